import { fetch } from "undici";
import { asJsonRecord, type FetchFn, HttpStatusError, joinUrl, requestJson } from "./http";

export const SOURCE_LABEL_VALUES = ["PRIMARY", "SECONDARY"] as const;
export type SourceLabel = (typeof SOURCE_LABEL_VALUES)[number];

export type TelemetryPosition = {
  lat: number | null;
  lon: number | null;
};

export type TelemetryDevices = {
  tdac: string | null;
  deviceBundleVersion: string | null;
};

export type TelemetryRecord = Readonly<{
  timestamp: number | null;
  position: Readonly<TelemetryPosition> | null;
  engineHours: number | null;
  archived: boolean | null;
  ceqId: string | null;
  companyName: string | null;
  devices: Readonly<TelemetryDevices> | null;
}>;

export type TelemetrySourceConfig = {
  label: SourceLabel;
  baseUrl: string;
  apiKey: string;
};

export type FetchTelemetryDependencies = {
  fetchFn?: FetchFn;
  signal?: AbortSignal;
  timeoutMs?: number;
};

function parseNullableString(value: unknown): string | null {
  if (typeof value === "string") return value.trim() || null;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return null;
}

function parseNullableNumber(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim()) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function parseNullableBoolean(value: unknown): boolean | null {
  if (typeof value === "boolean") return value;
  if (value === "true") return true;
  if (value === "false") return false;
  return null;
}

export function parseTelemetryTimestamp(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== "string" || !value.trim()) {
    return null;
  }

  const trimmed = value.trim();
  if (/^-?\d+(\.\d+)?$/.test(trimmed)) {
    return Number(trimmed);
  }

  const parsed = Date.parse(trimmed);
  return Number.isNaN(parsed) ? null : parsed;
}

function parsePosition(value: unknown): TelemetryPosition | null {
  const row = asJsonRecord(value);
  if (!row) return null;
  return {
    lat: parseNullableNumber(row.lat ?? row.latitude),
    lon: parseNullableNumber(row.lon ?? row.lng ?? row.longitude),
  };
}

function parseDevices(value: unknown): TelemetryDevices | null {
  const row = asJsonRecord(value);
  if (!row) return null;
  return {
    tdac: parseNullableString(row.tdac),
    deviceBundleVersion: parseNullableString(row.deviceBundleVersion),
  };
}

/**
 * Reads a provider payload without rejecting unknown shapes: missing or mistyped
 * fields become null. Returns null when the body holds no vehicle object at all.
 */
export function parseTelemetryRecord(body: unknown): TelemetryRecord | null {
  const candidate = Array.isArray(body) ? body.find((entry) => asJsonRecord(entry) !== null) : body;
  const row = asJsonRecord(candidate);
  if (!row || Object.keys(row).length === 0) {
    return null;
  }

  return Object.freeze({
    timestamp: parseTelemetryTimestamp(row.timestamp),
    position: parsePosition(row.position),
    engineHours: parseNullableNumber(row.engineHours),
    archived: parseNullableBoolean(row.archived),
    ceqId: parseNullableString(row.ceqId),
    companyName: parseNullableString(row.companyName),
    devices: parseDevices(row.devices),
  });
}

export function buildTelemetryUrl(baseUrl: string, vin: string): string {
  return joinUrl(baseUrl, `vehicles/${encodeURIComponent(vin)}`);
}

export async function fetchTelemetry(
  source: TelemetrySourceConfig,
  vin: string,
  dependencies: FetchTelemetryDependencies = {},
): Promise<TelemetryRecord | null> {
  const fetchFn = dependencies.fetchFn ?? fetch;
  const context = `telemetry ${source.label.toLowerCase()}`;

  const response = await requestJson(
    fetchFn,
    buildTelemetryUrl(source.baseUrl, vin),
    {
      method: "GET",
      headers: {
        accept: "application/json",
        authorization: `Bearer ${source.apiKey}`,
      },
    },
    { signal: dependencies.signal, timeoutMs: dependencies.timeoutMs },
  );

  if (response.status === 404) {
    return null;
  }

  if (!response.ok) {
    throw new HttpStatusError(`${context} ${vin}`, response.status, response.body);
  }

  return parseTelemetryRecord(response.body);
}
