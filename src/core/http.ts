import { fetch } from "undici";

export type FetchFn = typeof fetch;
type RequestInit = NonNullable<Parameters<FetchFn>[1]>;

export type JsonRecord = Record<string, unknown>;

export function isJsonRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function asJsonRecord(value: unknown): JsonRecord | null {
  return isJsonRecord(value) ? value : null;
}

export const DEFAULT_TIMEOUT_MS = 10_000;

export type HttpJsonResult = {
  status: number;
  ok: boolean;
  body: unknown;
};

export type HttpRequestOptions = {
  timeoutMs?: number;
  signal?: AbortSignal;
};

export class HttpStatusError extends Error {
  readonly status: number;
  readonly body: unknown;

  constructor(context: string, status: number, body: unknown) {
    super(`${context}: HTTP ${status}${describeErrorBody(body)}`);
    this.name = "HttpStatusError";
    this.status = status;
    this.body = body;
  }
}

function describeErrorBody(body: unknown): string {
  const detail = errorBodyText(body);
  return detail ? ` (${detail})` : "";
}

export function errorBodyText(body: unknown): string {
  if (typeof body === "string") return body.trim().slice(0, 300);
  const record = asJsonRecord(body);
  if (!record) return "";
  const parts: string[] = [];

  if (Array.isArray(record.errorMessages)) {
    for (const entry of record.errorMessages) {
      if (typeof entry === "string" && entry.trim()) parts.push(entry.trim());
    }
  }

  const errors = asJsonRecord(record.errors);
  if (errors) {
    for (const [field, message] of Object.entries(errors)) {
      if (typeof message === "string" && message.trim()) parts.push(`${field}: ${message.trim()}`);
    }
  }

  if (typeof record.message === "string" && record.message.trim()) parts.push(record.message.trim());

  return parts.join("; ");
}

export function describeHttpFailure(status: number, body: unknown): string {
  const detail = errorBodyText(body);
  return detail ? `HTTP ${status}: ${detail}` : `HTTP ${status}`;
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error && error.message) return error.message;
  return String(error);
}

export function isTimeoutError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if (error.name === "TimeoutError" || error.name === "AbortError") return true;
  const text = error.message.toLowerCase();
  return text.includes("timeout") || text.includes("timed out");
}

// A caller-owned signal carries its own deadline; otherwise the request gets one.
function buildSignal(options: HttpRequestOptions): AbortSignal {
  return options.signal ?? AbortSignal.timeout(Math.max(1, Math.trunc(options.timeoutMs ?? DEFAULT_TIMEOUT_MS)));
}

function parseBody(text: string): unknown {
  if (!text.trim()) return null;
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return text;
  }
}

/**
 * Performs exactly one HTTP call and decodes the JSON body.
 * Non-2xx responses are returned, not thrown, so callers can decide what a 404 means.
 */
export async function requestJson(
  fetchFn: FetchFn,
  url: string,
  init: RequestInit = {},
  options: HttpRequestOptions = {},
): Promise<HttpJsonResult> {
  const response = await fetchFn(url, { ...init, signal: buildSignal(options) });
  const text = await response.text();

  return {
    status: response.status,
    ok: response.ok,
    body: parseBody(text),
  };
}

export function basicAuthHeader(user: string, secret: string): string {
  return `Basic ${Buffer.from(`${user}:${secret}`, "utf8").toString("base64")}`;
}

export function joinUrl(baseUrl: string, pathname: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/${pathname.replace(/^\/+/, "")}`;
}
