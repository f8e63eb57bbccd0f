import type { TelemetryRecord } from "./telemetry";

export const UPDATE_FIELD_KEYS = ["ceqId", "companyName", "tdac", "deviceBundleVersion"] as const;
export type UpdateFieldKey = (typeof UPDATE_FIELD_KEYS)[number];

export type UpdatePayload = Partial<Record<UpdateFieldKey, string>>;

export type TrackedIssue = Readonly<{
  id: string;
  key: string;
  vin: string;
  companyNameAlreadySet: boolean;
}>;

export type UpdateGateDecision = { update: true } | { update: false; reason: "already-enriched" | "no-fields" };

function presentValue(value: string | null | undefined): string | null {
  if (typeof value !== "string") return null;
  return value.trim() ? value : null;
}

export function mapTelemetryFields(record: TelemetryRecord): UpdatePayload {
  const payload: UpdatePayload = {};
  const candidates: Array<[UpdateFieldKey, string | null]> = [
    ["ceqId", presentValue(record.ceqId)],
    ["companyName", presentValue(record.companyName)],
  ];

  // devices may be null; both device entries are dropped with it.
  if (record.devices) {
    candidates.push(["tdac", presentValue(record.devices.tdac)]);
    candidates.push(["deviceBundleVersion", presentValue(record.devices.deviceBundleVersion)]);
  }

  for (const [key, value] of candidates) {
    if (value !== null) {
      payload[key] = value;
    }
  }

  return payload;
}

export function payloadFieldKeys(payload: UpdatePayload): UpdateFieldKey[] {
  return UPDATE_FIELD_KEYS.filter((key) => payload[key] !== undefined);
}

export function decideIssueUpdate(issue: TrackedIssue, payload: UpdatePayload): UpdateGateDecision {
  if (issue.companyNameAlreadySet) {
    return { update: false, reason: "already-enriched" };
  }

  if (payloadFieldKeys(payload).length === 0) {
    return { update: false, reason: "no-fields" };
  }

  return { update: true };
}

export function shouldUpdateIssue(issue: TrackedIssue, payload: UpdatePayload): boolean {
  return decideIssueUpdate(issue, payload).update;
}
