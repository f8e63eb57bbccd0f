import type { SourceLabel, TelemetryRecord } from "./telemetry";

export type ReconciledTelemetry = {
  record: TelemetryRecord;
  source: SourceLabel;
};

function timestampRank(record: TelemetryRecord): number {
  return record.timestamp ?? Number.NEGATIVE_INFINITY;
}

/**
 * Last-write-wins across the two sources. Assumes both providers stamp records
 * with comparable clocks; on equal timestamps PRIMARY is kept.
 */
export function reconcileSources(
  primary: TelemetryRecord | null,
  secondary: TelemetryRecord | null,
): ReconciledTelemetry | null {
  if (!primary) {
    return secondary ? { record: secondary, source: "SECONDARY" } : null;
  }

  if (!secondary) {
    return { record: primary, source: "PRIMARY" };
  }

  if (timestampRank(secondary) > timestampRank(primary)) {
    return { record: secondary, source: "SECONDARY" };
  }

  return { record: primary, source: "PRIMARY" };
}
