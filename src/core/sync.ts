import { decideIssueUpdate, mapTelemetryFields, payloadFieldKeys, type TrackedIssue, type UpdateFieldKey, type UpdatePayload } from "./fields";
import { DEFAULT_TIMEOUT_MS, isTimeoutError, toErrorMessage } from "./http";
import { reconcileSources } from "./reconcile";
import type { SourceLabel, TelemetryRecord } from "./telemetry";

export const SYNC_OUTCOME_VALUES = ["no-data", "skipped", "updated", "update-failed", "planned"] as const;
export type SyncOutcome = (typeof SYNC_OUTCOME_VALUES)[number];

export type TelemetryLookup = (vin: string, signal: AbortSignal) => Promise<TelemetryRecord | null>;

export type UpdateResult = { ok: true } | { ok: false; reason: string };

export type ApplyUpdateFn = (issueId: string, payload: UpdatePayload, signal: AbortSignal) => Promise<UpdateResult>;

export type VinSyncPorts = {
  fetchPrimary: TelemetryLookup;
  fetchSecondary: TelemetryLookup;
  applyUpdate: ApplyUpdateFn;
};

export type SourceErrorNote = {
  source: SourceLabel;
  message: string;
  timedOut: boolean;
};

export type SyncIssueEntry = {
  issueId: string;
  issueKey: string;
  vin: string;
  outcome: SyncOutcome;
  source: SourceLabel | null;
  fields: UpdateFieldKey[];
  detail: string | null;
  sourceErrors: SourceErrorNote[];
};

export type SyncReport = {
  dryRun: boolean;
  cancelled: boolean;
  total: number;
  counts: Record<SyncOutcome, number>;
  entries: SyncIssueEntry[];
};

export type VinSyncOptions = {
  dryRun?: boolean;
  timeoutMs?: number;
  concurrency?: number;
  signal?: AbortSignal;
  onEntry?: (entry: SyncIssueEntry) => void;
};

type SourceLookupResult = {
  record: TelemetryRecord | null;
  error: SourceErrorNote | null;
};

function emptyCounts(): Record<SyncOutcome, number> {
  return {
    "no-data": 0,
    skipped: 0,
    updated: 0,
    "update-failed": 0,
    planned: 0,
  };
}

export function buildSyncReport(
  entries: readonly SyncIssueEntry[],
  meta: { dryRun: boolean; cancelled: boolean; total: number },
): SyncReport {
  const counts = entries.reduce<Record<SyncOutcome, number>>(
    (acc, entry) => ({ ...acc, [entry.outcome]: acc[entry.outcome] + 1 }),
    emptyCounts(),
  );

  return {
    dryRun: meta.dryRun,
    cancelled: meta.cancelled,
    total: meta.total,
    counts,
    entries: [...entries],
  };
}

async function withCallTimeout<T>(label: string, timeoutMs: number, call: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      const error = new Error(`${label}: timed out after ${timeoutMs}ms`);
      error.name = "TimeoutError";
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([call(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

async function lookupSource(
  source: SourceLabel,
  lookup: TelemetryLookup,
  vin: string,
  timeoutMs: number,
): Promise<SourceLookupResult> {
  try {
    const record = await withCallTimeout(`telemetry ${source.toLowerCase()}`, timeoutMs, (signal) => lookup(vin, signal));
    return { record, error: null };
  } catch (error) {
    return {
      record: null,
      error: { source, message: toErrorMessage(error), timedOut: isTimeoutError(error) },
    };
  }
}

export async function syncIssue(
  issue: TrackedIssue,
  ports: VinSyncPorts,
  options: Pick<VinSyncOptions, "dryRun" | "timeoutMs"> = {},
): Promise<SyncIssueEntry> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const [primary, secondary] = await Promise.all([
    lookupSource("PRIMARY", ports.fetchPrimary, issue.vin, timeoutMs),
    lookupSource("SECONDARY", ports.fetchSecondary, issue.vin, timeoutMs),
  ]);

  const sourceErrors = [primary.error, secondary.error].filter((note): note is SourceErrorNote => note !== null);
  const base = {
    issueId: issue.id,
    issueKey: issue.key,
    vin: issue.vin,
    sourceErrors,
  };

  const chosen = reconcileSources(primary.record, secondary.record);
  if (!chosen) {
    return { ...base, outcome: "no-data", source: null, fields: [], detail: "no telemetry from either source" };
  }

  const payload = mapTelemetryFields(chosen.record);
  const fields = payloadFieldKeys(payload);
  const decision = decideIssueUpdate(issue, payload);

  if (!decision.update) {
    return { ...base, outcome: "skipped", source: chosen.source, fields, detail: decision.reason };
  }

  if (options.dryRun) {
    return { ...base, outcome: "planned", source: chosen.source, fields, detail: null };
  }

  try {
    const result = await withCallTimeout(`update ${issue.key}`, timeoutMs, (signal) =>
      ports.applyUpdate(issue.id, payload, signal),
    );
    if (result.ok) {
      return { ...base, outcome: "updated", source: chosen.source, fields, detail: null };
    }
    return { ...base, outcome: "update-failed", source: chosen.source, fields, detail: result.reason };
  } catch (error) {
    return { ...base, outcome: "update-failed", source: chosen.source, fields, detail: toErrorMessage(error) };
  }
}

/**
 * Runs the per-VIN pipeline over every issue. Issues are independent: up to
 * `concurrency` run at once, entries keep input order, and once `signal` aborts
 * no further issue is started.
 */
export async function runVinSync(
  issues: readonly TrackedIssue[],
  ports: VinSyncPorts,
  options: VinSyncOptions = {},
): Promise<SyncReport> {
  const dryRun = options.dryRun ?? false;
  const concurrency = Math.max(1, Math.trunc(options.concurrency ?? 1));
  const slots: Array<SyncIssueEntry | undefined> = new Array(issues.length).fill(undefined);
  let nextIndex = 0;

  const worker = async (): Promise<void> => {
    while (nextIndex < issues.length && !options.signal?.aborted) {
      const index = nextIndex;
      nextIndex += 1;

      const entry = await syncIssue(issues[index], ports, { dryRun, timeoutMs: options.timeoutMs });
      slots[index] = entry;
      options.onEntry?.(entry);
    }
  };

  await Promise.all(Array.from({ length: Math.min(concurrency, issues.length) }, () => worker()));

  const entries = slots.filter((entry): entry is SyncIssueEntry => entry !== undefined);
  return buildSyncReport(entries, {
    dryRun,
    cancelled: entries.length < issues.length,
    total: issues.length,
  });
}
