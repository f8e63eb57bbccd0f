import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { SyncIssueEntry, SyncReport } from "./sync";

export const DEFAULT_REPORT_PATH = path.join(".fleet-sync", "runtime", "last-sync.json");

export type SyncReportRecord = {
  version: 1;
  generated_at: string;
  report: SyncReport;
};

export function formatSyncEntry(entry: SyncIssueEntry): string {
  const source = entry.source ?? "-";
  const fields = entry.fields.length ? entry.fields.join(",") : "-";
  const columns = [entry.issueKey, entry.vin, entry.outcome, source, fields];
  if (entry.detail) {
    columns.push(entry.detail);
  }
  return columns.join("\t");
}

export function formatSourceErrors(entry: SyncIssueEntry): string[] {
  return entry.sourceErrors.map((note) => {
    const kind = note.timedOut ? "timeout" : "unavailable";
    return `  ${note.source.toLowerCase()} ${kind}: ${note.message}`;
  });
}

export function formatSyncCounts(report: SyncReport): string {
  const parts = [
    `no-data=${report.counts["no-data"]}`,
    `skipped=${report.counts.skipped}`,
    `updated=${report.counts.updated}`,
    `update-failed=${report.counts["update-failed"]}`,
  ];
  if (report.dryRun) {
    parts.push(`planned=${report.counts.planned}`);
  }
  return `processed ${report.entries.length}/${report.total}: ${parts.join(" ")}`;
}

export async function writeSyncReport(
  report: SyncReport,
  reportPath: string = DEFAULT_REPORT_PATH,
  cwd: string = process.cwd(),
): Promise<string> {
  const filePath = path.resolve(cwd, reportPath);
  const record: SyncReportRecord = {
    version: 1,
    generated_at: new Date().toISOString(),
    report,
  };

  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, `${JSON.stringify(record, null, 2)}\n`, "utf8");
  return filePath;
}
