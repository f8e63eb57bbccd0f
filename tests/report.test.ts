import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { DEFAULT_REPORT_PATH, formatSourceErrors, formatSyncCounts, formatSyncEntry, writeSyncReport } from "../src/core/report";
import { buildSyncReport, type SyncIssueEntry } from "../src/core/sync";

const skippedEntry: SyncIssueEntry = {
  issueId: "10002",
  issueKey: "FLEET-2",
  vin: "2T1BURHE0JC000001",
  outcome: "skipped",
  source: "PRIMARY",
  fields: ["ceqId", "tdac"],
  detail: "already-enriched",
  sourceErrors: [{ source: "SECONDARY", message: "telemetry secondary: timed out after 50ms", timedOut: true }],
};

const noDataEntry: SyncIssueEntry = {
  issueId: "10003",
  issueKey: "FLEET-3",
  vin: "3VWFE21C04M000001",
  outcome: "no-data",
  source: null,
  fields: [],
  detail: null,
  sourceErrors: [],
};

describe("sync report formatting", () => {
  it("renders tab separated columns", () => {
    expect(formatSyncEntry(skippedEntry)).toBe("FLEET-2\t2T1BURHE0JC000001\tskipped\tPRIMARY\tceqId,tdac\talready-enriched");
    expect(formatSyncEntry(noDataEntry)).toBe("FLEET-3\t3VWFE21C04M000001\tno-data\t-\t-");
  });

  it("renders source errors as indented lines", () => {
    expect(formatSourceErrors(skippedEntry)).toEqual(["  secondary timeout: telemetry secondary: timed out after 50ms"]);
    expect(formatSourceErrors(noDataEntry)).toEqual([]);
  });

  it("adds the planned count only in dry-run", () => {
    const live = buildSyncReport([skippedEntry, noDataEntry], { total: 3, dryRun: false, cancelled: true });
    expect(formatSyncCounts(live)).toBe("processed 2/3: no-data=1 skipped=1 updated=0 update-failed=0");

    const dry = buildSyncReport([skippedEntry], { total: 1, dryRun: true, cancelled: false });
    expect(formatSyncCounts(dry)).toBe("processed 1/1: no-data=0 skipped=1 updated=0 update-failed=0 planned=0");
  });
});

describe("writeSyncReport", () => {
  let tempDir = "";

  beforeEach(() => {
    tempDir = mkdtempSync(path.join(os.tmpdir(), "fleet-sync-report-test-"));
  });

  afterEach(() => {
    if (tempDir) {
      rmSync(tempDir, { recursive: true, force: true });
    }
  });

  it("writes a versioned record under the runtime directory", async () => {
    const report = buildSyncReport([noDataEntry], { total: 1, dryRun: false, cancelled: false });

    const written = await writeSyncReport(report, DEFAULT_REPORT_PATH, tempDir);

    expect(written).toBe(path.join(tempDir, ".fleet-sync", "runtime", "last-sync.json"));
    const saved = JSON.parse(readFileSync(written, "utf8")) as { version: number; generated_at: string; report: unknown };
    expect(saved.version).toBe(1);
    expect(Number.isNaN(Date.parse(saved.generated_at))).toBe(false);
    expect(saved.report).toEqual(report);
  });
});
