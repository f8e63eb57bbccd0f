import { describe, expect, it, vi } from "vitest";

import type { TrackedIssue, UpdatePayload } from "../src/core/fields";
import { buildSyncReport, runVinSync, syncIssue, type VinSyncPorts } from "../src/core/sync";
import type { TelemetryRecord } from "../src/core/telemetry";

function telemetry(timestamp: number, overrides: Partial<TelemetryRecord> = {}): TelemetryRecord {
  return {
    timestamp,
    position: { lat: 1, lon: 2 },
    engineHours: 10,
    archived: false,
    ceqId: `CEQ-${timestamp}`,
    companyName: `Company ${timestamp}`,
    devices: { tdac: `TDAC-${timestamp}`, deviceBundleVersion: `v${timestamp}` },
    ...overrides,
  };
}

function trackedIssue(id: string, vin: string, companyNameAlreadySet = false): TrackedIssue {
  return { id, key: `FLEET-${id}`, vin, companyNameAlreadySet };
}

function applyUpdateMock() {
  return vi.fn<VinSyncPorts["applyUpdate"]>(async () => ({ ok: true }));
}

function ports(overrides: Partial<VinSyncPorts> = {}): VinSyncPorts {
  return {
    fetchPrimary: async () => null,
    fetchSecondary: async () => null,
    applyUpdate: async () => ({ ok: true }),
    ...overrides,
  };
}

describe("syncIssue", () => {
  it("chooses the newer secondary record and applies every present field", async () => {
    const applyUpdate = applyUpdateMock();
    const p = ports({
      fetchPrimary: vi.fn(async () => telemetry(100)),
      fetchSecondary: vi.fn(async () => telemetry(200)),
      applyUpdate,
    });

    const entry = await syncIssue(trackedIssue("1", "VIN00000000000001"), p);

    expect(entry.outcome).toBe("updated");
    expect(entry.source).toBe("SECONDARY");
    expect(entry.fields).toEqual(["ceqId", "companyName", "tdac", "deviceBundleVersion"]);
    expect(applyUpdate).toHaveBeenCalledTimes(1);
    const [issueId, payload] = applyUpdate.mock.calls[0];
    expect(issueId).toBe("1");
    expect(payload).toEqual<UpdatePayload>({
      ceqId: "CEQ-200",
      companyName: "Company 200",
      tdac: "TDAC-200",
      deviceBundleVersion: "v200",
    });
  });

  it("falls back to the primary record when the secondary fetch times out", async () => {
    const p = ports({
      fetchPrimary: vi.fn(async () => telemetry(100)),
      fetchSecondary: vi.fn(async () => {
        const error = new Error("secondary request timed out");
        error.name = "TimeoutError";
        throw error;
      }),
    });

    const entry = await syncIssue(trackedIssue("2", "VIN00000000000002"), p);

    expect(entry.outcome).toBe("updated");
    expect(entry.source).toBe("PRIMARY");
    expect(entry.sourceErrors).toEqual([
      { source: "SECONDARY", message: "secondary request timed out", timedOut: true },
    ]);
  });

  it("enforces the per-call timeout on a lookup that never settles", async () => {
    const p = ports({
      fetchPrimary: vi.fn(async () => telemetry(100)),
      fetchSecondary: vi.fn(() => new Promise<TelemetryRecord | null>(() => undefined)),
    });

    const entry = await syncIssue(trackedIssue("3", "VIN00000000000003"), p, { timeoutMs: 20 });

    expect(entry.source).toBe("PRIMARY");
    expect(entry.sourceErrors).toEqual([
      { source: "SECONDARY", message: "telemetry secondary: timed out after 20ms", timedOut: true },
    ]);
  });

  it("counts an update call that never settles as update-failed", async () => {
    const p = ports({
      fetchPrimary: vi.fn(async () => telemetry(100)),
      applyUpdate: () => new Promise<{ ok: true }>(() => undefined),
    });

    const entry = await syncIssue(trackedIssue("5", "VIN00000000000005"), p, { timeoutMs: 20 });

    expect(entry.outcome).toBe("update-failed");
    expect(entry.source).toBe("PRIMARY");
    expect(entry.detail).toBe("update FLEET-5: timed out after 20ms");
  });

  it("records no-data and makes no update call when both sources are absent", async () => {
    const applyUpdate = applyUpdateMock();
    const p = ports({ applyUpdate });

    const entry = await syncIssue(trackedIssue("4", "VIN00000000000004"), p);

    expect(entry.outcome).toBe("no-data");
    expect(entry.source).toBeNull();
    expect(applyUpdate).not.toHaveBeenCalled();
  });

  it("skips issues whose company name is already set", async () => {
    const applyUpdate = applyUpdateMock();
    const p = ports({
      fetchPrimary: vi.fn(async () => telemetry(100)),
      fetchSecondary: vi.fn(async () => telemetry(100)),
      applyUpdate,
    });

    const entry = await syncIssue(trackedIssue("5", "VIN00000000000005", true), p);

    expect(entry.outcome).toBe("skipped");
    expect(entry.detail).toBe("already-enriched");
    expect(entry.source).toBe("PRIMARY");
    expect(applyUpdate).not.toHaveBeenCalled();
  });

  it("skips when the chosen record has nothing to map", async () => {
    const applyUpdate = applyUpdateMock();
    const p = ports({
      fetchPrimary: vi.fn(async () => telemetry(100, { ceqId: null, companyName: null, devices: null })),
      applyUpdate,
    });

    const entry = await syncIssue(trackedIssue("6", "VIN00000000000006"), p);

    expect(entry.outcome).toBe("skipped");
    expect(entry.detail).toBe("no-fields");
    expect(applyUpdate).not.toHaveBeenCalled();
  });

  it("reports update-failed with the sink's reason", async () => {
    const p = ports({
      fetchPrimary: vi.fn(async () => telemetry(100)),
      applyUpdate: vi.fn(async () => ({ ok: false as const, reason: "HTTP 400: customfield_10101: bad value" })),
    });

    const entry = await syncIssue(trackedIssue("7", "VIN00000000000007"), p);

    expect(entry.outcome).toBe("update-failed");
    expect(entry.detail).toBe("HTTP 400: customfield_10101: bad value");
  });

  it("plans without calling the sink in dry-run", async () => {
    const applyUpdate = applyUpdateMock();
    const p = ports({ fetchPrimary: vi.fn(async () => telemetry(100)), applyUpdate });

    const entry = await syncIssue(trackedIssue("8", "VIN00000000000008"), p, { dryRun: true });

    expect(entry.outcome).toBe("planned");
    expect(applyUpdate).not.toHaveBeenCalled();
  });
});

describe("runVinSync", () => {
  it("continues after a failing issue and counts every outcome", async () => {
    const issues = [
      trackedIssue("1", "VIN-THROWS"),
      trackedIssue("2", "VIN-NODATA"),
      trackedIssue("3", "VIN-DONE", true),
      trackedIssue("4", "VIN-OK"),
    ];
    const p = ports({
      fetchPrimary: vi.fn(async (vin: string) => (vin === "VIN-NODATA" ? null : telemetry(100))),
      applyUpdate: vi.fn(async (issueId: string) => {
        if (issueId === "1") {
          throw new Error("connection reset");
        }
        return { ok: true as const };
      }),
    });

    const report = await runVinSync(issues, p);

    expect(report.entries.map((entry) => entry.outcome)).toEqual(["update-failed", "no-data", "skipped", "updated"]);
    expect(report.counts).toEqual({ "no-data": 1, skipped: 1, updated: 1, "update-failed": 1, planned: 0 });
    expect(report.entries[0].detail).toBe("connection reset");
    expect(report.total).toBe(4);
    expect(report.cancelled).toBe(false);
  });

  it("keeps input order when issues run concurrently", async () => {
    const delays: Record<string, number> = { A: 30, B: 5, C: 15 };
    const p = ports({
      fetchPrimary: vi.fn(async (vin: string) => {
        await new Promise((resolve) => setTimeout(resolve, delays[vin] ?? 0));
        return telemetry(100);
      }),
    });

    const report = await runVinSync([trackedIssue("1", "A"), trackedIssue("2", "B"), trackedIssue("3", "C")], p, {
      concurrency: 3,
    });

    expect(report.entries.map((entry) => entry.vin)).toEqual(["A", "B", "C"]);
    expect(report.counts.updated).toBe(3);
  });

  it("stops starting new issues once the signal aborts", async () => {
    const controller = new AbortController();
    const fetchPrimary = vi.fn(async () => telemetry(100));
    const p = ports({ fetchPrimary });
    const seen: string[] = [];

    const report = await runVinSync(
      [trackedIssue("1", "A"), trackedIssue("2", "B"), trackedIssue("3", "C")],
      p,
      {
        signal: controller.signal,
        onEntry: (entry) => {
          seen.push(entry.vin);
          controller.abort();
        },
      },
    );

    expect(seen).toEqual(["A"]);
    expect(report.entries).toHaveLength(1);
    expect(report.cancelled).toBe(true);
    expect(fetchPrimary).toHaveBeenCalledTimes(1);
  });

  it("returns an empty report for no issues", async () => {
    const report = await runVinSync([], ports());
    expect(report).toEqual(
      buildSyncReport([], { dryRun: false, cancelled: false, total: 0 }),
    );
    expect(report.counts.updated).toBe(0);
  });
});
