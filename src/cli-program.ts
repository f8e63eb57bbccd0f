import { Command } from "commander";
import { fetch } from "undici";
import { redactSyncConfig, resolveSyncConfig, type SyncConfig, type SyncConfigResolution, validateSyncConfig } from "./core/config";
import type { FetchFn } from "./core/http";
import { applyJiraUpdate, searchTrackedIssues } from "./core/jira";
import { type PreflightResult, runPreflight } from "./core/preflight";
import { formatSourceErrors, formatSyncCounts, formatSyncEntry, writeSyncReport } from "./core/report";
import { runVinSync, type SyncIssueEntry, type VinSyncPorts } from "./core/sync";
import { fetchTelemetry } from "./core/telemetry";

export const SYNC_INVALID_CONFIG_EXIT_CODE = 2;
export const SYNC_PARTIAL_FAILURE_EXIT_CODE = 3;
export const PREFLIGHT_FAILED_EXIT_CODE = 4;

type ConfigCommandOptions = {
  config?: string;
};

type SyncCommandOptions = ConfigCommandOptions & {
  jql?: string;
  limit?: string;
  concurrency?: string;
  timeoutMs?: string;
  dryRun: boolean;
  preflight: boolean;
  report?: string;
};

function printConfigProblems(command: string, resolution: SyncConfigResolution, missing: string[]): boolean {
  if (!resolution.problems.length && !missing.length) {
    return false;
  }

  console.error(`${command}: invalid configuration (${resolution.configPath}).`);
  for (const problem of resolution.problems) {
    console.error(`- ${problem}`);
  }
  if (missing.length) {
    console.error(`- missing: ${missing.join(", ")}`);
  }
  return true;
}

function printPreflight(result: PreflightResult): void {
  for (const check of result.checks) {
    console.log(`preflight ${check.name}: ${check.ok ? "OK" : "FAIL"} (${check.detail})`);
  }
}

function parseLimit(raw: string | undefined): number | null | undefined {
  if (raw === undefined) return null;
  const trimmed = raw.trim();
  if (!/^[0-9]+$/.test(trimmed) || Number(trimmed) <= 0) return undefined;
  return Number(trimmed);
}

function printSyncEntry(entry: SyncIssueEntry): void {
  console.log(formatSyncEntry(entry));
  for (const line of formatSourceErrors(entry)) {
    console.log(line);
  }
}

export function buildSyncPorts(config: SyncConfig, fetchFn: FetchFn): VinSyncPorts {
  return {
    fetchPrimary: (vin, signal) => fetchTelemetry(config.telemetry.primary, vin, { fetchFn, signal }),
    fetchSecondary: (vin, signal) => fetchTelemetry(config.telemetry.secondary, vin, { fetchFn, signal }),
    applyUpdate: (issueId, payload, signal) =>
      applyJiraUpdate(config.jira, config.jira.fields, issueId, payload, { fetchFn, signal }),
  };
}

export function createProgram(fetchFn: FetchFn = fetch): Command {
  const program = new Command();

  program.name("fleet-sync").description("Sync fleet telemetry into Jira issues keyed by VIN").version("0.1.0");

  program
    .command("sync")
    .description("Enrich tracked issues with the freshest telemetry for their VIN")
    .option("-c, --config <path>", "Path to YAML config (default .fleet-sync/config.yml)")
    .option("--jql <query>", "Override the JQL used to select issues")
    .option("--limit <n>", "Process at most n issues")
    .option("--concurrency <n>", "Issues processed in parallel")
    .option("--timeout-ms <n>", "Per-call timeout for telemetry and update requests")
    .option("--dry-run", "Plan updates without writing to Jira", false)
    .option("--preflight", "Run auth/permission/field checks before syncing", false)
    .option("--report <path>", "Write the sync report as JSON")
    .action(async (opts: SyncCommandOptions) => {
      const controller = new AbortController();
      const onSigint = (): void => {
        console.error("sync: interrupted, finishing in-flight issues.");
        controller.abort();
      };

      try {
        const resolution = await resolveSyncConfig({
          configPath: opts.config ?? null,
          overrides: {
            jql: opts.jql ?? null,
            concurrency: opts.concurrency ?? null,
            timeoutMs: opts.timeoutMs ?? null,
          },
        });
        const limit = parseLimit(opts.limit);
        if (limit === undefined) {
          resolution.problems.push(`--limit must be a positive integer (got '${String(opts.limit)}')`);
        }

        const missing = validateSyncConfig(resolution.config);
        if (printConfigProblems("sync", resolution, missing)) {
          process.exitCode = SYNC_INVALID_CONFIG_EXIT_CODE;
          return;
        }

        const { config } = resolution;

        if (opts.preflight) {
          const preflight = await runPreflight(config.jira, config.jira.fields, { fetchFn, timeoutMs: config.timeoutMs });
          printPreflight(preflight);
          if (!preflight.ok) {
            console.error("sync: preflight failed; no issues processed.");
            process.exitCode = PREFLIGHT_FAILED_EXIT_CODE;
            return;
          }
        }

        const search = await searchTrackedIssues(
          config.jira,
          { jql: config.jira.jql, fieldMap: config.jira.fields, limit },
          { fetchFn, timeoutMs: config.timeoutMs },
        );

        console.log(`sync: ${search.issues.length} issue(s) to process${opts.dryRun ? " (dry-run)" : ""}`);
        if (search.ignoredKeys.length) {
          console.log(`sync: ignored issues without VIN: ${search.ignoredKeys.join(", ")}`);
        }

        process.once("SIGINT", onSigint);
        const report = await runVinSync(search.issues, buildSyncPorts(config, fetchFn), {
          dryRun: opts.dryRun,
          timeoutMs: config.timeoutMs,
          concurrency: config.concurrency,
          signal: controller.signal,
          onEntry: printSyncEntry,
        });

        console.log(`\nsync: ${formatSyncCounts(report)}`);
        if (report.cancelled) {
          console.log("sync: cancelled before all issues were started.");
        }

        if (opts.report) {
          const reportPath = await writeSyncReport(report, opts.report);
          console.log(`sync: report written to ${reportPath}`);
        }

        if (report.counts["update-failed"] > 0) {
          process.exitCode = SYNC_PARTIAL_FAILURE_EXIT_CODE;
        }
      } catch (error) {
        console.error("sync: ERROR");
        console.error(error);
        process.exitCode = 1;
      } finally {
        process.removeListener("SIGINT", onSigint);
      }
    });

  program
    .command("preflight")
    .description("Check Jira credentials, permissions and configured field ids")
    .option("-c, --config <path>", "Path to YAML config (default .fleet-sync/config.yml)")
    .action(async (opts: ConfigCommandOptions) => {
      try {
        const resolution = await resolveSyncConfig({ configPath: opts.config ?? null });
        const missing = validateSyncConfig(resolution.config).filter(
          (key) => key.startsWith("jira.") && key !== "jira.jql",
        );
        if (printConfigProblems("preflight", resolution, missing)) {
          process.exitCode = SYNC_INVALID_CONFIG_EXIT_CODE;
          return;
        }

        const { config } = resolution;
        const result = await runPreflight(config.jira, config.jira.fields, { fetchFn, timeoutMs: config.timeoutMs });
        printPreflight(result);

        if (!result.ok) {
          process.exitCode = PREFLIGHT_FAILED_EXIT_CODE;
          return;
        }
        console.log("preflight: OK");
      } catch (error) {
        console.error("preflight: ERROR");
        console.error(error);
        process.exitCode = 1;
      }
    });

  const configCommand = program.command("config").description("Inspect resolved configuration");

  configCommand
    .command("show")
    .description("Print the resolved configuration with secrets masked")
    .option("-c, --config <path>", "Path to YAML config (default .fleet-sync/config.yml)")
    .action(async (opts: ConfigCommandOptions) => {
      try {
        const resolution = await resolveSyncConfig({ configPath: opts.config ?? null });
        console.log(`config: ${resolution.configPath}${resolution.fileFound ? "" : " (not found)"}`);
        console.log(JSON.stringify(redactSyncConfig(resolution.config), null, 2));

        const missing = validateSyncConfig(resolution.config);
        if (printConfigProblems("config show", resolution, missing)) {
          process.exitCode = SYNC_INVALID_CONFIG_EXIT_CODE;
        }
      } catch (error) {
        console.error("config show: ERROR");
        console.error(error);
        process.exitCode = 1;
      }
    });

  return program;
}

export async function runCli(argv: string[] = process.argv, fetchFn: FetchFn = fetch): Promise<void> {
  const program = createProgram(fetchFn);
  await program.parseAsync(argv);
}
