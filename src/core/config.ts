import { readFile } from "node:fs/promises";
import path from "node:path";
import { parse } from "yaml";
import { z } from "zod";
import { UPDATE_FIELD_KEYS } from "./fields";
import { DEFAULT_TIMEOUT_MS, toErrorMessage } from "./http";
import type { JiraConnection, JiraFieldMap } from "./jira";
import type { TelemetrySourceConfig } from "./telemetry";

const DEFAULT_CONFIG_FILE = path.join(".fleet-sync", "config.yml");
const CONFIG_PATH_ENV_KEY = "FLEET_SYNC_CONFIG";
const DEFAULT_CONCURRENCY = 1;
const MAX_CONCURRENCY = 32;
// setTimeout delays are signed 32-bit.
export const MAX_TIMEOUT_MS = 2_147_483_647;

type EnvBinding = {
  primary: string;
  compat?: string[];
};

const ENV_KEYS = {
  jiraBaseUrl: { primary: "FLEET_SYNC_JIRA_BASE_URL", compat: ["JIRA_BASE_URL"] },
  jiraEmail: { primary: "FLEET_SYNC_JIRA_EMAIL", compat: ["JIRA_EMAIL"] },
  jiraApiToken: { primary: "FLEET_SYNC_JIRA_API_TOKEN", compat: ["JIRA_API_TOKEN"] },
  jql: { primary: "FLEET_SYNC_JQL" },
  primaryUrl: { primary: "FLEET_SYNC_PRIMARY_URL" },
  primaryApiKey: { primary: "FLEET_SYNC_PRIMARY_API_KEY" },
  secondaryUrl: { primary: "FLEET_SYNC_SECONDARY_URL" },
  secondaryApiKey: { primary: "FLEET_SYNC_SECONDARY_API_KEY" },
  timeoutMs: { primary: "FLEET_SYNC_TIMEOUT_MS" },
  concurrency: { primary: "FLEET_SYNC_CONCURRENCY" },
} satisfies Record<string, EnvBinding>;

const SourceFileSchema = z
  .object({
    baseUrl: z.string().optional(),
    apiKey: z.string().optional(),
  })
  .strict();

export const SyncConfigFileSchema = z
  .object({
    jira: z
      .object({
        baseUrl: z.string().optional(),
        email: z.string().optional(),
        apiToken: z.string().optional(),
        jql: z.string().optional(),
        fields: z
          .object({
            vin: z.string().nullable().optional(),
            ceqId: z.string().optional(),
            companyName: z.string().optional(),
            tdac: z.string().optional(),
            deviceBundleVersion: z.string().optional(),
          })
          .strict()
          .optional(),
      })
      .strict()
      .optional(),
    telemetry: z
      .object({
        primary: SourceFileSchema.optional(),
        secondary: SourceFileSchema.optional(),
      })
      .strict()
      .optional(),
    sync: z
      .object({
        timeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS).optional(),
        concurrency: z.number().int().positive().max(MAX_CONCURRENCY).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type SyncConfigFile = z.infer<typeof SyncConfigFileSchema>;

export type SyncConfig = {
  jira: JiraConnection & {
    jql: string;
    fields: JiraFieldMap;
  };
  telemetry: {
    primary: TelemetrySourceConfig;
    secondary: TelemetrySourceConfig;
  };
  timeoutMs: number;
  concurrency: number;
};

export type SyncConfigOverrides = {
  jql?: string | null;
  timeoutMs?: string | number | null;
  concurrency?: string | number | null;
};

export type ResolveSyncConfigOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  configPath?: string | null;
  overrides?: SyncConfigOverrides;
};

export type SyncConfigResolution = {
  config: SyncConfig;
  configPath: string;
  fileFound: boolean;
  problems: string[];
};

function isErrno(error: unknown, code: string): boolean {
  return typeof error === "object" && error !== null && "code" in error && (error as { code?: unknown }).code === code;
}

function readEnv(env: NodeJS.ProcessEnv, binding: EnvBinding): string | undefined {
  const primary = env[binding.primary]?.trim();
  if (primary) {
    return primary;
  }

  for (const key of binding.compat ?? []) {
    const compat = env[key]?.trim();
    if (compat) {
      return compat;
    }
  }

  return undefined;
}

function firstText(...values: Array<string | null | undefined>): string {
  for (const value of values) {
    if (typeof value === "string" && value.trim()) {
      return value.trim();
    }
  }
  return "";
}

function parsePositiveInt(
  value: string | number | null | undefined,
  label: string,
  problems: string[],
  max: number = Number.MAX_SAFE_INTEGER,
): number | null {
  if (value === null || value === undefined || value === "") return null;
  const raw = typeof value === "number" ? String(value) : value.trim();
  if (!/^[0-9]+$/.test(raw) || Number(raw) <= 0 || !Number.isSafeInteger(Number(raw))) {
    problems.push(`${label} must be a positive integer (got '${raw}')`);
    return null;
  }
  if (Number(raw) > max) {
    problems.push(`${label} must be at most ${max} (got '${raw}')`);
    return null;
  }
  return Number(raw);
}

export function getConfigFilePath(options: Pick<ResolveSyncConfigOptions, "cwd" | "env" | "configPath"> = {}): string {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const raw = firstText(options.configPath, env[CONFIG_PATH_ENV_KEY]);
  return path.resolve(cwd, raw || DEFAULT_CONFIG_FILE);
}

async function loadConfigFile(
  filePath: string,
  problems: string[],
): Promise<{ file: SyncConfigFile; found: boolean }> {
  let raw = "";
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    if (isErrno(error, "ENOENT")) {
      return { file: {}, found: false };
    }
    problems.push(`config: unable to read '${filePath}' (${toErrorMessage(error)})`);
    return { file: {}, found: false };
  }

  let document: unknown;
  try {
    document = parse(raw);
  } catch (error) {
    problems.push(`config: unable to parse '${filePath}' (${toErrorMessage(error)})`);
    return { file: {}, found: true };
  }

  const parsed = SyncConfigFileSchema.safeParse(document ?? {});
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      const where = issue.path.length ? issue.path.join(".") : "(root)";
      problems.push(`config: ${where}: ${issue.message}`);
    }
    return { file: {}, found: true };
  }

  return { file: parsed.data, found: true };
}

/**
 * Layers configuration: flags over environment over the YAML file over defaults.
 * Shape problems are collected rather than thrown; missing values are left empty
 * for `validateSyncConfig` to report.
 */
export async function resolveSyncConfig(options: ResolveSyncConfigOptions = {}): Promise<SyncConfigResolution> {
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};
  const problems: string[] = [];
  const configPath = getConfigFilePath(options);
  const { file, found } = await loadConfigFile(configPath, problems);

  const fileFields = file.jira?.fields ?? {};
  const timeoutMs =
    parsePositiveInt(overrides.timeoutMs, "--timeout-ms", problems, MAX_TIMEOUT_MS) ??
    parsePositiveInt(readEnv(env, ENV_KEYS.timeoutMs), ENV_KEYS.timeoutMs.primary, problems, MAX_TIMEOUT_MS) ??
    file.sync?.timeoutMs ??
    DEFAULT_TIMEOUT_MS;
  const concurrency =
    parsePositiveInt(overrides.concurrency, "--concurrency", problems) ??
    parsePositiveInt(readEnv(env, ENV_KEYS.concurrency), ENV_KEYS.concurrency.primary, problems) ??
    file.sync?.concurrency ??
    DEFAULT_CONCURRENCY;

  const config: SyncConfig = {
    jira: {
      baseUrl: firstText(readEnv(env, ENV_KEYS.jiraBaseUrl), file.jira?.baseUrl),
      email: firstText(readEnv(env, ENV_KEYS.jiraEmail), file.jira?.email),
      apiToken: firstText(readEnv(env, ENV_KEYS.jiraApiToken), file.jira?.apiToken),
      jql: firstText(overrides.jql, readEnv(env, ENV_KEYS.jql), file.jira?.jql),
      fields: {
        vin: firstText(fileFields.vin) || null,
        ceqId: firstText(fileFields.ceqId),
        companyName: firstText(fileFields.companyName),
        tdac: firstText(fileFields.tdac),
        deviceBundleVersion: firstText(fileFields.deviceBundleVersion),
      },
    },
    telemetry: {
      primary: {
        label: "PRIMARY",
        baseUrl: firstText(readEnv(env, ENV_KEYS.primaryUrl), file.telemetry?.primary?.baseUrl),
        apiKey: firstText(readEnv(env, ENV_KEYS.primaryApiKey), file.telemetry?.primary?.apiKey),
      },
      secondary: {
        label: "SECONDARY",
        baseUrl: firstText(readEnv(env, ENV_KEYS.secondaryUrl), file.telemetry?.secondary?.baseUrl),
        apiKey: firstText(readEnv(env, ENV_KEYS.secondaryApiKey), file.telemetry?.secondary?.apiKey),
      },
    },
    timeoutMs,
    concurrency: Math.min(concurrency, MAX_CONCURRENCY),
  };

  return { config, configPath, fileFound: found, problems };
}

/** Returns the dotted keys that must be set before a run may start. */
export function validateSyncConfig(config: SyncConfig): string[] {
  const missing: string[] = [];
  const required: Array<[string, string]> = [
    ["jira.baseUrl", config.jira.baseUrl],
    ["jira.email", config.jira.email],
    ["jira.apiToken", config.jira.apiToken],
    ["jira.jql", config.jira.jql],
    ["telemetry.primary.baseUrl", config.telemetry.primary.baseUrl],
    ["telemetry.primary.apiKey", config.telemetry.primary.apiKey],
    ["telemetry.secondary.baseUrl", config.telemetry.secondary.baseUrl],
    ["telemetry.secondary.apiKey", config.telemetry.secondary.apiKey],
  ];

  for (const key of UPDATE_FIELD_KEYS) {
    required.push([`jira.fields.${key}`, config.jira.fields[key]]);
  }

  for (const [key, value] of required) {
    if (!value.trim()) {
      missing.push(key);
    }
  }

  return missing;
}

function mask(secret: string): string {
  if (!secret) return "";
  return secret.length <= 4 ? "****" : `${secret.slice(0, 2)}****`;
}

export function redactSyncConfig(config: SyncConfig): SyncConfig {
  return {
    ...config,
    jira: { ...config.jira, apiToken: mask(config.jira.apiToken) },
    telemetry: {
      primary: { ...config.telemetry.primary, apiKey: mask(config.telemetry.primary.apiKey) },
      secondary: { ...config.telemetry.secondary, apiKey: mask(config.telemetry.secondary.apiKey) },
    },
  };
}
