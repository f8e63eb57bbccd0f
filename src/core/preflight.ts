import { fetch } from "undici";
import { UPDATE_FIELD_KEYS } from "./fields";
import {
  asJsonRecord,
  describeHttpFailure,
  type FetchFn,
  type HttpJsonResult,
  type JsonRecord,
  joinUrl,
  requestJson,
  toErrorMessage,
} from "./http";
import { type JiraConnection, type JiraFieldMap, jiraHeaders } from "./jira";

export const PREFLIGHT_CHECK_VALUES = ["auth", "permissions", "fields"] as const;
export type PreflightCheckName = (typeof PREFLIGHT_CHECK_VALUES)[number];

export const REQUIRED_JIRA_PERMISSIONS = ["BROWSE_PROJECTS", "EDIT_ISSUES"] as const;

export type PreflightCheck = {
  name: PreflightCheckName;
  ok: boolean;
  detail: string;
};

export type PreflightResult = {
  ok: boolean;
  checks: PreflightCheck[];
};

export type PreflightDependencies = {
  fetchFn?: FetchFn;
  timeoutMs?: number;
};

async function getJson(
  connection: JiraConnection,
  pathname: string,
  dependencies: PreflightDependencies,
): Promise<HttpJsonResult> {
  return requestJson(
    dependencies.fetchFn ?? fetch,
    joinUrl(connection.baseUrl, pathname),
    { method: "GET", headers: jiraHeaders(connection) },
    { timeoutMs: dependencies.timeoutMs },
  );
}

async function checkAuth(connection: JiraConnection, dependencies: PreflightDependencies): Promise<PreflightCheck> {
  const response = await getJson(connection, "rest/api/2/myself", dependencies);
  if (!response.ok) {
    return { name: "auth", ok: false, detail: describeHttpFailure(response.status, response.body) };
  }

  const me: JsonRecord = asJsonRecord(response.body) ?? {};
  const who = [me.displayName, me.emailAddress, me.accountId].find(
    (value): value is string => typeof value === "string" && value.trim().length > 0,
  );
  return { name: "auth", ok: true, detail: `authenticated as ${who ?? connection.email}` };
}

async function checkPermissions(connection: JiraConnection, dependencies: PreflightDependencies): Promise<PreflightCheck> {
  const query = `rest/api/2/mypermissions?permissions=${REQUIRED_JIRA_PERMISSIONS.join(",")}`;
  const response = await getJson(connection, query, dependencies);
  if (!response.ok) {
    return { name: "permissions", ok: false, detail: describeHttpFailure(response.status, response.body) };
  }

  const permissions: JsonRecord = asJsonRecord(asJsonRecord(response.body)?.permissions) ?? {};
  const missing = REQUIRED_JIRA_PERMISSIONS.filter((permission) => asJsonRecord(permissions[permission])?.havePermission !== true);
  if (missing.length) {
    return { name: "permissions", ok: false, detail: `missing permissions: ${missing.join(", ")}` };
  }

  return { name: "permissions", ok: true, detail: `granted: ${REQUIRED_JIRA_PERMISSIONS.join(", ")}` };
}

export function configuredFieldIds(fieldMap: JiraFieldMap): string[] {
  const ids = UPDATE_FIELD_KEYS.map((key) => fieldMap[key]);
  return fieldMap.vin ? [fieldMap.vin, ...ids] : ids;
}

async function checkFields(
  connection: JiraConnection,
  fieldMap: JiraFieldMap,
  dependencies: PreflightDependencies,
): Promise<PreflightCheck> {
  const response = await getJson(connection, "rest/api/2/field", dependencies);
  if (!response.ok) {
    return { name: "fields", ok: false, detail: describeHttpFailure(response.status, response.body) };
  }

  const rows = Array.isArray(response.body) ? response.body : [];
  const known = new Set(
    rows.map((row) => asJsonRecord(row)?.id).filter((id): id is string => typeof id === "string"),
  );
  const missing = configuredFieldIds(fieldMap).filter((id) => !known.has(id));
  if (missing.length) {
    return { name: "fields", ok: false, detail: `unknown field ids: ${missing.join(", ")}` };
  }

  return { name: "fields", ok: true, detail: `${configuredFieldIds(fieldMap).length} field(s) found` };
}

/**
 * Capability probe run before any per-VIN work. Each check reports its own
 * failure; a thrown network error fails only that check.
 */
export async function runPreflight(
  connection: JiraConnection,
  fieldMap: JiraFieldMap,
  dependencies: PreflightDependencies = {},
): Promise<PreflightResult> {
  const probes: Array<[PreflightCheckName, () => Promise<PreflightCheck>]> = [
    ["auth", () => checkAuth(connection, dependencies)],
    ["permissions", () => checkPermissions(connection, dependencies)],
    ["fields", () => checkFields(connection, fieldMap, dependencies)],
  ];

  const checks: PreflightCheck[] = [];
  for (const [name, probe] of probes) {
    try {
      checks.push(await probe());
    } catch (error) {
      checks.push({ name, ok: false, detail: toErrorMessage(error) });
    }
  }

  return { ok: checks.every((check) => check.ok), checks };
}
