import { fetch } from "undici";
import { type TrackedIssue, UPDATE_FIELD_KEYS, type UpdateFieldKey, type UpdatePayload } from "./fields";
import {
  asJsonRecord,
  basicAuthHeader,
  describeHttpFailure,
  type FetchFn,
  HttpStatusError,
  isJsonRecord,
  type JsonRecord,
  joinUrl,
  requestJson,
} from "./http";
import type { UpdateResult } from "./sync";

export const JIRA_SEARCH_PAGE_SIZE = 100;

const VIN_PATTERN = /\b[A-HJ-NPR-Z0-9]{17}\b/i;

export type JiraConnection = {
  baseUrl: string;
  email: string;
  apiToken: string;
};

export type JiraFieldMap = Record<UpdateFieldKey, string> & {
  vin: string | null;
};

export type JiraDependencies = {
  fetchFn?: FetchFn;
  timeoutMs?: number;
  signal?: AbortSignal;
};

export type JiraSearchPage = {
  startAt: number;
  total: number | null;
  /** Entries Jira returned, including any that were not objects. */
  size: number;
  rows: JsonRecord[];
};

export type IssueSearchState = Readonly<{
  issues: readonly TrackedIssue[];
  ignoredKeys: readonly string[];
  fetched: number;
  done: boolean;
}>;

export type IssueSearchResult = {
  issues: TrackedIssue[];
  ignoredKeys: string[];
};

export type SearchTrackedIssuesOptions = {
  jql: string;
  fieldMap: JiraFieldMap;
  limit?: number | null;
  pageSize?: number;
};

export function jiraHeaders(connection: JiraConnection): Record<string, string> {
  return {
    accept: "application/json",
    "content-type": "application/json",
    authorization: basicAuthHeader(connection.email, connection.apiToken),
  };
}

function fieldText(value: unknown): string | null {
  if (typeof value === "string") return value.trim() || null;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);

  // select and option fields arrive as { value } objects
  const option = asJsonRecord(value);
  if (option && typeof option.value === "string") return option.value.trim() || null;
  return null;
}

export function extractVin(fields: JsonRecord, vinFieldId: string | null): string | null {
  if (vinFieldId) {
    const value = fieldText(fields[vinFieldId]);
    return value ? value.toUpperCase() : null;
  }

  const summary = typeof fields.summary === "string" ? fields.summary : "";
  const match = VIN_PATTERN.exec(summary);
  return match ? match[0].toUpperCase() : null;
}

export function parseTrackedIssue(row: JsonRecord, fieldMap: JiraFieldMap): TrackedIssue | null {
  const id = fieldText(row.id);
  const key = fieldText(row.key);
  const fields: JsonRecord = asJsonRecord(row.fields) ?? {};
  if (!id || !key) return null;

  const vin = extractVin(fields, fieldMap.vin);
  if (!vin) return null;

  return Object.freeze({
    id,
    key,
    vin,
    companyNameAlreadySet: fieldText(fields[fieldMap.companyName]) !== null,
  });
}

export function parseSearchPage(body: unknown): JiraSearchPage {
  const record = asJsonRecord(body);
  if (!record || !Array.isArray(record.issues)) {
    throw new Error("jira search: expected an object with an issues array");
  }

  return {
    startAt: typeof record.startAt === "number" ? record.startAt : 0,
    total: typeof record.total === "number" ? record.total : null,
    size: record.issues.length,
    rows: record.issues.filter(isJsonRecord),
  };
}

export function initialSearchState(): IssueSearchState {
  return { issues: [], ignoredKeys: [], fetched: 0, done: false };
}

/** Folds one search page into a new state; the previous state is left untouched. */
export function foldIssuePage(state: IssueSearchState, page: JiraSearchPage, fieldMap: JiraFieldMap): IssueSearchState {
  const parsed = page.rows.map((row) => ({ row, issue: parseTrackedIssue(row, fieldMap) }));
  const accepted = parsed.flatMap((entry) => (entry.issue ? [entry.issue] : []));
  const ignored = parsed.flatMap((entry) => (entry.issue ? [] : [fieldText(entry.row.key) ?? "(unknown)"]));
  const fetched = state.fetched + page.size;

  return {
    issues: [...state.issues, ...accepted],
    ignoredKeys: [...state.ignoredKeys, ...ignored],
    fetched,
    done: page.size === 0 || (page.total !== null && fetched >= page.total),
  };
}

export function searchFieldIds(fieldMap: JiraFieldMap): string[] {
  return fieldMap.vin ? ["summary", fieldMap.vin, fieldMap.companyName] : ["summary", fieldMap.companyName];
}

async function fetchSearchPage(
  connection: JiraConnection,
  options: SearchTrackedIssuesOptions,
  startAt: number,
  dependencies: JiraDependencies,
): Promise<JiraSearchPage> {
  const response = await requestJson(
    dependencies.fetchFn ?? fetch,
    joinUrl(connection.baseUrl, "rest/api/2/search"),
    {
      method: "POST",
      headers: jiraHeaders(connection),
      body: JSON.stringify({
        jql: options.jql,
        startAt,
        maxResults: options.pageSize ?? JIRA_SEARCH_PAGE_SIZE,
        fields: searchFieldIds(options.fieldMap),
      }),
    },
    { timeoutMs: dependencies.timeoutMs, signal: dependencies.signal },
  );

  if (!response.ok) {
    throw new HttpStatusError("jira search", response.status, response.body);
  }

  return parseSearchPage(response.body);
}

export async function searchTrackedIssues(
  connection: JiraConnection,
  options: SearchTrackedIssuesOptions,
  dependencies: JiraDependencies = {},
): Promise<IssueSearchResult> {
  const limit = options.limit && options.limit > 0 ? options.limit : null;
  let state = initialSearchState();

  while (!state.done && (limit === null || state.issues.length < limit)) {
    const page = await fetchSearchPage(connection, options, state.fetched, dependencies);
    state = foldIssuePage(state, page, options.fieldMap);
  }

  return {
    issues: limit === null ? [...state.issues] : state.issues.slice(0, limit),
    ignoredKeys: [...state.ignoredKeys],
  };
}

export function buildJiraFieldUpdate(payload: UpdatePayload, fieldMap: JiraFieldMap): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const key of UPDATE_FIELD_KEYS) {
    const value = payload[key];
    if (value !== undefined) {
      fields[fieldMap[key]] = value;
    }
  }
  return fields;
}

export async function applyJiraUpdate(
  connection: JiraConnection,
  fieldMap: JiraFieldMap,
  issueId: string,
  payload: UpdatePayload,
  dependencies: JiraDependencies = {},
): Promise<UpdateResult> {
  const response = await requestJson(
    dependencies.fetchFn ?? fetch,
    joinUrl(connection.baseUrl, `rest/api/2/issue/${encodeURIComponent(issueId)}`),
    {
      method: "PUT",
      headers: jiraHeaders(connection),
      body: JSON.stringify({ fields: buildJiraFieldUpdate(payload, fieldMap) }),
    },
    { timeoutMs: dependencies.timeoutMs, signal: dependencies.signal },
  );

  if (response.ok) {
    return { ok: true };
  }

  return { ok: false, reason: describeHttpFailure(response.status, response.body) };
}
