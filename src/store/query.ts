/**
 * Read-side queries over `flow_view`. Nothing here decodes chunks.
 */

import type Database from "better-sqlite3";
import type { FlowId, FlowSummary, SortKey, SortOrder } from "../shared/types.js";
import type { CompiledPredicate, SqlParam } from "../filter/compiler.js";

export const SORT_COLUMNS: Readonly<Record<SortKey, string>> = {
  created: "timestamp_created",
  method: "method",
  url: "url",
  status: "status_code",
  size: "size",
  duration: "duration",
  seq: "seq",
};

export const SORT_KEYS = Object.keys(SORT_COLUMNS).filter(isSortKey);

export function isSortKey(value: string): value is SortKey {
  return Object.hasOwn(SORT_COLUMNS, value);
}

export function isSortOrder(value: string): value is SortOrder {
  return value === "asc" || value === "desc";
}

export interface PageOptions {
  sort?: SortKey;
  order?: SortOrder;
  limit: number;
  offset?: number;
}

interface FlowIdRow {
  flow_id: string;
}

interface CountRow {
  count: number;
}

interface SummaryRow {
  flow_id: string;
  timestamp_created: number;
  method: string;
  url: string;
  status_code: number | null;
  response_content_type: string | null;
  duration: number | null;
  request_size: number;
  response_size: number;
  marked: string;
  has_error: number;
}

function orderClause(options: PageOptions): string {
  const column = SORT_COLUMNS[options.sort ?? "seq"];
  const direction = (options.order ?? "asc") === "desc" ? "DESC" : "ASC";
  // seq breaks ties so pages never overlap
  return `ORDER BY ${column} ${direction}, seq ${direction}`;
}

function pageParams(predicate: CompiledPredicate, options: PageOptions): SqlParam[] {
  return [...predicate.params, options.limit, options.offset ?? 0];
}

export function queryFlowIds(
  db: Database.Database,
  predicate: CompiledPredicate,
  options: PageOptions
): FlowId[] {
  const rows = db
    .prepare<SqlParam[], FlowIdRow>(
      `SELECT flow_id FROM flow_view WHERE ${predicate.sql} ${orderClause(options)} LIMIT ? OFFSET ?`
    )
    .all(...pageParams(predicate, options));
  return rows.map((row) => row.flow_id);
}

export function countFlows(db: Database.Database, predicate: CompiledPredicate): number {
  const row = db
    .prepare<SqlParam[], CountRow>(`SELECT COUNT(*) AS count FROM flow_view WHERE ${predicate.sql}`)
    .get(...predicate.params);
  return row?.count ?? 0;
}

/**
 * List-view rows for a page of flows.
 */
export function queryFlowSummaries(
  db: Database.Database,
  predicate: CompiledPredicate,
  options: PageOptions
): FlowSummary[] {
  const rows = db
    .prepare<SqlParam[], SummaryRow>(
      `SELECT flow_id, timestamp_created, method, url, status_code, response_content_type,
              duration, request_size, response_size, marked, has_error
       FROM flow_view
       WHERE ${predicate.sql}
       ${orderClause(options)}
       LIMIT ? OFFSET ?`
    )
    .all(...pageParams(predicate, options));

  return rows.map(toSummary);
}

function toSummary(row: SummaryRow): FlowSummary {
  const summary: FlowSummary = {
    id: row.flow_id,
    timestampCreated: row.timestamp_created,
    method: row.method,
    url: row.url,
    requestSize: row.request_size,
    responseSize: row.response_size,
    hasError: row.has_error === 1,
  };

  if (row.status_code !== null) summary.statusCode = row.status_code;
  if (row.response_content_type !== null) summary.responseContentType = row.response_content_type;
  if (row.duration !== null) summary.durationMs = row.duration;
  if (row.marked !== "") summary.marked = row.marked;

  return summary;
}
