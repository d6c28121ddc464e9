/**
 * SQL for the flow database.
 *
 * `chunk` is the only source of truth. Everything else (the header table and
 * its triggers, the flow view, the expression indexes) is derived from it and
 * can be dropped and recreated at any time. Bump DERIVED_SCHEMA_VERSION
 * whenever the derived SQL changes; the next open rebuilds it.
 */

import { DEFAULT_MARKER } from "./codec.js";

export const DERIVED_SCHEMA_VERSION = 2;

export const CHUNK_TABLE = "chunk";

export function chunkTableSql(schema?: string): string {
  const table = schema ? `${schema}.${CHUNK_TABLE}` : CHUNK_TABLE;
  return `
    CREATE TABLE IF NOT EXISTS ${table} (
      id INTEGER PRIMARY KEY,
      flow_id TEXT NOT NULL,
      kind TEXT NOT NULL,
      payload BLOB,
      UNIQUE (flow_id, kind)
    );
  `;
}

/**
 * The payload of a metadata row, or NULL for any other kind. JSON functions
 * must only ever see metadata payloads; content rows hold raw bytes.
 */
function payloadOf(kind: string, table?: string): string {
  const column = (name: string): string => (table ? `${table}.${name}` : name);
  return `CASE WHEN ${column("kind")} = '${kind}' THEN ${column("payload")} END`;
}

function flowField(path: string, table?: string): string {
  return `json_extract(${payloadOf("http_flow", table)}, '${path}')`;
}

function headerLines(payload: string, side: "request" | "response"): string {
  return `COALESCE((
    SELECT group_concat(json_extract(h.value, '$[0]') || '=' || json_extract(h.value, '$[1]'), char(10))
    FROM json_each(${payload}, '$.${side}.headers') AS h
  ), '')`;
}

function contentType(table: string, side: "request" | "response"): string {
  const value = "json_extract(h.value, '$[1]')";
  return `(
    SELECT lower(trim(CASE WHEN instr(${value}, ';') > 0
                           THEN substr(${value}, 1, instr(${value}, ';') - 1)
                           ELSE ${value} END))
    FROM json_each(${payloadOf("http_flow", table)}, '$.${side}.headers') AS h
    WHERE lower(json_extract(h.value, '$[0]')) = 'content-type'
    LIMIT 1
  )`;
}

function contentSize(table: string, kinds: string): string {
  return `(
    SELECT COALESCE(SUM(length(body.payload)), 0) FROM chunk AS body
    WHERE body.flow_id = ${table}.flow_id AND body.kind IN (${kinds})
  )`;
}

function relatedPayload(table: string, kind: string): string {
  return `(SELECT rel.payload FROM chunk AS rel WHERE rel.flow_id = ${table}.flow_id AND rel.kind = '${kind}')`;
}

function connAddress(table: string, kind: string, field: string): string {
  const payload = payloadOf(kind, "conn");
  return `(
    SELECT json_extract(${payload}, '$.${field}[0]') || ':' || json_extract(${payload}, '$.${field}[1]')
    FROM chunk AS conn
    WHERE conn.flow_id = ${table}.flow_id AND conn.kind = '${kind}'
  )`;
}

const HEADERS_TABLE_SQL = `
  CREATE TABLE flow_headers (
    flow_id TEXT PRIMARY KEY,
    request_headers TEXT NOT NULL DEFAULT '',
    response_headers TEXT NOT NULL DEFAULT ''
  );

  INSERT INTO flow_headers (flow_id, request_headers, response_headers)
  SELECT chunk.flow_id,
         ${headerLines(payloadOf("http_flow", "chunk"), "request")},
         ${headerLines(payloadOf("http_flow", "chunk"), "response")}
  FROM chunk
  WHERE chunk.kind = 'http_flow';
`;

function headerUpsert(event: "INSERT" | "UPDATE OF payload"): string {
  const name = event === "INSERT" ? "chunk_headers_insert" : "chunk_headers_update";
  const payload = "new.payload";
  return `
    CREATE TRIGGER ${name} AFTER ${event} ON chunk
    WHEN new.kind = 'http_flow'
    BEGIN
      INSERT INTO flow_headers (flow_id, request_headers, response_headers)
      VALUES (new.flow_id, ${headerLines(payload, "request")}, ${headerLines(payload, "response")})
      ON CONFLICT (flow_id) DO UPDATE SET
        request_headers = excluded.request_headers,
        response_headers = excluded.response_headers;
    END;
  `;
}

const HEADER_TRIGGERS_SQL = `
  ${headerUpsert("INSERT")}
  ${headerUpsert("UPDATE OF payload")}
  CREATE TRIGGER chunk_headers_delete AFTER DELETE ON chunk
  WHEN old.kind = 'http_flow'
  BEGIN
    DELETE FROM flow_headers WHERE flow_id = old.flow_id;
  END;
`;

const scheme = flowField("$.request.scheme", "c");
const host = flowField("$.request.host", "c");
const port = flowField("$.request.port", "c");

const FLOW_VIEW_SQL = `
  CREATE VIEW flow_view AS
  SELECT
    c.flow_id AS flow_id,
    c.id AS seq,
    ${flowField("$.timestamp_created", "c")} AS timestamp_created,
    ${flowField("$.request.method", "c")} AS method,
    ${scheme} AS scheme,
    ${host} AS host,
    ${port} AS port,
    ${flowField("$.request.path", "c")} AS path,
    ${scheme} || '://' || ${host} ||
      CASE WHEN (${scheme} = 'http' AND ${port} = 80) OR (${scheme} = 'https' AND ${port} = 443)
           THEN '' ELSE ':' || ${port} END ||
      ${flowField("$.request.path", "c")} AS url,
    ${flowField("$.request.http_version", "c")} AS http_version,
    CAST(${flowField("$.response.status_code", "c")} AS INTEGER) AS status_code,
    ${flowField("$.response.reason", "c")} AS reason,
    ${contentType("c", "request")} AS request_content_type,
    ${contentType("c", "response")} AS response_content_type,
    ${contentSize("c", "'request_content'")} AS request_size,
    ${contentSize("c", "'response_content'")} AS response_size,
    ${contentSize("c", "'request_content', 'response_content'")} AS size,
    ${flowField("$.response.timestamp_end", "c")} - ${flowField("$.request.timestamp_start", "c")} AS duration,
    CASE WHEN COALESCE(${flowField("$.marked", "c")}, '') IN ('', 0) THEN 0 ELSE 1 END AS is_marked,
    CASE json_type(${payloadOf("http_flow", "c")}, '$.marked')
         WHEN 'text' THEN ${flowField("$.marked", "c")}
         WHEN 'true' THEN '${DEFAULT_MARKER}'
         ELSE '' END AS marked,
    COALESCE(${flowField("$.comment", "c")}, '') AS comment,
    COALESCE(${flowField("$.metadata", "c")}, '{}') AS metadata,
    ${flowField("$.is_replay", "c")} AS is_replay,
    CASE WHEN json_type(${payloadOf("http_flow", "c")}, '$.response') = 'object' THEN 1 ELSE 0 END AS has_response,
    CASE WHEN json_type(${payloadOf("http_flow", "c")}, '$.error') = 'object' THEN 1 ELSE 0 END AS has_error,
    ${flowField("$.error.msg", "c")} AS error_msg,
    COALESCE(${flowField("$.intercepted", "c")}, 0) AS intercepted,
    COALESCE(${flowField("$.websocket", "c")}, 0) AS is_websocket,
    ${connAddress("c", "client_conn", "peername")} AS client_address,
    ${connAddress("c", "server_conn", "address")} AS server_address,
    ${relatedPayload("c", "request_content")} AS request_body,
    ${relatedPayload("c", "response_content")} AS response_body
  FROM chunk AS c
  WHERE c.kind = 'http_flow';
`;

// Index expressions must match the view's expressions after it is flattened
// into a query, so they reuse the same builders.
const INDEXES_SQL = `
  CREATE INDEX idx_chunk_kind ON chunk (kind);
  CREATE INDEX idx_flow_status ON chunk (CAST(${flowField("$.response.status_code")} AS INTEGER))
    WHERE kind = 'http_flow';
  CREATE INDEX idx_flow_method ON chunk (upper(${flowField("$.request.method")}))
    WHERE kind = 'http_flow';
  CREATE INDEX idx_flow_host ON chunk (${flowField("$.request.host")})
    WHERE kind = 'http_flow';
  CREATE INDEX idx_flow_created ON chunk (${flowField("$.timestamp_created")})
    WHERE kind = 'http_flow';
`;

/**
 * Creates every derived object. Runs against a database where none of them
 * exist.
 */
export const DERIVED_SCHEMA_SQL = [HEADERS_TABLE_SQL, HEADER_TRIGGERS_SQL, FLOW_VIEW_SQL, INDEXES_SQL].join(
  "\n"
);
