/**
 * Flag table for the filter language: every `~code` the parser accepts and
 * how the compiler lowers it onto the flow view.
 */

// Every leaf condition evaluates to 0 or 1, never NULL, so that NOT of a
// condition selects exactly the flows the condition does not.

/** Leaf that tests a boolean-like property and takes no argument */
export interface UnaryField {
  arity: "unary";
  help: string;
  /** Complete SQL condition over flow_view columns */
  sql: string;
}

/** Leaf that matches a regex argument against text via `search()` */
export interface RegexField {
  arity: "regex";
  help: string;
  /** SQL expression producing the text to match */
  target: string;
  flags: string;
  /**
   * Table the target lives in. Header text lives in flow_headers and is
   * reached through a flow_id subquery.
   */
  source: "flow_view" | "flow_headers";
}

/** Leaf that compares an integer column with an integer argument */
export interface IntField {
  arity: "int";
  help: string;
  column: string;
}

export type FilterField = UnaryField | RegexField | IntField;

const ASSET_CONTENT_TYPES = "javascript|css|image|font";

function joinText(...columns: string[]): string {
  return columns.map((column) => `COALESCE(${column}, '')`).join(" || char(10) || ");
}

export const UNARY_FIELDS = {
  all: { arity: "unary", help: "All flows", sql: "1" },
  a: {
    arity: "unary",
    help: "Asset response: CSS, JavaScript, images, fonts",
    sql: `search('${ASSET_CONTENT_TYPES}', COALESCE(response_content_type, ''), 'i')`,
  },
  e: { arity: "unary", help: "Flow has an error", sql: "has_error = 1" },
  http: { arity: "unary", help: "HTTP flow", sql: "1" },
  tcp: { arity: "unary", help: "TCP flow (never stored)", sql: "0" },
  udp: { arity: "unary", help: "UDP flow (never stored)", sql: "0" },
  dns: { arity: "unary", help: "DNS flow (never stored)", sql: "0" },
  websocket: { arity: "unary", help: "Flow upgraded to a WebSocket", sql: "is_websocket = 1" },
  marked: { arity: "unary", help: "Marked flow", sql: "is_marked = 1" },
  q: { arity: "unary", help: "Request without a response", sql: "has_response = 0" },
  s: { arity: "unary", help: "Flow has a response", sql: "has_response = 1" },
  replay: { arity: "unary", help: "Replayed flow", sql: "is_replay IS NOT NULL" },
  replayq: { arity: "unary", help: "Replayed client request", sql: "is_replay IS 'request'" },
  replays: { arity: "unary", help: "Replayed server response", sql: "is_replay IS 'response'" },
} as const satisfies Record<string, UnaryField>;

export const REGEX_FIELDS = {
  b: {
    arity: "regex",
    help: "Request or response body",
    target: joinText("CAST(request_body AS TEXT)", "CAST(response_body AS TEXT)"),
    flags: "s",
    source: "flow_view",
  },
  bq: {
    arity: "regex",
    help: "Request body",
    target: "CAST(request_body AS TEXT)",
    flags: "s",
    source: "flow_view",
  },
  bs: {
    arity: "regex",
    help: "Response body",
    target: "CAST(response_body AS TEXT)",
    flags: "s",
    source: "flow_view",
  },
  comment: { arity: "regex", help: "Flow comment", target: "comment", flags: "", source: "flow_view" },
  d: { arity: "regex", help: "Host", target: "host", flags: "i", source: "flow_view" },
  dst: {
    arity: "regex",
    help: "Server address host:port",
    target: "server_address",
    flags: "i",
    source: "flow_view",
  },
  h: {
    arity: "regex",
    help: "Request or response header, as name=value",
    target: joinText("latin1_utf8(request_headers)", "latin1_utf8(response_headers)"),
    flags: "im",
    source: "flow_headers",
  },
  hq: {
    arity: "regex",
    help: "Request header, as name=value",
    target: "latin1_utf8(request_headers)",
    flags: "im",
    source: "flow_headers",
  },
  hs: {
    arity: "regex",
    help: "Response header, as name=value",
    target: "latin1_utf8(response_headers)",
    flags: "im",
    source: "flow_headers",
  },
  m: { arity: "regex", help: "Method", target: "method", flags: "i", source: "flow_view" },
  marker: { arity: "regex", help: "Marker text", target: "marked", flags: "", source: "flow_view" },
  meta: { arity: "regex", help: "Flow metadata (JSON)", target: "metadata", flags: "", source: "flow_view" },
  src: {
    arity: "regex",
    help: "Client address host:port",
    target: "client_address",
    flags: "i",
    source: "flow_view",
  },
  t: {
    arity: "regex",
    help: "Request or response content type",
    target: joinText("request_content_type", "response_content_type"),
    flags: "i",
    source: "flow_view",
  },
  tq: {
    arity: "regex",
    help: "Request content type",
    target: "request_content_type",
    flags: "i",
    source: "flow_view",
  },
  ts: {
    arity: "regex",
    help: "Response content type",
    target: "response_content_type",
    flags: "i",
    source: "flow_view",
  },
  u: { arity: "regex", help: "URL", target: "url", flags: "i", source: "flow_view" },
} as const satisfies Record<string, RegexField>;

export const INT_FIELDS = {
  c: { arity: "int", help: "Response status code", column: "status_code" },
} as const satisfies Record<string, IntField>;

export type UnaryCode = keyof typeof UNARY_FIELDS;
export type RegexCode = keyof typeof REGEX_FIELDS;
export type IntCode = keyof typeof INT_FIELDS;
export type FilterCode = UnaryCode | RegexCode | IntCode;

/** Code used for a bare regex with no flag */
export const DEFAULT_REGEX_CODE: RegexCode = "u";

export type ResolvedField =
  | { arity: "unary"; code: UnaryCode }
  | { arity: "regex"; code: RegexCode }
  | { arity: "int"; code: IntCode };

function isUnaryCode(code: string): code is UnaryCode {
  return Object.hasOwn(UNARY_FIELDS, code);
}

function isRegexCode(code: string): code is RegexCode {
  return Object.hasOwn(REGEX_FIELDS, code);
}

function isIntCode(code: string): code is IntCode {
  return Object.hasOwn(INT_FIELDS, code);
}

/**
 * Look a flag code up exactly. Returns undefined for unknown codes.
 */
export function resolveField(code: string): ResolvedField | undefined {
  if (isUnaryCode(code)) return { arity: "unary", code };
  if (isRegexCode(code)) return { arity: "regex", code };
  if (isIntCode(code)) return { arity: "int", code };
  return undefined;
}

export const FILTER_FIELDS: Readonly<Record<FilterCode, FilterField>> = {
  ...UNARY_FIELDS,
  ...REGEX_FIELDS,
  ...INT_FIELDS,
};

/**
 * Every flag code in alphabetical order, for help output.
 */
export function listFilterCodes(): FilterCode[] {
  const codes: FilterCode[] = [
    ...Object.keys(UNARY_FIELDS).filter(isUnaryCode),
    ...Object.keys(REGEX_FIELDS).filter(isRegexCode),
    ...Object.keys(INT_FIELDS).filter(isIntCode),
  ];
  return codes.sort((a, b) => a.localeCompare(b));
}
