/**
 * Core types for flowvault
 */

export type FlowId = string;

/** A single header as raw bytes: `[name, value]`. */
export type HeaderField = [Buffer, Buffer];

/** Network address as `[host, port]`. */
export type Address = [string, number];

export type ReplayKind = "request" | "response";

export interface RequestState {
  method: string;
  scheme: string;
  host: string;
  port: number;
  path: string;
  httpVersion: string;
  headers: HeaderField[];
  /** `null` when the body has not been (or will never be) captured */
  content: Buffer | null;
  timestampStart: number;
  timestampEnd: number | null;
}

export interface ResponseState {
  statusCode: number;
  reason: string;
  httpVersion: string;
  headers: HeaderField[];
  content: Buffer | null;
  timestampStart: number;
  timestampEnd: number | null;
}

export interface FlowError {
  msg: string;
  timestamp: number;
}

export interface ClientConnState {
  id: string;
  peername: Address | null;
  sockname: Address | null;
  tlsEstablished: boolean;
  sni: string | null;
  timestampStart: number;
  timestampEnd: number | null;
}

export interface ServerConnState {
  id: string;
  address: Address | null;
  peername: Address | null;
  tlsEstablished: boolean;
  /** DER-encoded certificates, leaf first */
  certificateList: Buffer[];
  timestampStart: number | null;
  timestampEnd: number | null;
}

export interface HttpFlowState {
  type: "http";
  id: FlowId;
  request: RequestState;
  response: ResponseState | null;
  error: FlowError | null;
  clientConn: ClientConnState;
  serverConn: ServerConnState;
  intercepted: boolean;
  isReplay: ReplayKind | null;
  /** Marker text; empty string means unmarked */
  marked: string;
  comment: string;
  metadata: Record<string, unknown>;
  websocket: boolean;
  timestampCreated: number;
}

export interface StreamMessage {
  fromClient: boolean;
  content: Buffer;
  timestamp: number;
}

/**
 * Raw TCP/UDP flows. The capture engine can produce these but they are not
 * persisted.
 */
export interface StreamFlowState {
  type: "tcp" | "udp";
  id: FlowId;
  clientConn: ClientConnState;
  serverConn: ServerConnState;
  messages: StreamMessage[];
  error: FlowError | null;
}

export type FlowState = HttpFlowState | StreamFlowState;
export type FlowType = FlowState["type"];

/**
 * A flow as handed over by the capture engine. State is read lazily so the
 * producer decides when to snapshot.
 */
export interface FlowSnapshot {
  getState(): FlowState;
}

// --- Chunks ---

export type MetadataChunkKind = "http_flow" | "client_conn" | "server_conn";
export type ContentChunkKind = "request_content" | "response_content";
export type ChunkKind = MetadataChunkKind | ContentChunkKind;

export interface MetadataChunk {
  flowId: FlowId;
  kind: MetadataChunkKind;
  /** UTF-8 JSON */
  payload: string;
}

export interface ContentChunk {
  flowId: FlowId;
  kind: ContentChunkKind;
  payload: Buffer;
}

export type Chunk = MetadataChunk | ContentChunk;

// --- Queries ---

export type SortKey = "created" | "method" | "url" | "status" | "size" | "duration" | "seq";
export type SortOrder = "asc" | "desc";

export interface FlowQuery {
  /** Filter expression; omitted means every flow */
  filter?: string;
  sort?: SortKey;
  order?: SortOrder;
  limit?: number;
  offset?: number;
}

/**
 * List-view row read straight from the flow view, without decoding chunks.
 */
export interface FlowSummary {
  id: FlowId;
  timestampCreated: number;
  method: string;
  url: string;
  statusCode?: number;
  responseContentType?: string;
  durationMs?: number;
  requestSize: number;
  responseSize: number;
  marked?: string;
  hasError: boolean;
}
