/**
 * Chunk codec: splits one flow's state into independently keyed chunks and
 * reassembles it.
 *
 * Bodies become binary content chunks, each connection becomes its own JSON
 * chunk, and everything else (method, URL, headers, status, timing, flags)
 * goes into the `http_flow` chunk that the derived views read from.
 */

import type { z } from "zod";
import type {
  Address,
  Chunk,
  ChunkKind,
  ClientConnState,
  ContentChunk,
  FlowId,
  FlowState,
  HeaderField,
  HttpFlowState,
  MetadataChunk,
  RequestState,
  ResponseState,
  ServerConnState,
} from "../shared/types.js";
import { DecodeError, UnsupportedFlowTypeError } from "../shared/errors.js";
import {
  PAYLOAD_VERSION,
  LEGACY_PAYLOAD_VERSION,
  clientConnPayloadSchema,
  encodingsFor,
  httpFlowPayloadSchema,
  serverConnPayloadSchema,
  type BytesEncoding,
  type ClientConnPayload,
  type HttpFlowPayload,
  type PayloadEncodings,
  type ServerConnPayload,
} from "./payloads.js";

export const CHUNK_KINDS = [
  "http_flow",
  "client_conn",
  "server_conn",
  "request_content",
  "response_content",
] as const satisfies readonly ChunkKind[];

const METADATA_KINDS = new Set<string>(["http_flow", "client_conn", "server_conn"]);

/** Marker text given to flows marked by a version 1 payload */
export const DEFAULT_MARKER = ":default:";

/**
 * A chunk as read back from storage, before its kind has been checked.
 */
export interface StoredChunk {
  flowId: string;
  kind: string;
  payload: string | Buffer | null;
}

export function isChunkKind(kind: string): kind is ChunkKind {
  return CHUNK_KINDS.some((candidate) => candidate === kind);
}

// --- Encoding ---

function bytesToText(bytes: Buffer, encoding: BytesEncoding): string {
  return bytes.toString(encoding);
}

function textToBytes(text: string, encoding: BytesEncoding): Buffer {
  return Buffer.from(text, encoding);
}

function encodeHeaders(headers: readonly HeaderField[], encoding: BytesEncoding): [string, string][] {
  return headers.map(([name, value]) => [bytesToText(name, encoding), bytesToText(value, encoding)]);
}

function decodeHeaders(headers: readonly [string, string][], encoding: BytesEncoding): HeaderField[] {
  return headers.map(([name, value]) => [textToBytes(name, encoding), textToBytes(value, encoding)]);
}

function copyAddress(address: Address | null): Address | null {
  return address ? [address[0], address[1]] : null;
}

function encodeClientConn(conn: ClientConnState): ClientConnPayload {
  return {
    v: PAYLOAD_VERSION,
    id: conn.id,
    peername: copyAddress(conn.peername),
    sockname: copyAddress(conn.sockname),
    tls_established: conn.tlsEstablished,
    sni: conn.sni,
    timestamp_start: conn.timestampStart,
    timestamp_end: conn.timestampEnd,
  };
}

function encodeServerConn(conn: ServerConnState): ServerConnPayload {
  const { certificates } = encodingsFor(PAYLOAD_VERSION);
  return {
    v: PAYLOAD_VERSION,
    id: conn.id,
    address: copyAddress(conn.address),
    peername: copyAddress(conn.peername),
    tls_established: conn.tlsEstablished,
    certificate_list: conn.certificateList.map((cert) => bytesToText(cert, certificates)),
    timestamp_start: conn.timestampStart,
    timestamp_end: conn.timestampEnd,
  };
}

function encodeHttpFlow(flow: HttpFlowState): HttpFlowPayload {
  const { headers } = encodingsFor(PAYLOAD_VERSION);
  const { request, response } = flow;

  return {
    v: PAYLOAD_VERSION,
    id: flow.id,
    type: "http",
    timestamp_created: flow.timestampCreated,
    intercepted: flow.intercepted,
    is_replay: flow.isReplay,
    marked: flow.marked,
    comment: flow.comment,
    metadata: flow.metadata,
    websocket: flow.websocket,
    error: flow.error ? { msg: flow.error.msg, timestamp: flow.error.timestamp } : null,
    request: {
      method: request.method,
      scheme: request.scheme,
      host: request.host,
      port: request.port,
      path: request.path,
      http_version: request.httpVersion,
      headers: encodeHeaders(request.headers, headers),
      timestamp_start: request.timestampStart,
      timestamp_end: request.timestampEnd,
    },
    response: response
      ? {
          status_code: response.statusCode,
          reason: response.reason,
          http_version: response.httpVersion,
          headers: encodeHeaders(response.headers, headers),
          timestamp_start: response.timestampStart,
          timestamp_end: response.timestampEnd,
        }
      : null,
  };
}

/**
 * Split a flow into chunks. The `http_flow` chunk comes last so a reader that
 * applies chunks in order sees content before the metadata that owns it.
 *
 * @throws UnsupportedFlowTypeError for anything but HTTP flows
 */
export function encodeFlow(flow: FlowState): Chunk[] {
  switch (flow.type) {
    case "http":
      return encodeHttpFlowChunks(flow);
    case "tcp":
    case "udp":
      throw new UnsupportedFlowTypeError(flow.type);
  }
}

function encodeHttpFlowChunks(flow: HttpFlowState): Chunk[] {
  const chunks: Chunk[] = [];

  if (flow.request.content !== null) {
    chunks.push({ flowId: flow.id, kind: "request_content", payload: flow.request.content });
  }

  if (flow.response && flow.response.content !== null) {
    chunks.push({ flowId: flow.id, kind: "response_content", payload: flow.response.content });
  }

  chunks.push(
    { flowId: flow.id, kind: "client_conn", payload: JSON.stringify(encodeClientConn(flow.clientConn)) },
    { flowId: flow.id, kind: "server_conn", payload: JSON.stringify(encodeServerConn(flow.serverConn)) },
    { flowId: flow.id, kind: "http_flow", payload: JSON.stringify(encodeHttpFlow(flow)) }
  );

  return chunks;
}

// --- Decoding ---

/**
 * Check a stored row's kind and payload type and turn it into a `Chunk`.
 */
export function toChunk(stored: StoredChunk): Chunk {
  const { flowId, kind, payload } = stored;

  if (!isChunkKind(kind)) {
    throw new DecodeError(`Unknown chunk kind "${kind}"`, flowId);
  }
  if (payload === null) {
    throw new DecodeError(`Chunk "${kind}" has no payload`, flowId);
  }

  if (METADATA_KINDS.has(kind)) {
    const metadata: MetadataChunk = {
      flowId,
      kind: metadataKind(kind, flowId),
      payload: typeof payload === "string" ? payload : payload.toString("utf8"),
    };
    return metadata;
  }

  const content: ContentChunk = {
    flowId,
    kind: kind === "request_content" ? "request_content" : "response_content",
    payload: typeof payload === "string" ? Buffer.from(payload, "utf8") : payload,
  };
  return content;
}

function metadataKind(kind: ChunkKind, flowId: FlowId): MetadataChunk["kind"] {
  switch (kind) {
    case "http_flow":
    case "client_conn":
    case "server_conn":
      return kind;
    default:
      throw new DecodeError(`Chunk "${kind}" is not a metadata chunk`, flowId);
  }
}

/**
 * All chunks of one flow, indexed by kind. Built before anything is parsed so
 * chunk order does not matter.
 */
interface ReconstructionContext {
  flowId: FlowId;
  metadata: Partial<Record<MetadataChunk["kind"], string>>;
  content: Partial<Record<ContentChunk["kind"], Buffer>>;
}

function collectChunks(stored: readonly StoredChunk[]): ReconstructionContext {
  const first = stored[0];
  if (!first) {
    throw new DecodeError("No chunks to decode");
  }

  const context: ReconstructionContext = { flowId: first.flowId, metadata: {}, content: {} };
  const seen = new Set<ChunkKind>();

  for (const row of stored) {
    if (row.flowId !== context.flowId) {
      throw new DecodeError(`Chunk for flow ${row.flowId} mixed into chunk set`, context.flowId);
    }

    const chunk = toChunk(row);
    if (seen.has(chunk.kind)) {
      throw new DecodeError(`Duplicate "${chunk.kind}" chunk`, context.flowId);
    }
    seen.add(chunk.kind);

    if (chunk.kind === "request_content" || chunk.kind === "response_content") {
      context.content[chunk.kind] = chunk.payload;
    } else {
      context.metadata[chunk.kind] = chunk.payload;
    }
  }

  return context;
}

function parsePayload<T extends z.ZodTypeAny>(
  schema: T,
  kind: MetadataChunk["kind"],
  text: string | undefined,
  flowId: FlowId
): z.infer<T> {
  if (text === undefined) {
    throw new DecodeError(`Missing "${kind}" chunk`, flowId);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new DecodeError(`Chunk "${kind}" is not valid JSON`, flowId, { cause: err });
  }

  const result = schema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new DecodeError(
      `Chunk "${kind}" does not match its schema${where}: ${issue?.message ?? "invalid"}`,
      flowId,
      { cause: result.error }
    );
  }

  return result.data;
}

function payloadEncodings(version: number | undefined, kind: string, flowId: FlowId): PayloadEncodings {
  const resolved = version ?? LEGACY_PAYLOAD_VERSION;
  if (resolved > PAYLOAD_VERSION) {
    throw new DecodeError(`Chunk "${kind}" has unsupported payload version ${resolved}`, flowId);
  }
  return encodingsFor(resolved);
}

function decodeClientConn(payload: ClientConnPayload): ClientConnState {
  return {
    id: payload.id,
    peername: payload.peername,
    sockname: payload.sockname,
    tlsEstablished: payload.tls_established,
    sni: payload.sni,
    timestampStart: payload.timestamp_start,
    timestampEnd: payload.timestamp_end,
  };
}

function decodeServerConn(payload: ServerConnPayload, flowId: FlowId): ServerConnState {
  const { certificates } = payloadEncodings(payload.v, "server_conn", flowId);
  return {
    id: payload.id,
    address: payload.address,
    peername: payload.peername,
    tlsEstablished: payload.tls_established,
    certificateList: payload.certificate_list.map((cert) => textToBytes(cert, certificates)),
    timestampStart: payload.timestamp_start,
    timestampEnd: payload.timestamp_end,
  };
}

function decodeMarked(marked: string | boolean): string {
  if (typeof marked === "string") {
    return marked;
  }
  return marked ? DEFAULT_MARKER : "";
}

/**
 * Reassemble one flow from its chunks, in any order.
 *
 * A `response_content` chunk is ignored when the metadata records no response.
 *
 * @throws DecodeError when the chunk set is incomplete, mixes flows, repeats a
 *   kind, carries an unknown kind, or a payload fails its schema
 */
export function decodeFlow(chunks: readonly StoredChunk[]): HttpFlowState {
  const context = collectChunks(chunks);
  const { flowId } = context;

  const flowPayload = parsePayload(
    httpFlowPayloadSchema,
    "http_flow",
    context.metadata.http_flow,
    flowId
  );
  if (flowPayload.id !== flowId) {
    throw new DecodeError(`"http_flow" chunk belongs to flow ${flowPayload.id}`, flowId);
  }

  const clientConn = decodeClientConn(
    parsePayload(clientConnPayloadSchema, "client_conn", context.metadata.client_conn, flowId)
  );
  const serverConn = decodeServerConn(
    parsePayload(serverConnPayloadSchema, "server_conn", context.metadata.server_conn, flowId),
    flowId
  );

  // Byte transforms depend on the owning metadata chunk's version
  const { headers } = payloadEncodings(flowPayload.v, "http_flow", flowId);
  const req = flowPayload.request;
  const request: RequestState = {
    method: req.method,
    scheme: req.scheme,
    host: req.host,
    port: req.port,
    path: req.path,
    httpVersion: req.http_version,
    headers: decodeHeaders(req.headers, headers),
    content: context.content.request_content ?? null,
    timestampStart: req.timestamp_start,
    timestampEnd: req.timestamp_end,
  };

  const res = flowPayload.response;
  const response: ResponseState | null = res
    ? {
        statusCode: res.status_code,
        reason: res.reason,
        httpVersion: res.http_version,
        headers: decodeHeaders(res.headers, headers),
        content: context.content.response_content ?? null,
        timestampStart: res.timestamp_start,
        timestampEnd: res.timestamp_end,
      }
    : null;

  return {
    type: "http",
    id: flowId,
    request,
    response,
    error: flowPayload.error,
    clientConn,
    serverConn,
    intercepted: flowPayload.intercepted,
    isReplay: flowPayload.is_replay,
    marked: decodeMarked(flowPayload.marked),
    comment: flowPayload.comment,
    metadata: flowPayload.metadata,
    websocket: flowPayload.websocket,
    timestampCreated: flowPayload.timestamp_created,
  };
}
