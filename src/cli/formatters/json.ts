/**
 * JSON shapes for `--json` output. Buffers become text when they are valid
 * UTF-8 and base64 otherwise.
 */

import type { HeaderField, HttpFlowState } from "../../shared/types.js";

export type JsonBody = { text: string } | { base64: string } | null;

const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

export function bodyToJson(body: Buffer | null): JsonBody {
  if (body === null) return null;
  try {
    return { text: utf8Decoder.decode(body) };
  } catch {
    return { base64: body.toString("base64") };
  }
}

function headersToJson(headers: HeaderField[]): [string, string][] {
  return headers.map(([name, value]) => [name.toString("latin1"), value.toString("latin1")]);
}

/**
 * Plain-JSON view of a flow for scripting.
 */
export function flowToJson(flow: HttpFlowState): Record<string, unknown> {
  return {
    id: flow.id,
    timestampCreated: flow.timestampCreated,
    request: {
      ...flow.request,
      headers: headersToJson(flow.request.headers),
      content: bodyToJson(flow.request.content),
    },
    response: flow.response && {
      ...flow.response,
      headers: headersToJson(flow.response.headers),
      content: bodyToJson(flow.response.content),
    },
    error: flow.error,
    clientConn: flow.clientConn,
    serverConn: {
      ...flow.serverConn,
      certificateList: flow.serverConn.certificateList.map((cert) => cert.toString("base64")),
    },
    intercepted: flow.intercepted,
    isReplay: flow.isReplay,
    marked: flow.marked,
    comment: flow.comment,
    metadata: flow.metadata,
    websocket: flow.websocket,
  };
}
