import { v4 as uuidv4 } from "uuid";
import type { HeaderField, HttpFlowState, ReplayKind, StreamFlowState } from "../../src/shared/types.js";

export const BASE_TIME = 1_700_000_000_000;

export interface TestFlowOptions {
  id?: string;
  method?: string;
  scheme?: string;
  host?: string;
  port?: number;
  path?: string;
  requestHeaders?: [string, string][];
  requestBody?: string | Buffer | null;
  /** `null` for a flow still waiting on its response */
  status?: number | null;
  reason?: string;
  responseHeaders?: [string, string][];
  responseBody?: string | Buffer | null;
  createdAt?: number;
  /** Response end minus request start */
  duration?: number;
  marked?: string;
  comment?: string;
  metadata?: Record<string, unknown>;
  error?: string;
  isReplay?: ReplayKind | null;
  websocket?: boolean;
  certificates?: Buffer[];
}

function toHeaders(pairs: [string, string][]): HeaderField[] {
  return pairs.map(([name, value]) => [Buffer.from(name, "latin1"), Buffer.from(value, "latin1")]);
}

function toBody(body: string | Buffer | null): Buffer | null {
  if (body === null) return null;
  return typeof body === "string" ? Buffer.from(body, "utf8") : body;
}

export function makeFlow(options: TestFlowOptions = {}): HttpFlowState {
  const id = options.id ?? uuidv4();
  const host = options.host ?? "example.com";
  const scheme = options.scheme ?? "https";
  const port = options.port ?? (scheme === "https" ? 443 : 80);
  const createdAt = options.createdAt ?? BASE_TIME;
  const duration = options.duration ?? 20;
  const status = options.status === undefined ? 200 : options.status;

  return {
    type: "http",
    id,
    request: {
      method: options.method ?? "GET",
      scheme,
      host,
      port,
      path: options.path ?? "/",
      httpVersion: "HTTP/1.1",
      headers: toHeaders(
        options.requestHeaders ?? [
          ["Host", host],
          ["User-Agent", "test-agent"],
        ]
      ),
      content: toBody(options.requestBody ?? null),
      timestampStart: createdAt,
      timestampEnd: createdAt + 1,
    },
    response:
      status === null
        ? null
        : {
            statusCode: status,
            reason: options.reason ?? "OK",
            httpVersion: "HTTP/1.1",
            headers: toHeaders(options.responseHeaders ?? [["Content-Type", "text/html; charset=utf-8"]]),
            content: toBody(options.responseBody === undefined ? "hello" : options.responseBody),
            timestampStart: createdAt + 2,
            timestampEnd: createdAt + duration,
          },
    error: options.error ? { msg: options.error, timestamp: createdAt + duration } : null,
    clientConn: {
      id: `${id}-client`,
      peername: ["127.0.0.1", 51000],
      sockname: ["127.0.0.1", 8080],
      tlsEstablished: scheme === "https",
      sni: scheme === "https" ? host : null,
      timestampStart: createdAt,
      timestampEnd: null,
    },
    serverConn: {
      id: `${id}-server`,
      address: [host, port],
      peername: ["10.0.0.1", port],
      tlsEstablished: scheme === "https",
      certificateList: options.certificates ?? [],
      timestampStart: createdAt,
      timestampEnd: null,
    },
    intercepted: false,
    isReplay: options.isReplay ?? null,
    marked: options.marked ?? "",
    comment: options.comment ?? "",
    metadata: options.metadata ?? {},
    websocket: options.websocket ?? false,
    timestampCreated: createdAt,
  };
}

export function makeTcpFlow(id = uuidv4()): StreamFlowState {
  const flow = makeFlow({ id });
  return {
    type: "tcp",
    id,
    clientConn: flow.clientConn,
    serverConn: flow.serverConn,
    messages: [{ fromClient: true, content: Buffer.from("ping"), timestamp: BASE_TIME }],
    error: null,
  };
}
