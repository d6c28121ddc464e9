import * as fs from "node:fs";
import * as mockttp from "mockttp";
import { v4 as uuidv4 } from "uuid";
import { getErrorMessage } from "../shared/errors.js";
import type { Logger } from "../shared/logger.js";
import type { Address, FlowSnapshot, HeaderField, HttpFlowState } from "../shared/types.js";
import type { FlowRecorder } from "./recorder.js";

/** Default maximum body size to capture (10MB) */
export const DEFAULT_MAX_BODY_SIZE = 10 * 1024 * 1024;

const DEFAULT_PORTS: Record<string, number> = { http: 80, https: 443 };

/**
 * The parts of mockttp's timing data we read. Timestamps other than
 * `startTime` are high-resolution offsets, not epoch milliseconds.
 */
export interface CapturedTiming {
  startTime?: number;
  startTimestamp?: number;
  bodyReceivedTimestamp?: number;
  headersSentTimestamp?: number;
  responseSentTimestamp?: number;
  abortedTimestamp?: number;
}

export interface CapturedRequestHead {
  id: string;
  method: string;
  url: string;
  httpVersion?: string;
  remoteIpAddress?: string;
  remotePort?: number;
  rawHeaders: ReadonlyArray<readonly [string, string]>;
  timingEvents: CapturedTiming;
}

export interface CapturedRequest extends CapturedRequestHead {
  body: { buffer: Buffer };
}

export interface CapturedResponse {
  id: string;
  statusCode: number;
  statusMessage?: string;
  rawHeaders: ReadonlyArray<readonly [string, string]>;
  body: { buffer: Buffer };
  timingEvents: CapturedTiming;
}

export interface CapturedAbort extends CapturedRequestHead {
  error?: { message?: string; code?: string };
}

/**
 * Convert one of mockttp's relative timestamps to epoch milliseconds.
 */
export function toEpochMs(timing: CapturedTiming, relative: number | undefined): number | undefined {
  if (timing.startTime === undefined || relative === undefined) {
    return undefined;
  }
  if (timing.startTimestamp === undefined) {
    return timing.startTime;
  }
  return timing.startTime + (relative - timing.startTimestamp);
}

/**
 * Raw header pairs as bytes. Node hands header text over as latin1, so this
 * gives back exactly what was on the wire.
 */
export function toHeaderFields(rawHeaders: ReadonlyArray<readonly [string, string]>): HeaderField[] {
  return rawHeaders.map(([name, value]) => [Buffer.from(name, "latin1"), Buffer.from(value, "latin1")]);
}

function headerValue(rawHeaders: ReadonlyArray<readonly [string, string]>, name: string): string | undefined {
  const lower = name.toLowerCase();
  return rawHeaders.find(([key]) => key.toLowerCase() === lower)?.[1];
}

/**
 * mockttp hands over an empty buffer once a body passes `maxBodySize`, so a
 * non-zero Content-Length with no bytes means the body was dropped.
 */
export function isBodyTruncated(
  rawHeaders: ReadonlyArray<readonly [string, string]>,
  buffer: Buffer
): boolean {
  const contentLength = parseInt(headerValue(rawHeaders, "content-length") ?? "0", 10);
  return buffer.length === 0 && contentLength > 0;
}

function formatHttpVersion(version: string | undefined): string {
  if (version === undefined || version === "") {
    return "HTTP/1.1";
  }
  return version.startsWith("HTTP/") ? version : `HTTP/${version}`;
}

function peerAddress(head: CapturedRequestHead): Address | null {
  if (head.remoteIpAddress === undefined || head.remotePort === undefined) {
    return null;
  }
  return [head.remoteIpAddress, head.remotePort];
}

function markTruncated(flow: HttpFlowState, part: "request" | "response"): void {
  const existing = flow.metadata["truncated"];
  const parts = Array.isArray(existing) ? existing.filter((p): p is string => typeof p === "string") : [];
  flow.metadata["truncated"] = [...parts, part];
}

/**
 * Build the flow state for a request whose headers (and body, when `body`
 * is given) have been received.
 */
export function flowFromRequest(
  head: CapturedRequestHead,
  body?: { buffer: Buffer },
  now: number = Date.now()
): HttpFlowState {
  const url = new URL(head.url);
  const scheme = url.protocol.replace(/:$/, "");
  const port = url.port === "" ? (DEFAULT_PORTS[scheme] ?? 80) : Number(url.port);
  const tls = scheme === "https";
  const started = head.timingEvents.startTime ?? now;
  const truncated = body !== undefined && isBodyTruncated(head.rawHeaders, body.buffer);
  const received = toEpochMs(head.timingEvents, head.timingEvents.bodyReceivedTimestamp) ?? started;

  const flow: HttpFlowState = {
    type: "http",
    id: uuidv4(),
    request: {
      method: head.method,
      scheme,
      host: url.hostname,
      port,
      path: url.pathname + url.search,
      httpVersion: formatHttpVersion(head.httpVersion),
      headers: toHeaderFields(head.rawHeaders),
      content: body === undefined || truncated ? null : body.buffer,
      timestampStart: started,
      timestampEnd: body === undefined ? null : received,
    },
    response: null,
    error: null,
    clientConn: {
      id: uuidv4(),
      peername: peerAddress(head),
      sockname: null,
      tlsEstablished: tls,
      sni: tls ? url.hostname : null,
      timestampStart: started,
      timestampEnd: null,
    },
    serverConn: {
      id: uuidv4(),
      address: [url.hostname, port],
      peername: null,
      tlsEstablished: false,
      certificateList: [],
      timestampStart: null,
      timestampEnd: null,
    },
    intercepted: false,
    isReplay: null,
    marked: "",
    comment: "",
    metadata: {},
    websocket: false,
    timestampCreated: started,
  };

  if (truncated) {
    markTruncated(flow, "request");
  }
  return flow;
}

/**
 * Attach a completed response to a flow.
 */
export function applyResponse(flow: HttpFlowState, response: CapturedResponse, now: number = Date.now()): void {
  const timing = response.timingEvents;
  const start = toEpochMs(timing, timing.headersSentTimestamp) ?? now;
  const end = toEpochMs(timing, timing.responseSentTimestamp) ?? start;
  const truncated = isBodyTruncated(response.rawHeaders, response.body.buffer);

  flow.response = {
    statusCode: response.statusCode,
    reason: response.statusMessage ?? "",
    httpVersion: flow.request.httpVersion,
    headers: toHeaderFields(response.rawHeaders),
    content: truncated ? null : response.body.buffer,
    timestampStart: start,
    timestampEnd: end,
  };
  flow.serverConn.tlsEstablished = flow.request.scheme === "https";
  flow.serverConn.timestampStart = flow.request.timestampEnd ?? flow.request.timestampStart;
  flow.serverConn.timestampEnd = end;
  flow.clientConn.timestampEnd = end;

  if (truncated) {
    markTruncated(flow, "response");
  }
}

/**
 * Record why a flow failed.
 */
export function applyAbort(flow: HttpFlowState, abort: CapturedAbort, now: number = Date.now()): void {
  const timestamp = toEpochMs(abort.timingEvents, abort.timingEvents.abortedTimestamp) ?? now;
  flow.error = {
    msg: abort.error?.message ?? abort.error?.code ?? "Request aborted",
    timestamp,
  };
  flow.clientConn.timestampEnd = timestamp;
}

function snapshotOf(flow: HttpFlowState): FlowSnapshot {
  return { getState: () => flow };
}

/**
 * Correlates mockttp's per-request events into flows and feeds each state
 * change to the recorder. Keyed by mockttp's request id.
 */
export class FlowTracker {
  private readonly pending = new Map<string, HttpFlowState>();

  constructor(
    private readonly recorder: FlowRecorder,
    private readonly logger?: Logger
  ) {}

  onRequest(request: CapturedRequest): void {
    const flow = flowFromRequest(request, request.body);
    this.pending.set(request.id, flow);
    this.logger?.trace("Request received", { id: flow.id, method: flow.request.method, url: request.url });
    this.recorder.request(snapshotOf(flow));
  }

  onResponse(response: CapturedResponse): void {
    const flow = this.pending.get(response.id);
    if (!flow) {
      this.logger?.debug("Response for unknown request", { requestId: response.id });
      return;
    }
    this.pending.delete(response.id);
    applyResponse(flow, response);
    this.logger?.trace("Response received", { id: flow.id, status: response.statusCode });
    this.recorder.response(snapshotOf(flow));
  }

  onAbort(abort: CapturedAbort): void {
    const flow = this.pending.get(abort.id) ?? flowFromRequest(abort);
    this.pending.delete(abort.id);
    applyAbort(flow, abort);
    this.logger?.debug("Request aborted", { id: flow.id, error: flow.error?.msg });
    this.recorder.error(snapshotOf(flow));
  }

  pendingCount(): number {
    return this.pending.size;
  }
}

export interface CaptureProxyOptions {
  port?: number;
  recorder: FlowRecorder;
  caKeyPath: string;
  caCertPath: string;
  /** Bodies larger than this are proxied but not stored */
  maxBodySize?: number;
  logger?: Logger;
}

export interface CaptureProxy {
  port: number;
  url: string;
  stop: () => Promise<void>;
}

/**
 * Generate the CA used to intercept HTTPS unless one already exists.
 *
 * @returns true when a new certificate was written
 */
export async function ensureCaCertificate(keyPath: string, certPath: string, logger?: Logger): Promise<boolean> {
  if (fs.existsSync(keyPath) && fs.existsSync(certPath)) {
    return false;
  }

  logger?.info("Generating CA certificate");
  const ca = await mockttp.generateCACertificate({
    commonName: "flowvault Local CA - DO NOT TRUST",
  });
  fs.writeFileSync(keyPath, ca.key);
  fs.writeFileSync(certPath, ca.cert);
  fs.chmodSync(keyPath, 0o600);
  return true;
}

/**
 * Start a MITM proxy that passes all traffic through and records every flow.
 */
export async function createCaptureProxy(options: CaptureProxyOptions): Promise<CaptureProxy> {
  const { recorder, logger } = options;
  const tracker = new FlowTracker(recorder, logger);

  const server = mockttp.getLocal({
    https: {
      keyPath: options.caKeyPath,
      certPath: options.caCertPath,
    },
    recordTraffic: false,
    maxBodySize: options.maxBodySize ?? DEFAULT_MAX_BODY_SIZE,
  });

  await server.start(options.port);

  // Store failures inside event handlers have nowhere to propagate to
  const guarded =
    <T>(name: string, handler: (event: T) => void) =>
    (event: T): void => {
      try {
        handler(event);
      } catch (err) {
        logger?.error(`Failed to record ${name}`, { error: getErrorMessage(err) });
      }
    };

  await server.on("request", guarded("request", (request: CapturedRequest) => tracker.onRequest(request)));
  await server.on("response", guarded("response", (response: CapturedResponse) => tracker.onResponse(response)));
  await server.on("abort", guarded("abort", (abort: CapturedAbort) => tracker.onAbort(abort)));

  await server.forAnyRequest().thenPassThrough({
    ignoreHostHttpsErrors: true,
  });

  logger?.info("Capture proxy started", { port: server.port });

  return {
    port: server.port,
    url: server.url,
    stop: async () => {
      await server.stop();
      logger?.info("Capture proxy stopped", { pending: tracker.pendingCount() });
    },
  };
}
