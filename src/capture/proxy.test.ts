import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { FlowStore } from "../store/flow-store.js";
import {
  FlowTracker,
  applyAbort,
  applyResponse,
  flowFromRequest,
  isBodyTruncated,
  toEpochMs,
  toHeaderFields,
  type CapturedRequest,
  type CapturedResponse,
} from "./proxy.js";
import { FlowRecorder } from "./recorder.js";

const START = 1_700_000_000_000;

function makeRequest(overrides: Partial<CapturedRequest> = {}): CapturedRequest {
  return {
    id: "req-1",
    method: "POST",
    url: "https://api.example.com/items?page=2",
    httpVersion: "1.1",
    remoteIpAddress: "127.0.0.1",
    remotePort: 52000,
    rawHeaders: [
      ["Host", "api.example.com"],
      ["Content-Length", "7"],
    ],
    body: { buffer: Buffer.from("payload") },
    timingEvents: { startTime: START, startTimestamp: 500, bodyReceivedTimestamp: 512.5 },
    ...overrides,
  };
}

function makeResponse(overrides: Partial<CapturedResponse> = {}): CapturedResponse {
  return {
    id: "req-1",
    statusCode: 201,
    statusMessage: "Created",
    rawHeaders: [["Content-Type", "application/json"]],
    body: { buffer: Buffer.from('{"ok":true}') },
    timingEvents: {
      startTime: START,
      startTimestamp: 500,
      headersSentTimestamp: 540,
      responseSentTimestamp: 545,
    },
    ...overrides,
  };
}

describe("toEpochMs", () => {
  it("offsets relative timestamps from the start time", () => {
    expect(toEpochMs({ startTime: START, startTimestamp: 500 }, 540)).toBe(START + 40);
  });

  it("is undefined when the event has not happened", () => {
    expect(toEpochMs({ startTime: START, startTimestamp: 500 }, undefined)).toBeUndefined();
    expect(toEpochMs({}, 540)).toBeUndefined();
  });
});

describe("toHeaderFields", () => {
  it("keeps header bytes as sent", () => {
    const [field] = toHeaderFields([["X-Name", "café"]]);
    expect(field?.[0]).toEqual(Buffer.from("X-Name"));
    expect(field?.[1]).toEqual(Buffer.from([0x63, 0x61, 0x66, 0xe9]));
  });
});

describe("isBodyTruncated", () => {
  it("spots a dropped body", () => {
    expect(isBodyTruncated([["content-length", "100"]], Buffer.alloc(0))).toBe(true);
    expect(isBodyTruncated([["Content-Length", "0"]], Buffer.alloc(0))).toBe(false);
    expect(isBodyTruncated([], Buffer.alloc(0))).toBe(false);
    expect(isBodyTruncated([["Content-Length", "3"]], Buffer.from("abc"))).toBe(false);
  });
});

describe("flowFromRequest", () => {
  it("maps a captured request into flow state", () => {
    const flow = flowFromRequest(makeRequest(), makeRequest().body);

    expect(flow.request).toEqual({
      method: "POST",
      scheme: "https",
      host: "api.example.com",
      port: 443,
      path: "/items?page=2",
      httpVersion: "HTTP/1.1",
      headers: toHeaderFields(makeRequest().rawHeaders),
      content: Buffer.from("payload"),
      timestampStart: START,
      timestampEnd: START + 12.5,
    });
    expect(flow.response).toBeNull();
    expect(flow.clientConn.peername).toEqual(["127.0.0.1", 52000]);
    expect(flow.clientConn.sni).toBe("api.example.com");
    expect(flow.serverConn.address).toEqual(["api.example.com", 443]);
    expect(flow.timestampCreated).toBe(START);
    expect(flow.metadata).toEqual({});
  });

  it("keeps explicit ports and plain http", () => {
    const flow = flowFromRequest(makeRequest({ url: "http://localhost:3000/" }));
    expect(flow.request.scheme).toBe("http");
    expect(flow.request.port).toBe(3000);
    expect(flow.clientConn.sni).toBeNull();
  });

  it("leaves the body out until it has been received", () => {
    const flow = flowFromRequest(makeRequest());
    expect(flow.request.content).toBeNull();
    expect(flow.request.timestampEnd).toBeNull();
  });

  it("marks a body dropped for size", () => {
    const request = makeRequest({ body: { buffer: Buffer.alloc(0) } });
    const flow = flowFromRequest(request, request.body);
    expect(flow.request.content).toBeNull();
    expect(flow.metadata).toEqual({ truncated: ["request"] });
  });

  it("falls back to the current time without timing data", () => {
    const flow = flowFromRequest(makeRequest({ timingEvents: {} }), undefined, 42);
    expect(flow.timestampCreated).toBe(42);
  });
});

describe("applyResponse", () => {
  it("attaches the response and closes the connections", () => {
    const flow = flowFromRequest(makeRequest(), makeRequest().body);
    applyResponse(flow, makeResponse());

    expect(flow.response).toEqual({
      statusCode: 201,
      reason: "Created",
      httpVersion: "HTTP/1.1",
      headers: toHeaderFields([["Content-Type", "application/json"]]),
      content: Buffer.from('{"ok":true}'),
      timestampStart: START + 40,
      timestampEnd: START + 45,
    });
    expect(flow.serverConn.tlsEstablished).toBe(true);
    expect(flow.serverConn.timestampStart).toBe(START + 12.5);
    expect(flow.clientConn.timestampEnd).toBe(START + 45);
  });

  it("adds to the truncation list", () => {
    const request = makeRequest({ body: { buffer: Buffer.alloc(0) } });
    const flow = flowFromRequest(request, request.body);
    applyResponse(
      flow,
      makeResponse({ rawHeaders: [["Content-Length", "99999"]], body: { buffer: Buffer.alloc(0) } })
    );
    expect(flow.response?.content).toBeNull();
    expect(flow.metadata).toEqual({ truncated: ["request", "response"] });
  });
});

describe("applyAbort", () => {
  it("records the error message and time", () => {
    const flow = flowFromRequest(makeRequest());
    applyAbort(flow, {
      ...makeRequest(),
      error: { code: "ECONNRESET" },
      timingEvents: { startTime: START, startTimestamp: 500, abortedTimestamp: 600 },
    });
    expect(flow.error).toEqual({ msg: "ECONNRESET", timestamp: START + 100 });
  });

  it("uses a generic message when none is given", () => {
    const flow = flowFromRequest(makeRequest());
    applyAbort(flow, makeRequest(), 7);
    expect(flow.error).toEqual({ msg: "Request aborted", timestamp: 7 });
  });
});

describe("FlowTracker", () => {
  let tempDir: string;
  let store: FlowStore;
  let tracker: FlowTracker;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "flowvault-proxy-test-"));
    store = FlowStore.open({ path: path.join(tempDir, "flows.db") });
    tracker = new FlowTracker(new FlowRecorder(store));
  });

  afterEach(() => {
    store.close();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("records a flow on request and completes it on response", () => {
    tracker.onRequest(makeRequest());
    expect(store.count("~q")).toBe(1);
    expect(tracker.pendingCount()).toBe(1);

    tracker.onResponse(makeResponse());
    expect(store.count("~q")).toBe(0);
    expect(store.count("~s & ~c 201 & ~d api\\.example\\.com")).toBe(1);
    expect(tracker.pendingCount()).toBe(0);
  });

  it("stores the request body", () => {
    tracker.onRequest(makeRequest());
    expect(store.count("~bq payload")).toBe(1);
  });

  it("ignores responses it has no request for", () => {
    tracker.onResponse(makeResponse({ id: "unknown" }));
    expect(store.count()).toBe(0);
  });

  it("records aborted requests as errors", () => {
    tracker.onRequest(makeRequest());
    tracker.onAbort({ ...makeRequest(), error: { message: "socket hang up" } });

    expect(store.count("~e")).toBe(1);
    expect(store.count()).toBe(1);
    expect(tracker.pendingCount()).toBe(0);
  });

  it("records an abort that arrives before the request completed", () => {
    tracker.onAbort({ ...makeRequest({ id: "early" }), error: { message: "client went away" } });
    const [summary] = store.summaries();
    expect(summary?.hasError).toBe(true);
    expect(summary?.url).toBe("https://api.example.com/items?page=2");
  });
});
