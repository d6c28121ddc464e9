import { describe, it, expect } from "vitest";
import type { FlowSummary } from "../../shared/types.js";
import { formatFlowTable } from "./table.js";

const COMPLETE: FlowSummary = {
  id: "0123456789abcdef",
  timestampCreated: 0,
  method: "get",
  url: "https://example.com/",
  statusCode: 200,
  durationMs: 45,
  requestSize: 0,
  responseSize: 2048,
  hasError: false,
};

const PENDING: FlowSummary = {
  id: "ffff0000aaaa",
  timestampCreated: 0,
  method: "POST",
  url: "http://api.test/upload/a/very/long/path",
  requestSize: 10,
  responseSize: 0,
  marked: ":star:",
  hasError: true,
};

describe("formatFlowTable", () => {
  it("renders a header, one row per flow and a footer", () => {
    const output = formatFlowTable([COMPLETE, PENDING], 5, { urlWidth: 20, colour: false });
    expect(output.split("\n")).toEqual([
      "  ID        Method   Status  URL                     Duration      Size",
      "  01234567  GET         200  https://example.com/        45ms     2.0KB",
      "  ffff0000  POST        ...  http://api.test/upl…           -        0B [E] :star:",
      "",
      "  Showing 2 of 5 flows",
    ]);
  });

  it("says how many flows are shown when the page holds them all", () => {
    expect(formatFlowTable([COMPLETE], 1, { colour: false }).split("\n").at(-1)).toBe("  Showing 1 flow");
    expect(formatFlowTable([], 0, { colour: false }).split("\n").at(-1)).toBe("  Showing 0 flows");
  });

  it("colours the status by class", () => {
    const output = formatFlowTable([{ ...COMPLETE, statusCode: 404 }], 1, { colour: true });
    expect(output).toContain("\x1b[31m   404\x1b[0m");
  });
});
