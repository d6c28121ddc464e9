/**
 * Detail view for `flowvault show`.
 */

import type { HeaderField, HttpFlowState, RequestState } from "../../shared/types.js";
import { BOLD, CYAN, DIM, RED, YELLOW, paint, statusColour, useColour } from "./colour.js";
import { formatDuration, formatSize } from "./units.js";

const DEFAULT_PORTS: Record<string, number> = { http: 80, https: 443 };
const MAX_PREVIEW_LENGTH = 2000;
const SCAN_SIZE = 8 * 1024;
const BINARY_THRESHOLD = 0.1;

export interface DetailOptions {
  colour?: boolean;
}

/**
 * Full URL of a request, leaving out the scheme's default port.
 */
export function flowUrl(request: RequestState): string {
  const port = DEFAULT_PORTS[request.scheme] === request.port ? "" : `:${request.port}`;
  return `${request.scheme}://${request.host}${port}${request.path}`;
}

/**
 * Treat a body as binary when more than 10% of its first 8KB are control
 * bytes. Bytes >= 128 count as text so UTF-8 passes.
 */
export function isBinaryBody(body: Buffer): boolean {
  const bytesToScan = Math.min(body.length, SCAN_SIZE);
  if (bytesToScan === 0) return false;

  let nonPrintable = 0;
  for (let i = 0; i < bytesToScan; i++) {
    const byte = body[i];
    if (byte === undefined) continue;
    const printable = byte === 9 || byte === 10 || byte === 13 || (byte >= 32 && byte <= 126) || byte >= 128;
    if (!printable) nonPrintable++;
  }
  return nonPrintable / bytesToScan > BINARY_THRESHOLD;
}

export function headerValue(headers: HeaderField[], name: string): string | undefined {
  const lower = name.toLowerCase();
  const match = headers.find(([key]) => key.toString("latin1").toLowerCase() === lower);
  return match?.[1].toString("utf-8");
}

/**
 * Mask an authorisation header value, showing only the scheme.
 */
function maskAuthValue(value: string): string {
  const spaceIdx = value.indexOf(" ");
  return spaceIdx > 0 ? value.slice(0, spaceIdx) + " ***" : "***";
}

function formatHeaders(title: string, headers: HeaderField[], colour: boolean): string[] {
  const lines = [paint(`  ${title}`, BOLD, colour)];
  for (const [rawName, rawValue] of headers) {
    const name = rawName.toString("utf-8");
    const value = rawValue.toString("utf-8");
    const masked = name.toLowerCase() === "authorization" ? maskAuthValue(value) : value;
    lines.push(`    ${name}: ${masked}`);
  }
  return lines;
}

function formatBody(title: string, body: Buffer | null, headers: HeaderField[], colour: boolean): string[] {
  if (body === null) {
    return [`${paint(`  ${title}`, BOLD, colour)} ${paint("(not captured)", DIM, colour)}`];
  }
  if (body.length === 0) {
    return [];
  }

  const contentType = headerValue(headers, "content-type")?.split(";")[0]?.trim();
  const info = contentType ? `${formatSize(body.length)}, ${contentType}` : formatSize(body.length);
  const lines = [`${paint(`  ${title}`, BOLD, colour)} (${info})`];

  if (isBinaryBody(body)) {
    lines.push(paint("    (binary content, use --body to dump it)", DIM, colour));
    return lines;
  }

  const text = body.toString("utf-8");
  const preview = text.length > MAX_PREVIEW_LENGTH ? text.slice(0, MAX_PREVIEW_LENGTH) + "..." : text;
  for (const line of preview.split("\n")) {
    lines.push(`    ${line}`);
  }
  return lines;
}

function formatTitle(flow: HttpFlowState, colour: boolean): string {
  const { request, response } = flow;
  const arrow = paint("→", DIM, colour);
  const status = response
    ? paint(`${response.statusCode} ${response.reason}`.trim(), statusColour(response.statusCode), colour)
    : "pending";
  const end = response?.timestampEnd ?? null;
  const duration = end === null ? "" : ` (${formatDuration(end - request.timestampStart)})`;
  return `  ${request.method} ${flowUrl(request)} ${arrow} ${status}${duration}`;
}

/**
 * Format the full detail view for a single flow.
 */
export function formatFlowDetail(flow: HttpFlowState, options?: DetailOptions): string {
  const colour = options?.colour ?? useColour();
  const lines = [formatTitle(flow, colour)];

  lines.push(paint(`  ${flow.id}  ${new Date(flow.timestampCreated).toISOString()}`, DIM, colour));
  if (flow.error) {
    lines.push(paint(`  Error: ${flow.error.msg}`, RED, colour));
  }
  if (flow.marked !== "") {
    lines.push(paint(`  Marked: ${flow.marked}`, YELLOW, colour));
  }
  if (flow.comment !== "") {
    lines.push(`  Comment: ${flow.comment}`);
  }
  if (flow.isReplay) {
    lines.push(paint(`  Replayed ${flow.isReplay}`, CYAN, colour));
  }
  lines.push("");

  lines.push(...formatHeaders("Request Headers", flow.request.headers, colour));
  lines.push(...formatBody("Request Body", flow.request.content, flow.request.headers, colour));
  lines.push("");

  if (flow.response) {
    lines.push(...formatHeaders("Response Headers", flow.response.headers, colour));
    lines.push(...formatBody("Response Body", flow.response.content, flow.response.headers, colour));
    lines.push("");
  }

  const client = flow.clientConn.peername;
  const server = flow.serverConn.address;
  lines.push(paint("  Connection", BOLD, colour));
  lines.push(`    Client: ${client ? `${client[0]}:${client[1]}` : "-"}`);
  lines.push(`    Server: ${server ? `${server[0]}:${server[1]}` : "-"}${flow.serverConn.tlsEstablished ? " (TLS)" : ""}`);

  return lines.join("\n");
}
