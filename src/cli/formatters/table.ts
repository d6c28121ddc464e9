/**
 * Tabular flow list for `flowvault flows`. One row per summary with a short
 * id, colour-coded status and error/marker flags.
 */

import type { FlowSummary } from "../../shared/types.js";
import { DIM, RED, YELLOW, paint, statusColour, useColour } from "./colour.js";
import { formatDuration, formatSize, padLeft, padRight, truncate } from "./units.js";

/** Length of abbreviated IDs shown in list views. */
export const SHORT_ID_LENGTH = 8;

const METHOD_WIDTH = 7;
const STATUS_WIDTH = 6;
const DURATION_WIDTH = 10;
const SIZE_WIDTH = 8;

export interface TableOptions {
  /** Maximum URL column width. Defaults to 50. */
  urlWidth?: number;
  /** Defaults to whether stdout supports colour */
  colour?: boolean;
}

function formatStatus(status: number | undefined, colour: boolean): string {
  if (status === undefined) return padLeft("...", STATUS_WIDTH);
  return paint(padLeft(String(status), STATUS_WIDTH), statusColour(status), colour);
}

function formatFlags(summary: FlowSummary, colour: boolean): string {
  const flags: string[] = [];
  if (summary.hasError) flags.push(paint("[E]", RED, colour));
  if (summary.marked !== undefined) flags.push(paint(summary.marked, YELLOW, colour));
  return flags.length === 0 ? "" : " " + flags.join(" ");
}

/**
 * Format flow summaries as a table string, with a "Showing" footer.
 */
export function formatFlowTable(summaries: FlowSummary[], total: number, options?: TableOptions): string {
  const urlWidth = options?.urlWidth ?? 50;
  const colour = options?.colour ?? useColour();
  const lines: string[] = [];

  const header =
    `  ${padRight("ID", SHORT_ID_LENGTH)}  ${padRight("Method", METHOD_WIDTH)}  ` +
    `${padLeft("Status", STATUS_WIDTH)}  ${padRight("URL", urlWidth)}  ` +
    `${padLeft("Duration", DURATION_WIDTH)}  ${padLeft("Size", SIZE_WIDTH)}`;
  lines.push(paint(header, DIM, colour));

  for (const summary of summaries) {
    const shortId = padRight(summary.id.slice(0, SHORT_ID_LENGTH), SHORT_ID_LENGTH);
    const method = padRight(summary.method.toUpperCase(), METHOD_WIDTH);
    const status = formatStatus(summary.statusCode, colour);
    const url = padRight(truncate(summary.url, urlWidth), urlWidth);
    const duration = padLeft(formatDuration(summary.durationMs), DURATION_WIDTH);
    const size = padLeft(formatSize(summary.responseSize), SIZE_WIDTH);

    lines.push(`  ${shortId}  ${method}  ${status}  ${url}  ${duration}  ${size}${formatFlags(summary, colour)}`);
  }

  lines.push("");
  const showing = summaries.length;
  if (showing < total) {
    lines.push(`  Showing ${showing} of ${total} flows`);
  } else {
    lines.push(`  Showing ${showing} flow${showing === 1 ? "" : "s"}`);
  }

  return lines.join("\n");
}
