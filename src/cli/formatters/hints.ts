/**
 * Dim hint lines at the bottom of CLI output pointing at related commands.
 * Only shown on a TTY, never with --json.
 */

import { DIM, RESET } from "./colour.js";

export function shouldShowHints(): boolean {
  if (!process.stdout.isTTY) return false;
  if (process.env["NO_COLOR"] !== undefined) return false;
  return true;
}

/**
 * Join segments with " │ " and dim the result. Empty when hints are off.
 */
export function formatHint(segments: string[]): string {
  if (!shouldShowHints()) return "";
  return `${DIM}  Hint: ${segments.join(" │ ")}${RESET}`;
}
