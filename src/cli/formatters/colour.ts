/**
 * ANSI colour constants and helpers for CLI formatters. Colour is off when
 * NO_COLOR is set or stdout is not a TTY.
 */

export const GREEN = "\x1b[32m";
export const YELLOW = "\x1b[33m";
export const RED = "\x1b[31m";
export const CYAN = "\x1b[36m";
export const BOLD = "\x1b[1m";
export const DIM = "\x1b[2m";
export const RESET = "\x1b[0m";

export function useColour(): boolean {
  if (process.env["NO_COLOR"] !== undefined) return false;
  if (!process.stdout.isTTY) return false;
  return true;
}

/** Green for 2xx, yellow for 3xx, red for 4xx/5xx. */
export function statusColour(status: number): string {
  if (status >= 200 && status < 300) return GREEN;
  if (status >= 300 && status < 400) return YELLOW;
  if (status >= 400) return RED;
  return "";
}

/**
 * Wrap text in a colour code when colour is enabled.
 */
export function paint(text: string, code: string, enabled: boolean = useColour()): string {
  return enabled && code !== "" ? `${code}${text}${RESET}` : text;
}
