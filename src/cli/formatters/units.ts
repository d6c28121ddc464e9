/**
 * Column helpers shared by the list and detail formatters.
 */

const BYTES_PER_KB = 1024;
const MS_PER_SECOND = 1000;
const MS_PER_MINUTE = 60 * MS_PER_SECOND;

/**
 * Format a byte count into a compact human-readable string.
 * Returns "0B" for zero, otherwise e.g. "500B", "1.2KB", "3.5MB".
 */
export function formatSize(bytes: number | undefined): string {
  if (bytes === undefined) return "-";
  if (bytes === 0) return "0B";
  if (bytes < BYTES_PER_KB) return `${bytes}B`;
  const kb = bytes / BYTES_PER_KB;
  if (kb < BYTES_PER_KB) return `${kb.toFixed(1)}KB`;
  const mb = kb / BYTES_PER_KB;
  return `${mb.toFixed(1)}MB`;
}

/**
 * "45ms", "1.5s", "2m 5s"; "-" when unknown.
 */
export function formatDuration(ms: number | undefined): string {
  if (ms === undefined) return "-";
  if (ms < MS_PER_SECOND) return `${Math.round(ms)}ms`;
  if (ms < MS_PER_MINUTE) return `${(ms / MS_PER_SECOND).toFixed(1)}s`;
  const minutes = Math.floor(ms / MS_PER_MINUTE);
  const seconds = Math.round((ms % MS_PER_MINUTE) / MS_PER_SECOND);
  return `${minutes}m ${seconds}s`;
}

export function truncate(text: string, width: number): string {
  if (text.length <= width) return text;
  if (width <= 1) return text.slice(0, width);
  return text.slice(0, width - 1) + "…";
}

export function padRight(text: string, width: number): string {
  return text.padEnd(width);
}

export function padLeft(text: string, width: number): string {
  return text.padStart(width);
}
