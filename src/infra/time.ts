/**
 * Time formatting for transcript and log lines.
 */

const pad = (n: number): string => String(n).padStart(2, "0");

/**
 * Format epoch milliseconds to "YYYY-MM-DD HH:MM:SS" in local time.
 */
export function formatTimestamp(epochMs: number): string {
  const d = new Date(epochMs);
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

/**
 * Format a bracketed timestamp for tool notices, optionally with duration.
 *
 * Examples:
 *   [2026-02-28 14:30:05 | took 2.3s]
 *   [2026-02-28 14:30:05]
 */
export function formatToolTimestamp(
  epochMs: number,
  durationMs?: number,
): string {
  const ts = formatTimestamp(epochMs);
  if (durationMs != null) {
    const secs = (durationMs / 1000).toFixed(1);
    return `[${ts} | took ${secs}s]`;
  }
  return `[${ts}]`;
}
