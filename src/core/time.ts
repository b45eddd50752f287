/**
 * Get current time as an ISO-8601 UTC string.
 */
export function now(): string {
  return new Date().toISOString();
}

/**
 * Shift an ISO timestamp by a number of seconds.
 * @example addSeconds("2025-01-01T00:00:00.000Z", 90) -> "2025-01-01T00:01:30.000Z"
 */
export function addSeconds(ts: string, seconds: number): string {
  return new Date(Date.parse(ts) + seconds * 1000).toISOString();
}

/**
 * Whole seconds from `from` to `to`.
 */
export function secondsBetween(from: string, to: string): number {
  return Math.round((Date.parse(to) - Date.parse(from)) / 1000);
}

/**
 * ISO timestamp for `days` days before now.
 */
export function daysAgo(days: number): string {
  return addSeconds(now(), -days * 86400);
}

/**
 * True when `ts` is null or strictly after `reference`.
 */
export function isUnexpired(ts: string | null, reference: string): boolean {
  return ts === null || ts > reference;
}
