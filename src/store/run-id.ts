/**
 * Run IDs are 14-digit UTC timestamps (YYYYMMDDHHmmss), optionally
 * suffixed to keep runs started within the same second apart.
 */
export function makeRunId(now: Date = new Date(), suffix?: string): string {
  const parts = [
    now.getUTCFullYear(),
    String(now.getUTCMonth() + 1).padStart(2, '0'),
    String(now.getUTCDate()).padStart(2, '0'),
    String(now.getUTCHours()).padStart(2, '0'),
    String(now.getUTCMinutes()).padStart(2, '0'),
    String(now.getUTCSeconds()).padStart(2, '0')
  ];
  const base = parts.join('');
  return suffix ? `${base}-${suffix}` : base;
}

/** ISO-8601 UTC with millisecond precision and a Z suffix. */
export function isoTimestamp(now: Date = new Date()): string {
  return now.toISOString();
}
