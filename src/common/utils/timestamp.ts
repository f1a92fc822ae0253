/**
 * ISO timestamp for a record being modified. Always later than `previous`,
 * even when the change lands in the same millisecond.
 */
export function touchedAt(previous: string, now: Date = new Date()): string {
  const last = Date.parse(previous);
  const next = Number.isNaN(last) ? now.getTime() : Math.max(now.getTime(), last + 1);
  return new Date(next).toISOString();
}
