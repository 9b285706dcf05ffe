/** ISO 8601 UTC with second precision, e.g. `2026-01-21T10:00:00Z`. */
export function formatUtcSeconds(date: Date): string {
  const copy = new Date(date.getTime());
  copy.setMilliseconds(0);
  return copy.toISOString().replace(".000Z", "Z");
}

/**
 * Timestamp for a rewritten document: now, unless the previous document
 * claims a later time (clock skew), so the value never goes backwards.
 */
export function nextUpdatedAt(previous: string | null, now: Date): string {
  const current = formatUtcSeconds(now);
  if (previous === null) return current;
  return Date.parse(previous) > Date.parse(current) ? previous : current;
}
