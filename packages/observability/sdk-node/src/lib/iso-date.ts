/**
 * ISO-8601 in UTC truncated to whole seconds, without a zone suffix:
 * `2017-01-02T00:00:00`. The store endpoint reads it as UTC.
 */
export function formatIsoSecondPrecision(date: Date): string {
  return date.toISOString().slice(0, 19);
}
