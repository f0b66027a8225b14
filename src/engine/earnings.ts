import { isoDate } from './dates.js';

/**
 * First earnings date falling between today and the expiration (inclusive),
 * or null when the expiration is clear.
 */
export function earningsBeforeExpiration(
  earningsDates: readonly string[],
  expiration: string,
  today: Date = new Date(),
): string | null {
  const start = isoDate(today);
  const hits = earningsDates.filter(d => d >= start && d <= expiration).sort();
  return hits[0] ?? null;
}
