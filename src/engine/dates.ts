const MS_PER_DAY = 86_400_000;

/** YYYY-MM-DD of the given instant in UTC. */
export function isoDate(d: Date): string {
  return d.toISOString().slice(0, 10);
}

function utcMidnight(isoDay: string): number {
  return Date.parse(`${isoDay}T00:00:00Z`);
}

/** Calendar days from `today` to the expiration date; negative once expired. */
export function daysToExpiry(expiration: string, today: Date = new Date()): number {
  return Math.round((utcMidnight(expiration) - utcMidnight(isoDate(today))) / MS_PER_DAY);
}

/** Weekdays strictly after `today` up to and including the expiration. Holidays are not excluded. */
export function tradingDaysToExpiry(expiration: string, today: Date = new Date()): number {
  const end = utcMidnight(expiration);
  let cursor = utcMidnight(isoDate(today)) + MS_PER_DAY;
  let count = 0;
  while (cursor <= end) {
    const day = new Date(cursor).getUTCDay();
    if (day !== 0 && day !== 6) count++;
    cursor += MS_PER_DAY;
  }
  return count;
}

export function addDays(d: Date, days: number): Date {
  return new Date(d.getTime() + days * MS_PER_DAY);
}
