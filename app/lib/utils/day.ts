/**
 * Local calendar-day helpers.
 *
 * Days are keyed as "YYYY-MM-DD" in local time; timestamps are epoch ms.
 */

export function dayKey(timestamp: number | Date): string {
  const date = new Date(timestamp);
  const year = date.getFullYear();
  const month = (date.getMonth() + 1).toString().padStart(2, '0');
  const day = date.getDate().toString().padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Epoch ms of local midnight for the day containing `timestamp`
 */
export function startOfDay(timestamp: number | Date): number {
  const date = new Date(timestamp);
  return new Date(date.getFullYear(), date.getMonth(), date.getDate()).getTime();
}

/**
 * Shift by whole calendar days, keeping the local wall-clock time
 */
export function addDays(timestamp: number | Date, days: number): number {
  const date = new Date(timestamp);
  date.setDate(date.getDate() + days);
  return date.getTime();
}

/**
 * Parse a "YYYY-MM-DD" key back to local midnight (epoch ms), or null when malformed
 */
export function parseDayKey(key: string): number | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(key);
  if (!match) return null;
  const [, year, month, day] = match;
  return new Date(Number(year), Number(month) - 1, Number(day)).getTime();
}

