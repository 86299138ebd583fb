/**
 * Parse a YYYY-MM-DD string as a local date at noon, so DST shifts never move the day
 */
export function parseLocalDate(dateStr: string): Date {
  const [year, month, day] = dateStr.split('-').map(Number);
  return new Date(year, month - 1, day, 12, 0, 0);
}

/**
 * Format a Date object to YYYY-MM-DD string
 */
export function formatDateStr(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Validate a schedule date. Returns the date unchanged when it names a real
 * calendar day in YYYY-MM-DD form, otherwise null.
 */
export function parseScheduleDate(value: string): string | null {
  const match = value.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!match) {
    return null;
  }
  const [, year, month, day] = match;
  const parsed = parseLocalDate(value);
  if (
    parsed.getFullYear() !== Number(year) ||
    parsed.getMonth() + 1 !== Number(month) ||
    parsed.getDate() !== Number(day)
  ) {
    return null;
  }
  return value;
}

/**
 * Games on or before this date are not considered for swaps.
 * Defaults to today + 10 days.
 */
export function computeCutoffDate(now: Date, days = 10): string {
  const cutoff = new Date(now.getFullYear(), now.getMonth(), now.getDate(), 12, 0, 0);
  cutoff.setDate(cutoff.getDate() + days);
  return formatDateStr(cutoff);
}
