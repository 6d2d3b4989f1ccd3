/**
 * Calendar helpers. Every date here is a UTC calendar day in YYYY-MM-DD form.
 */

const DAY_MS = 24 * 60 * 60 * 1000;

export function startOfDay(isoDate: string): Date {
  return new Date(`${isoDate}T00:00:00.000Z`);
}

export function toIsoDate(instant: Date): string {
  return instant.toISOString().slice(0, 10);
}

export function addDays(isoDate: string, days: number): string {
  return toIsoDate(new Date(startOfDay(isoDate).getTime() + days * DAY_MS));
}

export function daysInMonth(year: number, month: number): number {
  // Day 0 of the next month is the last day of this one
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function monthBounds(year: number, month: number): { first: string; last: string } {
  const mm = String(month).padStart(2, '0');
  const last = String(daysInMonth(year, month)).padStart(2, '0');
  return { first: `${year}-${mm}-01`, last: `${year}-${mm}-${last}` };
}

/**
 * Instant a task is due: its date and time, or the end of its due day when it has no time.
 */
export function dueInstant(dueDate: string, dueTime: string | null): Date {
  if (dueTime) {
    return new Date(`${dueDate}T${dueTime}:00.000Z`);
  }
  return startOfDay(addDays(dueDate, 1));
}
