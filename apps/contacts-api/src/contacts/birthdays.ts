/**
 * Birthday arithmetic on calendar dates (YYYY-MM-DD), evaluated in UTC.
 * A 29 February birthday falls on 28 February in non-leap years.
 */

export const UPCOMING_BIRTHDAY_DAYS = 7;

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function occurrence(year: number, month: number, day: number): number {
  if (month === 2 && day === 29 && !isLeapYear(year)) {
    return Date.UTC(year, 1, 28);
  }
  return Date.UTC(year, month - 1, day);
}

function parseCalendarDate(value: string): { month: number; day: number } {
  const match = CALENDAR_DATE.exec(value);
  if (!match) {
    throw new Error(`Not a calendar date: '${value}'`);
  }
  return { month: Number(match[2]), day: Number(match[3]) };
}

/**
 * Whole days from `today` to the next anniversary of `birthday` (0 when it is today)
 */
export function daysUntilBirthday(birthday: string, today: Date): number {
  const { month, day } = parseCalendarDate(birthday);
  const year = today.getUTCFullYear();
  const start = Date.UTC(year, today.getUTCMonth(), today.getUTCDate());

  let next = occurrence(year, month, day);
  if (next < start) {
    next = occurrence(year + 1, month, day);
  }

  return Math.round((next - start) / MS_PER_DAY);
}

/**
 * Entries whose next birthday falls within [today, today + days], soonest first
 */
export function upcomingBirthdays<T extends { birthday: string | null }>(
  entries: T[],
  today: Date,
  days: number = UPCOMING_BIRTHDAY_DAYS,
): T[] {
  const upcoming: Array<{ entry: T; daysUntil: number }> = [];

  for (const entry of entries) {
    if (entry.birthday === null) {
      continue;
    }
    const daysUntil = daysUntilBirthday(entry.birthday, today);
    if (daysUntil <= days) {
      upcoming.push({ entry, daysUntil });
    }
  }

  return upcoming.sort((a, b) => a.daysUntil - b.daysUntil).map(({ entry }) => entry);
}
