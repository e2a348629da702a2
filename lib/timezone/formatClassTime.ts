/**
 * Display helpers for class start/end instants.
 *
 * Class timestamps arrive as studio wall-clock times and are parsed as UTC,
 * so formatting happens in UTC to give the wall-clock values back.
 */

import { differenceInMinutes } from 'date-fns';

const DEFAULT_LOCALE = 'en-US';
const WALL_CLOCK_ZONE = 'UTC';

export function formatClassDayOfWeek(startsAt: Date, timeZone: string = WALL_CLOCK_ZONE): string {
  return startsAt.toLocaleDateString(DEFAULT_LOCALE, { weekday: 'long', timeZone });
}

/** `2024-01-01` */
export function formatClassDate(startsAt: Date, timeZone: string = WALL_CLOCK_ZONE): string {
  const parts = new Intl.DateTimeFormat(DEFAULT_LOCALE, {
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    timeZone,
  }).formatToParts(startsAt);
  const part = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value ?? '';
  return `${part('year')}-${part('month')}-${part('day')}`;
}

/** `10:00 AM` */
export function formatClassTime(startsAt: Date, timeZone: string = WALL_CLOCK_ZONE): string {
  return startsAt
    .toLocaleTimeString(DEFAULT_LOCALE, {
      hour: 'numeric',
      minute: '2-digit',
      hour12: true,
      timeZone,
    })
    .replace(/\u202f/g, ' '); // newer ICU puts a narrow no-break space before AM/PM
}

/** `50 min` */
export function formatClassDuration(startsAt: Date, endsAt: Date): string {
  return `${differenceInMinutes(endsAt, startsAt)} min`;
}
