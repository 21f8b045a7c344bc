/**
 * Calendar helpers working on `YYYY-MM-DD` day keys.
 *
 * Day keys are computed in the configured time zone once and then handled
 * as plain calendar dates, so day arithmetic never depends on the host zone.
 */

const MS_PER_DAY = 86_400_000;

const MONTH_NAMES = [
  'Jan',
  'Feb',
  'Mar',
  'Apr',
  'May',
  'Jun',
  'Jul',
  'Aug',
  'Sep',
  'Oct',
  'Nov',
  'Dec',
] as const;

interface ZonedParts {
  year: string;
  month: string;
  day: string;
  hour: string;
  minute: string;
  second: string;
}

export function isValidTimeZone(timeZone: string): boolean {
  if (!timeZone) {
    return false;
  }
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

function zonedParts(date: Date, timeZone: string): ZonedParts {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  });

  const parts: ZonedParts = { year: '', month: '', day: '', hour: '', minute: '', second: '' };
  for (const part of formatter.formatToParts(date)) {
    if (
      part.type === 'year' ||
      part.type === 'month' ||
      part.type === 'day' ||
      part.type === 'hour' ||
      part.type === 'minute' ||
      part.type === 'second'
    ) {
      parts[part.type] = part.value;
    }
  }
  return parts;
}

function parseDateKey(key: string): number {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(key);
  if (!match) {
    throw new Error(`Invalid date key: ${key}`);
  }
  return Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
}

function formatDateKey(utcMs: number): string {
  return new Date(utcMs).toISOString().slice(0, 10);
}

/**
 * Calendar day of an instant in the given time zone
 */
export function toDateKey(date: Date, timeZone: string): string {
  const { year, month, day } = zonedParts(date, timeZone);
  return `${year}-${month}-${day}`;
}

export function addDays(key: string, days: number): string {
  return formatDateKey(parseDateKey(key) + days * MS_PER_DAY);
}

/**
 * Whole days from `from` to `to` (negative when `to` is earlier)
 */
export function daysBetween(from: string, to: string): number {
  return Math.round((parseDateKey(to) - parseDateKey(from)) / MS_PER_DAY);
}

export function firstOfMonth(key: string): string {
  parseDateKey(key);
  return `${key.slice(0, 8)}01`;
}

/**
 * `2024-10-05` -> `Oct 05`
 */
export function formatShortDate(key: string): string {
  const month = new Date(parseDateKey(key)).getUTCMonth();
  return `${MONTH_NAMES[month]} ${key.slice(8, 10)}`;
}

/**
 * `YYYY-MM-DD HH:mm <zone>` in the given time zone
 */
export function formatTimestamp(date: Date, timeZone: string, withSeconds = false): string {
  const { year, month, day, hour, minute, second } = zonedParts(date, timeZone);
  const time = withSeconds ? `${hour}:${minute}:${second}` : `${hour}:${minute}`;
  return `${year}-${month}-${day} ${time} ${timeZone}`;
}
