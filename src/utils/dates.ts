import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import timezone from 'dayjs/plugin/timezone';

dayjs.extend(utc);
dayjs.extend(timezone);

export type Locale = 'en' | 'it';

export const DEFAULT_TIMEZONE = 'Europe/Rome';

const ISO_DATE_FORMAT = 'YYYY-MM-DD';
const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

// Phrase the safety defaults inject when a date-sensitive tool gets no target_date
export const TODAY_PHRASES: Record<Locale, string> = {
  en: 'today',
  it: 'oggi',
};

export const RELATIVE_DAY_OFFSETS: ReadonlyMap<string, number> = new Map([
  ['today', 0],
  ['tomorrow', 1],
  ['yesterday', -1],
  ['day after tomorrow', 2],
  ['the day after tomorrow', 2],
  ['day before yesterday', -2],
  ['the day before yesterday', -2],
  ['oggi', 0],
  ['domani', 1],
  ['dopodomani', 2],
  ['ieri', -1],
  ['avantieri', -2],
  ["l'altro ieri", -2],
]);

export const isIsoDate = (value: string): boolean =>
  ISO_DATE_RE.test(value) &&
  dayjs.utc(value).format(ISO_DATE_FORMAT) === value;

export const isValidTimezone = (name: string): boolean => {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: name });
    return true;
  } catch {
    return false;
  }
};

export const todayIso = (tz: string, now: Date = new Date()): string =>
  dayjs(now).tz(tz).format(ISO_DATE_FORMAT);

export const addDays = (iso: string, days: number): string =>
  dayjs.utc(iso).add(days, 'day').format(ISO_DATE_FORMAT);

export const diffDays = (start: string, end: string): number =>
  dayjs.utc(end).diff(dayjs.utc(start), 'day');

export const weekdayOf = (iso: string): string => dayjs.utc(iso).format('dddd');
