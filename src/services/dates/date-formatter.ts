// Pure date -> folder name formatting

import { ConfigurationError } from '../../core/errors';
import { DateFormat } from '../../core/organizer-types';
import { PathUtils } from '../local/path-utils';

const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
];

const WEEKDAY_NAMES = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Build a local-time date, or undefined when the fields do not name a real calendar date
 */
export function makeLocalDate(
  year: number,
  month: number,
  day: number,
  hours = 0,
  minutes = 0,
  seconds = 0
): Date | undefined {
  if (year < 1 || year > 9999 || month < 1 || month > 12 || day < 1) {
    return undefined;
  }
  if (hours > 23 || minutes > 59 || seconds > 59) {
    return undefined;
  }

  const date = new Date(2000, 0, 1, hours, minutes, seconds);
  // setFullYear keeps years below 100 literal
  date.setFullYear(year, month - 1, day);

  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return undefined;
  }
  return date;
}

export function getQuarter(date: Date): number {
  return Math.floor(date.getMonth() / 3) + 1;
}

/**
 * ISO 8601 week number (weeks start on Monday, week 1 holds the first Thursday)
 */
export function getIsoWeek(date: Date): number {
  const target = new Date(Date.UTC(date.getFullYear(), date.getMonth(), date.getDate()));
  const dayNumber = target.getUTCDay() || 7;
  target.setUTCDate(target.getUTCDate() + 4 - dayNumber);
  const yearStart = new Date(Date.UTC(target.getUTCFullYear(), 0, 1));
  return Math.ceil(((target.getTime() - yearStart.getTime()) / 86400000 + 1) / 7);
}

function getDayOfYear(date: Date): number {
  const start = Date.UTC(date.getFullYear(), 0, 1);
  const current = Date.UTC(date.getFullYear(), date.getMonth(), date.getDate());
  return Math.floor((current - start) / 86400000) + 1;
}

/**
 * strftime subset: %Y %y %m %d %H %M %S %b %B %a %A %j %%. Unknown directives are kept verbatim.
 */
export function strftime(date: Date, pattern: string): string {
  return pattern.replace(/%([a-zA-Z%])/g, (directive: string, token: string) => {
    switch (token) {
      case 'Y':
        return pad(date.getFullYear(), 4);
      case 'y':
        return pad(date.getFullYear() % 100);
      case 'm':
        return pad(date.getMonth() + 1);
      case 'd':
        return pad(date.getDate());
      case 'H':
        return pad(date.getHours());
      case 'M':
        return pad(date.getMinutes());
      case 'S':
        return pad(date.getSeconds());
      case 'b':
        return MONTH_NAMES[date.getMonth()].slice(0, 3);
      case 'B':
        return MONTH_NAMES[date.getMonth()];
      case 'a':
        return WEEKDAY_NAMES[date.getDay()].slice(0, 3);
      case 'A':
        return WEEKDAY_NAMES[date.getDay()];
      case 'j':
        return pad(getDayOfYear(date), 3);
      case '%':
        return '%';
      default:
        return directive;
    }
  });
}

/**
 * Folder name for a date. Quarter is "YYYY-Qn"; week is the calendar year with the ISO week number.
 * Custom patterns may contain "/" to nest folders; each segment is sanitized.
 */
export function formatDateFolder(date: Date, format: DateFormat, customPattern?: string): string {
  switch (format) {
    case 'YYYY':
      return strftime(date, '%Y');
    case 'YYYY-MM':
      return strftime(date, '%Y-%m');
    case 'YYYY-MM-DD':
      return strftime(date, '%Y-%m-%d');
    case 'YYYY-QQ':
      return `${pad(date.getFullYear(), 4)}-Q${getQuarter(date)}`;
    case 'YYYY-WW':
      return `${pad(date.getFullYear(), 4)}-W${pad(getIsoWeek(date))}`;
    case 'MM-YYYY':
      return strftime(date, '%m-%Y');
    case 'MMM-YYYY':
      return strftime(date, '%b-%Y');
    case 'YYYY-MMM':
      return strftime(date, '%Y-%b');
    case 'YYYY-MMMM':
      return strftime(date, '%Y-%B');
    case 'custom':
      if (!customPattern || !customPattern.trim()) {
        throw new ConfigurationError('Custom date format requires a pattern', { format });
      }
      return PathUtils.sanitizeRelativeFolderPath(strftime(date, customPattern));
    default: {
      const unreachable: never = format;
      throw new ConfigurationError(`Unsupported date format: ${String(unreachable)}`);
    }
  }
}
