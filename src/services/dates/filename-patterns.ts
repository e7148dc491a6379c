// Dates embedded in file names

import { makeLocalDate } from './date-formatter';

export interface FilenameDatePattern {
  name: string;
  regex: RegExp;
}

// Tried in order against the file name; the first valid calendar date wins
export const FILENAME_DATE_PATTERNS: readonly FilenameDatePattern[] = [
  { name: 'YYYY-MM-DD', regex: /(\d{4})-(\d{2})-(\d{2})/ },
  { name: 'YYYYMMDD', regex: /(\d{4})(\d{2})(\d{2})/ },
  { name: 'MM-DD-YYYY', regex: /(\d{2})-(\d{2})-(\d{4})/ },
  { name: 'MMDDYYYY', regex: /(\d{2})(\d{2})(\d{4})/ },
  { name: 'YYYY-MM', regex: /(\d{4})-(\d{2})/ },
  { name: 'YYYYMM', regex: /(\d{4})(\d{2})/ },
  { name: 'IMG_YYYYMMDD', regex: /IMG_(\d{4})(\d{2})(\d{2})/ },
  { name: 'YYYY-MM-DD_HH-MM-SS', regex: /(\d{4})-(\d{2})-(\d{2})_(\d{2})-(\d{2})-(\d{2})/ },
];

function dateFromGroups(groups: string[]): Date | undefined {
  const numbers = groups.map((group) => parseInt(group, 10));

  switch (groups.length) {
    case 2:
      return makeLocalDate(numbers[0], numbers[1], 1);
    case 3:
      // Year-first when the first field is four digits, otherwise month-day-year
      return groups[0].length === 4
        ? makeLocalDate(numbers[0], numbers[1], numbers[2])
        : makeLocalDate(numbers[2], numbers[0], numbers[1]);
    case 6:
      return makeLocalDate(numbers[0], numbers[1], numbers[2], numbers[3], numbers[4], numbers[5]);
    default:
      return undefined;
  }
}

export function extractDateFromFilename(fileName: string): Date | undefined {
  for (const pattern of FILENAME_DATE_PATTERNS) {
    const match = pattern.regex.exec(fileName);
    if (!match) {
      continue;
    }
    const date = dateFromGroups(match.slice(1));
    if (date) {
      return date;
    }
  }
  return undefined;
}

/**
 * Parse an EXIF timestamp ("YYYY:MM:DD HH:MM:SS") as local time
 */
export function parseExifDate(value: string): Date | undefined {
  const match = /^(\d{4}):(\d{2}):(\d{2})[ T](\d{2}):(\d{2}):(\d{2})/.exec(value.trim());
  if (!match) {
    return undefined;
  }
  const [year, month, day, hours, minutes, seconds] = match.slice(1).map((part) => parseInt(part, 10));
  return makeLocalDate(year, month, day, hours, minutes, seconds);
}
