import { extractDateFromFilename, parseExifDate } from '../../../services/dates/filename-patterns';

function ymd(date: Date | undefined): string | undefined {
  return date ? `${date.getFullYear()}-${date.getMonth() + 1}-${date.getDate()}` : undefined;
}

describe('filename patterns', () => {
  describe('extractDateFromFilename', () => {
    it('should read dashed year-first dates', () => {
      expect(ymd(extractDateFromFilename('trip-2023-05-01.jpg'))).toBe('2023-5-1');
    });

    it('should read compact camera file names', () => {
      expect(ymd(extractDateFromFilename('IMG_20230514_123456.jpg'))).toBe('2023-5-14');
    });

    it('should read month-first dates', () => {
      expect(ymd(extractDateFromFilename('report-05-14-2023.pdf'))).toBe('2023-5-14');
      expect(ymd(extractDateFromFilename('scan12252022.pdf'))).toBe('2022-12-25');
    });

    it('should fall back to year and month', () => {
      expect(ymd(extractDateFromFilename('budget_2023-07.xlsx'))).toBe('2023-7-1');
    });

    it('should skip matches that are not calendar dates', () => {
      expect(extractDateFromFilename('scan_2023-13-45.pdf')).toBeUndefined();
    });

    it('should return undefined when no date is present', () => {
      expect(extractDateFromFilename('notes.txt')).toBeUndefined();
    });
  });

  describe('parseExifDate', () => {
    it('should parse EXIF timestamps as local time', () => {
      const date = parseExifDate('2022:12:31 23:59:58');

      expect(date).toEqual(new Date(2022, 11, 31, 23, 59, 58));
    });

    it('should reject other formats and impossible dates', () => {
      expect(parseExifDate('2022-12-31 10:00:00')).toBeUndefined();
      expect(parseExifDate('2022:02:30 10:00:00')).toBeUndefined();
    });
  });
});
