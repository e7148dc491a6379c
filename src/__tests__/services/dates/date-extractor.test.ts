import * as exifr from 'exifr';
import { DateExtractor, isInRange } from '../../../services/dates/date-extractor';
import { ConfigurationError } from '../../../core/errors';
import { ConsoleLogger } from '../../../core/logger';
import { DateDistribution } from '../../../core/organizer-types';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';

jest.mock('exifr', () => ({ parse: jest.fn() }));

const parseMock = jest.mocked(exifr.parse);

function distribution(overrides: Partial<DateDistribution>): DateDistribution {
  return {
    totalFiles: 0,
    filesWithDate: 0,
    filesWithoutDate: 0,
    bySource: {},
    byYear: {},
    byMonth: {},
    problematicFiles: [],
    ...overrides,
  };
}

describe('DateExtractor', () => {
  const fixedNow = new Date(2030, 5, 1, 12, 0, 0);
  let tempDir: string;
  let extractor: DateExtractor;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'organizer-dates-'));
    extractor = new DateExtractor(new ConsoleLogger('ERROR'), { now: () => fixedNow });
    parseMock.mockReset();
    parseMock.mockResolvedValue(undefined);
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function writeFile(name: string, modified?: Date): Promise<string> {
    const filePath = path.join(tempDir, name);
    await fs.writeFile(filePath, 'content');
    if (modified) {
      await fs.utimes(filePath, modified, modified);
    }
    return filePath;
  }

  describe('extract', () => {
    it('should collect filesystem and filename dates', async () => {
      const modified = new Date(2022, 2, 4, 10, 30, 0);
      const file = await writeFile('trip-2023-05-01.txt', modified);

      const info = await extractor.extract(file);

      expect(info.filePath).toBe(file);
      expect(info.modification).toEqual(modified);
      expect(info.filename).toEqual(new Date(2023, 4, 1));
      expect(info.metadata).toBeUndefined();
      expect(info.bestSource).toBe('filename');
      expect(info.bestDate).toEqual(new Date(2023, 4, 1));
      expect(parseMock).not.toHaveBeenCalled();
    });

    it('should prefer the embedded capture date for photos', async () => {
      parseMock.mockResolvedValue({ CreateDate: '2021:07:04 18:00:00', DateTimeOriginal: '2021:07:04 17:59:00' });
      const file = await writeFile('IMG_20230514_120000.jpg');

      const info = await extractor.extract(file);

      expect(parseMock).toHaveBeenCalledWith(file, {
        pick: ['DateTimeOriginal', 'CreateDate', 'ModifyDate'],
        reviveValues: false,
      });
      expect(info.metadata).toEqual(new Date(2021, 6, 4, 17, 59, 0));
      expect(info.bestSource).toBe('metadata');
    });

    it('should ignore unreadable metadata', async () => {
      parseMock.mockRejectedValue(new Error('Unknown file format'));
      const file = await writeFile('broken.jpg', new Date(2020, 0, 2));

      const info = await extractor.extract(file);

      expect(info.metadata).toBeUndefined();
      expect(['creation', 'modification']).toContain(info.bestSource);
    });

    it('should throw for a missing file', async () => {
      await expect(extractor.extract(path.join(tempDir, 'missing.txt'))).rejects.toThrow(/ENOENT/);
    });
  });

  describe('selectDate', () => {
    it('should return the requested source or nothing', async () => {
      const modified = new Date(2022, 2, 4);
      const info = await extractor.extract(await writeFile('notes.txt', modified));

      expect(extractor.selectDate(info, 'modification')).toEqual({ date: modified, source: 'modification' });
      expect(extractor.selectDate(info, 'filename')).toEqual({ source: null });
      expect(extractor.selectDate(info, 'auto').date).toBe(info.bestDate);
    });
  });

  describe('organizeByDate', () => {
    it('should group by the selected source in first-seen order', async () => {
      const a = await writeFile('a.txt', new Date(2023, 2, 10));
      const b = await writeFile('b.txt', new Date(2024, 0, 2));
      const c = await writeFile('c.txt', new Date(2023, 2, 25));

      const groups = await extractor.organizeByDate([a, b, c], { source: 'modification', format: 'YYYY-MM' });

      expect([...groups]).toEqual([
        ['2023-03', [a, c]],
        ['2024-01', [b]],
      ]);
      expect(extractor.getLastRunStatistics()).toEqual({
        total: 3,
        grouped: 3,
        unknown: 0,
        outOfRange: 0,
        errors: [],
        bySource: { modification: 3 },
      });
    });

    it('should let a filename date win over file times under auto', async () => {
      const file = await writeFile('2023-05-01 notes.txt', new Date(2020, 0, 1));

      const groups = await extractor.organizeByDate([file], { source: 'auto', format: 'YYYY-MM-DD' });

      expect([...groups]).toEqual([['2023-05-01', [file]]]);
    });

    it('should leave out files outside the range', async () => {
      const early = await writeFile('early.txt', new Date(2023, 2, 10));
      const late = await writeFile('late.txt', new Date(2023, 2, 25));

      const groups = await extractor.organizeByDate([early, late], {
        source: 'modification',
        format: 'YYYY-MM-DD',
        range: { start: new Date(2023, 2, 20) },
      });

      expect([...groups]).toEqual([['2023-03-25', [late]]]);
      expect(extractor.getLastRunStatistics().outOfRange).toBe(1);
    });

    it('should place files without the requested date in Unknown-Date', async () => {
      const file = await writeFile('notes.txt');

      const groups = await extractor.organizeByDate([file], { source: 'filename', format: 'YYYY' });

      expect([...groups]).toEqual([['Unknown-Date', [file]]]);
      expect(extractor.getLastRunStatistics()).toMatchObject({ unknown: 1, bySource: { unknown: 1 } });
    });

    it('should omit undated files when unknown dates are not handled', async () => {
      const skipping = new DateExtractor(new ConsoleLogger('ERROR'), { handleUnknownDates: false });
      const file = await writeFile('notes.txt');

      const groups = await skipping.organizeByDate([file], { source: 'filename', format: 'YYYY' });

      expect(groups.size).toBe(0);
      expect(skipping.getLastRunStatistics()).toMatchObject({ total: 1, grouped: 0, unknown: 1 });
    });

    it('should record unreadable files and group them as unknown', async () => {
      const missing = path.join(tempDir, 'missing.txt');

      const groups = await extractor.organizeByDate([missing], { source: 'auto', format: 'YYYY' });

      expect([...groups]).toEqual([['Unknown-Date', [missing]]]);
      const stats = extractor.getLastRunStatistics();
      expect(stats.errors).toHaveLength(1);
      expect(stats.errors[0].file).toBe(missing);
    });

    it('should support custom nested patterns', async () => {
      const file = await writeFile('a.txt', new Date(2023, 6, 9));

      const groups = await extractor.organizeByDate([file], {
        source: 'modification',
        format: 'custom',
        customFormat: '%Y/%m',
      });

      expect([...groups.keys()]).toEqual([path.join('2023', '07')]);
    });

    it('should reject a custom format without a pattern', async () => {
      await expect(extractor.organizeByDate([], { source: 'auto', format: 'custom' })).rejects.toThrow(
        ConfigurationError
      );
    });
  });

  describe('analyzeDateDistribution', () => {
    it('should summarize dates by year and month', async () => {
      const first = await writeFile('a_2023-01-05.txt');
      const second = await writeFile('b_2023-03-10.txt');
      const missing = path.join(tempDir, 'missing.txt');

      const analysis = await extractor.analyzeDateDistribution([first, second, missing]);

      expect(analysis).toEqual({
        totalFiles: 3,
        filesWithDate: 2,
        filesWithoutDate: 0,
        bySource: { filename: 2 },
        byYear: { '2023': 2 },
        byMonth: { '2023-01': 1, '2023-03': 1 },
        problematicFiles: [missing],
        earliest: new Date(2023, 0, 5),
        latest: new Date(2023, 2, 10),
      });
      expect(DateExtractor.suggestFormatFor(analysis)).toBe('YYYY-MM');
    });
  });

  describe('suggestFormatFor', () => {
    it('should pick folder granularity from the date span', () => {
      const start = new Date(2020, 0, 1);

      expect(DateExtractor.suggestFormatFor(distribution({}))).toBe('YYYY-MM-DD');
      expect(DateExtractor.suggestFormatFor(distribution({ earliest: start, latest: new Date(2020, 0, 20) }))).toBe(
        'YYYY-MM-DD'
      );
      expect(DateExtractor.suggestFormatFor(distribution({ earliest: start, latest: new Date(2021, 5, 1) }))).toBe(
        'YYYY-MM'
      );
      expect(DateExtractor.suggestFormatFor(distribution({ earliest: start, latest: new Date(2024, 0, 1) }))).toBe(
        'YYYY'
      );
    });
  });

  describe('getFilesInDateRange', () => {
    it('should return files whose date falls in the inclusive range', async () => {
      const january = await writeFile('a_2023-01-05.txt');
      const march = await writeFile('b_2023-03-10.txt');
      const undated = await writeFile('notes.txt');

      const matching = await extractor.getFilesInDateRange(
        [january, march, undated],
        { start: new Date(2023, 0, 5), end: new Date(2023, 1, 28) },
        'filename'
      );

      expect(matching).toEqual([january]);
    });
  });

  describe('isInRange', () => {
    it('should treat both bounds as inclusive and optional', () => {
      const date = new Date(2023, 5, 15);

      expect(isInRange(date, {})).toBe(true);
      expect(isInRange(date, { start: date, end: date })).toBe(true);
      expect(isInRange(date, { start: new Date(2023, 5, 16) })).toBe(false);
      expect(isInRange(date, { end: new Date(2023, 5, 14) })).toBe(false);
    });
  });
});
