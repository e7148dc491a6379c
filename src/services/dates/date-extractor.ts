// Candidate file dates, best-date selection and date-based grouping

import * as fs from 'fs/promises';
import * as path from 'path';
import * as exifr from 'exifr';
import { Logger } from '../../types';
import { errorMessage, isRecord } from '../../types/utils';
import { EXIF_EXTENSIONS, UNKNOWN_DATE_FOLDER } from '../../core/constants';
import { ConfigurationError } from '../../core/errors';
import {
  DateDistribution,
  DateFormat,
  DateGroupingOptions,
  DateGroupingStatistics,
  DateRange,
  DateSource,
  FileDateInfo,
  ResolvedDateSource,
} from '../../core/organizer-types';
import { formatDateFolder, strftime } from './date-formatter';
import { extractDateFromFilename, parseExifDate } from './filename-patterns';

// Best-date priority when the source is 'auto'
const AUTO_PRIORITY: readonly ResolvedDateSource[] = ['metadata', 'filename', 'creation', 'modification'];

// Tag names as exifr reports them: DateTimeOriginal, DateTimeDigitized, DateTime
const EXIF_DATE_TAGS = ['DateTimeOriginal', 'CreateDate', 'ModifyDate'];

const DAY_MS = 24 * 60 * 60 * 1000;

export interface DateExtractorOptions {
  handleUnknownDates?: boolean;
  now?: () => Date;
}

export interface SelectedDate {
  date?: Date;
  source: ResolvedDateSource | null;
}

export function isInRange(date: Date, range: DateRange): boolean {
  if (range.start && date.getTime() < range.start.getTime()) {
    return false;
  }
  if (range.end && date.getTime() > range.end.getTime()) {
    return false;
  }
  return true;
}

function emptyGroupingStatistics(): DateGroupingStatistics {
  return { total: 0, grouped: 0, unknown: 0, outOfRange: 0, errors: [], bySource: {} };
}

export class DateExtractor {
  private readonly logger: Logger;
  private readonly handleUnknownDates: boolean;
  private readonly now: () => Date;
  private lastRunStatistics: DateGroupingStatistics = emptyGroupingStatistics();

  constructor(logger: Logger, options: DateExtractorOptions = {}) {
    this.logger = logger;
    this.handleUnknownDates = options.handleUnknownDates ?? true;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Collect every available candidate date. Throws when the file cannot be stat'ed.
   */
  async extract(filePath: string): Promise<FileDateInfo> {
    const stats = await fs.stat(filePath);
    const info: FileDateInfo = {
      filePath,
      // Platforms without birth time report 0
      creation: stats.birthtimeMs > 0 ? stats.birthtime : undefined,
      modification: stats.mtime,
      access: stats.atime,
      filename: extractDateFromFilename(path.basename(filePath)),
      metadata: EXIF_EXTENSIONS.includes(path.extname(filePath).toLowerCase())
        ? await this.readMetadataDate(filePath)
        : undefined,
      bestDate: this.now(),
      bestSource: null,
    };

    for (const source of AUTO_PRIORITY) {
      const candidate = info[source];
      if (candidate) {
        info.bestDate = candidate;
        info.bestSource = source;
        break;
      }
    }

    return info;
  }

  /**
   * The date for a requested source. 'auto' always yields a date (current time as a last resort)
   * but reports a null source when nothing was found.
   */
  selectDate(info: FileDateInfo, source: DateSource): SelectedDate {
    if (source === 'auto') {
      return { date: info.bestDate, source: info.bestSource };
    }
    const date = info[source];
    return date ? { date, source } : { source: null };
  }

  /**
   * Group files into date-named folders in first-seen order.
   * Files outside the range are left out entirely.
   */
  async organizeByDate(filePaths: readonly string[], options: DateGroupingOptions): Promise<Map<string, string[]>> {
    if (options.format === 'custom' && !options.customFormat?.trim()) {
      throw new ConfigurationError('Custom date format requires a pattern', { format: options.format });
    }

    const groups = new Map<string, string[]>();
    const stats = emptyGroupingStatistics();
    const addToGroup = (folder: string, filePath: string): void => {
      const bucket = groups.get(folder);
      if (bucket) {
        bucket.push(filePath);
      } else {
        groups.set(folder, [filePath]);
      }
      stats.grouped++;
    };

    this.logger.info(`Organizing ${filePaths.length} files by date`, {
      source: options.source,
      format: options.format,
    });

    for (const filePath of filePaths) {
      stats.total++;
      try {
        const info = await this.extract(filePath);
        const selected = this.selectDate(info, options.source);
        const sourceKey = selected.source ?? 'unknown';
        stats.bySource[sourceKey] = (stats.bySource[sourceKey] ?? 0) + 1;

        if (!selected.date) {
          stats.unknown++;
          if (this.handleUnknownDates) {
            addToGroup(UNKNOWN_DATE_FOLDER, filePath);
          }
          continue;
        }

        if (options.range && !isInRange(selected.date, options.range)) {
          stats.outOfRange++;
          this.logger.debug(`${path.basename(filePath)} outside date range`);
          continue;
        }

        const folder = formatDateFolder(selected.date, options.format, options.customFormat);
        addToGroup(folder, filePath);
        this.logger.debug(`${path.basename(filePath)} -> ${folder} (${strftime(selected.date, '%Y-%m-%d %H:%M')})`);
      } catch (error) {
        const message = errorMessage(error);
        this.logger.error(`Error reading dates of ${filePath}: ${message}`);
        stats.errors.push({ file: filePath, message });
        if (this.handleUnknownDates) {
          addToGroup(UNKNOWN_DATE_FOLDER, filePath);
        }
      }
    }

    this.lastRunStatistics = stats;
    this.logger.info(`Date organization complete: ${groups.size} folders, ${stats.grouped} files`, {
      bySource: stats.bySource,
    });

    return groups;
  }

  getLastRunStatistics(): DateGroupingStatistics {
    return {
      ...this.lastRunStatistics,
      errors: [...this.lastRunStatistics.errors],
      bySource: { ...this.lastRunStatistics.bySource },
    };
  }

  async analyzeDateDistribution(filePaths: readonly string[]): Promise<DateDistribution> {
    const analysis: DateDistribution = {
      totalFiles: filePaths.length,
      filesWithDate: 0,
      filesWithoutDate: 0,
      bySource: {},
      byYear: {},
      byMonth: {},
      problematicFiles: [],
    };

    for (const filePath of filePaths) {
      let info: FileDateInfo;
      try {
        info = await this.extract(filePath);
      } catch (error) {
        this.logger.debug(`Cannot read dates of ${filePath}: ${errorMessage(error)}`);
        analysis.problematicFiles.push(filePath);
        continue;
      }

      if (!info.bestSource) {
        analysis.filesWithoutDate++;
        analysis.problematicFiles.push(filePath);
        continue;
      }

      const date = info.bestDate;
      analysis.filesWithDate++;
      analysis.bySource[info.bestSource] = (analysis.bySource[info.bestSource] ?? 0) + 1;

      const year = strftime(date, '%Y');
      const month = strftime(date, '%Y-%m');
      analysis.byYear[year] = (analysis.byYear[year] ?? 0) + 1;
      analysis.byMonth[month] = (analysis.byMonth[month] ?? 0) + 1;

      if (!analysis.earliest || date < analysis.earliest) {
        analysis.earliest = date;
      }
      if (!analysis.latest || date > analysis.latest) {
        analysis.latest = date;
      }
    }

    return analysis;
  }

  /**
   * Day-level folders for spans up to a month, months up to three years, years beyond
   */
  static suggestFormatFor(analysis: DateDistribution): DateFormat {
    if (!analysis.earliest || !analysis.latest) {
      return 'YYYY-MM-DD';
    }

    const spanDays = Math.floor((analysis.latest.getTime() - analysis.earliest.getTime()) / DAY_MS);
    if (spanDays <= 31) {
      return 'YYYY-MM-DD';
    }
    if (spanDays <= 365 * 3) {
      return 'YYYY-MM';
    }
    return 'YYYY';
  }

  async suggestFormat(filePaths: readonly string[]): Promise<DateFormat> {
    return DateExtractor.suggestFormatFor(await this.analyzeDateDistribution(filePaths));
  }

  async getFilesInDateRange(
    filePaths: readonly string[],
    range: DateRange,
    source: DateSource = 'auto'
  ): Promise<string[]> {
    const matching: string[] = [];

    for (const filePath of filePaths) {
      try {
        const { date } = this.selectDate(await this.extract(filePath), source);
        if (date && isInRange(date, range)) {
          matching.push(filePath);
        }
      } catch (error) {
        this.logger.warn(`Error filtering ${filePath}: ${errorMessage(error)}`);
      }
    }

    this.logger.info(`Found ${matching.length} of ${filePaths.length} files in date range`);
    return matching;
  }

  private async readMetadataDate(filePath: string): Promise<Date | undefined> {
    try {
      const tags: unknown = await exifr.parse(filePath, { pick: EXIF_DATE_TAGS, reviveValues: false });
      if (!isRecord(tags)) {
        return undefined;
      }

      for (const tag of EXIF_DATE_TAGS) {
        const value = tags[tag];
        const date = typeof value === 'string' ? parseExifDate(value) : undefined;
        if (date) {
          return date;
        }
      }
    } catch (error) {
      this.logger.debug(`No embedded date in ${filePath}: ${errorMessage(error)}`);
    }
    return undefined;
  }
}
