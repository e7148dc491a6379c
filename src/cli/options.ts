// Parsing and validation of command line options

import { OrganizerConfigManager } from '../core/config-manager';
import { ConfigurationError } from '../core/errors';
import { parseLogLevel } from '../core/logger';
import {
  BatchOperationRequest,
  CONFLICT_STRATEGIES,
  DATE_FORMATS,
  DATE_SOURCES,
  DateRange,
  ORGANIZE_MODES,
  OrganizerConfig,
} from '../core/organizer-types';
import { makeLocalDate } from '../services/dates/date-formatter';
import { isOneOf, isRecord } from '../types/utils';

type Env = Record<string, string | undefined>;

export interface ConfigCommandOptions {
  configFile?: string;
  mode?: string;
  conflictStrategy?: string;
  dateSource?: string;
  dateFormat?: string;
  customFormat?: string;
  subdirs?: boolean;
  dryRun?: boolean;
  backupDir?: string;
  categoriesDir?: string;
  verbose?: boolean;
}

export interface OrganizeCommandOptions extends ConfigCommandOptions {
  destination?: string;
  force?: boolean;
  from?: string;
  to?: string;
  report?: string;
}

export interface InfoCommandOptions extends ConfigCommandOptions {
  showCategories?: boolean;
  showStats?: boolean;
  showFormats?: boolean;
}

function pickOption<T extends string>(
  values: readonly T[],
  value: string | undefined,
  flag: string
): T | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isOneOf(values, value)) {
    throw new ConfigurationError(`Invalid value for ${flag}: "${value}". Expected one of: ${values.join(', ')}`, {
      flag,
      value,
    });
  }
  return value;
}

/**
 * Configuration file (or environment) first, then command line flags on top
 */
export async function resolveConfig(options: ConfigCommandOptions, env: Env = process.env): Promise<OrganizerConfig> {
  const base = options.configFile
    ? await OrganizerConfigManager.loadFromFile(options.configFile)
    : OrganizerConfigManager.createFromEnv(env);

  return OrganizerConfigManager.mergeWithDefaults(
    {
      mode: pickOption(ORGANIZE_MODES, options.mode, '--mode'),
      conflictStrategy: pickOption(CONFLICT_STRATEGIES, options.conflictStrategy, '--conflict-strategy'),
      dateSource: pickOption(DATE_SOURCES, options.dateSource, '--date-source'),
      dateFormat: pickOption(DATE_FORMATS, options.dateFormat, '--date-format'),
      customDateFormat: options.customFormat,
      // commander reports subdirs as true whenever --no-subdirs is absent
      createSubdirs: options.subdirs === false ? false : undefined,
      dryRun: options.dryRun,
      backupDirectory: options.backupDir,
      categoriesDirectory: options.categoriesDir,
      logLevel: options.verbose ? 'DEBUG' : parseLogLevel(env.LOG_LEVEL, base.logLevel),
    },
    base
  );
}

/**
 * YYYY-MM-DD in local time; an upper bound covers the whole day
 */
export function parseDateBound(value: string, endOfDay: boolean): Date {
  const match = /^(\d{4})-(\d{1,2})-(\d{1,2})$/.exec(value.trim());
  const date = match
    ? endOfDay
      ? makeLocalDate(Number(match[1]), Number(match[2]), Number(match[3]), 23, 59, 59)
      : makeLocalDate(Number(match[1]), Number(match[2]), Number(match[3]))
    : undefined;

  if (!date) {
    throw new ConfigurationError(`Invalid date "${value}". Use YYYY-MM-DD`, { value });
  }
  if (endOfDay) {
    date.setMilliseconds(999);
  }
  return date;
}

export function parseDateRange(from?: string, to?: string): DateRange | undefined {
  if (!from && !to) {
    return undefined;
  }
  const range: DateRange = {
    start: from ? parseDateBound(from, false) : undefined,
    end: to ? parseDateBound(to, true) : undefined,
  };
  if (range.start && range.end && range.start > range.end) {
    throw new ConfigurationError(`Date range start ${from} is after end ${to}`, { from, to });
  }
  return range;
}

/**
 * A batch file is a JSON array of { type, source, destination } or an object with an `operations` array
 */
export function parseBatchOperations(content: string): BatchOperationRequest[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Invalid batch file: ${error instanceof Error ? error.message : String(error)}`);
  }

  const items = isRecord(parsed) ? parsed.operations : parsed;
  if (!Array.isArray(items)) {
    throw new ConfigurationError('Batch file must contain an array of operations');
  }

  return items.map((item: unknown, index: number) => {
    if (
      !isRecord(item) ||
      typeof item.type !== 'string' ||
      typeof item.source !== 'string' ||
      typeof item.destination !== 'string'
    ) {
      throw new ConfigurationError(`Batch operation ${index + 1} needs string type, source and destination`, {
        index,
      });
    }
    return { type: item.type, source: item.source, destination: item.destination };
  });
}

export function parseLimit(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}
