// Organizer configuration management

import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigValidationResult } from '../types';
import { isOneOf, isRecord } from '../types/utils';
import { DEFAULT_ORGANIZER_CONFIG } from './constants';
import { ConfigurationError } from './errors';
import { parseLogLevel } from './logger';
import {
  CONFLICT_STRATEGIES,
  DATE_FORMATS,
  DATE_SOURCES,
  ORGANIZE_MODES,
  OrganizerConfig,
} from './organizer-types';

type Env = Record<string, string | undefined>;

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  return ['true', '1', 'yes', 'on'].includes(value.trim().toLowerCase());
}

export class OrganizerConfigManager {
  /**
   * Create a default organizer configuration
   */
  static createDefault(): OrganizerConfig {
    return { ...DEFAULT_ORGANIZER_CONFIG };
  }

  /**
   * Create organizer configuration from ORGANIZER_* environment variables.
   * Unrecognized values fall back to the defaults.
   */
  static createFromEnv(env: Env = process.env): OrganizerConfig {
    const defaults = OrganizerConfigManager.createDefault();
    const mode = env.ORGANIZER_MODE;
    const conflictStrategy = env.ORGANIZER_CONFLICT_STRATEGY;
    const dateSource = env.ORGANIZER_DATE_SOURCE;
    const dateFormat = env.ORGANIZER_DATE_FORMAT;

    return {
      mode: isOneOf(ORGANIZE_MODES, mode) ? mode : defaults.mode,
      conflictStrategy: isOneOf(CONFLICT_STRATEGIES, conflictStrategy)
        ? conflictStrategy
        : defaults.conflictStrategy,
      dateSource: isOneOf(DATE_SOURCES, dateSource) ? dateSource : defaults.dateSource,
      dateFormat: isOneOf(DATE_FORMATS, dateFormat) ? dateFormat : defaults.dateFormat,
      customDateFormat: env.ORGANIZER_CUSTOM_DATE_FORMAT || undefined,
      createSubdirs: parseBoolean(env.ORGANIZER_CREATE_SUBDIRS, defaults.createSubdirs),
      dryRun: parseBoolean(env.ORGANIZER_DRY_RUN, defaults.dryRun),
      handleUnknownDates: parseBoolean(env.ORGANIZER_HANDLE_UNKNOWN_DATES, defaults.handleUnknownDates),
      backupDirectory: env.ORGANIZER_BACKUP_DIRECTORY || defaults.backupDirectory,
      categoriesDirectory: env.ORGANIZER_CATEGORIES_DIRECTORY || undefined,
      auditDirectory: env.ORGANIZER_AUDIT_DIRECTORY || defaults.auditDirectory,
      enableAuditFile: parseBoolean(env.ORGANIZER_ENABLE_AUDIT_FILE, defaults.enableAuditFile),
      logLevel: parseLogLevel(env.LOG_LEVEL, defaults.logLevel),
    };
  }

  /**
   * Merge user configuration with defaults (or with another base configuration)
   */
  static mergeWithDefaults(
    userConfig: Partial<OrganizerConfig>,
    base: OrganizerConfig = OrganizerConfigManager.createDefault()
  ): OrganizerConfig {
    const merged: OrganizerConfig = { ...base };
    // Explicit undefined in the user config must not erase a default
    for (const [key, value] of Object.entries(userConfig)) {
      if (value !== undefined) {
        Object.assign(merged, { [key]: value });
      }
    }
    return merged;
  }

  static validateConfig(config: OrganizerConfig): ConfigValidationResult {
    const errors: string[] = [];

    if (!isOneOf(ORGANIZE_MODES, config.mode)) {
      errors.push(`Mode must be one of: ${ORGANIZE_MODES.join(', ')}`);
    }

    if (!isOneOf(CONFLICT_STRATEGIES, config.conflictStrategy)) {
      errors.push(`Conflict strategy must be one of: ${CONFLICT_STRATEGIES.join(', ')}`);
    }

    if (!isOneOf(DATE_SOURCES, config.dateSource)) {
      errors.push(`Date source must be one of: ${DATE_SOURCES.join(', ')}`);
    }

    if (!isOneOf(DATE_FORMATS, config.dateFormat)) {
      errors.push(`Date format must be one of: ${DATE_FORMATS.join(', ')}`);
    }

    if (config.dateFormat === 'custom' && !config.customDateFormat?.trim()) {
      errors.push('Custom date format requires a pattern (e.g. "%Y/%m")');
    }

    if (!config.backupDirectory || config.backupDirectory.trim().length === 0) {
      errors.push('Backup directory cannot be empty');
    }

    if (config.enableAuditFile && (!config.auditDirectory || config.auditDirectory.trim().length === 0)) {
      errors.push('Audit directory cannot be empty when audit files are enabled');
    }

    const invalidChars = /[<>"|?*\x00]/;
    if (invalidChars.test(config.backupDirectory)) {
      errors.push('Backup directory contains invalid characters');
    }

    return {
      isValid: errors.length === 0,
      errors,
    };
  }

  /**
   * Resolve relative directories against the working directory
   */
  static sanitizeConfig(config: OrganizerConfig): OrganizerConfig {
    return {
      ...config,
      backupDirectory: path.resolve(config.backupDirectory.trim()),
      auditDirectory: path.resolve(config.auditDirectory.trim()),
      categoriesDirectory: config.categoriesDirectory
        ? path.resolve(config.categoriesDirectory.trim())
        : undefined,
      customDateFormat: config.customDateFormat?.trim() || undefined,
    };
  }

  /**
   * Get configuration summary for display
   */
  static getConfigSummary(config: OrganizerConfig): Record<string, string | boolean> {
    return {
      Mode: config.mode,
      'Conflict Strategy': config.conflictStrategy,
      'Date Source': config.dateSource,
      'Date Format': config.dateFormat === 'custom' ? `custom (${config.customDateFormat ?? ''})` : config.dateFormat,
      'Create Subdirectories': config.createSubdirs,
      'Dry Run': config.dryRun,
      'Unknown Dates Folder': config.handleUnknownDates,
      'Backup Directory': config.backupDirectory,
      'Categories Directory': config.categoriesDirectory ?? 'Built-in categories',
      'Audit File': config.enableAuditFile ? config.auditDirectory : 'Disabled',
    };
  }

  static exportConfig(config: OrganizerConfig): string {
    return JSON.stringify(config, null, 2);
  }

  /**
   * Import configuration from a JSON string, ignoring unknown keys
   */
  static importConfig(configJson: string): OrganizerConfig {
    let parsed: unknown;
    try {
      parsed = JSON.parse(configJson);
    } catch (error) {
      throw new ConfigurationError(
        `Invalid configuration JSON: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }

    if (!isRecord(parsed)) {
      throw new ConfigurationError('Configuration JSON must be an object');
    }

    return OrganizerConfigManager.mergeWithDefaults(OrganizerConfigManager.pickKnownFields(parsed));
  }

  static async loadFromFile(filePath: string): Promise<OrganizerConfig> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      throw new ConfigurationError(
        `Cannot read configuration file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        { filePath }
      );
    }
    return OrganizerConfigManager.importConfig(content);
  }

  private static pickKnownFields(raw: Record<string, unknown>): Partial<OrganizerConfig> {
    const picked: Partial<OrganizerConfig> = {};
    const invalid: string[] = [];

    const str = (key: string): string | undefined => {
      const value = raw[key];
      if (value === undefined) return undefined;
      if (typeof value === 'string') return value;
      invalid.push(key);
      return undefined;
    };
    const bool = (key: string): boolean | undefined => {
      const value = raw[key];
      if (value === undefined) return undefined;
      if (typeof value === 'boolean') return value;
      invalid.push(key);
      return undefined;
    };

    const mode = str('mode');
    if (mode !== undefined) {
      if (isOneOf(ORGANIZE_MODES, mode)) picked.mode = mode;
      else invalid.push('mode');
    }
    const conflictStrategy = str('conflictStrategy');
    if (conflictStrategy !== undefined) {
      if (isOneOf(CONFLICT_STRATEGIES, conflictStrategy)) picked.conflictStrategy = conflictStrategy;
      else invalid.push('conflictStrategy');
    }
    const dateSource = str('dateSource');
    if (dateSource !== undefined) {
      if (isOneOf(DATE_SOURCES, dateSource)) picked.dateSource = dateSource;
      else invalid.push('dateSource');
    }
    const dateFormat = str('dateFormat');
    if (dateFormat !== undefined) {
      if (isOneOf(DATE_FORMATS, dateFormat)) picked.dateFormat = dateFormat;
      else invalid.push('dateFormat');
    }
    const logLevel = str('logLevel');
    if (logLevel !== undefined) {
      picked.logLevel = parseLogLevel(logLevel);
    }

    picked.customDateFormat = str('customDateFormat');
    picked.backupDirectory = str('backupDirectory');
    picked.categoriesDirectory = str('categoriesDirectory');
    picked.auditDirectory = str('auditDirectory');
    picked.createSubdirs = bool('createSubdirs');
    picked.dryRun = bool('dryRun');
    picked.handleUnknownDates = bool('handleUnknownDates');
    picked.enableAuditFile = bool('enableAuditFile');

    if (invalid.length > 0) {
      throw new ConfigurationError(`Invalid configuration values for: ${invalid.join(', ')}`, { fields: invalid });
    }

    return picked;
  }
}
