// Environment configuration loader and validator

import { ConfigValidationResult, LogLevel } from '../types';
import { OrganizerConfigManager } from './config-manager';
import { parseLogLevel } from './logger';
import { OrganizerConfig } from './organizer-types';

type Env = Record<string, string | undefined>;

export interface LoggingConfig {
  level: LogLevel;
  enableFileLogging: boolean;
  filePath: string;
}

export interface EnvironmentConfig {
  organizer: OrganizerConfig;
  logging: LoggingConfig;
}

export interface EnvironmentConfigValidationResult extends ConfigValidationResult {
  warnings: string[];
}

/**
 * Load complete configuration from environment variables
 */
export function loadEnvironmentConfig(env: Env = process.env): EnvironmentConfig {
  return {
    organizer: OrganizerConfigManager.createFromEnv(env),
    logging: {
      level: parseLogLevel(env.LOG_LEVEL),
      enableFileLogging: env.LOG_TO_FILE === 'true',
      filePath: env.LOG_FILE_PATH || './logs',
    },
  };
}

export function validateEnvironmentConfig(
  config: EnvironmentConfig = loadEnvironmentConfig(),
  env: Env = process.env
): EnvironmentConfigValidationResult {
  const { errors } = OrganizerConfigManager.validateConfig(config.organizer);
  const warnings: string[] = [];

  if (env.LOG_LEVEL && parseLogLevel(env.LOG_LEVEL, 'DEBUG') !== env.LOG_LEVEL.trim().toUpperCase()) {
    warnings.push(`Invalid log level "${env.LOG_LEVEL}", using INFO as default`);
  }

  if (config.organizer.conflictStrategy === 'overwrite') {
    warnings.push('Conflict strategy "overwrite" permanently replaces existing files at the destination');
  }

  if (config.organizer.dateSource === 'access') {
    warnings.push('Access times change whenever files are read; grouping by them is rarely stable');
  }

  return {
    isValid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Create environment configuration with overrides
 */
export function createEnvironmentConfig(
  overrides: {
    organizer?: Partial<OrganizerConfig>;
    logging?: Partial<LoggingConfig>;
  },
  env: Env = process.env
): EnvironmentConfig {
  const baseConfig = loadEnvironmentConfig(env);

  return {
    organizer: OrganizerConfigManager.mergeWithDefaults(overrides.organizer ?? {}, baseConfig.organizer),
    logging: {
      ...baseConfig.logging,
      ...overrides.logging,
    },
  };
}

/**
 * Get configuration summary for display
 */
export function getConfigurationSummary(config: EnvironmentConfig = loadEnvironmentConfig()): Record<string, unknown> {
  return {
    'Organizer Settings': OrganizerConfigManager.getConfigSummary(config.organizer),
    Logging: {
      Level: config.logging.level,
      'File Logging': config.logging.enableFileLogging ? config.logging.filePath : 'Disabled',
    },
  };
}
