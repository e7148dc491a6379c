import {
  createEnvironmentConfig,
  getConfigurationSummary,
  loadEnvironmentConfig,
  validateEnvironmentConfig,
} from '../../core/environment-config';

describe('environment config', () => {
  describe('loadEnvironmentConfig', () => {
    it('should use defaults for an empty environment', () => {
      const config = loadEnvironmentConfig({});

      expect(config.organizer.mode).toBe('type');
      expect(config.logging).toEqual({ level: 'INFO', enableFileLogging: false, filePath: './logs' });
    });

    it('should read logging variables', () => {
      const config = loadEnvironmentConfig({ LOG_LEVEL: 'warn', LOG_TO_FILE: 'true', LOG_FILE_PATH: '/var/log/organizer' });

      expect(config.logging).toEqual({ level: 'WARN', enableFileLogging: true, filePath: '/var/log/organizer' });
    });
  });

  describe('validateEnvironmentConfig', () => {
    it('should warn about an invalid log level', () => {
      const env = { LOG_LEVEL: 'chatty' };

      const result = validateEnvironmentConfig(loadEnvironmentConfig(env), env);

      expect(result.isValid).toBe(true);
      expect(result.warnings).toEqual(['Invalid log level "chatty", using INFO as default']);
    });

    it('should warn about destructive and unstable settings', () => {
      const env = { ORGANIZER_CONFLICT_STRATEGY: 'overwrite', ORGANIZER_DATE_SOURCE: 'access' };

      const result = validateEnvironmentConfig(loadEnvironmentConfig(env), env);

      expect(result.warnings).toEqual([
        'Conflict strategy "overwrite" permanently replaces existing files at the destination',
        'Access times change whenever files are read; grouping by them is rarely stable',
      ]);
    });

    it('should report organizer errors', () => {
      const env = { ORGANIZER_DATE_FORMAT: 'custom' };

      const result = validateEnvironmentConfig(loadEnvironmentConfig(env), env);

      expect(result.isValid).toBe(false);
      expect(result.errors).toEqual(['Custom date format requires a pattern (e.g. "%Y/%m")']);
    });
  });

  describe('createEnvironmentConfig', () => {
    it('should apply overrides on top of the environment', () => {
      const config = createEnvironmentConfig(
        { organizer: { dryRun: true, mode: undefined }, logging: { level: 'ERROR' } },
        { ORGANIZER_MODE: 'date', LOG_FILE_PATH: '/logs' }
      );

      expect(config.organizer.mode).toBe('date');
      expect(config.organizer.dryRun).toBe(true);
      expect(config.logging).toEqual({ level: 'ERROR', enableFileLogging: false, filePath: '/logs' });
    });
  });

  describe('getConfigurationSummary', () => {
    it('should summarize organizer and logging settings', () => {
      const summary = getConfigurationSummary(loadEnvironmentConfig({ LOG_TO_FILE: 'true' }));

      expect(summary.Logging).toEqual({ Level: 'INFO', 'File Logging': './logs' });
      expect(summary['Organizer Settings']).toMatchObject({ Mode: 'type', 'Dry Run': false });
    });
  });
});
