import { OrganizerConfigManager } from '../../core/config-manager';
import { ConfigurationError } from '../../core/errors';
import { OrganizerConfig } from '../../core/organizer-types';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';

describe('OrganizerConfigManager', () => {
  describe('createDefault', () => {
    it('should create the default configuration', () => {
      expect(OrganizerConfigManager.createDefault()).toEqual({
        mode: 'type',
        conflictStrategy: 'rename',
        dateSource: 'auto',
        dateFormat: 'YYYY-MM-DD',
        createSubdirs: true,
        dryRun: false,
        handleUnknownDates: true,
        backupDirectory: './backup',
        auditDirectory: './audit',
        enableAuditFile: false,
        logLevel: 'INFO',
      });
    });

    it('should return a fresh object each time', () => {
      const first = OrganizerConfigManager.createDefault();
      first.dryRun = true;

      expect(OrganizerConfigManager.createDefault().dryRun).toBe(false);
    });
  });

  describe('createFromEnv', () => {
    it('should read ORGANIZER_* variables', () => {
      const config = OrganizerConfigManager.createFromEnv({
        ORGANIZER_MODE: 'date',
        ORGANIZER_CONFLICT_STRATEGY: 'hash-compare',
        ORGANIZER_DATE_SOURCE: 'modification',
        ORGANIZER_DATE_FORMAT: 'custom',
        ORGANIZER_CUSTOM_DATE_FORMAT: '%Y/%m',
        ORGANIZER_CREATE_SUBDIRS: 'no',
        ORGANIZER_DRY_RUN: 'yes',
        ORGANIZER_BACKUP_DIRECTORY: '/tmp/backups',
        LOG_LEVEL: 'debug',
      });

      expect(config).toMatchObject({
        mode: 'date',
        conflictStrategy: 'hash-compare',
        dateSource: 'modification',
        dateFormat: 'custom',
        customDateFormat: '%Y/%m',
        createSubdirs: false,
        dryRun: true,
        handleUnknownDates: true,
        backupDirectory: '/tmp/backups',
        logLevel: 'DEBUG',
      });
    });

    it('should fall back to defaults for unrecognized values', () => {
      const config = OrganizerConfigManager.createFromEnv({
        ORGANIZER_MODE: 'size',
        ORGANIZER_CONFLICT_STRATEGY: 'merge',
        LOG_LEVEL: 'loud',
      });

      expect(config.mode).toBe('type');
      expect(config.conflictStrategy).toBe('rename');
      expect(config.logLevel).toBe('INFO');
    });
  });

  describe('mergeWithDefaults', () => {
    it('should apply user values over defaults', () => {
      const merged = OrganizerConfigManager.mergeWithDefaults({ mode: 'date', dryRun: true });

      expect(merged.mode).toBe('date');
      expect(merged.dryRun).toBe(true);
      expect(merged.conflictStrategy).toBe('rename');
    });

    it('should ignore explicit undefined values', () => {
      const base: OrganizerConfig = { ...OrganizerConfigManager.createDefault(), backupDirectory: '/srv/backup' };

      const merged = OrganizerConfigManager.mergeWithDefaults({ backupDirectory: undefined }, base);

      expect(merged.backupDirectory).toBe('/srv/backup');
    });
  });

  describe('validateConfig', () => {
    it('should accept the defaults', () => {
      expect(OrganizerConfigManager.validateConfig(OrganizerConfigManager.createDefault())).toEqual({
        isValid: true,
        errors: [],
      });
    });

    it('should require a pattern for custom date formats', () => {
      const config: OrganizerConfig = { ...OrganizerConfigManager.createDefault(), dateFormat: 'custom' };

      expect(OrganizerConfigManager.validateConfig(config).errors).toEqual([
        'Custom date format requires a pattern (e.g. "%Y/%m")',
      ]);
    });

    it('should reject empty and invalid directories', () => {
      const config: OrganizerConfig = {
        ...OrganizerConfigManager.createDefault(),
        backupDirectory: 'bad|dir',
        auditDirectory: ' ',
        enableAuditFile: true,
      };

      expect(OrganizerConfigManager.validateConfig(config).errors).toEqual([
        'Audit directory cannot be empty when audit files are enabled',
        'Backup directory contains invalid characters',
      ]);
    });
  });

  describe('sanitizeConfig', () => {
    it('should resolve directories and trim the custom pattern', () => {
      const sanitized = OrganizerConfigManager.sanitizeConfig({
        ...OrganizerConfigManager.createDefault(),
        backupDirectory: ' backup ',
        categoriesDirectory: 'config',
        customDateFormat: '  ',
      });

      expect(sanitized.backupDirectory).toBe(path.resolve('backup'));
      expect(sanitized.auditDirectory).toBe(path.resolve('audit'));
      expect(sanitized.categoriesDirectory).toBe(path.resolve('config'));
      expect(sanitized.customDateFormat).toBeUndefined();
    });
  });

  describe('getConfigSummary', () => {
    it('should describe the configuration for display', () => {
      const summary = OrganizerConfigManager.getConfigSummary({
        ...OrganizerConfigManager.createDefault(),
        dateFormat: 'custom',
        customDateFormat: '%Y/%m',
      });

      expect(summary['Date Format']).toBe('custom (%Y/%m)');
      expect(summary['Categories Directory']).toBe('Built-in categories');
      expect(summary['Audit File']).toBe('Disabled');
    });
  });

  describe('importConfig', () => {
    it('should read known fields and ignore unknown ones', () => {
      const config = OrganizerConfigManager.importConfig(
        JSON.stringify({ mode: 'date', dateFormat: 'YYYY-MM', dryRun: true, theme: 'dark' })
      );

      expect(config).toEqual({
        ...OrganizerConfigManager.createDefault(),
        mode: 'date',
        dateFormat: 'YYYY-MM',
        dryRun: true,
      });
    });

    it('should round-trip an exported configuration', () => {
      const original: OrganizerConfig = {
        ...OrganizerConfigManager.createDefault(),
        conflictStrategy: 'backup',
        categoriesDirectory: '/etc/organizer',
      };

      expect(OrganizerConfigManager.importConfig(OrganizerConfigManager.exportConfig(original))).toEqual(original);
    });

    it('should reject invalid JSON and non-objects', () => {
      expect(() => OrganizerConfigManager.importConfig('{')).toThrow(ConfigurationError);
      expect(() => OrganizerConfigManager.importConfig('[1]')).toThrow('Configuration JSON must be an object');
    });

    it('should name every invalid field', () => {
      expect(() =>
        OrganizerConfigManager.importConfig(JSON.stringify({ mode: 'size', dryRun: 'yes', backupDirectory: 3 }))
      ).toThrow('Invalid configuration values for: mode, backupDirectory, dryRun');
    });
  });

  describe('loadFromFile', () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'organizer-config-'));
    });

    afterEach(async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('should load a configuration file', async () => {
      const filePath = path.join(tempDir, 'organizer.json');
      await fs.writeFile(filePath, JSON.stringify({ conflictStrategy: 'skip' }));

      const config = await OrganizerConfigManager.loadFromFile(filePath);

      expect(config.conflictStrategy).toBe('skip');
    });

    it('should report an unreadable file', async () => {
      const filePath = path.join(tempDir, 'missing.json');

      await expect(OrganizerConfigManager.loadFromFile(filePath)).rejects.toThrow(
        `Cannot read configuration file ${filePath}:`
      );
    });
  });
});
