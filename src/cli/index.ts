#!/usr/bin/env node

// CLI entry point
import { Command } from 'commander';
import * as readline from 'readline';
import * as fs from 'fs/promises';
import * as path from 'path';
import { createOrganizer, Organizer } from '../core/organizer-factory';
import { EnhancedLogger } from '../core/logger';
import { getConfigurationSummary, loadEnvironmentConfig } from '../core/environment-config';
import { OrganizerConfigManager } from '../core/config-manager';
import {
  CONFLICT_STRATEGIES,
  DATE_FORMATS,
  DATE_SOURCES,
  OrganizationReport,
  ORGANIZE_MODES,
  PreviewReport,
  SafetyReport,
} from '../core/organizer-types';
import { OrganizationReporter, formatBytes } from '../progress/organization-reporter';
import { PathValidator } from '../services/validation/path-validator';
import { ProgressInfo } from '../types';
import { errorMessage } from '../types/utils';
import { DateExtractor } from '../services/dates/date-extractor';
import {
  ConfigCommandOptions,
  InfoCommandOptions,
  OrganizeCommandOptions,
  parseBatchOperations,
  parseDateRange,
  parseLimit,
  resolveConfig,
} from './options';

const program = new Command();

program
  .name('file-organizer')
  .description('Sort files into category or date folders, safely')
  .version('1.0.0');

// Helper function to create readline interface and prompt user for input
function promptUser(question: string): Promise<string> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
    });

    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

async function confirm(question: string): Promise<boolean> {
  const answer = (await promptUser(`${question} (y/N): `)).toLowerCase();
  return answer === 'y' || answer === 'yes';
}

async function buildOrganizer(options: ConfigCommandOptions): Promise<Organizer> {
  const config = await resolveConfig(options);
  const environment = loadEnvironmentConfig();
  const logger = new EnhancedLogger({
    level: config.logLevel,
    enableFileLogging: environment.logging.enableFileLogging,
    logDirectory: environment.logging.filePath,
    component: 'CLI',
  });
  return createOrganizer(config, { logger });
}

function renderProgress(progress: ProgressInfo): void {
  const percent = Math.round(progress.fraction * 100);
  const name = path.basename(progress.file);
  process.stdout.write(`\r⏳ ${percent}% (${progress.current}/${progress.total}) ${name}`.padEnd(80).slice(0, 80));
  if (progress.current === progress.total) {
    process.stdout.write('\n');
  }
}

function printSafetyReport(report: SafetyReport): void {
  console.log('🛡️  Safety Report');
  console.log('═'.repeat(60));
  console.log(`Directory: ${report.directory}`);
  console.log(`Total files: ${report.totalFiles}`);
  console.log(`Accessible: ${report.accessibleFiles}`);
  console.log(`Locked: ${report.lockedFiles}`);
  console.log(`Hidden: ${report.hiddenFiles}`);
  console.log(`System: ${report.systemFiles}`);
  if (report.largeFiles.length > 0) {
    console.log(`\n📦 Large files (${report.largeFiles.length}):`);
    report.largeFiles.slice(0, 10).forEach((file) => console.log(`   ${file.path} (${file.sizeMb} MB)`));
  }
  if (report.warnings.length > 0) {
    console.log(`\n⚠️  Warnings (${report.warnings.length + report.suppressedWarnings}):`);
    report.warnings.slice(0, 10).forEach((warning) => console.log(`   • ${warning}`));
  }
}

function printReport(report: OrganizationReport, reporter: OrganizationReporter): void {
  console.log('');
  console.log(reporter.generateTextReport(report));
  if (report.errorFiles === 0 && !report.cancelled) {
    console.log(report.dryRun ? '\n✅ Dry run complete' : '\n🎉 Organization complete');
  }
}

function fail(prefix: string, error: unknown): never {
  console.error(`❌ ${prefix}:`, errorMessage(error));
  process.exit(1);
}

program
  .command('organize')
  .description('Organize files by type or date')
  .argument('<source>', 'Directory to organize')
  .option('-d, --destination <directory>', 'Destination directory (defaults to the source)')
  .option('-m, --mode <mode>', `Organization mode (${ORGANIZE_MODES.join(', ')})`)
  .option('-n, --dry-run', 'Show what would happen without changing anything')
  .option('--conflict-strategy <strategy>', 'How to handle existing destination files')
  .option('--date-source <source>', 'Which date to group by')
  .option('--date-format <format>', 'Date folder format')
  .option('--custom-format <pattern>', 'strftime-style pattern for the custom date format')
  .option('--from <date>', 'Only organize files dated on or after YYYY-MM-DD')
  .option('--to <date>', 'Only organize files dated on or before YYYY-MM-DD')
  .option('--no-subdirs', 'Do not create category subfolders')
  .option('--backup-dir <directory>', 'Where the backup strategy keeps replaced files')
  .option('--categories-dir <directory>', 'Directory holding category JSON files')
  .option('--report <file>', 'Also save the report (.json, .md or .txt)')
  .option('-f, --force', 'Skip safety confirmation')
  .option('-v, --verbose', 'Verbose logging')
  .option('-c, --config-file <file>', 'Load configuration from a JSON file')
  .action(async (source: string, options: OrganizeCommandOptions) => {
    try {
      const organizer = await buildOrganizer(options);
      const { engine, validator, config } = organizer;
      const reporter = new OrganizationReporter(organizer.logger);
      const dateRange = parseDateRange(options.from, options.to);

      console.log(`📁 Organizing ${path.resolve(source)} by ${config.mode}${config.dryRun ? ' (dry run)' : ''}`);

      if (!options.force) {
        const safety = await validator.scanDirectorySafety(source);
        if (!PathValidator.isSafeReport(safety) || safety.warnings.length > 0) {
          printSafetyReport(safety);
          if (!(await confirm('\nContinue anyway?'))) {
            console.log('Cancelled.');
            return;
          }
        }
        if (!config.dryRun && !(await confirm(`Move ${safety.totalFiles} files now?`))) {
          console.log('Cancelled.');
          return;
        }
      }

      let interrupted = false;
      const onInterrupt = (): void => {
        interrupted = true;
        console.log('\n⚠️  Stopping after the current file...');
      };
      process.once('SIGINT', onInterrupt);

      const runOptions = {
        sourceDir: source,
        destinationDir: options.destination,
        dryRun: config.dryRun,
        onProgress: renderProgress,
        shouldCancel: () => interrupted,
      };

      let report: OrganizationReport;
      try {
        report = config.mode === 'type'
          ? await engine.organizeByType({ ...runOptions, createSubdirs: config.createSubdirs })
          : await engine.organizeByDate({
              ...runOptions,
              dateFormat: config.dateFormat,
              dateSource: config.dateSource,
              customFormat: config.customDateFormat,
              dateRange,
            });
      } finally {
        process.removeListener('SIGINT', onInterrupt);
      }

      printReport(report, reporter);

      if (options.report) {
        await reporter.saveReport(report, options.report);
        console.log(`\n📄 Report saved to ${options.report}`);
      }

      if (report.errorFiles > 0 && report.processedFiles === 0) {
        process.exit(1);
      }
    } catch (error) {
      fail('Organization failed', error);
    }
  });

program
  .command('analyze')
  .description('Analyze a directory without changing anything')
  .argument('<directory>', 'Directory to analyze')
  .option('-m, --mode <mode>', 'type, date or both', 'both')
  .option('--export <file>', 'Write the analysis as JSON')
  .option('-v, --verbose', 'Verbose logging')
  .option('-c, --config-file <file>', 'Load configuration from a JSON file')
  .action(async (directory: string, options: { mode: string; export?: string } & ConfigCommandOptions) => {
    try {
      if (!['type', 'date', 'both'].includes(options.mode)) {
        throw new Error(`Invalid mode "${options.mode}". Expected type, date or both`);
      }
      const { engine, classifier } = await buildOrganizer({ ...options, mode: undefined });
      const analysis: Record<string, unknown> = { directory: path.resolve(directory) };

      if (options.mode !== 'date') {
        const preview = await engine.getOrganizationPreview(directory, 'type');
        if (!preview.success) {
          throw new Error(preview.error);
        }
        analysis.type = preview.data;
        const groups = new Map<string, string[]>();
        for (const { file, group } of preview.data.fileMapping) {
          groups.set(group, [...(groups.get(group) ?? []), file]);
        }
        analysis.categoryStats = await classifier.getCategoryStats(groups);

        console.log('📊 By type');
        console.log('─'.repeat(60));
        for (const [name, summary] of Object.entries(preview.data.groups)) {
          console.log(`   ${name}: ${summary.count} files (${formatBytes(summary.totalBytes)})`);
        }
      }

      if (options.mode !== 'type') {
        const distribution = await engine.analyzeDateDistribution(directory);
        const suggestion = DateExtractor.suggestFormatFor(distribution);
        analysis.dates = distribution;
        analysis.suggestedDateFormat = suggestion;

        console.log('\n📅 By date');
        console.log('─'.repeat(60));
        console.log(`   Files with dates: ${distribution.filesWithDate}/${distribution.totalFiles}`);
        if (distribution.earliest && distribution.latest) {
          console.log(`   Range: ${distribution.earliest.toLocaleDateString()} - ${distribution.latest.toLocaleDateString()}`);
        }
        Object.entries(distribution.bySource).forEach(([source, count]) => console.log(`   ${source}: ${count}`));
        console.log(`   Suggested format: ${suggestion}`);
      }

      if (options.export) {
        await fs.writeFile(options.export, JSON.stringify(analysis, null, 2), 'utf-8');
        console.log(`\n📄 Analysis exported to ${options.export}`);
      }
    } catch (error) {
      fail('Analysis failed', error);
    }
  });

program
  .command('preview')
  .description('Show the folders an organize run would create')
  .argument('<directory>', 'Directory to preview')
  .option('-m, --mode <mode>', `Organization mode (${ORGANIZE_MODES.join(', ')})`)
  .option('--date-source <source>', 'Which date to group by')
  .option('--date-format <format>', 'Date folder format')
  .option('--custom-format <pattern>', 'strftime-style pattern for the custom date format')
  .option('--limit <number>', 'Show at most N files', '20')
  .option('-c, --config-file <file>', 'Load configuration from a JSON file')
  .action(async (directory: string, options: { limit?: string } & ConfigCommandOptions) => {
    try {
      const { engine, config, logger } = await buildOrganizer(options);
      const result = await engine.getOrganizationPreview(directory, config.mode);
      if (!result.success) {
        throw new Error(result.error);
      }
      const preview: PreviewReport = result.data;
      console.log(new OrganizationReporter(logger).generatePreviewText(preview, parseLimit(options.limit, 20)));
    } catch (error) {
      fail('Preview failed', error);
    }
  });

program
  .command('safety')
  .description('Check a directory for locked, hidden, system and large files')
  .argument('<directory>', 'Directory to check')
  .action(async (directory: string) => {
    try {
      const { validator } = await buildOrganizer({});
      const report = await validator.scanDirectorySafety(directory);
      printSafetyReport(report);
      const safe = PathValidator.isSafeReport(report);
      console.log(safe ? '\n✅ Safe to organize' : '\n❌ Too many locked or system files to organize safely');
      if (!safe) {
        process.exit(1);
      }
    } catch (error) {
      fail('Safety check failed', error);
    }
  });

program
  .command('batch')
  .description('Run move/copy operations listed in a JSON file')
  .argument('<operations>', 'JSON file with [{ "type": "move" | "copy", "source", "destination" }]')
  .option('-n, --dry-run', 'Show what would happen without changing anything')
  .option('--conflict-strategy <strategy>', 'How to handle existing destination files')
  .option('-c, --config-file <file>', 'Load configuration from a JSON file')
  .action(async (operationsFile: string, options: ConfigCommandOptions) => {
    try {
      const operations = parseBatchOperations(await fs.readFile(operationsFile, 'utf-8'));
      const organizer = await buildOrganizer(options);
      const report = await organizer.engine.batchOperation(operations, {
        dryRun: organizer.config.dryRun,
        onProgress: renderProgress,
      });
      printReport(report, new OrganizationReporter(organizer.logger));
      if (report.errorFiles > 0) {
        process.exit(1);
      }
    } catch (error) {
      fail('Batch failed', error);
    }
  });

program
  .command('info')
  .description('Show configuration, categories and supported formats')
  .option('--show-categories', 'List categories and their extensions')
  .option('--show-stats', 'Show category table statistics')
  .option('--show-formats', 'List date formats, date sources and conflict strategies')
  .option('-c, --config-file <file>', 'Load configuration from a JSON file')
  .action(async (options: InfoCommandOptions) => {
    try {
      const { classifier, config } = await buildOrganizer(options);
      const environment = loadEnvironmentConfig();
      const showAll = !options.showCategories && !options.showStats && !options.showFormats;

      console.log('⚙️  Configuration');
      console.log('═'.repeat(60));
      for (const [key, value] of Object.entries(OrganizerConfigManager.getConfigSummary(config))) {
        console.log(`   ${key}: ${String(value)}`);
      }
      const logging = getConfigurationSummary(environment).Logging;
      console.log(`   Logging: ${JSON.stringify(logging)}`);

      const categories = classifier.getCategories();

      if (showAll || options.showCategories) {
        console.log('\n🗂️  Categories');
        console.log('─'.repeat(60));
        for (const [category, extensions] of categories) {
          console.log(`   ${category}: ${extensions.join(' ')}`);
        }
      }

      if (showAll || options.showStats) {
        const extensionCounts = [...categories.values()].map((extensions) => extensions.length);
        console.log('\n📈 Statistics');
        console.log('─'.repeat(60));
        console.log(`   Categories: ${categories.size}`);
        console.log(`   Extensions supported: ${classifier.getSupportedExtensions().length}`);
        console.log(`   Largest category: ${Math.max(0, ...extensionCounts)} extensions`);
      }

      if (showAll || options.showFormats) {
        console.log('\n📅 Formats');
        console.log('─'.repeat(60));
        console.log(`   Date formats: ${DATE_FORMATS.join(', ')}`);
        console.log(`   Date sources: ${DATE_SOURCES.join(', ')}`);
        console.log(`   Conflict strategies: ${CONFLICT_STRATEGIES.join(', ')}`);
      }
    } catch (error) {
      fail('Cannot show info', error);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => fail('Unexpected error', error));

