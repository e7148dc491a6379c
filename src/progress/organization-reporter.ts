import { Logger } from '../types';
import { OrganizationReport, PreviewReport } from '../core/organizer-types';
import { errorMessage } from '../types/utils';
import * as fs from 'fs/promises';
import * as path from 'path';

export type ReportFormat = 'text' | 'markdown' | 'json';

const MAX_LISTED_ERRORS = 5;
const RULE = '═'.repeat(60);
const THIN_RULE = '─'.repeat(60);

export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB'];
  let size = bytes;
  let unitIndex = 0;

  while (size >= 1024 && unitIndex < units.length - 1) {
    size /= 1024;
    unitIndex++;
  }

  return `${size.toFixed(1)} ${units[unitIndex]}`;
}

export function formatDuration(milliseconds: number): string {
  const seconds = Math.floor(milliseconds / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);

  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  } else if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  } else {
    return `${seconds}s`;
  }
}

/**
 * Renders organization reports for the console and writes them to disk
 */
export class OrganizationReporter {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  public generateTextReport(report: OrganizationReport): string {
    const lines: string[] = ['File Organization Report', RULE];

    if (report.dryRun) {
      lines.push('[DRY RUN] No files were changed');
    }

    lines.push(
      `Session: ${report.sessionId}`,
      `Operation: ${report.operation}`,
      `Source: ${report.sourceDirectory || '-'}`,
      `Destination: ${report.destinationDirectory || '-'}`,
      `Duration: ${formatDuration(report.durationMs)}`,
      THIN_RULE,
      `Total files: ${report.totalFiles}`,
      `Processed: ${report.processedFiles}`,
      `Skipped: ${report.skippedFiles}`,
      `Errors: ${report.errorFiles}`,
      `Folders created: ${report.foldersCreated}`,
      `Conflicts resolved: ${report.conflictsResolved}`,
      `Data processed: ${formatBytes(report.totalBytes)}`,
      `Success rate: ${report.successRate.toFixed(1)}%`
    );

    if (report.cancelled) {
      lines.push('Cancelled before completion');
    }

    const groups = Object.entries(report.groups);
    if (groups.length > 0) {
      lines.push('', 'Groups:');
      for (const [name, summary] of groups) {
        lines.push(`  ${name}: ${summary.count} files (${formatBytes(summary.totalBytes)})`);
      }
    }

    if (report.errors.length > 0) {
      const shown = report.errors.slice(0, MAX_LISTED_ERRORS);
      lines.push('', `Errors (showing ${shown.length} of ${report.errors.length}):`);
      for (const failure of shown) {
        lines.push(`  ${failure.file}: ${failure.message}`);
      }
    }

    return lines.join('\n');
  }

  public generateMarkdownReport(report: OrganizationReport): string {
    let markdown = '# File Organization Report\n\n';
    if (report.dryRun) {
      markdown += '> Dry run: no files were changed\n\n';
    }
    markdown += `**Session ID:** ${report.sessionId}\n`;
    markdown += `**Operation:** ${report.operation}\n`;
    markdown += `**Duration:** ${formatDuration(report.durationMs)}\n\n`;

    markdown += '## Results\n\n';
    markdown += '| Metric | Value |\n|--------|-------|\n';
    markdown += `| Total Files | ${report.totalFiles} |\n`;
    markdown += `| Processed | ${report.processedFiles} |\n`;
    markdown += `| Skipped | ${report.skippedFiles} |\n`;
    markdown += `| Errors | ${report.errorFiles} |\n`;
    markdown += `| Folders Created | ${report.foldersCreated} |\n`;
    markdown += `| Conflicts Resolved | ${report.conflictsResolved} |\n`;
    markdown += `| Data Processed | ${formatBytes(report.totalBytes)} |\n`;
    markdown += `| Success Rate | ${report.successRate.toFixed(1)}% |\n\n`;

    const groups = Object.entries(report.groups);
    if (groups.length > 0) {
      markdown += '## Groups\n\n';
      for (const [name, summary] of groups) {
        markdown += `- **${name}**: ${summary.count} files (${formatBytes(summary.totalBytes)})\n`;
      }
      markdown += '\n';
    }

    if (report.errors.length > 0) {
      markdown += '## Errors\n\n';
      for (const failure of report.errors) {
        markdown += `- \`${failure.file}\`: ${failure.message}\n`;
      }
      markdown += '\n';
    }

    if (report.skipped.length > 0) {
      markdown += '## Skipped\n\n';
      for (const skipped of report.skipped) {
        markdown += `- \`${skipped.file}\`: ${skipped.message}\n`;
      }
    }

    return markdown;
  }

  public generatePreviewText(preview: PreviewReport, limit = 20): string {
    const lines: string[] = [
      'Organization Preview',
      RULE,
      `Source: ${preview.sourceDirectory}`,
      `Mode: ${preview.mode}`,
      `Total files: ${preview.totalFiles}`,
      `Folders: ${preview.estimatedFolders}`,
      THIN_RULE,
    ];

    for (const [name, summary] of Object.entries(preview.groups)) {
      lines.push(`${name}: ${summary.count} files (${formatBytes(summary.totalBytes)})`);
    }

    if (preview.fileMapping.length > 0 && limit > 0) {
      lines.push('', 'Files:');
      for (const { file, group } of preview.fileMapping.slice(0, limit)) {
        lines.push(`  ${path.basename(file)} -> ${group}`);
      }
      if (preview.fileMapping.length > limit) {
        lines.push(`  ... and ${preview.fileMapping.length - limit} more`);
      }
    }

    return lines.join('\n');
  }

  /**
   * Write a report to disk; the format follows the file extension unless given
   */
  public async saveReport(report: OrganizationReport, filePath: string, format?: ReportFormat): Promise<string> {
    const resolvedFormat = format ?? formatForExtension(path.extname(filePath));
    const content = resolvedFormat === 'json'
      ? JSON.stringify(report, null, 2)
      : resolvedFormat === 'markdown'
        ? this.generateMarkdownReport(report)
        : this.generateTextReport(report);

    try {
      await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
      await fs.writeFile(filePath, content, 'utf-8');
    } catch (error) {
      this.logger.error(`Failed to save report to ${filePath}`, { error: errorMessage(error) });
      throw error;
    }

    this.logger.debug(`Report saved to ${filePath}`);
    return filePath;
  }
}

function formatForExtension(extension: string): ReportFormat {
  switch (extension.toLowerCase()) {
    case '.json':
      return 'json';
    case '.md':
      return 'markdown';
    default:
      return 'text';
  }
}
