import { Logger } from '../types';
import { EnhancedLogger } from '../core/logger';
import { errorMessage } from '../types/utils';
import * as fs from 'fs';
import * as path from 'path';

export type AuditStatus = 'started' | 'completed' | 'failed' | 'skipped';

export interface AuditEvent {
  eventId: string;
  timestamp: string;
  sessionId: string;
  eventType: AuditEventType;
  source: string;
  target?: string;
  operation: string;
  status: AuditStatus;
  dryRun: boolean;
  details?: Record<string, unknown>;
  error?: string;
  duration?: number;
}

export type AuditEventType =
  | 'organize_session'
  | 'folder_creation'
  | 'file_move'
  | 'file_copy'
  | 'conflict_resolution'
  | 'validation'
  | 'rollback';

export interface AuditLoggerConfig {
  sessionId: string;
  auditDirectory: string;
  enableFileOutput: boolean;
  enableConsoleOutput: boolean;
  maxEvents?: number;
}

interface EventDetails {
  source?: string;
  target?: string;
  dryRun?: boolean;
  metadata?: Record<string, unknown>;
  error?: unknown;
  duration?: number;
}

/**
 * Record of every action an organize run took (or would take, in dry run).
 * Events are kept in memory and optionally appended to a JSON-lines file.
 */
export class AuditLogger {
  private logger: Logger;
  private config: AuditLoggerConfig;
  private auditFilePath = '';
  private eventCounter = 0;
  private readonly events: AuditEvent[] = [];

  constructor(config: AuditLoggerConfig, logger?: Logger) {
    this.config = { ...config };
    this.logger = logger ?? new EnhancedLogger({
      level: 'INFO',
      enableFileLogging: false,
      enableConsole: config.enableConsoleOutput,
      sessionId: config.sessionId,
      component: 'AUDIT',
    });

    if (config.enableFileOutput) {
      this.initializeAuditFile();
    }
  }

  public get sessionId(): string {
    return this.config.sessionId;
  }

  public logEvent(
    eventType: AuditEventType,
    operation: string,
    status: AuditStatus,
    details: EventDetails = {}
  ): AuditEvent {
    const event: AuditEvent = {
      eventId: this.generateEventId(),
      timestamp: new Date().toISOString(),
      sessionId: this.config.sessionId,
      eventType,
      source: details.source ?? 'organizer',
      target: details.target,
      operation,
      status,
      dryRun: details.dryRun ?? false,
      details: details.metadata,
      error: details.error === undefined ? undefined : errorMessage(details.error),
      duration: details.duration,
    };

    this.remember(event);
    this.writeAuditEvent(event);
    this.logToConsole(event);
    return event;
  }

  public logSession(
    operation: string,
    status: AuditStatus,
    details: {
      sourceDirectory?: string;
      destinationDirectory?: string;
      dryRun?: boolean;
      totalFiles?: number;
      processedFiles?: number;
      skippedFiles?: number;
      errorFiles?: number;
      duration?: number;
      error?: unknown;
    } = {}
  ): void {
    this.logEvent('organize_session', operation, status, {
      source: details.sourceDirectory,
      target: details.destinationDirectory,
      dryRun: details.dryRun,
      metadata: {
        totalFiles: details.totalFiles,
        processedFiles: details.processedFiles,
        skippedFiles: details.skippedFiles,
        errorFiles: details.errorFiles,
      },
      error: details.error,
      duration: details.duration,
    });
  }

  public logFolderCreation(folderPath: string, status: AuditStatus, dryRun: boolean, error?: unknown): void {
    this.logEvent('folder_creation', 'create_folder', status, {
      target: folderPath,
      dryRun,
      error,
    });
  }

  public logFileTransfer(
    operation: 'move' | 'copy',
    sourcePath: string,
    destinationPath: string | undefined,
    status: AuditStatus,
    details: { dryRun: boolean; size?: number; group?: string; reason?: string; error?: unknown; duration?: number }
  ): void {
    this.logEvent(operation === 'move' ? 'file_move' : 'file_copy', operation, status, {
      source: sourcePath,
      target: destinationPath,
      dryRun: details.dryRun,
      metadata: { size: details.size, group: details.group, reason: details.reason },
      error: details.error,
      duration: details.duration,
    });
  }

  public logConflictResolution(
    sourcePath: string,
    destinationPath: string,
    strategy: string,
    status: AuditStatus,
    details: { resolvedPath?: string; reason?: string; dryRun: boolean }
  ): void {
    this.logEvent('conflict_resolution', strategy, status, {
      source: sourcePath,
      target: details.resolvedPath ?? destinationPath,
      dryRun: details.dryRun,
      metadata: { destinationPath, reason: details.reason },
    });
  }

  public logValidation(targetPath: string, check: string, status: AuditStatus, error?: unknown): void {
    this.logEvent('validation', check, status, { source: targetPath, error });
  }

  public logRollback(status: AuditStatus, details: { restored?: number; failed?: number; dryRun: boolean }): void {
    this.logEvent('rollback', 'rollback', status, {
      dryRun: details.dryRun,
      metadata: { restored: details.restored, failed: details.failed },
    });
  }

  public getAuditFilePath(): string | undefined {
    return this.auditFilePath || undefined;
  }

  public getAuditEvents(eventType?: AuditEventType, status?: AuditStatus): AuditEvent[] {
    return this.events.filter(
      (event) => (!eventType || event.eventType === eventType) && (!status || event.status === status)
    );
  }

  public clearEvents(): void {
    this.events.length = 0;
  }

  private remember(event: AuditEvent): void {
    this.events.push(event);
    const maxEvents = this.config.maxEvents ?? 10000;
    if (this.events.length > maxEvents) {
      this.events.shift();
    }
  }

  private initializeAuditFile(): void {
    try {
      if (!fs.existsSync(this.config.auditDirectory)) {
        fs.mkdirSync(this.config.auditDirectory, { recursive: true });
      }

      const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
      this.auditFilePath = path.join(
        this.config.auditDirectory,
        `audit-${this.config.sessionId}-${timestamp}.jsonl`
      );
    } catch (error) {
      this.logger.error('Failed to initialize audit file', { error: errorMessage(error) });
      this.config.enableFileOutput = false;
    }
  }

  private writeAuditEvent(event: AuditEvent): void {
    if (!this.config.enableFileOutput || !this.auditFilePath) {
      return;
    }

    try {
      fs.appendFileSync(this.auditFilePath, JSON.stringify(event) + '\n');
    } catch (error) {
      this.logger.error('Failed to write audit event', { error: errorMessage(error) });
    }
  }

  private logToConsole(event: AuditEvent): void {
    if (!this.config.enableConsoleOutput) {
      return;
    }

    const prefix = event.dryRun ? '[dry run] ' : '';
    const message = `${prefix}${event.eventType.toUpperCase()}: ${event.operation} - ${event.status}`;
    const meta = {
      eventId: event.eventId,
      source: event.source,
      target: event.target,
      duration: event.duration,
      error: event.error,
    };

    switch (event.status) {
      case 'failed':
        this.logger.error(message, meta);
        break;
      case 'skipped':
        this.logger.info(message, meta);
        break;
      case 'started':
        this.logger.debug(message, meta);
        break;
      case 'completed':
        this.logger.debug(message, meta);
        break;
    }
  }

  private generateEventId(): string {
    this.eventCounter++;
    const timestamp = Date.now().toString(36);
    const counter = this.eventCounter.toString(36).padStart(3, '0');
    return `${this.config.sessionId.substring(0, 8)}-${timestamp}-${counter}`;
  }
}
