// Composition root: builds one organizer with all of its collaborators

import { v4 as uuidv4 } from 'uuid';
import { Logger } from '../types';
import { OrganizerConfig } from './organizer-types';
import { OrganizerConfigManager } from './config-manager';
import { ConfigurationError } from './errors';
import { ErrorHandler } from './error-handler';
import { EnhancedLogger } from './logger';
import { OrganizationEngine } from './organization-engine';
import { PathValidator, PathValidatorOptions } from '../services/validation/path-validator';
import { DirectoryManager } from '../services/local/directory-manager';
import { FileMover } from '../services/local/file-mover';
import { RollbackJournal } from '../services/local/rollback-journal';
import { CategoryClassifier } from '../services/classification/category-classifier';
import { loadCategoryTable } from '../services/classification/category-table';
import { DateExtractor } from '../services/dates/date-extractor';
import { ConflictResolver } from '../services/conflicts/conflict-resolver';
import { AuditLogger } from '../progress/audit-logger';

export interface OrganizerFactoryOptions {
  logger?: Logger;
  sessionId?: string;
  validatorOptions?: PathValidatorOptions;
  now?: () => Date;
}

export interface Organizer {
  config: OrganizerConfig;
  engine: OrganizationEngine;
  logger: Logger;
  validator: PathValidator;
  directoryManager: DirectoryManager;
  classifier: CategoryClassifier;
  dateExtractor: DateExtractor;
  conflictResolver: ConflictResolver;
  fileMover: FileMover;
  rollbackJournal: RollbackJournal;
  auditLogger: AuditLogger;
  errorHandler: ErrorHandler;
}

/**
 * Validate the configuration, load the category table and wire every component.
 * Throws ConfigurationError when the configuration is invalid.
 */
export async function createOrganizer(
  userConfig: Partial<OrganizerConfig> = {},
  options: OrganizerFactoryOptions = {}
): Promise<Organizer> {
  const merged = OrganizerConfigManager.mergeWithDefaults(userConfig);
  const validation = OrganizerConfigManager.validateConfig(merged);
  if (!validation.isValid) {
    throw new ConfigurationError(`Invalid configuration: ${validation.errors.join(', ')}`, {
      errors: validation.errors,
    });
  }
  const config = OrganizerConfigManager.sanitizeConfig(merged);
  const sessionId = options.sessionId ?? uuidv4();

  const logger = options.logger ?? new EnhancedLogger({ level: config.logLevel, sessionId, component: 'ORGANIZER' });
  const loggerFor = (component: string): Logger =>
    logger instanceof EnhancedLogger ? logger.createChildLogger(component) : logger;

  const directoryManager = new DirectoryManager(loggerFor('DIRECTORIES'));
  const fileMover = new FileMover(loggerFor('FILE_MOVER'));
  const validator = new PathValidator(directoryManager, loggerFor('VALIDATOR'), options.validatorOptions);
  const classifierLogger = loggerFor('CLASSIFIER');
  const categories = await loadCategoryTable(config.categoriesDirectory, classifierLogger);
  const classifier = new CategoryClassifier(validator, classifierLogger, categories);
  const dateExtractor = new DateExtractor(loggerFor('DATES'), {
    handleUnknownDates: config.handleUnknownDates,
    now: options.now,
  });
  const conflictResolver = new ConflictResolver(fileMover, loggerFor('CONFLICTS'), {
    backupRoot: config.backupDirectory,
    defaultStrategy: config.conflictStrategy,
    now: options.now,
  });
  const rollbackJournal = new RollbackJournal(fileMover, loggerFor('ROLLBACK'));
  const auditLogger = new AuditLogger(
    {
      sessionId,
      auditDirectory: config.auditDirectory,
      enableFileOutput: config.enableAuditFile,
      enableConsoleOutput: config.logLevel === 'DEBUG',
    },
    loggerFor('AUDIT')
  );
  const errorHandler = new ErrorHandler(loggerFor('ERRORS'));

  const engine = new OrganizationEngine({
    logger: loggerFor('ENGINE'),
    config,
    validator,
    directoryManager,
    classifier,
    dateExtractor,
    conflictResolver,
    fileMover,
    rollbackJournal,
    auditLogger,
    errorHandler,
  });

  return {
    config,
    engine,
    logger,
    validator,
    directoryManager,
    classifier,
    dateExtractor,
    conflictResolver,
    fileMover,
    rollbackJournal,
    auditLogger,
    errorHandler,
  };
}
