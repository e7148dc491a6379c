// Main entry point for the file organizer library

export * from './types';
export * from './core';
export * from './progress';

export { PathValidator, PathValidatorOptions, ValidatedOperation } from './services/validation/path-validator';
export { DirectoryManager, pathExists } from './services/local/directory-manager';
export { FileMover } from './services/local/file-mover';
export { RollbackJournal } from './services/local/rollback-journal';
export { PathUtils } from './services/local/path-utils';
export * from './services/local/types';
export { CategoryClassifier } from './services/classification/category-classifier';
export {
  CategoryTable,
  createDefaultCategoryTable,
  loadCategoryTable,
  saveCustomCategories,
} from './services/classification/category-table';
export { DateExtractor, DateExtractorOptions, isInRange } from './services/dates/date-extractor';
export { formatDateFolder, strftime } from './services/dates/date-formatter';
export { extractDateFromFilename } from './services/dates/filename-patterns';
export { ConflictResolver, ConflictResolverOptions } from './services/conflicts/conflict-resolver';
export { ConflictInfo, hashFile } from './services/conflicts/conflict-info';
