// Content category classification by extension, MIME type and magic bytes

import * as fs from 'fs/promises';
import * as path from 'path';
import * as mime from 'mime-types';
import { Logger } from '../../types';
import { errorMessage } from '../../types/utils';
import { LIMITS, UNCATEGORIZED } from '../../core/constants';
import { ConfigurationError } from '../../core/errors';
import {
  CategoryStats,
  ClassificationMethod,
  ClassificationResult,
  ClassificationStatistics,
} from '../../core/organizer-types';
import { PathUtils } from '../local/path-utils';
import { PathValidator } from '../validation/path-validator';
import { detectMagicCategory } from './magic-signatures';
import {
  CategoryTable,
  createDefaultCategoryTable,
  createMimeCategoryTable,
  normalizeExtension,
  saveCustomCategories,
} from './category-table';

const SUGGESTIONS: ReadonlyArray<{ test: (extension: string) => boolean; category: string }> = [
  { test: (ext) => ['.txt', '.md', '.rst'].includes(ext), category: 'Documents' },
  { test: (ext) => ['.log', '.cfg', '.ini'].includes(ext), category: 'System' },
  { test: (ext) => ext.endsWith('rc') || ['.sh', '.bat', '.ps1'].includes(ext), category: 'Scripts' },
  { test: (ext) => ['.tmp', '.temp', '.bak', '.old'].includes(ext), category: 'Temporary' },
];

function emptyStatistics(): ClassificationStatistics {
  return {
    total: 0,
    categorized: 0,
    uncategorized: 0,
    errors: 0,
    byMethod: { extension: 0, mime: 0, magic: 0, unknown: 0, error: 0 },
  };
}

/**
 * Maps files to content categories. The extension lookup is rebuilt (never mutated)
 * on every table change, so a classifyAll in progress keeps the snapshot it started with.
 */
export class CategoryClassifier {
  private readonly validator: PathValidator;
  private readonly logger: Logger;
  private readonly mimeTable: ReadonlyMap<string, string>;
  private categories: CategoryTable;
  private extensionMap: ReadonlyMap<string, string>;
  private lastRunStatistics: ClassificationStatistics = emptyStatistics();

  constructor(validator: PathValidator, logger: Logger, categories: CategoryTable = createDefaultCategoryTable()) {
    this.validator = validator;
    this.logger = logger;
    this.categories = new Map(Array.from(categories, ([name, extensions]) => [name, extensions.map(normalizeExtension)]));
    this.extensionMap = this.buildExtensionMap(this.categories);
    this.mimeTable = this.buildMimeMap(createMimeCategoryTable());
  }

  async classify(filePath: string): Promise<ClassificationResult> {
    return this.classifyWith(filePath, this.extensionMap);
  }

  /**
   * Group paths by category in first-seen order
   */
  async classifyAll(filePaths: readonly string[]): Promise<Map<string, string[]>> {
    const lookup = this.extensionMap;
    const groups = new Map<string, string[]>();
    const stats = emptyStatistics();

    for (const filePath of filePaths) {
      stats.total++;
      const { category, method } = await this.classifyWith(filePath, lookup);
      stats.byMethod[method]++;

      if (method === 'error') {
        stats.errors++;
      } else if (category === UNCATEGORIZED) {
        stats.uncategorized++;
      } else {
        stats.categorized++;
      }

      const bucket = groups.get(category);
      if (bucket) {
        bucket.push(filePath);
      } else {
        groups.set(category, [filePath]);
      }

      this.logger.debug(`${path.basename(filePath)} -> ${category} (${method})`);
    }

    this.lastRunStatistics = stats;
    this.logger.info(
      `Categorization complete: ${stats.categorized} categorized, ${stats.uncategorized} uncategorized, ${stats.errors} errors`
    );

    return groups;
  }

  getLastRunStatistics(): ClassificationStatistics {
    return { ...this.lastRunStatistics, byMethod: { ...this.lastRunStatistics.byMethod } };
  }

  /**
   * Add or replace a category. Its extensions take precedence over any earlier mapping.
   */
  addCategory(name: string, extensions: readonly string[]): void {
    const trimmed = name.trim();
    if (!trimmed || /[/\\]/.test(trimmed) || trimmed === UNCATEGORIZED) {
      throw new ConfigurationError(`Invalid category name: "${name}"`, { name });
    }
    if (extensions.length === 0) {
      throw new ConfigurationError(`Category "${trimmed}" needs at least one extension`, { name: trimmed });
    }

    // Normalize everything before touching state so a bad extension changes nothing
    const normalized = [...new Set(extensions.map(normalizeExtension))];

    const next = new Map(this.categories);
    next.delete(trimmed);
    next.set(trimmed, normalized);
    this.applyTable(next);

    this.logger.info(`Added category '${trimmed}' with ${normalized.length} extensions`);
  }

  removeCategory(name: string): void {
    if (!this.categories.has(name)) {
      throw new ConfigurationError(`Category '${name}' not found`, { name });
    }

    const next = new Map(this.categories);
    next.delete(name);
    this.applyTable(next);

    this.logger.info(`Removed category '${name}'`);
  }

  getCategories(): Map<string, string[]> {
    return new Map(Array.from(this.categories, ([name, extensions]) => [name, [...extensions]]));
  }

  getSupportedExtensions(): string[] {
    return [...this.extensionMap.keys()].sort();
  }

  getCategoryForExtension(extension: string): string | undefined {
    return this.extensionMap.get(normalizeExtension(extension));
  }

  /**
   * Heuristic category name for an extension the table does not know
   */
  suggestCategory(extension: string): string | undefined {
    const normalized = normalizeExtension(extension);
    return SUGGESTIONS.find((suggestion) => suggestion.test(normalized))?.category;
  }

  async getCategoryStats(groups: ReadonlyMap<string, readonly string[]>): Promise<Record<string, CategoryStats>> {
    let totalFiles = 0;
    for (const files of groups.values()) {
      totalFiles += files.length;
    }

    const stats: Record<string, CategoryStats> = {};
    for (const [category, files] of groups) {
      let totalBytes = 0;
      let accessibleFiles = 0;

      for (const filePath of files) {
        try {
          totalBytes += (await fs.stat(filePath)).size;
          accessibleFiles++;
        } catch (error) {
          this.logger.debug(`Cannot stat ${filePath}: ${errorMessage(error)}`);
        }
      }

      stats[category] = {
        count: files.length,
        percentage: totalFiles > 0 ? Math.round((files.length / totalFiles) * 1000) / 10 : 0,
        totalBytes,
        accessibleFiles,
        inaccessibleFiles: files.length - accessibleFiles,
      };
    }
    return stats;
  }

  async saveCustomCategories(configDirectory: string): Promise<string> {
    const filePath = await saveCustomCategories(configDirectory, this.categories);
    this.logger.debug(`Saved custom categories: ${filePath}`);
    return filePath;
  }

  private async classifyWith(filePath: string, lookup: ReadonlyMap<string, string>): Promise<ClassificationResult> {
    let resolved: string;
    try {
      resolved = await this.validator.validateFilePath(filePath);
    } catch (error) {
      this.logger.error(`Cannot categorize file ${filePath}: ${errorMessage(error)}`);
      return { category: UNCATEGORIZED, method: 'error' };
    }

    const byExtension = this.categoryByExtension(resolved, lookup);
    if (byExtension) {
      return this.result(byExtension, 'extension');
    }

    const byMime = this.categoryByMime(resolved);
    if (byMime) {
      return this.result(byMime, 'mime');
    }

    const byMagic = await this.categoryByMagic(resolved);
    if (byMagic) {
      return this.result(byMagic, 'magic');
    }

    return this.result(UNCATEGORIZED, 'unknown');
  }

  private result(category: string, method: ClassificationMethod): ClassificationResult {
    return { category, method };
  }

  private categoryByExtension(filePath: string, lookup: ReadonlyMap<string, string>): string | undefined {
    const suffixes = PathUtils.getSuffixes(filePath);

    // Compound extension first so ".tar.gz" is not shadowed by ".gz"
    if (suffixes.length >= 2) {
      const compound = `.${suffixes.slice(-2).join('.')}`;
      const category = lookup.get(compound);
      if (category) {
        return category;
      }
    }

    const last = suffixes[suffixes.length - 1];
    return last ? lookup.get(`.${last}`) : undefined;
  }

  private categoryByMime(filePath: string): string | undefined {
    const mimeType = mime.lookup(path.basename(filePath));
    return mimeType ? this.mimeTable.get(mimeType) : undefined;
  }

  private async categoryByMagic(filePath: string): Promise<string | undefined> {
    try {
      const handle = await fs.open(filePath, 'r');
      try {
        const header = Buffer.alloc(LIMITS.MAGIC_BYTES_LENGTH);
        const { bytesRead } = await handle.read(header, 0, LIMITS.MAGIC_BYTES_LENGTH, 0);
        return detectMagicCategory(header.subarray(0, bytesRead));
      } finally {
        await handle.close();
      }
    } catch (error) {
      this.logger.debug(`Cannot read header of ${filePath}: ${errorMessage(error)}`);
      return undefined;
    }
  }

  private applyTable(next: CategoryTable): void {
    const extensionMap = this.buildExtensionMap(next);
    this.categories = next;
    this.extensionMap = extensionMap;
  }

  private buildExtensionMap(table: CategoryTable): ReadonlyMap<string, string> {
    const map = new Map<string, string>();
    for (const [category, extensions] of table) {
      for (const extension of extensions) {
        const previous = map.get(extension);
        if (previous !== undefined && previous !== category) {
          this.logger.debug(`Extension conflict: ${extension} mapped to ${category} (was ${previous})`);
        }
        map.set(extension, category);
      }
    }
    return map;
  }

  private buildMimeMap(table: CategoryTable): ReadonlyMap<string, string> {
    const map = new Map<string, string>();
    for (const [category, mimeTypes] of table) {
      for (const mimeType of mimeTypes) {
        if (!map.has(mimeType)) {
          map.set(mimeType, category);
        }
      }
    }
    return map;
  }
}
