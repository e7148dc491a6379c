// Category table: built-in defaults plus optional JSON overrides from a config directory

import * as fs from 'fs/promises';
import * as path from 'path';
import { Logger } from '../../types';
import { errorMessage, isErrnoException, isRecord } from '../../types/utils';
import { CATEGORY_CONFIG_FILES } from '../../core/constants';
import { ConfigurationError } from '../../core/errors';
import defaultCategories from './default-categories.json';
import mimeCategories from './mime-categories.json';

export type CategoryTable = Map<string, string[]>;

export interface CategoryFile {
  categories: Record<string, string[]>;
}

function tableFromRecord(record: Record<string, string[]>): CategoryTable {
  return new Map(Object.entries(record).map(([name, values]) => [name, [...values]]));
}

export function createDefaultCategoryTable(): CategoryTable {
  return tableFromRecord(defaultCategories.categories);
}

export function createMimeCategoryTable(): CategoryTable {
  return tableFromRecord(mimeCategories.categories);
}

/**
 * Lowercase with a leading dot. Throws on empty values or values containing separators or whitespace.
 */
export function normalizeExtension(extension: string): string {
  const trimmed = extension.trim().toLowerCase();
  const withDot = trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
  if (withDot.length < 2 || /[\s/\\]/.test(withDot)) {
    throw new ConfigurationError(`Invalid extension: "${extension}"`, { extension });
  }
  return withDot;
}

export function parseCategoryFile(content: string, source: string): CategoryTable {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Invalid category JSON in ${source}: ${errorMessage(error)}`, { source });
  }

  if (!isRecord(parsed) || !isRecord(parsed.categories)) {
    throw new ConfigurationError(`Category file ${source} must contain a "categories" object`, { source });
  }

  const table: CategoryTable = new Map();
  for (const [name, extensions] of Object.entries(parsed.categories)) {
    if (!Array.isArray(extensions) || !extensions.every((ext): ext is string => typeof ext === 'string')) {
      throw new ConfigurationError(`Category "${name}" in ${source} must be a list of extensions`, { source, name });
    }
    table.set(name, extensions.map(normalizeExtension));
  }
  return table;
}

async function readCategoryFile(filePath: string, logger: Logger): Promise<CategoryTable | null> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    logger.warn(`Could not read category file ${filePath}: ${errorMessage(error)}`);
    return null;
  }

  try {
    return parseCategoryFile(content, filePath);
  } catch (error) {
    logger.warn(`Could not load category file ${filePath}: ${errorMessage(error)}`);
    return null;
  }
}

/**
 * Built-in table, extended by default_categories.json and overridden by custom_categories.json
 * when a config directory is given. Unreadable or malformed files are logged and ignored.
 */
export async function loadCategoryTable(configDirectory: string | undefined, logger: Logger): Promise<CategoryTable> {
  const table = createDefaultCategoryTable();
  if (!configDirectory) {
    return table;
  }

  const extensions = await readCategoryFile(path.join(configDirectory, CATEGORY_CONFIG_FILES.DEFAULTS), logger);
  if (extensions) {
    for (const [name, values] of extensions) {
      const existing = table.get(name) ?? [];
      table.set(name, [...existing, ...values.filter((value) => !existing.includes(value))]);
    }
    logger.debug(`Loaded category defaults from ${configDirectory}`);
  }

  const overrides = await readCategoryFile(path.join(configDirectory, CATEGORY_CONFIG_FILES.CUSTOM), logger);
  if (overrides) {
    for (const [name, values] of overrides) {
      table.set(name, values);
    }
    logger.debug(`Loaded custom categories from ${configDirectory}`);
  }

  return table;
}

/**
 * Persist the categories that differ from the built-in table
 */
export async function saveCustomCategories(configDirectory: string, table: ReadonlyMap<string, readonly string[]>): Promise<string> {
  const builtIn = createDefaultCategoryTable();
  const custom: Record<string, string[]> = {};

  for (const [name, extensions] of table) {
    const original = builtIn.get(name);
    const unchanged = original !== undefined
      && original.length === extensions.length
      && original.every((value, index) => value === extensions[index]);
    if (!unchanged) {
      custom[name] = [...extensions];
    }
  }

  const data: CategoryFile = { categories: custom };
  const filePath = path.join(configDirectory, CATEGORY_CONFIG_FILES.CUSTOM);
  await fs.mkdir(configDirectory, { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(data, null, 2) + '\n', 'utf-8');
  return filePath;
}
