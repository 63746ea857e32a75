import * as yaml from 'js-yaml';

import type { Category, PackageId } from '../../types/index.js';
import { CatalogError } from '../../utils/errors.js';
import { readTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

/**
 * Shape of a catalog document:
 *
 * ```yaml
 * order: [core, pip, optional, apps]
 * categories:
 *   core: [git, vim]
 *   apps: [firefox]
 * ```
 *
 * `order` is the install priority; mapping order in `categories` is ignored.
 */
export interface CatalogDocument {
  order: string[];
  categories: Record<string, PackageId[]>;
}

/**
 * Ordered, read-only collection of package categories, assembled once.
 */
export class CategoryCatalog {
  private readonly ordered: readonly Category[];
  private readonly byId: ReadonlyMap<string, Category>;

  constructor(document: CatalogDocument) {
    this.ordered = Object.freeze(buildCategories(document));
    this.byId = new Map(this.ordered.map(category => [category.id, category]));
  }

  categories(): readonly Category[] {
    return this.ordered;
  }

  get(id: string): Category | undefined {
    return this.byId.get(id);
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }
}

function buildCategories(document: CatalogDocument): Category[] {
  const declared = Object.keys(document.categories);
  const seen = new Set<string>();

  const categories = document.order.map(id => {
    if (id.length === 0) {
      throw new CatalogError('category ids must be non-empty');
    }
    if (seen.has(id)) {
      throw new CatalogError(`category '${id}' appears more than once in order`);
    }
    seen.add(id);

    if (!Object.prototype.hasOwnProperty.call(document.categories, id)) {
      throw new CatalogError(`order names unknown category '${id}'`);
    }
    return buildCategory(id, document.categories[id]);
  });

  const unordered = declared.filter(id => !seen.has(id));
  if (unordered.length > 0) {
    throw new CatalogError(`categories missing from order: ${unordered.join(', ')}`);
  }

  return categories;
}

function buildCategory(id: string, packages: PackageId[]): Category {
  const unique = new Set<PackageId>();
  for (const pkg of packages) {
    if (pkg.length === 0) {
      throw new CatalogError(`category '${id}' contains an empty package name`);
    }
    if (unique.has(pkg)) {
      throw new CatalogError(`package '${pkg}' is listed twice in category '${id}'`);
    }
    unique.add(pkg);
  }
  return Object.freeze({ id, packages: Object.freeze([...packages]) });
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

/**
 * Validate an untyped YAML value into a catalog document.
 */
export function parseCatalogDocument(value: unknown): CatalogDocument {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new CatalogError('document must be a mapping with order and categories');
  }
  const order: unknown = Reflect.get(value, 'order');
  const rawCategories: unknown = Reflect.get(value, 'categories');

  if (!isStringList(order)) {
    throw new CatalogError('order must be a list of category ids');
  }
  if (typeof rawCategories !== 'object' || rawCategories === null || Array.isArray(rawCategories)) {
    throw new CatalogError('categories must be a mapping of id to package list');
  }

  const categories: Record<string, PackageId[]> = {};
  for (const [id, packages] of Object.entries(rawCategories)) {
    if (packages === null) {
      categories[id] = [];
      continue;
    }
    if (!isStringList(packages)) {
      throw new CatalogError(`category '${id}' must be a list of package names`);
    }
    categories[id] = packages;
  }

  return { order, categories };
}

/**
 * Load and validate a catalog from a YAML file.
 */
export async function loadCatalog(path: string): Promise<CategoryCatalog> {
  const content = await readTextFile(path);
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    throw new CatalogError(`failed to parse ${path}: ${error instanceof Error ? error.message : String(error)}`, { path });
  }
  const catalog = new CategoryCatalog(parseCatalogDocument(parsed));
  logger.debug(`Loaded catalog from ${path}`, { categories: catalog.categories().map(c => c.id) });
  return catalog;
}
