/**
 * apptrack Catalog — Catalog Store
 *
 * Reads and writes `catalog.json` inside the store directory.
 *
 * The file is rewritten as a whole on every save (keys sorted, four-space
 * indentation) through a temporary file renamed over the old one.
 */

import * as fs from 'fs';
import * as path from 'path';
import { isCompatible } from './semver';
import { checkCatalog, isProduct, ValidationError } from './validator';
import { Bucket, CatalogDocument, CatalogEntry, Product, SCHEME_VERSION, Stage } from './types';

export const CATALOG_FILENAME = 'catalog.json';


export const CATALOG_WARNING =
  'This file is automatically generated by apptrack. ' +
  'Do not edit it by hand: your changes may be overwritten or break the tracking.';

/** Thrown by `save()` for a document `load()` would reject. */
export class InvalidCatalogError extends Error {
  constructor(readonly errors: ValidationError[]) {
    const first = errors[0];
    super(
      first
        ? `Refusing to save an invalid catalog: ${first.path}: ${first.message}`
        : 'Refusing to save an invalid catalog',
    );
    this.name = 'InvalidCatalogError';
  }
}

export type CatalogLoadResult =
  | { ok: true; catalog: CatalogDocument; created: boolean; path: string }
  | { ok: false; message: string; errors: ValidationError[]; path: string };

/** An empty catalog, never saved. */
export function createCatalog(): CatalogDocument {
  return {
    __warning__: CATALOG_WARNING,
    __version__: SCHEME_VERSION,
    modified: null,
    products: {},
  };
}

/** Get the entry of an application, creating an empty one if missing. */
export function ensureEntry(catalog: CatalogDocument, appId: string): CatalogEntry {
  let entry = catalog.products[appId];
  if (!entry) {
    entry = { pulled: {}, fetched: {}, approved: {} };
    catalog.products[appId] = entry;
  }
  return entry;
}

export function isEmptyBucket(bucket: Bucket): boolean {
  return !isProduct(bucket);
}

/** Product recorded at a stage, null when the stage is empty. */
export function getProduct(
  catalog: CatalogDocument,
  appId: string,
  stage: Stage,
): Product | null {
  const entry = catalog.products[appId];
  if (!entry) return null;
  const bucket = entry[stage];
  return isProduct(bucket) ? bucket : null;
}

/** Local time, "YYYY-MM-DDTHH:MM:SS" (no milliseconds, no zone). */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/** Whether a file written with `version` can be read by this release. */
export function isCompatibleScheme(version: string): boolean {
  return isCompatible(version, SCHEME_VERSION);
}

/** Deep copy with object keys in ascending order. Arrays keep their order. */
export function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value).sort(([a], [b]) =>
      a < b ? -1 : a > b ? 1 : 0,
    )) {
      sorted[key] = sortKeys(inner);
    }
    return sorted;
  }
  return value;
}

export function serializeCatalog(catalog: CatalogDocument): string {
  return JSON.stringify(sortKeys(catalog), null, 4) + '\n';
}

export class CatalogStore {
  readonly filePath: string;

  constructor(storeDir: string) {
    this.filePath = path.join(storeDir, CATALOG_FILENAME);
  }

  get exists(): boolean {
    return fs.existsSync(this.filePath);
  }

  /**
   * Read the catalog. A missing file is not an error: a new, empty
   * catalog is returned with `created` set.
   */
  load(): CatalogLoadResult {
    let content: string;
    try {
      content = fs.readFileSync(this.filePath, 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err) && err.code === 'ENOENT') {
        return { ok: true, catalog: createCatalog(), created: true, path: this.filePath };
      }
      const msg = err instanceof Error ? err.message : String(err);
      return this.failure(`Cannot read the catalog: ${msg}`);
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      return this.failure(`The catalog is not valid JSON: ${msg}`);
    }

    const { catalog, errors } = checkCatalog(data);
    if (!catalog) {
      return this.failure('The catalog does not match the expected layout', errors);
    }

    if (!isCompatibleScheme(catalog.__version__)) {
      return this.failure(
        `Catalog layout ${catalog.__version__} is not supported (expected ${SCHEME_VERSION})`,
      );
    }

    // Older minor layouts are read as is and saved with the current version
    catalog.__version__ = SCHEME_VERSION;
    catalog.__warning__ = CATALOG_WARNING;
    return { ok: true, catalog, created: false, path: this.filePath };
  }

  /**
   * Stamp the modification time and write the catalog. The document is
   * checked like `load()` does; an invalid one is not written.
   */
  save(catalog: CatalogDocument, now: Date = new Date()): void {
    catalog.modified = formatTimestamp(now);
    catalog.__version__ = SCHEME_VERSION;

    const { errors } = checkCatalog(catalog);
    if (errors.length > 0) throw new InvalidCatalogError(errors);

    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.tmp`;
    fs.writeFileSync(tmpPath, serializeCatalog(catalog), 'utf-8');
    fs.renameSync(tmpPath, this.filePath);
  }

  private failure(message: string, errors: ValidationError[] = []): CatalogLoadResult {
    return { ok: false, message, errors, path: this.filePath };
  }
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
