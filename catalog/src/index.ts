/**
 * apptrack Catalog — Public API
 *
 * Main entry point for the catalog package.
 * Exports the store, the validator, semantic versioning and types.
 */

export {
  CatalogStore,
  InvalidCatalogError,
  CATALOG_FILENAME,
  CATALOG_WARNING,
  createCatalog,
  ensureEntry,
  getProduct,
  isEmptyBucket,
  formatTimestamp,
  isCompatibleScheme,
  serializeCatalog,
  sortKeys,
} from './store';
export type { CatalogLoadResult } from './store';
export {
  validateCatalog,
  checkCatalog,
  checkProduct,
  isProduct,
  isWellFormedTimestamp,
} from './validator';
export type { ValidationResult, ValidationError, CatalogCheck } from './validator';
export {
  compareDigits,
  compareIdentifier,
  comparePrerelease,
  compareSemver,
  formatSemver,
  isCompatible,
  isUnstable,
  isValidSemver,
  normalizeSemver,
  parseSemver,
} from './semver';
export type { SemverParts } from './semver';
export { APP_ID_PATTERN, SCHEME_VERSION, TARGETS, STAGES } from './types';
export type {
  Target,
  SecureHash,
  Product,
  EmptyBucket,
  Bucket,
  Stage,
  CatalogEntry,
  CatalogDocument,
} from './types';
