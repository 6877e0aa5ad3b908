/**
 * apptrack Catalog — Catalog Validator
 *
 * Validates catalog documents against the JSON Schema in schema.json.
 *
 * Two levels of validation:
 * 1. Schema validation (structure, types, patterns) via AJV
 * 2. Semantic validation (dates, digests) via custom checks
 */

import Ajv, { ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import * as fs from 'fs';
import * as path from 'path';
import { CatalogDocument, Product, SCHEME_VERSION, Stage, STAGES } from './types';

/** A validation result */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

export interface ValidationError {
  path: string;
  message: string;
  rule: string;
}

// Resolved from src/ as well as from dist/
const SCHEMA_PATH = path.join(__dirname, '..', 'schema.json');

let _validate: ValidateFunction<CatalogDocument> | null = null;

function getValidator(): ValidateFunction<CatalogDocument> {
  if (_validate) return _validate;

  const schemaContent = fs.readFileSync(SCHEMA_PATH, 'utf-8');
  const schema = JSON.parse(schemaContent);

  const ajv = new Ajv({ allErrors: true, strict: false });
  addFormats(ajv);

  _validate = ajv.compile<CatalogDocument>(schema);
  return _validate;
}

const TIMESTAMP_RE = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})$/;

/**
 * Whether a "YYYY-MM-DDTHH:MM:SS" string names a real instant
 * (no month 13, no February 30th).
 */
export function isWellFormedTimestamp(value: string): boolean {
  const match = TIMESTAMP_RE.exec(value);
  if (!match) return false;
  const [year, month, day, hour, minute, second] = match
    .slice(1)
    .map((part) => parseInt(part, 10));
  const date = new Date(year, month - 1, day, hour, minute, second);
  return (
    date.getFullYear() === year &&
    date.getMonth() === month - 1 &&
    date.getDate() === day &&
    date.getHours() === hour &&
    date.getMinutes() === minute &&
    date.getSeconds() === second
  );
}

export interface CatalogCheck {
  /** The document, typed, when it is valid */
  catalog: CatalogDocument | null;
  errors: ValidationError[];
}

/**
 * Check an arbitrary value (usually parsed JSON) and return it typed
 * when it is a valid catalog.
 */
export function checkCatalog(data: unknown): CatalogCheck {
  const validate = getValidator();

  if (!validate(data)) {
    return {
      catalog: null,
      errors: (validate.errors ?? []).map((err) => ({
        path: err.instancePath || '/',
        message: err.message || 'Unknown validation error',
        rule: `schema:${err.keyword}`,
      })),
    };
  }

  const errors = validateSemanticRules(data);
  return { catalog: errors.length === 0 ? data : null, errors };
}

/**
 * Validate a catalog object against the JSON Schema + semantic rules.
 */
export function validateCatalog(data: unknown): ValidationResult {
  const { errors } = checkCatalog(data);
  return { valid: errors.length === 0, errors };
}

/**
 * Check a product before it is put at `stage` of application `appId`.
 * The errors carry the paths the product would have in the catalog.
 */
export function checkProduct(appId: string, stage: Stage, product: Product): ValidationError[] {
  const at = `/products/${appId}/${stage}`;
  const catalog = {
    __version__: SCHEME_VERSION,
    modified: null,
    products: { [appId]: { pulled: {}, fetched: {}, approved: {}, [stage]: product } },
  };
  // the empty-bucket alternative fails for every product
  return checkCatalog(catalog).errors.filter(
    (err) => !(err.path === at && BUCKET_RULES.includes(err.rule)),
  );
}

const BUCKET_RULES = ['schema:maxProperties', 'schema:oneOf'];

/**
 * Rules JSON Schema cannot express.
 */
function validateSemanticRules(catalog: CatalogDocument): ValidationError[] {
  const errors: ValidationError[] = [];

  if (catalog.modified !== null && !isWellFormedTimestamp(catalog.modified)) {
    errors.push({
      path: '/modified',
      message: `"${catalog.modified}" is not a valid date and time`,
      rule: 'semantic:timestamp',
    });
  }

  for (const [id, entry] of Object.entries(catalog.products)) {
    for (const stage of STAGES) {
      const bucket = entry[stage];
      if (!isProduct(bucket)) continue;
      errors.push(...validateProduct(bucket, `/products/${id}/${stage}`));
    }
  }

  return errors;
}

function validateProduct(product: Product, at: string): ValidationError[] {
  const errors: ValidationError[] = [];

  if (product.published !== '' && !isWellFormedTimestamp(product.published)) {
    errors.push({
      path: `${at}/published`,
      message: `"${product.published}" is not a valid date and time`,
      rule: 'semantic:timestamp',
    });
  }

  if (product.secure_hash !== null && !/^[a-f0-9]+$/i.test(product.secure_hash[1])) {
    errors.push({
      path: `${at}/secure_hash`,
      message: `Digest "${product.secure_hash[1]}" is not hexadecimal`,
      rule: 'semantic:hex-digest',
    });
  }

  return errors;
}

/** Whether a stage holds a product (an empty object is an empty stage). */
export function isProduct(bucket: Product | Record<string, never>): bucket is Product {
  return Object.keys(bucket).length > 0;
}
