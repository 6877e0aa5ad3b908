/**
 * apptrack Catalog — Type Definitions
 *
 * The catalog records, for every tracked application, the product in
 * each of the three stages of its life cycle:
 *
 *   pulled   → newer release found on the editor's channel
 *   fetched  → installer downloaded into the store
 *   approved → release accepted for deployment
 *
 * An empty object marks an empty stage.
 */

// ─── Product ─────────────────────────────────────────────────────

/** Architecture an installer runs on. "unified" covers both. */
/** Version of the file layout, not of the application */
export const SCHEME_VERSION = '1.0.0';

/** Pattern of application ids, the keys of `products` */
export const APP_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

export type Target = 'x86' | 'x64' | 'unified';

export const TARGETS: readonly Target[] = ['x86', 'x64', 'unified'];

/** [algorithm, lowercase hex digest] */
export type SecureHash = [string, string];

export interface Product {
  /** Short name, also used for the installer file name */
  name: string;
  display_name: string;
  version: string;
  /** Release date, "YYYY-MM-DDTHH:MM:SS" or "" when unknown */
  published: string;
  target: Target;
  description: string;
  editor: string;
  web_site_location: string;
  /** Where the installer is downloaded from */
  location: string;
  icon: string;
  announce_location: string;
  feed_location: string;
  release_note_location: string;
  /** HTML fragment summarizing the changes since the approved release */
  change_summary: string;
  /** Installer path, once fetched */
  installer: string;
  /** Size in bytes, -1 when unknown */
  file_size: number;
  secure_hash: SecureHash | null;
  std_inst_args: string;
  silent_inst_args: string;
  /** Handler-specific attributes */
  extra?: Record<string, string>;
}

export type EmptyBucket = Record<string, never>;

export type Bucket = Product | EmptyBucket;

export type Stage = 'pulled' | 'fetched' | 'approved';

export const STAGES: readonly Stage[] = ['pulled', 'fetched', 'approved'];

export type CatalogEntry = Record<Stage, Bucket>;

// ─── Catalog Document ────────────────────────────────────────────

export interface CatalogDocument {
  __warning__: string;
  __version__: string;
  /** Last save, "YYYY-MM-DDTHH:MM:SS" local time, null when never saved */
  modified: string | null;
  products: Record<string, CatalogEntry>;
}
