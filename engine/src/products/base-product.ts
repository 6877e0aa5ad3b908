/**
 * apptrack Engine — Base Product
 *
 * A product handler knows where an editor publishes its releases and how
 * to read them. Each handler extends BaseProduct and implements
 * getOrigin(), which fills the attributes of the latest release.
 *
 * The tracker uses two instances per application:
 *   - the deployed product, loaded from the catalog's approved record
 *   - the origin, loaded the same way then refreshed by getOrigin()
 * and records the origin when it is an update of the deployed product.
 */

import * as fs from "fs";
import * as path from "path";
import { Product, SecureHash, Target } from "@apptrack/catalog";
import { downloadFile, ProgressCallback } from "../downloader";
import { TrackerFailure } from "../errors";
import { Logger } from "../utils/logger";
import { compareVersionIds } from "../utils/version-id";

export interface ProductContext {
  logger: Logger;
  /** Accept http:// locations */
  allowInsecure: boolean;
  /** Clock, replaced in tests */
  now: () => Date;
  timeoutMs?: number;
  onProgress?: ProgressCallback;
}

function titleCase(text: string): string {
  return text.replace(/\w\S*/g, (word) => word[0].toUpperCase() + word.slice(1).toLowerCase());
}

export abstract class BaseProduct implements Product {
  name = "";
  display_name = "";
  version = "0.0.0";
  published = "";
  target: Target = "unified";
  description = "";
  editor = "";
  web_site_location = "";
  location = "";
  icon = "";
  announce_location = "";
  feed_location = "";
  release_note_location = "";
  change_summary = "";
  installer = "";
  file_size = -1;
  secure_hash: SecureHash | null = null;
  std_inst_args = "";
  silent_inst_args = "";
  extra: Record<string, string> = {};

  /**
   * Look up the latest release published by the editor and update the
   * attributes. When nothing newer exists the attributes may stay as
   * loaded. Throws a TrackerFailure when the channel cannot be read.
   */
  abstract getOrigin(ctx: ProductContext): Promise<void>;

  /** "Firefox (X64)" */
  get title(): string {
    return `${titleCase(this.name)} (${titleCase(this.target)})`;
  }

  /**
   * Overwrite the attributes present in `attributes`; the others are left
   * unchanged.
   */
  load(attributes: Partial<Product>): void {
    const { extra, secure_hash, ...plain } = attributes;
    Object.assign(this, plain);
    if (secure_hash !== undefined) {
      this.secure_hash = secure_hash ? [secure_hash[0], secure_hash[1]] : null;
    }
    if (extra !== undefined) {
      this.extra = { ...this.extra, ...extra };
    }
  }

  /** A copy of the attributes, as stored in the catalog. */
  dump(): Product {
    const product: Product = {
      name: this.name,
      display_name: this.display_name,
      version: this.version,
      published: this.published,
      target: this.target,
      description: this.description,
      editor: this.editor,
      web_site_location: this.web_site_location,
      location: this.location,
      icon: this.icon,
      announce_location: this.announce_location,
      feed_location: this.feed_location,
      release_note_location: this.release_note_location,
      change_summary: this.change_summary,
      installer: this.installer,
      file_size: this.file_size,
      secure_hash: this.secure_hash ? [this.secure_hash[0], this.secure_hash[1]] : null,
      std_inst_args: this.std_inst_args,
      silent_inst_args: this.silent_inst_args,
    };
    if (Object.keys(this.extra).length > 0) {
      product.extra = { ...this.extra };
    }
    return product;
  }

  /**
   * Whether this product is a newer release than `deployed`.
   * Versions that cannot be compared are never considered an update.
   */
  isUpdate(deployed: Product, logger: Logger): boolean {
    const cmp = compareVersionIds(this.version, deployed.version);
    if (cmp === null) {
      logger.warn(
        { current: this.version, deployed: deployed.version },
        "Versions cannot be compared",
      );
      return false;
    }
    const update = cmp > 0;
    logger.info(
      { current: this.version, deployed: deployed.version, update },
      update ? "It is an update" : "Not an update",
    );
    return update;
  }

  /** "<name>_v<version>_<target><ext>", name lower-cased */
  installerName(extension: string): string {
    return `${this.name.toLowerCase()}_v${this.version}_${this.target}${extension}`;
  }

  /**
   * Download the installer into `dirPath` and record its location, size
   * and digest.
   */
  async fetch(dirPath: string, ctx: ProductContext): Promise<void> {
    if (!this.location) {
      throw new TrackerFailure(
        "HANDLER_ERROR",
        `No download location known for ${this.display_name || this.name}`,
      );
    }

    const result = await downloadFile({
      url: this.location,
      destDir: dirPath,
      expectedLength: this.file_size,
      expectedHash: this.secure_hash,
      allowInsecure: ctx.allowInsecure,
      onProgress: ctx.onProgress,
      timeoutMs: ctx.timeoutMs,
      logger: ctx.logger,
    });

    const target = path.join(dirPath, this.installerName(path.extname(result.file_path)));
    try {
      await fs.promises.rename(result.file_path, target);
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new TrackerFailure("IO_ERROR", `Cannot rename the installer: ${msg}`, {
        from: result.file_path,
        to: target,
      });
    }

    this.file_size = result.file_size;
    this.secure_hash = result.secure_hash;
    this.installer = target;
    ctx.logger.info({ installer: target }, "Installer downloaded");
  }
}
