/**
 * apptrack Engine — File Downloader
 *
 * Downloads installers into the store and retrieves the text documents
 * (update feeds, PAD files, release notes) product handlers read.
 *
 * HTTPS only, unless `core.allow_insecure` is set: several editors still
 * publish their feeds over plain HTTP.
 *
 * An installer is written to `<file>.partial` and renamed once its length
 * and digest have been checked; the partial file is removed on failure.
 */

import * as fs from "fs";
import * as path from "path";
import * as crypto from "crypto";
import { SecureHash } from "@apptrack/catalog";
import { TrackerFailure } from "./errors";
import { Logger } from "./utils/logger";
import { USER_AGENT } from "./version";
import { DEFAULT_HASH_ALGORITHM, isSupportedHashAlgorithm } from "./verifier";

export interface DownloadProgress {
  bytes_downloaded: number;
  /** -1 when the server does not announce the length */
  bytes_total: number;
  percent: number;
}

export type ProgressCallback = (progress: DownloadProgress) => void;

export interface DownloadOptions {
  url: string;
  destDir: string;
  /** File name to use; by default taken from Content-Disposition, then the URL */
  filename?: string;
  /** Expected size in bytes, -1 or absent when unknown */
  expectedLength?: number;
  /** Expected media type, compared with the start of Content-Type */
  expectedType?: string;
  /** Declared digest; the file is hashed with DEFAULT_HASH_ALGORITHM otherwise */
  expectedHash?: SecureHash | null;
  allowInsecure?: boolean;
  onProgress?: ProgressCallback;
  timeoutMs?: number;
  logger: Logger;
}

export interface DownloadResult {
  file_path: string;
  file_size: number;
  secure_hash: SecureHash;
  content_type: string;
  duration_ms: number;
}

const DEFAULT_TIMEOUT_MS = 60_000;

export function isSecureUrl(url: string): boolean {
  return url.startsWith("https://");
}

function checkScheme(url: string, allowInsecure: boolean | undefined): void {
  if (isSecureUrl(url)) return;
  if (allowInsecure && url.startsWith("http://")) return;
  throw new TrackerFailure(
    "NETWORK_ERROR",
    allowInsecure
      ? `Unsupported URL scheme: ${url}`
      : `Download URL must be HTTPS. Got: ${url}`,
    { url },
  );
}

/**
 * File name announced by a `Content-Disposition: attachment` header.
 * Directory parts are dropped. Returns null when there is none.
 */
export function filenameFromDisposition(header: string | null): string | null {
  if (!header || !/^\s*attachment/i.test(header)) return null;

  let name: string | null = null;
  const extended = /filename\*\s*=\s*[\w-]+'[\w-]*'([^;]+)/i.exec(header);
  if (extended) {
    try {
      name = decodeURIComponent(extended[1].trim());
    } catch {
      name = null; // malformed escape: fall back to the plain parameter
    }
  }
  if (name === null) {
    const plain = /filename\s*=\s*(?:"([^"]*)"|([^;]+))/i.exec(header);
    if (plain) name = (plain[1] ?? plain[2]).trim();
  }
  if (!name) return null;

  const base = path.basename(name.replace(/\\/g, "/"));
  return base === "" || base === "." || base === ".." ? null : base;
}

/** Last path segment of a URL, decoded; null for a bare host. */
export function filenameFromUrl(url: string): string | null {
  const segment = path.posix.basename(new URL(url).pathname);
  if (!segment) return null;
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * Download a file into `destDir`.
 *
 * Throws a TrackerFailure: NETWORK_ERROR when the server cannot be
 * reached or answers with an error, INTEGRITY_ERROR when the length,
 * media type or digest differs from what was expected, IO_ERROR when the
 * file cannot be written.
 */
export async function downloadFile(options: DownloadOptions): Promise<DownloadResult> {
  const { url, destDir, logger } = options;
  checkScheme(url, options.allowInsecure);

  const algorithm = (options.expectedHash?.[0] ?? DEFAULT_HASH_ALGORITHM).toLowerCase();
  if (!isSupportedHashAlgorithm(algorithm)) {
    throw new TrackerFailure("INTEGRITY_ERROR", `Unsupported hash algorithm: ${algorithm}`);
  }

  const startTime = Date.now();
  const controller = new AbortController();
  const timer = setTimeout(
    () => controller.abort(),
    options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
  );

  try {
    logger.info({ url }, "Starting download");

    let response: Response;
    try {
      response = await fetch(url, {
        headers: { "User-Agent": USER_AGENT },
        redirect: "follow",
        signal: controller.signal,
      });
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new TrackerFailure("NETWORK_ERROR", `Download request failed: ${msg}`, { url });
    }

    if (!response.ok) {
      throw new TrackerFailure(
        "NETWORK_ERROR",
        `Download failed: HTTP ${response.status} for ${url}`,
        { url, status: response.status },
      );
    }
    const finalUrl = response.url || url;
    if (finalUrl !== url) {
      logger.debug({ redirect: finalUrl }, "Followed redirect");
      checkScheme(finalUrl, options.allowInsecure);
    }

    // ─── Pre-checks ───
    const lengthHeader = response.headers.get("content-length");
    const announced = lengthHeader !== null ? parseInt(lengthHeader, 10) : -1;
    const expectedLength = options.expectedLength ?? -1;
    if (expectedLength >= 0 && announced >= 0 && announced !== expectedLength) {
      throw new TrackerFailure(
        "INTEGRITY_ERROR",
        `Unexpected file size: the server announces ${announced} bytes, ${expectedLength} expected`,
        { url, announced, expected: expectedLength },
      );
    }

    const contentType = response.headers.get("content-type") ?? "";
    if (options.expectedType && !contentType.startsWith(options.expectedType)) {
      throw new TrackerFailure(
        "INTEGRITY_ERROR",
        `Unexpected content type "${contentType}", "${options.expectedType}" expected`,
        { url, content_type: contentType },
      );
    }

    const filename =
      options.filename ??
      filenameFromDisposition(response.headers.get("content-disposition")) ??
      filenameFromUrl(finalUrl) ??
      "download";
    const destPath = path.join(destDir, filename);
    const partialPath = `${destPath}.partial`;

    // ─── Transfer ───
    const hash = crypto.createHash(algorithm);
    let downloaded = 0;
    try {
      fs.mkdirSync(destDir, { recursive: true });
      const handle = await fs.promises.open(partialPath, "w");
      try {
        if (response.body) {
          const reader = response.body.getReader();
          for (;;) {
            const { done, value } = await reader.read();
            if (done) break;
            await handle.write(value);
            hash.update(value);
            downloaded += value.length;
            options.onProgress?.({
              bytes_downloaded: downloaded,
              bytes_total: announced,
              percent: announced > 0 ? Math.round((downloaded / announced) * 100) : 0,
            });
          }
        }
      } finally {
        await handle.close();
      }
    } catch (err: unknown) {
      await fs.promises.rm(partialPath, { force: true });
      if (err instanceof TrackerFailure) throw err;
      const msg = err instanceof Error ? err.message : String(err);
      throw new TrackerFailure(
        controller.signal.aborted ? "NETWORK_ERROR" : "IO_ERROR",
        `Failed to download ${url}: ${msg}`,
        { url, dest: destPath },
      );
    }

    // ─── Post-checks ───
    const expectedSize = expectedLength >= 0 ? expectedLength : announced;
    if (expectedSize >= 0 && downloaded !== expectedSize) {
      await fs.promises.rm(partialPath, { force: true });
      throw new TrackerFailure(
        "INTEGRITY_ERROR",
        `Incomplete download: ${downloaded} bytes received, ${expectedSize} expected`,
        { url, received: downloaded, expected: expectedSize },
      );
    }

    const digest = hash.digest("hex");
    if (options.expectedHash && digest !== options.expectedHash[1].toLowerCase()) {
      await fs.promises.rm(partialPath, { force: true });
      throw new TrackerFailure(
        "INTEGRITY_ERROR",
        `Checksum mismatch for ${filename} (${algorithm})`,
        { url, expected: options.expectedHash[1], actual: digest },
      );
    }

    await fs.promises.rename(partialPath, destPath);
    const duration = Date.now() - startTime;
    logger.info(
      { dest: destPath, bytes: downloaded, duration_ms: duration },
      "Download complete",
    );

    return {
      file_path: destPath,
      file_size: downloaded,
      secure_hash: [algorithm, digest],
      content_type: contentType,
      duration_ms: duration,
    };
  } finally {
    clearTimeout(timer);
  }
}

export interface RetrieveOptions {
  allowInsecure?: boolean;
  timeoutMs?: number;
  logger: Logger;
}

/**
 * Fetch a text document. Throws a NETWORK_ERROR TrackerFailure on any
 * transport or HTTP error.
 */
export async function retrieveText(url: string, options: RetrieveOptions): Promise<string> {
  checkScheme(url, options.allowInsecure);
  options.logger.debug({ url }, "Retrieving document");

  let response: Response;
  try {
    response = await fetch(url, {
      headers: { "User-Agent": USER_AGENT },
      redirect: "follow",
      signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
    });
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new TrackerFailure("NETWORK_ERROR", `Cannot retrieve ${url}: ${msg}`, { url });
  }
  if (!response.ok) {
    throw new TrackerFailure(
      "NETWORK_ERROR",
      `Cannot retrieve ${url}: HTTP ${response.status}`,
      { url, status: response.status },
    );
  }
  return response.text();
}
