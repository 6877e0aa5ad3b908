/**
 * apptrack Engine — Checksum Verification
 *
 * Hashes installers once they are in the store and checks them against
 * the digest an editor declares.
 */

import * as fs from "fs";
import * as crypto from "crypto";
import { SecureHash } from "@apptrack/catalog";

/** Algorithm used when the editor declares no digest */
export const DEFAULT_HASH_ALGORITHM = "sha1";

export interface VerificationResult {
  valid: boolean;
  algorithm: string;
  expected: string;
  actual: string;
  file_path: string;
}

const DIGEST_LENGTHS: Record<string, number> = {
  md5: 32,
  sha1: 40,
  sha224: 56,
  sha256: 64,
  sha384: 96,
  sha512: 128,
};

export function isSupportedHashAlgorithm(algorithm: string): boolean {
  return crypto.getHashes().includes(algorithm.toLowerCase());
}

/**
 * Compute the hex digest of a file. Streams the file, so installers of
 * any size are fine.
 */
export async function computeFileHash(
  filePath: string,
  algorithm = "sha256",
): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash(algorithm);
    const stream = fs.createReadStream(filePath);

    stream.on("data", (chunk) => hash.update(chunk));
    stream.on("end", () => resolve(hash.digest("hex")));
    stream.on("error", (err) =>
      reject(new Error(`Failed to read file for hashing: ${err.message}`)),
    );
  });
}

/**
 * Verify a file against a declared digest.
 *
 * Throws when the digest is malformed for its algorithm or the file
 * does not exist; a mismatch is reported through `valid`.
 */
export async function verifyChecksum(
  filePath: string,
  expected: SecureHash,
): Promise<VerificationResult> {
  const algorithm = expected[0].toLowerCase();
  const normalizedExpected = expected[1].toLowerCase().trim();

  if (!isSupportedHashAlgorithm(algorithm)) {
    throw new Error(`Unsupported hash algorithm: "${expected[0]}"`);
  }
  const length = DIGEST_LENGTHS[algorithm];
  const pattern = new RegExp(`^[a-f0-9]{${length ?? "1,"}}$`);
  if (!pattern.test(normalizedExpected)) {
    throw new Error(
      `Invalid ${algorithm} digest: "${expected[1]}".` +
        (length ? ` Expected ${length} hex characters.` : ""),
    );
  }

  if (!fs.existsSync(filePath)) {
    throw new Error(`File not found: ${filePath}`);
  }

  const actual = await computeFileHash(filePath, algorithm);

  return {
    valid: actual === normalizedExpected,
    algorithm,
    expected: normalizedExpected,
    actual,
    file_path: filePath,
  };
}
