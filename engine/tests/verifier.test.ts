/**
 * apptrack Engine — Checksum Verifier Tests
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import * as fs from "fs";
import * as path from "path";
import * as crypto from "crypto";
import * as os from "os";
import {
  verifyChecksum,
  computeFileHash,
  isSupportedHashAlgorithm,
} from "../src/verifier";

const TEST_DIR = path.join(os.tmpdir(), "apptrack-verifier-test");
const TEST_FILE = path.join(TEST_DIR, "test-file.txt");
const TEST_CONTENT = "Hello, apptrack verifier test!";

let sha256: string;
let sha1: string;

beforeAll(() => {
  fs.mkdirSync(TEST_DIR, { recursive: true });
  fs.writeFileSync(TEST_FILE, TEST_CONTENT, "utf-8");
  sha256 = crypto.createHash("sha256").update(TEST_CONTENT).digest("hex");
  sha1 = crypto.createHash("sha1").update(TEST_CONTENT).digest("hex");
});

afterAll(() => {
  fs.rmSync(TEST_DIR, { recursive: true, force: true });
});

describe("computeFileHash", () => {
  it("computes SHA-256 by default", async () => {
    expect(await computeFileHash(TEST_FILE)).toBe(sha256);
  });

  it("computes the requested algorithm", async () => {
    expect(await computeFileHash(TEST_FILE, "sha1")).toBe(sha1);
  });

  it("throws for non-existent file", async () => {
    await expect(computeFileHash("/nonexistent/file.txt")).rejects.toThrow(
      "Failed to read file for hashing",
    );
  });
});

describe("isSupportedHashAlgorithm", () => {
  it("accepts algorithms in any case", () => {
    expect(isSupportedHashAlgorithm("SHA256")).toBe(true);
    expect(isSupportedHashAlgorithm("md5")).toBe(true);
  });

  it("rejects unknown algorithms", () => {
    expect(isSupportedHashAlgorithm("crc32x")).toBe(false);
  });
});

describe("verifyChecksum", () => {
  it("returns valid: true for matching checksum", async () => {
    const result = await verifyChecksum(TEST_FILE, ["sha256", sha256]);
    expect(result).toEqual({
      valid: true,
      algorithm: "sha256",
      expected: sha256,
      actual: sha256,
      file_path: TEST_FILE,
    });
  });

  it("normalizes algorithm and digest case", async () => {
    const result = await verifyChecksum(TEST_FILE, ["SHA1", sha1.toUpperCase()]);
    expect(result.valid).toBe(true);
    expect(result.algorithm).toBe("sha1");
  });

  it("returns valid: false for mismatched checksum", async () => {
    const result = await verifyChecksum(TEST_FILE, ["sha256", "a".repeat(64)]);
    expect(result.valid).toBe(false);
    expect(result.actual).toBe(sha256);
  });

  it("throws for a digest of the wrong length", async () => {
    await expect(verifyChecksum(TEST_FILE, ["sha1", "abc123"])).rejects.toThrow(
      'Invalid sha1 digest: "abc123". Expected 40 hex characters.',
    );
  });

  it("throws for an unsupported algorithm", async () => {
    await expect(verifyChecksum(TEST_FILE, ["crc32x", "00"])).rejects.toThrow(
      'Unsupported hash algorithm: "crc32x"',
    );
  });

  it("throws for non-existent file", async () => {
    await expect(
      verifyChecksum("/nonexistent/file.txt", ["sha256", "a".repeat(64)]),
    ).rejects.toThrow("File not found: /nonexistent/file.txt");
  });
});
