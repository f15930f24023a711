/**
 * Tests for compression format detection
 */

import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { CompressionDetector, MAGIC_BYTES_LENGTH } from "../../src/compression/detector";
import { FileError } from "../../src/errors";
import { detectCompression } from "../../src/io/file-reader";
import { createFixtureDir } from "../utils/fixtures";

describe("CompressionDetector.fromMagicBytes", () => {
  test("recognizes the gzip signature", () => {
    const detection = CompressionDetector.fromMagicBytes(new Uint8Array([0x1f, 0x8b, 0x08, 0x00]));

    expect(detection.format).toBe("gzip");
    expect(detection.magicBytes).toEqual(new Uint8Array([0x1f, 0x8b]));
  });

  test("reports plain text as uncompressed", () => {
    const detection = CompressionDetector.fromMagicBytes(new TextEncoder().encode("chr1\t1\t2"));

    expect(detection).toEqual({ format: "none" });
  });

  test("reports short prefixes as uncompressed", () => {
    expect(CompressionDetector.fromMagicBytes(new Uint8Array([0x1f])).format).toBe("none");
    expect(CompressionDetector.fromMagicBytes(new Uint8Array(0)).format).toBe("none");
  });

  test("needs two bytes", () => {
    expect(MAGIC_BYTES_LENGTH).toBe(2);
  });
});

describe("detectCompression", () => {
  const fixtures = createFixtureDir("detector");

  beforeAll(() => {
    fixtures.writeGzip("reads.fq.gz", "@r\nA\n+\nI\n");
    fixtures.writeText("reads.fq", "@r\nA\n+\nI\n");
    fixtures.writeText("one-byte.txt", "\x1f");
    fixtures.writeText("empty.txt", "");
  });

  afterAll(() => {
    fixtures.cleanup();
  });

  test("sniffs gzip files", async () => {
    expect((await detectCompression(`${fixtures.dir}/reads.fq.gz`)).format).toBe("gzip");
  });

  test("sniffs plain files", async () => {
    expect((await detectCompression(`${fixtures.dir}/reads.fq`)).format).toBe("none");
  });

  test("treats files shorter than the signature as plain", async () => {
    expect((await detectCompression(`${fixtures.dir}/one-byte.txt`)).format).toBe("none");
    expect((await detectCompression(`${fixtures.dir}/empty.txt`)).format).toBe("none");
  });

  test("fails with a FileError for a missing file", async () => {
    await expect(detectCompression(`${fixtures.dir}/absent.gz`)).rejects.toThrow(FileError);
  });
});
