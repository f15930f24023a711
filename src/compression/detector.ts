/**
 * Compression format detection from magic bytes
 *
 * Input files are classified by content, never by name: a `.bed` file that
 * is actually gzip is still inflated, and a `.gz` file holding plain text
 * is read as-is.
 */

import type { CompressionDetection } from "../types";

const GZIP_MAGIC_FIRST_BYTE = 0x1f;
const GZIP_MAGIC_SECOND_BYTE = 0x8b;

const COMPRESSION_MAGIC_BYTES = {
  gzip: new Uint8Array([GZIP_MAGIC_FIRST_BYTE, GZIP_MAGIC_SECOND_BYTE]),
} as const;

/**
 * Number of leading bytes needed to recognise every supported format
 */
export const MAGIC_BYTES_LENGTH = COMPRESSION_MAGIC_BYTES.gzip.length;

export class CompressionDetector {
  /**
   * Detect compression format from the first bytes of a file
   *
   * A prefix shorter than the signature (including an empty file) is
   * reported as uncompressed.
   *
   * @example
   * ```typescript
   * CompressionDetector.fromMagicBytes(new Uint8Array([0x1f, 0x8b, 0x08])).format; // 'gzip'
   * ```
   */
  static fromMagicBytes(bytes: Uint8Array): CompressionDetection {
    const gzipMagic = COMPRESSION_MAGIC_BYTES.gzip;
    if (bytes.length >= gzipMagic.length) {
      const matches = gzipMagic.every((byte, index) => bytes[index] === byte);
      if (matches) {
        return {
          format: "gzip",
          magicBytes: bytes.slice(0, gzipMagic.length),
        };
      }
    }

    return { format: "none" };
  }
}
