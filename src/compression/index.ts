/**
 * Compression module
 *
 * Gzip is the only compressed format found in ATAC-seq inputs handled
 * here; detection is by magic bytes.
 *
 * @example Streaming decompression
 * ```typescript
 * import { CompressionDetector, decompressStream } from './compression';
 *
 * if (CompressionDetector.fromMagicBytes(header).format === 'gzip') {
 *   chunks = decompressStream(chunks);
 * }
 * ```
 */

export { CompressionDetector, MAGIC_BYTES_LENGTH } from "./detector";
export { decompress, decompressStream, GzipDecompressor } from "./gzip";

export type { CompressionDetection, CompressionFormat } from "../types";
export { CompressionError } from "../errors";
