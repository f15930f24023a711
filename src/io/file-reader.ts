/**
 * File opening with transparent gzip decompression
 *
 * Every reader in this package opens its input through `createStream` or
 * `openLines`: the first two bytes are sniffed for the gzip signature and
 * the content is inflated on the fly when it matches.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect, Option, Stream } from "effect";
import { CompressionDetector, decompressStream, MAGIC_BYTES_LENGTH } from "../compression";
import { FileError, ValidationError } from "../errors";
import type { CompressionDetection, CompressionFormat, FileReaderOptions } from "../types";
import { FilePathSchema, FileReaderOptionsSchema } from "../types";
import { runWithPlatform } from "./runtime";
import { readLines } from "./stream-utils";

const DEFAULT_CHUNK_SIZE = 65_536;

/**
 * Read the leading bytes of a file and classify its compression
 *
 * @throws {FileError} If the file cannot be opened or read
 *
 * @example
 * ```typescript
 * const { format } = await detectCompression('reads_R1.fastq.gz'); // 'gzip'
 * ```
 */
export async function detectCompression(path: string): Promise<CompressionDetection> {
  const validatedPath = validatePath(path);

  const program = Effect.scoped(
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const file = yield* fs.open(validatedPath, { flag: "r" });
      return yield* file.readAlloc(MAGIC_BYTES_LENGTH);
    })
  ).pipe(Effect.mapError((error) => FileError.fromSystemError("open", validatedPath, error)));

  const header = await runWithPlatform(program);
  return CompressionDetector.fromMagicBytes(Option.getOrElse(header, () => new Uint8Array(0)));
}

/**
 * Create a streaming reader for a file, decompressing gzip content
 *
 * The file is sniffed first unless `compressionFormat` is given or
 * `autoDecompress` is false. Cancelling the returned stream closes the file.
 *
 * @throws {FileError} If the path is invalid or the file cannot be opened; read failures surface from the stream
 * @throws {ValidationError} If the options are invalid
 */
export async function createStream(
  path: string,
  options: FileReaderOptions = {}
): Promise<ReadableStream<Uint8Array>> {
  const validatedPath = validatePath(path);
  const { chunkSize, autoDecompress } = mergeOptions(options);
  const format = await resolveFormat(validatedPath, options.compressionFormat, autoDecompress);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const raw = fs
      .stream(validatedPath, { chunkSize })
      .pipe(Stream.mapError((error) => FileError.fromSystemError("read", validatedPath, error)));
    const content = format === "gzip" ? decompressStream(raw) : raw;
    return Stream.toReadableStream(content);
  });

  return runWithPlatform(program);
}

/**
 * Lazily read the lines of a possibly gzipped file
 *
 * Nothing is opened until the first line is pulled, and the file is closed
 * when the sequence ends, fails, or the consumer stops early.
 *
 * @example
 * ```typescript
 * for await (const line of openLines('peaks.bed.gz')) {
 *   if (line.startsWith('chr1\t')) break; // file is closed here
 * }
 * ```
 */
export async function* openLines(
  path: string,
  options: FileReaderOptions = {}
): AsyncGenerator<string> {
  const stream = await createStream(path, options);
  yield* readLines(stream);
}

export const FileReader = {
  detectCompression,
  createStream,
  openLines,
} as const;

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

async function resolveFormat(
  path: string,
  requested: CompressionFormat | undefined,
  autoDecompress: boolean
): Promise<CompressionFormat> {
  if (!autoDecompress) {
    return "none";
  }
  if (requested !== undefined) {
    return requested;
  }
  const detection = await detectCompression(path);
  return detection.format;
}

function validatePath(path: string): string {
  const result = FilePathSchema(path);
  if (result instanceof type.errors) {
    throw new FileError(`Invalid file path: ${result.summary}`, path, "stat");
  }
  return result;
}

function mergeOptions(options: FileReaderOptions): { chunkSize: number; autoDecompress: boolean } {
  const result = FileReaderOptionsSchema(options);
  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid file reader options: ${result.summary}`);
  }
  return {
    chunkSize: options.chunkSize ?? DEFAULT_CHUNK_SIZE,
    autoDecompress: options.autoDecompress ?? true,
  };
}
