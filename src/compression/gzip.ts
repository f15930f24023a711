/**
 * Gzip decompression for BED and FASTQ inputs
 *
 * Whole-buffer decompression plus a streaming variant that plugs into an
 * Effect `Stream` of file chunks, so a compressed file is inflated chunk by
 * chunk as lines are pulled.
 */

import { Effect, Stream } from "effect";
import { Gunzip, gunzipSync } from "fflate";
import { CompressionError } from "../errors";

const GZIP_MAGIC_BYTE1 = 0x1f;
const GZIP_MAGIC_BYTE2 = 0x8b;

function validateGzipFormat(compressed: Uint8Array): void {
  if (
    compressed.length < 2 ||
    compressed[0] !== GZIP_MAGIC_BYTE1 ||
    compressed[1] !== GZIP_MAGIC_BYTE2
  ) {
    throw new CompressionError(
      "Invalid gzip magic bytes - file may not be gzip compressed",
      "gzip",
      "decompress",
      0
    );
  }
}

/**
 * Decompress a complete gzip buffer
 *
 * @throws {CompressionError} If the data is not gzip or is corrupt
 *
 * @example
 * ```typescript
 * const text = new TextDecoder().decode(decompress(bytes));
 * ```
 */
export function decompress(compressed: Uint8Array): Uint8Array {
  validateGzipFormat(compressed);

  try {
    return gunzipSync(compressed);
  } catch (err) {
    throw CompressionError.fromSystemError("gzip", "decompress", err, 0);
  }
}

/**
 * Inflate a stream of gzip chunks
 *
 * The inflater is created per run of the returned stream. Output produced
 * while pushing a chunk is emitted before the next chunk is pulled; the
 * final push flushes whatever the inflater still holds and fails on a
 * truncated member.
 */
export function decompressStream<E, R>(
  source: Stream.Stream<Uint8Array, E, R>
): Stream.Stream<Uint8Array, E | CompressionError, R> {
  return Stream.suspend(() => {
    const pending: Uint8Array[] = [];
    const inflater = new Gunzip((chunk) => {
      pending.push(chunk);
    });
    let bytesProcessed = 0;

    const push = (chunk: Uint8Array, final: boolean) =>
      Effect.try({
        try: () => {
          bytesProcessed += chunk.length;
          inflater.push(chunk, final);
          return pending.splice(0, pending.length);
        },
        catch: (err) => CompressionError.fromSystemError("gzip", "stream", err, bytesProcessed),
      });

    return source.pipe(
      Stream.mapEffect((chunk) => push(chunk, false)),
      Stream.concat(Stream.fromEffect(Effect.suspend(() => push(new Uint8Array(0), true)))),
      Stream.flattenIterables
    );
  });
}

export const GzipDecompressor = {
  decompress,
  decompressStream,
} as const;
