/**
 * Line streaming over byte streams
 *
 * Turns a `ReadableStream<Uint8Array>` into lines on demand. Each pull reads
 * only as many chunks as it takes to complete the next line; stopping early
 * cancels the source so the file behind it is closed.
 */

import { AtacSeqError, StreamError } from "../errors";
import type { LineProcessingResult } from "../types";

/**
 * Convert a byte stream to an async sequence of lines
 *
 * Handles `\n`, `\r\n` and `\r` line endings, including a `\r\n` split
 * across two chunks. A final line without a terminator is yielded unless it
 * is only whitespace.
 *
 * @throws {StreamError} If the source fails with a non-library error
 *
 * @example
 * ```typescript
 * for await (const line of readLines(await createStream('peaks.bed.gz'))) {
 *   console.log(line);
 * }
 * ```
 */
export async function* readLines(stream: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder("utf-8");
  let buffer = "";
  let bytesProcessed = 0;
  let sourceOpen = true;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        sourceOpen = false;
        break;
      }

      buffer += decoder.decode(value, { stream: true });
      bytesProcessed += value.length;

      const result = processBuffer(buffer);
      buffer = result.remainder;

      for (const line of result.lines) {
        yield line;
      }
    }

    buffer += decoder.decode();
    if (buffer.endsWith("\r")) {
      buffer = buffer.slice(0, -1);
    }
    if (buffer.trim() !== "") {
      yield buffer;
    }
  } catch (error) {
    sourceOpen = false;
    if (error instanceof AtacSeqError) {
      throw error;
    }
    throw new StreamError(
      `Line reading failed: ${error instanceof Error ? error.message : String(error)}`,
      "read",
      bytesProcessed
    );
  } finally {
    // consumer stopped early
    if (sourceOpen) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

/**
 * Split a text buffer into complete lines and an unterminated remainder
 *
 * A trailing `\r` stays in the remainder, since the next chunk may start
 * with the `\n` that completes it.
 */
export function processBuffer(buffer: string): LineProcessingResult {
  const lines: string[] = [];
  let lineStart = 0;

  for (let position = 0; position < buffer.length; position++) {
    const char = buffer[position];

    if (char === "\n") {
      const lineEnd = position > lineStart && buffer[position - 1] === "\r" ? position - 1 : position;
      lines.push(buffer.slice(lineStart, lineEnd));
      lineStart = position + 1;
    } else if (char === "\r" && position + 1 < buffer.length && buffer[position + 1] !== "\n") {
      lines.push(buffer.slice(lineStart, position));
      lineStart = position + 1;
    }
  }

  return {
    lines,
    remainder: buffer.slice(lineStart),
  };
}

/**
 * Adapt an in-memory line source to an async sequence
 */
export async function* fromLines(lines: Iterable<string> | AsyncIterable<string>): AsyncGenerator<string> {
  yield* lines;
}

export const StreamUtils = {
  readLines,
  processBuffer,
  fromLines,
} as const;
