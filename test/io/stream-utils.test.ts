/**
 * Tests for line streaming
 */

import { describe, expect, test, vi } from "vitest";
import { StreamError, ValidationError } from "../../src/errors";
import { fromLines, processBuffer, readLines } from "../../src/io/stream-utils";
import { collect } from "../utils/fixtures";

function streamOf(...chunks: string[]): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(encoder.encode(chunk));
      }
      controller.close();
    },
  });
}

describe("processBuffer", () => {
  test("splits on LF and CRLF", () => {
    expect(processBuffer("a\nb\r\nc")).toEqual({ lines: ["a", "b"], remainder: "c" });
  });

  test("splits on a lone CR", () => {
    expect(processBuffer("a\rb\n")).toEqual({ lines: ["a", "b"], remainder: "" });
  });

  test("keeps a trailing CR in the remainder", () => {
    expect(processBuffer("a\rb\r")).toEqual({ lines: ["a"], remainder: "b\r" });
  });

  test("keeps empty lines", () => {
    expect(processBuffer("\n\nx\n")).toEqual({ lines: ["", "", "x"], remainder: "" });
  });
});

describe("readLines", () => {
  test("reassembles lines split across chunks", async () => {
    const lines = await collect(readLines(streamOf("chr1\t1", "00\t200\nchr2", "\t5\t6\n")));

    expect(lines).toEqual(["chr1\t100\t200", "chr2\t5\t6"]);
  });

  test("handles CRLF split between chunks", async () => {
    expect(await collect(readLines(streamOf("x\r", "\ny\r\n")))).toEqual(["x", "y"]);
  });

  test("yields a final unterminated line", async () => {
    expect(await collect(readLines(streamOf("a\nb")))).toEqual(["a", "b"]);
    expect(await collect(readLines(streamOf("a\nb\r")))).toEqual(["a", "b"]);
  });

  test("drops a whitespace-only final remainder", async () => {
    expect(await collect(readLines(streamOf("a\n  ")))).toEqual(["a"]);
  });

  test("decodes multi-byte characters split across chunks", async () => {
    const bytes = new TextEncoder().encode("µ\n");
    const stream = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(bytes.subarray(0, 1));
        controller.enqueue(bytes.subarray(1));
        controller.close();
      },
    });

    expect(await collect(readLines(stream))).toEqual(["µ"]);
  });

  test("cancels the source when the consumer stops early", async () => {
    const cancel = vi.fn();
    let counter = 0;
    const endless = new ReadableStream<Uint8Array>({
      pull(controller) {
        counter++;
        controller.enqueue(new TextEncoder().encode(`line${counter}\n`));
      },
      cancel,
    });

    for await (const line of readLines(endless)) {
      expect(line).toBe("line1");
      break;
    }

    expect(cancel).toHaveBeenCalledTimes(1);
  });

  test("wraps foreign source failures in a StreamError", async () => {
    const failing = new ReadableStream<Uint8Array>({
      pull(controller) {
        controller.error(new Error("device lost"));
      },
    });

    await expect(collect(readLines(failing))).rejects.toThrow(StreamError);
    await expect(collect(readLines(failing))).rejects.toThrow("Line reading failed: device lost");
  });

  test("passes library errors through unchanged", async () => {
    const failing = new ReadableStream<Uint8Array>({
      pull(controller) {
        controller.error(new ValidationError("bad record"));
      },
    });

    await expect(collect(readLines(failing))).rejects.toThrow(ValidationError);
  });
});

describe("fromLines", () => {
  test("adapts arrays and async sources", async () => {
    async function* source(): AsyncGenerator<string> {
      yield "p";
      yield "q";
    }

    expect(await collect(fromLines(["a", "b"]))).toEqual(["a", "b"]);
    expect(await collect(fromLines(source()))).toEqual(["p", "q"]);
  });
});
