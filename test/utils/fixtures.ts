/**
 * Shared helpers for tests that read from disk
 */

import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { gzipSync } from "fflate";
import { tmpdir } from "os";
import { join } from "path";

/**
 * Drain an async sequence into an array
 */
export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const results: T[] = [];
  for await (const item of source) {
    results.push(item);
  }
  return results;
}

/**
 * Temporary directory with plain and gzip writers, removed by `cleanup`
 */
export function createFixtureDir(prefix: string): {
  dir: string;
  writeText: (name: string, text: string) => string;
  writeGzip: (name: string, text: string) => string;
  cleanup: () => void;
} {
  const dir = mkdtempSync(join(tmpdir(), `${prefix}-`));

  return {
    dir,
    writeText: (name, text) => {
      const path = join(dir, name);
      writeFileSync(path, text);
      return path;
    },
    writeGzip: (name, text) => {
      const path = join(dir, name);
      writeFileSync(path, gzipSync(new TextEncoder().encode(text)));
      return path;
    },
    cleanup: () => {
      rmSync(dir, { recursive: true, force: true });
    },
  };
}
