/**
 * Paired-end FASTQ reader
 *
 * Reads R1 and R2 files in lockstep and yields the records at the same
 * position in each. Record n of R1 is assumed to be the mate of record n of
 * R2; by default that is not checked, since upstream tools write mates in
 * the same order and checking costs a comparison per pair.
 *
 * Records are any four consecutive lines. The `@` and `+` sentinels are not
 * inspected and multi-line sequences are not supported.
 *
 * @example Basic paired-end reading
 * ```typescript
 * for await (const [r1, r2] of makeFastqPairReader('R1.fastq.gz', 'R2.fastq.gz')) {
 *   const [id1, seq1] = r1;
 *   const [id2, seq2] = r2;
 * }
 * ```
 *
 * @example With synchronization checking
 * ```typescript
 * const reader = new FastqPairReader({ checkPairSync: true });
 * try {
 *   for await (const pair of reader.readFiles('R1.fq', 'R2.fq')) {
 *     // mates verified
 *   }
 * } catch (error) {
 *   if (error instanceof PairSyncError) {
 *     console.error(`Sync failed at pair ${error.pairIndex}`);
 *   }
 * }
 * ```
 */

import { type } from "arktype";
import { PairSyncError, ValidationError } from "../../errors";
import { openLines } from "../../io/file-reader";
import { fromLines } from "../../io/stream-utils";
import type {
  FastqPairReaderOptions,
  FastqRecord,
  FastqRecordPair,
  FileReaderOptions,
} from "../../types";
import { FastqPairReaderOptionsSchema } from "../../types";

const LINES_PER_RECORD = 4;

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Default paired-end ID extractor
 *
 * Drops the comment after the first whitespace, then a trailing mate
 * suffix: `/1`, `/2`, `_1`, `.2`, `_R1`, `.r2` and so on.
 *
 * @example
 * ```typescript
 * defaultExtractPairId('@read1/1');              // '@read1'
 * defaultExtractPairId('read1_R2');              // 'read1'
 * defaultExtractPairId('@M001:7:1101 1:N:0:1');  // '@M001:7:1101'
 * ```
 */
export function defaultExtractPairId(id: string): string {
  const [name = ""] = id.split(/\s/, 1);
  return name.replace(/[/._][12]$|[/._][Rr][12]$/, "");
}

async function readRecordLines(lines: AsyncIterator<string>): Promise<string[]> {
  const record: string[] = [];
  while (record.length < LINES_PER_RECORD) {
    const next = await lines.next();
    if (next.done === true) {
      break;
    }
    record.push(next.value.trim());
  }
  return record;
}

function toRecord(lines: readonly string[]): FastqRecord {
  const [id = "", sequence = "", separator = "", quality = ""] = lines;
  return [id, sequence, separator, quality];
}

// =============================================================================
// CLASSES
// =============================================================================

/**
 * Lockstep reader over two FASTQ sources
 */
export class FastqPairReader {
  private readonly checkPairSync: boolean;
  private readonly extractPairId: (id: string) => string;
  private readonly onWarning: (warning: string) => void;
  private readonly fileOptions: FileReaderOptions;

  /**
   * @throws {ValidationError} If the options are malformed
   */
  constructor(options: FastqPairReaderOptions = {}) {
    const validation = FastqPairReaderOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid paired FASTQ options: ${validation.summary}`);
    }

    this.checkPairSync = options.checkPairSync ?? false;
    this.extractPairId = options.extractPairId ?? defaultExtractPairId;
    this.onWarning =
      options.onWarning ??
      ((warning: string): void => {
        console.warn(`FASTQ Warning: ${warning}`);
      });
    this.fileOptions = options.fileOptions ?? {};
  }

  /**
   * Read pairs from two files, each gzip-compressed or plain
   *
   * Both files open on the first pull and close when iteration ends,
   * fails, or is abandoned.
   */
  async *readFiles(r1Path: string, r2Path: string): AsyncGenerator<FastqRecordPair> {
    yield* this.readLines(openLines(r1Path, this.fileOptions), openLines(r2Path, this.fileOptions));
  }

  /**
   * Pair records from two line sources
   *
   * Ends as soon as either source cannot supply a full record.
   *
   * @throws {PairSyncError} Only with `checkPairSync`, on mismatched IDs, counts or a partial record
   */
  async *readLines(
    r1Lines: Iterable<string> | AsyncIterable<string>,
    r2Lines: Iterable<string> | AsyncIterable<string>
  ): AsyncGenerator<FastqRecordPair> {
    const r1 = fromLines(r1Lines);
    const r2 = fromLines(r2Lines);
    let pairIndex = 0;

    try {
      while (true) {
        const r1Record = await readRecordLines(r1);
        if (r1Record.length < LINES_PER_RECORD) {
          await this.handleR1End(r1Record.length, r2, pairIndex);
          return;
        }

        const r2Record = await readRecordLines(r2);
        if (r2Record.length < LINES_PER_RECORD) {
          this.handleR2End(r2Record.length, pairIndex);
          return;
        }

        const pair: FastqRecordPair = [toRecord(r1Record), toRecord(r2Record)];
        if (this.checkPairSync) {
          this.verifyIds(pair, pairIndex);
        }

        yield pair;
        pairIndex++;
      }
    } finally {
      await Promise.all([r1.return(undefined), r2.return(undefined)]);
    }
  }

  private async handleR1End(
    linesRead: number,
    r2: AsyncIterator<string>,
    pairIndex: number
  ): Promise<void> {
    if (linesRead > 0) {
      if (this.checkPairSync) {
        throw PairSyncError.forPartialRecord(pairIndex, "r1", linesRead);
      }
      this.onWarning(
        `R1 ended inside a record at pair ${pairIndex} (${linesRead} of ${LINES_PER_RECORD} lines); record dropped`
      );
      return;
    }

    if (this.checkPairSync) {
      const extra = await r2.next();
      if (extra.done !== true) {
        throw PairSyncError.forLengthMismatch(pairIndex, "r1");
      }
    }
  }

  private handleR2End(linesRead: number, pairIndex: number): void {
    if (this.checkPairSync) {
      throw linesRead > 0
        ? PairSyncError.forPartialRecord(pairIndex, "r2", linesRead)
        : PairSyncError.forLengthMismatch(pairIndex, "r2");
    }
    this.onWarning(
      `R2 ended before R1 at pair ${pairIndex} (${linesRead} of ${LINES_PER_RECORD} lines read); remaining R1 records dropped`
    );
  }

  private verifyIds([r1, r2]: FastqRecordPair, pairIndex: number): void {
    const baseR1 = this.extractPairId(r1[0]);
    const baseR2 = this.extractPairId(r2[0]);
    if (baseR1 !== baseR2) {
      throw PairSyncError.forIdMismatch(r1[0], r2[0], pairIndex, baseR1, baseR2);
    }
  }
}

/**
 * Lockstep reader over two FASTQ files
 *
 * @example
 * ```typescript
 * const pairs = makeFastqPairReader('sample_R1.fastq.gz', 'sample_R2.fastq.gz');
 * const first = await pairs.next(); // { done: false, value: [r1, r2] }
 * ```
 */
export function makeFastqPairReader(
  r1Path: string,
  r2Path: string,
  options: FastqPairReaderOptions = {}
): AsyncGenerator<FastqRecordPair> {
  return new FastqPairReader(options).readFiles(r1Path, r2Path);
}
