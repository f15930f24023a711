/**
 * BED feature stream reader
 *
 * Reads tab-separated interval files (optionally gzip-compressed) into one
 * feature object per row, lazily and in file order. Rows map onto the
 * twelve BED columns by position; the feature class decides what the
 * region around each interval is.
 *
 * Handles the usual non-data lines:
 * - blank lines
 * - `#` comment lines
 * - `track` and `browser` lines
 */

import { type } from "arktype";
import { BedError, ValidationError } from "../errors";
import { openLines } from "../io/file-reader";
import { fromLines } from "../io/stream-utils";
import type {
  BedRow,
  ExtraColumnPolicy,
  FeatureClass,
  FeatureReaderConfig,
  FeatureReaderOptions,
  FileReaderOptions,
} from "../types";
import { FeatureReaderOptionsSchema } from "../types";
import { ExtendedFeature } from "./feature";

/**
 * BED column names in file order
 */
export const BED_COLUMNS = [
  "reference",
  "start",
  "end",
  "name",
  "score",
  "strand",
  "thickStart",
  "thickEnd",
  "color",
  "blockCount",
  "blockSizes",
  "blockStarts",
] as const;

const REQUIRED_COLUMN_COUNT = 3;

/**
 * Whether a line is a BED comment, `track` or `browser` line
 *
 * The keywords only count when followed by whitespace or alone, so a
 * contig named `track1` is still data.
 */
export function isBedHeaderLine(line: string): boolean {
  return line.startsWith("#") || /^(track|browser)(\s|$)/.test(line);
}

/**
 * Split one data line into named BED columns
 *
 * Missing trailing columns are absent. Columns past the twelfth go into
 * `rest`, or raise under the `"error"` policy.
 *
 * @throws {BedError} If the row has fewer than three columns, or extra columns under `"error"`
 */
export function parseBedRow(
  line: string,
  lineNumber: number,
  extraColumns: ExtraColumnPolicy = "collect"
): BedRow {
  const fields = line.split("\t");

  if (fields.length < REQUIRED_COLUMN_COUNT) {
    throw new BedError(
      `BED format requires at least ${REQUIRED_COLUMN_COUNT} fields, got ${fields.length}`,
      fields[0],
      lineNumber,
      line
    );
  }

  if (fields.length > BED_COLUMNS.length && extraColumns === "error") {
    throw new BedError(
      `BED row has ${fields.length} fields, at most ${BED_COLUMNS.length} allowed`,
      fields[0],
      lineNumber,
      line
    );
  }

  const [reference = "", start = "", end = ""] = fields;
  const rest = fields.slice(BED_COLUMNS.length);

  return {
    reference,
    start,
    end,
    name: fields[3],
    score: fields[4],
    strand: fields[5],
    thickStart: fields[6],
    thickEnd: fields[7],
    color: fields[8],
    blockCount: fields[9],
    blockSizes: fields[10],
    blockStarts: fields[11],
    ...(rest.length > 0 && { rest }),
    lineNumber,
  };
}

/**
 * Streaming BED reader producing one feature per data row
 *
 * @example
 * ```typescript
 * const reader = FeatureReader.create({ extension: 50, reverseFeatureShift: 1 });
 * for await (const feature of reader.readFile('motifs.bed.gz')) {
 *   console.log(feature.toRegionString());
 * }
 * ```
 *
 * @example Alternate region policy
 * ```typescript
 * class SummitFeature extends ExtendedFeature { ... }
 * const reader = new FeatureReader({ featureClass: SummitFeature, extension: 25 });
 * ```
 */
export class FeatureReader<F> {
  private readonly extension: number;
  private readonly reverseFeatureShift: number;
  private readonly featureClass: FeatureClass<F>;
  private readonly extraColumns: ExtraColumnPolicy;
  private readonly onWarning: (warning: string, lineNumber?: number) => void;
  private readonly fileOptions: FileReaderOptions;

  /**
   * @throws {ValidationError} If `extension` or `reverseFeatureShift` is not a non-negative integer
   */
  constructor(options: FeatureReaderConfig<F>) {
    const validation = FeatureReaderOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid feature reader options: ${validation.summary}`);
    }

    this.extension = options.extension ?? 100;
    this.reverseFeatureShift = options.reverseFeatureShift ?? 0;
    this.featureClass = options.featureClass;
    this.extraColumns = options.extraColumns ?? "collect";
    this.onWarning =
      options.onWarning ??
      ((warning: string, lineNumber?: number): void => {
        console.warn(`BED Warning (line ${lineNumber}): ${warning}`);
      });
    this.fileOptions = options.fileOptions ?? {};
  }

  /**
   * Reader building `ExtendedFeature`s unless another class is given
   */
  static create(options: FeatureReaderOptions<ExtendedFeature> = {}): FeatureReader<ExtendedFeature> {
    return new FeatureReader({ ...options, featureClass: options.featureClass ?? ExtendedFeature });
  }

  /**
   * Read features from a BED file, gzip-compressed or plain
   *
   * The file opens on the first pull and closes when iteration ends,
   * fails, or is abandoned.
   */
  async *readFile(filePath: string): AsyncGenerator<F> {
    yield* this.readLines(openLines(filePath, this.fileOptions));
  }

  /**
   * Read features from BED text held in memory
   */
  async *readString(data: string): AsyncGenerator<F> {
    yield* this.readLines(data.split(/\r?\n/));
  }

  /**
   * Read features from any line source
   */
  async *readLines(lines: Iterable<string> | AsyncIterable<string>): AsyncGenerator<F> {
    let lineNumber = 0;
    let warnedAboutExtraColumns = false;

    for await (const line of fromLines(lines)) {
      lineNumber++;

      if (line.trim() === "" || isBedHeaderLine(line)) {
        continue;
      }

      const row = parseBedRow(line, lineNumber, this.extraColumns);
      if (row.rest !== undefined && !warnedAboutExtraColumns) {
        warnedAboutExtraColumns = true;
        this.onWarning(
          `${row.rest.length} column(s) beyond blockStarts passed to the feature class as rest`,
          lineNumber
        );
      }
      yield this.createFeature(row);
    }
  }

  /**
   * Map a parsed row field by field onto the feature constructor
   */
  private createFeature(row: BedRow): F {
    return new this.featureClass({
      reference: row.reference,
      start: row.start,
      end: row.end,
      name: row.name,
      score: row.score,
      strand: row.strand,
      thickStart: row.thickStart,
      thickEnd: row.thickEnd,
      color: row.color,
      blockCount: row.blockCount,
      blockSizes: row.blockSizes,
      blockStarts: row.blockStarts,
      extension: this.extension,
      reverseFeatureShift: this.reverseFeatureShift,
      rest: row.rest,
    });
  }
}

/**
 * Read features from a BED file
 *
 * @example
 * ```typescript
 * for await (const feature of readFeatures('peaks.bed', { extension: 100 })) {
 *   console.log(feature.regionStart, feature.regionEnd);
 * }
 * ```
 */
export function readFeatures(
  filePath: string,
  options?: FeatureReaderOptions<ExtendedFeature>
): AsyncGenerator<ExtendedFeature>;
export function readFeatures<F>(
  filePath: string,
  options: FeatureReaderConfig<F>
): AsyncGenerator<F>;
export function readFeatures(
  filePath: string,
  options: FeatureReaderOptions<unknown> = {}
): AsyncGenerator<unknown> {
  return new FeatureReader({
    ...options,
    featureClass: options.featureClass ?? ExtendedFeature,
  }).readFile(filePath);
}
