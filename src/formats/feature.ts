/**
 * Feature region model
 *
 * A BED feature plus the padded region around it that downstream counting
 * works on. The region is fixed at construction: `extension` bases on each
 * side, moved upstream by `reverseFeatureShift` for reverse-strand
 * features so the window follows the direction of transcription rather
 * than the coordinate axis.
 */

import { ParseError } from "../errors";
import type { FeatureInit, NumericInput } from "../types";

const DEFAULT_EXTENSION = 100;
const DEFAULT_COLOR = "0,0,0";

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const SPECIAL_FLOAT_PATTERN = /^([+-]?)(inf|infinity|nan)$/i;

/**
 * Parse an integer BED column
 *
 * Strings must be an optional sign and digits, surrounding whitespace
 * allowed. Finite numbers are truncated toward zero.
 *
 * @throws {ParseError} If the value is not an integer
 */
export function parseInteger(value: NumericInput, field: string): number {
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new ParseError(`Invalid ${field}: ${value} is not a finite number`, "BED");
    }
    return Math.trunc(value);
  }

  const trimmed = value.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    throw new ParseError(`Invalid ${field}: '${value}' is not a valid integer`, "BED");
  }
  return parseInt(trimmed, 10);
}

/**
 * Parse a floating-point BED column
 *
 * Accepts decimal and exponent notation and `inf`, `infinity` or `nan` in
 * any case. The empty string is rejected.
 *
 * @throws {ParseError} If the value is not a number
 */
export function parseFloatingPoint(value: NumericInput, field: string): number {
  if (typeof value === "number") {
    return value;
  }

  const trimmed = value.trim();
  if (DECIMAL_PATTERN.test(trimmed)) {
    return Number(trimmed);
  }

  const special = SPECIAL_FLOAT_PATTERN.exec(trimmed);
  if (special !== null) {
    const [, sign, word] = special;
    if (word?.toLowerCase() === "nan") {
      return Number.NaN;
    }
    return sign === "-" ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
  }

  throw new ParseError(`Invalid ${field}: '${value}' is not a valid number`, "BED");
}

/**
 * A feature plus a fixed extended region, usually read from a BED file
 *
 * Attribute names follow the BED column names where they can; `reference`
 * is BED's `chrom`, `featureStart`/`featureEnd` are `chromStart`/`chromEnd`
 * and `color` is `itemRgb`. Drawing and block columns are carried through
 * as given.
 *
 * @example
 * ```typescript
 * const feature = new ExtendedFeature({
 *   reference: 'chr1',
 *   start: 1000,
 *   end: 1020,
 *   strand: '-',
 *   extension: 100,
 *   reverseFeatureShift: 1,
 * });
 * feature.regionStart; // 899
 * feature.regionEnd;   // 1119
 * ```
 */
export class ExtendedFeature {
  readonly reference: string;
  readonly featureStart: number;
  readonly featureEnd: number;

  readonly name: string | undefined;
  readonly score: number;
  readonly strand: string | undefined;
  readonly thickStart: NumericInput | undefined;
  readonly thickEnd: NumericInput | undefined;
  readonly color: string;
  readonly blockCount: NumericInput | undefined;
  readonly blockSizes: string | undefined;
  readonly blockStarts: string | undefined;

  readonly extension: number;
  readonly reverseFeatureShift: number;
  readonly isReverse: boolean;
  readonly regionStart: number;
  readonly regionEnd: number;

  /**
   * @throws {ParseError} If `start`, `end` or `extension` is not an integer, or `score` is not a number
   */
  constructor(init: FeatureInit) {
    this.reference = init.reference;
    this.featureStart = parseInteger(init.start, "start");
    this.featureEnd = parseInteger(init.end, "end");

    this.name = init.name;
    this.score = parseFloatingPoint(init.score ?? 0, "score");
    this.strand = init.strand;
    this.thickStart = init.thickStart;
    this.thickEnd = init.thickEnd;
    this.color = init.color ?? DEFAULT_COLOR;
    this.blockCount = init.blockCount;
    this.blockSizes = init.blockSizes;
    this.blockStarts = init.blockStarts;

    this.extension = parseInteger(init.extension ?? DEFAULT_EXTENSION, "extension");
    this.reverseFeatureShift = init.reverseFeatureShift ?? 0;
    this.isReverse = this.strand === "-";

    let regionStart = this.featureStart - this.extension;
    let regionEnd = this.featureEnd + this.extension;
    if (this.isReverse && this.reverseFeatureShift > 0) {
      regionStart -= this.reverseFeatureShift;
      regionEnd -= this.reverseFeatureShift;
    }
    this.regionStart = regionStart;
    this.regionEnd = regionEnd;
  }

  get regionLength(): number {
    return this.regionEnd - this.regionStart;
  }

  /**
   * `reference:regionStart-regionEnd`, for log lines
   */
  toRegionString(): string {
    return `${this.reference}:${this.regionStart}-${this.regionEnd}`;
  }

  /**
   * Tab-separated BED columns followed by extension and shift; absent fields are empty
   */
  toString(): string {
    return [
      this.reference,
      this.featureStart,
      this.featureEnd,
      this.name,
      this.score,
      this.strand,
      this.thickStart,
      this.thickEnd,
      this.color,
      this.blockCount,
      this.blockSizes,
      this.blockStarts,
      this.extension,
      this.reverseFeatureShift,
    ]
      .map((field) => (field === undefined ? "" : String(field)))
      .join("\t");
  }
}
