/**
 * Shared types and option schemas
 *
 * Interfaces describe the records flowing through the readers and the
 * filter; ArkType schemas validate the option objects callers hand in.
 */

import { type } from "arktype";

// =============================================================================
// COMPRESSION
// =============================================================================

/**
 * Compression formats the file opener understands
 */
export type CompressionFormat = "gzip" | "none";

/**
 * Result of sniffing a byte prefix for a compression signature
 */
export interface CompressionDetection {
  readonly format: CompressionFormat;
  readonly magicBytes?: Uint8Array;
}

// =============================================================================
// FILE I/O
// =============================================================================

/**
 * File reading configuration options
 */
export interface FileReaderOptions {
  /** Size of each chunk read from disk in bytes (default: 64 KiB) */
  readonly chunkSize?: number;
  /** Whether to decompress gzip input transparently (default: true) */
  readonly autoDecompress?: boolean;
  /** Skip sniffing and treat the file as this format */
  readonly compressionFormat?: CompressionFormat;
}

/**
 * Complete lines extracted from a text buffer plus the unterminated tail
 */
export interface LineProcessingResult {
  readonly lines: string[];
  readonly remainder: string;
}

// =============================================================================
// BED FEATURES
// =============================================================================

/**
 * Strand orientation as written in BED column 6
 */
export type Strand = "+" | "-" | ".";

/**
 * Values accepted where a BED column is parsed as a number
 */
export type NumericInput = number | string;

/**
 * Constructor input for a feature: the BED columns plus region parameters
 *
 * Column values are accepted as read from the file; only `start`, `end`,
 * `score` and `extension` are parsed.
 */
export interface FeatureInit {
  readonly reference: string;
  readonly start: NumericInput;
  readonly end: NumericInput;
  readonly name?: string;
  readonly score?: NumericInput;
  readonly strand?: string;
  readonly thickStart?: NumericInput;
  readonly thickEnd?: NumericInput;
  readonly color?: string;
  readonly blockCount?: NumericInput;
  readonly blockSizes?: string;
  readonly blockStarts?: string;
  readonly extension?: NumericInput;
  readonly reverseFeatureShift?: number;
  /** Columns past the twelfth, ignored by ExtendedFeature */
  readonly rest?: readonly string[];
}

/**
 * One tab-separated BED row mapped onto the twelve column names
 *
 * Trailing columns missing from the row are absent; columns past the
 * twelfth are kept in `rest`.
 */
export interface BedRow {
  readonly reference: string;
  readonly start: string;
  readonly end: string;
  readonly name?: string;
  readonly score?: string;
  readonly strand?: string;
  readonly thickStart?: string;
  readonly thickEnd?: string;
  readonly color?: string;
  readonly blockCount?: string;
  readonly blockSizes?: string;
  readonly blockStarts?: string;
  readonly rest?: readonly string[];
  readonly lineNumber: number;
}

/**
 * Constructor used to build one feature per BED row
 *
 * The default is `ExtendedFeature`; a subclass or any class taking a
 * `FeatureInit` can supply a different region policy.
 */
export type FeatureClass<F> = new (init: FeatureInit) => F;

/**
 * What to do with columns past the twelfth
 */
export type ExtraColumnPolicy = "collect" | "error";

/**
 * Feature stream reader options
 */
export interface FeatureReaderOptions<F> {
  /** Bases added on each side of every feature (default: 100) */
  readonly extension?: number;
  /** Upstream shift applied to reverse-strand regions (default: 0) */
  readonly reverseFeatureShift?: number;
  /** Class instantiated for each row (default: ExtendedFeature) */
  readonly featureClass?: FeatureClass<F>;
  /** Columns past the twelfth go into `BedRow.rest` or raise (default: "collect") */
  readonly extraColumns?: ExtraColumnPolicy;
  /** Diagnostic sink (default: console.warn) */
  readonly onWarning?: (warning: string, lineNumber?: number) => void;
  /** File opening options */
  readonly fileOptions?: FileReaderOptions;
}

/**
 * Feature reader options with the feature class fixed
 */
export type FeatureReaderConfig<F> = FeatureReaderOptions<F> & {
  readonly featureClass: FeatureClass<F>;
};

// =============================================================================
// ALIGNED SEGMENTS
// =============================================================================

/**
 * The two fields of an aligned read the filter looks at
 *
 * Records come from an external SAM/BAM source; any object exposing these
 * fields qualifies.
 */
export interface AlignedSegment {
  readonly mappingQuality: number;
  readonly flag: number;
}

/**
 * Criteria for `filterAlignedSegments`
 */
export interface SegmentFilterCriteria {
  /** A segment must contain every bit of at least one of these masks */
  readonly includeFlags: readonly number[];
  /** A segment must share no bit with any of these masks */
  readonly excludeFlags: readonly number[];
  /** Minimum mapping quality */
  readonly quality: number;
  /** Emit a summary diagnostic; never changes the result */
  readonly verbose?: boolean;
  /** Diagnostic sink used when verbose (default: console.error) */
  readonly onDiagnostic?: (message: string) => void;
}

// =============================================================================
// FASTQ
// =============================================================================

/**
 * One FASTQ record: identifier, sequence, separator and quality lines
 */
export type FastqRecord = readonly [id: string, sequence: string, separator: string, quality: string];

/**
 * Records at the same position in the R1 and R2 files
 */
export type FastqRecordPair = readonly [r1: FastqRecord, r2: FastqRecord];

/**
 * Paired FASTQ reader options
 */
export interface FastqPairReaderOptions {
  /** Verify read IDs and record counts match (default: false) */
  readonly checkPairSync?: boolean;
  /** Reduces a read ID to the part both mates share */
  readonly extractPairId?: (id: string) => string;
  /** Diagnostic sink (default: console.warn) */
  readonly onWarning?: (warning: string) => void;
  /** File opening options applied to both files */
  readonly fileOptions?: FileReaderOptions;
}

// =============================================================================
// VALIDATION SCHEMAS
// =============================================================================

/**
 * Non-negative integer, used for region sizes
 */
export const NonNegativeIntegerSchema = type("number >= 0").narrow(
  (value, ctx) => Number.isInteger(value) || ctx.mustBe("an integer")
);

/**
 * File path validation: non-empty, no null bytes
 */
export const FilePathSchema = type("string > 0").narrow(
  (path, ctx) => !path.includes("\0") || ctx.mustBe("a path without null characters")
);

export const FileReaderOptionsSchema = type({
  "chunkSize?": "number > 0",
  "autoDecompress?": "boolean",
  "compressionFormat?": "'gzip' | 'none'",
});

export const FeatureReaderOptionsSchema = type({
  "extension?": NonNegativeIntegerSchema,
  "reverseFeatureShift?": NonNegativeIntegerSchema,
  "extraColumns?": "'collect' | 'error'",
});

export const FastqPairReaderOptionsSchema = type({
  "checkPairSync?": "boolean",
});
