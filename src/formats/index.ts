/**
 * Central format module exports
 *
 * @example
 * ```typescript
 * import { FeatureReader, makeFastqPairReader } from '../formats';
 * ```
 */

// BED format exports
export { BED_COLUMNS, FeatureReader, isBedHeaderLine, parseBedRow, readFeatures } from "./bed";
// Paired FASTQ exports
export { defaultExtractPairId, FastqPairReader, makeFastqPairReader } from "./fastq";
export { ExtendedFeature, parseFloatingPoint, parseInteger } from "./feature";
// SAM flag exports
export { decodeFlag, PROPER_PAIR_INCLUDE_FLAGS, SamFlag, UNMAPPED_EXCLUDE_FLAGS } from "./sam-flags";
