/**
 * atacseq-io - data access for ATAC-seq pipelines
 *
 * BED features with padded strand-aware regions, paired FASTQ reading,
 * aligned-read filtering by SAM flag, and nucleotide complements. Inputs
 * may be gzip-compressed; detection is by content.
 */

// Compression infrastructure
export { CompressionDetector, decompress, decompressStream, GzipDecompressor } from "./compression";
// Error types
export {
  AtacSeqError,
  BedError,
  CompressionError,
  FileError,
  PairSyncError,
  ParseError,
  SequenceError,
  StreamError,
  ValidationError,
} from "./errors";
// Formats
export {
  BED_COLUMNS,
  decodeFlag,
  defaultExtractPairId,
  ExtendedFeature,
  FastqPairReader,
  FeatureReader,
  isBedHeaderLine,
  makeFastqPairReader,
  parseBedRow,
  PROPER_PAIR_INCLUDE_FLAGS,
  readFeatures,
  SamFlag,
  UNMAPPED_EXCLUDE_FLAGS,
} from "./formats";
// File I/O infrastructure
export { createStream, detectCompression, FileReader, openLines } from "./io/file-reader";
export { fromLines, processBuffer, readLines, StreamUtils } from "./io/stream-utils";
// Operations
export {
  AlignedSegmentFilter,
  complement,
  filterAlignedSegments,
  matchesFlagMask,
  reverse,
  reverseComplement,
  segmentPassesFilter,
} from "./operations";

// Core types
export type {
  AlignedSegment,
  BedRow,
  CompressionDetection,
  CompressionFormat,
  ExtraColumnPolicy,
  FastqPairReaderOptions,
  FastqRecord,
  FastqRecordPair,
  FeatureClass,
  FeatureInit,
  FeatureReaderConfig,
  FeatureReaderOptions,
  FileReaderOptions,
  LineProcessingResult,
  NumericInput,
  SegmentFilterCriteria,
  Strand,
} from "./types";
