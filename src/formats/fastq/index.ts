/**
 * FASTQ module
 *
 * Paired-end reading only: single-file FASTQ parsing, quality decoding and
 * writing are left to dedicated tools upstream of ATAC-seq processing.
 */

export { defaultExtractPairId, FastqPairReader, makeFastqPairReader } from "./paired";
export type { FastqPairReaderOptions, FastqRecord, FastqRecordPair } from "../../types";
