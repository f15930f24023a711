/**
 * SAM FLAG bits
 *
 * Bit meanings from the SAM specification, plus the flag combinations
 * ATAC-seq filtering usually works with.
 */

export const SamFlag = {
  /** read paired in sequencing */
  PAIRED: 0x1,
  /** mapped in a proper pair */
  PROPER_PAIR: 0x2,
  /** read unmapped */
  UNMAPPED: 0x4,
  /** mate unmapped */
  MATE_UNMAPPED: 0x8,
  /** read on the reverse strand */
  REVERSE: 0x10,
  /** mate on the reverse strand */
  MATE_REVERSE: 0x20,
  /** first in pair */
  READ1: 0x40,
  /** second in pair */
  READ2: 0x80,
  /** not the primary alignment */
  SECONDARY: 0x100,
  /** failed platform/vendor quality checks */
  QC_FAIL: 0x200,
  /** PCR or optical duplicate */
  DUPLICATE: 0x400,
  /** supplementary alignment */
  SUPPLEMENTARY: 0x800,
} as const;

/**
 * Properly paired, mapped segments
 *
 * - 83: paired, proper pair, read reverse, first in pair
 * - 99: paired, proper pair, mate reverse, first in pair
 * - 147: paired, proper pair, read reverse, second in pair
 * - 163: paired, proper pair, mate reverse, second in pair
 */
export const PROPER_PAIR_INCLUDE_FLAGS: readonly number[] = [83, 99, 147, 163];

/**
 * Read unmapped (4) or mate unmapped (8)
 */
export const UNMAPPED_EXCLUDE_FLAGS: readonly number[] = [
  SamFlag.UNMAPPED,
  SamFlag.MATE_UNMAPPED,
];

/**
 * Decode SAM flag into human-readable components
 */
export function decodeFlag(flag: number): {
  isPaired: boolean;
  isProperPair: boolean;
  isUnmapped: boolean;
  isMateUnmapped: boolean;
  isReverse: boolean;
  isMateReverse: boolean;
  isFirstInPair: boolean;
  isSecondInPair: boolean;
  isSecondary: boolean;
  isQCFail: boolean;
  isDuplicate: boolean;
  isSupplementary: boolean;
} {
  return {
    isPaired: (flag & SamFlag.PAIRED) !== 0,
    isProperPair: (flag & SamFlag.PROPER_PAIR) !== 0,
    isUnmapped: (flag & SamFlag.UNMAPPED) !== 0,
    isMateUnmapped: (flag & SamFlag.MATE_UNMAPPED) !== 0,
    isReverse: (flag & SamFlag.REVERSE) !== 0,
    isMateReverse: (flag & SamFlag.MATE_REVERSE) !== 0,
    isFirstInPair: (flag & SamFlag.READ1) !== 0,
    isSecondInPair: (flag & SamFlag.READ2) !== 0,
    isSecondary: (flag & SamFlag.SECONDARY) !== 0,
    isQCFail: (flag & SamFlag.QC_FAIL) !== 0,
    isDuplicate: (flag & SamFlag.DUPLICATE) !== 0,
    isSupplementary: (flag & SamFlag.SUPPLEMENTARY) !== 0,
  };
}
