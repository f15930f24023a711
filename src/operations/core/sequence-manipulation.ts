/**
 * Core sequence manipulation operations
 *
 * Complement and reverse complement over the nucleotide alphabet used in
 * ATAC-seq reads: A, C, G, T and N in either case.
 *
 * @module sequence-manipulation
 */

import { SequenceError } from "../../errors";

// =============================================================================
// CONSTANTS
// =============================================================================

/**
 * Nucleotide complement mapping, case preserved
 */
const NUCLEOTIDE_COMPLEMENTS: Readonly<Record<string, string>> = {
  A: "T",
  C: "G",
  G: "C",
  N: "N",
  T: "A",
  a: "t",
  c: "g",
  g: "c",
  n: "n",
  t: "a",
};

// =============================================================================
// EXPORTED FUNCTIONS
// =============================================================================

/**
 * Complement of a nucleic sequence
 *
 * @example
 * ```typescript
 * complement('ACGTN'); // 'TGCAN'
 * complement('acgtn'); // 'tgcan'
 * ```
 *
 * @throws {SequenceError} On any character outside ACGTN/acgtn
 */
export function complement(sequence: string): string {
  let result = "";

  for (let i = 0; i < sequence.length; i++) {
    const base = sequence.charAt(i);
    const comp = NUCLEOTIDE_COMPLEMENTS[base];
    if (comp === undefined) {
      throw new SequenceError(
        `Cannot complement '${base}' at position ${i}: only A, C, G, T and N are recognized`,
        i,
        sequence.length > 50 ? `${sequence.slice(0, 50)}...` : sequence
      );
    }
    result += comp;
  }

  return result;
}

/**
 * Reverse a sequence
 */
export function reverse(sequence: string): string {
  return sequence.split("").reverse().join("");
}

/**
 * Reverse complement: the sequence of the opposite strand, read 5' to 3'
 *
 * @example
 * ```typescript
 * reverseComplement('AACGTn'); // 'nACGTT'
 * ```
 *
 * @throws {SequenceError} On any character outside ACGTN/acgtn
 */
export function reverseComplement(sequence: string): string {
  return reverse(complement(sequence));
}
