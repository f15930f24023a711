/**
 * Record-level operations: aligned-read filtering and sequence complements
 */

export { complement, reverse, reverseComplement } from "./core/sequence-manipulation";
export {
  AlignedSegmentFilter,
  filterAlignedSegments,
  matchesFlagMask,
  segmentPassesFilter,
} from "./filter";
