/**
 * Aligned-segment filtering by mapping quality and SAM flags
 *
 * A segment is kept when all of these hold:
 * - its mapping quality is at least the threshold
 * - its flag contains every bit of at least one include mask
 * - its flag shares no bit with any exclude mask
 *
 * The include test is a submask test, not an overlap test: include mask 99
 * (paired, proper pair, mate reverse, first in pair) keeps flag 99 and
 * flag 1123 (99 plus duplicate) but not flag 97, which lacks the proper
 * pair bit.
 */

import { ValidationError } from "../errors";
import type { AlignedSegment, SegmentFilterCriteria } from "../types";

/**
 * Whether `flag` contains every bit of `mask`
 */
export function matchesFlagMask(flag: number, mask: number): boolean {
  return (flag & mask) === mask;
}

function assertSegmentFields(segment: AlignedSegment, index: number): void {
  if (typeof segment.mappingQuality !== "number" || typeof segment.flag !== "number") {
    throw new ValidationError(
      `Aligned segment ${index} must expose numeric mappingQuality and flag`,
      undefined,
      `mappingQuality=${String(segment.mappingQuality)}, flag=${String(segment.flag)}`
    );
  }
}

/**
 * Check one segment against the filter criteria
 *
 * An empty include list rejects everything; an empty exclude list rejects
 * nothing.
 */
export function segmentPassesFilter(
  segment: AlignedSegment,
  criteria: SegmentFilterCriteria
): boolean {
  if (segment.mappingQuality < criteria.quality) {
    return false;
  }
  if (!criteria.includeFlags.some((mask) => matchesFlagMask(segment.flag, mask))) {
    return false;
  }
  return criteria.excludeFlags.every((mask) => (segment.flag & mask) === 0);
}

/**
 * Filter aligned segments using SAM flags and mapping quality
 *
 * Returns the kept segments in input order; the records themselves are
 * neither copied nor modified.
 *
 * @throws {ValidationError} At the first segment lacking numeric `mappingQuality` or `flag`
 *
 * @example
 * ```typescript
 * const kept = filterAlignedSegments(reads, {
 *   includeFlags: PROPER_PAIR_INCLUDE_FLAGS,
 *   excludeFlags: UNMAPPED_EXCLUDE_FLAGS,
 *   quality: 30,
 * });
 * ```
 */
export function filterAlignedSegments<T extends AlignedSegment>(
  alignedSegments: Iterable<T>,
  criteria: SegmentFilterCriteria
): T[] {
  const kept: T[] = [];
  let seen = 0;

  for (const segment of alignedSegments) {
    assertSegmentFields(segment, seen);
    seen++;
    if (segmentPassesFilter(segment, criteria)) {
      kept.push(segment);
    }
  }

  if (criteria.verbose === true) {
    const report =
      criteria.onDiagnostic ??
      ((message: string): void => {
        console.error(message);
      });
    report(describeFilterRun(kept.length, seen, criteria));
  }

  return kept;
}

/**
 * Streaming counterpart of `filterAlignedSegments`
 *
 * @example
 * ```typescript
 * const filter = new AlignedSegmentFilter({ includeFlags: [99, 163], excludeFlags: [4, 8], quality: 20 });
 * for await (const read of filter.process(alignmentSource)) {
 *   tally(read);
 * }
 * ```
 */
export class AlignedSegmentFilter {
  constructor(private readonly criteria: SegmentFilterCriteria) {}

  /**
   * @yields Segments that pass, in input order
   */
  async *process<T extends AlignedSegment>(
    source: Iterable<T> | AsyncIterable<T>
  ): AsyncGenerator<T> {
    let seen = 0;
    let kept = 0;

    for await (const segment of source) {
      assertSegmentFields(segment, seen);
      seen++;
      if (segmentPassesFilter(segment, this.criteria)) {
        kept++;
        yield segment;
      }
    }

    if (this.criteria.verbose === true) {
      const report =
        this.criteria.onDiagnostic ??
        ((message: string): void => {
          console.error(message);
        });
      report(describeFilterRun(kept, seen, this.criteria));
    }
  }
}

function describeFilterRun(kept: number, seen: number, criteria: SegmentFilterCriteria): string {
  return (
    `kept ${kept} of ${seen} aligned segments ` +
    `(quality >= ${criteria.quality}, include [${criteria.includeFlags.join(", ")}], ` +
    `exclude [${criteria.excludeFlags.join(", ")}])`
  );
}
