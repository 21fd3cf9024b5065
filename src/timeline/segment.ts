/**
 * Segment helpers
 *
 * ARCHITECTURE: Plain records plus pure helpers, no class hierarchy
 * Pattern: Continuation is a table lookup on the segment kind
 */

import { compareAsc, differenceInMilliseconds } from 'date-fns';
import type { MotionState, Sample, Segment, SegmentKind, SegmentRecord } from '../types/timeline.js';
import { CONTINUES_ON } from '../types/timeline.js';

/**
 * Kind of segment a sample opens
 */
export function kindForMotion(motionState: MotionState): SegmentKind {
  return motionState === 'stationary' ? 'visit' : 'path';
}

/**
 * Whether a segment of this kind continues on a sample in this motion state
 */
export function continuesOn(kind: SegmentKind, motionState: MotionState): boolean {
  return CONTINUES_ON[kind].has(motionState);
}

export function createSegment(id: string, sample: Sample): SegmentRecord {
  return {
    id,
    kind: kindForMotion(sample.motionState),
    start: sample.timestamp,
    end: undefined,
    samples: [sample],
    previous: undefined,
    next: undefined,
  };
}

export function lastSample(segment: Segment): Sample | undefined {
  return segment.samples[segment.samples.length - 1];
}

/**
 * Close an open segment at its last sample
 */
export function closeSegment(segment: SegmentRecord): void {
  if (segment.end !== undefined) return;
  segment.end = lastSample(segment)?.timestamp ?? segment.start;
}

/**
 * Seconds covered by a segment's samples (an open segment is measured up to its last sample)
 */
export function durationSeconds(segment: Segment): number {
  const until = segment.end ?? lastSample(segment)?.timestamp ?? segment.start;
  return differenceInMilliseconds(until, segment.start) / 1000;
}

/**
 * Stable chronological merge of sample runs
 */
export function mergeSamples(...runs: ReadonlyArray<readonly Sample[]>): Sample[] {
  return runs.flat().sort((a, b) => compareAsc(a.timestamp, b.timestamp));
}

/**
 * Re-derive start (and end, for closed segments) from the samples after they were moved around
 */
export function refreshExtent(segment: SegmentRecord): void {
  const first = segment.samples[0];
  if (!first) return;
  segment.start = first.timestamp;
  if (segment.end !== undefined) {
    segment.end = lastSample(segment)?.timestamp ?? segment.end;
  }
}

/**
 * Detached copy for read-only snapshots
 */
export function snapshotSegment(segment: Segment): Segment {
  return {
    ...segment,
    start: new Date(segment.start),
    end: segment.end && new Date(segment.end),
    samples: segment.samples.map((sample) => ({ ...sample, timestamp: new Date(sample.timestamp) })),
  };
}

/**
 * Deeply frozen copy for the finalized store
 */
export function freezeSegment(segment: Segment): Segment {
  const copy = snapshotSegment(segment);
  return Object.freeze({ ...copy, samples: Object.freeze(copy.samples.map((sample) => Object.freeze(sample))) });
}
