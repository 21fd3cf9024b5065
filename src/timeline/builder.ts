/**
 * Segment Builder
 *
 * ARCHITECTURE: Decides continuation vs. a new segment for each incoming sample
 * Pattern: Rate limit → continue current if compatible → otherwise open a new segment
 *
 * Spacing is measured on sample timestamps, so replays behave the same as live input.
 */

import { differenceInMilliseconds } from 'date-fns';
import type { Sample, SegmentRecord } from '../types/timeline.js';
import type { SegmentChain } from './chain.js';
import { closeSegment, continuesOn, createSegment } from './segment.js';

export type Placement =
  | { readonly accepted: false }
  | { readonly accepted: true; readonly created: SegmentRecord | undefined };

/**
 * Minimum milliseconds between accepted samples
 */
export function minimumSpacingMs(samplesPerMinute: number): number {
  return 60_000 / samplesPerMinute;
}

export class SegmentBuilder {
  private readonly chain: SegmentChain;
  private readonly newId: () => string;
  private lastAccepted: Date | undefined;

  constructor(chain: SegmentChain, newId: () => string) {
    this.chain = chain;
    this.newId = newId;
  }

  /**
   * The open segment still receiving samples, if any
   */
  current(): SegmentRecord | undefined {
    const newest = this.chain.last();
    return newest && newest.end === undefined ? newest : undefined;
  }

  isTooSoon(sample: Sample, samplesPerMinute: number): boolean {
    if (!this.lastAccepted) return false;
    return differenceInMilliseconds(sample.timestamp, this.lastAccepted) < minimumSpacingMs(samplesPerMinute);
  }

  /**
   * Append the sample to the current segment, or open a new one after it
   */
  place(sample: Sample, samplesPerMinute: number): Placement {
    // don't record too soon
    if (this.isTooSoon(sample, samplesPerMinute)) {
      return { accepted: false };
    }
    this.lastAccepted = sample.timestamp;

    const current = this.current();
    if (current && continuesOn(current.kind, sample.motionState)) {
      current.samples.push(sample);
      return { accepted: true, created: undefined };
    }

    // switched between path and visit (or first sample)
    if (current) {
      closeSegment(current);
    }
    const segment = createSegment(this.newId(), sample);
    this.chain.append(segment);

    return { accepted: true, created: segment };
  }
}
