/**
 * Scoring Policy
 *
 * ARCHITECTURE: The engine only consumes ordinal verdicts; the formulas live here
 * Pattern: Interface for injection, duration-based default implementation
 *
 * Keepness levels (default policy):
 *   0 - invalid: shorter than minValidDuration, most likely noise
 *   1 - valid: real but too short to anchor the timeline
 *   2 - keeper: long enough for its kind to be worth keeping
 */

import type { MergeParties, Segment, SegmentKind, SegmentRecord } from '../types/timeline.js';
import { MergeScore } from '../types/timeline.js';
import { continuesOn, durationSeconds, refreshExtent } from './segment.js';

export interface ScoringPolicy {
  isWorthKeeping(segment: Segment): boolean;
  keepnessScore(segment: Segment): number;
  score(parties: MergeParties): MergeScore;
  /**
   * Clean up boundary samples before scoring. May move samples between
   * `segment` and its active predecessor; both must stay non-empty.
   */
  sanitizeEdges(segment: SegmentRecord, previous: SegmentRecord | undefined): void;
}

export interface DefaultScoringOptions {
  /** Seconds below which a segment is treated as noise */
  readonly minValidDuration: number;
  /** Seconds a segment of each kind needs to be worth keeping */
  readonly minKeeperDuration: Readonly<Record<SegmentKind, number>>;
}

export const DEFAULT_SCORING_OPTIONS: DefaultScoringOptions = {
  minValidDuration: 10,
  minKeeperDuration: {
    path: 60,
    visit: 120,
  },
};

export const KEEPNESS_INVALID = 0;
export const KEEPNESS_VALID = 1;
export const KEEPNESS_KEEPER = 2;

export class DefaultScoringPolicy implements ScoringPolicy {
  private readonly options: DefaultScoringOptions;

  constructor(options: Partial<DefaultScoringOptions> = {}) {
    this.options = { ...DEFAULT_SCORING_OPTIONS, ...options };
  }

  keepnessScore(segment: Segment): number {
    const duration = durationSeconds(segment);
    if (duration >= this.options.minKeeperDuration[segment.kind]) {
      return KEEPNESS_KEEPER;
    }
    if (duration >= this.options.minValidDuration) {
      return KEEPNESS_VALID;
    }
    return KEEPNESS_INVALID;
  }

  isWorthKeeping(segment: Segment): boolean {
    return this.keepnessScore(segment) >= KEEPNESS_KEEPER;
  }

  score({ keeper, deadman, betweener }: MergeParties): MergeScore {
    const keeperKeepness = this.keepnessScore(keeper);
    const deadmanKeepness = this.keepnessScore(deadman);

    // never let a weaker segment swallow a stronger one
    if (deadmanKeepness > keeperKeepness) {
      return MergeScore.impossible;
    }

    if (betweener) {
      const betweenerKeepness = this.keepnessScore(betweener);
      if (betweenerKeepness >= Math.min(keeperKeepness, deadmanKeepness)) {
        return MergeScore.impossible;
      }
      // a bridge only makes sense between two halves of the same thing
      return keeper.kind === deadman.kind ? MergeScore.high : MergeScore.impossible;
    }

    if (keeper.kind === deadman.kind) {
      return MergeScore.perfect;
    }
    if (deadmanKeepness === KEEPNESS_INVALID) {
      return MergeScore.high;
    }
    if (keeperKeepness >= KEEPNESS_KEEPER && deadmanKeepness >= KEEPNESS_KEEPER) {
      return MergeScore.impossible;
    }
    if (keeperKeepness >= KEEPNESS_KEEPER) {
      return MergeScore.medium;
    }
    return MergeScore.low;
  }

  sanitizeEdges(segment: SegmentRecord, previous: SegmentRecord | undefined): void {
    if (!previous) return;

    let moved = 0;
    let first = segment.samples[0];
    while (
      first &&
      segment.samples.length > 1 &&
      !continuesOn(segment.kind, first.motionState) &&
      continuesOn(previous.kind, first.motionState)
    ) {
      segment.samples.shift();
      previous.samples.push(first);
      moved++;
      first = segment.samples[0];
    }

    if (moved > 0) {
      refreshExtent(segment);
      refreshExtent(previous);
    }
  }
}
