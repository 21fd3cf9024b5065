/**
 * Timeline Types
 *
 * ARCHITECTURE: Segments form a doubly linked chain keyed by id
 * Pattern: previous/next are weak relations (lookup only), ownership stays with the chain
 *
 * Segment kinds:
 * - path: in transit (moving or uncertain samples)
 * - visit: stationary
 */

// ============================================================================
// Samples
// ============================================================================

export type MotionState = 'moving' | 'uncertain' | 'stationary';

export const MOTION_STATES: readonly MotionState[] = ['moving', 'uncertain', 'stationary'];

/**
 * A motion-classified location sample, as delivered by the sample source
 */
export interface Sample {
  readonly timestamp: Date;
  readonly motionState: MotionState;
}

// ============================================================================
// Segments
// ============================================================================

export type SegmentKind = 'path' | 'visit';

/**
 * Which motion states each segment kind keeps absorbing
 */
export const CONTINUES_ON: Readonly<Record<SegmentKind, ReadonlySet<MotionState>>> = {
  path: new Set<MotionState>(['moving', 'uncertain']),
  visit: new Set<MotionState>(['stationary']),
};

/**
 * Mutable segment record held by the active set.
 *
 * `end` stays undefined while the segment is current.
 */
export interface SegmentRecord {
  readonly id: string;
  readonly kind: SegmentKind;
  start: Date;
  end: Date | undefined;
  samples: Sample[];
  previous: string | undefined;
  next: string | undefined;
}

/**
 * Read-only view handed to callers and to the scoring policy
 */
export interface Segment {
  readonly id: string;
  readonly kind: SegmentKind;
  readonly start: Date;
  readonly end: Date | undefined;
  readonly samples: readonly Sample[];
  readonly previous: string | undefined;
  readonly next: string | undefined;
}

// ============================================================================
// Merges
// ============================================================================

/**
 * Ordinal merge quality. `impossible` is the distinguished worst value.
 */
export const MergeScore = {
  impossible: 0,
  veryLow: 1,
  low: 2,
  medium: 3,
  high: 4,
  perfect: 5,
} as const;

export type MergeScore = (typeof MergeScore)[keyof typeof MergeScore];

/**
 * Segments resolved for scoring a candidate merge
 */
export interface MergeParties {
  readonly keeper: Segment;
  readonly deadman: Segment;
  readonly betweener?: Segment;
}

export interface MergeCandidate {
  readonly keeper: string;
  readonly deadman: string;
  readonly betweener?: string;
  readonly score: MergeScore;
}

// ============================================================================
// Processing outcomes
// ============================================================================

export interface ConsolidationReport {
  readonly merges: number;
  readonly promoted: number;
  readonly expired: number;
}

export type SubmitOutcome =
  | { readonly status: 'not_recording' }
  | { readonly status: 'rate_limited' }
  | { readonly status: 'reentrant' }
  | {
      readonly status: 'processed';
      readonly created: boolean;
      readonly report: ConsolidationReport;
    };
