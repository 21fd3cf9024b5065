/**
 * Wayline - timeline segmentation engine
 *
 * Main exports for programmatic usage
 */

// Types
export type {
  Result,
  TimelineConfig,
  ConfigError,
  SourceError,
  InvariantCode,
} from './types/index.js';

export type {
  MotionState,
  Sample,
  SegmentKind,
  Segment,
  SegmentRecord,
  MergeParties,
  MergeCandidate,
  ConsolidationReport,
  SubmitOutcome,
} from './types/timeline.js';

// Result type constructors and values
export { Ok, Err, type Ok as OkType, type Err as ErrType } from './types/index.js';
export { DEFAULT_TIMELINE_CONFIG, TimelineInvariantError } from './types/index.js';
export { MergeScore, MOTION_STATES, CONTINUES_ON } from './types/timeline.js';

// Engine
export { TimelineManager, type TimelineManagerOptions } from './timeline/manager.js';
export { TimelineEmitter, type TimelineEvents, type TimelineEventName } from './timeline/events.js';
export {
  DefaultScoringPolicy,
  DEFAULT_SCORING_OPTIONS,
  KEEPNESS_INVALID,
  KEEPNESS_VALID,
  KEEPNESS_KEEPER,
  type ScoringPolicy,
  type DefaultScoringOptions,
} from './timeline/scoring.js';
export { SegmentChain } from './timeline/chain.js';
export { SegmentBuilder, minimumSpacingMs, type Placement } from './timeline/builder.js';
export {
  generateCandidates,
  selectWinner,
  applyMerge,
  consolidateChain,
  describeCandidate,
  type ConsolidationOptions,
} from './timeline/consolidation.js';
export { promoteSettled, expireOld, isExpired, ACTIVE_KEEPER_COUNT } from './timeline/retention.js';
export { kindForMotion, continuesOn, durationSeconds } from './timeline/segment.js';

// Sample sources
export { readSamplesFile, parseSamples, parseSample, isSampleFile } from './source/sample-file.js';
export { followSamples, type Follower, type FollowerConfig, type FollowerHandlers } from './source/follower.js';

// Global paths and configuration
export { getGlobalDir, getGlobalConfigPath, readTimelineConfig, writeTimelineConfig } from './paths.js';
