/**
 * Shared test fixtures: timestamps, samples, hand-built chains and a scripted scoring policy
 */

import type { MergeParties, MotionState, Sample, Segment, SegmentKind, SegmentRecord } from '../types/timeline.js';
import { MergeScore } from '../types/timeline.js';
import type { ScoringPolicy } from '../timeline/scoring.js';
import { SegmentChain } from '../timeline/chain.js';

export const BASE_TIME = new Date('2024-03-01T08:00:00.000Z');

/**
 * Timestamp `seconds` after BASE_TIME
 */
export function at(seconds: number): Date {
  return new Date(BASE_TIME.getTime() + seconds * 1000);
}

/**
 * Seconds between BASE_TIME and a timestamp
 */
export function secondsOf(date: Date): number {
  return (date.getTime() - BASE_TIME.getTime()) / 1000;
}

export function sample(seconds: number, motionState: MotionState): Sample {
  return { timestamp: at(seconds), motionState };
}

export function sequentialIds(prefix = 'seg'): () => string {
  let counter = 0;
  return () => `${prefix}-${++counter}`;
}

export interface SegmentSpec {
  readonly id: string;
  readonly kind: SegmentKind;
  readonly at: readonly number[];
}

/**
 * Build an active chain from specs, oldest first. Every segment but the last is closed.
 */
export function buildChain(specs: readonly SegmentSpec[]): SegmentChain {
  const chain = new SegmentChain();
  specs.forEach((spec, index) => {
    const motionState: MotionState = spec.kind === 'visit' ? 'stationary' : 'moving';
    const samples = spec.at.map((seconds) => sample(seconds, motionState));
    const first = samples[0];
    const last = samples[samples.length - 1];
    if (!first || !last) {
      throw new Error(`Segment ${spec.id} needs at least one sample`);
    }
    const record: SegmentRecord = {
      id: spec.id,
      kind: spec.kind,
      start: first.timestamp,
      end: index === specs.length - 1 ? undefined : last.timestamp,
      samples,
      previous: undefined,
      next: undefined,
    };
    chain.append(record);
  });
  return chain;
}

export function ids(segments: readonly Segment[]): string[] {
  return segments.map((segment) => segment.id);
}

/**
 * Policy driven by lookup tables so tests control every verdict
 */
export class ScriptedPolicy implements ScoringPolicy {
  readonly sanitized: string[] = [];
  private readonly keepness: (segment: Segment) => number;
  private readonly scorer: (parties: MergeParties) => MergeScore;

  constructor(options: {
    keepness?: (segment: Segment) => number;
    score?: (parties: MergeParties) => MergeScore;
  } = {}) {
    this.keepness = options.keepness ?? (() => 2);
    this.scorer = options.score ?? (() => MergeScore.impossible);
  }

  keepnessScore(segment: Segment): number {
    return this.keepness(segment);
  }

  isWorthKeeping(segment: Segment): boolean {
    return this.keepness(segment) >= 2;
  }

  score(parties: MergeParties): MergeScore {
    return this.scorer(parties);
  }

  sanitizeEdges(segment: SegmentRecord): void {
    this.sanitized.push(segment.id);
  }
}

/**
 * Keepness looked up by segment id, defaulting to keeper
 */
export function keepnessById(table: Readonly<Record<string, number>>): (segment: Segment) => number {
  return (segment) => table[segment.id] ?? 2;
}
