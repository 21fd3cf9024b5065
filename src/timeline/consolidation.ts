/**
 * Consolidation Engine
 *
 * ARCHITECTURE: Greedy merge loop over the active tier
 * Pattern: Generate candidates → pick best → apply → repeat until nothing qualifies
 *
 * Each pass walks back from the current segment along `previous` links,
 * proposing pairwise merges in both directions, plus "betweener" merges that
 * bridge a low-keepness segment sandwiched between two stronger ones.
 * The walk stops at the oldest active segment; finalized history is never revisited.
 *
 * Every applied merge removes at least one active segment, so the loop runs
 * at most (active count - 1) times.
 */

import { compareAsc, max, min } from 'date-fns';
import type { MergeCandidate, SegmentRecord } from '../types/timeline.js';
import { MergeScore } from '../types/timeline.js';
import { TimelineInvariantError } from '../types/index.js';
import { debugLog } from '../debug.js';
import type { SegmentChain } from './chain.js';
import type { ScoringPolicy } from './scoring.js';
import { mergeSamples } from './segment.js';

export interface ConsolidationOptions {
  readonly assertInvariants: boolean;
}

function shortId(id: string): string {
  return id.slice(0, 8);
}

export function describeCandidate(candidate: MergeCandidate): string {
  const betweener = candidate.betweener ? ` via ${shortId(candidate.betweener)}` : '';
  return `${shortId(candidate.keeper)} <- ${shortId(candidate.deadman)}${betweener} (score ${candidate.score})`;
}

function proposeMerge(
  policy: ScoringPolicy,
  keeper: SegmentRecord,
  deadman: SegmentRecord,
  betweener?: SegmentRecord
): MergeCandidate {
  const score = policy.score({ keeper, deadman, betweener });
  return betweener
    ? { keeper: keeper.id, deadman: deadman.id, betweener: betweener.id, score }
    : { keeper: keeper.id, deadman: deadman.id, score };
}

/**
 * Collect every candidate merge reachable from the current segment
 */
export function generateCandidates(
  chain: SegmentChain,
  current: SegmentRecord,
  policy: ScoringPolicy
): MergeCandidate[] {
  const candidates: MergeCandidate[] = [];
  let working = current;

  while (true) {
    // clean up edges before any score involving this segment
    policy.sanitizeEdges(working, chain.activePrevious(working));

    const previous = chain.activePrevious(working);
    if (!previous) {
      break;
    }

    candidates.push(proposeMerge(policy, working, previous));
    candidates.push(proposeMerge(policy, previous, working));

    const previousKeepness = policy.keepnessScore(previous);
    if (previousKeepness < policy.keepnessScore(working)) {
      const prevPrev = chain.activePrevious(previous);
      if (prevPrev && policy.keepnessScore(prevPrev) > previousKeepness) {
        candidates.push(proposeMerge(policy, working, prevPrev, previous));
        candidates.push(proposeMerge(policy, prevPrev, working, previous));
      }
    }

    working = previous;
  }

  return candidates;
}

/**
 * Highest scoring candidate, or undefined when none may be applied.
 * Ties go to the earliest generated candidate.
 */
export function selectWinner(candidates: readonly MergeCandidate[]): MergeCandidate | undefined {
  const ranked = [...candidates].sort((a, b) => b.score - a.score);
  const best = ranked[0];
  if (!best || best.score === MergeScore.impossible) {
    return undefined;
  }
  return best;
}

function assertContiguous(keeper: SegmentRecord, deadman: SegmentRecord, betweener?: SegmentRecord): void {
  const adjacent = (a: SegmentRecord, b: SegmentRecord): boolean => a.next === b.id || a.previous === b.id;
  const ok = betweener
    ? adjacent(keeper, betweener) && adjacent(betweener, deadman)
    : adjacent(keeper, deadman);
  if (!ok) {
    throw new TimelineInvariantError(
      'chain_link',
      `Merge of ${deadman.id} into ${keeper.id} spans non-adjacent segments`
    );
  }
}

/**
 * Absorb the deadman (and betweener) into the keeper.
 *
 * @returns ids of the segments that died
 */
export function applyMerge(chain: SegmentChain, candidate: MergeCandidate): string[] {
  if (candidate.score === MergeScore.impossible) {
    throw new TimelineInvariantError('merge_progress', `Refusing impossible merge ${describeCandidate(candidate)}`);
  }

  const keeper = chain.require(candidate.keeper);
  const deadman = chain.require(candidate.deadman);
  const betweener = candidate.betweener === undefined ? undefined : chain.require(candidate.betweener);
  assertContiguous(keeper, deadman, betweener);

  const absorbed = betweener ? [betweener, deadman] : [deadman];
  const parties = [keeper, ...absorbed];

  keeper.samples = mergeSamples(keeper.samples, ...absorbed.map((segment) => segment.samples));
  keeper.start = min(parties.map((segment) => segment.start));

  // absorbing the current segment makes the keeper current
  const ends = parties.map((segment) => segment.end);
  keeper.end = ends.every((end): end is Date => end !== undefined) ? max(ends) : undefined;

  const died = [...absorbed].sort((a, b) => compareAsc(a.start, b.start));
  for (const segment of died) {
    chain.detach(segment.id);
  }

  return died.map((segment) => segment.id);
}

/**
 * Apply the best merge repeatedly until no candidate qualifies.
 *
 * @returns number of merges applied
 */
export function consolidateChain(
  chain: SegmentChain,
  policy: ScoringPolicy,
  options: ConsolidationOptions
): number {
  let merges = 0;

  while (true) {
    // only a keeper current segment may trigger consolidation
    const current = chain.last();
    if (!current || current.end !== undefined || !policy.isWorthKeeping(current)) {
      break;
    }

    const candidates = generateCandidates(chain, current, policy);
    if (candidates.length > 0) {
      debugLog('consolidation', `merges: ${candidates.map(describeCandidate).join(', ')}`);
    }

    const winner = selectWinner(candidates);
    if (!winner) {
      break;
    }

    debugLog('consolidation', `DOING: ${describeCandidate(winner)}`);

    const before = chain.activeCount;
    applyMerge(chain, winner);
    if (chain.activeCount >= before) {
      throw new TimelineInvariantError(
        'merge_progress',
        `Merge ${describeCandidate(winner)} left ${chain.activeCount} active segments (was ${before})`
      );
    }
    merges++;

    if (options.assertInvariants) {
      chain.assertIntegrity();
    }
  }

  return merges;
}
