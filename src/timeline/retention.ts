/**
 * Retention Manager
 *
 * ARCHITECTURE: Two-tier housekeeping run after every consolidation pass
 * Pattern: Criteria-based promotion, age-based expiry
 *
 * Promotion: everything older than the second-newest worth-keeping segment is
 * settled. The current segment and the keeper before it stay revisable, since
 * a later sample or merge may still move their shared boundary.
 *
 * Expiry: finalized segments whose end is older than the retention window
 * are dropped for good.
 */

import { differenceInMilliseconds } from 'date-fns';
import type { Segment } from '../types/timeline.js';
import { TimelineInvariantError } from '../types/index.js';
import { debugLog } from '../debug.js';
import type { SegmentChain } from './chain.js';
import type { ScoringPolicy } from './scoring.js';

/**
 * Number of keepers, counted from the newest, that stay in the active tier
 */
export const ACTIVE_KEEPER_COUNT = 2;

/**
 * Move settled segments from the active tier to the finalized tier
 */
export function promoteSettled(chain: SegmentChain, policy: ScoringPolicy): Segment[] {
  const records = chain.records();
  let keeperCount = 0;

  for (let index = records.length - 1; index >= 0; index--) {
    const segment = records[index];
    if (segment && policy.isWorthKeeping(segment)) {
      keeperCount++;
    }
    if (keeperCount === ACTIVE_KEEPER_COUNT) {
      if (index === 0) {
        return [];
      }
      const promoted = chain.promoteOldest(index);
      debugLog('retention', `Finalised ${promoted.length} timeline segment(s).`);
      return promoted;
    }
  }

  return [];
}

/**
 * Whether a finalized segment has outlived the retention window
 */
export function isExpired(segment: Segment, retentionSeconds: number, now: Date): boolean {
  if (segment.end === undefined) {
    throw new TimelineInvariantError('open_finalized', `Finalized segment ${segment.id} has no end`);
  }
  return differenceInMilliseconds(now, segment.end) > retentionSeconds * 1000;
}

/**
 * Discard finalized segments whose end is older than the retention window
 */
export function expireOld(chain: SegmentChain, retentionSeconds: number, now: Date): Segment[] {
  const discarded = chain.discardFinalized((segment) => isExpired(segment, retentionSeconds, now));
  if (discarded.length > 0) {
    debugLog('retention', `Released ${discarded.length} historical timeline segment(s).`);
  }
  return discarded;
}
