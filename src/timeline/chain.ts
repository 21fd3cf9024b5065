/**
 * Segment Chain
 *
 * ARCHITECTURE: Arena of segments keyed by id, split into two tiers
 * Pattern: Active tier is mutable and ordered; finalized tier holds frozen copies
 *
 *   active     - still revisable by consolidation, ascending by start
 *   finalized  - settled history, only ever appended to or expired
 *
 * Links are ids. Detaching a segment splices its neighbours together, but
 * never touches a finalized segment.
 */

import { compareAsc } from 'date-fns';
import type { Segment, SegmentRecord } from '../types/timeline.js';
import { TimelineInvariantError } from '../types/index.js';
import { freezeSegment, snapshotSegment } from './segment.js';

export class SegmentChain {
  private readonly active = new Map<string, SegmentRecord>();
  private order: string[] = [];
  private finalized: Segment[] = [];
  private readonly finalizedIds = new Set<string>();

  get activeCount(): number {
    return this.order.length;
  }

  get finalizedCount(): number {
    return this.finalized.length;
  }

  get(id: string | undefined): SegmentRecord | undefined {
    return id === undefined ? undefined : this.active.get(id);
  }

  require(id: string): SegmentRecord {
    const segment = this.active.get(id);
    if (!segment) {
      throw new TimelineInvariantError('unknown_segment', `Segment ${id} is not in the active set`);
    }
    return segment;
  }

  /**
   * Resolve an id in either tier
   */
  lookup(id: string | undefined): Segment | undefined {
    if (id === undefined) return undefined;
    return this.active.get(id) ?? this.finalized.find((s) => s.id === id);
  }

  isFinalized(id: string): boolean {
    return this.finalizedIds.has(id);
  }

  last(): SegmentRecord | undefined {
    return this.get(this.order[this.order.length - 1]);
  }

  /**
   * Active segments in ascending order (live records, engine use only)
   */
  records(): SegmentRecord[] {
    return this.order.map((id) => this.require(id));
  }

  /**
   * Previous neighbour, provided it is still in the active tier
   */
  activePrevious(segment: Segment): SegmentRecord | undefined {
    return this.get(segment.previous);
  }

  /**
   * Append a new segment after the newest active one and link them
   */
  append(segment: SegmentRecord): void {
    if (this.active.has(segment.id) || this.finalizedIds.has(segment.id)) {
      throw new TimelineInvariantError('duplicate_segment', `Segment ${segment.id} already exists`);
    }

    const tail = this.last();
    if (tail) {
      tail.next = segment.id;
      segment.previous = tail.id;
    }

    this.active.set(segment.id, segment);
    this.order.push(segment.id);
  }

  /**
   * Remove an active segment, splicing its active neighbours together
   */
  detach(id: string): void {
    const segment = this.require(id);

    const previous = this.get(segment.previous);
    const next = this.get(segment.next);
    if (previous) previous.next = segment.next;
    if (next) next.previous = segment.previous;

    this.active.delete(id);
    this.order = this.order.filter((other) => other !== id);
  }

  /**
   * Move the oldest `count` active segments to the finalized tier
   */
  promoteOldest(count: number): Segment[] {
    const ids = this.order.slice(0, count);
    const promoted = ids.map((id) => freezeSegment(this.require(id)));

    for (const segment of promoted) {
      this.active.delete(segment.id);
      this.finalizedIds.add(segment.id);
    }
    this.order = this.order.slice(ids.length);
    this.finalized = [...this.finalized, ...promoted];

    return promoted;
  }

  /**
   * Drop finalized segments matching the predicate
   */
  discardFinalized(predicate: (segment: Segment) => boolean): Segment[] {
    const discarded = this.finalized.filter(predicate);
    if (discarded.length === 0) return [];

    for (const segment of discarded) {
      this.finalizedIds.delete(segment.id);
    }
    this.finalized = this.finalized.filter((segment) => this.finalizedIds.has(segment.id));

    return discarded;
  }

  /**
   * Frozen copies of the finalized tier; Date fields are copied too, since freezing does not reach them
   */
  finalizedSegments(): readonly Segment[] {
    return this.finalized.map(freezeSegment);
  }

  activeSnapshot(): Segment[] {
    return this.records().map(snapshotSegment);
  }

  /**
   * Verify ordering, link mirroring, single current and tier separation
   */
  assertIntegrity(): void {
    const records = this.records();

    if (this.active.size !== records.length) {
      throw new TimelineInvariantError(
        'chain_link',
        `Active index holds ${this.active.size} segments but order lists ${records.length}`
      );
    }

    records.forEach((segment, index) => {
      if (this.finalizedIds.has(segment.id)) {
        throw new TimelineInvariantError('duplicate_segment', `Segment ${segment.id} is both active and finalized`);
      }

      if (segment.end === undefined && index !== records.length - 1) {
        throw new TimelineInvariantError('multiple_current', `Open segment ${segment.id} is not the newest`);
      }

      const before = records[index - 1];
      if (!before) {
        if (this.active.has(segment.previous ?? '')) {
          throw new TimelineInvariantError('chain_cycle', `Oldest segment ${segment.id} links back into the active set`);
        }
        return;
      }

      if (compareAsc(before.start, segment.start) > 0) {
        throw new TimelineInvariantError('chain_order', `Segment ${segment.id} starts before ${before.id}`);
      }
      if (before.next !== segment.id || segment.previous !== before.id) {
        throw new TimelineInvariantError('chain_link', `Segments ${before.id} and ${segment.id} are not linked`);
      }
    });

    const newest = records[records.length - 1];
    if (newest && newest.next !== undefined) {
      throw new TimelineInvariantError('chain_link', `Newest segment ${newest.id} links forward to ${newest.next}`);
    }

    // walking back from the newest must visit each active segment exactly once
    const seen = new Set<string>();
    let cursor = newest;
    while (cursor) {
      if (seen.has(cursor.id)) {
        throw new TimelineInvariantError('chain_cycle', `Segment ${cursor.id} is reachable twice`);
      }
      seen.add(cursor.id);
      cursor = this.get(cursor.previous);
    }
    if (seen.size !== records.length) {
      throw new TimelineInvariantError('chain_link', `Chain reaches ${seen.size} of ${records.length} active segments`);
    }
  }
}
