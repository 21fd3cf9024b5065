/**
 * Segment Builder Tests
 *
 * Rate limiting, classification and chain linking of incoming samples.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { SegmentBuilder, minimumSpacingMs } from '../timeline/builder.js';
import { SegmentChain } from '../timeline/chain.js';
import { at, ids, sample, sequentialIds } from './fixtures.js';

describe('segment-builder', () => {
  let chain: SegmentChain;
  let builder: SegmentBuilder;

  beforeEach(() => {
    chain = new SegmentChain();
    builder = new SegmentBuilder(chain, sequentialIds());
  });

  describe('minimumSpacingMs', () => {
    it('derives spacing from the sample rate', () => {
      expect(minimumSpacingMs(60)).toBe(1000);
      expect(minimumSpacingMs(10)).toBe(6000);
    });
  });

  describe('place', () => {
    it('opens a path for a moving sample', () => {
      const placement = builder.place(sample(0, 'moving'), 60);

      expect(placement).toEqual({ accepted: true, created: chain.get('seg-1') });
      expect(builder.current()?.kind).toBe('path');
      expect(builder.current()?.end).toBeUndefined();
    });

    it('opens a path for an uncertain sample and a visit for a stationary one', () => {
      builder.place(sample(0, 'uncertain'), 60);
      expect(builder.current()?.kind).toBe('path');

      const fresh = new SegmentBuilder(new SegmentChain(), sequentialIds());
      fresh.place(sample(0, 'stationary'), 60);
      expect(fresh.current()?.kind).toBe('visit');
    });

    it('continues a path on moving and uncertain samples', () => {
      builder.place(sample(0, 'moving'), 60);
      const second = builder.place(sample(1, 'uncertain'), 60);
      const third = builder.place(sample(2, 'moving'), 60);

      expect(second).toEqual({ accepted: true, created: undefined });
      expect(third).toEqual({ accepted: true, created: undefined });
      expect(chain.activeCount).toBe(1);
      expect(builder.current()?.samples).toHaveLength(3);
    });

    it('starts a linked visit when a path sees a stationary sample', () => {
      builder.place(sample(0, 'moving'), 60);
      builder.place(sample(1, 'moving'), 60);
      const placement = builder.place(sample(2, 'stationary'), 60);

      expect(placement.accepted && placement.created?.id).toBe('seg-2');
      expect(ids(chain.activeSnapshot())).toEqual(['seg-1', 'seg-2']);

      const path = chain.require('seg-1');
      expect(path.end).toEqual(at(1));
      expect(path.next).toBe('seg-2');
      expect(chain.require('seg-2').previous).toBe('seg-1');
      expect(builder.current()?.id).toBe('seg-2');
    });

    it('ignores samples that arrive sooner than the minimum spacing', () => {
      builder.place(sample(0, 'moving'), 60);

      const early = builder.place({ timestamp: new Date(at(0).getTime() + 500), motionState: 'stationary' }, 60);

      expect(early).toEqual({ accepted: false });
      expect(chain.activeCount).toBe(1);
      expect(builder.current()?.samples).toHaveLength(1);
    });

    it('measures spacing from the last accepted sample', () => {
      builder.place(sample(0, 'moving'), 30);

      expect(builder.place(sample(1, 'moving'), 30)).toEqual({ accepted: false });
      expect(builder.place(sample(2, 'moving'), 30)).toEqual({ accepted: true, created: undefined });
      expect(builder.place(sample(3, 'moving'), 30)).toEqual({ accepted: false });
    });
  });
});
