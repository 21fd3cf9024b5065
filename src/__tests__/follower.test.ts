/**
 * Sample Follower Tests
 *
 * Delivery order and error reporting for a followed directory.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { followSamples, type Follower } from '../source/follower.js';
import type { SourceError } from '../types/index.js';
import type { Sample } from '../types/timeline.js';

function samplesDocument(entries: ReadonlyArray<readonly [number, string]>): string {
  return JSON.stringify(entries.map(([timestamp, motionState]) => ({ timestamp, motion_state: motionState })));
}

describe('followSamples', () => {
  let testDir: string;
  let follower: Follower | undefined;
  let delivered: Array<{ sample: Sample; file: string }>;
  let errors: SourceError[];

  const start = (dir: string): Follower => {
    follower = followSamples(
      { dir, stabilityThresholdMs: 20 },
      {
        onSample: (sample, file) => delivered.push({ sample, file }),
        onError: (error) => errors.push(error),
      }
    );
    return follower;
  };

  beforeEach(async () => {
    testDir = join(tmpdir(), `wayline-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await fs.mkdir(testDir, { recursive: true });
    delivered = [];
    errors = [];
    follower = undefined;
  });

  afterEach(async () => {
    await follower?.close();
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('delivers existing files in filename order', async () => {
    await fs.writeFile(join(testDir, 'b.json'), samplesDocument([[1709280020, 'stationary']]), 'utf-8');
    await fs.writeFile(
      join(testDir, 'a.json'),
      samplesDocument([
        [1709280000, 'moving'],
        [1709280010, 'moving'],
      ]),
      'utf-8'
    );
    await fs.writeFile(join(testDir, 'notes.txt'), 'not samples', 'utf-8');

    await start(testDir).idle();

    expect(delivered.map((d) => d.file)).toEqual(['a.json', 'a.json', 'b.json']);
    expect(delivered.map((d) => d.sample.motionState)).toEqual(['moving', 'moving', 'stationary']);
    expect(errors).toEqual([]);
  });

  it('reports an invalid file and carries on', async () => {
    await fs.writeFile(join(testDir, 'a.json'), samplesDocument([[1709280000, 'flying']]), 'utf-8');
    await fs.writeFile(join(testDir, 'b.json'), samplesDocument([[1709280010, 'moving']]), 'utf-8');

    await start(testDir).idle();

    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({ type: 'invalid_sample', index: 0 });
    expect(delivered.map((d) => d.file)).toEqual(['b.json']);
  });

  it('reports a directory that cannot be listed', async () => {
    const missing = join(testDir, 'missing');

    await start(missing).idle();

    expect(errors).toEqual([expect.objectContaining({ type: 'read_error', path: missing })]);
  });

  it('picks up files added while following', async () => {
    const running = start(testDir);
    await running.ready;

    await fs.writeFile(join(testDir, 'later.json'), samplesDocument([[1709280000, 'uncertain']]), 'utf-8');

    await vi.waitFor(
      () => {
        expect(delivered).toHaveLength(1);
      },
      { timeout: 5000, interval: 50 }
    );
    expect(delivered[0]?.file).toBe('later.json');
  });
});
