/**
 * Sample Directory Follower
 *
 * ARCHITECTURE: Watches a directory for sample files and replays them into a consumer
 * Pattern: Single serial queue, one file at a time in filename order
 *
 * The engine needs samples delivered one at a time; this is the single writer
 * that serializes files arriving concurrently.
 */

import { watch } from 'chokidar';
import { promises as fs } from 'node:fs';
import { basename, join } from 'node:path';
import type { SourceError } from '../types/index.js';
import type { Sample } from '../types/timeline.js';
import { isSampleFile, readSamplesFile } from './sample-file.js';

export interface FollowerConfig {
  readonly dir: string;
  /** Wait for writes to settle before reading a new file (ms) */
  readonly stabilityThresholdMs: number;
}

export interface FollowerHandlers {
  readonly onSample: (sample: Sample, file: string) => void;
  readonly onError?: (error: SourceError) => void;
}

export interface Follower {
  /** Resolves once the watcher is running and the initial directory scan has been queued */
  readonly ready: Promise<void>;
  /** Resolves when every queued file has been delivered */
  idle(): Promise<void>;
  close(): Promise<void>;
}

export const DEFAULT_STABILITY_THRESHOLD_MS = 100;

function reportError(handlers: FollowerHandlers, error: SourceError): void {
  if (handlers.onError) {
    handlers.onError(error);
    return;
  }
  console.error(`[follower] ${error.message}`);
}

/**
 * Follow a directory of sample files
 */
export function followSamples(config: FollowerConfig, handlers: FollowerHandlers): Follower {
  const seen = new Set<string>();
  let queue: Promise<void> = Promise.resolve();

  const deliver = async (path: string): Promise<void> => {
    const result = await readSamplesFile(path);
    if (!result.ok) {
      reportError(handlers, result.error);
      return;
    }
    const file = basename(path);
    for (const sample of result.value) {
      handlers.onSample(sample, file);
    }
  };

  const enqueue = (path: string): void => {
    if (seen.has(path) || !isSampleFile(path)) return;
    seen.add(path);
    queue = queue.then(() => deliver(path)).catch((error: unknown) => {
      console.error(`[follower] Failed to deliver ${path}: ${error instanceof Error ? error.message : 'Unknown error'}`);
    });
  };

  const watcher = watch(config.dir, {
    ignoreInitial: true,
    depth: 0,
    awaitWriteFinish: {
      stabilityThreshold: config.stabilityThresholdMs,
      pollInterval: 50,
    },
  });
  watcher.on('add', enqueue);
  watcher.on('error', (error: unknown) => {
    reportError(handlers, {
      type: 'read_error',
      message: `Failed to watch samples directory: ${error instanceof Error ? error.message : 'Unknown error'}`,
      path: config.dir,
    });
  });
  const watching = new Promise<void>((resolve) => {
    watcher.once('ready', () => resolve());
  });

  // existing files first, in filename order
  const scanned = fs.readdir(config.dir).then(
    (files) => {
      for (const file of [...files].sort()) {
        enqueue(join(config.dir, file));
      }
    },
    (error: unknown) => {
      reportError(handlers, {
        type: 'read_error',
        message: `Failed to list samples directory: ${error instanceof Error ? error.message : 'Unknown error'}`,
        path: config.dir,
      });
    }
  );

  return {
    ready: Promise.all([scanned, watching]).then(() => undefined),
    idle: async () => {
      await scanned;
      await queue;
    },
    close: async () => {
      await watcher.close();
      await scanned;
      await queue;
    },
  };
}
