/**
 * Sample Files
 *
 * ARCHITECTURE: Reads recorded samples from YAML or JSON documents
 * Pattern: Parse → validate each entry → Result, never a cast
 *
 * Accepted shapes:
 *   - [{ timestamp, motion_state }, ...]
 *   - { samples: [{ timestamp, motion_state }, ...] }
 *
 * `timestamp` is an ISO-8601 string or epoch seconds.
 */

import { promises as fs } from 'node:fs';
import { compareAsc, fromUnixTime, isValid, parseISO } from 'date-fns';
import { parse as parseYaml } from 'yaml';
import type { Result, SourceError } from '../types/index.js';
import { Ok, Err } from '../types/index.js';
import type { MotionState, Sample } from '../types/timeline.js';
import { MOTION_STATES } from '../types/timeline.js';

export const SAMPLE_FILE_EXTENSIONS: readonly string[] = ['.yaml', '.yml', '.json'];

export function isSampleFile(path: string): boolean {
  return SAMPLE_FILE_EXTENSIONS.some((extension) => path.endsWith(extension));
}

function isMotionState(value: unknown): value is MotionState {
  return MOTION_STATES.some((state) => state === value);
}

function parseTimestamp(value: unknown): Date | undefined {
  if (typeof value === 'number') {
    const date = fromUnixTime(value);
    return isValid(date) ? date : undefined;
  }
  if (typeof value === 'string') {
    const date = parseISO(value);
    return isValid(date) ? date : undefined;
  }
  if (value instanceof Date && isValid(value)) {
    return value;
  }
  return undefined;
}

/**
 * Validate one raw entry
 */
export function parseSample(raw: unknown, index: number): Result<Sample, SourceError> {
  if (typeof raw !== 'object' || raw === null) {
    return Err({ type: 'invalid_sample', message: 'Sample must be a mapping', index });
  }

  const timestamp = parseTimestamp(Reflect.get(raw, 'timestamp'));
  if (!timestamp) {
    return Err({ type: 'invalid_sample', message: 'Sample has no valid timestamp', index });
  }

  const motionState: unknown = Reflect.get(raw, 'motion_state');
  if (!isMotionState(motionState)) {
    return Err({
      type: 'invalid_sample',
      message: `motion_state must be one of ${MOTION_STATES.join(', ')}`,
      index,
    });
  }

  return Ok({ timestamp, motionState });
}

/**
 * Validate a parsed document into chronologically ordered samples
 */
export function parseSamples(document: unknown): Result<Sample[], SourceError> {
  const entries: unknown =
    typeof document === 'object' && document !== null && !Array.isArray(document)
      ? Reflect.get(document, 'samples')
      : document;

  if (!Array.isArray(entries)) {
    return Err({ type: 'invalid_sample', message: 'Expected a list of samples', index: -1 });
  }

  const list: readonly unknown[] = entries;
  const samples: Sample[] = [];
  for (const [index, entry] of list.entries()) {
    const result = parseSample(entry, index);
    if (!result.ok) return result;

    const previous = samples[samples.length - 1];
    if (previous && compareAsc(previous.timestamp, result.value.timestamp) > 0) {
      return Err({ type: 'invalid_sample', message: 'Samples must be in chronological order', index });
    }
    samples.push(result.value);
  }

  return Ok(samples);
}

/**
 * Read a samples file from disk
 */
export async function readSamplesFile(path: string): Promise<Result<Sample[], SourceError>> {
  let content: string;
  try {
    content = await fs.readFile(path, 'utf-8');
  } catch (error) {
    return Err({
      type: 'read_error',
      message: `Failed to read samples: ${error instanceof Error ? error.message : 'Unknown error'}`,
      path,
    });
  }

  let document: unknown;
  try {
    document = parseYaml(content);
  } catch (error) {
    return Err({
      type: 'parse_error',
      message: `Failed to parse samples: ${error instanceof Error ? error.message : 'Unknown error'}`,
      path,
    });
  }

  return parseSamples(document);
}
