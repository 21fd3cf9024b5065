#!/usr/bin/env node
/**
 * Wayline CLI
 *
 * Usage:
 *   wayline replay <file> [--debug]   - Replay a samples file and print the timeline
 *   wayline follow <dir> [--debug]    - Follow a directory of sample files
 *   wayline config                    - Show the effective configuration
 */

import { format, formatDistanceStrict } from 'date-fns';
import { getGlobalConfigPath, readTimelineConfig } from './paths.js';
import { DEFAULT_STABILITY_THRESHOLD_MS, followSamples } from './source/follower.js';
import { readSamplesFile } from './source/sample-file.js';
import { TimelineManager } from './timeline/manager.js';
import { lastSample } from './timeline/segment.js';
import type { TimelineConfig } from './types/index.js';
import type { Segment, SubmitOutcome } from './types/timeline.js';

const TIME_FORMAT = 'yyyy-MM-dd HH:mm:ss';

function describeSegment(segment: Segment): string {
  const until = segment.end ?? lastSample(segment)?.timestamp ?? segment.start;
  const endLabel = segment.end ? format(segment.end, TIME_FORMAT) : 'now';
  const count = segment.samples.length;
  return (
    `[${format(segment.start, TIME_FORMAT)} → ${endLabel}] ${segment.kind.toUpperCase()} ` +
    `${count} sample${count === 1 ? '' : 's'} (${formatDistanceStrict(segment.start, until)})`
  );
}

function printTimeline(manager: TimelineManager): void {
  const finalized = manager.finalizedSegments;
  const active = manager.activeSegments;

  console.log(`\n=== FINALIZED (${finalized.length}) ===`);
  for (const segment of finalized) {
    console.log(describeSegment(segment));
  }

  console.log(`\n=== ACTIVE (${active.length}) ===`);
  for (const segment of active) {
    console.log(describeSegment(segment));
  }
}

async function loadConfig(): Promise<TimelineConfig> {
  const result = await readTimelineConfig();
  if (!result.ok) {
    console.error(`Failed to load config: ${result.error.message}`);
    process.exit(1);
  }
  return result.value;
}

async function replay(file: string): Promise<void> {
  const config = await loadConfig();
  const samples = await readSamplesFile(file);
  if (!samples.ok) {
    const where = samples.error.type === 'invalid_sample' ? ` (entry ${samples.error.index})` : '';
    console.error(`Failed to load samples${where}: ${samples.error.message}`);
    process.exit(1);
  }

  // retention ages are measured against the replayed data, not the wall clock
  let now = samples.value[0]?.timestamp ?? new Date();
  const manager = new TimelineManager({ config, clock: () => now });
  manager.startRecording();

  const counts: Record<SubmitOutcome['status'], number> = {
    processed: 0,
    rate_limited: 0,
    not_recording: 0,
    reentrant: 0,
  };
  let merges = 0;

  for (const sample of samples.value) {
    now = sample.timestamp;
    const outcome = manager.submit(sample);
    counts[outcome.status]++;
    if (outcome.status === 'processed') {
      merges += outcome.report.merges;
    }
  }

  console.log(`Replayed ${samples.value.length} samples from ${file}`);
  console.log(`  Accepted: ${counts.processed}, rate limited: ${counts.rate_limited}, merges: ${merges}`);
  printTimeline(manager);
}

async function follow(dir: string): Promise<void> {
  const config = await loadConfig();
  const manager = new TimelineManager({ config });
  manager.on('segmentCreated', (segment) => {
    console.log(`New ${segment.kind} at ${format(segment.start, TIME_FORMAT)}`);
  });
  manager.startRecording();

  const follower = followSamples(
    { dir, stabilityThresholdMs: DEFAULT_STABILITY_THRESHOLD_MS },
    {
      onSample: (sample) => {
        const outcome = manager.submit(sample);
        if (outcome.status === 'processed' && outcome.report.merges > 0) {
          console.log(`  Consolidated ${outcome.report.merges} segment(s)`);
        }
      },
      onError: (error) => console.error(`Sample source error: ${error.message}`),
    }
  );

  const shutdown = (): void => {
    manager.stopRecording();
    follower
      .close()
      .then(() => {
        printTimeline(manager);
        process.exit(0);
      })
      .catch((error: unknown) => {
        console.error('Failed to stop follower:', error);
        process.exit(1);
      });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await follower.ready;
  console.log(`Following ${dir}. Press Ctrl+C to stop.`);
}

async function showConfig(): Promise<void> {
  console.log(`Config file: ${getGlobalConfigPath()}\n`);
  const config = await loadConfig();
  console.log('Current configuration:');
  console.log(JSON.stringify(config, null, 2));
}

function printUsage(): void {
  console.log(`
Wayline - Segment location samples into a timeline of visits and paths

Usage:
  wayline <command> [options]

Commands:
  replay <file>     Replay a YAML/JSON samples file and print the timeline
  follow <dir>      Follow a directory of sample files (Ctrl+C prints the timeline)
  config            Show the effective configuration

Options:
  --debug, -d       Log consolidation passes

Environment Variables:
  WAYLINE_HOME                Override global directory (default: ~/.wayline)
  WAYLINE_SAMPLES_PER_MINUTE  Override samples_per_minute
  WAYLINE_HISTORY_RETENTION   Override history_retention_seconds
  WAYLINE_DEBUG               Enable debug logging (set to 1 or use --debug flag)
`);
}

// Main
const args = process.argv.slice(2);
if (args.includes('--debug') || args.includes('-d')) {
  process.env['WAYLINE_DEBUG'] = '1';
}
const [command, target] = args.filter((arg) => !arg.startsWith('-'));

function run(task: Promise<void>): void {
  task.catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}

switch (command) {
  case 'replay':
  case 'follow':
    if (!target) {
      console.error(`Usage: wayline ${command} <${command === 'replay' ? 'file' : 'dir'}>`);
      process.exit(1);
    }
    run(command === 'replay' ? replay(target) : follow(target));
    break;

  case 'config':
    run(showConfig());
    break;

  case 'help':
  case undefined:
    printUsage();
    break;

  default:
    console.error(`Unknown command: ${command}`);
    printUsage();
    process.exit(1);
}
