/**
 * Global Paths and Configuration
 *
 * ARCHITECTURE: Centralized path management, config read from a YAML file
 * Pattern: Defaults ← config file ← environment, every value validated
 *
 * Global structure (~/.wayline/):
 *   config.yaml          - Timeline configuration
 *
 * Config file keys:
 *   samples_per_minute         - target sample rate (default 10)
 *   history_retention_seconds  - finalized segment retention (default 21600)
 *
 * Environment overrides:
 *   WAYLINE_SAMPLES_PER_MINUTE, WAYLINE_HISTORY_RETENTION
 */

import { join, dirname } from 'node:path';
import { homedir } from 'node:os';
import { promises as fs } from 'node:fs';
import { parse as parseYaml, stringify as stringifyYaml, YAMLParseError } from 'yaml';
import type { ConfigError, Result, TimelineConfig } from './types/index.js';
import { DEFAULT_TIMELINE_CONFIG, Ok, Err } from './types/index.js';

// ============================================================================
// Global Paths
// ============================================================================

const GLOBAL_DIR_NAME = '.wayline';
const CONFIG_FILE = 'config.yaml';

/**
 * Get the global wayline directory (~/.wayline/)
 */
export function getGlobalDir(): string {
  return process.env['WAYLINE_HOME'] ?? join(homedir(), GLOBAL_DIR_NAME);
}

/**
 * Get the global config file path (~/.wayline/config.yaml)
 */
export function getGlobalConfigPath(): string {
  return join(getGlobalDir(), CONFIG_FILE);
}

// ============================================================================
// Validation
// ============================================================================

const FILE_KEYS = {
  samplesPerMinute: 'samples_per_minute',
  historyRetention: 'history_retention_seconds',
} as const satisfies Record<keyof TimelineConfig, string>;

const ENV_KEYS = {
  samplesPerMinute: 'WAYLINE_SAMPLES_PER_MINUTE',
  historyRetention: 'WAYLINE_HISTORY_RETENTION',
} as const satisfies Record<keyof TimelineConfig, string>;

function positiveNumber(key: string, value: unknown): Result<number, ConfigError> {
  const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isFinite(parsed) || parsed <= 0) {
    return Err({
      type: 'invalid_value',
      message: `${key} must be a positive number, got ${JSON.stringify(value)}`,
      key,
    });
  }
  return Ok(parsed);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Overlay validated values onto a base config
 */
function overlay(
  base: TimelineConfig,
  source: Readonly<Record<string, unknown>>,
  keys: Readonly<Record<keyof TimelineConfig, string>>
): Result<TimelineConfig, ConfigError> {
  let config = base;

  for (const field of ['samplesPerMinute', 'historyRetention'] as const) {
    const key = keys[field];
    const raw = source[key];
    if (raw === undefined || raw === null) continue;

    const result = positiveNumber(key, raw);
    if (!result.ok) return result;
    config = { ...config, [field]: result.value };
  }

  return Ok(config);
}

// ============================================================================
// Configuration
// ============================================================================

/**
 * Read timeline configuration, falling back to defaults when the file is missing
 */
export async function readTimelineConfig(
  configPath: string = getGlobalConfigPath(),
  env: NodeJS.ProcessEnv = process.env
): Promise<Result<TimelineConfig, ConfigError>> {
  let fileValues: Record<string, unknown> = {};

  try {
    const content = await fs.readFile(configPath, 'utf-8');
    const parsed: unknown = parseYaml(content);
    if (parsed !== null && parsed !== undefined) {
      if (!isRecord(parsed)) {
        return Err({
          type: 'parse_error',
          message: 'Config file must contain a mapping',
          path: configPath,
        });
      }
      fileValues = parsed;
    }
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
      return Err({
        type: error instanceof YAMLParseError ? 'parse_error' : 'read_error',
        message: `Failed to read timeline config: ${error instanceof Error ? error.message : 'Unknown error'}`,
        path: configPath,
      });
    }
  }

  const fromFile = overlay(DEFAULT_TIMELINE_CONFIG, fileValues, FILE_KEYS);
  if (!fromFile.ok) return fromFile;

  return overlay(fromFile.value, env, ENV_KEYS);
}

/**
 * Write timeline configuration
 */
export async function writeTimelineConfig(
  config: TimelineConfig,
  configPath: string = getGlobalConfigPath()
): Promise<Result<void, ConfigError>> {
  const document = {
    [FILE_KEYS.samplesPerMinute]: config.samplesPerMinute,
    [FILE_KEYS.historyRetention]: config.historyRetention,
  };

  try {
    await fs.mkdir(dirname(configPath), { recursive: true });
    await fs.writeFile(configPath, stringifyYaml(document), 'utf-8');
    return Ok(undefined);
  } catch (error) {
    return Err({
      type: 'write_error',
      message: `Failed to write timeline config: ${error instanceof Error ? error.message : 'Unknown error'}`,
      path: configPath,
    });
  }
}
