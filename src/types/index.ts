/**
 * Core type definitions for Wayline
 *
 * ARCHITECTURE: Fallible I/O returns Result<T, E>; engine defects throw
 * Pattern: Steady-state refusals are values, broken invariants are exceptions
 */

// ============================================================================
// Result Type - Explicit error handling
// ============================================================================

export type Result<T, E> = Ok<T> | Err<E>;

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export const Ok = <T>(value: T): Ok<T> => ({ ok: true, value });
export const Err = <E>(error: E): Err<E> => ({ ok: false, error });

// ============================================================================
// Configuration Types
// ============================================================================

export interface TimelineConfig {
  /** Target sample rate; the minimum spacing between accepted samples is 60 / samplesPerMinute seconds */
  readonly samplesPerMinute: number;
  /** Seconds a finalized segment is retained after its end */
  readonly historyRetention: number;
}

export const DEFAULT_TIMELINE_CONFIG: TimelineConfig = {
  samplesPerMinute: 10,
  historyRetention: 60 * 60 * 6, // 6 hours
};

// ============================================================================
// Error Types
// ============================================================================

export type ConfigError =
  | { readonly type: 'read_error'; readonly message: string; readonly path: string }
  | { readonly type: 'write_error'; readonly message: string; readonly path: string }
  | { readonly type: 'parse_error'; readonly message: string; readonly path: string }
  | { readonly type: 'invalid_value'; readonly message: string; readonly key: string };

export type SourceError =
  | { readonly type: 'read_error'; readonly message: string; readonly path: string }
  | { readonly type: 'parse_error'; readonly message: string; readonly path: string }
  | { readonly type: 'invalid_sample'; readonly message: string; readonly index: number };

export type InvariantCode =
  | 'chain_order'
  | 'chain_link'
  | 'chain_cycle'
  | 'multiple_current'
  | 'duplicate_segment'
  | 'open_finalized'
  | 'unknown_segment'
  | 'merge_progress';

/**
 * Thrown when the engine finds its own state inconsistent.
 * These indicate a bug in segmentation or consolidation and are never retried.
 */
export class TimelineInvariantError extends Error {
  readonly code: InvariantCode;

  constructor(code: InvariantCode, message: string) {
    super(`[${code}] ${message}`);
    this.name = 'TimelineInvariantError';
    this.code = code;
  }
}
