/**
 * Timeline Manager
 *
 * ARCHITECTURE: One explicit engine instance owning the segment chain
 * Pattern: submit → consolidate → promote → expire → notify, fully synchronous
 *
 * Samples are processed one at a time. A submission arriving while a cycle is
 * running (for example from an event listener) is refused, never interleaved.
 * Callers delivering samples from several sources must serialize them first.
 */

import { v4 as uuidv4 } from 'uuid';
import type { ConsolidationReport, Sample, Segment, SubmitOutcome } from '../types/timeline.js';
import type { TimelineConfig } from '../types/index.js';
import { DEFAULT_TIMELINE_CONFIG } from '../types/index.js';
import { SegmentBuilder } from './builder.js';
import { SegmentChain } from './chain.js';
import { consolidateChain } from './consolidation.js';
import { TimelineEmitter, type TimelineEventName, type TimelineEvents } from './events.js';
import { expireOld, promoteSettled } from './retention.js';
import { DefaultScoringPolicy, type ScoringPolicy } from './scoring.js';
import { snapshotSegment } from './segment.js';

export interface TimelineManagerOptions {
  readonly config?: Partial<TimelineConfig>;
  readonly policy?: ScoringPolicy;
  /** Reference time for retention ages (default: wall clock) */
  readonly clock?: () => Date;
  readonly idFactory?: () => string;
  /** Check chain invariants around every pass (default: on outside production) */
  readonly assertInvariants?: boolean;
}

const EMPTY_REPORT: ConsolidationReport = { merges: 0, promoted: 0, expired: 0 };

function assertPositive(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive number, got ${value}`);
  }
}

export class TimelineManager {
  private readonly chain = new SegmentChain();
  private readonly emitter = new TimelineEmitter();
  private readonly builder: SegmentBuilder;
  private readonly policy: ScoringPolicy;
  private readonly clock: () => Date;
  private readonly assertInvariants: boolean;
  private settings: TimelineConfig;
  private recording = false;
  private processing = false;

  constructor(options: TimelineManagerOptions = {}) {
    const settings = { ...DEFAULT_TIMELINE_CONFIG, ...options.config };
    assertPositive('samplesPerMinute', settings.samplesPerMinute);
    assertPositive('historyRetention', settings.historyRetention);

    this.settings = settings;
    this.policy = options.policy ?? new DefaultScoringPolicy();
    this.clock = options.clock ?? (() => new Date());
    this.assertInvariants = options.assertInvariants ?? process.env['NODE_ENV'] !== 'production';
    this.builder = new SegmentBuilder(this.chain, options.idFactory ?? (() => uuidv4()));
  }

  // ==========================================================================
  // Settings
  // ==========================================================================

  get config(): TimelineConfig {
    return this.settings;
  }

  setSamplesPerMinute(samplesPerMinute: number): void {
    assertPositive('samplesPerMinute', samplesPerMinute);
    this.settings = { ...this.settings, samplesPerMinute };
  }

  setHistoryRetention(historyRetention: number): void {
    assertPositive('historyRetention', historyRetention);
    this.settings = { ...this.settings, historyRetention };
  }

  // ==========================================================================
  // Starting and Stopping Recording
  // ==========================================================================

  startRecording(): void {
    this.recording = true;
  }

  stopRecording(): void {
    this.recording = false;
  }

  get isRecording(): boolean {
    return this.recording;
  }

  // ==========================================================================
  // State
  // ==========================================================================

  get currentSegment(): Segment | undefined {
    const current = this.builder.current();
    return current ? snapshotSegment(current) : undefined;
  }

  /**
   * Segments still open to revision by consolidation, ascending by start
   */
  get activeSegments(): Segment[] {
    return this.chain.activeSnapshot();
  }

  /**
   * Settled segments, ascending by start. Never modified again, only expired.
   */
  get finalizedSegments(): readonly Segment[] {
    return this.chain.finalizedSegments();
  }

  on<K extends TimelineEventName>(event: K, listener: TimelineEvents[K]): () => void {
    return this.emitter.on(event, listener);
  }

  // ==========================================================================
  // Processing
  // ==========================================================================

  submit(sample: Sample): SubmitOutcome {
    if (!this.recording) {
      return { status: 'not_recording' };
    }
    if (this.processing) {
      console.warn('[timeline] Ignoring sample submitted during a processing cycle');
      return { status: 'reentrant' };
    }

    this.processing = true;
    try {
      this.checkIntegrity();

      const placement = this.builder.place(sample, this.settings.samplesPerMinute);
      if (!placement.accepted) {
        return { status: 'rate_limited' };
      }

      if (placement.created) {
        this.emitter.emitSegmentCreated(snapshotSegment(placement.created));
      }

      const report = this.runPass();
      this.emitter.emitProcessingCompleted();

      return { status: 'processed', created: placement.created !== undefined, report };
    } finally {
      this.processing = false;
    }
  }

  /**
   * Run a consolidation and housekeeping pass outside of sample submission
   */
  consolidate(): ConsolidationReport {
    if (this.processing) {
      console.warn('[timeline] Ignoring consolidate() during a processing cycle');
      return EMPTY_REPORT;
    }

    this.processing = true;
    try {
      this.checkIntegrity();
      return this.runPass();
    } finally {
      this.processing = false;
    }
  }

  private runPass(): ConsolidationReport {
    const merges = consolidateChain(this.chain, this.policy, { assertInvariants: this.assertInvariants });

    // housekeeping
    const promoted = promoteSettled(this.chain, this.policy);
    const expired = expireOld(this.chain, this.settings.historyRetention, this.clock());

    this.checkIntegrity();

    return { merges, promoted: promoted.length, expired: expired.length };
  }

  private checkIntegrity(): void {
    if (this.assertInvariants) {
      this.chain.assertIntegrity();
    }
  }
}
