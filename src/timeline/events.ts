/**
 * Timeline Events
 *
 * ARCHITECTURE: Explicit subscriber lists, delivered synchronously in subscription order
 * Pattern: on() returns an unsubscribe function
 *
 * A throwing listener is logged and skipped; it never aborts the processing cycle.
 */

import type { Segment } from '../types/timeline.js';

export interface TimelineEvents {
  segmentCreated: (segment: Segment) => void;
  processingCompleted: () => void;
}

export type TimelineEventName = keyof TimelineEvents;

export class TimelineEmitter {
  private readonly listeners: { [K in TimelineEventName]: Array<TimelineEvents[K]> } = {
    segmentCreated: [],
    processingCompleted: [],
  };

  on<K extends TimelineEventName>(event: K, listener: TimelineEvents[K]): () => void {
    this.listeners[event].push(listener);
    return () => this.off(event, listener);
  }

  off<K extends TimelineEventName>(event: K, listener: TimelineEvents[K]): void {
    const list: Array<TimelineEvents[K]> = this.listeners[event];
    const index = list.indexOf(listener);
    if (index >= 0) {
      list.splice(index, 1);
    }
  }

  emitSegmentCreated(segment: Segment): void {
    for (const listener of [...this.listeners.segmentCreated]) {
      this.deliver('segmentCreated', () => listener(segment));
    }
  }

  emitProcessingCompleted(): void {
    for (const listener of [...this.listeners.processingCompleted]) {
      this.deliver('processingCompleted', () => listener());
    }
  }

  private deliver(event: TimelineEventName, call: () => void): void {
    try {
      call();
    } catch (error) {
      console.error(`[timeline] ${event} listener failed: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
  }
}
