/**
 * @fileoverview Trace Recorder - records the span tree of one orchestration run.
 *
 * A run produces one RUN span, a ROUND span per model round, and LLM_CALL
 * and TOOL spans nested beneath the round that issued them.
 *
 * @module rag-orchestrator/observability/tracer
 * @version 0.1.0
 */

import { v4 as uuidv4 } from 'uuid';
import type { UniqueId, Timestamp } from '../types/core.types.js';
import { createUniqueId, createTimestamp } from '../types/core.types.js';
import { errorMessage } from '../utils/errors.js';

/**
 * A complete execution trace.
 */
export interface ExecutionTrace {
  readonly id: UniqueId;

  /** Run this trace belongs to */
  readonly runId: UniqueId;

  readonly startedAt: Timestamp;
  readonly endedAt: Timestamp;
  readonly success: boolean;
  readonly spans: ReadonlyArray<TraceSpan>;
  readonly metadata: TraceMetadata;
}

/**
 * A span within a trace representing a unit of work.
 */
export interface TraceSpan {
  readonly id: UniqueId;
  readonly parentId: UniqueId | null;
  readonly name: string;
  readonly type: SpanType;
  readonly startedAt: Timestamp;
  readonly endedAt: Timestamp | null;
  readonly durationMs: number | null;
  readonly status: SpanStatus;

  /** Round index when the span was opened */
  readonly round: number;

  readonly attributes: Readonly<Record<string, unknown>>;
  readonly events: ReadonlyArray<SpanEvent>;
}

export enum SpanType {
  RUN = 'RUN',
  ROUND = 'ROUND',
  LLM_CALL = 'LLM_CALL',
  TOOL = 'TOOL',
  CUSTOM = 'CUSTOM',
}

export enum SpanStatus {
  RUNNING = 'RUNNING',
  OK = 'OK',
  ERROR = 'ERROR',
}

export interface SpanEvent {
  readonly name: string;
  readonly timestamp: Timestamp;
  readonly attributes: Readonly<Record<string, unknown>>;
}

export interface TraceMetadata {
  readonly query: string;
  readonly totalRounds: number;
  readonly totalDurationMs: number;
  readonly custom: Readonly<Record<string, unknown>>;
}

export interface SpanOptions {
  readonly parentId?: UniqueId;
  readonly type?: SpanType;
  readonly round?: number;
  readonly attributes?: Record<string, unknown>;
}

/**
 * Records execution traces for debugging and analysis.
 *
 * Parents are explicit or taken from the innermost open span. Concurrent
 * tool spans should pass `parentId` so they all hang off their round.
 *
 * @example
 * ```typescript
 * const tracer = new TraceRecorder(runId);
 * const roundSpan = tracer.startSpan('round 0', { type: SpanType.ROUND, round: 0 });
 * // ... call the model, run tools ...
 * tracer.endSpan(roundSpan);
 * const trace = tracer.finalize(true, { query });
 * ```
 */
export class TraceRecorder {
  private readonly traceId: UniqueId;
  private readonly spans: Map<UniqueId, TraceSpan> = new Map();
  private readonly activeSpanStack: UniqueId[] = [];
  private readonly startedAt: Timestamp;
  private currentRound = 0;

  constructor(private readonly runId: UniqueId) {
    this.traceId = createUniqueId(uuidv4());
    this.startedAt = createTimestamp();
  }

  /**
   * Sets the round index recorded on spans opened from now on.
   */
  setRound(round: number): void {
    this.currentRound = round;
  }

  startSpan(name: string, options: SpanOptions = {}): UniqueId {
    const spanId = createUniqueId(uuidv4());
    const parentId = options.parentId ?? this.activeSpanStack[this.activeSpanStack.length - 1] ?? null;

    this.spans.set(spanId, {
      id: spanId,
      parentId,
      name,
      type: options.type ?? SpanType.CUSTOM,
      startedAt: createTimestamp(),
      endedAt: null,
      durationMs: null,
      status: SpanStatus.RUNNING,
      round: options.round ?? this.currentRound,
      attributes: options.attributes ?? {},
      events: [],
    });
    this.activeSpanStack.push(spanId);

    return spanId;
  }

  addEvent(spanId: UniqueId, name: string, attributes: Record<string, unknown> = {}): void {
    const span = this.spans.get(spanId);
    if (!span) return;

    this.spans.set(spanId, {
      ...span,
      events: [...span.events, { name, timestamp: createTimestamp(), attributes }],
    });
  }

  setAttributes(spanId: UniqueId, attributes: Record<string, unknown>): void {
    const span = this.spans.get(spanId);
    if (!span) return;

    this.spans.set(spanId, {
      ...span,
      attributes: { ...span.attributes, ...attributes },
    });
  }

  endSpan(
    spanId: UniqueId,
    status: SpanStatus = SpanStatus.OK,
    attributes?: Record<string, unknown>,
  ): void {
    const span = this.spans.get(spanId);
    if (!span || span.endedAt !== null) return;

    const now = createTimestamp();
    this.spans.set(spanId, {
      ...span,
      endedAt: now,
      durationMs: now - span.startedAt,
      status,
      attributes: attributes ? { ...span.attributes, ...attributes } : span.attributes,
    });

    const stackIndex = this.activeSpanStack.indexOf(spanId);
    if (stackIndex !== -1) {
      this.activeSpanStack.splice(stackIndex, 1);
    }
  }

  /**
   * Closes any open spans and returns the finished trace.
   */
  finalize(
    success: boolean,
    metadata: Partial<Omit<TraceMetadata, 'totalDurationMs'>> = {},
  ): ExecutionTrace {
    for (const spanId of [...this.activeSpanStack]) {
      this.endSpan(spanId, success ? SpanStatus.OK : SpanStatus.ERROR);
    }

    const endedAt = createTimestamp();

    return {
      id: this.traceId,
      runId: this.runId,
      startedAt: this.startedAt,
      endedAt,
      success,
      spans: this.getSpans(),
      metadata: {
        query: metadata.query ?? '',
        totalRounds: metadata.totalRounds ?? this.currentRound + 1,
        totalDurationMs: endedAt - this.startedAt,
        custom: metadata.custom ?? {},
      },
    };
  }

  getSpans(): ReadonlyArray<TraceSpan> {
    return Array.from(this.spans.values());
  }

  getActiveSpan(): TraceSpan | null {
    const activeId = this.activeSpanStack[this.activeSpanStack.length - 1];
    return activeId === undefined ? null : this.spans.get(activeId) ?? null;
  }
}

/**
 * Runs an operation inside a span, marking it ERROR if the operation throws.
 */
export async function traced<T>(
  tracer: TraceRecorder,
  name: string,
  options: SpanOptions,
  operation: (spanId: UniqueId) => Promise<T>,
): Promise<T> {
  const spanId = tracer.startSpan(name, options);

  try {
    const result = await operation(spanId);
    tracer.endSpan(spanId, SpanStatus.OK);
    return result;
  } catch (error) {
    tracer.addEvent(spanId, 'error', { message: errorMessage(error) });
    tracer.endSpan(spanId, SpanStatus.ERROR);
    throw error;
  }
}
