/**
 * @fileoverview Observability module public exports.
 *
 * @module rag-orchestrator/observability
 * @version 0.1.0
 */

export {
  Logger,
  ConsoleTransport,
  MemoryTransport,
  createLogger,
  parseSeverity,
  type LogEntry,
  type LogError,
  type LogTransport,
  type LoggerConfig,
} from './logger.js';

export {
  TraceRecorder,
  traced,
  SpanType,
  SpanStatus,
  type ExecutionTrace,
  type TraceSpan,
  type SpanEvent,
  type TraceMetadata,
  type SpanOptions,
} from './tracer.js';
