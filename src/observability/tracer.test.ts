/**
 * @fileoverview Unit tests for TraceRecorder
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { TraceRecorder, SpanType, SpanStatus, traced } from './tracer.js';
import { createUniqueId, type UniqueId } from '../types/index.js';
import { v4 as uuidv4 } from 'uuid';

describe('TraceRecorder', () => {
  let recorder: TraceRecorder;
  let runId: UniqueId;

  beforeEach(() => {
    runId = createUniqueId(uuidv4());
    recorder = new TraceRecorder(runId);
  });

  describe('startSpan()', () => {
    it('should create a running span', () => {
      const spanId = recorder.startSpan('round 0', { type: SpanType.ROUND });

      const spans = recorder.getSpans();
      expect(spans).toHaveLength(1);
      expect(spans[0]?.id).toBe(spanId);
      expect(spans[0]?.name).toBe('round 0');
      expect(spans[0]?.type).toBe(SpanType.ROUND);
      expect(spans[0]?.status).toBe(SpanStatus.RUNNING);
      expect(spans[0]?.parentId).toBeNull();
    });

    it('should nest under the innermost open span', () => {
      const parentId = recorder.startSpan('Parent');
      const childId = recorder.startSpan('Child');

      const child = recorder.getSpans().find(s => s.id === childId);
      expect(child?.parentId).toBe(parentId);
    });

    it('should honour an explicit parent', () => {
      const roundId = recorder.startSpan('round', { type: SpanType.ROUND });
      recorder.startSpan('tool a', { type: SpanType.TOOL, parentId: roundId });
      const secondId = recorder.startSpan('tool b', { type: SpanType.TOOL, parentId: roundId });

      const second = recorder.getSpans().find(s => s.id === secondId);
      expect(second?.parentId).toBe(roundId);
    });

    it('should record the current round', () => {
      recorder.setRound(2);
      const spanId = recorder.startSpan('call');

      expect(recorder.getSpans().find(s => s.id === spanId)?.round).toBe(2);
    });
  });

  describe('endSpan()', () => {
    it('should end a span with duration and status', () => {
      const spanId = recorder.startSpan('Tool', { type: SpanType.TOOL });

      recorder.endSpan(spanId, SpanStatus.ERROR, { code: 'TOOL_TIMEOUT' });

      const span = recorder.getSpans().find(s => s.id === spanId);
      expect(span?.endedAt).not.toBeNull();
      expect(span?.durationMs).toBeGreaterThanOrEqual(0);
      expect(span?.status).toBe(SpanStatus.ERROR);
      expect(span?.attributes).toEqual({ code: 'TOOL_TIMEOUT' });
    });

    it('should ignore a second end', () => {
      const spanId = recorder.startSpan('Once');
      recorder.endSpan(spanId, SpanStatus.OK);
      recorder.endSpan(spanId, SpanStatus.ERROR);

      expect(recorder.getSpans()[0]?.status).toBe(SpanStatus.OK);
    });
  });

  describe('events and attributes', () => {
    it('should add events to a span', () => {
      const spanId = recorder.startSpan('call');
      recorder.addEvent(spanId, 'response', { stopReason: 'tool_use' });

      const span = recorder.getSpans()[0];
      expect(span.events).toHaveLength(1);
      expect(span.events[0]?.name).toBe('response');
      expect(span.events[0]?.attributes).toEqual({ stopReason: 'tool_use' });
    });

    it('should merge attributes', () => {
      const spanId = recorder.startSpan('Tool', { attributes: { tool: 'search' } });
      recorder.setAttributes(spanId, { requestId: 't1' });

      expect(recorder.getSpans()[0]?.attributes).toEqual({ tool: 'search', requestId: 't1' });
    });
  });

  describe('finalize()', () => {
    it('should close open spans and report metadata', () => {
      recorder.startSpan('run', { type: SpanType.RUN });
      recorder.startSpan('round', { type: SpanType.ROUND });

      const trace = recorder.finalize(true, { query: 'what is MCP?', totalRounds: 2 });

      expect(trace.runId).toBe(runId);
      expect(trace.success).toBe(true);
      expect(trace.spans.every(s => s.endedAt !== null)).toBe(true);
      expect(trace.spans.every(s => s.status === SpanStatus.OK)).toBe(true);
      expect(trace.metadata.query).toBe('what is MCP?');
      expect(trace.metadata.totalRounds).toBe(2);
    });

    it('should mark open spans as errors on failure', () => {
      recorder.startSpan('Failing');

      const trace = recorder.finalize(false);

      expect(trace.success).toBe(false);
      expect(trace.spans[0]?.status).toBe(SpanStatus.ERROR);
    });
  });

  describe('getActiveSpan()', () => {
    it('should return null when no spans active', () => {
      expect(recorder.getActiveSpan()).toBeNull();
    });

    it('should return the most recent active span', () => {
      recorder.startSpan('First');
      const secondId = recorder.startSpan('Second');

      expect(recorder.getActiveSpan()?.id).toBe(secondId);
    });
  });
});

describe('traced() utility', () => {
  it('should wrap an operation with a span', async () => {
    const recorder = new TraceRecorder(createUniqueId(uuidv4()));

    const result = await traced(recorder, 'operation', { type: SpanType.TOOL }, async () => 42);

    expect(result).toBe(42);
    const spans = recorder.getSpans();
    expect(spans).toHaveLength(1);
    expect(spans[0]?.status).toBe(SpanStatus.OK);
  });

  it('should mark span as errored on exception', async () => {
    const recorder = new TraceRecorder(createUniqueId(uuidv4()));

    await expect(
      traced(recorder, 'failing-operation', { type: SpanType.TOOL }, async () => {
        throw new Error('test error');
      }),
    ).rejects.toThrow('test error');

    const [span] = recorder.getSpans();
    expect(span.status).toBe(SpanStatus.ERROR);
    expect(span.events[0]?.attributes).toEqual({ message: 'test error' });
  });
});
