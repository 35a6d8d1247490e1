/**
 * @fileoverview Unit tests for orchestration state transitions
 */

import { describe, it, expect } from 'vitest';
import {
  advanceRound,
  appendTurn,
  classifyTermination,
  createInitialState,
  createTermination,
  recordToolRound,
  requestStop,
  terminate,
  toolsForRound,
} from './state.js';
import type { ToolSchema, Turn } from '../types/index.js';
import { assistantText, toolRequestTurn, toolResultTurn, userText } from '../types/index.js';
import { OrchestrationError } from '../utils/errors.js';

const schema: ToolSchema = {
  name: 'search_course_content',
  description: 'Search',
  input_schema: { type: 'object', properties: {}, required: [] },
};

const requestTurn: Turn = toolRequestTurn('', [
  { type: 'tool_request', id: 't1', name: 'search_course_content', arguments: {} },
]);

function resultTurn(isError: boolean): Turn {
  return toolResultTurn([{ type: 'tool_result', requestId: 't1', content: 'x', isError }]);
}

describe('createInitialState()', () => {
  it('should append the query after the history', () => {
    const history = [userText('earlier'), assistantText('reply')];

    const state = createInitialState('now', { history, tools: [schema], maxRounds: 2 });

    expect(state.transcript).toEqual([...history, { role: 'user', content: 'now' }]);
    expect(state.round).toBe(0);
    expect(state.termination).toBeNull();
  });

  it('should not mutate the history', () => {
    const history = [userText('earlier')];

    createInitialState('now', { history, maxRounds: 1 });

    expect(history).toHaveLength(1);
  });

  it.each([-1, 1.5, Number.NaN])('should reject maxRounds %s', (maxRounds) => {
    expect(() => createInitialState('q', { maxRounds })).toThrow(OrchestrationError);
  });
});

describe('toolsForRound()', () => {
  it('should offer tools only while rounds remain', () => {
    const state = createInitialState('q', { tools: [schema], maxRounds: 2 });

    expect(toolsForRound(state)).toEqual([schema]);
    expect(toolsForRound(advanceRound(state))).toEqual([schema]);
    expect(toolsForRound(advanceRound(advanceRound(state)))).toBeNull();
  });

  it('should offer nothing when no tools are given', () => {
    expect(toolsForRound(createInitialState('q', { tools: [], maxRounds: 2 }))).toBeNull();
  });

  it('should offer nothing with maxRounds 0', () => {
    expect(toolsForRound(createInitialState('q', { tools: [schema], maxRounds: 0 }))).toBeNull();
  });

  it('should offer nothing after a stop request', () => {
    expect(toolsForRound(requestStop(createInitialState('q', { tools: [schema], maxRounds: 2 })))).toBeNull();
  });
});

describe('transitions', () => {
  it('should return new states and leave the old one unchanged', () => {
    const initial = createInitialState('q', { tools: [schema], maxRounds: 2 });

    const next = appendTurn(initial, assistantText('a'));

    expect(next).not.toBe(initial);
    expect(initial.transcript).toHaveLength(1);
    expect(next.transcript).toHaveLength(2);
    expect(next.transcript[0]).toBe(initial.transcript[0]);
  });

  it('should count consecutive rounds where every tool failed', () => {
    const initial = createInitialState('q', { tools: [schema], maxRounds: 3 });

    const once = recordToolRound(initial, requestTurn, resultTurn(true));
    const twice = recordToolRound(once, requestTurn, resultTurn(true));
    const reset = recordToolRound(twice, requestTurn, resultTurn(false));

    expect(once.consecutiveFailedRounds).toBe(1);
    expect(twice.consecutiveFailedRounds).toBe(2);
    expect(reset.consecutiveFailedRounds).toBe(0);
    expect(reset.transcript).toHaveLength(7);
  });
});

describe('termination', () => {
  it('should classify a text answer before the limit as natural', () => {
    const state = createInitialState('q', { tools: [schema], maxRounds: 2 });

    expect(classifyTermination(state)).toBe('natural');
  });

  it('should classify the call at the limit as round-limit', () => {
    const state = advanceRound(advanceRound(createInitialState('q', { tools: [schema], maxRounds: 2 })));

    expect(classifyTermination(state)).toBe('round-limit');
  });

  it('should classify a requested stop as explicit', () => {
    const state = requestStop(advanceRound(createInitialState('q', { tools: [schema], maxRounds: 2 })));

    expect(classifyTermination(state)).toBe('explicit');
  });

  it('should record the termination', () => {
    const state = advanceRound(createInitialState('q', { tools: [schema], maxRounds: 1 }));

    const termination = createTermination(state, 2);

    expect(termination).toEqual({
      reason: 'round-limit',
      round: 1,
      llmCalls: 2,
      detail: 'answered without tools after reaching 1 tool round(s)',
    });
    expect(terminate(state, termination).termination).toBe(termination);
    expect(toolsForRound(terminate(state, termination))).toBeNull();
  });

  it('should describe a natural and an explicit end', () => {
    const initial = createInitialState('q', { tools: [schema], maxRounds: 3 });
    const failed = requestStop(advanceRound(recordToolRound(initial, requestTurn, resultTurn(true))));

    expect(createTermination(initial, 1).detail).toBe('answered after 0 tool round(s)');
    expect(createTermination(failed, 2).detail).toBe('stopped after 1 consecutive failed tool round(s)');
  });
});
