/**
 * @fileoverview Orchestration state and its transitions.
 *
 * Every transition returns a new state; the transcript of a later state
 * always extends the transcript of an earlier one. The orchestrator keeps
 * each intermediate state so a run can be inspected after the fact.
 *
 * @module rag-orchestrator/agent/state
 * @version 0.1.0
 */

import type { Transcript, Turn } from '../types/conversation.types.js';
import { toolResultsOf, userText } from '../types/conversation.types.js';
import type { ToolSchema } from '../types/tools.types.js';
import { OrchestrationError } from '../utils/errors.js';

/**
 * Why a run ended.
 * - `natural`: the model answered while tools were still on offer
 * - `round-limit`: the answer came from the tool-free call after the last round
 * - `explicit`: a stop was requested and the model answered without tools
 */
export type TerminationReason = 'natural' | 'round-limit' | 'explicit';

export interface TerminationRecord {
  readonly reason: TerminationReason;

  /** Round index of the final model call */
  readonly round: number;

  readonly llmCalls: number;
  readonly detail: string;
}

export interface OrchestrationState {
  readonly transcript: Transcript;

  /** Completed tool rounds so far */
  readonly round: number;

  readonly maxRounds: number;

  /** Schemas offered while rounds remain */
  readonly tools: ReadonlyArray<ToolSchema>;

  /** Trailing rounds in which every tool result was an error */
  readonly consecutiveFailedRounds: number;

  readonly stopRequested: boolean;
  readonly termination: TerminationRecord | null;
}

export interface InitialStateOptions {
  readonly history?: Transcript;
  readonly tools?: ReadonlyArray<ToolSchema>;
  readonly maxRounds: number;
}

/**
 * @throws OrchestrationError if `maxRounds` is not a non-negative integer
 */
export function createInitialState(query: string, options: InitialStateOptions): OrchestrationState {
  if (!Number.isInteger(options.maxRounds) || options.maxRounds < 0) {
    throw new OrchestrationError(
      `maxRounds must be a non-negative integer, got ${options.maxRounds}`,
      { maxRounds: options.maxRounds },
    );
  }

  return {
    transcript: [...(options.history ?? []), userText(query)],
    round: 0,
    maxRounds: options.maxRounds,
    tools: options.tools ?? [],
    consecutiveFailedRounds: 0,
    stopRequested: false,
    termination: null,
  };
}

/**
 * Tools to offer on the next call, or null for a tool-free call.
 */
export function toolsForRound(state: OrchestrationState): ReadonlyArray<ToolSchema> | null {
  if (state.termination !== null || state.stopRequested) return null;
  if (state.round >= state.maxRounds || state.tools.length === 0) return null;
  return state.tools;
}

export function appendTurn(state: OrchestrationState, turn: Turn): OrchestrationState {
  return { ...state, transcript: [...state.transcript, turn] };
}

/**
 * Appends a round's assistant request turn and the user turn answering it.
 */
export function recordToolRound(
  state: OrchestrationState,
  requestTurn: Turn,
  resultTurn: Turn,
): OrchestrationState {
  const results = toolResultsOf(resultTurn);
  const allFailed = results.length > 0 && results.every(result => result.isError);

  return {
    ...state,
    transcript: [...state.transcript, requestTurn, resultTurn],
    consecutiveFailedRounds: allFailed ? state.consecutiveFailedRounds + 1 : 0,
  };
}

export function advanceRound(state: OrchestrationState): OrchestrationState {
  return { ...state, round: state.round + 1 };
}

/**
 * Makes the next call tool-free; its answer ends the run.
 */
export function requestStop(state: OrchestrationState): OrchestrationState {
  return { ...state, stopRequested: true };
}

export function classifyTermination(state: OrchestrationState): TerminationReason {
  if (state.stopRequested) return 'explicit';
  if (state.round >= state.maxRounds) return 'round-limit';
  return 'natural';
}

/**
 * Builds the record for a run whose final call is made in this state.
 */
export function createTermination(state: OrchestrationState, llmCalls: number): TerminationRecord {
  const reason = classifyTermination(state);
  return { reason, round: state.round, llmCalls, detail: describeTermination(reason, state) };
}

export function terminate(state: OrchestrationState, termination: TerminationRecord): OrchestrationState {
  return { ...state, termination };
}

function describeTermination(reason: TerminationReason, state: OrchestrationState): string {
  switch (reason) {
    case 'natural':
      return `answered after ${state.round} tool round(s)`;
    case 'round-limit':
      return `answered without tools after reaching ${state.maxRounds} tool round(s)`;
    case 'explicit':
      return `stopped after ${state.consecutiveFailedRounds} consecutive failed tool round(s)`;
  }
}
