/**
 * @fileoverview Contract between the orchestrator and a remote model.
 *
 * @module rag-orchestrator/types/llm
 * @version 0.1.0
 */

import type { Transcript, ToolRequestBlock } from './conversation.types.js';
import type { ToolSchema } from './tools.types.js';

/**
 * The model produced its final answer.
 */
export interface TextResponse {
  readonly stopReason: 'text';
  readonly text: string;

  /** Stop reason as reported by the provider, e.g. "end_turn" */
  readonly rawStopReason: string | null;
}

/**
 * The model asked for one or more tools to be run.
 */
export interface ToolUseResponse {
  readonly stopReason: 'tool_use';

  /** Text emitted before the requests; empty when there was none */
  readonly text: string;

  /** Requests in the order the model emitted them, never empty */
  readonly toolRequests: ReadonlyArray<ToolRequestBlock>;

  readonly rawStopReason: string | null;
}

export type LLMResponse = TextResponse | ToolUseResponse;

/**
 * A model endpoint. `tools === null` means no tools are offered and the
 * model must answer in text.
 *
 * Transport, authentication and rate-limit failures reject the promise.
 */
export interface LLMClient {
  send(transcript: Transcript, tools: ReadonlyArray<ToolSchema> | null): Promise<LLMResponse>;
}
