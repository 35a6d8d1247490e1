/**
 * @fileoverview Conversation transcript exchanged with the model.
 *
 * A transcript is an ordered, append-only list of turns. Every
 * `tool_request` block the assistant emits in turn N is answered by exactly
 * one `tool_result` block with the same id in the user turn N + 1.
 *
 * @module rag-orchestrator/types/conversation
 * @version 0.1.0
 */

/**
 * Speaker of a turn.
 */
export type Role = 'user' | 'assistant';

/**
 * Plain text emitted by either side.
 */
export interface TextBlock {
  readonly type: 'text';
  readonly text: string;
}

/**
 * A tool invocation requested by the model.
 */
export interface ToolRequestBlock {
  readonly type: 'tool_request';

  /** Correlation id assigned by the model */
  readonly id: string;

  /** Registered tool name */
  readonly name: string;

  /** Structured arguments as emitted by the model */
  readonly arguments: Readonly<Record<string, unknown>>;
}

/**
 * Output (or failure) of a tool, sent back to the model.
 */
export interface ToolResultBlock {
  readonly type: 'tool_result';

  /** Id of the `tool_request` block this answers */
  readonly requestId: string;

  readonly content: string;

  readonly isError: boolean;
}

export type ContentBlock = TextBlock | ToolRequestBlock | ToolResultBlock;

/**
 * One entry of the transcript.
 */
export interface Turn {
  readonly role: Role;
  readonly content: string | ReadonlyArray<ContentBlock>;
}

export type Transcript = ReadonlyArray<Turn>;

export function userText(text: string): Turn {
  return { role: 'user', content: text };
}

export function assistantText(text: string): Turn {
  return { role: 'assistant', content: text };
}

/**
 * Builds the assistant turn that carries a round's tool requests,
 * preceded by any text the model emitted alongside them.
 */
export function toolRequestTurn(
  preamble: string,
  requests: ReadonlyArray<ToolRequestBlock>,
): Turn {
  const blocks: ContentBlock[] = preamble.trim().length > 0
    ? [{ type: 'text', text: preamble }, ...requests]
    : [...requests];
  return { role: 'assistant', content: blocks };
}

/**
 * Builds the single user turn that answers a round's tool requests.
 */
export function toolResultTurn(results: ReadonlyArray<ToolResultBlock>): Turn {
  return { role: 'user', content: [...results] };
}

/**
 * Returns the tool request blocks of a turn, in order.
 */
export function toolRequestsOf(turn: Turn): ReadonlyArray<ToolRequestBlock> {
  if (typeof turn.content === 'string') return [];
  return turn.content.filter((b): b is ToolRequestBlock => b.type === 'tool_request');
}

/**
 * Returns the tool result blocks of a turn, in order.
 */
export function toolResultsOf(turn: Turn): ReadonlyArray<ToolResultBlock> {
  if (typeof turn.content === 'string') return [];
  return turn.content.filter((b): b is ToolResultBlock => b.type === 'tool_result');
}
