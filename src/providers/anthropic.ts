/**
 * @fileoverview Anthropic Messages API client.
 *
 * Translates the transcript to Anthropic message params (`tool_request`
 * becomes `tool_use`, `tool_result` keeps its `is_error` flag) and maps
 * the returned message to the `LLMResponse` union.
 *
 * @module rag-orchestrator/providers/anthropic
 */

import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import type { ContentBlock, ToolRequestBlock, Transcript, Turn } from '../types/conversation.types.js';
import type { LLMResponse } from '../types/llm.types.js';
import type { ToolSchema } from '../types/tools.types.js';
import { LLMClientError } from '../utils/errors.js';
import type { Logger } from '../observability/logger.js';
import { BaseLLMClient, type ProviderConfig } from './base.js';

/**
 * The parts of a returned message the client reads.
 */
export interface ModelContentBlock {
  readonly type: string;
  readonly text?: string;
  readonly id?: string;
  readonly name?: string;
  readonly input?: unknown;
}

export interface ModelMessage {
  readonly content: ReadonlyArray<ModelContentBlock>;
  readonly stop_reason: string | null;
}

/**
 * Sends one non-streaming request. Defaults to `messages.create` of the SDK;
 * tests pass their own.
 */
export type MessageCreator = (
  params: Anthropic.MessageCreateParamsNonStreaming,
  options: { timeout: number },
) => Promise<ModelMessage>;

export interface AnthropicClientOptions {
  readonly config?: Partial<ProviderConfig>;

  /** Falls back to ANTHROPIC_API_KEY in the environment */
  readonly apiKey?: string;

  readonly createMessage?: MessageCreator;
  readonly logger?: Logger;
}

const ToolArgumentsSchema = z.record(z.unknown());

export class AnthropicClient extends BaseLLMClient {
  readonly name = 'anthropic';

  private readonly createMessage: MessageCreator;

  constructor(options: AnthropicClientOptions = {}) {
    super(options.config, options.logger);
    this.createMessage = options.createMessage ?? sdkMessageCreator(
      new Anthropic({ apiKey: options.apiKey, maxRetries: this.config.maxRetries }),
    );
  }

  /**
   * Builds the request body for one call.
   */
  buildRequest(
    transcript: Transcript,
    tools: ReadonlyArray<ToolSchema> | null,
  ): Anthropic.MessageCreateParamsNonStreaming {
    const params: Anthropic.MessageCreateParamsNonStreaming = {
      model: this.config.model,
      max_tokens: this.config.maxTokens,
      temperature: this.config.temperature,
      system: this.config.systemPrompt,
      messages: transcript.map(toMessageParam),
    };

    if (tools !== null && tools.length > 0) {
      params.tools = tools.map(toAnthropicTool);
      params.tool_choice = { type: 'auto' };
    }

    return params;
  }

  protected async complete(
    transcript: Transcript,
    tools: ReadonlyArray<ToolSchema> | null,
  ): Promise<LLMResponse> {
    const message = await this.createMessage(
      this.buildRequest(transcript, tools),
      { timeout: this.config.timeoutMs },
    );
    return toLLMResponse(message);
  }

  protected toClientError(error: unknown): LLMClientError {
    if (error instanceof Anthropic.APIError) {
      return new LLMClientError(`Anthropic API error: ${error.message}`, error.status ?? null, { cause: error });
    }
    return super.toClientError(error);
  }
}

function sdkMessageCreator(sdk: Anthropic): MessageCreator {
  return (params, options) => sdk.messages.create(params, options);
}

// ============ Request Mapping ============

export function toMessageParam(turn: Turn): Anthropic.MessageParam {
  if (typeof turn.content === 'string') {
    return { role: turn.role, content: turn.content };
  }
  return { role: turn.role, content: turn.content.map(toContentBlockParam) };
}

function toContentBlockParam(block: ContentBlock): Anthropic.ContentBlockParam {
  switch (block.type) {
    case 'text':
      return { type: 'text', text: block.text };
    case 'tool_request':
      return { type: 'tool_use', id: block.id, name: block.name, input: { ...block.arguments } };
    case 'tool_result':
      return {
        type: 'tool_result',
        tool_use_id: block.requestId,
        content: block.content,
        is_error: block.isError,
      };
  }
}

function toAnthropicTool(schema: ToolSchema): Anthropic.Tool {
  return {
    name: schema.name,
    description: schema.description,
    input_schema: {
      type: 'object',
      properties: { ...schema.input_schema.properties },
      required: [...schema.input_schema.required],
    },
  };
}

// ============ Response Mapping ============

/**
 * Maps a returned message to an `LLMResponse`.
 *
 * A message is a tool-use response only if the model stopped for tool use
 * and emitted at least one `tool_use` block; otherwise its first text block
 * is the answer.
 *
 * @throws LLMClientError if a `tool_use` block is malformed
 */
export function toLLMResponse(message: ModelMessage): LLMResponse {
  const texts: string[] = [];
  const toolRequests: ToolRequestBlock[] = [];

  for (const block of message.content) {
    if (block.type === 'text' && block.text !== undefined) {
      texts.push(block.text);
    } else if (block.type === 'tool_use') {
      toolRequests.push(toToolRequest(block));
    }
  }

  // Both variants take the first text block, so a tool_use reply that ends
  // the run answers with the same text a plain reply would.
  if (message.stop_reason === 'tool_use' && toolRequests.length > 0) {
    return {
      stopReason: 'tool_use',
      text: texts[0] ?? '',
      toolRequests,
      rawStopReason: message.stop_reason,
    };
  }

  return {
    stopReason: 'text',
    text: texts[0] ?? '',
    rawStopReason: message.stop_reason,
  };
}

function toToolRequest(block: ModelContentBlock): ToolRequestBlock {
  if (block.id === undefined || block.name === undefined) {
    throw new LLMClientError('Malformed tool_use block: missing id or name', null);
  }

  const args = ToolArgumentsSchema.safeParse(block.input ?? {});
  if (!args.success) {
    throw new LLMClientError(`Malformed tool_use block '${block.id}': input is not an object`, null);
  }

  return { type: 'tool_request', id: block.id, name: block.name, arguments: args.data };
}
