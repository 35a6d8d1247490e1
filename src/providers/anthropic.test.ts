/**
 * @fileoverview Unit tests for AnthropicClient
 */

import { describe, it, expect, vi } from 'vitest';
import Anthropic from '@anthropic-ai/sdk';
import { AnthropicClient, toLLMResponse, type MessageCreator, type ModelMessage } from './anthropic.js';
import type { ToolSchema, Transcript } from '../types/index.js';
import { Severity } from '../types/index.js';
import { LLMClientError } from '../utils/errors.js';
import { Logger, MemoryTransport } from '../observability/logger.js';

const searchSchema: ToolSchema = {
  name: 'search_course_content',
  description: 'Search course materials',
  input_schema: {
    type: 'object',
    properties: { query: { type: 'string' } },
    required: ['query'],
  },
};

function clientWith(createMessage: MessageCreator): AnthropicClient {
  return new AnthropicClient({
    config: { model: 'test-model', systemPrompt: 'test prompt' },
    createMessage,
    logger: new Logger({ minLevel: Severity.DEBUG, transports: [new MemoryTransport()] }),
  });
}

const textMessage: ModelMessage = {
  content: [{ type: 'text', text: 'Hello.' }],
  stop_reason: 'end_turn',
};

describe('AnthropicClient', () => {
  describe('buildRequest()', () => {
    it('should omit tools when none are offered', () => {
      const client = clientWith(vi.fn(async () => textMessage));

      const request = client.buildRequest([{ role: 'user', content: 'hi' }], null);

      expect(request).toEqual({
        model: 'test-model',
        max_tokens: 800,
        temperature: 0,
        system: 'test prompt',
        messages: [{ role: 'user', content: 'hi' }],
      });
    });

    it('should offer tools with automatic tool choice', () => {
      const client = clientWith(vi.fn(async () => textMessage));

      const request = client.buildRequest([{ role: 'user', content: 'hi' }], [searchSchema]);

      expect(request.tools).toEqual([
        {
          name: 'search_course_content',
          description: 'Search course materials',
          input_schema: { type: 'object', properties: { query: { type: 'string' } }, required: ['query'] },
        },
      ]);
      expect(request.tool_choice).toEqual({ type: 'auto' });
    });

    it('should treat an empty tool list as no tools', () => {
      const client = clientWith(vi.fn(async () => textMessage));

      const request = client.buildRequest([{ role: 'user', content: 'hi' }], []);

      expect(request.tools).toBeUndefined();
      expect(request.tool_choice).toBeUndefined();
    });

    it('should map tool requests and results to Anthropic blocks', () => {
      const client = clientWith(vi.fn(async () => textMessage));
      const transcript: Transcript = [
        { role: 'user', content: 'What is in lesson 1?' },
        {
          role: 'assistant',
          content: [
            { type: 'text', text: 'Searching.' },
            { type: 'tool_request', id: 'toolu_1', name: 'search_course_content', arguments: { query: 'lesson 1' } },
          ],
        },
        {
          role: 'user',
          content: [{ type: 'tool_result', requestId: 'toolu_1', content: 'Error executing tool: down', isError: true }],
        },
      ];

      const request = client.buildRequest(transcript, null);

      expect(request.messages).toEqual([
        { role: 'user', content: 'What is in lesson 1?' },
        {
          role: 'assistant',
          content: [
            { type: 'text', text: 'Searching.' },
            { type: 'tool_use', id: 'toolu_1', name: 'search_course_content', input: { query: 'lesson 1' } },
          ],
        },
        {
          role: 'user',
          content: [{ type: 'tool_result', tool_use_id: 'toolu_1', content: 'Error executing tool: down', is_error: true }],
        },
      ]);
    });
  });

  describe('send()', () => {
    it('should pass the configured timeout', async () => {
      const createMessage = vi.fn<MessageCreator>(async () => textMessage);
      const client = new AnthropicClient({ config: { timeoutMs: 1234 }, createMessage });

      await client.send([{ role: 'user', content: 'hi' }], null);

      expect(createMessage.mock.calls[0]?.[1]).toEqual({ timeout: 1234 });
    });

    it('should return a text response', async () => {
      const client = clientWith(vi.fn(async () => textMessage));

      await expect(client.send([{ role: 'user', content: 'hi' }], null)).resolves.toEqual({
        stopReason: 'text',
        text: 'Hello.',
        rawStopReason: 'end_turn',
      });
    });

    it('should wrap API errors with their status', async () => {
      const client = clientWith(vi.fn(async () => {
        throw new Anthropic.APIError(429, undefined, 'rate limited', undefined);
      }));

      const failure = client.send([{ role: 'user', content: 'hi' }], null);

      await expect(failure).rejects.toBeInstanceOf(LLMClientError);
      await expect(failure).rejects.toMatchObject({
        status: 429,
        message: 'Anthropic API error: 429 rate limited',
      });
    });

    it('should wrap other failures without a status', async () => {
      const client = clientWith(vi.fn(async () => {
        throw new Error('socket hang up');
      }));

      await expect(client.send([{ role: 'user', content: 'hi' }], null)).rejects.toMatchObject({
        name: 'LLMClientError',
        status: null,
        message: 'anthropic request failed: socket hang up',
      });
    });
  });
});

describe('toLLMResponse()', () => {
  it('should collect tool requests in model order', () => {
    const response = toLLMResponse({
      content: [
        { type: 'text', text: 'Let me look.' },
        { type: 'tool_use', id: 'a', name: 'search_course_content', input: { query: 'x' } },
        { type: 'tool_use', id: 'b', name: 'get_course_outline', input: { course_title: 'y' } },
      ],
      stop_reason: 'tool_use',
    });

    expect(response).toEqual({
      stopReason: 'tool_use',
      text: 'Let me look.',
      toolRequests: [
        { type: 'tool_request', id: 'a', name: 'search_course_content', arguments: { query: 'x' } },
        { type: 'tool_request', id: 'b', name: 'get_course_outline', arguments: { course_title: 'y' } },
      ],
      rawStopReason: 'tool_use',
    });
  });

  it('should take the first text block alongside tool requests', () => {
    const response = toLLMResponse({
      content: [
        { type: 'text', text: 'First.' },
        { type: 'tool_use', id: 'a', name: 'search_course_content', input: { query: 'x' } },
        { type: 'text', text: 'Second.' },
      ],
      stop_reason: 'tool_use',
    });

    expect(response.stopReason).toBe('tool_use');
    expect(response.text).toBe('First.');
  });

  it('should use the first text block as the answer', () => {
    const response = toLLMResponse({
      content: [{ type: 'text', text: 'First.' }, { type: 'text', text: 'Second.' }],
      stop_reason: 'end_turn',
    });

    expect(response).toEqual({ stopReason: 'text', text: 'First.', rawStopReason: 'end_turn' });
  });

  it('should answer with an empty string when there is no text', () => {
    expect(toLLMResponse({ content: [], stop_reason: 'max_tokens' })).toEqual({
      stopReason: 'text',
      text: '',
      rawStopReason: 'max_tokens',
    });
  });

  it('should treat tool_use stop without tool blocks as text', () => {
    const response = toLLMResponse({ content: [{ type: 'text', text: 'Done.' }], stop_reason: 'tool_use' });

    expect(response.stopReason).toBe('text');
  });

  it('should reject tool input that is not an object', () => {
    expect(() => toLLMResponse({
      content: [{ type: 'tool_use', id: 'a', name: 'search_course_content', input: 'query' }],
      stop_reason: 'tool_use',
    })).toThrow(LLMClientError);
  });
});
