/**
 * @fileoverview Base class for model clients.
 *
 * A concrete provider only translates the transcript and tool schemas to
 * its wire format and back (`complete`). Logging and the mapping of
 * provider failures to `LLMClientError` live here, so the orchestrator
 * sees the same contract from every provider.
 *
 * @module rag-orchestrator/providers/base
 */

import type { Transcript } from '../types/conversation.types.js';
import type { LLMClient, LLMResponse } from '../types/llm.types.js';
import type { ToolSchema } from '../types/tools.types.js';
import { LLMClientError, errorMessage } from '../utils/errors.js';
import { Logger, createLogger } from '../observability/logger.js';
import { DEFAULT_SYSTEM_PROMPT } from '../prompts/system-prompt.js';

/**
 * Provider configuration.
 */
export interface ProviderConfig {
  /** Model identifier */
  readonly model: string;

  /** Upper bound on generated tokens per call */
  readonly maxTokens: number;

  readonly temperature: number;

  /** Per-call timeout */
  readonly timeoutMs: number;

  /** Transport retries performed by the provider SDK */
  readonly maxRetries: number;

  readonly systemPrompt: string;
}

export const DEFAULT_PROVIDER_CONFIG: ProviderConfig = {
  model: 'claude-sonnet-4-20250514',
  maxTokens: 800,
  temperature: 0,
  timeoutMs: 60_000,
  maxRetries: 2,
  systemPrompt: DEFAULT_SYSTEM_PROMPT,
};

/**
 * Abstract base class for model clients.
 */
export abstract class BaseLLMClient implements LLMClient {
  abstract readonly name: string;

  protected readonly config: ProviderConfig;
  protected readonly logger: Logger;

  constructor(config: Partial<ProviderConfig> = {}, logger?: Logger) {
    this.config = { ...DEFAULT_PROVIDER_CONFIG, ...config };
    this.logger = logger ?? createLogger('llm');
  }

  async send(transcript: Transcript, tools: ReadonlyArray<ToolSchema> | null): Promise<LLMResponse> {
    const offered = tools !== null && tools.length > 0 ? tools : null;
    const start = Date.now();

    this.logger.debug('Model request', {
      provider: this.name,
      model: this.config.model,
      turns: transcript.length,
      tools: offered?.length ?? 0,
    });

    try {
      const response = await this.complete(transcript, offered);
      this.logger.debug('Model response', {
        provider: this.name,
        stopReason: response.stopReason,
        rawStopReason: response.rawStopReason,
        durationMs: Date.now() - start,
      });
      return response;
    } catch (error) {
      const clientError = error instanceof LLMClientError ? error : this.toClientError(error);
      this.logger.error('Model request failed', {
        provider: this.name,
        status: clientError.status,
        durationMs: Date.now() - start,
      }, clientError);
      throw clientError;
    }
  }

  /**
   * Performs one provider call. `tools` is null or non-empty.
   */
  protected abstract complete(
    transcript: Transcript,
    tools: ReadonlyArray<ToolSchema> | null,
  ): Promise<LLMResponse>;

  /**
   * Maps a provider failure to `LLMClientError`. Providers override this to
   * extract the HTTP status from their SDK's error type.
   */
  protected toClientError(error: unknown): LLMClientError {
    return new LLMClientError(`${this.name} request failed: ${errorMessage(error)}`, null, { cause: error });
  }
}
