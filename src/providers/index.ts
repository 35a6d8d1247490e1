/**
 * @fileoverview Provider exports
 */

export { BaseLLMClient, DEFAULT_PROVIDER_CONFIG, type ProviderConfig } from './base.js';
export {
  AnthropicClient,
  toLLMResponse,
  toMessageParam,
  type AnthropicClientOptions,
  type MessageCreator,
  type ModelContentBlock,
  type ModelMessage,
} from './anthropic.js';
