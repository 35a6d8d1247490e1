/**
 * @fileoverview rag-orchestrator public API.
 *
 * @module rag-orchestrator
 * @version 0.1.0
 */

export * from './types/index.js';

export {
  AppError,
  ToolExecutionError,
  LLMClientError,
  ConfigurationError,
  OrchestrationError,
  UsageError,
  ErrorCode,
  errorMessage,
} from './utils/errors.js';

export {
  Orchestrator,
  DEFAULT_ORCHESTRATOR_CONFIG,
  advanceRound,
  appendTurn,
  classifyTermination,
  createInitialState,
  createTermination,
  recordToolRound,
  requestStop,
  terminate,
  toolsForRound,
  type OrchestratorEvents,
  type OrchestratorConfig,
  type OrchestrationResult,
  type RunOptions,
  type ToolExecution,
  type OrchestrationState,
  type TerminationReason,
  type TerminationRecord,
  type InitialStateOptions,
} from './agent/index.js';

export {
  ToolRegistry,
  DEFAULT_REGISTRY_CONFIG,
  toToolSchema,
  type ToolRegistryConfig,
  type ToolRegistryEntry,
  type ToolRegistryEvents,
} from './registry/index.js';

export * from './tools/index.js';
export * from './catalog/index.js';
export * from './providers/index.js';
export * from './observability/index.js';

export { loadConfig, requireApiKey, type AppConfig, type Environment } from './config/index.js';
export { createSystemPrompt, DEFAULT_SYSTEM_PROMPT } from './prompts/system-prompt.js';
export { VERSION } from './version.js';
