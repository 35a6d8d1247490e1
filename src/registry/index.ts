/**
 * @fileoverview Registry module public exports.
 *
 * @module rag-orchestrator/registry
 * @version 0.1.0
 */

export {
  ToolRegistry,
  DEFAULT_REGISTRY_CONFIG,
  type ToolRegistryConfig,
  type ToolRegistryEntry,
  type ToolRegistryEvents,
} from './tool-registry.js';

export { toToolSchema } from './tool-schema.js';
