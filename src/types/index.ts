/**
 * @fileoverview Type module public exports.
 *
 * @module rag-orchestrator/types
 * @version 0.1.0
 */

export * from './core.types.js';
export * from './conversation.types.js';
export * from './tools.types.js';
export * from './llm.types.js';
export * from './course.types.js';
