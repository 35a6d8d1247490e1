/**
 * @fileoverview Agent module public exports.
 *
 * @module rag-orchestrator/agent
 * @version 0.1.0
 */

export {
  Orchestrator,
  DEFAULT_ORCHESTRATOR_CONFIG,
  type OrchestratorEvents,
  type OrchestratorConfig,
  type OrchestrationResult,
  type RunOptions,
  type ToolExecution,
} from './orchestrator.js';

export {
  advanceRound,
  appendTurn,
  classifyTermination,
  createInitialState,
  createTermination,
  recordToolRound,
  requestStop,
  terminate,
  toolsForRound,
  type OrchestrationState,
  type TerminationReason,
  type TerminationRecord,
  type InitialStateOptions,
} from './state.js';
