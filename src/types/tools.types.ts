/**
 * @fileoverview Tool contract type definitions.
 *
 * Tools are the only way the model reaches the document corpus. Each tool
 * carries its own zod input schema, which doubles as the JSON schema
 * offered to the model and as the validator applied before execution.
 *
 * @module rag-orchestrator/types/tools
 * @version 0.1.0
 */

import type { z } from 'zod';
import type { UniqueId } from './core.types.js';

/**
 * A document or lesson a tool drew its answer from.
 */
export interface SourceReference {
  /** Display label, e.g. "Course Title - Lesson 2" */
  readonly label: string;

  /** Link to the lesson or course, when known */
  readonly link: string | null;
}

/**
 * What a tool returns: plain text, or text plus the sources behind it.
 */
export type ToolOutput =
  | string
  | {
      readonly text: string;
      readonly sources: ReadonlyArray<SourceReference>;
    };

/**
 * Logger interface handed to tool execution.
 */
export interface ExecutionLogger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Context provided to tool execution.
 */
export interface ToolExecutionContext {
  /** Unique ID for this execution */
  readonly invocationId: UniqueId;

  /** Aborted when the per-call timeout fires */
  readonly signal: AbortSignal;

  readonly logger: ExecutionLogger;
}

/**
 * Complete definition of a tool available to the model.
 */
export interface ToolDefinition<TSchema extends z.ZodTypeAny = z.ZodTypeAny> {
  /** Name the model uses to call the tool */
  readonly name: string;

  /** Description shown to the model */
  readonly description: string;

  /** Input parameter schema */
  readonly inputSchema: TSchema;

  /** Overrides the registry's default timeout */
  readonly timeoutMs?: number;

  readonly execute: (
    input: z.output<TSchema>,
    context: ToolExecutionContext,
  ) => Promise<ToolOutput>;
}

/**
 * JSON schema of a tool's input, as offered to the model.
 */
export type ToolInputSchema = {
  readonly type: 'object';
  readonly properties: Readonly<Record<string, unknown>>;
  readonly required: ReadonlyArray<string>;
};

/**
 * Tool description in the shape the model API expects.
 */
export interface ToolSchema {
  readonly name: string;
  readonly description: string;
  readonly input_schema: ToolInputSchema;
}

/**
 * Successful execution of a named tool.
 */
export interface ToolOutcome {
  readonly toolName: string;
  readonly text: string;
  readonly sources: ReadonlyArray<SourceReference>;
  readonly durationMs: number;
}

/**
 * The tool-execution capability the orchestrator depends on.
 * Failures are reported by rejecting, never by a flag on the outcome.
 */
export interface ToolExecutor {
  invoke(name: string, args: Readonly<Record<string, unknown>>): Promise<ToolOutcome>;
}
