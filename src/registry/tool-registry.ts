/**
 * @fileoverview Tool Registry - maps tool names to executable capabilities.
 *
 * The registry validates arguments against each tool's zod schema, applies
 * a per-call timeout and reports every failure as a `ToolExecutionError`,
 * so callers only ever see a text outcome or a typed tool-level error.
 * It keeps usage metrics but no per-query state: sources travel back in
 * the outcome of each call.
 *
 * @module rag-orchestrator/registry/tool-registry
 * @version 0.1.0
 */

import { v4 as uuidv4 } from 'uuid';
import { EventEmitter } from 'eventemitter3';
import type { ZodError } from 'zod';
import type { UniqueId, Timestamp } from '../types/core.types.js';
import { createUniqueId, createTimestamp } from '../types/core.types.js';
import type {
  ToolDefinition,
  ToolExecutionContext,
  ToolExecutor,
  ToolOutcome,
  ToolOutput,
  ToolSchema,
} from '../types/tools.types.js';
import { ErrorCode, ToolExecutionError, errorMessage } from '../utils/errors.js';
import { Logger, createLogger } from '../observability/logger.js';
import { toToolSchema } from './tool-schema.js';

/**
 * Events emitted by the Tool Registry.
 */
export interface ToolRegistryEvents {
  'tool:registered': (name: string) => void;
  'tool:unregistered': (name: string) => void;
  'tool:invoked': (name: string, invocationId: UniqueId) => void;
  'tool:completed': (name: string, invocationId: UniqueId, outcome: ToolOutcome) => void;
  'tool:failed': (name: string, invocationId: UniqueId, error: ToolExecutionError) => void;
}

export interface ToolRegistryConfig {
  /** Timeout for a tool call that does not set its own */
  readonly defaultTimeoutMs: number;

  readonly logger?: Logger;
}

export const DEFAULT_REGISTRY_CONFIG: ToolRegistryConfig = {
  defaultTimeoutMs: 30_000,
};

/**
 * Registration record and usage metrics for one tool.
 */
export interface ToolRegistryEntry {
  readonly definition: ToolDefinition;
  readonly registeredAt: Timestamp;
  readonly enabled: boolean;
  readonly invocationCount: number;
  readonly failureCount: number;
  readonly lastInvokedAt: Timestamp | null;
  readonly averageDurationMs: number;
}

const TOOL_NAME_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;

/**
 * Central registry for tool management.
 *
 * @example
 * ```typescript
 * const registry = new ToolRegistry({ defaultTimeoutMs: 10_000 });
 * createCourseTools(catalog).forEach(tool => registry.register(tool));
 * const text = await registry.execute('search_course_content', { query: 'MCP' });
 * ```
 */
export class ToolRegistry extends EventEmitter<ToolRegistryEvents> implements ToolExecutor {
  private readonly tools: Map<string, ToolRegistryEntry> = new Map();
  private readonly config: ToolRegistryConfig;
  private readonly logger: Logger;

  constructor(config: Partial<ToolRegistryConfig> = {}) {
    super();
    this.config = { ...DEFAULT_REGISTRY_CONFIG, ...config };
    this.logger = this.config.logger ?? createLogger('registry');
  }

  /**
   * Registers a new tool.
   *
   * @throws Error if the name is invalid or already registered
   */
  register(definition: ToolDefinition): void {
    if (!TOOL_NAME_PATTERN.test(definition.name)) {
      throw new Error(`Invalid tool name '${definition.name}': use 1-64 letters, digits, '_' or '-'`);
    }
    if (this.tools.has(definition.name)) {
      throw new Error(`Tool '${definition.name}' is already registered`);
    }

    this.tools.set(definition.name, {
      definition,
      registeredAt: createTimestamp(),
      enabled: true,
      invocationCount: 0,
      failureCount: 0,
      lastInvokedAt: null,
      averageDurationMs: 0,
    });
    this.emit('tool:registered', definition.name);
  }

  /**
   * @returns true if the tool was unregistered, false if not found
   */
  unregister(name: string): boolean {
    const existed = this.tools.delete(name);
    if (existed) {
      this.emit('tool:unregistered', name);
    }
    return existed;
  }

  get(name: string): ToolDefinition | null {
    return this.tools.get(name)?.definition ?? null;
  }

  /**
   * Checks if a tool is registered and enabled.
   */
  has(name: string): boolean {
    return this.tools.get(name)?.enabled === true;
  }

  /**
   * Lists enabled tools in registration order.
   */
  list(): ReadonlyArray<ToolDefinition> {
    return Array.from(this.tools.values())
      .filter(entry => entry.enabled)
      .map(entry => entry.definition);
  }

  setEnabled(name: string, enabled: boolean): void {
    const entry = this.tools.get(name);
    if (entry) {
      this.tools.set(name, { ...entry, enabled });
    }
  }

  /**
   * Schemas of every enabled tool, ready to offer to the model.
   */
  getSchemas(): ReadonlyArray<ToolSchema> {
    return this.list().map(toToolSchema);
  }

  getMetrics(name: string): ToolRegistryEntry | null {
    return this.tools.get(name) ?? null;
  }

  /**
   * Executes a named tool and returns its text.
   *
   * @throws ToolExecutionError on any tool-level failure
   */
  async execute(name: string, args: Readonly<Record<string, unknown>>): Promise<string> {
    const outcome = await this.invoke(name, args);
    return outcome.text;
  }

  /**
   * Executes a named tool and returns its text and sources.
   *
   * @throws ToolExecutionError on any tool-level failure
   */
  async invoke(name: string, args: Readonly<Record<string, unknown>>): Promise<ToolOutcome> {
    const invocationId = createUniqueId(uuidv4());
    const entry = this.tools.get(name);

    if (!entry) {
      throw this.failed(invocationId, ToolExecutionError.notFound(name));
    }
    if (!entry.enabled) {
      throw this.failed(invocationId, ToolExecutionError.disabled(name));
    }

    const parsed = entry.definition.inputSchema.safeParse(args);
    if (!parsed.success) {
      throw this.failed(invocationId, new ToolExecutionError(
        ErrorCode.INVALID_ARGUMENTS,
        `Invalid arguments for tool '${name}': ${formatIssues(parsed.error)}`,
        name,
        { details: parsed.error.issues },
      ));
    }

    this.emit('tool:invoked', name, invocationId);
    this.logger.debug('Tool invoked', { tool: name, invocationId });

    const timeoutMs = entry.definition.timeoutMs ?? this.config.defaultTimeoutMs;
    const startTime = Date.now();

    try {
      const output = await this.executeWithTimeout(entry.definition, parsed.data, invocationId, timeoutMs);
      const outcome = toOutcome(name, output, Date.now() - startTime);

      this.updateMetrics(name, outcome.durationMs, false);
      this.emit('tool:completed', name, invocationId, outcome);

      return outcome;
    } catch (error) {
      this.updateMetrics(name, Date.now() - startTime, true);
      const toolError = error instanceof ToolExecutionError
        ? error
        : new ToolExecutionError(ErrorCode.EXECUTION_FAILED, errorMessage(error), name, { cause: error });
      throw this.failed(invocationId, toolError);
    }
  }

  // ============ Private Methods ============

  private failed(invocationId: UniqueId, error: ToolExecutionError): ToolExecutionError {
    this.logger.warn('Tool failed', {
      tool: error.toolName,
      invocationId,
      code: error.code,
      message: error.message,
    });
    this.emit('tool:failed', error.toolName, invocationId, error);
    return error;
  }

  private executeWithTimeout(
    definition: ToolDefinition,
    input: unknown,
    invocationId: UniqueId,
    timeoutMs: number,
  ): Promise<ToolOutput> {
    const abortController = new AbortController();
    const context: ToolExecutionContext = {
      invocationId,
      signal: abortController.signal,
      logger: this.logger.child({ module: `tool.${definition.name}`, fields: { invocationId } }),
    };

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        abortController.abort();
        reject(ToolExecutionError.timeout(definition.name, timeoutMs));
      }, timeoutMs);

      // a synchronous throw from execute must still clear the timer
      Promise.resolve()
        .then(() => definition.execute(input, context))
        .then(output => {
          clearTimeout(timer);
          resolve(output);
        })
        .catch((error: unknown) => {
          clearTimeout(timer);
          reject(error);
        });
    });
  }

  private updateMetrics(name: string, durationMs: number, failed: boolean): void {
    const entry = this.tools.get(name);
    if (!entry) return;

    const invocationCount = entry.invocationCount + 1;
    this.tools.set(name, {
      ...entry,
      invocationCount,
      failureCount: entry.failureCount + (failed ? 1 : 0),
      lastInvokedAt: createTimestamp(),
      averageDurationMs: (entry.averageDurationMs * entry.invocationCount + durationMs) / invocationCount,
    });
  }
}

function toOutcome(toolName: string, output: ToolOutput, durationMs: number): ToolOutcome {
  if (typeof output === 'string') {
    return { toolName, text: output, sources: [], durationMs };
  }
  return { toolName, text: output.text, sources: output.sources, durationMs };
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(input)'}: ${issue.message}`)
    .join('; ');
}
