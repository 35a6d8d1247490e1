/**
 * @fileoverview Error taxonomy for the orchestrator.
 *
 * Tool-level failures are recovered inside the loop; everything else propagates.
 *
 * @module rag-orchestrator/utils/errors
 */

export enum ErrorCode {
  TOOL_NOT_FOUND = 'TOOL_NOT_FOUND',
  TOOL_DISABLED = 'TOOL_DISABLED',
  INVALID_ARGUMENTS = 'INVALID_ARGUMENTS',
  TOOL_TIMEOUT = 'TOOL_TIMEOUT',
  EXECUTION_FAILED = 'EXECUTION_FAILED',
  SEARCH_FAILED = 'SEARCH_FAILED',
  LLM_REQUEST_FAILED = 'LLM_REQUEST_FAILED',
  INVALID_CONFIG = 'INVALID_CONFIG',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
}

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'AppError';
  }
}

/**
 * A tool could not produce a result. The orchestrator turns this into an
 * error-flagged tool result instead of failing the query.
 */
export class ToolExecutionError extends AppError {
  constructor(
    code: ErrorCode,
    message: string,
    public readonly toolName: string,
    options?: { cause?: unknown; details?: unknown },
  ) {
    super(code, message, options?.details, { cause: options?.cause });
    this.name = 'ToolExecutionError';
  }

  static notFound(toolName: string): ToolExecutionError {
    return new ToolExecutionError(ErrorCode.TOOL_NOT_FOUND, `Tool '${toolName}' not found`, toolName);
  }

  static disabled(toolName: string): ToolExecutionError {
    return new ToolExecutionError(ErrorCode.TOOL_DISABLED, `Tool '${toolName}' is currently disabled`, toolName);
  }

  static timeout(toolName: string, timeoutMs: number): ToolExecutionError {
    return new ToolExecutionError(
      ErrorCode.TOOL_TIMEOUT,
      `Tool '${toolName}' timed out after ${timeoutMs}ms`,
      toolName,
    );
  }
}

/**
 * The model endpoint failed (transport, auth, rate limit). Never caught by
 * the orchestration loop.
 */
export class LLMClientError extends AppError {
  constructor(
    message: string,
    public readonly status: number | null,
    options?: { cause?: unknown },
  ) {
    super(ErrorCode.LLM_REQUEST_FAILED, message, { status }, options);
    this.name = 'LLMClientError';
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, public readonly issues: ReadonlyArray<string>) {
    super(ErrorCode.INVALID_CONFIG, message, { issues });
    this.name = 'ConfigurationError';
  }
}

/**
 * The caller passed something the loop cannot run with.
 */
export class OrchestrationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(ErrorCode.INVALID_ARGUMENT, message, details);
    this.name = 'OrchestrationError';
  }
}

/**
 * Bad command-line usage.
 */
export class UsageError extends AppError {
  constructor(message: string) {
    super(ErrorCode.INVALID_ARGUMENT, message);
    this.name = 'UsageError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}
