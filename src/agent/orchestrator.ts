/**
 * @fileoverview Orchestrator - bounded multi-round tool loop.
 *
 * Each round makes one model call. While rounds remain the model is offered
 * the tools; when it asks for them, every request is executed, all results
 * go back in one user turn, and the next round begins. The call made once
 * `maxRounds` rounds are spent carries no tools, so a run makes at most
 * `maxRounds + 1` model calls.
 *
 * Tool failures never end a run: they reach the model as error-flagged
 * results. Model client failures end it and propagate to the caller.
 *
 * @module rag-orchestrator/agent/orchestrator
 * @version 0.1.0
 */

import { EventEmitter } from 'eventemitter3';
import { v4 as uuidv4 } from 'uuid';
import type { UniqueId } from '../types/core.types.js';
import { createUniqueId } from '../types/core.types.js';
import type { ToolRequestBlock, ToolResultBlock, Transcript } from '../types/conversation.types.js';
import { assistantText, toolRequestTurn, toolResultTurn } from '../types/conversation.types.js';
import type { LLMClient, LLMResponse } from '../types/llm.types.js';
import type { SourceReference, ToolExecutor, ToolOutcome, ToolSchema } from '../types/tools.types.js';
import { OrchestrationError, errorMessage } from '../utils/errors.js';
import { Logger, createLogger } from '../observability/logger.js';
import { SpanStatus, SpanType, TraceRecorder, traced, type ExecutionTrace } from '../observability/tracer.js';
import {
  advanceRound,
  appendTurn,
  createInitialState,
  createTermination,
  recordToolRound,
  requestStop,
  terminate,
  toolsForRound,
  type OrchestrationState,
  type TerminationRecord,
} from './state.js';

/**
 * Events emitted by the orchestrator.
 */
export interface OrchestratorEvents {
  'run:start': (runId: UniqueId, query: string) => void;
  'round:start': (runId: UniqueId, round: number, toolsOffered: boolean) => void;
  'llm:response': (runId: UniqueId, round: number, response: LLMResponse) => void;
  'tool:start': (runId: UniqueId, round: number, request: ToolRequestBlock) => void;
  'tool:complete': (runId: UniqueId, execution: ToolExecution) => void;
  'tool:failed': (runId: UniqueId, execution: ToolExecution) => void;
  'run:complete': (runId: UniqueId, result: OrchestrationResult) => void;
  'run:failed': (runId: UniqueId, error: unknown) => void;
}

export interface OrchestratorConfig {
  /** Tool rounds allowed per run when the caller does not say */
  readonly maxRounds: number;

  /** Run a round's tool requests concurrently; results keep request order */
  readonly parallelToolExecution: boolean;

  /**
   * Consecutive rounds in which every tool fails before the loop stops
   * offering tools. 0 disables the check.
   */
  readonly maxConsecutiveToolFailures: number;

  readonly logger?: Logger;
}

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  maxRounds: 2,
  parallelToolExecution: false,
  maxConsecutiveToolFailures: 0,
};

export interface RunOptions {
  /** Prior turns; the query is appended after them */
  readonly history?: Transcript;

  /** Schemas offered to the model; none when omitted */
  readonly tools?: ReadonlyArray<ToolSchema>;

  readonly maxRounds?: number;
}

/**
 * One executed tool request.
 */
export interface ToolExecution {
  readonly round: number;
  readonly request: ToolRequestBlock;
  readonly result: ToolResultBlock;
  readonly sources: ReadonlyArray<SourceReference>;

  /** Failure message, null on success */
  readonly error: string | null;

  readonly durationMs: number;
}

export interface OrchestrationResult {
  readonly runId: UniqueId;
  readonly answer: string;
  readonly termination: TerminationRecord;
  readonly finalState: OrchestrationState;

  /** Initial state, the state after each tool round, and the final state */
  readonly states: ReadonlyArray<OrchestrationState>;

  /** Sources of successful tool calls, first occurrence first */
  readonly sources: ReadonlyArray<SourceReference>;

  readonly llmCalls: number;
  readonly toolExecutions: ReadonlyArray<ToolExecution>;
  readonly trace: ExecutionTrace;
  readonly durationMs: number;
}

interface RoundContext {
  readonly runId: UniqueId;
  readonly round: number;
  readonly tracer: TraceRecorder;
  readonly roundSpan: UniqueId;
  readonly logger: Logger;
}

/**
 * Runs queries against a model with bounded access to tools.
 *
 * @example
 * ```typescript
 * const orchestrator = new Orchestrator(new AnthropicClient(), registry);
 * const answer = await orchestrator.run('What does lesson 2 cover?', {
 *   tools: registry.getSchemas(),
 * });
 * ```
 */
export class Orchestrator extends EventEmitter<OrchestratorEvents> {
  private readonly config: OrchestratorConfig;
  private readonly logger: Logger;

  constructor(
    private readonly llm: LLMClient,
    private readonly executor: ToolExecutor,
    config: Partial<OrchestratorConfig> = {},
  ) {
    super();
    this.config = { ...DEFAULT_ORCHESTRATOR_CONFIG, ...config };
    this.logger = this.config.logger ?? createLogger('agent.orchestrator');
  }

  /**
   * Answers a query and returns the final text.
   *
   * @throws OrchestrationError for an invalid `maxRounds`
   * @throws LLMClientError when a model call fails
   */
  async run(query: string, options: RunOptions = {}): Promise<string> {
    const result = await this.runDetailed(query, options);
    return result.answer;
  }

  /**
   * Answers a query and returns the answer with everything that led to it.
   */
  async runDetailed(query: string, options: RunOptions = {}): Promise<OrchestrationResult> {
    let state = createInitialState(query, {
      history: options.history,
      tools: options.tools,
      maxRounds: options.maxRounds ?? this.config.maxRounds,
    });

    const runId = createUniqueId(uuidv4());
    const startTime = Date.now();
    const logger = this.logger.child({ runId });
    const tracer = new TraceRecorder(runId);
    const states: OrchestrationState[] = [state];
    const executions: ToolExecution[] = [];
    let llmCalls = 0;

    this.emit('run:start', runId, query);
    logger.info('Run started', {
      maxRounds: state.maxRounds,
      tools: state.tools.map(tool => tool.name),
      historyTurns: state.transcript.length - 1,
    });
    const runSpan = tracer.startSpan('run', { type: SpanType.RUN, attributes: { maxRounds: state.maxRounds } });

    try {
      while (state.round <= state.maxRounds) {
        const round = state.round;
        const tools = toolsForRound(state);
        const transcript = state.transcript;

        tracer.setRound(round);
        const roundSpan = tracer.startSpan(`round ${round}`, { type: SpanType.ROUND, parentId: runSpan });
        this.emit('round:start', runId, round, tools !== null);

        const response = await traced(
          tracer,
          'llm',
          { type: SpanType.LLM_CALL, parentId: roundSpan, attributes: { toolsOffered: tools?.length ?? 0 } },
          async spanId => {
            const reply = await this.llm.send(transcript, tools);
            tracer.setAttributes(spanId, { stopReason: reply.stopReason, rawStopReason: reply.rawStopReason });
            return reply;
          },
        );
        llmCalls++;
        this.emit('llm:response', runId, round, response);

        if (response.stopReason === 'text' || tools === null) {
          if (response.stopReason === 'tool_use') {
            logger.warn('Ignoring tool requests on a tool-free call', {
              round,
              requested: response.toolRequests.map(request => request.name),
            });
          }
          tracer.endSpan(roundSpan);
          return this.finish(runId, query, state, response.text, {
            states, executions, llmCalls, tracer, runSpan, startTime, logger,
          });
        }

        const context: RoundContext = { runId, round, tracer, roundSpan, logger };
        const roundExecutions = await this.executeTools(context, response.toolRequests);
        executions.push(...roundExecutions);

        state = recordToolRound(
          state,
          toolRequestTurn(response.text, response.toolRequests),
          toolResultTurn(roundExecutions.map(execution => execution.result)),
        );
        state = advanceRound(state);

        const failureLimit = this.config.maxConsecutiveToolFailures;
        if (failureLimit > 0 && state.consecutiveFailedRounds >= failureLimit) {
          logger.warn('Stopping tool use after repeated failures', {
            consecutiveFailedRounds: state.consecutiveFailedRounds,
          });
          state = requestStop(state);
        }

        states.push(state);
        tracer.endSpan(roundSpan);
      }

      throw new OrchestrationError(
        `Round ${state.round} exceeds maxRounds ${state.maxRounds}`,
        { round: state.round, maxRounds: state.maxRounds },
      );
    } catch (error) {
      tracer.finalize(false, { query, totalRounds: state.round });
      logger.error('Run failed', { round: state.round, llmCalls }, error);
      this.emit('run:failed', runId, error);
      throw error;
    }
  }

  // ============ Private Methods ============

  private finish(
    runId: UniqueId,
    query: string,
    state: OrchestrationState,
    answer: string,
    run: {
      states: OrchestrationState[];
      executions: ReadonlyArray<ToolExecution>;
      llmCalls: number;
      tracer: TraceRecorder;
      runSpan: UniqueId;
      startTime: number;
      logger: Logger;
    },
  ): OrchestrationResult {
    const termination = createTermination(state, run.llmCalls);
    let finalState = terminate(state, termination);
    if (answer.length > 0) {
      finalState = appendTurn(finalState, assistantText(answer));
    }
    run.states.push(finalState);

    run.tracer.endSpan(run.runSpan, SpanStatus.OK, { termination: termination.reason });
    const trace = run.tracer.finalize(true, {
      query,
      totalRounds: state.round,
      custom: { termination: termination.reason, llmCalls: run.llmCalls },
    });

    const result: OrchestrationResult = {
      runId,
      answer,
      termination,
      finalState,
      states: run.states,
      sources: collectSources(run.executions),
      llmCalls: run.llmCalls,
      toolExecutions: run.executions,
      trace,
      durationMs: Date.now() - run.startTime,
    };

    run.logger.info('Run completed', {
      termination: termination.reason,
      llmCalls: run.llmCalls,
      toolExecutions: run.executions.length,
      durationMs: result.durationMs,
    });
    this.emit('run:complete', runId, result);

    return result;
  }

  private async executeTools(
    context: RoundContext,
    requests: ReadonlyArray<ToolRequestBlock>,
  ): Promise<ToolExecution[]> {
    if (this.config.parallelToolExecution) {
      return Promise.all(requests.map(request => this.executeTool(context, request)));
    }

    const executions: ToolExecution[] = [];
    for (const request of requests) {
      executions.push(await this.executeTool(context, request));
    }
    return executions;
  }

  /**
   * Executes one request. Never rejects: failures become error results.
   */
  private async executeTool(context: RoundContext, request: ToolRequestBlock): Promise<ToolExecution> {
    const { runId, round, tracer } = context;
    this.emit('tool:start', runId, round, request);

    const spanId = tracer.startSpan(`tool ${request.name}`, {
      type: SpanType.TOOL,
      parentId: context.roundSpan,
      round,
      attributes: { tool: request.name, requestId: request.id },
    });
    const startTime = Date.now();

    let outcome: ToolOutcome;
    try {
      outcome = await this.executor.invoke(request.name, request.arguments);
    } catch (error) {
      const message = errorMessage(error);
      const execution: ToolExecution = {
        round,
        request,
        result: {
          type: 'tool_result',
          requestId: request.id,
          content: `Error executing tool: ${message}`,
          isError: true,
        },
        sources: [],
        error: message,
        durationMs: Date.now() - startTime,
      };

      tracer.addEvent(spanId, 'error', { message });
      tracer.endSpan(spanId, SpanStatus.ERROR);
      context.logger.warn('Tool call failed', {
        round,
        tool: request.name,
        requestId: request.id,
        error: message,
      });
      this.emit('tool:failed', runId, execution);
      return execution;
    }

    const execution: ToolExecution = {
      round,
      request,
      result: { type: 'tool_result', requestId: request.id, content: outcome.text, isError: false },
      sources: outcome.sources,
      error: null,
      durationMs: Date.now() - startTime,
    };

    tracer.endSpan(spanId, SpanStatus.OK, { sources: outcome.sources.length });
    context.logger.debug('Tool call completed', {
      round,
      tool: request.name,
      requestId: request.id,
      durationMs: execution.durationMs,
    });
    this.emit('tool:complete', runId, execution);
    return execution;
  }
}

function collectSources(executions: ReadonlyArray<ToolExecution>): SourceReference[] {
  const sources: SourceReference[] = [];
  const seen = new Set<string>();

  for (const execution of executions) {
    for (const source of execution.sources) {
      const key = `${source.label}\u0000${source.link ?? ''}`;
      if (!seen.has(key)) {
        seen.add(key);
        sources.push(source);
      }
    }
  }

  return sources;
}
