#!/usr/bin/env node
/**
 * @fileoverview rag-orchestrator CLI
 *
 * Answers questions about a course catalog with a bounded tool loop.
 *
 * Usage:
 *   rag-orchestrator ask "<question>" [options]
 *   rag-orchestrator tools [options]
 *   rag-orchestrator --help
 */

import { fileURLToPath } from 'node:url';
import { parseArgs, type CLIConfig } from './args.js';
import { loadConfig, requireApiKey, type AppConfig } from '../config/index.js';
import { InMemoryCourseCatalog } from '../catalog/in-memory-catalog.js';
import { ToolRegistry } from '../registry/tool-registry.js';
import { createCourseTools } from '../tools/course-tools.js';
import { AnthropicClient } from '../providers/anthropic.js';
import { Orchestrator } from '../agent/orchestrator.js';
import { createSystemPrompt } from '../prompts/system-prompt.js';
import { Logger, createLogger } from '../observability/logger.js';
import { Severity } from '../types/core.types.js';
import { ConfigurationError, UsageError, errorMessage } from '../utils/errors.js';
import { VERSION } from '../version.js';

const DEFAULT_CATALOG_PATH = fileURLToPath(new URL('../../data/sample-catalog.json', import.meta.url));

/**
 * Print help message.
 */
function printHelp(): void {
  console.log(`
╔═══════════════════════════════════════════════════════════════════╗
║                        RAG ORCHESTRATOR                           ║
║        Course Q&A with a bounded multi-round tool loop            ║
╚═══════════════════════════════════════════════════════════════════╝

USAGE:
  rag-orchestrator <command> [options]

COMMANDS:
  ask <question>    Answer a question about the course catalog
  tools             List the tools offered to the model
  help              Show this help message
  version           Show version

OPTIONS:
  -c, --catalog <file>      Course catalog JSON (default: bundled sample)
  -r, --max-rounds <n>      Tool rounds before the final answer (default: MAX_TOOL_ROUNDS or 2)
  --parallel                Run a round's tool calls concurrently
  --verbose                 Print tool activity and debug logs to stderr

ENVIRONMENT:
  ANTHROPIC_API_KEY         Required for ask
  ANTHROPIC_MODEL           Model id (default: claude-sonnet-4-20250514)
  MAX_TOOL_ROUNDS           Default tool rounds per question
  LLM_TIMEOUT_MS            Per model call timeout
  TOOL_TIMEOUT_MS           Per tool call timeout
  LOG_LEVEL                 DEBUG, INFO, WARN, ERROR or FATAL

EXAMPLES:
  rag-orchestrator ask "What does lesson 2 of the tool agents course cover?"
  rag-orchestrator ask "Outline of Retrieval Basics" --max-rounds 1
  rag-orchestrator tools --catalog ./courses.json
`);
}

/**
 * Print version.
 */
function printVersion(): void {
  console.log(`rag-orchestrator v${VERSION}`);
}

async function createRegistry(cli: CLIConfig, config: AppConfig, logger: Logger): Promise<ToolRegistry> {
  const catalogPath = cli.catalogPath ?? DEFAULT_CATALOG_PATH;
  const catalog = await InMemoryCourseCatalog.fromFile(catalogPath, {
    maxResults: config.tools.maxSearchResults,
  });
  logger.debug('Catalog loaded', {
    path: catalogPath,
    courses: catalog.courseCount,
    chunks: catalog.chunkCount,
  });

  const registry = new ToolRegistry({
    defaultTimeoutMs: config.tools.timeoutMs,
    logger: logger.child({ module: 'registry' }),
  });
  for (const tool of createCourseTools(catalog)) {
    registry.register(tool);
  }
  return registry;
}

/**
 * List available tools.
 */
async function listTools(cli: CLIConfig, config: AppConfig, logger: Logger): Promise<void> {
  const registry = await createRegistry(cli, config, logger);
  const schemas = registry.getSchemas();

  console.log('\n╔═══════════════════════════════════════════════════════════════════╗');
  console.log('║                      AVAILABLE TOOLS                              ║');
  console.log('╚═══════════════════════════════════════════════════════════════════╝\n');

  for (const schema of schemas) {
    const required = new Set(schema.input_schema.required);
    const params = Object.keys(schema.input_schema.properties)
      .map(name => (required.has(name) ? name : `${name}?`))
      .join(', ');

    console.log(`  ${schema.name}(${params})`);
    console.log(`     ${schema.description}`);
    console.log('');
  }

  console.log(`Total: ${schemas.length} tools\n`);
}

/**
 * Answer one question.
 */
async function ask(cli: CLIConfig, config: AppConfig, logger: Logger): Promise<void> {
  const apiKey = requireApiKey(config);
  const maxRounds = cli.maxRounds ?? config.orchestrator.maxRounds;
  const registry = await createRegistry(cli, config, logger);

  const client = new AnthropicClient({
    apiKey,
    config: { ...config.llm, systemPrompt: createSystemPrompt(maxRounds) },
    logger: logger.child({ module: 'llm' }),
  });

  const orchestrator = new Orchestrator(client, registry, {
    maxRounds,
    parallelToolExecution: cli.parallel || config.orchestrator.parallelToolExecution,
    maxConsecutiveToolFailures: config.orchestrator.maxConsecutiveToolFailures,
    logger: logger.child({ module: 'agent.orchestrator' }),
  });

  if (cli.verbose) {
    orchestrator.on('tool:start', (_runId, round, request) => {
      console.error(`  [round ${round}] → ${request.name} ${JSON.stringify(request.arguments)}`);
    });
    orchestrator.on('tool:complete', (_runId, execution) => {
      console.error(`  [round ${execution.round}] ← ${execution.request.name}: ✓ (${execution.durationMs}ms)`);
    });
    orchestrator.on('tool:failed', (_runId, execution) => {
      console.error(`  [round ${execution.round}] ← ${execution.request.name}: ✗ ${execution.error ?? ''}`);
    });
  }

  const result = await orchestrator.runDetailed(cli.question, {
    tools: registry.getSchemas(),
    maxRounds,
  });

  console.log(result.answer);

  if (result.sources.length > 0) {
    console.log('\nSources:');
    for (const source of result.sources) {
      console.log(source.link !== null ? `  - ${source.label} (${source.link})` : `  - ${source.label}`);
    }
  }

  if (cli.verbose) {
    console.error(
      `\n  ${result.termination.reason}: ${result.termination.detail}; ` +
      `${result.llmCalls} model call(s), ${result.toolExecutions.length} tool call(s), ${result.durationMs}ms`,
    );
  }
}

/**
 * Main entry point.
 */
async function main(): Promise<void> {
  let cli: CLIConfig;
  try {
    cli = parseArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`Error: ${error.message}\nRun 'rag-orchestrator --help' for usage.`);
      process.exitCode = 2;
      return;
    }
    throw error;
  }

  switch (cli.command) {
    case 'help':
      printHelp();
      return;

    case 'version':
      printVersion();
      return;

    case 'tools':
    case 'ask': {
      const config = loadConfig(process.env);
      const logger = createLogger('cli', { minLevel: cli.verbose ? Severity.DEBUG : config.logLevel });

      if (cli.command === 'tools') {
        await listTools(cli, config, logger);
      } else {
        await ask(cli, config, logger);
      }
      return;
    }
  }
}

main().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    console.error(`Configuration error: ${error.message}`);
  } else {
    console.error(`Fatal error: ${errorMessage(error)}`);
  }
  process.exit(1);
});
