/**
 * @fileoverview Programmatic usage of the orchestrator against the bundled sample catalog.
 *
 * Compile with the root tsconfig, then run from the repository root:
 *   npx tsc && ANTHROPIC_API_KEY=... node dist/examples/basic-usage.js
 */

import { resolve } from 'node:path';
import {
  AnthropicClient,
  InMemoryCourseCatalog,
  Orchestrator,
  Severity,
  ToolRegistry,
  createCourseTools,
  createLogger,
  createSystemPrompt,
  loadConfig,
  requireApiKey,
} from '../src/index.js';

const CATALOG_PATH = resolve('data/sample-catalog.json');

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger('example', { minLevel: Severity.INFO });

  const catalog = await InMemoryCourseCatalog.fromFile(CATALOG_PATH);
  const registry = new ToolRegistry({ logger: logger.child({ module: 'registry' }) });
  for (const tool of createCourseTools(catalog)) {
    registry.register(tool);
  }

  const maxRounds = 2;
  const client = new AnthropicClient({
    apiKey: requireApiKey(config),
    config: { ...config.llm, systemPrompt: createSystemPrompt(maxRounds) },
    logger: logger.child({ module: 'llm' }),
  });

  const orchestrator = new Orchestrator(client, registry, { maxRounds, logger });

  orchestrator.on('tool:start', (_runId, round, request) => {
    console.log(`[round ${round}] ${request.name} ${JSON.stringify(request.arguments)}`);
  });

  // Compare two lessons so the model needs more than one search.
  const result = await orchestrator.runDetailed(
    'How does lesson 1 of Retrieval Basics relate to lesson 2 of Building Tool-Using Agents?',
    { tools: registry.getSchemas() },
  );

  console.log(`\n${result.answer}\n`);
  console.log(`termination: ${result.termination.reason} (${result.termination.detail})`);
  for (const source of result.sources) {
    console.log(`source: ${source.label}${source.link !== null ? ` ${source.link}` : ''}`);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
