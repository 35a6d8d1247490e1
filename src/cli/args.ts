/**
 * @fileoverview Command-line argument parsing.
 *
 * @module rag-orchestrator/cli/args
 */

import { UsageError } from '../utils/errors.js';

export type CLICommand = 'ask' | 'tools' | 'help' | 'version';

/**
 * CLI Configuration.
 */
export interface CLIConfig {
  command: CLICommand;
  question: string;
  catalogPath: string | null;
  maxRounds: number | null;
  parallel: boolean;
  verbose: boolean;
}

/**
 * Parse command line arguments.
 *
 * @throws UsageError for unknown commands or options, missing values,
 * or `ask` without a question
 */
export function parseArgs(args: ReadonlyArray<string>): CLIConfig {
  const config: CLIConfig = {
    command: 'help',
    question: '',
    catalogPath: null,
    maxRounds: null,
    parallel: false,
    verbose: false,
  };

  let commandSeen = false;
  const questionParts: string[] = [];

  let i = 0;
  while (i < args.length) {
    const arg = args[i] ?? '';

    switch (arg) {
      case '-h':
      case '--help':
        config.command = 'help';
        commandSeen = true;
        break;

      case '-v':
      case '--version':
        config.command = 'version';
        commandSeen = true;
        break;

      case '-c':
      case '--catalog':
        config.catalogPath = valueOf(args, ++i, arg);
        break;

      case '-r':
      case '--max-rounds':
        config.maxRounds = parseRounds(valueOf(args, ++i, arg));
        break;

      case '--parallel':
        config.parallel = true;
        break;

      case '--verbose':
        config.verbose = true;
        break;

      default:
        if (arg.startsWith('-') && arg !== '-') {
          throw new UsageError(`Unknown option '${arg}'`);
        }
        if (!commandSeen) {
          config.command = parseCommand(arg);
          commandSeen = true;
        } else if (config.command === 'ask') {
          questionParts.push(arg);
        } else {
          throw new UsageError(`Unexpected argument '${arg}'`);
        }
    }

    i++;
  }

  config.question = questionParts.join(' ').trim();
  if (config.command === 'ask' && config.question.length === 0) {
    throw new UsageError('ask requires a question');
  }

  return config;
}

function parseCommand(arg: string): CLICommand {
  switch (arg) {
    case 'ask':
    case 'query':
      return 'ask';
    case 'tools':
    case 'list':
      return 'tools';
    case 'help':
      return 'help';
    case 'version':
      return 'version';
    default:
      throw new UsageError(`Unknown command '${arg}'`);
  }
}

function valueOf(args: ReadonlyArray<string>, index: number, option: string): string {
  const value = args[index];
  if (value === undefined || value.startsWith('-')) {
    throw new UsageError(`${option} requires a value`);
  }
  return value;
}

function parseRounds(value: string): number {
  const rounds = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(rounds)) {
    throw new UsageError(`--max-rounds must be a non-negative integer, got '${value}'`);
  }
  return rounds;
}
