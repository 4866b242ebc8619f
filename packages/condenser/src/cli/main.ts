import { isCondenserError } from '../core/errors.js';
import { QueryCache } from '../network/query-cache.js';
import { AnalysisServiceClient } from '../service/client.js';
import { createLogger, type Logger, type LogLevel } from '../utils/logger.js';
import { buildCommand, type SnapshotService } from './commands/build.js';
import { queryCommand } from './commands/query.js';
import { simplifyCommand } from './commands/simplify.js';
import { loadConfig, type CondenserConfig } from './config.js';

export const VERSION = '0.1.0';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export function helpText(): string {
  return `
route-condenser - condense routing policies into a verification IR

Usage:
  route-condenser <command> [options]

Commands:
  build <config-dir> [-o out.json]          Upload configs to the analysis service
                                            and write its raw answer tables
  simplify <raw.json> [-o out.ir.json]      Build the topology and write the
                                            condensed IR
  query <ir.json|raw.json> --destination <addr>
                                            Answer a reachability query
  version                                   Show version information
  help                                      Show this help message

Global Options:
  --config <path>   Config file (default: ./route-condenser.yaml)
  --verbose, -v     Debug logging and stack traces
  --quiet, -q       Only log errors
  --help, -h        Show help

Command Options:
  simplify:
    --simplify-bools, -b    Simplify policy expressions before writing
    --keep-unsupported      Keep unknown constructs instead of failing

  query:
    --destination <addr>    Destination address or prefix
    --source <node>         Node whose reachability decides the answer
    --trace                 Include the hop-by-hop trace
    --queries <file.yaml>   Run a batch of queries instead

Exit Codes:
  0  Success (query: every answer is accept)
  1  Failure (query: reject, error or inconclusive)
  2  Usage error (invalid arguments)
`;
}

export interface ParsedArgs {
  command: string;
  positionals: string[];
  flags: Record<string, boolean>;
  options: Record<string, string>;
}

const VALUE_FLAGS = new Set(['output', 'config', 'destination', 'source', 'queries']);

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export function parseArgs(args: string[]): ParsedArgs {
  const flags: Record<string, boolean> = {};
  const options: Record<string, string> = {};
  const positionals: string[] = [];
  let command = '';

  const takeValue = (flag: string, i: number): string => {
    const value = args[i + 1];
    if (value === undefined || value.startsWith('-')) {
      throw new UsageError(`Option --${flag} requires a value`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      const flag = arg.slice(2);
      if (VALUE_FLAGS.has(flag)) {
        options[flag] = takeValue(flag, i);
        i++;
      } else {
        flags[flag] = true;
      }
    } else if (arg.startsWith('-') && arg.length > 1) {
      const shortFlags = arg.slice(1).split('');
      for (const f of shortFlags) {
        switch (f) {
          case 'o':
            options['output'] = takeValue('output', i);
            i++;
            break;
          case 'b': flags['simplify-bools'] = true; break;
          case 'v': flags['verbose'] = true; break;
          case 'q': flags['quiet'] = true; break;
          case 'h': flags['help'] = true; break;
          default:
            throw new UsageError(`Unknown option -${f}`);
        }
      }
    } else if (!command) {
      command = arg;
    } else {
      positionals.push(arg);
    }
  }

  return { command, positionals, flags, options };
}

export interface RunDependencies {
  createService?: (config: CondenserConfig, logger: Logger) => SnapshotService;
  logger?: Logger;
}

function logLevelFor(config: CondenserConfig, flags: Record<string, boolean>): LogLevel {
  if (flags['verbose']) return 'debug';
  if (flags['quiet']) return 'error';
  return config.logLevel;
}

function requirePositional(positionals: string[], usage: string): string {
  const value = positionals[0];
  if (value === undefined) throw new UsageError(`Usage: ${usage}`);
  return value;
}

async function dispatch(parsed: ParsedArgs, deps: RunDependencies): Promise<number> {
  const { command, positionals, flags, options } = parsed;
  const { config } = loadConfig({ path: options['config'] });
  const logger = deps.logger ?? createLogger(logLevelFor(config, flags));

  switch (command) {
    case 'build': {
      const dir = requirePositional(positionals, 'route-condenser build <config-dir> [-o out.json]');
      const service = deps.createService
        ? deps.createService(config, logger)
        : new AnalysisServiceClient({
            config: { baseUrl: config.service.url, timeoutMs: config.service.timeoutMs, retries: config.service.retries },
            logger,
          });
      await buildCommand({ dir, output: options['output'], service, logger });
      return EXIT_SUCCESS;
    }

    case 'simplify': {
      const input = requirePositional(positionals, 'route-condenser simplify <raw.json> [-o out.ir.json]');
      simplifyCommand({
        input,
        output: options['output'],
        simplifyBools: flags['simplify-bools'] === true || config.simplify,
        keepUnsupported: flags['keep-unsupported'],
        logger,
      });
      return EXIT_SUCCESS;
    }

    case 'query': {
      const usage = 'route-condenser query <ir.json|raw.json> --destination <addr>';
      const input = requirePositional(positionals, usage);
      if (!options['destination'] && !options['queries']) {
        throw new UsageError(`Usage: ${usage}`);
      }
      const result = queryCommand({
        input,
        destination: options['destination'],
        source: options['source'],
        trace: flags['trace'],
        queries: options['queries'],
        keepUnsupported: flags['keep-unsupported'],
        maxIterations: config.query.maxIterations,
        maxPaths: config.query.maxPaths,
        cache: new QueryCache(),
        logger,
      });
      return result.success ? EXIT_SUCCESS : EXIT_FAILURE;
    }

    default:
      throw new UsageError(`Unknown command: ${command}`);
  }
}

/**
 * Run the CLI and return the process exit code.
 */
export async function run(args: string[], deps: RunDependencies = {}): Promise<number> {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(args);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(error.message);
      return EXIT_USAGE;
    }
    throw error;
  }

  if (parsed.flags['help'] || parsed.command === 'help' || parsed.command === '') {
    console.log(helpText());
    return EXIT_SUCCESS;
  }

  if (parsed.flags['version'] || parsed.command === 'version') {
    console.log(`route-condenser v${VERSION}`);
    return EXIT_SUCCESS;
  }

  try {
    return await dispatch(parsed, deps);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(error.message);
      console.error('Run "route-condenser help" for usage information.');
      return EXIT_USAGE;
    }
    if (isCondenserError(error)) {
      console.error(error.describe());
    } else {
      console.error(`error ${error instanceof Error ? error.message : String(error)}`);
    }
    if (parsed.flags['verbose'] && error instanceof Error && error.stack) {
      console.error(error.stack);
    }
    return EXIT_FAILURE;
  }
}
