import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { JsonObject } from '../../compiler/ast.js';
import { isJsonObject } from '../../compiler/parser.js';
import { QueryError } from '../../core/errors.js';
import type { RouteAttributes } from '../../interpreter/route-record.js';
import type { QueryCache } from '../../network/query-cache.js';
import {
  renderBatchEntry,
  renderQueryResult,
  runQueries,
  runQuery,
  type ReachabilityQuery,
} from '../../network/query-engine.js';
import { buildTopology } from '../../network/service-json.js';
import { loadIr, type Topology } from '../../network/topology.js';
import type { Logger } from '../../utils/logger.js';

export interface QueryCommandOptions {
  input: string;
  destination?: string;
  source?: string;
  trace?: boolean;
  /** YAML file holding a `queries` list; replaces the single query. */
  queries?: string;
  keepUnsupported?: boolean;
  maxIterations?: number;
  maxPaths?: number;
  cache?: QueryCache;
  logger: Logger;
}

export interface QueryCommandResult {
  /** Every query answered `accept`. */
  success: boolean;
  output: JsonObject | JsonObject[];
}

/**
 * Load either a condensed IR document (it has a `version`) or raw service
 * JSON.
 */
export function loadTopology(path: string, keepUnsupported: boolean, logger: Logger): Topology {
  const json: unknown = JSON.parse(readFileSync(resolve(path), 'utf-8'));
  if (isJsonObject(json) && 'version' in json) {
    logger.debug('Loading condensed IR', { path });
    // IR may have been written with unsupported constructs kept
    return loadIr(json, { keepUnsupported: true });
  }
  logger.debug('Loading raw service data', { path });
  return buildTopology(json, { keepUnsupported, logger });
}

function stringList(value: unknown, what: string): string[] {
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new QueryError(`${what} must be a list of strings`);
  }
  return value;
}

function numberList(value: unknown, what: string): number[] {
  if (!Array.isArray(value) || !value.every((v): v is number => typeof v === 'number')) {
    throw new QueryError(`${what} must be a list of numbers`);
  }
  return value;
}

function readRoute(value: unknown, where: string): RouteAttributes {
  if (!isJsonObject(value)) throw new QueryError(`${where}.route must be a mapping`);
  const route: RouteAttributes = {};
  for (const [key, entry] of Object.entries(value)) {
    switch (key) {
      case 'prefix':
      case 'nextHop':
        if (typeof entry !== 'string') throw new QueryError(`${where}.route.${key} must be a string`);
        route[key] = entry;
        break;
      case 'localPreference':
      case 'metric':
      case 'weight':
      case 'tag':
        if (typeof entry !== 'number') throw new QueryError(`${where}.route.${key} must be a number`);
        route[key] = entry;
        break;
      case 'communities':
        route.communities = stringList(entry, `${where}.route.communities`);
        break;
      case 'asPath':
        route.asPath = numberList(entry, `${where}.route.asPath`);
        break;
      default:
        throw new QueryError(`${where}.route: unknown attribute '${key}'`);
    }
  }
  return route;
}

/**
 * Read a batch file:
 *
 * ```yaml
 * queries:
 *   - destination: 10.0.1.0/24
 *     source: edge1
 *     route: { communities: ["65000:1"] }
 * ```
 */
export function loadQueryFile(path: string): ReachabilityQuery[] {
  const parsed: unknown = parseYaml(readFileSync(resolve(path), 'utf-8'));
  if (typeof parsed !== 'object' || parsed === null || !('queries' in parsed) || !Array.isArray(parsed.queries)) {
    throw new QueryError(`Invalid query file ${path}: expected a 'queries' list`);
  }
  const entries: unknown[] = parsed.queries;
  return entries.map((entry, i): ReachabilityQuery => {
    const where = `queries[${i}]`;
    if (!isJsonObject(entry) || typeof entry['destination'] !== 'string') {
      throw new QueryError(`${where} must have a destination`);
    }
    const query: ReachabilityQuery = { kind: 'reachable', destination: entry['destination'] };
    const source = entry['source'];
    if (source !== undefined) {
      if (typeof source !== 'string') throw new QueryError(`${where}.source must be a string`);
      query.source = source;
    }
    const trace = entry['trace'];
    if (trace !== undefined) {
      if (typeof trace !== 'boolean') throw new QueryError(`${where}.trace must be true or false`);
      query.trace = trace;
    }
    if (entry['route'] !== undefined) query.route = readRoute(entry['route'], where);
    return query;
  });
}

/**
 * Answer one query (or a batch file of them) and print the results as JSON.
 */
export function queryCommand(options: QueryCommandOptions): QueryCommandResult {
  const { logger } = options;
  const topology = loadTopology(options.input, options.keepUnsupported === true, logger);
  const engineOptions = {
    maxIterations: options.maxIterations,
    maxPaths: options.maxPaths,
    cache: options.cache,
    logger,
  };

  let result: QueryCommandResult;
  if (options.queries) {
    const entries = runQueries(topology, loadQueryFile(options.queries), engineOptions);
    result = {
      success: entries.every((e) => e.status === 'ok' && e.result?.disposition === 'accept'),
      output: entries.map(renderBatchEntry),
    };
  } else {
    if (!options.destination) {
      throw new QueryError('A destination is required');
    }
    const query: ReachabilityQuery = { kind: 'reachable', destination: options.destination };
    if (options.source !== undefined) query.source = options.source;
    if (options.trace) query.trace = true;
    const answer = runQuery(topology, query, engineOptions);
    result = { success: answer.disposition === 'accept', output: renderQueryResult(answer) };
  }

  console.log(JSON.stringify(result.output, null, 2));
  return result;
}
