/**
 * Reachability queries over a topology.
 *
 * Routes for the destination start at the nodes that own it, and at
 * external peers with an arbitrary route, then propagate along directed
 * edges through the sender's export chain and the receiver's import chain. Each route variant carries the condition on the
 * input route under which it arrives; a node's predicate is the disjunction
 * of the conditions of all variants that reached it.
 *
 * @module network/query-engine
 */

import { and, bool, or, type Expr, type JsonObject } from '../compiler/ast.js';
import { serializeExpression } from '../compiler/serializer.js';
import { simplify } from '../compiler/simplifier.js';
import { CondenserError, CycleBoundError, ErrorCode, QueryError } from '../core/errors.js';
import { evaluateChain, type TraceStep } from '../interpreter/interpreter.js';
import { RouteRecord, type RouteAttributes } from '../interpreter/route-record.js';
import { canonicalize } from '../utils/canonical.js';
import type { Logger } from '../utils/logger.js';
import { formatPrefix, parsePrefix, prefixContains } from './ipv4.js';
import type { QueryCache } from './query-cache.js';
import { exportChain, importChain, outgoingEdges, type Endpoint, type Topology } from './topology.js';

export const DEFAULT_MAX_ITERATIONS = 10000;

export interface ReachabilityQuery {
  kind: 'reachable';
  /** Address or prefix the route is for. */
  destination: string;
  /** Node whose reachability decides the disposition; all nodes when omitted. */
  source?: string;
  /** Concrete attribute values of the originated route; the rest stay symbolic. */
  route?: RouteAttributes;
  trace?: boolean;
}

export interface HopTrace {
  from: Endpoint;
  to: Endpoint;
  direction: 'export' | 'import';
  policies: string[];
  disposition: 'accept' | 'reject';
  steps: TraceStep[];
}

export interface QueryResult {
  query: ReachabilityQuery;
  disposition: 'accept' | 'reject';
  witness: Expr;
  nodes: ReadonlyMap<string, Expr>;
  iterations: number;
  trace?: HopTrace[];
}

export interface QueryOptions {
  maxIterations?: number;
  maxPaths?: number;
  cache?: QueryCache;
  logger?: Logger;
}

export type BatchStatus = 'ok' | 'error' | 'inconclusive';

export interface BatchEntry {
  query: ReachabilityQuery;
  status: BatchStatus;
  result?: QueryResult;
  error?: CondenserError;
}

/**
 * A route that reached `node`. Hops are linked back through `parent` so a
 * new variant costs one pair of hops, not a copy of the whole path.
 */
interface Variant {
  node: string;
  condition: Expr;
  record: RouteRecord;
  parent?: Variant;
  via?: readonly [HopTrace, HopTrace];
}

function conjuncts(condition: Expr): Expr[] {
  if (condition.kind === 'and') return [...condition.operands];
  if (condition.kind === 'bool' && condition.value) return [];
  return [condition];
}

// Fixed point is over conditions: a variant whose condition a node has
// already seen adds nothing to that node's predicate, whatever attributes
// it carries.
function conditionKey(condition: Expr): string {
  return canonicalize(serializeExpression(condition));
}

function hopsOf(variant: Variant | undefined): HopTrace[] {
  const hops: HopTrace[] = [];
  for (let at = variant; at?.via; at = at.parent) hops.push(at.via[1], at.via[0]);
  return hops.reverse();
}

function destinationPrefix(destination: string): string {
  const prefix = parsePrefix(destination);
  if (!prefix) throw new QueryError(`Invalid destination '${destination}'`);
  return formatPrefix(prefix);
}

/**
 * Answer one reachability query.
 *
 * @throws QueryError on an unknown source or malformed destination
 * @throws InterpretError when a policy cannot be evaluated
 * @throws CycleBoundError when propagation exceeds `maxIterations`
 */
export function runQuery(topology: Topology, query: ReachabilityQuery, options: QueryOptions = {}): QueryResult {
  const cached = options.cache?.get(topology.fingerprint, query);
  if (cached) {
    options.logger?.debug('Query cache hit', { destination: query.destination });
    return cached;
  }

  const result = propagate(topology, query, options);
  options.cache?.set(topology.fingerprint, query, result);
  return result;
}

function propagate(topology: Topology, query: ReachabilityQuery, options: QueryOptions): QueryResult {
  const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  const maxPaths = options.maxPaths;
  const logger = options.logger;

  if (query.source !== undefined && !topology.nodes.has(query.source)) {
    throw new QueryError(`Unknown source node '${query.source}'`, { node: query.source });
  }
  const destination = destinationPrefix(query.destination);
  const target = parsePrefix(destination);

  const variants = new Map<string, Variant[]>();
  const variantKeys = new Map<string, Set<string>>();
  const queue: Variant[] = [];
  const rejected: HopTrace[] = [];

  const addVariant = (variant: Variant): void => {
    const key = conditionKey(variant.condition);
    const keys = variantKeys.get(variant.node) ?? new Set<string>();
    if (keys.has(key)) return;
    keys.add(key);
    variantKeys.set(variant.node, keys);
    const list = variants.get(variant.node) ?? [];
    list.push(variant);
    variants.set(variant.node, list);
    queue.push(variant);
  };

  const initial = RouteRecord.from({ ...query.route, prefix: destination });
  // external peers may announce any route for the destination
  const announced = RouteRecord.from({ prefix: destination });
  for (const node of topology.nodes.values()) {
    if (node.external) {
      addVariant({ node: node.name, condition: bool(true), record: announced });
      continue;
    }
    const owns = node.prefixes.some((owned) => {
      const prefix = parsePrefix(owned);
      return prefix !== null && target !== null && prefixContains(prefix, target);
    });
    if (owns) addVariant({ node: node.name, condition: bool(true), record: initial });
  }
  logger?.debug('Query origins', { destination, origins: [...variants.keys()] });

  const seen = new Set<string>();
  let iterations = 0;

  for (let head = 0; head < queue.length; head++) {
    const variant = queue[head];
    const key = conditionKey(variant.condition);
    for (const { index, edge } of outgoingEdges(topology, variant.node)) {
      const edgeKey = `${index}|${key}`;
      if (seen.has(edgeKey)) continue;
      seen.add(edgeKey);

      iterations += 1;
      if (iterations > maxIterations) {
        throw new CycleBoundError(maxIterations, { node: variant.node });
      }

      const exported = withHopContext(edge.from, () =>
        evaluateChain(exportChain(topology, edge.from), variant.record, {
          assumptions: conjuncts(variant.condition),
          maxPaths,
          policies: topology.nodes.get(edge.from.node)?.policies,
        }),
      );

      for (const out of exported.paths) {
        const exportHop: HopTrace = {
          from: edge.from,
          to: edge.to,
          direction: 'export',
          policies: exported.policies,
          disposition: out.disposition === 'accept' ? 'accept' : 'reject',
          steps: out.trace,
        };
        if (out.disposition !== 'accept') {
          rejected.push(exportHop);
          continue;
        }

        const imported = withHopContext(edge.to, () =>
          evaluateChain(importChain(topology, edge.to), out.record, {
            assumptions: out.condition,
            maxPaths,
            policies: topology.nodes.get(edge.to.node)?.policies,
          }),
        );
        for (const into of imported.paths) {
          const importHop: HopTrace = {
            from: edge.from,
            to: edge.to,
            direction: 'import',
            policies: imported.policies,
            disposition: into.disposition === 'accept' ? 'accept' : 'reject',
            steps: into.trace,
          };
          if (into.disposition !== 'accept') {
            rejected.push(importHop);
            continue;
          }
          const condition = simplify(and(...into.condition));
          if (condition.kind === 'bool' && !condition.value) continue;
          addVariant({
            node: edge.to.node,
            condition,
            record: into.record,
            parent: variant,
            via: [exportHop, importHop],
          });
        }
      }
    }
  }

  const predicates = new Map<string, Expr>();
  for (const name of topology.nodes.keys()) {
    const reached = variants.get(name) ?? [];
    predicates.set(name, simplify(or(...reached.map((v) => v.condition))));
  }

  let witness: Expr;
  if (query.source !== undefined) {
    witness = predicates.get(query.source) ?? bool(false);
  } else {
    witness = simplify(and(...predicates.values()));
  }
  const disposition = witness.kind === 'bool' && !witness.value ? 'reject' : 'accept';

  logger?.debug('Query finished', { destination, disposition, iterations });

  const result: QueryResult = { query, disposition, witness, nodes: predicates, iterations };
  if (query.trace) {
    result.trace = disposition === 'reject' ? rejected : acceptTrace(variants, query.source);
  }
  return result;
}

function acceptTrace(variants: ReadonlyMap<string, Variant[]>, source: string | undefined): HopTrace[] {
  if (source !== undefined) return hopsOf(variants.get(source)?.[0]);
  return [...variants.values()].flatMap((list) => hopsOf(list[0]));
}

function withHopContext<T>(end: Endpoint, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof CondenserError) throw error.addContext({ node: end.node, interface: end.interface });
    throw error;
  }
}

/**
 * Run several queries against one topology. Interpretation failures and
 * cycle bounds are scoped to the query that hit them.
 */
export function runQueries(
  topology: Topology,
  queries: readonly ReachabilityQuery[],
  options: QueryOptions = {},
): BatchEntry[] {
  return queries.map((query): BatchEntry => {
    try {
      return { query, status: 'ok', result: runQuery(topology, query, options) };
    } catch (error) {
      if (!(error instanceof CondenserError)) throw error;
      options.logger?.warn('Query failed', { destination: query.destination, code: error.code });
      const status: BatchStatus = error.code === ErrorCode.CYCLE_BOUND ? 'inconclusive' : 'error';
      return { query, status, error };
    }
  });
}

// ============================================================================
// Rendering
// ============================================================================

function renderQuery(query: ReachabilityQuery): JsonObject {
  const out: JsonObject = { kind: query.kind, destination: query.destination };
  if (query.source !== undefined) out['source'] = query.source;
  if (query.route !== undefined) {
    const route: JsonObject = {};
    for (const [name, value] of Object.entries(query.route)) {
      if (value === undefined) continue;
      route[name] = typeof value === 'object' ? [...value] : value;
    }
    out['route'] = route;
  }
  if (query.trace !== undefined) out['trace'] = query.trace;
  return out;
}

function renderStep(step: TraceStep): JsonObject {
  const out: JsonObject = { policy: step.policy, statement: step.statement, action: step.action };
  if (step.branch !== undefined) out['branch'] = step.branch;
  if (step.symbolic !== undefined) out['symbolic'] = step.symbolic;
  if (step.attribute !== undefined) out['attribute'] = step.attribute;
  if (step.disposition !== undefined) out['disposition'] = step.disposition;
  return out;
}

export function renderHop(hop: HopTrace): JsonObject {
  return {
    from: [hop.from.node, hop.from.interface],
    to: [hop.to.node, hop.to.interface],
    direction: hop.direction,
    policies: hop.policies,
    disposition: hop.disposition,
    steps: hop.steps.map(renderStep),
  };
}

export function renderQueryResult(result: QueryResult): JsonObject {
  const nodes: JsonObject = {};
  for (const [name, predicate] of result.nodes) nodes[name] = serializeExpression(predicate);
  const out: JsonObject = {
    query: renderQuery(result.query),
    disposition: result.disposition,
    witness: serializeExpression(result.witness),
    nodes,
    iterations: result.iterations,
  };
  if (result.trace) out['trace'] = result.trace.map(renderHop);
  return out;
}

export function renderBatchEntry(entry: BatchEntry): JsonObject {
  const out: JsonObject = { query: renderQuery(entry.query), status: entry.status };
  if (entry.result) out['result'] = renderQueryResult(entry.result);
  if (entry.error) {
    const context: JsonObject = {};
    for (const [key, value] of Object.entries(entry.error.context)) {
      if (typeof value === 'string') context[key] = value;
    }
    out['error'] = { code: entry.error.code, message: entry.error.message, context };
  }
  return out;
}
