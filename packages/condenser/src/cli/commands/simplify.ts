import { readFileSync, writeFileSync } from 'node:fs';
import { basename, dirname, join, resolve } from 'node:path';
import { statementsSize } from '../../compiler/ast.js';
import { simplifyTopology } from '../../compiler/simplifier.js';
import { checkPolicy } from '../../compiler/type-checker.js';
import { ParseError } from '../../core/errors.js';
import { buildTopology } from '../../network/service-json.js';
import { toIr, type Topology } from '../../network/topology.js';
import type { Logger } from '../../utils/logger.js';

export interface SimplifyOptions {
  input: string;
  output?: string;
  simplifyBools?: boolean;
  keepUnsupported?: boolean;
  logger: Logger;
}

export interface SimplifyResult {
  output: string;
  nodes: number;
  edges: number;
  policies: number;
  sizeBefore: number;
  sizeAfter: number;
  fingerprint: string;
}

/**
 * Refuse topologies whose policies do not type-check.
 *
 * @throws ParseError naming the first offending node, policy and statement
 */
export function assertWellTyped(topology: Topology): void {
  for (const node of topology.nodes.values()) {
    for (const policy of Object.values(node.policies)) {
      const { issues } = checkPolicy(policy);
      const error = issues.find((i) => i.severity === 'error');
      if (error) {
        throw new ParseError(`Type error: ${error.message}`, '', {
          node: node.name,
          policy: policy.name,
          statement: error.location,
        });
      }
    }
  }
}

function policyCount(topology: Topology): number {
  let total = 0;
  for (const node of topology.nodes.values()) total += Object.keys(node.policies).length;
  return total;
}

function totalSize(topology: Topology): number {
  let total = 0;
  for (const node of topology.nodes.values()) {
    for (const policy of Object.values(node.policies)) total += statementsSize(policy.statements);
  }
  return total;
}

/** `net.json` -> `net.ir.json`, next to the input. */
export function defaultIrPath(input: string): string {
  const name = basename(input).replace(/\.json$/i, '');
  return join(dirname(input), `${name}.ir.json`);
}

/**
 * Build the topology from raw service JSON, optionally simplify it, and
 * write the condensed IR.
 */
export function simplifyCommand(options: SimplifyOptions): SimplifyResult {
  const { logger } = options;
  const inputPath = resolve(options.input);
  const raw: unknown = JSON.parse(readFileSync(inputPath, 'utf-8'));

  let topology = buildTopology(raw, { keepUnsupported: options.keepUnsupported, logger });
  assertWellTyped(topology);
  const sizeBefore = totalSize(topology);

  if (options.simplifyBools) {
    topology = simplifyTopology(topology);
  }
  const sizeAfter = totalSize(topology);

  const output = options.output ? resolve(options.output) : defaultIrPath(inputPath);
  writeFileSync(output, `${JSON.stringify(toIr(topology), null, 2)}\n`);

  const result: SimplifyResult = {
    output,
    nodes: topology.nodes.size,
    edges: topology.edges.length,
    policies: policyCount(topology),
    sizeBefore,
    sizeAfter,
    fingerprint: topology.fingerprint,
  };

  logger.info('Wrote condensed IR', {
    output,
    nodes: result.nodes,
    edges: result.edges,
    policies: result.policies,
    simplified: options.simplifyBools === true,
    sizeBefore,
    sizeAfter,
  });

  return result;
}
