/**
 * Network topology: nodes, their interface policy chains, and directed
 * edges between interfaces.
 *
 * @module network/topology
 */

import { calledPolicies, type Policy } from '../compiler/ast.js';
import { ParseError } from '../core/errors.js';
import { canonicalize, sha256Hex } from '../utils/canonical.js';
import { readIr, renderIr, type IrDocument, type ReadIrOptions } from './ir.js';
import { parsePrefix } from './ipv4.js';

export interface Endpoint {
  node: string;
  interface: string;
}

export interface Edge {
  from: Endpoint;
  to: Endpoint;
}

/** Ordered policy names applied to routes leaving and entering an interface. */
export interface InterfacePolicies {
  import: readonly string[];
  export: readonly string[];
}

export interface NetworkNode {
  name: string;
  asn?: number;
  /** Networks the node originates. */
  prefixes: readonly string[];
  interfaces: ReadonlyMap<string, InterfacePolicies>;
  policies: Readonly<Record<string, Policy>>;
  /** A peer outside the analysed network; it announces arbitrary routes. */
  external?: boolean;
}

export interface Topology {
  readonly nodes: ReadonlyMap<string, NetworkNode>;
  readonly edges: readonly Edge[];
  /** SHA-256 of the canonical IR; identifies the topology to caches. */
  readonly fingerprint: string;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    const children = value instanceof Map ? [...value.values()] : Object.values(value);
    for (const child of children) deepFreeze(child);
  }
  return value;
}

function validateNode(node: NetworkNode): void {
  for (const prefix of node.prefixes) {
    if (parsePrefix(prefix) === null) {
      throw new ParseError(`Invalid prefix '${prefix}'`, '', { node: node.name });
    }
  }
  for (const [name, chains] of node.interfaces) {
    for (const policy of [...chains.import, ...chains.export]) {
      if (!Object.hasOwn(node.policies, policy)) {
        throw new ParseError('Interface references an undefined policy', '', {
          node: node.name,
          interface: name,
          policy,
        });
      }
    }
  }
  for (const policy of Object.values(node.policies)) {
    for (const callee of calledPolicies(policy.statements)) {
      if (!Object.hasOwn(node.policies, callee)) {
        throw new ParseError(`Policy calls undefined policy '${callee}'`, '', { node: node.name, policy: policy.name });
      }
    }
  }
}

/**
 * Build an immutable topology. Nodes and edges keep their given order, which
 * fixes the order queries explore them in.
 *
 * @throws ParseError on a dangling policy reference or edge endpoint
 */
export function createTopology(nodes: readonly NetworkNode[], edges: readonly Edge[]): Topology {
  const byName = new Map<string, NetworkNode>();
  for (const node of nodes) {
    if (byName.has(node.name)) {
      throw new ParseError('Duplicate node', '', { node: node.name });
    }
    validateNode(node);
    byName.set(node.name, deepFreeze({ ...node, interfaces: new Map(node.interfaces) }));
  }

  for (const edge of edges) {
    for (const end of [edge.from, edge.to]) {
      const node = byName.get(end.node);
      if (!node) throw new ParseError('Edge references an unknown node', '', { node: end.node });
      if (!node.interfaces.has(end.interface)) {
        throw new ParseError('Edge references an unknown interface', '', { node: end.node, interface: end.interface });
      }
    }
  }

  const frozenEdges = deepFreeze(edges.map((e) => ({ from: { ...e.from }, to: { ...e.to } })));
  const fingerprint = sha256Hex(canonicalize(renderIr(byName.values(), frozenEdges)));
  return Object.freeze({ nodes: byName, edges: frozenEdges, fingerprint });
}

export function toIr(topology: Topology): IrDocument {
  return renderIr(topology.nodes.values(), topology.edges);
}

/**
 * Load a condensed IR document.
 *
 * @throws ParseError on a malformed document
 */
export function loadIr(json: unknown, options: ReadIrOptions = {}): Topology {
  const { nodes, edges } = readIr(json, options);
  return createTopology(nodes, edges);
}

export function outgoingEdges(topology: Topology, node: string): { index: number; edge: Edge }[] {
  return topology.edges.flatMap((edge, index) => (edge.from.node === node ? [{ index, edge }] : []));
}

function chain(topology: Topology, end: Endpoint, direction: keyof InterfacePolicies): Policy[] {
  const node = topology.nodes.get(end.node);
  const names = node?.interfaces.get(end.interface)?.[direction] ?? [];
  return names.flatMap((name) => {
    return node && Object.hasOwn(node.policies, name) ? [node.policies[name]] : [];
  });
}

export function exportChain(topology: Topology, end: Endpoint): Policy[] {
  return chain(topology, end, 'export');
}

export function importChain(topology: Topology, end: Endpoint): Policy[] {
  return chain(topology, end, 'import');
}
