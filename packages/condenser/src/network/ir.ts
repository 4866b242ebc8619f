/**
 * The condensed IR document: every node with its originated prefixes and
 * per-interface policy chains inlined in native encoding, plus the directed
 * edge list. Policies reached only through calls are listed per node under
 * `policies`.
 *
 * @module network/ir
 */

import { calledPolicies, statementsEqual, type JsonObject, type JsonValue, type Policy } from '../compiler/ast.js';
import { isJsonObject, parsePolicy, type ParseOptions } from '../compiler/parser.js';
import { serializePolicy } from '../compiler/serializer.js';
import { CondenserError, ParseError } from '../core/errors.js';
import type { Edge, InterfacePolicies, NetworkNode } from './topology.js';

export const IR_VERSION = 1;

export interface IrInterface {
  import: JsonObject[];
  export: JsonObject[];
}

export interface IrNode {
  asn?: number;
  external?: boolean;
  prefixes: string[];
  interfaces: Record<string, IrInterface>;
  policies?: Record<string, JsonObject>;
}

export type IrEndpoint = [node: string, iface: string];

export interface IrDocument {
  version: typeof IR_VERSION;
  nodes: Record<string, IrNode>;
  edges: [IrEndpoint, IrEndpoint][];
}

export type ReadIrOptions = ParseOptions;

/** Policies reachable through calls from the chains but bound to none. */
function callOnlyPolicies(node: NetworkNode): Policy[] {
  const bound = new Set<string>();
  for (const chains of node.interfaces.values()) {
    for (const name of [...chains.import, ...chains.export]) bound.add(name);
  }
  const reached = new Set<string>();
  const pending = [...bound];
  while (pending.length > 0) {
    const name = pending.pop();
    if (name === undefined || !Object.hasOwn(node.policies, name)) continue;
    for (const callee of calledPolicies(node.policies[name].statements)) {
      if (bound.has(callee) || reached.has(callee)) continue;
      reached.add(callee);
      pending.push(callee);
    }
  }
  return Object.values(node.policies).filter((p) => reached.has(p.name));
}

export function renderIr(nodes: Iterable<NetworkNode>, edges: Iterable<Edge>): IrDocument {
  const out: Record<string, IrNode> = {};
  for (const node of nodes) {
    const interfaces: Record<string, IrInterface> = {};
    for (const [name, chains] of node.interfaces) {
      interfaces[name] = {
        import: chains.import.map((p) => serializePolicy(node.policies[p])),
        export: chains.export.map((p) => serializePolicy(node.policies[p])),
      };
    }
    const entry: IrNode = { prefixes: [...node.prefixes], interfaces };
    if (node.asn !== undefined) entry.asn = node.asn;
    if (node.external) entry.external = true;
    const called = callOnlyPolicies(node);
    if (called.length > 0) {
      entry.policies = Object.fromEntries(called.map((p) => [p.name, serializePolicy(p)]));
    }
    out[node.name] = entry;
  }
  return {
    version: IR_VERSION,
    nodes: out,
    edges: [...edges].map((e): [IrEndpoint, IrEndpoint] => [
      [e.from.node, e.from.interface],
      [e.to.node, e.to.interface],
    ]),
  };
}

function expectObject(value: JsonValue | undefined, path: string): JsonObject {
  if (!isJsonObject(value)) throw new ParseError('Expected an object', path);
  return value;
}

function expectArray(value: JsonValue | undefined, path: string): JsonValue[] {
  if (!Array.isArray(value)) throw new ParseError('Expected an array', path);
  return value;
}

function readEndpoint(value: JsonValue, path: string): { node: string; interface: string } {
  if (Array.isArray(value) && value.length === 2) {
    const [node, iface] = value;
    if (typeof node === 'string' && typeof iface === 'string') return { node, interface: iface };
  }
  throw new ParseError('Expected a [node, interface] pair', path);
}

function readPolicy(item: JsonValue, path: string, policies: Map<string, Policy>, options: ReadIrOptions): string {
  const policy = parsePolicy(item, options, path);
  const known = policies.get(policy.name);
  if (known && !statementsEqual(known.statements, policy.statements)) {
    throw new ParseError('Conflicting definitions of policy', path, { policy: policy.name });
  }
  if (!known) policies.set(policy.name, policy);
  return policy.name;
}

function readChain(
  value: JsonValue | undefined,
  path: string,
  policies: Map<string, Policy>,
  options: ReadIrOptions,
): string[] {
  return expectArray(value, path).map((item, i) => readPolicy(item, `${path}[${i}]`, policies, options));
}

function readNode(name: string, value: JsonValue, options: ReadIrOptions): NetworkNode {
  const path = `nodes.${name}`;
  const obj = expectObject(value, path);

  const asn = obj['asn'];
  if (asn !== undefined && (typeof asn !== 'number' || !Number.isInteger(asn) || asn < 0)) {
    throw new ParseError('Field asn must be a non-negative integer', `${path}.asn`);
  }
  const prefixes = expectArray(obj['prefixes'], `${path}.prefixes`).map((p, i) => {
    if (typeof p !== 'string') throw new ParseError('Expected a prefix string', `${path}.prefixes[${i}]`);
    return p;
  });

  const policies = new Map<string, Policy>();
  const interfaces = new Map<string, InterfacePolicies>();
  for (const [iface, chainsValue] of Object.entries(expectObject(obj['interfaces'], `${path}.interfaces`))) {
    const ifacePath = `${path}.interfaces.${iface}`;
    try {
      const chains = expectObject(chainsValue, ifacePath);
      interfaces.set(iface, {
        import: readChain(chains['import'], `${ifacePath}.import`, policies, options),
        export: readChain(chains['export'], `${ifacePath}.export`, policies, options),
      });
    } catch (error) {
      if (error instanceof CondenserError) throw error.addContext({ node: name, interface: iface });
      throw error;
    }
  }

  const extra = obj['policies'];
  if (extra !== undefined) {
    for (const [policyName, item] of Object.entries(expectObject(extra, `${path}.policies`))) {
      const itemPath = `${path}.policies.${policyName}`;
      if (readPolicy(item, itemPath, policies, options) !== policyName) {
        throw new ParseError('Policy is listed under another name', itemPath, { node: name, policy: policyName });
      }
    }
  }

  const external = obj['external'];
  if (external !== undefined && typeof external !== 'boolean') {
    throw new ParseError('Field external must be true or false', `${path}.external`);
  }

  const node: NetworkNode = { name, prefixes, interfaces, policies: Object.fromEntries(policies) };
  if (external) node.external = true;
  return typeof asn === 'number' ? { ...node, asn } : node;
}

/**
 * Read an IR document back into topology parts.
 *
 * @throws ParseError on a malformed document or an unknown version
 */
export function readIr(json: unknown, options: ReadIrOptions = {}): { nodes: NetworkNode[]; edges: Edge[] } {
  if (!isJsonObject(json)) throw new ParseError('Expected an IR document object', '');
  if (json['version'] !== IR_VERSION) {
    throw new ParseError(`Unsupported IR version ${JSON.stringify(json['version'] ?? null)}`, 'version');
  }
  const nodes = Object.entries(expectObject(json['nodes'], 'nodes')).map(([name, value]) =>
    readNode(name, value, options),
  );
  const edges = expectArray(json['edges'], 'edges').map((value, i) => {
    if (!Array.isArray(value) || value.length !== 2) {
      throw new ParseError('Expected a [from, to] pair', `edges[${i}]`);
    }
    return { from: readEndpoint(value[0], `edges[${i}][0]`), to: readEndpoint(value[1], `edges[${i}][1]`) };
  });
  return { nodes, edges };
}
