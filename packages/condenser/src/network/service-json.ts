/**
 * Builds a topology from the analysis service's raw answer tables.
 *
 * @module network/service-json
 */

import type { Expr, JsonObject, JsonValue, Policy } from '../compiler/ast.js';
import { inlinePolicy, type PrefixListLine } from '../compiler/inliner.js';
import { isJsonObject, parseExpression, parseStatements } from '../compiler/parser.js';
import { simplify } from '../compiler/simplifier.js';
import { CondenserError, ParseError } from '../core/errors.js';
import type { Logger } from '../utils/logger.js';
import { formatPrefix, networkOf, parseAddress, parsePrefixRange } from './ipv4.js';
import { createTopology, type Edge, type Endpoint, type InterfacePolicies, type NetworkNode, type Topology } from './topology.js';

/** Answer tables as written by the `build` command. */
export interface RawServiceData {
  topology: JsonObject[];
  ips: JsonObject[];
  interfaces: JsonObject[];
  declarations: JsonObject[];
  nodes?: JsonObject[];
  issues?: JsonObject[];
}

export const ROUTING_POLICY = 'Routing_Policy';
export const ROUTE_FILTER_LIST = 'Route_Filter_List';
export const COMMUNITY_SET = 'Community_Set';
export const VRF = 'VRF';

export interface BuildTopologyOptions {
  keepUnsupported?: boolean;
  logger?: Logger;
}

interface NodeDraft {
  asn?: number;
  external?: boolean;
  prefixes: string[];
  interfaces: Map<string, InterfacePolicies>;
  policies: Map<string, Policy>;
  prefixLists: Map<string, PrefixListLine[]>;
  communitySets: Map<string, Expr>;
}

/** One BGP session as configured on `node`. */
interface Neighbor {
  node: string;
  peer: string;
  localIp?: string;
  localAs?: number;
  remoteAs?: number;
  importPolicy?: string;
  exportPolicy?: string;
}

function rows(raw: JsonObject, table: string, required: boolean): JsonObject[] {
  const value = raw[table];
  if (value === undefined && !required) return [];
  if (!Array.isArray(value)) {
    throw new ParseError(`Table '${table}' must be an array`, table);
  }
  return value.map((row, i) => {
    if (!isJsonObject(row)) throw new ParseError('Expected a row object', `${table}[${i}]`);
    return row;
  });
}

function str(row: JsonObject, key: string, path: string): string {
  const value = row[key];
  if (typeof value !== 'string') throw new ParseError(`Field '${key}' must be a string`, `${path}.${key}`);
  return value;
}

/** `Node` cells come as `{ name }` objects; bare hostnames are accepted too. */
function nodeName(value: JsonValue | undefined, path: string): string {
  if (typeof value === 'string') return value;
  if (isJsonObject(value) && typeof value['name'] === 'string') return value['name'];
  throw new ParseError('Expected a node reference', path);
}

function endpoint(value: JsonValue | undefined, path: string): Endpoint {
  if (isJsonObject(value)) {
    const node = value['hostname'];
    const iface = value['interface'];
    if (typeof node === 'string' && typeof iface === 'string') return { node, interface: iface };
  }
  throw new ParseError('Expected an interface reference { hostname, interface }', path);
}

function optionalString(row: JsonObject, key: string, path: string): string | undefined {
  const value = row[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') throw new ParseError(`Field '${key}' must be a string`, `${path}.${key}`);
  return value;
}

/** AS numbers come as integers or as their decimal text. */
function optionalAsn(row: JsonObject, key: string, path: string): number | undefined {
  const value = row[key];
  if (value === undefined || value === null) return undefined;
  const asn = typeof value === 'string' && /^\d+$/.test(value) ? Number(value) : value;
  if (typeof asn !== 'number' || !Number.isInteger(asn) || asn < 0) {
    throw new ParseError(`Field '${key}' must be an AS number`, `${path}.${key}`);
  }
  return asn;
}

function parseRouteFilterList(body: JsonObject, path: string): PrefixListLine[] {
  const lines = body['lines'];
  if (!Array.isArray(lines)) throw new ParseError('Expected a list of route filter lines', `${path}.lines`);
  return lines.map((line, i) => {
    const linePath = `${path}.lines[${i}]`;
    if (!isJsonObject(line)) throw new ParseError('Expected a route filter line', linePath);
    const action = str(line, 'action', linePath).toLowerCase();
    if (action !== 'permit' && action !== 'deny') {
      throw new ParseError(`Unknown route filter action '${action}'`, `${linePath}.action`);
    }
    const lengths = str(line, 'lengthRange', linePath);
    const range = `${str(line, 'ipWildcard', linePath)}:${lengths.includes('-') ? lengths : `${lengths}-${lengths}`}`;
    if (parsePrefixRange(range) === null) {
      throw new ParseError(`Invalid route filter range '${range}'`, linePath);
    }
    return { action, range };
  });
}

function parseNeighbors(node: string, body: JsonObject, path: string): Neighbor[] {
  const bgp = body['bgpProcess'];
  if (bgp === undefined || bgp === null) return [];
  if (!isJsonObject(bgp)) throw new ParseError('Expected a BGP process', `${path}.bgpProcess`);
  const neighbors = bgp['neighbors'] ?? {};
  if (!isJsonObject(neighbors)) throw new ParseError('Expected a neighbor table', `${path}.bgpProcess.neighbors`);

  return Object.entries(neighbors).map(([key, config]): Neighbor => {
    const configPath = `${path}.bgpProcess.neighbors.${key}`;
    if (!isJsonObject(config)) throw new ParseError('Expected a neighbor config', configPath);
    // keys may carry a /32 suffix
    const peer = optionalString(config, 'peerAddress', configPath) ?? key.split('/')[0];
    if (parseAddress(peer) === null) throw new ParseError(`Invalid neighbor address '${peer}'`, configPath);

    const neighbor: Neighbor = { node, peer };
    const localIp = optionalString(config, 'localIp', configPath);
    if (localIp !== undefined) neighbor.localIp = localIp;
    const localAs = optionalAsn(config, 'localAs', configPath);
    if (localAs !== undefined) neighbor.localAs = localAs;
    const remoteAs = optionalAsn(config, 'remoteAsns', configPath);
    if (remoteAs !== undefined) neighbor.remoteAs = remoteAs;

    const family = config['ipv4UnicastAddressFamily'];
    if (isJsonObject(family)) {
      const familyPath = `${configPath}.ipv4UnicastAddressFamily`;
      const importPolicy = optionalString(family, 'importPolicy', familyPath);
      if (importPolicy !== undefined) neighbor.importPolicy = importPolicy;
      const exportPolicy = optionalString(family, 'exportPolicy', familyPath);
      if (exportPolicy !== undefined) neighbor.exportPolicy = exportPolicy;
    }
    return neighbor;
  });
}

function appendPolicy(chain: readonly string[], policy: string | undefined): readonly string[] {
  return policy === undefined || chain.includes(policy) ? chain : [...chain, policy];
}

function nameList(value: JsonValue | undefined, path: string): string[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) throw new ParseError('Expected a list of policy names', path);
  return value.map((item, i) => {
    if (typeof item !== 'string') throw new ParseError('Expected a policy name', `${path}[${i}]`);
    return item;
  });
}

/**
 * Turn raw service tables into a topology.
 *
 * Routing-policy declarations become policies, with references to the
 * node's route filter lists and community sets inlined. VRF declarations
 * bind BGP neighbor policies to the interface facing the peer; a peer whose
 * address no node owns becomes an external node. Active interface addresses
 * contribute their network to the owning node's prefixes.
 *
 * @throws ParseError with node / interface / policy context
 */
export function buildTopology(raw: unknown, options: BuildTopologyOptions = {}): Topology {
  const logger = options.logger;
  if (!isJsonObject(raw)) throw new ParseError('Expected raw service data object', '');

  const drafts = new Map<string, NodeDraft>();
  const draft = (name: string): NodeDraft => {
    let entry = drafts.get(name);
    if (!entry) {
      entry = {
        prefixes: [],
        interfaces: new Map(),
        policies: new Map(),
        prefixLists: new Map(),
        communitySets: new Map(),
      };
      drafts.set(name, entry);
    }
    return entry;
  };
  const ensureInterface = (end: Endpoint): void => {
    const node = draft(end.node);
    if (!node.interfaces.has(end.interface)) node.interfaces.set(end.interface, { import: [], export: [] });
  };

  rows(raw, 'nodes', false).forEach((row, i) => {
    const node = draft(nodeName(row['Node'], `nodes[${i}].Node`));
    const asn = row['AS'];
    if (typeof asn === 'number' && Number.isInteger(asn)) node.asn = asn;
  });

  const neighbors: Neighbor[] = [];
  rows(raw, 'declarations', true).forEach((row, i) => {
    const path = `declarations[${i}]`;
    const name = nodeName(row['Node'], `${path}.Node`);
    const type = str(row, 'Structure_Type', path);
    const structure = str(row, 'Structure_Name', path);
    const node = draft(name);
    if (type !== ROUTING_POLICY && type !== ROUTE_FILTER_LIST && type !== COMMUNITY_SET && type !== VRF) {
      logger?.debug('Skipping non-policy structure', { node: name, type, structure });
      return;
    }
    const valuePath = `${path}.Structure_Definition.value`;
    const definition = row['Structure_Definition'];
    const body = isJsonObject(definition) ? definition['value'] : undefined;
    if (!isJsonObject(body)) {
      throw new ParseError('Missing structure definition', valuePath, { node: name, policy: structure });
    }
    try {
      switch (type) {
        case ROUTING_POLICY:
          node.policies.set(structure, {
            name: structure,
            statements: parseStatements(body['statements'], options, `${valuePath}.statements`),
          });
          break;
        case ROUTE_FILTER_LIST:
          node.prefixLists.set(structure, parseRouteFilterList(body, valuePath));
          break;
        case COMMUNITY_SET: {
          const set = simplify(parseExpression(body, options, valuePath));
          if (set.kind !== 'communitySet') {
            throw new ParseError('Community set must be a constant set of communities', valuePath);
          }
          node.communitySets.set(structure, set);
          break;
        }
        case VRF:
          neighbors.push(...parseNeighbors(name, body, valuePath));
          break;
      }
    } catch (error) {
      if (error instanceof CondenserError) throw error.addContext({ node: name, policy: structure });
      throw error;
    }
  });

  for (const [name, node] of drafts) {
    for (const [policyName, policy] of node.policies) {
      try {
        node.policies.set(policyName, inlinePolicy(policy, node));
      } catch (error) {
        if (error instanceof CondenserError) throw error.addContext({ node: name, policy: policyName });
        throw error;
      }
    }
  }

  rows(raw, 'interfaces', true).forEach((row, i) => {
    const path = `interfaces[${i}]`;
    const end = endpoint(row['Interface'], `${path}.Interface`);
    draft(end.node).interfaces.set(end.interface, {
      import: nameList(row['Import_Policy'], `${path}.Import_Policy`),
      export: nameList(row['Export_Policy'], `${path}.Export_Policy`),
    });
  });

  const owners = new Map<string, string>();
  rows(raw, 'ips', true).forEach((row, i) => {
    const path = `ips[${i}]`;
    if (row['Active'] === false) return;
    const name = nodeName(row['Node'], `${path}.Node`);
    const address = str(row, 'IP', path);
    const maskLength = row['Mask'];
    const network = typeof maskLength === 'number' ? networkOf(address, maskLength) : null;
    if (!network) throw new ParseError('Invalid interface address', path, { node: name });
    owners.set(address, name);
    const prefix = formatPrefix(network);
    const node = draft(name);
    if (!node.prefixes.includes(prefix)) node.prefixes.push(prefix);
  });

  const edges: Edge[] = rows(raw, 'topology', true).map((row, i) => {
    const from = endpoint(row['Interface'], `topology[${i}].Interface`);
    const to = endpoint(row['Remote_Interface'], `topology[${i}].Remote_Interface`);
    ensureInterface(from);
    ensureInterface(to);
    return { from, to };
  });

  const bind = (end: Endpoint, neighbor: Neighbor): void => {
    const node = draft(end.node);
    const chains = node.interfaces.get(end.interface) ?? { import: [], export: [] };
    node.interfaces.set(end.interface, {
      import: appendPolicy(chains.import, neighbor.importPolicy),
      export: appendPolicy(chains.export, neighbor.exportPolicy),
    });
  };

  for (const neighbor of neighbors) {
    const local = draft(neighbor.node);
    if (neighbor.localAs !== undefined) {
      if (local.asn === undefined) local.asn = neighbor.localAs;
      else if (local.asn !== neighbor.localAs) {
        logger?.warn('Node has more than one AS number', { node: neighbor.node, asn: local.asn, other: neighbor.localAs });
      }
    }

    const owner = owners.get(neighbor.peer);
    if (owner !== undefined) {
      const link = edges.find((e) => e.from.node === neighbor.node && e.to.node === owner);
      if (!link) {
        logger?.warn('BGP neighbor has no link', { node: neighbor.node, peer: neighbor.peer });
        continue;
      }
      bind(link.from, neighbor);
      continue;
    }

    // a peer outside the snapshot is named by its AS, else by its address
    const name = neighbor.remoteAs !== undefined ? String(neighbor.remoteAs) : neighbor.peer;
    const peer = draft(name);
    if (!peer.external && (peer.interfaces.size > 0 || peer.policies.size > 0 || peer.prefixes.length > 0)) {
      throw new ParseError('External peer has the name of a node in the snapshot', '', { node: name });
    }
    peer.external = true;
    if (neighbor.remoteAs !== undefined) peer.asn = neighbor.remoteAs;
    const near: Endpoint = { node: neighbor.node, interface: `bgp-${neighbor.peer}` };
    const far: Endpoint = { node: name, interface: `bgp-${neighbor.localIp ?? neighbor.node}` };
    bind(near, neighbor);
    ensureInterface(far);
    edges.push({ from: near, to: far }, { from: far, to: near });
  }

  const issues = rows(raw, 'issues', false);
  if (issues.length > 0) {
    logger?.warn('Analysis service reported initialization issues', { count: issues.length });
  }

  const nodes: NetworkNode[] = [...drafts].map(([name, d]) => {
    const node: NetworkNode = {
      name,
      prefixes: d.prefixes,
      interfaces: d.interfaces,
      policies: Object.fromEntries(d.policies),
    };
    if (d.external) node.external = true;
    return d.asn === undefined ? node : { ...node, asn: d.asn };
  });

  logger?.debug('Built topology', { nodes: nodes.length, edges: edges.length });
  return createTopology(nodes, edges);
}
