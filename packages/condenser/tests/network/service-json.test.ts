import { describe, it, expect } from 'vitest';
import { buildTopology } from '../../src/network/service-json.js';
import {
  and,
  communitySet,
  ifStmt,
  matchCommunity,
  matchPrefix,
  not,
  ret,
} from '../../src/compiler/ast.js';
import { ParseError } from '../../src/core/errors.js';
import { createMockLogger, rawBgp, rawTwoNode, TAGGED } from '../fixtures/networks.js';

function parseFailure(fn: () => unknown): ParseError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ParseError) return error;
    throw error;
  }
  throw new Error('expected a ParseError');
}

describe('buildTopology', () => {
  it('builds nodes, policies and edges from the answer tables', () => {
    const topology = buildTopology(rawTwoNode());

    expect([...topology.nodes.keys()]).toEqual(['A', 'B']);
    expect(topology.edges).toEqual([
      { from: { node: 'A', interface: 'eth0' }, to: { node: 'B', interface: 'eth0' } },
      { from: { node: 'B', interface: 'eth0' }, to: { node: 'A', interface: 'eth0' } },
    ]);

    const a = topology.nodes.get('A');
    expect(a?.asn).toBe(65001);
    expect(a?.interfaces.get('eth0')).toEqual({ import: ['accept-all'], export: ['accept-all'] });
    expect(Object.keys(a?.policies ?? {})).toEqual(['accept-all']);

    const b = topology.nodes.get('B');
    expect(b?.policies['deny-tagged']?.statements).toEqual([
      ifStmt({ kind: 'and', operands: [{ kind: 'bool', value: true }, matchCommunity(TAGGED)] }, [ret('reject')], [
        ret('accept'),
      ]),
    ]);
  });

  it('derives originated prefixes from active interface addresses', () => {
    const topology = buildTopology(rawTwoNode());
    expect(topology.nodes.get('A')?.prefixes).toEqual(['10.0.1.0/24']);
    expect(topology.nodes.get('B')?.prefixes).toEqual(['10.0.2.0/24']);
  });

  it('creates edge endpoints missing from the interface table', () => {
    const raw = rawTwoNode();
    raw.topology.push({
      Interface: { hostname: 'B', interface: 'eth1' },
      Remote_Interface: { hostname: 'C', interface: 'ge-0/0/0' },
    });

    const topology = buildTopology(raw);

    expect(topology.nodes.get('B')?.interfaces.get('eth1')).toEqual({ import: [], export: [] });
    expect(topology.nodes.get('C')?.prefixes).toEqual([]);
  });

  it('accepts bare hostnames in node cells', () => {
    const raw = rawTwoNode();
    raw.nodes = [{ Node: 'A', AS: 64512 }];
    expect(buildTopology(raw).nodes.get('A')?.asn).toBe(64512);
  });

  it('fails on an unknown construct with the node and policy', () => {
    const raw = rawTwoNode();
    raw.declarations[0] = {
      Node: { name: 'B' },
      Structure_Type: 'Routing_Policy',
      Structure_Name: 'deny-tagged',
      Structure_Definition: {
        value: {
          statements: [
            { class: 'If', guard: { class: 'MatchTag', tag: 7 }, trueStatements: [], falseStatements: [] },
          ],
        },
      },
    };

    const error = parseFailure(() => buildTopology(raw));
    expect(error.message).toBe(
      "Unsupported expression 'MatchTag' at declarations[0].Structure_Definition.value.statements[0].guard",
    );
    expect(error.context).toEqual({ node: 'B', policy: 'deny-tagged' });

    const kept = buildTopology(raw, { keepUnsupported: true });
    const statement = kept.nodes.get('B')?.policies['deny-tagged']?.statements[0];
    expect(statement).toMatchObject({ kind: 'if', guard: { kind: 'unsupported', tag: 'MatchTag' } });
  });

  it('fails on a reference to an undeclared policy', () => {
    const raw = rawTwoNode();
    raw.interfaces[1] = {
      Interface: { hostname: 'B', interface: 'eth0' },
      Import_Policy: ['from-peers'],
      Export_Policy: [],
    };

    const error = parseFailure(() => buildTopology(raw));
    expect(error.context).toEqual({ node: 'B', interface: 'eth0', policy: 'from-peers' });
  });

  it('fails on a missing table', () => {
    const { topology, ips, interfaces } = rawTwoNode();
    expect(() => buildTopology({ topology, ips, interfaces })).toThrow("Table 'declarations' must be an array");
  });

  it('fails on an invalid interface address', () => {
    const raw = rawTwoNode();
    raw.ips.push({ Node: { name: 'A' }, IP: '10.0.300.1', Mask: 24 });
    expect(() => buildTopology(raw)).toThrow('Invalid interface address at ips[3]');
  });

  it('warns about initialization issues', () => {
    const logger = createMockLogger();
    const raw = rawTwoNode();
    raw.issues = [{ Details: 'Unrecognized line', Type: 'Parse warning' }];

    buildTopology(raw, { logger });

    expect(logger.warn).toHaveBeenCalledWith('Analysis service reported initialization issues', { count: 1 });
  });

  it('skips structures that are not routing policies', () => {
    const logger = createMockLogger();
    buildTopology(rawTwoNode(), { logger });
    expect(logger.debug).toHaveBeenCalledWith('Skipping non-policy structure', {
      node: 'A',
      type: 'IP_Access_List',
      structure: 'mgmt-only',
    });
  });
});

describe('buildTopology with BGP declarations', () => {
  it('inlines route filter lists and community sets into policies', () => {
    const topology = buildTopology(rawBgp());
    const customers = and(not(matchPrefix(['10.9.0.0/16:16-16'])), matchPrefix(['10.0.0.0/8:16-24']));

    expect(topology.nodes.get('R1')?.policies['from-isp']?.statements).toEqual([
      ifStmt(and(customers, matchCommunity(TAGGED, communitySet([TAGGED]))), [ret('reject')], [ret('accept')]),
    ]);
    expect(Object.keys(topology.nodes.get('R1')?.policies ?? {})).toEqual(['from-isp', 'to-r2']);
  });

  it('binds internal neighbor policies to the linked interfaces', () => {
    const topology = buildTopology(rawBgp());

    expect(topology.nodes.get('R1')?.interfaces.get('eth0')).toEqual({ import: [], export: ['to-r2'] });
    expect(topology.nodes.get('R2')?.interfaces.get('eth0')).toEqual({ import: ['from-r1'], export: [] });
  });

  it('takes the AS number from the neighbor configuration', () => {
    const topology = buildTopology(rawBgp());
    expect(topology.nodes.get('R1')?.asn).toBe(65001);
    expect(topology.nodes.get('R2')?.asn).toBe(65001);
  });

  it('turns a peer outside the snapshot into an external node', () => {
    const topology = buildTopology(rawBgp());

    expect([...topology.nodes.keys()]).toEqual(['R1', 'R2', '64500']);
    const peer = topology.nodes.get('64500');
    expect(peer?.external).toBe(true);
    expect(peer?.asn).toBe(64500);
    expect(peer?.prefixes).toEqual([]);
    expect(topology.nodes.get('R1')?.external).toBeUndefined();

    expect(topology.nodes.get('R1')?.interfaces.get('bgp-203.0.113.2')).toEqual({ import: ['from-isp'], export: [] });
    expect(topology.edges.slice(2)).toEqual([
      { from: { node: 'R1', interface: 'bgp-203.0.113.2' }, to: { node: '64500', interface: 'bgp-203.0.113.1' } },
      { from: { node: '64500', interface: 'bgp-203.0.113.1' }, to: { node: 'R1', interface: 'bgp-203.0.113.2' } },
    ]);
  });

  it('names an external peer without an AS number by its address', () => {
    const raw = rawBgp();
    raw.declarations[4] = {
      Node: { name: 'R1' },
      Structure_Type: 'VRF',
      Structure_Name: 'default',
      Structure_Definition: { value: { bgpProcess: { neighbors: { '198.51.100.9': {} } } } },
    };

    const topology = buildTopology(raw);

    expect(topology.nodes.get('198.51.100.9')?.external).toBe(true);
    expect(topology.nodes.get('198.51.100.9')?.interfaces.has('bgp-R1')).toBe(true);
  });

  it('warns about a neighbor it cannot place on a link', () => {
    const logger = createMockLogger();
    const raw = rawBgp();
    raw.topology.pop();

    const topology = buildTopology(raw, { logger });

    expect(logger.warn).toHaveBeenCalledWith('BGP neighbor has no link', { node: 'R2', peer: '10.0.1.1' });
    expect(topology.nodes.get('R2')?.interfaces.get('eth0')).toEqual({ import: [], export: [] });
  });

  it('fails on a reference to an undefined prefix list', () => {
    const raw = rawBgp();
    raw.declarations.splice(0, 1);

    const error = parseFailure(() => buildTopology(raw));
    expect(error.message).toBe("Undefined prefix list 'customers'");
    expect(error.context).toEqual({ node: 'R1', policy: 'from-isp' });
  });

  it('fails on a community set that is not constant', () => {
    const raw = rawBgp();
    raw.declarations[1] = {
      Node: { name: 'R1' },
      Structure_Type: 'Community_Set',
      Structure_Name: 'ours',
      Structure_Definition: { value: { class: 'RouteAttribute', attribute: 'communities' } },
    };

    const error = parseFailure(() => buildTopology(raw));
    expect(error.message).toBe(
      'Community set must be a constant set of communities at declarations[1].Structure_Definition.value',
    );
    expect(error.context).toEqual({ node: 'R1', policy: 'ours' });
  });

  it('fails on an unknown route filter action', () => {
    const raw = rawBgp();
    raw.declarations[0] = {
      Node: { name: 'R1' },
      Structure_Type: 'Route_Filter_List',
      Structure_Name: 'customers',
      Structure_Definition: { value: { lines: [{ action: 'MAYBE', ipWildcard: '10.0.0.0/8', lengthRange: '8' }] } },
    };

    expect(() => buildTopology(raw)).toThrow(
      "Unknown route filter action 'maybe' at declarations[0].Structure_Definition.value.lines[0].action",
    );
  });
});
