import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { loadQueryFile, loadTopology, queryCommand } from '../../../src/cli/commands/query.js';
import { QueryError } from '../../../src/core/errors.js';
import { QueryCache } from '../../../src/network/query-cache.js';
import { buildTopology } from '../../../src/network/service-json.js';
import { toIr } from '../../../src/network/topology.js';
import { createMockLogger, rawTwoNode, TAGGED } from '../../fixtures/networks.js';

const TEST_DIR = '/tmp/route-condenser-query-test-' + Date.now();
const RAW_PATH = join(TEST_DIR, 'net.json');

describe('query command', () => {
  beforeEach(() => {
    if (existsSync(TEST_DIR)) rmSync(TEST_DIR, { recursive: true });
    mkdirSync(TEST_DIR, { recursive: true });
    writeFileSync(RAW_PATH, JSON.stringify(rawTwoNode()), 'utf-8');
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    if (existsSync(TEST_DIR)) rmSync(TEST_DIR, { recursive: true });
    vi.restoreAllMocks();
  });

  describe('loadTopology', () => {
    it('reads raw service data and condensed IR alike', () => {
      const logger = createMockLogger();
      const fromRaw = loadTopology(RAW_PATH, false, logger);

      const irPath = join(TEST_DIR, 'net.ir.json');
      writeFileSync(irPath, JSON.stringify(toIr(buildTopology(rawTwoNode()))), 'utf-8');
      const fromIr = loadTopology(irPath, false, logger);

      expect(fromIr.fingerprint).toBe(fromRaw.fingerprint);
      expect(logger.debug).toHaveBeenCalledWith('Loading raw service data', { path: RAW_PATH });
      expect(logger.debug).toHaveBeenCalledWith('Loading condensed IR', { path: irPath });
    });
  });

  describe('loadQueryFile', () => {
    it('reads queries with routes', () => {
      const path = join(TEST_DIR, 'queries.yaml');
      writeFileSync(
        path,
        `
queries:
  - destination: 10.0.2.0/24
    source: A
    trace: true
    route:
      communities: ["${TAGGED}"]
      localPreference: 200
  - destination: 10.0.1.0/24
`,
        'utf-8',
      );

      expect(loadQueryFile(path)).toEqual([
        {
          kind: 'reachable',
          destination: '10.0.2.0/24',
          source: 'A',
          trace: true,
          route: { communities: [TAGGED], localPreference: 200 },
        },
        { kind: 'reachable', destination: '10.0.1.0/24' },
      ]);
    });

    it('rejects malformed entries', () => {
      const path = join(TEST_DIR, 'bad.yaml');

      writeFileSync(path, 'queries:\n  - source: A\n', 'utf-8');
      expect(() => loadQueryFile(path)).toThrow('queries[0] must have a destination');

      writeFileSync(path, 'queries:\n  - destination: 10.0.2.0/24\n    route: { med: 5 }\n', 'utf-8');
      expect(() => loadQueryFile(path)).toThrow("queries[0].route: unknown attribute 'med'");

      writeFileSync(path, 'checks: []\n', 'utf-8');
      expect(() => loadQueryFile(path)).toThrow(QueryError);
    });
  });

  describe('queryCommand', () => {
    it('answers a single query and prints it', () => {
      const result = queryCommand({
        input: RAW_PATH,
        destination: '10.0.2.0/24',
        source: 'A',
        logger: createMockLogger(),
      });

      expect(result.success).toBe(true);
      expect(result.output).toMatchObject({
        query: { kind: 'reachable', destination: '10.0.2.0/24', source: 'A' },
        disposition: 'accept',
        witness: {
          class: 'Not',
          expr: {
            class: 'MatchCommunity',
            communitySetExpr: { class: 'RouteAttribute', attribute: 'communities' },
            community: TAGGED,
          },
        },
      });
      expect(console.log).toHaveBeenCalledWith(JSON.stringify(result.output, null, 2));
    });

    it('fails when any query in a batch is not accepted', () => {
      const queries = join(TEST_DIR, 'queries.yaml');
      writeFileSync(
        queries,
        `
queries:
  - destination: 10.0.2.0/24
    source: A
    route: { communities: ["${TAGGED}"] }
  - destination: 10.0.1.0/24
    source: B
`,
        'utf-8',
      );

      const result = queryCommand({ input: RAW_PATH, queries, cache: new QueryCache(), logger: createMockLogger() });

      expect(result.success).toBe(false);
      expect(result.output).toMatchObject([
        { status: 'ok', result: { disposition: 'reject' } },
        { status: 'ok', result: { disposition: 'accept' } },
      ]);
    });

    it('requires a destination without a batch file', () => {
      expect(() => queryCommand({ input: RAW_PATH, logger: createMockLogger() })).toThrow('A destination is required');
    });
  });
});
