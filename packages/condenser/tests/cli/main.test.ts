import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { EXIT_FAILURE, EXIT_SUCCESS, EXIT_USAGE, parseArgs, run, UsageError } from '../../src/cli/main.js';
import type { SnapshotService } from '../../src/cli/commands/build.js';
import { createMockLogger, rawTwoNode } from '../fixtures/networks.js';

const TEST_DIR = '/tmp/route-condenser-main-test-' + Date.now();

describe('parseArgs', () => {
  it('separates the command, positionals, flags and options', () => {
    expect(parseArgs(['query', 'net.json', '--destination', '10.0.2.0/24', '--trace', '-v'])).toEqual({
      command: 'query',
      positionals: ['net.json'],
      flags: { trace: true, verbose: true },
      options: { destination: '10.0.2.0/24' },
    });
  });

  it('expands short flags', () => {
    expect(parseArgs(['simplify', 'net.json', '-bq', '-o', 'out.json'])).toEqual({
      command: 'simplify',
      positionals: ['net.json'],
      flags: { 'simplify-bools': true, quiet: true },
      options: { output: 'out.json' },
    });
  });

  it('rejects unknown short flags and missing values', () => {
    expect(() => parseArgs(['-x'])).toThrow(new UsageError('Unknown option -x'));
    expect(() => parseArgs(['query', 'net.json', '--destination'])).toThrow('Option --destination requires a value');
    expect(() => parseArgs(['build', 'lab', '-o', '--verbose'])).toThrow('Option --output requires a value');
  });
});

describe('run', () => {
  const logger = createMockLogger();

  beforeEach(() => {
    if (existsSync(TEST_DIR)) rmSync(TEST_DIR, { recursive: true });
    mkdirSync(TEST_DIR, { recursive: true });
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    if (existsSync(TEST_DIR)) rmSync(TEST_DIR, { recursive: true });
    vi.restoreAllMocks();
  });

  it('prints the version', async () => {
    expect(await run(['version'])).toBe(EXIT_SUCCESS);
    expect(console.log).toHaveBeenCalledWith('route-condenser v0.1.0');
  });

  it('prints help without a command', async () => {
    expect(await run([])).toBe(EXIT_SUCCESS);
    expect(console.log).toHaveBeenCalledTimes(1);
  });

  it('exits with a usage error for bad arguments', async () => {
    expect(await run(['-x'])).toBe(EXIT_USAGE);
    expect(console.error).toHaveBeenCalledWith('Unknown option -x');

    expect(await run(['bogus'], { logger })).toBe(EXIT_USAGE);
    expect(console.error).toHaveBeenCalledWith('Unknown command: bogus');

    expect(await run(['query', 'net.json'], { logger })).toBe(EXIT_USAGE);
    expect(console.error).toHaveBeenCalledWith('Usage: route-condenser query <ir.json|raw.json> --destination <addr>');

    expect(await run(['simplify'], { logger })).toBe(EXIT_USAGE);
  });

  it('reports condenser errors with their code', async () => {
    const input = join(TEST_DIR, 'net.json');
    writeFileSync(input, JSON.stringify({ topology: 'nope' }), 'utf-8');

    expect(await run(['simplify', input], { logger })).toBe(EXIT_FAILURE);
    expect(console.error).toHaveBeenCalledWith("error [PARSE_ERROR] Table 'declarations' must be an array at declarations");
  });

  it('reports other errors by message', async () => {
    const input = join(TEST_DIR, 'missing.json');

    expect(await run(['simplify', input], { logger })).toBe(EXIT_FAILURE);
    expect(console.error).toHaveBeenCalledWith(expect.stringMatching(/^error ENOENT/));
  });

  it('builds through the injected service', async () => {
    const dir = join(TEST_DIR, 'lab');
    mkdirSync(dir);
    writeFileSync(join(dir, 'r1.cfg'), 'hostname r1\n', 'utf-8');
    const output = join(TEST_DIR, 'lab.json');
    const service: SnapshotService = {
      healthCheck: vi.fn().mockResolvedValue(undefined),
      uploadSnapshot: vi.fn().mockResolvedValue('snap-1'),
      collect: vi.fn().mockResolvedValue(rawTwoNode()),
    };
    const createService = vi.fn().mockReturnValue(service);

    expect(await run(['build', dir, '-o', output], { logger, createService })).toBe(EXIT_SUCCESS);
    expect(createService).toHaveBeenCalledTimes(1);
    expect(JSON.parse(readFileSync(output, 'utf-8'))).toEqual(rawTwoNode());
  });

  it('simplifies and then queries the IR', async () => {
    const input = join(TEST_DIR, 'net.json');
    writeFileSync(input, JSON.stringify(rawTwoNode()), 'utf-8');

    expect(await run(['simplify', input, '--simplify-bools'], { logger })).toBe(EXIT_SUCCESS);
    const ir = join(TEST_DIR, 'net.ir.json');
    expect(existsSync(ir)).toBe(true);

    expect(await run(['query', ir, '--destination', '10.0.2.0/24', '--source', 'A'], { logger })).toBe(EXIT_SUCCESS);
    expect(await run(['query', ir, '--destination', '10.0.9.0/24'], { logger })).toBe(EXIT_FAILURE);
  });
});
