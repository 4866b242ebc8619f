import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { buildCommand, findConfigFiles, type SnapshotService } from '../../../src/cli/commands/build.js';
import { ServiceUnavailableError } from '../../../src/core/errors.js';
import { createMockLogger, rawTwoNode } from '../../fixtures/networks.js';

const TEST_DIR = '/tmp/route-condenser-build-test-' + Date.now();
const CONFIG_DIR = join(TEST_DIR, 'lab');

function stubService() {
  return {
    healthCheck: vi.fn().mockResolvedValue(undefined),
    uploadSnapshot: vi.fn().mockResolvedValue('snap-1'),
    collect: vi.fn().mockResolvedValue(rawTwoNode()),
  } satisfies SnapshotService;
}

describe('build command', () => {
  beforeEach(() => {
    if (existsSync(TEST_DIR)) rmSync(TEST_DIR, { recursive: true });
    mkdirSync(join(CONFIG_DIR, 'sub'), { recursive: true });
    writeFileSync(join(CONFIG_DIR, 'r1.cfg'), 'hostname r1\n', 'utf-8');
    writeFileSync(join(CONFIG_DIR, 'sub', 'r2.cfg'), 'hostname r2\n', 'utf-8');
    writeFileSync(join(CONFIG_DIR, '.hidden'), 'ignored\n', 'utf-8');
  });

  afterEach(() => {
    if (existsSync(TEST_DIR)) rmSync(TEST_DIR, { recursive: true });
  });

  describe('findConfigFiles', () => {
    it('lists files recursively and skips hidden entries', () => {
      expect(findConfigFiles(CONFIG_DIR)).toEqual([join(CONFIG_DIR, 'r1.cfg'), join(CONFIG_DIR, 'sub', 'r2.cfg')]);
    });
  });

  describe('buildCommand', () => {
    it('uploads the configs and writes the raw tables', async () => {
      const service = stubService();
      const output = join(TEST_DIR, 'lab.json');

      const result = await buildCommand({ dir: CONFIG_DIR, output, service, logger: createMockLogger() });

      expect(result).toEqual({
        output,
        files: 2,
        snapshot: 'snap-1',
        rows: { topology: 2, ips: 3, interfaces: 2, declarations: 3, nodes: 2 },
      });
      expect(service.uploadSnapshot).toHaveBeenCalledWith('lab', [
        { path: 'r1.cfg', content: 'hostname r1\n' },
        { path: 'sub/r2.cfg', content: 'hostname r2\n' },
      ]);
      expect(service.collect).toHaveBeenCalledWith('snap-1');

      const written: unknown = JSON.parse(readFileSync(output, 'utf-8'));
      expect(written).toEqual(rawTwoNode());
    });

    it('does not upload when the service is down', async () => {
      const service = stubService();
      service.healthCheck.mockRejectedValue(
        new ServiceUnavailableError('Analysis service at http://localhost:9996 is unavailable'),
      );

      await expect(
        buildCommand({ dir: CONFIG_DIR, output: join(TEST_DIR, 'lab.json'), service, logger: createMockLogger() }),
      ).rejects.toThrow(ServiceUnavailableError);
      expect(service.uploadSnapshot).not.toHaveBeenCalled();
      expect(existsSync(join(TEST_DIR, 'lab.json'))).toBe(false);
    });

    it('refuses service data that does not type-check', async () => {
      const service = stubService();
      const raw = rawTwoNode();
      raw.declarations.push({
        Node: { name: 'A' },
        Structure_Type: 'Routing_Policy',
        Structure_Name: 'bad',
        Structure_Definition: {
          value: {
            statements: [
              {
                class: 'SetLocalPreference',
                localPreference: { class: 'LiteralCommunitySet', communitySet: ['65000:1'] },
              },
            ],
          },
        },
      });
      service.collect.mockResolvedValue(raw);

      await expect(
        buildCommand({ dir: CONFIG_DIR, output: join(TEST_DIR, 'lab.json'), service, logger: createMockLogger() }),
      ).rejects.toThrow('Type error: Value assigned to localPreference must be integer, got communities');
    });
  });
});
