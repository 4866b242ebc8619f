import { readdirSync, readFileSync, statSync, writeFileSync } from 'node:fs';
import { basename, join, relative, resolve } from 'node:path';
import type { AnalysisServiceClient, SnapshotFile } from '../../service/client.js';
import { buildTopology } from '../../network/service-json.js';
import type { Logger } from '../../utils/logger.js';
import { assertWellTyped } from './simplify.js';

export type SnapshotService = Pick<AnalysisServiceClient, 'healthCheck' | 'uploadSnapshot' | 'collect'>;

export interface BuildOptions {
  dir: string;
  output?: string;
  service: SnapshotService;
  logger: Logger;
}

export interface BuildResult {
  output: string;
  files: number;
  snapshot: string;
  rows: Record<string, number>;
}

/**
 * Every regular file under `dirPath`, recursively, skipping hidden entries.
 * Paths are sorted so uploads are stable.
 */
export function findConfigFiles(dirPath: string): string[] {
  const files: string[] = [];
  for (const entry of readdirSync(dirPath).sort()) {
    if (entry.startsWith('.')) continue;
    const fullPath = join(dirPath, entry);
    const stat = statSync(fullPath);
    if (stat.isDirectory()) {
      files.push(...findConfigFiles(fullPath));
    } else if (stat.isFile()) {
      files.push(fullPath);
    }
  }
  return files;
}

/**
 * Upload a configuration directory to the analysis service and write the
 * raw answer tables.
 */
export async function buildCommand(options: BuildOptions): Promise<BuildResult> {
  const { logger, service } = options;
  const dir = resolve(options.dir);
  if (!statSync(dir).isDirectory()) {
    throw new Error(`Not a directory: ${dir}`);
  }

  const paths = findConfigFiles(dir);
  const files: SnapshotFile[] = paths.map((path) => ({
    path: relative(dir, path).split('\\').join('/'),
    content: readFileSync(path, 'utf-8'),
  }));
  logger.info('Collected configuration files', { dir, files: files.length });

  await service.healthCheck();
  const snapshot = await service.uploadSnapshot(basename(dir), files);
  const raw = await service.collect(snapshot);

  // unknown constructs stay in the raw output; type errors abort
  assertWellTyped(buildTopology(raw, { keepUnsupported: true, logger }));

  const output = options.output ? resolve(options.output) : resolve(`${basename(dir)}.json`);
  writeFileSync(output, `${JSON.stringify(raw, null, 2)}\n`);

  const rows: Record<string, number> = {};
  for (const [table, entries] of Object.entries(raw)) {
    if (Array.isArray(entries)) rows[table] = entries.length;
  }
  logger.info('Wrote raw service data', { output, ...rows });

  return { output, files: files.length, snapshot, rows };
}
