import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { ConfigError } from '../core/errors.js';
import { DEFAULT_MAX_PATHS } from '../interpreter/interpreter.js';
import { DEFAULT_MAX_ITERATIONS } from '../network/query-engine.js';
import { DEFAULT_SERVICE_URL, DEFAULT_TIMEOUT_MS } from '../service/client.js';
import { isLogLevel, type LogLevel } from '../utils/logger.js';

export interface CondenserConfig {
  service: {
    url: string;
    timeoutMs: number;
    retries: number;
  };
  query: {
    maxIterations: number;
    maxPaths: number;
  };
  simplify: boolean;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: CondenserConfig = {
  service: { url: DEFAULT_SERVICE_URL, timeoutMs: DEFAULT_TIMEOUT_MS, retries: 1 },
  query: { maxIterations: DEFAULT_MAX_ITERATIONS, maxPaths: DEFAULT_MAX_PATHS },
  simplify: false,
  logLevel: 'info',
};

const CONFIG_FILES = ['route-condenser.yaml', 'route-condenser.yml'];

/**
 * Find the config file in a directory.
 */
export function findConfigFile(dir: string = process.cwd()): string | null {
  for (const name of CONFIG_FILES) {
    const path = join(dir, name);
    if (existsSync(path)) {
      return path;
    }
  }
  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string, source: string): Record<string, unknown> {
  const value = raw[key];
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) throw new ConfigError(`${source}: '${key}' must be a mapping`);
  return value;
}

function positiveInt(value: unknown, fallback: number, name: string, source: string, allowZero = false): number {
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < (allowZero ? 0 : 1)) {
    throw new ConfigError(`${source}: '${name}' must be a ${allowZero ? 'non-negative' : 'positive'} integer`);
  }
  return value;
}

/**
 * Validate a parsed config document and fill in defaults.
 *
 * @throws ConfigError on an unknown key or a value of the wrong type
 */
export function validateConfig(raw: unknown, source = 'config'): CondenserConfig {
  if (raw === null || raw === undefined) return structuredClone(DEFAULT_CONFIG);
  if (!isRecord(raw)) throw new ConfigError(`${source}: expected a mapping at the top level`);

  for (const key of Object.keys(raw)) {
    if (!(key in DEFAULT_CONFIG)) throw new ConfigError(`${source}: unknown key '${key}'`);
  }

  const service = section(raw, 'service', source);
  const query = section(raw, 'query', source);

  const url = service['url'] ?? DEFAULT_CONFIG.service.url;
  if (typeof url !== 'string' || !/^https?:\/\//.test(url)) {
    throw new ConfigError(`${source}: 'service.url' must be an http(s) URL`);
  }
  const simplify = raw['simplify'] ?? DEFAULT_CONFIG.simplify;
  if (typeof simplify !== 'boolean') throw new ConfigError(`${source}: 'simplify' must be true or false`);
  const logLevel = raw['logLevel'] ?? DEFAULT_CONFIG.logLevel;
  if (!isLogLevel(logLevel)) throw new ConfigError(`${source}: unknown logLevel '${String(logLevel)}'`);

  return {
    service: {
      url,
      timeoutMs: positiveInt(service['timeoutMs'], DEFAULT_CONFIG.service.timeoutMs, 'service.timeoutMs', source),
      retries: positiveInt(service['retries'], DEFAULT_CONFIG.service.retries, 'service.retries', source, true),
    },
    query: {
      maxIterations: positiveInt(query['maxIterations'], DEFAULT_CONFIG.query.maxIterations, 'query.maxIterations', source),
      maxPaths: positiveInt(query['maxPaths'], DEFAULT_CONFIG.query.maxPaths, 'query.maxPaths', source),
    },
    simplify,
    logLevel,
  };
}

/**
 * Apply ROUTE_CONDENSER_* environment variables on top of a config.
 */
export function loadEnvOverrides(config: CondenserConfig, env: NodeJS.ProcessEnv = process.env): CondenserConfig {
  const result = structuredClone(config);

  const url = env['ROUTE_CONDENSER_SERVICE_URL'];
  if (url) result.service.url = url;

  const timeout = env['ROUTE_CONDENSER_TIMEOUT_MS'];
  if (timeout) {
    const ms = Number(timeout);
    if (!Number.isInteger(ms) || ms <= 0) {
      throw new ConfigError(`ROUTE_CONDENSER_TIMEOUT_MS must be a positive integer, got '${timeout}'`);
    }
    result.service.timeoutMs = ms;
  }

  const level = env['ROUTE_CONDENSER_LOG_LEVEL'];
  if (level) {
    if (!isLogLevel(level)) throw new ConfigError(`ROUTE_CONDENSER_LOG_LEVEL: unknown level '${level}'`);
    result.logLevel = level;
  }

  return result;
}

export interface LoadConfigOptions {
  /** Explicit config path; must exist. */
  path?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface LoadedConfig {
  config: CondenserConfig;
  /** File the config was read from, if any. */
  source: string | null;
}

/**
 * Load the config file (explicit path, or searched in the working
 * directory), then apply environment overrides.
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const cwd = options.cwd ?? process.cwd();
  let path: string | null = null;
  if (options.path) {
    path = resolve(cwd, options.path);
    if (!existsSync(path)) throw new ConfigError(`Config file not found: ${path}`);
  } else {
    path = findConfigFile(cwd);
  }

  let config = structuredClone(DEFAULT_CONFIG);
  if (path) {
    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(path, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`${path}: ${err instanceof Error ? err.message : String(err)}`);
    }
    config = validateConfig(parsed, path);
  }

  return { config: loadEnvOverrides(config, options.env), source: path };
}
