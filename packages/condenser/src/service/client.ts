import type { JsonObject } from '../compiler/ast.js';
import { isJsonObject } from '../compiler/parser.js';
import { ServiceRequestError, ServiceUnavailableError } from '../core/errors.js';
import { RetryExhaustedError, withRetry, type RetryConfig } from '../core/retry.js';
import type { RawServiceData } from '../network/service-json.js';
import type { Logger } from '../utils/logger.js';

export interface AnalysisServiceConfig {
  baseUrl: string;
  timeoutMs?: number;
  /** Retries after the first failed attempt. */
  retries?: number;
  headers?: Record<string, string>;
}

export interface AnalysisServiceClientOptions {
  config: AnalysisServiceConfig;
  logger: Logger;
  sleepFn?: (ms: number) => Promise<void>;
  jitterFn?: () => number;
}

export interface SnapshotFile {
  path: string;
  content: string;
}

export type Question =
  | 'layer3Edges'
  | 'ipOwners'
  | 'interfacePolicies'
  | 'namedStructures'
  | 'nodeProperties'
  | 'initIssues';

/** Which raw table each question's rows are stored under. */
export const QUESTION_TABLES: Readonly<Record<Question, keyof RawServiceData>> = {
  layer3Edges: 'topology',
  ipOwners: 'ips',
  interfacePolicies: 'interfaces',
  namedStructures: 'declarations',
  nodeProperties: 'nodes',
  initIssues: 'issues',
};

export const QUESTIONS: readonly Question[] = [
  'layer3Edges',
  'ipOwners',
  'interfacePolicies',
  'namedStructures',
  'nodeProperties',
  'initIssues',
];

export const DEFAULT_SERVICE_URL = 'http://localhost:9996';
export const DEFAULT_TIMEOUT_MS = 30000;

export class AnalysisServiceClient {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly retryConfig: Partial<RetryConfig>;
  private readonly logger: Logger;
  private readonly sleepFn?: (ms: number) => Promise<void>;
  private readonly jitterFn?: () => number;

  constructor(options: AnalysisServiceClientOptions) {
    this.baseUrl = options.config.baseUrl.replace(/\/$/, '');
    this.headers = options.config.headers ?? {};
    this.timeoutMs = options.config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retryConfig = { maxAttempts: 1 + (options.config.retries ?? 1) };
    this.logger = options.logger;
    this.sleepFn = options.sleepFn;
    this.jitterFn = options.jitterFn;

    this.logger.debug('Analysis service client initialized', {
      baseUrl: this.baseUrl,
      timeoutMs: this.timeoutMs,
      maxAttempts: this.retryConfig.maxAttempts,
    });
  }

  /**
   * @throws ServiceUnavailableError when the service is not ready after retrying
   */
  async healthCheck(): Promise<void> {
    await this.request('GET', '/health');
    this.logger.debug('Analysis service is ready', { baseUrl: this.baseUrl });
  }

  async uploadSnapshot(name: string, files: readonly SnapshotFile[]): Promise<string> {
    const data = await this.request('POST', '/snapshots', { name, files: files.map((f) => ({ ...f })) });
    const snapshot = data['snapshot'];
    if (typeof snapshot !== 'string') {
      throw new ServiceRequestError('Missing or invalid snapshot in response');
    }
    this.logger.info('Uploaded snapshot', { snapshot, files: files.length });
    return snapshot;
  }

  async ask(snapshot: string, question: Question): Promise<JsonObject[]> {
    const path = `/snapshots/${encodeURIComponent(snapshot)}/questions/${question}`;
    const data = await this.request('POST', path, {});
    const rows = data['rows'];
    if (!Array.isArray(rows)) {
      throw new ServiceRequestError(`Missing or invalid rows for ${question}`);
    }
    return rows.map((row) => {
      if (!isJsonObject(row)) throw new ServiceRequestError(`Invalid row in ${question} answer`);
      return row;
    });
  }

  /** Ask every question and assemble the raw tables. */
  async collect(snapshot: string): Promise<RawServiceData> {
    const raw: RawServiceData = { topology: [], ips: [], interfaces: [], declarations: [] };
    for (const question of QUESTIONS) {
      const rows = await this.ask(snapshot, question);
      raw[QUESTION_TABLES[question]] = rows;
      this.logger.debug('Answered question', { question, rows: rows.length });
    }
    return raw;
  }

  private async request(method: 'GET' | 'POST', path: string, body?: JsonObject): Promise<JsonObject> {
    const url = `${this.baseUrl}${path}`;
    try {
      const result = await withRetry(
        () => this.send(method, url, body),
        this.retryConfig,
        this.logger,
        this.sleepFn,
        this.jitterFn
      );
      return result.value;
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        this.logger.error('Analysis service unavailable', { url, attempts: error.attempts }, error.lastError);
        throw new ServiceUnavailableError(`Analysis service at ${this.baseUrl} is unavailable: ${error.lastError.message}`, error.lastError);
      }
      throw error;
    }
  }

  private async send(method: 'GET' | 'POST', url: string, body?: JsonObject): Promise<JsonObject> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(url, {
        method,
        headers: { 'Content-Type': 'application/json', ...this.headers },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });

      clearTimeout(timeoutId);

      if (!response.ok) {
        const text = await response.text().catch(() => 'Unable to read response body');
        throw new ServiceRequestError(`Service returned status ${response.status}`, response.status, text);
      }

      if (method === 'GET') return {};
      const data: unknown = await response.json();
      if (!isJsonObject(data)) {
        throw new ServiceRequestError('Invalid response format');
      }
      return data;
    } catch (error) {
      clearTimeout(timeoutId);

      if (error instanceof ServiceRequestError) {
        throw error;
      }

      if (error instanceof Error && error.name === 'AbortError') {
        throw new ServiceRequestError(`Request timed out after ${this.timeoutMs}ms`);
      }

      throw new ServiceRequestError(
        `Request failed: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
}
