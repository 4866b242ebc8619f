/**
 * Error taxonomy for the condenser pipeline.
 *
 * Every error carries a stable code and the node / interface / policy /
 * statement it was raised for. Construction-time errors (`ParseError`) abort
 * the run; query-time errors (`InterpretError`, `CycleBoundError`,
 * `QueryError`) are scoped to the query that raised them.
 *
 * @module core/errors
 */

export const ErrorCode = {
  PARSE_ERROR: 'PARSE_ERROR',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
  SERVICE_ERROR: 'SERVICE_ERROR',
  INTERPRET_ERROR: 'INTERPRET_ERROR',
  CYCLE_BOUND: 'CYCLE_BOUND',
  QUERY_ERROR: 'QUERY_ERROR',
  CONFIG_ERROR: 'CONFIG_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface ErrorContext {
  node?: string;
  interface?: string;
  policy?: string;
  statement?: string;
}

const CONTEXT_KEYS: (keyof ErrorContext)[] = ['node', 'interface', 'policy', 'statement'];

export class CondenserError extends Error {
  readonly code: ErrorCode;
  readonly context: ErrorContext;

  constructor(code: ErrorCode, message: string, context: ErrorContext = {}) {
    super(message);
    this.name = 'CondenserError';
    this.code = code;
    this.context = { ...context };
  }

  /**
   * Fill in context keys that are not set yet. Inner frames know the
   * statement, outer frames know the node, so the innermost value wins.
   */
  addContext(context: ErrorContext): this {
    for (const key of CONTEXT_KEYS) {
      const value = context[key];
      if (this.context[key] === undefined && value !== undefined) {
        this.context[key] = value;
      }
    }
    return this;
  }

  /** One-line description used by the CLI. */
  describe(): string {
    const parts = CONTEXT_KEYS.flatMap((key) => {
      const value = this.context[key];
      return value === undefined ? [] : [`${key}=${value}`];
    });
    const where = parts.length > 0 ? ` (${parts.join(', ')})` : '';
    return `error [${this.code}] ${this.message}${where}`;
  }
}

export class ParseError extends CondenserError {
  readonly path: string;

  constructor(message: string, path: string, context: ErrorContext = {}) {
    super(ErrorCode.PARSE_ERROR, path ? `${message} at ${path}` : message, context);
    this.name = 'ParseError';
    this.path = path;
  }
}

export class InterpretError extends CondenserError {
  constructor(message: string, context: ErrorContext = {}) {
    super(ErrorCode.INTERPRET_ERROR, message, context);
    this.name = 'InterpretError';
  }
}

export class CycleBoundError extends CondenserError {
  readonly iterations: number;

  constructor(iterations: number, context: ErrorContext = {}) {
    super(
      ErrorCode.CYCLE_BOUND,
      `Propagation did not reach a fixed point within ${iterations} steps; result is inconclusive`,
      context,
    );
    this.name = 'CycleBoundError';
    this.iterations = iterations;
  }
}

export class QueryError extends CondenserError {
  constructor(message: string, context: ErrorContext = {}) {
    super(ErrorCode.QUERY_ERROR, message, context);
    this.name = 'QueryError';
  }
}

export class ServiceUnavailableError extends CondenserError {
  constructor(message: string, cause?: Error) {
    super(ErrorCode.SERVICE_UNAVAILABLE, message);
    this.name = 'ServiceUnavailableError';
    this.cause = cause;
  }
}

export class ServiceRequestError extends CondenserError {
  readonly statusCode?: number;
  readonly responseBody?: string;

  constructor(message: string, statusCode?: number, responseBody?: string) {
    super(ErrorCode.SERVICE_ERROR, message);
    this.name = 'ServiceRequestError';
    this.statusCode = statusCode;
    this.responseBody = responseBody;
  }
}

export class ConfigError extends CondenserError {
  constructor(message: string) {
    super(ErrorCode.CONFIG_ERROR, message);
    this.name = 'ConfigError';
  }
}

export function isCondenserError(error: unknown): error is CondenserError {
  return error instanceof CondenserError;
}
