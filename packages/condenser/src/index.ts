export * from './compiler/index.js';

export {
  evaluatePolicy,
  evaluateChain,
  residualFor,
  DEFAULT_MAX_PATHS,
  type ChainEvaluation,
  type EvaluateOptions,
  type PolicyEvaluation,
  type PolicyPath,
  type TraceStep,
} from './interpreter/interpreter.js';
export { RouteRecord, type RouteAttributes, type RouteRecordOptions } from './interpreter/route-record.js';

export {
  createTopology,
  loadIr,
  toIr,
  exportChain,
  importChain,
  outgoingEdges,
  type Edge,
  type Endpoint,
  type InterfacePolicies,
  type NetworkNode,
  type Topology,
} from './network/topology.js';
export { renderIr, readIr, IR_VERSION, type IrDocument } from './network/ir.js';
export { buildTopology, type BuildTopologyOptions, type RawServiceData } from './network/service-json.js';
export {
  runQuery,
  runQueries,
  renderQueryResult,
  renderBatchEntry,
  DEFAULT_MAX_ITERATIONS,
  type BatchEntry,
  type BatchStatus,
  type HopTrace,
  type QueryOptions,
  type QueryResult,
  type ReachabilityQuery,
} from './network/query-engine.js';
export { QueryCache } from './network/query-cache.js';

export {
  AnalysisServiceClient,
  type AnalysisServiceClientOptions,
  type AnalysisServiceConfig,
  type Question,
  type SnapshotFile,
} from './service/client.js';

export {
  CondenserError,
  ParseError,
  InterpretError,
  CycleBoundError,
  QueryError,
  ServiceUnavailableError,
  ServiceRequestError,
  ConfigError,
  ErrorCode,
  isCondenserError,
  type ErrorContext,
} from './core/errors.js';
export { withRetry, type RetryConfig } from './core/retry.js';
export { createLogger, type Logger, type LogLevel } from './utils/logger.js';
