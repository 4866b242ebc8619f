export { run, parseArgs, helpText, VERSION, type ParsedArgs, type RunDependencies } from './main.js';
export {
  loadConfig,
  validateConfig,
  findConfigFile,
  loadEnvOverrides,
  DEFAULT_CONFIG,
  type CondenserConfig,
  type LoadConfigOptions,
  type LoadedConfig,
} from './config.js';
export { buildCommand, findConfigFiles, type BuildOptions, type BuildResult, type SnapshotService } from './commands/build.js';
export { simplifyCommand, assertWellTyped, type SimplifyOptions, type SimplifyResult } from './commands/simplify.js';
export { queryCommand, loadQueryFile, loadTopology, type QueryCommandOptions, type QueryCommandResult } from './commands/query.js';
