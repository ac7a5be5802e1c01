export { run, parseFile, diagnosticsTable, outputPayload } from './runner.js';
export type { Output, FileOutcome, RunSummary } from './runner.js';
export {
  DEFAULT_EXTENSIONS,
  DEFAULT_TARGET,
  loadConfig,
  loadConfigFile,
  resolveConfigPath,
  resolveRunOptions,
  validateConfig,
} from './config.js';
export type { CliOptions, ConfigLocations, DdlReaderConfig, LoadedConfig, RunOptions } from './config.js';
export { collectInputFiles, dumpSchema, schemaFileName } from './files.js';
