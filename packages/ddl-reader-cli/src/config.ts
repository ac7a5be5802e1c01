import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { isOutputMode, type OutputMode } from 'ddl-reader';

export const DEFAULT_EXTENSIONS: readonly string[] = ['.sql', '.ddl', '.hql'];
export const DEFAULT_TARGET = 'schemas';

/** Contents of a ddl-reader.config.json file. Every key is optional. */
export interface DdlReaderConfig {
  outputMode?: OutputMode;
  target?: string;
  dump?: boolean;
  groupByType?: boolean;
  extensions?: string[];
}

/** Options as commander hands them over */
export interface CliOptions {
  target?: string;
  verbose?: boolean;
  dump: boolean;
  outputMode?: string;
  groupByType?: boolean;
  config?: string;
  color: boolean;
  debug?: boolean;
}

export interface RunOptions {
  target: string;
  verbose: boolean;
  dump: boolean;
  outputMode: OutputMode;
  groupByType: boolean;
  color: boolean;
  extensions: readonly string[];
}

export interface ConfigLocations {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  homeDir?: string;
}

/**
 * Resolve config file path following the resolution strategy
 */
export async function resolveConfigPath(configOption?: string, locations: ConfigLocations = {}): Promise<string | null> {
  const env = locations.env ?? process.env;
  const cwd = locations.cwd ?? process.cwd();

  // 1. --config CLI argument (highest priority)
  if (configOption) {
    return path.resolve(cwd, configOption);
  }

  // 2. DDL_READER_CONFIG environment variable
  if (env.DDL_READER_CONFIG) {
    return path.resolve(cwd, env.DDL_READER_CONFIG);
  }

  // 3. ./ddl-reader.config.json (current directory)
  const cwdConfig = path.join(cwd, 'ddl-reader.config.json');
  if (await exists(cwdConfig)) {
    return cwdConfig;
  }

  // 4. ~/.ddl-reader/config.json (user home directory)
  const homeConfig = path.join(locations.homeDir ?? os.homedir(), '.ddl-reader', 'config.json');
  if (await exists(homeConfig)) {
    return homeConfig;
  }

  return null;
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

/**
 * Load and parse config file
 */
export async function loadConfigFile(configPath: string): Promise<unknown> {
  try {
    const content = await fs.readFile(configPath, 'utf-8');
    return JSON.parse(content);
  } catch (error) {
    throw new Error(`Failed to load config from '${configPath}': ${error instanceof Error ? error.message : error}`);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function validateConfig(value: unknown): value is DdlReaderConfig {
  if (!isRecord(value)) return false;
  if (value.outputMode !== undefined && !isOutputMode(value.outputMode)) return false;
  if (value.target !== undefined && typeof value.target !== 'string') return false;
  if (value.dump !== undefined && typeof value.dump !== 'boolean') return false;
  if (value.groupByType !== undefined && typeof value.groupByType !== 'boolean') return false;
  if (value.extensions !== undefined) {
    if (!Array.isArray(value.extensions)) return false;
    if (!value.extensions.every(ext => typeof ext === 'string' && ext.startsWith('.'))) return false;
  }
  return true;
}

export interface LoadedConfig {
  path: string;
  config: DdlReaderConfig;
}

/**
 * Finds and loads the config file, if any.
 * @throws Error when the file cannot be read or does not validate
 */
export async function loadConfig(configOption?: string, locations?: ConfigLocations): Promise<LoadedConfig | null> {
  const configPath = await resolveConfigPath(configOption, locations);
  if (!configPath) return null;
  const config = await loadConfigFile(configPath);
  if (!validateConfig(config)) {
    throw new Error(`Invalid config file at ${configPath}`);
  }
  return { path: configPath, config };
}

/**
 * Merges command-line options over the config file over the defaults.
 * `isExplicit` tells whether the user passed an option, since negatable
 * flags such as --no-dump always carry a value.
 */
export function resolveRunOptions(
  cli: CliOptions,
  config: DdlReaderConfig = {},
  isExplicit: (key: keyof CliOptions) => boolean = key => cli[key] !== undefined
): RunOptions {
  const outputMode = cli.outputMode ?? config.outputMode ?? 'sql';
  if (!isOutputMode(outputMode)) {
    throw new Error(`Invalid output mode '${outputMode}' (expected sql or hql)`);
  }
  return {
    target: cli.target ?? config.target ?? DEFAULT_TARGET,
    verbose: cli.verbose ?? false,
    dump: isExplicit('dump') ? cli.dump : config.dump ?? true,
    outputMode,
    groupByType: cli.groupByType ?? config.groupByType ?? false,
    color: cli.color,
    extensions: config.extensions ?? DEFAULT_EXTENSIONS,
  };
}
