import * as path from 'node:path';
import { ConfigSchema, type Config } from './schema.js';
import { loadYamlWithSchema, isFileSync } from '../../utils/index.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

const DEFAULT_CONFIG_PATH = '.playbook-grapher.yaml';

/**
 * Immutable deny-lists handed to the tree scanner.
 */
export interface ScanPolicy {
  readonly extensions: ReadonlySet<string>;
  readonly skipFolders: ReadonlySet<string>;
  readonly skipFiles: ReadonlySet<string>;
  readonly unsupported: ReadonlySet<string>;
}

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration from a file.
 * Falls back to defaults if the file doesn't exist.
 */
export function loadConfig(projectRoot: string, configPath?: string): Config {
  const fullPath = getConfigPath(projectRoot, configPath);

  if (!isFileSync(fullPath)) {
    return getDefaultConfig();
  }

  try {
    return loadYamlWithSchema(fullPath, ConfigSchema);
  } catch (error) {
    if (error instanceof ConfigError) {
      throw error;
    }
    if (error instanceof Error) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Failed to load config from ${fullPath}: ${error.message}`,
        { path: fullPath, originalError: error.message }
      );
    }
    throw error;
  }
}

/**
 * Merge partial config with defaults.
 */
export function mergeConfig(partial: Record<string, unknown>): Config {
  return ConfigSchema.parse(partial);
}

/**
 * Get the config file path for a project.
 */
export function getConfigPath(projectRoot: string, configPath?: string): string {
  return path.resolve(projectRoot, configPath ?? DEFAULT_CONFIG_PATH);
}

/**
 * Freeze the scan settings into the deny-list structure the scanner consumes.
 */
export function resolveScanPolicy(config: Config): ScanPolicy {
  const { scan } = config;
  const skipFolders = new Set(scan.skip_folders);
  if (scan.skip_unsupported) {
    for (const name of scan.unsupported) {
      skipFolders.add(name);
    }
  }
  return Object.freeze({
    extensions: new Set(scan.extensions.map((ext) => ext.toLowerCase())),
    skipFolders,
    skipFiles: new Set(scan.skip_files),
    unsupported: new Set(scan.unsupported),
  });
}
