/**
 * Configuration loading. Falls back to defaults when no file exists.
 */
import * as path from 'node:path';
import { ConfigSchema, type Config } from './schema.js';
import { loadYamlWithSchema, fileExists } from '../../utils/index.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

const DEFAULT_CONFIG_PATH = '.doctag/config.yaml';

/**
 * Default configuration values.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration from a file.
 */
export async function loadConfig(
  projectRoot: string,
  configPath?: string
): Promise<Config> {
  const fullPath = configPath
    ? path.resolve(projectRoot, configPath)
    : getConfigPath(projectRoot);

  if (!(await fileExists(fullPath))) {
    // An explicitly named file must exist
    if (configPath) {
      throw new ConfigError(ErrorCodes.FILE_NOT_FOUND, `Config file not found: ${fullPath}`, {
        path: fullPath,
      });
    }
    return getDefaultConfig();
  }

  try {
    return await loadYamlWithSchema(fullPath, ConfigSchema);
  } catch (error) {
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
export function mergeConfig(partial: unknown): Config {
  return ConfigSchema.parse(partial);
}

/**
 * Get the expected config file path for a project.
 */
export function getConfigPath(projectRoot: string): string {
  return path.resolve(projectRoot, DEFAULT_CONFIG_PATH);
}

/**
 * Check if a config file exists in the project.
 */
export async function configExists(projectRoot: string): Promise<boolean> {
  return fileExists(getConfigPath(projectRoot));
}
