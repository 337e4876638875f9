import * as path from 'node:path';
import { ConfigFileSchema, ConfigSchema, type Config } from './schema.js';
import { fileExists, readFile } from '../../utils/file-system.js';
import { parseYamlWithSchema } from '../../utils/yaml.js';
import { ConfigError, SystemError, ErrorCodes } from '../../utils/errors.js';

export const CONFIG_FILE_NAME = '.argcheck.yaml';

export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load `.argcheck.yaml` from the project root, or an explicit path relative to it.
 * A missing default file means defaults; a missing explicit file is an error.
 */
export async function loadConfig(projectRoot: string, configPath?: string): Promise<Config> {
  const fullPath = configPath ? path.resolve(projectRoot, configPath) : getConfigPath(projectRoot);

  if (!(await fileExists(fullPath))) {
    if (configPath) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Config file not found: ${fullPath}`,
        { path: fullPath }
      );
    }
    return getDefaultConfig();
  }

  let content: string;
  try {
    content = await readFile(fullPath);
  } catch (error) {
    throw new ConfigError(
      ErrorCodes.CONFIG_LOAD_ERROR,
      `Failed to read config file ${fullPath}: ${error instanceof Error ? error.message : String(error)}`,
      { path: fullPath }
    );
  }

  try {
    return parseYamlWithSchema(content, ConfigFileSchema, path.basename(fullPath));
  } catch (error) {
    if (error instanceof SystemError) {
      throw new ConfigError(ErrorCodes.CONFIG_INVALID, `${error.message} (${fullPath})`, {
        ...error.details,
        path: fullPath,
      });
    }
    throw error;
  }
}

/**
 * Fill defaults around partial values.
 */
export function mergeConfig(partial: Partial<Config>): Config {
  return ConfigSchema.parse(partial);
}

export function getConfigPath(projectRoot: string): string {
  return path.resolve(projectRoot, CONFIG_FILE_NAME);
}
