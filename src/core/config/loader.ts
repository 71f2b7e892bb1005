import * as path from 'node:path';
import { z } from 'zod';
import { ConfigSchema, type Config, type ConfigInput, type EngineConfig } from './schema.js';
import { fileExists, loadYamlWithSchema, formatZodError } from '../../utils/index.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const DEFAULT_CONFIG_PATH = '.codesim.yaml';

// An empty YAML document parses to null.
const ConfigFileSchema = z.preprocess((val) => val ?? {}, ConfigSchema);

/**
 * Validate a partial configuration and freeze the result.
 * An already resolved EngineConfig is accepted too and is re-validated.
 * Throws ConfigError before any comparison can run with bad settings.
 */
export function resolveEngineConfig(input: ConfigInput = {}): EngineConfig {
  const result = ConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      ErrorCodes.INVALID_CONFIG,
      `Invalid configuration: ${formatZodError(result.error)}`,
      { errors: result.error.issues }
    );
  }
  return freezeConfig(result.data);
}

/**
 * Default configuration values.
 */
export function getDefaultConfig(): EngineConfig {
  return resolveEngineConfig({});
}

/**
 * Apply overrides on top of an existing configuration, section by section.
 */
export function mergeConfig(base: EngineConfig, overrides: ConfigInput): EngineConfig {
  return resolveEngineConfig({
    fingerprint: { ...base.fingerprint, ...overrides.fingerprint },
    weights: { ...base.weights, ...overrides.weights },
    ratings: overrides.ratings ?? base.ratings,
    language: {
      keywords: overrides.language?.keywords ?? base.language.keywords,
      control_constructs: overrides.language?.control_constructs ?? base.language.control_constructs,
    },
    normalize: { ...base.normalize, ...overrides.normalize },
    segments: { ...base.segments, ...overrides.segments },
  });
}

/**
 * Load configuration from a YAML file.
 * Falls back to defaults when the default file doesn't exist; an explicit
 * path that doesn't exist is an error.
 */
export async function loadConfig(
  projectRoot: string,
  configPath?: string
): Promise<EngineConfig> {
  const fullPath = configPath
    ? path.resolve(projectRoot, configPath)
    : path.resolve(projectRoot, DEFAULT_CONFIG_PATH);

  const exists = await fileExists(fullPath);

  if (!exists) {
    if (configPath) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Config file not found: ${fullPath}`,
        { path: fullPath }
      );
    }
    logger.debug(`No config at ${fullPath}, using defaults`);
    return getDefaultConfig();
  }

  try {
    const parsed = await loadYamlWithSchema(fullPath, ConfigFileSchema);
    logger.debug(`Loaded config from ${fullPath}`);
    return freezeConfig(parsed);
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
 * Get the expected config file path for a project.
 */
export function getConfigPath(projectRoot: string): string {
  return path.resolve(projectRoot, DEFAULT_CONFIG_PATH);
}

function freezeConfig(config: Config): EngineConfig {
  return Object.freeze({
    fingerprint: Object.freeze({ ...config.fingerprint }),
    weights: Object.freeze({ ...config.weights }),
    ratings: Object.freeze(config.ratings.map((r) => Object.freeze({ ...r }))),
    language: Object.freeze({
      keywords: Object.freeze([...config.language.keywords]),
      control_constructs: Object.freeze([...config.language.control_constructs]),
    }),
    normalize: Object.freeze({ ...config.normalize }),
    segments: Object.freeze({ ...config.segments }),
  });
}
