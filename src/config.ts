/**
 * @fileoverview Configuration of the image finder.
 * Built-in defaults are overridden by a YAML configuration file, then by environment variables.
 */

import * as fs from 'fs';
import * as yaml from 'js-yaml';
import * as os from 'os';
import * as path from 'path';

import { ConfigError, getErrorMessage } from './errors';

/**
 * Resolved configuration.
 */
export type AppConfig = {
  /** Root of the image repository, e.g. a CVMFS mount point. */
  readonly repositoryRoot: string;
  /** Subdirectory of the repository root holding the image files. */
  readonly subdirectory: string;
  /** URL of the published listing file; used when the image directory is not mounted. */
  readonly listUrl?: string;
  /** Location of the catalog snapshot. */
  readonly cachePath: string;
  /** Age after which the snapshot is rebuilt. */
  readonly maxCacheAgeSeconds: number;
};

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: AppConfig = {
  repositoryRoot: '/cvmfs/singularity.galaxyproject.org',
  subdirectory: 'all',
  cachePath: path.join(os.tmpdir(), 'image-finder', 'images.json'),
  maxCacheAgeSeconds: 3600,
};

/**
 * Environment variables and the configuration keys they override.
 */
const ENVIRONMENT_OVERRIDES = {
  IMAGE_FINDER_REPOSITORY_ROOT: 'repositoryRoot',
  IMAGE_FINDER_SUBDIRECTORY: 'subdirectory',
  IMAGE_FINDER_LIST_URL: 'listUrl',
  IMAGE_FINDER_CACHE_PATH: 'cachePath',
  IMAGE_FINDER_MAX_CACHE_AGE: 'maxCacheAgeSeconds',
} as const satisfies Record<string, keyof AppConfig>;

type StringConfigKey = Exclude<keyof AppConfig, 'maxCacheAgeSeconds'>;

const STRING_CONFIG_KEYS: ReadonlyArray<StringConfigKey> = ['repositoryRoot', 'subdirectory', 'listUrl', 'cachePath'];

type ConfigOverrides = { -readonly [Key in keyof AppConfig]?: AppConfig[Key] };

/**
 * Path of the per-user configuration file that is read when no file is named explicitly:
 * `$XDG_CONFIG_HOME/image-finder/config.yaml`, with `~/.config` as the configuration home by default.
 */
export function getDefaultConfigPath(environment: NodeJS.ProcessEnv = process.env): string {
  const configHome = environment.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
  return path.join(configHome, 'image-finder', 'config.yaml');
}

function parseMaxCacheAge(value: unknown, origin: string): number {
  const maxAge = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof maxAge !== 'number' || !Number.isFinite(maxAge) || maxAge < 0) {
    throw new ConfigError(`maxCacheAgeSeconds in ${origin} must be a non-negative number`);
  }
  return maxAge;
}

/**
 * Validates the parsed content of a configuration file. Unknown keys are ignored.
 *
 * @throws {ConfigError} If the document is not a mapping or a known key has the wrong type
 */
export function parseConfigDocument(document: unknown, origin: string): ConfigOverrides {
  if (document === undefined || document === null) {
    return {};
  }
  if (typeof document !== 'object' || Array.isArray(document)) {
    throw new ConfigError(`Configuration in ${origin} must be a mapping`);
  }

  const overrides: ConfigOverrides = {};
  for (const key of STRING_CONFIG_KEYS) {
    const value: unknown = Reflect.get(document, key);
    if (value === undefined) continue;
    if (typeof value !== 'string') {
      throw new ConfigError(`${key} in ${origin} must be a string`);
    }
    overrides[key] = value;
  }

  const maxCacheAgeSeconds: unknown = Reflect.get(document, 'maxCacheAgeSeconds');
  if (maxCacheAgeSeconds !== undefined) {
    overrides.maxCacheAgeSeconds = parseMaxCacheAge(maxCacheAgeSeconds, origin);
  }
  return overrides;
}

function readConfigFile(configPath: string): ConfigOverrides {
  let fileContents: string;
  try {
    fileContents = fs.readFileSync(configPath, 'utf8');
  } catch (error) {
    throw new ConfigError(`Failed to read configuration file ${configPath}: ${getErrorMessage(error)}`);
  }

  let document: unknown;
  try {
    document = yaml.load(fileContents);
  } catch (error) {
    throw new ConfigError(`Failed to parse configuration file ${configPath}: ${getErrorMessage(error)}`);
  }
  return parseConfigDocument(document, configPath);
}

function readEnvironmentOverrides(environment: NodeJS.ProcessEnv): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  for (const [variableName, key] of Object.entries(ENVIRONMENT_OVERRIDES)) {
    const value = environment[variableName];
    if (value === undefined || value === '') continue;
    if (key === 'maxCacheAgeSeconds') {
      overrides.maxCacheAgeSeconds = parseMaxCacheAge(value, variableName);
    } else {
      overrides[key] = value;
    }
  }
  return overrides;
}

/**
 * Resolves the configuration.
 *
 * @param configPath - Explicit configuration file; must exist when given
 * @param environment - Environment variables to read overrides from
 * @throws {ConfigError} If a configuration file or variable is invalid
 */
export function loadConfig(configPath?: string, environment: NodeJS.ProcessEnv = process.env): AppConfig {
  const defaultConfigPath = getDefaultConfigPath(environment);
  const fileOverrides = configPath
    ? readConfigFile(configPath)
    : fs.existsSync(defaultConfigPath)
      ? readConfigFile(defaultConfigPath)
      : {};

  return {
    ...DEFAULT_CONFIG,
    ...fileOverrides,
    ...readEnvironmentOverrides(environment),
  };
}

/**
 * Directory holding the image files: the repository root joined with its subdirectory.
 */
export function getImageDirectory(config: AppConfig): string {
  return path.join(config.repositoryRoot, config.subdirectory);
}
