import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { CommuteRankConfig } from '../types';
import { getGlobalConfig, configHelpers } from '../config/commute-rank.global.config';
import { ConfigError } from './errors';

export const CONFIG_FILE_NAME = 'commute-rank.config.yaml';

/**
 * Values given on the command line; strings are parsed like config file values
 */
export interface ConfigOverrides {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: string | number;
  departureTime?: string | number;
  maxAttempts?: string | number;
  baseDelayMs?: string | number;
  mode?: string;
  verbose?: boolean;
}

type YamlSection = Record<string, unknown>;

function isSection(value: unknown): value is YamlSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(parent: YamlSection, key: string): YamlSection {
  const value = parent[key];
  if (value === undefined || value === null) {
    return {};
  }
  if (!isSection(value)) {
    throw new ConfigError(`Config section "${key}" must be a mapping`);
  }
  return value;
}

function optionalString(value: unknown, name: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ConfigError(`${name} must be a string`);
  }
  return value;
}

/**
 * Find the config file: consumer configs first, then the package default
 */
export function findConfigFile(explicitPath?: string): string | null {
  if (explicitPath) {
    const resolved = path.resolve(explicitPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Configuration file not found: ${resolved}`);
    }
    return resolved;
  }

  const possibleConfigPaths = [
    path.join(process.cwd(), 'configs', CONFIG_FILE_NAME),
    path.join(__dirname, '../../configs', CONFIG_FILE_NAME),
  ];
  return possibleConfigPaths.find(candidate => fs.existsSync(candidate)) ?? null;
}

export function readConfigFile(configPath: string): YamlSection {
  let parsed: unknown;
  try {
    parsed = yaml.load(fs.readFileSync(configPath, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to read configuration from ${configPath}: ${reason}`);
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isSection(parsed)) {
    throw new ConfigError(`Configuration in ${configPath} must be a mapping`);
  }
  return parsed;
}

/**
 * Layer the environment defaults, the YAML document and the overrides into a validated config
 */
export function resolveConfig(
  fileConfig: YamlSection,
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): CommuteRankConfig {
  const defaults = getGlobalConfig(env);
  const googleMaps = section(fileConfig, 'googleMaps');
  const retry = section(fileConfig, 'retry');

  const apiKey = overrides.apiKey ?? optionalString(googleMaps.apiKey, 'googleMaps.apiKey') ?? defaults.googleMaps.apiKey;
  const baseUrl = overrides.baseUrl ?? optionalString(googleMaps.baseUrl, 'googleMaps.baseUrl') ?? defaults.googleMaps.baseUrl;

  return {
    googleMaps: {
      apiKey,
      baseUrl: baseUrl.replace(/\/+$/, ''),
      timeoutMs: configHelpers.parsePositiveInteger(
        overrides.timeoutMs ?? googleMaps.timeoutMs ?? defaults.googleMaps.timeoutMs,
        'timeoutMs'
      ),
      departureTime: configHelpers.parseDepartureTime(
        overrides.departureTime ?? googleMaps.departureTime ?? defaults.googleMaps.departureTime
      ),
    },
    retry: {
      maxAttempts: configHelpers.parsePositiveInteger(
        overrides.maxAttempts ?? retry.maxAttempts ?? defaults.retry.maxAttempts,
        'maxAttempts'
      ),
      baseDelayMs: configHelpers.parseNonNegativeNumber(
        overrides.baseDelayMs ?? retry.baseDelayMs ?? defaults.retry.baseDelayMs,
        'baseDelayMs'
      ),
    },
    mode: configHelpers.parseMode(overrides.mode ?? fileConfig.mode ?? defaults.defaultMode),
    verbose: overrides.verbose ?? (fileConfig.verbose === true || defaults.verbose),
  };
}

export function loadConfig(
  configPath?: string,
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): CommuteRankConfig {
  const found = findConfigFile(configPath);
  const fileConfig = found ? readConfigFile(found) : {};
  return resolveConfig(fileConfig, overrides, env);
}
