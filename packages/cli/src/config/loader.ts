import { readFileSync, existsSync, writeFileSync, mkdirSync } from 'fs';
import { homedir } from 'os';
import { resolve, dirname } from 'path';
import { parse } from 'yaml';
import { ConfigSchema, ConfigDefaults, CONFIG_TEMPLATE, type RawConfig, type Config } from './schema.js';

const DEFAULT_CONFIG_PATH = '.colloquy/config.yaml';

export const API_KEY_ENV_VAR = 'OPENAI_API_KEY';
export const PLACEHOLDER_API_KEY = 'INSERT API KEY HERE';

function getDefaultConfigPath(): string {
  return resolve(homedir(), DEFAULT_CONFIG_PATH);
}

function expandTilde(path: string): string {
  if (path.startsWith('~/') || path === '~') {
    return resolve(homedir(), path.slice(2));
  }
  return path;
}

function resolveEnvVar(value: string): string {
  if (value.startsWith('env:')) {
    const envVal = process.env[value.slice(4)];
    return envVal ? envVal : value;
  }
  if (value.startsWith('${') && value.endsWith('}')) {
    const envVal = process.env[value.slice(2, -1)];
    return envVal ? envVal : value;
  }
  if (value.startsWith('$')) {
    const envVal = process.env[value.slice(1)];
    return envVal ? envVal : value;
  }
  return value;
}

function isUnresolvedEnvRef(value: string): boolean {
  return value.startsWith('env:') || value.startsWith('$');
}

function stripNullValues(obj: unknown): unknown {
  if (obj === null || obj === undefined) {
    return undefined;
  }
  if (Array.isArray(obj)) {
    return obj.filter(item => item !== null).map(stripNullValues);
  }
  if (typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (value !== null) {
        result[key] = stripNullValues(value);
      }
    }
    return result;
  }
  return obj;
}

function resolveEnvVarsInObject(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return resolveEnvVar(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(resolveEnvVarsInObject);
  }
  if (obj !== null && typeof obj === 'object') {
    const resolved: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      resolved[key] = resolveEnvVarsInObject(value);
    }
    return resolved;
  }
  return obj;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface LoadConfigOptions {
  configPath?: string;
}

/** Values given on the command line; they win over file and environment. */
export interface ConfigOverrides {
  apiKey?: string;
  model?: string;
  multiline?: boolean;
}

export type ApiKeySource = 'flag' | 'env' | 'file' | 'none';

export interface LoadConfigResult {
  config: Config;
  configPath: string;
  /** True when the file did not exist and a template was written. */
  initialized: boolean;
  apiKeySource: ApiKeySource;
}

export function getConfigPath(configPath?: string): string {
  if (configPath) {
    return expandTilde(configPath);
  }
  return getDefaultConfigPath();
}

/**
 * Write the starter config file, creating parent directories.
 */
export function initConfigFile(configPath: string): void {
  try {
    mkdirSync(dirname(configPath), { recursive: true });
    writeFileSync(configPath, CONFIG_TEMPLATE, { encoding: 'utf-8', flag: 'wx' });
  } catch (error) {
    const reason = error instanceof Error ? `: ${error.message}` : '';
    throw new ConfigError(`Failed to create config file: ${configPath}${reason}`);
  }
}

function readConfigFile(configPath: string): RawConfig | undefined {
  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch {
    throw new ConfigError(`Failed to read config file: ${configPath}`);
  }

  let rawConfig: unknown;
  try {
    rawConfig = parse(fileContent);
  } catch {
    throw new ConfigError(`Failed to parse config file: ${configPath}`);
  }

  if (rawConfig === null || rawConfig === undefined) {
    return undefined;
  }

  const validated = ConfigSchema.safeParse(resolveEnvVarsInObject(stripNullValues(rawConfig)));
  if (!validated.success) {
    const issues = validated.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join(', ');
    throw new ConfigError(`Invalid config: ${issues}`);
  }
  return validated.data;
}

export function loadConfig(options: LoadConfigOptions = {}, overrides: ConfigOverrides = {}): Config {
  return loadConfigWithMeta(options, overrides).config;
}

/**
 * Load the config file (writing the template first if it is missing), then
 * apply overrides.
 *
 * API key precedence: `overrides.apiKey` > `OPENAI_API_KEY` > file.
 * An unresolved env reference or the template placeholder counts as no key.
 */
export function loadConfigWithMeta(
  options: LoadConfigOptions = {},
  overrides: ConfigOverrides = {},
): LoadConfigResult {
  const configPath = getConfigPath(options.configPath);

  let initialized = false;
  if (!existsSync(configPath)) {
    initConfigFile(configPath);
    initialized = true;
  }

  const raw = readConfigFile(configPath);
  const config: Config = { ...ConfigDefaults, ...raw };

  let apiKeySource: ApiKeySource = 'none';
  const fileKey = config.api_key.trim();
  if (fileKey && fileKey !== PLACEHOLDER_API_KEY && !isUnresolvedEnvRef(fileKey)) {
    config.api_key = fileKey;
    apiKeySource = 'file';
  } else {
    config.api_key = '';
  }

  const envKey = process.env[API_KEY_ENV_VAR]?.trim();
  if (envKey) {
    config.api_key = envKey;
    apiKeySource = 'env';
  }

  const flagKey = overrides.apiKey?.trim();
  if (flagKey) {
    config.api_key = flagKey;
    apiKeySource = 'flag';
  }

  const model = overrides.model?.trim();
  if (model) {
    config.model = model;
  }

  if (overrides.multiline) {
    config.multiline = true;
  }

  return { config, configPath, initialized, apiKeySource };
}
