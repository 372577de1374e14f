/**
 * Configuration loader
 * Loads configuration from YAML/JSON files and merges it onto the defaults
 */

import * as fs from 'fs';
import * as path from 'path';
import * as YAML from 'yaml';
import { env } from '../lib/env';
import { logger } from '../lib/logger';
import { VolumeRefreshConfig } from './types';

// Default configuration
export const DEFAULT_CONFIG: VolumeRefreshConfig = {
  version: '1.0.0',
  array: {
    apiVersion: '1.19',
    allowUntrustedCertificate: false,
    requestTimeoutMs: 60000,
  },
  database: {
    encrypt: true,
    trustServerCertificate: false,
    connectTimeoutMs: 15000,
    requestTimeoutMs: 120000,
    authentication: 'sql',
  },
  remote: {
    shell: 'pwsh',
    useSsl: false,
    port: 0,
    authentication: 'Default',
  },
  orchestration: {
    stepTimeoutMs: 300000,
    overwriteTimeoutMs: 0,
  },
  history: {
    enabled: true,
    listLimit: 20,
  },
};

let loadedConfig: VolumeRefreshConfig | null = null;

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const key of Object.keys(source)) {
    const incoming = source[key];
    if (incoming === undefined) continue;

    const current = result[key];
    if (isPlainObject(incoming) && isPlainObject(current)) {
      result[key] = deepMerge(current, incoming);
    } else {
      result[key] = incoming;
    }
  }

  return result;
}

function readUserConfig(file: string): PlainObject {
  const content = fs.readFileSync(file, 'utf-8');
  const parsed: unknown = file.endsWith('.json') ? JSON.parse(content) : YAML.parse(content);
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw new Error(`Config file ${file} must contain a mapping at the top level`);
  }
  return parsed;
}

// Only known sections and matching primitive types survive the merge
function conformsTo(shape: unknown, value: unknown): boolean {
  if (isPlainObject(shape)) {
    if (!isPlainObject(value)) return false;
    return Object.keys(value).every((key) => !(key in shape) || conformsTo(shape[key], value[key]));
  }
  return shape === undefined || typeof shape === typeof value;
}

function isVolumeRefreshConfig(value: PlainObject): value is PlainObject & VolumeRefreshConfig {
  return conformsTo(DEFAULT_CONFIG, value);
}

export function mergeConfig(userConfig: PlainObject): VolumeRefreshConfig {
  const merged = deepMerge(Object.fromEntries(Object.entries(DEFAULT_CONFIG)), userConfig);
  if (!isVolumeRefreshConfig(merged)) {
    throw new Error('Configuration has values of the wrong type; compare with `volume-refresh config`');
  }
  return merged;
}

export function loadConfig(configPath?: string): VolumeRefreshConfig {
  if (loadedConfig && !configPath) {
    return loadedConfig;
  }

  const configFile = configPath || path.join(env.CONFIG_DIR, 'config.yaml');
  const jsonConfigFile = configPath || path.join(env.CONFIG_DIR, 'config.json');

  let userConfig: PlainObject = {};

  // Try YAML first, then JSON
  if (fs.existsSync(configFile)) {
    logger.info(`Loading config from ${configFile}`);
    userConfig = readUserConfig(configFile);
  } else if (fs.existsSync(jsonConfigFile)) {
    logger.info(`Loading config from ${jsonConfigFile}`);
    userConfig = readUserConfig(jsonConfigFile);
  } else if (configPath) {
    throw new Error(`Config file not found: ${configPath}`);
  } else {
    logger.warn(`No config file found, using defaults. Expected at: ${configFile}`);
    // Write default config for reference
    writeDefaultConfig(configFile);
  }

  loadedConfig = mergeConfig(userConfig);
  return loadedConfig;
}

export function writeDefaultConfig(configPath: string): void {
  const dir = path.dirname(configPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const content = YAML.stringify(DEFAULT_CONFIG, { indent: 2 });
  fs.writeFileSync(configPath, content);
  logger.info(`Wrote default config to ${configPath}`);
}

export function reloadConfig(): VolumeRefreshConfig {
  loadedConfig = null;
  return loadConfig();
}

export function getConfig(): VolumeRefreshConfig {
  return loadConfig();
}
