/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create config directory (~/.docr)
 * 2. Load config.toml if it exists
 * 3. Validate with Zod schema
 * 4. Merge with defaults (user values override defaults)
 * 5. Provide type-safe access
 *
 * Every function takes an optional config path so tests can point at a
 * temp directory.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import TOML from '@iarna/toml';
import { ConfigSchema, PartialConfigSchema, type Config } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getConfigPath } from './paths.js';
import { ConfigurationError } from '../errors/index.js';

type Table = Record<string, unknown>;

function isTable(value: unknown): value is Table {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

function isTomlTable(value: unknown): value is TOML.JsonMap {
  return isTable(value);
}

/**
 * Deep merge two objects, with source values overriding target
 */
function deepMerge(target: Table, source: Table): Table {
  const result: Table = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];

    if (isTable(sourceValue) && isTable(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

function formatIssues(issues: Array<{ path: Array<string | number>; message: string }>): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

/**
 * Merge validated user values over the defaults and re-check the result.
 */
function resolveConfig(userConfig: Table, context: string, hint: string): Config {
  const result = ConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, userConfig));
  if (!result.success) {
    throw new ConfigurationError(`${context}:\n${formatIssues(result.error.issues)}`, hint);
  }
  return result.data;
}

function readToml(configPath: string): TOML.JsonMap {
  const content = fs.readFileSync(configPath, 'utf-8');
  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigurationError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or delete it to restore defaults`
    );
  }
}

/**
 * Load and parse the config file
 * Returns the merged config (defaults + user overrides)
 *
 * @param createIfMissing - If true, writes the default template on first run
 * @throws ConfigurationError if the file exists but is invalid
 */
export function loadConfig(createIfMissing = true, configPath = getConfigPath()): Config {
  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      fs.mkdirSync(path.dirname(configPath), { recursive: true });
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return structuredClone(DEFAULT_CONFIG);
  }

  const parsed = readToml(configPath);

  // Shape check first so the error points at the user's own keys
  const validationResult = PartialConfigSchema.safeParse(parsed);
  if (!validationResult.success) {
    throw new ConfigurationError(
      `Invalid configuration:\n${formatIssues(validationResult.error.issues)}`,
      `Fix the values in ${configPath}`
    );
  }

  return resolveConfig(validationResult.data, 'Invalid configuration', `Fix the values in ${configPath}`);
}

/**
 * Get a specific config value by dot-notation path
 * Example: getConfigValue('chunking.chunk_size') => 1000
 */
export function getConfigValue(key: string, configPath = getConfigPath()): unknown {
  let current: unknown = loadConfig(false, configPath);
  for (const part of key.split('.')) {
    if (!isTable(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Parse a CLI string into a boolean, number or string
 */
function parseValue(value: string): string | number | boolean {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * Set a specific config value by dot-notation path
 * Writes the change back to the config file after validating the result
 */
export function setConfigValue(key: string, value: string, configPath = getConfigPath()): void {
  const parts = key.split('.').filter((part) => part.length > 0);
  const leaf = parts.pop();
  if (leaf === undefined) {
    throw new ConfigurationError('Invalid config key: empty key');
  }

  const config: TOML.JsonMap = fs.existsSync(configPath) ? readToml(configPath) : {};

  let current = config;
  for (const part of parts) {
    const next = current[part];
    if (isTomlTable(next)) {
      current = next;
    } else {
      const created: TOML.JsonMap = {};
      current[part] = created;
      current = created;
    }
  }
  current[leaf] = parseValue(value);

  const known = listKeys(DEFAULT_CONFIG);
  if (!known.includes(key)) {
    throw new ConfigurationError(
      `Unknown config key: ${key}`,
      `Known keys: ${known.join(', ')}`
    );
  }

  resolveConfig(config, `Invalid value for '${key}'`, 'Run: docr config list  to see current values and types');

  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, TOML.stringify(config), 'utf-8');
}

function flatten(obj: Table, prefix: string, entries: Array<[string, unknown]>): void {
  for (const [key, value] of Object.entries(obj)) {
    const fullKey = prefix ? `${prefix}.${key}` : key;
    if (isTable(value)) {
      flatten(value, fullKey, entries);
    } else {
      entries.push([fullKey, value]);
    }
  }
}

function listKeys(config: Config): string[] {
  const entries: Array<[string, unknown]> = [];
  flatten(config, '', entries);
  return entries.map(([key]) => key);
}

/**
 * List all config values in a flat format
 * Returns entries like ['chunking.chunk_size', 1000]
 */
export function listConfig(configPath = getConfigPath()): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];
  flatten(loadConfig(true, configPath), '', entries);
  return entries;
}
