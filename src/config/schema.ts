/**
 * Config schema validation
 */

import { parse as parseYaml } from 'yaml';
import { isValidTimeZone } from '../schedule/time.js';
import type { ConfigFile } from '../types/index.js';

export interface ValidationError {
  path: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

const STRING_KEYS = ['url', 'out', 'timezone', 'calendar_name', 'uid_domain', 'user_agent'] as const;
const POSITIVE_INT_KEYS = ['conference_year', 'timeout_ms', 'description_timeout_ms'] as const;
const KNOWN_KEYS = new Set<string>([...STRING_KEYS, ...POSITIVE_INT_KEYS, 'fetch_descriptions', 'version']);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateUrl(value: string, path: string): ValidationError[] {
  try {
    const url = new URL(value);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return [{ path, message: 'url must use http or https' }];
    }
    return [];
  } catch {
    return [{ path, message: `invalid url: ${value}` }];
  }
}

/**
 * Validate a (partial) config object, as read from a file or built from flags
 */
export function validateConfig(config: unknown): ValidationResult {
  if (!isPlainObject(config)) {
    return { valid: false, errors: [{ path: '', message: 'config must be an object' }] };
  }

  const errors: ValidationError[] = [];

  for (const key of Object.keys(config)) {
    if (!KNOWN_KEYS.has(key)) {
      errors.push({ path: key, message: `unknown key: ${key}` });
    }
  }

  if (config.version !== undefined && config.version !== 1) {
    errors.push({ path: 'version', message: 'version must be 1' });
  }

  for (const key of STRING_KEYS) {
    const value = config[key];
    if (value !== undefined && (typeof value !== 'string' || !value.trim())) {
      errors.push({ path: key, message: `${key} must be a non-empty string` });
    }
  }

  for (const key of POSITIVE_INT_KEYS) {
    const value = config[key];
    if (value !== undefined && (typeof value !== 'number' || !Number.isInteger(value) || value <= 0)) {
      errors.push({ path: key, message: `${key} must be a positive integer` });
    }
  }

  if (config.fetch_descriptions !== undefined && typeof config.fetch_descriptions !== 'boolean') {
    errors.push({ path: 'fetch_descriptions', message: 'fetch_descriptions must be a boolean' });
  }

  if (typeof config.url === 'string' && config.url.trim()) {
    errors.push(...validateUrl(config.url, 'url'));
  }

  if (typeof config.timezone === 'string' && config.timezone.trim() && !isValidTimeZone(config.timezone)) {
    errors.push({ path: 'timezone', message: `unknown time zone: ${config.timezone}` });
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Parse and validate config file text (YAML; JSON is accepted as a subset)
 */
export function parseConfig(text: string): { config: ConfigFile | null; errors: ValidationError[] } {
  let parsed: unknown;
  try {
    parsed = parseYaml(text);
  } catch (e) {
    return {
      config: null,
      errors: [{ path: '', message: `Invalid YAML: ${e instanceof Error ? e.message : 'parse error'}` }],
    };
  }

  // An empty file means "all defaults"
  if (parsed === null || parsed === undefined) {
    return { config: {}, errors: [] };
  }

  const result = validateConfig(parsed);
  if (!result.valid || !isPlainObject(parsed)) {
    return { config: null, errors: result.errors };
  }

  return { config: toConfigFile(parsed), errors: [] };
}

/**
 * Copy the validated keys into a typed object
 */
function toConfigFile(raw: Record<string, unknown>): ConfigFile {
  const config: ConfigFile = {};
  for (const key of STRING_KEYS) {
    const value = raw[key];
    if (typeof value === 'string') {
      config[key] = value;
    }
  }
  for (const key of POSITIVE_INT_KEYS) {
    const value = raw[key];
    if (typeof value === 'number') {
      config[key] = value;
    }
  }
  if (typeof raw.fetch_descriptions === 'boolean') {
    config.fetch_descriptions = raw.fetch_descriptions;
  }
  return config;
}
