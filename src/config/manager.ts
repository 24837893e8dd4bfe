/**
 * Config manager - loads the optional config file and layers CLI overrides
 */

import { DEFAULT_CONFIG, type ConfigFile, type ExportConfig } from '../types/index.js';
import { isExplicitConfigPath, resolveConfigPath } from '../utils/config-path.js';
import { fileExists, readFileSafe } from '../utils/fs.js';
import { parseConfig, validateConfig, type ValidationError } from './schema.js';

/**
 * The config file or the effective settings are invalid
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly errors: ValidationError[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

function describeErrors(errors: ValidationError[]): string {
  return errors.map((e) => (e.path ? `${e.path}: ${e.message}` : e.message)).join(', ');
}

export class ConfigManager {
  private readonly configPath: string;
  private readonly explicit: boolean;
  private fileConfig: ConfigFile | null = null;

  constructor(configPath?: string) {
    this.configPath = resolveConfigPath({ configPath });
    this.explicit = isExplicitConfigPath({ configPath });
  }

  getConfigPath(): string {
    return this.configPath;
  }

  async exists(): Promise<boolean> {
    return fileExists(this.configPath);
  }

  /**
   * Read the config file. A missing default file yields `{}`; a missing
   * file the user named is an error.
   */
  async loadFile(): Promise<ConfigFile> {
    if (this.fileConfig) {
      return this.fileConfig;
    }

    const content = await readFileSafe(this.configPath);
    if (content === null) {
      if (this.explicit) {
        throw new ConfigError(`Config file not found: ${this.configPath}`);
      }
      this.fileConfig = {};
      return this.fileConfig;
    }

    const { config, errors } = parseConfig(content);
    if (!config) {
      throw new ConfigError(`Invalid config ${this.configPath}: ${describeErrors(errors)}`, errors);
    }

    this.fileConfig = config;
    return config;
  }

  /**
   * Effective settings: defaults < config file < overrides
   */
  async resolve(overrides: Partial<ExportConfig> = {}): Promise<ExportConfig> {
    const file = await this.loadFile();
    return mergeConfig(file, overrides);
  }
}

/**
 * Merge a config file and CLI overrides onto the defaults. Undefined
 * override values leave the lower layer in place.
 *
 * @throws ConfigError when the merged settings are invalid
 */
export function mergeConfig(file: ConfigFile, overrides: Partial<ExportConfig> = {}): ExportConfig {
  const pick = <K extends keyof ExportConfig>(key: K): ExportConfig[K] =>
    overrides[key] ?? file[key] ?? DEFAULT_CONFIG[key];

  const merged: ExportConfig = {
    url: pick('url'),
    out: pick('out'),
    timezone: pick('timezone'),
    conference_year: pick('conference_year'),
    timeout_ms: pick('timeout_ms'),
    description_timeout_ms: pick('description_timeout_ms'),
    fetch_descriptions: pick('fetch_descriptions'),
    calendar_name: pick('calendar_name'),
    uid_domain: pick('uid_domain'),
    user_agent: pick('user_agent'),
  };

  const result = validateConfig(merged);
  if (!result.valid) {
    throw new ConfigError(`Invalid options: ${describeErrors(result.errors)}`, result.errors);
  }
  return merged;
}
