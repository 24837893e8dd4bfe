/**
 * Config path resolution utility
 * Priority:
 * 1) --config <path> (passed as argument)
 * 2) CONFCAL_CONFIG environment variable
 * 3) OS standard config location
 */

import { homedir, platform } from 'os';
import { join } from 'path';

export const CONFIG_ENV_VAR = 'CONFCAL_CONFIG';

export function getDefaultConfigDir(): string {
  const home = homedir();

  switch (platform()) {
    case 'win32':
      // %APPDATA%\confcal
      return join(process.env.APPDATA || join(home, 'AppData', 'Roaming'), 'confcal');
    case 'darwin':
      return join(home, 'Library', 'Application Support', 'confcal');
    default:
      return join(process.env.XDG_CONFIG_HOME || join(home, '.config'), 'confcal');
  }
}

export function getDefaultConfigPath(): string {
  return join(getDefaultConfigDir(), 'config.yaml');
}

export interface ConfigPathOptions {
  configPath?: string; // --config argument
}

/**
 * True when the user named a config file, so a missing file is an error
 * rather than a reason to fall back to defaults
 */
export function isExplicitConfigPath(options: ConfigPathOptions = {}): boolean {
  return Boolean(options.configPath || process.env[CONFIG_ENV_VAR]);
}

export function resolveConfigPath(options: ConfigPathOptions = {}): string {
  if (options.configPath) {
    return options.configPath;
  }

  const envPath = process.env[CONFIG_ENV_VAR];
  if (envPath) {
    return envPath;
  }

  return getDefaultConfigPath();
}
