/**
 * Environment and filesystem locations for the history analyzer
 */

import * as os from 'os';
import * as path from 'path';
import { CONFIG_DIR_NAME, IGNORE_FILE_NAME, SAFARI_HISTORY_PATH } from './constants';

/**
 * Load environment variable with fallback
 * @param key - Environment variable key
 * @param defaultValue - Default value if not found
 * @returns Environment variable value or default
 */
export function getEnvVar(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/**
 * Configuration directory: $XDG_CONFIG_HOME/hist, or ~/.config/hist
 */
export function getConfigDir(): string {
  const configHome = getEnvVar('XDG_CONFIG_HOME', path.join(os.homedir(), '.config'));
  return path.join(configHome, CONFIG_DIR_NAME);
}

/**
 * Location of the ignore-list text file
 */
export function getIgnoreListPath(): string {
  return path.join(getConfigDir(), IGNORE_FILE_NAME);
}

/**
 * History database path: $HIST_DB_PATH, or Safari's History.db under the home directory
 */
export function getHistoryDbPath(): string {
  return getEnvVar('HIST_DB_PATH', path.join(os.homedir(), SAFARI_HISTORY_PATH));
}
