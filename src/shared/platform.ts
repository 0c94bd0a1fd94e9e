/**
 * Host platform details recorded on sessions and used to place the database.
 */
import os from 'node:os';
import path from 'node:path';

const PLATFORM_NAMES: Partial<Record<NodeJS.Platform, string>> = {
  darwin: 'macOS',
  win32: 'Windows',
  linux: 'Linux'
};

/** Human-readable OS name, e.g. `macOS`; `Unknown` elsewhere. */
export function getPlatformName(platform: NodeJS.Platform = process.platform): string {
  return PLATFORM_NAMES[platform] ?? 'Unknown';
}

/**
 * Per-user configuration directory:
 * - Windows: %APPDATA%
 * - everywhere else: $XDG_CONFIG_HOME or ~/.config
 */
export function getAppDataPath(): string {
  if (process.platform === 'win32') {
    return process.env.APPDATA || path.join(os.homedir(), 'AppData', 'Roaming');
  }
  return process.env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
}

export function getDefaultDatabasePath(): string {
  return path.join(getAppDataPath(), 'code-time-tracker', 'coding_data.db');
}
