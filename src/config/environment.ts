import path from 'node:path';
import type { LogLevel } from '@/types/logLevel';

/**
 * Install directory: two levels above this module in both `src/config` and
 * `dist/config`. Independent of the working directory, which for an invite
 * link is the launching program's.
 */
export const APP_ROOT = path.resolve(__dirname, '..', '..');

export interface EnvironmentConfig {
  nodeEnv: 'development' | 'production' | 'test';
  /** Console level used until config.json has been read. */
  logLevel: LogLevel;
  /** Holds config.json and the log file. */
  dataDir: string;
  /** Tray icons. */
  assetsDir: string;
}

/**
 * Fixed process settings; there are no environment variable overrides.
 */
export function loadEnvironment(root = APP_ROOT): EnvironmentConfig {
  return {
    nodeEnv: 'development',
    logLevel: 'info',
    dataDir: path.resolve(root, 'data'),
    assetsDir: path.resolve(root, 'assets'),
  };
}
