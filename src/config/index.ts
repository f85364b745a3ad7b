import path from 'node:path';
import { loadEnvironment, type EnvironmentConfig } from '@/config/environment';

export type AppConfig = {
  env: EnvironmentConfig;
  configPath: string;
  logFilePath: string;
  assetsDir: string;
};

/**
 * Where the process keeps its files, under the install directory unless a
 * root is given.
 */
export function loadConfig(root?: string): AppConfig {
  const env = loadEnvironment(root);
  return {
    env,
    configPath: path.join(env.dataDir, 'config.json'),
    logFilePath: path.join(env.dataDir, 'presence.log'),
    assetsDir: env.assetsDir,
  };
}
