import type { PresenceAppConfig } from '@/domain/config/types';

export interface ConfigPort {
  load(): Promise<PresenceAppConfig>;
  getConfig(): PresenceAppConfig;
  getConfigPath(): string;
  updateConfig(
    mutator: (config: PresenceAppConfig) => void | Promise<void>,
  ): Promise<PresenceAppConfig>;
}

export type { PresenceAppConfig };
