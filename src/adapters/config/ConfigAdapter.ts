import type { ConfigRepository } from '@/application/config/configRepository';
import type { PresenceAppConfig } from '@/domain/config/types';
import type { ConfigPort } from '@/ports/ConfigPort';

/**
 * ConfigPort over the JSON-file repository.
 */
export class ConfigAdapter implements ConfigPort {
  constructor(private readonly repository: ConfigRepository) {}

  public load(): Promise<PresenceAppConfig> {
    return this.repository.load();
  }

  public getConfig(): PresenceAppConfig {
    return this.repository.get();
  }

  public getConfigPath(): string {
    return this.repository.path;
  }

  public updateConfig(mutator: (config: PresenceAppConfig) => void | Promise<void>): Promise<PresenceAppConfig> {
    return this.repository.update(mutator);
  }
}
