import { ConfigAdapter } from '@/adapters/config/ConfigAdapter';
import { StorageAdapter } from '@/adapters/storage/StorageAdapter';
import { ConfigRepository } from '@/application/config/configRepository';
import type { ClockPort } from '@/ports/ClockPort';
import type { ConfigPort } from '@/ports/ConfigPort';
import type { StoragePort } from '@/ports/StoragePort';

export type RuntimePorts = {
  storage: StoragePort;
  config: ConfigPort;
  clock: ClockPort;
};

const wallClock: ClockPort = { now: () => Date.now() };

/**
 * The process-wide ports shared by host mode and the one-shot commands.
 */
export function createRuntimePorts({ configPath }: { configPath: string }): RuntimePorts {
  const storage = new StorageAdapter();
  return {
    storage,
    config: new ConfigAdapter(new ConfigRepository(storage, configPath)),
    clock: wallClock,
  };
}
