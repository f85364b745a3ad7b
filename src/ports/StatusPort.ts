import type { PresenceStatus } from '@/domain/presence/types';

export interface StatusPort {
  report(status: PresenceStatus): void;
}
