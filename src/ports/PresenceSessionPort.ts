import type { PresencePayload } from '@/domain/presence/types';

/**
 * Connection to the remote presence service. `update` and `clear` reject with
 * `NotConnectedError` while disconnected; retry policy belongs to the caller.
 */
export interface PresenceSessionPort {
  connect(): Promise<void>;
  update(payload: PresencePayload): Promise<void>;
  clear(): Promise<void>;
  disconnect(): Promise<void>;
  isConnected(): boolean;
}

export type JoinListener = (secret: string) => void;

/**
 * Sessions that can also report "Join" clicks from other users.
 */
export interface JoinEventSource {
  onJoin(listener: JoinListener): () => void;
}
