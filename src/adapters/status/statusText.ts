import type { PresenceStatus } from '@/domain/presence/types';

/**
 * One-line status for the tray and the log.
 */
export function formatStatus(status: PresenceStatus): string {
  if (status.mode === 'paused') {
    return 'Paused';
  }
  if (!status.connected) {
    return status.lastError ? `Disconnected (${status.lastError})` : 'Not connected';
  }
  if (status.track) {
    return `Showing: ${status.track.title} — ${status.track.artist}`;
  }
  return 'Idle';
}
