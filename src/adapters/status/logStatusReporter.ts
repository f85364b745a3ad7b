import { formatStatus } from '@/adapters/status/statusText';
import type { PresenceStatus } from '@/domain/presence/types';
import type { StatusPort } from '@/ports/StatusPort';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

/**
 * Logs the presence status whenever its text changes.
 */
export class LogStatusReporter implements StatusPort {
  private last: string | null = null;

  constructor(private readonly log: ComponentLogger = createLogger('Presence', 'Status')) {}

  public report(status: PresenceStatus): void {
    const text = formatStatus(status);
    if (text === this.last) {
      return;
    }
    this.last = text;
    this.log.info(`status: ${text}`, { mode: status.mode, connected: status.connected });
  }
}

/**
 * Fans a status out to several sinks (log, tray).
 */
export class StatusFanout implements StatusPort {
  private readonly sinks = new Set<StatusPort>();

  constructor(sinks: StatusPort[] = []) {
    sinks.forEach((sink) => this.sinks.add(sink));
  }

  public add(sink: StatusPort): void {
    this.sinks.add(sink);
  }

  public report(status: PresenceStatus): void {
    for (const sink of this.sinks) {
      sink.report(status);
    }
  }
}
