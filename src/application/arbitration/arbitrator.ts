import { AdapterProbeError, errorMessage } from '@/domain/errors';
import {
  SOURCE_PRIORITY,
  describeTrack,
  type SourceId,
  type TrackSnapshot,
} from '@/domain/track/trackSnapshot';
import type { SourceAdapter, SourceAdapterRegistry } from '@/ports/SourceAdapterPort';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

export type ProbeOutcome =
  | { kind: 'snapshot'; sourceId: SourceId; snapshot: TrackSnapshot }
  | { kind: 'empty'; sourceId: SourceId }
  | { kind: 'failed'; sourceId: SourceId; error: AdapterProbeError };

/**
 * Picks the single authoritative track for a tick: the first adapter in
 * priority order that reports something actually playing.
 */
export class Arbitrator {
  private readonly lastFailure = new Map<SourceId, string>();

  constructor(
    private readonly adapters: SourceAdapterRegistry,
    private readonly log: ComponentLogger = createLogger('Presence', 'Arbitrator'),
  ) {}

  public async select(): Promise<TrackSnapshot | null> {
    for (const sourceId of SOURCE_PRIORITY) {
      const adapter = this.adapters[sourceId];
      if (!adapter) {
        continue;
      }
      const outcome = await this.probe(adapter);
      if (outcome.kind === 'failed') {
        this.reportFailure(outcome.error);
        continue;
      }
      this.lastFailure.delete(sourceId);
      if (outcome.kind === 'snapshot') {
        this.log.spam('source selected', {
          sourceId,
          adapter: adapter.name,
          track: describeTrack(outcome.snapshot),
        });
        return outcome.snapshot;
      }
    }
    return null;
  }

  public async probe(adapter: SourceAdapter): Promise<ProbeOutcome> {
    try {
      const snapshot = await adapter.probe();
      if (!snapshot || !snapshot.isPlaying) {
        return { kind: 'empty', sourceId: adapter.id };
      }
      return { kind: 'snapshot', sourceId: adapter.id, snapshot };
    } catch (error) {
      const probeError =
        error instanceof AdapterProbeError
          ? error
          : new AdapterProbeError(adapter.id, errorMessage(error), { cause: error });
      return { kind: 'failed', sourceId: adapter.id, error: probeError };
    }
  }

  private reportFailure(error: AdapterProbeError): void {
    const context = { sourceId: error.sourceId, message: error.message };
    if (this.lastFailure.get(error.sourceId) === error.message) {
      this.log.debug('source probe failed', context);
      return;
    }
    this.lastFailure.set(error.sourceId, error.message);
    this.log.warn('source probe failed', context);
  }
}
