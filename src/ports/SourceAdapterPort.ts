import type { SourceId, TrackSnapshot } from '@/domain/track/trackSnapshot';

/**
 * A local track source. `probe` resolves `null` when nothing is playing and
 * rejects only for transport-level faults.
 */
export interface SourceAdapter {
  readonly id: SourceId;
  readonly name: string;
  probe(): Promise<TrackSnapshot | null>;
}

/**
 * Adapters keyed by their slot in the priority list. A missing slot is a
 * source that is disabled in the configuration.
 */
export type SourceAdapterRegistry = Partial<Record<SourceId, SourceAdapter>>;
