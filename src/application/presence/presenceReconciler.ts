import { deriveArtworkCacheKey, type ArtworkPublisher } from '@/application/artwork/artworkPublisher';
import { NotConnectedError, UploadError, errorMessage } from '@/domain/errors';
import { buildPresencePayload, type PayloadOptions } from '@/domain/presence/payload';
import {
  createPresenceState,
  type PresenceState,
  type PresenceStatus,
  type PublishedState,
} from '@/domain/presence/types';
import { describeTrack, isSameTrack, type TrackSnapshot } from '@/domain/track/trackSnapshot';
import type { ClockPort } from '@/ports/ClockPort';
import type { PresenceSessionPort } from '@/ports/PresenceSessionPort';
import type { StatusPort } from '@/ports/StatusPort';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

export type ReconcileResult =
  | 'updated'
  | 'cleared'
  | 'unchanged'
  | 'paused'
  | 'disconnected'
  | 'failed';

type RemoteCallResult = 'ok' | 'disconnected' | 'failed';

export interface PresenceReconcilerOptions {
  session: PresenceSessionPort;
  clock: ClockPort;
  payload: PayloadOptions;
  /** Null when artwork upload is disabled; covers then fall back to the asset key. */
  artwork?: ArtworkPublisher | null;
  status?: StatusPort;
  state?: PresenceState;
  log?: ComponentLogger;
}

/**
 * Owns what the remote side shows and decides, per tick, whether it must be
 * replaced, cleared or left alone.
 *
 * | mode        | snapshot                  | action                         |
 * |-------------|---------------------------|--------------------------------|
 * | idle/active | none, something published | clear, reset, idle             |
 * | idle/active | none, nothing published   | nothing                        |
 * | idle/active | same track as published   | nothing (or cover retry)       |
 * | idle/active | different track           | artwork, update, active        |
 * | paused      | any                       | nothing                        |
 *
 * Every method must be called from a single serial queue (see PresenceLoop).
 */
export class PresenceReconciler {
  private readonly session: PresenceSessionPort;
  private readonly clock: ClockPort;
  private readonly payloadOptions: PayloadOptions;
  private readonly artwork: ArtworkPublisher | null;
  private readonly status: StatusPort | null;
  private readonly state: PresenceState;
  private readonly log: ComponentLogger;
  /** The published track is showing the asset key because its upload failed. */
  private artworkPending = false;

  constructor(options: PresenceReconcilerOptions) {
    this.session = options.session;
    this.clock = options.clock;
    this.payloadOptions = options.payload;
    this.artwork = options.artwork ?? null;
    this.status = options.status ?? null;
    this.state = options.state ?? createPresenceState();
    this.log = options.log ?? createLogger('Presence', 'Reconciler');
  }

  public getState(): Readonly<PresenceState> {
    return this.state;
  }

  public getStatus(): PresenceStatus {
    const snapshot = this.state.published.lastSnapshot;
    return {
      mode: this.state.mode,
      connected: this.state.published.connected,
      track: snapshot
        ? { title: snapshot.title, artist: snapshot.artist, sourceId: snapshot.sourceId }
        : null,
      lastError: this.state.lastError,
    };
  }

  public async reconcile(snapshot: TrackSnapshot | null): Promise<ReconcileResult> {
    this.syncConnection();

    if (this.state.mode === 'paused') {
      return 'paused';
    }

    const published = this.state.published;
    if (!snapshot) {
      if (!published.lastSnapshot) {
        return 'unchanged';
      }
      const result = await this.callRemote('clear', () => this.session.clear());
      if (result !== 'ok') {
        return this.finish(result);
      }
      this.log.info('presence cleared');
      this.resetPublished();
      this.state.mode = 'idle';
      this.state.lastError = null;
      return this.finish('cleared');
    }

    const sameTrack = isSameTrack(published.lastSnapshot, snapshot);
    if (sameTrack && !this.artworkPending) {
      return 'unchanged';
    }

    const artwork = await this.resolveArtwork(snapshot);
    if (sameTrack && artwork.url === null) {
      // Still no cover; what is shown already matches.
      this.artworkPending = artwork.failed;
      return 'unchanged';
    }
    const payload = buildPresencePayload(
      snapshot,
      artwork.url,
      this.clock.now(),
      this.payloadOptions,
    );
    const result = await this.callRemote('update', () => this.session.update(payload));
    if (result !== 'ok') {
      return this.finish(result);
    }

    published.lastSnapshot = snapshot;
    published.artworkUrl = artwork.url;
    published.artworkCacheKey = artwork.cacheKey;
    this.artworkPending = artwork.failed;
    this.state.mode = 'active';
    this.state.lastError = null;
    this.log.info('presence updated', {
      track: describeTrack(snapshot),
      sourceId: snapshot.sourceId,
      artwork: artwork.url ? 'url' : 'asset',
    });
    return this.finish('updated');
  }

  public pause(): void {
    if (this.state.mode === 'paused') {
      return;
    }
    this.state.mode = 'paused';
    this.log.info('presence updates paused');
    this.report();
  }

  public resume(): void {
    if (this.state.mode !== 'paused') {
      return;
    }
    this.state.mode = this.state.published.lastSnapshot ? 'active' : 'idle';
    this.log.info('presence updates resumed', { mode: this.state.mode });
    this.report();
  }

  /**
   * Hides the presence until the next resume: clear, disconnect, forget, pause.
   */
  public async clearPresence(): Promise<void> {
    if (this.session.isConnected()) {
      try {
        await this.session.clear();
      } catch (error) {
        this.log.warn('failed to clear presence', { message: errorMessage(error) });
      }
    }
    await this.disconnectQuietly();
    this.resetPublished();
    this.state.published.connected = false;
    this.state.mode = 'paused';
    this.log.info('presence cleared by user');
    this.report();
  }

  /**
   * Release path for process exit. Never throws.
   */
  public async shutdown(): Promise<void> {
    if (this.state.published.lastSnapshot && this.session.isConnected()) {
      try {
        await this.session.clear();
      } catch (error) {
        this.log.warn('failed to clear presence on shutdown', { message: errorMessage(error) });
      }
    }
    await this.disconnectQuietly();
    this.resetPublished();
    this.state.published.connected = false;
  }

  private syncConnection(): void {
    const published = this.state.published;
    if (this.session.isConnected()) {
      published.connected = true;
      return;
    }
    const wasVisible = published.connected || published.lastSnapshot !== null;
    published.connected = false;
    if (published.lastSnapshot) {
      // Nothing is shown on a lost connection, so the next track must be sent again.
      this.resetPublished();
    }
    if (wasVisible) {
      this.log.debug('presence session found disconnected');
      this.report();
    }
  }

  private async resolveArtwork(
    snapshot: TrackSnapshot,
  ): Promise<{ url: string | null; cacheKey: string | null; failed: boolean }> {
    if (snapshot.artworkUrl) {
      return { url: snapshot.artworkUrl, cacheKey: null, failed: false };
    }
    if (!snapshot.artworkBytes || !this.artwork) {
      return { url: null, cacheKey: null, failed: false };
    }
    const cacheKey = deriveArtworkCacheKey(snapshot);
    try {
      const url = await this.artwork.publish(cacheKey, snapshot.artworkBytes);
      return { url, cacheKey, failed: false };
    } catch (error) {
      if (!(error instanceof UploadError)) {
        throw error;
      }
      this.log.warn('artwork upload failed; using asset key', {
        track: describeTrack(snapshot),
        message: error.message,
      });
      return { url: null, cacheKey: null, failed: true };
    }
  }

  /**
   * One connect per tick at most: up front when the session is known to be
   * down, otherwise after a NotConnectedError, followed by one retry.
   */
  private async callRemote(
    operation: 'update' | 'clear',
    call: () => Promise<void>,
  ): Promise<RemoteCallResult> {
    if (!this.state.published.connected) {
      return this.reconnectAndCall(operation, call);
    }
    try {
      await call();
      return 'ok';
    } catch (error) {
      if (!(error instanceof NotConnectedError)) {
        this.state.lastError = errorMessage(error);
        this.log.warn(`presence ${operation} failed`, { message: this.state.lastError });
        return 'failed';
      }
    }
    return this.reconnectAndCall(operation, call);
  }

  private async reconnectAndCall(
    operation: 'update' | 'clear',
    call: () => Promise<void>,
  ): Promise<RemoteCallResult> {
    try {
      await this.session.connect();
      await call();
      this.state.published.connected = true;
      this.log.info('presence session reconnected', { operation });
      return 'ok';
    } catch (error) {
      this.state.published.connected = false;
      this.resetPublished();
      this.state.lastError = errorMessage(error);
      this.log.warn(`presence ${operation} failed after reconnect`, {
        message: this.state.lastError,
      });
      return 'disconnected';
    }
  }

  private finish<T extends ReconcileResult>(result: T): T {
    this.report();
    return result;
  }

  private resetPublished(): void {
    const published: PublishedState = this.state.published;
    published.lastSnapshot = null;
    published.artworkUrl = null;
    published.artworkCacheKey = null;
    this.artworkPending = false;
  }

  private async disconnectQuietly(): Promise<void> {
    try {
      await this.session.disconnect();
    } catch (error) {
      this.log.warn('failed to disconnect presence session', { message: errorMessage(error) });
    }
  }

  private report(): void {
    this.status?.report(this.getStatus());
  }
}
