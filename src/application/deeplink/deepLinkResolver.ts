import { parseInvite, type ListenInvite } from '@/domain/deeplink/invite';
import { errorMessage } from '@/domain/errors';
import type { ClockPort } from '@/ports/ClockPort';
import type {
  PlayFailureReason,
  PlayOutcome,
  StreamingPlaybackPort,
  UrlOpenerPort,
} from '@/ports/PlaybackPort';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

export type SearchReason = 'no_playback' | 'no_active_session' | PlayFailureReason;

export type DeepLinkAction =
  | { kind: 'play'; invite: ListenInvite; trackName: string; positionMs: number }
  | { kind: 'search'; invite: ListenInvite; url: string; reason: SearchReason }
  | { kind: 'invalid' };

export interface DeepLinkResolverOptions {
  scheme: string;
  searchUrlTemplate: string;
  matchByTitle: boolean;
  latencyOffsetMs: number;
  opener: UrlOpenerPort;
  clock: ClockPort;
  /** Null when no streaming account is configured. */
  playback?: StreamingPlaybackPort | null;
  log?: ComponentLogger;
}

/**
 * Fills `{query}` in the search template with "title artist".
 */
export function buildSearchUrl(template: string, invite: Pick<ListenInvite, 'title' | 'artist'>): string {
  const query = [invite.title, invite.artist].filter((part) => part.length > 0).join(' ');
  return template.replace('{query}', encodeURIComponent(query));
}

/**
 * Turns a received invite into local playback: one play attempt on the
 * streaming service, otherwise one web search.
 */
export class DeepLinkResolver {
  private readonly log: ComponentLogger;
  private readonly playback: StreamingPlaybackPort | null;

  constructor(private readonly options: DeepLinkResolverOptions) {
    this.log = options.log ?? createLogger('DeepLink', 'Resolver');
    this.playback = options.playback ?? null;
  }

  public async resolve(payload: string): Promise<DeepLinkAction> {
    const invite = parseInvite(payload, this.options.scheme);
    if (!invite) {
      this.log.warn('invalid listen-along invite', { payload: payload.slice(0, 200) });
      return { kind: 'invalid' };
    }

    const reason = await this.tryPlay(invite);
    if (reason.kind === 'played') {
      return {
        kind: 'play',
        invite,
        trackName: reason.trackName,
        positionMs: reason.positionMs,
      };
    }

    const url = buildSearchUrl(this.options.searchUrlTemplate, invite);
    this.log.info('opening web search for invite', { reason: reason.reason, url });
    await this.options.opener.open(url);
    return { kind: 'search', invite, url, reason: reason.reason };
  }

  public positionFor(invite: ListenInvite): number {
    if (invite.startedAt === undefined) {
      return 0;
    }
    const elapsed = this.options.clock.now() - invite.startedAt * 1000;
    return Math.max(0, elapsed + this.options.latencyOffsetMs);
  }

  private async tryPlay(
    invite: ListenInvite,
  ): Promise<
    | { kind: 'played'; trackName: string; positionMs: number }
    | { kind: 'skipped'; reason: SearchReason }
  > {
    const playback = this.playback;
    const playable = Boolean(invite.trackId) || (this.options.matchByTitle && invite.title.length > 0);
    if (!playback || !playable) {
      return { kind: 'skipped', reason: 'no_playback' };
    }

    let active = false;
    try {
      active = await playback.hasActiveSession();
    } catch (error) {
      this.log.warn('streaming session check failed', { message: errorMessage(error) });
    }
    if (!active) {
      return { kind: 'skipped', reason: 'no_active_session' };
    }

    const positionMs = this.positionFor(invite);
    let outcome: PlayOutcome;
    try {
      outcome = await playback.play({
        trackId: invite.trackId,
        title: invite.title,
        artist: invite.artist,
        positionMs,
      });
    } catch (error) {
      this.log.warn('listen-along playback threw', { message: errorMessage(error) });
      outcome = { ok: false, reason: 'playback_error' };
    }
    if (!outcome.ok) {
      this.log.warn('listen-along playback failed', { reason: outcome.reason });
      return { kind: 'skipped', reason: outcome.reason };
    }
    this.log.info('listen-along playback started', { track: outcome.trackName, positionMs });
    return { kind: 'played', trackName: outcome.trackName, positionMs };
  }
}
