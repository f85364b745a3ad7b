export interface PlayRequest {
  trackId?: string;
  title: string;
  artist: string;
  positionMs: number;
}

export type PlayFailureReason =
  | 'no_match'
  | 'no_active_device'
  | 'premium_required'
  | 'server_error'
  | 'unauthorized'
  | 'playback_error';

export type PlayOutcome =
  | { ok: true; trackName: string }
  | { ok: false; reason: PlayFailureReason };

/**
 * Remote control of a streaming service used to start a listen-along track.
 */
export interface StreamingPlaybackPort {
  hasActiveSession(): Promise<boolean>;
  play(request: PlayRequest): Promise<PlayOutcome>;
}

export interface UrlOpenerPort {
  open(url: string): Promise<void>;
}
