/**
 * What an OS media-session reader reports, before it becomes a TrackSnapshot.
 */
export interface MediaSessionInfo {
  playerName?: string;
  title: string;
  artist: string;
  album?: string;
  isPlaying: boolean;
  positionMs?: number;
  durationMs?: number;
  /** `http(s)://` or `file://` cover reference. */
  artUrl?: string;
  /** Inline cover image, base64 encoded. */
  artworkBase64?: string;
  artworkMimeType?: string;
  /** Spotify track id when the player exposes one. */
  spotifyTrackId?: string;
  /** Location of the playing media; local players report `file://` paths. */
  trackUrl?: string;
}

export interface MediaSessionReader {
  readonly name: string;
  read(): Promise<MediaSessionInfo | null>;
}
