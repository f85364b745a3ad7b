/** Fields of the Web API objects this client reads. */

export interface SpotifyImage {
  url?: string;
  width?: number | null;
  height?: number | null;
}

export interface SpotifyTrackObject {
  id?: string | null;
  name?: string;
  uri?: string;
  duration_ms?: number;
  artists?: Array<{ name?: string }>;
  album?: { id?: string; name?: string; images?: SpotifyImage[] };
}

export interface SpotifyCurrentlyPlaying {
  is_playing?: boolean;
  progress_ms?: number | null;
  currently_playing_type?: string;
  item?: SpotifyTrackObject | null;
}

export interface SpotifyPlaybackState extends SpotifyCurrentlyPlaying {
  device?: { id?: string | null; name?: string; is_active?: boolean } | null;
}

export interface SpotifySearchResponse {
  tracks?: { items?: SpotifyTrackObject[] };
}
