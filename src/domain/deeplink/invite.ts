/**
 * Listen-along invites travel as Discord join secrets and as OS deep links:
 *
 *   <scheme>://sync?sp=<spotifyId>&track=<title>&artist=<artist>&at=<startEpochSeconds>
 *
 * Discord caps secrets at 128 characters, so titles and artists are shortened
 * until the encoded URI fits.
 */
export interface ListenInvite {
  title: string;
  artist: string;
  /** Spotify track id. */
  trackId?: string;
  /** Unix time (seconds) at which the host's track started. */
  startedAt?: number;
}

export const MAX_INVITE_LENGTH = 128;

const TITLE_LIMIT = 50;
const ARTIST_LIMIT = 30;
const SPOTIFY_ID_PATTERN = /^[A-Za-z0-9]{22}$/;

export function encodeInvite(
  invite: ListenInvite,
  scheme: string,
  maxLength = MAX_INVITE_LENGTH,
): string {
  // Code points, so that shortening never splits a surrogate pair.
  const title = Array.from(invite.title).slice(0, TITLE_LIMIT);
  const artist = Array.from(invite.artist).slice(0, ARTIST_LIMIT);
  const render = () =>
    buildInviteUri(scheme, { ...invite, title: title.join(''), artist: artist.join('') });

  let uri = render();
  while (uri.length > maxLength && (title.length > 1 || artist.length > 0)) {
    if (title.length > 1 && title.length >= artist.length) {
      title.pop();
    } else {
      artist.pop();
    }
    uri = render();
  }
  return uri;
}

/**
 * Accepts `<scheme>://sync?...`, the bare `<scheme>://<title>` form and
 * Discord's own `discord-<clientId>://join/<secret>` launch URI.
 */
export function parseInvite(raw: string, scheme: string): ListenInvite | null {
  const value = raw.trim();
  if (!value) {
    return null;
  }

  const discordJoin = /^discord-\d+:\/\/join\/(.+)$/i.exec(value);
  if (discordJoin) {
    const secret = safeDecode(discordJoin[1]);
    return secret === null ? null : parseInvite(secret, scheme);
  }

  const prefix = `${scheme.toLowerCase()}://`;
  if (!value.toLowerCase().startsWith(prefix)) {
    return null;
  }
  const rest = value.slice(prefix.length);
  const queryIndex = rest.indexOf('?');

  if (queryIndex === -1) {
    const title = safeDecode(rest.replace(/\//g, ''))?.trim() ?? '';
    return title ? { title, artist: '' } : null;
  }

  const params = new URLSearchParams(rest.slice(queryIndex + 1));
  const title = params.get('track')?.trim() ?? '';
  const artist = params.get('artist')?.trim() ?? '';
  const spotifyId = params.get('sp')?.trim() ?? '';
  const trackId = SPOTIFY_ID_PATTERN.test(spotifyId) ? spotifyId : undefined;
  const startedAt = parseEpochSeconds(params.get('at'));

  if (!title && !trackId) {
    return null;
  }
  return {
    title,
    artist,
    ...(trackId ? { trackId } : {}),
    ...(startedAt !== undefined ? { startedAt } : {}),
  };
}

function buildInviteUri(scheme: string, invite: ListenInvite): string {
  const parts: string[] = [];
  if (invite.trackId) {
    parts.push(`sp=${encodeURIComponent(invite.trackId)}`);
  }
  parts.push(`track=${encodeURIComponent(invite.title)}`);
  if (invite.artist) {
    parts.push(`artist=${encodeURIComponent(invite.artist)}`);
  }
  if (invite.startedAt !== undefined) {
    parts.push(`at=${Math.floor(invite.startedAt)}`);
  }
  return `${scheme}://sync?${parts.join('&')}`;
}

function parseEpochSeconds(raw: string | null): number | undefined {
  if (!raw || !/^\d{1,12}$/.test(raw)) {
    return undefined;
  }
  return Number(raw);
}

function safeDecode(value: string): string | null {
  try {
    return decodeURIComponent(value);
  } catch {
    return null;
  }
}
