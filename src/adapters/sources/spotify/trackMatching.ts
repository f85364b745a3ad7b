/**
 * Title matching between an invite and Spotify search results. Edition and
 * featuring noise ("(Remastered 2011)", "- Radio Edit", "[feat. X]") is
 * stripped before comparing.
 */

const SUFFIX_NOISE = new RegExp(
  String.raw`\s*[-–—]\s*(single|deluxe|remaster(ed)?(\s*\d{4})?|bonus\s*track|` +
    String.raw`expanded|anniversary|live|remix|version|edition|` +
    String.raw`explicit|clean|mono|stereo|radio\s*edit|acoustic|` +
    String.raw`original\s*mix|extended|instrumental|interlude|skit).*$`,
  'i',
);

const BRACKET_NOISE = new RegExp(
  String.raw`\s*[([](?:remaster(ed)?(\s*\d{4})?|deluxe(\s*edition)?|` +
    String.raw`single|bonus|expanded|anniversary(\s*edition)?|` +
    String.raw`live|remix|feat\.?[^)\]]*|ft\.?[^)\]]*|with\s+[^)\]]*|` +
    String.raw`version|edition|explicit|clean|mono|stereo|` +
    String.raw`radio\s*edit|acoustic|original\s*mix|extended|` +
    String.raw`instrumental|from\s+[^)\]]*|prod\.?\s*[^)\]]*)[^)\]]*[)\]]`,
  'gi',
);

export interface MatchCandidate {
  name: string;
  artists: readonly string[];
}

export function normalizeTitle(value: string): string {
  return value.replace(BRACKET_NOISE, '').replace(SUFFIX_NOISE, '').trim().toLowerCase();
}

/**
 * First candidate whose title contains (or is contained in) the wanted title
 * and whose artists overlap the wanted artist the same way.
 */
export function pickBestMatch<T extends MatchCandidate>(
  candidates: readonly T[],
  title: string,
  artist: string,
): T | null {
  const wantedTitle = normalizeTitle(title);
  const wantedArtist = artist.trim().toLowerCase();
  if (!wantedTitle) {
    return null;
  }
  for (const candidate of candidates) {
    const name = normalizeTitle(candidate.name);
    if (!name) {
      continue;
    }
    const artists = candidate.artists.join(' ').toLowerCase();
    const titleOk = name.includes(wantedTitle) || wantedTitle.includes(name);
    const artistOk =
      !wantedArtist ||
      (artists.length > 0 && (artists.includes(wantedArtist) || wantedArtist.includes(artists)));
    if (titleOk && artistOk) {
      return candidate;
    }
  }
  return null;
}

/**
 * Last resort for the plain search: accept the top hit when one title is a
 * prefix of the other.
 */
export function acceptTopByPrefix<T extends MatchCandidate>(
  candidates: readonly T[],
  title: string,
): T | null {
  const top = candidates[0];
  const wanted = normalizeTitle(title);
  if (!top || !wanted) {
    return null;
  }
  const name = normalizeTitle(top.name);
  return name && (wanted.startsWith(name) || name.startsWith(wanted)) ? top : null;
}

export function structuredQuery(title: string, artist: string): string {
  return artist ? `track:${title} artist:${artist}` : `track:${title}`;
}

export function plainQuery(title: string, artist: string): string {
  return `${normalizeTitle(title)} ${artist ? normalizeTitle(artist) : ''}`.trim();
}
