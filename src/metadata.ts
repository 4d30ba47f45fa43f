import { selectCoverUrl } from './select.js';
import type { ArtistCredit, DetailRecord, TagSet } from './types.js';

const ALBUM_ARTIST_ROLES: ReadonlySet<string> = new Set(['music', 'composer']);
const COMPOSER_ROLE = 'lyricist';
export const UNKNOWN_ARTIST = 'Unknown';

const joinNames = (credits: readonly ArtistCredit[]): string =>
  credits.map((credit) => credit.name).join(', ');

/**
 * Comma-joined primary artists in catalog order, or "Unknown".
 */
export const primaryArtistNames = (detail: Pick<DetailRecord, 'artists'>): string =>
  joinNames(detail.artists.primary) || UNKNOWN_ARTIST;

/**
 * Capitalizes the first letter of every word and lower-cases the rest ("hindi" -> "Hindi").
 */
export const toTitleCase = (value: string): string =>
  value
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, boundary: string, letter: string) => `${boundary}${letter.toUpperCase()}`);

/**
 * `m:ss` with unpadded minutes, e.g. 245 -> "4:05".
 */
export const formatDuration = (totalSeconds: number): string => {
  const seconds = Math.max(0, Math.trunc(totalSeconds));
  const minutes = Math.floor(seconds / 60);
  return `${minutes}:${String(seconds % 60).padStart(2, '0')}`;
};

export const albumName = (album: DetailRecord['album']): string | null => {
  if (album === null || album === undefined) {
    return null;
  }
  if (typeof album === 'string') {
    return album;
  }
  return album.name ?? null;
};

/**
 * Flattens a catalog detail record into the tags written to the output file.
 */
export const projectMetadata = (detail: DetailRecord): TagSet => {
  const artist = primaryArtistNames(detail);
  const albumArtist =
    joinNames(detail.artists.all.filter((credit) => ALBUM_ARTIST_ROLES.has(credit.role ?? ''))) || artist;
  const composers = joinNames(detail.artists.all.filter((credit) => credit.role === COMPOSER_ROLE));

  return {
    title: detail.name,
    artist,
    album: albumName(detail.album),
    year: detail.year,
    albumArtist,
    language: detail.language ? toTitleCase(detail.language) : null,
    ...(composers ? { composers } : {}),
    label: detail.label ?? null,
    copyright: detail.copyright ?? null,
    url: detail.url ?? null,
    durationSeconds: detail.duration ?? null,
    coverImageUrl: selectCoverUrl(detail),
  };
};
