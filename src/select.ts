import type { AssetLink, DetailRecord } from './types.js';

export const PREFERRED_AUDIO_QUALITY = '320kbps';
export const PREFERRED_IMAGE_QUALITY = '500x500';

/**
 * Returns the URL of the first link tagged with `preferred`; otherwise the URL of the last
 * link, which the catalog uses for its highest available variant. The scan is authoritative
 * and the positional fallback only applies when no link carries the preferred tag.
 */
export const pickLink = (links: readonly AssetLink[], preferred: string): string | null => {
  if (links.length === 0) {
    return null;
  }
  const match = links.find((link) => link.quality === preferred);
  const chosen = match ?? links[links.length - 1];
  return chosen?.url ? chosen.url : null;
};

/**
 * Picks the audio asset to download. `null` means the track cannot be fetched.
 */
export const selectAudioUrl = (detail: Pick<DetailRecord, 'downloadUrl'>): string | null =>
  pickLink(detail.downloadUrl, PREFERRED_AUDIO_QUALITY);

/**
 * Picks the cover image. `null` only means the file is tagged without artwork.
 */
export const selectCoverUrl = (detail: Pick<DetailRecord, 'image'>): string | null =>
  pickLink(detail.image, PREFERRED_IMAGE_QUALITY);
