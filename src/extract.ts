import ytdl from '@distube/ytdl-core';
import ytpl from 'ytpl';
import { describeError } from './errors.js';
import { createLogger } from './logger.js';
import { isYoutubePlaylistUrl } from './utils.js';
import type { TrackDescriptor } from './types.js';

const log = createLogger('extract');

export type TrackExtractor = (url: string) => Promise<TrackDescriptor[]>;

/**
 * Reads every item of a playlist. Items without a title (removed or private videos) are dropped.
 */
export const extractPlaylist = async (url: string): Promise<TrackDescriptor[]> => {
  const playlist = await ytpl(url, { limit: Infinity });
  return playlist.items
    .filter((item) => Boolean(item.title))
    .map((item) => ({
      title: item.title,
      uploader: item.author?.name ?? '',
      sourceId: item.id,
    }));
};

export const extractVideo = async (url: string): Promise<TrackDescriptor[]> => {
  const info = await ytdl.getBasicInfo(url);
  const details = info.videoDetails;
  return [
    {
      title: details.title,
      uploader: details.author?.name ?? details.ownerChannelName ?? '',
      sourceId: details.videoId,
    },
  ];
};

/**
 * Turns a YouTube video or playlist URL into track descriptors, in playlist order.
 * Any failure is logged and yields an empty list.
 */
export const extractTracks: TrackExtractor = async (url) => {
  try {
    const tracks = isYoutubePlaylistUrl(url) ? await extractPlaylist(url) : await extractVideo(url);
    log.info(`Found ${tracks.length} track(s) at ${url}`);
    return tracks;
  } catch (error) {
    log.error(`Error extracting YouTube metadata: ${describeError(error)}`);
    return [];
  }
};
