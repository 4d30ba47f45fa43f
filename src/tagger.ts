import type { AxiosInstance } from 'axios';
import NodeID3 from 'node-id3';
import { describeError } from './errors.js';
import { createLogger } from './logger.js';
import { formatDuration } from './metadata.js';
import type { TagSet } from './types.js';

const log = createLogger('tagger');

/** Embedded front cover. */
export interface CoverArt {
  readonly data: Buffer;
  readonly mimeType: string;
}

/** Result of a tag write. Failures are reported, never thrown. */
export interface TagWriteResult {
  readonly success: boolean;
  readonly error: string | null;
}

export type TagWriter = (filePath: string, tags: TagSet) => Promise<TagWriteResult>;

/**
 * Maps a tag set onto ID3v2 frames. Copyright, source URL and duration go into
 * described user text frames (TXXX) so each keeps its own label.
 */
export const buildId3Tags = (tags: TagSet, cover: CoverArt | null = null): NodeID3.Tags => {
  const id3: NodeID3.Tags = {
    title: tags.title,
    artist: tags.artist,
    performerInfo: tags.albumArtist,
  };

  if (tags.album) {
    id3.album = tags.album;
  }
  if (tags.year) {
    id3.year = tags.year;
  }
  if (tags.language) {
    id3.genre = tags.language;
  }
  if (tags.composers) {
    id3.composer = tags.composers;
  }
  if (tags.label) {
    id3.publisher = tags.label;
  }

  const described: Array<{ description: string; value: string }> = [];
  if (tags.copyright) {
    described.push({ description: 'Copyright', value: tags.copyright });
  }
  if (tags.url) {
    described.push({ description: 'URL', value: tags.url });
  }
  if (tags.durationSeconds) {
    described.push({ description: 'Duration', value: formatDuration(tags.durationSeconds) });
  }
  if (described.length > 0) {
    id3.userDefinedText = described;
  }

  if (cover) {
    id3.image = {
      mime: cover.mimeType,
      type: { id: 3, name: 'front cover' },
      description: 'Cover',
      imageBuffer: cover.data,
    };
  }

  return id3;
};

/**
 * Writes frames into the file's ID3 tag, creating the tag when the file has none.
 * Frames not named in `tags` are preserved.
 */
export const writeTags = (filePath: string, tags: NodeID3.Tags): TagWriteResult => {
  try {
    const result = NodeID3.update(tags, filePath);
    if (result instanceof Error) {
      return { success: false, error: `Failed to write ID3 tags: ${result.message}` };
    }
    return { success: true, error: null };
  } catch (error: unknown) {
    return { success: false, error: `Unexpected error writing tags: ${describeError(error)}` };
  }
};

/**
 * Downloads cover art through the shared session. Any failure only drops the image.
 */
export const fetchCoverArt = async (http: AxiosInstance, url: string): Promise<CoverArt | null> => {
  try {
    const response = await http.get<ArrayBuffer>(url, { responseType: 'arraybuffer' });
    const contentType = response.headers['content-type'];
    const mimeType =
      typeof contentType === 'string' && contentType.startsWith('image/')
        ? contentType.split(';')[0] ?? 'image/jpeg'
        : 'image/jpeg';
    return { data: Buffer.from(response.data), mimeType };
  } catch (error) {
    log.debug(`Failed to fetch artwork ${url}: ${describeError(error)}`);
    return null;
  }
};

export const createTagWriter =
  (http: AxiosInstance): TagWriter =>
  async (filePath, tags) => {
    const cover = tags.coverImageUrl ? await fetchCoverArt(http, tags.coverImageUrl) : null;
    return writeTags(filePath, buildId3Tags(tags, cover));
  };
