import type { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import type { AxiosInstance } from 'axios';
import fs from 'fs-extra';
import ffmpeg from 'fluent-ffmpeg';
import { DEFAULT_BITRATE_KBPS } from './utils.js';
import type { ProgressCallback } from './types.js';

if (process.env.FFMPEG_PATH) {
  ffmpeg.setFfmpegPath(process.env.FFMPEG_PATH);
}

/**
 * Streams a remote asset to `destination` through the shared session.
 * `onProgress` receives the received fraction whenever the server announced a length.
 */
export const transferToFile = async (
  http: AxiosInstance,
  url: string,
  destination: string,
  onProgress?: ProgressCallback,
): Promise<void> => {
  const response = await http.get<Readable>(url, { responseType: 'stream' });
  const total = Number(response.headers['content-length'] ?? 0);
  let received = 0;

  response.data.on('data', (chunk: Buffer) => {
    received += chunk.length;
    if (total > 0) {
      onProgress?.(Math.min(1, received / total));
    }
  });

  await pipeline(response.data, fs.createWriteStream(destination));
};

/**
 * Re-encodes `source` to a constant-bitrate MP3 at `destination`.
 * A partially written destination is removed when ffmpeg fails.
 */
export const transcodeToMp3 = async (
  source: string,
  destination: string,
  bitrateKbps: number = DEFAULT_BITRATE_KBPS,
): Promise<void> => {
  try {
    await new Promise<void>((resolve, reject) => {
      ffmpeg(source)
        .noVideo()
        .audioCodec('libmp3lame')
        .audioBitrate(bitrateKbps)
        .format('mp3')
        .on('error', (error: Error) => {
          reject(error);
        })
        .on('end', () => {
          resolve();
        })
        .save(destination);
    });
  } catch (error) {
    await fs.remove(destination);
    throw error;
  }
};
