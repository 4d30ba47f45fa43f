import os from 'node:os';
import path from 'node:path';
import axios, { AxiosError, type AxiosInstance, type InternalAxiosRequestConfig } from 'axios';
import fs from 'fs-extra';
import { vi } from 'vitest';
import type { CatalogClient } from '../../src/catalog.js';
import type { TrackServices } from '../../src/pipeline.js';
import type { TagWriteResult } from '../../src/tagger.js';
import type { DetailRecord, ProgressCallback, TagSet, TrackDescriptor } from '../../src/types.js';

export const createTempDir = async (prefix = 'tubesaavn-test-'): Promise<string> =>
  fs.mkdtemp(path.join(os.tmpdir(), prefix));

export const removeTempDir = async (dir: string): Promise<void> => {
  await fs.remove(dir);
};

/**
 * Detail record with sensible defaults; `overrides` replace whole fields.
 */
export const makeDetail = (overrides: Partial<DetailRecord> = {}): DetailRecord => ({
  id: 'song-1',
  name: 'Test Song',
  year: '2021',
  language: 'hindi',
  label: 'Test Label',
  copyright: '(C) 2021 Test Label',
  url: 'https://catalog.test/song/test-song',
  duration: 245,
  album: { name: 'Test Album' },
  artists: {
    primary: [{ name: 'Singer One', role: 'singer' }],
    all: [
      { name: 'Singer One', role: 'singer' },
      { name: 'Composer One', role: 'music' },
      { name: 'Writer One', role: 'lyricist' },
    ],
  },
  downloadUrl: [
    { quality: '96kbps', url: 'https://cdn.test/song-1_96.mp4' },
    { quality: '160kbps', url: 'https://cdn.test/song-1_160.mp4' },
    { quality: '320kbps', url: 'https://cdn.test/song-1_320.mp4' },
  ],
  image: [
    { quality: '50x50', url: 'https://cdn.test/song-1-50x50.jpg' },
    { quality: '150x150', url: 'https://cdn.test/song-1-150x150.jpg' },
    { quality: '500x500', url: 'https://cdn.test/song-1-500x500.jpg' },
  ],
  ...overrides,
});

export const makeTrack = (title: string, index = 1): TrackDescriptor => ({
  title,
  uploader: `Uploader ${index}`,
  sourceId: `video-${index}`,
});

/**
 * In-memory catalog keyed by search query. Queries missing from `songs` find nothing.
 */
export const createFakeCatalog = (songs: Record<string, DetailRecord>) => {
  const byId = new Map(Object.values(songs).map((detail) => [detail.id, detail]));
  const search = vi.fn(async (query: string) => {
    const detail = songs[query];
    return detail ? { id: detail.id } : null;
  });
  const fetchDetail = vi.fn(async (id: string) => byId.get(id) ?? null);
  const catalog: CatalogClient = { search, fetchDetail };
  return { catalog, search, fetchDetail };
};

/**
 * Services that never touch the network or ffmpeg: transfer writes a small payload,
 * transcode copies it, tagging always succeeds.
 */
export const createFakeServices = (catalog: CatalogClient) => {
  const transfer = vi.fn(async (url: string, destination: string, _onProgress?: ProgressCallback) => {
    await fs.outputFile(destination, `audio from ${url}`);
  });
  const transcode = vi.fn(async (source: string, destination: string) => {
    await fs.copy(source, destination);
  });
  const embedTags = vi.fn(
    async (_filePath: string, _tags: TagSet): Promise<TagWriteResult> => ({ success: true, error: null }),
  );
  const services: TrackServices = { catalog, transfer, transcode, embedTags };
  return { services, transfer, transcode, embedTags };
};

export interface StubResponse {
  readonly status?: number;
  readonly data: unknown;
  readonly headers?: Record<string, string>;
}

/**
 * Axios instance whose adapter answers in-process. `respond` returning an Error
 * simulates a transport failure; a status of 400 or more is rejected like a real server error.
 */
export const createStubSession = (
  respond: (config: InternalAxiosRequestConfig) => StubResponse | Error,
): AxiosInstance =>
  axios.create({
    baseURL: 'https://catalog.test/api',
    adapter: async (config) => {
      const answer = respond(config);
      if (answer instanceof Error) {
        throw new AxiosError(answer.message, AxiosError.ERR_NETWORK, config);
      }
      const status = answer.status ?? 200;
      const response = {
        data: answer.data,
        status,
        statusText: status < 400 ? 'OK' : 'Error',
        headers: answer.headers ?? {},
        config,
      };
      if (status >= 400) {
        throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_RESPONSE, config, null, response);
      }
      return response;
    },
  });
