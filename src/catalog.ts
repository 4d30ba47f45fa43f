import axios, { type AxiosInstance } from 'axios';
import { describeError } from './errors.js';
import { createLogger } from './logger.js';
import { DetailResponseSchema, SearchResponseSchema } from './schemas.js';
import type { DetailRecord, SearchCandidate } from './types.js';

const log = createLogger('catalog');

const SESSION_HEADERS: Record<string, string> = {
  'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36',
};

const JSON_HEADERS: Record<string, string> = { Accept: 'application/json' };

/**
 * Lookups the track pipeline needs from the catalog. `null` is a normal "no match".
 */
export interface CatalogClient {
  readonly search: (query: string) => Promise<SearchCandidate | null>;
  readonly fetchDetail: (id: string) => Promise<DetailRecord | null>;
}

/**
 * Creates the HTTP session shared by catalog lookups, audio transfers and cover downloads.
 * Relative paths resolve against `apiBase`; absolute asset URLs bypass it.
 */
export const createSession = (apiBase: string): AxiosInstance =>
  axios.create({
    baseURL: apiBase,
    headers: SESSION_HEADERS,
  });

const logRequestError = (what: string, error: unknown): void => {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    log.error(`Network error while ${what}: ${status ? `HTTP ${status}` : error.message}`);
    return;
  }
  log.error(`Unexpected error while ${what}: ${describeError(error)}`);
};

export const createCatalogClient = (http: AxiosInstance): CatalogClient => {
  /**
   * Takes the first "songs" result, falling back to the first "top query" result.
   */
  const search = async (query: string): Promise<SearchCandidate | null> => {
    let body: unknown;
    try {
      const response = await http.get<unknown>('/search', { params: { query }, headers: JSON_HEADERS });
      body = response.data;
    } catch (error) {
      logRequestError('searching', error);
      return null;
    }

    const parsed = SearchResponseSchema.safeParse(body);
    if (!parsed.success) {
      log.error(`Malformed search response for "${query}": ${parsed.error.message}`);
      return null;
    }
    if (!parsed.data.success) {
      log.warn(`Search failed for query: ${query}`);
      return null;
    }

    const songs = parsed.data.data?.songs?.results ?? [];
    const topQuery = parsed.data.data?.topQuery?.results ?? [];
    const entry = songs[0] ?? topQuery[0];
    if (!entry?.id) {
      log.warn(`No results found for query: ${query}`);
      return null;
    }
    return { id: entry.id };
  };

  const fetchDetail = async (id: string): Promise<DetailRecord | null> => {
    let body: unknown;
    try {
      const response = await http.get<unknown>(`/songs/${encodeURIComponent(id)}`, { headers: JSON_HEADERS });
      body = response.data;
    } catch (error) {
      logRequestError('fetching song details', error);
      return null;
    }

    const parsed = DetailResponseSchema.safeParse(body);
    if (!parsed.success) {
      log.error(`Malformed song detail response for ${id}: ${parsed.error.message}`);
      return null;
    }
    if (!parsed.data.success) {
      log.error(`Failed to retrieve song details for ID: ${id}`);
      return null;
    }

    const { data } = parsed.data;
    if (Array.isArray(data)) {
      return data[0] ?? null;
    }
    return data ?? null;
  };

  return { search, fetchDetail };
};
