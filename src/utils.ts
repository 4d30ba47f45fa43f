import path from 'node:path';
import { promises as dns } from 'node:dns';
import fs from 'fs-extra';
import { primaryArtistNames } from './metadata.js';
import type { DetailRecord, RunStatistics } from './types.js';

export const DEFAULT_WORKERS = 3;
export const DEFAULT_OUTPUT_DIR = 'downloads';
export const DEFAULT_BITRATE_KBPS = 320;
export const DEFAULT_API_BASE = 'https://saavn.sumit.co/api';
export const ERRORS_LOG_NAME = 'errors.log';
export const DOWNLOADED_LOG_NAME = 'downloaded.log';

const MAX_FILE_NAME_LENGTH = 200;
const RESERVED_CHARACTERS = /[<>:"/\\|?*]/g;

/**
 * Ensures the output directory exists so audio files have a target path.
 */
export const ensureOutputDir = async (outputDir: string): Promise<void> => {
  await fs.ensureDir(outputDir);
};

/**
 * Strips filesystem-reserved characters, then truncates to 200 characters and trims.
 */
export const sanitizeFileName = (value: string): string =>
  Array.from(value.replace(RESERVED_CHARACTERS, ''))
    .slice(0, MAX_FILE_NAME_LENGTH)
    .join('')
    .trim();

/**
 * `"{title} - {artists}"`, sanitized. Tracks that collapse to the same name share one file.
 */
export const buildTrackFileName = (detail: Pick<DetailRecord, 'name' | 'artists'>): string =>
  sanitizeFileName(`${detail.name} - ${primaryArtistNames(detail)}`);

/**
 * Returns an absolute mp3 file path for a given base name.
 */
export const resolveOutputPath = (baseName: string, outputDir: string): string =>
  path.resolve(outputDir, `${baseName}.mp3`);

/**
 * Download target used before transcoding. Unique per track ordinal, never the final path.
 */
export const resolveTempPath = (baseName: string, outputDir: string, ordinal: number): string =>
  path.resolve(outputDir, `${baseName}.${ordinal}.temp`);

/**
 * Checks whether the given mp3 file has already been produced.
 */
export const isAlreadyDownloaded = async (filePath: string): Promise<boolean> =>
  fs.pathExists(filePath);

/**
 * Appends error information to a persistent log so the user can review failures.
 */
export const logFailure = async (outputDir: string, message: string): Promise<void> => {
  const timestamp = new Date().toISOString();
  await fs.appendFile(path.resolve(outputDir, ERRORS_LOG_NAME), `[${timestamp}] ${message}\n`);
};

/**
 * Appends successfully written file names to a persistent log for tracking.
 */
export const logSuccess = async (outputDir: string, filePath: string): Promise<void> => {
  const timestamp = new Date().toISOString();
  await fs.appendFile(
    path.resolve(outputDir, DOWNLOADED_LOG_NAME),
    `[${timestamp}] ${path.basename(filePath)}\n`,
  );
};

/**
 * Logs a run summary block with the source URL and final counts.
 */
export const logRunSummary = async (
  outputDir: string,
  sourceUrl: string,
  statistics: RunStatistics,
): Promise<void> => {
  const timestamp = new Date().toISOString();
  await fs.appendFile(
    path.resolve(outputDir, DOWNLOADED_LOG_NAME),
    `\n[${timestamp}] ========================================\n` +
      `[${timestamp}] RUN SUMMARY: ${sourceUrl}\n` +
      `[${timestamp}] COMPLETED: ${statistics.succeeded}/${statistics.total} ` +
      `(failed ${statistics.failed}, cancelled ${statistics.cancelled})\n` +
      `[${timestamp}] ========================================\n\n`,
  );
};

/**
 * Detects whether a given string looks like a YouTube URL.
 */
export const isYoutubeUrl = (input: string): boolean => {
  try {
    const parsed = new URL(input);
    return /(^|\.)youtube\.com$/.test(parsed.hostname) || parsed.hostname === 'youtu.be';
  } catch {
    return false;
  }
};

/**
 * Detects whether a given string refers to a YouTube playlist (via list parameter or playlist path).
 */
export const isYoutubePlaylistUrl = (input: string): boolean => {
  if (!isYoutubeUrl(input)) {
    return false;
  }
  const parsed = new URL(input);
  return parsed.searchParams.has('list') || parsed.pathname.includes('/playlist');
};

/**
 * Quickly probes DNS for the catalog host to surface connectivity issues before the run.
 */
export const verifyInternet = async (apiBase: string): Promise<void> => {
  await dns.lookup(new URL(apiBase).hostname);
};

/**
 * Truncates long titles so progress bars remain readable in narrower terminals.
 */
export const truncateTitle = (value: string, maxLength = 42): string =>
  value.length <= maxLength ? value : `${value.slice(0, maxLength - 3)}...`;
