import path from 'node:path';
import fs from 'fs-extra';
import type { CatalogClient } from './catalog.js';
import { TrackStageError, describeError, type PipelineStage } from './errors.js';
import { createLogger } from './logger.js';
import { projectMetadata } from './metadata.js';
import { buildSearchQuery } from './normalize.js';
import { selectAudioUrl } from './select.js';
import type { TagWriteResult, TagWriter } from './tagger.js';
import {
  buildTrackFileName,
  isAlreadyDownloaded,
  resolveOutputPath,
  resolveTempPath,
} from './utils.js';
import type {
  ProgressCallback,
  ProgressReporter,
  TrackDescriptor,
  TrackOutcome,
  TrackTask,
} from './types.js';

const log = createLogger('pipeline');

/**
 * External collaborators a track needs. The CLI wires the real ones; tests pass fakes.
 */
export interface TrackServices {
  readonly catalog: CatalogClient;
  readonly transfer: (url: string, destination: string, onProgress?: ProgressCallback) => Promise<void>;
  readonly transcode: (source: string, destination: string) => Promise<void>;
  readonly embedTags: TagWriter;
}

export interface PipelineContext {
  readonly outputDir: string;
  readonly services: TrackServices;
  readonly progress?: ProgressReporter;
  /**
   * Output paths already taken by a track of the current run. A second track mapping to a
   * claimed path is skipped; the orchestrator supplies one set per run.
   */
  readonly claimedPaths?: Set<string>;
}

/**
 * Name under which a track appears in logs and reports.
 */
export const trackLabel = (track: TrackDescriptor): string => track.title.trim() || 'Unknown';

const runStage = async <T>(stage: PipelineStage, action: () => Promise<T>): Promise<T> => {
  try {
    return await action();
  } catch (error) {
    if (error instanceof TrackStageError) {
      throw error;
    }
    throw new TrackStageError(stage, describeError(error), { cause: error });
  }
};

/**
 * Downloads into the temp path and transcodes into the final path. The temp file is
 * removed on every exit, including a failed transcode.
 */
const fetchAudio = async (
  context: PipelineContext,
  label: string,
  audioUrl: string,
  tempPath: string,
  outputPath: string,
): Promise<void> => {
  const { services, progress } = context;
  const bar = progress?.start(label);
  try {
    await runStage('transfer', () => services.transfer(audioUrl, tempPath, bar?.update));
    log.debug(`Downloaded: ${path.basename(tempPath)}`);
    bar?.update(1);
    await runStage('transcode', () => services.transcode(tempPath, outputPath));
    log.debug(`Converted to MP3: ${path.basename(outputPath)}`);
  } finally {
    bar?.stop();
    await fs.remove(tempPath);
  }
};

/**
 * Runs one track through match, detail, select, transfer, transcode and tag.
 *
 * Never rejects: every stage error becomes a `failed` outcome carrying the stage name.
 * An existing or claimed output file short-circuits to `skipped`. A tagging failure is logged and
 * the track still succeeds, since the audio file is already in place.
 */
export const runTrack = async (task: TrackTask, context: PipelineContext): Promise<TrackOutcome> => {
  const { ordinal, track } = task;
  const label = trackLabel(track);
  const { catalog, embedTags } = context.services;
  const claimed = context.claimedPaths;
  let claimedPath: string | undefined;

  try {
    const query = buildSearchQuery(track.title);
    log.info(`Processing: ${query}`);

    const candidate = await runStage('match', () => catalog.search(query));
    if (!candidate) {
      throw new TrackStageError('match', `Not found in catalog: ${query}`);
    }

    const detail = await runStage('detail', () => catalog.fetchDetail(candidate.id));
    if (!detail) {
      throw new TrackStageError('detail', `Could not retrieve song details for ${candidate.id}`);
    }

    const audioUrl = selectAudioUrl(detail);
    if (!audioUrl) {
      throw new TrackStageError('select', 'No download URL available');
    }

    const baseName = buildTrackFileName(detail);
    const outputPath = resolveOutputPath(baseName, context.outputDir);
    if (claimed?.has(outputPath)) {
      log.info(`Already handled in this run: ${path.basename(outputPath)}`);
      return { status: 'skipped', ordinal, label, filePath: outputPath };
    }
    // Claimed before the first await so a concurrent duplicate sees it.
    claimed?.add(outputPath);
    claimedPath = outputPath;

    if (await isAlreadyDownloaded(outputPath)) {
      log.info(`Already exists: ${path.basename(outputPath)}`);
      return { status: 'skipped', ordinal, label, filePath: outputPath };
    }

    await fetchAudio(context, label, audioUrl, resolveTempPath(baseName, context.outputDir, ordinal), outputPath);

    const tagResult = await embedTags(outputPath, projectMetadata(detail)).catch(
      (error: unknown): TagWriteResult => ({ success: false, error: describeError(error) }),
    );
    if (tagResult.success) {
      log.debug(`Embedded metadata: ${path.basename(outputPath)}`);
    } else {
      log.warn(`Metadata embedding failed for ${path.basename(outputPath)}: ${tagResult.error ?? 'unknown error'}`);
    }

    log.info(`Successfully processed: ${path.basename(outputPath)}`);
    return { status: 'success', ordinal, label, filePath: outputPath };
  } catch (error) {
    const reason =
      error instanceof TrackStageError ? error.toReason() : `unexpected: ${describeError(error)}`;
    if (claimedPath !== undefined) {
      claimed?.delete(claimedPath);
    }
    log.warn(`Failed to process "${label}": ${reason}`);
    return { status: 'failed', ordinal, label, reason };
  }
};
