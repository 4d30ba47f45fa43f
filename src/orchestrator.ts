import pLimit from 'p-limit';
import { RunCancelledError, describeError } from './errors.js';
import type { TrackExtractor } from './extract.js';
import { createLogger } from './logger.js';
import { runTrack, trackLabel, type PipelineContext } from './pipeline.js';
import { DEFAULT_WORKERS } from './utils.js';
import type { RunEvent, RunStatistics, TrackTask } from './types.js';

const log = createLogger('run');

export interface ProcessOptions {
  /** Size of the worker pool. */
  readonly workers?: number;
  /** Aborting stops tracks that have not started; running tracks finish. */
  readonly signal?: AbortSignal;
  readonly extract: TrackExtractor;
  readonly pipeline: PipelineContext;
  /** Called from the aggregation loop after each event has been counted. */
  readonly onEvent?: (event: RunEvent, statistics: Readonly<RunStatistics>) => void | Promise<void>;
}

export const createStatistics = (total: number): RunStatistics => ({
  total,
  succeeded: 0,
  skipped: 0,
  failed: 0,
  cancelled: 0,
  failedTracks: [],
  cancelledTracks: [],
});

/**
 * Yields promise results in the order they settle rather than the order given.
 * A rejection is rethrown when it is reached.
 */
export async function* inCompletionOrder<T>(promises: readonly Promise<T>[]): AsyncGenerator<T, void, undefined> {
  const ready: Array<PromiseSettledResult<T>> = [];
  let wake: (() => void) | undefined;

  for (const promise of promises) {
    void promise.then(
      (value) => {
        ready.push({ status: 'fulfilled', value });
        wake?.();
      },
      (reason: unknown) => {
        ready.push({ status: 'rejected', reason });
        wake?.();
      },
    );
  }

  let delivered = 0;
  while (delivered < promises.length) {
    const next = ready.shift();
    if (next === undefined) {
      await new Promise<void>((resolve) => {
        wake = resolve;
      });
      continue;
    }
    delivered += 1;
    if (next.status === 'rejected') {
      throw next.reason;
    }
    yield next.value;
  }
}

const record = (statistics: RunStatistics, event: RunEvent): void => {
  switch (event.status) {
    case 'success':
      statistics.succeeded += 1;
      log.info(`[${statistics.succeeded}/${statistics.total}] Completed successfully: ${event.label}`);
      break;
    case 'skipped':
      statistics.succeeded += 1;
      statistics.skipped += 1;
      log.info(`[${statistics.succeeded}/${statistics.total}] Already present: ${event.label}`);
      break;
    case 'failed':
      statistics.failed += 1;
      statistics.failedTracks.push(event.label);
      log.warn(`[${event.ordinal}/${statistics.total}] Failed to process: ${event.label}`);
      break;
    case 'cancelled':
      statistics.cancelled += 1;
      statistics.cancelledTracks.push(event.label);
      log.debug(`[${event.ordinal}/${statistics.total}] Cancelled: ${event.label}`);
      break;
  }
};

/**
 * Extracts the tracks behind `url` and runs each through the track pipeline on a
 * pool of `workers` concurrent slots.
 *
 * Outcomes are folded into the statistics one at a time, in completion order, by the
 * loop below; nothing else writes to them. When `signal` aborts, tracks that have not
 * started are recorded as cancelled, running tracks are awaited, and the call then
 * rejects with a `RunCancelledError` carrying the final statistics.
 */
export const processUrl = async (url: string, options: ProcessOptions): Promise<RunStatistics> => {
  const workers = options.workers ?? DEFAULT_WORKERS;
  if (!Number.isInteger(workers) || workers < 1) {
    throw new RangeError(`Worker count must be a positive integer, got ${workers}`);
  }
  const { signal } = options;

  log.info(`Extracting metadata from: ${url}`);
  const tracks = await options.extract(url);
  const statistics = createStatistics(tracks.length);
  if (tracks.length === 0) {
    log.warn('Could not extract any tracks from URL');
    if (signal?.aborted) {
      throw new RunCancelledError(statistics);
    }
    return statistics;
  }

  log.info(`Processing ${tracks.length} track(s) with ${workers} parallel worker(s)`);

  const onAbort = (): void => {
    log.info('Interrupted: finishing current downloads, cancelling pending tracks...');
  };
  signal?.addEventListener('abort', onAbort, { once: true });

  const pipeline: PipelineContext = {
    ...options.pipeline,
    claimedPaths: options.pipeline.claimedPaths ?? new Set<string>(),
  };
  const limit = pLimit(workers);
  const execute = async (task: TrackTask): Promise<RunEvent> => {
    const label = trackLabel(task.track);
    if (signal?.aborted) {
      return { status: 'cancelled', ordinal: task.ordinal, label };
    }
    try {
      return await runTrack(task, pipeline);
    } catch (error) {
      return { status: 'failed', ordinal: task.ordinal, label, reason: `unexpected: ${describeError(error)}` };
    }
  };

  const submissions = tracks.map((track, index) => limit(() => execute({ ordinal: index + 1, track })));

  try {
    for await (const event of inCompletionOrder(submissions)) {
      record(statistics, event);
      if (options.onEvent) {
        try {
          await options.onEvent(event, statistics);
        } catch (error) {
          log.warn(`Outcome observer failed: ${describeError(error)}`);
        }
      }
    }
  } finally {
    signal?.removeEventListener('abort', onAbort);
  }

  if (signal?.aborted) {
    log.info(`Cancelled ${statistics.cancelled} pending track(s)`);
    throw new RunCancelledError(statistics);
  }
  return statistics;
};
