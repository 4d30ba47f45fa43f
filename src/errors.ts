import type { RunStatistics } from './types.js';

/**
 * Pipeline stages that can fail a track, in order. Tagging is best-effort and is not one of them.
 */
export type PipelineStage = 'match' | 'detail' | 'select' | 'transfer' | 'transcode';

/**
 * Raised inside the track pipeline when a stage cannot complete.
 * Converted into a `failed` outcome before it can reach the orchestrator.
 */
export class TrackStageError extends Error {
  readonly stage: PipelineStage;

  constructor(stage: PipelineStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TrackStageError';
    this.stage = stage;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /** `<stage>: <message>`, the form used in reports and logs. */
  toReason(): string {
    return `${this.stage}: ${this.message}`;
  }
}

/**
 * Raised once to the caller of `processUrl` after an interrupted run has drained.
 */
export class RunCancelledError extends Error {
  readonly statistics: RunStatistics;

  constructor(statistics: RunStatistics) {
    super(`Run cancelled with ${statistics.cancelled} track(s) not started`);
    this.name = 'RunCancelledError';
    this.statistics = statistics;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
