export type { AssetLink, ArtistCredit, Album, DetailRecord } from './schemas.js';

/**
 * A source video as read from YouTube, before any catalog matching.
 */
export interface TrackDescriptor {
  readonly title: string;
  readonly uploader: string;
  readonly sourceId: string;
}

/**
 * One unit of orchestrator work: a descriptor plus its 1-based position in the source list.
 */
export interface TrackTask {
  readonly ordinal: number;
  readonly track: TrackDescriptor;
}

export interface SearchCandidate {
  readonly id: string;
}

/**
 * Flat tag set written into the output file.
 */
export interface TagSet {
  readonly title: string;
  readonly artist: string;
  readonly album: string | null;
  readonly year: string | null;
  readonly albumArtist: string;
  readonly language: string | null;
  /** Absent rather than empty so the frame is skipped entirely. */
  readonly composers?: string;
  readonly label: string | null;
  readonly copyright: string | null;
  readonly url: string | null;
  readonly durationSeconds: number | null;
  readonly coverImageUrl: string | null;
}

interface OutcomeBase {
  readonly ordinal: number;
  readonly label: string;
}

export type TrackOutcome =
  | (OutcomeBase & { readonly status: 'success'; readonly filePath: string })
  | (OutcomeBase & { readonly status: 'skipped'; readonly filePath: string })
  | (OutcomeBase & { readonly status: 'failed'; readonly reason: string });

/**
 * What the orchestrator observes per submission: a pipeline outcome, or a
 * cancellation for work that never started.
 */
export type RunEvent = TrackOutcome | (OutcomeBase & { readonly status: 'cancelled' });

/**
 * Aggregate for one run. `succeeded` includes tracks skipped because their file already existed.
 */
export interface RunStatistics {
  total: number;
  succeeded: number;
  skipped: number;
  failed: number;
  cancelled: number;
  readonly failedTracks: string[];
  readonly cancelledTracks: string[];
}

export type ProgressCallback = (fraction: number) => void;

export interface ProgressHandle {
  readonly update: (fraction: number) => void;
  readonly stop: () => void;
}

/**
 * Creates a per-track progress display for the transfer stage.
 */
export interface ProgressReporter {
  readonly start: (label: string) => ProgressHandle;
}
