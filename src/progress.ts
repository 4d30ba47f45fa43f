import cliProgress from 'cli-progress';
import type { LogSink } from './logger.js';
import { truncateTitle } from './utils.js';
import type { ProgressHandle, ProgressReporter } from './types.js';

export const createMultiBar = (): cliProgress.MultiBar =>
  new cliProgress.MultiBar(
    {
      clearOnComplete: false,
      hideCursor: true,
      format: '{bar} {percentage}% | {title}',
    },
    cliProgress.Presets.shades_grey,
  );

/**
 * One transfer bar per running track, removed once the track leaves the transfer stage.
 */
export const createBarReporter = (bars: cliProgress.MultiBar): ProgressReporter => ({
  start: (label: string): ProgressHandle => {
    const title = truncateTitle(label);
    const bar = bars.create(100, 0, { title });
    return {
      update: (fraction: number) => {
        const clamped = Math.min(100, Math.max(0, Math.floor(fraction * 100)));
        bar.update(clamped, { title });
      },
      stop: () => {
        bar.stop();
        bars.remove(bar);
      },
    };
  },
});

/**
 * Prints log lines above the bars instead of through them.
 */
export const barLogSink =
  (bars: cliProgress.MultiBar): LogSink =>
  (_level, line) => {
    bars.log(`${line}\n`);
  };
