import type { RunStatistics } from './types.js';

const RULE = '='.repeat(60);

export const NOTHING_TO_DO = 'Nothing to do: no tracks were found at the source URL.';

/**
 * Formats the end-of-run summary as printable lines.
 */
export const buildReport = (statistics: Readonly<RunStatistics>): string[] => {
  if (statistics.total === 0) {
    return [NOTHING_TO_DO];
  }

  const lines = [
    RULE,
    'Download Summary:',
    `Total: ${statistics.total} | Success: ${statistics.succeeded} | Failed: ${statistics.failed} | Cancelled: ${statistics.cancelled}`,
  ];

  if (statistics.skipped > 0) {
    lines.push(`Already present (skipped): ${statistics.skipped}`);
  }

  if (statistics.failedTracks.length > 0) {
    lines.push('', 'Failed tracks:', ...statistics.failedTracks.map((label) => `  - ${label}`));
  }

  if (statistics.cancelledTracks.length > 0) {
    lines.push('', 'Cancelled tracks:', ...statistics.cancelledTracks.map((label) => `  - ${label}`));
  }

  lines.push(RULE);
  return lines;
};

export const printReport = (
  statistics: Readonly<RunStatistics>,
  write: (line: string) => void = console.log,
): void => {
  for (const line of buildReport(statistics)) {
    write(line);
  }
};
