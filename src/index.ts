#!/usr/bin/env node
import process, { stdin, stdout } from 'node:process';
import { createInterface } from 'node:readline/promises';
import { createCatalogClient, createSession } from './catalog.js';
import { parseArgs, printHelp, type CliConfig } from './config.js';
import { transcodeToMp3, transferToFile } from './download.js';
import { RunCancelledError, describeError } from './errors.js';
import { extractTracks } from './extract.js';
import { createLogger, setLogSink, setVerbose } from './logger.js';
import { processUrl } from './orchestrator.js';
import { barLogSink, createBarReporter, createMultiBar } from './progress.js';
import { printReport } from './report.js';
import { createTagWriter } from './tagger.js';
import {
  ensureOutputDir,
  isYoutubeUrl,
  logFailure,
  logRunSummary,
  logSuccess,
  verifyInternet,
} from './utils.js';
import type { RunEvent, RunStatistics } from './types.js';

const log = createLogger('cli');

const EXIT_CANCELLED = 130;

/**
 * Prompts the user for a YouTube URL when none was passed.
 */
const promptForUrl = async (): Promise<string> => {
  const rl = createInterface({ input: stdin, output: stdout });
  try {
    const answer = await rl.question('Enter a YouTube video or playlist URL: ');
    return answer.trim();
  } finally {
    rl.close();
  }
};

/**
 * Mirrors each outcome into errors.log / downloaded.log in the output directory.
 */
const journalEvent =
  (outputDir: string) =>
  async (event: RunEvent): Promise<void> => {
    if (event.status === 'success') {
      await logSuccess(outputDir, event.filePath);
    } else if (event.status === 'failed') {
      await logFailure(outputDir, `${event.label} :: ${event.reason}`);
    }
  };

const finishRun = async (config: CliConfig, url: string, statistics: RunStatistics): Promise<void> => {
  printReport(statistics);
  if (statistics.total > 0) {
    await logRunSummary(config.outputDir, url, statistics);
  }
};

/**
 * Runs one download session for the resolved configuration.
 */
const runSession = async (config: CliConfig, url: string): Promise<void> => {
  try {
    await verifyInternet(config.apiBase);
  } catch (error) {
    log.warn(`Connectivity check failed: ${describeError(error)}`);
  }

  await ensureOutputDir(config.outputDir);

  const http = createSession(config.apiBase);
  const multiBar = createMultiBar();
  setLogSink(barLogSink(multiBar));

  const controller = new AbortController();
  let interrupts = 0;
  const onSigint = (): void => {
    interrupts += 1;
    if (interrupts > 1) {
      multiBar.stop();
      process.exit(EXIT_CANCELLED);
    }
    controller.abort();
  };
  process.on('SIGINT', onSigint);

  let statistics: RunStatistics;
  let cancelled = false;
  try {
    statistics = await processUrl(url, {
      workers: config.workers,
      signal: controller.signal,
      extract: extractTracks,
      pipeline: {
        outputDir: config.outputDir,
        progress: createBarReporter(multiBar),
        services: {
          catalog: createCatalogClient(http),
          transfer: (assetUrl, destination, onProgress) => transferToFile(http, assetUrl, destination, onProgress),
          transcode: (source, destination) => transcodeToMp3(source, destination, config.bitrateKbps),
          embedTags: createTagWriter(http),
        },
      },
      onEvent: journalEvent(config.outputDir),
    });
  } catch (error) {
    if (!(error instanceof RunCancelledError)) {
      throw error;
    }
    statistics = error.statistics;
    cancelled = true;
  } finally {
    multiBar.stop();
    setLogSink();
    process.off('SIGINT', onSigint);
  }

  await finishRun(config, url, statistics);

  if (cancelled) {
    log.info('Operation cancelled by user');
    process.exitCode = EXIT_CANCELLED;
  }
};

/**
 * Entry point: parses arguments, resolves the source URL and runs the session.
 */
const main = async (): Promise<void> => {
  const config = parseArgs(process.argv.slice(2));
  if (config.help) {
    printHelp();
    return;
  }

  setVerbose(config.verbose);

  let url = config.url;
  if (!url && stdin.isTTY) {
    url = await promptForUrl();
  }
  if (!url || !isYoutubeUrl(url)) {
    log.error('A valid YouTube video or playlist URL is required.');
    printHelp();
    process.exitCode = 1;
    return;
  }

  await runSession(config, url);
};

void main().catch((error: unknown) => {
  log.error(`Fatal error: ${describeError(error)}`);
  process.exit(1);
});
