import path from 'node:path';
import fs from 'fs-extra';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  buildTrackFileName,
  isYoutubePlaylistUrl,
  isYoutubeUrl,
  logFailure,
  logRunSummary,
  resolveOutputPath,
  resolveTempPath,
  sanitizeFileName,
  truncateTitle,
} from '../src/utils.js';
import { createStatistics } from '../src/orchestrator.js';
import { createTempDir, removeTempDir } from './helpers/fixtures.js';

describe('sanitizeFileName', () => {
  it('strips every reserved character instead of replacing it', () => {
    expect(sanitizeFileName('a<b>c:d"e/f\\g|h?i*j')).toBe('abcdefghij');
  });

  it('truncates to 200 characters', () => {
    expect(sanitizeFileName('x'.repeat(250))).toHaveLength(200);
  });

  it('trims after truncating', () => {
    expect(sanitizeFileName(`${'a'.repeat(199)} tail`)).toBe('a'.repeat(199));
  });

  it('stays within 200 characters for long names full of reserved characters', () => {
    const result = sanitizeFileName(`${'<>:"/\\|?*'.repeat(30)}${'n'.repeat(300)}`);
    expect(result).toBe('n'.repeat(200));
  });
});

describe('buildTrackFileName', () => {
  it('combines title and primary artists', () => {
    const name = buildTrackFileName({
      name: 'What? Song',
      artists: { primary: [{ name: 'A/B' }, { name: 'C' }], all: [] },
    });
    expect(name).toBe('What Song - AB, C');
  });

  it('uses "Unknown" without primary artists', () => {
    expect(buildTrackFileName({ name: 'Solo', artists: { primary: [], all: [] } })).toBe('Solo - Unknown');
  });
});

describe('output paths', () => {
  it('keeps the temp file beside the final file under a different name', () => {
    const outputDir = path.resolve('/music');
    expect(resolveOutputPath('Song - Artist', outputDir)).toBe(path.join(outputDir, 'Song - Artist.mp3'));
    expect(resolveTempPath('Song - Artist', outputDir, 4)).toBe(path.join(outputDir, 'Song - Artist.4.temp'));
  });
});

describe('YouTube URL detection', () => {
  it.each([
    ['https://www.youtube.com/watch?v=abc123', true],
    ['https://music.youtube.com/watch?v=abc123', true],
    ['https://youtu.be/abc123', true],
    ['https://example.com/watch?v=abc123', false],
    ['not a url', false],
  ])('isYoutubeUrl(%s) is %s', (input, expected) => {
    expect(isYoutubeUrl(input)).toBe(expected);
  });

  it.each([
    ['https://www.youtube.com/playlist?list=PL123', true],
    ['https://www.youtube.com/watch?v=abc123&list=PL123', true],
    ['https://www.youtube.com/watch?v=abc123', false],
    ['https://example.com/playlist?list=PL123', false],
  ])('isYoutubePlaylistUrl(%s) is %s', (input, expected) => {
    expect(isYoutubePlaylistUrl(input)).toBe(expected);
  });
});

describe('truncateTitle', () => {
  it('leaves short titles alone', () => {
    expect(truncateTitle('Short')).toBe('Short');
  });

  it('shortens long titles with an ellipsis', () => {
    expect(truncateTitle('abcdefghij', 8)).toBe('abcde...');
  });
});

describe('persistent logs', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('appends timestamped failures to errors.log', async () => {
    await logFailure(dir, 'Missing Song :: match: Not found in catalog: Missing Song');
    const content = await fs.readFile(path.join(dir, 'errors.log'), 'utf-8');
    expect(content).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] Missing Song :: match: Not found in catalog: Missing Song\n$/);
  });

  it('appends a run summary to downloaded.log', async () => {
    const statistics = { ...createStatistics(3), succeeded: 2, failed: 1 };
    await logRunSummary(dir, 'https://www.youtube.com/playlist?list=PL123', statistics);
    const content = await fs.readFile(path.join(dir, 'downloaded.log'), 'utf-8');
    expect(content).toContain('RUN SUMMARY: https://www.youtube.com/playlist?list=PL123\n');
    expect(content).toContain('COMPLETED: 2/3 (failed 1, cancelled 0)\n');
  });
});
