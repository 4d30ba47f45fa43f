import { describe, expect, it } from 'vitest';
import {
  albumName,
  formatDuration,
  primaryArtistNames,
  projectMetadata,
  toTitleCase,
} from '../src/metadata.js';
import { makeDetail } from './helpers/fixtures.js';

describe('projectMetadata', () => {
  it('flattens a full detail record', () => {
    expect(projectMetadata(makeDetail())).toEqual({
      title: 'Test Song',
      artist: 'Singer One',
      album: 'Test Album',
      year: '2021',
      albumArtist: 'Composer One',
      language: 'Hindi',
      composers: 'Writer One',
      label: 'Test Label',
      copyright: '(C) 2021 Test Label',
      url: 'https://catalog.test/song/test-song',
      durationSeconds: 245,
      coverImageUrl: 'https://cdn.test/song-1-500x500.jpg',
    });
  });

  it('joins primary artists in catalog order', () => {
    const detail = makeDetail({
      artists: {
        primary: [
          { name: 'B Singer', role: 'singer' },
          { name: 'A Singer', role: 'singer' },
        ],
        all: [],
      },
    });
    expect(projectMetadata(detail).artist).toBe('B Singer, A Singer');
  });

  it('uses "Unknown" when there are no primary artists', () => {
    const detail = makeDetail({ artists: { primary: [], all: [] } });
    expect(projectMetadata(detail).artist).toBe('Unknown');
    expect(projectMetadata(detail).albumArtist).toBe('Unknown');
  });

  it('builds the album artist from music and composer roles', () => {
    const detail = makeDetail({
      artists: {
        primary: [{ name: 'Singer', role: 'singer' }],
        all: [
          { name: 'Music Director', role: 'music' },
          { name: 'Singer', role: 'singer' },
          { name: 'Composer', role: 'composer' },
        ],
      },
    });
    expect(projectMetadata(detail).albumArtist).toBe('Music Director, Composer');
  });

  it('falls back to the artist when no album artist role is present', () => {
    const detail = makeDetail({
      artists: { primary: [{ name: 'Singer', role: 'singer' }], all: [{ name: 'Singer', role: 'singer' }] },
    });
    expect(projectMetadata(detail).albumArtist).toBe('Singer');
  });

  it('leaves composers absent rather than empty', () => {
    const detail = makeDetail({ artists: { primary: [{ name: 'Singer' }], all: [] } });
    expect('composers' in projectMetadata(detail)).toBe(false);
  });

  it('has no cover when the record has no images', () => {
    expect(projectMetadata(makeDetail({ image: [] })).coverImageUrl).toBeNull();
  });

  it('keeps a missing language absent', () => {
    expect(projectMetadata(makeDetail({ language: null })).language).toBeNull();
  });
});

describe('albumName', () => {
  it('reads the name of a structured album', () => {
    expect(albumName({ name: 'Structured' })).toBe('Structured');
  });

  it('uses a scalar album as-is', () => {
    expect(albumName('Scalar Album')).toBe('Scalar Album');
  });

  it('returns null for a missing album', () => {
    expect(albumName(null)).toBeNull();
    expect(albumName({})).toBeNull();
  });
});

describe('primaryArtistNames', () => {
  it('joins with a comma and space', () => {
    expect(
      primaryArtistNames({ artists: { primary: [{ name: 'One' }, { name: 'Two' }], all: [] } }),
    ).toBe('One, Two');
  });
});

describe('formatDuration', () => {
  it.each([
    [245, '4:05'],
    [59, '0:59'],
    [600, '10:00'],
    [3725, '62:05'],
    [0, '0:00'],
  ])('formats %i seconds as %s', (seconds, expected) => {
    expect(formatDuration(seconds)).toBe(expected);
  });
});

describe('toTitleCase', () => {
  it.each([
    ['hindi', 'Hindi'],
    ['ENGLISH', 'English'],
    ['tamil nadu', 'Tamil Nadu'],
  ])('title-cases %s', (input, expected) => {
    expect(toTitleCase(input)).toBe(expected);
  });
});
