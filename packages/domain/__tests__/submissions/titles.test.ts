import { describe, expect, it } from 'vitest';
import { generateSubmissionTitle } from '../../src/submissions/SubmissionTitle';
import { generatePublicationTitle } from '../../src/publications/PublicationTitle';
import { formatMovieTime } from '../../src/shared/movieTime';
import { joinNames, normalizeCsv } from '../../src/shared/names';

describe('formatMovieTime', () => {
  it('formats minutes, seconds and hundredths', () => {
    expect(formatMovieTime(17838, 60)).toBe('04:57.30');
  });

  it('adds hours past the hour', () => {
    expect(formatMovieTime(216000, 60)).toBe('1:00:00.00');
  });

  it('falls back to 60 fps without a frame rate', () => {
    expect(formatMovieTime(90, null)).toBe('00:01.50');
  });
});

describe('joinNames', () => {
  it('joins with an ampersand before the last name', () => {
    expect(joinNames(['Alice'])).toBe('Alice');
    expect(joinNames(['Alice', 'Bob'])).toBe('Alice & Bob');
    expect(joinNames(['Alice', 'Bob', 'Carol'])).toBe('Alice, Bob & Carol');
  });
});

describe('normalizeCsv', () => {
  it('trims entries and drops empty ones', () => {
    expect(normalizeCsv(' Dave ,, Erin ')).toBe('Dave, Erin');
    expect(normalizeCsv(' , ')).toBeNull();
  });
});

describe('titles', () => {
  it('builds the submission title from authors, system, game and branch', () => {
    expect(
      generateSubmissionTitle({
        id: 42,
        authorNames: ['Alice', 'Bob'],
        additionalAuthors: 'Carol',
        systemCode: 'NES',
        gameName: 'Some Game',
        branch: 'warps',
        frames: 17838,
        frameRate: 60,
      })
    ).toBe(`#42: Alice, Bob & Carol's NES Some Game "warps" in 04:57.30`);
  });

  it('builds the publication title and leaves out the baseline goal', () => {
    expect(
      generatePublicationTitle({
        id: 1234,
        systemCode: 'SNES',
        gameDisplayName: 'Other Game',
        goal: 'baseline',
        authorNames: ['Alice'],
        additionalAuthors: null,
        frames: 216000,
        frameRate: 60,
      })
    ).toBe('[1234] SNES Other Game by Alice in 1:00:00.00');
  });
});
