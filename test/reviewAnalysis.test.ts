import { describe, expect, it } from 'vitest';
import { UNKNOWN_DATE, deriveSentiment, looksRelative, normalizeReviewTime } from '../src/services/reviewAnalysis';

const now = new Date('2024-06-15T12:00:00Z');

describe('normalizeReviewTime', () => {
  it('converts relative times to Month-YYYY', () => {
    expect(normalizeReviewTime('5 days ago', now)).toBe('June-2024');
    expect(normalizeReviewTime('3 weeks ago', now)).toBe('May-2024');
    expect(normalizeReviewTime('a month ago', now)).toBe('May-2024');
    expect(normalizeReviewTime('2 months ago', now)).toBe('April-2024');
    expect(normalizeReviewTime('2 years ago', now)).toBe('June-2022');
  });

  it('counts a missing number as one unit', () => {
    expect(normalizeReviewTime('a year ago', now)).toBe('June-2023');
    expect(normalizeReviewTime('Yesterday', now)).toBe('June-2024');
  });

  it('strips star glyphs and keeps the line with the time', () => {
    expect(normalizeReviewTime('\ue838\ue838\ue838\n2 months ago', now)).toBe('April-2024');
  });

  it('keeps strings without a time unit as they are', () => {
    expect(normalizeReviewTime('March-2024', now)).toBe('March-2024');
    expect(normalizeReviewTime('', now)).toBe('');
  });

  it('reports an unusable reference time as unknown', () => {
    expect(normalizeReviewTime('3 weeks ago', new Date('not a date'))).toBe(UNKNOWN_DATE);
  });
});

describe('looksRelative', () => {
  it('detects relative descriptions', () => {
    expect(looksRelative('3 Weeks ago')).toBe(true);
    expect(looksRelative('March-2024')).toBe(false);
  });
});

describe('deriveSentiment', () => {
  it('buckets ratings', () => {
    expect([1, 2, 3, 4, 5].map(deriveSentiment)).toEqual(['negative', 'negative', 'neutral', 'positive', 'positive']);
  });
});
