import { Sentiment } from '../types';

const MONTHS = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
];

const DAY_MS = 24 * 60 * 60 * 1000;

// Checked in this order: "day" before "week" so "yesterday" counts as a day.
const UNITS: Array<{ unit: string; days: number }> = [
  { unit: 'day', days: 1 },
  { unit: 'week', days: 7 },
  { unit: 'month', days: 30 },
  { unit: 'year', days: 365 },
];

const STAR_GLYPH = '\ue838';

export const UNKNOWN_DATE = 'Unknown Date';

export const formatMonthYear = (date: Date): string =>
  `${MONTHS[date.getUTCMonth()]}-${date.getUTCFullYear()}`;

export const looksRelative = (raw: string): boolean => {
  const lower = raw.toLowerCase();
  return UNITS.some(({ unit }) => lower.includes(unit));
};

/** Scraped times can carry star glyphs on earlier lines. Keep the line with the time. */
const stripNoise = (raw: string): string => {
  if (!raw.includes(STAR_GLYPH) && !raw.includes('\n')) return raw.trim();
  const line = raw.split('\n').find((part) => looksRelative(part));
  return (line ?? raw).split(STAR_GLYPH).join('').trim();
};

/**
 * "3 weeks ago" -> "Month-YYYY" relative to `now` (UTC).
 * Months are 30 days and years 365; "a month ago" counts as 1.
 * Anything without a day/week/month/year unit is returned unchanged.
 */
export const normalizeReviewTime = (raw: string, now: Date = new Date()): string => {
  const clean = stripNoise(raw ?? '');
  const lower = clean.toLowerCase();
  const match = UNITS.find(({ unit }) => lower.includes(unit));
  if (!match) return clean;

  const before = lower.split(match.unit)[0];
  const digits = before.replace(/\D/g, '');
  const count = digits ? Number.parseInt(digits, 10) : 1;
  const reviewDate = new Date(now.getTime() - count * match.days * DAY_MS);
  if (Number.isNaN(reviewDate.getTime())) return UNKNOWN_DATE;
  return formatMonthYear(reviewDate);
};

export const deriveSentiment = (rating: number): Sentiment => {
  if (rating <= 2) return 'negative';
  if (rating === 3) return 'neutral';
  return 'positive';
};
