import { ratio } from 'fuzzball';

export const normalizeDescription = (value: string): string =>
  value.toLowerCase().trim().replace(/\s+/g, ' ');

/**
 * Indel similarity ratio in [0, 1], as fuzzball's `ratio` scores it
 * (whole percentages). Two empty strings are identical.
 */
export const similarityRatio = (a: string, b: string): number => {
  if (a === b) return 1;
  if (!a.length || !b.length) return 0;
  return ratio(a, b, { full_process: false }) / 100;
};

export const descriptionSimilarity = (a: string, b: string): number =>
  similarityRatio(normalizeDescription(a), normalizeDescription(b));
