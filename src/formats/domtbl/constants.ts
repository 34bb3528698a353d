/**
 * HMMER `--domtblout` layout
 *
 * Column positions are 0-based token indices on a whitespace-split line.
 */

export const COMMENT_PREFIX = "#";

/**
 * Data lines carry 22 fixed columns followed by a free-text description
 */
export const MIN_FIELDS = 22;

/**
 * Token count cap; the last token keeps the rest of the line verbatim
 */
export const MAX_FIELDS = 23;

export const COLUMNS = {
  target: 0,
  targetLength: 2,
  query: 3,
  queryLength: 5,
  fullEvalue: 6,
  fullScore: 7,
  hmmFrom: 15,
  hmmTo: 16,
  aliFrom: 17,
  aliTo: 18,
  description: 22,
} as const;
