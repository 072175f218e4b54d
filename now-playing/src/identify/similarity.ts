/**
 * String similarity metrics scored 0-100 (100 = identical).
 */

import { compareTwoStrings } from "string-similarity";

/** Scores how alike two strings are, from 0 to 100 */
export type Similarity = (a: string, b: string) => number;

/**
 * Lowercase, turn punctuation into spaces and collapse whitespace.
 */
export function normalizeForMatch(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, " ")
    .trim();
}

/**
 * Dice coefficient over character bigrams, scaled to 0-100.
 * Whitespace is ignored; empty input scores 0.
 */
export const ratio: Similarity = (a, b) => {
  if (!a.trim() || !b.trim()) return 0;
  return Math.round(compareTwoStrings(a, b) * 100);
};

function sortedTokens(tokens: Iterable<string>): string {
  return [...tokens].sort().join(" ");
}

/**
 * Token-set ratio: word order and repeated words do not matter, and a
 * string whose words are all contained in the other scores 100.
 *
 * Compares the sorted shared words against the shared words plus each
 * side's leftovers and returns the best pairwise `ratio`.
 */
export const tokenSetRatio: Similarity = (a, b) => {
  const tokensA = new Set(normalizeForMatch(a).split(" ").filter(Boolean));
  const tokensB = new Set(normalizeForMatch(b).split(" ").filter(Boolean));
  if (tokensA.size === 0 || tokensB.size === 0) return 0;

  const shared = [...tokensA].filter((token) => tokensB.has(token));
  const onlyA = [...tokensA].filter((token) => !tokensB.has(token));
  const onlyB = [...tokensB].filter((token) => !tokensA.has(token));

  const sharedText = sortedTokens(shared);
  const withA = `${sharedText} ${sortedTokens(onlyA)}`.trim();
  const withB = `${sharedText} ${sortedTokens(onlyB)}`.trim();

  if (sharedText && (withA === sharedText || withB === sharedText)) {
    return 100;
  }

  return Math.max(ratio(sharedText, withA), ratio(sharedText, withB), ratio(withA, withB));
};

export const defaultSimilarity: Similarity = tokenSetRatio;
