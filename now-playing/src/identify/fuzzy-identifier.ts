/**
 * Find which channel is playing (or recently played) a song.
 * Scores every (channel, song) pair in a corpus and returns the best one.
 * There is no acceptance threshold: callers decide whether the confidence
 * is good enough.
 */

import { InvalidQueryError } from "../errors.js";
import type { Corpus, IdentifyOutcome, MatchResult, Song } from "../types.js";
import { songListing } from "../types.js";
import { defaultSimilarity, ratio, type Similarity } from "./similarity.js";

export interface IdentifyOptions {
  /** "song by artist" token; when present the query is split on it */
  delimiter?: string;
  similarity?: Similarity;
}

/** Query split into title and artist when it used the delimiter */
export interface ParsedQuery {
  title: string;
  artist: string | null;
  /** What gets compared against each song */
  combined: string;
}

export function normalizeQuery(text: string): string {
  return text.replace(/\s+/g, " ").trim().toLowerCase();
}

/**
 * Case-fold the query and split "title by artist" on the last delimiter.
 * @throws InvalidQueryError for empty or whitespace-only input
 */
export function parseQuery(text: string, delimiter = " by "): ParsedQuery {
  const normalized = normalizeQuery(text);
  if (!normalized) {
    throw new InvalidQueryError();
  }

  const at = normalized.lastIndexOf(delimiter.toLowerCase());
  if (at <= 0) {
    return { title: normalized, artist: null, combined: normalized };
  }

  const title = normalized.slice(0, at).trim();
  const artist = normalized.slice(at + delimiter.length).trim();
  return { title, artist, combined: `${title} ${artist}`.trim() };
}

/** Non-finite scores count as 0 */
function clampScore(score: number): number {
  return Number.isFinite(score) ? Math.min(100, Math.max(0, score)) : 0;
}

function songText(song: Song): string {
  return normalizeQuery(`${song.title} ${song.artist}`);
}

/**
 * Score every song in the corpus against the query.
 *
 * Pairs with equal scores are told apart by whole-string `ratio`, so an
 * exact "title artist" beats a song that merely contains the query's words.
 * Remaining ties keep the first pair in corpus order (channels in directory
 * order, then the live song before previous ones).
 *
 * @returns the best match, or no-match only when the corpus has no songs
 * @throws InvalidQueryError for an empty query
 */
export function identify(
  queryText: string,
  corpus: Corpus,
  options: IdentifyOptions = {}
): IdentifyOutcome {
  const query = parseQuery(queryText, options.delimiter);
  const similarity = options.similarity ?? defaultSimilarity;

  let best: MatchResult | null = null;
  let bestExactness = 0;

  for (const entry of corpus.values()) {
    for (const [position, song] of songListing(entry).entries()) {
      const text = songText(song);
      const confidence = clampScore(similarity(query.combined, text));
      if (best && confidence < best.confidence) continue;

      // Equal scores go to the closer full string; only a strictly closer one replaces
      const exactness = ratio(query.combined, text);
      if (best && confidence === best.confidence && exactness <= bestExactness) continue;

      best = { kind: "match", channel: entry.channel, song, position, confidence };
      bestExactness = exactness;
    }
  }

  return best ?? { kind: "no-match" };
}
