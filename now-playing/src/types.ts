/**
 * Shared model for channels, songs and match results.
 * Every value here is plain data so it can be logged or serialized as-is.
 */

import type { ChannelFailure } from "./errors.js";

/** A channel from the upstream directory */
export interface Channel {
  readonly name: string;
  /** Opaque key the site uses to address the channel's page */
  readonly identifier: string;
  /** Position in the directory (stable within one directory fetch) */
  readonly index: number;
}

/** A song as listed on a channel page. Unknown fields are empty strings. */
export interface Song {
  readonly title: string;
  readonly artist: string;
}

/** What a channel is playing now and what it played before (most recent first) */
export interface ChannelSongs {
  readonly channel: Channel;
  readonly current: Song;
  readonly previous: readonly Song[];
}

/**
 * Songs for every channel that answered, keyed by channel identifier.
 * Iteration order is directory order.
 */
export type Corpus = ReadonlyMap<string, ChannelSongs>;

/** Result of aggregating all channels: the corpus plus what failed */
export interface AggregationResult {
  corpus: Corpus;
  failures: ChannelFailure[];
}

/** A way of naming a channel: by its name or by its directory index */
export type ChannelRef =
  | { kind: "name"; name: string }
  | { kind: "index"; index: number };

/** Best-scoring (channel, song) pair for a query */
export interface MatchResult {
  kind: "match";
  channel: Channel;
  song: Song;
  /** 0 for the live song, n for the n-th previous song */
  position: number;
  /** Similarity between query and song, 0-100 */
  confidence: number;
}

export type IdentifyOutcome = MatchResult | { kind: "no-match" };

export const EMPTY_SONG: Song = Object.freeze({ title: "", artist: "" });

/**
 * Full listing for a channel: the live song first, then previous songs.
 */
export function songListing(songs: ChannelSongs): Song[] {
  return [songs.current, ...songs.previous];
}

/**
 * Turn user input into a channel reference.
 * All-digit input is an index, anything else is a name.
 */
export function parseChannelRef(input: string): ChannelRef {
  const trimmed = input.trim();
  if (/^\d+$/.test(trimmed)) {
    return { kind: "index", index: parseInt(trimmed, 10) };
  }
  return { kind: "name", name: trimmed };
}

export function describeChannelRef(ref: ChannelRef): string {
  return ref.kind === "index" ? `#${ref.index}` : `"${ref.name}"`;
}
