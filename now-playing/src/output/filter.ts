import type { ChannelSongs, Corpus } from "../types.js";
import { songListing } from "../types.js";

function channelMatches(entry: ChannelSongs, needle: string): boolean {
  if (entry.channel.name.toLowerCase().includes(needle)) {
    return true;
  }
  return songListing(entry).some(
    (song) =>
      song.title.toLowerCase().includes(needle) || song.artist.toLowerCase().includes(needle)
  );
}

/**
 * Keep channels whose name, or any listed song title or artist, contains
 * the filter text (case-insensitive). Empty filter text keeps everything.
 */
export function filterCorpus(corpus: Corpus, filterText: string): Corpus {
  const needle = filterText.trim().toLowerCase();
  const filtered = new Map<string, ChannelSongs>();

  for (const [key, entry] of corpus) {
    if (!needle || channelMatches(entry, needle)) {
      filtered.set(key, entry);
    }
  }

  return filtered;
}
