/**
 * Extract the channel directory and per-channel song lists from site markup.
 *
 * Directory page:
 *   <select id="channel"><option value="{identifier}">{name}</option>...</select>
 *
 * Channel page:
 *   <div id="now-playing">Title by Artist</div>
 *   <ul id="previous-songs"><li>Title by Artist</li>...</ul>
 *
 * A song element may instead carry `.title` and `.artist` children.
 * Missing containers raise ParseError; a single bad entry is skipped or
 * degraded, never fatal.
 */

import * as cheerio from "cheerio";
import { ParseError } from "../errors.js";
import { EMPTY_SONG, type Song } from "../types.js";
import { logger } from "../utils/logger.js";

export const DIRECTORY_SELECTOR = "select#channel";
export const NOW_PLAYING_SELECTOR = "#now-playing";
export const PREVIOUS_SONGS_SELECTOR = "#previous-songs";

export interface DirectoryEntry {
  name: string;
  identifier: string;
}

export interface ChannelPage {
  current: Song;
  /** In page order, assumed most recent first */
  previous: Song[];
}

function cleanText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Split "Title by Artist" on the last occurrence of the delimiter.
 * Without a delimiter the whole text is the title.
 */
export function splitSongText(text: string, delimiter: string): Song {
  const cleaned = cleanText(text);
  const at = cleaned.lastIndexOf(delimiter);
  if (at === -1) {
    return { title: cleaned, artist: "" };
  }
  return {
    title: cleaned.slice(0, at).trim(),
    artist: cleaned.slice(at + delimiter.length).trim(),
  };
}

/** Text pulled out of one song element */
interface SongText {
  /** Text of a `.title` child, null if there is none */
  title: string | null;
  /** Text of an `.artist` child, null if there is none */
  artist: string | null;
  /** Full text of the element */
  text: string;
}

/**
 * Build a song from an element's text, preferring `.title` / `.artist`
 * children. Returns null when the element holds no text at all.
 */
function toSong(parts: SongText, delimiter: string): Song | null {
  if (parts.title !== null || parts.artist !== null) {
    const song = { title: cleanText(parts.title ?? ""), artist: cleanText(parts.artist ?? "") };
    return song.title || song.artist ? song : null;
  }

  const text = cleanText(parts.text);
  if (!text) return null;
  return splitSongText(text, delimiter);
}

/**
 * Parse the channel directory into (name, identifier) pairs in document order.
 * Only the first option for an identifier is kept.
 * @throws ParseError if the channel selector is missing
 */
export function parseDirectory(html: string): DirectoryEntry[] {
  const $ = cheerio.load(html);
  const select = $(DIRECTORY_SELECTOR).first();

  if (select.length === 0) {
    throw new ParseError(
      `Channel directory not found (no ${DIRECTORY_SELECTOR} element); the page layout may have changed`
    );
  }

  const entries: DirectoryEntry[] = [];
  const seen = new Set<string>();
  for (const option of select.find("option").toArray()) {
    const $option = $(option);
    // attr("value") falls back to the option text, so only a real attribute counts.
    // Placeholder options ("Choose a channel...") carry no value.
    const identifier = $option.is("[value]") ? ($option.attr("value") ?? "").trim() : "";
    if (!identifier) continue;

    // Identifiers address channel pages; a repeat would shadow the first channel
    if (seen.has(identifier)) {
      logger.debug(`Skipping duplicate channel identifier "${identifier}" (${cleanText($option.text())})`);
      continue;
    }
    seen.add(identifier);

    entries.push({
      name: cleanText($option.text()) || identifier,
      identifier,
    });
  }

  return entries;
}

/**
 * Parse a channel page into its current song and previous songs.
 * @throws ParseError if the now-playing element is missing
 */
export function parseChannelPage(html: string, delimiter: string): ChannelPage {
  const $ = cheerio.load(html);
  const nowPlaying = $(NOW_PLAYING_SELECTOR).first();

  if (nowPlaying.length === 0) {
    throw new ParseError(
      `Now-playing element not found (no ${NOW_PLAYING_SELECTOR} element); the page layout may have changed`
    );
  }

  const nowTitle = nowPlaying.find(".title").first();
  const nowArtist = nowPlaying.find(".artist").first();
  const current = toSong(
    {
      title: nowTitle.length > 0 ? nowTitle.text() : null,
      artist: nowArtist.length > 0 ? nowArtist.text() : null,
      text: nowPlaying.text(),
    },
    delimiter
  ) ?? EMPTY_SONG;

  const previous: Song[] = [];
  for (const item of $(PREVIOUS_SONGS_SELECTOR).find("li").toArray()) {
    const $item = $(item);
    const title = $item.find(".title").first();
    const artist = $item.find(".artist").first();
    const song = toSong(
      {
        title: title.length > 0 ? title.text() : null,
        artist: artist.length > 0 ? artist.text() : null,
        text: $item.text(),
      },
      delimiter
    );
    if (song) previous.push(song);
  }

  return { current, previous };
}
