import chalk, { type ChalkInstance } from "chalk";
import type { ChannelSongs, MatchResult, Song } from "../types.js";

/** Card colours, rotated by channel position */
const CARD_COLORS: ChalkInstance[] = [
  chalk.blueBright,
  chalk.greenBright,
  chalk.magentaBright,
  chalk.yellowBright,
  chalk.cyanBright,
  chalk.redBright,
  chalk.whiteBright,
];

/**
 * "Title by Artist", just the title when the artist is unknown,
 * "(unknown)" when both are.
 */
export function formatSong(song: Song, delimiter = " by "): string {
  if (!song.title && !song.artist) return "(unknown)";
  if (!song.artist) return song.title;
  if (!song.title) return `(unknown)${delimiter}${song.artist}`;
  return `${song.title}${delimiter}${song.artist}`;
}

/** Plain-text lines of a channel card */
export function channelCardLines(entry: ChannelSongs, delimiter = " by "): string[] {
  const lines = [entry.channel.name, `Now Playing: ${formatSong(entry.current, delimiter)}`];
  if (entry.previous.length > 0) {
    lines.push("Previous Songs:");
    for (const song of entry.previous) {
      lines.push(`  • ${formatSong(song, delimiter)}`);
    }
  }
  return lines;
}

/**
 * Coloured card for a channel; `position` picks the colour
 */
export function formatChannelCard(entry: ChannelSongs, position: number, delimiter = " by "): string {
  const color = CARD_COLORS[position % CARD_COLORS.length];
  const [name, ...rest] = channelCardLines(entry, delimiter);
  return [
    color.bold(name),
    ...rest.map((line) => (line === "Previous Songs:" ? chalk.bold(line) : color(line))),
  ].join("\n");
}

export function formatMatch(match: MatchResult, delimiter = " by "): string {
  const when = match.position === 0 ? "now playing" : `played ${match.position} song(s) ago`;
  return `${match.channel.name}: ${formatSong(match.song, delimiter)} (${when}, confidence ${match.confidence}%)`;
}
