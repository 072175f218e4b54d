import fs from "node:fs/promises";
import type { Corpus, Song } from "../types.js";

/** One channel in the exported file */
export interface ExportedChannel {
  identifier: string;
  index: number;
  current: Song;
  previous: Song[];
}

/**
 * Plain object keyed by channel name, in corpus order.
 * A repeated name is suffixed with the channel identifier.
 */
export function corpusToRecord(corpus: Corpus): Record<string, ExportedChannel> {
  const record: Record<string, ExportedChannel> = {};
  for (const entry of corpus.values()) {
    const { name, identifier } = entry.channel;
    const key = Object.hasOwn(record, name) ? `${name} (${identifier})` : name;
    record[key] = {
      identifier: entry.channel.identifier,
      index: entry.channel.index,
      current: { title: entry.current.title, artist: entry.current.artist },
      previous: entry.previous.map((song) => ({ title: song.title, artist: song.artist })),
    };
  }
  return record;
}

export function corpusToJson(corpus: Corpus): string {
  return `${JSON.stringify(corpusToRecord(corpus), null, 2)}\n`;
}

/**
 * Write the corpus to a JSON file
 */
export async function exportCorpus(corpus: Corpus, outputPath: string): Promise<void> {
  await fs.writeFile(outputPath, corpusToJson(corpus), "utf-8");
}
