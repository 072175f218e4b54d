import type { ChannelCatalog } from "../catalog/channel-catalog.js";
import type { SiteConfig } from "../config/types.js";
import { FetchError, ParseError, type ChannelFailure } from "../errors.js";
import type { PageFetcher } from "../fetch/page-fetcher.js";
import { channelUrl } from "../fetch/urls.js";
import { parseChannelPage } from "../parse/markup-parser.js";
import type { AggregationResult, Channel, ChannelSongs, Song } from "../types.js";
import { songListing } from "../types.js";
import { logger } from "../utils/logger.js";

export interface SongAggregatorOptions {
  site: SiteConfig;
  /** Title/artist delimiter used on channel pages */
  delimiter: string;
  /** Deadline for the all-channels batch (null = none) */
  batchDeadlineMs?: number | null;
}

/**
 * Reads song data for one channel or for every channel at once.
 * Each call fetches fresh pages; nothing is cached here.
 */
export class SongAggregator {
  constructor(
    private readonly catalog: ChannelCatalog,
    private readonly fetcher: PageFetcher,
    private readonly options: SongAggregatorOptions
  ) {}

  /**
   * Fetch and parse one channel's page.
   * @throws FetchError or ParseError
   */
  async channelSongs(channel: Channel): Promise<ChannelSongs> {
    const url = channelUrl(this.options.site, channel.identifier);
    const outcome = await this.fetcher.fetchOne(url);
    if (!outcome.ok) {
      throw new FetchError(url, outcome.failure);
    }
    return this.toChannelSongs(channel, outcome.body);
  }

  async currentSong(channel: Channel): Promise<Song> {
    return (await this.channelSongs(channel)).current;
  }

  async previousSongs(channel: Channel): Promise<Song[]> {
    return [...(await this.channelSongs(channel)).previous];
  }

  /** The live song followed by previous songs, from a single page fetch */
  async allSongs(channel: Channel): Promise<Song[]> {
    return songListing(await this.channelSongs(channel));
  }

  /**
   * Fetch every channel concurrently and build a corpus of those that answered.
   * Channels whose page failed to load or parse are left out of the corpus
   * and listed in `failures`.
   */
  async allChannelsData(): Promise<AggregationResult> {
    const channels = await this.catalog.list();
    const urls = channels.map((channel) => channelUrl(this.options.site, channel.identifier));

    const outcomes = await this.fetcher.fetchMany(urls, {
      deadlineMs: this.options.batchDeadlineMs ?? null,
    });

    const corpus = new Map<string, ChannelSongs>();
    const failures: ChannelFailure[] = [];

    outcomes.forEach((outcome, i) => {
      const channel = channels[i];
      if (!outcome.ok) {
        failures.push({ channel, error: new FetchError(outcome.url, outcome.failure) });
        return;
      }

      try {
        corpus.set(channel.identifier, this.toChannelSongs(channel, outcome.body));
      } catch (error) {
        if (!(error instanceof ParseError)) throw error;
        failures.push({ channel, error });
      }
    });

    for (const failure of failures) {
      logger.debug(`Skipping channel "${failure.channel.name}": ${failure.error.message}`);
    }
    logger.debug(`Aggregated ${corpus.size} of ${channels.length} channels`);

    return { corpus, failures };
  }

  private toChannelSongs(channel: Channel, html: string): ChannelSongs {
    const page = parseChannelPage(html, this.options.delimiter);
    return { channel, current: page.current, previous: page.previous };
  }
}
