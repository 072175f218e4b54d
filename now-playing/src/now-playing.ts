import { SongAggregator } from "./aggregate/song-aggregator.js";
import { ChannelCatalog } from "./catalog/channel-catalog.js";
import { loadConfig } from "./config/config.js";
import type { Config } from "./config/types.js";
import type { ChannelFailure } from "./errors.js";
import { PageFetcher, type FetchLike } from "./fetch/page-fetcher.js";
import { identify, parseQuery } from "./identify/fuzzy-identifier.js";
import type { Similarity } from "./identify/similarity.js";
import type { AggregationResult, Channel, IdentifyOutcome, Song } from "./types.js";
import { parseChannelRef } from "./types.js";
import { logger } from "./utils/logger.js";

export interface NowPlayingOptions {
  /** Replaces the global fetch */
  fetch?: FetchLike;
  /** Replaces the default token-set similarity */
  similarity?: Similarity;
}

export interface IdentifyReport {
  outcome: IdentifyOutcome;
  /** Channels that could not be searched */
  failures: ChannelFailure[];
}

/**
 * Entry point to the library: one fetcher, one channel catalog and one
 * aggregator sharing a configuration. Channel arguments are names or
 * directory indexes as typed by a user ("Jazz", "3").
 */
export class NowPlaying {
  readonly fetcher: PageFetcher;
  readonly catalog: ChannelCatalog;
  readonly aggregator: SongAggregator;

  constructor(
    readonly config: Config,
    private readonly options: NowPlayingOptions = {}
  ) {
    this.fetcher = new PageFetcher({
      timeoutMs: config.network.timeoutMs,
      maxConcurrency: config.network.maxConcurrency,
      userAgent: config.network.userAgent,
      fetch: options.fetch,
    });
    this.catalog = new ChannelCatalog(this.fetcher, config.site);
    this.aggregator = new SongAggregator(this.catalog, this.fetcher, {
      site: config.site,
      delimiter: config.matching.delimiter,
      batchDeadlineMs: config.network.batchDeadlineMs,
    });
  }

  channels(): Promise<readonly Channel[]> {
    return this.catalog.list();
  }

  resolve(channel: string): Promise<Channel> {
    return this.catalog.resolve(parseChannelRef(channel));
  }

  async currentSong(channel: string): Promise<Song> {
    return this.aggregator.currentSong(await this.resolve(channel));
  }

  async previousSongs(channel: string): Promise<Song[]> {
    return this.aggregator.previousSongs(await this.resolve(channel));
  }

  async allSongs(channel: string): Promise<Song[]> {
    return this.aggregator.allSongs(await this.resolve(channel));
  }

  allChannelsData(): Promise<AggregationResult> {
    return this.aggregator.allChannelsData();
  }

  /**
   * Find the channel whose songs best match the query.
   * The query is checked before any page is fetched.
   */
  async identify(query: string): Promise<IdentifyReport> {
    const delimiter = this.config.matching.delimiter;
    parseQuery(query, delimiter);

    const { corpus, failures } = await this.allChannelsData();
    const outcome = identify(query, corpus, {
      delimiter,
      similarity: this.options.similarity,
    });
    return { outcome, failures };
  }
}

/**
 * Load configuration and build a client.
 * `debug` turns on debug logging in addition to the config's own setting.
 */
export async function createNowPlaying(
  configPath?: string,
  debug = false,
  options: NowPlayingOptions = {}
): Promise<NowPlaying> {
  if (debug) {
    logger.setDebug(true);
  }

  const config = await loadConfig(configPath);
  if (config.debug) {
    logger.setDebug(true);
  }
  logger.debug(`Config: ${JSON.stringify(config, null, 2)}`);

  return new NowPlaying(config, options);
}

export { DEFAULT_CONFIG } from "./config/defaults.js";
export type { Config } from "./config/types.js";
export * from "./errors.js";
export type { FetchLike, FetchOutcome } from "./fetch/page-fetcher.js";
export { identify } from "./identify/fuzzy-identifier.js";
export { ratio, tokenSetRatio, type Similarity } from "./identify/similarity.js";
export { corpusToRecord, exportCorpus } from "./output/export.js";
export { filterCorpus } from "./output/filter.js";
export * from "./types.js";
