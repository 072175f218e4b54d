import type { SiteConfig } from "../config/types.js";
import { ChannelNotFoundError, FetchError } from "../errors.js";
import type { PageFetcher } from "../fetch/page-fetcher.js";
import { directoryUrl } from "../fetch/urls.js";
import { parseDirectory } from "../parse/markup-parser.js";
import type { Channel, ChannelRef } from "../types.js";
import { logger } from "../utils/logger.js";

/**
 * Registry of the site's channels.
 *
 * The directory is fetched on the first `list()` and kept for the life of
 * the catalog; a restart picks up new channels. Concurrent first callers
 * share one directory request. A failed load is not cached, so the next
 * call tries again.
 */
export class ChannelCatalog {
  private channels: readonly Channel[] | null = null;
  private loading: Promise<readonly Channel[]> | null = null;

  constructor(
    private readonly fetcher: PageFetcher,
    private readonly site: SiteConfig
  ) {}

  /**
   * All channels in directory order.
   */
  async list(): Promise<readonly Channel[]> {
    if (this.channels) {
      return this.channels;
    }

    if (!this.loading) {
      this.loading = this.load().then(
        (channels) => {
          this.channels = channels;
          this.loading = null;
          return channels;
        },
        (error: unknown) => {
          this.loading = null;
          throw error;
        }
      );
    } else {
      logger.debug("Channel directory already loading; waiting for it");
    }

    return this.loading;
  }

  /**
   * Find a channel by name (case-insensitive, exact) or by directory index.
   * @throws ChannelNotFoundError if nothing matches
   */
  async resolve(ref: ChannelRef): Promise<Channel> {
    const channels = await this.list();

    let found: Channel | undefined;
    if (ref.kind === "index") {
      found = Number.isInteger(ref.index) ? channels[ref.index] : undefined;
    } else {
      const wanted = ref.name.trim().toLowerCase();
      found = channels.find((channel) => channel.name.toLowerCase() === wanted);
    }

    if (!found) {
      throw new ChannelNotFoundError(ref, channels.length);
    }
    return found;
  }

  private async load(): Promise<readonly Channel[]> {
    const url = directoryUrl(this.site);
    const outcome = await this.fetcher.fetchOne(url);
    if (!outcome.ok) {
      throw new FetchError(url, outcome.failure);
    }

    const channels = parseDirectory(outcome.body).map((entry, index) =>
      Object.freeze({ name: entry.name, identifier: entry.identifier, index })
    );
    logger.debug(`Loaded ${channels.length} channels from ${url}`);

    return Object.freeze(channels);
  }
}
