/**
 * Configuration types for now-playing
 */

/** Where the upstream pages live */
export interface SiteConfig {
  /** Base URL of the site, e.g. "https://host.example" */
  baseUrl: string;
  /** Path of the channel directory page */
  directoryPath: string;
  /** Path of a channel page; "{id}" is replaced by the channel identifier */
  channelPath: string;
}

export interface NetworkConfig {
  /** Per-request timeout in milliseconds */
  timeoutMs: number;
  /** Maximum requests in flight during a batch */
  maxConcurrency: number;
  /** Whole-batch deadline in milliseconds (null = none) */
  batchDeadlineMs: number | null;
  userAgent: string;
}

export interface MatchingConfig {
  /** Token between title and artist, both on the site and in queries */
  delimiter: string;
}

export interface Config {
  site: SiteConfig;
  network: NetworkConfig;
  matching: MatchingConfig;
  debug: boolean;
}

/** Shape accepted from config files: every section optional and partial */
export interface PartialConfig {
  site?: Partial<SiteConfig>;
  network?: Partial<NetworkConfig>;
  matching?: Partial<MatchingConfig>;
  debug?: boolean;
}
