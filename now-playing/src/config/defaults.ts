import type { Config } from "./types.js";

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: Config = {
  site: {
    baseUrl: "https://wpn.moodmedia.com",
    directoryPath: "/",
    channelPath: "/?channel={id}",
  },
  network: {
    timeoutMs: 10_000,
    maxConcurrency: 8,
    batchDeadlineMs: null,
    userAgent: "now-playing/0.1.0",
  },
  matching: {
    delimiter: " by ",
  },
  debug: false,
};
