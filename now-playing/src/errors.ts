import type { Channel, ChannelRef } from "./types.js";
import { describeChannelRef } from "./types.js";

/** Why a single page request failed */
export type FetchFailure =
  | { kind: "timeout"; message: string }
  | { kind: "http-status"; status: number; message: string }
  | { kind: "network"; message: string };

/** Base class for every error raised by now-playing */
export class NowPlayingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NowPlayingError";
  }
}

export class FetchError extends NowPlayingError {
  constructor(
    public url: string,
    public failure: FetchFailure
  ) {
    super(`Request to ${url} failed: ${failure.message}`);
    this.name = "FetchError";
  }
}

/** Expected markup was not found; usually means the site layout changed */
export class ParseError extends NowPlayingError {
  constructor(message: string) {
    super(message);
    this.name = "ParseError";
  }
}

export class ChannelNotFoundError extends NowPlayingError {
  constructor(
    public ref: ChannelRef,
    public channelCount: number
  ) {
    let message = `No channel named ${describeChannelRef(ref)}`;
    if (ref.kind === "index") {
      message =
        channelCount > 0
          ? `No channel at index ${ref.index} (valid range 0-${channelCount - 1})`
          : `No channel at index ${ref.index} (directory is empty)`;
    }
    super(message);
    this.name = "ChannelNotFoundError";
  }
}

export class InvalidQueryError extends NowPlayingError {
  constructor(message = "Query must contain at least one non-whitespace character") {
    super(message);
    this.name = "InvalidQueryError";
  }
}

export class ConfigError extends NowPlayingError {
  constructor(message: string) {
    super(`Configuration error: ${message}`);
    this.name = "ConfigError";
  }
}

/** A channel left out of a corpus, and why */
export interface ChannelFailure {
  channel: Channel;
  error: FetchError | ParseError;
}
