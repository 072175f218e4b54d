/**
 * HTTP GET of upstream pages, one at a time or as a bounded concurrent batch.
 * Failures are returned as values, never thrown, so one bad page cannot
 * abort a batch. No retries happen here.
 */

import pLimit from "p-limit";
import type { FetchFailure } from "../errors.js";
import { logger } from "../utils/logger.js";

/** The part of the fetch API this module needs */
export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export type FetchOutcome =
  | { ok: true; url: string; body: string }
  | { ok: false; url: string; failure: FetchFailure };

export interface PageFetcherOptions {
  /** Per-request timeout in milliseconds */
  timeoutMs: number;
  /** Maximum requests in flight during fetchMany */
  maxConcurrency: number;
  userAgent?: string;
  /** Replaces the global fetch (tests use an in-process stand-in) */
  fetch?: FetchLike;
}

export interface FetchManyOptions {
  /**
   * Deadline for the whole batch in milliseconds. Requests still running
   * or not yet started when it passes are reported as timeouts.
   */
  deadlineMs?: number | null;
}

export class PageFetcher {
  private readonly fetchImpl: FetchLike;
  private readonly headers: Record<string, string>;

  constructor(private readonly options: PageFetcherOptions) {
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.headers = {
      Accept: "text/html",
      ...(options.userAgent ? { "User-Agent": options.userAgent } : {}),
    };
  }

  /**
   * GET a single page.
   *
   * @param signal Aborting it ends the request as a timeout (used for batch deadlines)
   */
  async fetchOne(url: string, signal?: AbortSignal): Promise<FetchOutcome> {
    if (signal?.aborted) {
      return timeoutOutcome(url, "batch deadline passed before the request started");
    }

    // Both the per-request timer and the batch deadline abort with a reason;
    // any abort is reported as a timeout.
    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(`no response within ${this.options.timeoutMs}ms`),
      this.options.timeoutMs
    );
    const onDeadline = (): void => controller.abort("batch deadline passed");
    signal?.addEventListener("abort", onDeadline, { once: true });

    logger.logRequest("GET", url, this.headers);

    try {
      const response = await this.fetchImpl(url, {
        headers: this.headers,
        signal: controller.signal,
      });

      if (!response.ok) {
        return {
          ok: false,
          url,
          failure: {
            kind: "http-status",
            status: response.status,
            message: `HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ""}`,
          },
        };
      }

      const body = await response.text();
      logger.debug(`GET ${url} -> ${response.status} (${body.length} chars)`);
      return { ok: true, url, body };
    } catch (error) {
      if (controller.signal.aborted) {
        return timeoutOutcome(url, String(controller.signal.reason));
      }
      return {
        ok: false,
        url,
        failure: {
          kind: "network",
          message: error instanceof Error ? error.message : String(error),
        },
      };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onDeadline);
    }
  }

  /**
   * GET many pages with at most `maxConcurrency` requests in flight.
   * The result has one outcome per input URL, in input order.
   */
  async fetchMany(urls: readonly string[], options: FetchManyOptions = {}): Promise<FetchOutcome[]> {
    const limit = pLimit(this.options.maxConcurrency);
    const batch = new AbortController();
    const deadline =
      options.deadlineMs !== undefined && options.deadlineMs !== null
        ? setTimeout(() => batch.abort(), options.deadlineMs)
        : undefined;

    // Each slot is written exactly once by the task that owns its index
    const outcomes = new Array<FetchOutcome>(urls.length);

    logger.debug(`Fetching ${urls.length} pages (max ${this.options.maxConcurrency} at a time)`);

    try {
      await Promise.all(
        urls.map((url, index) =>
          limit(async () => {
            outcomes[index] = await this.fetchOne(url, batch.signal);
          })
        )
      );
    } finally {
      clearTimeout(deadline);
    }

    return outcomes;
  }
}

function timeoutOutcome(url: string, message: string): FetchOutcome {
  return { ok: false, url, failure: { kind: "timeout", message } };
}
