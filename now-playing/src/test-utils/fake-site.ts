/**
 * In-process stand-in for the upstream site, used by tests in place of
 * the network.
 */

import type { SiteConfig } from "../config/types.js";
import type { FetchLike } from "../fetch/page-fetcher.js";
import { channelUrl, directoryUrl } from "../fetch/urls.js";

export const TEST_SITE: SiteConfig = {
  baseUrl: "https://radio.test",
  directoryPath: "/",
  channelPath: "/?channel={id}",
};

export interface FakeRoute {
  body?: string;
  /** Response status, default 200 */
  status?: number;
  /** Milliseconds before the response arrives */
  delayMs?: number;
  /** Reject like a connection failure with this message */
  error?: string;
}

export interface FakeRequest {
  url: string;
  headers: Headers;
}

export interface FakeFetch {
  fetch: FetchLike;
  /** Every request made, in call order */
  requests: FakeRequest[];
  /** Highest number of requests in flight at once */
  maxInFlight(): number;
}

/**
 * Fetch replacement serving `routes` by exact URL. Unknown URLs answer 404.
 * Honours the request's abort signal the way fetch does. Routes are read
 * at request time, so tests may change them between calls.
 */
export function createFakeFetch(routes: Record<string, FakeRoute>): FakeFetch {
  const requests: FakeRequest[] = [];
  let inFlight = 0;
  let peak = 0;

  const fetch: FetchLike = (url, init) => {
    requests.push({ url, headers: new Headers(init?.headers) });
    const route: FakeRoute | undefined = routes[url];
    const signal = init?.signal ?? null;

    inFlight++;
    peak = Math.max(peak, inFlight);

    return new Promise<Response>((resolve, reject) => {
      const settle = (): void => {
        inFlight--;
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
      };

      const onAbort = (): void => {
        settle();
        const error = new Error("This operation was aborted");
        error.name = "AbortError";
        reject(error);
      };

      const respond = (): void => {
        settle();
        if (!route) {
          resolve(new Response("Not Found", { status: 404, statusText: "Not Found" }));
        } else if (route.error) {
          reject(new TypeError(route.error));
        } else {
          resolve(new Response(route.body ?? "", { status: route.status ?? 200 }));
        }
      };

      const timer = setTimeout(respond, route?.delayMs ?? 0);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  };

  return { fetch, requests, maxInFlight: () => peak };
}

/** Directory page listing the given (name, identifier) pairs */
export function directoryPage(channels: Array<[name: string, identifier: string]>): string {
  const options = channels
    .map(([name, identifier]) => `      <option value="${identifier}">${name}</option>`)
    .join("\n");
  return `<html>
  <body>
    <select id="channel" name="channel">
      <option value="">Choose a channel...</option>
${options}
    </select>
  </body>
</html>`;
}

/** Channel page with a now-playing entry and a previous-songs list */
export function channelPage(current: string, previous: string[] = []): string {
  const items = previous.map((song) => `      <li>${song}</li>`).join("\n");
  return `<html>
  <body>
    <div id="now-playing">${current}</div>
    <ul id="previous-songs">
${items}
    </ul>
  </body>
</html>`;
}

export interface FakeChannel {
  name: string;
  identifier: string;
  current: string;
  previous?: string[];
  /** Overrides for this channel's page route (delay, status, error) */
  route?: FakeRoute;
}

/** Routes for a directory page plus one page per channel on TEST_SITE */
export function siteRoutes(channels: FakeChannel[]): Record<string, FakeRoute> {
  const routes: Record<string, FakeRoute> = {
    [directoryUrl(TEST_SITE)]: {
      body: directoryPage(channels.map((channel) => [channel.name, channel.identifier])),
    },
  };
  for (const channel of channels) {
    routes[channelUrl(TEST_SITE, channel.identifier)] = {
      body: channelPage(channel.current, channel.previous),
      ...channel.route,
    };
  }
  return routes;
}
