import { describe, it, expect } from "vitest";
import { SongAggregator } from "./song-aggregator.js";
import { ChannelCatalog } from "../catalog/channel-catalog.js";
import { FetchError, ParseError } from "../errors.js";
import { PageFetcher } from "../fetch/page-fetcher.js";
import { channelUrl } from "../fetch/urls.js";
import {
  TEST_SITE,
  createFakeFetch,
  siteRoutes,
  type FakeChannel,
  type FakeRoute,
} from "../test-utils/fake-site.js";

const CHANNELS: FakeChannel[] = [
  {
    name: "Smooth Jazz",
    identifier: "jazz",
    current: "Blue in Green by Miles Davis",
    previous: ["So What by Miles Davis", "Naima by John Coltrane"],
  },
  {
    name: "Classic Rock",
    identifier: "rock",
    current: "Hotel California by Eagles",
    previous: ["Layla by Derek and the Dominos"],
  },
  {
    name: "Pop Hits",
    identifier: "pop",
    current: "Dancing Queen by ABBA",
    previous: [],
  },
];

function makeAggregator(
  routes: Record<string, FakeRoute>,
  options: { timeoutMs?: number; batchDeadlineMs?: number | null } = {}
) {
  const fake = createFakeFetch(routes);
  const fetcher = new PageFetcher({
    timeoutMs: options.timeoutMs ?? 1000,
    maxConcurrency: 4,
    fetch: fake.fetch,
  });
  const catalog = new ChannelCatalog(fetcher, TEST_SITE);
  const aggregator = new SongAggregator(catalog, fetcher, {
    site: TEST_SITE,
    delimiter: " by ",
    batchDeadlineMs: options.batchDeadlineMs,
  });
  return { fake, catalog, aggregator };
}

describe("SongAggregator single channel", () => {
  it("reads the current song", async () => {
    const { catalog, aggregator } = makeAggregator(siteRoutes(CHANNELS));
    const jazz = await catalog.resolve({ kind: "name", name: "Smooth Jazz" });

    expect(await aggregator.currentSong(jazz)).toEqual({
      title: "Blue in Green",
      artist: "Miles Davis",
    });
  });

  it("reads previous songs", async () => {
    const { catalog, aggregator } = makeAggregator(siteRoutes(CHANNELS));
    const jazz = await catalog.resolve({ kind: "index", index: 0 });

    expect(await aggregator.previousSongs(jazz)).toEqual([
      { title: "So What", artist: "Miles Davis" },
      { title: "Naima", artist: "John Coltrane" },
    ]);
  });

  it("lists the current song followed by previous songs", async () => {
    const { catalog, aggregator } = makeAggregator(siteRoutes(CHANNELS));
    const rock = await catalog.resolve({ kind: "index", index: 1 });

    const all = await aggregator.allSongs(rock);
    const current = await aggregator.currentSong(rock);
    const previous = await aggregator.previousSongs(rock);

    expect(all).toEqual([current, ...previous]);
    expect(all).toEqual([
      { title: "Hotel California", artist: "Eagles" },
      { title: "Layla", artist: "Derek and the Dominos" },
    ]);
  });

  it("fetches the channel page once per call", async () => {
    const { fake, catalog, aggregator } = makeAggregator(siteRoutes(CHANNELS));
    const pop = await catalog.resolve({ kind: "index", index: 2 });

    await aggregator.allSongs(pop);

    const pageUrl = channelUrl(TEST_SITE, "pop");
    expect(fake.requests.filter((r) => r.url === pageUrl)).toHaveLength(1);
  });

  it("throws FetchError when the channel page fails", async () => {
    const routes = siteRoutes(CHANNELS);
    routes[channelUrl(TEST_SITE, "rock")] = { status: 500 };
    const { catalog, aggregator } = makeAggregator(routes);
    const rock = await catalog.resolve({ kind: "index", index: 1 });

    await expect(aggregator.currentSong(rock)).rejects.toThrow(FetchError);
    await expect(aggregator.currentSong(rock)).rejects.toMatchObject({
      failure: { kind: "http-status", status: 500 },
    });
  });

  it("throws ParseError when the channel page layout is wrong", async () => {
    const routes = siteRoutes(CHANNELS);
    routes[channelUrl(TEST_SITE, "rock")] = { body: "<p>Coming soon</p>" };
    const { catalog, aggregator } = makeAggregator(routes);
    const rock = await catalog.resolve({ kind: "index", index: 1 });

    await expect(aggregator.previousSongs(rock)).rejects.toThrow(ParseError);
  });
});

describe("SongAggregator.allChannelsData", () => {
  it("builds a corpus keyed by identifier in directory order", async () => {
    const { aggregator } = makeAggregator(siteRoutes(CHANNELS));

    const { corpus, failures } = await aggregator.allChannelsData();

    expect([...corpus.keys()]).toEqual(["jazz", "rock", "pop"]);
    expect(failures).toEqual([]);
    expect(corpus.get("pop")).toEqual({
      channel: { name: "Pop Hits", identifier: "pop", index: 2 },
      current: { title: "Dancing Queen", artist: "ABBA" },
      previous: [],
    });
  });

  it("keeps the channels that answered when one times out", async () => {
    const channels: FakeChannel[] = CHANNELS.map((channel) =>
      channel.identifier === "pop" ? { ...channel, route: { delayMs: 500 } } : channel
    );
    const { aggregator } = makeAggregator(siteRoutes(channels), { timeoutMs: 50 });

    const { corpus, failures } = await aggregator.allChannelsData();

    expect([...corpus.keys()]).toEqual(["jazz", "rock"]);
    expect(failures).toHaveLength(1);
    expect(failures[0].channel.identifier).toBe("pop");
    expect(failures[0].error).toBeInstanceOf(FetchError);
    expect(failures[0].error).toMatchObject({ failure: { kind: "timeout" } });
  });

  it("reports channels still loading at the batch deadline", async () => {
    const channels: FakeChannel[] = CHANNELS.map((channel) =>
      channel.identifier === "jazz" ? { ...channel, route: { delayMs: 1000 } } : channel
    );
    const { aggregator } = makeAggregator(siteRoutes(channels), { batchDeadlineMs: 50 });

    const { corpus, failures } = await aggregator.allChannelsData();

    expect([...corpus.keys()]).toEqual(["rock", "pop"]);
    expect(failures.map((f) => f.channel.identifier)).toEqual(["jazz"]);
    expect(failures[0].error.message).toBe(
      "Request to https://radio.test/?channel=jazz failed: batch deadline passed"
    );
  });

  it("records parse failures without dropping other channels", async () => {
    const routes = siteRoutes(CHANNELS);
    routes[channelUrl(TEST_SITE, "jazz")] = { body: "<html><body>Maintenance</body></html>" };
    routes[channelUrl(TEST_SITE, "rock")] = { error: "read ECONNRESET" };
    const { aggregator } = makeAggregator(routes);

    const { corpus, failures } = await aggregator.allChannelsData();

    expect([...corpus.keys()]).toEqual(["pop"]);
    expect(failures.map((f) => f.channel.identifier)).toEqual(["jazz", "rock"]);
    expect(failures[0].error).toBeInstanceOf(ParseError);
    expect(failures[1].error).toMatchObject({ failure: { kind: "network", message: "read ECONNRESET" } });
  });

  it("keeps the first of two channels sharing an identifier", async () => {
    const channels: FakeChannel[] = [
      { name: "Jazz", identifier: "x", current: "So What by Miles Davis" },
      { name: "Jazz HD", identifier: "x", current: "So What by Miles Davis" },
      { name: "Rock", identifier: "r", current: "Layla by Derek and the Dominos" },
    ];
    const { catalog, aggregator } = makeAggregator(siteRoutes(channels));

    const { corpus, failures } = await aggregator.allChannelsData();

    expect((await catalog.list()).map((c) => c.name)).toEqual(["Jazz", "Rock"]);
    expect([...corpus.values()].map((entry) => entry.channel.name)).toEqual(["Jazz", "Rock"]);
    expect(failures).toEqual([]);
  });

  it("returns a fresh corpus on every call", async () => {
    const { aggregator } = makeAggregator(siteRoutes(CHANNELS));

    const first = await aggregator.allChannelsData();
    const second = await aggregator.allChannelsData();

    expect(second.corpus).not.toBe(first.corpus);
    expect(second.corpus).toEqual(first.corpus);
  });
});
