import { describe, it, expect } from "vitest";
import { ChannelCatalog } from "./channel-catalog.js";
import { ChannelNotFoundError, FetchError, ParseError } from "../errors.js";
import { PageFetcher } from "../fetch/page-fetcher.js";
import { directoryUrl } from "../fetch/urls.js";
import { parseChannelRef } from "../types.js";
import {
  TEST_SITE,
  createFakeFetch,
  directoryPage,
  type FakeRoute,
} from "../test-utils/fake-site.js";

const DIRECTORY_URL = directoryUrl(TEST_SITE);

const DIRECTORY = directoryPage([
  ["Smooth Jazz", "jazz"],
  ["Classic Rock", "rock"],
  ["Pop Hits", "pop"],
]);

function makeCatalog(routes: Record<string, FakeRoute>) {
  const fake = createFakeFetch(routes);
  const fetcher = new PageFetcher({ timeoutMs: 1000, maxConcurrency: 4, fetch: fake.fetch });
  return { fake, catalog: new ChannelCatalog(fetcher, TEST_SITE) };
}

describe("ChannelCatalog.list", () => {
  it("returns channels in directory order with their index", async () => {
    const { catalog } = makeCatalog({ [DIRECTORY_URL]: { body: DIRECTORY } });

    expect(await catalog.list()).toEqual([
      { name: "Smooth Jazz", identifier: "jazz", index: 0 },
      { name: "Classic Rock", identifier: "rock", index: 1 },
      { name: "Pop Hits", identifier: "pop", index: 2 },
    ]);
  });

  it("returns frozen channels", async () => {
    const { catalog } = makeCatalog({ [DIRECTORY_URL]: { body: DIRECTORY } });

    const channels = await catalog.list();

    expect(Object.isFrozen(channels)).toBe(true);
    expect(Object.isFrozen(channels[0])).toBe(true);
  });

  it("fetches the directory once and reuses it", async () => {
    const { fake, catalog } = makeCatalog({ [DIRECTORY_URL]: { body: DIRECTORY } });

    const first = await catalog.list();
    const second = await catalog.list();

    expect(second).toBe(first);
    expect(fake.requests).toHaveLength(1);
  });

  it("shares one directory request between concurrent first callers", async () => {
    const { fake, catalog } = makeCatalog({ [DIRECTORY_URL]: { body: DIRECTORY, delayMs: 20 } });

    const results = await Promise.all([catalog.list(), catalog.list(), catalog.list()]);

    expect(fake.requests).toHaveLength(1);
    expect(results[1]).toBe(results[0]);
    expect(results[2]).toBe(results[0]);
  });

  it("does not cache a failed load", async () => {
    const routes: Record<string, FakeRoute> = { [DIRECTORY_URL]: { status: 502 } };
    const { fake, catalog } = makeCatalog(routes);

    await expect(catalog.list()).rejects.toThrow(FetchError);

    routes[DIRECTORY_URL] = { body: DIRECTORY };
    const channels = await catalog.list();

    expect(channels).toHaveLength(3);
    expect(fake.requests).toHaveLength(2);
  });

  it("rejects every concurrent caller when the shared load fails", async () => {
    const { fake, catalog } = makeCatalog({ [DIRECTORY_URL]: { error: "getaddrinfo ENOTFOUND", delayMs: 10 } });

    const results = await Promise.allSettled([catalog.list(), catalog.list()]);

    expect(results.map((r) => r.status)).toEqual(["rejected", "rejected"]);
    expect(fake.requests).toHaveLength(1);
  });

  it("throws ParseError when the directory markup is missing", async () => {
    const { catalog } = makeCatalog({ [DIRECTORY_URL]: { body: "<html><body></body></html>" } });

    await expect(catalog.list()).rejects.toThrow(ParseError);
  });
});

describe("ChannelCatalog.resolve", () => {
  it("returns the identical channel by name and by index", async () => {
    const { catalog } = makeCatalog({ [DIRECTORY_URL]: { body: DIRECTORY } });

    const byName = await catalog.resolve({ kind: "name", name: "Classic Rock" });
    const byIndex = await catalog.resolve({ kind: "index", index: 1 });

    expect(byName).toBe(byIndex);
    expect(byName.identifier).toBe("rock");
  });

  it("matches names case-insensitively after trimming", async () => {
    const { catalog } = makeCatalog({ [DIRECTORY_URL]: { body: DIRECTORY } });

    const channel = await catalog.resolve(parseChannelRef("  smooth JAZZ "));

    expect(channel.identifier).toBe("jazz");
  });

  it("resolves all-digit input as an index", async () => {
    const { catalog } = makeCatalog({ [DIRECTORY_URL]: { body: DIRECTORY } });

    const channel = await catalog.resolve(parseChannelRef("2"));

    expect(channel.name).toBe("Pop Hits");
  });

  it("throws ChannelNotFoundError for an unknown name", async () => {
    const { catalog } = makeCatalog({ [DIRECTORY_URL]: { body: DIRECTORY } });

    await expect(catalog.resolve({ kind: "name", name: "Polka" })).rejects.toThrow(
      new ChannelNotFoundError({ kind: "name", name: "Polka" }, 3)
    );
    await expect(catalog.resolve({ kind: "name", name: "Polka" })).rejects.toThrow(
      'No channel named "Polka"'
    );
  });

  it("throws ChannelNotFoundError for an index out of range", async () => {
    const { catalog } = makeCatalog({ [DIRECTORY_URL]: { body: DIRECTORY } });

    await expect(catalog.resolve({ kind: "index", index: 3 })).rejects.toThrow(
      "No channel at index 3 (valid range 0-2)"
    );
    await expect(catalog.resolve({ kind: "index", index: -1 })).rejects.toThrow(ChannelNotFoundError);
    await expect(catalog.resolve({ kind: "index", index: 1.5 })).rejects.toThrow(ChannelNotFoundError);
  });

  it("reports an empty directory", async () => {
    const { catalog } = makeCatalog({ [DIRECTORY_URL]: { body: directoryPage([]) } });

    await expect(catalog.resolve({ kind: "index", index: 0 })).rejects.toThrow(
      "No channel at index 0 (directory is empty)"
    );
  });
});
