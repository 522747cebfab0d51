import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadFeeds, loadSettings, mergeFeedSpecs, parseFeedsDocument, saveFeeds } from "../src/config.js";
import { ConfigError } from "../src/core/errors.js";

describe("parseFeedsDocument", () => {
  it("drops entries without a usable url and defaults the name", () => {
    const feeds = parseFeedsDocument({
      feeds: [
        { name: "Good", url: "https://good.example.com/rss" },
        { name: "No url" },
        { name: "Bad url", url: "not a url" },
        "just a string",
        { url: "https://nameless.example.com/atom" },
      ],
    });
    expect(feeds).toEqual([
      { name: "Good", url: "https://good.example.com/rss" },
      { name: "https://nameless.example.com/atom", url: "https://nameless.example.com/atom" },
    ]);
  });

  it("keeps the first entry for a repeated url", () => {
    const feeds = parseFeedsDocument({
      feeds: [
        { name: "One", url: "https://same.example.com/rss" },
        { name: "Two", url: "https://same.example.com/rss" },
      ],
    });
    expect(feeds).toEqual([{ name: "One", url: "https://same.example.com/rss" }]);
  });

  it("treats a missing feeds array as empty", () => {
    expect(parseFeedsDocument({})).toEqual([]);
  });

  it("rejects a document that is not an object", () => {
    expect(() => parseFeedsDocument([1, 2])).toThrow(ConfigError);
  });
});

describe("mergeFeedSpecs", () => {
  it("appends new urls and keeps existing entries as they are", () => {
    const existing = [{ name: "Mine", url: "https://a.example.com/rss" }];
    const incoming = [
      { name: "Theirs", url: "https://a.example.com/rss" },
      { name: "New", url: "https://b.example.com/rss" },
    ];
    expect(mergeFeedSpecs(existing, incoming)).toEqual([
      { name: "Mine", url: "https://a.example.com/rss" },
      { name: "New", url: "https://b.example.com/rss" },
    ]);
  });
});

describe("loadFeeds / saveFeeds", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "tidefeed-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads the first existing candidate", async () => {
    const missing = join(dir, "missing.json");
    const present = join(dir, "config.json");
    await saveFeeds(present, [{ name: "A", url: "https://a.example.com/rss" }]);

    const loaded = await loadFeeds([missing, present]);
    expect(loaded).toEqual({ path: present, feeds: [{ name: "A", url: "https://a.example.com/rss" }] });
  });

  it("raises ConfigError when no candidate exists", async () => {
    await expect(loadFeeds([join(dir, "nope.json")])).rejects.toBeInstanceOf(ConfigError);
  });

  it("raises ConfigError for invalid JSON", async () => {
    const path = join(dir, "config.json");
    await writeFile(path, "{ feeds: ");
    await expect(loadFeeds([path])).rejects.toThrow(/Cannot read feed list/);
  });
});

describe("loadSettings", () => {
  it("applies defaults", () => {
    const s = loadSettings({ TIDEFEED_CACHE_DIR: "/tmp/tidefeed-cache" });
    expect(s).toMatchObject({
      cacheDir: "/tmp/tidefeed-cache",
      cacheTtlMs: 15 * 60_000,
      concurrency: 8,
      fetchTimeoutMs: 10_000,
      runTimeoutMs: 45_000,
      retries: 1,
      retryDelayMs: 1000,
      maxItemAgeHours: 24,
    });
    expect(s.feedListPaths).toHaveLength(2);
    expect(s.databaseUrl).toBeUndefined();
  });

  it("reads overrides from the environment", () => {
    const s = loadSettings({
      TIDEFEED_CONFIG: "/etc/tidefeed/feeds.json",
      TIDEFEED_CACHE_TTL_MINUTES: "30",
      TIDEFEED_CONCURRENCY: "4",
      TIDEFEED_MAX_ITEM_AGE_HOURS: "0",
    });
    expect(s.feedListPaths).toEqual(["/etc/tidefeed/feeds.json"]);
    expect(s.cacheTtlMs).toBe(30 * 60_000);
    expect(s.concurrency).toBe(4);
    expect(s.maxItemAgeHours).toBe(0);
  });

  it("rejects out-of-range values", () => {
    expect(() => loadSettings({ TIDEFEED_CONCURRENCY: "0" })).toThrow(ConfigError);
  });
});
