import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { importFromOpml, importOpmlIntoFeedList } from "../src/importers/index.js";
import { mergeFeedSpecs } from "../src/config.js";
import { ConfigError } from "../src/core/errors.js";

const OPML = `<?xml version="1.0" encoding="UTF-8"?>
<opml version="2.0">
  <head><title>Subscriptions</title></head>
  <body>
    <outline text="Tech" title="Tech">
      <outline type="rss" text="Alpha Blog" title="Alpha Blog" xmlUrl="https://alpha.example.com/feed.xml" htmlUrl="https://alpha.example.com/"/>
      <outline type="rss" text="Tom &amp; Jerry" xmlUrl="https://tj.example.com/rss?a=1&amp;b=2"/>
    </outline>
    <outline type='rss' title='Single Quoted' xmlurl='https://single.example.com/atom'/>
    <outline type="rss" xmlUrl="https://untitled.example.com/rss"/>
    <outline type="rss" title="Relative" xmlUrl="feed.xml"/>
    <outline type="rss" title="Mail" xmlUrl="mailto:someone@example.com"/>
    <outline type="rss" title="No url"/>
    <!-- <outline type="rss" title="Commented" xmlUrl="https://commented.example.com/rss"/> -->
    <outline type="link" title="Plain url attr" url="https://plain.example.com/index.xml"/>
    <outline title="Greater &gt; than" xmlUrl="https://gt.example.com/rss" description="a > b"/>
  </body>
</opml>`;

describe("importFromOpml", () => {
  it("extracts every outline with a usable feed url", () => {
    expect(importFromOpml(OPML)).toEqual([
      { name: "Alpha Blog", url: "https://alpha.example.com/feed.xml" },
      { name: "Tom & Jerry", url: "https://tj.example.com/rss?a=1&b=2" },
      { name: "Single Quoted", url: "https://single.example.com/atom" },
      { name: "https://untitled.example.com/rss", url: "https://untitled.example.com/rss" },
      { name: "Plain url attr", url: "https://plain.example.com/index.xml" },
      { name: "Greater > than", url: "https://gt.example.com/rss" },
    ]);
  });

  it("accepts raw bytes", () => {
    expect(importFromOpml(Buffer.from(OPML, "utf-8"))).toHaveLength(6);
  });

  it("leaves out-of-range character references undecoded", () => {
    const doc = `<opml><body>
      <outline title="Bad &#99999999; &#x110000;" xmlUrl="https://bad.example.com/rss"/>
      <outline title="Good &#x263A;" xmlUrl="https://good.example.com/rss"/>
    </body></opml>`;
    expect(importFromOpml(doc)).toEqual([
      { name: "Bad &#99999999; &#x110000;", url: "https://bad.example.com/rss" },
      { name: "Good \u263A", url: "https://good.example.com/rss" },
    ]);
  });

  it("returns nothing for a document without outlines", () => {
    expect(importFromOpml("<opml><body></body></opml>")).toEqual([]);
    expect(importFromOpml("not even xml")).toEqual([]);
  });

  it("imports the same document twice without duplicates through a url-keyed writer", () => {
    const once = mergeFeedSpecs([], importFromOpml(OPML));
    const twice = mergeFeedSpecs(once, importFromOpml(OPML));
    expect(twice).toEqual(once);
    expect(new Set(twice.map((s) => s.url)).size).toBe(twice.length);
  });
});

describe("importOpmlIntoFeedList", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "tidefeed-opml-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("creates the feed list and is idempotent on re-import", async () => {
    const target = join(dir, "nested", "config.json");

    const first = await importOpmlIntoFeedList(OPML, [target]);
    expect(first).toMatchObject({ path: target, added: 6, total: 6 });

    const second = await importOpmlIntoFeedList(OPML, [target]);
    expect(second).toMatchObject({ path: target, added: 0, total: 6 });

    const saved = JSON.parse(await readFile(target, "utf-8"));
    expect(saved.feeds).toHaveLength(6);
    expect(saved.feeds[0]).toEqual({ name: "Alpha Blog", url: "https://alpha.example.com/feed.xml" });
  });

  it("refuses a document with no usable feeds", async () => {
    await expect(importOpmlIntoFeedList("<opml/>", [join(dir, "config.json")])).rejects.toBeInstanceOf(ConfigError);
  });
});
