import { describe, it, expect } from "vitest";
import {
  UNRANKED,
  arrangeGroup,
  buildGroups,
  classOf,
  selectPrimaryIndex,
} from "../channels/grouper";
import { parseM3U } from "../sync/m3u-parser";
import { entry, record } from "./fakes";

describe("classOf", () => {
  it.each([
    ["https://cdn.example/live.m3u8", 1],
    ["https://1.2.3.4/live", 1],
    ["http://cdn.example/live", 2],
    ["http://1.2.3.4:8080/live", 2],
    ["https://[2001:db8::1]/live", 3],
    ["http://[2001:db8::1]:8000/live", 4],
  ])("%s is class %i", (endpoint, expected) => {
    expect(classOf(endpoint)).toBe(expected);
  });

  it("leaves other schemes and garbage unranked", () => {
    expect(classOf("rtmp://cdn.example/live")).toBe(UNRANKED);
    expect(classOf("httpfoo")).toBe(UNRANKED);
  });
});

describe("selectPrimaryIndex", () => {
  it("prefers https over IPv4/hostname above everything else", () => {
    const records = [
      record("http://1.2.3.4/x"),
      record("https://[2001:db8::1]/x"),
      record("https://5.6.7.8/x"),
    ];
    expect(selectPrimaryIndex(records)).toBe(2);
  });

  it("takes the first of several records in the best class", () => {
    const records = [
      record("http://[2001:db8::1]/x"),
      record("http://a.example/1"),
      record("http://b.example/2"),
    ];
    expect(selectPrimaryIndex(records)).toBe(1);
  });

  it("prefers http IPv4 over https IPv6", () => {
    expect(
      selectPrimaryIndex([record("https://[2001:db8::1]/x"), record("http://1.2.3.4/x")])
    ).toBe(1);
  });

  it("falls back to the first record when nothing ranks", () => {
    expect(selectPrimaryIndex([record("rtmp://a.example/1"), record("rtmp://b.example/2")])).toBe(0);
  });
});

describe("buildGroups", () => {
  it("groups by exact name and splits primary from overflow", () => {
    const groups = buildGroups([
      entry("News", "http://1.2.3.4/news", 0),
      entry("Sports", "http://a.example/sports", 1),
      entry("News", "https://[2001:db8::1]/news", 2),
      entry("News", "https://news.example/live", 3),
    ]);

    expect([...groups.keys()]).toEqual(["News", "Sports"]);
    const news = groups.get("News");
    expect(news?.primary.endpoint).toBe("https://news.example/live");
    expect(news?.overflow.map((r) => r.endpoint)).toEqual([
      "http://1.2.3.4/news",
      "https://[2001:db8::1]/news",
    ]);
    expect(groups.get("Sports")?.overflow).toEqual([]);
  });

  it("does not merge names that differ only in case or spacing", () => {
    const groups = buildGroups([
      entry("News", "http://a.example/1", 0),
      entry("news", "http://a.example/2", 1),
      entry("News ", "http://a.example/3", 2),
    ]);
    expect(groups.size).toBe(3);
  });

  it("ignores entries without an endpoint", () => {
    const groups = buildGroups([entry("Empty", "", 0)]);
    expect(groups.size).toBe(0);
  });

  it("gives the same result for the same input", () => {
    const entries = [
      entry("A", "http://a.example/1", 0),
      entry("A", "https://a.example/2", 1),
      entry("B", "http://b.example/1", 2),
    ];
    expect(buildGroups(entries)).toEqual(buildGroups(entries));
  });

  it("groups a parsed manifest end to end", () => {
    const manifest = [
      "#EXTM3U",
      '#EXTINF:-1 tvg-id="1" group-title="News",Channel A',
      "http://1.2.3.4/a",
      "#EXTINF:-1,Channel A",
      "https://[2001:db8::1]/a",
      "",
    ].join("\n");
    const source = "https://lists.example/a.m3u";

    const groups = buildGroups(parseM3U(manifest, source).entries);

    expect(groups.get("Channel A")).toEqual({
      channelName: "Channel A",
      primary: {
        sourceManifest: source,
        endpoint: "http://1.2.3.4/a",
        attributes: { "tvg-id": "1", "group-title": "News" },
      },
      overflow: [
        { sourceManifest: source, endpoint: "https://[2001:db8::1]/a", attributes: {} },
      ],
    });
  });
});

describe("arrangeGroup", () => {
  it("refuses an empty member list", () => {
    expect(() => arrangeGroup("Nothing", [])).toThrow(/empty group/);
  });
});
