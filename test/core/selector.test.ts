import { describe, it, expect } from "vitest";
import type { RawTag } from "../../src/core/evaluator.js";
import { defaultSelectionOptions, emptyGroup } from "../../src/core/query.js";
import { selectMedia, selectMediaDetailed, shuffle, type MediaItem } from "../../src/core/selector.js";
import { filter, group } from "../helpers/tags.js";

function item(id: string, updatedAt: number, extra: Partial<MediaItem> = {}): MediaItem {
  return { id, title: id, mediaType: "playlist", provider: "spotify", updatedAt, ...extra };
}

function rawTags(record: Record<string, string[]>): RawTag[] {
  return Object.entries(record).flatMap(([category, values]) => values.map(value => ({ category, value })));
}

const calm = group({ allOf: [filter("mood", "calm")] });

describe("selectMediaDetailed", () => {
  it("orders strict matches by most recent update", () => {
    const items = [item("a", 1), item("b", 3), item("c", 2)];
    const tags = items.map(() => rawTags({ mood: ["calm"] }));

    const result = selectMediaDetailed(items, tags, calm, defaultSelectionOptions());

    expect(result.items.map(i => i.id)).toEqual(["b", "c", "a"]);
    expect(result.phase).toBe("strict");
    expect(result.strictMatches).toBe(3);
    expect(result.considered).toBe(3);
  });

  it("breaks recency ties by title and then id", () => {
    const items = [
      item("2", 5, { title: "Beta" }),
      item("3", 5, { title: "alpha" }),
      item("1", 5, { title: "Alpha" })
    ];
    const tags = items.map(() => rawTags({ mood: ["calm"] }));

    expect(selectMedia(items, tags, calm, defaultSelectionOptions()).map(i => i.id)).toEqual(["1", "3", "2"]);
  });

  it("shuffles strict matches with the given random source", () => {
    const items = [item("a", 1), item("b", 3), item("c", 2)];
    const tags = items.map(() => rawTags({ mood: ["calm"] }));

    const result = selectMedia(items, tags, calm, defaultSelectionOptions({ random: true, rng: () => 0 }));

    expect(result.map(i => i.id)).toEqual(["b", "c", "a"]);
  });

  it("applies hard filters before tag matching", () => {
    const items = [
      item("pl", 4),
      item("radio", 3, { mediaType: "radio", provider: "tunein" }),
      item("book", 2, { mediaType: "audiobook", provider: "local", title: "Le Petit Prince", description: "Conte lu pour le coucher" }),
      item("old", 9, { active: false }),
      item("skip", 8)
    ];
    const tags = items.map(() => rawTags({ mood: ["calm"] }));
    const run = (overrides: Parameters<typeof defaultSelectionOptions>[0]) =>
      selectMedia(items, tags, calm, defaultSelectionOptions(overrides)).map(i => i.id);

    expect(run({})).toEqual(["skip", "pl", "radio", "book"]);
    expect(run({ excludeIds: new Set(["skip"]) })).toEqual(["pl", "radio", "book"]);
    expect(run({ hardFilters: { mediaType: "Radio" } })).toEqual(["radio"]);
    expect(run({ hardFilters: { provider: "LOCAL" } })).toEqual(["book"]);
    expect(run({ hardFilters: { search: "coucher" } })).toEqual(["book"]);
    expect(run({ hardFilters: { search: "PETIT" } })).toEqual(["book"]);
  });

  it("reports an empty result without fallback", () => {
    const items = [item("a", 1)];
    const result = selectMediaDetailed(
      items,
      [rawTags({ owner: ["papa"] })],
      group({ allOf: [filter("owner", "papa"), filter("mood", "sleepy")] }),
      defaultSelectionOptions()
    );

    expect(result.items).toEqual([]);
    expect(result.phase).toBe("empty");
    expect(result.strictMatches).toBe(0);
  });

  it("fills from stricter relaxation levels first under force", () => {
    const items = [item("without", 9), item("with", 1)];
    const tags = [rawTags({ owner: ["papa"] }), rawTags({ owner: ["papa"], mood: ["calm"] })];
    const query = group({ allOf: [filter("owner", "papa"), filter("mood", "calm"), filter("context", "evening")] });

    const result = selectMediaDetailed(items, tags, query, defaultSelectionOptions({ fallback: "force" }), [
      "owner",
      "mood",
      "context"
    ]);

    expect(result.items.map(i => i.id)).toEqual(["with", "without"]);
    expect(result.phase).toBe("fallback");
  });

  it("stops at the first non-empty level under aggressive", () => {
    const items = [item("without", 9), item("with", 1)];
    const tags = [rawTags({ owner: ["papa"] }), rawTags({ owner: ["papa"], mood: ["calm"] })];
    const query = group({ allOf: [filter("owner", "papa"), filter("mood", "calm"), filter("context", "evening")] });

    const result = selectMedia(items, tags, query, defaultSelectionOptions({ fallback: "aggressive" }));

    expect(result.map(i => i.id)).toEqual(["with"]);
  });

  it("keeps hard filters during fallback", () => {
    const items = [item("radio", 9, { mediaType: "radio" }), item("pl", 1)];
    const tags = [rawTags({ owner: ["papa"] }), rawTags({ owner: ["papa"] })];
    const query = group({ allOf: [filter("owner", "papa"), filter("mood", "sleepy")] });

    const result = selectMedia(
      items,
      tags,
      query,
      defaultSelectionOptions({ fallback: "soft", hardFilters: { mediaType: "playlist" } })
    );

    expect(result.map(i => i.id)).toEqual(["pl"]);
  });

  it("returns at least one item when the limit is below one", () => {
    const items = [item("a", 1), item("b", 2)];
    const tags = items.map(() => rawTags({}));

    expect(selectMedia(items, tags, emptyGroup(), defaultSelectionOptions({ limit: 0 })).map(i => i.id)).toEqual(["b"]);
  });

  it.each(["none", "force"] as const)("bounds a non-numeric limit to the default (%s)", (fallback) => {
    const items = Array.from({ length: 30 }, (_, i) => item(`i${i}`, i));
    const tags = items.map(() => rawTags({ owner: ["papa"] }));
    const query = fallback === "none"
      ? group({ allOf: [filter("owner", "papa")] })
      : group({ allOf: [filter("owner", "papa"), filter("mood", "sleepy")] });

    const result = selectMediaDetailed(items, tags, query, defaultSelectionOptions({ limit: Number.NaN, fallback }));

    expect(result.items).toHaveLength(10);
  });

  it("normalizes raw tags before matching", () => {
    const items = [item("a", 1)];
    const result = selectMedia(items, [[{ category: " Mood ", value: "CALMÉ" }]], group({ allOf: [filter("mood", "calme")] }), defaultSelectionOptions());

    expect(result.map(i => i.id)).toEqual(["a"]);
  });

  it("returns the same result for the same input", () => {
    const items = [item("a", 1), item("b", 3), item("c", 2)];
    const tags = [rawTags({ owner: ["papa"] }), rawTags({ mood: ["calm"] }), rawTags({ owner: ["papa"], mood: ["calm"] })];
    const query = group({ allOf: [filter("owner", "papa"), filter("mood", "sleepy")] });
    const options = defaultSelectionOptions({ fallback: "soft" });

    const first = selectMedia(items, tags, query, options).map(i => i.id);
    const second = selectMedia(items, tags, query, options).map(i => i.id);

    expect(first).toEqual(["c", "a"]);
    expect(second).toEqual(first);
  });
});

describe("shuffle", () => {
  it("keeps every element", () => {
    const values = [1, 2, 3, 4, 5];
    expect(shuffle([...values]).sort()).toEqual(values);
  });
});
