import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { listCategories, loadCatalog, parseCatalog } from "../../src/core/catalog.js";
import { CatalogError, MissingFileError } from "../../src/core/errors.js";

const FIXTURE = fileURLToPath(new URL("../fixtures/catalog.json", import.meta.url));

describe("parseCatalog", () => {
  it("accepts a bare array with camelCase keys", () => {
    const snapshot = parseCatalog([
      { id: 7, title: "Morning", mediaType: "podcast", provider: "local", updatedAt: 42, active: false, tags: [] }
    ]);

    expect(snapshot.items).toEqual([
      { id: "7", title: "Morning", mediaType: "podcast", provider: "local", description: null, updatedAt: 42, active: false }
    ]);
    expect(snapshot.tags).toEqual([[]]);
  });

  it("parses ISO timestamps and defaults optional fields", () => {
    const snapshot = parseCatalog({
      items: [{ id: "a", title: "A", media_type: "album", provider: "spotify", updated_at: "2024-01-02T00:00:00Z" }]
    });

    expect(snapshot.items[0]?.updatedAt).toBe(1704153600000);
    expect(snapshot.items[0]?.active).toBe(true);
    expect(snapshot.tags).toEqual([[]]);
  });

  it("splits string tags at the first colon", () => {
    const snapshot = parseCatalog([
      { id: "a", title: "A", media_type: "track", provider: "local", tags: ["mood:calm:deep", { category: "owner", value: "papa" }] }
    ]);

    expect(snapshot.tags[0]).toEqual([
      { category: "mood", value: "calm:deep" },
      { category: "owner", value: "papa" }
    ]);
    expect(snapshot.items[0]?.updatedAt).toBe(0);
  });

  it("rejects items without a media type", () => {
    expect(() => parseCatalog([{ id: "a", title: "A", provider: "local" }])).toThrow("items.0: media_type is required");
  });

  it("rejects unknown media types", () => {
    expect(() => parseCatalog([{ id: "a", title: "A", media_type: "vinyl", provider: "local" }])).toThrow(CatalogError);
  });

  it("rejects malformed timestamps", () => {
    expect(() =>
      parseCatalog([{ id: "a", title: "A", media_type: "track", provider: "local", updated_at: "yesterday" }])
    ).toThrow(CatalogError);
  });

  it("names the source and path of shape errors", () => {
    expect(() => parseCatalog({ items: [{ id: "a" }] }, "snap.json")).toThrow(/^Invalid catalogue in snap\.json: /);
  });

  it("rejects tag strings without a category", () => {
    expect(() =>
      parseCatalog([{ id: "a", title: "A", media_type: "track", provider: "local", tags: ["calm"] }])
    ).toThrow(CatalogError);
  });
});

describe("loadCatalog", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "tagsift-catalog-test-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("loads the fixture snapshot", () => {
    const snapshot = loadCatalog(FIXTURE);

    expect(snapshot.items.map(i => i.id)).toEqual(["m1", "m2", "m3", "m4", "m5", "m6"]);
    expect(snapshot.items[5]?.active).toBe(false);
    expect(snapshot.items[4]?.description).toBe("Conte lu pour le coucher");
  });

  it("reports a missing file", () => {
    const path = join(dir, "nope.json");
    expect(() => loadCatalog(path)).toThrow(MissingFileError);
    expect(() => loadCatalog(path)).toThrow(`Missing catalogue: ${path}`);
  });

  it("reports invalid JSON", () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ items: ", "utf8");

    expect(() => loadCatalog(path)).toThrow(`Failed to parse ${path}`);
  });
});

describe("listCategories", () => {
  it("collects normalized values per category in sorted order", () => {
    const categories = listCategories(loadCatalog(FIXTURE));

    expect(Array.from(categories.keys())).toEqual(["context", "genre", "mood", "owner", "time_of_day"]);
    expect(categories.get("owner")).toEqual(["enfants", "maman", "papa"]);
    expect(categories.get("mood")).toEqual(["calm", "energetic"]);
    expect(categories.get("context")).toEqual(["bedtime", "morning", "sport"]);
  });
});
