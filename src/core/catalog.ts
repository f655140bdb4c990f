import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";
import { CatalogError, MissingFileError } from "./errors.js";
import type { RawTag } from "./evaluator.js";
import { normalizeToken } from "./normalize.js";
import { MEDIA_TYPES } from "./query.js";
import type { MediaItem } from "./selector.js";

const tagSchema = z.union([
  z.object({ category: z.string(), value: z.string() }),
  z.string().regex(/^[^:]+:.+$/, "expected \"category:value\"")
]);

const timestampSchema = z.union([z.string(), z.number()]);

const itemSchema = z.object({
  id: z.union([z.string().min(1), z.number().int()]),
  title: z.string(),
  media_type: z.enum(MEDIA_TYPES).optional(),
  mediaType: z.enum(MEDIA_TYPES).optional(),
  provider: z.string(),
  description: z.string().nullable().optional(),
  updated_at: timestampSchema.optional(),
  updatedAt: timestampSchema.optional(),
  is_active: z.boolean().optional(),
  active: z.boolean().optional(),
  tags: z.array(tagSchema).default([])
});

const catalogSchema = z.union([
  z.object({ items: z.array(itemSchema) }),
  z.array(itemSchema)
]);

type RawItem = z.infer<typeof itemSchema>;

export interface CatalogSnapshot {
  items: MediaItem[];
  /** `tags[i]` belongs to `items[i]`. */
  tags: RawTag[][];
}

function toTimestamp(value: string | number | undefined, where: string): number {
  if (value === undefined) return 0;
  if (typeof value === "number") return value;
  const parsed = Date.parse(value);
  if (Number.isNaN(parsed)) {
    throw new CatalogError(`${where}: invalid timestamp "${value}"`);
  }
  return parsed;
}

function toRawTag(tag: z.infer<typeof tagSchema>): RawTag {
  if (typeof tag !== "string") return tag;
  const separator = tag.indexOf(":");
  return { category: tag.slice(0, separator), value: tag.slice(separator + 1) };
}

function toMediaItem(raw: RawItem, position: number): MediaItem {
  const where = `items.${position}`;
  const mediaType = raw.mediaType ?? raw.media_type;
  if (!mediaType) {
    throw new CatalogError(`${where}: media_type is required`);
  }
  return {
    id: String(raw.id),
    title: raw.title,
    mediaType,
    provider: raw.provider,
    description: raw.description ?? null,
    updatedAt: toTimestamp(raw.updatedAt ?? raw.updated_at, where),
    active: raw.active ?? raw.is_active ?? true
  };
}

export function parseCatalog(input: unknown, source: string = "catalog"): CatalogSnapshot {
  const result = catalogSchema.safeParse(input);
  if (!result.success) {
    const first = result.error.issues[0];
    const detail = first ? `${first.path.join(".") || "(root)"}: ${first.message}` : "unknown shape";
    throw new CatalogError(`Invalid catalogue in ${source}: ${detail}`, source);
  }
  const rawItems = Array.isArray(result.data) ? result.data : result.data.items;
  return {
    items: rawItems.map(toMediaItem),
    tags: rawItems.map(raw => raw.tags.map(toRawTag))
  };
}

export function loadCatalog(filepath: string): CatalogSnapshot {
  if (!existsSync(filepath)) {
    throw new MissingFileError(filepath, "catalogue");
  }
  const raw = readFileSync(filepath, "utf8");
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new CatalogError(`Failed to parse ${filepath}: ${error instanceof Error ? error.message : String(error)}`, filepath);
  }
  return parseCatalog(data, filepath);
}

/**
 * Category -> sorted distinct values across the snapshot, keyed and valued in
 * normalized form.
 */
export function listCategories(snapshot: CatalogSnapshot): Map<string, string[]> {
  const collected = new Map<string, Set<string>>();
  for (const tags of snapshot.tags) {
    for (const tag of tags) {
      const category = normalizeToken(tag.category);
      const value = normalizeToken(tag.value);
      if (!category || !value) continue;
      let values = collected.get(category);
      if (!values) {
        values = new Set<string>();
        collected.set(category, values);
      }
      values.add(value);
    }
  }
  const out = new Map<string, string[]>();
  for (const category of Array.from(collected.keys()).sort()) {
    out.set(category, Array.from(collected.get(category) ?? []).sort());
  }
  return out;
}
