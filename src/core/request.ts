import { buildSimpleGroup, parseTagFilters, type ParsedTagFilters, type QueryPair } from "./filter-parser.js";
import { splitCsv } from "./normalize.js";
import {
  DEFAULT_LIMIT,
  MAX_LIMIT,
  isSelectionFallback,
  type SelectionFallback,
  type SelectionOptions,
  type TagQueryGroup
} from "./query.js";

export const RESERVED_KEYS: readonly string[] = [
  "media_type",
  "provider",
  "search",
  "random",
  "limit",
  "fallback",
  "exclude_ids"
];

export interface SelectRequestDefaults {
  limit?: number;
  random?: boolean;
  fallback?: SelectionFallback;
  /** Extra keys to keep out of the tag filters. */
  reservedKeys?: readonly string[];
}

export interface SelectRequest {
  options: SelectionOptions;
  group: TagQueryGroup;
  includeOrder: string[];
  filters: ParsedTagFilters;
}

const TRUE_VALUES = new Set(["true", "1", "yes", "on"]);
const FALSE_VALUES = new Set(["false", "0", "no", "off"]);

export function parseBooleanFlag(value: string | undefined, fallback: boolean): boolean {
  const normalized = (value ?? "").trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  return fallback;
}

export function clampLimit(value: number): number {
  if (!Number.isFinite(value)) return DEFAULT_LIMIT;
  return Math.min(MAX_LIMIT, Math.max(1, Math.floor(value)));
}

export function parseLimit(value: string | undefined, fallback: number): number {
  const trimmed = (value ?? "").trim();
  if (!/^-?\d+$/.test(trimmed)) return fallback;
  return clampLimit(parseInt(trimmed, 10));
}

export function parseFallback(value: string | undefined, fallback: SelectionFallback): SelectionFallback {
  const normalized = (value ?? "").trim().toLowerCase();
  return isSelectionFallback(normalized) ? normalized : fallback;
}

/**
 * Ordered pairs from a query string; a leading "?" is ignored.
 */
export function parseQueryString(text: string): Array<[string, string]> {
  const trimmed = text.trim().replace(/^\?/, "");
  return Array.from(new URLSearchParams(trimmed).entries());
}

/**
 * Split a flat request into selection options (reserved keys) and a tag query
 * built from everything else. Last occurrence wins for scalar keys; `exclude_ids`
 * occurrences union.
 */
export function parseSelectRequest(pairs: readonly QueryPair[], defaults: SelectRequestDefaults = {}): SelectRequest {
  const scalars = new Map<string, string>();
  const excludeIds = new Set<string>();

  for (const [key, value] of pairs) {
    if (value === null || value === undefined) continue;
    if (key === "exclude_ids") {
      for (const id of splitCsv(value)) excludeIds.add(id);
    } else if (RESERVED_KEYS.includes(key)) {
      scalars.set(key, value);
    }
  }

  const reservedKeys = new Set([...RESERVED_KEYS, ...(defaults.reservedKeys ?? [])]);
  const filters = parseTagFilters(pairs, { reservedKeys });
  const group = buildSimpleGroup(filters.includeValues, filters.excludeValues, filters.includeOrder);

  const mediaType = scalars.get("media_type")?.trim();
  const provider = scalars.get("provider")?.trim();
  const search = scalars.get("search")?.trim();

  const options: SelectionOptions = {
    limit: parseLimit(scalars.get("limit"), clampLimit(defaults.limit ?? DEFAULT_LIMIT)),
    random: parseBooleanFlag(scalars.get("random"), defaults.random ?? false),
    fallback: parseFallback(scalars.get("fallback"), defaults.fallback ?? "none"),
    excludeIds,
    hardFilters: {
      ...(mediaType ? { mediaType } : {}),
      ...(provider ? { provider } : {}),
      ...(search ? { search } : {})
    }
  };

  return { options, group, includeOrder: filters.includeOrder, filters };
}
