import { normalizeToken, splitCsv } from "./normalize.js";
import type { TagFilter, TagQueryGroup } from "./query.js";

export type QueryPair = readonly [key: string, value: string | null | undefined];

export interface ParsedTagFilters {
  includeValues: Map<string, Set<string>>;
  excludeValues: Map<string, Set<string>>;
  /** Include categories in order of first appearance; drives fallback priority. */
  includeOrder: string[];
}

export interface ParseTagFiltersOptions {
  reservedKeys?: ReadonlySet<string>;
}

// most specific first
const KEY_PREFIXES: ReadonlyArray<{ prefix: string; exclude: boolean }> = [
  { prefix: "not_tag_", exclude: true },
  { prefix: "not_", exclude: true },
  { prefix: "tag_", exclude: false }
];

function classifyKey(key: string): { category: string; exclude: boolean } {
  for (const { prefix, exclude } of KEY_PREFIXES) {
    if (key.startsWith(prefix)) {
      return { category: key.slice(prefix.length), exclude };
    }
  }
  return { category: key, exclude: false };
}

function addValues(target: Map<string, Set<string>>, category: string, values: string[]): void {
  let bucket = target.get(category);
  if (!bucket) {
    bucket = new Set<string>();
    target.set(category, bucket);
  }
  for (const value of values) bucket.add(value);
}

/**
 * Parse tag include/exclude filters from ordered query-string pairs.
 *
 * Supported keys:
 * - `<category>=a,b` include values for that category
 * - `tag_<slug>=a,b` include values for a dynamic category
 * - `not_<category>=a,b` exclude values for that category
 * - `not_tag_<slug>=a,b` exclude values for a dynamic category
 *
 * Reserved keys, empty keys and empty values are skipped without complaint.
 */
export function parseTagFilters(
  pairs: Iterable<QueryPair>,
  options: ParseTagFiltersOptions = {}
): ParsedTagFilters {
  const reserved = options.reservedKeys ?? new Set<string>();
  const includeValues = new Map<string, Set<string>>();
  const excludeValues = new Map<string, Set<string>>();
  const includeOrder: string[] = [];
  const seenInclude = new Set<string>();

  for (const [key, rawValue] of pairs) {
    if (!key || reserved.has(key)) continue;
    if (rawValue === null || rawValue === undefined || rawValue === "") continue;

    const classified = classifyKey(key);
    const category = normalizeToken(classified.category);
    if (!category) continue;

    const values = splitCsv(rawValue).map(normalizeToken).filter(Boolean);
    if (values.length === 0) continue;

    if (classified.exclude) {
      addValues(excludeValues, category, values);
      continue;
    }

    if (!seenInclude.has(category)) {
      seenInclude.add(category);
      includeOrder.push(category);
    }
    addValues(includeValues, category, values);
  }

  return { includeValues, excludeValues, includeOrder };
}

function toFilter(category: string, values: ReadonlySet<string> | undefined): TagFilter | undefined {
  if (!values || values.size === 0) return undefined;
  return { category, values: Array.from(values).sort() };
}

/**
 * Flat query shape: one AND-ed filter per include category (in `includeOrder`),
 * one exclusion per exclude category, no nested OR groups.
 */
export function buildSimpleGroup(
  includeValues: ReadonlyMap<string, ReadonlySet<string>>,
  excludeValues: ReadonlyMap<string, ReadonlySet<string>>,
  includeOrder: readonly string[]
): TagQueryGroup {
  const allOf: TagFilter[] = [];
  for (const category of includeOrder) {
    const filter = toFilter(category, includeValues.get(category));
    if (filter) allOf.push(filter);
  }

  const noneOf: TagFilter[] = [];
  for (const [category, values] of excludeValues) {
    const filter = toFilter(category, values);
    if (filter) noneOf.push(filter);
  }

  return { allOf, anyOf: [], noneOf };
}
