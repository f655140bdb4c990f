import { normalizeToken } from "./normalize.js";
import type { TagFilter, TagQueryGroup } from "./query.js";

export interface RawTag {
  category: string;
  value: string;
}

/** Normalized category -> normalized values carried by one item. */
export type TagIndex = ReadonlyMap<string, ReadonlySet<string>>;

export function buildTagIndex(tags: Iterable<RawTag>): TagIndex {
  const index = new Map<string, Set<string>>();
  for (const tag of tags) {
    const category = normalizeToken(tag.category);
    const value = normalizeToken(tag.value);
    if (!category || !value) continue;
    let values = index.get(category);
    if (!values) {
      values = new Set<string>();
      index.set(category, values);
    }
    values.add(value);
  }
  return index;
}

export function matchesFilter(tags: TagIndex, filter: TagFilter): boolean {
  const values = tags.get(filter.category);
  if (!values || values.size === 0) return false;
  return filter.values.some(value => values.has(value));
}

/**
 * Evaluate a boolean query group against one item's tags.
 * Exclusions are checked first and always win.
 */
export function evaluateGroup(tags: TagIndex, group: TagQueryGroup): boolean {
  for (const filter of group.noneOf) {
    if (matchesFilter(tags, filter)) return false;
  }

  for (const filter of group.allOf) {
    if (!matchesFilter(tags, filter)) return false;
  }

  if (group.anyOf.length > 0) {
    return group.anyOf.some(sub => evaluateGroup(tags, sub));
  }

  return true;
}

export function passesExclusions(tags: TagIndex, group: TagQueryGroup): boolean {
  return !group.noneOf.some(filter => matchesFilter(tags, filter));
}
