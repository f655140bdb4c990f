import { evaluateGroup, matchesFilter, passesExclusions, type TagIndex } from "./evaluator.js";
import type { SelectionFallback, TagFilter, TagQueryGroup } from "./query.js";

export type SortKey = ReadonlyArray<number | string>;

export interface FallbackParams<T> {
  items: readonly T[];
  itemTags: readonly TagIndex[];
  group: TagQueryGroup;
  limit: number;
  fallback: SelectionFallback;
  /** Include categories in request order, most important first. Defaults to `allOf` order. */
  includeOrder?: readonly string[];
  /** Non-tag constraints that are never relaxed (media type, provider, excluded ids). */
  passesStrict?: (index: number) => boolean;
  tiebreak?: (item: T) => SortKey;
}

export function compareSortKeys(a: SortKey, b: SortKey): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const left = a[i];
    const right = b[i];
    if (left === right || left === undefined || right === undefined) continue;
    if (typeof left === "number" && typeof right === "number") {
      return left - right;
    }
    if (typeof left === "number") return -1;
    if (typeof right === "number") return 1;
    return left < right ? -1 : 1;
  }
  return a.length - b.length;
}

/**
 * Priority order of the categories that actually carry `allOf` filters.
 * Categories missing from `includeOrder` are appended in `allOf` order.
 */
export function resolvePriority(group: TagQueryGroup, includeOrder?: readonly string[]): string[] {
  const filtered = new Set(group.allOf.map(f => f.category));
  const order: string[] = [];
  const seen = new Set<string>();
  const push = (category: string) => {
    if (seen.has(category) || !filtered.has(category)) return;
    seen.add(category);
    order.push(category);
  };
  for (const category of includeOrder ?? []) push(category);
  for (const filter of group.allOf) push(filter.category);
  return order;
}

function truncatedGroup(group: TagQueryGroup, keep: ReadonlySet<string>): TagQueryGroup {
  return {
    allOf: group.allOf.filter(f => keep.has(f.category)),
    anyOf: group.anyOf,
    noneOf: group.noneOf
  };
}

/**
 * Groups from strictest to loosest: every category kept, then the last one
 * dropped, and so on down to no `allOf` filter at all.
 */
function* relaxationLevels(group: TagQueryGroup, priority: readonly string[]): Generator<TagQueryGroup> {
  for (let k = priority.length; k >= 0; k--) {
    yield truncatedGroup(group, new Set(priority.slice(0, k)));
  }
}

function orderedFilters(group: TagQueryGroup, priority: readonly string[]): TagFilter[] {
  const out: TagFilter[] = [];
  for (const category of priority) {
    for (const filter of group.allOf) {
      if (filter.category === category) out.push(filter);
    }
  }
  return out;
}

/**
 * Return selected indices into `items` after applying fallback.
 *
 * Strict matches are returned as-is when there are any. Otherwise the group is
 * relaxed according to `fallback`; `noneOf` and `passesStrict` hold in every tier.
 */
export function applyFallback<T>(params: FallbackParams<T>): number[] {
  const { items, itemTags, group, limit, fallback } = params;
  if (!(limit > 0)) return [];

  const passesStrict = params.passesStrict ?? (() => true);
  const tiebreak = params.tiebreak ?? ((): SortKey => []);

  const eligible: number[] = [];
  for (let i = 0; i < items.length; i++) {
    if (passesStrict(i)) eligible.push(i);
  }

  const tagsAt = (i: number): TagIndex => itemTags[i] ?? new Map<string, ReadonlySet<string>>();
  const itemAt = (i: number): T => {
    const item = items[i];
    if (item === undefined) throw new RangeError(`No item at index ${i}`);
    return item;
  };

  const strict = eligible.filter(i => evaluateGroup(tagsAt(i), group));
  if (strict.length > 0) return strict.slice(0, limit);

  if (fallback === "none") return [];

  const priority = resolvePriority(group, params.includeOrder);
  const filters = orderedFilters(group, priority);

  // count of matched filters desc, then earliest-priority matches, then caller tiebreak
  const rankKeys = new Map<number, SortKey>();
  const rankKey = (i: number): SortKey => {
    let key = rankKeys.get(i);
    if (!key) {
      const vector = filters.map(f => matchesFilter(tagsAt(i), f));
      const count = vector.filter(Boolean).length;
      key = [-count, ...vector.map(m => (m ? 0 : 1)), ...tiebreak(itemAt(i))];
      rankKeys.set(i, key);
    }
    return key;
  };
  const byRank = (a: number, b: number) => compareSortKeys(rankKey(a), rankKey(b));

  if (fallback === "aggressive") {
    for (const relaxed of relaxationLevels(group, priority)) {
      const matches = eligible.filter(i => evaluateGroup(tagsAt(i), relaxed));
      if (matches.length > 0) {
        matches.sort((a, b) => compareSortKeys(tiebreak(itemAt(a)), tiebreak(itemAt(b))));
        return matches.slice(0, limit);
      }
    }
    return [];
  }

  if (fallback === "force") {
    const collected: number[] = [];
    const seen = new Set<number>();
    for (const relaxed of relaxationLevels(group, priority)) {
      const batch = eligible.filter(
        i => !seen.has(i) && passesExclusions(tagsAt(i), group) && evaluateGroup(tagsAt(i), relaxed)
      );
      batch.sort(byRank);
      for (const i of batch) {
        seen.add(i);
        collected.push(i);
        if (collected.length >= limit) return collected;
      }
    }
    return collected;
  }

  // soft
  if (filters.length === 0) return [];

  const candidates = eligible.filter(
    i => passesExclusions(tagsAt(i), group) && filters.some(f => matchesFilter(tagsAt(i), f))
  );
  candidates.sort(byRank);
  return candidates.slice(0, limit);
}
