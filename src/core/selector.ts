import { buildTagIndex, evaluateGroup, type RawTag, type TagIndex } from "./evaluator.js";
import { applyFallback, compareSortKeys, type SortKey } from "./fallback.js";
import { normalizeToken } from "./normalize.js";
import { DEFAULT_LIMIT, type HardFilters, type SelectionFallback, type SelectionOptions, type TagQueryGroup } from "./query.js";

export interface MediaItem {
  id: string;
  title: string;
  mediaType: string;
  provider: string;
  /** Last modification, epoch milliseconds. */
  updatedAt: number;
  description?: string | null;
  active?: boolean;
}

export type SelectionPhase = "strict" | "fallback" | "empty";

export interface SelectionResult<T> {
  items: T[];
  phase: SelectionPhase;
  /** Items left after hard filters. */
  considered: number;
  strictMatches: number;
  fallback: SelectionFallback;
}

/** Most recently updated first, then title, then id. */
export function recencyTiebreak(item: MediaItem): SortKey {
  return [-item.updatedAt, normalizeToken(item.title), item.id];
}

export function shuffle<T>(values: T[], rng: () => number = Math.random): T[] {
  for (let i = values.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    const current = values[i];
    const swap = values[j];
    if (current === undefined || swap === undefined) continue;
    values[i] = swap;
    values[j] = current;
  }
  return values;
}

function compileHardFilter(filters: HardFilters, excludeIds: ReadonlySet<string>): (item: MediaItem) => boolean {
  const mediaType = normalizeToken(filters.mediaType);
  const provider = normalizeToken(filters.provider);
  const search = normalizeToken(filters.search);

  return (item) => {
    if (item.active === false) return false;
    if (excludeIds.has(item.id)) return false;
    if (mediaType && normalizeToken(item.mediaType) !== mediaType) return false;
    if (provider && normalizeToken(item.provider) !== provider) return false;
    if (search) {
      const haystacks = [item.title, item.description ?? ""].map(normalizeToken);
      if (!haystacks.some(text => text.includes(search))) return false;
    }
    return true;
  };
}

/**
 * Run one selection against an in-memory snapshot.
 *
 * `rawTags[i]` holds the tag associations of `items[i]`. Hard filters apply to
 * both phases; fallback only runs when the strict pass finds nothing.
 */
export function selectMediaDetailed<T extends MediaItem>(
  items: readonly T[],
  rawTags: ReadonlyArray<Iterable<RawTag>>,
  group: TagQueryGroup,
  options: SelectionOptions,
  includeOrder?: readonly string[]
): SelectionResult<T> {
  const limit = Number.isFinite(options.limit) ? Math.max(1, Math.floor(options.limit)) : DEFAULT_LIMIT;
  const tagIndices: TagIndex[] = items.map((_, i) => buildTagIndex(rawTags[i] ?? []));
  const passesHard = compileHardFilter(options.hardFilters, options.excludeIds);
  const hardMask = items.map(passesHard);
  const considered = hardMask.filter(Boolean).length;

  const strict: T[] = [];
  items.forEach((item, i) => {
    const tags = tagIndices[i];
    if (hardMask[i] && tags && evaluateGroup(tags, group)) strict.push(item);
  });

  const base = { considered, strictMatches: strict.length, fallback: options.fallback };

  if (strict.length > 0) {
    if (options.random) {
      shuffle(strict, options.rng);
    } else {
      strict.sort((a, b) => compareSortKeys(recencyTiebreak(a), recencyTiebreak(b)));
    }
    return { ...base, items: strict.slice(0, limit), phase: "strict" };
  }

  if (options.fallback === "none") {
    return { ...base, items: [], phase: "empty" };
  }

  const indices = applyFallback({
    items,
    itemTags: tagIndices,
    group,
    limit,
    fallback: options.fallback,
    includeOrder,
    passesStrict: (i) => hardMask[i] === true,
    tiebreak: recencyTiebreak
  });

  const selected: T[] = [];
  for (const i of indices) {
    const item = items[i];
    if (item !== undefined) selected.push(item);
  }

  return { ...base, items: selected, phase: selected.length > 0 ? "fallback" : "empty" };
}

export function selectMedia<T extends MediaItem>(
  items: readonly T[],
  rawTags: ReadonlyArray<Iterable<RawTag>>,
  group: TagQueryGroup,
  options: SelectionOptions,
  includeOrder?: readonly string[]
): T[] {
  return selectMediaDetailed(items, rawTags, group, options, includeOrder).items;
}
