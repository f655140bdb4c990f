/**
 * "Item must carry at least one of `values` under `category`."
 * Category and values are expected in normalized form.
 */
export interface TagFilter {
  readonly category: string;
  readonly values: readonly string[];
}

/**
 * Recursive boolean query. `allOf` is AND across filters, `noneOf` rejects on any
 * match and `anyOf` needs one nested group to hold when it is non-empty.
 * An empty group matches everything.
 */
export interface TagQueryGroup {
  readonly allOf: readonly TagFilter[];
  readonly anyOf: readonly TagQueryGroup[];
  readonly noneOf: readonly TagFilter[];
}

export const SELECTION_FALLBACKS = ["none", "soft", "aggressive", "force"] as const;

export type SelectionFallback = (typeof SELECTION_FALLBACKS)[number];

export function isSelectionFallback(value: string): value is SelectionFallback {
  return SELECTION_FALLBACKS.some(mode => mode === value);
}

export const MEDIA_TYPES = ["playlist", "audiobook", "radio", "podcast", "album", "track"] as const;

export type MediaType = (typeof MEDIA_TYPES)[number];

/** Non-tag constraints; never relaxed by any fallback tier. */
export interface HardFilters {
  mediaType?: string;
  provider?: string;
  search?: string;
}

export interface SelectionOptions {
  limit: number;
  random: boolean;
  fallback: SelectionFallback;
  excludeIds: ReadonlySet<string>;
  hardFilters: HardFilters;
  /** Random source for the strict-phase shuffle, `Math.random` when omitted. */
  rng?: () => number;
}

export const DEFAULT_LIMIT = 10;
export const MAX_LIMIT = 100;

export function emptyGroup(): TagQueryGroup {
  return { allOf: [], anyOf: [], noneOf: [] };
}

export function defaultSelectionOptions(overrides: Partial<SelectionOptions> = {}): SelectionOptions {
  return {
    limit: DEFAULT_LIMIT,
    random: false,
    fallback: "none",
    excludeIds: new Set<string>(),
    hardFilters: {},
    ...overrides
  };
}
