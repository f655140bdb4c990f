export { normalizeToken, splitCsv } from "./core/normalize.js";
export { parseTagFilters, buildSimpleGroup } from "./core/filter-parser.js";
export { buildTagIndex, evaluateGroup, matchesFilter } from "./core/evaluator.js";
export { applyFallback, compareSortKeys } from "./core/fallback.js";
export { selectMedia, selectMediaDetailed, recencyTiebreak } from "./core/selector.js";
export { parseSelectRequest, parseQueryString, RESERVED_KEYS } from "./core/request.js";
export { parseQueryPayload, includeOrderOf } from "./core/query-schema.js";
export { loadCatalog, parseCatalog, listCategories } from "./core/catalog.js";
export { runSelection, prepareSelection } from "./core/runner.js";
export { resolveRuntimeConfig } from "./config.js";
export { defaultSelectionOptions, emptyGroup, SELECTION_FALLBACKS, MEDIA_TYPES } from "./core/query.js";
export { TagsiftError, ParseConfigError, MissingFileError, CatalogError, QueryPayloadError, ExitCode } from "./core/errors.js";
export type { TagFilter, TagQueryGroup, SelectionFallback, SelectionOptions, HardFilters, MediaType } from "./core/query.js";
export type { ParsedTagFilters, QueryPair } from "./core/filter-parser.js";
export type { RawTag, TagIndex } from "./core/evaluator.js";
export type { FallbackParams, SortKey } from "./core/fallback.js";
export type { MediaItem, SelectionResult, SelectionPhase } from "./core/selector.js";
export type { SelectRequest, SelectRequestDefaults } from "./core/request.js";
export type { CatalogSnapshot } from "./core/catalog.js";
export type { RuntimeConfig } from "./config.js";
