import type { RuntimeConfig } from "../config.js";
import { emitEvent, previewQuery } from "../utils/events.js";
import { logger } from "../utils/logger.js";
import type { CatalogSnapshot } from "./catalog.js";
import { ParseConfigError } from "./errors.js";
import type { SelectionFallback, SelectionOptions, TagQueryGroup } from "./query.js";
import { includeOrderOf, parseQueryPayload } from "./query-schema.js";
import { clampLimit, parseQueryString, parseSelectRequest } from "./request.js";
import { selectMediaDetailed, type MediaItem, type SelectionResult } from "./selector.js";

/** Values given on the command line; they win over the query string. */
export interface SelectOverrides {
  limit?: number;
  random?: boolean;
  fallback?: SelectionFallback;
  mediaType?: string;
  provider?: string;
  search?: string;
  excludeIds?: string[];
}

export interface SelectionInput {
  query?: string;
  /** Structured query; replaces the tag filters of `query` when present. */
  payload?: unknown;
  overrides?: SelectOverrides;
  rng?: () => number;
}

export interface RunOptions {
  eventsJson?: boolean;
}

export interface PreparedSelection {
  options: SelectionOptions;
  group: TagQueryGroup;
  includeOrder: string[];
}

export interface SelectionRun extends SelectionResult<MediaItem>, PreparedSelection {}

export function prepareSelection(config: RuntimeConfig, input: SelectionInput): PreparedSelection {
  const request = parseSelectRequest(parseQueryString(input.query ?? ""), {
    limit: config.limit,
    random: config.random,
    fallback: config.fallback,
    reservedKeys: config.reservedKeys
  });

  let group = request.group;
  let includeOrder = request.includeOrder;
  if (input.payload !== undefined) {
    group = parseQueryPayload(input.payload);
    includeOrder = includeOrderOf(group);
  }

  const overrides = input.overrides ?? {};
  if (overrides.limit !== undefined && !Number.isFinite(overrides.limit)) {
    throw new ParseConfigError(`Invalid limit: ${overrides.limit}`);
  }
  const excludeIds = new Set(request.options.excludeIds);
  for (const id of overrides.excludeIds ?? []) excludeIds.add(id);

  const options: SelectionOptions = {
    limit: overrides.limit !== undefined ? clampLimit(overrides.limit) : request.options.limit,
    random: overrides.random ?? request.options.random,
    fallback: overrides.fallback ?? request.options.fallback,
    excludeIds,
    hardFilters: {
      ...request.options.hardFilters,
      ...(overrides.mediaType ? { mediaType: overrides.mediaType } : {}),
      ...(overrides.provider ? { provider: overrides.provider } : {}),
      ...(overrides.search ? { search: overrides.search } : {})
    },
    ...(input.rng ? { rng: input.rng } : {})
  };

  return { options, group, includeOrder };
}

export function runSelection(
  config: RuntimeConfig,
  snapshot: CatalogSnapshot,
  input: SelectionInput,
  runOptions: RunOptions = {}
): SelectionRun {
  const prepared = prepareSelection(config, input);
  const { options, group, includeOrder } = prepared;
  const events = runOptions.eventsJson;

  emitEvent(events, {
    event: "select_start",
    items: snapshot.items.length,
    limit: options.limit,
    fallback: options.fallback,
    random: options.random
  });
  logger.debug(`query: ${previewQuery(input.query ?? "") || "(none)"}`);
  logger.debug(`priority: ${includeOrder.join(" > ") || "(none)"}`);

  const result = selectMediaDetailed(snapshot.items, snapshot.tags, group, options, includeOrder);

  emitEvent(events, { event: "select_strict", considered: result.considered, matches: result.strictMatches });
  logger.debug(`${result.considered}/${snapshot.items.length} items pass hard filters`);
  logger.debug(`${result.strictMatches} strict matches`);

  if (result.strictMatches === 0 && options.fallback !== "none") {
    emitEvent(events, { event: "select_fallback", mode: options.fallback, selected: result.items.length });
    logger.debug(`fallback ${options.fallback} selected ${result.items.length} items`);
  }

  emitEvent(events, { event: "select_end", phase: result.phase, ids: result.items.map(item => item.id) });

  return { ...result, ...prepared };
}
