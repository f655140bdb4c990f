import { z } from "zod";
import { QueryPayloadError } from "./errors.js";
import { normalizeToken, splitCsv } from "./normalize.js";
import type { TagFilter, TagQueryGroup } from "./query.js";

export const MAX_QUERY_DEPTH = 16;

const filterSchema = z.object({
  category: z.string(),
  values: z.union([z.array(z.string()), z.string()])
});

type RawFilter = z.infer<typeof filterSchema>;

interface RawGroup {
  all_of?: RawFilter[];
  allOf?: RawFilter[];
  any_of?: RawGroup[];
  anyOf?: RawGroup[];
  none_of?: RawFilter[];
  noneOf?: RawFilter[];
}

export const queryGroupSchema: z.ZodType<RawGroup> = z.lazy(() =>
  z
    .object({
      all_of: z.array(filterSchema).optional(),
      allOf: z.array(filterSchema).optional(),
      any_of: z.array(queryGroupSchema).optional(),
      anyOf: z.array(queryGroupSchema).optional(),
      none_of: z.array(filterSchema).optional(),
      noneOf: z.array(filterSchema).optional()
    })
    .strict()
);

function normalizeFilters(raw: RawFilter[]): TagFilter[] {
  const out: TagFilter[] = [];
  for (const filter of raw) {
    const category = normalizeToken(filter.category);
    if (!category) continue;
    const tokens = typeof filter.values === "string" ? splitCsv(filter.values) : filter.values;
    const values = new Set(tokens.map(normalizeToken).filter(Boolean));
    if (values.size === 0) continue;
    out.push({ category, values: Array.from(values).sort() });
  }
  return out;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Walks nested `any_of`/`anyOf` lists, stopping one level past the limit. */
function nestingExceeds(value: unknown, depth: number): boolean {
  if (!isRecord(value)) return false;
  if (depth > MAX_QUERY_DEPTH) return true;
  const children: unknown[] = [];
  for (const list of [value.any_of, value.anyOf]) {
    if (Array.isArray(list)) children.push(...list);
  }
  return children.some(child => nestingExceeds(child, depth + 1));
}

function toGroup(raw: RawGroup): TagQueryGroup {
  return {
    allOf: normalizeFilters([...(raw.all_of ?? []), ...(raw.allOf ?? [])]),
    anyOf: [...(raw.any_of ?? []), ...(raw.anyOf ?? [])].map(toGroup),
    noneOf: normalizeFilters([...(raw.none_of ?? []), ...(raw.noneOf ?? [])])
  };
}

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${path}: ${issue.message}`;
}

/**
 * Validate and normalize a structured (possibly nested) query payload.
 * Accepts snake_case and camelCase list names; filter values may be a list or
 * a comma-separated string.
 */
export function parseQueryPayload(input: unknown): TagQueryGroup {
  // checked before zod, whose recursion would otherwise exhaust the stack first
  if (nestingExceeds(input, 1)) {
    throw new QueryPayloadError([`query nesting exceeds ${MAX_QUERY_DEPTH} levels`]);
  }
  const result = queryGroupSchema.safeParse(input);
  if (!result.success) {
    throw new QueryPayloadError(result.error.issues.map(formatIssue));
  }
  return toGroup(result.data);
}

/** Category order of the top-level `allOf`, used as fallback priority. */
export function includeOrderOf(group: TagQueryGroup): string[] {
  const order: string[] = [];
  for (const filter of group.allOf) {
    if (!order.includes(filter.category)) order.push(filter.category);
  }
  return order;
}
