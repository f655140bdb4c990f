import { logger } from "./logger.js";

export type SelectionEventName = "select_start" | "select_strict" | "select_fallback" | "select_end";

export type EventRecord = Record<string, unknown> & { event: SelectionEventName };

export function emitEvent(enabled: boolean | undefined, record: EventRecord): void {
  if (!enabled) return;
  try {
    // raw NDJSON on stdout, bypassing the colourised logger
    // eslint-disable-next-line no-console
    console.log(JSON.stringify({ ...record, ts: new Date().toISOString() }));
  } catch (e) {
    logger.warn(`Failed to emit event: ${e instanceof Error ? e.message : String(e)}`);
  }
}

export function previewQuery(query: string, max: number = 60): string {
  return query.length > max ? query.slice(0, max - 3) + "..." : query;
}
