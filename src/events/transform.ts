/**
 * Events Module - Pure Transformations
 *
 * Translation annotation and byte-bounded truncation of event records.
 * No side effects, no I/O - just data in, data out.
 */
import type { EventRecord, TranslationTable } from "../stokercloud/index.js";
import type { TruncationResult } from "./schema.js";
import { TRANSLATED_SUFFIX } from "./schema.js";

// =============================================================================
// Translation
// =============================================================================

/**
 * Annotate one record: every string value found in the table gets a
 * parallel `<key>_translated` field. The input record is not touched.
 *
 * @example
 * translateEvent({ type: "IGN" }, { IGN: "Ignition" })
 * // { type: "IGN", type_translated: "Ignition" }
 */
export function translateEvent(
  event: EventRecord,
  table: TranslationTable,
): EventRecord {
  const out: Record<string, unknown> = { ...event };

  for (const [key, value] of Object.entries(event)) {
    if (typeof value === "string" && Object.hasOwn(table, value)) {
      out[`${key}${TRANSLATED_SUFFIX}`] = table[value];
    }
  }

  return out;
}

/**
 * Annotate every record. An empty table passes the list through unchanged.
 */
export function applyTranslations(
  events: ReadonlyArray<EventRecord>,
  table: TranslationTable,
): ReadonlyArray<EventRecord> {
  if (Object.keys(table).length === 0) {
    return events;
  }
  return events.map((event) => translateEvent(event, table));
}

// =============================================================================
// Truncation
// =============================================================================

/**
 * UTF-8 size of the compact JSON encoding of a list of records.
 */
export function encodedSize(events: ReadonlyArray<EventRecord>): number {
  return Buffer.byteLength(JSON.stringify(events), "utf8");
}

/**
 * Longest prefix of `events` whose encoding fits in `budgetBytes`.
 *
 * Never returns an empty list for non-empty input: when even the first
 * record is too large it is returned alone, flagged as truncated.
 *
 * @example
 * truncateEvents(events, 16_000)
 * // { events: events.slice(0, k), truncated: k < events.length }
 */
export function truncateEvents(
  events: ReadonlyArray<EventRecord>,
  budgetBytes: number,
): TruncationResult {
  if (events.length === 0) {
    return { events, truncated: false };
  }

  if (encodedSize(events) <= budgetBytes) {
    return { events, truncated: false };
  }

  let low = 1;
  let high = events.length;
  let best = 1;

  while (low <= high) {
    const mid = Math.floor((low + high) / 2);
    if (encodedSize(events.slice(0, mid)) <= budgetBytes) {
      best = mid;
      low = mid + 1;
    } else {
      high = mid - 1;
    }
  }

  return { events: events.slice(0, best), truncated: true };
}
