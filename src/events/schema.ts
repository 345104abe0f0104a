/**
 * Events Module - Schemas and Types
 *
 * Shapes for event annotation and size-bounded truncation.
 */
import type { EventRecord } from "../stokercloud/index.js";

/**
 * Default ceiling for serialized event attributes, in bytes.
 */
export const DEFAULT_ATTRIBUTE_BUDGET_BYTES = 16_000;

/**
 * Suffix of the key added next to a translated field.
 */
export const TRANSLATED_SUFFIX = "_translated";

/**
 * Result of fitting an event list into a byte budget.
 */
export type TruncationResult = Readonly<{
  events: ReadonlyArray<EventRecord>;
  truncated: boolean;
}>;
