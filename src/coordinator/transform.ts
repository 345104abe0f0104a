/**
 * Coordinator Module - Pure Transformations
 */
import { applyTranslations } from "../events/index.js";
import type {
  EventBatch,
  EventBatchResult,
  TranslationTable,
} from "../stokercloud/index.js";
import type { CycleAborted } from "./schema.js";

/**
 * Settings the event coordinator stamps onto every batch.
 */
export type EventLogSettings = Readonly<{
  count: number;
  offset: number;
  translationLanguage: string;
  translations: TranslationTable;
}>;

/**
 * Translate a raw event batch and stamp it with the request settings.
 */
export function buildEventBatchResult(
  batch: EventBatch,
  settings: EventLogSettings,
): EventBatchResult {
  return {
    rawPayload: batch.rawPayload,
    events: applyTranslations(batch.events, settings.translations),
    count: settings.count,
    offset: settings.offset,
    translationLanguage: settings.translationLanguage,
    translationsLoaded: Object.keys(settings.translations).length > 0,
  };
}

/**
 * Create a CYCLE_ABORTED error.
 */
export function cycleAborted(name: string): CycleAborted {
  return { type: "CYCLE_ABORTED", message: `${name} refresh abandoned` };
}
