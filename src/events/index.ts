/**
 * Events Module - Public API
 */

// Types
export type { TruncationResult } from "./schema.js";

// Constants
export { DEFAULT_ATTRIBUTE_BUDGET_BYTES, TRANSLATED_SUFFIX } from "./schema.js";

// Pure transformations
export {
  applyTranslations,
  encodedSize,
  translateEvent,
  truncateEvents,
} from "./transform.js";
