/**
 * StokerCloud Module - Public API
 *
 * Exports only what's needed by other modules.
 * Internal implementation details stay hidden.
 */

// Types
export type {
  ControllerSnapshot,
  EventBatch,
  EventBatchResult,
  EventRecord,
  JsonObject,
  JsonRequest,
  LoginResult,
  TranslationTable,
} from "./schema.js";
export type { StokerCloudError } from "./errors.js";
export type { StokerCloudClient, StokerCloudClientOptions } from "./service.js";
export type { RequestExecutor } from "./transport.js";

// Constants
export { DEFAULT_SCREEN } from "./schema.js";

// Error utilities
export {
  authError,
  formatStokerCloudError,
  isAuthError,
  protocolError,
} from "./errors.js";

// Service functions (side effects)
export { createStokerCloudClient } from "./service.js";
export { createFetchTransport } from "./transport.js";

// Pure transformations
export { extractEvents, isJsonObject } from "./transform.js";
