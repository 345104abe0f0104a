/**
 * Bridge Module - Public API
 */

// Types
export type { SetupError, SetupFailureReason } from "./errors.js";
export type {
  BridgeOptions,
  BridgeState,
  PollSource,
  Publisher,
} from "./schema.js";

// Error utilities
export { formatSetupError } from "./errors.js";

// Service functions
export {
  getBridgeState,
  loadTranslations,
  startBridge,
  stopBridge,
} from "./service.js";
