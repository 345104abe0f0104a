/**
 * Auth Module - Public API
 */

// Types
export type { AuthExhaustedError, TokenGuardError } from "./errors.js";
export type { LoginFn, TokenGuard, TokenOperation } from "./service.js";
export type { Lock } from "./lock.js";

// Error utilities
export { authExhausted, formatTokenGuardError } from "./errors.js";

// Service functions
export { createLock } from "./lock.js";
export { createTokenGuard } from "./service.js";
