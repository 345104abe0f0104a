/**
 * Auth Module - Error Types
 *
 * Errors surfaced by the token guard. Errors are values, not exceptions.
 */
import type { StokerCloudError } from "../stokercloud/index.js";
import { formatStokerCloudError } from "../stokercloud/index.js";

/**
 * The token was rejected, a fresh login was forced, and the retry was
 * rejected again. The account needs external re-validation.
 */
export type AuthExhaustedError = {
  readonly type: "AUTH_EXHAUSTED";
  readonly message: string;
};

/**
 * Everything withToken can fail with.
 */
export type TokenGuardError = StokerCloudError | AuthExhaustedError;

/**
 * Create an AUTH_EXHAUSTED error.
 */
export function authExhausted(message: string): AuthExhaustedError {
  return { type: "AUTH_EXHAUSTED", message };
}

/**
 * Format a TokenGuardError for logging.
 */
export function formatTokenGuardError(error: TokenGuardError): string {
  switch (error.type) {
    case "AUTH_EXHAUSTED":
      return `Authentication exhausted: ${error.message}`;
    default:
      return formatStokerCloudError(error);
  }
}
