/**
 * Bridge Module - Error Types
 *
 * Errors are values, not exceptions.
 */
import type { TokenGuardError } from "../auth/index.js";
import { formatTokenGuardError } from "../auth/index.js";

/**
 * "credentials": the account was rejected and needs to be re-entered.
 * "unreachable": the service failed or answered with something unexpected.
 */
export type SetupFailureReason = "credentials" | "unreachable";

export type SetupError =
  | {
      readonly type: "SETUP_FAILED";
      readonly reason: SetupFailureReason;
      readonly message: string;
      readonly cause: TokenGuardError;
    }
  | {
      readonly type: "ALREADY_STARTED";
      readonly message: string;
    };

/**
 * Create a SETUP_FAILED error from the first device refresh failure.
 */
export function setupFailed(cause: TokenGuardError): SetupError {
  const reason: SetupFailureReason =
    cause.type === "AUTH_ERROR" || cause.type === "AUTH_EXHAUSTED"
      ? "credentials"
      : "unreachable";

  return {
    type: "SETUP_FAILED",
    reason,
    message: formatTokenGuardError(cause),
    cause,
  };
}

/**
 * Create an ALREADY_STARTED error.
 */
export function alreadyStarted(): SetupError {
  return { type: "ALREADY_STARTED", message: "Bridge is already running" };
}

/**
 * Format a SetupError for logging.
 */
export function formatSetupError(error: SetupError): string {
  switch (error.type) {
    case "SETUP_FAILED":
      return error.reason === "credentials"
        ? `Setup failed, account needs to be re-validated: ${error.message}`
        : `Setup failed, StokerCloud unreachable: ${error.message}`;
    case "ALREADY_STARTED":
      return error.message;
  }
}
