/**
 * StokerCloud Module - Error Types
 *
 * Typed error unions for StokerCloud API operations.
 * Errors are values, not exceptions.
 */

/**
 * Errors that can occur while talking to StokerCloud.
 *
 * AUTH_ERROR: the server rejected the account or the session token.
 * PROTOCOL_ERROR: transport failure, invalid JSON, or an unexpected payload.
 */
export type StokerCloudError =
  | {
      readonly type: "AUTH_ERROR";
      readonly message: string;
    }
  | {
      readonly type: "PROTOCOL_ERROR";
      readonly message: string;
      readonly cause?: Error;
      readonly responseData?: unknown;
    };

/**
 * Create an AUTH_ERROR.
 */
export function authError(message: string): StokerCloudError {
  return { type: "AUTH_ERROR", message };
}

/**
 * Create a PROTOCOL_ERROR.
 */
export function protocolError(
  message: string,
  options: { cause?: Error; responseData?: unknown } = {},
): StokerCloudError {
  return {
    type: "PROTOCOL_ERROR",
    message,
    ...(options.cause ? { cause: options.cause } : {}),
    ...(options.responseData !== undefined
      ? { responseData: options.responseData }
      : {}),
  };
}

/**
 * Whether an error means the credentials or token were rejected.
 */
export function isAuthError(error: { readonly type: string }): boolean {
  return error.type === "AUTH_ERROR";
}

/**
 * Format a StokerCloudError for logging.
 */
export function formatStokerCloudError(error: StokerCloudError): string {
  switch (error.type) {
    case "AUTH_ERROR":
      return `Authentication rejected: ${error.message}`;
    case "PROTOCOL_ERROR":
      return `Protocol error: ${error.message}`;
  }
}
