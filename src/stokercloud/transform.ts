/**
 * StokerCloud Module - Pure Transformations
 *
 * Response classification and payload parsing for the vendor API.
 * No side effects, no I/O - just data in, data out.
 */
import { type Result, err, ok } from "neverthrow";

import type { StokerCloudError } from "./errors.js";
import { authError, protocolError } from "./errors.js";
import type {
  ControllerSnapshot,
  EventRecord,
  JsonObject,
  LoginResult,
  TranslationTable,
} from "./schema.js";
import {
  ControllerSnapshotSchema,
  EVENT_LIST_KEYS,
  LoginResponseSchema,
} from "./schema.js";

// =============================================================================
// Type Guards
// =============================================================================

/**
 * A JSON object (not an array, not null).
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const AUTH_STATUSES: ReadonlyArray<unknown> = [401, 403, "401", "403"];
const OK_STATUSES: ReadonlyArray<unknown> = [undefined, null, 0, "0"];
const TOKEN_REJECTION_HINTS = ["expired", "invalid", "reject"] as const;

/**
 * Whether a status field means the token or account was rejected.
 */
export function isAuthStatus(status: unknown): boolean {
  return AUTH_STATUSES.includes(status);
}

/**
 * Whether a server message reads like a token rejection.
 *
 * @example
 * isTokenRejectionMessage("Token expired") // true
 * isTokenRejectionMessage("Invalid user")  // false - no "token"
 */
export function isTokenRejectionMessage(message: string): boolean {
  const lowered = message.toLowerCase();
  return (
    lowered.includes("token") &&
    TOKEN_REJECTION_HINTS.some((hint) => lowered.includes(hint))
  );
}

// =============================================================================
// Response Classification
// =============================================================================

/**
 * Classify a parsed JSON response before any operation-specific checks.
 *
 * The vendor reports errors in the body, not through HTTP status codes:
 * an object with a `status` other than absent/0/"0" is a failure.
 */
export function classifyResponse(
  payload: unknown,
): Result<JsonObject | ReadonlyArray<unknown>, StokerCloudError> {
  if (Array.isArray(payload)) {
    return ok(payload);
  }

  if (!isJsonObject(payload)) {
    return err(protocolError("Unexpected response type", { responseData: payload }));
  }

  const status = payload.status;
  if (OK_STATUSES.includes(status)) {
    return ok(payload);
  }

  const message = String(payload.message ?? "Request failed");

  if (isAuthStatus(status)) {
    return err(authError(message));
  }

  if (isTokenRejectionMessage(message)) {
    return err(authError(message));
  }

  return err(protocolError(message, { responseData: payload }));
}

// =============================================================================
// Login
// =============================================================================

/**
 * Parse a classified login response.
 *
 * Login only succeeds with status 0 and a token present.
 */
export function parseLoginResponse(
  payload: unknown,
): Result<LoginResult, StokerCloudError> {
  if (!isJsonObject(payload)) {
    return err(protocolError("Unexpected login payload", { responseData: payload }));
  }

  const parsed = LoginResponseSchema.safeParse(payload);
  if (!parsed.success) {
    return err(protocolError("Invalid login response format", { responseData: payload }));
  }

  const { status, token, credentials, master } = parsed.data;
  const message = String(parsed.data.message ?? "Login failed");

  if ((status !== 0 && status !== "0") || token === undefined || token === null) {
    return err(authError(message));
  }

  return ok({
    token: String(token),
    ...(typeof credentials === "string" ? { credentials } : {}),
    ...(typeof master === "number" ? { master } : {}),
  });
}

// =============================================================================
// Controller Data
// =============================================================================

/**
 * Validate a classified controller data payload.
 */
export function parseControllerData(
  payload: unknown,
): Result<ControllerSnapshot, StokerCloudError> {
  if (!isJsonObject(payload)) {
    return err(
      protocolError("Unexpected controller data payload", { responseData: payload }),
    );
  }

  if (isAuthStatus(payload.status)) {
    return err(authError("Token rejected"));
  }

  const parsed = ControllerSnapshotSchema.safeParse(payload);
  if (!parsed.success) {
    return err(
      protocolError("Unexpected controller data payload", { responseData: payload }),
    );
  }

  return ok(parsed.data);
}

// =============================================================================
// Translations
// =============================================================================

/**
 * Keep only string → string entries of a translation payload.
 */
export function parseTranslations(
  payload: unknown,
): Result<TranslationTable, StokerCloudError> {
  if (!isJsonObject(payload)) {
    return err(protocolError("Unexpected translation payload"));
  }

  const table: Record<string, string> = {};
  for (const [key, value] of Object.entries(payload)) {
    if (typeof value === "string") {
      table[key] = value;
    }
  }

  return ok(table);
}

// =============================================================================
// Event Extraction
// =============================================================================

/**
 * One way of locating the event list in a payload.
 * Returns null when the strategy does not apply.
 */
export type EventExtractionStrategy = (
  payload: unknown,
) => ReadonlyArray<unknown> | null;

/**
 * The payload itself is the list.
 */
export const fromTopLevelArray: EventExtractionStrategy = (payload) =>
  Array.isArray(payload) ? payload : null;

/**
 * The first well-known field holding an array.
 */
export const fromCandidateKeys: EventExtractionStrategy = (payload) => {
  if (!isJsonObject(payload)) {
    return null;
  }

  for (const key of EVENT_LIST_KEYS) {
    const value = payload[key];
    if (Array.isArray(value)) {
      return value;
    }
  }

  return null;
};

/**
 * The first field holding an array with at least one object in it.
 */
export const fromFirstArrayOfObjects: EventExtractionStrategy = (payload) => {
  if (!isJsonObject(payload)) {
    return null;
  }

  for (const value of Object.values(payload)) {
    if (Array.isArray(value) && value.some(isJsonObject)) {
      return value;
    }
  }

  return null;
};

/**
 * Strategies evaluated in order; the first non-null list wins.
 */
export const EVENT_EXTRACTION_STRATEGIES: ReadonlyArray<EventExtractionStrategy> = [
  fromTopLevelArray,
  fromCandidateKeys,
  fromFirstArrayOfObjects,
];

/**
 * Extract event records from a loosely structured payload.
 * Non-object elements are discarded; server order is kept.
 *
 * @example
 * extractEvents({ eventdata: [{ a: 1 }, "skip", { b: 2 }] })
 * // [{ a: 1 }, { b: 2 }]
 */
export function extractEvents(
  payload: unknown,
  strategies: ReadonlyArray<EventExtractionStrategy> = EVENT_EXTRACTION_STRATEGIES,
): EventRecord[] {
  for (const strategy of strategies) {
    const list = strategy(payload);
    if (list !== null) {
      return list.filter(isJsonObject);
    }
  }

  return [];
}
