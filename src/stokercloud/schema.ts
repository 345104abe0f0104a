/**
 * StokerCloud Module - Schemas and Types
 *
 * Defines the data shapes for the StokerCloud vendor API.
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import { z } from "zod";

// =============================================================================
// Endpoints
// =============================================================================

export const LOGIN_PATH = "login.php";
export const CONTROLLER_DATA_PATH = "controllerdata2.php";
export const EVENT_DATA_PATH = "geteventdata.php";

/**
 * Screen query captured from the StokerCloud web UI.
 * Selects which panels the controller data endpoint returns.
 */
export const DEFAULT_SCREEN =
  "b1,3,b2,5,b3,4,b4,6,b5,12,b6,14,b7,15,b8,16,b9,9," +
  "b10,0," +
  "d1,3,d2,4,d3,0,d4,0,d5,0,d6,0,d7,0,d8,0,d9,0,d10,0," +
  "h1,2,h2,3,h3,4,h4,7,h5,8,h6,0,h7,0,h8,0,h9,0,h10,0," +
  "w1,2,w2,3,w3,9,w4,0,w5,0";

// =============================================================================
// Transport
// =============================================================================

export type HttpMethod = "GET" | "POST";

/**
 * A single request handed to the transport.
 */
export type JsonRequest = Readonly<{
  method: HttpMethod;
  url: string;
  params: Readonly<Record<string, string | number>>;
  signal?: AbortSignal;
}>;

// =============================================================================
// Generic JSON
// =============================================================================

export type JsonObject = Readonly<Record<string, unknown>>;

export const JsonObjectSchema = z.record(z.unknown());

// =============================================================================
// Login
// =============================================================================

/**
 * Login response. Everything is optional - the server omits fields on failure.
 */
export const LoginResponseSchema = z
  .object({
    status: z.union([z.number(), z.string()]).nullish(),
    message: z.unknown().optional(),
    token: z.union([z.string(), z.number()]).nullish(),
    credentials: z.string().nullish().catch(undefined),
    master: z.coerce.number().int().nullish().catch(undefined),
  })
  .passthrough();

export type LoginResponse = z.infer<typeof LoginResponseSchema>;

/**
 * Successful login.
 */
export type LoginResult = Readonly<{
  token: string;
  credentials?: string;
  master?: number;
}>;

// =============================================================================
// Controller Data
// =============================================================================

/**
 * Controller snapshot: nested sections (weatherdata, boilerdata, frontdata,
 * hopperdata, dhwdata, leftoutput, ...) exactly as the server returned them.
 * Always contains the top-level `miscdata` marker.
 */
export const ControllerSnapshotSchema = JsonObjectSchema.refine(
  (payload) => "miscdata" in payload,
  { message: "Missing miscdata marker" },
);

export type ControllerSnapshot = JsonObject;

// =============================================================================
// Events & Translations
// =============================================================================

/**
 * One furnace log entry. Keys and order come from the server.
 */
export type EventRecord = Readonly<Record<string, unknown>>;

/**
 * Raw event fetch: the untouched payload plus the extracted records.
 */
export type EventBatch = Readonly<{
  rawPayload: unknown;
  events: ReadonlyArray<EventRecord>;
}>;

/**
 * Event batch as published by the event coordinator.
 * count/offset echo the request; the server does not confirm them.
 */
export type EventBatchResult = Readonly<{
  rawPayload: unknown;
  events: ReadonlyArray<EventRecord>;
  count: number;
  offset: number;
  translationLanguage: string;
  translationsLoaded: boolean;
}>;

/**
 * Vendor code → human-readable text.
 */
export type TranslationTable = Readonly<Record<string, string>>;

/**
 * Candidate fields holding the event list, checked in this order.
 */
export const EVENT_LIST_KEYS = [
  "events",
  "eventdata",
  "data",
  "items",
  "rows",
  "log",
] as const;
