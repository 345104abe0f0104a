/**
 * Bridge Module - Schemas and Types
 *
 * Startup options, publisher contract and the state exposed to the API.
 */
import type { TokenGuardError } from "../auth/index.js";
import type { CoordinatorState } from "../coordinator/index.js";
import type {
  ControllerSnapshot,
  EventBatchResult,
  RequestExecutor,
} from "../stokercloud/index.js";

export type PollSource = "device" | "events";

/**
 * Something that republishes what the coordinators fetch.
 */
export type Publisher = Readonly<{
  name: string;
  publishDevice(snapshot: ControllerSnapshot): void;
  publishEventLog(batch: EventBatchResult): void;
  publishError(source: PollSource, message: string): void;
}>;

export type BridgeOptions = Readonly<{
  username: string;
  transport: RequestExecutor;
  apiBaseUrl: string;
  translationBaseUrl: string;
  translationLanguage: string;
  deviceIntervalMs: number;
  eventIntervalMs: number;
  eventCount: number;
  eventOffset: number;
  publishers: ReadonlyArray<Publisher>;
}>;

/**
 * Snapshot of everything the bridge knows, for the HTTP API.
 */
export type BridgeState = Readonly<{
  device: CoordinatorState<ControllerSnapshot, TokenGuardError>;
  events: CoordinatorState<EventBatchResult, TokenGuardError>;
  authenticated: boolean;
  translationsLoaded: boolean;
  startedAt: number;
}>;
