/**
 * SSE Module - Schemas and Types
 *
 * Event types pushed to Server-Sent Events clients.
 */
import type { PollSource } from "../bridge/index.js";
import type {
  DeviceInfo,
  EventLogAttributes,
  SensorReading,
} from "../sensors/index.js";

// =============================================================================
// SSE Event Types
// =============================================================================

/**
 * Sent once to every client right after it connects.
 */
export type ConnectedEvent = Readonly<{
  type: "connected";
  clientId: number;
}>;

/**
 * A new controller snapshot, projected onto sensors.
 */
export type DeviceSnapshotEvent = Readonly<{
  type: "device_snapshot";
  device: DeviceInfo | null;
  sensors: ReadonlyArray<SensorReading>;
  updatedAt: number;
}>;

/**
 * A new event log batch. Attributes are already truncated to the budget.
 */
export type EventLogEvent = Readonly<{
  type: "event_log";
  state: number;
  attributes: EventLogAttributes;
}>;

/**
 * A failed refresh; the last good data stays in place.
 */
export type PollErrorEvent = Readonly<{
  type: "poll_error";
  source: PollSource;
  message: string;
}>;

/**
 * Union of all SSE event types.
 */
export type SseEvent =
  | ConnectedEvent
  | DeviceSnapshotEvent
  | EventLogEvent
  | PollErrorEvent;
