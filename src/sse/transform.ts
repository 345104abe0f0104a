/**
 * SSE Module - Pure Transformations
 */
import {
  buildEventLogView,
  deriveDeviceInfo,
  projectSensors,
  SENSOR_DESCRIPTIONS,
} from "../sensors/index.js";
import type {
  ControllerSnapshot,
  EventBatchResult,
} from "../stokercloud/index.js";
import type {
  DeviceSnapshotEvent,
  EventLogEvent,
  SseEvent,
} from "./schema.js";

/**
 * Frame an event in the text/event-stream wire format.
 *
 * @example
 * encodeSseEvent({ type: "connected", clientId: 1 })
 * // 'event: connected\ndata: {"type":"connected","clientId":1}\n\n'
 */
export function encodeSseEvent(event: SseEvent): string {
  return `event: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`;
}

export function toDeviceSnapshotEvent(
  snapshot: ControllerSnapshot,
  updatedAt: number,
): DeviceSnapshotEvent {
  return {
    type: "device_snapshot",
    device: deriveDeviceInfo(snapshot),
    sensors: projectSensors(snapshot, SENSOR_DESCRIPTIONS),
    updatedAt,
  };
}

export function toEventLogEvent(
  batch: EventBatchResult,
  budgetBytes: number,
): EventLogEvent {
  const view = buildEventLogView(batch, budgetBytes);
  return { type: "event_log", state: view.state, attributes: view.attributes };
}
