/**
 * MQTT Module - Pure Transformations
 *
 * Topic naming and message building. No client, no I/O.
 */
import {
  buildEventLogView,
  deriveDeviceInfo,
  projectSensors,
  SENSOR_DESCRIPTIONS,
} from "../sensors/index.js";
import type { SensorValue } from "../sensors/index.js";
import type {
  ControllerSnapshot,
  EventBatchResult,
} from "../stokercloud/index.js";
import type { Availability, MqttMessage } from "./schema.js";
import { TOPICS } from "./schema.js";

// =============================================================================
// Topics
// =============================================================================

/**
 * Lower-case a topic segment and replace everything outside `[a-z0-9_-]`.
 * An empty segment becomes "unknown".
 *
 * @example
 * sanitizeTopicSegment("Cellar Boiler #2") // "cellar_boiler__2"
 */
export function sanitizeTopicSegment(segment: string): string {
  const sanitized = segment.toLowerCase().replace(/[^a-z0-9_-]/g, "_");
  return sanitized === "" ? "unknown" : sanitized;
}

/**
 * `<prefix>/<deviceId>`. A prefix may itself span several levels; each
 * level is sanitized on its own.
 *
 * @example
 * buildBaseTopic("Home/StokerCloud", "12345") // "home/stokercloud/12345"
 */
export function buildBaseTopic(prefix: string, deviceId: string): string {
  const levels = prefix
    .split("/")
    .filter((level) => level !== "")
    .map(sanitizeTopicSegment);

  return [...levels, sanitizeTopicSegment(deviceId)].join("/");
}

/**
 * Device segment: the snapshot's identifier, else the fallback.
 */
export function resolveDeviceId(
  snapshot: ControllerSnapshot | null,
  fallbackId: string,
): string {
  return deriveDeviceInfo(snapshot)?.identifier ?? fallbackId;
}

// =============================================================================
// Payloads
// =============================================================================

/**
 * Sensor values as text; null is published as an empty string.
 */
export function formatSensorPayload(value: SensorValue): string {
  return value === null ? "" : String(value);
}

export function buildAvailabilityMessage(
  baseTopic: string,
  availability: Availability,
): MqttMessage {
  return { topic: `${baseTopic}/${TOPICS.availability}`, payload: availability };
}

/**
 * One message per sensor, the device info document and `online`.
 */
export function buildDeviceMessages(
  snapshot: ControllerSnapshot,
  baseTopic: string,
): MqttMessage[] {
  const sensorMessages = projectSensors(snapshot, SENSOR_DESCRIPTIONS).map(
    (reading) => ({
      topic: `${baseTopic}/${TOPICS.sensor}/${sanitizeTopicSegment(reading.key)}`,
      payload: formatSensorPayload(reading.value),
    }),
  );

  return [
    ...sensorMessages,
    {
      topic: `${baseTopic}/${TOPICS.device}`,
      payload: JSON.stringify(deriveDeviceInfo(snapshot)),
    },
    buildAvailabilityMessage(baseTopic, "online"),
  ];
}

/**
 * Event count and the truncated attribute document.
 */
export function buildEventLogMessages(
  batch: EventBatchResult,
  baseTopic: string,
  budgetBytes: number,
): MqttMessage[] {
  const view = buildEventLogView(batch, budgetBytes);

  return [
    {
      topic: `${baseTopic}/${TOPICS.eventLogState}`,
      payload: String(view.state),
    },
    {
      topic: `${baseTopic}/${TOPICS.eventLogAttributes}`,
      payload: JSON.stringify(view.attributes),
    },
  ];
}
