/**
 * MQTT Module - Schemas and Types
 *
 * Topic layout and message shapes for retained republishing.
 */

/**
 * One outgoing message. Payloads are always text.
 */
export type MqttMessage = Readonly<{
  topic: string;
  payload: string;
}>;

export type Availability = "online" | "offline";

/**
 * Topic suffixes below `<prefix>/<deviceId>/`.
 */
export const TOPICS = {
  sensor: "sensor",
  device: "device",
  eventLogState: "event_log/state",
  eventLogAttributes: "event_log/attributes",
  availability: "availability",
} as const;

export type MqttPublisherOptions = Readonly<{
  topicPrefix: string;
  /** Used as the device segment until a snapshot names the device */
  fallbackDeviceId: string;
  attributeBudgetBytes: number;
}>;
