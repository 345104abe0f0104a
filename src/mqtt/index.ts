/**
 * MQTT Module - Public API
 */

// Types
export type { Availability, MqttMessage, MqttPublisherOptions } from "./schema.js";
export type { MqttError } from "./errors.js";

export { TOPICS } from "./schema.js";

// Error utilities
export { formatMqttError } from "./errors.js";

// Service functions
export {
  createMqttPublisher,
  disconnectMqttClient,
  initializeMqttClient,
  isConnected,
  publishMessages,
} from "./service.js";

// Pure transformations
export {
  buildAvailabilityMessage,
  buildBaseTopic,
  buildDeviceMessages,
  buildEventLogMessages,
  formatSensorPayload,
  resolveDeviceId,
  sanitizeTopicSegment,
} from "./transform.js";
