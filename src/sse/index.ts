/**
 * SSE Module - Public API
 */

// Types
export type {
  ConnectedEvent,
  DeviceSnapshotEvent,
  EventLogEvent,
  PollErrorEvent,
  SseEvent,
} from "./schema.js";

// Service functions
export {
  broadcast,
  createSsePublisher,
  createSseStream,
  disconnectAllClients,
  getClientCount,
  removeClient,
  sendToClient,
} from "./service.js";

// Pure transformations
export {
  encodeSseEvent,
  toDeviceSnapshotEvent,
  toEventLogEvent,
} from "./transform.js";
