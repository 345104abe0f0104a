/**
 * Coordinator Module - Public API
 */

// Types
export type {
  CoordinatorListener,
  CoordinatorOptions,
  CoordinatorState,
  CycleAborted,
  UpdateFn,
} from "./schema.js";
export type {
  DeviceCoordinator,
  EventCoordinator,
  PollCoordinator,
} from "./service.js";
export type { EventLogSettings } from "./transform.js";

export { initialCoordinatorState } from "./schema.js";

// Service functions
export {
  createDeviceCoordinator,
  createEventCoordinator,
  createPollCoordinator,
} from "./service.js";

// Pure transformations
export { buildEventBatchResult } from "./transform.js";
