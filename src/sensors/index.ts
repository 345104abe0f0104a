/**
 * Sensors Module - Public API
 */

// Types
export type {
  DeviceInfo,
  EventLogAttributes,
  EventLogView,
  SensorDescription,
  SensorReading,
  SensorValue,
} from "./schema.js";

// Sensor table
export { findSensorDescription, SENSOR_DESCRIPTIONS } from "./descriptions.js";

// Pure transformations
export {
  asFloat,
  buildEventLogView,
  deriveDeviceInfo,
  findById,
  getFrontValue,
  getLeftOutputValue,
  getListValue,
  projectSensors,
  readSensor,
} from "./transform.js";
