/**
 * Sensors Module - Schemas and Types
 *
 * Consumer contract: a controller snapshot projected onto individually
 * named display values.
 */
import type { ControllerSnapshot } from "../stokercloud/index.js";

export type SensorValue = number | string | boolean | null;

export type SensorDeviceClass =
  | "temperature"
  | "power"
  | "weight"
  | "wind_speed";

export type SensorStateClass = "measurement" | "total_increasing";

export type SensorUnit = "°C" | "%" | "kW" | "kg" | "g" | "m/s";

/**
 * One display sensor: identifier, unit/kind metadata, and a pure
 * extraction function over the snapshot.
 */
export type SensorDescription = Readonly<{
  key: string;
  name: string;
  unit?: SensorUnit;
  deviceClass?: SensorDeviceClass;
  stateClass?: SensorStateClass;
  icon?: string;
  value: (snapshot: ControllerSnapshot) => SensorValue;
}>;

/**
 * A sensor evaluated against one snapshot.
 */
export type SensorReading = Readonly<{
  key: string;
  name: string;
  unit: SensorUnit | null;
  deviceClass: SensorDeviceClass | null;
  stateClass: SensorStateClass | null;
  value: SensorValue;
}>;

/**
 * Device identity derived from the snapshot.
 */
export type DeviceInfo = Readonly<{
  identifier: string;
  name: string;
  manufacturer: string;
  model: string;
}>;

export const MANUFACTURER = "StokerCloud";
export const DEFAULT_MODEL = "pellet furnace";

/**
 * Event log as published: state is the number of events held.
 */
export type EventLogView = Readonly<{
  state: number;
  attributes: EventLogAttributes;
}>;

export type EventLogAttributes = Readonly<{
  events: ReadonlyArray<Readonly<Record<string, unknown>>>;
  events_total: number;
  events_truncated: boolean;
  count: number;
  offset: number;
  translation_language: string;
  translations_loaded: boolean;
}>;
