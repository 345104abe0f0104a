/**
 * Sensors Module - Pure Transformations
 *
 * Lookups into the controller snapshot, sensor projection, device identity
 * and the size-bounded event log view.
 */
import { truncateEvents } from "../events/index.js";
import type {
  ControllerSnapshot,
  EventBatchResult,
  JsonObject,
} from "../stokercloud/index.js";
import { isJsonObject } from "../stokercloud/transform.js";
import type {
  DeviceInfo,
  EventLogView,
  SensorDescription,
  SensorReading,
  SensorValue,
} from "./schema.js";
import { DEFAULT_MODEL, MANUFACTURER } from "./schema.js";

// =============================================================================
// Snapshot Lookups
// =============================================================================

/**
 * Find the `{ id, value }` record with the given id. Ids are compared as
 * strings since the server mixes "1" and 1.
 */
export function findById(items: unknown, wantedId: string): JsonObject | null {
  if (!Array.isArray(items)) {
    return null;
  }

  for (const item of items) {
    if (isJsonObject(item) && String(item.id) === wantedId) {
      return item;
    }
  }

  return null;
}

function toSensorValue(value: unknown): SensorValue {
  if (
    typeof value === "number" ||
    typeof value === "string" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  return null;
}

/**
 * Value of record `wantedId` in list section `section`.
 */
export function getListValue(
  snapshot: ControllerSnapshot,
  section: string,
  wantedId: string,
): SensorValue {
  const item = findById(snapshot[section], wantedId);
  return item ? toSensorValue(item.value) : null;
}

/**
 * Value from the front readout panel.
 */
export function getFrontValue(
  snapshot: ControllerSnapshot,
  frontId: string,
): SensorValue {
  return getListValue(snapshot, "frontdata", frontId);
}

/**
 * `leftoutput[outputId].val` - the output icons are keyed objects, not lists.
 */
export function getLeftOutputValue(
  snapshot: ControllerSnapshot,
  outputId: string,
): SensorValue {
  const leftOutput = snapshot.leftoutput;
  if (!isJsonObject(leftOutput)) {
    return null;
  }

  const output = leftOutput[outputId];
  if (!isJsonObject(output)) {
    return null;
  }

  return toSensorValue(output.val);
}

/**
 * Numeric reading, or null for missing, empty and "N/A" values.
 *
 * @example
 * asFloat("21.5") // 21.5
 * asFloat("N/A")  // null
 */
export function asFloat(value: SensorValue): number | null {
  if (value === null || value === "" || value === "N/A") {
    return null;
  }

  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }

  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }

  const parsed = Number(value.trim());
  return value.trim() !== "" && Number.isFinite(parsed) ? parsed : null;
}

// =============================================================================
// Projection
// =============================================================================

/**
 * Evaluate one sensor against a snapshot.
 */
export function readSensor(
  description: SensorDescription,
  snapshot: ControllerSnapshot,
): SensorReading {
  return {
    key: description.key,
    name: description.name,
    unit: description.unit ?? null,
    deviceClass: description.deviceClass ?? null,
    stateClass: description.stateClass ?? null,
    value: description.value(snapshot),
  };
}

/**
 * Evaluate every sensor against a snapshot, in table order.
 */
export function projectSensors(
  snapshot: ControllerSnapshot,
  descriptions: ReadonlyArray<SensorDescription>,
): SensorReading[] {
  return descriptions.map((description) => readSensor(description, snapshot));
}

// =============================================================================
// Device Identity
// =============================================================================

function nonEmptyText(value: unknown): string | null {
  if (typeof value === "number") {
    return String(value);
  }
  if (typeof value === "string" && value !== "") {
    return value;
  }
  return null;
}

/**
 * Device identity: prefers the (serial, alias) pair, falls back to
 * whichever one is present. Null when neither is.
 *
 * @example
 * deriveDeviceInfo({ serial: "12345", alias: "cellar" })
 * // { identifier: "12345", name: "12345 / cellar", ... }
 */
export function deriveDeviceInfo(
  snapshot: ControllerSnapshot | null,
): DeviceInfo | null {
  if (!snapshot) {
    return null;
  }

  const serial = nonEmptyText(snapshot.serial);
  const alias = nonEmptyText(snapshot.alias);
  const identifier = serial ?? alias;

  if (identifier === null) {
    return null;
  }

  return {
    identifier,
    name: serial !== null && alias !== null ? `${serial} / ${alias}` : identifier,
    manufacturer: MANUFACTURER,
    model: nonEmptyText(snapshot.model) ?? DEFAULT_MODEL,
  };
}

// =============================================================================
// Event Log View
// =============================================================================

/**
 * Event log as published to consumers. The events attribute is truncated
 * to fit `budgetBytes`; the stored batch itself is never truncated.
 */
export function buildEventLogView(
  batch: EventBatchResult,
  budgetBytes: number,
): EventLogView {
  const { events, truncated } = truncateEvents(batch.events, budgetBytes);

  return {
    state: batch.events.length,
    attributes: {
      events,
      events_total: batch.events.length,
      events_truncated: truncated,
      count: batch.count,
      offset: batch.offset,
      translation_language: batch.translationLanguage,
      translations_loaded: batch.translationsLoaded,
    },
  };
}
