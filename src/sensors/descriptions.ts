/**
 * Sensors Module - Sensor Table
 *
 * Declarative mapping from snapshot fields to display sensors, grouped by
 * the web UI panel they come from. Adding a sensor means adding a row here;
 * nothing in the fetch or poll path changes.
 */
import type { SensorDescription } from "./schema.js";
import {
  asFloat,
  getFrontValue,
  getLeftOutputValue,
  getListValue,
} from "./transform.js";

export const SENSOR_DESCRIPTIONS: ReadonlyArray<SensorDescription> = [
  // ===========================================================================
  // Weather (top-left panel)
  // ===========================================================================
  {
    key: "weather_city",
    name: "Weather city",
    icon: "mdi:city",
    value: (data) => getListValue(data, "weatherdata", "weather-city"),
  },
  {
    key: "outdoor_temperature",
    name: "Outdoor temperature",
    unit: "°C",
    deviceClass: "temperature",
    stateClass: "measurement",
    value: (data) => asFloat(getListValue(data, "weatherdata", "1")),
  },
  {
    key: "wind_speed",
    name: "Wind speed",
    unit: "m/s",
    deviceClass: "wind_speed",
    stateClass: "measurement",
    value: (data) => asFloat(getListValue(data, "weatherdata", "2")),
  },
  {
    key: "wind_direction",
    name: "Wind direction",
    icon: "mdi:compass",
    value: (data) => getListValue(data, "weatherdata", "3"),
  },
  {
    key: "clouds",
    name: "Clouds",
    unit: "%",
    stateClass: "measurement",
    value: (data) => asFloat(getListValue(data, "weatherdata", "9")),
  },

  // ===========================================================================
  // Boiler (bottom-left panel)
  // ===========================================================================
  {
    key: "chimney_smoke_temperature",
    name: "Chimney/smoke temperature",
    unit: "°C",
    deviceClass: "temperature",
    stateClass: "measurement",
    value: (data) => asFloat(getListValue(data, "boilerdata", "3")),
  },
  {
    key: "power_output",
    name: "Power output",
    unit: "kW",
    deviceClass: "power",
    stateClass: "measurement",
    value: (data) => asFloat(getListValue(data, "boilerdata", "5")),
  },
  {
    key: "power_percentage",
    name: "Power (%)",
    unit: "%",
    stateClass: "measurement",
    value: (data) => asFloat(getListValue(data, "boilerdata", "4")),
  },
  {
    key: "photo_sensor_light",
    name: "Photo sensor (light)",
    unit: "%",
    stateClass: "measurement",
    value: (data) => asFloat(getListValue(data, "boilerdata", "6")),
  },
  {
    key: "oxygen",
    name: "Oxygen (%)",
    unit: "%",
    stateClass: "measurement",
    value: (data) => asFloat(getListValue(data, "boilerdata", "12")),
  },
  {
    key: "oxygen_reference",
    name: "Oxygen reference",
    unit: "%",
    stateClass: "measurement",
    value: (data) => asFloat(getFrontValue(data, "refoxygen")),
  },
  {
    key: "o2_low_regulation",
    name: "O2 low regulation (%)",
    unit: "%",
    stateClass: "measurement",
    value: (data) => asFloat(getListValue(data, "boilerdata", "14")),
  },
  {
    key: "o2_mid_regulation",
    name: "O2 mid regulation (%)",
    unit: "%",
    stateClass: "measurement",
    value: (data) => asFloat(getListValue(data, "boilerdata", "15")),
  },
  {
    key: "o2_high_regulation",
    name: "O2 high regulation (%)",
    unit: "%",
    stateClass: "measurement",
    value: (data) => asFloat(getListValue(data, "boilerdata", "16")),
  },
  {
    key: "online_time",
    name: "Online time",
    unit: "%",
    stateClass: "measurement",
    value: (data) => asFloat(getListValue(data, "boilerdata", "9")),
  },

  // ===========================================================================
  // Front readout (boiler temperature and setpoint)
  // ===========================================================================
  {
    key: "boiler_temperature",
    name: "Boiler temperature",
    unit: "°C",
    deviceClass: "temperature",
    stateClass: "measurement",
    value: (data) => asFloat(getFrontValue(data, "boilertemp")),
  },
  {
    key: "wanted_boiler_temperature",
    name: "Wanted boiler temperature",
    unit: "°C",
    deviceClass: "temperature",
    stateClass: "measurement",
    value: (data) => asFloat(getFrontValue(data, "-wantedboilertemp")),
  },

  // ===========================================================================
  // Output icons (left side)
  // ===========================================================================
  {
    key: "pump_output",
    name: "Pump output",
    icon: "mdi:pump",
    value: (data) => getLeftOutputValue(data, "output-2"),
  },
  {
    key: "compressor",
    name: "Compressor",
    icon: "mdi:air-compressor",
    stateClass: "measurement",
    value: (data) => asFloat(getLeftOutputValue(data, "output-7")),
  },

  // ===========================================================================
  // Hopper (center-right panel)
  // ===========================================================================
  {
    key: "hopper_content",
    name: "Hopper content",
    unit: "kg",
    deviceClass: "weight",
    stateClass: "measurement",
    value: (data) => asFloat(getFrontValue(data, "hoppercontent")),
  },
  {
    key: "auger_capacity",
    name: "Auger capacity",
    unit: "g",
    deviceClass: "weight",
    stateClass: "measurement",
    value: (data) => asFloat(getListValue(data, "hopperdata", "2")),
  },
  {
    key: "consumption_last_24h",
    name: "Consumption last 24 h",
    unit: "kg",
    deviceClass: "weight",
    stateClass: "measurement",
    value: (data) => asFloat(getListValue(data, "hopperdata", "3")),
  },
  {
    key: "consumption_total",
    name: "Consumption total",
    unit: "kg",
    deviceClass: "weight",
    stateClass: "total_increasing",
    value: (data) => asFloat(getListValue(data, "hopperdata", "4")),
  },
  {
    key: "power_10pct",
    name: "Power 10%",
    unit: "kW",
    deviceClass: "power",
    stateClass: "measurement",
    value: (data) => asFloat(getListValue(data, "hopperdata", "7")),
  },
  {
    key: "power_100pct",
    name: "Power 100%",
    unit: "kW",
    deviceClass: "power",
    stateClass: "measurement",
    value: (data) => asFloat(getListValue(data, "hopperdata", "8")),
  },

  // ===========================================================================
  // Domestic hot water (right panel)
  // ===========================================================================
  {
    key: "dhw_temperature",
    name: "DHW temperature",
    unit: "°C",
    deviceClass: "temperature",
    stateClass: "measurement",
    value: (data) => asFloat(getFrontValue(data, "dhw")),
  },
  {
    key: "wanted_dhw_temperature",
    name: "Wanted DHW temperature",
    unit: "°C",
    deviceClass: "temperature",
    stateClass: "measurement",
    value: (data) => asFloat(getFrontValue(data, "dhwwanted")),
  },
  {
    key: "dhw_difference",
    name: "DHW difference",
    unit: "°C",
    deviceClass: "temperature",
    stateClass: "measurement",
    value: (data) => asFloat(getListValue(data, "dhwdata", "3")),
  },
];

/**
 * Look up a sensor by key.
 */
export function findSensorDescription(key: string): SensorDescription | null {
  return SENSOR_DESCRIPTIONS.find((description) => description.key === key) ?? null;
}
