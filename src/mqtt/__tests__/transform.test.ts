/**
 * MQTT Module - Transform Tests
 *
 * Unit tests for topic naming and message building.
 */
import { describe, expect, it, vi } from "vitest";

import { SENSOR_DESCRIPTIONS } from "../../sensors/index.js";
import type { EventBatchResult } from "../../stokercloud/index.js";
import {
  buildAvailabilityMessage,
  buildBaseTopic,
  buildDeviceMessages,
  buildEventLogMessages,
  formatSensorPayload,
  resolveDeviceId,
  sanitizeTopicSegment,
} from "../transform.js";

// Transforms are pure: loading configuration from here is a bug
vi.mock("../../config.js", () => {
  throw new Error("configuration loaded by a pure transform");
});

// =============================================================================
// Topics
// =============================================================================

describe("sanitizeTopicSegment", () => {
  it("lower-cases and replaces characters outside [a-z0-9_-]", () => {
    expect(sanitizeTopicSegment("Cellar Boiler #2")).toBe("cellar_boiler__2");
  });

  it("keeps dashes and underscores", () => {
    expect(sanitizeTopicSegment("nbe-v13_01")).toBe("nbe-v13_01");
  });

  it("replaces MQTT wildcards and separators", () => {
    expect(sanitizeTopicSegment("a/b+c#")).toBe("a_b_c_");
  });

  it("maps an empty segment to unknown", () => {
    expect(sanitizeTopicSegment("")).toBe("unknown");
  });
});

describe("buildBaseTopic", () => {
  it("sanitizes each prefix level and the device id", () => {
    expect(buildBaseTopic("Home/StokerCloud", "12345")).toBe(
      "home/stokercloud/12345",
    );
  });

  it("drops empty prefix levels", () => {
    expect(buildBaseTopic("/stokercloud/", "user@example.com")).toBe(
      "stokercloud/user_example_com",
    );
  });
});

describe("resolveDeviceId", () => {
  it("uses the fallback without a snapshot", () => {
    expect(resolveDeviceId(null, "test-user")).toBe("test-user");
  });

  it("uses the fallback when the snapshot names no device", () => {
    expect(resolveDeviceId({ miscdata: {} }, "test-user")).toBe("test-user");
  });

  it("prefers the serial", () => {
    expect(resolveDeviceId({ serial: 12345, alias: "cellar" }, "test-user")).toBe(
      "12345",
    );
  });
});

// =============================================================================
// Payloads
// =============================================================================

describe("formatSensorPayload", () => {
  it("publishes null as an empty string", () => {
    expect(formatSensorPayload(null)).toBe("");
  });

  it("stringifies numbers, strings and booleans", () => {
    expect(formatSensorPayload(64.5)).toBe("64.5");
    expect(formatSensorPayload("NE")).toBe("NE");
    expect(formatSensorPayload(false)).toBe("false");
  });
});

describe("buildAvailabilityMessage", () => {
  it("targets the availability topic", () => {
    expect(buildAvailabilityMessage("stokercloud/12345", "offline")).toEqual({
      topic: "stokercloud/12345/availability",
      payload: "offline",
    });
  });
});

describe("buildDeviceMessages", () => {
  const snapshot = {
    serial: "12345",
    alias: "cellar",
    miscdata: {},
    frontdata: [{ id: "boilertemp", value: "64.5" }],
  };

  it("emits one message per sensor plus device and availability", () => {
    const messages = buildDeviceMessages(snapshot, "stokercloud/12345");

    expect(messages).toHaveLength(SENSOR_DESCRIPTIONS.length + 2);
  });

  it("publishes sensor values as text", () => {
    const messages = buildDeviceMessages(snapshot, "stokercloud/12345");

    expect(messages).toContainEqual({
      topic: "stokercloud/12345/sensor/boiler_temperature",
      payload: "64.5",
    });
    expect(messages).toContainEqual({
      topic: "stokercloud/12345/sensor/dhw_temperature",
      payload: "",
    });
  });

  it("publishes device info as JSON and marks the device online", () => {
    const messages = buildDeviceMessages(snapshot, "stokercloud/12345");
    const device = messages.find((m) => m.topic === "stokercloud/12345/device");

    expect(JSON.parse(device?.payload ?? "null")).toEqual({
      identifier: "12345",
      name: "12345 / cellar",
      manufacturer: "StokerCloud",
      model: "pellet furnace",
    });
    expect(messages[messages.length - 1]).toEqual({
      topic: "stokercloud/12345/availability",
      payload: "online",
    });
  });
});

describe("buildEventLogMessages", () => {
  const batch: EventBatchResult = {
    rawPayload: {},
    events: [{ n: 1 }, { n: 2 }],
    count: 100,
    offset: 0,
    translationLanguage: "uk",
    translationsLoaded: true,
  };

  it("publishes the event count and full attributes within budget", () => {
    const [state, attributes] = buildEventLogMessages(
      batch,
      "stokercloud/12345",
      16_000,
    );

    expect(state).toEqual({ topic: "stokercloud/12345/event_log/state", payload: "2" });
    expect(attributes.topic).toBe("stokercloud/12345/event_log/attributes");
    expect(JSON.parse(attributes.payload)).toEqual({
      events: [{ n: 1 }, { n: 2 }],
      events_total: 2,
      events_truncated: false,
      count: 100,
      offset: 0,
      translation_language: "uk",
      translations_loaded: true,
    });
  });

  it("truncates attributes but keeps the full count as state", () => {
    // [{"n":1}] is 9 bytes, both records 17
    const [state, attributes] = buildEventLogMessages(
      batch,
      "stokercloud/12345",
      10,
    );

    expect(state.payload).toBe("2");
    expect(JSON.parse(attributes.payload)).toMatchObject({
      events: [{ n: 1 }],
      events_total: 2,
      events_truncated: true,
    });
  });
});
