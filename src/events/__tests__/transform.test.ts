/**
 * Events Module - Transform Tests
 *
 * Translation annotation and byte-bounded truncation.
 */
import { describe, expect, it } from "vitest";

import {
  applyTranslations,
  encodedSize,
  translateEvent,
  truncateEvents,
} from "../transform.js";

// =============================================================================
// Translation
// =============================================================================

describe("translateEvent", () => {
  it("adds a _translated field for every string value in the table", () => {
    const event = { date: "2024-01-01", type: "IGN", level: 2 };

    expect(translateEvent(event, { IGN: "Ignition" })).toEqual({
      date: "2024-01-01",
      type: "IGN",
      type_translated: "Ignition",
      level: 2,
    });
  });

  it("does not modify the input record", () => {
    const event = { type: "IGN" };

    translateEvent(event, { IGN: "Ignition" });

    expect(event).toEqual({ type: "IGN" });
  });

  it("ignores inherited object keys", () => {
    expect(translateEvent({ type: "toString" }, { IGN: "Ignition" })).toEqual({
      type: "toString",
    });
  });
});

describe("applyTranslations", () => {
  it("returns the same list for an empty table", () => {
    const events = [{ type: "IGN" }];

    expect(applyTranslations(events, {})).toBe(events);
  });

  it("annotates every record in order", () => {
    const result = applyTranslations([{ a: "X" }, { a: "Y" }], { X: "ex" });

    expect(result).toEqual([{ a: "X", a_translated: "ex" }, { a: "Y" }]);
  });
});

// =============================================================================
// Truncation
// =============================================================================

/**
 * Records whose compact JSON is exactly 50 bytes: {"id":"<41 chars>"}.
 */
function fiftyByteRecords(count: number) {
  return Array.from({ length: count }, (_, i) => ({
    id: String(i).padStart(41, "0"),
  }));
}

describe("encodedSize", () => {
  it("counts UTF-8 bytes of the compact encoding", () => {
    expect(encodedSize([{ a: "é" }])).toBe(12);
    expect(encodedSize(fiftyByteRecords(1))).toBe(52);
  });
});

describe("truncateEvents", () => {
  it("keeps the longest prefix that fits the budget", () => {
    // k records encode to 51k + 1 bytes: 19 → 970, 20 → 1021
    const events = fiftyByteRecords(1000);

    const result = truncateEvents(events, 1000);

    expect(result.truncated).toBe(true);
    expect(result.events).toHaveLength(19);
    expect(result.events).toEqual(events.slice(0, 19));
  });

  it("returns everything when the list fits", () => {
    const events = fiftyByteRecords(3);

    expect(truncateEvents(events, 1000)).toEqual({ events, truncated: false });
  });

  it("keeps a single oversized record and flags it", () => {
    const events = [{ note: "x".repeat(100) }, { note: "y" }];

    expect(truncateEvents(events, 10)).toEqual({
      events: [{ note: "x".repeat(100) }],
      truncated: true,
    });
  });

  it("returns an empty list untruncated", () => {
    expect(truncateEvents([], 0)).toEqual({ events: [], truncated: false });
  });

  it("is idempotent", () => {
    const once = truncateEvents(fiftyByteRecords(100), 1000);
    const twice = truncateEvents(once.events, 1000);

    expect(twice.events).toEqual(once.events);
    expect(twice.truncated).toBe(false);
  });
});
