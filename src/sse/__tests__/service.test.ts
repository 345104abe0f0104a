/**
 * SSE Service Tests
 *
 * Tests SSE client management, broadcasting and the bridge publisher.
 */
import { describe, expect, test, vi, beforeEach, afterEach } from "vitest";

// Mock logger
vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

// Import after mocks
import type { EventBatchResult } from "../../stokercloud/index.js";
import {
  broadcast,
  createSsePublisher,
  createSseStream,
  disconnectAllClients,
  getClientCount,
  removeClient,
  sendToClient,
} from "../service.js";

const decoder = new TextDecoder();

async function readFrame(
  reader: ReadableStreamDefaultReader<Uint8Array>,
): Promise<{ event: string; data: unknown }> {
  const { value } = await reader.read();
  const [eventLine, dataLine] = decoder.decode(value).split("\n");
  return {
    event: eventLine.replace("event: ", ""),
    data: JSON.parse(dataLine.replace("data: ", "")),
  };
}

describe("SSE Service", () => {
  beforeEach(() => {
    disconnectAllClients();
  });

  afterEach(() => {
    disconnectAllClients();
  });

  // ===========================================================================
  // Client Management
  // ===========================================================================

  describe("getClientCount", () => {
    test("returns 0 when no clients connected", () => {
      expect(getClientCount()).toBe(0);
    });

    test("returns correct count after clients connect", () => {
      createSseStream();
      createSseStream();
      createSseStream();

      expect(getClientCount()).toBe(3);
    });
  });

  describe("createSseStream", () => {
    test("increments client ID for each new client", () => {
      const client1 = createSseStream();
      const client2 = createSseStream();

      expect(client1.stream).toBeInstanceOf(ReadableStream);
      expect(client2.clientId).toBeGreaterThan(client1.clientId);
    });

    test("sends connected event on stream start", async () => {
      const { stream, clientId } = createSseStream();
      const reader = stream.getReader();

      const frame = await readFrame(reader);
      reader.releaseLock();

      expect(frame).toEqual({
        event: "connected",
        data: { type: "connected", clientId },
      });
    });

    test("cancelling the stream unregisters the client", async () => {
      const { stream } = createSseStream();
      expect(getClientCount()).toBe(1);

      await stream.cancel();

      expect(getClientCount()).toBe(0);
    });
  });

  describe("removeClient", () => {
    test("removes client by ID", () => {
      const { clientId } = createSseStream();

      removeClient(clientId);

      expect(getClientCount()).toBe(0);
    });

    test("does nothing for non-existent client ID", () => {
      createSseStream();

      removeClient(99999);

      expect(getClientCount()).toBe(1);
    });
  });

  // ===========================================================================
  // Broadcasting
  // ===========================================================================

  describe("broadcast", () => {
    test("sends event to all connected clients", async () => {
      const reader1 = createSseStream().stream.getReader();
      const reader2 = createSseStream().stream.getReader();
      await readFrame(reader1);
      await readFrame(reader2);

      broadcast({ type: "poll_error", source: "device", message: "boom" });

      const expected = {
        event: "poll_error",
        data: { type: "poll_error", source: "device", message: "boom" },
      };
      expect(await readFrame(reader1)).toEqual(expected);
      expect(await readFrame(reader2)).toEqual(expected);

      reader1.releaseLock();
      reader2.releaseLock();
    });

    test("does nothing when no clients connected", () => {
      expect(() => {
        broadcast({ type: "poll_error", source: "events", message: "boom" });
      }).not.toThrow();
    });
  });

  describe("sendToClient", () => {
    test("sends event to specific client", async () => {
      const { stream, clientId } = createSseStream();
      const reader = stream.getReader();
      await readFrame(reader);

      const sent = sendToClient(clientId, {
        type: "poll_error",
        source: "device",
        message: "boom",
      });

      expect(sent).toBe(true);
      expect((await readFrame(reader)).event).toBe("poll_error");
      reader.releaseLock();
    });

    test("returns false for non-existent client", () => {
      const sent = sendToClient(99999, {
        type: "poll_error",
        source: "device",
        message: "boom",
      });
      expect(sent).toBe(false);
    });
  });

  // ===========================================================================
  // Publisher
  // ===========================================================================

  describe("createSsePublisher", () => {
    test("publishes a device snapshot with identity and sensors", async () => {
      const reader = createSseStream().stream.getReader();
      await readFrame(reader);
      const publisher = createSsePublisher(16_000);

      publisher.publishDevice({
        serial: "12345",
        alias: "cellar",
        miscdata: {},
        frontdata: [{ id: "boilertemp", value: "64.5" }],
      });

      const frame = await readFrame(reader);
      reader.releaseLock();

      expect(frame.event).toBe("device_snapshot");
      expect(frame.data).toMatchObject({
        type: "device_snapshot",
        device: {
          identifier: "12345",
          name: "12345 / cellar",
          manufacturer: "StokerCloud",
          model: "pellet furnace",
        },
      });
      expect(frame.data).toMatchObject({
        sensors: expect.arrayContaining([
          expect.objectContaining({ key: "boiler_temperature", value: 64.5 }),
          expect.objectContaining({ key: "dhw_temperature", value: null }),
        ]),
      });
    });

    test("publishes the event log with truncated attributes", async () => {
      const reader = createSseStream().stream.getReader();
      await readFrame(reader);
      // [{"n":1}] is 9 bytes, [{"n":1},{"n":2}] is 17
      const publisher = createSsePublisher(10);
      const batch: EventBatchResult = {
        rawPayload: {},
        events: [{ n: 1 }, { n: 2 }],
        count: 100,
        offset: 0,
        translationLanguage: "uk",
        translationsLoaded: false,
      };

      publisher.publishEventLog(batch);

      const frame = await readFrame(reader);
      reader.releaseLock();

      expect(frame).toEqual({
        event: "event_log",
        data: {
          type: "event_log",
          state: 2,
          attributes: {
            events: [{ n: 1 }],
            events_total: 2,
            events_truncated: true,
            count: 100,
            offset: 0,
            translation_language: "uk",
            translations_loaded: false,
          },
        },
      });
    });

    test("publishes poll errors with their source", async () => {
      const reader = createSseStream().stream.getReader();
      await readFrame(reader);

      createSsePublisher(16_000).publishError("events", "Token rejected");

      expect(await readFrame(reader)).toEqual({
        event: "poll_error",
        data: { type: "poll_error", source: "events", message: "Token rejected" },
      });
      reader.releaseLock();
    });
  });
});
