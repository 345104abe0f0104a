/**
 * StokerCloud Service Tests
 *
 * Tests the API client against a fake transport.
 */
import { describe, expect, test, vi, beforeEach } from "vitest";
import { err, ok } from "neverthrow";

vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

import { protocolError } from "../errors.js";
import { DEFAULT_SCREEN } from "../schema.js";
import { createStokerCloudClient } from "../service.js";
import type { RequestExecutor } from "../transport.js";

describe("StokerCloud Client", () => {
  const transport = vi.fn<RequestExecutor>();
  const client = createStokerCloudClient({
    transport,
    apiBaseUrl: "https://api.test/v2/dataout2/",
    translationBaseUrl: "https://assets.test/translation",
  });

  beforeEach(() => {
    transport.mockReset();
  });

  // ===========================================================================
  // login
  // ===========================================================================

  describe("login", () => {
    test("posts the username and returns the token", async () => {
      // Arrange
      transport.mockResolvedValue(ok({ status: 0, token: "test-token", master: 42 }));

      // Act
      const result = await client.login("test-user");

      // Assert
      expect(result._unsafeUnwrap()).toEqual({ token: "test-token", master: 42 });
      expect(transport).toHaveBeenCalledWith({
        method: "POST",
        url: "https://api.test/v2/dataout2/login.php",
        params: { user: "test-user" },
      });
    });

    test("returns AUTH_ERROR when no token is issued", async () => {
      transport.mockResolvedValue(ok({ status: 0 }));

      const result = await client.login("test-user");

      expect(result._unsafeUnwrapErr().type).toBe("AUTH_ERROR");
    });

    test("returns PROTOCOL_ERROR for a non-auth failure status", async () => {
      transport.mockResolvedValue(ok({ status: 1, message: "Maintenance" }));

      const result = await client.login("test-user");

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: "PROTOCOL_ERROR",
        message: "Maintenance",
      });
    });

    test("passes transport errors through", async () => {
      transport.mockResolvedValue(err(protocolError("Request timed out")));

      const result = await client.login("test-user");

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "PROTOCOL_ERROR",
        message: "Request timed out",
      });
    });
  });

  // ===========================================================================
  // fetchControllerData
  // ===========================================================================

  describe("fetchControllerData", () => {
    test("requests the default screen with the token", async () => {
      const snapshot = { miscdata: {}, serial: "12345" };
      transport.mockResolvedValue(ok(snapshot));
      const controller = new AbortController();

      const result = await client.fetchControllerData("test-token", controller.signal);

      expect(result._unsafeUnwrap()).toEqual(snapshot);
      expect(transport).toHaveBeenCalledWith({
        method: "GET",
        url: "https://api.test/v2/dataout2/controllerdata2.php",
        params: { screen: DEFAULT_SCREEN, token: "test-token" },
        signal: controller.signal,
      });
    });

    test("maps a token rejection message to AUTH_ERROR", async () => {
      transport.mockResolvedValue(ok({ status: 2, message: "Invalid token" }));

      const result = await client.fetchControllerData("stale-token");

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "AUTH_ERROR",
        message: "Invalid token",
      });
    });
  });

  // ===========================================================================
  // fetchEventData
  // ===========================================================================

  describe("fetchEventData", () => {
    test("returns the raw payload and extracted events", async () => {
      const payload = { eventdata: [{ a: 1 }, "skip", { b: 2 }] };
      transport.mockResolvedValue(ok(payload));

      const result = await client.fetchEventData("test-token", { count: 50, offset: 10 });

      expect(result._unsafeUnwrap()).toEqual({
        rawPayload: payload,
        events: [{ a: 1 }, { b: 2 }],
      });
      expect(transport).toHaveBeenCalledWith({
        method: "GET",
        url: "https://api.test/v2/dataout2/geteventdata.php",
        params: { count: 50, offset: 10, token: "test-token" },
      });
    });
  });

  // ===========================================================================
  // fetchTranslations
  // ===========================================================================

  describe("fetchTranslations", () => {
    test("fetches <language>.json without query parameters", async () => {
      transport.mockResolvedValue(ok({ IGN: "Ignition", n: 1 }));

      const result = await client.fetchTranslations("uk");

      expect(result._unsafeUnwrap()).toEqual({ IGN: "Ignition" });
      expect(transport).toHaveBeenCalledWith({
        method: "GET",
        url: "https://assets.test/translation/uk.json",
        params: {},
      });
    });
  });
});
