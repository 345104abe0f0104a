/**
 * API routes for the StokerCloud bridge.
 *
 * - /api/health - Health check
 * - /api/version - App version
 * - /api/device - Device identity and every sensor
 * - /api/sensors/:key - One sensor
 * - /api/events - Event log state and attributes
 * - /api/stream - SSE stream of updates
 */
import { Hono } from "hono";

import { formatTokenGuardError } from "../auth/index.js";
import type { TokenGuardError } from "../auth/index.js";
import { getBridgeState } from "../bridge/index.js";
import { getPollingConfig } from "../config.js";
import type { CoordinatorState } from "../coordinator/index.js";
import { createLogger } from "../logger.js";
import { isConnected } from "../mqtt/index.js";
import {
  buildEventLogView,
  deriveDeviceInfo,
  findSensorDescription,
  projectSensors,
  readSensor,
  SENSOR_DESCRIPTIONS,
} from "../sensors/index.js";
import {
  createSseStream,
  getClientCount,
  sendToClient,
  toDeviceSnapshotEvent,
  toEventLogEvent,
} from "../sse/index.js";

const log = createLogger("api");

export const APP_VERSION = "1.0.0";

export const routes = new Hono();

function toIso(timestamp: number | null): string | null {
  return timestamp === null ? null : new Date(timestamp).toISOString();
}

function describeLoop<T>(state: CoordinatorState<T, TokenGuardError>) {
  return {
    ready: state.data !== null,
    running: state.isRunning,
    lastSuccessAt: toIso(state.lastSuccessAt),
    lastAttemptAt: toIso(state.lastAttemptAt),
    consecutiveFailures: state.consecutiveFailures,
    lastError: state.lastError ? formatTokenGuardError(state.lastError) : null,
  };
}

// =============================================================================
// Health Check
// =============================================================================

/**
 * Health endpoint - "starting" until the bridge is up, "degraded" while
 * either loop's latest refresh failed.
 */
routes.get("/api/health", (c) => {
  const requestId = c.get("requestId");
  log.debug({ requestId }, "Health check");

  const state = getBridgeState();
  const status =
    state === null
      ? "starting"
      : state.device.lastError !== null || state.events.lastError !== null
        ? "degraded"
        : "ok";

  return c.json({
    status,
    timestamp: new Date().toISOString(),
    requestId,
    version: APP_VERSION,
    device: state ? describeLoop(state.device) : null,
    events: state ? describeLoop(state.events) : null,
    authenticated: state?.authenticated ?? false,
    translationsLoaded: state?.translationsLoaded ?? false,
    sseClients: getClientCount(),
    mqttConnected: isConnected(),
  });
});

/**
 * Version endpoint - returns app version.
 */
routes.get("/api/version", (c) => {
  return c.json({ version: APP_VERSION });
});

// =============================================================================
// Device and Sensors
// =============================================================================

routes.get("/api/device", (c) => {
  const requestId = c.get("requestId");
  const snapshot = getBridgeState()?.device;

  if (!snapshot?.data) {
    log.debug({ requestId }, "Device data requested before first snapshot");
    return c.json({ error: "Device data not available yet", requestId }, 503);
  }

  return c.json({
    device: deriveDeviceInfo(snapshot.data),
    sensors: projectSensors(snapshot.data, SENSOR_DESCRIPTIONS),
    updatedAt: toIso(snapshot.lastSuccessAt),
    stale: snapshot.lastError !== null,
    requestId,
  });
});

routes.get("/api/sensors/:key", (c) => {
  const requestId = c.get("requestId");
  const key = c.req.param("key");
  const description = findSensorDescription(key);

  if (!description) {
    return c.json({ error: `Unknown sensor: ${key}`, requestId }, 404);
  }

  const snapshot = getBridgeState()?.device;
  if (!snapshot?.data) {
    return c.json({ error: "Device data not available yet", requestId }, 503);
  }

  return c.json({
    sensor: readSensor(description, snapshot.data),
    updatedAt: toIso(snapshot.lastSuccessAt),
    requestId,
  });
});

// =============================================================================
// Event Log
// =============================================================================

routes.get("/api/events", (c) => {
  const requestId = c.get("requestId");
  const events = getBridgeState()?.events;

  if (!events?.data) {
    return c.json(
      { events: null, error: "Event log not available yet", requestId },
      503,
    );
  }

  const view = buildEventLogView(
    events.data,
    getPollingConfig().attributeBudgetBytes,
  );

  return c.json({
    state: view.state,
    attributes: view.attributes,
    updatedAt: toIso(events.lastSuccessAt),
    requestId,
  });
});

// =============================================================================
// Server-Sent Events
// =============================================================================

/**
 * SSE stream. New clients get the current snapshot and event log right
 * after the `connected` event.
 */
routes.get("/api/stream", (c) => {
  const requestId = c.get("requestId");
  const { stream, clientId } = createSseStream();
  log.info({ requestId, clientId }, "SSE stream opened");

  const state = getBridgeState();
  if (state?.device.data) {
    sendToClient(
      clientId,
      toDeviceSnapshotEvent(
        state.device.data,
        state.device.lastSuccessAt ?? Date.now(),
      ),
    );
  }
  if (state?.events.data) {
    sendToClient(
      clientId,
      toEventLogEvent(state.events.data, getPollingConfig().attributeBudgetBytes),
    );
  }

  return new Response(stream, {
    headers: {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    },
  });
});
