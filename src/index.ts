/**
 * StokerCloud Bridge - Application Entry Point
 *
 * Sets up the Hono server on Node, then starts the bridge:
 * - token-guarded access to the StokerCloud API
 * - device and event log refresh loops
 * - SSE and (optionally) MQTT republishing
 */
import { serve } from "@hono/node-server";

import { createApp } from "./api/app.js";
import type { Publisher } from "./bridge/index.js";
import { formatSetupError, startBridge, stopBridge } from "./bridge/index.js";
import { config, getMqttConfig, getPollingConfig } from "./config.js";
import { createLogger } from "./logger.js";
import {
  createMqttPublisher,
  disconnectMqttClient,
  initializeMqttClient,
} from "./mqtt/index.js";
import { createSsePublisher, disconnectAllClients } from "./sse/index.js";
import { createFetchTransport } from "./stokercloud/index.js";

const log = createLogger("bridge");

// =============================================================================
// APPLICATION STARTUP BANNER
// =============================================================================

console.log("");
console.log("========================================");
console.log("  STOKERCLOUD BRIDGE");
console.log("========================================");
console.log("");

const polling = getPollingConfig();
const mqttConfig = getMqttConfig();

// Non-sensitive values only; the session token is never logged
log.info(
  {
    port: config.PORT,
    env: config.NODE_ENV,
    username: config.STOKERCLOUD_USERNAME,
    apiUrl: config.STOKERCLOUD_API_URL,
    translationLanguage: config.TRANSLATION_LANGUAGE,
    deviceIntervalMs: polling.deviceIntervalMs,
    eventIntervalMs: polling.eventIntervalMs,
    eventCount: polling.eventCount,
    requestTimeoutMs: config.REQUEST_TIMEOUT_MS,
  },
  "Configuration loaded",
);

// =============================================================================
// PUBLISHERS
// =============================================================================

const publishers: Publisher[] = [createSsePublisher(polling.attributeBudgetBytes)];

if (mqttConfig && initializeMqttClient(mqttConfig.brokerUrl)) {
  publishers.push(
    createMqttPublisher({
      topicPrefix: mqttConfig.topicPrefix,
      fallbackDeviceId: config.STOKERCLOUD_USERNAME,
      attributeBudgetBytes: polling.attributeBudgetBytes,
    }),
  );
  log.info({ topicPrefix: mqttConfig.topicPrefix }, "MQTT publishing: ENABLED");
} else {
  log.info("MQTT publishing: DISABLED");
}

// =============================================================================
// START SERVER
// =============================================================================

const app = createApp();

const server = serve(
  { fetch: app.fetch, port: config.PORT, hostname: "0.0.0.0" },
  (info) => {
    log.info(
      { port: info.port, appName: config.APP_NAME },
      `🚀 ${config.APP_NAME} listening on port ${info.port}`,
    );
  },
);

// =============================================================================
// START BRIDGE
// =============================================================================

async function main(): Promise<void> {
  const result = await startBridge({
    username: config.STOKERCLOUD_USERNAME,
    transport: createFetchTransport({ timeoutMs: config.REQUEST_TIMEOUT_MS }),
    apiBaseUrl: config.STOKERCLOUD_API_URL,
    translationBaseUrl: config.STOKERCLOUD_TRANSLATION_URL,
    translationLanguage: config.TRANSLATION_LANGUAGE,
    deviceIntervalMs: polling.deviceIntervalMs,
    eventIntervalMs: polling.eventIntervalMs,
    eventCount: polling.eventCount,
    eventOffset: polling.eventOffset,
    publishers,
  });

  if (result.isErr()) {
    log.fatal({ error: formatSetupError(result.error) }, "Bridge failed to start");
    shutdown("SETUP_FAILED", 1);
  }
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  log.fatal({ error: message }, "Bridge crashed");
  shutdown("CRASH", 1);
});

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

function shutdown(reason: string, exitCode = 0): void {
  log.info({ reason }, `${reason}: shutting down...`);

  stopBridge();
  disconnectMqttClient();
  disconnectAllClients();

  server.close(() => {
    log.info("Shutdown complete");
    process.exit(exitCode);
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
