/**
 * MQTT Module - Service Layer
 *
 * MQTT client management and retained republishing of bridge results.
 */
import mqtt from "mqtt";
import type { MqttClient } from "mqtt";
import { type Result, err, ok } from "neverthrow";

import type { Publisher } from "../bridge/index.js";
import { createLogger } from "../logger.js";
import type { MqttError } from "./errors.js";
import { formatMqttError, notConnected, publishFailed } from "./errors.js";
import type { MqttMessage, MqttPublisherOptions } from "./schema.js";
import {
  buildAvailabilityMessage,
  buildBaseTopic,
  buildDeviceMessages,
  buildEventLogMessages,
  resolveDeviceId,
} from "./transform.js";

const log = createLogger("mqtt");

// =============================================================================
// Module State
// =============================================================================

let mqttClient: MqttClient | null = null;

// =============================================================================
// MQTT Client Management
// =============================================================================

/**
 * Initialize and connect the MQTT client.
 *
 * @returns true if connection initiated successfully
 */
export function initializeMqttClient(brokerUrl: string): boolean {
  if (mqttClient) {
    log.warn("MQTT client already initialized");
    return true;
  }

  log.info({ broker: brokerUrl }, "Connecting to MQTT broker...");

  try {
    mqttClient = mqtt.connect(brokerUrl, {
      reconnectPeriod: 5000,
      connectTimeout: 10000,
    });

    setupClientHandlers(mqttClient);

    return true;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.error({ error: message }, "Failed to initialize MQTT client");
    return false;
  }
}

function setupClientHandlers(client: MqttClient): void {
  client.on("connect", () => {
    log.info("Connected to MQTT broker");
  });

  client.on("error", (error) => {
    log.error({ error: error.message }, "MQTT client error");
  });

  client.on("close", () => {
    log.warn("MQTT connection closed");
  });

  client.on("reconnect", () => {
    log.info("Reconnecting to MQTT broker...");
  });

  client.on("offline", () => {
    log.warn("MQTT client offline");
  });
}

/**
 * Publish messages retained. While the broker is unreachable the client
 * queues them and flushes on reconnect.
 *
 * @returns number of messages handed to the client
 */
export function publishMessages(
  messages: ReadonlyArray<MqttMessage>,
): Result<number, MqttError> {
  const client = mqttClient;
  if (!client) {
    return err(notConnected());
  }

  for (const { topic, payload } of messages) {
    client.publish(topic, payload, { qos: 0, retain: true }, (error) => {
      if (error) {
        log.warn({ error: formatMqttError(publishFailed(topic, error.message)) }, "Publish failed");
      }
    });
  }

  log.debug({ count: messages.length }, "Messages published");
  return ok(messages.length);
}

/**
 * Check if MQTT client is connected.
 */
export function isConnected(): boolean {
  return mqttClient?.connected ?? false;
}

/**
 * Disconnect and clean up MQTT client.
 */
export function disconnectMqttClient(): void {
  if (mqttClient) {
    log.info("Disconnecting MQTT client...");
    mqttClient.end(true);
    mqttClient = null;
  }
}

// =============================================================================
// Publisher
// =============================================================================

/**
 * Bridge publisher writing retained topics under `<prefix>/<deviceId>/`.
 * The device segment follows the latest snapshot's identifier.
 */
export function createMqttPublisher(options: MqttPublisherOptions): Publisher {
  let deviceId = options.fallbackDeviceId;

  const baseTopic = (): string => buildBaseTopic(options.topicPrefix, deviceId);

  const send = (messages: ReadonlyArray<MqttMessage>): void => {
    const result = publishMessages(messages);
    if (result.isErr()) {
      log.warn({ error: formatMqttError(result.error) }, "Skipping MQTT publish");
    }
  };

  return {
    name: "mqtt",
    publishDevice(snapshot) {
      deviceId = resolveDeviceId(snapshot, options.fallbackDeviceId);
      send(buildDeviceMessages(snapshot, baseTopic()));
    },
    publishEventLog(batch) {
      send(buildEventLogMessages(batch, baseTopic(), options.attributeBudgetBytes));
    },
    publishError(source) {
      // Only device failures mean the furnace data is stale
      if (source === "device") {
        send([buildAvailabilityMessage(baseTopic(), "offline")]);
      }
    },
  };
}
