/**
 * MQTT Module - Error Types
 *
 * Errors are values, not exceptions.
 */

export type MqttError =
  | {
      readonly type: "NOT_CONNECTED";
      readonly message: string;
    }
  | {
      readonly type: "PUBLISH_FAILED";
      readonly topic: string;
      readonly message: string;
    };

/**
 * Create a NOT_CONNECTED error.
 */
export function notConnected(): MqttError {
  return { type: "NOT_CONNECTED", message: "MQTT client not initialized" };
}

/**
 * Create a PUBLISH_FAILED error.
 */
export function publishFailed(topic: string, message: string): MqttError {
  return { type: "PUBLISH_FAILED", topic, message };
}

/**
 * Format an MqttError for logging.
 */
export function formatMqttError(error: MqttError): string {
  switch (error.type) {
    case "NOT_CONNECTED":
      return error.message;
    case "PUBLISH_FAILED":
      return `Publish to ${error.topic} failed: ${error.message}`;
  }
}
