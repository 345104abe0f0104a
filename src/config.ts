/**
 * Typed configuration - all config lives in .env, parsed with Zod at startup.
 * App crashes immediately on invalid config - fail fast.
 *
 * StokerCloud Bridge configuration covering:
 * - Server settings
 * - StokerCloud account and endpoints
 * - Polling intervals and event paging
 * - MQTT republishing
 */
import { z } from "zod";

/**
 * Custom boolean parser for environment variables.
 * z.coerce.boolean() doesn't work with string "false" (it's truthy).
 */
const envBoolean = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((val) =>
      val === undefined ? defaultValue : val.toLowerCase() === "true",
    );

/**
 * Parse optional URL - empty string becomes undefined
 */
const optionalUrl = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== "" ? val : undefined));

export const ConfigSchema = z.object({
  // ==========================================================================
  // Server Configuration
  // ==========================================================================
  PORT: z.coerce.number().default(8084).describe("HTTP server port"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  APP_NAME: z
    .string()
    .default("StokerCloudBridge")
    .describe("Application name"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),

  // ==========================================================================
  // StokerCloud Account & Endpoints
  // ==========================================================================
  STOKERCLOUD_USERNAME: z
    .string()
    .trim()
    .min(1, "STOKERCLOUD_USERNAME is required")
    .describe("StokerCloud account name (the API takes no password)"),
  STOKERCLOUD_API_URL: z
    .string()
    .url()
    .default("https://stokercloud.dk/v2/dataout2")
    .describe("Base URL of the data endpoints (login.php, controllerdata2.php, ...)"),
  STOKERCLOUD_TRANSLATION_URL: z
    .string()
    .url()
    .default("https://stokercloud.dk/v3/assets/json/translation")
    .describe("Base URL of the static translation files"),
  TRANSLATION_LANGUAGE: z
    .string()
    .min(1)
    .default("uk")
    .describe("Translation file to load (<language>.json)"),
  REQUEST_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .default(10000)
    .describe("Timeout for every StokerCloud request (ms)"),

  // ==========================================================================
  // Polling
  // ==========================================================================
  DEVICE_POLL_INTERVAL_MS: z.coerce
    .number()
    .positive()
    .default(30000)
    .describe("Controller data polling interval (ms)"),
  EVENT_POLL_INTERVAL_MS: z.coerce
    .number()
    .positive()
    .default(300000)
    .describe("Event log polling interval (ms)"),
  EVENT_COUNT: z.coerce
    .number()
    .int()
    .positive()
    .default(100)
    .describe("Number of events requested per poll"),
  EVENT_OFFSET: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(0)
    .describe("Offset into the event log"),
  EVENT_ATTRIBUTE_BUDGET_BYTES: z.coerce
    .number()
    .int()
    .positive()
    .default(16000)
    .describe("Maximum serialized size of published event attributes (bytes)"),

  // ==========================================================================
  // MQTT Republishing
  // ==========================================================================
  ENABLE_MQTT: envBoolean(true).describe("Enable MQTT republishing"),
  MQTT_BROKER_URL: optionalUrl.describe("MQTT broker connection URL"),
  MQTT_TOPIC_PREFIX: z
    .string()
    .min(1)
    .default("stokercloud")
    .describe("Root topic for published values"),
});

// Parse at startup - crashes immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config = parsed.data;

// Type export for use elsewhere
export type Config = z.infer<typeof ConfigSchema>;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * MQTT configuration object for the publisher.
 * Returns null if MQTT is disabled or no broker is configured.
 */
export function getMqttConfig(): Readonly<{
  brokerUrl: string;
  topicPrefix: string;
}> | null {
  if (!config.ENABLE_MQTT || !config.MQTT_BROKER_URL) {
    return null;
  }

  return {
    brokerUrl: config.MQTT_BROKER_URL,
    topicPrefix: config.MQTT_TOPIC_PREFIX,
  };
}

/**
 * Polling configuration for the bridge.
 */
export function getPollingConfig(): Readonly<{
  deviceIntervalMs: number;
  eventIntervalMs: number;
  eventCount: number;
  eventOffset: number;
  attributeBudgetBytes: number;
}> {
  return {
    deviceIntervalMs: config.DEVICE_POLL_INTERVAL_MS,
    eventIntervalMs: config.EVENT_POLL_INTERVAL_MS,
    eventCount: config.EVENT_COUNT,
    eventOffset: config.EVENT_OFFSET,
    attributeBudgetBytes: config.EVENT_ATTRIBUTE_BUDGET_BYTES,
  };
}
