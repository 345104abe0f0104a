/**
 * Bridge Module - Service Layer
 *
 * Startup sequence and lifecycle: translations, token guard, both poll
 * coordinators and the publishers that republish their results.
 */
import { type Result, err, ok } from "neverthrow";

import type { TokenGuard } from "../auth/index.js";
import { createTokenGuard, formatTokenGuardError } from "../auth/index.js";
import type {
  CoordinatorState,
  DeviceCoordinator,
  EventCoordinator,
} from "../coordinator/index.js";
import {
  createDeviceCoordinator,
  createEventCoordinator,
} from "../coordinator/index.js";
import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import type {
  StokerCloudClient,
  TranslationTable,
} from "../stokercloud/index.js";
import {
  createStokerCloudClient,
  formatStokerCloudError,
} from "../stokercloud/index.js";
import type { SetupError } from "./errors.js";
import { alreadyStarted, formatSetupError, setupFailed } from "./errors.js";
import type {
  BridgeOptions,
  BridgeState,
  PollSource,
  Publisher,
} from "./schema.js";

const log = createLogger("bridge");

// =============================================================================
// Module State
// =============================================================================

type RunningBridge = Readonly<{
  guard: TokenGuard;
  device: DeviceCoordinator;
  events: EventCoordinator;
  unsubscribe: ReadonlyArray<() => void>;
  translationsLoaded: boolean;
  startedAt: number;
}>;

let bridge: RunningBridge | null = null;
let starting = false;

/**
 * Current bridge state, or null when the bridge is not running.
 */
export function getBridgeState(): BridgeState | null {
  if (!bridge) {
    return null;
  }

  return {
    device: bridge.device.getState(),
    events: bridge.events.getState(),
    authenticated: bridge.guard.hasToken(),
    translationsLoaded: bridge.translationsLoaded,
    startedAt: bridge.startedAt,
  };
}

// =============================================================================
// Translations
// =============================================================================

/**
 * Fetch the translation table once. Best-effort: any failure yields an
 * empty table and event annotation is skipped.
 */
export async function loadTranslations(
  client: StokerCloudClient,
  language: string,
): Promise<TranslationTable> {
  const result = await client.fetchTranslations(language);

  if (result.isErr()) {
    log.warn(
      { language, error: formatStokerCloudError(result.error) },
      "Failed to fetch translations, event codes stay untranslated",
    );
    return {};
  }

  log.info(
    { language, entries: Object.keys(result.value).length },
    "Translations loaded",
  );
  return result.value;
}

// =============================================================================
// Publishing
// =============================================================================

function notify(
  publisher: Publisher,
  action: string,
  publish: () => void,
): void {
  try {
    publish();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.error({ publisher: publisher.name, action, error: message }, "Publisher failed");
  }
}

/**
 * Forward new data and new errors from a coordinator to every publisher.
 */
function connectPublishers<T, E>(
  source: PollSource,
  coordinator: {
    getState(): CoordinatorState<T, E>;
    subscribe(listener: (state: CoordinatorState<T, E>) => void): () => void;
  },
  publishers: ReadonlyArray<Publisher>,
  publishData: (publisher: Publisher, data: T) => void,
  formatError: (error: E) => string,
): () => void {
  let previous = coordinator.getState();

  return coordinator.subscribe((state) => {
    const { data, lastError } = state;

    if (data !== null && data !== previous.data) {
      for (const publisher of publishers) {
        notify(publisher, `${source}:data`, () => publishData(publisher, data));
      }
    }

    if (lastError !== null && lastError !== previous.lastError) {
      const message = formatError(lastError);
      for (const publisher of publishers) {
        notify(publisher, `${source}:error`, () =>
          publisher.publishError(source, message),
        );
      }
    }

    previous = state;
  });
}

// =============================================================================
// Lifecycle
// =============================================================================

/**
 * Start the bridge.
 *
 * The first device refresh must succeed - without a snapshot there is
 * nothing to serve. The first event refresh may fail; the bridge then
 * starts with no event data.
 */
export async function startBridge(
  options: BridgeOptions,
): Promise<Result<BridgeState, SetupError>> {
  if (bridge || starting) {
    log.warn("Bridge already running");
    return err(alreadyStarted());
  }

  starting = true;
  const startTime = Date.now();
  logOperationStart(log, "startBridge", {
    deviceIntervalMs: options.deviceIntervalMs,
    eventIntervalMs: options.eventIntervalMs,
  });

  try {
    const client = createStokerCloudClient({
      transport: options.transport,
      apiBaseUrl: options.apiBaseUrl,
      translationBaseUrl: options.translationBaseUrl,
    });

    const translations = await loadTranslations(
      client,
      options.translationLanguage,
    );

    const guard = createTokenGuard({
      username: options.username,
      login: (username, signal) => client.login(username, signal),
    });

    const device = createDeviceCoordinator({
      guard,
      client,
      intervalMs: options.deviceIntervalMs,
    });

    const events = createEventCoordinator({
      guard,
      client,
      intervalMs: options.eventIntervalMs,
      settings: {
        count: options.eventCount,
        offset: options.eventOffset,
        translationLanguage: options.translationLanguage,
        translations,
      },
    });

    const unsubscribe = [
      connectPublishers(
        "device",
        device,
        options.publishers,
        (publisher, snapshot) => publisher.publishDevice(snapshot),
        formatTokenGuardError,
      ),
      connectPublishers(
        "events",
        events,
        options.publishers,
        (publisher, batch) => publisher.publishEventLog(batch),
        formatTokenGuardError,
      ),
    ];

    const first = await device.refresh();
    if (first.isErr()) {
      for (const stop of unsubscribe) stop();
      guard.clear();

      // Only stop() aborts a cycle, and nothing has been started yet
      const error =
        first.error.type === "CYCLE_ABORTED"
          ? setupFailed({ type: "PROTOCOL_ERROR", message: first.error.message })
          : setupFailed(first.error);
      logOperationFailed(log, "startBridge", formatSetupError(error));
      return err(error);
    }

    const firstEvents = await events.refresh();
    if (firstEvents.isErr()) {
      log.warn(
        { error: firstEvents.error.message },
        "Unable to fetch event log on startup, continuing without event data",
      );
    }

    device.start();
    events.start();

    bridge = {
      guard,
      device,
      events,
      unsubscribe,
      translationsLoaded: Object.keys(translations).length > 0,
      startedAt: startTime,
    };

    logOperationComplete(log, "startBridge", startTime, {
      events: firstEvents.isOk() ? firstEvents.value.events.length : null,
    });

    return ok({
      device: device.getState(),
      events: events.getState(),
      authenticated: guard.hasToken(),
      translationsLoaded: bridge.translationsLoaded,
      startedAt: startTime,
    });
  } finally {
    starting = false;
  }
}

/**
 * Stop both loops, abandon in-flight cycles and forget the session token.
 */
export function stopBridge(): void {
  if (!bridge) {
    log.warn("Bridge not running");
    return;
  }

  log.info("Stopping bridge...");
  bridge.device.stop();
  bridge.events.stop();
  for (const stop of bridge.unsubscribe) stop();
  bridge.guard.clear();
  bridge = null;
  log.info("Bridge stopped");
}
