/**
 * Coordinator Module - Service Layer
 *
 * Periodic refresh loops. Each coordinator keeps the last good value and
 * the last error, publishes whole-value state swaps, and never runs two
 * cycles of itself at once.
 */
import { type Result, err } from "neverthrow";

import type { TokenGuard, TokenGuardError } from "../auth/index.js";
import { formatTokenGuardError } from "../auth/index.js";
import { createLogger } from "../logger.js";
import type {
  ControllerSnapshot,
  EventBatchResult,
  StokerCloudClient,
} from "../stokercloud/index.js";
import type {
  CoordinatorListener,
  CoordinatorOptions,
  CoordinatorState,
  CycleAborted,
} from "./schema.js";
import { initialCoordinatorState } from "./schema.js";
import type { EventLogSettings } from "./transform.js";
import { buildEventBatchResult, cycleAborted } from "./transform.js";

const log = createLogger("coordinator");

export type PollCoordinator<T, E> = Readonly<{
  name: string;
  getState(): CoordinatorState<T, E>;
  /** Run one cycle now; joins the running cycle if there is one */
  refresh(): Promise<Result<T, E | CycleAborted>>;
  start(): void;
  stop(): void;
  subscribe(listener: CoordinatorListener<T, E>): () => void;
}>;

// =============================================================================
// Generic Coordinator
// =============================================================================

export function createPollCoordinator<T, E>(
  options: CoordinatorOptions<T, E>,
): PollCoordinator<T, E> {
  const { name } = options;
  const listeners = new Set<CoordinatorListener<T, E>>();

  let state: CoordinatorState<T, E> = initialCoordinatorState();
  let inFlight: Promise<Result<T, E | CycleAborted>> | null = null;
  let controller: AbortController | null = null;
  let timer: ReturnType<typeof setTimeout> | null = null;
  // Bumped on start/stop so a tick from an earlier run never reschedules
  let generation = 0;

  function setState(next: CoordinatorState<T, E>): void {
    state = next;
    for (const listener of listeners) {
      try {
        listener(state);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        log.error({ coordinator: name, error: message }, "Coordinator listener failed");
      }
    }
  }

  async function runCycle(
    cycleController: AbortController,
  ): Promise<Result<T, E | CycleAborted>> {
    const startedAt = Date.now();
    log.debug({ coordinator: name }, "Refresh started");

    const result = await options.update(cycleController.signal);

    if (cycleController.signal.aborted) {
      log.debug({ coordinator: name }, "Refresh abandoned");
      return err(cycleAborted(name));
    }

    const now = Date.now();

    if (result.isOk()) {
      setState({
        ...state,
        data: result.value,
        lastError: null,
        lastSuccessAt: now,
        lastAttemptAt: now,
        consecutiveFailures: 0,
      });
      log.debug(
        { coordinator: name, durationMs: now - startedAt },
        "Refresh succeeded",
      );
      return result;
    }

    setState({
      ...state,
      lastError: result.error,
      lastAttemptAt: now,
      consecutiveFailures: state.consecutiveFailures + 1,
    });
    log.warn(
      {
        coordinator: name,
        error: options.formatError(result.error),
        consecutiveFailures: state.consecutiveFailures,
        hasData: state.data !== null,
      },
      "Refresh failed, keeping last good data",
    );
    return result;
  }

  function refresh(): Promise<Result<T, E | CycleAborted>> {
    if (inFlight) {
      log.debug({ coordinator: name }, "Refresh already in progress, joining");
      return inFlight;
    }

    const cycleController = new AbortController();
    controller = cycleController;

    const cycle = runCycle(cycleController).finally(() => {
      if (controller === cycleController) {
        controller = null;
      }
      if (inFlight === cycle) {
        inFlight = null;
      }
    });
    inFlight = cycle;
    return cycle;
  }

  function scheduleNext(runGeneration: number): void {
    timer = setTimeout(() => {
      timer = null;
      void tick(runGeneration);
    }, options.intervalMs);
  }

  async function tick(runGeneration: number): Promise<void> {
    try {
      await refresh();
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      log.error({ coordinator: name, error: message }, "Error in refresh cycle");
    }

    if (state.isRunning && runGeneration === generation) {
      scheduleNext(runGeneration);
    }
  }

  return {
    name,

    getState() {
      return state;
    },

    refresh,

    start() {
      if (state.isRunning) {
        log.warn({ coordinator: name }, "Coordinator already running");
        return;
      }

      generation++;
      log.info(
        { coordinator: name, intervalMs: options.intervalMs },
        "Starting refresh loop",
      );
      setState({ ...state, isRunning: true });
      scheduleNext(generation);
    },

    stop() {
      generation++;
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
      // An aborted cycle is never joined, a later refresh starts afresh
      controller?.abort();
      controller = null;
      inFlight = null;

      if (!state.isRunning) {
        log.debug({ coordinator: name }, "Coordinator not running");
        return;
      }

      log.info({ coordinator: name }, "Stopping refresh loop");
      setState({ ...state, isRunning: false });
    },

    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };
}

// =============================================================================
// StokerCloud Coordinators
// =============================================================================

export type DeviceCoordinator = PollCoordinator<ControllerSnapshot, TokenGuardError>;
export type EventCoordinator = PollCoordinator<EventBatchResult, TokenGuardError>;

/**
 * Fast loop: controller data through the token guard.
 */
export function createDeviceCoordinator(deps: {
  guard: TokenGuard;
  client: StokerCloudClient;
  intervalMs: number;
}): DeviceCoordinator {
  return createPollCoordinator({
    name: "device",
    intervalMs: deps.intervalMs,
    update: (signal) =>
      deps.guard.withToken(
        (token) => deps.client.fetchControllerData(token, signal),
        signal,
      ),
    formatError: formatTokenGuardError,
  });
}

/**
 * Slow loop: event log through the same token guard, translated and
 * stamped with the request settings.
 */
export function createEventCoordinator(deps: {
  guard: TokenGuard;
  client: StokerCloudClient;
  intervalMs: number;
  settings: EventLogSettings;
}): EventCoordinator {
  const { count, offset } = deps.settings;

  return createPollCoordinator({
    name: "events",
    intervalMs: deps.intervalMs,
    update: async (signal) => {
      const result = await deps.guard.withToken(
        (token) => deps.client.fetchEventData(token, { count, offset }, signal),
        signal,
      );
      return result.map((batch) => buildEventBatchResult(batch, deps.settings));
    },
    formatError: formatTokenGuardError,
  });
}
