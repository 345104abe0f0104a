/**
 * Coordinator Module - Schemas and Types
 *
 * State of a periodic refresh loop.
 */
import type { Result } from "neverthrow";

/**
 * Published state of one coordinator. Replaced as a whole on every change.
 */
export type CoordinatorState<T, E> = Readonly<{
  /** Last good value, kept across failures */
  data: T | null;
  /** Error of the most recent cycle, cleared by the next success */
  lastError: E | null;
  /** Timestamp of the last successful cycle */
  lastSuccessAt: number | null;
  /** Timestamp of the last finished cycle */
  lastAttemptAt: number | null;
  consecutiveFailures: number;
  /** Whether the periodic schedule is active */
  isRunning: boolean;
}>;

/**
 * One refresh cycle. Receives a signal that is aborted on stop().
 */
export type UpdateFn<T, E> = (signal: AbortSignal) => Promise<Result<T, E>>;

export type CoordinatorOptions<T, E> = Readonly<{
  name: string;
  intervalMs: number;
  update: UpdateFn<T, E>;
  formatError: (error: E) => string;
}>;

export type CoordinatorListener<T, E> = (state: CoordinatorState<T, E>) => void;

/**
 * Error returned by refresh() when the cycle was abandoned by stop().
 */
export type CycleAborted = {
  readonly type: "CYCLE_ABORTED";
  readonly message: string;
};

export function initialCoordinatorState<T, E>(): CoordinatorState<T, E> {
  return {
    data: null,
    lastError: null,
    lastSuccessAt: null,
    lastAttemptAt: null,
    consecutiveFailures: 0,
    isRunning: false,
  };
}
