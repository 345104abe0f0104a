/**
 * Auth Module - Token Guard
 *
 * Owns the single cached session token. Logs in lazily, and re-authenticates
 * exactly once when an operation is rejected before giving up.
 *
 * The lock covers only reading-or-creating the token and the forced
 * refresh - never the operation itself - so a slow data request does not
 * block other callers once a token exists.
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import type { LoginResult, StokerCloudError } from "../stokercloud/index.js";
import { formatStokerCloudError, isAuthError } from "../stokercloud/index.js";
import type { TokenGuardError } from "./errors.js";
import { authExhausted } from "./errors.js";
import { createLock } from "./lock.js";

const log = createLogger("auth");

export type LoginFn = (
  username: string,
  signal?: AbortSignal,
) => Promise<Result<LoginResult, StokerCloudError>>;

/**
 * An operation that needs a session token.
 */
export type TokenOperation<T> = (
  token: string,
) => Promise<Result<T, StokerCloudError>>;

export type TokenGuard = Readonly<{
  /** The signal cancels any login this call has to make */
  withToken<T>(
    operation: TokenOperation<T>,
    signal?: AbortSignal,
  ): Promise<Result<T, TokenGuardError>>;
  hasToken(): boolean;
  clear(): void;
}>;

export function createTokenGuard(options: {
  username: string;
  login: LoginFn;
}): TokenGuard {
  const lock = createLock();
  let token: string | null = null;

  async function loginAndCache(
    signal?: AbortSignal,
  ): Promise<Result<string, StokerCloudError>> {
    const result = await options.login(options.username, signal);
    if (result.isErr()) {
      return err(result.error);
    }
    token = result.value.token;
    return ok(token);
  }

  /**
   * Cached token, or a fresh login if there is none.
   * Concurrent callers queue on the lock, so only the first one logs in.
   */
  function acquireToken(
    signal?: AbortSignal,
  ): Promise<Result<string, StokerCloudError>> {
    return lock.runExclusive(async () => {
      if (token !== null) {
        return ok(token);
      }
      log.debug("No cached token, logging in");
      return loginAndCache(signal);
    });
  }

  /**
   * Unconditionally replace the cached token.
   */
  function forceRefresh(
    signal?: AbortSignal,
  ): Promise<Result<string, StokerCloudError>> {
    return lock.runExclusive(() => loginAndCache(signal));
  }

  return {
    async withToken<T>(
      operation: TokenOperation<T>,
      signal?: AbortSignal,
    ): Promise<Result<T, TokenGuardError>> {
      const acquired = await acquireToken(signal);
      if (acquired.isErr()) {
        return err(acquired.error);
      }

      const first = await operation(acquired.value);
      if (first.isOk() || !isAuthError(first.error)) {
        return first;
      }

      log.warn(
        { error: formatStokerCloudError(first.error) },
        "Token rejected, forcing a fresh login",
      );

      const refreshed = await forceRefresh(signal);
      if (refreshed.isErr()) {
        if (isAuthError(refreshed.error)) {
          log.error("Login rejected after token refresh");
          return err(authExhausted(refreshed.error.message));
        }
        return err(refreshed.error);
      }

      const second = await operation(refreshed.value);
      if (second.isErr() && isAuthError(second.error)) {
        log.error(
          { error: formatStokerCloudError(second.error) },
          "Token rejected again after fresh login",
        );
        return err(authExhausted(second.error.message));
      }

      return second;
    },

    hasToken() {
      return token !== null;
    },

    clear() {
      token = null;
      log.debug("Token cache cleared");
    },
  };
}
