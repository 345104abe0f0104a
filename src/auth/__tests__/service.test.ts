/**
 * Token Guard Tests
 *
 * Lazy login, retry-once on rejection and single-flight login.
 */
import { describe, expect, test, vi } from "vitest";
import { err, ok } from "neverthrow";
import type { Result } from "neverthrow";

vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

import type { LoginResult, StokerCloudError } from "../../stokercloud/index.js";
import { authError, protocolError } from "../../stokercloud/index.js";
import type { LoginFn, TokenOperation } from "../service.js";
import { createTokenGuard } from "../service.js";

/**
 * Login that hands out token-1, token-2, ...
 */
function countingLogin() {
  let issued = 0;
  return vi.fn<LoginFn>(async (): Promise<Result<LoginResult, StokerCloudError>> => {
    issued++;
    return ok({ token: `token-${issued}` });
  });
}

describe("createTokenGuard", () => {
  test("logs in lazily and reuses the cached token", async () => {
    // Arrange
    const login = countingLogin();
    const guard = createTokenGuard({ username: "test-user", login });
    const operation = vi.fn<TokenOperation<string>>(async (token) => ok(`data:${token}`));

    // Act
    const first = await guard.withToken(operation);
    const second = await guard.withToken(operation);

    // Assert
    expect(first._unsafeUnwrap()).toBe("data:token-1");
    expect(second._unsafeUnwrap()).toBe("data:token-1");
    expect(login).toHaveBeenCalledTimes(1);
    expect(login).toHaveBeenCalledWith("test-user", undefined);
    expect(guard.hasToken()).toBe(true);
  });

  test("a token rejected once costs one extra login and one retry", async () => {
    const login = countingLogin();
    const guard = createTokenGuard({ username: "test-user", login });
    const operation = vi
      .fn<TokenOperation<string>>()
      .mockResolvedValueOnce(err(authError("Token expired")))
      .mockImplementation(async (token) => ok(`data:${token}`));

    const result = await guard.withToken(operation);

    expect(result._unsafeUnwrap()).toBe("data:token-2");
    expect(login).toHaveBeenCalledTimes(2);
    expect(operation).toHaveBeenCalledTimes(2);
    expect(operation).toHaveBeenNthCalledWith(1, "token-1");
    expect(operation).toHaveBeenNthCalledWith(2, "token-2");
  });

  test("a token rejected twice yields AUTH_EXHAUSTED", async () => {
    const login = countingLogin();
    const guard = createTokenGuard({ username: "test-user", login });
    const operation = vi
      .fn<TokenOperation<string>>()
      .mockResolvedValue(err(authError("Token invalid")));

    const result = await guard.withToken(operation);

    expect(result._unsafeUnwrapErr()).toEqual({
      type: "AUTH_EXHAUSTED",
      message: "Token invalid",
    });
    expect(login).toHaveBeenCalledTimes(2);
    expect(operation).toHaveBeenCalledTimes(2);
  });

  test("a non-auth error propagates without retry", async () => {
    const login = countingLogin();
    const guard = createTokenGuard({ username: "test-user", login });
    const operation = vi
      .fn<TokenOperation<string>>()
      .mockResolvedValue(err(protocolError("Maintenance")));

    const result = await guard.withToken(operation);

    expect(result._unsafeUnwrapErr()).toEqual({
      type: "PROTOCOL_ERROR",
      message: "Maintenance",
    });
    expect(login).toHaveBeenCalledTimes(1);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  test("concurrent callers share a single login", async () => {
    // Login resolves only after every caller is queued
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const login = vi.fn<LoginFn>(async () => {
      await gate;
      return ok({ token: "shared-token" });
    });
    const guard = createTokenGuard({ username: "test-user", login });
    const seen: string[] = [];

    const calls = Array.from({ length: 5 }, () =>
      guard.withToken(async (token) => {
        seen.push(token);
        return ok(token);
      }),
    );
    release();
    const results = await Promise.all(calls);

    expect(login).toHaveBeenCalledTimes(1);
    expect(results.map((r) => r._unsafeUnwrap())).toEqual(Array(5).fill("shared-token"));
    expect(seen).toEqual(Array(5).fill("shared-token"));
  });

  test("returns the login error when the first login is rejected", async () => {
    const login = vi.fn<LoginFn>().mockResolvedValue(err(authError("Unknown user")));
    const guard = createTokenGuard({ username: "test-user", login });
    const operation = vi.fn<TokenOperation<string>>();

    const result = await guard.withToken(operation);

    expect(result._unsafeUnwrapErr()).toEqual({ type: "AUTH_ERROR", message: "Unknown user" });
    expect(operation).not.toHaveBeenCalled();
    expect(guard.hasToken()).toBe(false);
  });

  test("a rejected forced login yields AUTH_EXHAUSTED without a retry", async () => {
    const login = vi
      .fn<LoginFn>()
      .mockResolvedValueOnce(ok({ token: "token-1" }))
      .mockResolvedValueOnce(err(authError("Account locked")));
    const guard = createTokenGuard({ username: "test-user", login });
    const operation = vi
      .fn<TokenOperation<string>>()
      .mockResolvedValue(err(authError("Token expired")));

    const result = await guard.withToken(operation);

    expect(result._unsafeUnwrapErr()).toEqual({
      type: "AUTH_EXHAUSTED",
      message: "Account locked",
    });
    expect(operation).toHaveBeenCalledTimes(1);
  });

  test("passes the caller's signal to the lazy and the forced login", async () => {
    const login = countingLogin();
    const guard = createTokenGuard({ username: "test-user", login });
    const operation = vi
      .fn<TokenOperation<string>>()
      .mockResolvedValueOnce(err(authError("Token expired")))
      .mockImplementation(async (token) => ok(token));
    const controller = new AbortController();

    const result = await guard.withToken(operation, controller.signal);

    expect(result._unsafeUnwrap()).toBe("token-2");
    expect(login).toHaveBeenNthCalledWith(1, "test-user", controller.signal);
    expect(login).toHaveBeenNthCalledWith(2, "test-user", controller.signal);
  });

  test("clear forgets the token", async () => {
    const login = countingLogin();
    const guard = createTokenGuard({ username: "test-user", login });
    await guard.withToken(async (token) => ok(token));

    guard.clear();
    const result = await guard.withToken(async (token) => ok(token));

    expect(guard.hasToken()).toBe(true);
    expect(result._unsafeUnwrap()).toBe("token-2");
  });
});
