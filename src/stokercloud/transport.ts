/**
 * StokerCloud Module - HTTP Transport
 *
 * fetch-based request executor. Parses every body as JSON regardless of
 * the Content-Type header, since the vendor serves JSON as text/html.
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import type { StokerCloudError } from "./errors.js";
import { protocolError } from "./errors.js";
import type { JsonRequest } from "./schema.js";

const log = createLogger("stokercloud");

/**
 * Executes one request and returns the parsed JSON body.
 * The API client never owns the transport - it is injected.
 */
export type RequestExecutor = (
  request: JsonRequest,
) => Promise<Result<unknown, StokerCloudError>>;

/**
 * Build the request URL with query parameters.
 */
export function buildRequestUrl(
  url: string,
  params: JsonRequest["params"],
): string {
  const target = new URL(url);
  for (const [key, value] of Object.entries(params)) {
    target.searchParams.set(key, String(value));
  }
  return target.toString();
}

/**
 * Create a transport backed by the global fetch.
 *
 * @param options.timeoutMs - upper bound for each request, including body read
 */
export function createFetchTransport(options: {
  timeoutMs: number;
}): RequestExecutor {
  return async (request) => {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), options.timeoutMs);
    const onAbort = () => controller.abort();

    if (request.signal?.aborted) {
      clearTimeout(timeout);
      return err(protocolError("Request aborted"));
    }
    request.signal?.addEventListener("abort", onAbort, { once: true });

    const url = buildRequestUrl(request.url, request.params);
    log.debug({ method: request.method, path: new URL(request.url).pathname }, "Requesting...");

    try {
      const response = await fetch(url, {
        method: request.method,
        headers: { Accept: "application/json, text/plain, */*" },
        signal: controller.signal,
      });

      const text = await response.text();

      try {
        return ok(JSON.parse(text));
      } catch (error) {
        const cause = error instanceof Error ? error : new Error(String(error));
        return err(
          protocolError(`Invalid JSON response (HTTP ${response.status})`, { cause }),
        );
      }
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));

      if (request.signal?.aborted) {
        return err(protocolError("Request aborted", { cause }));
      }

      // Handle timeout specifically
      if (cause.name === "TimeoutError" || cause.name === "AbortError") {
        return err(protocolError("Request timed out", { cause }));
      }

      return err(protocolError(`Request failed: ${cause.message}`, { cause }));
    } finally {
      clearTimeout(timeout);
      request.signal?.removeEventListener("abort", onAbort);
    }
  };
}
