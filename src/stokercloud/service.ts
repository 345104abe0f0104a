/**
 * StokerCloud Module - Service Layer
 *
 * Side effects happen here: requests to the StokerCloud API through the
 * injected transport. Uses Result types for explicit error handling.
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import type { StokerCloudError } from "./errors.js";
import { formatStokerCloudError } from "./errors.js";
import type {
  ControllerSnapshot,
  EventBatch,
  HttpMethod,
  LoginResult,
  TranslationTable,
} from "./schema.js";
import {
  CONTROLLER_DATA_PATH,
  DEFAULT_SCREEN,
  EVENT_DATA_PATH,
  LOGIN_PATH,
} from "./schema.js";
import {
  classifyResponse,
  extractEvents,
  parseControllerData,
  parseLoginResponse,
  parseTranslations,
} from "./transform.js";
import type { RequestExecutor } from "./transport.js";

const log = createLogger("stokercloud");

export type StokerCloudClientOptions = Readonly<{
  transport: RequestExecutor;
  apiBaseUrl: string;
  translationBaseUrl: string;
  screen?: string;
}>;

/**
 * Stateless StokerCloud API client. Holds no token - see the auth module.
 */
export type StokerCloudClient = Readonly<{
  login(
    username: string,
    signal?: AbortSignal,
  ): Promise<Result<LoginResult, StokerCloudError>>;
  fetchControllerData(
    token: string,
    signal?: AbortSignal,
  ): Promise<Result<ControllerSnapshot, StokerCloudError>>;
  fetchEventData(
    token: string,
    page: Readonly<{ count: number; offset: number }>,
    signal?: AbortSignal,
  ): Promise<Result<EventBatch, StokerCloudError>>;
  fetchTranslations(
    language: string,
  ): Promise<Result<TranslationTable, StokerCloudError>>;
}>;

function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, "")}/${path}`;
}

/**
 * Create a StokerCloud client over the given transport.
 */
export function createStokerCloudClient(
  options: StokerCloudClientOptions,
): StokerCloudClient {
  const screen = options.screen ?? DEFAULT_SCREEN;

  /**
   * Run a request and apply the shared response classification.
   */
  async function requestJson(
    method: HttpMethod,
    url: string,
    params: Record<string, string | number>,
    signal?: AbortSignal,
  ): Promise<Result<unknown, StokerCloudError>> {
    const response = await options.transport({
      method,
      url,
      params,
      ...(signal ? { signal } : {}),
    });
    if (response.isErr()) {
      return err(response.error);
    }

    const classified = classifyResponse(response.value);
    if (classified.isErr()) {
      log.debug(
        { url, error: formatStokerCloudError(classified.error) },
        "Request rejected by server",
      );
      return err(classified.error);
    }

    return ok(classified.value);
  }

  return {
    async login(username, signal) {
      log.info("Logging in to StokerCloud...");

      const response = await requestJson(
        "POST",
        joinUrl(options.apiBaseUrl, LOGIN_PATH),
        { user: username },
        signal,
      );
      const result = response.andThen(parseLoginResponse);

      if (result.isOk()) {
        log.info(
          { master: result.value.master ?? null },
          "Session token obtained",
        );
      }
      return result;
    },

    async fetchControllerData(token, signal) {
      const response = await requestJson(
        "GET",
        joinUrl(options.apiBaseUrl, CONTROLLER_DATA_PATH),
        { screen, token },
        signal,
      );
      return response.andThen(parseControllerData);
    },

    async fetchEventData(token, page, signal) {
      const response = await requestJson(
        "GET",
        joinUrl(options.apiBaseUrl, EVENT_DATA_PATH),
        { count: page.count, offset: page.offset, token },
        signal,
      );

      return response.map((payload) => {
        const events = extractEvents(payload);
        log.debug({ events: events.length }, "Event data fetched");
        return { rawPayload: payload, events };
      });
    },

    async fetchTranslations(language) {
      const response = await requestJson(
        "GET",
        joinUrl(options.translationBaseUrl, `${encodeURIComponent(language)}.json`),
        {},
      );
      return response.andThen(parseTranslations);
    },
  };
}
