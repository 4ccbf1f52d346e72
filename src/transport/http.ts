import { randomUUID } from "node:crypto";
import { fetch, type Dispatcher } from "undici";
import type { z } from "zod";
import {
  ControlResponseSchema,
  DevicesResponseSchema,
  StateResponseSchema,
  type RawDevice,
  type WireCapability,
} from "../capability/schema.ts";
import type { DeviceRef } from "../capability/types.ts";
import { AmbiguousCommandResult, TransportError } from "../errors.ts";
import { createLogger } from "../logger.ts";
import { cloak, sleep, truncate } from "../utility.ts";
import type { CommandAck, Transport } from "./types.ts";

const log = createLogger("http");

export const DEFAULT_API_BASE = "https://openapi.api.govee.com/router/api/v1";
export const API_KEY_HEADER = "Govee-API-Key";

const DEFAULT_TIMEOUT_MS = 10_000;
const MAX_RETRIES = 2;
const INITIAL_RETRY_DELAY_MS = 1000;

// Failures that happen before any byte of the request reaches the server
const CONNECT_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ENOTFOUND",
  "EAI_AGAIN",
  "UND_ERR_CONNECT_TIMEOUT",
]);

export interface HttpTransportOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  retries?: number;
  backoffMs?: number;
  dispatcher?: Dispatcher;
  sleep?: (ms: number) => Promise<void>;
}

const causeChain = (error: unknown): unknown[] => {
  const chain: unknown[] = [];
  let current = error;
  while (current instanceof Error && chain.length < 5) {
    chain.push(current);
    current = current.cause;
  }
  return chain;
};

const errorCode = (error: unknown): string | undefined =>
  error instanceof Error && "code" in error && typeof error.code === "string"
    ? error.code
    : undefined;

const failedBeforeSending = (error: TransportError): boolean =>
  causeChain(error.cause).some(e => {
    const code = errorCode(e);
    return code !== undefined && CONNECT_ERROR_CODES.has(code);
  });

/**
 * Client of the Govee cloud API. Requests failing with 5xx or a network
 * error are retried with exponential backoff; 4xx and malformed bodies fail
 * at once. Commands are never retried once they may have reached the server.
 */
export class HttpTransport implements Transport {
  readonly name = "http";
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly backoffMs: number;
  private readonly dispatcher?: Dispatcher;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor({
    apiKey,
    baseUrl = DEFAULT_API_BASE,
    timeoutMs = DEFAULT_TIMEOUT_MS,
    retries = MAX_RETRIES,
    backoffMs = INITIAL_RETRY_DELAY_MS,
    dispatcher,
    sleep: sleepFn = sleep,
  }: HttpTransportOptions) {
    this.apiKey = apiKey;
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.timeoutMs = timeoutMs;
    this.retries = retries;
    this.backoffMs = backoffMs;
    this.dispatcher = dispatcher;
    this.sleep = sleepFn;
    log.debug("transport.created", {
      baseUrl: this.baseUrl,
      apiKey: cloak(apiKey),
    });
  }

  listDevices = async (): Promise<RawDevice[]> => {
    const response = await this.withRetry("listDevices", () =>
      this.request("GET", "/user/devices", DevicesResponseSchema)
    );
    return response.data;
  };

  fetchState = async (device: DeviceRef): Promise<unknown[]> => {
    const response = await this.withRetry("fetchState", () =>
      this.request("POST", "/device/state", StateResponseSchema, {
        requestId: randomUUID(),
        payload: { sku: device.sku, device: device.id },
      })
    );
    return response.payload.capabilities;
  };

  sendCommand = async (
    device: DeviceRef,
    capability: WireCapability
  ): Promise<CommandAck> => {
    const requestId = randomUUID();
    const response = await this.withRetry("sendCommand", async () => {
      try {
        return await this.request(
          "POST",
          "/device/control",
          ControlResponseSchema,
          {
            requestId,
            payload: { sku: device.sku, device: device.id, capability },
          }
        );
      } catch (error) {
        if (
          error instanceof TransportError &&
          error.status === 0 &&
          !failedBeforeSending(error)
        ) {
          throw new AmbiguousCommandResult(device.id, capability.instance, {
            cause: error,
          });
        }
        throw error;
      }
    });

    const state = response.capability?.state;
    if (state?.status === "failure") {
      throw new TransportError(
        state.errorCode ?? response.code,
        state.errorMsg ?? response.msg ?? "failure",
        false
      );
    }
    return { requestId };
  };

  close = async (): Promise<void> => {
    await this.dispatcher?.close();
  };

  private withRetry = async <T>(
    operation: string,
    attempt: () => Promise<T>
  ): Promise<T> => {
    for (let retry = 0; ; retry++) {
      try {
        return await attempt();
      } catch (error) {
        if (
          !(error instanceof TransportError) ||
          !error.retryable ||
          retry >= this.retries
        ) {
          throw error;
        }

        const delayMs = this.backoffMs * 2 ** retry;
        log.debug("request.retry", {
          operation,
          status: error.status,
          attempt: retry + 2,
          delayMs,
        });
        await this.sleep(delayMs);
      }
    }
  };

  private request = async <T extends z.ZodType<{ code: number }>>(
    method: "GET" | "POST",
    path: string,
    schema: T,
    body?: unknown
  ): Promise<z.infer<T>> => {
    let status = 0;
    let text: string;
    try {
      const response = await fetch(`${this.baseUrl}${path}`, {
        method,
        headers: {
          "Content-Type": "application/json",
          [API_KEY_HEADER]: this.apiKey,
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        dispatcher: this.dispatcher,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      text = await response.text();
      status = response.status;
    } catch (error) {
      // status stays 0: no complete response, the request may or may not
      // have been processed
      log.debug("request.network_error", { method, path });
      throw new TransportError(
        0,
        error instanceof Error ? error.message : String(error),
        true,
        { cause: error }
      );
    }

    if (status < 200 || status >= 300) {
      log.debug("request.failed", {
        method,
        path,
        status,
        body: truncate(text, 200),
      });
      throw new TransportError(status, text, status >= 500);
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new TransportError(status, text, false, { cause: error });
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new TransportError(status, text, false, { cause: parsed.error });
    }
    if (parsed.data.code !== 200) {
      // The API reports some failures in the body of a 200 response
      throw new TransportError(parsed.data.code, text, parsed.data.code >= 500);
    }
    return parsed.data;
  };
}
