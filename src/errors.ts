import type { DeviceId } from "./capability/types.ts";

/**
 * Base class of every error the sync engine raises on purpose
 */
export class SyncError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Network or HTTP failure talking to the cloud API. `retryable` marks the
 * 5xx / network class; everything else (4xx, malformed bodies) is fatal.
 */
export class TransportError extends SyncError {
  readonly status: number;
  readonly body: string;
  readonly retryable: boolean;

  constructor(
    status: number,
    body: string,
    retryable: boolean,
    options?: ErrorOptions
  ) {
    super(
      status > 0
        ? `Cloud API request failed with status ${status}`
        : "Cloud API request failed before a response was received",
      options
    );
    this.status = status;
    this.body = body;
    this.retryable = retryable;
  }

  get rateLimited(): boolean {
    return this.status === 429;
  }
}

export class QuotaExhausted extends SyncError {
  readonly retryAfterMs: number;

  constructor(retryAfterMs: number) {
    super(
      `Daily API quota exhausted, resets in ${Math.ceil(retryAfterMs / 1000)}s`
    );
    this.retryAfterMs = retryAfterMs;
  }
}

export class MalformedCapability extends SyncError {
  readonly deviceId: DeviceId;
  readonly type: string;
  readonly instance: string;
  readonly reason: string;

  constructor(
    deviceId: DeviceId,
    type: string,
    instance: string,
    reason: string
  ) {
    super(`Malformed capability ${instance} (${type}) on ${deviceId}: ${reason}`);
    this.deviceId = deviceId;
    this.type = type;
    this.instance = instance;
    this.reason = reason;
  }
}

export class InvalidCommandValue extends SyncError {
  readonly instance: string;
  readonly value: unknown;

  constructor(instance: string, value: unknown, reason: string) {
    super(`Invalid value for ${instance}: ${reason}`);
    this.instance = instance;
    this.value = value;
  }
}

export class UnknownCapability extends SyncError {
  readonly deviceId: DeviceId;
  readonly instance: string;

  constructor(deviceId: DeviceId, instance: string) {
    super(`Device ${deviceId} does not declare capability ${instance}`);
    this.deviceId = deviceId;
    this.instance = instance;
  }
}

export class UnknownDevice extends SyncError {
  readonly deviceId: DeviceId;

  constructor(deviceId: DeviceId) {
    super(`Unknown device ${deviceId}`);
    this.deviceId = deviceId;
  }
}

/**
 * A command whose request timed out or lost its connection after it was
 * sent. The device may or may not have applied it.
 */
export class AmbiguousCommandResult extends SyncError {
  readonly deviceId: DeviceId;
  readonly instance: string;

  constructor(deviceId: DeviceId, instance: string, options?: ErrorOptions) {
    super(
      `Command ${instance} on ${deviceId} timed out, outcome unknown`,
      options
    );
    this.deviceId = deviceId;
    this.instance = instance;
  }
}

export class CancelledError extends SyncError {
  constructor(message = "Operation cancelled") {
    super(message);
  }
}
