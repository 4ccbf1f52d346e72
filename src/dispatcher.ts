import { encodeCommand, type EncodedCommand } from "./capability/codec.ts";
import {
  findCapability,
  type CapabilityValue,
  type DeviceId,
  type DeviceState,
} from "./capability/types.ts";
import {
  AmbiguousCommandResult,
  CancelledError,
  QuotaExhausted,
  TransportError,
  UnknownCapability,
  UnknownDevice,
} from "./errors.ts";
import type { RateGovernor } from "./governor.ts";
import { createLogger } from "./logger.ts";
import type { DeviceWriter, StateStore } from "./store.ts";
import type { Transport } from "./transport/types.ts";

const log = createLogger("dispatcher");

export interface CommandResult {
  deviceId: DeviceId;
  instance: string;
  /** Value merged into the store, after snapping */
  value: CapabilityValue;
  requestId: string;
  state: DeviceState;
}

export interface DispatchOptions {
  /** Abandons the wait for the result; a sent command still completes */
  signal?: AbortSignal;
}

export interface CommandDispatcherOptions {
  transport: Transport;
  store: StateStore;
  governor: RateGovernor;
  /** Out-of-band state refresh, started when a command outcome is unknown */
  scheduleRefresh: (deviceId: DeviceId) => Promise<void>;
  now?: () => number;
}

const abandonable = <T>(pending: Promise<T>, signal: AbortSignal): Promise<T> =>
  new Promise<T>((resolve, reject) => {
    const onAbort = () =>
      reject(new CancelledError("Stopped waiting for the command result"));
    signal.addEventListener("abort", onAbort, { once: true });
    void pending
      .then(resolve, reject)
      .finally(() => signal.removeEventListener("abort", onAbort));
  });

/**
 * Validates, gates, sends and reconciles single commands. Every error is
 * surfaced to the caller; nothing about a command is dropped silently.
 */
export class CommandDispatcher {
  private readonly transport: Transport;
  private readonly store: StateStore;
  private readonly governor: RateGovernor;
  private readonly scheduleRefresh: (deviceId: DeviceId) => Promise<void>;
  private readonly now: () => number;

  constructor({
    transport,
    store,
    governor,
    scheduleRefresh,
    now = Date.now,
  }: CommandDispatcherOptions) {
    this.transport = transport;
    this.store = store;
    this.governor = governor;
    this.scheduleRefresh = scheduleRefresh;
    this.now = now;
  }

  /**
   * Caller errors (unknown device or capability, invalid value) are raised
   * before the budget or the network are touched.
   */
  dispatch = async (
    deviceId: DeviceId,
    instance: string,
    value: unknown,
    { signal }: DispatchOptions = {}
  ): Promise<CommandResult> => {
    const device = this.store.getDevice(deviceId);
    if (!device) {
      throw new UnknownDevice(deviceId);
    }
    const capability = findCapability(device, instance);
    if (!capability) {
      throw new UnknownCapability(deviceId, instance);
    }
    const command = encodeCommand(capability, value);

    if (signal?.aborted) {
      throw new CancelledError("Command cancelled before sending");
    }

    const grant = this.governor.tryAcquire("command");
    if (!grant.granted) {
      log.info("command.quota_denied", {
        deviceId,
        instance,
        retryAfterMs: grant.retryAfterMs,
      });
      throw new QuotaExhausted(grant.retryAfterMs);
    }

    const pending = this.store.withDevice(deviceId, writer => {
      // Queued behind another writer: still cancellable until sent
      if (signal?.aborted) {
        log.info("command.cancelled", { deviceId, instance });
        throw new CancelledError("Command cancelled before sending");
      }
      return this.send(writer, command);
    });
    return signal ? abandonable(pending, signal) : pending;
  };

  private send = async (
    writer: DeviceWriter,
    command: EncodedCommand
  ): Promise<CommandResult> => {
    const { device } = writer;
    const { instance } = command.capability;

    let requestId: string;
    try {
      ({ requestId } = await this.transport.sendCommand(
        device,
        command.capability
      ));
    } catch (error) {
      throw this.failed(writer, instance, error);
    }

    const { state } = writer.merge({ [instance]: command.value }, {
      at: this.now(),
    });
    log.info("command.applied", { deviceId: device.id, instance, requestId });
    return {
      deviceId: device.id,
      instance,
      value: command.value,
      requestId,
      state,
    };
  };

  private failed(writer: DeviceWriter, instance: string, error: unknown) {
    const deviceId = writer.device.id;

    if (error instanceof AmbiguousCommandResult) {
      writer.markStale();
      log.warn("command.ambiguous", { deviceId, instance });
      void this.scheduleRefresh(deviceId);
      return error;
    }

    if (error instanceof TransportError && error.rateLimited) {
      this.governor.exhaust();
      const { resetsAt } = this.governor.ledger();
      log.warn("command.rate_limited", { deviceId, instance });
      return new QuotaExhausted(Math.max(resetsAt - this.now(), 0));
    }

    if (error instanceof TransportError) {
      log.warn("command.failed", {
        deviceId,
        instance,
        status: error.status,
        body: error.body,
      });
    } else {
      log.error("command.error", error, { deviceId, instance });
    }
    return error;
  }
}
