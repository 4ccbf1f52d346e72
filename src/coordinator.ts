import { decodeState, parseCapabilities } from "./capability/parser.ts";
import type { RawDevice } from "./capability/schema.ts";
import {
  toDeviceId,
  type Device,
  type DeviceId,
  type DeviceState,
} from "./capability/types.ts";
import { QuotaExhausted, TransportError, UnknownDevice } from "./errors.ts";
import type { CallPriority, RateGovernor } from "./governor.ts";
import { createLogger } from "./logger.ts";
import type { DeviceWriter, DevicesUpdatedEvent, StateStore } from "./store.ts";
import type { Transport } from "./transport/types.ts";

const log = createLogger("coordinator");

export const DEFAULT_POLL_INTERVAL_MS = 60_000;
export const DEFAULT_DEVICE_LIST_INTERVAL_MS = 60 * 60 * 1000;

export type CyclePhase = "idle" | "gating" | "fetching" | "parsing" | "merging";

export interface CycleReport {
  /** The governor denied the first call, nothing was fetched */
  skipped: boolean;
  /** Aborted between two devices */
  cancelled: boolean;
  refreshed: DeviceId[];
  failed: DeviceId[];
  /** Left alone because a command held the device */
  busy: DeviceId[];
  /** Not reached because the budget ran out mid-cycle */
  deferred: DeviceId[];
}

export interface SyncCoordinatorOptions {
  transport: Transport;
  store: StateStore;
  governor: RateGovernor;
  pollIntervalMs?: number;
  deviceListIntervalMs?: number;
  now?: () => number;
}

export const toDevice = (raw: RawDevice): Device => {
  const id = toDeviceId(raw.device);
  return {
    id,
    sku: raw.sku,
    name: raw.deviceName,
    type: raw.type,
    capabilities: parseCapabilities(id, raw.capabilities).items,
  };
};

const checkInterval = (name: string, ms: number): number => {
  if (!Number.isFinite(ms) || ms <= 0) {
    throw new RangeError(`${name} must be positive, got ${ms}`);
  }
  return ms;
};

/**
 * Drives the periodic poll cycle: device list on a slow cadence, device
 * states on every cycle, each call gated by the rate governor. A failing
 * device is marked stale and the cycle moves on.
 */
export class SyncCoordinator {
  private readonly transport: Transport;
  private readonly store: StateStore;
  private readonly governor: RateGovernor;
  private readonly now: () => number;
  private pollIntervalMs: number;
  private readonly deviceListIntervalMs: number;

  private lastListedAt?: number;
  private rawDevices: RawDevice[] = [];
  private rawStates = new Map<DeviceId, unknown[]>();
  private running?: Promise<CycleReport>;
  private controller?: AbortController;
  private timer?: NodeJS.Timeout;
  private currentPhase: CyclePhase = "idle";

  constructor({
    transport,
    store,
    governor,
    pollIntervalMs = DEFAULT_POLL_INTERVAL_MS,
    deviceListIntervalMs = DEFAULT_DEVICE_LIST_INTERVAL_MS,
    now = Date.now,
  }: SyncCoordinatorOptions) {
    this.transport = transport;
    this.store = store;
    this.governor = governor;
    this.now = now;
    this.pollIntervalMs = checkInterval("Poll interval", pollIntervalMs);
    this.deviceListIntervalMs = checkInterval(
      "Device list interval",
      deviceListIntervalMs
    );
  }

  get phase(): CyclePhase {
    return this.currentPhase;
  }

  get interval(): number {
    return this.pollIntervalMs;
  }

  get lastRawDevices(): readonly RawDevice[] {
    return this.rawDevices;
  }

  get lastRawStates(): ReadonlyMap<DeviceId, unknown[]> {
    return this.rawStates;
  }

  /**
   * Runs the first cycle right away and schedules the following ones.
   * Resolves with the report of the first cycle.
   */
  start = (): Promise<CycleReport> => {
    if (this.controller) {
      throw new Error("Coordinator is already running");
    }
    const controller = new AbortController();
    this.controller = controller;
    log.info("coordinator.start", { pollIntervalMs: this.pollIntervalMs });
    return this.tick(controller.signal);
  };

  stop = async (): Promise<void> => {
    const controller = this.controller;
    if (!controller) return;

    this.controller = undefined;
    clearTimeout(this.timer);
    this.timer = undefined;
    controller.abort();
    await this.running?.catch(() => undefined);
    log.info("coordinator.stop");
  };

  /**
   * Takes effect when the next cycle is scheduled; a pending timer keeps
   * its delay.
   */
  setPollInterval = (ms: number): void => {
    this.pollIntervalMs = checkInterval("Poll interval", ms);
    log.info("poll.interval_changed", { pollIntervalMs: ms });
  };

  /**
   * One poll cycle. Concurrent calls share the cycle already running.
   */
  runCycle = (signal?: AbortSignal): Promise<CycleReport> => {
    this.running ??= this.cycle(signal).finally(() => {
      this.running = undefined;
      this.currentPhase = "idle";
    });
    return this.running;
  };

  /**
   * Lists devices and reconciles the store. Gated like a poll call.
   */
  refreshDevices = async (): Promise<DevicesUpdatedEvent> => {
    this.acquire("poll");
    try {
      return await this.listAndSync();
    } catch (error) {
      this.recordFailure(undefined, error);
      throw error;
    }
  };

  /**
   * Fetches and merges one device's state outside the regular cadence.
   * Waits behind any command holding the device.
   */
  refreshDevice = (
    deviceId: DeviceId,
    priority: CallPriority = "poll"
  ): Promise<DeviceState> => {
    if (!this.store.getDevice(deviceId)) {
      return Promise.reject(new UnknownDevice(deviceId));
    }
    try {
      this.acquire(priority);
    } catch (error) {
      return Promise.reject(error);
    }

    return this.store.withDevice(deviceId, async writer => {
      try {
        await this.fetchAndMerge(writer);
      } catch (error) {
        this.recordFailure(deviceId, error);
        writer.markStale();
        throw error;
      }
      return this.store.read(deviceId) ?? writer.markStale();
    });
  };

  /**
   * Out-of-band refresh after a command with an unknown outcome. Never
   * rejects; a failure leaves the device stale for the next cycle.
   */
  requestRefresh = (deviceId: DeviceId): Promise<void> =>
    this.refreshDevice(deviceId, "command").then(
      state => log.info("refresh.resolved", { deviceId, stale: state.stale }),
      (error: unknown) =>
        log.warn("refresh.failed", {
          deviceId,
          error: error instanceof Error ? error.message : String(error),
        })
    );

  private tick = (signal: AbortSignal): Promise<CycleReport> => {
    const cycle = this.runCycle(signal);
    void cycle.then(
      () => this.schedule(signal),
      error => {
        log.error("poll.error", error);
        this.schedule(signal);
      }
    );
    return cycle;
  };

  private schedule(signal: AbortSignal): void {
    if (signal.aborted) return;
    this.timer = setTimeout(() => this.tick(signal), this.pollIntervalMs);
  }

  private acquire(priority: CallPriority): void {
    const grant = this.governor.tryAcquire(priority);
    if (!grant.granted) {
      throw new QuotaExhausted(grant.retryAfterMs);
    }
  }

  private async cycle(signal?: AbortSignal): Promise<CycleReport> {
    const report: CycleReport = {
      skipped: false,
      cancelled: false,
      refreshed: [],
      failed: [],
      busy: [],
      deferred: [],
    };
    let acquired = false;

    if (this.deviceListDue()) {
      this.currentPhase = "gating";
      const grant = this.governor.tryAcquire("poll");
      if (!grant.granted) {
        report.skipped = true;
        return this.deny(report, this.store.listDevices(), grant.retryAfterMs);
      }
      acquired = true;

      this.currentPhase = "fetching";
      try {
        await this.listAndSync();
      } catch (error) {
        if (!(error instanceof TransportError)) throw error;
        this.recordFailure(undefined, error);
      }
    }

    const devices = this.store.listDevices();
    for (const [index, device] of devices.entries()) {
      if (signal?.aborted) {
        report.cancelled = true;
        log.info("poll.cancelled", { remaining: devices.length - index });
        break;
      }
      if (this.store.isLocked(device.id)) {
        report.busy.push(device.id);
        log.debug("poll.device_busy", { deviceId: device.id });
        continue;
      }

      this.currentPhase = "gating";
      const grant = this.governor.tryAcquire("poll");
      if (!grant.granted) {
        report.skipped = !acquired;
        return this.deny(report, devices.slice(index), grant.retryAfterMs);
      }
      acquired = true;

      const ok = await this.store.withDevice(device.id, async writer => {
        try {
          await this.fetchAndMerge(writer, phase => {
            this.currentPhase = phase;
          });
          return true;
        } catch (error) {
          this.recordFailure(device.id, error);
          writer.markStale();
          return false;
        }
      });
      (ok ? report.refreshed : report.failed).push(device.id);
    }

    log.debug("poll.done", {
      refreshed: report.refreshed.length,
      failed: report.failed.length,
      busy: report.busy.length,
    });
    return report;
  }

  /**
   * Budget ran out: everything not yet refreshed keeps its values and is
   * flagged stale. Devices held by a command are left to the command.
   */
  private async deny(
    report: CycleReport,
    remaining: Device[],
    retryAfterMs: number
  ): Promise<CycleReport> {
    const idle = remaining.filter(device => !this.store.isLocked(device.id));
    await Promise.all(idle.map(device => this.store.markStale(device.id)));
    report.deferred = idle.map(device => device.id);
    log.info(report.skipped ? "poll.skip" : "poll.deferred", {
      retryAfterMs,
      devices: report.deferred.length,
    });
    return report;
  }

  private deviceListDue(): boolean {
    return (
      this.lastListedAt === undefined ||
      this.now() - this.lastListedAt >= this.deviceListIntervalMs
    );
  }

  private async listAndSync(): Promise<DevicesUpdatedEvent> {
    const raw = await this.transport.listDevices();
    this.lastListedAt = this.now();
    this.rawDevices = raw;

    const [added, removed] = this.store.syncDevices(raw.map(toDevice));
    removed.forEach(device => this.rawStates.delete(device.id));
    return { added, removed };
  }

  private async fetchAndMerge(
    writer: DeviceWriter,
    onPhase: (phase: CyclePhase) => void = () => {}
  ): Promise<void> {
    const { device } = writer;

    onPhase("fetching");
    const raw = await this.transport.fetchState(device);
    this.rawStates.set(device.id, raw);

    onPhase("parsing");
    const { items, empty, anomalies } = decodeState(device, raw);

    onPhase("merging");
    const { changed } = writer.merge(items, {
      fullRefresh: true,
      // Malformed values were reported too; they are logged, not missing
      reported: [...empty, ...anomalies.map(anomaly => anomaly.instance)],
      at: this.now(),
    });
    log.debug("poll.merged", { deviceId: device.id, changed });
  }

  private recordFailure(deviceId: DeviceId | undefined, error: unknown): void {
    if (error instanceof TransportError) {
      if (error.rateLimited) {
        this.governor.exhaust();
      }
      log.warn("poll.transport_error", {
        deviceId,
        status: error.status,
        retryable: error.retryable,
      });
    } else {
      log.error("poll.device_error", error, { deviceId });
    }
  }
}
