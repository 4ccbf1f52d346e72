import type { RawDevice } from "./capability/schema.ts";
import {
  toDeviceId,
  type Device,
  type DeviceId,
  type DeviceState,
} from "./capability/types.ts";
import type { AppConfig } from "./config.ts";
import { SyncCoordinator, type CycleReport } from "./coordinator.ts";
import {
  CommandDispatcher,
  type CommandResult,
  type DispatchOptions,
} from "./dispatcher.ts";
import { RateGovernor, type RateLedger } from "./governor.ts";
import { createLogger } from "./logger.ts";
import {
  StateStore,
  type DevicesUpdatedEvent,
  type StateChangeEvent,
} from "./store.ts";
import { FixtureTransport } from "./transport/fixture.ts";
import { HttpTransport } from "./transport/http.ts";
import type { Transport } from "./transport/types.ts";
import { cloak } from "./utility.ts";

export * from "./capability/types.ts";
export * from "./errors.ts";
export type { AppConfig } from "./config.ts";
export type { CommandResult, DispatchOptions } from "./dispatcher.ts";
export type { CycleReport } from "./coordinator.ts";
export type { RateLedger } from "./governor.ts";
export type { DevicesUpdatedEvent, StateChangeEvent } from "./store.ts";
export type { Transport } from "./transport/types.ts";
export { FixtureTransport } from "./transport/fixture.ts";
export { HttpTransport } from "./transport/http.ts";

const log = createLogger("engine");

export interface SyncEngineOptions {
  transport: Transport;
  pollIntervalMs?: number;
  deviceListIntervalMs?: number;
  quota?: number;
  reserve?: number;
  now?: () => number;
  /** Settings echoed, cloaked, in diagnostics */
  config?: AppConfig;
}

export interface DeviceHealth {
  deviceId: DeviceId;
  stale: boolean;
  missing: readonly string[];
  lastRefreshed?: number;
}

/**
 * Diagnostics export. `data` has the shape the fixture transport reads.
 */
export interface Diagnostics {
  config: Record<string, unknown>;
  transport: string;
  pollIntervalMs: number;
  ledger: RateLedger;
  devices: DeviceHealth[];
  data: {
    cloud_devices: readonly RawDevice[];
    cloud_states: Record<string, { capabilities: unknown[] }>;
  };
}

export const createTransport = async (
  config: AppConfig
): Promise<Transport> => {
  if (config.fixtureFile) {
    return FixtureTransport.fromFile(config.fixtureFile);
  }
  if (!config.apiKey) {
    throw new Error("An API key is required for the cloud transport");
  }
  return new HttpTransport({
    apiKey: config.apiKey,
    baseUrl: config.apiBase,
    timeoutMs: config.requestTimeoutMs,
  });
};

/**
 * Consumer-facing facade owning one store, governor, coordinator and
 * dispatcher for the lifetime of the engine.
 */
export class SyncEngine {
  readonly store = new StateStore();
  readonly governor: RateGovernor;
  private readonly transport: Transport;
  private readonly coordinator: SyncCoordinator;
  private readonly dispatcher: CommandDispatcher;
  private readonly config?: AppConfig;

  constructor({
    transport,
    pollIntervalMs,
    deviceListIntervalMs,
    quota,
    reserve,
    now,
    config,
  }: SyncEngineOptions) {
    this.transport = transport;
    this.config = config;
    this.governor = new RateGovernor({ quota, reserve, now });
    this.coordinator = new SyncCoordinator({
      transport,
      store: this.store,
      governor: this.governor,
      pollIntervalMs,
      deviceListIntervalMs,
      now,
    });
    this.dispatcher = new CommandDispatcher({
      transport,
      store: this.store,
      governor: this.governor,
      scheduleRefresh: this.coordinator.requestRefresh,
      now,
    });
  }

  static fromConfig = async (config: AppConfig): Promise<SyncEngine> =>
    new SyncEngine({
      transport: await createTransport(config),
      pollIntervalMs: config.pollIntervalMs,
      deviceListIntervalMs: config.deviceListIntervalMs,
      quota: config.dailyQuota,
      reserve: config.quotaReserve,
      config,
    });

  /**
   * Starts polling. Resolves once the first cycle has listed the devices
   * and fetched their states.
   */
  start = async (): Promise<CycleReport> => {
    log.info("engine.start", { transport: this.transport.name });
    return this.coordinator.start();
  };

  stop = async (): Promise<void> => {
    await this.coordinator.stop();
    await this.transport.close();
    log.info("engine.stop");
  };

  getState = (deviceId: string): DeviceState | undefined =>
    this.store.read(toDeviceId(deviceId));

  listDevices = (): Device[] => this.store.listDevices();

  /**
   * Calls `listener` for every committed change. Returns the unsubscribe
   * function.
   */
  subscribeChanges = (
    listener: (event: StateChangeEvent) => void
  ): (() => void) => {
    this.store.on("changed", listener);
    return () => {
      this.store.off("changed", listener);
    };
  };

  changes = (signal?: AbortSignal): AsyncGenerator<StateChangeEvent> =>
    this.store.changes(signal);

  onDevicesUpdated = (
    listener: (event: DevicesUpdatedEvent) => void
  ): (() => void) => {
    this.store.on("devicesUpdated", listener);
    return () => {
      this.store.off("devicesUpdated", listener);
    };
  };

  sendCommand = (
    deviceId: string,
    instance: string,
    value: unknown,
    options?: DispatchOptions
  ): Promise<CommandResult> =>
    this.dispatcher.dispatch(toDeviceId(deviceId), instance, value, options);

  refresh = (deviceId: string): Promise<DeviceState> =>
    this.coordinator.refreshDevice(toDeviceId(deviceId));

  refreshDevices = (): Promise<DevicesUpdatedEvent> =>
    this.coordinator.refreshDevices();

  runCycle = (signal?: AbortSignal): Promise<CycleReport> =>
    this.coordinator.runCycle(signal);

  setPollInterval = (seconds: number): void =>
    this.coordinator.setPollInterval(seconds * 1000);

  diagnostics = (): Diagnostics => ({
    config: this.config
      ? {
          ...this.config,
          apiKey: this.config.apiKey && cloak(this.config.apiKey),
          sentryDsn: this.config.sentryDsn && cloak(this.config.sentryDsn, 8),
        }
      : {},
    transport: this.transport.name,
    pollIntervalMs: this.coordinator.interval,
    ledger: this.governor.ledger(),
    devices: this.store.readAll().map(state => ({
      deviceId: state.deviceId,
      stale: state.stale,
      missing: state.missing,
      lastRefreshed: state.lastRefreshed,
    })),
    data: {
      cloud_devices: this.coordinator.lastRawDevices,
      cloud_states: Object.fromEntries(
        [...this.coordinator.lastRawStates].map(([id, capabilities]) => [
          id,
          { capabilities },
        ])
      ),
    },
  });
}
