import { EventEmitter, on } from "node:events";
import type {
  CapabilityValue,
  Device,
  DeviceId,
  DeviceState,
} from "./capability/types.ts";
import { createLogger } from "./logger.ts";
import { fastDeepEqual } from "./utility.ts";

const log = createLogger("store");

/**
 * Emitted once per committed merge that changed at least one value
 */
export interface StateChangeEvent {
  deviceId: DeviceId;
  changed: string[];
  prevState: DeviceState;
  newState: DeviceState;
}

export interface DevicesUpdatedEvent {
  added: Device[];
  removed: Device[];
}

export interface MergeOptions {
  /**
   * The values come from a complete state read: the refresh timestamp moves
   * and staleness clears, unless declared capabilities were not reported,
   * in which case they are recorded as missing and the device stays stale.
   * Partial merges (command reconciliation) leave both untouched.
   */
  fullRefresh?: boolean;
  /** Instances the full refresh listed without a usable value */
  reported?: readonly string[];
  at?: number;
}

export interface MergeResult {
  changed: string[];
  state: DeviceState;
}

/**
 * Write access to one device, handed out while its lock is held
 */
export interface DeviceWriter {
  readonly device: Device;
  merge(
    values: Record<string, CapabilityValue>,
    options?: MergeOptions
  ): MergeResult;
  markStale(): DeviceState;
}

const emptyState = (deviceId: DeviceId): DeviceState =>
  Object.freeze({
    deviceId,
    values: Object.freeze({}),
    stale: true,
    missing: [],
  });

/**
 * Single owner of every device's last-known state. Snapshots are immutable
 * and replaced whole on commit, so readers never see a partial merge.
 * Writers for the same device are serialized through a per-device lock.
 */
export class StateStore extends EventEmitter<{
  changed: [StateChangeEvent];
  devicesUpdated: [DevicesUpdatedEvent];
}> {
  private devices = new Map<DeviceId, Device>();
  private states = new Map<DeviceId, DeviceState>();
  private locks = new Map<DeviceId, Promise<void>>();

  getDevice = (deviceId: DeviceId): Device | undefined =>
    this.devices.get(deviceId);

  listDevices = (): Device[] => [...this.devices.values()];

  read = (deviceId: DeviceId): DeviceState | undefined =>
    this.states.get(deviceId);

  readAll = (): DeviceState[] => [...this.states.values()];

  isLocked = (deviceId: DeviceId): boolean => this.locks.has(deviceId);

  /**
   * Replaces the device set with a fresh listing. Known devices keep their
   * identity and declared capabilities; unlisted ones are dropped along with
   * their state.
   */
  syncDevices = (listed: Device[]): [Device[], Device[]] => {
    const listedIds = new Set(listed.map(device => device.id));
    const added = listed.filter(device => !this.devices.has(device.id));
    const removed = [...this.devices.values()].filter(
      device => !listedIds.has(device.id)
    );

    removed.forEach(device => {
      this.devices.delete(device.id);
      this.states.delete(device.id);
    });
    added.forEach(device => {
      this.devices.set(device.id, device);
      this.states.set(device.id, emptyState(device.id));
    });

    if (added.length > 0 || removed.length > 0) {
      log.info("devices.updated", {
        added: added.map(d => d.id),
        removed: removed.map(d => d.id),
      });
      const event = { added, removed };
      this.rawListeners("devicesUpdated").forEach(listener =>
        this.deliver("devicesUpdated", () => listener(event))
      );
    }
    return [added, removed];
  };

  /**
   * Runs `fn` with exclusive write access to one device. Calls for the same
   * device run one after another in call order; other devices and readers
   * are never blocked.
   */
  withDevice = <T>(
    deviceId: DeviceId,
    fn: (writer: DeviceWriter) => Promise<T> | T
  ): Promise<T> => {
    const previous = this.locks.get(deviceId) ?? Promise.resolve();
    const run = previous.then(() => fn(this.writerFor(deviceId)));
    const tail = run.then(
      () => undefined,
      () => undefined
    );

    this.locks.set(deviceId, tail);
    void tail.then(() => {
      if (this.locks.get(deviceId) === tail) {
        this.locks.delete(deviceId);
      }
    });
    return run;
  };

  merge = (
    deviceId: DeviceId,
    values: Record<string, CapabilityValue>,
    options?: MergeOptions
  ): Promise<MergeResult> =>
    this.withDevice(deviceId, writer => writer.merge(values, options));

  markStale = (deviceId: DeviceId): Promise<DeviceState> =>
    this.withDevice(deviceId, writer => writer.markStale());

  /**
   * Change events as an async iterator, ending when `signal` aborts
   */
  async *changes(signal?: AbortSignal): AsyncGenerator<StateChangeEvent> {
    try {
      for await (const [event] of on(this, "changed", { signal })) {
        yield event;
      }
    } catch (error) {
      if (!signal?.aborted) {
        throw error;
      }
    }
  }

  private writerFor = (deviceId: DeviceId): DeviceWriter => {
    const device = this.devices.get(deviceId);
    if (!device) {
      throw new Error(`Device ${deviceId} is not registered`);
    }

    return {
      device,
      merge: (values, options) => this.commitMerge(device, values, options),
      markStale: () => this.commitStale(device),
    };
  };

  private commitMerge(
    device: Device,
    values: Record<string, CapabilityValue>,
    { fullRefresh = false, reported = [], at = Date.now() }: MergeOptions = {}
  ): MergeResult {
    const prevState = this.states.get(device.id) ?? emptyState(device.id);
    const declared = new Set(device.capabilities.map(c => c.instance));

    const accepted = Object.entries(values).filter(([instance]) => {
      if (declared.has(instance)) return true;
      log.warn("merge.undeclared", { deviceId: device.id, instance });
      return false;
    });

    const changed = accepted
      .filter(
        ([instance, value]) => !fastDeepEqual(prevState.values[instance], value)
      )
      .map(([instance]) => instance);

    const seen = new Set([...accepted.map(([i]) => i), ...reported]);
    const missing = (fullRefresh ? [...declared] : prevState.missing).filter(
      instance => !seen.has(instance)
    );

    const newState: DeviceState = Object.freeze({
      deviceId: device.id,
      values: Object.freeze({
        ...prevState.values,
        ...Object.fromEntries(accepted),
      }),
      lastRefreshed: fullRefresh ? at : prevState.lastRefreshed,
      lastUpdated: at,
      stale: fullRefresh ? missing.length > 0 : prevState.stale,
      missing: Object.freeze(missing),
    });

    this.states.set(device.id, newState);

    if (changed.length > 0) {
      const event = { deviceId: device.id, changed, prevState, newState };
      this.rawListeners("changed").forEach(listener =>
        this.deliver("changed", () => listener(event))
      );
    }
    return { changed, state: newState };
  }

  /**
   * The commit has already happened when listeners run: a throwing listener
   * is logged and the remaining ones are still called.
   */
  private deliver(event: string, call: () => void): void {
    try {
      call();
    } catch (error) {
      log.error("subscriber.error", error, { event });
    }
  }

  private commitStale(device: Device): DeviceState {
    const prevState = this.states.get(device.id) ?? emptyState(device.id);
    if (prevState.stale) {
      return prevState;
    }

    const newState: DeviceState = Object.freeze({ ...prevState, stale: true });
    this.states.set(device.id, newState);
    log.debug("state.stale", { deviceId: device.id });
    return newState;
  }
}
