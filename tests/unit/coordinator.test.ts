import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { toDeviceId } from "../../src/capability/types.ts";
import { SyncCoordinator } from "../../src/coordinator.ts";
import {
  QuotaExhausted,
  TransportError,
  UnknownDevice,
} from "../../src/errors.ts";
import { RateGovernor } from "../../src/governor.ts";
import { StateStore } from "../../src/store.ts";
import { createRawDevice, FakeTransport, stateEntry } from "../factories.ts";

const A = toDeviceId("AA:BB:CC:DD:EE:FF:00:01");
const B = toDeviceId("AA:BB:CC:DD:EE:FF:00:02");
const C = toDeviceId("AA:BB:CC:DD:EE:FF:00:03");

const flush = () => new Promise(resolve => setImmediate(resolve));

describe("SyncCoordinator", () => {
  let clock: number;
  let transport: FakeTransport;
  let store: StateStore;
  let governor: RateGovernor;
  let coordinator: SyncCoordinator;

  const now = () => clock;

  const setBrightness = (id: string, brightness: number) =>
    transport.states.set(id, [
      stateEntry("powerSwitch", 1),
      stateEntry("brightness", brightness),
    ]);

  const createCoordinator = (quota = 100, reserve = 0) => {
    governor = new RateGovernor({ quota, reserve, now });
    coordinator = new SyncCoordinator({
      transport,
      store,
      governor,
      pollIntervalMs: 1000,
      deviceListIntervalMs: 10_000,
      now,
    });
  };

  beforeEach(() => {
    clock = 0;
    transport = new FakeTransport([
      createRawDevice(A),
      createRawDevice(B),
      createRawDevice(C),
    ]);
    setBrightness(A, 10);
    setBrightness(B, 20);
    setBrightness(C, 30);
    store = new StateStore();
    createCoordinator();
  });

  afterEach(async () => {
    await coordinator.stop();
    vi.useRealTimers();
  });

  describe("runCycle", () => {
    it("should list devices and merge every state", async () => {
      const report = await coordinator.runCycle();

      expect(report).toEqual({
        skipped: false,
        cancelled: false,
        refreshed: [A, B, C],
        failed: [],
        busy: [],
        deferred: [],
      });
      expect(store.read(A)).toMatchObject({
        values: { powerSwitch: true, brightness: 10 },
        stale: false,
        lastRefreshed: 0,
      });
      expect(governor.remaining).toBe(96);
    });

    it("should isolate a failing device from the rest of the cycle", async () => {
      await coordinator.runCycle();
      setBrightness(A, 11);
      setBrightness(B, 21);
      setBrightness(C, 31);
      transport.failures.set(B, new TransportError(500, "boom", true));

      const report = await coordinator.runCycle();

      expect(report.refreshed).toEqual([A, C]);
      expect(report.failed).toEqual([B]);
      expect(store.read(A)?.values.brightness).toBe(11);
      expect(store.read(C)?.values.brightness).toBe(31);
      expect(store.read(B)).toMatchObject({
        values: { powerSwitch: true, brightness: 20 },
        stale: true,
      });
    });

    it("should isolate unexpected errors too", async () => {
      transport.failures.set(A, new Error("exploded"));

      const report = await coordinator.runCycle();

      expect(report.refreshed).toEqual([B, C]);
      expect(report.failed).toEqual([A]);
      expect(store.read(A)?.stale).toBe(true);
    });

    it("should skip the whole cycle without budget", async () => {
      await coordinator.runCycle();
      governor.exhaust();

      const report = await coordinator.runCycle();

      expect(report.skipped).toBe(true);
      expect(report.deferred).toEqual([A, B, C]);
      expect(transport.fetchState).toHaveBeenCalledTimes(3);
      expect(store.read(A)).toMatchObject({
        values: { powerSwitch: true, brightness: 10 },
        stale: true,
      });
    });

    it("should leave the reserve to commands", async () => {
      createCoordinator(4, 2);

      const report = await coordinator.runCycle();

      expect(report.skipped).toBe(false);
      expect(report.refreshed).toEqual([A]);
      expect(report.deferred).toEqual([B, C]);
      expect(governor.remaining).toBe(2);
    });

    it("should list devices on the slower cadence", async () => {
      await coordinator.runCycle();
      clock = 5000;
      await coordinator.runCycle();
      expect(transport.listDevices).toHaveBeenCalledTimes(1);

      clock = 10_000;
      await coordinator.runCycle();
      expect(transport.listDevices).toHaveBeenCalledTimes(2);
      expect(transport.fetchState).toHaveBeenCalledTimes(9);
    });

    it("should drop devices that are no longer listed", async () => {
      await coordinator.runCycle();
      const listener = vi.fn();
      store.on("devicesUpdated", listener);
      transport.devices = [createRawDevice(A), createRawDevice(C)];
      clock = 10_000;

      const report = await coordinator.runCycle();

      expect(report.refreshed).toEqual([A, C]);
      expect(store.getDevice(B)).toBeUndefined();
      expect(coordinator.lastRawStates.has(B)).toBe(false);
      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener).toHaveBeenCalledWith({
        added: [],
        removed: [expect.objectContaining({ id: B })],
      });
    });

    it("should keep polling known devices when the listing fails", async () => {
      await coordinator.runCycle();
      transport.listError = new TransportError(503, "unavailable", true);
      clock = 10_000;

      const report = await coordinator.runCycle();

      expect(report.refreshed).toEqual([A, B, C]);
      expect(store.listDevices()).toHaveLength(3);
    });

    it("should retry a failed first listing on the next cycle", async () => {
      transport.listError = new TransportError(503, "unavailable", true);
      await coordinator.runCycle();
      transport.listError = undefined;

      const report = await coordinator.runCycle();

      expect(transport.listDevices).toHaveBeenCalledTimes(2);
      expect(report.refreshed).toEqual([A, B, C]);
    });

    it("should stop spending after a rate limit response", async () => {
      transport.failures.set(A, new TransportError(429, "", false));

      const report = await coordinator.runCycle();

      expect(report.failed).toEqual([A]);
      expect(report.deferred).toEqual([B, C]);
      expect(governor.remaining).toBe(0);
    });

    it("should stop between devices when cancelled", async () => {
      const controller = new AbortController();
      transport.fetchState.mockImplementationOnce(async () => {
        controller.abort();
        return [];
      });

      const report = await coordinator.runCycle(controller.signal);

      expect(report.cancelled).toBe(true);
      expect(report.refreshed).toEqual([A]);
      expect(transport.fetchState).toHaveBeenCalledTimes(1);
    });

    it("should pass over devices held by a command", async () => {
      await coordinator.runCycle();
      let release = () => {};
      const held = store.withDevice(
        A,
        () =>
          new Promise<void>(resolve => {
            release = resolve;
          })
      );

      const report = await coordinator.runCycle();
      release();
      await held;

      expect(report.busy).toEqual([A]);
      expect(report.refreshed).toEqual([B, C]);
    });

    it("should walk through the cycle phases", async () => {
      const phases: string[] = [];
      transport.fetchState.mockImplementationOnce(async () => {
        phases.push(coordinator.phase);
        return [];
      });

      await coordinator.runCycle();

      expect(phases).toEqual(["fetching"]);
      expect(coordinator.phase).toBe("idle");
    });

    it("should share a cycle already running", async () => {
      const [first, second] = await Promise.all([
        coordinator.runCycle(),
        coordinator.runCycle(),
      ]);

      expect(first).toBe(second);
      expect(transport.listDevices).toHaveBeenCalledTimes(1);
    });
  });

  describe("refreshDevices", () => {
    it("should reconcile the device list", async () => {
      const { added, removed } = await coordinator.refreshDevices();

      expect(added.map(device => device.id)).toEqual([A, B, C]);
      expect(removed).toEqual([]);
    });

    it("should stop spending after a rate limit response", async () => {
      transport.listError = new TransportError(429, "", false);

      await expect(coordinator.refreshDevices()).rejects.toThrow(
        TransportError
      );
      expect(governor.remaining).toBe(0);
    });
  });

  describe("refreshDevice", () => {
    beforeEach(async () => {
      await coordinator.runCycle();
    });

    it("should fetch and merge one device", async () => {
      setBrightness(A, 42);

      const state = await coordinator.refreshDevice(A);

      expect(state.values.brightness).toBe(42);
      expect(transport.fetchState).toHaveBeenCalledTimes(4);
    });

    it("should reject unknown devices", async () => {
      await expect(
        coordinator.refreshDevice(toDeviceId("nope"))
      ).rejects.toThrow(UnknownDevice);
    });

    it("should respect the budget", async () => {
      governor.exhaust();

      await expect(coordinator.refreshDevice(A)).rejects.toThrow(
        QuotaExhausted
      );
    });

    it("should mark the device stale when the fetch fails", async () => {
      transport.failures.set(A, new TransportError(502, "bad gateway", true));

      await expect(coordinator.refreshDevice(A)).rejects.toThrow(
        TransportError
      );
      expect(store.read(A)?.stale).toBe(true);
    });

    it("should never reject an out-of-band refresh", async () => {
      transport.failures.set(A, new TransportError(502, "bad gateway", true));

      await expect(coordinator.requestRefresh(A)).resolves.toBeUndefined();
      expect(store.read(A)?.stale).toBe(true);
    });
  });

  describe("scheduling", () => {
    it("should poll on the interval until stopped", async () => {
      vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });

      const first = await coordinator.start();
      expect(first.refreshed).toEqual([A, B, C]);

      vi.advanceTimersByTime(999);
      await flush();
      expect(transport.fetchState).toHaveBeenCalledTimes(3);

      vi.advanceTimersByTime(1);
      await flush();
      expect(transport.fetchState).toHaveBeenCalledTimes(6);

      await coordinator.stop();
      vi.advanceTimersByTime(10_000);
      await flush();
      expect(transport.fetchState).toHaveBeenCalledTimes(6);
    });

    it("should apply a new interval from the next scheduled cycle", async () => {
      vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
      await coordinator.start();

      coordinator.setPollInterval(5000);
      vi.advanceTimersByTime(1000);
      await flush();
      expect(transport.fetchState).toHaveBeenCalledTimes(6);

      vi.advanceTimersByTime(4999);
      await flush();
      expect(transport.fetchState).toHaveBeenCalledTimes(6);

      vi.advanceTimersByTime(1);
      await flush();
      expect(transport.fetchState).toHaveBeenCalledTimes(9);
    });

    it("should reject a non-positive interval", () => {
      expect(() => coordinator.setPollInterval(0)).toThrow(
        "Poll interval must be positive, got 0"
      );
    });

    it("should refuse to start twice", async () => {
      await coordinator.start();

      expect(() => coordinator.start()).toThrow(
        "Coordinator is already running"
      );
    });
  });
});
