import { vi } from "vitest";
import type { RawDevice, WireCapability } from "../src/capability/schema.ts";
import {
  toDeviceId,
  type Capability,
  type Device,
  type DeviceId,
  type DeviceRef,
} from "../src/capability/types.ts";
import { toDevice } from "../src/coordinator.ts";
import type { CommandAck, Transport } from "../src/transport/types.ts";

export const createDeviceId = (
  id: string = "AA:BB:CC:DD:EE:FF:00:01"
): DeviceId => toDeviceId(id);

export const Declarations = {
  powerSwitch: {
    type: "devices.capabilities.on_off",
    instance: "powerSwitch",
    parameters: {
      dataType: "ENUM",
      options: [
        { name: "on", value: 1 },
        { name: "off", value: 0 },
      ],
    },
  },
  brightness: {
    type: "devices.capabilities.range",
    instance: "brightness",
    parameters: {
      unit: "unit.percent",
      dataType: "INTEGER",
      range: { min: 1, max: 100, precision: 1 },
    },
  },
  colorRgb: {
    type: "devices.capabilities.color_setting",
    instance: "colorRgb",
    parameters: {
      dataType: "INTEGER",
      range: { min: 0, max: 16777215, precision: 1 },
    },
  },
  colorTemperatureK: {
    type: "devices.capabilities.color_setting",
    instance: "colorTemperatureK",
    parameters: {
      dataType: "INTEGER",
      range: { min: 2000, max: 9000, precision: 100 },
    },
  },
  nightlightScene: {
    type: "devices.capabilities.mode",
    instance: "nightlightScene",
    parameters: {
      dataType: "ENUM",
      options: [
        { name: "Forest", value: 1 },
        { name: "Ocean", value: 2 },
      ],
    },
  },
  workMode: {
    type: "devices.capabilities.work_mode",
    instance: "workMode",
    parameters: {
      dataType: "STRUCT",
      fields: [
        {
          fieldName: "workMode",
          dataType: "ENUM",
          options: [
            { name: "gearMode", value: 1 },
            { name: "Auto", value: 3 },
          ],
          required: true,
        },
        {
          fieldName: "modeValue",
          dataType: "INTEGER",
          range: { min: 0, max: 3, precision: 1 },
          required: true,
        },
      ],
    },
  },
  sensorTemperature: {
    type: "devices.capabilities.property",
    instance: "sensorTemperature",
    parameters: { dataType: "INTEGER", unit: "unit.fahrenheit" },
  },
} as const;

export type DeclarationName = keyof typeof Declarations;

/** Heater work mode: gear levels are grouped under their parent mode */
export const HeaterWorkMode = {
  type: "devices.capabilities.work_mode",
  instance: "workMode",
  parameters: {
    dataType: "STRUCT",
    fields: [
      {
        fieldName: "workMode",
        dataType: "ENUM",
        options: [
          { name: "gearMode", value: 1 },
          { name: "Auto", value: 3 },
          { name: "Dryer", value: 8 },
          { name: "Fan", value: 9 },
        ],
        required: true,
      },
      {
        fieldName: "modeValue",
        dataType: "ENUM",
        options: [
          {
            name: "gearMode",
            options: [
              { name: "Low", value: 1 },
              { name: "Medium", value: 2 },
              { name: "High", value: 3 },
            ],
          },
          { name: "Auto", range: { min: 80, max: 80 } },
          { name: "Dryer", defaultValue: 0 },
          { name: "Fan", value: 9 },
        ],
        required: true,
      },
    ],
  },
} as const;

export const createRawDevice = (
  id: string = "AA:BB:CC:DD:EE:FF:00:01",
  instances: DeclarationName[] = ["powerSwitch", "brightness"],
  name: string = `Lamp ${id.slice(-2)}`
): RawDevice => ({
  sku: "H6008",
  device: id,
  deviceName: name,
  type: "devices.types.light",
  capabilities: instances.map(instance => Declarations[instance]),
});

export const createDevice = (
  id?: string,
  instances?: DeclarationName[]
): Device => toDevice(createRawDevice(id, instances));

export const createCapability = (name: DeclarationName): Capability => {
  const [capability] = createDevice(undefined, [name]).capabilities;
  if (!capability) {
    throw new Error(`Declaration ${name} did not parse`);
  }
  return capability;
};

export const stateEntry = (
  name: DeclarationName,
  value: unknown
): { type: string; instance: string; state: { value: unknown } } => ({
  type: Declarations[name].type,
  instance: Declarations[name].instance,
  state: { value },
});

/**
 * In-process transport serving canned devices and states. Per-device
 * failures are thrown from `fetchState`; `commandError` from `sendCommand`.
 */
export class FakeTransport implements Transport {
  readonly name = "fake";
  devices: RawDevice[];
  states = new Map<string, unknown[]>();
  failures = new Map<string, Error>();
  listError?: Error;
  commandError?: Error;
  /** Resolves pending commands when set; commands wait on it */
  commandGate?: Promise<void>;

  constructor(devices: RawDevice[] = []) {
    this.devices = devices;
  }

  listDevices = vi.fn(async (): Promise<RawDevice[]> => {
    if (this.listError) throw this.listError;
    return this.devices;
  });

  fetchState = vi.fn(async (device: DeviceRef): Promise<unknown[]> => {
    const failure = this.failures.get(device.id);
    if (failure) throw failure;
    return this.states.get(device.id) ?? [];
  });

  sendCommand = vi.fn(
    async (
      _device: DeviceRef,
      _capability: WireCapability
    ): Promise<CommandAck> => {
      await this.commandGate;
      if (this.commandError) throw this.commandError;
      return { requestId: "req-1" };
    }
  );

  close = vi.fn(async (): Promise<void> => {});
}
