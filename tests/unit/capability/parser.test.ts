import * as Sentry from "@sentry/node";
import { describe, expect, it } from "vitest";
import {
  decodeState,
  parseCapabilities,
} from "../../../src/capability/parser.ts";
import { toDevice } from "../../../src/coordinator.ts";
import {
  createDevice,
  createDeviceId,
  Declarations,
  HeaterWorkMode,
  stateEntry,
} from "../../factories.ts";

const deviceId = createDeviceId();

describe("parseCapabilities", () => {
  it("should map every supported declaration onto a kind", () => {
    const { items, anomalies } = parseCapabilities(
      deviceId,
      Object.values(Declarations)
    );

    expect(anomalies).toEqual([]);
    expect(items.map(c => [c.instance, c.kind])).toEqual([
      ["powerSwitch", "onOff"],
      ["brightness", "range"],
      ["colorRgb", "color"],
      ["colorTemperatureK", "range"],
      ["nightlightScene", "mode"],
      ["workMode", "composite"],
      ["sensorTemperature", "reading"],
    ]);
  });

  it("should read range bounds, step and unit", () => {
    const { items } = parseCapabilities(deviceId, [
      Declarations.brightness,
      Declarations.colorTemperatureK,
    ]);

    expect(items).toEqual([
      {
        kind: "range",
        type: "devices.capabilities.range",
        instance: "brightness",
        min: 1,
        max: 100,
        step: 1,
        unit: "unit.percent",
      },
      {
        kind: "range",
        type: "devices.capabilities.color_setting",
        instance: "colorTemperatureK",
        min: 2000,
        max: 9000,
        step: 100,
      },
    ]);
  });

  it("should read struct fields with their constraints", () => {
    const { items } = parseCapabilities(deviceId, [Declarations.workMode]);

    expect(items[0]).toEqual({
      kind: "composite",
      type: "devices.capabilities.work_mode",
      instance: "workMode",
      fields: [
        {
          name: "workMode",
          required: true,
          constraint: {
            type: "enum",
            options: [
              { name: "gearMode", value: 1 },
              { name: "Auto", value: 3 },
            ],
            ranges: [],
          },
        },
        {
          name: "modeValue",
          required: true,
          constraint: { type: "range", min: 0, max: 3, step: 1 },
        },
      ],
    });
  });

  it("should flatten grouped, default and range field options", () => {
    const { items } = parseCapabilities(deviceId, [HeaterWorkMode]);

    expect(items[0]).toMatchObject({
      kind: "composite",
      fields: [
        { name: "workMode" },
        {
          name: "modeValue",
          required: true,
          constraint: {
            type: "enum",
            options: [
              { name: "Low", value: 1 },
              { name: "Medium", value: 2 },
              { name: "High", value: 3 },
              { name: "Dryer", value: 0 },
              { name: "Fan", value: 9 },
            ],
            ranges: [{ min: 80, max: 80 }],
          },
        },
      ],
    });
  });

  it("should default on/off values to 1 and 0", () => {
    const { items } = parseCapabilities(deviceId, [
      { type: "devices.capabilities.toggle", instance: "oscillationToggle" },
    ]);

    expect(items).toEqual([
      {
        kind: "onOff",
        type: "devices.capabilities.toggle",
        instance: "oscillationToggle",
        onValue: 1,
        offValue: 0,
      },
    ]);
  });

  it("should skip malformed entries and keep the rest", () => {
    const { items, anomalies } = parseCapabilities(deviceId, [
      Declarations.powerSwitch,
      42,
      { type: "devices.capabilities.online", instance: "online" },
      { type: "devices.capabilities.range", instance: "humidity" },
      Declarations.powerSwitch,
    ]);

    expect(items.map(c => c.instance)).toEqual(["powerSwitch"]);
    expect(anomalies.map(a => [a.instance, a.reason])).toEqual([
      ["?", "unreadable declaration"],
      ["online", "unsupported capability type"],
      ["humidity", "range capability without declared bounds"],
      ["powerSwitch", "duplicate instance"],
    ]);
  });

  it("should report anomalies as warnings", () => {
    parseCapabilities(deviceId, [
      { type: "devices.capabilities.online", instance: "online" },
    ]);

    expect(Sentry.captureMessage).toHaveBeenCalledWith("capability.malformed", {
      level: "warning",
      tags: { component: "capability" },
      extra: {
        deviceId,
        type: "devices.capabilities.online",
        instance: "online",
        reason: "unsupported capability type",
      },
    });
  });
});

describe("decodeState", () => {
  const device = createDevice(undefined, [
    "powerSwitch",
    "brightness",
    "colorRgb",
  ]);

  it("should decode every declared capability", () => {
    expect(
      decodeState(device, [
        stateEntry("powerSwitch", 1),
        stateEntry("brightness", 50),
        stateEntry("colorRgb", 16711680),
      ])
    ).toEqual({
      items: {
        powerSwitch: true,
        brightness: 50,
        colorRgb: { r: 255, g: 0, b: 0 },
      },
      empty: [],
      anomalies: [],
    });
  });

  it("should drop out of bounds and undeclared values", () => {
    const { items, anomalies } = decodeState(device, [
      stateEntry("powerSwitch", 0),
      stateEntry("brightness", 150),
      stateEntry("nightlightScene", 1),
      {
        type: "devices.capabilities.toggle",
        instance: "powerSwitch",
        state: { value: 1 },
      },
    ]);

    expect(items).toEqual({ powerSwitch: false });
    expect(anomalies.map(a => [a.instance, a.reason])).toEqual([
      ["brightness", "value 150 outside [1, 100]"],
      ["nightlightScene", "not declared by device"],
      ["powerSwitch", "declared as devices.capabilities.on_off"],
    ]);
  });

  it("should decode a work mode picked from grouped options", () => {
    const heater = toDevice({
      sku: "H7130",
      device: deviceId,
      capabilities: [HeaterWorkMode],
    });

    expect(
      decodeState(heater, [
        {
          type: "devices.capabilities.work_mode",
          instance: "workMode",
          state: { value: { workMode: 1, modeValue: 2 } },
        },
      ])
    ).toEqual({
      items: { workMode: { workMode: 1, modeValue: 2 } },
      empty: [],
      anomalies: [],
    });
  });

  it("should list capabilities reported without a value", () => {
    const { items, empty } = decodeState(device, [
      stateEntry("brightness", ""),
      { type: "devices.capabilities.on_off", instance: "powerSwitch" },
    ]);

    expect(items).toEqual({});
    expect(empty).toEqual(["brightness", "powerSwitch"]);
  });
});
