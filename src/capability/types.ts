import type { WireScalar } from "./schema.ts";

export type DeviceId = string & { readonly __deviceId: unique symbol };

export const toDeviceId = (id: string): DeviceId => id as DeviceId;

export interface RgbColor {
  r: number;
  g: number;
  b: number;
}

export interface ModeOption {
  name: string;
  value: WireScalar;
}

export interface ValueRange {
  min: number;
  max: number;
}

export type FieldConstraint =
  /** Declared values, plus any value inside one of `ranges` */
  | { type: "enum"; options: ModeOption[]; ranges: ValueRange[] }
  | { type: "range"; min: number; max: number; step: number }
  | { type: "any" };

export interface CompositeField {
  name: string;
  required: boolean;
  constraint: FieldConstraint;
}

interface CapabilityBase {
  /** Vendor capability type, e.g. `devices.capabilities.range` */
  type: string;
  /** Unique within the owning device */
  instance: string;
}

export interface OnOffCapability extends CapabilityBase {
  kind: "onOff";
  onValue: WireScalar;
  offValue: WireScalar;
}

export interface RangeCapability extends CapabilityBase {
  kind: "range";
  min: number;
  max: number;
  step: number;
  unit?: string;
}

export interface ModeCapability extends CapabilityBase {
  kind: "mode";
  options: ModeOption[];
}

export interface ColorCapability extends CapabilityBase {
  kind: "color";
}

export interface CompositeCapability extends CapabilityBase {
  kind: "composite";
  fields: CompositeField[];
}

/** Read-only sensor value (`devices.capabilities.property`) */
export interface ReadingCapability extends CapabilityBase {
  kind: "reading";
  unit?: string;
}

export type Capability =
  | OnOffCapability
  | RangeCapability
  | ModeCapability
  | ColorCapability
  | CompositeCapability
  | ReadingCapability;

export type CapabilityKind = Capability["kind"];

export type CompositeValue = Record<string, WireScalar>;

export interface CapabilityValueByKind {
  onOff: boolean;
  range: number;
  mode: string;
  color: RgbColor;
  composite: CompositeValue;
  reading: WireScalar | boolean;
}

export type CapabilityValue = CapabilityValueByKind[CapabilityKind];

export interface DeviceRef {
  id: DeviceId;
  sku: string;
}

/**
 * Immutable identity plus the capabilities declared when the device was
 * first listed
 */
export interface Device extends DeviceRef {
  name?: string;
  type?: string;
  capabilities: readonly Capability[];
}

export interface DeviceState {
  deviceId: DeviceId;
  values: Readonly<Record<string, CapabilityValue>>;
  /** Epoch ms of the last successful refresh, undefined until the first */
  lastRefreshed?: number;
  /** Epoch ms of the last committed change of any kind */
  lastUpdated?: number;
  stale: boolean;
  /** Declared capabilities the last full refresh did not report */
  missing: readonly string[];
}

export const findCapability = (
  device: Device,
  instance: string
): Capability | undefined =>
  device.capabilities.find(capability => capability.instance === instance);
