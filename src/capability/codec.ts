/**
 * Value codecs between the vendor wire values and the typed capability
 * values, one per capability kind
 */

import { match } from "ts-pattern";
import { z } from "zod";
import { InvalidCommandValue } from "../errors.ts";
import { Result } from "../utility.ts";
import type { WireCapability, WireScalar, WireValue } from "./schema.ts";
import type {
  Capability,
  CapabilityValue,
  CompositeCapability,
  CompositeValue,
  FieldConstraint,
  ModeCapability,
  OnOffCapability,
  RangeCapability,
  RgbColor,
} from "./types.ts";

const MAX_RGB = 0xff_ff_ff;

const RgbColorSchema = z
  .object({
    r: z.number().int().min(0).max(255),
    g: z.number().int().min(0).max(255),
    b: z.number().int().min(0).max(255),
  })
  .strict();

const CompositeValueSchema = z.record(
  z.string(),
  z.union([z.number(), z.string()])
);

/** Decimal places of a number, exponent notation included (1e-7 has 7) */
const decimals = (n: number): number => {
  const [mantissa = "", exponent = "0"] = n.toExponential().split("e");
  const fraction = mantissa.split(".")[1]?.length ?? 0;
  return Math.max(fraction - Number(exponent), 0);
};

/**
 * Snaps a value to the nearest `min + k * step`, ties rounding up. A result
 * past `max` (when `max` itself is off-grid) falls back one step.
 */
export const snapToStep = (
  value: number,
  { min, max, step }: { min: number; max: number; step: number }
): number => {
  let snapped = min + Math.round((value - min) / step) * step;
  if (snapped > max) {
    snapped -= step;
  }
  return Number(snapped.toFixed(Math.max(decimals(min), decimals(step))));
};

const inRange = (value: number, { min, max }: { min: number; max: number }) =>
  value >= min && value <= max;

export const rgbToInt = ({ r, g, b }: RgbColor): number =>
  (r << 16) | (g << 8) | b;

export const intToRgb = (value: number): RgbColor => ({
  r: (value >> 16) & 255,
  g: (value >> 8) & 255,
  b: value & 255,
});

const isScalar = (value: unknown): value is WireScalar =>
  typeof value === "number" || typeof value === "string";

const checkField = (
  name: string,
  constraint: FieldConstraint,
  value: WireScalar,
  snap: boolean
): WireScalar =>
  match(constraint)
    .with({ type: "enum" }, ({ options, ranges }) => {
      const declared =
        options.some(option => option.value === value) ||
        (typeof value === "number" &&
          ranges.some(range => inRange(value, range)));
      if (!declared) {
        throw new Error(`field ${name} value ${value} is not a declared option`);
      }
      return value;
    })
    .with({ type: "range" }, range => {
      if (typeof value !== "number" || !Number.isFinite(value)) {
        throw new Error(`field ${name} must be a number`);
      }
      if (!inRange(value, range)) {
        throw new Error(
          `field ${name} value ${value} outside [${range.min}, ${range.max}]`
        );
      }
      return snap ? snapToStep(value, range) : value;
    })
    .with({ type: "any" }, () => value)
    .exhaustive();

const checkComposite = (
  capability: CompositeCapability,
  value: CompositeValue,
  encoding: boolean
): CompositeValue => {
  const checked: CompositeValue = {};
  for (const [name, fieldValue] of Object.entries(value)) {
    const field = capability.fields.find(f => f.name === name);
    if (!field) {
      throw new Error(`unknown field ${name}`);
    }
    checked[name] = checkField(name, field.constraint, fieldValue, encoding);
  }

  if (encoding) {
    const missing = capability.fields.filter(
      field => field.required && !(field.name in value)
    );
    if (missing.length > 0) {
      throw new Error(
        `missing required field(s) ${missing.map(f => f.name).join(", ")}`
      );
    }
  }
  return checked;
};

const decodeOnOff = (capability: OnOffCapability, wire: unknown): boolean => {
  if (wire === capability.onValue) return true;
  if (wire === capability.offValue) return false;
  throw new Error(`value ${String(wire)} is neither on nor off`);
};

const decodeRange = (capability: RangeCapability, wire: unknown): number => {
  if (typeof wire !== "number" || !Number.isFinite(wire)) {
    throw new Error("value must be a number");
  }
  if (!inRange(wire, capability)) {
    throw new Error(
      `value ${wire} outside [${capability.min}, ${capability.max}]`
    );
  }
  return wire;
};

const decodeMode = (capability: ModeCapability, wire: unknown): string => {
  const option = capability.options.find(o => o.value === wire);
  if (!option) {
    throw new Error(`value ${String(wire)} is not a declared option`);
  }
  return option.name;
};

const decodeColor = (wire: unknown): RgbColor => {
  if (!Number.isInteger(wire) || typeof wire !== "number") {
    throw new Error("color must be an integer");
  }
  if (wire < 0 || wire > MAX_RGB) {
    throw new Error(`color ${wire} outside [0, ${MAX_RGB}]`);
  }
  return intToRgb(wire);
};

/**
 * Decodes a wire value reported by the API for a declared capability
 */
export const decodeValue = (
  capability: Capability,
  wire: unknown
): Result<CapabilityValue> =>
  Result.try(() =>
    match(capability)
      .returnType<CapabilityValue>()
      .with({ kind: "onOff" }, c => decodeOnOff(c, wire))
      .with({ kind: "range" }, c => decodeRange(c, wire))
      .with({ kind: "mode" }, c => decodeMode(c, wire))
      .with({ kind: "color" }, () => decodeColor(wire))
      .with({ kind: "composite" }, c => {
        const parsed = CompositeValueSchema.safeParse(wire);
        if (!parsed.success) {
          throw new Error("composite value must be an object of scalars");
        }
        return checkComposite(c, parsed.data, false);
      })
      .with({ kind: "reading" }, () => {
        if (isScalar(wire) || typeof wire === "boolean") {
          return wire;
        }
        throw new Error("reading must be a scalar");
      })
      .exhaustive()
  );

/**
 * Validates a consumer-supplied value for a capability and converts it to
 * the wire value. Range values are snapped to the declared step.
 * Returns the wire value and the canonical value the device should end up
 * with.
 */
export const encodeValue = (
  capability: Capability,
  value: unknown
): Result<{ wire: WireValue; value: CapabilityValue }> =>
  Result.try(() =>
    match(capability)
      .returnType<{ wire: WireValue; value: CapabilityValue }>()
      .with({ kind: "onOff" }, c => {
        if (typeof value !== "boolean") {
          throw new Error("expected a boolean");
        }
        return { wire: value ? c.onValue : c.offValue, value };
      })
      .with({ kind: "range" }, c => {
        if (typeof value !== "number" || !Number.isFinite(value)) {
          throw new Error("expected a number");
        }
        if (!inRange(value, c)) {
          throw new Error(`${value} outside [${c.min}, ${c.max}]`);
        }
        const snapped = snapToStep(value, c);
        return { wire: snapped, value: snapped };
      })
      .with({ kind: "mode" }, c => {
        const option = c.options.find(o => o.name === value);
        if (!option) {
          throw new Error(
            `expected one of ${c.options.map(o => o.name).join(", ")}`
          );
        }
        return { wire: option.value, value: option.name };
      })
      .with({ kind: "color" }, () => {
        const parsed = RgbColorSchema.safeParse(value);
        if (!parsed.success) {
          throw new Error("expected {r, g, b} with channels in [0, 255]");
        }
        return { wire: rgbToInt(parsed.data), value: parsed.data };
      })
      .with({ kind: "composite" }, c => {
        const parsed = CompositeValueSchema.safeParse(value);
        if (!parsed.success) {
          throw new Error("expected an object of field values");
        }
        const checked = checkComposite(c, parsed.data, true);
        return { wire: checked, value: checked };
      })
      .with({ kind: "reading" }, () => {
        throw new Error("capability is read-only");
      })
      .exhaustive()
  );

export interface EncodedCommand {
  capability: WireCapability;
  /** Value the device holds once the command applies (range values snapped) */
  value: CapabilityValue;
}

export const encodeCommand = (
  capability: Capability,
  value: unknown
): EncodedCommand =>
  encodeValue(capability, value).fold(
    encoded => ({
      capability: {
        type: capability.type,
        instance: capability.instance,
        value: encoded.wire,
      },
      value: encoded.value,
    }),
    error => {
      throw new InvalidCommandValue(capability.instance, value, error.message);
    }
  );
