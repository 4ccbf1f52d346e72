import { createLogger } from "../logger.ts";
import { MalformedCapability } from "../errors.ts";
import { Result, safeParse } from "../utility.ts";
import { decodeValue } from "./codec.ts";
import {
  CapabilityDeclarationSchema,
  StateCapabilitySchema,
  WireOptionSchema,
  WireParametersSchema,
  type WireField,
  type WireOption,
  type WireParameters,
} from "./schema.ts";
import {
  findCapability,
  type Capability,
  type CapabilityValue,
  type CompositeField,
  type Device,
  type DeviceId,
  type ModeOption,
  type ValueRange,
} from "./types.ts";

const log = createLogger("capability");

export const CapabilityTypes = {
  ON_OFF: "devices.capabilities.on_off",
  TOGGLE: "devices.capabilities.toggle",
  RANGE: "devices.capabilities.range",
  MODE: "devices.capabilities.mode",
  WORK_MODE: "devices.capabilities.work_mode",
  COLOR_SETTING: "devices.capabilities.color_setting",
  SEGMENT_COLOR_SETTING: "devices.capabilities.segment_color_setting",
  DYNAMIC_SCENE: "devices.capabilities.dynamic_scene",
  MUSIC_SETTING: "devices.capabilities.music_setting",
  DIY_SETTING: "devices.capabilities.diy_setting",
  TEMPERATURE_SETTING: "devices.capabilities.temperature_setting",
  PROPERTY: "devices.capabilities.property",
} as const;

// Types whose shape is decided by the declared dataType
const SHAPED_BY_DATA_TYPE = new Set<string>([
  CapabilityTypes.MODE,
  CapabilityTypes.WORK_MODE,
  CapabilityTypes.SEGMENT_COLOR_SETTING,
  CapabilityTypes.DYNAMIC_SCENE,
  CapabilityTypes.MUSIC_SETTING,
  CapabilityTypes.DIY_SETTING,
  CapabilityTypes.TEMPERATURE_SETTING,
]);

export interface ParseOutcome<T> {
  items: T;
  anomalies: MalformedCapability[];
}

export interface DecodedState
  extends ParseOutcome<Record<string, CapabilityValue>> {
  /** Declared instances present in the payload without a value */
  empty: string[];
}

const scalarOptions = (options: WireOption[] = []): ModeOption[] =>
  options.flatMap(({ name, value, defaultValue }) => {
    const scalar = value ?? defaultValue;
    return scalar === undefined ? [] : [{ name, value: scalar }];
  });

/**
 * Field options may group values under a parent option, e.g.
 * `{name: "gearMode", options: [{name: "Low", value: 1}, ...]}`. The
 * children are flattened next to their parent.
 */
const flattenOptions = (options: WireOption[] = []): WireOption[] =>
  options.flatMap(option => [
    option,
    ...flattenOptions(
      (option.options ?? []).flatMap(child => {
        const parsed = WireOptionSchema.safeParse(child);
        return parsed.success ? [parsed.data] : [];
      })
    ),
  ]);

const toField = (field: WireField): CompositeField => {
  const flat = flattenOptions(field.options);
  const options = scalarOptions(flat);
  const ranges = flat.flatMap(({ range }): ValueRange[] =>
    range ? [{ min: range.min, max: range.max }] : []
  );
  const required = field.required ?? false;

  if (field.dataType === "ENUM" && options.length + ranges.length > 0) {
    return {
      name: field.fieldName,
      required,
      constraint: { type: "enum", options, ranges },
    };
  }
  if (field.range) {
    const { min, max, precision } = field.range;
    return {
      name: field.fieldName,
      required,
      constraint: { type: "range", min, max, step: precision ?? 1 },
    };
  }
  return { name: field.fieldName, required, constraint: { type: "any" } };
};

const rangeFrom = (
  type: string,
  instance: string,
  parameters: WireParameters
): Capability => {
  if (!parameters.range) {
    throw new Error("range capability without declared bounds");
  }
  const { min, max, precision } = parameters.range;
  if (min > max) {
    throw new Error(`empty range [${min}, ${max}]`);
  }
  return {
    kind: "range",
    type,
    instance,
    min,
    max,
    step: precision ?? 1,
    ...(parameters.unit ? { unit: parameters.unit } : {}),
  };
};

const fromDataType = (
  type: string,
  instance: string,
  parameters: WireParameters
): Capability => {
  switch (parameters.dataType) {
    case "ENUM": {
      const options = scalarOptions(parameters.options);
      if (options.length === 0) {
        throw new Error("enumeration without options");
      }
      return { kind: "mode", type, instance, options };
    }
    case "STRUCT": {
      if (!parameters.fields || parameters.fields.length === 0) {
        throw new Error("struct without fields");
      }
      return {
        kind: "composite",
        type,
        instance,
        fields: parameters.fields.map(toField),
      };
    }
    case "INTEGER":
      return rangeFrom(type, instance, parameters);
    default:
      throw new Error(`unsupported data type ${parameters.dataType}`);
  }
};

const toCapability = (
  type: string,
  instance: string,
  parameters: WireParameters
): Capability => {
  switch (type) {
    case CapabilityTypes.ON_OFF:
    case CapabilityTypes.TOGGLE: {
      const options = scalarOptions(parameters.options);
      return {
        kind: "onOff",
        type,
        instance,
        onValue: options.find(o => o.name === "on")?.value ?? 1,
        offValue: options.find(o => o.name === "off")?.value ?? 0,
      };
    }
    case CapabilityTypes.RANGE:
      return rangeFrom(type, instance, parameters);
    case CapabilityTypes.COLOR_SETTING:
      return instance === "colorRgb"
        ? { kind: "color", type, instance }
        : rangeFrom(type, instance, parameters);
    case CapabilityTypes.PROPERTY:
      return {
        kind: "reading",
        type,
        instance,
        ...(parameters.unit ? { unit: parameters.unit } : {}),
      };
    default:
      if (SHAPED_BY_DATA_TYPE.has(type)) {
        return fromDataType(type, instance, parameters);
      }
      throw new Error("unsupported capability type");
  }
};

const reportAnomaly = (anomaly: MalformedCapability) => {
  log.warn("capability.malformed", {
    deviceId: anomaly.deviceId,
    type: anomaly.type,
    instance: anomaly.instance,
    reason: anomaly.reason,
  });
  return anomaly;
};

/**
 * Parses the capability declarations of a listed device. Entries of unknown
 * kind or with unusable parameters are skipped and reported as anomalies.
 */
export const parseCapabilities = (
  deviceId: DeviceId,
  declarations: readonly unknown[]
): ParseOutcome<Capability[]> => {
  const items: Capability[] = [];
  const anomalies: MalformedCapability[] = [];

  for (const raw of declarations) {
    const declaration = CapabilityDeclarationSchema.safeParse(raw);
    if (!declaration.success) {
      anomalies.push(
        reportAnomaly(
          new MalformedCapability(deviceId, "?", "?", "unreadable declaration")
        )
      );
      continue;
    }

    const { type, instance, parameters } = declaration.data;
    if (items.some(item => item.instance === instance)) {
      anomalies.push(
        reportAnomaly(
          new MalformedCapability(deviceId, type, instance, "duplicate instance")
        )
      );
      continue;
    }

    safeParse(parameters ?? {}, WireParametersSchema)
      .flatMap(parsed =>
        Result.try(() => toCapability(type, instance, parsed))
      )
      .fold(
        capability => items.push(capability),
        error =>
          anomalies.push(
            reportAnomaly(
              new MalformedCapability(deviceId, type, instance, error.message)
            )
          )
      );
  }

  return { items, anomalies };
};

/**
 * Decodes a state payload against the device's declared capabilities.
 * Undeclared instances and out-of-bounds values are dropped and reported;
 * capabilities reported without a value are left out.
 */
export const decodeState = (
  device: Device,
  reported: readonly unknown[]
): DecodedState => {
  const items: Record<string, CapabilityValue> = {};
  const empty: string[] = [];
  const anomalies: MalformedCapability[] = [];
  const anomaly = (type: string, instance: string, reason: string) =>
    anomalies.push(
      reportAnomaly(new MalformedCapability(device.id, type, instance, reason))
    );

  for (const raw of reported) {
    const entry = StateCapabilitySchema.safeParse(raw);
    if (!entry.success) {
      anomaly("?", "?", "unreadable state entry");
      continue;
    }

    const { type, instance, state } = entry.data;
    const capability = findCapability(device, instance);
    if (!capability) {
      anomaly(type, instance, "not declared by device");
      continue;
    }
    if (capability.type !== type) {
      anomaly(type, instance, `declared as ${capability.type}`);
      continue;
    }

    const wire = state?.value;
    if (wire === undefined || wire === null || wire === "") {
      empty.push(instance);
      continue;
    }

    decodeValue(capability, wire).fold(
      value => {
        items[instance] = value;
      },
      error => anomaly(type, instance, error.message)
    );
  }

  return { items, empty, anomalies };
};
