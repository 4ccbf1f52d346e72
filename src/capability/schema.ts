import { z } from "zod";

// Payload shapes of the Govee OpenAPI v1 (router/api/v1). Capability arrays
// are kept as `unknown[]` here and validated entry by entry in the parser, so
// one bad entry never rejects a whole device.

const WireScalarSchema = z.union([z.number(), z.string()]);

export const WireRangeSchema = z.object({
  min: z.number(),
  max: z.number(),
  precision: z.number().positive().optional(),
});

export const WireOptionSchema = z.object({
  name: z.string(),
  value: WireScalarSchema.optional(),
  defaultValue: z.number().optional(),
  range: WireRangeSchema.optional(),
  options: z.array(z.unknown()).optional(),
});

export const WireFieldSchema = z.object({
  fieldName: z.string(),
  dataType: z.string(),
  options: z.array(WireOptionSchema).optional(),
  range: WireRangeSchema.optional(),
  required: z.boolean().optional(),
});

export const WireParametersSchema = z.object({
  dataType: z.string().optional(),
  unit: z.string().optional(),
  range: WireRangeSchema.optional(),
  options: z.array(WireOptionSchema).optional(),
  fields: z.array(WireFieldSchema).optional(),
});

export const CapabilityDeclarationSchema = z.object({
  type: z.string(),
  instance: z.string(),
  parameters: z.unknown().optional(),
});

export const StateCapabilitySchema = z.object({
  type: z.string(),
  instance: z.string(),
  state: z.object({ value: z.unknown().optional() }).optional(),
});

export const RawDeviceSchema = z.object({
  sku: z.string(),
  device: z.string(),
  deviceName: z.string().optional(),
  type: z.string().optional(),
  capabilities: z.array(z.unknown()).default([]),
});

export const DevicesResponseSchema = z.object({
  code: z.number(),
  message: z.string().optional(),
  data: z.array(RawDeviceSchema),
});

export const StateResponseSchema = z.object({
  code: z.number(),
  msg: z.string().optional(),
  payload: z.object({
    sku: z.string(),
    device: z.string(),
    capabilities: z.array(z.unknown()),
  }),
});

export const ControlResponseSchema = z.object({
  code: z.number(),
  msg: z.string().optional(),
  capability: z
    .object({
      type: z.string(),
      instance: z.string(),
      value: z.unknown().optional(),
      state: z
        .object({
          status: z.string().optional(),
          errorCode: z.number().optional(),
          errorMsg: z.string().optional(),
        })
        .optional(),
    })
    .optional(),
});

/**
 * Document written by the diagnostics export and read back by the fixture
 * transport
 */
export const FixtureDocumentSchema = z.object({
  data: z.object({
    cloud_devices: z.array(RawDeviceSchema),
    cloud_states: z
      .record(z.string(), z.object({ capabilities: z.array(z.unknown()) }))
      .default({}),
  }),
});

export type WireScalar = z.infer<typeof WireScalarSchema>;
export type WireRange = z.infer<typeof WireRangeSchema>;
export type WireOption = z.infer<typeof WireOptionSchema>;
export type WireField = z.infer<typeof WireFieldSchema>;
export type WireParameters = z.infer<typeof WireParametersSchema>;
export type RawDevice = z.infer<typeof RawDeviceSchema>;
export type StateCapability = z.infer<typeof StateCapabilitySchema>;
export type ControlResponse = z.infer<typeof ControlResponseSchema>;
export type FixtureDocument = z.infer<typeof FixtureDocumentSchema>;

export type WireValue = number | string | Record<string, WireScalar>;

/**
 * `{type, instance, value}` triple sent to `/device/control`
 */
export interface WireCapability {
  type: string;
  instance: string;
  value: WireValue;
}
