import type { RawDevice, WireCapability } from "../capability/schema.ts";
import type { DeviceRef } from "../capability/types.ts";

export interface CommandAck {
  requestId: string;
}

/**
 * The three remote operations the engine needs. The live HTTP client and the
 * fixture-backed stand-in both implement it.
 */
export interface Transport {
  readonly name: string;
  listDevices(): Promise<RawDevice[]>;
  /** Raw `{type, instance, state}` entries reported for the device */
  fetchState(device: DeviceRef): Promise<unknown[]>;
  sendCommand(
    device: DeviceRef,
    capability: WireCapability
  ): Promise<CommandAck>;
  close(): Promise<void>;
}
