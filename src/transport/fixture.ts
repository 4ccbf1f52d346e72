import { randomUUID } from "node:crypto";
import { readFile } from "node:fs/promises";
import {
  FixtureDocumentSchema,
  StateCapabilitySchema,
  type FixtureDocument,
  type RawDevice,
  type WireCapability,
} from "../capability/schema.ts";
import type { DeviceRef } from "../capability/types.ts";
import { createLogger } from "../logger.ts";
import { safeParse } from "../utility.ts";
import type { CommandAck, Transport } from "./types.ts";

const log = createLogger("fixture");

/**
 * Offline transport serving a diagnostics export. Commands always succeed
 * and are applied to the in-memory copy, so a following state read reports
 * them.
 */
export class FixtureTransport implements Transport {
  readonly name = "fixture";
  private readonly document: FixtureDocument;

  constructor(document: FixtureDocument) {
    this.document = structuredClone(document);
  }

  static fromFile = async (path: string): Promise<FixtureTransport> => {
    const text = await readFile(path, "utf8");
    const document = await safeParse(
      JSON.parse(text),
      FixtureDocumentSchema
    ).toPromise();
    log.info("fixture.loaded", {
      path,
      devices: document.data.cloud_devices.length,
    });
    return new FixtureTransport(document);
  };

  listDevices = async (): Promise<RawDevice[]> =>
    structuredClone(this.document.data.cloud_devices);

  fetchState = async (device: DeviceRef): Promise<unknown[]> =>
    structuredClone(this.document.data.cloud_states[device.id]?.capabilities) ??
    [];

  sendCommand = async (
    device: DeviceRef,
    capability: WireCapability
  ): Promise<CommandAck> => {
    const states = (this.document.data.cloud_states[device.id] ??= {
      capabilities: [],
    });
    const index = states.capabilities.findIndex(
      entry =>
        StateCapabilitySchema.safeParse(entry).data?.instance ===
        capability.instance
    );
    const entry = {
      type: capability.type,
      instance: capability.instance,
      state: { value: structuredClone(capability.value) },
    };
    if (index >= 0) {
      states.capabilities[index] = entry;
    } else {
      states.capabilities.push(entry);
    }

    log.debug("fixture.command", {
      deviceId: device.id,
      instance: capability.instance,
    });
    return { requestId: randomUUID() };
  };

  close = async (): Promise<void> => {};
}
