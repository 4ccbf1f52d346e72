#!/usr/bin/env node
import { Command } from "commander";
import { loadConfig } from "../src/config.ts";
import { SyncEngine } from "../src/engine.ts";

const program = new Command();

program
  .name("list-devices")
  .description("List cloud devices with their capabilities and current state")
  .version("1.0.0")
  .option("-f, --fixture <file>", "Read a diagnostics export instead")
  .option("--diagnostics", "Print the diagnostics document as JSON", false)
  .addHelpText(
    "after",
    `

Examples:

  $ list-devices
  $ list-devices --fixture tests/fixtures/diagnostics.json
  $ list-devices --diagnostics > diagnostics.json
`
  );

program.parse();

const opts = program.opts<{ fixture?: string; diagnostics: boolean }>();
const config = loadConfig(
  opts.fixture
    ? { ...process.env, GOVEE_FIXTURE_FILE: opts.fixture }
    : process.env
);

const engine = await SyncEngine.fromConfig(config);
try {
  const report = await engine.runCycle();

  if (opts.diagnostics) {
    console.log(JSON.stringify(engine.diagnostics(), null, 2));
  } else {
    const devices = engine.listDevices();
    console.log(`Total devices: ${devices.length}\n`);

    devices.forEach((device, index) => {
      const state = engine.getState(device.id);
      console.log(`[${index + 1}] ${device.name ?? "Unnamed Device"}`);
      console.log(`  ID: ${device.id}`);
      console.log(`  SKU: ${device.sku}`);
      console.log(`  Stale: ${state?.stale ?? true}`);
      device.capabilities.forEach(capability => {
        const value = state?.values[capability.instance];
        console.log(
          `    ${capability.instance} (${capability.kind}): ${
            value === undefined ? "-" : JSON.stringify(value)
          }`
        );
      });
      console.log("");
    });

    if (report.failed.length > 0) {
      console.log(`Failed to refresh: ${report.failed.join(", ")}`);
    }
  }
} finally {
  await engine.stop();
}
