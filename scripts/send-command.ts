#!/usr/bin/env node
import { Command } from "commander";
import { loadConfig } from "../src/config.ts";
import { SyncEngine } from "../src/engine.ts";

const program = new Command();

program
  .name("send-command")
  .description("Send one command to a cloud device")
  .version("1.0.0")
  .argument("<device-id>", "Device id (e.g., AA:BB:CC:DD:EE:FF:00:11)")
  .argument("<instance>", "Capability instance (e.g., brightness)")
  .argument("<value>", "Value as JSON, bare words are taken as strings")
  .option("-f, --fixture <file>", "Send to a diagnostics export instead")
  .addHelpText(
    "after",
    `

Examples:

  $ send-command AA:BB:CC:DD:EE:FF:00:11 powerSwitch true
  $ send-command AA:BB:CC:DD:EE:FF:00:11 brightness 40
  $ send-command AA:BB:CC:DD:EE:FF:00:11 colorRgb '{"r":255,"g":0,"b":0}'
  $ send-command AA:BB:CC:DD:EE:FF:00:11 nightlightScene Forest
`
  );

program.parse();

const [deviceId = "", instance = "", rawValue = ""] = program.args;
const opts = program.opts<{ fixture?: string }>();

const parseValue = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
};

const config = loadConfig(
  opts.fixture
    ? { ...process.env, GOVEE_FIXTURE_FILE: opts.fixture }
    : process.env
);
const engine = await SyncEngine.fromConfig(config);

try {
  await engine.refreshDevices();
  const result = await engine.sendCommand(
    deviceId,
    instance,
    parseValue(rawValue)
  );
  console.log(`✅ ${result.instance} = ${JSON.stringify(result.value)}`);
  console.log(`   Request: ${result.requestId}`);
} catch (error) {
  console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
} finally {
  await engine.stop();
}
