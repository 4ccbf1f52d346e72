import { loadConfig } from "./config.ts";
import { SyncEngine } from "./engine.ts";
import { createLogger } from "./logger.ts";

const log = createLogger("main");

let engine: SyncEngine;
try {
  engine = await SyncEngine.fromConfig(loadConfig());
} catch (error) {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
}

engine.subscribeChanges(({ deviceId, changed, newState }) =>
  log.info("state.changed", {
    deviceId,
    changed: Object.fromEntries(
      changed.map(instance => [instance, newState.values[instance]])
    ),
  })
);
engine.onDevicesUpdated(({ added, removed }) =>
  log.info("devices.updated", {
    added: added.map(device => device.name ?? device.id),
    removed: removed.map(device => device.name ?? device.id),
  })
);

const report = await engine.start();
log.info("sync.started", {
  devices: engine.listDevices().length,
  refreshed: report.refreshed.length,
  failed: report.failed.length,
});

const shutdown = async () => {
  log.info("sync.shutdown");
  await engine.stop();
  process.exit(0);
};

process.on("SIGTERM", () => void shutdown());
process.on("SIGINT", () => void shutdown());
