#!/usr/bin/env node
import { logger } from "../config/logger.js";
import { ensureCadenceDirectories, getCadenceHome, getPluginCacheRoot, getPluginDataRoot } from "../config/paths.js";
import { loadHostConfig } from "../config/settings.js";
import { createPluginEnvironment } from "../execution/pluginEnvironment.js";
import { ChildProcessRunner } from "../execution/processRunner.js";
import { UnitRegistry } from "../orchestration/unitRegistry.js";
import { DirectorySource } from "../plugins/directorySource.js";
import { fileMetadataProvider } from "../plugins/pluginMetadata.js";
import { systemClock } from "../scheduling/clock.js";
import { openDatabase } from "../state/db.js";
import { SqlitePreferencesStore } from "../state/preferences.js";
import { SqliteUnitEventSink } from "../state/unitEvents.js";

logger.info("cadence-runner initializing...");

const config = loadHostConfig();
ensureCadenceDirectories(config.pluginDir);

const db = openDatabase(config.databasePath);
const preferences = new SqlitePreferencesStore(db);
logger.info(
  {
    cadenceHome: getCadenceHome(),
    pluginDir: config.pluginDir,
    maxConcurrentInvocations: config.maxConcurrentInvocations,
    invocationTimeoutMs: config.invocationTimeoutMs,
    disabled: preferences.disabledIds(),
  },
  "Configuration loaded",
);

const registry = new UnitRegistry({
  runner: new ChildProcessRunner({ shell: config.shell, timeoutMs: config.invocationTimeoutMs }),
  preferences,
  metadataProvider: fileMetadataProvider,
  environment: createPluginEnvironment({
    pluginDir: config.pluginDir,
    cacheRoot: getPluginCacheRoot(),
    dataRoot: getPluginDataRoot(),
  }),
  clock: systemClock,
  maxConcurrentInvocations: config.maxConcurrentInvocations,
  debugLogLimit: config.debugLogLimit,
  eventSink: config.persistDebugEvents ? new SqliteUnitEventSink(db, config.debugLogLimit) : undefined,
});

registry.subscribe((unitId, content) => {
  const unit = registry.get(unitId);
  logger.info({ unitId, state: unit?.state, content }, "Plugin content updated");
});

registry.attach(new DirectorySource(config.pluginDir));
logger.info({ plugins: registry.list().length }, "cadence-runner started");

async function shutdown(signal: string): Promise<void> {
  logger.info({ signal }, "Shutting down");
  try {
    await registry.shutdown();
  } finally {
    db.close();
  }
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        logger.error({ error: message }, "Shutdown failed");
        process.exit(1);
      });
  });
}

process.on("SIGHUP", () => {
  logger.info("Refreshing all plugins");
  registry.refreshAll();
});
