import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { logger } from "./logger.js";

let _resolvedHome: string | null = null;

function resolveCadenceHome(): string {
  if (!_resolvedHome) {
    _resolvedHome = process.env.CADENCE_HOME ?? path.join(os.homedir(), ".cadence");
    logger.debug({ cadenceHome: _resolvedHome }, "CADENCE_HOME resolved");
  }
  return _resolvedHome;
}

export function getCadenceHome(): string {
  return resolveCadenceHome();
}

export function getDefaultPluginDir(): string {
  return path.join(resolveCadenceHome(), "plugins");
}

export function getPluginCacheRoot(): string {
  return path.join(resolveCadenceHome(), "cache");
}

export function getPluginDataRoot(): string {
  return path.join(resolveCadenceHome(), "data");
}

export function getDatabasePath(): string {
  return path.join(resolveCadenceHome(), "state.db");
}

export function getConfigFilePath(): string {
  return path.join(resolveCadenceHome(), "config.yaml");
}

export function ensureCadenceDirectories(pluginDir: string): void {
  const dirs = [resolveCadenceHome(), pluginDir, getPluginCacheRoot(), getPluginDataRoot()];

  for (const dir of dirs) {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
      logger.info({ dir }, "Created cadence directory");
    }
  }
}
