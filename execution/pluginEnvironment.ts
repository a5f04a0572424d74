import fs from "node:fs";
import path from "node:path";
import { logger } from "../config/logger.js";

export interface PluginEnvironmentOptions {
  readonly pluginDir: string;
  readonly cacheRoot: string;
  readonly dataRoot: string;
  readonly baseEnv?: NodeJS.ProcessEnv;
}

export interface PluginEnvironment {
  envFor(pluginId: string, sourcePath: string): NodeJS.ProcessEnv;
  /** Creates the per-plugin cache and data directories. */
  prepare(pluginId: string): void;
}

const IDE_ENV_PREFIXES = ["VSCODE_", "CURSOR_", "ELECTRON_"];

function inheritedEnv(baseEnv: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = {};

  for (const [key, value] of Object.entries(baseEnv)) {
    const shouldStrip = IDE_ENV_PREFIXES.some((prefix) => key.startsWith(prefix));
    if (!shouldStrip) {
      env[key] = value;
    }
  }

  return env;
}

export function createPluginEnvironment(options: PluginEnvironmentOptions): PluginEnvironment {
  const baseEnv = inheritedEnv(options.baseEnv ?? process.env);
  const cachePath = (pluginId: string) => path.join(options.cacheRoot, pluginId);
  const dataPath = (pluginId: string) => path.join(options.dataRoot, pluginId);

  return {
    envFor(pluginId, sourcePath) {
      return {
        ...baseEnv,
        CADENCE: "1",
        CADENCE_PLUGINS_PATH: options.pluginDir,
        CADENCE_PLUGIN_PATH: sourcePath,
        CADENCE_PLUGIN_ID: pluginId,
        CADENCE_PLUGIN_CACHE_PATH: cachePath(pluginId),
        CADENCE_PLUGIN_DATA_PATH: dataPath(pluginId),
      };
    },

    prepare(pluginId) {
      for (const dir of [cachePath(pluginId), dataPath(pluginId)]) {
        try {
          fs.mkdirSync(dir, { recursive: true });
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          logger.warn({ pluginId, dir, error: message }, "Failed to create plugin support directory");
        }
      }
    },
  };
}
