import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

vi.mock("../config/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { createPluginEnvironment } from "./pluginEnvironment.js";

describe("createPluginEnvironment", () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "cadence-env-"));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  function build() {
    return createPluginEnvironment({
      pluginDir: path.join(root, "plugins"),
      cacheRoot: path.join(root, "cache"),
      dataRoot: path.join(root, "data"),
      baseEnv: { PATH: "/usr/bin", HOME: "/home/test", VSCODE_PID: "42" },
    });
  }

  it("should expose plugin locations to the script", () => {
    const env = build().envFor("clock.1m.sh", path.join(root, "plugins", "clock.1m.sh"));

    expect(env).toEqual({
      PATH: "/usr/bin",
      HOME: "/home/test",
      CADENCE: "1",
      CADENCE_PLUGINS_PATH: path.join(root, "plugins"),
      CADENCE_PLUGIN_PATH: path.join(root, "plugins", "clock.1m.sh"),
      CADENCE_PLUGIN_ID: "clock.1m.sh",
      CADENCE_PLUGIN_CACHE_PATH: path.join(root, "cache", "clock.1m.sh"),
      CADENCE_PLUGIN_DATA_PATH: path.join(root, "data", "clock.1m.sh"),
    });
  });

  it("should strip editor variables from the inherited environment", () => {
    const env = build().envFor("a.sh", "/x/a.sh");
    expect(env.VSCODE_PID).toBeUndefined();
  });

  it("should create cache and data directories", () => {
    build().prepare("clock.1m.sh");

    expect(fs.statSync(path.join(root, "cache", "clock.1m.sh")).isDirectory()).toBe(true);
    expect(fs.statSync(path.join(root, "data", "clock.1m.sh")).isDirectory()).toBe(true);
  });
});
