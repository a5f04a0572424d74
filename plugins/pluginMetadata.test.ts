import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

vi.mock("../config/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { fileMetadataProvider, parseMetadata, resolveMetadata } from "./pluginMetadata.js";

const SCRIPT = [
  "#!/bin/bash",
  "# <cadence.title>Weather</cadence.title>",
  "# <cadence.version>v1.2</cadence.version>",
  "# <cadence.author>Test Author</cadence.author>",
  "# <cadence.desc>Shows the forecast</cadence.desc>",
  "# <cadence.schedule>*/15 * * * *</cadence.schedule>",
  "# <cadence.runInShell>false</cadence.runInShell>",
  'echo "sunny"',
].join("\n");

describe("parseMetadata", () => {
  it("should read every known tag", () => {
    expect(parseMetadata(SCRIPT)).toEqual({
      title: "Weather",
      version: "v1.2",
      author: "Test Author",
      description: "Shows the forecast",
      schedule: "*/15 * * * *",
      runInShell: false,
      hidden: undefined,
    });
  });

  it("should leave absent fields undefined", () => {
    expect(parseMetadata("#!/bin/sh\necho hi\n")).toEqual({
      title: undefined,
      version: undefined,
      author: undefined,
      description: undefined,
      schedule: undefined,
      runInShell: undefined,
      hidden: undefined,
    });
  });

  it("should accept xbar tags and the runInBash alias", () => {
    const meta = parseMetadata("# <xbar.title>Clock</xbar.title>\n# <xbar.runInBash>true</xbar.runInBash>");
    expect(meta.title).toBe("Clock");
    expect(meta.runInShell).toBe(true);
  });

  it("should ignore tags whose prefixes do not match", () => {
    expect(parseMetadata("# <cadence.title>Broken</xbar.title>").title).toBeUndefined();
  });

  it("should ignore boolean tags with other values", () => {
    expect(parseMetadata("# <cadence.runInShell>maybe</cadence.runInShell>").runInShell).toBeUndefined();
  });
});

describe("resolveMetadata", () => {
  it("should compute the next fire time from the schedule", () => {
    const after = new Date(2026, 0, 5, 10, 7, 30);
    const resolved = resolveMetadata({ schedule: "*/15 * * * *" }, after);
    expect(resolved.nextAbsoluteFireTime).toEqual(new Date(2026, 0, 5, 10, 15, 0));
  });

  it("should not set a fire time without a schedule", () => {
    expect(resolveMetadata({ title: "x" }, new Date()).nextAbsoluteFireTime).toBeUndefined();
  });
});

describe("fileMetadataProvider", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "cadence-meta-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("should read metadata from the script file", () => {
    const file = path.join(dir, "weather.sh");
    fs.writeFileSync(file, SCRIPT, "utf-8");

    const resolved = fileMetadataProvider.resolve(file, new Date(2026, 0, 5, 10, 50, 0));

    expect(resolved.metadata.title).toBe("Weather");
    expect(resolved.nextAbsoluteFireTime).toEqual(new Date(2026, 0, 5, 11, 0, 0));
  });

  it("should return empty metadata when the file cannot be read", () => {
    expect(fileMetadataProvider.resolve(path.join(dir, "gone.sh"), new Date())).toEqual({ metadata: {} });
  });
});
