import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

vi.mock("../config/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { InvocationError } from "./invocationError.js";
import { makeExecutable, type PermissionFixer } from "./permissionFixer.js";
import { ChildProcessRunner } from "./processRunner.js";

describe("ChildProcessRunner", () => {
  let dir: string;

  function writeScript(name: string, body: string, mode = 0o755): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, `#!/bin/sh\n${body}\n`, "utf-8");
    fs.chmodSync(file, mode);
    return file;
  }

  async function runExpectingError(
    runner: ChildProcessRunner,
    file: string,
    useShell: boolean,
  ): Promise<InvocationError> {
    try {
      await runner.run({ path: file, env: process.env, useShell });
    } catch (error) {
      if (error instanceof InvocationError) return error;
      throw error;
    }
    throw new Error("expected the run to fail");
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "cadence-runner-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("should capture stdout through the shell wrapper", async () => {
    const file = writeScript("hello.sh", "echo hello");
    const runner = new ChildProcessRunner({ shell: "/bin/sh" });

    const result = await runner.run({ path: file, env: process.env, useShell: true });

    expect(result).toEqual({ stdout: "hello\n", stderr: "", exitCode: 0 });
  });

  it("should execute the script directly without the shell wrapper", async () => {
    const file = writeScript("direct.sh", "echo direct");
    const runner = new ChildProcessRunner();

    const result = await runner.run({ path: file, env: process.env, useShell: false });

    expect(result.stdout).toBe("direct\n");
  });

  it("should pass the environment and run inside the plugin directory", async () => {
    const file = writeScript("env.sh", 'echo "$CADENCE_PLUGIN_ID"; pwd');
    const runner = new ChildProcessRunner();

    const result = await runner.run({
      path: file,
      env: { PATH: process.env.PATH, CADENCE_PLUGIN_ID: "env.sh" },
      useShell: false,
    });

    expect(result.stdout).toBe(`env.sh\n${fs.realpathSync(dir)}\n`);
  });

  it("should return stderr alongside a successful exit", async () => {
    const file = writeScript("warn.sh", "echo out; echo careful >&2");
    const runner = new ChildProcessRunner();

    const result = await runner.run({ path: file, env: process.env, useShell: true });

    expect(result.stdout).toBe("out\n");
    expect(result.stderr).toBe("careful\n");
  });

  it("should reject a non-zero exit with the captured stderr", async () => {
    const file = writeScript("boom.sh", "echo boom >&2; exit 3");
    const runner = new ChildProcessRunner();

    const error = await runExpectingError(runner, file, true);

    expect(error.kind).toBe("non-zero-exit");
    expect(error.message).toBe("boom");
    expect(error.rawStderr).toBe("boom\n");
    expect(error.exitCode).toBe(3);
  });

  it("should describe a silent non-zero exit by its code", async () => {
    const file = writeScript("quiet.sh", "exit 2");
    const runner = new ChildProcessRunner();

    const error = await runExpectingError(runner, file, false);

    expect(error.message).toBe("Process exited with code 2");
  });

  it("should make the script executable before the first run", async () => {
    const file = writeScript("locked.sh", "echo unlocked", 0o644);
    const fixer: PermissionFixer = { makeExecutable: vi.fn(makeExecutable) };
    const runner = new ChildProcessRunner({ permissionFixer: fixer });

    const result = await runner.run({ path: file, env: process.env, useShell: false });

    expect(result.stdout).toBe("unlocked\n");
    expect(fs.statSync(file).mode & 0o777).toBe(0o755);
    expect(fixer.makeExecutable).toHaveBeenCalledTimes(1);
  });

  it("should fix permissions only once per path", async () => {
    const file = writeScript("twice.sh", "echo again");
    const fixer: PermissionFixer = { makeExecutable: vi.fn(makeExecutable) };
    const runner = new ChildProcessRunner({ permissionFixer: fixer });

    await runner.run({ path: file, env: process.env, useShell: false });
    await runner.run({ path: file, env: process.env, useShell: false });

    expect(fixer.makeExecutable).toHaveBeenCalledTimes(1);
  });

  it("should not relaunch when the permission fix changes nothing", async () => {
    const file = writeScript("stuck.sh", "echo never", 0o644);
    const fixer: PermissionFixer = { makeExecutable: vi.fn(async () => false) };
    const runner = new ChildProcessRunner({ permissionFixer: fixer });

    const error = await runExpectingError(runner, file, false);

    expect(error.kind).toBe("launch-failure");
    expect(fixer.makeExecutable).toHaveBeenCalledTimes(2);
  });

  it("should relaunch through the shell once the execute bit is restored", async () => {
    const file = writeScript("revoked.sh", "echo restored");
    const runner = new ChildProcessRunner({ shell: "/bin/sh" });
    await runner.run({ path: file, env: process.env, useShell: true });

    fs.chmodSync(file, 0o644);
    const result = await runner.run({ path: file, env: process.env, useShell: true });

    expect(result.stdout).toBe("restored\n");
    expect(fs.statSync(file).mode & 0o777).toBe(0o755);
  });

  it("should run a script that exits 126 on its own only once", async () => {
    const counter = path.join(dir, "runs.txt");
    const file = writeScript("side.sh", `echo run >> "${counter}"; exit 126`);
    const runner = new ChildProcessRunner({ shell: "/bin/sh" });

    const error = await runExpectingError(runner, file, true);

    expect(fs.readFileSync(counter, "utf-8")).toBe("run\n");
    expect(error.kind).toBe("non-zero-exit");
    expect(error.exitCode).toBe(126);
  });

  it("should treat a missing command inside the script as a non-zero exit", async () => {
    const file = writeScript("typo.sh", "cadence-no-such-command");
    const runner = new ChildProcessRunner({ shell: "/bin/sh" });

    const error = await runExpectingError(runner, file, true);

    expect(error.kind).toBe("non-zero-exit");
    expect(error.exitCode).toBe(127);
  });

  it("should report a missing target behind the shell as a launch failure", async () => {
    const runner = new ChildProcessRunner({ shell: "/bin/sh" });

    const error = await runExpectingError(runner, path.join(dir, "absent.sh"), true);

    expect(error.kind).toBe("launch-failure");
    expect(error.exitCode).toBe(127);
  });

  it("should report a missing script as a launch failure", async () => {
    const runner = new ChildProcessRunner();

    const error = await runExpectingError(runner, path.join(dir, "missing.sh"), false);

    expect(error.kind).toBe("launch-failure");
    expect(error.message).toContain("missing.sh");
  });

  it("should stop a script that exceeds the timeout", async () => {
    const file = writeScript("slow.sh", "exec sleep 5");
    const runner = new ChildProcessRunner({ timeoutMs: 100 });

    const error = await runExpectingError(runner, file, false);

    expect(error.kind).toBe("timeout");
    expect(error.message).toBe("Timed out after 100ms");
  });

  it("should stop processes the script started when it times out", async () => {
    const file = writeScript("spawner.sh", "sleep 4; echo done");
    const runner = new ChildProcessRunner({ timeoutMs: 100 });
    const startedAt = Date.now();

    const error = await runExpectingError(runner, file, false);

    expect(error.kind).toBe("timeout");
    expect(Date.now() - startedAt).toBeLessThan(2000);
  });
});
