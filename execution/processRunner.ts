import { spawn } from "node:child_process";
import path from "node:path";
import { logger } from "../config/logger.js";
import { InvocationError } from "./invocationError.js";
import { canExecute, chmodPermissionFixer, type PermissionFixer } from "./permissionFixer.js";

export interface ProcessRequest {
  readonly path: string;
  readonly env: NodeJS.ProcessEnv;
  readonly useShell: boolean;
  readonly cwd?: string;
}

export interface ProcessResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
}

export interface ProcessRunner {
  /** Resolves with the captured output, rejects with an InvocationError. */
  run(request: ProcessRequest): Promise<ProcessResult>;
}

export interface ChildProcessRunnerOptions {
  readonly shell?: string;
  readonly timeoutMs?: number;
  readonly permissionFixer?: PermissionFixer;
}

type SpawnOutcome =
  | {
      readonly kind: "exited";
      readonly stdout: string;
      readonly stderr: string;
      readonly exitCode: number;
      readonly timedOut: boolean;
    }
  | { readonly kind: "spawn-error"; readonly error: NodeJS.ErrnoException };

const DEFAULT_SHELL = "/bin/sh";
// POSIX shells exit with 126 when the target cannot be executed and 127 when it is missing.
const SHELL_NOT_EXECUTABLE_EXIT = 126;
const SHELL_NOT_FOUND_EXIT = 127;
const KILL_GRACE_MS = 2_000;

function quoteForShell(value: string): string {
  const singleQuoteEscape = String.raw`'\''`;
  return "'" + value.replaceAll("'", singleQuoteEscape) + "'";
}

function isPermissionFailure(outcome: SpawnOutcome, useShell: boolean): boolean {
  if (outcome.kind === "spawn-error") {
    return outcome.error.code === "EACCES";
  }
  return useShell && outcome.exitCode === SHELL_NOT_EXECUTABLE_EXIT;
}

export class ChildProcessRunner implements ProcessRunner {
  private readonly prepared = new Set<string>();
  private readonly shell: string;
  private readonly timeoutMs: number;
  private readonly permissionFixer: PermissionFixer;

  constructor(options: ChildProcessRunnerOptions = {}) {
    this.shell = options.shell ?? DEFAULT_SHELL;
    this.timeoutMs = options.timeoutMs ?? 0;
    this.permissionFixer = options.permissionFixer ?? chmodPermissionFixer;
  }

  async run(request: ProcessRequest): Promise<ProcessResult> {
    if (!this.prepared.has(request.path)) {
      await this.fixPermissions(request.path);
    }

    let outcome = await this.spawnOnce(request);

    if (isPermissionFailure(outcome, request.useShell) && (await this.fixPermissions(request.path))) {
      logger.warn({ path: request.path }, "Plugin was not executable, retrying after fixing permissions");
      outcome = await this.spawnOnce(request);
    }

    if (outcome.kind === "spawn-error") {
      throw new InvocationError(
        `Failed to launch ${request.path}: ${outcome.error.message}`,
        "launch-failure",
      );
    }

    if (outcome.timedOut) {
      throw new InvocationError(
        `Timed out after ${String(this.timeoutMs)}ms`,
        "timeout",
        outcome.stderr,
        outcome.exitCode,
      );
    }

    if (outcome.exitCode !== 0) {
      // 126 and 127 only mean the shell could not start the target when the target is not runnable.
      const launchFailed =
        request.useShell &&
        (outcome.exitCode === SHELL_NOT_EXECUTABLE_EXIT || outcome.exitCode === SHELL_NOT_FOUND_EXIT) &&
        !(await canExecute(request.path));
      const message = outcome.stderr.trim() || `Process exited with code ${String(outcome.exitCode)}`;
      throw new InvocationError(
        message,
        launchFailed ? "launch-failure" : "non-zero-exit",
        outcome.stderr,
        outcome.exitCode,
      );
    }

    return { stdout: outcome.stdout, stderr: outcome.stderr, exitCode: outcome.exitCode };
  }

  /** Resolves to true when the file's mode was changed. */
  private async fixPermissions(filePath: string): Promise<boolean> {
    try {
      const changed = await this.permissionFixer.makeExecutable(filePath);
      this.prepared.add(filePath);
      return changed;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn({ path: filePath, error: message }, "Could not make plugin executable");
      return false;
    }
  }

  private spawnOnce(request: ProcessRequest): Promise<SpawnOutcome> {
    const cwd = request.cwd ?? path.dirname(request.path);

    return new Promise((resolve) => {
      // Own process group, so a timeout reaches every process the script started.
      const child = request.useShell
        ? spawn(this.shell, ["-c", quoteForShell(request.path)], {
            cwd,
            env: request.env,
            detached: true,
            stdio: ["ignore", "pipe", "pipe"],
          })
        : spawn(request.path, [], {
            cwd,
            env: request.env,
            detached: true,
            stdio: ["ignore", "pipe", "pipe"],
          });

      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];
      let settled = false;
      let timedOut = false;
      let timeoutTimer: NodeJS.Timeout | null = null;

      const signalGroup = (signal: NodeJS.Signals) => {
        if (child.pid === undefined) return;
        try {
          process.kill(-child.pid, signal);
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          logger.debug({ path: request.path, signal, error: message }, "Process group already gone");
        }
      };

      const settleExited = (code: number | null) => {
        if (settled) return;
        settled = true;
        if (timeoutTimer) clearTimeout(timeoutTimer);
        resolve({
          kind: "exited",
          stdout: Buffer.concat(stdoutChunks).toString("utf-8"),
          stderr: Buffer.concat(stderrChunks).toString("utf-8"),
          exitCode: code ?? 1,
          timedOut,
        });
      };

      child.stdout.on("data", (chunk: Buffer) => {
        stdoutChunks.push(chunk);
      });

      child.stderr.on("data", (chunk: Buffer) => {
        stderrChunks.push(chunk);
      });

      child.on("close", (code) => {
        settleExited(code);
      });

      // After a timeout, a process that escaped the group may still hold the pipes open.
      child.on("exit", (code) => {
        if (!timedOut) return;
        child.stdout.destroy();
        child.stderr.destroy();
        settleExited(code);
      });

      child.on("error", (error: NodeJS.ErrnoException) => {
        if (settled) return;
        settled = true;
        if (timeoutTimer) clearTimeout(timeoutTimer);
        resolve({ kind: "spawn-error", error });
      });

      if (this.timeoutMs > 0) {
        timeoutTimer = setTimeout(() => {
          if (settled) return;
          timedOut = true;
          logger.warn({ path: request.path, timeoutMs: this.timeoutMs }, "Plugin timed out, sending SIGTERM");
          signalGroup("SIGTERM");
          setTimeout(() => signalGroup("SIGKILL"), KILL_GRACE_MS).unref();
        }, this.timeoutMs);
      }
    });
  }
}
