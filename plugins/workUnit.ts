import { logger } from "../config/logger.js";
import { InvocationError, isInvocationError } from "../execution/invocationError.js";
import type { PluginEnvironment } from "../execution/pluginEnvironment.js";
import type { ProcessRunner } from "../execution/processRunner.js";
import type { InvocableUnit, InvocationTicket } from "../orchestration/invocationQueue.js";
import type { SchedulableUnit, TimerController } from "../orchestration/scheduler.js";
import type { Clock } from "../scheduling/clock.js";
import { computeSchedule, resolveIntervalSeconds, type Schedule } from "../scheduling/scheduleCalculator.js";
import type { PreferencesStore } from "../state/preferences.js";
import { DebugLog, type DebugEvent, type UnitEventSink } from "./debugLog.js";
import type { MetadataProvider, PluginMetadata } from "./pluginMetadata.js";
import {
  UnitContractError,
  type ContentListener,
  type InvocationOutcome,
  type UnitDescriptor,
  type UnitState,
} from "./types.js";

export const LOADING_CONTENT = "...";

export interface InvocationSubmitter {
  submit(unitId: string): InvocationTicket;
}

export interface WorkUnitDependencies {
  readonly runner: ProcessRunner;
  readonly queue: InvocationSubmitter;
  readonly timers: TimerController;
  readonly preferences: PreferencesStore;
  readonly metadataProvider: MetadataProvider;
  readonly environment: PluginEnvironment;
  readonly clock: Clock;
  readonly debugLogLimit?: number;
  readonly eventSink?: UnitEventSink;
}

export interface WorkUnitSnapshot {
  readonly id: string;
  readonly name: string;
  readonly sourcePath: string;
  readonly state: UnitState;
  readonly enabled: boolean;
  readonly schedule: Schedule;
  readonly runInShell: boolean;
  readonly metadata: PluginMetadata;
  readonly lastUpdated: string | null;
  readonly lastError: string | null;
}

export class WorkUnit implements InvocableUnit, SchedulableUnit {
  readonly id: string;
  readonly name: string;
  readonly sourcePath: string;

  private _state: UnitState = "loading";
  private _content: string | undefined = LOADING_CONTENT;
  private _lastOutput: string | undefined;
  private _lastError: InvocationError | undefined;
  private _lastUpdated: Date | undefined;
  private _metadata: PluginMetadata = {};
  private _runInShell = true;
  private _nextAbsoluteFireTime: Date | undefined;
  private consumedFireTime: Date | undefined;
  private pendingInvocation: InvocationTicket | null = null;
  private readonly intervalSeconds: number;
  private readonly listeners = new Set<ContentListener>();
  private readonly debugLog: DebugLog;

  constructor(
    descriptor: UnitDescriptor,
    private readonly deps: WorkUnitDependencies,
  ) {
    if (descriptor.sourcePath.trim().length === 0) {
      throw new UnitContractError(`Unit "${descriptor.id}" has no source path`);
    }

    this.id = descriptor.id;
    this.name = descriptor.id.split(".")[0];
    this.sourcePath = descriptor.sourcePath;
    this.debugLog = new DebugLog(descriptor.id, deps.debugLogLimit, deps.eventSink);

    this.intervalSeconds = resolveIntervalSeconds(descriptor.intervalToken);

    this.refreshMetadata();
  }

  get state(): UnitState {
    return this._state;
  }

  get enabled(): boolean {
    return !this.deps.preferences.isDisabled(this.id);
  }

  /** Observable output: the loading marker, the last stdout, or undefined after a failure. */
  get content(): string | undefined {
    return this._content;
  }

  get lastOutput(): string | undefined {
    return this._lastOutput;
  }

  get lastError(): InvocationError | undefined {
    return this._lastError;
  }

  get lastUpdated(): Date | undefined {
    return this._lastUpdated;
  }

  get metadata(): PluginMetadata {
    return this._metadata;
  }

  get runInShell(): boolean {
    return this._runInShell;
  }

  get updateIntervalSeconds(): number {
    return this.intervalSeconds;
  }

  get nextAbsoluteFireTime(): Date | undefined {
    return this._nextAbsoluteFireTime;
  }

  get schedule(): Schedule {
    return computeSchedule({
      intervalSeconds: this.intervalSeconds,
      nextAbsoluteFireTime: this._nextAbsoluteFireTime,
    });
  }

  get hasPendingInvocation(): boolean {
    const ticket = this.pendingInvocation;
    return ticket !== null && !ticket.started && !ticket.cancelled;
  }

  start(): void {
    if (!this.enabled) {
      this._state = "disabled";
      logger.info({ unitId: this.id }, "Plugin is disabled, not starting");
      return;
    }
    this.refresh();
  }

  refresh(): void {
    if (!this.enabled) {
      logger.debug({ unitId: this.id }, "Skipping refresh for disabled plugin");
      return;
    }

    logger.debug({ unitId: this.id }, "Requesting refresh for plugin");
    this.debugLog.add("refresh", "Requesting manual refresh", this.deps.clock.now());
    this.disableTimer();
    this.cancelPendingInvocation();
    this.refreshMetadata();
    this.pendingInvocation = this.deps.queue.submit(this.id);
  }

  /** Queues an invocation without touching the armed timer. */
  requestInvocation(): void {
    if (!this.enabled) return;
    this.pendingInvocation = this.deps.queue.submit(this.id);
  }

  disable(): void {
    this._state = "disabled";
    this.disableTimer();
    this.cancelPendingInvocation();
    this.deps.preferences.addDisabled(this.id);
    logger.info({ unitId: this.id }, "Plugin disabled");
  }

  enable(): void {
    this.deps.preferences.removeDisabled(this.id);
    logger.info({ unitId: this.id }, "Plugin enabled");
    this.refresh();
  }

  terminate(): void {
    this.disableTimer();
    this.cancelPendingInvocation();
  }

  /** Forgets the debug history, including any persisted events. */
  discardHistory(): void {
    this.debugLog.clear();
  }

  enableTimer(): void {
    if (!this.enabled) return;
    this.deps.timers.enableTimer(this);
  }

  disableTimer(): void {
    this.deps.timers.disableTimer(this.id);
  }

  consumeAbsoluteFireTime(): void {
    this.consumedFireTime = this._nextAbsoluteFireTime;
    this._nextAbsoluteFireTime = undefined;
  }

  async invoke(): Promise<InvocationOutcome> {
    this._lastUpdated = this.deps.clock.now();

    try {
      const result = await this.deps.runner.run({
        path: this.sourcePath,
        env: this.deps.environment.envFor(this.id, this.sourcePath),
        useShell: this._runInShell,
      });

      this._lastError = undefined;
      this._lastOutput = result.stdout;
      this.applyState("success");
      logger.debug({ unitId: this.id, bytes: result.stdout.length }, "Plugin executed successfully");
      this.debugLog.add("content-update", result.stdout, this.deps.clock.now());

      if (result.stderr.length > 0) {
        logger.warn({ unitId: this.id, stderr: result.stderr }, "Plugin wrote to stderr");
        this.debugLog.add("content-update-error", result.stderr, this.deps.clock.now());
      }

      return { ok: true, output: result.stdout };
    } catch (error) {
      const invocationError =
        isInvocationError(error)
          ? error
          : new InvocationError(error instanceof Error ? error.message : String(error), "launch-failure");

      logger.error(
        { unitId: this.id, kind: invocationError.kind, error: invocationError.message },
        "Failed to execute plugin",
      );
      this._lastError = invocationError;
      this.applyState("failed");
      this.debugLog.add("content-update-error", invocationError.message, this.deps.clock.now());

      return { ok: false, error: invocationError };
    }
  }

  publish(content: string | undefined): void {
    if (content === this._content) return;
    this._content = content;

    for (const listener of this.listeners) {
      try {
        listener(content);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn({ unitId: this.id, error: message }, "Content listener threw");
      }
    }
  }

  /** Returns an unsubscribe function. */
  subscribe(listener: ContentListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  debugEvents(): readonly DebugEvent[] {
    return this.debugLog.events();
  }

  describe(): WorkUnitSnapshot {
    return {
      id: this.id,
      name: this.name,
      sourcePath: this.sourcePath,
      state: this._state,
      enabled: this.enabled,
      schedule: this.schedule,
      runInShell: this._runInShell,
      metadata: this._metadata,
      lastUpdated: this._lastUpdated?.toISOString() ?? null,
      lastError: this._lastError?.message ?? null,
    };
  }

  private cancelPendingInvocation(): void {
    this.pendingInvocation?.cancel();
    this.pendingInvocation = null;
  }

  // A unit disabled while its process was running keeps its disabled state.
  private applyState(next: UnitState): void {
    if (!this.enabled) return;
    this._state = next;
  }

  private refreshMetadata(): void {
    const now = this.deps.clock.now();
    const consumed = this.consumedFireTime;
    const after = consumed && consumed.getTime() > now.getTime() ? consumed : now;
    this.consumedFireTime = undefined;

    const resolved = this.deps.metadataProvider.resolve(this.sourcePath, after);
    this._metadata = resolved.metadata;
    this._runInShell = resolved.metadata.runInShell ?? true;
    this._nextAbsoluteFireTime = resolved.nextAbsoluteFireTime;
  }
}
