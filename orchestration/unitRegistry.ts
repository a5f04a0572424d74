import { logger } from "../config/logger.js";
import type { PluginEnvironment } from "../execution/pluginEnvironment.js";
import type { ProcessRunner } from "../execution/processRunner.js";
import type { UnitEventSink } from "../plugins/debugLog.js";
import type { MetadataProvider } from "../plugins/pluginMetadata.js";
import type { UnitDescriptor, UnitSource } from "../plugins/types.js";
import { WorkUnit, type WorkUnitSnapshot } from "../plugins/workUnit.js";
import type { Clock } from "../scheduling/clock.js";
import type { PreferencesStore } from "../state/preferences.js";
import { InvocationQueue } from "./invocationQueue.js";
import { Scheduler } from "./scheduler.js";

export interface UnitRegistryOptions {
  readonly runner: ProcessRunner;
  readonly preferences: PreferencesStore;
  readonly metadataProvider: MetadataProvider;
  readonly environment: PluginEnvironment;
  readonly clock: Clock;
  /** 0 means unbounded. */
  readonly maxConcurrentInvocations?: number;
  readonly debugLogLimit?: number;
  readonly eventSink?: UnitEventSink;
}

export type RegistryContentListener = (unitId: string, content: string | undefined) => void;

export class UnitRegistry {
  readonly queue: InvocationQueue;
  readonly scheduler: Scheduler;

  private readonly units = new Map<string, WorkUnit>();
  private readonly unitSubscriptions = new Map<string, () => void>();
  private readonly listeners = new Set<RegistryContentListener>();
  private detachSource: (() => void) | null = null;

  constructor(private readonly options: UnitRegistryOptions) {
    this.queue = new InvocationQueue((unitId) => this.units.get(unitId), {
      maxConcurrent: options.maxConcurrentInvocations,
    });
    this.scheduler = new Scheduler(options.clock);
  }

  add(descriptor: UnitDescriptor): WorkUnit {
    const existing = this.units.get(descriptor.id);
    if (existing) {
      logger.debug({ unitId: descriptor.id }, "Plugin already registered");
      return existing;
    }

    this.options.environment.prepare(descriptor.id);

    const unit = new WorkUnit(descriptor, {
      runner: this.options.runner,
      queue: this.queue,
      timers: this.scheduler,
      preferences: this.options.preferences,
      metadataProvider: this.options.metadataProvider,
      environment: this.options.environment,
      clock: this.options.clock,
      debugLogLimit: this.options.debugLogLimit,
      eventSink: this.options.eventSink,
    });

    this.units.set(unit.id, unit);
    this.unitSubscriptions.set(
      unit.id,
      unit.subscribe((content) => this.notify(unit.id, content)),
    );

    logger.info({ unit: unit.describe() }, "Plugin registered");
    unit.start();
    return unit;
  }

  /** Drops the unit for good, along with its debug history. */
  remove(unitId: string): boolean {
    const unit = this.detach(unitId);
    if (!unit) return false;

    unit.discardHistory();
    logger.info({ unitId }, "Plugin removed");
    return true;
  }

  get(unitId: string): WorkUnit | undefined {
    return this.units.get(unitId);
  }

  list(): readonly WorkUnit[] {
    return [...this.units.values()];
  }

  snapshot(): readonly WorkUnitSnapshot[] {
    return this.list().map((unit) => unit.describe());
  }

  /** Registers new descriptors and removes units whose source disappeared. */
  sync(descriptors: readonly UnitDescriptor[]): void {
    const incoming = new Set(descriptors.map((d) => d.id));

    for (const unitId of [...this.units.keys()]) {
      if (!incoming.has(unitId)) this.remove(unitId);
    }
    for (const descriptor of descriptors) {
      if (!this.units.has(descriptor.id)) this.add(descriptor);
    }
  }

  refreshAll(): void {
    for (const unit of this.units.values()) {
      unit.refresh();
    }
  }

  enable(unitId: string): boolean {
    const unit = this.units.get(unitId);
    if (!unit) return false;
    unit.enable();
    return true;
  }

  disable(unitId: string): boolean {
    const unit = this.units.get(unitId);
    if (!unit) return false;
    unit.disable();
    return true;
  }

  subscribe(listener: RegistryContentListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  attach(source: UnitSource): void {
    this.detachSource?.();
    this.sync(source.scan());
    this.detachSource = source.watch((change) => {
      if (change.type === "added") {
        this.add(change.descriptor);
      } else {
        this.remove(change.id);
      }
    });
  }

  async shutdown(): Promise<void> {
    this.detachSource?.();
    this.detachSource = null;

    for (const unitId of [...this.units.keys()]) {
      this.detach(unitId);
    }
    this.scheduler.disarmAll();

    await this.queue.idle();
    this.scheduler.disarmAll();
    logger.info("Unit registry shut down");
  }

  private detach(unitId: string): WorkUnit | undefined {
    const unit = this.units.get(unitId);
    if (!unit) return undefined;

    unit.terminate();
    this.unitSubscriptions.get(unitId)?.();
    this.unitSubscriptions.delete(unitId);
    this.units.delete(unitId);
    return unit;
  }

  private notify(unitId: string, content: string | undefined): void {
    for (const listener of this.listeners) {
      try {
        listener(unitId, content);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn({ unitId, error: message }, "Registry content listener threw");
      }
    }
  }
}
