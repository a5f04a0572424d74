import { logger } from "../config/logger.js";

export type DebugEventKind = "refresh" | "content-update" | "content-update-error";

export interface DebugEvent {
  readonly timestamp: Date;
  readonly kind: DebugEventKind;
  readonly value: string;
}

/** Destination for debug events shared by every unit. */
export interface UnitEventSink {
  record(unitId: string, event: DebugEvent): void;
  /** Newest last. */
  recent(unitId: string, limit: number): readonly DebugEvent[];
  forget(unitId: string): void;
}

export const DEFAULT_DEBUG_LOG_LIMIT = 50;

/** Bounded per-unit history; the oldest events are dropped first. */
export class DebugLog {
  private readonly entries: DebugEvent[] = [];

  constructor(
    private readonly unitId: string,
    private readonly limit: number = DEFAULT_DEBUG_LOG_LIMIT,
    private readonly sink?: UnitEventSink,
  ) {
    if (!sink) return;
    try {
      this.entries.push(...sink.recent(unitId, limit));
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      logger.warn({ error: msg, unitId }, "Failed to load persisted debug events");
    }
  }

  add(kind: DebugEventKind, value: string, timestamp: Date): void {
    const event: DebugEvent = { timestamp, kind, value };
    this.entries.push(event);
    if (this.entries.length > this.limit) {
      this.entries.splice(0, this.entries.length - this.limit);
    }

    if (!this.sink) return;
    try {
      this.sink.record(this.unitId, event);
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      logger.warn({ error: msg, unitId: this.unitId, kind }, "Failed to persist debug event");
    }
  }

  events(): readonly DebugEvent[] {
    return [...this.entries];
  }

  /** Drops the history here and in the sink. */
  clear(): void {
    this.entries.length = 0;
    if (!this.sink) return;
    try {
      this.sink.forget(this.unitId);
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      logger.warn({ error: msg, unitId: this.unitId }, "Failed to delete persisted debug events");
    }
  }
}
