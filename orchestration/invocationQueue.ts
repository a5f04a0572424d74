import { logger } from "../config/logger.js";
import type { InvocationOutcome } from "../plugins/types.js";

export interface InvocableUnit {
  readonly id: string;
  invoke(): Promise<InvocationOutcome>;
  publish(content: string | undefined): void;
  enableTimer(): void;
}

/**
 * Tasks hold only a unit id and resolve it when they start, so a unit that
 * was removed in the meantime is skipped.
 */
export type UnitLookup = (unitId: string) => InvocableUnit | undefined;

export interface InvocationTicket {
  readonly unitId: string;
  readonly started: boolean;
  readonly cancelled: boolean;
  /** Resolves once the task has run or has been skipped. */
  readonly settled: Promise<void>;
  /** Idempotent. A task that already started still runs to completion. */
  cancel(): void;
}

export interface InvocationQueueOptions {
  /** 0 means unbounded. */
  readonly maxConcurrent?: number;
}

export interface QueueStats {
  readonly running: number;
  readonly waiting: number;
}

class Ticket implements InvocationTicket {
  started = false;
  cancelled = false;
  readonly settled: Promise<void>;
  private settle: () => void = () => undefined;
  private finished = false;

  constructor(
    readonly unitId: string,
    private readonly onCancel: () => void,
  ) {
    this.settled = new Promise<void>((resolve) => {
      this.settle = resolve;
    });
  }

  cancel(): void {
    if (this.cancelled) return;
    this.cancelled = true;
    if (this.started) return;
    this.finish();
    this.onCancel();
  }

  finish(): void {
    if (this.finished) return;
    this.finished = true;
    this.settle();
  }
}

interface Lane {
  running: Ticket | null;
  pending: Ticket | null;
}

export class InvocationQueue {
  private readonly lanes = new Map<string, Lane>();
  private readonly ready: string[] = [];
  private readonly maxConcurrent: number;
  private idleWaiters: Array<() => void> = [];
  private active = 0;
  private pumpScheduled = false;

  constructor(
    private readonly lookup: UnitLookup,
    options: InvocationQueueOptions = {},
  ) {
    this.maxConcurrent = options.maxConcurrent ?? 0;
  }

  /** Replaces the unit's waiting task, if any, with a new one. */
  submit(unitId: string): InvocationTicket {
    const lane = this.laneFor(unitId);

    if (lane.pending) {
      logger.debug({ unitId }, "Cancelling pending invocation in favour of a newer request");
      lane.pending.cancel();
    }

    const ticket = new Ticket(unitId, () => this.schedulePump());
    lane.pending = ticket;

    if (!lane.running && !this.ready.includes(unitId)) {
      this.ready.push(unitId);
    }

    this.schedulePump();
    return ticket;
  }

  stats(): QueueStats {
    let waiting = 0;
    for (const lane of this.lanes.values()) {
      if (lane.pending && !lane.pending.cancelled) waiting++;
    }
    return { running: this.active, waiting };
  }

  isIdle(): boolean {
    const { running, waiting } = this.stats();
    return running === 0 && waiting === 0;
  }

  idle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private laneFor(unitId: string): Lane {
    let lane = this.lanes.get(unitId);
    if (!lane) {
      lane = { running: null, pending: null };
      this.lanes.set(unitId, lane);
    }
    return lane;
  }

  private hasCapacity(): boolean {
    return this.maxConcurrent === 0 || this.active < this.maxConcurrent;
  }

  // Deferred so that requests made in the same tick collapse into one.
  private schedulePump(): void {
    if (this.pumpScheduled) return;
    this.pumpScheduled = true;
    queueMicrotask(() => {
      this.pumpScheduled = false;
      this.pump();
    });
  }

  private pump(): void {
    while (this.ready.length > 0) {
      const unitId = this.ready[0];
      const lane = this.lanes.get(unitId);
      const ticket = lane?.pending;

      if (!lane || !ticket || lane.running) {
        this.ready.shift();
        continue;
      }

      if (ticket.cancelled) {
        lane.pending = null;
        this.ready.shift();
        this.releaseLane(unitId, lane);
        continue;
      }

      if (!this.hasCapacity()) break;

      lane.pending = null;
      this.ready.shift();
      this.execute(lane, ticket).catch((error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        logger.error({ unitId, error: message }, "Invocation task crashed");
      });
    }

    this.notifyIfIdle();
  }

  private async execute(lane: Lane, ticket: Ticket): Promise<void> {
    ticket.started = true;
    lane.running = ticket;
    this.active++;

    try {
      const unit = this.lookup(ticket.unitId);
      if (!unit) {
        logger.debug({ unitId: ticket.unitId }, "Unit removed before its invocation started, skipping");
        return;
      }

      const outcome = await unit.invoke();
      unit.publish(outcome.ok ? outcome.output : undefined);

      if (this.lookup(ticket.unitId) === unit) {
        unit.enableTimer();
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ unitId: ticket.unitId, error: message }, "Invocation task failed unexpectedly");
    } finally {
      this.active--;
      lane.running = null;
      ticket.finish();

      if (lane.pending) {
        this.ready.push(ticket.unitId);
      } else {
        this.releaseLane(ticket.unitId, lane);
      }
      this.pump();
    }
  }

  private releaseLane(unitId: string, lane: Lane): void {
    if (!lane.running && !lane.pending) {
      this.lanes.delete(unitId);
    }
  }

  private notifyIfIdle(): void {
    if (!this.isIdle() || this.idleWaiters.length === 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
