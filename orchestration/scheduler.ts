/**
 * Scheduler — owns the armed timer of every unit.
 *
 * A unit is either unarmed or armed with exactly one timer:
 *   - absolute: a one-shot timer for the unit's next cron occurrence. When it
 *     fires the occurrence is consumed and the unit is refreshed, which
 *     derives the following occurrence.
 *   - interval: a repeating timer. Each tick requests an invocation; the
 *     timer stays armed.
 *
 * Timer callbacks only submit work to the invocation queue, which keeps
 * invocations of one unit serialized.
 */

import { logger } from "../config/logger.js";
import type { Clock, TimerHandle } from "../scheduling/clock.js";
import type { Schedule } from "../scheduling/scheduleCalculator.js";

export interface SchedulableUnit {
  readonly id: string;
  readonly schedule: Schedule;
  requestInvocation(): void;
  consumeAbsoluteFireTime(): void;
  refresh(): void;
}

export interface TimerController {
  enableTimer(unit: SchedulableUnit): void;
  disableTimer(unitId: string): void;
}

export type ArmedMode = Schedule["mode"];

interface ArmedTimer {
  readonly mode: ArmedMode;
  readonly handle: TimerHandle;
}

const MIN_INTERVAL_MS = 1;

export class Scheduler implements TimerController {
  private readonly timers = new Map<string, ArmedTimer>();

  constructor(private readonly clock: Clock) {}

  enableTimer(unit: SchedulableUnit): void {
    if (this.timers.has(unit.id)) return;

    const schedule = unit.schedule;

    if (schedule.mode === "absolute") {
      const delayMs = Math.max(0, schedule.at.getTime() - this.clock.now().getTime());
      const handle = this.clock.setTimeout(() => this.fireAbsolute(unit), delayMs);
      this.timers.set(unit.id, { mode: "absolute", handle });
      logger.debug({ unitId: unit.id, at: schedule.at.toISOString() }, "Armed one-shot timer");
      return;
    }

    const periodMs = Math.max(MIN_INTERVAL_MS, Math.round(schedule.seconds * 1000));
    const handle = this.clock.setInterval(() => this.fireInterval(unit), periodMs);
    this.timers.set(unit.id, { mode: "interval", handle });
    logger.debug({ unitId: unit.id, seconds: schedule.seconds }, "Armed repeating timer");
  }

  disableTimer(unitId: string): void {
    const timer = this.timers.get(unitId);
    if (!timer) return;
    timer.handle.cancel();
    this.timers.delete(unitId);
  }

  armedMode(unitId: string): ArmedMode | undefined {
    return this.timers.get(unitId)?.mode;
  }

  armedCount(): number {
    return this.timers.size;
  }

  disarmAll(): void {
    for (const timer of this.timers.values()) {
      timer.handle.cancel();
    }
    this.timers.clear();
  }

  private fireAbsolute(unit: SchedulableUnit): void {
    this.timers.delete(unit.id);
    logger.debug({ unitId: unit.id }, "Scheduled occurrence reached");
    unit.consumeAbsoluteFireTime();
    unit.refresh();
  }

  private fireInterval(unit: SchedulableUnit): void {
    logger.debug({ unitId: unit.id }, "Interval elapsed");
    unit.requestInvocation();
  }
}
