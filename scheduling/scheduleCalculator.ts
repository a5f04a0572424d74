import { Cron } from "croner";
import { logger } from "../config/logger.js";

/** 100 days: an interval that effectively never fires on its own. */
export const NEVER_INTERVAL_SECONDS = 60 * 60 * 24 * 100;

export type Schedule =
  | { readonly mode: "interval"; readonly seconds: number }
  | { readonly mode: "absolute"; readonly at: Date };

export interface ScheduleInput {
  readonly intervalToken?: string;
  /** Already-resolved interval; takes the place of `intervalToken`. */
  readonly intervalSeconds?: number;
  readonly nextAbsoluteFireTime?: Date;
}

const UNIT_MULTIPLIERS: ReadonlyArray<readonly [suffix: string, toSeconds: (value: number) => number]> = [
  ["ms", (value) => value / 1000],
  ["s", (value) => value],
  ["m", (value) => value * 60],
  ["h", (value) => value * 60 * 60],
  ["d", (value) => value * 60 * 60 * 24],
];

const NUMBER_CHARS = /[0-9.]/g;

export function parseIntervalToken(token: string): number | undefined {
  const digits = token.match(NUMBER_CHARS)?.join("") ?? "";
  if (digits.length === 0) return undefined;

  const value = Number(digits);
  if (!Number.isFinite(value) || value <= 0) return undefined;

  const unit = UNIT_MULTIPLIERS.find(([suffix]) => token.endsWith(suffix));
  if (!unit) return undefined;

  return unit[1](value);
}

/** `weather.5m.sh` carries its interval in the second dot-separated segment. */
export function intervalTokenFromFileName(fileName: string): string | undefined {
  const parts = fileName.split(".");
  if (parts.length <= 2) return undefined;
  return parts[1];
}

export function computeSchedule(input: ScheduleInput): Schedule {
  if (input.nextAbsoluteFireTime) {
    return { mode: "absolute", at: input.nextAbsoluteFireTime };
  }

  return { mode: "interval", seconds: input.intervalSeconds ?? resolveIntervalSeconds(input.intervalToken) };
}

/** Parsed token in seconds, or the never-fire sentinel when absent or malformed. */
export function resolveIntervalSeconds(token: string | undefined): number {
  if (token === undefined) return NEVER_INTERVAL_SECONDS;

  const seconds = parseIntervalToken(token);
  if (seconds === undefined) {
    logger.warn({ token }, "Malformed schedule token, falling back to default interval");
    return NEVER_INTERVAL_SECONDS;
  }
  return seconds;
}

/**
 * Earliest occurrence strictly after `from` across `|`-separated cron
 * expressions. Invalid expressions are skipped.
 */
export function nextCronOccurrence(expressions: string, from: Date): Date | undefined {
  let earliest: Date | undefined;

  for (const expression of expressions.split("|")) {
    const trimmed = expression.trim();
    if (trimmed.length === 0) continue;

    try {
      const next = new Cron(trimmed).nextRun(from);
      if (next && (!earliest || next.getTime() < earliest.getTime())) {
        earliest = next;
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn({ expression: trimmed, error: message }, "Invalid cron expression, skipping");
    }
  }

  return earliest;
}
