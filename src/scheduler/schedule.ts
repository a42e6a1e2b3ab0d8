/**
 * Next-run computation for once / cron / interval schedules.
 *
 * All results are whole seconds in UTC.
 */

import { Cron } from "croner";
import { ScheduleIntegrityError } from "./errors.js";
import type { ScheduleSpec } from "./types.js";

export type NextRunContext = {
  nowMs: number;
  /** The schedule's current nextRunAtMs; undefined on the first computation. */
  previousRunAtMs?: number;
  repetitionCount: number;
  maxRepetitions: number | null;
};

const INTERVAL_RE = /^\s*(\d+)\s*([smh]?)\s*$/i;

const INTERVAL_MULTIPLIERS: Record<string, number> = {
  "": 1_000,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
};

export function toWholeSecondMs(ms: number): number {
  return Math.floor(ms / 1000) * 1000;
}

/**
 * Parse an interval like "30s", "5m", "1h" or a bare number of seconds.
 * Returns null when the string is not a positive interval.
 */
export function parseInterval(raw: string): number | null {
  const match = raw.match(INTERVAL_RE);
  if (!match) return null;
  const value = Number.parseInt(match[1], 10);
  const multiplier = INTERVAL_MULTIPLIERS[match[2].toLowerCase()];
  if (multiplier === undefined || value <= 0) return null;
  return value * multiplier;
}

function createCron(expr: string): Cron {
  return new Cron(expr, { timezone: "UTC", catch: false });
}

/**
 * Earliest cron occurrence strictly after nowMs, or undefined when none exists.
 * Throws whatever croner throws for a malformed pattern.
 */
function nextCronRunAtMs(expr: string, nowMs: number): number | undefined {
  const cron = createCron(expr);
  const next = cron.nextRun(new Date(nowMs));
  if (!next) return undefined;

  const nextMs = next.getTime();
  if (nextMs > nowMs) return toWholeSecondMs(nextMs);

  // croner can hand back "now" inside the same second; step past it.
  const retry = cron.nextRun(new Date(toWholeSecondMs(nowMs) + 1000));
  if (!retry) return undefined;
  const retryMs = retry.getTime();
  return retryMs > nowMs ? toWholeSecondMs(retryMs) : undefined;
}

/**
 * Check a cron expression at creation time: five fields, parseable, and
 * with at least one future occurrence. Returns an error message or null.
 */
export function validateCronExpression(expr: string, nowMs: number): string | null {
  const fields = expr.trim().split(/\s+/).filter(Boolean);
  if (fields.length !== 5) {
    return `Invalid cron expression: "${expr}" (expected 5 fields: minute hour day-of-month month day-of-week)`;
  }
  try {
    if (nextCronRunAtMs(expr, nowMs) === undefined) {
      return `Cron expression "${expr}" never fires`;
    }
  } catch (err) {
    return `Invalid cron expression: "${expr}" (${err instanceof Error ? err.message : String(err)})`;
  }
  return null;
}

/**
 * Compute the next due time for a schedule.
 * Returns undefined when the schedule has no further occurrences.
 *
 * @throws {ScheduleIntegrityError} if the stored spec cannot be evaluated
 */
export function computeNextRunAtMs(spec: ScheduleSpec, ctx: NextRunContext): number | undefined {
  const { nowMs } = ctx;

  if (spec.kind === "once") {
    if (ctx.previousRunAtMs !== undefined) return undefined;
    const atMs = new Date(spec.at).getTime();
    if (!Number.isFinite(atMs)) {
      throw new ScheduleIntegrityError(`Unparseable one-time timestamp: "${spec.at}"`);
    }
    return toWholeSecondMs(atMs);
  }

  if (spec.kind === "interval") {
    if (ctx.maxRepetitions !== null && ctx.repetitionCount >= ctx.maxRepetitions) {
      return undefined;
    }
    const everyMs = spec.everyMs;
    if (!Number.isInteger(everyMs) || everyMs < 1000) {
      throw new ScheduleIntegrityError(`Invalid interval length: ${everyMs}ms`);
    }

    if (ctx.previousRunAtMs === undefined) {
      if (spec.startAtMs !== undefined && spec.startAtMs > nowMs) {
        return toWholeSecondMs(spec.startAtMs);
      }
      return toWholeSecondMs(nowMs + everyMs);
    }

    // Step from the previous due time so the cadence does not drift; skip
    // occurrences missed while the executor was behind.
    const anchor = ctx.previousRunAtMs;
    if (nowMs < anchor) return toWholeSecondMs(anchor + everyMs);
    const steps = Math.floor((nowMs - anchor) / everyMs) + 1;
    return toWholeSecondMs(anchor + steps * everyMs);
  }

  // kind === "cron"
  let next: number | undefined;
  try {
    next = nextCronRunAtMs(spec.expr, nowMs);
  } catch (err) {
    throw new ScheduleIntegrityError(
      `Unparseable cron expression "${spec.expr}": ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  if (next === undefined) {
    throw new ScheduleIntegrityError(`Cron expression "${spec.expr}" has no future occurrence`);
  }
  return next;
}
