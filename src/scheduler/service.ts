/**
 * SchedulerService: schedule CRUD, single passes and the executor loop.
 */

import crypto from "node:crypto";
import { runPass } from "./executor.js";
import { ValidationError } from "./errors.js";
import { parseTimestamp } from "./parse-time.js";
import { computeNextRunAtMs, parseInterval, toWholeSecondMs, validateCronExpression } from "./schedule.js";
import type { DeliveryClient } from "./delivery.js";
import type { AdvancePolicy } from "./state.js";
import type { ListOptions, ScheduleStore } from "./store.js";
import type { PassSummary, Schedule, ScheduleKind, ScheduleSpec, StoreStats } from "./types.js";

export type SchedulerServiceDeps = {
  store: ScheduleStore;
  delivery: Pick<DeliveryClient, "deliver">;
  policy: AdvancePolicy;
  /** Claims older than this are reclaimed by the next pass. */
  staleClaimMs?: number;
  /** Clock in epoch ms; injected for tests. */
  now?: () => number;
};

export type CreateScheduleInput = {
  recipientId: string;
  message: string;
  kind: ScheduleKind;
  /** ISO/natural-language time, 5-field cron expression, or interval ("30s", "5m", "1h"). */
  spec: string;
  startAt?: string;
  maxRepetitions?: number | null;
};

function requireText(field: string, value: string): string {
  const trimmed = value.trim();
  if (!trimmed) throw new ValidationError(field, `${field} is required`);
  return trimmed;
}

export class SchedulerService {
  private readonly store: ScheduleStore;
  private readonly deps: SchedulerServiceDeps;
  private readonly now: () => number;

  private loop: { controller: AbortController; done: Promise<void> } | null = null;
  private inFlight: Promise<PassSummary> | null = null;

  constructor(deps: SchedulerServiceDeps) {
    this.deps = deps;
    this.store = deps.store;
    this.now = deps.now ?? Date.now;
  }

  /**
   * Validate and store a new schedule.
   *
   * @throws {ValidationError} on any bad input; nothing is stored
   */
  async createSchedule(input: CreateScheduleInput): Promise<Schedule> {
    const nowMs = this.now();
    const recipientId = requireText("recipientId", input.recipientId);
    const message = requireText("message", input.message);
    const rawSpec = requireText("spec", input.spec);
    const maxRepetitions = input.maxRepetitions ?? null;

    if (input.kind !== "interval") {
      if (input.startAt !== undefined) {
        throw new ValidationError("startAt", "startAt only applies to interval schedules");
      }
      if (maxRepetitions !== null) {
        throw new ValidationError("maxRepetitions", "maxRepetitions only applies to interval schedules");
      }
    }
    if (maxRepetitions !== null && (!Number.isInteger(maxRepetitions) || maxRepetitions <= 0)) {
      throw new ValidationError("maxRepetitions", "maxRepetitions must be a positive integer");
    }

    const spec = this.buildSpec(input.kind, rawSpec, input.startAt, nowMs);
    const nextRunAtMs = computeNextRunAtMs(spec, { nowMs, repetitionCount: 0, maxRepetitions });
    if (nextRunAtMs === undefined) {
      throw new ValidationError("spec", `Schedule "${rawSpec}" has no occurrence`);
    }

    const schedule: Schedule = {
      id: crypto.randomUUID(),
      recipientId,
      message,
      spec,
      active: true,
      maxRepetitions,
      createdAt: new Date(toWholeSecondMs(nowMs)).toISOString(),
      state: {
        nextRunAtMs,
        repetitionCount: 0,
        consecutiveFailures: 0,
      },
    };

    await this.store.insert(schedule);
    console.log(
      `[scheduler] Created ${spec.kind} schedule ${schedule.id} for ${recipientId}, next run ${new Date(nextRunAtMs).toISOString()}`,
    );
    return schedule;
  }

  /**
   * @throws {ScheduleNotFoundError}
   */
  async cancelSchedule(id: string): Promise<Schedule> {
    const schedule = await this.store.cancel(id);
    console.log(`[scheduler] Cancelled schedule ${id}`);
    return schedule;
  }

  listSchedules(opts: ListOptions = {}): Promise<Schedule[]> {
    return this.store.list(opts);
  }

  getSchedule(id: string): Promise<Schedule | undefined> {
    return this.store.get(id);
  }

  stats(): Promise<StoreStats> {
    return this.store.stats(this.now());
  }

  /**
   * Run one pass now. Store failures propagate.
   */
  runOnce(): Promise<PassSummary> {
    const pass = runPass({
      store: this.store,
      delivery: this.deps.delivery,
      policy: this.deps.policy,
      now: this.now,
      staleClaimMs: this.deps.staleClaimMs,
    });
    this.inFlight = pass;
    const clear = (): void => {
      if (this.inFlight === pass) this.inFlight = null;
    };
    pass.then(clear, clear);
    return pass;
  }

  get isLooping(): boolean {
    return this.loop !== null;
  }

  /**
   * Run passes every `intervalSeconds` until `stop()` is called or `signal`
   * aborts. Only one loop may hold the store at a time.
   *
   * @throws {LoopAlreadyRunningError}
   */
  async runLoop(intervalSeconds: number, signal?: AbortSignal): Promise<void> {
    if (!Number.isFinite(intervalSeconds) || intervalSeconds <= 0) {
      throw new ValidationError("interval", "Loop interval must be a positive number of seconds");
    }
    const releaseLock = await this.store.acquireLoopLock();
    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });
    if (signal?.aborted) controller.abort();

    const done = this.loopBody(intervalSeconds * 1000, controller.signal);
    this.loop = { controller, done };
    console.log(`[scheduler] Loop started (every ${intervalSeconds}s) on ${this.store.location}`);

    try {
      await done;
    } finally {
      signal?.removeEventListener("abort", onAbort);
      this.loop = null;
      await releaseLock();
      console.log("[scheduler] Loop stopped");
    }
  }

  /**
   * Stop the loop. Resolves once the in-flight pass (if any) has finished.
   */
  async stop(): Promise<void> {
    const loop = this.loop;
    if (loop) {
      loop.controller.abort();
      await loop.done;
    }
    if (this.inFlight) {
      await this.inFlight.then(
        () => undefined,
        () => undefined,
      );
    }
  }

  // --- Internal ---

  private async loopBody(intervalMs: number, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.runOnce();
      } catch (err) {
        console.error("[scheduler] Pass failed:", err);
      }
      await abortableSleep(intervalMs, signal);
    }
  }

  private buildSpec(kind: ScheduleKind, raw: string, startAt: string | undefined, nowMs: number): ScheduleSpec {
    if (kind === "once") {
      const at = parseTimestamp(raw, new Date(nowMs));
      if (!at) {
        throw new ValidationError(
          "spec",
          `Invalid time "${raw}". Use ISO 8601 like 2025-12-25T10:00:00Z, or a phrase like "tomorrow at 9am"`,
        );
      }
      if (at.getTime() <= nowMs) {
        throw new ValidationError("spec", "Scheduled time must be in the future");
      }
      return { kind: "once", at: new Date(toWholeSecondMs(at.getTime())).toISOString() };
    }

    if (kind === "cron") {
      const expr = raw.trim().split(/\s+/).join(" ");
      const problem = validateCronExpression(expr, nowMs);
      if (problem) throw new ValidationError("spec", problem);
      return { kind: "cron", expr };
    }

    const everyMs = parseInterval(raw);
    if (everyMs === null) {
      throw new ValidationError("spec", `Invalid interval "${raw}". Use formats like "30s", "5m", "1h"`);
    }
    if (startAt === undefined) {
      return { kind: "interval", every: raw, everyMs };
    }
    const start = parseTimestamp(startAt, new Date(nowMs));
    if (!start) {
      throw new ValidationError("startAt", `Invalid start time "${startAt}"`);
    }
    if (start.getTime() <= nowMs) {
      throw new ValidationError("startAt", "Start time must be in the future");
    }
    return { kind: "interval", every: raw, everyMs, startAtMs: toWholeSecondMs(start.getTime()) };
  }
}

function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    signal.addEventListener("abort", onAbort, { once: true });
  });
}
