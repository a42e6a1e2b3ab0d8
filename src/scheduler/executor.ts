/**
 * One executor pass: claim due schedules, deliver each, commit its new state.
 */

import { ScheduleIntegrityError, StoreError } from "./errors.js";
import { advanceSchedule, type AdvancePolicy, type AttemptOutcome } from "./state.js";
import type { DeliveryClient } from "./delivery.js";
import type { ScheduleStore } from "./store.js";
import type { PassSummary, Schedule, ScheduleRunResult } from "./types.js";

export type ExecutorDeps = {
  store: ScheduleStore;
  delivery: Pick<DeliveryClient, "deliver">;
  policy: AdvancePolicy;
  now: () => number;
  /** Claims at least this old are treated as abandoned and taken over. */
  staleClaimMs?: number;
};

function toResult(schedule: Schedule): ScheduleRunResult {
  return {
    id: schedule.id,
    recipientId: schedule.recipientId,
    status: schedule.state.lastStatus ?? "integrity_error",
    active: schedule.active,
    nextRunAtMs: schedule.active ? schedule.state.nextRunAtMs : undefined,
    repetitionCount: schedule.state.repetitionCount,
    error: schedule.state.lastError,
  };
}

/**
 * Deliver one claimed schedule and compute its new state. Errors thrown by
 * delivery or the next-run computation are folded into the outcome; only
 * the store write is left to the caller.
 */
async function processSchedule(schedule: Schedule, deps: ExecutorDeps): Promise<Schedule> {
  let outcome: AttemptOutcome;
  try {
    outcome = await deps.delivery.deliver(schedule.recipientId, schedule.message);
  } catch (err) {
    // The delivery client reports failures as outcomes; a throw here is unexpected.
    const reason = err instanceof Error ? err.message : String(err);
    console.error(`[scheduler] Delivery for schedule ${schedule.id} threw:`, err);
    outcome = { status: "transient_failure", reason, attempts: 0 };
  }

  const nowMs = deps.now();
  try {
    return advanceSchedule(schedule, outcome, nowMs, deps.policy);
  } catch (err) {
    if (!(err instanceof ScheduleIntegrityError)) throw err;
    console.error(`[scheduler] Schedule ${schedule.id} is corrupt, deactivating: ${err.message}`);
    return advanceSchedule(schedule, { status: "integrity_error", reason: err.message }, nowMs, deps.policy);
  }
}

/**
 * Run a single pass. Per-schedule failures are recorded in the summary and
 * never stop the batch; store failures abort the pass and propagate.
 */
export async function runPass(deps: ExecutorDeps): Promise<PassSummary> {
  const startedAt = deps.now();
  const due = await deps.store.claimDue(startedAt, deps.staleClaimMs);
  const summary: PassSummary = { delivered: 0, failed: 0, rescheduled: 0, results: [] };

  if (due.length === 0) {
    return summary;
  }
  console.log(`[scheduler] Pass started with ${due.length} due schedule(s)`);

  for (let i = 0; i < due.length; i++) {
    const schedule = due[i];
    let next: Schedule;
    try {
      next = await processSchedule(schedule, deps);
    } catch (err) {
      // Anything else is a bug in this schedule's handling; contain it.
      const reason = err instanceof Error ? err.message : String(err);
      console.error(`[scheduler] Schedule ${schedule.id} failed unexpectedly:`, err);
      next = advanceSchedule(schedule, { status: "integrity_error", reason }, deps.now(), deps.policy);
    }

    let committed: Schedule;
    try {
      committed = await deps.store.commit(next);
    } catch (err) {
      // Leave no claims behind for the schedules this pass never reached.
      await releaseClaims(deps.store, due.slice(i + 1));
      if (err instanceof StoreError) throw err;
      throw new StoreError(`Failed to record outcome for schedule ${schedule.id}`, { cause: err });
    }

    const result = toResult(committed);
    summary.results.push(result);
    if (result.status === "delivered") {
      summary.delivered++;
    } else if (committed.active) {
      summary.rescheduled++;
    } else {
      summary.failed++;
    }
  }

  console.log(
    `[scheduler] Pass finished: ${summary.delivered} delivered, ${summary.failed} failed, ${summary.rescheduled} rescheduled`,
  );
  return summary;
}

async function releaseClaims(store: ScheduleStore, schedules: Schedule[]): Promise<void> {
  for (const s of schedules) {
    try {
      await store.release(s.id);
    } catch (err) {
      console.error(`[scheduler] Could not release claim on ${s.id}; the next pass reclaims it once stale:`, err);
    }
  }
}
