/**
 * Schedule state transitions after a delivery attempt.
 *
 * Pure: returns the updated record and leaves the write to the caller.
 */

import { computeNextRunAtMs, toWholeSecondMs } from "./schedule.js";
import type { DeactivationReason, DeliveryOutcome, Schedule } from "./types.js";

export type AdvancePolicy = {
  /** Escalate to inactive after this many transient failures in a row; 0 = never. */
  maxConsecutiveTransientFailures: number;
};

/** What the executor feeds the updater: a delivery outcome, or a failure to even compute one. */
export type AttemptOutcome = DeliveryOutcome | { status: "integrity_error"; reason: string };

function deactivate(schedule: Schedule, reason: DeactivationReason): Schedule {
  return { ...schedule, active: false, deactivatedReason: reason };
}

/**
 * Apply one attempt's outcome to a schedule.
 *
 * @throws {ScheduleIntegrityError} when a recurring spec cannot produce its next run
 */
export function advanceSchedule(
  schedule: Schedule,
  outcome: AttemptOutcome,
  nowMs: number,
  policy: AdvancePolicy,
): Schedule {
  const lastRunAtMs = toWholeSecondMs(nowMs);
  const base: Schedule = {
    ...schedule,
    state: {
      ...schedule.state,
      lastRunAtMs,
      lastStatus: outcome.status,
      lastError: outcome.status === "delivered" ? undefined : outcome.reason,
    },
  };

  switch (outcome.status) {
    case "delivered":
      return advanceAfterDelivery(base, nowMs);

    case "permanent_failure":
      return deactivate(base, "permanent_failure");

    case "integrity_error":
      return deactivate(base, "integrity_error");

    case "transient_failure": {
      // nextRunAtMs stays put: the schedule is still due on the next pass.
      const consecutiveFailures = base.state.consecutiveFailures + 1;
      const next: Schedule = { ...base, state: { ...base.state, consecutiveFailures } };
      const ceiling = policy.maxConsecutiveTransientFailures;
      if (ceiling > 0 && consecutiveFailures >= ceiling) {
        return deactivate(next, "retries_exhausted");
      }
      return next;
    }
  }
}

function advanceAfterDelivery(schedule: Schedule, nowMs: number): Schedule {
  const { spec } = schedule;
  const state = { ...schedule.state, consecutiveFailures: 0 };

  if (spec.kind === "once") {
    return deactivate({ ...schedule, state }, "completed");
  }

  if (spec.kind === "cron") {
    const nextRunAtMs = computeNextRunAtMs(spec, {
      nowMs,
      previousRunAtMs: state.nextRunAtMs,
      repetitionCount: state.repetitionCount,
      maxRepetitions: null,
    });
    return { ...schedule, state: { ...state, nextRunAtMs: nextRunAtMs ?? state.nextRunAtMs } };
  }

  const repetitionCount = state.repetitionCount + 1;
  const nextRunAtMs = computeNextRunAtMs(spec, {
    nowMs,
    previousRunAtMs: state.nextRunAtMs,
    repetitionCount,
    maxRepetitions: schedule.maxRepetitions,
  });
  if (nextRunAtMs === undefined) {
    return deactivate({ ...schedule, state: { ...state, repetitionCount } }, "completed");
  }
  return { ...schedule, state: { ...state, repetitionCount, nextRunAtMs } };
}
