/**
 * Structured results shared by the CLI, MCP and bot surfaces.
 */

import { LettaApiError, LettaNetworkError } from "../letta/errors.js";
import {
  LoopAlreadyRunningError,
  ScheduleIntegrityError,
  ScheduleNotFoundError,
  StoreError,
  ValidationError,
} from "./errors.js";
import type { PassSummary, Schedule } from "./types.js";

export type ErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "INTEGRITY_ERROR"
  | "STORE_ERROR"
  | "LOOP_RUNNING"
  | "LETTA_ERROR"
  | "EXECUTION_ERROR";

export type SuccessResult = { status: "success" } & Record<string, unknown>;
export type ErrorResult = { status: "error"; code: ErrorCode; message: string };
export type SurfaceResult = SuccessResult | ErrorResult;

export function success(data: Record<string, unknown> = {}): SuccessResult {
  return { ...data, status: "success" as const };
}

export function failure(code: ErrorCode, message: string): ErrorResult {
  return { status: "error", code, message };
}

export function errorCodeOf(err: unknown): ErrorCode {
  if (err instanceof ValidationError) return "VALIDATION_ERROR";
  if (err instanceof ScheduleNotFoundError) return "NOT_FOUND";
  if (err instanceof ScheduleIntegrityError) return "INTEGRITY_ERROR";
  if (err instanceof StoreError) return "STORE_ERROR";
  if (err instanceof LoopAlreadyRunningError) return "LOOP_RUNNING";
  if (err instanceof LettaApiError || err instanceof LettaNetworkError) return "LETTA_ERROR";
  return "EXECUTION_ERROR";
}

export function toErrorResult(err: unknown): ErrorResult {
  return failure(errorCodeOf(err), err instanceof Error ? err.message : String(err));
}

function isoOrNull(ms: number | undefined): string | null {
  return ms === undefined ? null : new Date(ms).toISOString();
}

/** Flat, JSON-friendly view of a schedule. */
export function describeSchedule(schedule: Schedule): Record<string, unknown> {
  const { spec, state } = schedule;
  return {
    id: schedule.id,
    agentId: schedule.recipientId,
    prompt: schedule.message,
    kind: spec.kind,
    schedule: spec.kind === "once" ? spec.at : spec.kind === "cron" ? spec.expr : spec.every,
    startAt: spec.kind === "interval" ? isoOrNull(spec.startAtMs) : null,
    active: schedule.active,
    deactivatedReason: schedule.deactivatedReason ?? null,
    nextRun: schedule.active ? isoOrNull(state.nextRunAtMs) : null,
    lastRun: isoOrNull(state.lastRunAtMs),
    lastStatus: state.lastStatus ?? null,
    lastError: state.lastError ?? null,
    repetitionCount: state.repetitionCount,
    maxRepetitions: schedule.maxRepetitions,
    createdAt: schedule.createdAt,
  };
}

export function describePass(summary: PassSummary): Record<string, unknown> {
  return {
    delivered: summary.delivered,
    failed: summary.failed,
    rescheduled: summary.rescheduled,
    results: summary.results.map((r) => ({
      id: r.id,
      agentId: r.recipientId,
      status: r.status,
      active: r.active,
      nextRun: isoOrNull(r.nextRunAtMs),
      error: r.error ?? null,
    })),
  };
}
