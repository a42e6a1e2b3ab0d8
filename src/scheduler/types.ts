export type ScheduleKind = "once" | "cron" | "interval";

export type ScheduleSpec =
  | { kind: "once"; at: string }
  | { kind: "cron"; expr: string }
  | { kind: "interval"; every: string; everyMs: number; startAtMs?: number };

export type AttemptStatus =
  | "delivered"
  | "transient_failure"
  | "permanent_failure"
  | "integrity_error";

export type DeactivationReason =
  | "completed"
  | "cancelled"
  | "permanent_failure"
  | "integrity_error"
  | "retries_exhausted";

export type ScheduleState = {
  nextRunAtMs: number;
  /** Set while a pass holds the schedule; cleared by the commit. */
  runningAtMs?: number;
  lastRunAtMs?: number;
  lastStatus?: AttemptStatus;
  lastError?: string;
  repetitionCount: number;
  /** Transient failures since the last successful delivery. */
  consecutiveFailures: number;
};

export type Schedule = {
  id: string;
  recipientId: string;
  message: string;
  spec: ScheduleSpec;
  active: boolean;
  deactivatedReason?: DeactivationReason;
  maxRepetitions: number | null;
  createdAt: string;
  state: ScheduleState;
};

export type SchedulerStoreFile = {
  version: 1;
  schedules: Schedule[];
};

export type DeliveryOutcome =
  | { status: "delivered"; attempts: number; transport: "standard" | "stream" }
  | { status: "transient_failure"; reason: string; attempts: number }
  | { status: "permanent_failure"; reason: string; attempts: number };

export type ScheduleRunResult = {
  id: string;
  recipientId: string;
  status: AttemptStatus;
  active: boolean;
  nextRunAtMs?: number;
  repetitionCount: number;
  error?: string;
};

export type PassSummary = {
  delivered: number;
  failed: number;
  rescheduled: number;
  results: ScheduleRunResult[];
};

export type StoreStats = {
  total: number;
  active: number;
  inactive: number;
  due: number;
  inFlight: number;
  oldestCreatedAt?: string;
  newestCreatedAt?: string;
};
