/**
 * Base error class for scheduler errors.
 */
export class SchedulerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SchedulerError";
  }
}

/**
 * Rejected input at creation time. Nothing is stored.
 */
export class ValidationError extends SchedulerError {
  public readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = "ValidationError";
    this.field = field;
  }
}

export class ScheduleNotFoundError extends SchedulerError {
  public readonly scheduleId: string;

  constructor(scheduleId: string) {
    super(`Schedule ${scheduleId} not found`);
    this.name = "ScheduleNotFoundError";
    this.scheduleId = scheduleId;
  }
}

/**
 * A stored schedule whose spec can no longer be evaluated.
 * Fatal for that schedule only.
 */
export class ScheduleIntegrityError extends SchedulerError {
  public readonly scheduleId: string | undefined;

  constructor(message: string, scheduleId?: string) {
    super(message);
    this.name = "ScheduleIntegrityError";
    this.scheduleId = scheduleId;
  }
}

/**
 * Store load or persist failure. Fatal for the current pass.
 */
export class StoreError extends SchedulerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = "StoreError";
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class LoopAlreadyRunningError extends SchedulerError {
  public readonly ownerPid: number | undefined;

  constructor(ownerPid?: number) {
    super(
      ownerPid !== undefined
        ? `Executor loop already running (pid ${ownerPid})`
        : "Executor loop already running",
    );
    this.name = "LoopAlreadyRunningError";
    this.ownerPid = ownerPid;
  }
}
