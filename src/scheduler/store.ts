import fs from "node:fs";
import type { FileHandle } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { LoopAlreadyRunningError, ScheduleNotFoundError, StoreError } from "./errors.js";
import type { Schedule, SchedulerStoreFile, StoreStats } from "./types.js";

const scheduleSpecSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("once"), at: z.string().min(1) }),
  z.object({ kind: z.literal("cron"), expr: z.string().min(1) }),
  z.object({
    kind: z.literal("interval"),
    every: z.string().min(1),
    everyMs: z.number().int().positive(),
    startAtMs: z.number().int().optional(),
  }),
]);

const scheduleSchema = z.object({
  id: z.string().min(1),
  recipientId: z.string().min(1),
  message: z.string().min(1),
  spec: scheduleSpecSchema,
  active: z.boolean(),
  deactivatedReason: z
    .enum(["completed", "cancelled", "permanent_failure", "integrity_error", "retries_exhausted"])
    .optional(),
  maxRepetitions: z.number().int().positive().nullable(),
  createdAt: z.string(),
  state: z.object({
    nextRunAtMs: z.number().int(),
    runningAtMs: z.number().int().optional(),
    lastRunAtMs: z.number().int().optional(),
    lastStatus: z.enum(["delivered", "transient_failure", "permanent_failure", "integrity_error"]).optional(),
    lastError: z.string().optional(),
    repetitionCount: z.number().int().nonnegative(),
    consecutiveFailures: z.number().int().nonnegative(),
  }),
});

const storeFileSchema = z.object({
  version: z.literal(1),
  schedules: z.array(scheduleSchema),
});

/**
 * Where the store document lives. `load` returns undefined when nothing
 * has been written yet.
 */
export interface StoreBackend {
  readonly location: string;
  load(): Promise<unknown>;
  save(file: SchedulerStoreFile): Promise<void>;
  /**
   * Run `fn` holding the exclusive write lock, shared by every process
   * and store instance using this location.
   */
  withWriteLock<T>(fn: () => Promise<T>): Promise<T>;
  /** Take the single-executor lock; resolves to its release function. */
  acquireLock(): Promise<() => Promise<void>>;
}

export type FileBackendOptions = {
  /** Give up waiting for the write lock after this long. */
  writeLockTimeoutMs?: number;
  /** A write lock older than this was left by a dead writer. */
  writeLockStaleMs?: number;
  writeLockRetryMs?: number;
};

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function isPidAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else.
    return (err as NodeJS.ErrnoException).code === "EPERM";
  }
}

// Lock files held by this process. A lock naming our own pid that is not in
// here was left by an earlier process that happened to have the same pid.
const heldLocks = new Set<string>();

/**
 * JSON file backend with atomic writes (temp + rename + backup).
 */
export function createFileBackend(storePath: string, opts: FileBackendOptions = {}): StoreBackend {
  const lockPath = `${storePath}.lock`;
  const writeLockPath = `${storePath}.write.lock`;
  const writeLockTimeoutMs = opts.writeLockTimeoutMs ?? 10_000;
  const writeLockStaleMs = opts.writeLockStaleMs ?? 30_000;
  const writeLockRetryMs = opts.writeLockRetryMs ?? 25;

  async function takeWriteLock(): Promise<FileHandle> {
    await fs.promises.mkdir(path.dirname(writeLockPath), { recursive: true });
    const startedAt = Date.now();
    for (;;) {
      try {
        return await fs.promises.open(writeLockPath, "wx");
      } catch (err) {
        if ((err as NodeJS.ErrnoException).code !== "EEXIST") throw err;
      }

      const stat = await fs.promises.stat(writeLockPath).catch((err: NodeJS.ErrnoException) => {
        // Released between our open and stat; try again straight away.
        if (err.code === "ENOENT") return undefined;
        throw err;
      });
      if (stat && Date.now() - stat.mtimeMs > writeLockStaleMs) {
        console.warn(`[store] Removing stale write lock ${writeLockPath}`);
        await fs.promises.rm(writeLockPath, { force: true });
        continue;
      }
      if (Date.now() - startedAt >= writeLockTimeoutMs) {
        throw new StoreError(`Timed out after ${writeLockTimeoutMs}ms waiting for write lock ${writeLockPath}`);
      }
      if (stat) await sleep(writeLockRetryMs);
    }
  }

  async function tryCreateLock(): Promise<boolean> {
    try {
      const handle = await fs.promises.open(lockPath, "wx");
      try {
        await handle.writeFile(String(process.pid), "utf-8");
      } finally {
        await handle.close();
      }
      return true;
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "EEXIST") return false;
      throw err;
    }
  }

  return {
    location: storePath,

    async load() {
      let raw: string;
      try {
        raw = await fs.promises.readFile(storePath, "utf-8");
      } catch (err) {
        if ((err as NodeJS.ErrnoException).code === "ENOENT") return undefined;
        throw err;
      }
      return JSON.parse(raw);
    },

    async save(file) {
      await fs.promises.mkdir(path.dirname(storePath), { recursive: true });
      const tmp = `${storePath}.${process.pid}.${Math.random().toString(16).slice(2)}.tmp`;
      await fs.promises.writeFile(tmp, JSON.stringify(file, null, 2), "utf-8");
      await fs.promises.rename(tmp, storePath);
      try {
        await fs.promises.copyFile(storePath, `${storePath}.bak`);
      } catch (err) {
        console.warn(`[store] Backup copy failed for ${storePath}:`, err);
      }
    },

    async withWriteLock(fn) {
      const handle = await takeWriteLock();
      try {
        return await fn();
      } finally {
        await handle.close();
        await fs.promises.rm(writeLockPath, { force: true });
      }
    },

    async acquireLock() {
      if (heldLocks.has(lockPath)) {
        throw new LoopAlreadyRunningError(process.pid);
      }
      heldLocks.add(lockPath);
      try {
        await fs.promises.mkdir(path.dirname(lockPath), { recursive: true });
        if (!(await tryCreateLock())) {
          const owner = Number.parseInt(await fs.promises.readFile(lockPath, "utf-8").catch(() => ""), 10);
          if (Number.isInteger(owner) && owner !== process.pid && isPidAlive(owner)) {
            throw new LoopAlreadyRunningError(owner);
          }
          console.warn(`[store] Taking over stale loop lock ${lockPath} (pid ${Number.isInteger(owner) ? owner : "unknown"})`);
          await fs.promises.rm(lockPath, { force: true });
          if (!(await tryCreateLock())) {
            throw new LoopAlreadyRunningError();
          }
        }
      } catch (err) {
        heldLocks.delete(lockPath);
        throw err;
      }
      return async () => {
        heldLocks.delete(lockPath);
        await fs.promises.rm(lockPath, { force: true });
      };
    },
  };
}

export type MemoryBackend = StoreBackend & {
  /** Number of successful saves so far. */
  readonly saveCount: number;
  /** Make the next `count` saves throw. */
  failNextSaves(count: number): void;
};

/**
 * In-process backend. Keeps the last saved document as JSON text so reads
 * never alias live objects.
 */
export function createMemoryBackend(initial?: SchedulerStoreFile): MemoryBackend {
  let stored: string | undefined = initial ? JSON.stringify(initial) : undefined;
  let saveCount = 0;
  let failures = 0;
  let locked = false;
  let writeTail: Promise<unknown> = Promise.resolve();

  return {
    location: "memory",
    get saveCount() {
      return saveCount;
    },
    failNextSaves(count: number) {
      failures = count;
    },
    async load() {
      return stored === undefined ? undefined : JSON.parse(stored);
    },
    async save(file) {
      if (failures > 0) {
        failures--;
        throw new Error("simulated write failure");
      }
      stored = JSON.stringify(file);
      saveCount++;
    },
    withWriteLock(fn) {
      const run = writeTail.then(fn);
      writeTail = run.then(
        () => undefined,
        () => undefined,
      );
      return run;
    },
    async acquireLock() {
      if (locked) throw new LoopAlreadyRunningError(process.pid);
      locked = true;
      return async () => {
        locked = false;
      };
    },
  };
}

export type ListOptions = {
  recipientId?: string;
  includeInactive?: boolean;
};

function byNextRun(a: Schedule, b: Schedule): number {
  return a.state.nextRunAtMs - b.state.nextRunAtMs || a.createdAt.localeCompare(b.createdAt);
}

function withoutClaim(schedule: Schedule): Schedule {
  const { runningAtMs: _claim, ...state } = schedule.state;
  return { ...schedule, state };
}

/**
 * Durable schedule collection.
 *
 * Every read loads the backend document afresh, and every mutation is a
 * read-modify-write under the backend's write lock, so several processes
 * can share one store file.
 */
export class ScheduleStore {
  private tail: Promise<unknown> = Promise.resolve();
  private opened = false;

  constructor(private readonly backend: StoreBackend) {}

  get location(): string {
    return this.backend.location;
  }

  /** Check the document is readable and valid before first use. */
  async open(): Promise<void> {
    await this.load();
    this.opened = true;
  }

  acquireLoopLock(): Promise<() => Promise<void>> {
    return this.backend.acquireLock();
  }

  async get(id: string): Promise<Schedule | undefined> {
    return (await this.read()).find((s) => s.id === id);
  }

  async list(opts: ListOptions = {}): Promise<Schedule[]> {
    return (await this.read())
      .filter((s) => opts.recipientId === undefined || s.recipientId === opts.recipientId)
      .filter((s) => opts.includeInactive || s.active)
      .sort(byNextRun);
  }

  async stats(nowMs: number): Promise<StoreStats> {
    const all = await this.read();
    const active = all.filter((s) => s.active);
    const created = all.map((s) => s.createdAt).sort();
    return {
      total: all.length,
      active: active.length,
      inactive: all.length - active.length,
      due: active.filter((s) => s.state.nextRunAtMs <= nowMs).length,
      inFlight: active.filter((s) => s.state.runningAtMs !== undefined).length,
      oldestCreatedAt: created[0],
      newestCreatedAt: created[created.length - 1],
    };
  }
  insert(schedule: Schedule): Promise<Schedule> {
    return this.mutate((draft) => {
      if (draft.some((s) => s.id === schedule.id)) {
        throw new StoreError(`Duplicate schedule id ${schedule.id}`);
      }
      draft.push(structuredClone(schedule));
      return { result: structuredClone(schedule), changed: true };
    });
  }

  /**
   * Select every due, unclaimed, active schedule (oldest due first) and mark
   * it in flight in the same step, so an overlapping pass cannot pick it up.
   * With `staleClaimMs`, a claim at least that old counts as abandoned and
   * the schedule is claimed again.
   */
  claimDue(nowMs: number, staleClaimMs?: number): Promise<Schedule[]> {
    const isClaimable = (s: Schedule): boolean => {
      const claimedAt = s.state.runningAtMs;
      if (claimedAt === undefined) return true;
      if (staleClaimMs === undefined || nowMs - claimedAt < staleClaimMs) return false;
      console.warn(`[store] Reclaiming schedule ${s.id}, claimed at ${new Date(claimedAt).toISOString()}`);
      return true;
    };

    return this.mutate((draft) => {
      const due = draft
        .filter((s) => s.active && s.state.nextRunAtMs <= nowMs && isClaimable(s))
        .sort(byNextRun);
      for (const s of due) {
        s.state.runningAtMs = nowMs;
      }
      return { result: due.map((s) => structuredClone(s)), changed: due.length > 0 };
    });
  }

  /**
   * Write back the outcome of one schedule's attempt and clear its claim.
   * A schedule cancelled while in flight stays cancelled.
   */
  commit(next: Schedule): Promise<Schedule> {
    return this.mutate((draft) => {
      const idx = draft.findIndex((s) => s.id === next.id);
      if (idx < 0) throw new ScheduleNotFoundError(next.id);

      const current = draft[idx];
      const merged = withoutClaim(structuredClone(next));
      if (!current.active) {
        merged.active = false;
        merged.deactivatedReason = current.deactivatedReason;
      }
      draft[idx] = merged;
      return { result: structuredClone(merged), changed: true };
    });
  }

  release(id: string): Promise<void> {
    return this.mutate((draft) => {
      const idx = draft.findIndex((s) => s.id === id);
      if (idx < 0 || draft[idx].state.runningAtMs === undefined) {
        return { result: undefined, changed: false };
      }
      draft[idx] = withoutClaim(draft[idx]);
      return { result: undefined, changed: true };
    });
  }

  /**
   * Clear in-flight markers left behind by a pass that never finished.
   * Returns how many were released.
   */
  releaseStaleClaims(nowMs: number, maxAgeMs: number): Promise<number> {
    return this.mutate((draft) => {
      let released = 0;
      for (let i = 0; i < draft.length; i++) {
        const claimedAt = draft[i].state.runningAtMs;
        if (claimedAt !== undefined && nowMs - claimedAt >= maxAgeMs) {
          console.warn(`[store] Releasing stale claim on schedule ${draft[i].id}`);
          draft[i] = withoutClaim(draft[i]);
          released++;
        }
      }
      return { result: released, changed: released > 0 };
    });
  }

  /**
   * Deactivate a schedule. Already-inactive schedules are returned unchanged.
   *
   * @throws {ScheduleNotFoundError}
   */
  cancel(id: string): Promise<Schedule> {
    return this.mutate((draft) => {
      const found = draft.find((s) => s.id === id);
      if (!found) throw new ScheduleNotFoundError(id);
      if (!found.active) return { result: structuredClone(found), changed: false };
      found.active = false;
      found.deactivatedReason = "cancelled";
      return { result: structuredClone(found), changed: true };
    });
  }

  // --- Internal ---

  private read(): Promise<Schedule[]> {
    if (!this.opened) {
      return Promise.reject(new StoreError("Schedule store used before open()"));
    }
    return this.load();
  }

  private async load(): Promise<Schedule[]> {
    let raw: unknown;
    try {
      raw = await this.backend.load();
    } catch (err) {
      throw new StoreError(`Failed to read schedule store at ${this.backend.location}`, { cause: err });
    }
    if (raw === undefined) return [];

    const parsed = storeFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new StoreError(
        `Schedule store at ${this.backend.location} is corrupt: ${parsed.error.issues[0]?.message ?? "invalid document"}`,
      );
    }
    return parsed.data.schedules;
  }

  private mutate<T>(fn: (draft: Schedule[]) => { result: T; changed: boolean }): Promise<T> {
    const run = (): Promise<T> =>
      this.backend.withWriteLock(async () => {
        const draft = await this.read();
        const { result, changed } = fn(draft);
        if (changed) {
          try {
            await this.backend.save({ version: 1, schedules: draft });
          } catch (err) {
            throw new StoreError(`Failed to write schedule store at ${this.backend.location}`, { cause: err });
          }
        }
        return result;
      });

    const chained = this.tail.then(run);
    // Keep the chain alive past a failed mutation; the caller still sees the rejection.
    this.tail = chained.then(
      () => undefined,
      () => undefined,
    );
    return chained;
  }
}
