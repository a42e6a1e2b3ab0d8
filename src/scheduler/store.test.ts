import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { LoopAlreadyRunningError, ScheduleNotFoundError, StoreError } from "./errors.js";
import { ScheduleStore, createFileBackend, createMemoryBackend, type MemoryBackend } from "./store.js";
import { makeSchedule } from "./testing.js";

const T = (iso: string) => Date.parse(iso);

describe("ScheduleStore (memory backend)", () => {
  let backend: MemoryBackend;
  let store: ScheduleStore;

  beforeEach(async () => {
    backend = createMemoryBackend();
    store = new ScheduleStore(backend);
    await store.open();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("starts empty when nothing has been written", async () => {
    await expect(store.list({ includeInactive: true })).resolves.toEqual([]);
    expect(backend.saveCount).toBe(0);
  });

  it("throws before open()", async () => {
    const unopened = new ScheduleStore(createMemoryBackend());
    await expect(unopened.list()).rejects.toThrow(StoreError);
  });

  it("lists active schedules soonest first, filtered by recipient", async () => {
    await store.insert(makeSchedule({ id: "late", state: { nextRunAtMs: T("2025-01-01T15:00:00Z") } }));
    await store.insert(makeSchedule({ id: "early", state: { nextRunAtMs: T("2025-01-01T09:00:00Z") } }));
    await store.insert(makeSchedule({ id: "other", recipientId: "agent-2" }));
    await store.insert(makeSchedule({ id: "done", active: false, deactivatedReason: "completed" }));

    expect((await store.list()).map((s) => s.id)).toEqual(["early", "other", "late"]);
    expect((await store.list({ recipientId: "agent-2" })).map((s) => s.id)).toEqual(["other"]);
    expect(await store.list({ includeInactive: true })).toHaveLength(4);
  });

  it("returns copies that do not alias stored state", async () => {
    await store.insert(makeSchedule({ id: "a" }));
    const copy = await store.get("a");
    if (!copy) throw new Error("missing");
    copy.message = "changed";
    expect((await store.get("a"))?.message).toBe("hello");
  });

  it("rejects a duplicate id", async () => {
    await store.insert(makeSchedule({ id: "a" }));
    await expect(store.insert(makeSchedule({ id: "a" }))).rejects.toThrow(StoreError);
  });

  describe("claimDue", () => {
    const now = T("2025-01-01T12:00:00Z");

    beforeEach(async () => {
      await store.insert(makeSchedule({ id: "due-later", state: { nextRunAtMs: now } }));
      await store.insert(makeSchedule({ id: "due-first", state: { nextRunAtMs: now - 60_000 } }));
      await store.insert(makeSchedule({ id: "future", state: { nextRunAtMs: now + 1_000 } }));
      await store.insert(makeSchedule({ id: "inactive", active: false, deactivatedReason: "cancelled", state: { nextRunAtMs: now - 1 } }));
    });

    it("selects active due schedules oldest-due first and marks them", async () => {
      const claimed = await store.claimDue(now);
      expect(claimed.map((s) => s.id)).toEqual(["due-first", "due-later"]);
      expect(claimed.every((s) => s.state.runningAtMs === now)).toBe(true);
      expect((await store.get("due-first"))?.state.runningAtMs).toBe(now);
      expect((await store.get("future"))?.state.runningAtMs).toBeUndefined();
    });

    it("never hands the same schedule to two passes", async () => {
      const [a, b] = await Promise.all([store.claimDue(now), store.claimDue(now)]);
      expect(a.map((s) => s.id)).toEqual(["due-first", "due-later"]);
      expect(b).toEqual([]);
    });

    it("writes nothing when nothing is due", async () => {
      const before = backend.saveCount;
      expect(await store.claimDue(now - 3_600_000)).toEqual([]);
      expect(backend.saveCount).toBe(before);
    });
  });

  describe("commit", () => {
    it("writes the new record and clears the claim", async () => {
      await store.insert(makeSchedule({ id: "a" }));
      const [claimed] = await store.claimDue(T("2025-01-01T12:00:00Z"));
      const next = { ...claimed, state: { ...claimed.state, nextRunAtMs: T("2025-01-02T12:00:00Z") } };

      const committed = await store.commit(next);
      expect(committed.state.runningAtMs).toBeUndefined();
      expect((await store.get("a"))?.state.nextRunAtMs).toBe(T("2025-01-02T12:00:00Z"));
      expect((await store.get("a"))?.state.runningAtMs).toBeUndefined();
    });

    it("keeps a cancel that landed while the schedule was in flight", async () => {
      await store.insert(makeSchedule({ id: "a", spec: { kind: "cron", expr: "0 * * * *" } }));
      const [claimed] = await store.claimDue(T("2025-01-01T12:00:00Z"));
      await store.cancel("a");

      const committed = await store.commit({ ...claimed, state: { ...claimed.state, nextRunAtMs: T("2025-01-01T13:00:00Z") } });
      expect(committed.active).toBe(false);
      expect(committed.deactivatedReason).toBe("cancelled");
    });

    it("rejects an unknown id", async () => {
      await expect(store.commit(makeSchedule({ id: "ghost" }))).rejects.toThrow(ScheduleNotFoundError);
    });
  });

  it("leaves the previous state visible when a write fails", async () => {
    await store.insert(makeSchedule({ id: "a" }));
    backend.failNextSaves(1);

    await expect(store.claimDue(T("2025-01-01T12:00:00Z"))).rejects.toThrow(StoreError);
    expect((await store.get("a"))?.state.runningAtMs).toBeUndefined();

    // The mutation chain keeps working afterwards.
    const claimed = await store.claimDue(T("2025-01-01T12:00:00Z"));
    expect(claimed.map((s) => s.id)).toEqual(["a"]);
  });

  it("release clears a claim and is a no-op without one", async () => {
    await store.insert(makeSchedule({ id: "a" }));
    await store.claimDue(T("2025-01-01T12:00:00Z"));
    await store.release("a");
    expect((await store.get("a"))?.state.runningAtMs).toBeUndefined();

    const before = backend.saveCount;
    await store.release("a");
    expect(backend.saveCount).toBe(before);
  });

  it("releases only claims older than the limit", async () => {
    const now = T("2025-01-01T12:00:00Z");
    await store.insert(makeSchedule({ id: "old", state: { runningAtMs: now - 7_200_000 } }));
    await store.insert(makeSchedule({ id: "fresh", state: { runningAtMs: now - 60_000 } }));
    vi.spyOn(console, "warn").mockImplementation(() => {});

    expect(await store.releaseStaleClaims(now, 3_600_000)).toBe(1);
    expect((await store.get("old"))?.state.runningAtMs).toBeUndefined();
    expect((await store.get("fresh"))?.state.runningAtMs).toBe(now - 60_000);
  });

  it("claims again when an earlier claim is older than the stale limit", async () => {
    const now = T("2025-01-01T12:00:00Z");
    await store.insert(makeSchedule({ id: "abandoned", state: { nextRunAtMs: now - 7_200_000, runningAtMs: now - 7_200_000 } }));
    await store.insert(makeSchedule({ id: "busy", state: { nextRunAtMs: now - 60_000, runningAtMs: now - 60_000 } }));
    vi.spyOn(console, "warn").mockImplementation(() => {});

    expect(await store.claimDue(now)).toEqual([]);
    expect((await store.claimDue(now, 3_600_000)).map((s) => s.id)).toEqual(["abandoned"]);
    expect((await store.get("abandoned"))?.state.runningAtMs).toBe(now);
    expect((await store.get("busy"))?.state.runningAtMs).toBe(now - 60_000);
  });

  describe("cancel", () => {
    it("deactivates with reason cancelled", async () => {
      await store.insert(makeSchedule({ id: "a" }));
      const cancelled = await store.cancel("a");
      expect(cancelled.active).toBe(false);
      expect(cancelled.deactivatedReason).toBe("cancelled");
      expect(await store.list()).toEqual([]);
    });

    it("leaves an already-inactive schedule untouched", async () => {
      await store.insert(makeSchedule({ id: "a", active: false, deactivatedReason: "completed" }));
      const before = backend.saveCount;
      const result = await store.cancel("a");
      expect(result.deactivatedReason).toBe("completed");
      expect(backend.saveCount).toBe(before);
    });

    it("throws for an unknown id", async () => {
      await expect(store.cancel("ghost")).rejects.toThrow(ScheduleNotFoundError);
    });
  });

  it("reports stats", async () => {
    const now = T("2025-01-01T12:00:00Z");
    await store.insert(makeSchedule({ id: "a", createdAt: "2025-01-01T01:00:00.000Z", state: { nextRunAtMs: now - 1_000 } }));
    await store.insert(makeSchedule({ id: "b", createdAt: "2025-01-01T02:00:00.000Z", state: { nextRunAtMs: now + 1_000, runningAtMs: now } }));
    await store.insert(makeSchedule({ id: "c", createdAt: "2025-01-01T03:00:00.000Z", active: false, deactivatedReason: "completed" }));

    expect(await store.stats(now)).toEqual({
      total: 3,
      active: 2,
      inactive: 1,
      due: 1,
      inFlight: 1,
      oldestCreatedAt: "2025-01-01T01:00:00.000Z",
      newestCreatedAt: "2025-01-01T03:00:00.000Z",
    });
  });

  it("refuses a corrupt document", async () => {
    const corrupt = createMemoryBackend();
    await corrupt.save({ version: 1, schedules: [makeSchedule({ id: "a" })] });
    vi.spyOn(corrupt, "load").mockResolvedValue({ version: 1, schedules: [{ id: "a" }] });
    await expect(new ScheduleStore(corrupt).open()).rejects.toThrow(/is corrupt/);
  });

  it("memory lock admits one holder at a time", async () => {
    const release = await store.acquireLoopLock();
    await expect(store.acquireLoopLock()).rejects.toThrow(LoopAlreadyRunningError);
    await release();
    await expect(store.acquireLoopLock()).resolves.toBeTypeOf("function");
  });
});

describe("ScheduleStore (file backend)", () => {
  let dir: string;
  let storePath: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "promptclock-store-"));
    storePath = path.join(dir, "nested", "schedules.json");
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it("persists across instances with a backup copy", async () => {
    const store = new ScheduleStore(createFileBackend(storePath));
    await store.open();
    await store.insert(makeSchedule({ id: "persisted" }));

    const reopened = new ScheduleStore(createFileBackend(storePath));
    await reopened.open();
    expect((await reopened.get("persisted"))?.message).toBe("hello");

    const backup = JSON.parse(await fs.promises.readFile(`${storePath}.bak`, "utf-8"));
    expect(backup.schedules[0].id).toBe("persisted");
    const leftovers = (await fs.promises.readdir(path.dirname(storePath))).filter((f) => f.endsWith(".tmp"));
    expect(leftovers).toEqual([]);
  });

  it("fails to open invalid JSON", async () => {
    await fs.promises.mkdir(path.dirname(storePath), { recursive: true });
    await fs.promises.writeFile(storePath, "{ not json", "utf-8");
    await expect(new ScheduleStore(createFileBackend(storePath)).open()).rejects.toThrow(StoreError);
  });

  describe("shared by several instances", () => {
    async function openStore(): Promise<ScheduleStore> {
      const store = new ScheduleStore(createFileBackend(storePath));
      await store.open();
      return store;
    }

    it("keeps writes made through another instance", async () => {
      const daemon = await openStore();
      const cli = await openStore();
      await cli.insert(makeSchedule({ id: "from-cli" }));
      await daemon.insert(makeSchedule({ id: "from-daemon" }));
      await daemon.cancel("from-cli");

      const reopened = await openStore();
      const ids = (await reopened.list({ includeInactive: true })).map((s) => s.id).sort();
      expect(ids).toEqual(["from-cli", "from-daemon"]);
      expect((await reopened.get("from-cli"))?.deactivatedReason).toBe("cancelled");
    });

    it("sees claims taken through another instance", async () => {
      const now = T("2025-01-01T12:00:00Z");
      const daemon = await openStore();
      const cli = await openStore();
      await daemon.insert(makeSchedule({ id: "due", state: { nextRunAtMs: now } }));

      expect((await cli.claimDue(now)).map((s) => s.id)).toEqual(["due"]);
      expect(await daemon.claimDue(now)).toEqual([]);
    });

    it("serializes concurrent writers and cleans up the write lock", async () => {
      const a = await openStore();
      const b = await openStore();
      await Promise.all(
        Array.from({ length: 10 }, (_, i) => (i % 2 === 0 ? a : b).insert(makeSchedule({ id: `s-${i}` }))),
      );

      expect(await b.list()).toHaveLength(10);
      expect(fs.existsSync(`${storePath}.write.lock`)).toBe(false);
    });
  });

  describe("write lock", () => {
    const writeLock = () => `${storePath}.write.lock`;

    it("times out while another writer holds it", async () => {
      await fs.promises.mkdir(path.dirname(storePath), { recursive: true });
      await fs.promises.writeFile(writeLock(), "", "utf-8");
      const store = new ScheduleStore(createFileBackend(storePath, { writeLockTimeoutMs: 50, writeLockRetryMs: 5 }));
      await store.open();

      await expect(store.insert(makeSchedule({ id: "a" }))).rejects.toThrow(
        `Timed out after 50ms waiting for write lock ${writeLock()}`,
      );
    });

    it("removes a write lock left by a dead writer", async () => {
      await fs.promises.mkdir(path.dirname(storePath), { recursive: true });
      await fs.promises.writeFile(writeLock(), "", "utf-8");
      const old = new Date(Date.now() - 60_000);
      await fs.promises.utimes(writeLock(), old, old);
      const store = new ScheduleStore(createFileBackend(storePath));
      await store.open();

      await store.insert(makeSchedule({ id: "a" }));
      expect((await store.get("a"))?.id).toBe("a");
      expect(console.warn).toHaveBeenCalledWith(`[store] Removing stale write lock ${writeLock()}`);
    });
  });

  describe("loop lock", () => {
    it("writes our pid and removes the file on release", async () => {
      const backend = createFileBackend(storePath);
      const release = await backend.acquireLock();
      expect(await fs.promises.readFile(`${storePath}.lock`, "utf-8")).toBe(String(process.pid));
      await release();
      expect(fs.existsSync(`${storePath}.lock`)).toBe(false);
    });

    it("refuses a second holder in the same process", async () => {
      const release = await createFileBackend(storePath).acquireLock();
      await expect(createFileBackend(storePath).acquireLock()).rejects.toThrow(LoopAlreadyRunningError);
      await release();
    });

    it("refuses a lock held by another live process", async () => {
      await fs.promises.mkdir(path.dirname(storePath), { recursive: true });
      await fs.promises.writeFile(`${storePath}.lock`, String(process.ppid), "utf-8");
      await expect(createFileBackend(storePath).acquireLock()).rejects.toThrow(`pid ${process.ppid}`);
    });

    it("takes over a lock left by a dead process", async () => {
      await fs.promises.mkdir(path.dirname(storePath), { recursive: true });
      await fs.promises.writeFile(`${storePath}.lock`, "2147483640", "utf-8");
      const release = await createFileBackend(storePath).acquireLock();
      expect(await fs.promises.readFile(`${storePath}.lock`, "utf-8")).toBe(String(process.pid));
      await release();
    });
  });
});
