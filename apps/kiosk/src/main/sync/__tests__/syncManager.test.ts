import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  BackendRejectionError,
  NetworkTransientError,
  StoreError,
} from "../../../shared/errors";
import type {
  AttendanceEvent,
  NewAttendanceEvent,
  SyncStatusSnapshot,
} from "../../../shared/types/attendance";
import { ConnectivityMonitor } from "../../connectivity/connectivityMonitor";
import { AttendanceEventStore } from "../../database/attendanceEventRepository";
import { IN_MEMORY_DATABASE, openDatabase } from "../../database/client";
import type { AttendanceBackend } from "../backendClient";
import { SyncManager, type SyncManagerOptions } from "../syncManager";

vi.mock("../../../shared/logger", async (importOriginal) => ({
  ...(await importOriginal<typeof import("../../../shared/logger")>()),
  getLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    flush: vi.fn(),
  }),
}));

/** In-process stand-in for the attendance API; dedups on eventId. */
class FakeBackend implements AttendanceBackend {
  readonly accepted = new Map<string, AttendanceEvent>();

  readonly calls: Array<{ eventId: string; at: number }> = [];

  onPost: (event: AttendanceEvent) => Promise<void> | void = () => undefined;

  private readonly failures = new Map<string, Error[]>();

  failNext(eventId: string, ...errors: Error[]): void {
    this.failures.set(eventId, [...(this.failures.get(eventId) ?? []), ...errors]);
  }

  async postAttendance(event: AttendanceEvent): Promise<void> {
    this.calls.push({ eventId: event.eventId, at: Date.now() });
    await this.onPost(event);
    const failure = this.failures.get(event.eventId)?.shift();
    if (failure) {
      throw failure;
    }
    this.accepted.set(event.eventId, event);
  }

  async checkHealth(): Promise<boolean> {
    return true;
  }
}

const timeout = () => new NetworkTransientError("timeout", "POST /attendance timed out");

const newEvent = (eventId: string, occurredAt: number): NewAttendanceEvent => ({
  eventId,
  personId: `person-${eventId}`,
  deviceId: "kiosk-test",
  occurredAt,
  kind: "IN",
  window: "2026-03-02:morning-in",
  confidence: 0.9,
});

describe("SyncManager", () => {
  let store: AttendanceEventStore;
  let backend: FakeBackend;
  let online: boolean;
  let monitor: ConnectivityMonitor;
  let manager: SyncManager;
  let statuses: SyncStatusSnapshot[];

  const createManager = (overrides: Partial<SyncManagerOptions> = {}) => {
    manager = new SyncManager({
      store,
      backend,
      monitor,
      syncIntervalMs: 60_000,
      maxAttempts: 8,
      backoffBaseMs: 2_000,
      backoffCapMs: 60_000,
      shutdownGraceMs: 1_000,
      ...overrides,
    });
    manager.on("status", (status) => statuses.push(status));
    return manager;
  };

  const append = (eventId: string, occurredAt: number) => {
    store.append(newEvent(eventId, occurredAt));
    manager.notifyAppended();
  };

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(2026, 2, 2, 8, 0, 0));
    store = new AttendanceEventStore(openDatabase(IN_MEMORY_DATABASE));
    backend = new FakeBackend();
    online = true;
    statuses = [];
    monitor = new ConnectivityMonitor({
      probe: async () => online,
      probeTimeoutMs: 100,
      offlineIntervalMs: 5_000,
      onlineIntervalMs: 300_000,
    });
  });

  afterEach(async () => {
    await manager.stop();
    await monitor.stop();
    store.close();
    vi.useRealTimers();
  });

  it("should keep events while offline and deliver them in order once online", async () => {
    online = false;
    createManager().start();
    await monitor.start();

    append("e3", 3_000);
    append("e1", 1_000);
    append("e2", 2_000);
    expect(backend.calls).toEqual([]);
    expect(store.countPending(8)).toBe(3);

    online = true;
    await vi.advanceTimersByTimeAsync(5_000);
    await manager.requestRun();

    expect(backend.calls.map((call) => call.eventId)).toEqual(["e1", "e2", "e3"]);
    expect(["e1", "e2", "e3"].map((id) => store.get(id)?.syncStatus)).toEqual([
      "Synced",
      "Synced",
      "Synced",
    ]);
    expect(statuses.at(-1)).toEqual({ pendingCount: 0, lastError: null });
  });

  it("should retry transient failures with growing delays until synced", async () => {
    backend.failNext("e1", timeout(), timeout());
    store.append(newEvent("e1", 1_000));
    createManager().start();
    await monitor.start();
    await manager.requestRun();

    await vi.advanceTimersByTimeAsync(2_000);
    await manager.requestRun();
    await vi.advanceTimersByTimeAsync(4_000);
    await manager.requestRun();

    const times = backend.calls.map((call) => call.at);
    expect(times).toHaveLength(3);
    const [first = 0, second = 0, third = 0] = times;
    expect([second - first, third - second]).toEqual([2_000, 4_000]);
    expect(store.get("e1")).toMatchObject({ syncStatus: "Synced", attempts: 2 });
    expect(backend.accepted.has("e1")).toBe(true);
  });

  it("should hold later events behind a head that is backing off", async () => {
    backend.failNext("e1", timeout());
    store.append(newEvent("e1", 1_000));
    store.append(newEvent("e2", 2_000));
    createManager().start();
    await monitor.start();
    await manager.requestRun();

    expect(backend.calls.map((call) => call.eventId)).toEqual(["e1"]);
    expect(store.get("e2")?.syncStatus).toBe("Pending");

    await vi.advanceTimersByTimeAsync(2_000);
    await manager.requestRun();
    expect(backend.calls.map((call) => call.eventId)).toEqual(["e1", "e1", "e2"]);
  });

  it("should fail a rejected event after one attempt and move on", async () => {
    const rejected = vi.fn();
    backend.failNext("e1", new BackendRejectionError(422, "unregistered person"));
    store.append(newEvent("e1", 1_000));
    store.append(newEvent("e2", 2_000));
    createManager();
    manager.on("rejected", rejected);
    manager.start();
    await monitor.start();
    await manager.requestRun();

    await vi.advanceTimersByTimeAsync(120_000);
    await manager.requestRun();

    expect(backend.calls.map((call) => call.eventId)).toEqual(["e1", "e2"]);
    expect(store.get("e1")).toMatchObject({
      syncStatus: "Failed",
      permanent: true,
      attempts: 1,
    });
    expect(store.get("e2")?.syncStatus).toBe("Synced");
    expect(rejected).toHaveBeenCalledTimes(1);
    expect(manager.getStatus().lastError).toEqual({
      category: "rejected",
      message: "unregistered person",
      eventId: "e1",
      status: 422,
    });
  });

  it("should skip a head that used up its attempts", async () => {
    backend.failNext("e1", timeout(), timeout(), timeout());
    store.append(newEvent("e1", 1_000));
    store.append(newEvent("e2", 2_000));
    createManager({ maxAttempts: 2 }).start();
    await monitor.start();
    await manager.requestRun();

    await vi.advanceTimersByTimeAsync(2_000);
    await manager.requestRun();
    await vi.advanceTimersByTimeAsync(4_000);
    await manager.requestRun();

    expect(backend.calls.map((call) => call.eventId)).toEqual(["e1", "e1", "e2"]);
    expect(store.get("e1")).toMatchObject({ syncStatus: "Failed", attempts: 2 });
    expect(store.listFailed(2).map((event) => event.eventId)).toEqual(["e1"]);
    expect(store.get("e2")?.syncStatus).toBe("Synced");
  });

  it("should reset backoff when connectivity comes back", async () => {
    backend.failNext("e1", timeout());
    backend.onPost = () => {
      online = false;
    };
    store.append(newEvent("e1", 1_000));
    createManager({ backoffBaseMs: 20_000 }).start();
    await monitor.start();
    await manager.requestRun();
    const firstAttemptAt = backend.calls[0]?.at ?? 0;

    expect(store.get("e1")?.nextAttemptAt).toBe(firstAttemptAt + 20_000);
    await vi.advanceTimersByTimeAsync(0);
    expect(monitor.getState()).toBe("Offline");

    backend.onPost = () => undefined;
    online = true;
    await vi.advanceTimersByTimeAsync(5_000);
    await manager.requestRun();

    expect(backend.calls).toHaveLength(2);
    expect(backend.calls[1]?.at).toBe(firstAttemptAt + 5_000);
    expect(store.get("e1")?.syncStatus).toBe("Synced");
  });

  it("should put an event back in the queue when recording its failure fails", async () => {
    backend.failNext("e1", timeout());
    store.append(newEvent("e1", 1_000));
    const markFailed = vi.spyOn(store, "markFailed").mockImplementationOnce(() => {
      throw new StoreError("update", new Error("SQLITE_BUSY"));
    });
    createManager().start();
    await monitor.start();
    await manager.requestRun();

    expect(markFailed).toHaveBeenCalledTimes(1);
    expect(backend.calls.map((call) => call.eventId)).toEqual(["e1", "e1"]);
    expect(store.get("e1")?.syncStatus).toBe("Synced");
    expect(manager.getStatus()).toEqual({ pendingCount: 0, lastError: null });
  });

  it("should pick up an event left in Syncing at the start of a run", async () => {
    store.append(newEvent("e1", 1_000));
    store.markSyncing("e1");
    expect(store.countPending(8)).toBe(0);

    createManager().start();
    await monitor.start();
    await manager.requestRun();

    expect(backend.calls.map((call) => call.eventId)).toEqual(["e1"]);
    expect(store.get("e1")?.syncStatus).toBe("Synced");
  });

  it("should resend an event interrupted mid-sync without duplicating it", async () => {
    store.append(newEvent("e1", 1_000));
    const original = store.get("e1");
    if (original) {
      await backend.postAttendance(original);
    }
    store.markSyncing("e1");
    expect(store.recoverInterrupted()).toBe(1);

    createManager().start();
    await monitor.start();
    await manager.requestRun();

    expect(backend.calls).toHaveLength(2);
    expect(backend.accepted.size).toBe(1);
    expect(store.get("e1")?.syncStatus).toBe("Synced");
  });

  it("should give up waiting for a hung send after the grace period", async () => {
    let hung = true;
    backend.onPost = () =>
      new Promise<void>((resolve) => {
        const check = setInterval(() => {
          if (!hung) {
            clearInterval(check);
            resolve();
          }
        }, 100);
      });
    store.append(newEvent("e1", 1_000));
    createManager().start();
    await monitor.start();

    const stopping = manager.stop();
    await vi.advanceTimersByTimeAsync(1_000);
    await expect(stopping).resolves.toBeUndefined();
    expect(store.get("e1")?.syncStatus).toBe("Syncing");

    hung = false;
    await vi.advanceTimersByTimeAsync(100);
  });
});
