import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { StoreError } from "../../../shared/errors";
import type { NewAttendanceEvent } from "../../../shared/types/attendance";
import { AttendanceEventStore } from "../attendanceEventRepository";
import { IN_MEMORY_DATABASE, openDatabase } from "../client";

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

const MAX_ATTEMPTS = 3;

const newEvent = (
  eventId: string,
  occurredAt: number,
  overrides: Partial<NewAttendanceEvent> = {},
): NewAttendanceEvent => ({
  eventId,
  personId: "P1",
  deviceId: "kiosk-test",
  occurredAt,
  kind: "IN",
  window: "2026-03-02:morning-in",
  confidence: 0.93,
  ...overrides,
});

describe("AttendanceEventStore", () => {
  let now: number;
  let store: AttendanceEventStore;

  beforeEach(() => {
    now = 10_000;
    store = new AttendanceEventStore(openDatabase(IN_MEMORY_DATABASE), () => now);
  });

  afterEach(() => {
    store.close();
  });

  it("should append a Pending event with every field intact", () => {
    const stored = store.append(newEvent("e1", 1000, { personId: null, kind: "UNKNOWN" }));

    expect(stored).toEqual({
      eventId: "e1",
      personId: null,
      deviceId: "kiosk-test",
      occurredAt: 1000,
      kind: "UNKNOWN",
      window: "2026-03-02:morning-in",
      confidence: 0.93,
      syncStatus: "Pending",
      attempts: 0,
      lastError: null,
      nextAttemptAt: null,
      permanent: false,
      createdAt: 10_000,
      updatedAt: 10_000,
      syncedAt: null,
    });
    expect(store.get("e1")).toEqual(stored);
  });

  it("should keep the first row when an eventId is appended twice", () => {
    store.append(newEvent("e1", 1000));
    now = 20_000;
    const again = store.append(newEvent("e1", 9999, { personId: "P2" }));

    expect(again.occurredAt).toBe(1000);
    expect(again.personId).toBe("P1");
    expect(store.countPending(MAX_ATTEMPTS)).toBe(1);
  });

  it("should list pending events in capture order", () => {
    store.append(newEvent("late", 3000));
    store.append(newEvent("early", 1000));
    store.append(newEvent("tie-a", 2000));
    store.append(newEvent("tie-b", 2000));

    expect(
      store.listPending({ maxAttempts: MAX_ATTEMPTS }).map((event) => event.eventId),
    ).toEqual(["early", "tie-a", "tie-b", "late"]);
    expect(
      store
        .listPending({ maxAttempts: MAX_ATTEMPTS, limit: 2 })
        .map((event) => event.eventId),
    ).toEqual(["early", "tie-a"]);
  });

  it("should walk an event through Syncing to Synced", () => {
    store.append(newEvent("e1", 1000));

    expect(store.markSyncing("e1")).toBe(true);
    expect(store.get("e1")?.syncStatus).toBe("Syncing");

    now = 12_000;
    expect(store.markSynced("e1")).toBe(true);
    expect(store.get("e1")).toMatchObject({
      syncStatus: "Synced",
      syncedAt: 12_000,
      updatedAt: 12_000,
    });
    expect(store.listPending({ maxAttempts: MAX_ATTEMPTS })).toEqual([]);
  });

  it("should ignore marks that the current status does not allow", () => {
    store.append(newEvent("e1", 1000));
    store.markSynced("e1");

    expect(store.markSyncing("e1")).toBe(false);
    expect(store.markFailed("e1", "late failure", { permanent: false, nextAttemptAt: null })).toBe(
      false,
    );
    expect(store.markSynced("e1")).toBe(false);
    expect(store.markSynced("missing")).toBe(false);
    expect(store.get("e1")).toMatchObject({ syncStatus: "Synced", attempts: 0 });
  });

  it("should count attempts and keep retryable failures in the queue", () => {
    store.append(newEvent("e1", 1000));
    store.markSyncing("e1");
    store.markFailed("e1", "timeout", { permanent: false, nextAttemptAt: 15_000 });

    expect(store.get("e1")).toMatchObject({
      syncStatus: "Failed",
      attempts: 1,
      lastError: "timeout",
      nextAttemptAt: 15_000,
      permanent: false,
    });
    expect(store.listPending({ maxAttempts: MAX_ATTEMPTS }).map((e) => e.eventId)).toEqual([
      "e1",
    ]);
  });

  it("should stop handing out an event after the maximum attempts", () => {
    store.append(newEvent("e1", 1000));
    store.append(newEvent("e2", 2000));
    for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt += 1) {
      store.markSyncing("e1");
      store.markFailed("e1", "server error", { permanent: false, nextAttemptAt: null });
    }

    expect(store.get("e1")?.attempts).toBe(MAX_ATTEMPTS);
    expect(store.listPending({ maxAttempts: MAX_ATTEMPTS }).map((e) => e.eventId)).toEqual([
      "e2",
    ]);
    expect(store.countPending(MAX_ATTEMPTS)).toBe(1);
    expect(store.listFailed(MAX_ATTEMPTS).map((e) => e.eventId)).toEqual(["e1"]);
  });

  it("should never hand out a permanently rejected event", () => {
    store.append(newEvent("e1", 1000));
    store.markSyncing("e1");
    store.markFailed("e1", "unregistered person", { permanent: true, nextAttemptAt: 99 });

    expect(store.get("e1")).toMatchObject({
      syncStatus: "Failed",
      permanent: true,
      attempts: 1,
      nextAttemptAt: null,
    });
    expect(store.listPending({ maxAttempts: MAX_ATTEMPTS })).toEqual([]);
    expect(store.listFailed(MAX_ATTEMPTS).map((e) => e.eventId)).toEqual(["e1"]);
  });

  it("should requeue a failed event with a clean slate", () => {
    store.append(newEvent("e1", 1000));
    store.markSyncing("e1");
    store.markFailed("e1", "unregistered person", { permanent: true, nextAttemptAt: null });

    expect(store.requeue("e1")).toBe(true);
    expect(store.get("e1")).toMatchObject({
      syncStatus: "Pending",
      attempts: 0,
      permanent: false,
      lastError: null,
    });
    expect(store.requeue("e1")).toBe(false);
  });

  it("should return rows left in Syncing to Pending", () => {
    store.append(newEvent("e1", 1000));
    store.append(newEvent("e2", 2000));
    store.markSyncing("e1");

    expect(store.recoverInterrupted()).toBe(1);
    expect(store.get("e1")?.syncStatus).toBe("Pending");
    expect(store.recoverInterrupted()).toBe(0);
  });

  it("should release only a claimed event back to Pending", () => {
    store.append(newEvent("e1", 1000));

    expect(store.releaseSyncing("e1")).toBe(false);
    store.markSyncing("e1");
    expect(store.releaseSyncing("e1")).toBe(true);
    expect(store.get("e1")).toMatchObject({ syncStatus: "Pending", attempts: 0 });
    expect(store.countPending(8)).toBe(1);
  });

  it("should clear backoff only on retryable failures", () => {
    store.append(newEvent("retry", 1000));
    store.append(newEvent("rejected", 2000));
    store.markSyncing("retry");
    store.markFailed("retry", "timeout", { permanent: false, nextAttemptAt: 50_000 });
    store.markSyncing("rejected");
    store.markFailed("rejected", "bad request", { permanent: true, nextAttemptAt: null });

    expect(store.resetBackoff()).toBe(1);
    expect(store.get("retry")?.nextAttemptAt).toBeNull();
  });

  it("should prune only synced events older than the cutoff", () => {
    store.append(newEvent("old-synced", 1000));
    store.append(newEvent("old-pending", 1500));
    store.append(newEvent("new-synced", 8000));
    store.markSynced("old-synced");
    store.markSynced("new-synced");

    expect(store.pruneSynced(5000)).toBe(1);
    expect(store.get("old-synced")).toBeNull();
    expect(store.get("old-pending")?.syncStatus).toBe("Pending");
    expect(store.get("new-synced")?.syncStatus).toBe("Synced");
  });

  it("should persist and reload person cooldowns", () => {
    store.saveCooldown({ personId: "P1", lastDecisionAt: 100, lastDecisionWindow: "w1" });
    store.saveCooldown({ personId: "P1", lastDecisionAt: 200, lastDecisionWindow: "w2" });
    store.saveCooldown({ personId: "P2", lastDecisionAt: 300, lastDecisionWindow: "w2" });

    expect(
      [...store.loadCooldowns()].sort((a, b) => a.personId.localeCompare(b.personId)),
    ).toEqual([
      { personId: "P1", lastDecisionAt: 200, lastDecisionWindow: "w2" },
      { personId: "P2", lastDecisionAt: 300, lastDecisionWindow: "w2" },
    ]);
  });

  it("should wrap failures after close in a StoreError", () => {
    store.close();

    expect(store.isClosed()).toBe(true);
    expect(() => store.append(newEvent("e1", 1000))).toThrowError(StoreError);
    try {
      store.get("e1");
    } catch (error) {
      expect(error instanceof StoreError && error.operation).toBe("read");
    }
    // Closing twice is harmless.
    store.close();
  });
});
