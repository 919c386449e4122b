import { and, asc, count, eq, gte, inArray, isNotNull, lt, or, sql } from "drizzle-orm";
import type { SQLiteUpdateSetSource } from "drizzle-orm/sqlite-core";
import { StoreError, type StoreOperation } from "../../shared/errors";
import { getLogger } from "../../shared/logger";
import { type Clock, systemClock } from "../../shared/time";
import type {
  AttendanceEvent,
  NewAttendanceEvent,
  PersonCooldownEntry,
} from "../../shared/types/attendance";
import type { DatabaseHandle } from "./client";
import { type AttendanceEventRow, attendanceEvents, personCooldowns } from "./schema";

const logger = getLogger("attendance-event-repository", "storage");

export type ListPendingOptions = {
  /** Failed events with this many attempts are no longer handed out. */
  maxAttempts: number;
  limit?: number;
};

export type MarkFailedOptions = {
  permanent: boolean;
  nextAttemptAt: number | null;
};

const mapRowToEvent = (row: AttendanceEventRow): AttendanceEvent => ({
  eventId: row.eventId,
  personId: row.personId,
  deviceId: row.deviceId,
  occurredAt: row.occurredAt,
  kind: row.kind,
  window: row.windowKey,
  confidence: row.confidence,
  syncStatus: row.syncStatus,
  attempts: row.attempts,
  lastError: row.lastError,
  nextAttemptAt: row.nextAttemptAt,
  permanent: row.permanent,
  createdAt: row.createdAt,
  updatedAt: row.updatedAt,
  syncedAt: row.syncedAt,
});

/**
 * Local, append-only queue of attendance events. Status changes are guarded
 * conditional updates: a mark from a status that does not allow it, or for an
 * unknown id, changes nothing and returns false.
 */
export class AttendanceEventStore {
  private readonly handle: DatabaseHandle;

  private readonly clock: Clock;

  private closed = false;

  constructor(handle: DatabaseHandle, clock: Clock = systemClock) {
    this.handle = handle;
    this.clock = clock;
  }

  /**
   * Durably inserts a new event. Appending an eventId that already exists
   * returns the stored row unchanged.
   */
  append(event: NewAttendanceEvent): AttendanceEvent {
    return this.execute("append", () => {
      const now = this.clock();
      this.handle.db
        .insert(attendanceEvents)
        .values({
          eventId: event.eventId,
          personId: event.personId,
          deviceId: event.deviceId,
          occurredAt: event.occurredAt,
          kind: event.kind,
          windowKey: event.window,
          confidence: event.confidence,
          syncStatus: "Pending",
          attempts: 0,
          createdAt: now,
          updatedAt: now,
        })
        .onConflictDoNothing({ target: attendanceEvents.eventId })
        .run();

      const stored = this.findRow(event.eventId);
      if (!stored) {
        throw new Error(`event ${event.eventId} missing after insert`);
      }
      return mapRowToEvent(stored);
    });
  }

  get(eventId: string): AttendanceEvent | null {
    return this.execute("read", () => {
      const row = this.findRow(eventId);
      return row ? mapRowToEvent(row) : null;
    });
  }

  /**
   * Events due for delivery in capture order: Pending ones, plus Failed ones
   * that are retryable and still under `maxAttempts`.
   */
  listPending(options: ListPendingOptions): AttendanceEvent[] {
    return this.execute("read", () => {
      const query = this.handle.db
        .select()
        .from(attendanceEvents)
        .where(this.deliverableCondition(options.maxAttempts))
        .orderBy(
          asc(attendanceEvents.occurredAt),
          asc(attendanceEvents.createdAt),
          asc(attendanceEvents.seq),
        );
      const rows =
        options.limit !== undefined ? query.limit(options.limit).all() : query.all();
      return rows.map(mapRowToEvent);
    });
  }

  countPending(maxAttempts: number): number {
    return this.execute("read", () => {
      const row = this.handle.db
        .select({ value: count() })
        .from(attendanceEvents)
        .where(this.deliverableCondition(maxAttempts))
        .get();
      return row?.value ?? 0;
    });
  }

  /** Rejected or exhausted events, oldest first, for admin inspection. */
  listFailed(maxAttempts: number): AttendanceEvent[] {
    return this.execute("read", () =>
      this.handle.db
        .select()
        .from(attendanceEvents)
        .where(
          and(
            eq(attendanceEvents.syncStatus, "Failed"),
            or(
              eq(attendanceEvents.permanent, true),
              gte(attendanceEvents.attempts, maxAttempts),
            ),
          ),
        )
        .orderBy(asc(attendanceEvents.occurredAt), asc(attendanceEvents.seq))
        .all()
        .map(mapRowToEvent),
    );
  }

  markSyncing(eventId: string): boolean {
    return this.transition(eventId, ["Pending", "Failed"], {
      syncStatus: "Syncing",
    });
  }

  markSynced(eventId: string): boolean {
    const now = this.clock();
    return this.transition(eventId, ["Pending", "Syncing", "Failed"], {
      syncStatus: "Synced",
      lastError: null,
      nextAttemptAt: null,
      syncedAt: now,
    });
  }

  markFailed(eventId: string, error: string, options: MarkFailedOptions): boolean {
    return this.transition(eventId, ["Pending", "Syncing"], {
      syncStatus: "Failed",
      attempts: sql`${attendanceEvents.attempts} + 1`,
      lastError: error,
      permanent: options.permanent,
      nextAttemptAt: options.permanent ? null : options.nextAttemptAt,
    });
  }

  /** Hands a claimed event back to the queue untouched. */
  releaseSyncing(eventId: string): boolean {
    return this.transition(eventId, ["Syncing"], { syncStatus: "Pending" });
  }

  /** Operator retry: a Failed event goes back to Pending with a clean slate. */
  requeue(eventId: string): boolean {
    return this.transition(eventId, ["Failed"], {
      syncStatus: "Pending",
      attempts: 0,
      lastError: null,
      nextAttemptAt: null,
      permanent: false,
    });
  }

  /** Rows a crash left in Syncing go back to Pending. */
  recoverInterrupted(): number {
    return this.execute("update", () => {
      const result = this.handle.db
        .update(attendanceEvents)
        .set({ syncStatus: "Pending", updatedAt: this.clock() })
        .where(eq(attendanceEvents.syncStatus, "Syncing"))
        .run();
      if (result.changes > 0) {
        logger.warn(`Recovered ${result.changes} event(s) interrupted mid-sync`);
      }
      return result.changes;
    });
  }

  /** Makes every retryable Failed event immediately eligible again. */
  resetBackoff(): number {
    return this.execute("update", () =>
      this.handle.db
        .update(attendanceEvents)
        .set({ nextAttemptAt: null, updatedAt: this.clock() })
        .where(
          and(
            eq(attendanceEvents.syncStatus, "Failed"),
            eq(attendanceEvents.permanent, false),
            isNotNull(attendanceEvents.nextAttemptAt),
          ),
        )
        .run().changes,
    );
  }

  /** Deletes Synced events captured before `olderThan`. Nothing else is ever deleted. */
  pruneSynced(olderThan: number): number {
    return this.execute("prune", () => {
      const result = this.handle.db
        .delete(attendanceEvents)
        .where(
          and(
            eq(attendanceEvents.syncStatus, "Synced"),
            lt(attendanceEvents.occurredAt, olderThan),
          ),
        )
        .run();
      if (result.changes > 0) {
        logger.info(`Pruned ${result.changes} synced event(s)`);
      }
      return result.changes;
    });
  }

  loadCooldowns(): PersonCooldownEntry[] {
    return this.execute("read", () =>
      this.handle.db
        .select()
        .from(personCooldowns)
        .all()
        .map((row) => ({
          personId: row.personId,
          lastDecisionAt: row.lastDecisionAt,
          lastDecisionWindow: row.lastDecisionWindow,
        })),
    );
  }

  saveCooldown(entry: PersonCooldownEntry): void {
    this.execute("update", () => {
      this.handle.db
        .insert(personCooldowns)
        .values(entry)
        .onConflictDoUpdate({
          target: personCooldowns.personId,
          set: {
            lastDecisionAt: entry.lastDecisionAt,
            lastDecisionWindow: entry.lastDecisionWindow,
          },
        })
        .run();
    });
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.execute("close", () => {
      this.handle.sqlite.close();
    });
    this.closed = true;
  }

  isClosed(): boolean {
    return this.closed;
  }

  private deliverableCondition(maxAttempts: number) {
    return or(
      eq(attendanceEvents.syncStatus, "Pending"),
      and(
        eq(attendanceEvents.syncStatus, "Failed"),
        eq(attendanceEvents.permanent, false),
        lt(attendanceEvents.attempts, maxAttempts),
      ),
    );
  }

  private findRow(eventId: string): AttendanceEventRow | undefined {
    return this.handle.db
      .select()
      .from(attendanceEvents)
      .where(eq(attendanceEvents.eventId, eventId))
      .get();
  }

  private transition(
    eventId: string,
    from: Array<AttendanceEvent["syncStatus"]>,
    changes: SQLiteUpdateSetSource<typeof attendanceEvents>,
  ): boolean {
    return this.execute("update", () => {
      const result = this.handle.db
        .update(attendanceEvents)
        .set({ ...changes, updatedAt: this.clock() })
        .where(
          and(
            eq(attendanceEvents.eventId, eventId),
            inArray(attendanceEvents.syncStatus, from),
          ),
        )
        .run();
      return result.changes > 0;
    });
  }

  private execute<T>(operation: StoreOperation, work: () => T): T {
    try {
      return work();
    } catch (error) {
      logger.error(
        `Event store ${operation} failed: ${
          error instanceof Error ? error.message : "Unknown error"
        }`,
      );
      throw error instanceof StoreError ? error : new StoreError(operation, error);
    }
  }
}
