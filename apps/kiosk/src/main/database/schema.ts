import { integer, real, sqliteTable, text } from "drizzle-orm/sqlite-core";

export const ATTENDANCE_EVENTS_TABLE = "attendance_events" as const;
export const PERSON_COOLDOWNS_TABLE = "person_cooldowns" as const;

export const SYNC_STATUSES = ["Pending", "Syncing", "Synced", "Failed"] as const;
export const ATTENDANCE_KINDS = ["IN", "OUT", "UNKNOWN"] as const;

export const attendanceEvents = sqliteTable(ATTENDANCE_EVENTS_TABLE, {
  // Insertion order, used to break occurredAt ties.
  seq: integer("seq").primaryKey({ autoIncrement: true }),
  eventId: text("event_id").notNull().unique(),
  personId: text("person_id"),
  deviceId: text("device_id").notNull(),
  occurredAt: integer("occurred_at").notNull(),
  kind: text("kind", { enum: ATTENDANCE_KINDS }).notNull(),
  windowKey: text("window_key"),
  confidence: real("confidence"),
  syncStatus: text("sync_status", { enum: SYNC_STATUSES })
    .notNull()
    .default("Pending"),
  attempts: integer("attempts").notNull().default(0),
  lastError: text("last_error"),
  nextAttemptAt: integer("next_attempt_at"),
  permanent: integer("permanent", { mode: "boolean" }).notNull().default(false),
  createdAt: integer("created_at").notNull(),
  updatedAt: integer("updated_at").notNull(),
  syncedAt: integer("synced_at"),
});

export type AttendanceEventRow = typeof attendanceEvents.$inferSelect;
export type NewAttendanceEventRow = typeof attendanceEvents.$inferInsert;

export const personCooldowns = sqliteTable(PERSON_COOLDOWNS_TABLE, {
  personId: text("person_id").primaryKey().notNull(),
  lastDecisionAt: integer("last_decision_at").notNull(),
  lastDecisionWindow: text("last_decision_window").notNull(),
});

export type PersonCooldownRow = typeof personCooldowns.$inferSelect;

export const schema = {
  attendanceEvents,
  personCooldowns,
};
