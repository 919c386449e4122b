export type AttendanceKind = "IN" | "OUT" | "UNKNOWN";

export type SyncStatus = "Pending" | "Syncing" | "Synced" | "Failed";

export type AttendanceEvent = {
  eventId: string;
  personId: string | null;
  deviceId: string;
  /** Capture time, ms since epoch. Never changes after creation. */
  occurredAt: number;
  kind: AttendanceKind;
  window: string | null;
  confidence: number | null;
  syncStatus: SyncStatus;
  attempts: number;
  lastError: string | null;
  nextAttemptAt: number | null;
  permanent: boolean;
  createdAt: number;
  updatedAt: number;
  syncedAt: number | null;
};

export type NewAttendanceEvent = Pick<
  AttendanceEvent,
  | "eventId"
  | "personId"
  | "deviceId"
  | "occurredAt"
  | "kind"
  | "window"
  | "confidence"
>;

export type DecisionOutcome =
  | "recorded"
  | "duplicate"
  | "unknown"
  | "outside-window"
  | "not-saved";

export type AttendanceDecision = {
  trackId: string;
  personId: string | null;
  outcome: DecisionOutcome;
  kind: AttendanceKind | null;
  window: string | null;
  decidedAt: number;
  event: AttendanceEvent | null;
};

export type PersonCooldownEntry = {
  personId: string;
  lastDecisionAt: number;
  lastDecisionWindow: string;
};

export type SyncErrorCategory = "rejected" | "transient" | "store";

export type SyncLastError = {
  category: SyncErrorCategory;
  message: string;
  eventId: string | null;
  status: number | null;
};

export type SyncStatusSnapshot = {
  pendingCount: number;
  lastError: SyncLastError | null;
};
