import { EventEmitter } from "node:events";
import {
  BackendRejectionError,
  NetworkTransientError,
} from "../../shared/errors";
import { getLogger, toErrorPayload } from "../../shared/logger";
import { type Clock, delay, systemClock, unrefIfPossible } from "../../shared/time";
import type {
  AttendanceEvent,
  SyncLastError,
  SyncStatusSnapshot,
} from "../../shared/types/attendance";
import type { ConnectivityChange } from "../../shared/types/connectivity";
import type { ConnectivityMonitor } from "../connectivity/connectivityMonitor";
import type { AttendanceEventStore } from "../database/attendanceEventRepository";
import type { AttendanceBackend } from "./backendClient";
import { RetryBackoff } from "./backoff";

type TimerHandle = ReturnType<typeof setTimeout>;

export type SyncEventStore = Pick<
  AttendanceEventStore,
  | "listPending"
  | "countPending"
  | "markSyncing"
  | "markSynced"
  | "markFailed"
  | "releaseSyncing"
  | "recoverInterrupted"
  | "resetBackoff"
>;

export type SyncManagerOptions = {
  store: SyncEventStore;
  backend: AttendanceBackend;
  monitor: ConnectivityMonitor;
  syncIntervalMs: number;
  maxAttempts: number;
  backoffBaseMs: number;
  backoffCapMs: number;
  shutdownGraceMs: number;
  clock?: Clock;
};

type SyncManagerEvents = {
  status: [SyncStatusSnapshot];
  rejected: [AttendanceEvent, BackendRejectionError];
};

type DeliveryResult = "synced" | "skipped" | "rejected" | "retry-later";

const logger = getLogger("sync-manager", "network");

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Delivers stored events to the backend one at a time in capture order.
 * Runs are triggered by connectivity settling on Online, by the sync
 * interval, and by new appends; overlapping triggers coalesce into one
 * follow-up run.
 */
export class SyncManager extends EventEmitter<SyncManagerEvents> {
  private readonly options: SyncManagerOptions;

  private readonly clock: Clock;

  private readonly backoff: RetryBackoff;

  private intervalTimer: ReturnType<typeof setInterval> | null = null;

  private wakeTimer: TimerHandle | null = null;

  private currentRun: Promise<void> | null = null;

  private rerunRequested = false;

  private started = false;

  private stopping = false;

  private lastSettled: "Online" | "Offline" = "Offline";

  private lastError: SyncLastError | null = null;

  private readonly handleConnectivity = (change: ConnectivityChange): void => {
    this.onConnectivityChange(change);
  };

  constructor(options: SyncManagerOptions) {
    super();
    this.options = options;
    this.clock = options.clock ?? systemClock;
    this.backoff = new RetryBackoff(options.backoffBaseMs, options.backoffCapMs);
  }

  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;
    this.stopping = false;
    const state = this.options.monitor.getState();
    if (state === "Online" || state === "Offline") {
      this.lastSettled = state;
    }
    this.options.monitor.on("stateChange", this.handleConnectivity);

    this.intervalTimer = setInterval(() => {
      if (this.options.monitor.getState() === "Online") {
        void this.requestRun();
      }
    }, this.options.syncIntervalMs);
    unrefIfPossible(this.intervalTimer);

    if (this.options.monitor.getState() === "Online") {
      void this.requestRun();
    }
  }

  /**
   * Stops triggering runs and waits up to `shutdownGraceMs` for the event
   * currently being sent.
   */
  async stop(): Promise<void> {
    if (!this.started) {
      return;
    }
    this.started = false;
    this.stopping = true;
    this.options.monitor.off("stateChange", this.handleConnectivity);
    if (this.intervalTimer) {
      clearInterval(this.intervalTimer);
      this.intervalTimer = null;
    }
    this.clearWakeTimer();

    const run = this.currentRun;
    if (!run) {
      return;
    }

    const controller = new AbortController();
    let finished = false;
    await Promise.race([
      run.then(() => {
        finished = true;
      }),
      delay(this.options.shutdownGraceMs, controller.signal),
    ]);
    controller.abort();
    if (!finished) {
      logger.warn(
        `Sync still in flight after ${this.options.shutdownGraceMs}ms; leaving it to recovery on next start`,
      );
    }
  }

  /** Called after the decisioning path appended an event. */
  notifyAppended(): void {
    if (this.started && this.options.monitor.getState() === "Online") {
      void this.requestRun();
      return;
    }
    this.publishStatus();
  }

  /**
   * Starts a run, or marks the running one to go again once it finishes.
   * The returned promise settles when the current drain is over.
   */
  requestRun(): Promise<void> {
    if (this.stopping) {
      return Promise.resolve();
    }
    if (this.currentRun) {
      this.rerunRequested = true;
      return this.currentRun;
    }
    const run = this.drain().finally(() => {
      this.currentRun = null;
    });
    this.currentRun = run;
    return run;
  }

  getStatus(): SyncStatusSnapshot {
    return {
      pendingCount: this.safeCountPending(),
      lastError: this.lastError ? { ...this.lastError } : null,
    };
  }

  private async drain(): Promise<void> {
    do {
      this.rerunRequested = false;
      await this.runOnce();
    } while (
      this.rerunRequested &&
      !this.stopping &&
      this.options.monitor.getState() !== "Offline"
    );
  }

  private async runOnce(): Promise<void> {
    try {
      // Nothing is in flight between runs, so any Syncing row is stranded.
      this.options.store.recoverInterrupted();
      const pending = this.options.store.listPending({
        maxAttempts: this.options.maxAttempts,
      });

      for (const event of pending) {
        if (this.stopping || this.options.monitor.getState() === "Offline") {
          break;
        }

        const now = this.clock();
        if (event.nextAttemptAt !== null && event.nextAttemptAt > now) {
          // Later events wait behind the head so delivery stays in order.
          this.scheduleWake(event.nextAttemptAt - now);
          break;
        }

        const result = await this.deliver(event);
        if (result === "retry-later") {
          break;
        }
      }
    } catch (error) {
      this.recordStoreFailure(error);
      this.scheduleWake(this.backoff.peek());
    } finally {
      this.publishStatus();
    }
  }

  private async deliver(event: AttendanceEvent): Promise<DeliveryResult> {
    if (!this.options.store.markSyncing(event.eventId)) {
      // Already moved on (synced or rejected elsewhere).
      return "skipped";
    }

    try {
      return await this.sendClaimed(event);
    } catch (error) {
      this.releaseClaim(event.eventId);
      throw error;
    }
  }

  private releaseClaim(eventId: string): void {
    try {
      this.options.store.releaseSyncing(eventId);
    } catch (error) {
      logger.error("Could not release claimed event; next run recovers it", {
        eventId,
        ...toErrorPayload(error),
      });
    }
  }

  private async sendClaimed(event: AttendanceEvent): Promise<DeliveryResult> {
    try {
      await this.options.backend.postAttendance(event);
    } catch (error) {
      return this.handleDeliveryFailure(event, error);
    }

    this.options.store.markSynced(event.eventId);
    this.backoff.reset();
    // Rejections stay visible to the admin side until something else fails.
    if (this.lastError?.category !== "rejected") {
      this.lastError = null;
    }
    logger.info("Attendance event synced", {
      eventId: event.eventId,
      attempts: event.attempts + 1,
    });
    return "synced";
  }

  private handleDeliveryFailure(event: AttendanceEvent, error: unknown): DeliveryResult {
    if (error instanceof BackendRejectionError) {
      this.options.store.markFailed(event.eventId, error.message, {
        permanent: true,
        nextAttemptAt: null,
      });
      this.lastError = {
        category: "rejected",
        message: error.detail,
        eventId: event.eventId,
        status: error.status,
      };
      logger.error("Backend rejected attendance event", {
        eventId: event.eventId,
        personId: event.personId,
        status: error.status,
        detail: error.detail,
      });
      this.emit("rejected", event, error);
      return "rejected";
    }

    const delayMs = this.backoff.nextDelay();
    const attempts = event.attempts + 1;
    this.options.store.markFailed(event.eventId, describeError(error), {
      permanent: false,
      nextAttemptAt: this.clock() + delayMs,
    });
    this.lastError = {
      category: "transient",
      message: describeError(error),
      eventId: event.eventId,
      status: error instanceof NetworkTransientError ? error.status : null,
    };

    if (attempts >= this.options.maxAttempts) {
      logger.error("Giving up on attendance event after repeated failures", {
        eventId: event.eventId,
        attempts,
      });
    } else {
      logger.warn("Attendance sync failed; will retry", {
        eventId: event.eventId,
        attempts,
        retryInMs: delayMs,
        ...toErrorPayload(error),
      });
    }

    this.scheduleWake(delayMs);
    void this.options.monitor.requestProbe();
    return "retry-later";
  }

  private onConnectivityChange(change: ConnectivityChange): void {
    if (change.state === "Probing") {
      return;
    }

    const reconnected = change.state === "Online" && this.lastSettled === "Offline";
    this.lastSettled = change.state;

    if (change.state === "Offline") {
      this.clearWakeTimer();
      this.publishStatus();
      return;
    }

    if (reconnected) {
      this.backoff.reset();
      try {
        this.options.store.resetBackoff();
      } catch (error) {
        this.recordStoreFailure(error);
      }
    }
    void this.requestRun();
  }

  private scheduleWake(delayMs: number): void {
    this.clearWakeTimer();
    if (this.stopping) {
      return;
    }
    this.wakeTimer = setTimeout(() => {
      this.wakeTimer = null;
      if (this.options.monitor.getState() !== "Offline") {
        void this.requestRun();
      }
    }, Math.max(0, delayMs));
    unrefIfPossible(this.wakeTimer);
  }

  private clearWakeTimer(): void {
    if (this.wakeTimer) {
      clearTimeout(this.wakeTimer);
      this.wakeTimer = null;
    }
  }

  private recordStoreFailure(error: unknown): void {
    this.lastError = {
      category: "store",
      message: describeError(error),
      eventId: null,
      status: null,
    };
    logger.error("Sync run aborted by a store failure", toErrorPayload(error));
  }

  private safeCountPending(): number {
    try {
      return this.options.store.countPending(this.options.maxAttempts);
    } catch (error) {
      logger.warn("Could not count pending events", toErrorPayload(error));
      return 0;
    }
  }

  private publishStatus(): void {
    this.emit("status", this.getStatus());
  }
}
