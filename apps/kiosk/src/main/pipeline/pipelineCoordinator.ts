import { EventEmitter } from "node:events";
import type { FaceTracker, FrameResult } from "../../recognition/tracking/face-tracker";
import {
  type BackendRejectionError,
  VisionInputError,
} from "../../shared/errors";
import { getLogger, toErrorPayload } from "../../shared/logger";
import { type Clock, delay, systemClock } from "../../shared/time";
import type {
  AttendanceDecision,
  AttendanceEvent,
  SyncStatusSnapshot,
} from "../../shared/types/attendance";
import type { ConnectivityChange } from "../../shared/types/connectivity";
import type {
  FaceTrackSnapshot,
  VisionProvider,
} from "../../shared/types/detection";
import { parseDetectionFrame } from "../../shared/validation/detectionFrame";
import type { ConnectivityMonitor } from "../connectivity/connectivityMonitor";
import type { AttendanceEventStore } from "../database/attendanceEventRepository";
import type { SyncManager } from "../sync/syncManager";
import { FrameGovernor } from "./frameGovernor";
import { GreetingGate } from "./greetingGate";

export type PipelineStore = Pick<
  AttendanceEventStore,
  "recoverInterrupted" | "pruneSynced" | "close"
>;

export type ErrorReporter = (
  error: unknown,
  context: Record<string, unknown>,
) => void;

export type PipelineCoordinatorOptions = {
  tracker: FaceTracker;
  store: PipelineStore;
  monitor: ConnectivityMonitor;
  syncManager: SyncManager;
  governor?: FrameGovernor;
  greetingCooldownMs: number;
  retentionDays: number;
  shutdownGraceMs: number;
  reportError?: ErrorReporter;
  clock?: Clock;
};

type PipelineEvents = {
  decision: [AttendanceDecision];
  /** A decision worth voicing; already deduplicated. */
  greeting: [AttendanceDecision];
  trackExpired: [FaceTrackSnapshot];
  syncStatus: [SyncStatusSnapshot];
  /** The backend refused an event for good; it stays Failed locally. */
  syncRejected: [AttendanceEvent, BackendRejectionError];
  connectivity: [ConnectivityChange];
  saveFailed: [AttendanceDecision, unknown];
};

const DAY_MS = 24 * 60 * 60 * 1000;

const logger = getLogger("pipeline-coordinator", "app");

/**
 * Owns the frame path and the lifecycle of the background loops. Frames are
 * handled synchronously; the monitor and the sync manager run on their own
 * timers and never block a frame.
 */
export class PipelineCoordinator extends EventEmitter<PipelineEvents> {
  private readonly options: PipelineCoordinatorOptions;

  private readonly clock: Clock;

  private readonly governor: FrameGovernor;

  private readonly greetings: GreetingGate;

  private paused = false;

  private running = false;

  private readonly forwardSyncStatus = (status: SyncStatusSnapshot): void => {
    this.emit("syncStatus", status);
  };

  private readonly forwardRejection = (
    event: AttendanceEvent,
    error: BackendRejectionError,
  ): void => {
    this.emit("syncRejected", event, error);
  };

  private readonly forwardConnectivity = (change: ConnectivityChange): void => {
    this.emit("connectivity", change);
  };

  constructor(options: PipelineCoordinatorOptions) {
    super();
    this.options = options;
    this.clock = options.clock ?? systemClock;
    this.governor = options.governor ?? new FrameGovernor();
    this.greetings = new GreetingGate(options.greetingCooldownMs);
  }

  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    this.running = true;

    this.options.store.recoverInterrupted();
    this.options.store.pruneSynced(
      this.clock() - this.options.retentionDays * DAY_MS,
    );

    this.options.syncManager.on("status", this.forwardSyncStatus);
    this.options.syncManager.on("rejected", this.forwardRejection);
    this.options.monitor.on("stateChange", this.forwardConnectivity);

    this.options.syncManager.start();
    const state = await this.options.monitor.start();
    logger.info(`Pipeline started; backend ${state}`);
  }

  /**
   * Stops the sync loop, then the monitor, then closes the store. Each
   * network step is bounded by `shutdownGraceMs`.
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;

    await this.options.syncManager.stop();

    const controller = new AbortController();
    await Promise.race([
      this.options.monitor.stop(),
      delay(this.options.shutdownGraceMs, controller.signal),
    ]);
    controller.abort();

    this.options.syncManager.off("status", this.forwardSyncStatus);
    this.options.syncManager.off("rejected", this.forwardRejection);
    this.options.monitor.off("stateChange", this.forwardConnectivity);

    this.options.tracker.reset();
    this.options.store.close();
    logger.info("Pipeline stopped");
  }

  pause(): void {
    if (this.paused) {
      return;
    }
    this.paused = true;
    this.options.tracker.reset();
    this.governor.reset();
    logger.info("Scanning paused");
  }

  resume(): void {
    if (!this.paused) {
      return;
    }
    this.paused = false;
    logger.info("Scanning resumed");
  }

  isPaused(): boolean {
    return this.paused;
  }

  getActiveTracks(): FaceTrackSnapshot[] {
    return this.options.tracker.getActiveTracks();
  }

  /** Runs the provider on a captured frame and feeds its output through. */
  processCapture<TFrame>(
    provider: VisionProvider<TFrame>,
    frame: TFrame,
    capturedAt: number = this.clock(),
  ): FrameResult | null {
    if (!this.running || this.paused || !this.governor.shouldProcess(capturedAt)) {
      return null;
    }
    let detections: unknown;
    try {
      detections = provider.detect(frame);
    } catch (error) {
      logger.warn("Vision provider failed; frame skipped", toErrorPayload(error));
      return null;
    }
    return this.processFrame(detections, capturedAt);
  }

  /**
   * Validates one frame of provider output and runs decisioning on it.
   * Returns null when the frame was skipped: not started, paused, rate
   * limited or malformed.
   */
  processFrame(detections: unknown, capturedAt: number = this.clock()): FrameResult | null {
    if (!this.running || this.paused || !this.governor.admit(capturedAt)) {
      return null;
    }

    let result: FrameResult;
    try {
      result = this.options.tracker.processFrame(
        parseDetectionFrame(detections, capturedAt),
      );
    } catch (error) {
      if (error instanceof VisionInputError) {
        logger.warn("Malformed detection frame skipped", { issues: error.issues });
        return null;
      }
      throw error;
    }

    result.expired.forEach((snapshot) => {
      this.emit("trackExpired", snapshot);
    });

    let appended = false;
    result.decisions.forEach((decision) => {
      if (decision.event) {
        appended = true;
      }
      this.emit("decision", decision);
      if (this.greetings.shouldGreet(decision, decision.decidedAt)) {
        this.emit("greeting", decision);
      }
    });

    result.saveFailures.forEach(({ trackId, error }) => {
      const decision = result.decisions.find(
        (candidate) => candidate.trackId === trackId,
      );
      if (!decision) {
        return;
      }
      this.options.reportError?.(error, {
        scope: "attendance:append",
        trackId,
        personId: decision.personId,
      });
      this.emit("saveFailed", decision, error);
    });

    if (appended) {
      this.options.syncManager.notifyAppended();
    }

    return result;
  }
}
