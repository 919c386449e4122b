import { v4 as uuidv4 } from "uuid";
import { getLogger, toErrorPayload } from "../../shared/logger";
import type {
  AttendanceDecision,
  AttendanceEvent,
  AttendanceKind,
  NewAttendanceEvent,
} from "../../shared/types/attendance";
import type {
  DetectionFrame,
  FaceDetection,
  FaceTrackSnapshot,
} from "../../shared/types/detection";
import {
  type RecognitionConfig,
  cloneRecognitionConfig,
} from "../config/recognition-config";
import type { ResolvedWindow, WindowResolver } from "../windows/attendance-window";
import { PersonCooldownRegistry } from "./person-cooldown";
import {
  FaceTrackMachine,
  type TrackTransitionEvent,
} from "./track-state-machine";

/** The part of the durable store the decisioning path writes to. */
export interface AttendanceEventSink {
  append(event: NewAttendanceEvent): AttendanceEvent;
}

export type FaceTrackerOptions = {
  config: RecognitionConfig;
  deviceId: string;
  store: AttendanceEventSink;
  resolveWindow: WindowResolver;
  cooldowns?: PersonCooldownRegistry;
  /** Extra append attempts after the first one fails. */
  appendRetries?: number;
  createEventId?: () => string;
  onTransition?: (event: TrackTransitionEvent) => void;
};

export type FrameResult = {
  decisions: AttendanceDecision[];
  expired: FaceTrackSnapshot[];
  /** Track ids present in the frame but beyond the per-frame face cap. */
  ignored: string[];
  /** Errors from appends that never succeeded, one per `not-saved` decision. */
  saveFailures: Array<{ trackId: string; error: unknown }>;
};

type AppendOutcome =
  | { ok: true; event: AttendanceEvent }
  | { ok: false; error: unknown };

const logger = getLogger("face-tracker", "capture");

/**
 * Holds one FaceTrackMachine per active track and turns resolved tracks into
 * attendance decisions. Frames must be fed one at a time; nothing in here
 * awaits.
 */
export class FaceTracker {
  private readonly config: RecognitionConfig;

  private readonly deviceId: string;

  private readonly store: AttendanceEventSink;

  private readonly resolveWindow: WindowResolver;

  private readonly cooldowns: PersonCooldownRegistry;

  private readonly appendRetries: number;

  private readonly createEventId: () => string;

  private readonly onTransition?: (event: TrackTransitionEvent) => void;

  private readonly tracks = new Map<string, FaceTrackMachine>();

  private lastFrameAt = 0;

  constructor(options: FaceTrackerOptions) {
    this.config = cloneRecognitionConfig(options.config);
    this.deviceId = options.deviceId;
    this.store = options.store;
    this.resolveWindow = options.resolveWindow;
    this.cooldowns = options.cooldowns ?? new PersonCooldownRegistry();
    this.appendRetries = Math.max(0, options.appendRetries ?? 1);
    this.createEventId = options.createEventId ?? uuidv4;
    this.onTransition = options.onTransition;
  }

  processFrame(frame: DetectionFrame): FrameResult {
    const at = Math.max(frame.capturedAt, this.lastFrameAt);
    this.lastFrameAt = at;

    const result: FrameResult = {
      decisions: [],
      expired: [],
      ignored: [],
      saveFailures: [],
    };
    this.expireStaleTracks(at, result);

    const { selected, ignored } = this.selectDetections(frame.detections);
    result.ignored = ignored;

    selected.forEach((detection) => {
      const machine = this.getOrCreateTrack(detection, at);
      const observation = machine.observe(detection, at);
      if (!observation.resolved) {
        return;
      }
      this.collect(result, this.decide(observation.snapshot, detection.confidence, at));
    });

    return result;
  }

  getActiveTracks(): FaceTrackSnapshot[] {
    return [...this.tracks.values()].map((machine) => machine.getSnapshot());
  }

  /** Drops every track without emitting anything, e.g. when scanning pauses. */
  reset(): void {
    this.tracks.clear();
  }

  /**
   * Drops tracks not reported for longer than the expiry. A track that left
   * without ever casting a vote is reported as Unknown first, stamped with
   * the time it was last seen.
   */
  private expireStaleTracks(at: number, result: FrameResult): void {
    this.tracks.forEach((machine, trackId) => {
      const lastSeenAt = machine.getLastSeenAt();
      if (at - lastSeenAt <= this.config.tracking.expiryMs) {
        return;
      }
      const observation = machine.abandon(lastSeenAt);
      if (observation.resolved) {
        const confidence = observation.snapshot.confidenceHistory.at(-1) ?? null;
        this.collect(result, this.decide(observation.snapshot, confidence, lastSeenAt));
      }
      result.expired.push(machine.expire(at));
      this.tracks.delete(trackId);
    });
  }

  private collect(
    result: FrameResult,
    outcome: { decision: AttendanceDecision; error?: unknown },
  ): void {
    result.decisions.push(outcome.decision);
    if (outcome.error !== undefined) {
      result.saveFailures.push({
        trackId: outcome.decision.trackId,
        error: outcome.error,
      });
    }
  }

  private selectDetections(detections: FaceDetection[]): {
    selected: FaceDetection[];
    ignored: string[];
  } {
    const cap = this.config.tracking.maxFacesPerFrame;
    const known = detections.filter((d) => this.tracks.has(d.trackId));
    const fresh = detections.filter((d) => !this.tracks.has(d.trackId));
    const ordered = [...known, ...fresh];
    return {
      selected: ordered.slice(0, cap),
      ignored: ordered.slice(cap).map((d) => d.trackId),
    };
  }

  private getOrCreateTrack(detection: FaceDetection, at: number): FaceTrackMachine {
    const existing = this.tracks.get(detection.trackId);
    if (existing) {
      return existing;
    }
    const machine = new FaceTrackMachine({
      trackId: detection.trackId,
      config: this.config.verification,
      firstSeenAt: at,
      bbox: detection.bbox,
      onTransition: this.onTransition,
    });
    this.tracks.set(detection.trackId, machine);
    return machine;
  }

  private decide(
    snapshot: FaceTrackSnapshot,
    confidence: number | null,
    at: number,
  ): { decision: AttendanceDecision; error?: unknown } {
    const window = this.resolveWindow(at);

    if (snapshot.status === "Unknown" || snapshot.candidatePersonId === null) {
      const outcome = this.appendWithRetry({
        eventId: this.createEventId(),
        personId: null,
        deviceId: this.deviceId,
        occurredAt: at,
        kind: "UNKNOWN",
        window: window?.key ?? null,
        confidence,
      });
      return this.buildDecision(snapshot.trackId, null, at, window, "UNKNOWN", outcome, "unknown");
    }

    const personId = snapshot.candidatePersonId;

    if (!window) {
      logger.debug("Recognised face outside every attendance window", {
        trackId: snapshot.trackId,
        personId,
      });
      return {
        decision: {
          trackId: snapshot.trackId,
          personId,
          outcome: "outside-window",
          kind: null,
          window: null,
          decidedAt: at,
          event: null,
        },
      };
    }

    if (this.cooldowns.isFresh(personId, window, at)) {
      logger.debug("Suppressed duplicate decision inside cooldown", {
        trackId: snapshot.trackId,
        personId,
        window: window.key,
      });
      return {
        decision: {
          trackId: snapshot.trackId,
          personId,
          outcome: "duplicate",
          kind: window.kind,
          window: window.key,
          decidedAt: at,
          event: null,
        },
      };
    }

    const outcome = this.appendWithRetry({
      eventId: this.createEventId(),
      personId,
      deviceId: this.deviceId,
      occurredAt: at,
      kind: window.kind,
      window: window.key,
      confidence,
    });

    if (outcome.ok) {
      try {
        this.cooldowns.record(personId, window, at);
      } catch (error) {
        // The event itself is stored; a lost cooldown row only matters across restarts.
        logger.warn("Failed to persist person cooldown", {
          personId,
          ...toErrorPayload(error),
        });
      }
    }

    return this.buildDecision(snapshot.trackId, personId, at, window, window.kind, outcome, "recorded");
  }

  private buildDecision(
    trackId: string,
    personId: string | null,
    at: number,
    window: ResolvedWindow | null,
    kind: AttendanceKind,
    outcome: AppendOutcome,
    successOutcome: "recorded" | "unknown",
  ): { decision: AttendanceDecision; error?: unknown } {
    const decision: AttendanceDecision = {
      trackId,
      personId,
      outcome: outcome.ok ? successOutcome : "not-saved",
      kind,
      window: window?.key ?? null,
      decidedAt: at,
      event: outcome.ok ? outcome.event : null,
    };
    return outcome.ok ? { decision } : { decision, error: outcome.error };
  }

  private appendWithRetry(event: NewAttendanceEvent): AppendOutcome {
    const attempts = this.appendRetries + 1;
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      try {
        const stored = this.store.append(event);
        logger.info("Attendance event recorded", {
          eventId: stored.eventId,
          personId: stored.personId,
          kind: stored.kind,
          window: stored.window,
        });
        return { ok: true, event: stored };
      } catch (error) {
        lastError = error;
        logger.warn("Attendance event append failed", {
          eventId: event.eventId,
          attempt,
          attempts,
          ...toErrorPayload(error),
        });
      }
    }

    logger.error("Attendance decision could not be saved", {
      eventId: event.eventId,
      personId: event.personId,
      ...toErrorPayload(lastError),
    });
    return { ok: false, error: lastError };
  }
}
