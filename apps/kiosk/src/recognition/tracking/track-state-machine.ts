import type {
  BoundingBox,
  FaceDetection,
  FaceTrackSnapshot,
  TrackStatus,
} from "../../shared/types/detection";
import type { VerificationConfig } from "../config/recognition-config";

export type TrackTransitionEvent = {
  trackId: string;
  from: TrackStatus;
  to: TrackStatus;
  timestamp: number;
  snapshot: FaceTrackSnapshot;
};

export type FaceTrackMachineOptions = {
  trackId: string;
  config: VerificationConfig;
  firstSeenAt: number;
  bbox: BoundingBox;
  onTransition?: (event: TrackTransitionEvent) => void;
};

export type TrackObservation = {
  /** True only on the frame where the track reached Recognized or Unknown. */
  resolved: boolean;
  snapshot: FaceTrackSnapshot;
};

const STATUS_RANK: Record<TrackStatus, number> = {
  Scanning: 0,
  Verifying: 1,
  Recognized: 2,
  Unknown: 2,
  Expired: 3,
};

export const isResolvedStatus = (status: TrackStatus): boolean =>
  status === "Recognized" || status === "Unknown";

/**
 * Debouncing automaton for one continuously tracked face. Every frame that
 * reports the track is folded in through `observe`; the status only moves
 * forward (Scanning → Verifying → Recognized | Unknown → Expired).
 */
export class FaceTrackMachine {
  readonly trackId: string;

  private readonly config: VerificationConfig;

  private readonly onTransition?: (event: TrackTransitionEvent) => void;

  private status: TrackStatus = "Scanning";

  private candidatePersonId: string | null = null;

  // null entries are frames that did not vote (low confidence or no match)
  private votes: Array<string | null> = [];

  private confidenceHistory: number[] = [];

  private readonly firstSeenAt: number;

  private lastSeenAt: number;

  private verifyingSince: number | null = null;

  private lastBbox: BoundingBox;

  constructor(options: FaceTrackMachineOptions) {
    this.trackId = options.trackId;
    this.config = { ...options.config };
    this.onTransition = options.onTransition;
    this.firstSeenAt = options.firstSeenAt;
    this.lastSeenAt = options.firstSeenAt;
    this.lastBbox = { ...options.bbox };
  }

  getStatus(): TrackStatus {
    return this.status;
  }

  getLastSeenAt(): number {
    return this.lastSeenAt;
  }

  observe(detection: FaceDetection, timestamp: number): TrackObservation {
    const at = Math.max(timestamp, this.lastSeenAt);
    this.lastSeenAt = at;
    this.lastBbox = { ...detection.bbox };
    this.pushBounded(this.confidenceHistory, detection.confidence);

    if (isResolvedStatus(this.status) || this.status === "Expired") {
      return { resolved: false, snapshot: this.getSnapshot() };
    }

    const vote =
      detection.match.kind === "person" &&
      detection.confidence >= this.config.threshold
        ? detection.match.personId
        : null;

    if (this.status === "Scanning") {
      if (vote === null) {
        if (at - this.firstSeenAt > this.config.timeoutMs) {
          this.transition("Unknown", at);
          return { resolved: true, snapshot: this.getSnapshot() };
        }
        return { resolved: false, snapshot: this.getSnapshot() };
      }
      this.verifyingSince = at;
      this.votes = [];
      this.transition("Verifying", at);
    }

    this.castVote(vote);

    const leader = this.currentCandidate();
    if (leader !== null && this.countVotes(leader) >= this.config.requiredVotes) {
      this.candidatePersonId = leader;
      this.transition("Recognized", at);
      return { resolved: true, snapshot: this.getSnapshot() };
    }

    const since = this.verifyingSince ?? this.firstSeenAt;
    if (at - since > this.config.timeoutMs) {
      this.transition("Unknown", at);
      return { resolved: true, snapshot: this.getSnapshot() };
    }

    return { resolved: false, snapshot: this.getSnapshot() };
  }

  /**
   * Gives up on a track that never cast a vote, e.g. a face that left before
   * the verify timeout. Any other status is left alone.
   */
  abandon(timestamp: number): TrackObservation {
    if (this.status !== "Scanning") {
      return { resolved: false, snapshot: this.getSnapshot() };
    }
    this.transition("Unknown", Math.max(timestamp, this.lastSeenAt));
    return { resolved: true, snapshot: this.getSnapshot() };
  }

  expire(timestamp: number): FaceTrackSnapshot {
    if (this.status !== "Expired") {
      this.transition("Expired", Math.max(timestamp, this.lastSeenAt));
    }
    return this.getSnapshot();
  }

  getSnapshot(): FaceTrackSnapshot {
    return {
      trackId: this.trackId,
      status: this.status,
      candidatePersonId: this.candidatePersonId,
      confidenceHistory: [...this.confidenceHistory],
      firstSeenAt: this.firstSeenAt,
      lastSeenAt: this.lastSeenAt,
      verifyingSince: this.verifyingSince,
      lastBbox: { ...this.lastBbox },
    };
  }

  private castVote(vote: string | null): void {
    const candidate = this.currentCandidate();
    if (vote !== null && candidate !== null && vote !== candidate) {
      // Disagreement restarts the count for the new candidate.
      this.votes = [vote];
      return;
    }
    this.pushBounded(this.votes, vote);
  }

  private currentCandidate(): string | null {
    return this.votes.find((vote): vote is string => vote !== null) ?? null;
  }

  private countVotes(personId: string): number {
    return this.votes.filter((vote) => vote === personId).length;
  }

  private pushBounded<T>(buffer: T[], value: T): void {
    buffer.push(value);
    if (buffer.length > this.config.windowSize) {
      buffer.splice(0, buffer.length - this.config.windowSize);
    }
  }

  private transition(to: TrackStatus, timestamp: number): void {
    const from = this.status;
    if (STATUS_RANK[to] <= STATUS_RANK[from]) {
      return;
    }
    this.status = to;
    this.onTransition?.({
      trackId: this.trackId,
      from,
      to,
      timestamp,
      snapshot: this.getSnapshot(),
    });
  }
}
