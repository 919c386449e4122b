export type BoundingBox = {
  x: number;
  y: number;
  width: number;
  height: number;
};

export type FaceMatch =
  | { kind: "person"; personId: string }
  | { kind: "unknown" };

/** One face reported by the vision provider in a single frame. */
export type FaceDetection = {
  trackId: string;
  bbox: BoundingBox;
  /** Identification confidence in the 0..1 range. */
  confidence: number;
  match: FaceMatch;
};

export type DetectionFrame = {
  /** Capture time of the frame, ms since epoch. */
  capturedAt: number;
  detections: FaceDetection[];
};

/**
 * Contract of the external vision provider: one synchronous call per frame.
 * The output is untrusted and goes through `parseDetectionFrame`.
 */
export interface VisionProvider<TFrame = unknown> {
  detect(frame: TFrame): unknown;
}

export type TrackStatus =
  | "Scanning"
  | "Verifying"
  | "Recognized"
  | "Unknown"
  | "Expired";

export type FaceTrackSnapshot = {
  trackId: string;
  status: TrackStatus;
  candidatePersonId: string | null;
  confidenceHistory: number[];
  firstSeenAt: number;
  lastSeenAt: number;
  verifyingSince: number | null;
  lastBbox: BoundingBox;
};
