import { VisionInputError } from "../errors";
import type {
  BoundingBox,
  DetectionFrame,
  FaceDetection,
  FaceMatch,
} from "../types/detection";

/**
 * Shape the vision provider hands over before normalisation. `personId` is
 * null/absent for faces it could not match; `bbox` may be an object or the
 * `[x1, y1, x2, y2]` corner tuple.
 */
export type RawFaceDetection = {
  trackId: string | number;
  bbox: BoundingBox | readonly [number, number, number, number];
  personId?: string | number | null;
  confidence: number;
};

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isFiniteNumber = (value: unknown): value is number =>
  typeof value === "number" && Number.isFinite(value);

const parseBbox = (value: unknown): BoundingBox | null => {
  if (Array.isArray(value)) {
    if (value.length !== 4) {
      return null;
    }
    const [x1, y1, x2, y2]: unknown[] = value;
    if (
      !isFiniteNumber(x1) ||
      !isFiniteNumber(y1) ||
      !isFiniteNumber(x2) ||
      !isFiniteNumber(y2) ||
      x2 < x1 ||
      y2 < y1
    ) {
      return null;
    }
    return { x: x1, y: y1, width: x2 - x1, height: y2 - y1 };
  }

  if (!isRecord(value)) {
    return null;
  }

  const { x, y, width, height } = value;
  if (
    !isFiniteNumber(x) ||
    !isFiniteNumber(y) ||
    !isFiniteNumber(width) ||
    !isFiniteNumber(height) ||
    width < 0 ||
    height < 0
  ) {
    return null;
  }
  return { x, y, width, height };
};

const parseTrackId = (value: unknown): string | null => {
  if (typeof value === "string" && value.trim().length > 0) {
    return value;
  }
  if (isFiniteNumber(value)) {
    return String(value);
  }
  return null;
};

const parseMatch = (value: unknown): FaceMatch | null => {
  if (value === null || value === undefined) {
    return { kind: "unknown" };
  }
  if (typeof value === "string") {
    return value.trim().length > 0
      ? { kind: "person", personId: value }
      : { kind: "unknown" };
  }
  if (isFiniteNumber(value)) {
    return { kind: "person", personId: String(value) };
  }
  return null;
};

const parseDetection = (
  value: unknown,
  index: number,
  issues: string[],
): FaceDetection | null => {
  if (!isRecord(value)) {
    issues.push(`detection[${index}] is not an object`);
    return null;
  }

  const trackId = parseTrackId(value.trackId);
  const bbox = parseBbox(value.bbox);
  const match = parseMatch(value.personId);
  const { confidence } = value;

  const before = issues.length;
  if (trackId === null) {
    issues.push(`detection[${index}].trackId is missing`);
  }
  if (bbox === null) {
    issues.push(`detection[${index}].bbox is invalid`);
  }
  if (match === null) {
    issues.push(`detection[${index}].personId has an unsupported type`);
  }
  if (!isFiniteNumber(confidence) || confidence < 0 || confidence > 1) {
    issues.push(`detection[${index}].confidence must be within 0..1`);
  }

  if (
    issues.length > before ||
    trackId === null ||
    bbox === null ||
    match === null ||
    !isFiniteNumber(confidence)
  ) {
    return null;
  }

  return { trackId, bbox, confidence, match };
};

/**
 * Normalises one frame of provider output. A non-array payload, or any
 * malformed entry, rejects the whole frame with a VisionInputError; an empty
 * array is a valid frame with no faces.
 */
export const parseDetectionFrame = (
  detections: unknown,
  capturedAt: number,
): DetectionFrame => {
  const issues: string[] = [];

  if (!isFiniteNumber(capturedAt)) {
    issues.push("capturedAt must be a finite timestamp");
  }

  if (!Array.isArray(detections)) {
    issues.push("detections must be an array");
    throw new VisionInputError(issues);
  }

  const parsed: FaceDetection[] = [];
  const seen = new Set<string>();
  detections.forEach((entry: unknown, index) => {
    const detection = parseDetection(entry, index, issues);
    if (!detection) {
      return;
    }
    if (seen.has(detection.trackId)) {
      issues.push(`detection[${index}].trackId "${detection.trackId}" is duplicated`);
      return;
    }
    seen.add(detection.trackId);
    parsed.push(detection);
  });

  if (issues.length > 0) {
    throw new VisionInputError(issues);
  }

  return { capturedAt, detections: parsed };
};
