import { createInterface } from "node:readline";
import type { Readable } from "node:stream";
import { isRecord } from "../shared/validation/detectionFrame";
import { getLogger } from "../shared/logger";

export type FrameLine = {
  detections: unknown;
  capturedAt: number | undefined;
};

const logger = getLogger("frame-source", "capture");

/**
 * Parses one line of vision provider output: either a bare detections array
 * or `{ "capturedAt": <ms>, "detections": [...] }`.
 */
export const parseFrameLine = (line: string): FrameLine | null => {
  const trimmed = line.trim();
  if (trimmed.length === 0) {
    return null;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    logger.warn("Ignoring frame line that is not JSON");
    return null;
  }
  if (Array.isArray(parsed)) {
    return { detections: parsed, capturedAt: undefined };
  }
  if (isRecord(parsed)) {
    const { capturedAt } = parsed;
    return {
      detections: parsed.detections,
      capturedAt: typeof capturedAt === "number" ? capturedAt : undefined,
    };
  }
  return { detections: parsed, capturedAt: undefined };
};

/**
 * Feeds newline-delimited provider output to `onFrame` until the stream ends.
 */
export const consumeFrameLines = async (
  input: Readable,
  onFrame: (frame: FrameLine) => void,
): Promise<void> => {
  const lines = createInterface({ input, crlfDelay: Number.POSITIVE_INFINITY });
  for await (const line of lines) {
    const frame = parseFrameLine(line);
    if (frame) {
      onFrame(frame);
    }
  }
};
