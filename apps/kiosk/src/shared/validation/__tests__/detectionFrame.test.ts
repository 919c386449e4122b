import { describe, expect, it } from "vitest";
import { VisionInputError } from "../../errors";
import { parseDetectionFrame } from "../detectionFrame";

const captureIssues = (detections: unknown, capturedAt = 1000): string[] => {
  try {
    parseDetectionFrame(detections, capturedAt);
  } catch (error) {
    if (error instanceof VisionInputError) {
      return error.issues;
    }
    throw error;
  }
  return [];
};

describe("parseDetectionFrame", () => {
  it("should normalise object and corner-tuple boxes", () => {
    const frame = parseDetectionFrame(
      [
        {
          trackId: 7,
          bbox: [10, 20, 110, 140],
          personId: "P1",
          confidence: 0.91,
        },
        {
          trackId: "t-2",
          bbox: { x: 5, y: 6, width: 30, height: 40 },
          personId: null,
          confidence: 0.2,
        },
      ],
      1000,
    );

    expect(frame).toEqual({
      capturedAt: 1000,
      detections: [
        {
          trackId: "7",
          bbox: { x: 10, y: 20, width: 100, height: 120 },
          confidence: 0.91,
          match: { kind: "person", personId: "P1" },
        },
        {
          trackId: "t-2",
          bbox: { x: 5, y: 6, width: 30, height: 40 },
          confidence: 0.2,
          match: { kind: "unknown" },
        },
      ],
    });
  });

  it("should treat numeric person ids as strings and blank ones as unknown", () => {
    const frame = parseDetectionFrame(
      [
        { trackId: "a", bbox: [0, 0, 1, 1], personId: 42, confidence: 0.9 },
        { trackId: "b", bbox: [0, 0, 1, 1], personId: "  ", confidence: 0.9 },
      ],
      5,
    );

    expect(frame.detections.map((detection) => detection.match)).toEqual([
      { kind: "person", personId: "42" },
      { kind: "unknown" },
    ]);
  });

  it("should accept an empty frame", () => {
    expect(parseDetectionFrame([], 1000)).toEqual({
      capturedAt: 1000,
      detections: [],
    });
  });

  it("should reject a payload that is not an array", () => {
    expect(captureIssues({ trackId: "a" })).toEqual(["detections must be an array"]);
  });

  it("should list every problem in a malformed entry", () => {
    expect(
      captureIssues([{ trackId: "", bbox: [10, 10, 5, 5], personId: {}, confidence: 1.5 }]),
    ).toEqual([
      "detection[0].trackId is missing",
      "detection[0].bbox is invalid",
      "detection[0].personId has an unsupported type",
      "detection[0].confidence must be within 0..1",
    ]);
  });

  it("should reject duplicated track ids", () => {
    expect(
      captureIssues([
        { trackId: "a", bbox: [0, 0, 1, 1], confidence: 0.5 },
        { trackId: "a", bbox: [0, 0, 1, 1], confidence: 0.5 },
      ]),
    ).toEqual(['detection[1].trackId "a" is duplicated']);
  });

  it("should reject a non-finite capture time", () => {
    expect(captureIssues([], Number.NaN)).toEqual([
      "capturedAt must be a finite timestamp",
    ]);
  });

  it("should throw a VisionInputError carrying its code", () => {
    expect(() => parseDetectionFrame("garbage", 0)).toThrowError(VisionInputError);
    try {
      parseDetectionFrame(null, 0);
    } catch (error) {
      expect(error).toBeInstanceOf(VisionInputError);
      expect(error instanceof VisionInputError && error.code).toBe("VISION_INPUT");
    }
  });
});
