export type FrameGovernorOptions = {
  maxFps?: number;
};

const DEFAULT_MAX_FPS = 30;

// Capture timestamps jitter; a frame up to this share of the interval early still counts.
const JITTER_TOLERANCE = 0.1;

/**
 * Drops frames that arrive faster than `maxFps`, judged on capture time so
 * that bursts delivered late by the camera are thinned the same way.
 */
export class FrameGovernor {
  private readonly frameInterval: number;

  private nextAllowedTime = Number.NEGATIVE_INFINITY;

  constructor({ maxFps = DEFAULT_MAX_FPS }: FrameGovernorOptions = {}) {
    const interval = 1000 / maxFps;
    this.frameInterval =
      Number.isFinite(interval) && interval > 0 ? interval : 1000 / DEFAULT_MAX_FPS;
  }

  shouldProcess(capturedAt: number): boolean {
    return capturedAt >= this.nextAllowedTime;
  }

  /** Returns true and reserves the slot when the frame may be processed. */
  admit(capturedAt: number): boolean {
    if (!this.shouldProcess(capturedAt)) {
      return false;
    }
    this.nextAllowedTime = capturedAt + this.frameInterval * (1 - JITTER_TOLERANCE);
    return true;
  }

  reset(): void {
    this.nextAllowedTime = Number.NEGATIVE_INFINITY;
  }
}
