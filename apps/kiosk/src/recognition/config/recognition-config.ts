export type VerificationConfig = {
  /** Number of recent frames considered when voting on a candidate. */
  windowSize: number;
  /** Votes for a single person needed inside the window to recognise them. */
  requiredVotes: number;
  /** Minimum confidence (0-1) for a frame to count as a vote. */
  threshold: number;
  /** Time a track may stay unresolved before it is declared Unknown. */
  timeoutMs: number;
};

export type TrackingConfig = {
  /** A track not reported for longer than this is expired and released. */
  expiryMs: number;
  /** Detections beyond this count are ignored for decisioning. */
  maxFacesPerFrame: number;
};

export type RecognitionConfig = {
  verification: VerificationConfig;
  tracking: TrackingConfig;
};

/** Two thirds of the window, rounded up: 2-of-3 for the default window. */
export const superMajority = (windowSize: number): number =>
  Math.max(1, Math.ceil((windowSize * 2) / 3));

export const DEFAULT_RECOGNITION_CONFIG: RecognitionConfig = {
  verification: {
    windowSize: 3,
    requiredVotes: superMajority(3),
    threshold: 0.8,
    timeoutMs: 2000,
  },
  tracking: {
    expiryMs: 1500,
    maxFacesPerFrame: 5,
  },
};

export const cloneRecognitionConfig = (
  config: RecognitionConfig,
): RecognitionConfig => ({
  verification: { ...config.verification },
  tracking: { ...config.tracking },
});
