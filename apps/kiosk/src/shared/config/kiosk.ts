import {
  DEFAULT_RECOGNITION_CONFIG,
  type RecognitionConfig,
  superMajority,
} from "../../recognition/config/recognition-config";
import {
  type AttendanceWindowRule,
  DEFAULT_WINDOW_SPEC,
  parseWindowRules,
} from "../../recognition/windows/attendance-window";
import { type RuntimeEnv, parseStrictNumericEnv } from "../env";
import { ConfigError } from "../errors";

export type SyncConfig = {
  intervalMs: number;
  maxAttempts: number;
  backoffBaseMs: number;
  backoffCapMs: number;
  requestTimeoutMs: number;
};

export type ConnectivityConfig = {
  probeTimeoutMs: number;
  offlineIntervalMs: number;
  onlineIntervalMs: number;
};

export type StoreConfig = {
  databasePath: string;
  appendRetries: number;
  retentionDays: number;
};

export type KioskConfig = {
  apiBaseUrl: string;
  deviceId: string;
  deviceToken: string;
  recognition: RecognitionConfig;
  windows: AttendanceWindowRule[];
  maxFps: number;
  sync: SyncConfig;
  connectivity: ConnectivityConfig;
  store: StoreConfig;
  greetingCooldownMs: number;
  shutdownGraceMs: number;
};

const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_KIOSK_ENV = {
  apiBaseUrl: "http://localhost:8000",
  deviceId: "kiosk-01",
  databasePath: "./data/attendance.sqlite",
  maxFps: 30,
  syncIntervalMs: 10_000,
  syncMaxAttempts: 8,
  backoffBaseMs: 2_000,
  backoffCapMs: 60_000,
  requestTimeoutMs: 12_000,
  probeTimeoutMs: 3_000,
  probeOfflineIntervalMs: 5_000,
  probeOnlineIntervalMs: 30_000,
  storeAppendRetries: 1,
  retentionDays: 30,
  greetingCooldownMs: 4_000,
  shutdownGraceMs: 5_000,
} as const;

const isHttpUrl = (value: string): boolean => {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
};

/**
 * Reads every KIOSK_* variable, applying defaults for the unset ones. All
 * invalid values are collected and reported together in one ConfigError.
 */
export const loadKioskConfig = (env: RuntimeEnv): KioskConfig => {
  const problems: string[] = [];

  const text = (key: string, fallback: string): string => {
    const raw = env[key]?.trim();
    return raw && raw.length > 0 ? raw : fallback;
  };

  const number = (
    key: string,
    fallback: number,
    min: number,
    max: number,
    integer = true,
  ): number => {
    const result = parseStrictNumericEnv(env[key], fallback, { min, max, integer });
    if (!result.ok) {
      problems.push(`${key} ${result.problem}`);
      return fallback;
    }
    return result.value;
  };

  const apiBaseUrl = text("KIOSK_API_BASE_URL", DEFAULT_KIOSK_ENV.apiBaseUrl);
  if (!isHttpUrl(apiBaseUrl)) {
    problems.push(`KIOSK_API_BASE_URL must be an absolute http(s) URL, got "${apiBaseUrl}"`);
  }

  const deviceId = text("KIOSK_DEVICE_ID", DEFAULT_KIOSK_ENV.deviceId);
  const deviceToken = env.KIOSK_DEVICE_TOKEN?.trim() ?? "";
  const databasePath = text("KIOSK_DB_PATH", DEFAULT_KIOSK_ENV.databasePath);

  const defaults = DEFAULT_RECOGNITION_CONFIG;
  const windowSize = number(
    "KIOSK_VERIFY_WINDOW_SIZE",
    defaults.verification.windowSize,
    1,
    30,
  );
  const requiredVotes = number(
    "KIOSK_VERIFY_REQUIRED_VOTES",
    superMajority(windowSize),
    1,
    windowSize,
  );
  const threshold = number(
    "KIOSK_VERIFY_THRESHOLD",
    defaults.verification.threshold,
    0,
    1,
    false,
  );
  if (threshold === 0) {
    problems.push("KIOSK_VERIFY_THRESHOLD must be greater than 0");
  }
  const timeoutMs = number("KIOSK_VERIFY_TIMEOUT_MS", defaults.verification.timeoutMs, 100, DAY_MS);
  const expiryMs = number("KIOSK_TRACK_EXPIRY_MS", defaults.tracking.expiryMs, 100, DAY_MS);
  const maxFacesPerFrame = number(
    "KIOSK_MAX_FACES",
    defaults.tracking.maxFacesPerFrame,
    1,
    20,
  );
  const maxFps = number("KIOSK_MAX_FPS", DEFAULT_KIOSK_ENV.maxFps, 1, 120, false);

  const windowResult = parseWindowRules(text("KIOSK_WINDOWS", DEFAULT_WINDOW_SPEC));
  if (!windowResult.ok) {
    windowResult.problems.forEach((problem) => problems.push(`KIOSK_WINDOWS: ${problem}`));
  }

  const backoffBaseMs = number("KIOSK_BACKOFF_BASE_MS", DEFAULT_KIOSK_ENV.backoffBaseMs, 100, DAY_MS);
  const probeOfflineIntervalMs = number(
    "KIOSK_PROBE_OFFLINE_INTERVAL_MS",
    DEFAULT_KIOSK_ENV.probeOfflineIntervalMs,
    500,
    DAY_MS,
  );

  const sync: SyncConfig = {
    intervalMs: number("KIOSK_SYNC_INTERVAL_MS", DEFAULT_KIOSK_ENV.syncIntervalMs, 500, DAY_MS),
    maxAttempts: number("KIOSK_SYNC_MAX_ATTEMPTS", DEFAULT_KIOSK_ENV.syncMaxAttempts, 1, 100),
    backoffBaseMs,
    backoffCapMs: number(
      "KIOSK_BACKOFF_CAP_MS",
      Math.max(DEFAULT_KIOSK_ENV.backoffCapMs, backoffBaseMs),
      backoffBaseMs,
      DAY_MS,
    ),
    requestTimeoutMs: number(
      "KIOSK_REQUEST_TIMEOUT_MS",
      DEFAULT_KIOSK_ENV.requestTimeoutMs,
      100,
      DAY_MS,
    ),
  };

  const connectivity: ConnectivityConfig = {
    probeTimeoutMs: number("KIOSK_PROBE_TIMEOUT_MS", DEFAULT_KIOSK_ENV.probeTimeoutMs, 100, DAY_MS),
    offlineIntervalMs: probeOfflineIntervalMs,
    onlineIntervalMs: number(
      "KIOSK_PROBE_ONLINE_INTERVAL_MS",
      Math.max(DEFAULT_KIOSK_ENV.probeOnlineIntervalMs, probeOfflineIntervalMs),
      probeOfflineIntervalMs,
      DAY_MS,
    ),
  };

  const store: StoreConfig = {
    databasePath,
    appendRetries: number("KIOSK_STORE_APPEND_RETRIES", DEFAULT_KIOSK_ENV.storeAppendRetries, 0, 5),
    retentionDays: number("KIOSK_RETENTION_DAYS", DEFAULT_KIOSK_ENV.retentionDays, 1, 3650),
  };

  const greetingCooldownMs = number(
    "KIOSK_GREETING_COOLDOWN_MS",
    DEFAULT_KIOSK_ENV.greetingCooldownMs,
    0,
    DAY_MS,
  );
  const shutdownGraceMs = number(
    "KIOSK_SHUTDOWN_GRACE_MS",
    DEFAULT_KIOSK_ENV.shutdownGraceMs,
    0,
    DAY_MS,
  );

  if (problems.length > 0 || !windowResult.ok) {
    throw new ConfigError(problems);
  }

  return {
    apiBaseUrl,
    deviceId,
    deviceToken,
    recognition: {
      verification: { windowSize, requiredVotes, threshold, timeoutMs },
      tracking: { expiryMs, maxFacesPerFrame },
    },
    windows: windowResult.rules,
    maxFps,
    sync,
    connectivity,
    store,
    greetingCooldownMs,
    shutdownGraceMs,
  };
};
