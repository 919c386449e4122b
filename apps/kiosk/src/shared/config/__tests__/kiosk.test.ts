import { describe, expect, it } from "vitest";
import type { RuntimeEnv } from "../../env";
import { ConfigError } from "../../errors";
import { loadKioskConfig } from "../kiosk";

const loadProblems = (env: RuntimeEnv): string[] => {
  try {
    loadKioskConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) {
      return error.problems;
    }
    throw error;
  }
  throw new Error("expected loadKioskConfig to reject the environment");
};

describe("loadKioskConfig", () => {
  it("applies defaults when nothing is set", () => {
    const config = loadKioskConfig({});

    expect(config.apiBaseUrl).toBe("http://localhost:8000");
    expect(config.deviceId).toBe("kiosk-01");
    expect(config.deviceToken).toBe("");
    expect(config.recognition).toEqual({
      verification: { windowSize: 3, requiredVotes: 2, threshold: 0.8, timeoutMs: 2000 },
      tracking: { expiryMs: 1500, maxFacesPerFrame: 5 },
    });
    expect(config.windows).toEqual([
      { name: "morning-in", kind: "IN", startMinute: 0, endMinute: 720 },
      { name: "afternoon-out", kind: "OUT", startMinute: 720, endMinute: 1440 },
    ]);
    expect(config.sync).toEqual({
      intervalMs: 10_000,
      maxAttempts: 8,
      backoffBaseMs: 2_000,
      backoffCapMs: 60_000,
      requestTimeoutMs: 12_000,
    });
    expect(config.connectivity).toEqual({
      probeTimeoutMs: 3_000,
      offlineIntervalMs: 5_000,
      onlineIntervalMs: 30_000,
    });
    expect(config.store).toEqual({
      databasePath: "./data/attendance.sqlite",
      appendRetries: 1,
      retentionDays: 30,
    });
    expect(config.maxFps).toBe(30);
    expect(config.greetingCooldownMs).toBe(4_000);
    expect(config.shutdownGraceMs).toBe(5_000);
  });

  it("trims identity values and keeps the device token", () => {
    const config = loadKioskConfig({
      KIOSK_API_BASE_URL: "https://attendance.example.test/api/",
      KIOSK_DEVICE_ID: "  gate-2 ",
      KIOSK_DEVICE_TOKEN: "test-secret",
      KIOSK_DB_PATH: "/var/lib/kiosk/events.sqlite",
    });

    expect(config.apiBaseUrl).toBe("https://attendance.example.test/api/");
    expect(config.deviceId).toBe("gate-2");
    expect(config.deviceToken).toBe("test-secret");
    expect(config.store.databasePath).toBe("/var/lib/kiosk/events.sqlite");
  });

  it("derives the vote count from a resized window", () => {
    const config = loadKioskConfig({ KIOSK_VERIFY_WINDOW_SIZE: "6" });

    expect(config.recognition.verification.windowSize).toBe(6);
    expect(config.recognition.verification.requiredVotes).toBe(4);
  });

  it("parses custom attendance windows with cooldowns", () => {
    const config = loadKioskConfig({
      KIOSK_WINDOWS: "morning-in@07:00-10:00:IN:15, evening-out@16:00-19:30:OUT",
    });

    expect(config.windows).toEqual([
      { name: "morning-in", kind: "IN", startMinute: 420, endMinute: 600, cooldownMs: 900_000 },
      { name: "evening-out", kind: "OUT", startMinute: 960, endMinute: 1170 },
    ]);
  });

  it("reports every invalid value at once", () => {
    const problems = loadProblems({
      KIOSK_API_BASE_URL: "ftp://files.example.test",
      KIOSK_VERIFY_THRESHOLD: "1.5",
      KIOSK_WINDOWS: "lunch@13:00-12:00:IN",
      KIOSK_SYNC_MAX_ATTEMPTS: "zero",
    });

    expect(problems).toEqual([
      'KIOSK_API_BASE_URL must be an absolute http(s) URL, got "ftp://files.example.test"',
      "KIOSK_VERIFY_THRESHOLD must be between 0 and 1, got 1.5",
      'KIOSK_WINDOWS: "lunch@13:00-12:00:IN" must end after it starts',
      'KIOSK_SYNC_MAX_ATTEMPTS expected an integer, got "zero"',
    ]);
  });

  it("rejects a zero confidence threshold", () => {
    expect(loadProblems({ KIOSK_VERIFY_THRESHOLD: "0" })).toEqual([
      "KIOSK_VERIFY_THRESHOLD must be greater than 0",
    ]);
  });

  it("rejects more required votes than the window holds", () => {
    expect(
      loadProblems({ KIOSK_VERIFY_WINDOW_SIZE: "3", KIOSK_VERIFY_REQUIRED_VOTES: "4" }),
    ).toEqual(["KIOSK_VERIFY_REQUIRED_VOTES must be between 1 and 3, got 4"]);
  });

  it("rejects a backoff cap below the base delay", () => {
    expect(
      loadProblems({ KIOSK_BACKOFF_BASE_MS: "5000", KIOSK_BACKOFF_CAP_MS: "1000" }),
    ).toEqual(["KIOSK_BACKOFF_CAP_MS must be between 5000 and 86400000, got 1000"]);
  });

  it("rejects overlapping windows", () => {
    expect(
      loadProblems({ KIOSK_WINDOWS: "a@08:00-12:00:IN,b@11:00-13:00:OUT" }),
    ).toEqual(['KIOSK_WINDOWS: windows "a" and "b" overlap']);
  });
});
