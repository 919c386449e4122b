import { FaceTracker } from "../recognition/tracking/face-tracker";
import { PersonCooldownRegistry } from "../recognition/tracking/person-cooldown";
import { createWindowResolver } from "../recognition/windows/attendance-window";
import type { KioskConfig } from "../shared/config/kiosk";
import { getLogger } from "../shared/logger";
import { type Clock, systemClock } from "../shared/time";
import { ConnectivityMonitor } from "./connectivity/connectivityMonitor";
import { AttendanceEventStore } from "./database/attendanceEventRepository";
import { openDatabase } from "./database/client";
import { FrameGovernor } from "./pipeline/frameGovernor";
import {
  type ErrorReporter,
  PipelineCoordinator,
} from "./pipeline/pipelineCoordinator";
import { type AttendanceBackend, BackendClient, type FetchLike } from "./sync/backendClient";
import { SyncManager } from "./sync/syncManager";

export type KioskRuntimeOptions = {
  fetch?: FetchLike;
  /** Replaces the HTTP client entirely, e.g. with an in-process fake. */
  backend?: AttendanceBackend;
  reportError?: ErrorReporter;
  clock?: Clock;
  createEventId?: () => string;
};

export type KioskRuntime = {
  coordinator: PipelineCoordinator;
  store: AttendanceEventStore;
  tracker: FaceTracker;
  monitor: ConnectivityMonitor;
  syncManager: SyncManager;
  backend: AttendanceBackend;
};

const logger = getLogger("runtime", "app");

/** Opens the store and wires every component from a validated config. */
export const createKioskRuntime = (
  config: KioskConfig,
  options: KioskRuntimeOptions = {},
): KioskRuntime => {
  const clock = options.clock ?? systemClock;
  const store = new AttendanceEventStore(openDatabase(config.store.databasePath), clock);

  const backend =
    options.backend ??
    new BackendClient({
      baseUrl: config.apiBaseUrl,
      deviceId: config.deviceId,
      deviceToken: config.deviceToken,
      requestTimeoutMs: config.sync.requestTimeoutMs,
      probeTimeoutMs: config.connectivity.probeTimeoutMs,
      fetch: options.fetch,
    });

  const cooldowns = new PersonCooldownRegistry(store.loadCooldowns(), (entry) =>
    store.saveCooldown(entry),
  );

  const tracker = new FaceTracker({
    config: config.recognition,
    deviceId: config.deviceId,
    store,
    resolveWindow: createWindowResolver(config.windows),
    cooldowns,
    appendRetries: config.store.appendRetries,
    createEventId: options.createEventId,
    onTransition: (event) => {
      logger.debug(`Track ${event.trackId} ${event.from} -> ${event.to}`, {
        personId: event.snapshot.candidatePersonId,
      });
    },
  });

  const monitor = new ConnectivityMonitor({
    probe: (timeoutMs) => backend.checkHealth(timeoutMs),
    probeTimeoutMs: config.connectivity.probeTimeoutMs,
    offlineIntervalMs: config.connectivity.offlineIntervalMs,
    onlineIntervalMs: config.connectivity.onlineIntervalMs,
    clock,
  });

  const syncManager = new SyncManager({
    store,
    backend,
    monitor,
    syncIntervalMs: config.sync.intervalMs,
    maxAttempts: config.sync.maxAttempts,
    backoffBaseMs: config.sync.backoffBaseMs,
    backoffCapMs: config.sync.backoffCapMs,
    shutdownGraceMs: config.shutdownGraceMs,
    clock,
  });

  const coordinator = new PipelineCoordinator({
    tracker,
    store,
    monitor,
    syncManager,
    governor: new FrameGovernor({ maxFps: config.maxFps }),
    greetingCooldownMs: config.greetingCooldownMs,
    retentionDays: config.store.retentionDays,
    shutdownGraceMs: config.shutdownGraceMs,
    reportError: options.reportError,
    clock,
  });

  return { coordinator, store, tracker, monitor, syncManager, backend };
};
