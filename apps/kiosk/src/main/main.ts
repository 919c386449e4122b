import "./loadEnv";
import { loadKioskConfig } from "../shared/config/kiosk";
import { ConfigError } from "../shared/errors";
import { getLogger, toErrorPayload } from "../shared/logger";
import { consumeFrameLines } from "./frameSource";
import { createKioskRuntime } from "./runtime";
import {
  captureException,
  captureMessage,
  flushSentry,
  initSentry,
  registerProcessHandlers,
} from "./sentry";

const logger = getLogger("main", "app");

const main = async (): Promise<void> => {
  const config = loadKioskConfig(process.env);

  initSentry(config.deviceId);
  registerProcessHandlers();

  const { coordinator } = createKioskRuntime(config, {
    reportError: captureException,
  });

  coordinator.on("greeting", (decision) => {
    logger.info(`Greeting ${decision.personId ?? "visitor"} (${decision.outcome})`, {
      kind: decision.kind,
      window: decision.window,
    });
  });
  coordinator.on("saveFailed", (decision) => {
    logger.warn("Attendance not saved", { trackId: decision.trackId });
  });
  coordinator.on("syncStatus", (status) => {
    logger.debug("Sync status", {
      pendingCount: status.pendingCount,
      lastError: status.lastError?.message ?? null,
    });
  });
  coordinator.on("syncRejected", (event, error) => {
    captureMessage(
      `Backend rejected attendance event ${event.eventId} (${error.status})`,
      "warning",
    );
  });
  coordinator.on("connectivity", (change) => {
    if (change.state !== "Probing") {
      logger.info(`Backend ${change.state}`);
    }
  });

  let stopping: Promise<void> | null = null;
  const shutdown = (reason: string): Promise<void> => {
    if (stopping) {
      return stopping;
    }
    logger.info(`Shutting down (${reason})`);
    const pending = coordinator
      .stop()
      .then(() => flushSentry(config.shutdownGraceMs))
      .then(() => logger.flush());
    stopping = pending;
    return pending;
  };

  process.once("SIGINT", () => {
    void shutdown("SIGINT").then(() => process.exit(0));
  });
  process.once("SIGTERM", () => {
    void shutdown("SIGTERM").then(() => process.exit(0));
  });

  await coordinator.start();
  logger.info(`Kiosk ${config.deviceId} ready; reading detections from stdin`);

  await consumeFrameLines(process.stdin, ({ detections, capturedAt }) => {
    coordinator.processFrame(detections, capturedAt);
  });

  await shutdown("end of input");
};

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    logger.fatal(error.message, { problems: error.problems });
  } else {
    logger.fatal("Kiosk failed to start", toErrorPayload(error));
    captureException(error);
  }
  process.exitCode = 1;
});
