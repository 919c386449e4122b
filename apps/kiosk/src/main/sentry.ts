import * as Sentry from "@sentry/node";
import { monitoringConfig } from "../shared/config/monitoring";
import { getLogger, toErrorPayload } from "../shared/logger";

const logger = getLogger("sentry", "app");

let initialised = false;

let handlersRegistered = false;

export const initSentry = (deviceId: string): void => {
  if (!monitoringConfig.sentry.enabled || initialised) {
    if (!monitoringConfig.sentry.enabled) {
      logger.debug("Sentry disabled by configuration");
    }
    return;
  }

  Sentry.init({
    dsn: monitoringConfig.sentry.dsn,
    environment: monitoringConfig.environment,
    release: monitoringConfig.release,
    beforeSend: monitoringConfig.sentry.beforeSend,
    tracesSampleRate: monitoringConfig.sentry.tracesSampleRate,
  });

  Sentry.setTag("process", "kiosk");
  Sentry.setTag("device", deviceId);
  Sentry.setContext("runtime", {
    pid: process.pid,
    platform: process.platform,
    node: process.versions.node,
  });

  initialised = true;
};

export const captureException = (
  error: unknown,
  context: Record<string, unknown> = {},
): void => {
  if (!initialised) {
    return;
  }
  const normalisedError =
    error instanceof Error ? error : new Error(String(error));
  Sentry.captureException(normalisedError, { extra: context });
};

export const captureMessage = (
  message: string,
  level: "info" | "warning" | "error" = "info",
): void => {
  if (!initialised) {
    return;
  }
  Sentry.captureMessage(message, level);
};

export const flushSentry = async (timeoutMs: number): Promise<void> => {
  if (!initialised) {
    return;
  }
  await Sentry.flush(timeoutMs);
};

const describeReason = (reason: unknown): string => {
  if (reason instanceof Error) {
    return reason.message;
  }
  if (typeof reason === "string") {
    return reason;
  }
  try {
    return JSON.stringify(reason);
  } catch {
    return "unknown";
  }
};

export const registerProcessHandlers = (): void => {
  if (handlersRegistered) {
    return;
  }
  handlersRegistered = true;

  process.on("uncaughtException", (error) => {
    logger.fatal("Uncaught exception", toErrorPayload(error));
    captureException(error);
  });

  process.on("unhandledRejection", (reason) => {
    const error = reason instanceof Error ? reason : new Error(describeReason(reason));
    logger.fatal("Unhandled rejection", toErrorPayload(error));
    captureException(error);
  });
};
