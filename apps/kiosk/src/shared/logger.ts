/* eslint-disable no-console */
// Console output mirrors the structured logs locally while they ship to Better Stack.
import type { Logtail } from "@logtail/node";
import { monitoringConfig } from "./config/monitoring";

export type LoggerScope = "app" | "capture" | "network" | "storage";

export type LoggerMetadata = Record<string, unknown>;

type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";

type LoggerOptions = {
  module: string;
  scope: LoggerScope;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

const consoleWriters: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: console.debug.bind(console),
  info: console.info.bind(console),
  warn: console.warn.bind(console),
  error: console.error.bind(console),
  fatal: console.error.bind(console),
};

const isLogLevel = (value: string): value is LogLevel =>
  Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);

const resolveMinimumLevel = (): LogLevel => {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  if (raw && isLogLevel(raw)) {
    return raw;
  }
  return monitoringConfig.environment === "test" ? "warn" : "info";
};

const minimumLevel: LogLevel = resolveMinimumLevel();

let logtailInstance: Promise<Logtail | null> | null = null;

const loadLogtail = async (): Promise<Logtail | null> => {
  if (!monitoringConfig.logtail.enabled) {
    return null;
  }

  if (logtailInstance) {
    return logtailInstance;
  }

  logtailInstance = (async () => {
    try {
      const { Logtail: LogtailClient } = await import("@logtail/node");
      return new LogtailClient(monitoringConfig.logtail.token);
    } catch (error) {
      console.error("Failed to initialise Better Stack Logtail client", error);
      return null;
    }
  })();

  return logtailInstance;
};

const emitLogtail = async (
  level: LogLevel,
  message: string,
  metadata: LoggerMetadata,
) => {
  try {
    const instance = await loadLogtail();
    if (!instance) {
      return;
    }

    switch (level) {
      case "debug":
        await instance.debug(message, metadata);
        return;
      case "info":
        await instance.info(message, metadata);
        return;
      case "warn":
        await instance.warn(message, metadata);
        return;
      default:
        await instance.error(message, metadata);
    }
  } catch (error) {
    console.error("Failed to send log to Better Stack", error);
  }
};

const createEmitter =
  ({ module, scope }: LoggerOptions, level: LogLevel) =>
  (message: string, metadata: LoggerMetadata = {}) => {
    const timestamp = new Date().toISOString();
    const enrichedMetadata = {
      ...metadata,
      module,
      scope,
      environment: monitoringConfig.environment,
      timestamp,
      level,
    };

    if (LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel]) {
      consoleWriters[level](
        `[${timestamp}] [${level.toUpperCase()}] [${module}] ${message}`,
        metadata,
      );
    }

    if (monitoringConfig.logtail.enabled) {
      emitLogtail(level, message, enrichedMetadata).catch(() => undefined);
    }
  };

export const createLogger = (options: LoggerOptions) => {
  const flush = async () => {
    const instance = await loadLogtail();
    await instance?.flush();
  };

  return {
    debug: createEmitter(options, "debug"),
    info: createEmitter(options, "info"),
    warn: createEmitter(options, "warn"),
    error: createEmitter(options, "error"),
    fatal: createEmitter(options, "fatal"),
    flush,
  };
};

export type Logger = ReturnType<typeof createLogger>;

const loggerCache = new Map<string, Logger>();

export const getLogger = (module: string, scope: LoggerScope): Logger => {
  const cacheKey = `${scope}:${module}`;

  const cached = loggerCache.get(cacheKey);
  if (cached) {
    return cached;
  }

  const logger = createLogger({ module, scope });
  loggerCache.set(cacheKey, logger);
  return logger;
};

export const toErrorPayload = (error: unknown): LoggerMetadata => {
  if (error instanceof Error) {
    const code =
      "code" in error && typeof error.code === "string" ? error.code : undefined;
    return {
      error: error.message,
      name: error.name,
      code,
      stack: error.stack,
    };
  }
  return { error: String(error) };
};
