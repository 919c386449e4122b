import { parseBooleanFlag, type RuntimeEnv } from "../env";

type Environment = string;

export type SanitizableSentryEvent = Record<string, unknown>;

const resolveEnvironment = (env: RuntimeEnv): Environment => {
  const explicitEnv = env.APP_ENV ?? env.KIOSK_ENV;

  if (explicitEnv && explicitEnv.trim().length > 0) {
    return explicitEnv;
  }

  const nodeEnv = env.NODE_ENV ?? "development";
  if (nodeEnv.trim().length > 0) {
    return nodeEnv;
  }

  return "development";
};

const SENSITIVE_KEYS = [
  "password",
  "token",
  "secret",
  "authorization",
  "auth",
  "email",
  "phone",
];

const stringifyUserId = (value: unknown): string => {
  if (typeof value === "string") {
    return value;
  }

  if (
    typeof value === "number" ||
    typeof value === "boolean" ||
    typeof value === "bigint"
  ) {
    return String(value);
  }

  try {
    return JSON.stringify(value);
  } catch {
    return "[unserializable-user-id]";
  }
};

const isPlainRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const scrubValue = (value: unknown): unknown => {
  if (value == null) {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => scrubValue(item));
  }

  if (isPlainRecord(value)) {
    const result: Record<string, unknown> = {};

    Object.entries(value).forEach(([key, nestedValue]) => {
      const lowerKey = key.toLowerCase();
      if (
        SENSITIVE_KEYS.some((sensitiveKey) => lowerKey.includes(sensitiveKey))
      ) {
        result[key] = "[redacted]";
        return;
      }

      result[key] = scrubValue(nestedValue);
    });

    return result;
  }

  if (typeof value === "string") {
    if (
      SENSITIVE_KEYS.some((sensitiveKey) =>
        value.toLowerCase().includes(sensitiveKey),
      )
    ) {
      return "[redacted]";
    }
  }

  return value;
};

const sanitizeSentryEvent = <T>(event: T): T => {
  if (!isPlainRecord(event)) {
    return event;
  }

  const eventRecord: Record<string, unknown> = { ...event };

  const rawBreadcrumbs = eventRecord.breadcrumbs;
  if (Array.isArray(rawBreadcrumbs)) {
    eventRecord.breadcrumbs = rawBreadcrumbs
      .filter(isPlainRecord)
      .map((breadcrumb) => {
        const breadcrumbRecord = { ...breadcrumb };
        if ("data" in breadcrumbRecord) {
          breadcrumbRecord.data = scrubValue(breadcrumbRecord.data);
        }
        return breadcrumbRecord;
      });
  }

  eventRecord.request = undefined;

  if (isPlainRecord(eventRecord.extra)) {
    eventRecord.extra = scrubValue(eventRecord.extra);
  }

  if (isPlainRecord(eventRecord.contexts)) {
    eventRecord.contexts = scrubValue(eventRecord.contexts);
  }

  const rawUser = eventRecord.user;
  if (isPlainRecord(rawUser)) {
    const userId = rawUser.id;
    eventRecord.user =
      userId != null ? { id: stringifyUserId(userId) } : undefined;
  }

  // Same shape as the input with scrubbed leaves.
  return eventRecord as T;
};

export type MonitoringConfig = {
  environment: Environment;
  release?: string;
  sentry: {
    dsn: string;
    enabled: boolean;
    tracesSampleRate: number;
    beforeSend: typeof sanitizeSentryEvent;
  };
  logtail: {
    token: string;
    enabled: boolean;
  };
};

export const createMonitoringConfig = (
  runtimeEnv: RuntimeEnv,
): MonitoringConfig => {
  const environment = resolveEnvironment(runtimeEnv);
  const isProductionLike =
    environment === "production" || environment === "staging";

  const sentryDsn = runtimeEnv.SENTRY_DSN ?? "";
  const logtailToken = runtimeEnv.BETTER_STACK_TOKEN ?? "";

  return {
    environment,
    release: runtimeEnv.npm_package_version,
    sentry: {
      dsn: sentryDsn,
      enabled:
        Boolean(sentryDsn) &&
        (isProductionLike ||
          parseBooleanFlag(runtimeEnv.ENABLE_SENTRY_IN_DEV, false)),
      tracesSampleRate: (() => {
        const parsedValue = Number.parseFloat(
          runtimeEnv.SENTRY_TRACES_SAMPLE_RATE ?? "0.1",
        );
        return Number.isNaN(parsedValue) ? 0.1 : parsedValue;
      })(),
      beforeSend: sanitizeSentryEvent,
    },
    logtail: {
      token: logtailToken,
      enabled:
        Boolean(logtailToken) &&
        (isProductionLike ||
          parseBooleanFlag(runtimeEnv.ENABLE_BETTER_STACK_IN_DEV, false)),
    },
  };
};

export const monitoringConfig: MonitoringConfig = createMonitoringConfig(
  typeof process !== "undefined" ? process.env : {},
);
