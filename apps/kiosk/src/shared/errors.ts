export type KioskErrorCode =
  | "VISION_INPUT"
  | "STORE"
  | "NETWORK_TRANSIENT"
  | "BACKEND_REJECTION"
  | "CONFIG";

export abstract class KioskError extends Error {
  abstract readonly code: KioskErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A detection frame from the vision provider could not be interpreted. */
export class VisionInputError extends KioskError {
  readonly code = "VISION_INPUT" as const;

  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Malformed detection frame: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

export type StoreOperation =
  | "open"
  | "append"
  | "read"
  | "update"
  | "prune"
  | "close";

export class StoreError extends KioskError {
  readonly code = "STORE" as const;

  readonly operation: StoreOperation;

  constructor(operation: StoreOperation, cause: unknown) {
    super(
      `Event store ${operation} failed: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      { cause },
    );
    this.operation = operation;
  }
}

export type TransientReason = "timeout" | "connection" | "server" | "throttled";

export class NetworkTransientError extends KioskError {
  readonly code = "NETWORK_TRANSIENT" as const;

  readonly reason: TransientReason;

  readonly status: number | null;

  constructor(
    reason: TransientReason,
    message: string,
    options: { status?: number | null; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.reason = reason;
    this.status = options.status ?? null;
  }
}

export class BackendRejectionError extends KioskError {
  readonly code = "BACKEND_REJECTION" as const;

  readonly status: number;

  readonly detail: string;

  constructor(status: number, detail: string) {
    super(`Backend rejected request (${status}): ${detail}`);
    this.status = status;
    this.detail = detail;
  }
}

export class ConfigError extends KioskError {
  readonly code = "CONFIG" as const;

  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration:\n  - ${problems.join("\n  - ")}`);
    this.problems = problems;
  }
}
