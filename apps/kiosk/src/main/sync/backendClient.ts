import fetch, { type RequestInit, type Response } from "node-fetch";
import {
  BackendRejectionError,
  NetworkTransientError,
} from "../../shared/errors";
import { getLogger } from "../../shared/logger";
import type { AttendanceEvent } from "../../shared/types/attendance";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

/** What the sync side needs from the attendance backend. */
export interface AttendanceBackend {
  /**
   * Delivers one event. Resolves once the backend has it (including when it
   * already had it); rejects with NetworkTransientError or
   * BackendRejectionError.
   */
  postAttendance(event: AttendanceEvent): Promise<void>;
  /** Resolves true when `GET /health` answered 200 within the timeout. */
  checkHealth(timeoutMs?: number): Promise<boolean>;
}

export type BackendClientOptions = {
  baseUrl: string;
  deviceId: string;
  deviceToken: string;
  requestTimeoutMs: number;
  probeTimeoutMs: number;
  fetch?: FetchLike;
};

export type AttendancePayload = {
  eventId: string;
  deviceId: string;
  personId: string | null;
  occurredAt: string;
  kind: AttendanceEvent["kind"];
};

const logger = getLogger("backend-client", "network");

// 409 means the backend already holds this eventId.
const ALREADY_RECORDED_STATUS = 409;

const isTransientStatus = (status: number): boolean =>
  status >= 500 || status === 408 || status === 429;

export const toAttendancePayload = (event: AttendanceEvent): AttendancePayload => ({
  eventId: event.eventId,
  deviceId: event.deviceId,
  personId: event.personId,
  occurredAt: new Date(event.occurredAt).toISOString(),
  kind: event.kind,
});

const parseJson = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
};

const readDetail = async (response: Response): Promise<string> => {
  const text = await response.text().catch(() => "");
  if (!text) {
    return response.statusText || `HTTP ${response.status}`;
  }
  const parsed = parseJson(text);
  if (
    typeof parsed === "object" &&
    parsed !== null &&
    "detail" in parsed &&
    typeof parsed.detail === "string"
  ) {
    return parsed.detail;
  }
  return text;
};

const isAbortError = (error: unknown): boolean =>
  error instanceof Error && error.name === "AbortError";

export class BackendClient implements AttendanceBackend {
  private readonly baseUrl: string;

  private readonly options: BackendClientOptions;

  private readonly fetchImpl: FetchLike;

  constructor(options: BackendClientOptions) {
    this.options = options;
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.fetchImpl = options.fetch ?? fetch;
  }

  async postAttendance(event: AttendanceEvent): Promise<void> {
    await this.exchange(
      "/attendance",
      {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "X-Device-Id": this.options.deviceId,
          "X-Device-Token": this.options.deviceToken,
        },
        body: JSON.stringify(toAttendancePayload(event)),
      },
      this.options.requestTimeoutMs,
      async (response) => {
        if (response.ok) {
          return;
        }

        if (response.status === ALREADY_RECORDED_STATUS) {
          logger.info("Backend already holds event", { eventId: event.eventId });
          return;
        }

        const detail = await readDetail(response);

        if (isTransientStatus(response.status)) {
          throw new NetworkTransientError(
            response.status === 429 ? "throttled" : "server",
            `Backend responded ${response.status}: ${detail}`,
            { status: response.status },
          );
        }

        throw new BackendRejectionError(response.status, detail);
      },
    );
  }

  async checkHealth(timeoutMs: number = this.options.probeTimeoutMs): Promise<boolean> {
    try {
      return await this.exchange("/health", { method: "GET" }, timeoutMs, async (response) => {
        // Drain the body so the socket can be reused.
        await response.text();
        return response.status === 200;
      });
    } catch (error) {
      logger.debug("Health probe failed", {
        reason: error instanceof NetworkTransientError ? error.reason : "unknown",
      });
      return false;
    }
  }

  /**
   * Sends the request and runs `read` on the response. The timeout covers
   * both, so a body that never finishes still fails as a timeout.
   */
  private async exchange<T>(
    path: string,
    init: RequestInit,
    timeoutMs: number,
    read: (response: Response) => Promise<T>,
  ): Promise<T> {
    const method = init.method ?? "GET";
    const controller = new AbortController();
    const timedOut = new Promise<never>((_resolve, reject) => {
      controller.signal.addEventListener(
        "abort",
        () => {
          reject(
            new NetworkTransientError(
              "timeout",
              `${method} ${path} timed out after ${timeoutMs}ms`,
            ),
          );
        },
        { once: true },
      );
    });
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      return await Promise.race([
        this.send(path, init, controller.signal).then(read),
        timedOut,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async send(
    path: string,
    init: RequestInit,
    signal: AbortSignal,
  ): Promise<Response> {
    const method = init.method ?? "GET";
    try {
      return await this.fetchImpl(`${this.baseUrl}${path}`, { ...init, signal });
    } catch (error) {
      if (isAbortError(error)) {
        throw new NetworkTransientError("timeout", `${method} ${path} was aborted`, {
          cause: error,
        });
      }
      throw new NetworkTransientError(
        "connection",
        `${method} ${path} failed: ${
          error instanceof Error ? error.message : String(error)
        }`,
        { cause: error },
      );
    }
  }
}
