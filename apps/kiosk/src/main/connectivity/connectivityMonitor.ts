import { EventEmitter } from "node:events";
import { getLogger, toErrorPayload } from "../../shared/logger";
import { type Clock, systemClock, unrefIfPossible } from "../../shared/time";
import type {
  ConnectivityChange,
  ConnectivityState,
} from "../../shared/types/connectivity";

type TimeoutHandle = ReturnType<typeof setTimeout>;

export type HealthProbe = (timeoutMs: number) => Promise<boolean>;

export type ConnectivityMonitorOptions = {
  probe: HealthProbe;
  probeTimeoutMs: number;
  offlineIntervalMs: number;
  onlineIntervalMs: number;
  clock?: Clock;
};

type ConnectivityEvents = {
  stateChange: [ConnectivityChange];
};

const logger = getLogger("connectivity-monitor", "network");

/**
 * Periodically probes backend health. Every probe passes through `Probing`
 * and settles on `Online` or `Offline`; a probe that throws or times out
 * counts as `Offline`.
 */
export class ConnectivityMonitor extends EventEmitter<ConnectivityEvents> {
  private readonly options: ConnectivityMonitorOptions;

  private readonly clock: Clock;

  private state: ConnectivityState = "Offline";

  private timer: TimeoutHandle | null = null;

  private running = false;

  private inFlight: Promise<ConnectivityState> | null = null;

  constructor(options: ConnectivityMonitorOptions) {
    super();
    this.options = options;
    this.clock = options.clock ?? systemClock;
  }

  getState(): ConnectivityState {
    return this.state;
  }

  isRunning(): boolean {
    return this.running;
  }

  /** Probes right away, then keeps probing on the state's interval. */
  async start(): Promise<ConnectivityState> {
    if (this.running) {
      return this.state;
    }
    this.running = true;
    return this.requestProbe();
  }

  async stop(): Promise<void> {
    this.running = false;
    this.clearTimer();
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  /**
   * Probes now. Calls made while a probe is in flight share its result.
   */
  requestProbe(): Promise<ConnectivityState> {
    if (this.inFlight) {
      return this.inFlight;
    }
    this.clearTimer();
    const probe = this.runProbe().finally(() => {
      this.inFlight = null;
      this.scheduleNext();
    });
    this.inFlight = probe;
    return probe;
  }

  private async runProbe(): Promise<ConnectivityState> {
    this.setState("Probing");

    let healthy = false;
    try {
      healthy = await this.options.probe(this.options.probeTimeoutMs);
    } catch (error) {
      logger.debug("Health probe threw", toErrorPayload(error));
    }

    const next: ConnectivityState = healthy ? "Online" : "Offline";
    this.setState(next);
    return next;
  }

  private scheduleNext(): void {
    if (!this.running) {
      return;
    }
    this.clearTimer();
    const interval =
      this.state === "Online"
        ? this.options.onlineIntervalMs
        : this.options.offlineIntervalMs;
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.requestProbe();
    }, interval);
    unrefIfPossible(this.timer);
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private setState(next: ConnectivityState): void {
    const previous = this.state;
    if (previous === next) {
      return;
    }
    this.state = next;
    if (next !== "Probing") {
      logger.debug(`Connectivity ${previous} -> ${next}`);
    }
    this.emit("stateChange", { state: next, previous, at: this.clock() });
  }
}
