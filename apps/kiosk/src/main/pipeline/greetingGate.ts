import type {
  AttendanceDecision,
  DecisionOutcome,
} from "../../shared/types/attendance";

// Duplicates, unsaved and out-of-window decisions stay silent.
const GREETED_OUTCOMES: ReadonlySet<DecisionOutcome> = new Set(["recorded", "unknown"]);

/**
 * Lets a greeting through for recorded and unknown decisions, at most once
 * per (person, outcome, kind) inside the cooldown, so a person lingering in
 * front of the camera is greeted once.
 */
export class GreetingGate {
  private readonly cooldownMs: number;

  private readonly lastGreetedAt = new Map<string, number>();

  constructor(cooldownMs: number) {
    this.cooldownMs = cooldownMs;
  }

  shouldGreet(decision: AttendanceDecision, at: number): boolean {
    if (!GREETED_OUTCOMES.has(decision.outcome)) {
      return false;
    }
    const key = `${decision.personId ?? "unknown"}|${decision.outcome}|${decision.kind ?? "-"}`;
    const last = this.lastGreetedAt.get(key);
    if (last !== undefined && at - last < this.cooldownMs) {
      return false;
    }
    this.lastGreetedAt.set(key, at);
    this.prune(at);
    return true;
  }

  reset(): void {
    this.lastGreetedAt.clear();
  }

  private prune(at: number): void {
    this.lastGreetedAt.forEach((greetedAt, key) => {
      if (at - greetedAt >= this.cooldownMs) {
        this.lastGreetedAt.delete(key);
      }
    });
  }
}
