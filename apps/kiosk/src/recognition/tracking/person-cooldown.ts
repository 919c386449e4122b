import type { PersonCooldownEntry } from "../../shared/types/attendance";
import type { ResolvedWindow } from "../windows/attendance-window";

export type CooldownPersister = (entry: PersonCooldownEntry) => void;

/**
 * Last recorded decision per person. Only the face tracker writes to it, from
 * the single frame-processing path.
 */
export class PersonCooldownRegistry {
  private readonly entries = new Map<string, PersonCooldownEntry>();

  private readonly persist?: CooldownPersister;

  constructor(
    initial: Iterable<PersonCooldownEntry> = [],
    persist?: CooldownPersister,
  ) {
    for (const entry of initial) {
      this.entries.set(entry.personId, { ...entry });
    }
    this.persist = persist;
  }

  /**
   * Fresh means the person was already recorded in this window and, for
   * windows with a re-punch interval, that interval has not elapsed.
   */
  isFresh(personId: string, window: ResolvedWindow, at: number): boolean {
    const entry = this.entries.get(personId);
    if (!entry || entry.lastDecisionWindow !== window.key) {
      return false;
    }
    if (window.cooldownMs === null) {
      return true;
    }
    return at - entry.lastDecisionAt < window.cooldownMs;
  }

  record(personId: string, window: ResolvedWindow, at: number): PersonCooldownEntry {
    const entry: PersonCooldownEntry = {
      personId,
      lastDecisionAt: at,
      lastDecisionWindow: window.key,
    };
    this.entries.set(personId, entry);
    this.persist?.(entry);
    return { ...entry };
  }

  get(personId: string): PersonCooldownEntry | null {
    const entry = this.entries.get(personId);
    return entry ? { ...entry } : null;
  }

  size(): number {
    return this.entries.size;
  }
}
