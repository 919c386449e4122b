import { toLocalDateString, toMinuteOfDay } from "../../shared/time";
import type { AttendanceKind } from "../../shared/types/attendance";

export type AttendanceWindowRule = {
  /** Day-part label, e.g. "morning-in". */
  name: string;
  kind: Exclude<AttendanceKind, "UNKNOWN">;
  /** Inclusive start, minutes after local midnight. */
  startMinute: number;
  /** Exclusive end, minutes after local midnight (1440 = end of day). */
  endMinute: number;
  /**
   * Re-punch guard inside the window. When absent a person is recorded at
   * most once for the whole window.
   */
  cooldownMs?: number;
};

export type ResolvedWindow = {
  /** Unique per calendar day, e.g. "2026-03-02:morning-in". */
  key: string;
  name: string;
  kind: Exclude<AttendanceKind, "UNKNOWN">;
  cooldownMs: number | null;
};

export type WindowResolver = (timestamp: number) => ResolvedWindow | null;

export const DEFAULT_WINDOW_SPEC =
  "morning-in@00:00-12:00:IN,afternoon-out@12:00-24:00:OUT";

const MINUTES_PER_DAY = 24 * 60;

const RULE_PATTERN =
  /^([a-z0-9][a-z0-9_-]*)@(\d{2}):(\d{2})-(\d{2}):(\d{2}):(IN|OUT)(?::(\d+))?$/i;

const toMinutes = (hours: string, minutes: string): number | null => {
  const h = Number.parseInt(hours, 10);
  const m = Number.parseInt(minutes, 10);
  if (m > 59 || h > 24 || (h === 24 && m !== 0)) {
    return null;
  }
  return h * 60 + m;
};

export type WindowParseResult =
  | { ok: true; rules: AttendanceWindowRule[] }
  | { ok: false; problems: string[] };

/**
 * Parses `name@HH:MM-HH:MM:KIND[:cooldownMinutes]` entries separated by
 * commas. Windows must not overlap; gaps are allowed and produce no events.
 */
export const parseWindowRules = (spec: string): WindowParseResult => {
  const problems: string[] = [];
  const rules: AttendanceWindowRule[] = [];

  const entries = spec
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

  if (entries.length === 0) {
    return { ok: false, problems: ["at least one attendance window is required"] };
  }

  entries.forEach((entry) => {
    const match = RULE_PATTERN.exec(entry);
    if (!match) {
      problems.push(`"${entry}" is not name@HH:MM-HH:MM:IN|OUT[:minutes]`);
      return;
    }
    const [, name = "", sh = "", sm = "", eh = "", em = "", kind = "", cooldown] =
      match;
    const startMinute = toMinutes(sh, sm);
    const endMinute = toMinutes(eh, em);
    if (startMinute === null || endMinute === null) {
      problems.push(`"${entry}" has an invalid time of day`);
      return;
    }
    if (endMinute <= startMinute) {
      problems.push(`"${entry}" must end after it starts`);
      return;
    }
    rules.push({
      name: name.toLowerCase(),
      kind: kind.toUpperCase() === "IN" ? "IN" : "OUT",
      startMinute,
      endMinute,
      cooldownMs:
        cooldown !== undefined
          ? Number.parseInt(cooldown, 10) * 60_000
          : undefined,
    });
  });

  const sorted = [...rules].sort((a, b) => a.startMinute - b.startMinute);
  sorted.forEach((rule, index) => {
    const next = sorted[index + 1];
    if (next && next.startMinute < rule.endMinute) {
      problems.push(`windows "${rule.name}" and "${next.name}" overlap`);
    }
  });

  const names = new Set<string>();
  sorted.forEach((rule) => {
    if (names.has(rule.name)) {
      problems.push(`window name "${rule.name}" is used twice`);
    }
    names.add(rule.name);
  });

  if (problems.length > 0) {
    return { ok: false, problems };
  }
  return { ok: true, rules: sorted };
};

export const createWindowResolver = (
  rules: readonly AttendanceWindowRule[],
): WindowResolver => {
  const ordered = [...rules].sort((a, b) => a.startMinute - b.startMinute);

  return (timestamp) => {
    const minute = toMinuteOfDay(timestamp);
    if (minute < 0 || minute >= MINUTES_PER_DAY) {
      return null;
    }
    const rule = ordered.find(
      (candidate) =>
        minute >= candidate.startMinute && minute < candidate.endMinute,
    );
    if (!rule) {
      return null;
    }
    return {
      key: `${toLocalDateString(timestamp)}:${rule.name}`,
      name: rule.name,
      kind: rule.kind,
      cooldownMs: rule.cooldownMs ?? null,
    };
  };
};
