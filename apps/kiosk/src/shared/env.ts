export type RuntimeEnv = Record<string, string | undefined>;

export const parseBooleanFlag = (
  value?: string | null,
  defaultValue = false,
): boolean => {
  return parseOptionalBoolean(value) ?? defaultValue;
};

export const parseOptionalBoolean = (value?: string | null): boolean | null => {
  if (typeof value !== "string") {
    return null;
  }
  const normalised = value.trim().toLowerCase();
  if (
    normalised === "1" ||
    normalised === "true" ||
    normalised === "yes" ||
    normalised === "on"
  ) {
    return true;
  }
  if (
    normalised === "0" ||
    normalised === "false" ||
    normalised === "no" ||
    normalised === "off"
  ) {
    return false;
  }
  return null;
};

type NumericOptions = {
  min: number;
  max: number;
  integer?: boolean;
};

/**
 * Strict variant: returns a problem description instead of clamping, so that
 * startup validation can report every bad value at once.
 */
export type StrictNumericResult =
  | { ok: true; value: number }
  | { ok: false; problem: string };

export const parseStrictNumericEnv = (
  value: string | null | undefined,
  fallback: number,
  options: NumericOptions,
): StrictNumericResult => {
  if (typeof value !== "string" || value.trim().length === 0) {
    return { ok: true, value: fallback };
  }
  const parsed = parseNumber(value, options.integer ?? false);
  if (parsed === null) {
    return {
      ok: false,
      problem: `expected ${options.integer ? "an integer" : "a number"}, got "${value}"`,
    };
  }
  if (parsed < options.min || parsed > options.max) {
    return {
      ok: false,
      problem: `must be between ${options.min} and ${options.max}, got ${parsed}`,
    };
  }
  return { ok: true, value: parsed };
};

const parseNumber = (
  value: string | null | undefined,
  integer: boolean,
): number | null => {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return null;
  }
  if (integer && !/^-?\d+$/.test(trimmed)) {
    return null;
  }
  const parsed = integer
    ? Number.parseInt(trimmed, 10)
    : Number(trimmed);
  if (!Number.isFinite(parsed)) {
    return null;
  }
  return parsed;
};
