import { ConfigError } from "./errors.js";

/**
 * Reads an integer flag. Absent flags give `undefined`; anything that is not an integer in range
 * is a ConfigError rather than a quiet fallback.
 */
export function parseIntegerOption(
  raw: string | boolean | undefined,
  flag: string,
  min: number,
  max?: number
): number | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  const value = Number(raw.trim());
  const inRange = Number.isInteger(value) && value >= min && (max === undefined || value <= max);
  if (raw.trim().length === 0 || !inRange) {
    const range = max === undefined ? `>= ${min}` : `between ${min} and ${max}`;
    throw new ConfigError(`${flag} must be an integer ${range}, got '${raw}'`);
  }
  return value;
}
