/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import { toCalendarDay } from "@neoscope/sdk";

/**
 * Parse a non-negative integer argument
 */
export function parseNonNegativeInt(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError(`${name} is too large`);
  }

  return parsed;
}

/**
 * Parse a finite decimal argument (distances, velocities, diameters)
 */
export function parseDecimal(value: string, name: string): number {
  const trimmed = value.trim();
  const parsed = trimmed === "" ? Number.NaN : Number(trimmed);

  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`${name} must be a number`);
  }

  return parsed;
}

/**
 * Parse a calendar date argument in YYYY-MM-DD form
 */
export function parseDate(value: string, name: string): string {
  const day = toCalendarDay(value);
  if (day === undefined) {
    throw new InvalidArgumentError(`${name} must be a date in YYYY-MM-DD form`);
  }
  return day;
}
