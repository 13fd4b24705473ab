/**
 * Coercion of raw feed fields into normalized values
 *
 * Nothing here throws: unknown or malformed values become the documented
 * defaults (undefined text, NaN diameter, 0 measurements, invalid Date).
 */

import type { RawField } from "./types.js";

const MONTHS: Record<string, number> = {
  jan: 0,
  feb: 1,
  mar: 2,
  apr: 3,
  may: 4,
  jun: 5,
  jul: 6,
  aug: 7,
  sep: 8,
  oct: 9,
  nov: 10,
  dec: 11,
};

// CAD compact form: 2020-Jan-01 00:00
const CAD_TIME = /^(\d{4})-([A-Za-z]{3})-(\d{1,2})\s+(\d{1,2}):(\d{2})$/;
const ISO_TIME = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2}))?)?Z?$/;
const CALENDAR_DAY = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Trim a text field; blank or non-string values are absent
 */
export function normalizeText(value: RawField): string | undefined {
  if (value === null || value === undefined || typeof value === "boolean") {
    return undefined;
  }
  const text = String(value).trim();
  return text === "" ? undefined : text;
}

/**
 * Comparison key for designations and names
 */
export function normalizeKey(value: string | null | undefined): string | undefined {
  if (value === null || value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed.toLowerCase();
}

function toNumber(value: RawField): number {
  if (typeof value === "number") return value;
  if (typeof value !== "string" || value.trim() === "") return Number.NaN;
  return Number(value.trim());
}

/**
 * Diameter in km, NaN when unknown
 */
export function parseDiameter(value: RawField): number {
  return toNumber(value);
}

/**
 * Distance or velocity; falls back when absent or unparseable
 */
export function parseMeasurement(value: RawField, fallback = 0): number {
  const parsed = toNumber(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

/**
 * "Y" (or true) is hazardous; everything else is not
 */
export function parseHazardous(value: RawField): boolean {
  if (typeof value === "boolean") return value;
  return typeof value === "string" && value.trim().toUpperCase() === "Y";
}

function utcDate(
  year: number,
  month: number,
  day: number,
  hours = 0,
  minutes = 0,
  seconds = 0
): Date {
  const date = new Date(Date.UTC(year, month, day, hours, minutes, seconds));
  // Reject rollovers such as Feb 30
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month ||
    date.getUTCDate() !== day ||
    hours > 23 ||
    minutes > 59 ||
    seconds > 59
  ) {
    return new Date(Number.NaN);
  }
  return date;
}

/**
 * Parse an approach timestamp (always UTC)
 * @returns A Date, invalid when the value cannot be parsed
 */
export function parseApproachTime(value: RawField | Date): Date {
  if (value instanceof Date) return new Date(value.getTime());
  if (typeof value !== "string") return new Date(Number.NaN);

  const text = value.trim();
  const cad = CAD_TIME.exec(text);
  if (cad) {
    const month = MONTHS[cad[2].toLowerCase()];
    if (month === undefined) return new Date(Number.NaN);
    return utcDate(Number(cad[1]), month, Number(cad[3]), Number(cad[4]), Number(cad[5]));
  }

  const iso = ISO_TIME.exec(text);
  if (iso) {
    return utcDate(
      Number(iso[1]),
      Number(iso[2]) - 1,
      Number(iso[3]),
      Number(iso[4] ?? 0),
      Number(iso[5] ?? 0),
      Number(iso[6] ?? 0)
    );
  }

  return new Date(Number.NaN);
}

function isValidDate(date: Date): boolean {
  return !Number.isNaN(date.getTime());
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

/**
 * UTC calendar day as YYYY-MM-DD
 *
 * Strings must already be in that form and name a real day.
 * @returns undefined for an invalid Date or string
 */
export function toCalendarDay(value: Date | string): string | undefined {
  if (typeof value === "string") {
    const match = CALENDAR_DAY.exec(value.trim());
    if (!match) return undefined;
    const date = utcDate(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
    return isValidDate(date) ? value.trim() : undefined;
  }
  if (!isValidDate(value)) return undefined;
  return `${pad(value.getUTCFullYear(), 4)}-${pad(value.getUTCMonth() + 1)}-${pad(value.getUTCDate())}`;
}

/**
 * Format a time as "YYYY-MM-DD HH:MM" (UTC); empty for an invalid Date
 */
export function formatTimestamp(date: Date): string {
  const day = toCalendarDay(date);
  if (day === undefined) return "";
  return `${day} ${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}`;
}
