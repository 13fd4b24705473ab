/**
 * Serialization of query results to CSV and JSON files
 *
 * Field names are a stable contract with downstream consumers.
 */

import { stringify } from "csv-stringify/sync";
import { atomicWrite } from "./io.js";
import type { Approach } from "./models.js";

export const CSV_COLUMNS = [
  "datetime_utc",
  "distance_au",
  "velocity_km_s",
  "designation",
  "name",
  "diameter_km",
  "potentially_hazardous",
] as const;

/**
 * Render approaches as CSV text with a header row
 *
 * Unknown diameters are written empty; booleans as True/False.
 */
export function toCsv(results: Iterable<Approach>): string {
  const rows = Array.from(results, (approach) => approach.toRow());
  return stringify(rows, {
    header: true,
    columns: [...CSV_COLUMNS],
    cast: {
      number: (value) => (Number.isNaN(value) ? "" : String(value)),
      boolean: (value) => (value ? "True" : "False"),
    },
  });
}

/**
 * Render approaches as a pretty-printed JSON array
 *
 * Unknown diameters become null.
 */
export function toJson(results: Iterable<Approach>): string {
  const records = Array.from(results, (approach) => approach.toRecord());
  return JSON.stringify(records, null, 2) + "\n";
}

export async function writeToCsv(results: Iterable<Approach>, filePath: string): Promise<void> {
  await atomicWrite(filePath, toCsv(results));
}

export async function writeToJson(results: Iterable<Approach>, filePath: string): Promise<void> {
  await atomicWrite(filePath, toJson(results));
}
