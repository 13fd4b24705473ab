/**
 * Loading of the NEO and close-approach feeds
 *
 * NEO feed: CSV with a header row; columns `pdes`, `name`, `diameter`, `pha`.
 * CAD feed: JSON `{ fields: [...], data: [[...], ...] }`; columns `des`, `cd`,
 * `dist`, `v_rel`, located by name in `fields`.
 *
 * Records are coerced, not validated: gaps become the model defaults.
 */

import { parse } from "csv-parse/sync";
import { z } from "zod";
import { SourceFormatError } from "./errors.js";
import { readSource } from "./io.js";
import { Approach, Neo } from "./models.js";
import { logger } from "./observability/logs.js";
import type { RawField } from "./types.js";

const CsvRowsSchema = z.array(z.array(z.string()));

const CellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const CadEnvelopeSchema = z.object({
  fields: z.array(z.string()),
  data: z.array(z.array(CellSchema)),
});

function columnIndex(header: readonly string[], column: string, filePath: string): number {
  const index = header.indexOf(column);
  if (index < 0) {
    throw new SourceFormatError(filePath, `missing column "${column}"`);
  }
  return index;
}

function cell(row: readonly RawField[], index: number): RawField {
  return index < row.length ? row[index] : undefined;
}

/**
 * Read NEOs from a CSV file
 * @throws The fs error for a missing or unreadable file (after logging)
 * @throws SourceFormatError when the CSV cannot be parsed or lacks a column
 */
export async function loadNeos(csvPath: string): Promise<Neo[]> {
  const content = await readSource(csvPath);

  let parsed: unknown;
  try {
    parsed = parse(content, { skip_empty_lines: true, relax_column_count: true });
  } catch (err) {
    throw new SourceFormatError(csvPath, "invalid CSV", { cause: err });
  }

  const rows = CsvRowsSchema.safeParse(parsed);
  if (!rows.success || rows.data.length === 0) {
    throw new SourceFormatError(csvPath, "missing header row");
  }

  const [header, ...records] = rows.data;
  const columns = {
    designation: columnIndex(header, "pdes", csvPath),
    name: columnIndex(header, "name", csvPath),
    diameter: columnIndex(header, "diameter", csvPath),
    hazardous: columnIndex(header, "pha", csvPath),
  };

  const neos = records.map(
    (row) =>
      new Neo({
        designation: cell(row, columns.designation),
        name: cell(row, columns.name),
        diameter: cell(row, columns.diameter),
        hazardous: cell(row, columns.hazardous),
      })
  );

  logger.debug("load.complete", { source: csvPath, details: { neos: neos.length } });
  return neos;
}

/**
 * Read close approaches from a CAD JSON file
 * @throws The fs error for a missing or unreadable file (after logging)
 * @throws SourceFormatError when the JSON is invalid or lacks the envelope or a column
 */
export async function loadApproaches(jsonPath: string): Promise<Approach[]> {
  const content = await readSource(jsonPath);

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new SourceFormatError(jsonPath, "invalid JSON", { cause: err });
  }

  const envelope = CadEnvelopeSchema.safeParse(parsed);
  if (!envelope.success) {
    throw new SourceFormatError(jsonPath, "expected { fields, data }", { cause: envelope.error });
  }

  const { fields, data } = envelope.data;
  const columns = {
    designation: columnIndex(fields, "des", jsonPath),
    time: columnIndex(fields, "cd", jsonPath),
    distance: columnIndex(fields, "dist", jsonPath),
    velocity: columnIndex(fields, "v_rel", jsonPath),
  };

  const approaches = data.map(
    (row) =>
      new Approach({
        designation: cell(row, columns.designation),
        time: cell(row, columns.time),
        distance: cell(row, columns.distance),
        velocity: cell(row, columns.velocity),
      })
  );

  logger.debug("load.complete", { source: jsonPath, details: { approaches: approaches.length } });
  return approaches;
}
