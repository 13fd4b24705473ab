/**
 * Feed-file fixtures in the shape of the NEO CSV and CAD JSON sources
 */

import { writeFile } from "node:fs/promises";
import { join } from "node:path";

export interface NeoFixture {
  pdes: string;
  name?: string;
  diameter?: string;
  pha?: string;
}

export interface ApproachFixture {
  des: string;
  cd: string;
  dist?: string | null;
  v_rel?: string | null;
}

/**
 * Column order used by the NEO feed fixture; extra columns mimic the real feed
 */
export const NEO_CSV_HEADER = ["id", "pdes", "name", "pha", "diameter", "albedo"] as const;

export const CAD_FIELDS = ["des", "orbit_id", "jd", "cd", "dist", "dist_min", "v_rel"] as const;

function csvCell(value: string): string {
  return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Render NEO fixtures as CSV text
 */
export function neoCsv(neos: readonly NeoFixture[]): string {
  const lines = [NEO_CSV_HEADER.join(",")];
  neos.forEach((neo, i) => {
    const row = [`a${i}`, neo.pdes, neo.name ?? "", neo.pha ?? "", neo.diameter ?? "", ""];
    lines.push(row.map(csvCell).join(","));
  });
  return lines.join("\n") + "\n";
}

/**
 * Render approach fixtures as a CAD JSON envelope
 */
export function cadJson(approaches: readonly ApproachFixture[]): string {
  const data = approaches.map((a) => [
    a.des,
    "1",
    "2451545.0",
    a.cd,
    a.dist ?? null,
    a.dist ?? null,
    a.v_rel ?? null,
  ]);
  return JSON.stringify({
    signature: { source: "fixture", version: "1.5" },
    count: String(data.length),
    fields: [...CAD_FIELDS],
    data,
  });
}

/**
 * Write a NEO CSV fixture into a directory
 * @returns Path of the written file
 */
export async function writeNeoCsv(
  dir: string,
  neos: readonly NeoFixture[],
  fileName = "neos.csv"
): Promise<string> {
  const filePath = join(dir, fileName);
  await writeFile(filePath, neoCsv(neos), "utf8");
  return filePath;
}

/**
 * Write a CAD JSON fixture into a directory
 * @returns Path of the written file
 */
export async function writeCadJson(
  dir: string,
  approaches: readonly ApproachFixture[],
  fileName = "cad.json"
): Promise<string> {
  const filePath = join(dir, fileName);
  await writeFile(filePath, cadJson(approaches), "utf8");
  return filePath;
}
