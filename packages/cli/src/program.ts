/**
 * Command definitions for the neoscope CLI
 */

import { Command, Option } from "commander";
import { readFileSync } from "node:fs";
import { extname } from "node:path";
import { fileURLToPath } from "node:url";
import { createFilters, limit, writeToCsv, writeToJson, type Approach } from "@neoscope/sdk";
import { parseDate, parseDecimal, parseNonNegativeInt } from "./lib/arg.js";
import { openCliDatabase } from "./lib/database.js";
import { resolveSourcePaths } from "./lib/env.js";
import { CliError } from "./lib/errors.js";
import {
  describeApproaches,
  describeNeo,
  highlightError,
  printJson,
  printLines,
} from "./lib/render.js";
import { timeCommand } from "./lib/telemetry.js";

/** Results printed to stdout when no --limit is given */
export const DEFAULT_PRINT_LIMIT = 10;

export interface GlobalOptions {
  neofile?: string;
  cadfile?: string;
  verbose?: boolean;
  quiet?: boolean;
}

interface InspectOptions {
  pdes?: string;
  name?: string;
  verbose?: boolean;
}

interface QueryOptions {
  date?: string;
  startDate?: string;
  endDate?: string;
  minDistance?: number;
  maxDistance?: number;
  minVelocity?: number;
  maxVelocity?: number;
  minDiameter?: number;
  maxDiameter?: number;
  hazardous?: boolean;
  notHazardous?: boolean;
  limit?: number;
  outfile?: string;
  json?: boolean;
}

function readVersion(): string {
  const packagePath = fileURLToPath(new URL("../package.json", import.meta.url));
  const parsed: unknown = JSON.parse(readFileSync(packagePath, "utf-8"));
  if (parsed !== null && typeof parsed === "object" && "version" in parsed) {
    return String(parsed.version);
  }
  return "0.0.0";
}

async function writeResults(results: readonly Approach[], outfile: string): Promise<void> {
  const ext = extname(outfile).toLowerCase();
  if (ext === ".csv") {
    await writeToCsv(results, outfile);
  } else if (ext === ".json") {
    await writeToJson(results, outfile);
  } else {
    throw new CliError(`Output file must end in .csv or .json: ${outfile}`);
  }
}

/**
 * Build the CLI program
 *
 * Errors (including commander usage errors) are thrown rather than exiting the process.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .configureOutput({
      writeErr: (str) => process.stderr.write(highlightError(str)),
    })
    .exitOverride()
    .enablePositionalOptions()
    .name("neoscope")
    .description("Explore near-Earth objects and their close approaches to Earth")
    .version(readVersion())
    .option("--neofile <path>", "NEO CSV feed")
    .option("--cadfile <path>", "Close-approach JSON feed")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Skip the confirmation printed after writing --outfile");

  program
    .command("inspect")
    .description("Show a single NEO, by primary designation or by name")
    .option("--pdes <designation>", "Primary designation")
    .option("--name <name>", "IAU name")
    .option("--verbose", "Also list the NEO's close approaches")
    .action(async (options: InspectOptions) => {
      await timeCommand("cli.inspect", async () => {
        if ((options.pdes === undefined) === (options.name === undefined)) {
          throw new CliError("Specify exactly one of --pdes or --name");
        }

        const db = await openCliDatabase(resolveSourcePaths(program.opts<GlobalOptions>()));
        const neo =
          options.pdes !== undefined
            ? db.getNeoByDesignation(options.pdes)
            : db.getNeoByName(options.name);

        if (neo === undefined) {
          throw new CliError("No matching NEOs exist in the database.", { exitCode: 2 });
        }

        printLines(describeNeo(neo, options.verbose ?? false));
      });
    });

  program
    .command("query")
    .description("Query close approaches matching all of the given criteria")
    .option("--date <date>", "Approaches on this date (YYYY-MM-DD)", (v) => parseDate(v, "--date"))
    .option("--start-date <date>", "Approaches on or after this date", (v) =>
      parseDate(v, "--start-date")
    )
    .option("--end-date <date>", "Approaches on or before this date", (v) =>
      parseDate(v, "--end-date")
    )
    .option("--min-distance <au>", "Minimum approach distance", (v) =>
      parseDecimal(v, "--min-distance")
    )
    .option("--max-distance <au>", "Maximum approach distance", (v) =>
      parseDecimal(v, "--max-distance")
    )
    .option("--min-velocity <kms>", "Minimum relative velocity", (v) =>
      parseDecimal(v, "--min-velocity")
    )
    .option("--max-velocity <kms>", "Maximum relative velocity", (v) =>
      parseDecimal(v, "--max-velocity")
    )
    .option("--min-diameter <km>", "Minimum NEO diameter", (v) =>
      parseDecimal(v, "--min-diameter")
    )
    .option("--max-diameter <km>", "Maximum NEO diameter", (v) =>
      parseDecimal(v, "--max-diameter")
    )
    .option("--hazardous", "Only potentially hazardous NEOs")
    .addOption(
      new Option("--not-hazardous", "Only NEOs that are not potentially hazardous").conflicts(
        "hazardous"
      )
    )
    .option("--limit <n>", "Maximum results (0 = unlimited)", (v) =>
      parseNonNegativeInt(v, "--limit")
    )
    .option("--outfile <path>", "Write results to a .csv or .json file")
    .option("--json", "Print results as a JSON array")
    .action(async (options: QueryOptions) => {
      await timeCommand("cli.query", async () => {
        const globals = program.opts<GlobalOptions>();

        let hazardous: boolean | undefined;
        if (options.hazardous) hazardous = true;
        else if (options.notHazardous) hazardous = false;

        const filters = createFilters({
          date: options.date,
          startDate: options.startDate,
          endDate: options.endDate,
          distanceMin: options.minDistance,
          distanceMax: options.maxDistance,
          velocityMin: options.minVelocity,
          velocityMax: options.maxVelocity,
          diameterMin: options.minDiameter,
          diameterMax: options.maxDiameter,
          hazardous,
        });

        const db = await openCliDatabase(resolveSourcePaths(globals));

        if (options.outfile !== undefined) {
          const results = Array.from(limit(db.query(filters), options.limit));
          await writeResults(results, options.outfile);
          if (!globals.quiet) {
            console.log(`Wrote ${results.length} result(s) to ${options.outfile}`);
          }
          return;
        }

        const results = limit(db.query(filters), options.limit ?? DEFAULT_PRINT_LIMIT);
        if (options.json) {
          printJson(Array.from(results, (approach) => approach.toRecord()));
        } else {
          printLines(describeApproaches(results));
        }
      });
    });

  return program;
}
