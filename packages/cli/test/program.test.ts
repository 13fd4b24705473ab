/**
 * In-process tests for the neoscope commands
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { CommanderError } from "commander";
import {
  createTempDir,
  removeDir,
  writeCadJson,
  writeNeoCsv,
  type ApproachFixture,
} from "@neoscope/testkit";
import { createProgram } from "../src/program.js";
import { CliError } from "../src/lib/errors.js";

const EROS_2020 =
  "On 2020-01-01 00:00, '433 (Eros)' approaches Earth at a distance of 0.15 au and a velocity of 5.00 km/s.";
const APOPHIS_2029 =
  "On 2029-04-13 21:46, '99942 (Apophis)' approaches Earth at a distance of 0.00 au and a velocity of 7.42 km/s.";
const OK_2019 =
  "On 2019-07-25 01:22, '2019 OK' approaches Earth at a distance of 0.00 au and a velocity of 24.50 km/s.";
const EROS_2021 =
  "On 2021-03-05 04:00, '433 (Eros)' approaches Earth at a distance of 0.40 au and a velocity of 4.10 km/s.";

const APPROACHES: ApproachFixture[] = [
  { des: "433", cd: "2020-Jan-01 00:00", dist: "0.15", v_rel: "5" },
  { des: "99942", cd: "2029-Apr-13 21:46", dist: "0.00025", v_rel: "7.42" },
  { des: "2019 OK", cd: "2019-Jul-25 01:22", dist: "0.00048", v_rel: "24.5" },
  { des: "433", cd: "2021-Mar-05 04:00", dist: "0.4", v_rel: "4.1" },
];

function captureOutput() {
  return {
    log: vi.spyOn(console, "log").mockImplementation(() => {}),
    stderr: vi.spyOn(process.stderr, "write").mockImplementation(() => true),
  };
}

describe("neoscope program", () => {
  let testDir: string;
  let neoFile: string;
  let cadFile: string;
  let output: ReturnType<typeof captureOutput>;

  beforeEach(async () => {
    testDir = await createTempDir();
    neoFile = await writeNeoCsv(testDir, [
      { pdes: "433", name: "Eros", diameter: "16.84", pha: "N" },
      { pdes: "99942", name: "Apophis", diameter: "0.37", pha: "Y" },
      { pdes: "2019 OK" },
    ]);
    cadFile = await writeCadJson(testDir, APPROACHES);
    output = captureOutput();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    await removeDir(testDir);
  });

  function run(...args: string[]) {
    return createProgram().parseAsync(["--neofile", neoFile, "--cadfile", cadFile, ...args], {
      from: "user",
    });
  }

  function printed(): string[] {
    return output.log.mock.calls.map((call) => String(call[0]));
  }

  describe("inspect", () => {
    it("should show a NEO by designation", async () => {
      await run("inspect", "--pdes", "433");

      expect(printed()).toEqual([
        "NEO 433 (Eros) has a diameter of 16.840 km and is not potentially hazardous.",
      ]);
    });

    it("should show a NEO by name with its approaches", async () => {
      await run("inspect", "--name", "apophis", "--verbose");

      expect(printed()).toEqual([
        "NEO 99942 (Apophis) has a diameter of 0.370 km and is potentially hazardous.",
        `- ${APOPHIS_2029}`,
      ]);
    });

    it("should exit with 2 when nothing matches", async () => {
      const attempt = run("inspect", "--pdes", "1036");

      await expect(attempt).rejects.toBeInstanceOf(CliError);
      await expect(attempt).rejects.toMatchObject({
        message: "No matching NEOs exist in the database.",
        exitCode: 2,
      });
    });

    it("should require exactly one lookup key", async () => {
      await expect(run("inspect")).rejects.toThrow("Specify exactly one of --pdes or --name");
      await expect(run("inspect", "--pdes", "433", "--name", "Eros")).rejects.toMatchObject({
        exitCode: 1,
      });
    });

    it("should emit link and timing metrics when verbose", async () => {
      vi.stubEnv("NEOSCOPE_CLI_DEBUG", "1");

      await run("inspect", "--pdes", "433");

      const lines = output.stderr.mock.calls.map((call) => String(call[0]));
      expect(lines[0]).toBe("metric cli.link strategy=scan linked=4 unmatched=0 total=4\n");
      expect(lines[1]).toMatch(/^metric cli\.inspect duration_ms=\d+ success=true\n$/);
    });
  });

  describe("query", () => {
    it("should print every approach in stored order without criteria", async () => {
      await run("query");

      expect(printed()).toEqual([EROS_2020, APOPHIS_2029, OK_2019, EROS_2021]);
    });

    it("should apply all criteria together", async () => {
      await run("query", "--start-date", "2020-01-01", "--max-distance", "0.2");

      expect(printed()).toEqual([EROS_2020, APOPHIS_2029]);
    });

    it("should filter on the hazard flag", async () => {
      await run("query", "--hazardous");
      expect(printed()).toEqual([APOPHIS_2029]);

      output.log.mockClear();
      await run("query", "--not-hazardous", "--min-diameter", "1");
      expect(printed()).toEqual([EROS_2020, EROS_2021]);
    });

    it("should honour --limit", async () => {
      await run("query", "--max-distance", "0.001", "--limit", "1");

      expect(printed()).toEqual([APOPHIS_2029]);
    });

    it("should print at most ten results by default", async () => {
      const many = Array.from({ length: 12 }, (_, i) => ({
        des: "433",
        cd: `2030-Jan-${i + 1} 00:00`,
        dist: "0.3",
        v_rel: "6",
      }));
      cadFile = await writeCadJson(testDir, many, "many.json");

      await run("query");
      expect(printed()).toHaveLength(10);

      output.log.mockClear();
      await run("query", "--limit", "0");
      expect(printed()).toHaveLength(12);
    });

    it("should print JSON records", async () => {
      await run("query", "--date", "2020-01-01", "--json");

      expect(JSON.parse(printed()[0])).toEqual([
        {
          datetime_utc: "2020-01-01 00:00",
          distance_au: 0.15,
          velocity_km_s: 5,
          neo: { designation: "433", name: "Eros", diameter_km: 16.84, potentially_hazardous: false },
        },
      ]);
    });

    it("should write results to a CSV file", async () => {
      const outfile = join(testDir, "out", "results.csv");

      await run("query", "--min-velocity", "7", "--outfile", outfile);

      expect(await readFile(outfile, "utf8")).toBe(
        "datetime_utc,distance_au,velocity_km_s,designation,name,diameter_km,potentially_hazardous\n" +
          "2029-04-13 21:46,0.00025,7.42,99942,Apophis,0.37,True\n" +
          "2019-07-25 01:22,0.00048,24.5,2019 OK,,,False\n"
      );
      expect(printed()).toEqual([`Wrote 2 result(s) to ${outfile}`]);
    });

    it("should write results to a JSON file quietly", async () => {
      const outfile = join(testDir, "results.json");

      await createProgram().parseAsync(
        [
          "--neofile",
          neoFile,
          "--cadfile",
          cadFile,
          "--quiet",
          "query",
          "--date",
          "2019-07-25",
          "--outfile",
          outfile,
        ],
        { from: "user" }
      );

      const written: unknown = JSON.parse(await readFile(outfile, "utf8"));
      expect(written).toEqual([
        {
          datetime_utc: "2019-07-25 01:22",
          distance_au: 0.00048,
          velocity_km_s: 24.5,
          neo: { designation: "2019 OK", name: "", diameter_km: null, potentially_hazardous: false },
        },
      ]);
      expect(printed()).toEqual([]);
    });

    it("should still print results under --quiet", async () => {
      await createProgram().parseAsync(
        ["--neofile", neoFile, "--cadfile", cadFile, "--quiet", "query", "--hazardous"],
        { from: "user" }
      );

      expect(printed()).toEqual([APOPHIS_2029]);
    });

    it("should reject other output extensions", async () => {
      const outfile = join(testDir, "results.txt");

      await expect(run("query", "--outfile", outfile)).rejects.toThrow(
        `Output file must end in .csv or .json: ${outfile}`
      );
    });

    it("should reject conflicting hazard flags", async () => {
      const attempt = run("query", "--hazardous", "--not-hazardous");

      await expect(attempt).rejects.toBeInstanceOf(CommanderError);
      await expect(attempt).rejects.toMatchObject({ code: "commander.conflictingOption", exitCode: 1 });
    });

    it("should reject malformed option values", async () => {
      await expect(run("query", "--limit", "ten")).rejects.toMatchObject({
        code: "commander.invalidArgument",
      });
      await expect(run("query", "--date", "01/01/2020")).rejects.toMatchObject({
        code: "commander.invalidArgument",
      });
    });
  });

  describe("sources", () => {
    it("should read feed paths from the environment", async () => {
      vi.stubEnv("NEOSCOPE_NEO_FILE", neoFile);
      vi.stubEnv("NEOSCOPE_CAD_FILE", cadFile);

      await createProgram().parseAsync(["inspect", "--name", "EROS"], { from: "user" });

      expect(printed()).toEqual([
        "NEO 433 (Eros) has a diameter of 16.840 km and is not potentially hazardous.",
      ]);
    });

    it("should log and rethrow a missing feed", async () => {
      const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
      neoFile = join(testDir, "absent.csv");

      await expect(run("inspect", "--pdes", "433")).rejects.toMatchObject({ code: "ENOENT" });
      expect(String(errorSpy.mock.calls[0][0])).toContain(`[load.failed] ${neoFile}`);
    });
  });
});
