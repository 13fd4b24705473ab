import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { createTempDir, removeDir } from "@neoscope/testkit";
import { linkApproaches } from "./linker.js";
import { Approach, Neo } from "./models.js";
import { CSV_COLUMNS, toCsv, toJson, writeToCsv, writeToJson } from "./write.js";

function results(): Approach[] {
  const neos = [
    new Neo({ designation: "433", name: "Eros", diameter: "16.84", hazardous: "N" }),
    new Neo({ designation: "99942", name: "Apophis", diameter: "0.37", hazardous: "Y" }),
  ];
  const approaches = [
    new Approach({ designation: "433", time: "2020-Jan-01 00:00", distance: "0.15", velocity: "5" }),
    new Approach({ designation: "99942", time: "2029-Apr-13 21:46", distance: "0.00025", velocity: "7.42" }),
    new Approach({ designation: "7", time: "2020-Jan-01 09:00", distance: "0.2", velocity: "9" }),
  ];
  linkApproaches(neos, approaches);
  return approaches;
}

const CSV_TEXT =
  "datetime_utc,distance_au,velocity_km_s,designation,name,diameter_km,potentially_hazardous\n" +
  "2020-01-01 00:00,0.15,5,433,Eros,16.84,False\n" +
  "2029-04-13 21:46,0.00025,7.42,99942,Apophis,0.37,True\n" +
  "2020-01-01 09:00,0.2,9,7,,,False\n";

describe("toCsv", () => {
  it("should write a header and one row per approach", () => {
    expect(toCsv(results())).toBe(CSV_TEXT);
  });

  it("should write only the header for no results", () => {
    expect(toCsv([])).toBe(CSV_COLUMNS.join(",") + "\n");
  });

  it("should quote names containing commas", () => {
    const neo = new Neo({ designation: "1", name: "Comma, Inc", diameter: "1" });
    const approach = new Approach({ designation: "1", time: "2020-Jan-01 00:00" });
    linkApproaches([neo], [approach]);

    expect(toCsv([approach]).split("\n")[1]).toBe('2020-01-01 00:00,0,0,1,"Comma, Inc",1,False');
  });
});

describe("toJson", () => {
  it("should nest the NEO and write unknown diameters as null", () => {
    expect(JSON.parse(toJson(results()))).toEqual([
      {
        datetime_utc: "2020-01-01 00:00",
        distance_au: 0.15,
        velocity_km_s: 5,
        neo: { designation: "433", name: "Eros", diameter_km: 16.84, potentially_hazardous: false },
      },
      {
        datetime_utc: "2029-04-13 21:46",
        distance_au: 0.00025,
        velocity_km_s: 7.42,
        neo: { designation: "99942", name: "Apophis", diameter_km: 0.37, potentially_hazardous: true },
      },
      {
        datetime_utc: "2020-01-01 09:00",
        distance_au: 0.2,
        velocity_km_s: 9,
        neo: { designation: "7", name: "", diameter_km: null, potentially_hazardous: false },
      },
    ]);
  });

  it("should write an empty array for no results", () => {
    expect(toJson([])).toBe("[]\n");
  });
});

describe("file writers", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await createTempDir();
  });

  afterEach(async () => {
    await removeDir(testDir);
  });

  it("should write CSV results to disk", async () => {
    const filePath = join(testDir, "out.csv");

    await writeToCsv(results(), filePath);

    expect(await readFile(filePath, "utf8")).toBe(CSV_TEXT);
  });

  it("should write JSON results to disk", async () => {
    const filePath = join(testDir, "nested", "out.json");

    await writeToJson(results().slice(0, 1), filePath);

    const written = await readFile(filePath, "utf8");
    expect(written).toBe(toJson(results().slice(0, 1)));
    expect(written.startsWith('[\n  {\n    "datetime_utc": "2020-01-01 00:00",')).toBe(true);
  });

  it("should consume a lazy result stream", async () => {
    const filePath = join(testDir, "out.csv");
    const approaches = results();

    await writeToCsv((function* () { yield* approaches; })(), filePath);

    expect(await readFile(filePath, "utf8")).toBe(CSV_TEXT);
  });
});
