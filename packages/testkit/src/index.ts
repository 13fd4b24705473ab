export { createTempDir, removeDir, withTempDir } from "./fs.js";
export {
  neoCsv,
  cadJson,
  writeNeoCsv,
  writeCadJson,
  NEO_CSV_HEADER,
  CAD_FIELDS,
} from "./fixtures.js";
export type { NeoFixture, ApproachFixture } from "./fixtures.js";
