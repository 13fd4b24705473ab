/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";

export const DEFAULT_NEO_FILE = "./data/neos.csv";
export const DEFAULT_CAD_FILE = "./data/cad.json";

/**
 * Absolute paths of the two source feeds
 */
export interface SourcePaths {
  neoFile: string;
  cadFile: string;
}

/**
 * Expand tilde (~) to home directory
 */
function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the source feed paths
 * Priority: CLI option > NEOSCOPE_NEO_FILE / NEOSCOPE_CAD_FILE > defaults under ./data
 */
export function resolveSourcePaths(cli: { neofile?: string; cadfile?: string } = {}): SourcePaths {
  const neoFile = cli.neofile ?? process.env.NEOSCOPE_NEO_FILE ?? DEFAULT_NEO_FILE;
  const cadFile = cli.cadfile ?? process.env.NEOSCOPE_CAD_FILE ?? DEFAULT_CAD_FILE;
  return {
    neoFile: path.resolve(expandTilde(neoFile)),
    cadFile: path.resolve(expandTilde(cadFile)),
  };
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return process.env.NEOSCOPE_CLI_DEBUG === "1";
}
