/**
 * Catalogue loading for CLI commands
 */

import { loadApproaches, loadNeos, NeoDatabase, type DatabaseOptions } from "@neoscope/sdk";
import type { SourcePaths } from "./env.js";
import { reportLink } from "./telemetry.js";

/**
 * Load both feeds and build a linked database
 *
 * Link progress is reported as a "cli.link" metric in verbose mode.
 */
export async function openCliDatabase(
  paths: SourcePaths,
  options: DatabaseOptions = {}
): Promise<NeoDatabase> {
  const [neos, approaches] = await Promise.all([
    loadNeos(paths.neoFile),
    loadApproaches(paths.cadFile),
  ]);

  return new NeoDatabase(neos, approaches, {
    onProgress: reportLink,
    ...options,
  });
}
