/**
 * Output rendering helpers
 */

import type { Approach, Neo } from "@neoscope/sdk";

/**
 * Print data as indented JSON to stdout
 */
export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

/**
 * Print lines to stdout (one per line)
 */
export function printLines(lines: Iterable<string>): void {
  for (const line of lines) {
    console.log(line);
  }
}

/**
 * Summary of a NEO, optionally followed by one line per approach
 */
export function describeNeo(neo: Neo, withApproaches = false): string[] {
  const lines = [neo.toString()];
  if (withApproaches) {
    for (const approach of neo.approaches) {
      lines.push(`- ${approach.toString()}`);
    }
  }
  return lines;
}

export function* describeApproaches(approaches: Iterable<Approach>): Generator<string> {
  for (const approach of approaches) {
    yield approach.toString();
  }
}

/**
 * Color error output red when the stream is a terminal
 */
export function highlightError(
  text: string,
  stream: { readonly isTTY?: boolean } = process.stderr
): string {
  return stream.isTTY ? `\x1b[31m${text}\x1b[0m` : text;
}
