/**
 * Metrics for verbose runs
 *
 * Written to stderr as `metric <name> key=value ...`, and only when
 * NEOSCOPE_CLI_DEBUG=1.
 */

import type { LinkProgress } from "@neoscope/sdk";
import { isVerbose } from "./env.js";
import { writeStderr } from "./io.js";

export type CommandMetric = "cli.inspect" | "cli.query";

export type MetricName = CommandMetric | "cli.link";

type MetricFields = Readonly<Record<string, string | number | boolean>>;

/**
 * Render one metric line; whitespace inside values becomes "_"
 */
export function formatMetric(name: MetricName, fields: MetricFields): string {
  const pairs = Object.entries(fields).map(
    ([key, value]) => `${key}=${String(value).trim().replace(/\s+/g, "_")}`
  );
  return ["metric", name, ...pairs].join(" ");
}

function emit(name: MetricName, fields: MetricFields): void {
  if (isVerbose()) {
    writeStderr(formatMetric(name, fields) + "\n");
  }
}

/**
 * Report the outcome of linking the two feeds
 */
export function reportLink(progress: LinkProgress): void {
  emit("cli.link", {
    strategy: progress.strategy,
    linked: progress.linked,
    unmatched: progress.unmatched,
    total: progress.total,
  });
}

/**
 * Run a command body and report its duration and outcome
 */
export async function timeCommand<T>(name: CommandMetric, run: () => Promise<T>): Promise<T> {
  const started = performance.now();
  let success = false;
  try {
    const result = await run();
    success = true;
    return result;
  } finally {
    emit(name, { duration_ms: Math.round(performance.now() - started), success });
  }
}
