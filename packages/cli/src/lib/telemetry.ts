/**
 * Command timing lines, written to the command's stderr when diagnostics are on
 */

import type { Output } from "./render.js";

export type MetricValue = string | number | boolean;

/**
 * Where timing lines go, and whether they are written at all
 */
export interface MetricSink {
  output: Output;
  enabled: boolean;
}

/**
 * Collapse line breaks so one metric always stays on one line
 */
function flatten(part: MetricValue): string {
  return String(part).replace(/[\r\n]+/g, " ").trim();
}

/**
 * Render a metric as `metric <key> field=value ...`
 */
export function formatMetric(key: string, fields: Record<string, MetricValue>): string {
  const pairs = Object.entries(fields).map(([name, value]) => `${flatten(name)}=${flatten(value)}`);
  return [`metric ${flatten(key)}`, ...pairs].join(" ");
}

export function emitMetric(
  sink: MetricSink,
  key: string,
  fields: Record<string, MetricValue>
): void {
  if (sink.enabled) {
    sink.output.stderr(formatMetric(key, fields) + "\n");
  }
}

/**
 * Run a command body and report its duration and outcome, rethrowing any failure
 */
export async function withTiming<T>(
  sink: MetricSink,
  command: string,
  fn: () => Promise<T>
): Promise<T> {
  const startedAt = performance.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    emitMetric(sink, `cli.${command}`, {
      duration_ms: Math.round(performance.now() - startedAt),
      success,
    });
  }
}
