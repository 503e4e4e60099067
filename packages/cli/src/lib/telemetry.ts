/**
 * Telemetry and observability helpers
 */

const SANITIZE_NEWLINES = /[\r\n]+/g;

/**
 * Where metric lines go; undefined disables them
 */
export type MetricSink = ((line: string) => void) | undefined;

/**
 * Sanitize metric part by removing newlines
 */
function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Format a metric line
 */
export function formatMetric(key: string, fields: Record<string, unknown>): string {
  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }
  return parts.join(" ");
}

/**
 * Emit a metric if a sink is attached
 */
export function emitMetric(sink: MetricSink, key: string, fields: Record<string, unknown>): void {
  if (!sink) {
    return;
  }

  sink(formatMetric(key, fields) + "\n");
}

/**
 * Wrap an async function with timing metrics
 */
export async function withTiming<T>(
  sink: MetricSink,
  label: string,
  fn: () => Promise<T>
): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    const duration = Date.now() - start;
    emitMetric(sink, label, {
      duration_ms: duration,
      success,
    });
  }
}
