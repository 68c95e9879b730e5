/**
 * Process-wide counters for input the terminal could not interpret.
 * The core never logs; callers read these to see what was dropped.
 */

export type VtMetricName =
  | 'vt_unknown_escape'
  | 'vt_unknown_csi'
  | 'vt_unknown_private_mode'
  | 'vt_unknown_osc'
  | 'vt_invalid_utf8'
  | 'vt_abandoned_sequence'
  | 'vt_reentrant_mutation';

type MetricTags = Record<string, string | number | undefined>;

const counters = new Map<string, number>();

function metricKey(name: VtMetricName, tags?: MetricTags): string {
  if (!tags) return name;
  const tagText = Object.entries(tags)
    .filter(([, value]) => value !== undefined)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([key, value]) => `${key}=${String(value)}`)
    .join(',');
  return tagText.length === 0 ? name : `${name}|${tagText}`;
}

export function incVtMetric(name: VtMetricName, tags?: MetricTags): void {
  const key = metricKey(name, tags);
  counters.set(key, (counters.get(key) ?? 0) + 1);
}

export function getVtMetric(name: VtMetricName, tags?: MetricTags): number {
  return counters.get(metricKey(name, tags)) ?? 0;
}

/** Sum of a metric across all tag combinations. */
export function getVtMetricTotal(name: VtMetricName): number {
  let total = 0;
  for (const [key, value] of counters) {
    if (key === name || key.startsWith(`${name}|`)) total += value;
  }
  return total;
}

export function getVtMetricSnapshot(): Record<string, number> {
  return Object.fromEntries(counters.entries());
}

export function resetVtMetrics(): void {
  counters.clear();
}
