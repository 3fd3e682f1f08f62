/**
 * Value and message formatting helpers
 */

import { MetricKey } from '../types/alerts';

export type MetricUnit = 'percent' | 'bytes_per_sec' | 'count' | 'dbm';

export const METRIC_UNITS: Readonly<Record<MetricKey, MetricUnit>> = {
  cpu_usage: 'percent',
  cpu_usage_sustained: 'percent',
  core_usage: 'percent',
  process_cpu: 'percent',
  bandwidth_total: 'bytes_per_sec',
  bandwidth_rx: 'bytes_per_sec',
  bandwidth_tx: 'bytes_per_sec',
  bandwidth_sustained: 'bytes_per_sec',
  connection_count: 'count',
  interface_bandwidth: 'bytes_per_sec',
  interface_errors: 'count',
  process_bandwidth: 'bytes_per_sec',
  wifi_signal: 'dbm'
};

/**
 * Round to one decimal place and always print that decimal: 90 -> "90.0"
 */
export function formatNumber(value: number): string {
  return (Math.round(value * 10) / 10).toFixed(1);
}

/**
 * Byte rates above 1e6 render as MB/s, above 1e3 as KB/s, otherwise as the plain number
 */
export function formatValueWithUnit(value: number): string {
  if (value > 1_000_000) {
    return `${(value / 1_000_000).toFixed(2)} MB/s`;
  }
  if (value > 1_000) {
    return `${(value / 1_000).toFixed(2)} KB/s`;
  }
  return formatNumber(value);
}

export function formatMetricValue(value: number, metric: MetricKey): string {
  switch (METRIC_UNITS[metric]) {
    case 'bytes_per_sec':
      return formatValueWithUnit(value);
    case 'count':
      return String(Math.round(value));
    case 'percent':
    case 'dbm':
      return formatNumber(value);
  }
}

/**
 * Elapsed seconds as minutes with one decimal: 125 -> "2.1"
 */
export function formatDurationMinutes(seconds: number): string {
  return (Math.round(seconds / 6) / 10).toFixed(1);
}

/**
 * Replace `{name}` placeholders. Placeholders with no value are left as written.
 */
export function substituteTemplate(
  template: string,
  variables: Record<string, string | number | undefined>
): string {
  return template.replace(/\{(\w+)\}/g, (placeholder: string, name: string) => {
    const value = Object.hasOwn(variables, name) ? variables[name] : undefined;
    return value === undefined ? placeholder : String(value);
  });
}

/**
 * Horizontal bar for a 0-100 percentage
 */
export function renderBar(percent: number, width: number = 30): string {
  const clamped = Math.max(0, Math.min(100, percent));
  const filled = Math.round((clamped / 100) * width);
  return '█'.repeat(filled) + '░'.repeat(width - filled);
}
