/**
 * Threshold and alert interfaces
 */

export enum AlertSeverity {
  INFO = 'info',
  WARNING = 'warning',
  CRITICAL = 'critical'
}

export enum AlertType {
  CPU_USAGE_HIGH = 'cpu_usage_high',
  CPU_USAGE_VERY_HIGH = 'cpu_usage_very_high',
  CPU_CORE_USAGE_HIGH = 'cpu_core_usage_high',
  CPU_USAGE_SUSTAINED = 'cpu_usage_sustained',
  PROCESS_CPU_USAGE_HIGH = 'process_cpu_usage_high',
  BANDWIDTH_USAGE_HIGH = 'bandwidth_usage_high',
  BANDWIDTH_USAGE_VERY_HIGH = 'bandwidth_usage_very_high',
  DOWNLOAD_RATE_HIGH = 'download_rate_high',
  UPLOAD_RATE_HIGH = 'upload_rate_high',
  TOTAL_BANDWIDTH_SUSTAINED = 'total_bandwidth_sustained',
  CONNECTION_COUNT_HIGH = 'connection_count_high',
  INTERFACE_ERROR_RATE_HIGH = 'interface_error_rate_high',
  PROCESS_BANDWIDTH_HIGH = 'process_bandwidth_high',
  WIFI_SIGNAL_LOW = 'wifi_signal_low'
}

/**
 * Which side of the threshold counts as a breach.
 * ABOVE fires on `value >= threshold`, BELOW on `value <= threshold`.
 */
export enum ComparisonDirection {
  ABOVE = 'above',
  BELOW = 'below'
}

export type EntityScope = 'core' | 'interface' | 'process' | 'wifi';

export type MetricKey =
  | 'cpu_usage'
  | 'cpu_usage_sustained'
  | 'core_usage'
  | 'process_cpu'
  | 'bandwidth_total'
  | 'bandwidth_rx'
  | 'bandwidth_tx'
  | 'bandwidth_sustained'
  | 'connection_count'
  | 'interface_bandwidth'
  | 'interface_errors'
  | 'process_bandwidth'
  | 'wifi_signal';

export const METRIC_SCOPES: Readonly<Record<MetricKey, EntityScope | 'global'>> = {
  cpu_usage: 'global',
  cpu_usage_sustained: 'global',
  core_usage: 'core',
  process_cpu: 'process',
  bandwidth_total: 'global',
  bandwidth_rx: 'global',
  bandwidth_tx: 'global',
  bandwidth_sustained: 'global',
  connection_count: 'global',
  interface_bandwidth: 'interface',
  interface_errors: 'interface',
  process_bandwidth: 'process',
  wifi_signal: 'wifi'
};

export function isMetricKey(value: unknown): value is MetricKey {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(METRIC_SCOPES, value);
}

export interface ThresholdConfig {
  readonly name: string;
  readonly metric: MetricKey;
  readonly threshold: number;
  readonly duration_seconds: number;
  readonly severity: AlertSeverity;
  readonly alert_type: AlertType;
  readonly alert_message: string;
  readonly direction: ComparisonDirection;
  readonly check_interval_seconds: number;
  readonly cooldown_seconds: number;
}

/**
 * Fields accepted by setThreshold beyond value, duration, severity and message.
 * `metric` and `alert_type` are required when the threshold name is new.
 */
export interface ThresholdOptions {
  metric?: MetricKey;
  alert_type?: AlertType;
  direction?: ComparisonDirection;
  cooldown_seconds?: number;
  check_interval_seconds?: number;
}

/**
 * Identifies the core, interface, process or WiFi link a scoped threshold
 * is tracked for. Global thresholds use `null` instead.
 */
export interface EntityContext {
  scope: EntityScope;
  key: string;
  core_id?: number;
  pid?: number;
  process_name?: string;
  interface_name?: string;
}

export interface AlertState {
  config: ThresholdConfig;
  entity: EntityContext | null;
  exceeded_since: number | null;
  last_alert_time: number;
  current_value: number;
  is_active: boolean;
}

export interface ActiveAlert {
  threshold_name: string;
  type: AlertType;
  severity: AlertSeverity;
  threshold: number;
  current_value: number;
  duration_seconds: number;
  message: string;
  core_id?: number;
  pid?: number;
  process_name?: string;
  interface_name?: string;
}

export interface AlertResolvedEvent {
  alert_key: string;
  threshold_name: string;
  entity: EntityContext | null;
  current_value: number;
  timestamp: Date;
}
