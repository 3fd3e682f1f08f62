/**
 * Configuration interfaces for syswatch
 */

import { AlertSeverity, AlertType, ComparisonDirection, MetricKey } from './alerts';

export type MonitorName = 'cpu' | 'network';

export interface ThresholdOverride {
  monitor: MonitorName;
  name: string;
  threshold: number;
  duration_seconds: number;
  severity?: AlertSeverity;
  alert_message?: string;
  metric?: MetricKey;
  alert_type?: AlertType;
  direction?: ComparisonDirection;
  cooldown_seconds?: number;
}

export interface ApiConfig {
  enabled: boolean;
  host: string;
  port: number;
  enable_cors: boolean;
}

export interface WebhookConfig {
  enabled: boolean;
  url: string;
  token?: string;
  min_severity: AlertSeverity;
}

export interface DashboardConfig {
  enabled: boolean;
  detailed_view: boolean;
  alert_display_seconds: number;
}

export interface SystemMonitorConfig {
  update_interval_seconds: number;
  alerts_enabled: boolean;
  monitors: {
    cpu: boolean;
    network: boolean;
  };
  check_interval_seconds?: number;
  source_timeout_ms: number;
  threshold_overrides: ThresholdOverride[];
  api: ApiConfig;
  webhook: WebhookConfig;
  dashboard: DashboardConfig;
}
