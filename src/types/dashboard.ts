/**
 * API and dashboard data interfaces
 */

import { ActiveAlert, ThresholdConfig } from './alerts';
import { MonitorName } from './config';

export interface APIResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  timestamp: Date;
}

export interface ActiveAlertsResponse {
  alerts: Record<string, ActiveAlert & { monitor: MonitorName }>;
  count: number;
}

export interface ThresholdListing {
  monitor: MonitorName;
  thresholds: ThresholdConfig[];
}

export interface RealtimeMessage {
  type: 'connected' | 'alert' | 'error';
  data?: unknown;
  message?: string;
  timestamp: Date;
}
