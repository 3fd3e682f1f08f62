/**
 * Metric event interfaces shared by producers and the event dispatcher
 */

import { AlertSeverity, AlertType } from './alerts';

export enum MetricUpdateEvent {
  CPU_OVERALL_UPDATED = 'cpu_overall_updated',
  CPU_CORES_UPDATED = 'cpu_cores_updated',
  NETWORK_UPDATED = 'network_updated',
  THRESHOLD_EXCEEDED = 'threshold_exceeded'
}

export interface MetricEvent<TData extends Record<string, unknown> = Record<string, unknown>> {
  readonly event_type: MetricUpdateEvent;
  readonly timestamp: Date;
  readonly source: string;
  readonly data: Readonly<TData>;
  readonly message: string;
}

export type AlertEventData = {
  threshold_name: string;
  threshold: number;
  current_value: number;
  duration_seconds: number;
  alert_type: AlertType;
  severity: AlertSeverity;
  core_id?: number;
  pid?: number;
  process_name?: string;
  interface_name?: string;
};

export interface ThresholdAlertEvent extends MetricEvent<AlertEventData> {
  readonly event_type: MetricUpdateEvent.THRESHOLD_EXCEEDED;
}

export interface MetricEventObserver {
  update(event: MetricEvent): void | Promise<void>;
}

export function isThresholdAlertEvent(event: MetricEvent): event is ThresholdAlertEvent {
  return event.event_type === MetricUpdateEvent.THRESHOLD_EXCEEDED
    && typeof event.data.threshold_name === 'string'
    && typeof event.data.severity === 'string';
}
