/**
 * Webhook notification delivery for threshold alerts
 */

import axios, { AxiosInstance } from 'axios';
import { AlertSeverity } from '../types/alerts';
import { WebhookConfig } from '../types/config';
import { AlertEventData, isThresholdAlertEvent, MetricEvent, MetricEventObserver, ThresholdAlertEvent } from '../types/events';
import { Logger } from '../utils/logger';

export interface WebhookPayload {
  title: string;
  message: string;
  severity: AlertSeverity;
  data: AlertEventData;
  timestamp: string;
}

export interface WebhookNotifierOptions {
  client?: Pick<AxiosInstance, 'post'>;
  timeoutMs?: number;
}

const SEVERITY_RANK: Record<AlertSeverity, number> = {
  [AlertSeverity.INFO]: 0,
  [AlertSeverity.WARNING]: 1,
  [AlertSeverity.CRITICAL]: 2
};

export class WebhookNotifier implements MetricEventObserver {
  private logger: Logger;
  private client: Pick<AxiosInstance, 'post'>;
  private config: WebhookConfig;
  private sent = 0;
  private skipped = 0;

  constructor(config: WebhookConfig, options: WebhookNotifierOptions = {}) {
    this.logger = new Logger('WebhookNotifier');
    this.config = config;
    this.client = options.client ?? axios.create({
      headers: {
        'Content-Type': 'application/json',
        ...(config.token ? { 'Authorization': `Bearer ${config.token}` } : {})
      },
      timeout: options.timeoutMs ?? 10000
    });
  }

  /**
   * Dispatcher callback. Delivery failures propagate to the dispatcher.
   */
  async update(event: MetricEvent): Promise<void> {
    if (!isThresholdAlertEvent(event)) {
      return;
    }

    if (!this.config.enabled || !this.shouldNotify(event.data.severity)) {
      this.skipped++;
      this.logger.debug(`Skipping webhook for ${event.data.threshold_name} (${event.data.severity})`);
      return;
    }

    await this.sendAlertNotification(event);
  }

  async sendAlertNotification(event: ThresholdAlertEvent): Promise<void> {
    const payload = this.formatPayload(event);
    await this.client.post(this.config.url, payload);
    this.sent++;
    this.logger.info(`Webhook notification sent for alert: ${event.data.threshold_name}`);
  }

  formatPayload(event: ThresholdAlertEvent): WebhookPayload {
    return {
      title: `System Alert: ${event.data.threshold_name}`,
      message: event.message,
      severity: event.data.severity,
      data: { ...event.data },
      timestamp: event.timestamp.toISOString()
    };
  }

  shouldNotify(severity: AlertSeverity): boolean {
    return SEVERITY_RANK[severity] >= SEVERITY_RANK[this.config.min_severity];
  }

  getStats(): { sent: number; skipped: number } {
    return { sent: this.sent, skipped: this.skipped };
  }
}
