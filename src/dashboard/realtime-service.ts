/**
 * Real-time alert streaming service
 * Subscribes to threshold alerts and broadcasts them to connected WebSocket clients
 */

import { EventEmitter } from 'events';
import { MetricsEventDispatcher, Subscription } from '../events/event-dispatcher';
import { isThresholdAlertEvent, MetricEvent, MetricEventObserver, MetricUpdateEvent, RealtimeMessage } from '../types';
import { Logger } from '../utils/logger';

export interface RealtimeBroadcaster {
  broadcast(message: RealtimeMessage): number;
}

export class RealtimeService extends EventEmitter implements MetricEventObserver {
  private dispatcher: MetricsEventDispatcher;
  private broadcaster: RealtimeBroadcaster;
  private logger: Logger;
  private subscription: Subscription | null = null;

  constructor(dispatcher: MetricsEventDispatcher, broadcaster: RealtimeBroadcaster) {
    super();
    this.dispatcher = dispatcher;
    this.broadcaster = broadcaster;
    this.logger = new Logger('RealtimeService');
  }

  /**
   * Start the real-time service
   */
  start(): void {
    if (this.subscription) {
      this.logger.warn('Real-time service already running');
      return;
    }

    this.subscription = this.dispatcher.subscribe(this, [MetricUpdateEvent.THRESHOLD_EXCEEDED]);
    this.logger.info('Real-time service started');
  }

  /**
   * Stop the real-time service
   */
  stop(): void {
    if (!this.subscription) {
      return;
    }

    this.subscription.unsubscribe();
    this.subscription = null;
    this.logger.info('Real-time service stopped');
  }

  update(event: MetricEvent): void {
    if (!isThresholdAlertEvent(event)) {
      return;
    }

    const message: RealtimeMessage = {
      type: 'alert',
      data: {
        ...event.data,
        message: event.message,
        source: event.source
      },
      timestamp: event.timestamp
    };

    const clients = this.broadcaster.broadcast(message);
    this.logger.debug(`Broadcast alert ${event.data.threshold_name} to ${clients} clients`);
    this.emit('alertBroadcast', message);
  }
}
