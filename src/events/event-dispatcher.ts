/**
 * Metrics event dispatcher
 * Delivers published events in FIFO order to observers filtered by event type
 */

import { EventEmitter } from 'events';
import { MetricEvent, MetricEventObserver, MetricUpdateEvent } from '../types/events';
import { ErrorHandler } from '../error-handling';
import { Logger } from '../utils/logger';
import { withTimeout } from '../utils/timeout';

export interface EventDispatcherOptions {
  maxQueueSize?: number;
  pollIntervalMs?: number;
  /** Bound on a single observer's update */
  deliveryTimeoutMs?: number;
  /** How long stop waits for the delivery in flight */
  stopTimeoutMs?: number;
  errorHandler?: ErrorHandler;
}

export interface DispatcherStats {
  running: boolean;
  queued: number;
  subscribers: number;
  delivered: number;
  dropped: number;
  delivery_errors: number;
  reclaimed: number;
}

export interface ObserverErrorEvent {
  observer: string;
  event: MetricEvent;
  error: unknown;
}

interface ObserverEntry {
  id: number;
  subscription: WeakRef<Subscription>;
  eventTypes: ReadonlySet<MetricUpdateEvent>;
}

/**
 * Handle returned by `subscribe`. Delivery lasts while the handle is reachable;
 * a handle dropped without `unsubscribe()` is reclaimed on a later dispatch pass.
 */
export class Subscription {
  private active = true;

  constructor(
    private dispatcher: MetricsEventDispatcher,
    private readonly id: number,
    readonly observer: MetricEventObserver
  ) {}

  unsubscribe(): void {
    if (!this.active) {
      return;
    }
    this.active = false;
    this.dispatcher.removeSubscription(this.id);
  }

  get closed(): boolean {
    return !this.active;
  }
}

export class MetricsEventDispatcher extends EventEmitter {
  private logger: Logger;
  private errorHandler: ErrorHandler | undefined;
  private maxQueueSize: number;
  private pollIntervalMs: number;
  private deliveryTimeoutMs: number;
  private stopTimeoutMs: number;

  private queue: MetricEvent[] = [];
  private entries: Map<number, ObserverEntry> = new Map();
  private nextId = 1;
  private pendingReclaim: Set<number> = new Set();
  private finalizer: FinalizationRegistry<number>;

  private isRunning = false;
  private workerPromise: Promise<void> | null = null;
  private generation = 0;
  private wakeWorker: (() => void) | null = null;
  private delivering = false;
  private idleWaiters: Array<() => void> = [];

  private delivered = 0;
  private dropped = 0;
  private deliveryErrors = 0;
  private reclaimed = 0;

  constructor(options: EventDispatcherOptions = {}) {
    super();
    this.logger = new Logger('EventDispatcher');
    this.errorHandler = options.errorHandler;
    this.maxQueueSize = options.maxQueueSize ?? 1000;
    this.pollIntervalMs = options.pollIntervalMs ?? 500;
    this.deliveryTimeoutMs = options.deliveryTimeoutMs ?? 5000;
    this.stopTimeoutMs = options.stopTimeoutMs ?? 2000;
    this.finalizer = new FinalizationRegistry((id: number) => {
      this.pendingReclaim.add(id);
    });
  }

  /**
   * Enqueue an event for delivery. Never blocks on observers.
   */
  publish(event: MetricEvent): void {
    if (this.queue.length >= this.maxQueueSize) {
      const droppedEvent = this.queue.shift();
      this.dropped++;
      this.logger.warn(`Event queue full (${this.maxQueueSize}), dropped oldest ${droppedEvent?.event_type ?? 'event'}`);
    }

    this.queue.push(Object.freeze(event));
    this.wake();
  }

  /**
   * Register an observer for the given event types. An empty list subscribes to nothing.
   */
  subscribe(observer: MetricEventObserver, eventTypes: Iterable<MetricUpdateEvent>): Subscription {
    const id = this.nextId++;
    const subscription = new Subscription(this, id, observer);
    const entry: ObserverEntry = {
      id,
      subscription: new WeakRef(subscription),
      eventTypes: new Set(eventTypes)
    };

    this.entries.set(id, entry);
    this.finalizer.register(subscription, id);
    this.logger.debug(`Subscribed ${this.describe(observer)} to ${Array.from(entry.eventTypes).join(', ') || 'no events'}`);

    return subscription;
  }

  /**
   * Remove every subscription of an observer
   */
  unsubscribe(observer: MetricEventObserver): boolean {
    let removed = false;
    for (const entry of Array.from(this.entries.values())) {
      const subscription = entry.subscription.deref();
      if (subscription?.observer === observer) {
        subscription.unsubscribe();
        removed = true;
      }
    }
    return removed;
  }

  /** @internal */
  removeSubscription(id: number): void {
    this.entries.delete(id);
  }

  /**
   * Start the delivery worker
   */
  start(): void {
    if (this.isRunning) {
      this.logger.warn('EventDispatcher is already running');
      return;
    }

    this.isRunning = true;
    this.generation++;
    this.workerPromise = this.runWorker(this.generation);
    this.logger.info('Event dispatcher started');
  }

  /**
   * Stop the delivery worker. Events still queued stay queued.
   * Waits at most `stopTimeoutMs` for the delivery in flight.
   */
  async stop(): Promise<void> {
    if (!this.isRunning) {
      return;
    }

    this.isRunning = false;
    this.wake();

    const worker = this.workerPromise;
    this.workerPromise = null;
    if (worker && !(await this.settlesWithin(worker, this.stopTimeoutMs))) {
      this.logger.warn(`Delivery still in flight after ${this.stopTimeoutMs}ms, stopping without it`);
      this.notifyIfIdle();
    }

    this.logger.info('Event dispatcher stopped');
  }

  /**
   * Resolve once the queue is empty and no delivery is in flight.
   * When the worker is not running the queue is delivered here instead.
   */
  async drain(): Promise<void> {
    if (!this.isRunning) {
      while (this.queue.length > 0) {
        const event = this.queue.shift();
        if (event) {
          await this.deliver(event);
        }
      }
      return;
    }

    if (this.isIdle()) {
      return;
    }

    await new Promise<void>(resolve => {
      this.idleWaiters.push(resolve);
    });
  }

  getStats(): DispatcherStats {
    return {
      running: this.isRunning,
      queued: this.queue.length,
      subscribers: this.entries.size,
      delivered: this.delivered,
      dropped: this.dropped,
      delivery_errors: this.deliveryErrors,
      reclaimed: this.reclaimed
    };
  }

  get subscriberCount(): number {
    return this.entries.size;
  }

  private async runWorker(generation: number): Promise<void> {
    while (this.isRunning && this.generation === generation) {
      const event = this.queue.shift();
      if (!event) {
        await this.waitForEvent();
        continue;
      }

      this.delivering = true;
      try {
        await this.deliver(event);
      } finally {
        this.delivering = false;
        this.notifyIfIdle();
      }
    }

    this.notifyIfIdle();
  }

  private waitForEvent(): Promise<void> {
    return new Promise(resolve => {
      const timer = setTimeout(() => {
        this.wakeWorker = null;
        resolve();
      }, this.pollIntervalMs);

      this.wakeWorker = () => {
        clearTimeout(timer);
        this.wakeWorker = null;
        resolve();
      };
    });
  }

  private async settlesWithin(promise: Promise<void>, timeoutMs: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<boolean>(resolve => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });

    try {
      return await Promise.race([promise.then(() => true), deadline]);
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
    }
  }

  private wake(): void {
    if (this.wakeWorker) {
      this.wakeWorker();
    }
  }

  private async deliver(event: MetricEvent): Promise<void> {
    this.reclaim();

    for (const entry of Array.from(this.entries.values())) {
      if (!entry.eventTypes.has(event.event_type)) {
        continue;
      }

      const subscription = entry.subscription.deref();
      if (!subscription) {
        this.entries.delete(entry.id);
        this.reclaimed++;
        continue;
      }

      const observer = subscription.observer;
      try {
        await withTimeout(
          Promise.resolve(observer.update(event)),
          this.deliveryTimeoutMs,
          'EventDispatcher',
          `${this.describe(observer)}.update`
        );
      } catch (error) {
        this.deliveryErrors++;
        const name = this.describe(observer);
        if (this.errorHandler) {
          this.errorHandler.handleDeliveryFailure('EventDispatcher', name, error);
        } else {
          this.logger.error(`Observer ${name} failed on ${event.event_type}:`, error);
        }
        const errorEvent: ObserverErrorEvent = { observer: name, event, error };
        this.emit('observer_error', errorEvent);
      }
    }

    this.delivered++;
  }

  /**
   * Drop entries whose handles have been garbage collected
   */
  private reclaim(): void {
    for (const id of this.pendingReclaim) {
      if (this.entries.delete(id)) {
        this.reclaimed++;
      }
    }
    this.pendingReclaim.clear();
  }

  private isIdle(): boolean {
    return this.queue.length === 0 && !this.delivering;
  }

  private notifyIfIdle(): void {
    if (!this.isIdle() && this.isRunning) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  private describe(observer: MetricEventObserver): string {
    return observer.constructor.name || 'observer';
  }
}
