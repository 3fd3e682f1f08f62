/**
 * Base threshold monitor
 * Runs the evaluation loop, isolates each check, and turns state transitions into alerts
 */

import { EventEmitter } from 'events';
import {
  ActiveAlert,
  AlertResolvedEvent,
  AlertSeverity,
  AlertState,
  EntityContext,
  EntityScope,
  MetricKey,
  ThresholdConfig,
  ThresholdOptions
} from '../types/alerts';
import { AlertEventData, MetricUpdateEvent, ThresholdAlertEvent } from '../types/events';
import { ErrorHandler, MonitoringError, ErrorCategory, ErrorSeverity } from '../error-handling';
import { MetricsEventDispatcher } from '../events/event-dispatcher';
import { Logger } from '../utils/logger';
import { withTimeout } from '../utils/timeout';
import { formatDurationMinutes, formatMetricValue, substituteTemplate } from '../utils/format';
import { evaluateAlertState, exceededSeconds } from './alert-state';
import { AlertStateTracker } from './alert-state-tracker';
import { SampleHistory } from './sample-history';
import { ThresholdDefinition, ThresholdRegistry } from './threshold-registry';

export interface ThresholdMonitorOptions {
  /** Overrides the loop interval derived from the thresholds' check intervals */
  checkIntervalSeconds?: number;
  /** Bound on each metric source call. A whole pass is also bounded by the loop interval. */
  sourceTimeoutMs?: number;
  errorHandler?: ErrorHandler;
  /** Epoch milliseconds */
  clock?: () => number;
}

export interface MonitorStatus {
  source: string;
  running: boolean;
  check_interval_seconds: number;
  thresholds: number;
  tracked_states: number;
  active_alerts: number;
}

type EntityFields = Pick<EntityContext, 'core_id' | 'pid' | 'process_name' | 'interface_name'>;

function entityFields(entity: EntityContext | null): EntityFields {
  if (!entity) {
    return {};
  }
  return {
    ...(entity.core_id !== undefined && { core_id: entity.core_id }),
    ...(entity.pid !== undefined && { pid: entity.pid }),
    ...(entity.process_name !== undefined && { process_name: entity.process_name }),
    ...(entity.interface_name !== undefined && { interface_name: entity.interface_name })
  };
}

export abstract class ThresholdMonitor<TSource> extends EventEmitter {
  protected readonly registry: ThresholdRegistry;
  protected readonly tracker = new AlertStateTracker();
  protected readonly logger: Logger;
  protected readonly errorHandler: ErrorHandler;
  protected readonly clock: () => number;

  private isRunning = false;
  private loopPromise: Promise<void> | null = null;
  private currentTick: Promise<void> | null = null;
  private wakeLoop: (() => void) | null = null;
  private tickAbort: AbortController | null = null;
  private tickDeadline = 0;

  constructor(
    readonly sourceName: string,
    protected readonly source: TSource,
    protected readonly dispatcher: MetricsEventDispatcher,
    defaults: ThresholdDefinition[],
    supportedMetrics: readonly MetricKey[],
    private readonly options: ThresholdMonitorOptions = {}
  ) {
    super();
    this.logger = new Logger(sourceName);
    this.errorHandler = options.errorHandler ?? new ErrorHandler();
    this.clock = options.clock ?? Date.now;
    this.registry = new ThresholdRegistry(defaults, {
      component: sourceName,
      supportedMetrics,
      errorHandler: this.errorHandler
    });
  }

  /**
   * Run every check of one evaluation pass
   */
  protected abstract runChecks(): Promise<void>;

  /**
   * Start the evaluation loop. Resolves when the first pass has completed.
   */
  start(): Promise<void> {
    if (this.isRunning) {
      this.logger.warn(`${this.sourceName} is already running`);
      return this.currentTick ?? Promise.resolve();
    }

    this.isRunning = true;
    this.logger.info(`Starting ${this.sourceName} (every ${this.getCheckIntervalSeconds()}s)`);

    const firstTick = this.checkNow();
    this.loopPromise = this.runLoop(firstTick);
    return firstTick;
  }

  /**
   * Stop the loop. Source calls still in flight are cancelled.
   */
  async stop(): Promise<void> {
    if (!this.isRunning) {
      return;
    }

    this.logger.info(`Stopping ${this.sourceName}`);
    this.isRunning = false;
    if (this.tickAbort) {
      this.tickAbort.abort();
    }
    if (this.wakeLoop) {
      this.wakeLoop();
    }

    const loop = this.loopPromise;
    this.loopPromise = null;
    if (loop) {
      await loop;
    }
  }

  /**
   * Run one evaluation pass now. Overlapping calls share the pass in flight.
   */
  checkNow(): Promise<void> {
    if (!this.currentTick) {
      this.currentTick = this.tick().finally(() => {
        this.currentTick = null;
      });
    }
    return this.currentTick;
  }

  /**
   * Insert or update a named threshold and reset its alert states for every entity
   */
  setThreshold(
    name: string,
    threshold: number,
    durationSeconds: number,
    severity?: AlertSeverity,
    alertMessage?: string,
    options: ThresholdOptions = {}
  ): ThresholdConfig | null {
    const config = this.registry.setThreshold(name, {
      ...options,
      threshold,
      duration_seconds: durationSeconds,
      severity,
      alert_message: alertMessage
    });

    if (config) {
      const resetCount = this.tracker.resetThreshold(config);
      this.logger.debug(`Reset ${resetCount} alert states for ${name}`);
    }

    return config;
  }

  getThresholds(): ThresholdConfig[] {
    return this.registry.getThresholds();
  }

  /**
   * Currently active alerts keyed by threshold name, or `<scope>_<entity>_<name>` for scoped thresholds
   */
  getActiveAlerts(): Record<string, ActiveAlert> {
    const now = this.clock();
    const alerts: Record<string, ActiveAlert> = {};

    for (const state of this.tracker.getActiveStates()) {
      const config = state.config;
      alerts[AlertStateTracker.alertKey(config.name, state.entity)] = {
        threshold_name: config.name,
        type: config.alert_type,
        severity: config.severity,
        threshold: config.threshold,
        current_value: state.current_value,
        duration_seconds: exceededSeconds(state, now),
        message: this.formatAlertMessage(state, now),
        ...entityFields(state.entity)
      };
    }

    return alerts;
  }

  getCheckIntervalSeconds(): number {
    return this.options.checkIntervalSeconds ?? this.registry.getMinCheckInterval();
  }

  getStatus(): MonitorStatus {
    return {
      source: this.sourceName,
      running: this.isRunning,
      check_interval_seconds: this.getCheckIntervalSeconds(),
      thresholds: this.registry.getThresholds().length,
      tracked_states: this.tracker.size,
      active_alerts: this.tracker.getActiveStates().length
    };
  }

  get running(): boolean {
    return this.isRunning;
  }

  /**
   * Run a single check. A failure is recorded against `<source>:<check>` and leaves state untouched.
   * Resolves true when the check completed.
   */
  protected async runCheck(check: string, fn: () => Promise<void>): Promise<boolean> {
    const component = `${this.sourceName}:${check}`;
    try {
      await fn();
      this.errorHandler.markComponentHealthy(component);
      return true;
    } catch (error) {
      if (this.tickAbort?.signal.aborted) {
        this.logger.debug(`${check} cancelled by stop`);
      } else {
        this.errorHandler.handleSourceFailure(component, check, error);
      }
      return false;
    }
  }

  /**
   * Call the metric source, bounded by the source timeout and by what is left of the pass
   */
  protected fetch<T>(label: string, operation: () => Promise<T>): Promise<T> {
    const remainingMs = this.tickDeadline - Date.now();
    const signal = this.tickAbort?.signal;

    if (remainingMs <= 0 || signal?.aborted) {
      return Promise.reject(new MonitoringError(
        signal?.aborted ? `${label} cancelled` : `${label} skipped: check interval used up`,
        ErrorCategory.TIMEOUT,
        ErrorSeverity.LOW,
        this.sourceName,
        label
      ));
    }

    const sourceTimeoutMs = this.options.sourceTimeoutMs;
    const timeoutMs = sourceTimeoutMs === undefined ? remainingMs : Math.min(sourceTimeoutMs, remainingMs);
    return withTimeout(operation(), timeoutMs, this.sourceName, label, signal);
  }

  /**
   * Feed a reading into every threshold bound to `metric`
   */
  protected evaluateMetric(metric: MetricKey, value: number, entity: EntityContext | null = null): void {
    const now = this.clock();

    for (const config of this.registry.getThresholdsForMetric(metric)) {
      const state = this.tracker.getOrCreate(config, entity);
      const outcome = evaluateAlertState(state, value, now);

      if (outcome === 'alert') {
        this.generateAlert(state, now);
      } else if (outcome === 'recovered') {
        this.resolveAlert(state, now);
      }
    }
  }

  /**
   * Evaluate the windowed mean of `history`, once it holds enough samples
   */
  protected evaluateSustained(metric: MetricKey, history: SampleHistory): void {
    const average = history.sustainedAverage(this.clock());
    if (average === null) {
      return;
    }
    this.evaluateMetric(metric, average);
  }

  /**
   * Forget entities of `scope` missing from a non-empty snapshot
   */
  protected pruneEntities(scope: EntityScope, seenKeys: Iterable<string>): void {
    const removed = this.tracker.pruneEntities(scope, new Set(seenKeys));
    if (removed.length > 0) {
      this.logger.debug(`Pruned ${scope} states for ${removed.join(', ')}`);
    }
  }

  protected formatAlertMessage(state: AlertState, now: number): string {
    const config = state.config;
    const entity = state.entity;

    return substituteTemplate(config.alert_message, {
      threshold: formatMetricValue(config.threshold, config.metric),
      value: formatMetricValue(state.current_value, config.metric),
      duration: formatDurationMinutes(exceededSeconds(state, now)),
      core_id: entity?.core_id,
      pid: entity?.pid,
      process_name: entity?.process_name,
      interface_name: entity?.interface_name
    });
  }

  private generateAlert(state: AlertState, now: number): void {
    const config = state.config;
    const message = this.formatAlertMessage(state, now);

    const data: AlertEventData = {
      threshold_name: config.name,
      threshold: config.threshold,
      current_value: state.current_value,
      duration_seconds: exceededSeconds(state, now),
      alert_type: config.alert_type,
      severity: config.severity,
      ...entityFields(state.entity)
    };

    const event: ThresholdAlertEvent = Object.freeze({
      event_type: MetricUpdateEvent.THRESHOLD_EXCEEDED,
      timestamp: new Date(now),
      source: this.sourceName,
      data: Object.freeze(data),
      message
    });

    this.dispatcher.publish(event);
    this.emit('alert', event);
    this.logger.warn(`ALERT: ${message}`);
  }

  private resolveAlert(state: AlertState, now: number): void {
    const resolved: AlertResolvedEvent = {
      alert_key: AlertStateTracker.alertKey(state.config.name, state.entity),
      threshold_name: state.config.name,
      entity: state.entity,
      current_value: state.current_value,
      timestamp: new Date(now)
    };

    this.emit('alert_resolved', resolved);
    this.logger.info(`Alert resolved: ${resolved.alert_key} (now ${formatMetricValue(state.current_value, state.config.metric)})`);
  }

  private async tick(): Promise<void> {
    const controller = new AbortController();
    this.tickAbort = controller;
    this.tickDeadline = Date.now() + this.getCheckIntervalSeconds() * 1000;

    try {
      await this.runChecks();
    } catch (error) {
      this.errorHandler.handleError(error, { component: this.sourceName });
    } finally {
      if (this.tickAbort === controller) {
        this.tickAbort = null;
      }
    }
  }

  private async runLoop(firstTick: Promise<void>): Promise<void> {
    await firstTick;

    while (this.isRunning) {
      await this.sleep(this.getCheckIntervalSeconds() * 1000);
      if (!this.isRunning) {
        break;
      }
      await this.checkNow();
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => {
      const timer = setTimeout(() => {
        this.wakeLoop = null;
        resolve();
      }, ms);

      this.wakeLoop = () => {
        clearTimeout(timer);
        this.wakeLoop = null;
        resolve();
      };
    });
  }
}
