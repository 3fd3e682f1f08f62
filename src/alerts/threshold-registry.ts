/**
 * Registry of named threshold definitions for one monitor.
 *
 * Configs are frozen and replaced whole, so a reader holding a config
 * never sees a partially applied update.
 */

import {
  AlertSeverity,
  AlertType,
  ComparisonDirection,
  isMetricKey,
  MetricKey,
  ThresholdConfig,
  ThresholdOptions
} from '../types/alerts';
import { ErrorHandler } from '../error-handling';
import { Logger } from '../utils/logger';

export const DEFAULT_ALERT_MESSAGE = 'Threshold {threshold} exceeded for {duration} minutes';
export const DEFAULT_DURATION_SECONDS = 60;
export const DEFAULT_CHECK_INTERVAL_SECONDS = 5;
export const DEFAULT_COOLDOWN_SECONDS = 10 * 60;

export interface ThresholdUpdate extends ThresholdOptions {
  threshold: number;
  duration_seconds: number;
  severity?: AlertSeverity;
  alert_message?: string;
}

export type ThresholdDefinition = Pick<ThresholdConfig, 'name' | 'metric' | 'threshold' | 'duration_seconds' | 'severity' | 'alert_type' | 'alert_message'>
  & Partial<Pick<ThresholdConfig, 'direction' | 'check_interval_seconds' | 'cooldown_seconds'>>;

export interface ThresholdRegistryOptions {
  component: string;
  supportedMetrics: readonly MetricKey[];
  errorHandler?: ErrorHandler;
}

/**
 * Fill in interval, cooldown and direction defaults and freeze
 */
export function createThresholdConfig(definition: ThresholdDefinition): ThresholdConfig {
  return Object.freeze({
    direction: ComparisonDirection.ABOVE,
    check_interval_seconds: DEFAULT_CHECK_INTERVAL_SECONDS,
    cooldown_seconds: DEFAULT_COOLDOWN_SECONDS,
    ...definition
  });
}

function isEnumValue<T extends Record<string, string>>(enumObject: T, value: unknown): value is T[keyof T] {
  return typeof value === 'string' && Object.values(enumObject).includes(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

export class ThresholdRegistry {
  private thresholds: Map<string, ThresholdConfig> = new Map();
  private supportedMetrics: ReadonlySet<MetricKey>;
  private component: string;
  private errorHandler: ErrorHandler | undefined;
  private logger: Logger;

  constructor(defaults: ThresholdDefinition[], options: ThresholdRegistryOptions) {
    this.component = options.component;
    this.supportedMetrics = new Set(options.supportedMetrics);
    this.errorHandler = options.errorHandler;
    this.logger = new Logger(options.component);

    for (const definition of defaults) {
      this.thresholds.set(definition.name, createThresholdConfig(definition));
    }
  }

  /**
   * Insert or update a named threshold.
   *
   * Invalid fields of an existing threshold keep their previous values. A new
   * threshold needs a supported `metric` and an `alert_type`, otherwise it is
   * rejected and null is returned. Never throws.
   */
  setThreshold(name: string, update: ThresholdUpdate): ThresholdConfig | null {
    const previous = this.thresholds.get(name);

    if (!previous) {
      if (!update.metric || !this.supportedMetrics.has(update.metric)) {
        this.reject(name, 'metric', `a supported metric is required for a new threshold (${Array.from(this.supportedMetrics).join(', ')})`, update.metric);
        return null;
      }
      if (!isEnumValue(AlertType, update.alert_type)) {
        this.reject(name, 'alert_type', 'an alert type is required for a new threshold', update.alert_type);
        return null;
      }
      if (!isFiniteNumber(update.threshold)) {
        this.reject(name, 'threshold', 'threshold must be a finite number', update.threshold);
        return null;
      }
    }

    const base: ThresholdConfig = previous ?? createThresholdConfig({
      name,
      metric: update.metric ?? 'cpu_usage',
      threshold: update.threshold,
      duration_seconds: DEFAULT_DURATION_SECONDS,
      severity: AlertSeverity.WARNING,
      alert_type: update.alert_type ?? AlertType.CPU_USAGE_HIGH,
      alert_message: DEFAULT_ALERT_MESSAGE
    });

    const config = createThresholdConfig({
      name,
      metric: this.pick(name, 'metric', update.metric, base.metric,
        (value): value is MetricKey => isMetricKey(value) && this.supportedMetrics.has(value)),
      threshold: this.pick(name, 'threshold', update.threshold, base.threshold, isFiniteNumber),
      duration_seconds: this.pick(name, 'duration_seconds', update.duration_seconds, base.duration_seconds,
        (value): value is number => isFiniteNumber(value) && value >= 0),
      severity: this.pick(name, 'severity', update.severity, base.severity,
        (value): value is AlertSeverity => isEnumValue(AlertSeverity, value)),
      alert_type: this.pick(name, 'alert_type', update.alert_type, base.alert_type,
        (value): value is AlertType => isEnumValue(AlertType, value)),
      alert_message: this.pick(name, 'alert_message', update.alert_message, base.alert_message,
        (value): value is string => typeof value === 'string' && value.trim().length > 0),
      direction: this.pick(name, 'direction', update.direction, base.direction,
        (value): value is ComparisonDirection => isEnumValue(ComparisonDirection, value)),
      check_interval_seconds: this.pick(name, 'check_interval_seconds', update.check_interval_seconds, base.check_interval_seconds,
        (value): value is number => isFiniteNumber(value) && value > 0),
      cooldown_seconds: this.pick(name, 'cooldown_seconds', update.cooldown_seconds, base.cooldown_seconds,
        (value): value is number => isFiniteNumber(value) && value >= 0)
    });

    this.thresholds.set(name, config);
    this.logger.info(`${previous ? 'Updated' : 'Added'} threshold ${name}: ${config.direction} ${config.threshold} for ${config.duration_seconds}s (${config.severity})`);

    return config;
  }

  getThreshold(name: string): ThresholdConfig | undefined {
    return this.thresholds.get(name);
  }

  /**
   * Snapshot of all current configs
   */
  getThresholds(): ThresholdConfig[] {
    return Array.from(this.thresholds.values());
  }

  getThresholdsForMetric(metric: MetricKey): ThresholdConfig[] {
    return this.getThresholds().filter(config => config.metric === metric);
  }

  has(name: string): boolean {
    return this.thresholds.has(name);
  }

  getMinCheckInterval(): number {
    const intervals = this.getThresholds().map(config => config.check_interval_seconds);
    return intervals.length > 0 ? Math.min(...intervals) : DEFAULT_CHECK_INTERVAL_SECONDS;
  }

  /**
   * Use `value` when it is given and valid, otherwise keep `fallback`
   */
  private pick<T>(
    name: string,
    field: string,
    value: unknown,
    fallback: T,
    isValid: (value: unknown) => value is T
  ): T {
    if (value === undefined) {
      return fallback;
    }
    if (isValid(value)) {
      return value;
    }
    this.reject(name, field, `invalid value, keeping ${String(fallback)}`, value);
    return fallback;
  }

  private reject(name: string, field: string, message: string, value: unknown): void {
    if (this.errorHandler) {
      this.errorHandler.handleConfigurationError(this.component, `${name}.${field}`, message, value);
    } else {
      this.logger.warn(`Invalid configuration for '${name}.${field}': ${message}`);
    }
  }
}
