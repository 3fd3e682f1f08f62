/**
 * Error handler for metric collection, evaluation and alert delivery
 */

import { EventEmitter } from 'events';
import { Logger } from '../utils/logger';
import {
  MonitoringErrorRecord,
  ErrorCategory,
  ErrorSeverity,
  SystemHealth,
  ComponentHealth,
  MonitoringError,
  toError
} from './error-types';

export interface ErrorHandlerOptions {
  maxStoredErrors?: number;
}

export interface ErrorContext {
  component?: string;
  target?: string;
  [key: string]: unknown;
}

export class ErrorHandler extends EventEmitter {
  private logger: Logger;
  private errors: MonitoringErrorRecord[] = [];
  private componentHealth: Map<string, ComponentHealth> = new Map();
  private maxStoredErrors: number;

  constructor(options: ErrorHandlerOptions = {}) {
    super();
    this.logger = new Logger('ErrorHandler');
    this.maxStoredErrors = options.maxStoredErrors ?? 200;
  }

  /**
   * Record an error, log it and update component health. Never throws.
   */
  handleError(error: unknown, context?: ErrorContext): MonitoringErrorRecord {
    let record: MonitoringErrorRecord;

    if (error instanceof MonitoringError) {
      record = error.toJSON();
    } else {
      const err = toError(error);
      const category = this.categorizeError(err);
      record = {
        id: this.generateErrorId(),
        timestamp: new Date(),
        category,
        severity: category === ErrorCategory.TIMEOUT ? ErrorSeverity.LOW : ErrorSeverity.MEDIUM,
        component: context?.component ?? 'unknown',
        message: err.message,
        ...(context?.target !== undefined && { target: context.target }),
        ...(context && { details: { ...context, originalError: err.name } }),
        ...(err.stack !== undefined && { stack_trace: err.stack })
      };
    }

    this.storeError(record);
    this.logError(record);
    this.updateComponentHealth(record);
    this.emit('error_recorded', record);

    return record;
  }

  /**
   * Handle a metric source that failed or timed out for one check
   */
  handleSourceFailure(component: string, check: string, error: unknown): MonitoringErrorRecord {
    const err = toError(error);
    const health = this.componentHealth.get(component);
    const consecutiveFailures = (health?.consecutive_failures ?? 0) + 1;
    const isTimeout = err instanceof MonitoringError && err.category === ErrorCategory.TIMEOUT;

    const monitoringError = new MonitoringError(
      `Metric source unavailable for check '${check}': ${err.message}`,
      isTimeout ? ErrorCategory.TIMEOUT : ErrorCategory.METRIC_SOURCE,
      consecutiveFailures > 2 ? ErrorSeverity.HIGH : ErrorSeverity.MEDIUM,
      component,
      check,
      { check, consecutiveFailures, originalError: err.message }
    );

    return this.handleError(monitoringError);
  }

  /**
   * Handle an observer or notifier that failed to take delivery of an event
   */
  handleDeliveryFailure(component: string, target: string, error: unknown): MonitoringErrorRecord {
    const err = toError(error);
    return this.handleError(new MonitoringError(
      `Delivery to '${target}' failed: ${err.message}`,
      ErrorCategory.DELIVERY,
      ErrorSeverity.LOW,
      component,
      target,
      { originalError: err.message }
    ));
  }

  /**
   * Handle a rejected configuration value
   */
  handleConfigurationError(component: string, field: string, message: string, value?: unknown): MonitoringErrorRecord {
    return this.handleError(new MonitoringError(
      `Invalid configuration for '${field}': ${message}`,
      ErrorCategory.CONFIGURATION,
      ErrorSeverity.LOW,
      component,
      field,
      { field, value }
    ));
  }

  /**
   * Reset failure counters after a component succeeds
   */
  markComponentHealthy(component: string): void {
    const health = this.componentHealth.get(component);
    if (!health) {
      this.componentHealth.set(component, {
        component,
        status: 'healthy',
        last_success: new Date(),
        consecutive_failures: 0,
        total_failures: 0
      });
      return;
    }

    if (health.status !== 'healthy') {
      this.logger.info(`Component ${component} recovered after ${health.consecutive_failures} failures`);
      this.emit('component_recovered', component);
    }

    health.consecutive_failures = 0;
    health.last_success = new Date();
    health.status = 'healthy';
  }

  getComponentHealth(component: string): ComponentHealth | undefined {
    return this.componentHealth.get(component);
  }

  /**
   * Get current system health status
   */
  getSystemHealth(): SystemHealth {
    const componentHealthArray = Array.from(this.componentHealth.values()).map(health => ({ ...health }));

    let overallStatus: SystemHealth['overall_status'] = 'healthy';
    const failedComponents = componentHealthArray.filter(c => c.status === 'failed');
    const degradedComponents = componentHealthArray.filter(c => c.status === 'degraded');

    if (failedComponents.length > 0 && failedComponents.length >= componentHealthArray.length * 0.5) {
      overallStatus = 'critical';
    } else if (failedComponents.length > 0 || degradedComponents.length > 0) {
      overallStatus = 'degraded';
    }

    return {
      overall_status: overallStatus,
      component_health: componentHealthArray,
      recent_errors: this.errors.slice(-20),
      last_health_check: new Date()
    };
  }

  /**
   * Get error statistics
   */
  getErrorStatistics(): {
    total_errors: number;
    errors_by_category: Record<ErrorCategory, number>;
    errors_by_severity: Record<ErrorSeverity, number>;
  } {
    const errorsByCategory: Record<ErrorCategory, number> = {
      [ErrorCategory.METRIC_SOURCE]: 0,
      [ErrorCategory.TIMEOUT]: 0,
      [ErrorCategory.CONFIGURATION]: 0,
      [ErrorCategory.DELIVERY]: 0,
      [ErrorCategory.SYSTEM_RESOURCE]: 0
    };
    const errorsBySeverity: Record<ErrorSeverity, number> = {
      [ErrorSeverity.LOW]: 0,
      [ErrorSeverity.MEDIUM]: 0,
      [ErrorSeverity.HIGH]: 0,
      [ErrorSeverity.CRITICAL]: 0
    };

    for (const error of this.errors) {
      errorsByCategory[error.category]++;
      errorsBySeverity[error.severity]++;
    }

    return {
      total_errors: this.errors.length,
      errors_by_category: errorsByCategory,
      errors_by_severity: errorsBySeverity
    };
  }

  /**
   * Clear stored errors older than maxAge milliseconds
   */
  clearOldErrors(maxAge: number = 24 * 60 * 60 * 1000): number {
    const cutoffTime = Date.now() - maxAge;
    const before = this.errors.length;
    this.errors = this.errors.filter(error => error.timestamp.getTime() >= cutoffTime);

    const clearedCount = before - this.errors.length;
    if (clearedCount > 0) {
      this.logger.info(`Cleared ${clearedCount} old errors`);
    }
    return clearedCount;
  }

  private storeError(record: MonitoringErrorRecord): void {
    this.errors.push(record);
    if (this.errors.length > this.maxStoredErrors) {
      this.errors.splice(0, this.errors.length - this.maxStoredErrors);
    }
  }

  private categorizeError(error: Error): ErrorCategory {
    const message = error.message.toLowerCase();

    if (message.includes('timeout') || message.includes('timed out')) {
      return ErrorCategory.TIMEOUT;
    }
    if (message.includes('config') || message.includes('validation')) {
      return ErrorCategory.CONFIGURATION;
    }
    if (message.includes('memory') || message.includes('emfile') || message.includes('resource')) {
      return ErrorCategory.SYSTEM_RESOURCE;
    }

    return ErrorCategory.METRIC_SOURCE;
  }

  /**
   * Log error with appropriate level
   */
  private logError(error: MonitoringErrorRecord): void {
    const logMessage = `[${error.category}] ${error.component}: ${error.message}`;

    switch (error.severity) {
      case ErrorSeverity.CRITICAL:
        this.logger.error(`CRITICAL ERROR - ${logMessage}`);
        break;
      case ErrorSeverity.HIGH:
        this.logger.error(`HIGH SEVERITY - ${logMessage}`);
        break;
      case ErrorSeverity.MEDIUM:
        this.logger.warn(`MEDIUM SEVERITY - ${logMessage}`);
        break;
      case ErrorSeverity.LOW:
        this.logger.info(`LOW SEVERITY - ${logMessage}`);
        break;
    }
  }

  private updateComponentHealth(error: MonitoringErrorRecord): void {
    const component = error.component;
    let health = this.componentHealth.get(component);

    if (!health) {
      health = {
        component,
        status: 'healthy',
        last_success: new Date(0),
        consecutive_failures: 0,
        total_failures: 0
      };
      this.componentHealth.set(component, health);
    }

    // Delivery and configuration problems do not degrade a component
    if (error.category === ErrorCategory.DELIVERY || error.category === ErrorCategory.CONFIGURATION) {
      return;
    }

    health.consecutive_failures++;
    health.total_failures++;

    if (error.severity === ErrorSeverity.CRITICAL || health.consecutive_failures > 5) {
      health.status = 'failed';
    } else if (error.severity === ErrorSeverity.HIGH || health.consecutive_failures > 2) {
      health.status = 'degraded';
    }
  }

  private generateErrorId(): string {
    return `error-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
  }
}
