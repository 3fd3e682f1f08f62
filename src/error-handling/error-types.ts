/**
 * Error types and classifications for the monitoring and alerting engine
 */

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export enum ErrorCategory {
  METRIC_SOURCE = 'metric_source',
  TIMEOUT = 'timeout',
  CONFIGURATION = 'configuration',
  DELIVERY = 'delivery',
  SYSTEM_RESOURCE = 'system_resource'
}

export interface MonitoringErrorRecord {
  id: string;
  timestamp: Date;
  category: ErrorCategory;
  severity: ErrorSeverity;
  component: string;
  target?: string;
  message: string;
  details?: Record<string, unknown>;
  stack_trace?: string;
}

export interface ComponentHealth {
  component: string;
  status: 'healthy' | 'degraded' | 'failed';
  last_success: Date;
  consecutive_failures: number;
  total_failures: number;
}

export interface SystemHealth {
  overall_status: 'healthy' | 'degraded' | 'critical';
  component_health: ComponentHealth[];
  recent_errors: MonitoringErrorRecord[];
  last_health_check: Date;
}

export class MonitoringError extends Error {
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly component: string;
  public readonly target?: string;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(
    message: string,
    category: ErrorCategory,
    severity: ErrorSeverity,
    component: string,
    target?: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'MonitoringError';
    this.category = category;
    this.severity = severity;
    this.component = component;
    if (target !== undefined) {
      this.target = target;
    }
    if (details !== undefined) {
      this.details = details;
    }
    this.timestamp = new Date();

    // Maintain proper stack trace for V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MonitoringError);
    }
  }

  toJSON(): MonitoringErrorRecord {
    return {
      id: `${this.component}-${this.category}-${this.timestamp.getTime()}-${Math.random().toString(36).slice(2, 11)}`,
      timestamp: this.timestamp,
      category: this.category,
      severity: this.severity,
      component: this.component,
      ...(this.target !== undefined && { target: this.target }),
      message: this.message,
      ...(this.details !== undefined && { details: this.details }),
      ...(this.stack !== undefined && { stack_trace: this.stack })
    };
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
