/**
 * Error types and classifications for the network status monitor
 */

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export enum ErrorCategory {
  PROBE_FAILURE = 'probe_failure',
  NOTIFICATION_FAILURE = 'notification_failure',
  LOG_WRITE_FAILURE = 'log_write_failure',
  TICK_FAILURE = 'tick_failure',
  INVARIANT_VIOLATION = 'invariant_violation',
  CONFIGURATION = 'configuration'
}

export interface NetworkError {
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
  last_success?: Date;
  last_failure?: Date;
  consecutive_failures: number;
}

export interface SystemHealth {
  overall_status: 'healthy' | 'degraded' | 'critical';
  component_health: ComponentHealth[];
  recent_errors: NetworkError[];
  last_health_check: Date;
}

export class NetworkMonitoringError extends Error {
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
    this.name = 'NetworkMonitoringError';
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
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): NetworkError {
    return {
      id: this.generateId(),
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

  private generateId(): string {
    return `${this.component}-${this.category}-${this.timestamp.getTime()}-${Math.random().toString(36).slice(2, 11)}`;
  }
}

/**
 * A programming defect: an operation broke one of the history or record
 * invariants. Never caught and tolerated inside the core.
 */
export class InvariantViolationError extends NetworkMonitoringError {
  constructor(message: string, component: string, details?: Record<string, unknown>) {
    super(message, ErrorCategory.INVARIANT_VIOLATION, ErrorSeverity.CRITICAL, component, undefined, details);
    this.name = 'InvariantViolationError';
  }
}

export function assertInvariant(
  condition: boolean,
  message: string,
  component: string,
  details?: Record<string, unknown>
): asserts condition {
  if (!condition) {
    throw new InvariantViolationError(message, component, details);
  }
}
