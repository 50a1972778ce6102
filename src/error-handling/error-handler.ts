/**
 * Error recording and component health tracking for the monitor
 */

import { EventEmitter } from 'events';
import { Logger } from '../utils/logger';
import { StateTransition } from '../types';
import {
  NetworkError,
  ErrorCategory,
  ErrorSeverity,
  SystemHealth,
  ComponentHealth,
  NetworkMonitoringError
} from './error-types';

export interface ErrorContext {
  component: string;
  category?: ErrorCategory;
  severity?: ErrorSeverity;
  target?: string;
  details?: Record<string, unknown>;
}

const DEFAULT_MAX_RECENT_ERRORS = 100;
const FAILED_AFTER_CONSECUTIVE_FAILURES = 5;

export class ErrorHandler extends EventEmitter {
  private logger: Logger;
  private errors: NetworkError[] = [];
  private componentHealth: Map<string, ComponentHealth> = new Map();
  private maxRecentErrors: number;

  constructor(maxRecentErrors: number = DEFAULT_MAX_RECENT_ERRORS) {
    super();
    this.logger = new Logger('ErrorHandler');
    this.maxRecentErrors = maxRecentErrors;
  }

  /**
   * Record an error, log it and update the health of the component it came from
   */
  handleError(error: unknown, context: ErrorContext): NetworkError {
    const networkError = error instanceof NetworkMonitoringError
      ? this.withContextDetails(error.toJSON(), context)
      : this.toNetworkError(error, context);

    this.errors.push(networkError);
    if (this.errors.length > this.maxRecentErrors) {
      this.errors.shift();
    }

    this.logError(networkError);
    this.updateComponentHealth(networkError);
    this.emit('errorRecorded', networkError);

    return networkError;
  }

  /**
   * Handle a failed alert delivery; the check that triggered it is already stored
   */
  handleNotificationFailure(transition: StateTransition, error: unknown): NetworkError {
    return this.handleError(error, {
      component: 'AlertNotifier',
      category: ErrorCategory.NOTIFICATION_FAILURE,
      severity: ErrorSeverity.MEDIUM,
      details: {
        previous_state: transition.previous_state,
        new_state: transition.new_state,
        transition_time: transition.timestamp.toISOString()
      }
    });
  }

  /**
   * Handle a failed write to the check log file
   */
  handleLogWriteFailure(filePath: string, error: unknown): NetworkError {
    return this.handleError(error, {
      component: 'CheckLog',
      category: ErrorCategory.LOG_WRITE_FAILURE,
      severity: ErrorSeverity.LOW,
      target: filePath
    });
  }

  /**
   * Handle a tick that failed before it could complete
   */
  handleTickFailure(error: unknown): NetworkError {
    return this.handleError(error, {
      component: 'ConnectivityMonitor',
      category: ErrorCategory.TICK_FAILURE,
      severity: ErrorSeverity.HIGH
    });
  }

  /**
   * Mark a component as working again
   */
  recordSuccess(component: string): void {
    const health = this.componentHealth.get(component);
    if (!health) {
      this.componentHealth.set(component, {
        component,
        status: 'healthy',
        last_success: new Date(),
        consecutive_failures: 0
      });
      return;
    }

    if (health.status !== 'healthy') {
      this.logger.info(`Component ${component} recovered after ${health.consecutive_failures} failures`);
    }
    health.status = 'healthy';
    health.consecutive_failures = 0;
    health.last_success = new Date();
  }

  /**
   * Get current system health status
   */
  getSystemHealth(): SystemHealth {
    const componentHealthArray = Array.from(this.componentHealth.values()).map(health => ({ ...health }));

    let overallStatus: SystemHealth['overall_status'] = 'healthy';
    if (componentHealthArray.some(c => c.status === 'failed')) {
      overallStatus = 'critical';
    } else if (componentHealthArray.some(c => c.status === 'degraded')) {
      overallStatus = 'degraded';
    }

    return {
      overall_status: overallStatus,
      component_health: componentHealthArray,
      recent_errors: [...this.errors],
      last_health_check: new Date()
    };
  }

  /**
   * Get the most recent errors, newest first
   */
  getRecentErrors(limit: number = this.maxRecentErrors): NetworkError[] {
    return this.errors.slice(-limit).reverse();
  }

  /**
   * Keep the caller's details next to the ones the error already carries;
   * the error's own keys win on conflict
   */
  private withContextDetails(error: NetworkError, context: ErrorContext): NetworkError {
    if (context.details === undefined) {
      return error;
    }
    return { ...error, details: { ...context.details, ...error.details } };
  }

  private toNetworkError(error: unknown, context: ErrorContext): NetworkError {
    const category = context.category ?? ErrorCategory.TICK_FAILURE;
    const message = error instanceof Error ? error.message : String(error);
    const timestamp = new Date();

    return {
      id: `${context.component}-${category}-${timestamp.getTime()}-${Math.random().toString(36).slice(2, 11)}`,
      timestamp,
      category,
      severity: context.severity ?? ErrorSeverity.MEDIUM,
      component: context.component,
      message,
      ...(context.target !== undefined && { target: context.target }),
      ...(context.details !== undefined && { details: context.details }),
      ...(error instanceof Error && error.stack !== undefined && { stack_trace: error.stack })
    };
  }

  /**
   * Log error with appropriate level
   */
  private logError(error: NetworkError): void {
    const logMessage = `[${error.category}] ${error.component}: ${error.message}`;
    const details: unknown[] = error.details !== undefined ? [error.details] : [];

    switch (error.severity) {
      case ErrorSeverity.CRITICAL:
        this.logger.error(`CRITICAL ERROR - ${logMessage}`, ...details);
        break;
      case ErrorSeverity.HIGH:
        this.logger.error(`HIGH SEVERITY - ${logMessage}`, ...details);
        break;
      case ErrorSeverity.MEDIUM:
        this.logger.warn(`MEDIUM SEVERITY - ${logMessage}`, ...details);
        break;
      case ErrorSeverity.LOW:
        this.logger.info(`LOW SEVERITY - ${logMessage}`, ...details);
        break;
    }
  }

  /**
   * Update component health based on error
   */
  private updateComponentHealth(error: NetworkError): void {
    const health: ComponentHealth = this.componentHealth.get(error.component) ?? {
      component: error.component,
      status: 'healthy',
      consecutive_failures: 0
    };

    health.consecutive_failures++;
    health.last_failure = error.timestamp;

    if (error.severity === ErrorSeverity.CRITICAL || health.consecutive_failures >= FAILED_AFTER_CONSECUTIVE_FAILURES) {
      health.status = 'failed';
    } else {
      health.status = 'degraded';
    }

    this.componentHealth.set(error.component, health);
  }
}
