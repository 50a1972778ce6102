/**
 * Tests for error recording and component health
 */

import { ErrorHandler } from './error-handler';
import {
  ErrorCategory,
  ErrorSeverity,
  InvariantViolationError,
  NetworkError,
  NetworkMonitoringError,
  assertInvariant
} from './error-types';
import { StateTransition } from '../types';

describe('ErrorHandler', () => {
  let errorHandler: ErrorHandler;

  beforeEach(() => {
    errorHandler = new ErrorHandler(3);
  });

  it('should record plain errors with the context category', () => {
    const recorded = errorHandler.handleError(new Error('boom'), {
      component: 'ConnectivityMonitor',
      category: ErrorCategory.TICK_FAILURE,
      severity: ErrorSeverity.HIGH,
      details: { tick: 4 }
    });

    expect(recorded).toMatchObject({
      category: ErrorCategory.TICK_FAILURE,
      severity: ErrorSeverity.HIGH,
      component: 'ConnectivityMonitor',
      message: 'boom',
      details: { tick: 4 }
    });
  });

  it('should keep the category of a NetworkMonitoringError', () => {
    const error = new NetworkMonitoringError(
      'delivery failed',
      ErrorCategory.NOTIFICATION_FAILURE,
      ErrorSeverity.MEDIUM,
      'AlertNotifier',
      'https://hooks.example.test'
    );

    const recorded = errorHandler.handleError(error, { component: 'ignored' });

    expect(recorded.category).toBe(ErrorCategory.NOTIFICATION_FAILURE);
    expect(recorded.component).toBe('AlertNotifier');
    expect(recorded.target).toBe('https://hooks.example.test');
  });

  it('should keep only the most recent errors, newest first', () => {
    ['one', 'two', 'three', 'four'].forEach(message =>
      errorHandler.handleError(new Error(message), { component: 'CheckLog' })
    );

    expect(errorHandler.getRecentErrors().map(e => e.message)).toEqual(['four', 'three', 'two']);
    expect(errorHandler.getRecentErrors(1).map(e => e.message)).toEqual(['four']);
  });

  it('should emit recorded errors', () => {
    const seen: NetworkError[] = [];
    errorHandler.on('errorRecorded', (error: NetworkError) => seen.push(error));

    errorHandler.handleLogWriteFailure('/var/log/network_status.log', new Error('EACCES'));

    expect(seen).toHaveLength(1);
    expect(seen[0]).toMatchObject({
      category: ErrorCategory.LOG_WRITE_FAILURE,
      severity: ErrorSeverity.LOW,
      component: 'CheckLog',
      target: '/var/log/network_status.log'
    });
  });

  it('should describe the transition of a failed notification', () => {
    const transition: StateTransition = {
      previous_state: 'UP',
      new_state: 'GATEWAY_DOWN',
      timestamp: new Date('2026-10-18T09:15:00Z')
    };

    const recorded = errorHandler.handleNotificationFailure(transition, new Error('timeout'));

    expect(recorded.details).toEqual({
      previous_state: 'UP',
      new_state: 'GATEWAY_DOWN',
      transition_time: '2026-10-18T09:15:00.000Z'
    });
  });

  it('should keep the transition details when the notifier raised a NetworkMonitoringError', () => {
    const transition: StateTransition = {
      previous_state: 'UP',
      new_state: 'INTERNET_DOWN',
      timestamp: new Date('2026-10-18T09:15:00Z')
    };
    const error = new NetworkMonitoringError(
      'Webhook delivery failed: timeout',
      ErrorCategory.NOTIFICATION_FAILURE,
      ErrorSeverity.MEDIUM,
      'AlertNotifier',
      'https://hooks.example.test',
      { status: 504 }
    );

    const recorded = errorHandler.handleNotificationFailure(transition, error);

    expect(recorded.target).toBe('https://hooks.example.test');
    expect(recorded.details).toEqual({
      previous_state: 'UP',
      new_state: 'INTERNET_DOWN',
      transition_time: '2026-10-18T09:15:00.000Z',
      status: 504
    });
  });

  describe('Health tracking', () => {
    it('should be healthy with no components', () => {
      expect(errorHandler.getSystemHealth().overall_status).toBe('healthy');
    });

    it('should degrade a component on failure and recover on success', () => {
      errorHandler.handleTickFailure(new Error('probe crashed'));
      expect(errorHandler.getSystemHealth().overall_status).toBe('degraded');

      errorHandler.recordSuccess('ConnectivityMonitor');

      const health = errorHandler.getSystemHealth();
      expect(health.overall_status).toBe('healthy');
      expect(health.component_health).toEqual([
        expect.objectContaining({ component: 'ConnectivityMonitor', status: 'healthy', consecutive_failures: 0 })
      ]);
    });

    it('should mark a component failed after five consecutive failures', () => {
      for (let i = 0; i < 5; i++) {
        errorHandler.handleTickFailure(new Error(`failure ${i}`));
      }

      const health = errorHandler.getSystemHealth();
      expect(health.overall_status).toBe('critical');
      expect(health.component_health[0]).toMatchObject({ status: 'failed', consecutive_failures: 5 });
    });

    it('should mark a component failed on a critical error', () => {
      errorHandler.handleError(new Error('corrupt'), {
        component: 'HistoryStore',
        severity: ErrorSeverity.CRITICAL
      });

      expect(errorHandler.getSystemHealth().overall_status).toBe('critical');
    });
  });
});

describe('assertInvariant', () => {
  it('should pass silently when the condition holds', () => {
    expect(() => assertInvariant(true, 'unused', 'Test')).not.toThrow();
  });

  it('should throw an InvariantViolationError otherwise', () => {
    let caught: unknown;
    try {
      assertInvariant(false, 'records out of order', 'HistoryStore', { size: 2 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InvariantViolationError);
    if (caught instanceof InvariantViolationError) {
      expect(caught.category).toBe(ErrorCategory.INVARIANT_VIOLATION);
      expect(caught.severity).toBe(ErrorSeverity.CRITICAL);
      expect(caught.details).toEqual({ size: 2 });
    }
  });
});
