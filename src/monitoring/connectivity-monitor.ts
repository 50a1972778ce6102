/**
 * Probe, classify and record connectivity on every scheduler tick
 */

import { EventEmitter } from 'events';
import {
  AlertNotifier,
  AnomalyState,
  CheckRecord,
  ConnectivityState,
  StateTransition
} from '../types';
import { ErrorHandler } from '../error-handling';
import { HistoryStore } from '../storage/history-store';
import { CheckLogSink, formatCheckLine, formatTransitionLine } from '../storage/check-log';
import { AlertTargets, buildAlertMessage, shouldNotify, DEFAULT_ALERT_SUBJECT } from '../alerts/alert-messages';
import { Logger } from '../utils/logger';
import { Prober } from './ping-prober';
import { classify } from './state-classifier';
import { createCheckRecord } from './check-record';
import { SchedulerStatus, TickScheduler } from './scheduler';

export interface ConnectivityMonitorOptions {
  prober: Prober;
  history: HistoryStore;
  targets: AlertTargets;
  intervalMs: number;
  anomalyState?: AnomalyState;
  notifier?: AlertNotifier;
  checkLog?: CheckLogSink;
  errorHandler?: ErrorHandler;
  alertSubject?: string;
  runImmediately?: boolean;
  clock?: () => Date;
  logger?: Logger;
}

/**
 * Owns the tick and the last known connectivity state.
 *
 * Events:
 * - `check` (record: CheckRecord) after every stored check
 * - `stateChange` (transition: StateTransition) when the state differs from
 *   the previous tick
 */
export class ConnectivityMonitor extends EventEmitter {
  private readonly prober: Prober;
  private readonly history: HistoryStore;
  private readonly targets: AlertTargets;
  private readonly anomalyState: AnomalyState | undefined;
  private readonly notifier: AlertNotifier | undefined;
  private readonly checkLog: CheckLogSink | undefined;
  private readonly errorHandler: ErrorHandler;
  private readonly alertSubject: string;
  private readonly clock: () => Date;
  private readonly logger: Logger;
  private readonly scheduler: TickScheduler;
  private lastState: ConnectivityState = 'UNKNOWN';
  private currentTick: Promise<CheckRecord> | null = null;

  constructor(options: ConnectivityMonitorOptions) {
    super();
    this.prober = options.prober;
    this.history = options.history;
    this.targets = options.targets;
    this.anomalyState = options.anomalyState;
    this.notifier = options.notifier;
    this.checkLog = options.checkLog;
    this.errorHandler = options.errorHandler ?? new ErrorHandler();
    this.alertSubject = options.alertSubject ?? DEFAULT_ALERT_SUBJECT;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? new Logger('ConnectivityMonitor');

    this.scheduler = new TickScheduler(
      async () => {
        await this.runTick();
      },
      {
        intervalMs: options.intervalMs,
        runImmediately: options.runImmediately ?? true,
        logger: this.logger.child('Scheduler')
      }
    );

    this.scheduler.on('tick:complete', () => {
      this.errorHandler.recordSuccess('ConnectivityMonitor');
    });

    this.scheduler.on('tick:error', (event: { error: unknown }) => {
      this.errorHandler.handleTickFailure(event.error);
    });
  }

  start(): void {
    this.logger.info(
      `Monitoring gateway ${this.targets.gateway.address} and internet host ${this.targets.internet.address}`
    );
    this.scheduler.start();
  }

  /**
   * Stop ticking; waits for a tick that is already probing to finish
   */
  async stop(): Promise<void> {
    await this.scheduler.stop();
  }

  getLastState(): ConnectivityState {
    return this.lastState;
  }

  getSchedulerStatus(): SchedulerStatus {
    return this.scheduler.getStatus();
  }

  /**
   * Execute one probe round. Concurrent callers share the round already in
   * progress, so the history keeps a single writer.
   */
  runTick(): Promise<CheckRecord> {
    if (!this.currentTick) {
      this.currentTick = this.performTick().finally(() => {
        this.currentTick = null;
      });
    }
    return this.currentTick;
  }

  private async performTick(): Promise<CheckRecord> {
    const startedAt = this.clock();

    const gateway = await this.prober.probe(this.targets.gateway);
    const internet = await this.prober.probe(this.targets.internet);

    const state = classify(gateway.reachable, internet.reachable, {
      ...(this.anomalyState !== undefined && { anomalyState: this.anomalyState })
    });

    const record = createCheckRecord({
      timestamp: this.nonDecreasing(startedAt),
      gateway,
      internet,
      state
    });
    this.history.append(record);

    let transition: StateTransition | null = null;
    if (state !== this.lastState) {
      transition = {
        previous_state: this.lastState,
        new_state: state,
        timestamp: record.timestamp
      };
      this.lastState = state;
    }

    this.emit('check', record);
    if (transition) {
      this.emit('stateChange', transition);
    }

    await this.writeLogLine(formatCheckLine(record));

    if (transition) {
      await this.writeLogLine(formatTransitionLine(transition));
      await this.announceTransition(transition);
    }

    return record;
  }

  private async announceTransition(transition: StateTransition): Promise<void> {
    if (!shouldNotify(transition)) {
      this.logger.info(`Initial state: ${transition.new_state}`);
      return;
    }

    const alert = buildAlertMessage(transition, this.targets, this.alertSubject);
    if (transition.new_state === 'UP') {
      this.logger.info(alert.message);
    } else {
      this.logger.error(alert.message);
    }

    if (!this.notifier) {
      return;
    }

    try {
      await this.notifier.notify(transition);
      this.errorHandler.recordSuccess('AlertNotifier');
    } catch (error) {
      this.errorHandler.handleNotificationFailure(transition, error);
    }
  }

  private async writeLogLine(line: string): Promise<void> {
    if (!this.checkLog) {
      return;
    }

    try {
      await this.checkLog.append(line);
      this.errorHandler.recordSuccess('CheckLog');
    } catch (error) {
      this.errorHandler.handleLogWriteFailure(this.checkLog.location, error);
    }
  }

  /**
   * Clamp to the newest stored timestamp if the wall clock stepped backwards
   */
  private nonDecreasing(timestamp: Date): Date {
    const latest = this.history.latest();
    if (latest && timestamp.getTime() < latest.timestamp.getTime()) {
      this.logger.warn(
        `Clock moved backwards (${timestamp.toISOString()} < ${latest.timestamp.toISOString()}), reusing last timestamp`
      );
      return latest.timestamp;
    }
    return timestamp;
  }
}
