/**
 * Fixed-interval tick scheduler
 */

import { EventEmitter } from 'events';
import { Logger } from '../types';
import { Logger as ConsoleLogger } from '../utils/logger';

export interface SchedulerOptions {
  intervalMs: number;
  /** Run the first tick right after start() instead of one interval later */
  runImmediately?: boolean;
  logger?: Logger;
}

export interface SchedulerStatus {
  running: boolean;
  tickInFlight: boolean;
  completedTicks: number;
  failedTicks: number;
  intervalMs: number;
  nextExecution?: Date;
}

export type TickTask = () => Promise<void>;

/**
 * Drives a single task at a fixed interval with setTimeout chaining.
 *
 * Ticks never overlap: the next one is planned `intervalMs` after the start of
 * the previous tick, or right away when a tick overran its slot. A failing
 * task is reported as `tick:error` and the loop keeps going.
 *
 * Events: `tick:start`, `tick:complete`, `tick:error`.
 */
export class TickScheduler extends EventEmitter {
  private readonly task: TickTask;
  private readonly intervalMs: number;
  private readonly runImmediately: boolean;
  private readonly logger: Logger;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private isRunning = false;
  private completedTicks = 0;
  private failedTicks = 0;
  private nextExecution: Date | undefined;
  /** Bumped on every start(); a tick only plans a successor for its own run */
  private generation = 0;

  constructor(task: TickTask, options: SchedulerOptions) {
    super();
    if (!Number.isFinite(options.intervalMs) || options.intervalMs <= 0) {
      throw new RangeError(`Tick interval must be a positive number of milliseconds, got ${options.intervalMs}`);
    }
    this.task = task;
    this.intervalMs = options.intervalMs;
    this.runImmediately = options.runImmediately ?? true;
    this.logger = options.logger ?? new ConsoleLogger('TickScheduler');
  }

  /**
   * Start the scheduler
   */
  start(): void {
    if (this.isRunning) {
      this.logger.warn('TickScheduler is already running');
      return;
    }

    this.isRunning = true;
    this.generation++;
    this.logger.info(`Starting tick scheduler (interval ${this.intervalMs}ms)`);
    this.scheduleNext(this.generation, this.runImmediately ? 0 : this.intervalMs);
  }

  /**
   * Stop issuing ticks. Resolves once a tick that is already running has
   * finished, so the caller can tear down what the tick writes to.
   */
  async stop(): Promise<void> {
    if (!this.isRunning) {
      return;
    }

    this.logger.info('Stopping tick scheduler');
    this.isRunning = false;
    this.nextExecution = undefined;

    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }

    if (this.inFlight) {
      this.logger.debug('Waiting for in-flight tick to finish');
      await this.inFlight;
    }
  }

  getStatus(): SchedulerStatus {
    return {
      running: this.isRunning,
      tickInFlight: this.inFlight !== null,
      completedTicks: this.completedTicks,
      failedTicks: this.failedTicks,
      intervalMs: this.intervalMs,
      ...(this.nextExecution !== undefined && { nextExecution: this.nextExecution })
    };
  }

  private scheduleNext(generation: number, delay: number): void {
    const boundedDelay = Math.max(0, delay);
    this.nextExecution = new Date(Date.now() + boundedDelay);
    this.logger.debug(`Next tick in ${boundedDelay}ms`);

    this.timer = setTimeout(() => {
      this.timer = null;
      // A tick from before a stop()/start() may still be running; queue behind it
      const previous = this.inFlight;
      const tick = previous
        ? previous.then(() => this.executeTick(generation))
        : this.executeTick(generation);
      const tracked: Promise<void> = tick.finally(() => {
        if (this.inFlight === tracked) {
          this.inFlight = null;
        }
      });
      this.inFlight = tracked;
    }, boundedDelay);
  }

  /**
   * Run one tick and plan the following one
   */
  private async executeTick(generation: number): Promise<void> {
    if (!this.isCurrent(generation)) {
      return;
    }

    const startedAt = Date.now();
    this.emit('tick:start', { startedAt: new Date(startedAt) });

    try {
      await this.task();
      this.completedTicks++;
      this.emit('tick:complete', { durationMs: Date.now() - startedAt });
    } catch (error) {
      this.failedTicks++;
      this.logger.error('Tick failed:', error);
      this.emit('tick:error', { error });
    }

    if (this.isCurrent(generation)) {
      this.scheduleNext(generation, startedAt + this.intervalMs - Date.now());
    }
  }

  private isCurrent(generation: number): boolean {
    return this.isRunning && generation === this.generation;
  }
}
