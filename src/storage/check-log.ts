/**
 * Append-only plain-text log of checks and state changes
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { CheckRecord, StateTransition } from '../types';
import { formatLocalTimestamp } from '../utils/time';

export interface CheckLogSink {
  /** Where lines end up, for error reports */
  readonly location: string;
  append(line: string): Promise<void>;
}

type LineLevel = 'INFO' | 'WARNING';

function formatLine(timestamp: Date, level: LineLevel, message: string): string {
  return `${formatLocalTimestamp(timestamp)}  ${level.padEnd(8)}  ${message}`;
}

function upDown(reachable: boolean): string {
  return reachable ? 'up' : 'down';
}

/**
 * One line per check, e.g.
 * `2026-10-18 09:15:00  WARNING   gateway=up internet=down state=INTERNET_DOWN`
 */
export function formatCheckLine(record: CheckRecord): string {
  return formatLine(
    record.timestamp,
    record.state === 'UP' ? 'INFO' : 'WARNING',
    `gateway=${upDown(record.gateway_reachable)} internet=${upDown(record.internet_reachable)} state=${record.state}`
  );
}

export function formatTransitionLine(transition: StateTransition): string {
  return formatLine(
    transition.timestamp,
    transition.new_state === 'UP' ? 'INFO' : 'WARNING',
    `state change ${transition.previous_state} -> ${transition.new_state}`
  );
}

/**
 * Appends lines to a file, creating its directory on first write
 */
export class FileCheckLog implements CheckLogSink {
  readonly location: string;
  private directoryReady = false;

  constructor(filePath: string) {
    this.location = filePath;
  }

  async append(line: string): Promise<void> {
    if (!this.directoryReady) {
      await fs.mkdir(path.dirname(this.location), { recursive: true });
      this.directoryReady = true;
    }
    await fs.appendFile(this.location, `${line}\n`, 'utf-8');
  }
}
