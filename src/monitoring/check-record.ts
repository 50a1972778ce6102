/**
 * Construction of immutable check records
 */

import { CheckRecord, ProbeResult, RecordedState } from '../types';

export interface CheckRecordInput {
  timestamp: Date;
  gateway: ProbeResult;
  internet: ProbeResult;
  state: RecordedState;
}

/**
 * Build a frozen check record. Latency is only kept for a reachable target,
 * and the timestamp is copied so later mutation of the input Date cannot
 * change a stored record.
 */
export function createCheckRecord(input: CheckRecordInput): CheckRecord {
  return Object.freeze({
    timestamp: new Date(input.timestamp.getTime()),
    gateway_reachable: input.gateway.reachable,
    internet_reachable: input.internet.reachable,
    gateway_latency_ms: input.gateway.reachable ? input.gateway.latency_ms : null,
    internet_latency_ms: input.internet.reachable ? input.internet.latency_ms : null,
    state: input.state
  });
}
