/**
 * Shared builders for tests
 */

import { CheckRecord, ProbeResult, ProbeTarget, RecordedState } from '../types';
import { createCheckRecord } from '../monitoring/check-record';
import { classify } from '../monitoring/state-classifier';
import { Prober } from '../monitoring/ping-prober';

export const GATEWAY: ProbeTarget = { name: 'Gateway', address: '192.168.0.1' };
export const INTERNET: ProbeTarget = { name: 'Internet', address: '8.8.8.8' };
export const TARGETS = { gateway: GATEWAY, internet: INTERNET };

export const BASE_TIME = new Date(2026, 9, 18, 9, 15, 0);

export function reachable(latency: number | null = 10): ProbeResult {
  return { reachable: true, latency_ms: latency };
}

export function unreachable(): ProbeResult {
  return { reachable: false, latency_ms: null, error_message: 'All packets lost' };
}

/**
 * Record `offsetSeconds` after BASE_TIME in the given state
 */
export function recordAt(offsetSeconds: number, state: RecordedState): CheckRecord {
  const gatewayUp = state !== 'GATEWAY_DOWN';
  const internetUp = state === 'UP';
  return createCheckRecord({
    timestamp: new Date(BASE_TIME.getTime() + offsetSeconds * 1000),
    gateway: gatewayUp ? reachable(2) : unreachable(),
    internet: internetUp ? reachable(20) : unreachable(),
    state: classify(gatewayUp, internetUp)
  });
}

/**
 * Prober that answers from a per-address script of results, repeating the
 * last entry once the script runs out
 */
export class ScriptedProber implements Prober {
  readonly calls: string[] = [];
  private scripts: Map<string, ProbeResult[]>;

  constructor(scripts: Record<string, ProbeResult[]>) {
    this.scripts = new Map(Object.entries(scripts));
  }

  async probe(target: ProbeTarget): Promise<ProbeResult> {
    this.calls.push(target.address);
    const script = this.scripts.get(target.address) ?? [];
    const next = script.length > 1 ? script.shift() : script[0];
    return next ?? unreachable();
  }
}

/**
 * Gateway/internet results for a sequence of states
 */
export function scriptForStates(states: RecordedState[]): Record<string, ProbeResult[]> {
  return {
    [GATEWAY.address]: states.map(state => (state === 'GATEWAY_DOWN' ? unreachable() : reachable(2))),
    [INTERNET.address]: states.map(state => (state === 'UP' ? reachable(20) : unreachable()))
  };
}
