/**
 * Aggregate statistics over a history snapshot
 */

import { AggregateStats, CheckRecord } from '../types';

function roundToOneDecimal(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Count checks per state and compute the uptime percentage. Computed fresh on
 * every call; an empty history yields zeros rather than NaN.
 */
export function aggregate(records: ReadonlyArray<CheckRecord>): AggregateStats {
  let upCount = 0;
  let gatewayDownCount = 0;
  let internetDownCount = 0;

  for (const record of records) {
    switch (record.state) {
      case 'UP':
        upCount++;
        break;
      case 'GATEWAY_DOWN':
        gatewayDownCount++;
        break;
      case 'INTERNET_DOWN':
        internetDownCount++;
        break;
    }
  }

  const total = records.length;

  return {
    total_checks: total,
    up_count: upCount,
    gateway_down_count: gatewayDownCount,
    internet_down_count: internetDownCount,
    uptime_percentage: total > 0 ? roundToOneDecimal((upCount / total) * 100) : 0
  };
}
