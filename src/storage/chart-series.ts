/**
 * Chart-ready latency series over a history snapshot
 */

import { ChartSeries, CheckRecord } from '../types';

/**
 * Three parallel series, oldest first. A failed probe is `null` so the chart
 * draws a gap instead of a zero-latency point.
 */
export function buildChartSeries(records: ReadonlyArray<CheckRecord>): ChartSeries {
  return {
    labels: records.map(record => record.timestamp.toISOString()),
    gateway_latency: records.map(record => record.gateway_latency_ms),
    internet_latency: records.map(record => record.internet_latency_ms)
  };
}
