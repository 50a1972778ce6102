/**
 * Tests for chart series extraction
 */

import { buildChartSeries } from './chart-series';
import { recordAt } from '../test-support/fixtures';

describe('buildChartSeries', () => {
  it('should return empty series for an empty history', () => {
    expect(buildChartSeries([])).toEqual({ labels: [], gateway_latency: [], internet_latency: [] });
  });

  it('should keep order and mark failed probes as null', () => {
    const records = [recordAt(0, 'UP'), recordAt(30, 'INTERNET_DOWN'), recordAt(60, 'GATEWAY_DOWN')];

    const series = buildChartSeries(records);

    expect(series.labels).toEqual(records.map(r => r.timestamp.toISOString()));
    expect(series.gateway_latency).toEqual([2, 2, null]);
    expect(series.internet_latency).toEqual([20, null, null]);
  });

  it('should produce series of equal length', () => {
    const records = [0, 30, 60, 90].map(offset => recordAt(offset, offset % 60 === 0 ? 'UP' : 'GATEWAY_DOWN'));

    const series = buildChartSeries(records);

    expect(series.labels).toHaveLength(4);
    expect(series.gateway_latency).toHaveLength(4);
    expect(series.internet_latency).toHaveLength(4);
  });
});
