/**
 * Tests for aggregate statistics
 */

import { aggregate } from './stats-aggregator';
import { HistoryStore } from './history-store';
import { recordAt } from '../test-support/fixtures';
import { RecordedState } from '../types';

function recordsFor(states: RecordedState[]) {
  return states.map((state, index) => recordAt(index * 30, state));
}

describe('aggregate', () => {
  it('should return zeros for an empty history', () => {
    expect(aggregate([])).toEqual({
      total_checks: 0,
      up_count: 0,
      gateway_down_count: 0,
      internet_down_count: 0,
      uptime_percentage: 0
    });
  });

  it('should compute 70% uptime for seven UP and three GATEWAY_DOWN checks', () => {
    const states: RecordedState[] = [
      ...Array<RecordedState>(7).fill('UP'),
      ...Array<RecordedState>(3).fill('GATEWAY_DOWN')
    ];

    expect(aggregate(recordsFor(states))).toEqual({
      total_checks: 10,
      up_count: 7,
      gateway_down_count: 3,
      internet_down_count: 0,
      uptime_percentage: 70
    });
  });

  it('should round the uptime percentage to one decimal place', () => {
    expect(aggregate(recordsFor(['UP', 'INTERNET_DOWN', 'GATEWAY_DOWN'])).uptime_percentage).toBe(33.3);
    expect(aggregate(recordsFor(['UP', 'UP', 'INTERNET_DOWN'])).uptime_percentage).toBe(66.7);
  });

  it('should only count the records left after eviction', () => {
    const store = new HistoryStore(3);
    recordsFor(['UP', 'UP', 'GATEWAY_DOWN', 'INTERNET_DOWN', 'UP']).forEach(record => store.append(record));

    expect(aggregate(store.snapshot())).toEqual({
      total_checks: 3,
      up_count: 1,
      gateway_down_count: 1,
      internet_down_count: 1,
      uptime_percentage: 33.3
    });
  });
});
