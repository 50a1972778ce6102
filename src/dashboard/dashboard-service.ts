/**
 * Read-only queries behind the dashboard and the REST API
 */

import {
  AggregateStats,
  ChartSeries,
  CheckRecord,
  CurrentStatus,
  DashboardData,
  ProbeTarget
} from '../types';
import { HistoryStore } from '../storage/history-store';
import { aggregate } from '../storage/stats-aggregator';
import { buildChartSeries } from '../storage/chart-series';

export const DEFAULT_RECENT_LIMIT = 50;

export interface DashboardServiceConfig {
  targets: {
    gateway: ProbeTarget;
    internet: ProbeTarget;
  };
  recentLimit?: number;
}

/**
 * Every query works on a fresh snapshot of the history; nothing is cached
 * between requests.
 */
export class DashboardService {
  private history: HistoryStore;
  private config: DashboardServiceConfig;

  constructor(history: HistoryStore, config: DashboardServiceConfig) {
    this.history = history;
    this.config = config;
  }

  getRecentLimit(): number {
    return this.config.recentLimit ?? DEFAULT_RECENT_LIMIT;
  }

  getHistoryCapacity(): number {
    return this.history.getCapacity();
  }

  getCurrentStatus(): CurrentStatus {
    const latest = this.history.latest();
    return {
      current_state: latest ? latest.state : 'UNKNOWN',
      last_check: latest ?? null
    };
  }

  getStats(): AggregateStats {
    return aggregate(this.history.snapshot());
  }

  /**
   * Newest-first records for tabular display
   */
  getRecentChecks(limit: number = this.getRecentLimit()): CheckRecord[] {
    return [...this.history.recent(limit)];
  }

  getChartSeries(): ChartSeries {
    return buildChartSeries(this.history.snapshot());
  }

  /**
   * Everything the dashboard page renders, derived from one snapshot
   */
  getDashboardData(): DashboardData {
    const snapshot = this.history.snapshot();
    const latest = snapshot[snapshot.length - 1];

    return {
      current_state: latest ? latest.state : 'UNKNOWN',
      last_check: latest ?? null,
      stats: aggregate(snapshot),
      recent_checks: snapshot.slice(-this.getRecentLimit()).reverse(),
      chart: buildChartSeries(snapshot),
      targets: {
        gateway: { ...this.config.targets.gateway },
        internet: { ...this.config.targets.internet }
      },
      history_capacity: this.history.getCapacity(),
      last_updated: new Date()
    };
  }
}
