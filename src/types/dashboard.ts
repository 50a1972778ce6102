/**
 * Dashboard and API interfaces
 */

import { CheckRecord, ConnectivityState } from './results';
import { ProbeTarget } from './config';

export interface AggregateStats {
  total_checks: number;
  up_count: number;
  gateway_down_count: number;
  internet_down_count: number;
  uptime_percentage: number;
}

export interface ChartSeries {
  labels: string[];
  gateway_latency: Array<number | null>;
  internet_latency: Array<number | null>;
}

export interface CurrentStatus {
  current_state: ConnectivityState;
  last_check: CheckRecord | null;
}

export interface DashboardData extends CurrentStatus {
  stats: AggregateStats;
  recent_checks: CheckRecord[];
  chart: ChartSeries;
  targets: {
    gateway: ProbeTarget;
    internet: ProbeTarget;
  };
  history_capacity: number;
  last_updated: Date;
}

export interface APIResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  timestamp: Date;
}
