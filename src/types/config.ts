/**
 * Configuration interfaces for the network status monitor
 */

import { ConnectivityState } from './results';

export interface ProbeTarget {
  name: string;
  address: string;
}

export interface AlertConfig {
  enabled: boolean;
  webhook_url: string;
  timeout_ms: number;
  subject: string;
}

export interface DashboardConfig {
  host: string;
  port: number;
  recent_limit: number;
}

/**
 * State recorded when the gateway probe fails but the internet probe succeeds
 */
export type AnomalyState = Extract<ConnectivityState, 'GATEWAY_DOWN' | 'UP'>;

export interface NetworkStatusConfig {
  gateway: ProbeTarget;
  internet: ProbeTarget;
  probe_timeout_ms: number;
  check_interval_seconds: number;
  history_capacity: number;
  anomaly_state: AnomalyState;
  log_file: string;
  alerts: AlertConfig;
  dashboard: DashboardConfig;
}
