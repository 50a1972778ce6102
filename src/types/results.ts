/**
 * Probe results and check records
 */

export const CONNECTIVITY_STATES = ['UP', 'GATEWAY_DOWN', 'INTERNET_DOWN', 'UNKNOWN'] as const;

export type ConnectivityState = typeof CONNECTIVITY_STATES[number];

/**
 * States a check record can carry; UNKNOWN only describes "no check yet"
 */
export type RecordedState = Exclude<ConnectivityState, 'UNKNOWN'>;

export interface ProbeResult {
  reachable: boolean;
  latency_ms: number | null;
  error_message?: string;
}

export interface CheckRecord {
  readonly timestamp: Date;
  readonly gateway_reachable: boolean;
  readonly internet_reachable: boolean;
  readonly gateway_latency_ms: number | null;
  readonly internet_latency_ms: number | null;
  readonly state: RecordedState;
}

export interface StateTransition {
  previous_state: ConnectivityState;
  new_state: RecordedState;
  timestamp: Date;
}
