/**
 * Connectivity state classification
 */

import { AnomalyState, RecordedState } from '../types';

export interface ClassifyOptions {
  /**
   * State used when the gateway does not answer but the internet host does.
   * Defaults to GATEWAY_DOWN: a silent gateway is the more actionable signal.
   */
  anomalyState?: AnomalyState;
}

/**
 * Map the reachability of the gateway and the internet host to a connectivity
 * state. Total over all four combinations; never returns UNKNOWN.
 */
export function classify(
  gatewayReachable: boolean,
  internetReachable: boolean,
  options: ClassifyOptions = {}
): RecordedState {
  if (gatewayReachable) {
    return internetReachable ? 'UP' : 'INTERNET_DOWN';
  }
  if (internetReachable) {
    return options.anomalyState ?? 'GATEWAY_DOWN';
  }
  return 'GATEWAY_DOWN';
}
