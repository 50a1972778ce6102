/**
 * Alert texts for connectivity state changes
 */

import { AlertMessage, ProbeTarget, StateTransition } from '../types';
import { formatLocalTimestamp } from '../utils/time';

export interface AlertTargets {
  gateway: ProbeTarget;
  internet: ProbeTarget;
}

export const DEFAULT_ALERT_SUBJECT = 'Network Monitor Alert';

/**
 * Whether a transition is worth an alert. The first check after startup
 * coming back UP is a baseline, not a recovery.
 */
export function shouldNotify(transition: StateTransition): boolean {
  if (transition.previous_state === transition.new_state) {
    return false;
  }
  return !(transition.previous_state === 'UNKNOWN' && transition.new_state === 'UP');
}

export function buildAlertMessage(
  transition: StateTransition,
  targets: AlertTargets,
  subject: string = DEFAULT_ALERT_SUBJECT
): AlertMessage {
  const at = formatLocalTimestamp(transition.timestamp);

  switch (transition.new_state) {
    case 'GATEWAY_DOWN':
      return {
        title: `${subject}: gateway down`,
        message: `[${at}] ALERT: Router/Gateway (${targets.gateway.address}) is DOWN.`,
        severity: 'critical'
      };
    case 'INTERNET_DOWN':
      return {
        title: `${subject}: internet down`,
        message: `[${at}] ALERT: Internet is DOWN (router OK, but cannot reach ${targets.internet.address}).`,
        severity: 'error'
      };
    case 'UP':
      return {
        title: `${subject}: connectivity restored`,
        message: `[${at}] INFO: Connectivity RESTORED (state: UP).`,
        severity: 'info'
      };
  }
}
