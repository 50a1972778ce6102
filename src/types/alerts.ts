/**
 * Alert and notification interfaces
 */

import { StateTransition } from './results';

export type AlertSeverity = 'info' | 'warning' | 'error' | 'critical';

export interface AlertMessage {
  title: string;
  message: string;
  severity: AlertSeverity;
}

/**
 * Delivery side of state-change alerts. Implementations reject on transport
 * failure; the caller decides what a failure means.
 */
export interface AlertNotifier {
  notify(transition: StateTransition): Promise<void>;
}
