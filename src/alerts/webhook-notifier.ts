/**
 * Webhook delivery of connectivity alerts
 */

import axios from 'axios';
import { AlertNotifier, AlertSeverity, StateTransition } from '../types';
import { ErrorCategory, ErrorSeverity, NetworkMonitoringError } from '../error-handling';
import { Logger } from '../utils/logger';
import { AlertTargets, buildAlertMessage, DEFAULT_ALERT_SUBJECT } from './alert-messages';

export interface WebhookNotifierConfig {
  url: string;
  timeoutMs: number;
  subject?: string;
  targets: AlertTargets;
}

/**
 * The part of an axios instance the notifier uses
 */
export interface WebhookClient {
  post(url: string, data: unknown): Promise<unknown>;
}

export interface WebhookPayload {
  title: string;
  message: string;
  severity: AlertSeverity;
  previous_state: string;
  new_state: string;
  timestamp: string;
}

/**
 * Posts a JSON payload for each transition to a configured URL
 */
export class WebhookNotifier implements AlertNotifier {
  private client: WebhookClient;
  private config: WebhookNotifierConfig;
  private logger: Logger;

  constructor(config: WebhookNotifierConfig, client?: WebhookClient) {
    this.config = config;
    this.logger = new Logger('WebhookNotifier');
    this.client = client ?? axios.create({
      headers: {
        'Content-Type': 'application/json'
      },
      timeout: config.timeoutMs
    });
  }

  async notify(transition: StateTransition): Promise<void> {
    const payload = this.formatPayload(transition);

    try {
      await this.client.post(this.config.url, payload);
    } catch (error) {
      throw new NetworkMonitoringError(
        `Webhook delivery failed: ${error instanceof Error ? error.message : String(error)}`,
        ErrorCategory.NOTIFICATION_FAILURE,
        ErrorSeverity.MEDIUM,
        'AlertNotifier',
        this.redactedUrl(),
        { previous_state: transition.previous_state, new_state: transition.new_state }
      );
    }

    this.logger.info(`Alert sent for ${transition.previous_state} -> ${transition.new_state}`);
  }

  formatPayload(transition: StateTransition): WebhookPayload {
    const alert = buildAlertMessage(transition, this.config.targets, this.config.subject ?? DEFAULT_ALERT_SUBJECT);

    return {
      title: alert.title,
      message: alert.message,
      severity: alert.severity,
      previous_state: transition.previous_state,
      new_state: transition.new_state,
      timestamp: transition.timestamp.toISOString()
    };
  }

  /**
   * Origin only; webhook paths and query strings often carry tokens
   */
  private redactedUrl(): string {
    try {
      return new URL(this.config.url).origin;
    } catch {
      return 'invalid-url';
    }
  }
}
