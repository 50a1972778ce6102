/**
 * Tests for WebhookNotifier
 */

import { WebhookNotifier } from './webhook-notifier';
import { ErrorCategory, NetworkMonitoringError } from '../error-handling';
import { StateTransition } from '../types';
import { TARGETS } from '../test-support/fixtures';

const transition: StateTransition = {
  previous_state: 'UP',
  new_state: 'INTERNET_DOWN',
  timestamp: new Date(2026, 9, 18, 9, 15, 0)
};

function createClient() {
  const post = jest.fn<Promise<unknown>, [string, unknown]>();
  return { post };
}

describe('WebhookNotifier', () => {
  const url = 'https://hooks.example.test/notify/test-token';

  it('should post the alert payload to the configured URL', async () => {
    const client = createClient();
    client.post.mockResolvedValue({ status: 200, data: {} });
    const notifier = new WebhookNotifier({ url, timeoutMs: 5000, targets: TARGETS }, client);

    await notifier.notify(transition);

    expect(client.post).toHaveBeenCalledWith(url, {
      title: 'Network Monitor Alert: internet down',
      message: '[2026-10-18 09:15:00] ALERT: Internet is DOWN (router OK, but cannot reach 8.8.8.8).',
      severity: 'error',
      previous_state: 'UP',
      new_state: 'INTERNET_DOWN',
      timestamp: transition.timestamp.toISOString()
    });
  });

  it('should use the configured subject in the title', () => {
    const notifier = new WebhookNotifier({ url, timeoutMs: 5000, subject: 'Office', targets: TARGETS }, createClient());

    expect(notifier.formatPayload(transition).title).toBe('Office: internet down');
  });

  it('should raise a notification failure without leaking the URL path', async () => {
    const client = createClient();
    client.post.mockRejectedValue(new Error('connect ECONNREFUSED'));
    const notifier = new WebhookNotifier({ url, timeoutMs: 5000, targets: TARGETS }, client);

    const error: unknown = await notifier.notify(transition).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(NetworkMonitoringError);
    if (error instanceof NetworkMonitoringError) {
      expect(error.category).toBe(ErrorCategory.NOTIFICATION_FAILURE);
      expect(error.component).toBe('AlertNotifier');
      expect(error.target).toBe('https://hooks.example.test');
      expect(error.message).toBe('Webhook delivery failed: connect ECONNREFUSED');
    }
  });
});
