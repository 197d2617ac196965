import { TransportError, errorMessage } from '../utils/errors';
import { withRetry, AbortError, type RetryPolicy } from '../utils/retry';
import type { DistributionMessage, DistributionTransport } from './transport';

// Preview length in code points; the full digest is behind the link
const MAX_PREVIEW_CHARS = 3000;

export function formatSlackText(message: DistributionMessage): string {
  const chars = Array.from(message.markdown);
  const preview =
    chars.length > MAX_PREVIEW_CHARS ? `${chars.slice(0, MAX_PREVIEW_CHARS).join('')}…` : message.markdown;
  return `*${message.subject}*\n<${message.url}|Read in the browser>\n\n${preview}`;
}

/**
 * Posts the digest to a Slack incoming webhook
 */
export class SlackWebhookTransport implements DistributionTransport {
  constructor(
    private readonly webhookUrl: string | null,
    private readonly retry: RetryPolicy
  ) {}

  async send(message: DistributionMessage): Promise<void> {
    const target = message.recipient ?? this.webhookUrl;
    if (!target) {
      throw new TransportError('No Slack webhook configured; set SLACK_WEBHOOK_URL or pass a recipient');
    }

    try {
      await withRetry(
        async () => {
          const response = await fetch(target, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify({ text: formatSlackText(message) })
          });
          if (!response.ok) {
            const error = new TransportError(`Slack webhook responded ${response.status}`);
            // Client errors will not improve on retry
            if (response.status >= 400 && response.status < 500) throw new AbortError(error);
            throw error;
          }
        },
        this.retry,
        'slack webhook'
      );
    } catch (error) {
      if (error instanceof TransportError) throw error;
      throw new TransportError(`Slack webhook failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
