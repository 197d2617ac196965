import { TransportError } from '../utils/errors';

export type DistributionChannel = 'slack' | 'email';

export const DISTRIBUTION_CHANNELS: readonly DistributionChannel[] = ['slack', 'email'];

export interface DistributionMessage {
  subject: string;
  /** Signed link to the shared HTML page */
  url: string;
  markdown: string;
  /** The rendered page stored behind `url` */
  html: string;
  /** Overrides the transport's default destination */
  recipient?: string;
}

export interface DistributionTransport {
  send(message: DistributionMessage): Promise<void>;
}

/**
 * A webhook URL goes to Slack, an address to email
 */
export function channelForRecipient(recipient: string): DistributionChannel {
  if (/^https?:\/\//i.test(recipient)) return 'slack';
  if (recipient.includes('@')) return 'email';
  throw new TransportError(`Recipient "${recipient}" is neither a webhook URL nor an email address`);
}

/**
 * Picks the channel from the recipient override, else the configured default
 */
export class RoutingTransport implements DistributionTransport {
  constructor(
    private readonly transports: Partial<Record<DistributionChannel, DistributionTransport>>,
    private readonly defaultChannel: DistributionChannel
  ) {}

  async send(message: DistributionMessage): Promise<void> {
    const channel = message.recipient ? channelForRecipient(message.recipient) : this.defaultChannel;
    const transport = this.transports[channel];
    if (!transport) {
      throw new TransportError(`No ${channel} transport configured`);
    }
    await transport.send(message);
  }
}
