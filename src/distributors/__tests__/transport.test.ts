import type { Mock } from 'vitest';
import { RoutingTransport, channelForRecipient, type DistributionMessage } from '../transport';
import { TransportError } from '../../utils/errors';

const MESSAGE: DistributionMessage = {
  subject: 'Digest',
  url: 'https://storage.test/shared/d1.html',
  markdown: '# Digest',
  html: '<h1>Digest</h1>'
};

describe('channelForRecipient', () => {
  it('tells webhooks from addresses', () => {
    expect(channelForRecipient('https://hooks.slack.com/services/T0/B0/x')).toBe('slack');
    expect(channelForRecipient('team@example.com')).toBe('email');
    expect(() => channelForRecipient('team')).toThrow(TransportError);
  });
});

describe('RoutingTransport', () => {
  let slack: Mock<(message: DistributionMessage) => Promise<void>>;
  let email: Mock<(message: DistributionMessage) => Promise<void>>;

  beforeEach(() => {
    slack = vi.fn<(message: DistributionMessage) => Promise<void>>(async () => undefined);
    email = vi.fn<(message: DistributionMessage) => Promise<void>>(async () => undefined);
  });

  it('uses the default channel without a recipient', async () => {
    await new RoutingTransport({ slack: { send: slack }, email: { send: email } }, 'email').send(MESSAGE);

    expect(email).toHaveBeenCalledWith(MESSAGE);
    expect(slack).not.toHaveBeenCalled();
  });

  it('routes by the recipient override', async () => {
    const router = new RoutingTransport({ slack: { send: slack }, email: { send: email } }, 'slack');

    await router.send({ ...MESSAGE, recipient: 'someone@example.org' });

    expect(email).toHaveBeenCalledTimes(1);
    expect(slack).not.toHaveBeenCalled();
  });

  it('fails when the chosen channel is not configured', async () => {
    const router = new RoutingTransport({ slack: { send: slack } }, 'slack');

    await expect(router.send({ ...MESSAGE, recipient: 'someone@example.org' })).rejects.toThrow(
      'No email transport configured'
    );
  });
});
