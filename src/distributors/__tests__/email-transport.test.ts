import type { Mock } from 'vitest';
import type { SendMailOptions } from 'nodemailer';
import { EmailTransport, withShareLink } from '../email-transport';
import type { DistributionMessage } from '../transport';
import { TransportError } from '../../utils/errors';

const MESSAGE: DistributionMessage = {
  subject: '[Feed Digest] 2026-10-18',
  url: 'https://storage.test/shared/d1.html?token=a&b=1',
  markdown: '# Feed Digest\n',
  html: '<!DOCTYPE html>\n<html>\n<body>\n<h1>Feed Digest</h1>\n</body>\n</html>\n'
};

const RETRY_ONCE = { retries: 1, factor: 1, minTimeout: 0, maxTimeout: 0 };

function smtpError(message: string, responseCode: number): Error {
  return Object.assign(new Error(message), { responseCode });
}

describe('withShareLink', () => {
  it('adds the escaped link at the top of the body', () => {
    expect(withShareLink(MESSAGE.html, MESSAGE.url)).toBe(
      '<!DOCTYPE html>\n<html>\n<body>\n' +
        '<p><a href="https://storage.test/shared/d1.html?token=a&amp;b=1">Read in the browser</a></p>\n' +
        '<h1>Feed Digest</h1>\n</body>\n</html>\n'
    );
  });

  it('prepends the link to a fragment', () => {
    expect(withShareLink('<h1>x</h1>', 'https://s.test/$&')).toBe(
      '<p><a href="https://s.test/$&amp;">Read in the browser</a></p>\n<h1>x</h1>'
    );
  });
});

describe('EmailTransport', () => {
  let sendMail: Mock<(options: SendMailOptions) => Promise<unknown>>;

  beforeEach(() => {
    sendMail = vi.fn<(options: SendMailOptions) => Promise<unknown>>(async () => ({ messageId: 'm1' }));
  });

  const transport = (to: string | null = 'team@example.com') =>
    new EmailTransport({ sendMail }, { from: 'digest@example.com', to, retry: RETRY_ONCE });

  it('sends the rendered page and a text alternative', async () => {
    await transport().send(MESSAGE);

    expect(sendMail).toHaveBeenCalledWith({
      from: 'digest@example.com',
      to: 'team@example.com',
      subject: '[Feed Digest] 2026-10-18',
      html: withShareLink(MESSAGE.html, MESSAGE.url),
      text: '# Feed Digest\n\nRead in the browser: https://storage.test/shared/d1.html?token=a&b=1\n'
    });
  });

  it('sends to the recipient when one is given', async () => {
    await transport().send({ ...MESSAGE, recipient: 'someone@example.org' });
    expect(sendMail.mock.calls[0][0].to).toBe('someone@example.org');
  });

  it('fails without a recipient', async () => {
    await expect(transport(null).send(MESSAGE)).rejects.toThrow(
      'No email recipient configured; set EMAIL_TO or pass a recipient'
    );
    expect(sendMail).not.toHaveBeenCalled();
  });

  it('retries temporary SMTP failures', async () => {
    sendMail.mockRejectedValueOnce(smtpError('try again later', 421));

    await transport().send(MESSAGE);

    expect(sendMail).toHaveBeenCalledTimes(2);
  });

  it('does not retry a permanent rejection', async () => {
    sendMail.mockRejectedValue(smtpError('mailbox unavailable', 550));

    await expect(transport().send(MESSAGE)).rejects.toThrow(
      new TransportError('SMTP server rejected the message: mailbox unavailable')
    );
    expect(sendMail).toHaveBeenCalledTimes(1);
  });

  it('wraps connection failures', async () => {
    sendMail.mockRejectedValue(new Error('connect ECONNREFUSED'));

    await expect(transport().send(MESSAGE)).rejects.toThrow('Email delivery failed: connect ECONNREFUSED');
    expect(sendMail).toHaveBeenCalledTimes(2);
  });
});
