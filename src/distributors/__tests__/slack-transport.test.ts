import { SlackWebhookTransport, formatSlackText } from '../slack-transport';
import type { DistributionMessage } from '../transport';
import { TransportError } from '../../utils/errors';

const MESSAGE: DistributionMessage = {
  subject: '[Feed Digest] 2026-10-18',
  url: 'https://storage.test/shared/d1.html',
  markdown: '# Feed Digest',
  html: '<html><body><h1>Feed Digest</h1></body></html>'
};

const RETRY_ONCE = { retries: 1, factor: 1, minTimeout: 0, maxTimeout: 0 };

describe('formatSlackText', () => {
  it('links the shared page above the Markdown preview', () => {
    expect(formatSlackText(MESSAGE)).toBe(
      '*[Feed Digest] 2026-10-18*\n<https://storage.test/shared/d1.html|Read in the browser>\n\n# Feed Digest'
    );
  });

  it('truncates long previews', () => {
    const text = formatSlackText({ ...MESSAGE, markdown: 'x'.repeat(3005) });
    expect(text.endsWith(`${'x'.repeat(3000)}…`)).toBe(true);
  });

  it('never splits a character made of two UTF-16 units', () => {
    const text = formatSlackText({ ...MESSAGE, markdown: `x${'😀'.repeat(3000)}` });
    expect(text.endsWith(`x${'😀'.repeat(2999)}…`)).toBe(true);
  });
});

describe('SlackWebhookTransport', () => {
  it('posts the formatted text to the webhook', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response('ok', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    await new SlackWebhookTransport('https://hooks.test/default', RETRY_ONCE).send(MESSAGE);

    const [target, init] = fetchMock.mock.calls[0];
    expect(target).toBe('https://hooks.test/default');
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({ text: formatSlackText(MESSAGE) });
  });

  it('sends to the recipient when one is given', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response('ok', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    await new SlackWebhookTransport(null, RETRY_ONCE).send({ ...MESSAGE, recipient: 'https://hooks.test/other' });

    expect(fetchMock.mock.calls[0][0]).toBe('https://hooks.test/other');
  });

  it('fails without a destination', async () => {
    await expect(new SlackWebhookTransport(null, RETRY_ONCE).send(MESSAGE)).rejects.toBeInstanceOf(TransportError);
  });

  it('does not retry client errors', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockImplementation(async () => new Response('invalid_payload', { status: 400 }));
    vi.stubGlobal('fetch', fetchMock);

    await expect(new SlackWebhookTransport('https://hooks.test/default', RETRY_ONCE).send(MESSAGE)).rejects.toThrow(
      new TransportError('Slack webhook responded 400')
    );
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('retries server errors before giving up', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockImplementation(async () => new Response('unavailable', { status: 503 }));
    vi.stubGlobal('fetch', fetchMock);

    await expect(new SlackWebhookTransport('https://hooks.test/default', RETRY_ONCE).send(MESSAGE)).rejects.toThrow(
      'Slack webhook responded 503'
    );
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('wraps network failures', async () => {
    vi.stubGlobal('fetch', vi.fn<typeof fetch>().mockRejectedValue(new TypeError('fetch failed')));

    await expect(
      new SlackWebhookTransport('https://hooks.test/default', { ...RETRY_ONCE, retries: 0 }).send(MESSAGE)
    ).rejects.toThrow('Slack webhook failed: fetch failed');
  });
});
