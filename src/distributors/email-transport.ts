import nodemailer from 'nodemailer';
import type { SendMailOptions } from 'nodemailer';
import type { EmailConfig } from '../config/environment';
import { TransportError, errorMessage } from '../utils/errors';
import { withRetry, AbortError, type RetryPolicy } from '../utils/retry';
import { escapeHtml } from './html-renderer';
import type { DistributionMessage, DistributionTransport } from './transport';

/** The part of a nodemailer transporter the email transport uses */
export interface MailSender {
  sendMail(options: SendMailOptions): Promise<unknown>;
}

export interface EmailTransportOptions {
  from: string;
  /** Default recipients, comma separated */
  to: string | null;
  retry: RetryPolicy;
}

export function createSmtpSender(config: EmailConfig): MailSender {
  return nodemailer.createTransport({
    host: config.host,
    port: config.port,
    secure: config.secure,
    auth: config.user ? { user: config.user, pass: config.password ?? '' } : undefined
  });
}

/**
 * Put a link to the shared page at the top of the rendered digest
 */
export function withShareLink(html: string, url: string): string {
  const link = `<p><a href="${escapeHtml(url)}">Read in the browser</a></p>`;
  return html.includes('<body>') ? html.replace('<body>', () => `<body>\n${link}`) : `${link}\n${html}`;
}

// 5xx SMTP replies are permanent failures
function isPermanentSmtpFailure(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'responseCode' in error &&
    typeof error.responseCode === 'number' &&
    error.responseCode >= 500 &&
    error.responseCode < 600
  );
}

/**
 * Sends the digest as an HTML mail with a plain-text alternative
 */
export class EmailTransport implements DistributionTransport {
  constructor(
    private readonly mailer: MailSender,
    private readonly options: EmailTransportOptions
  ) {}

  async send(message: DistributionMessage): Promise<void> {
    const to = message.recipient ?? this.options.to;
    if (!to) {
      throw new TransportError('No email recipient configured; set EMAIL_TO or pass a recipient');
    }

    const mail: SendMailOptions = {
      from: this.options.from,
      to,
      subject: message.subject,
      html: withShareLink(message.html, message.url),
      text: `${message.markdown.trim()}\n\nRead in the browser: ${message.url}\n`
    };

    try {
      await withRetry(
        async () => {
          try {
            await this.mailer.sendMail(mail);
          } catch (error) {
            if (isPermanentSmtpFailure(error)) {
              throw new AbortError(
                new TransportError(`SMTP server rejected the message: ${errorMessage(error)}`, { cause: error })
              );
            }
            throw error;
          }
        },
        this.options.retry,
        'smtp send'
      );
    } catch (error) {
      if (error instanceof TransportError) throw error;
      throw new TransportError(`Email delivery failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
