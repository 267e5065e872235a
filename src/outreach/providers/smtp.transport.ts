import { Logger } from '@nestjs/common';
import { createTransport } from 'nodemailer';
import type { Transporter } from 'nodemailer';
import type SMTPTransport from 'nodemailer/lib/smtp-transport';
import { TransientProviderError, errorMessage } from '../../common/errors';
import type { OutreachConfig } from '../../config/configuration';
import type {
  OutgoingMessage,
  SendReceipt,
  SendTransport,
} from '../interfaces/send-transport.interface';

/** The part of a nodemailer transporter used for sending. */
export type MailSender = Pick<Transporter<SMTPTransport.SentMessageInfo>, 'sendMail'>;

const TRANSIENT_CODES = new Set([
  'ECONNECTION',
  'ETIMEDOUT',
  'ESOCKET',
  'EDNS',
  'ECONNRESET',
]);

/**
 * SMTP 4xx replies and connection-level failures are worth retrying;
 * 5xx replies are permanent rejections.
 */
export function isTransientSmtpError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false;
  if ('responseCode' in error && typeof error.responseCode === 'number') {
    return error.responseCode >= 400 && error.responseCode < 500;
  }
  return 'code' in error && typeof error.code === 'string' && TRANSIENT_CODES.has(error.code);
}

export class SmtpTransport implements SendTransport {
  readonly name = 'smtp';
  private readonly logger = new Logger(SmtpTransport.name);

  constructor(
    private readonly transporter: MailSender,
    private readonly from: string,
  ) {}

  static fromConfig(outreach: OutreachConfig): SmtpTransport {
    const { host, port, user, password } = outreach.smtp;
    const transporter = createTransport({
      host,
      port,
      secure: port === 465,
      auth: user ? { user, pass: password } : undefined,
    });
    return new SmtpTransport(
      transporter,
      `${outreach.senderName} <${outreach.senderEmail ?? ''}>`,
    );
  }

  async send(message: OutgoingMessage): Promise<SendReceipt> {
    try {
      const info = await this.transporter.sendMail({
        from: this.from,
        to: message.to,
        subject: message.subject,
        text: message.body,
      });
      return { success: true, messageId: info.messageId };
    } catch (error: unknown) {
      if (isTransientSmtpError(error)) {
        throw new TransientProviderError(this.name, errorMessage(error));
      }
      this.logger.warn(`SMTP rejected message to ${message.to}: ${errorMessage(error)}`);
      return { success: false, error: errorMessage(error) };
    }
  }
}
