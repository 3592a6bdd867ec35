import nodemailer from 'nodemailer';
import type { AppConfig, SenderProfile } from '../lib/config.js';
import defaultLogger, { type Logger } from '../lib/logger.js';
import { errorMessage, failure, success, type Outcome } from '../lib/outcome.js';
import { withRetry } from '../lib/retry.js';
import type { Sleep } from '../lib/timing.js';

export interface OutgoingMail {
  to: string;
  subject: string;
  text: string;
}

export interface MailTransport {
  send(mail: OutgoingMail): Promise<Outcome<{ messageId: string }>>;
  close(): void;
}

/** The slice of a nodemailer transporter the SMTP transport uses. */
export interface MailSender {
  sendMail(mail: { from: string; to: string; subject: string; text: string }): Promise<{ messageId?: string }>;
  close(): void;
}

export interface SmtpTransportOptions {
  smtp: AppConfig['smtp'];
  sender: SenderProfile;
  /** Pre-built sender; a pooled STARTTLS transporter is created when omitted. */
  mailer?: MailSender;
  sleep?: Sleep;
  logger?: Logger;
}

export function createSmtpMailer(smtp: AppConfig['smtp']): MailSender {
  return nodemailer.createTransport({
    host: smtp.host,
    port: smtp.port,
    secure: smtp.port === 465,
    requireTLS: smtp.port !== 465,
    pool: true,
    maxConnections: 1,
    auth: { user: smtp.user, pass: smtp.password },
  });
}

export class SmtpMailTransport implements MailTransport {
  private readonly mailer: MailSender;
  private readonly from: string;
  private readonly log: Logger;

  constructor(private readonly options: SmtpTransportOptions) {
    this.mailer = options.mailer ?? createSmtpMailer(options.smtp);
    this.from = `"${options.sender.name.replace(/"/g, '')}" <${options.sender.email}>`;
    this.log = options.logger ?? defaultLogger;
  }

  async send(mail: OutgoingMail): Promise<Outcome<{ messageId: string }>> {
    try {
      const info = await withRetry(
        () => this.mailer.sendMail({ from: this.from, to: mail.to, subject: mail.subject, text: mail.text }),
        {
          maxAttempts: this.options.smtp.maxAttempts,
          baseDelay: 2000,
          sleep: this.options.sleep,
          onRetry: (attempt, error) =>
            this.log.warn({ recipient: mail.to, attempt, error: error.message }, 'Transient SMTP failure, retrying'),
        },
      );
      return success({ messageId: info.messageId ?? '' });
    } catch (err) {
      return failure({ kind: 'rejected', message: errorMessage(err) });
    }
  }

  close(): void {
    this.mailer.close();
  }
}
