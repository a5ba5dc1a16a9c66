import nodemailer from 'nodemailer';
import { type Mailer } from '@bookwell/domain';
import { type MailConfig } from './config';
import { type SafeLogger } from './logger';

export interface MailMessage {
  from: string;
  to: string;
  subject: string;
  text: string;
}

/** The slice of a nodemailer transporter the mailer uses. */
export interface MailTransport {
  sendMail(message: MailMessage): Promise<unknown>;
}

export function verificationMessage(from: string, to: string, code: string, ttlMinutes: number): MailMessage {
  return {
    from,
    to,
    subject: 'Your Bookwell verification code',
    text: [
      `Your verification code is ${code}.`,
      '',
      `It expires in ${ttlMinutes} minutes. If you did not create a Bookwell account, ignore this email.`,
    ].join('\n'),
  };
}

export class SmtpMailer implements Mailer {
  constructor(
    private readonly transport: MailTransport,
    private readonly from: string,
    private readonly codeTtlMinutes: number,
  ) {}

  async sendVerificationCode(email: string, code: string): Promise<void> {
    await this.transport.sendMail(verificationMessage(this.from, email, code, this.codeTtlMinutes));
  }
}

/** Development mailer. The code itself is only logged when `logCodes` is set. */
export class ConsoleMailer implements Mailer {
  constructor(
    private readonly logger: SafeLogger,
    private readonly logCodes = false,
  ) {}

  async sendVerificationCode(email: string, code: string): Promise<void> {
    this.logger.info(
      this.logCodes ? { email, devCode: code } : { email },
      'Verification code sent',
    );
  }
}

export function createMailer(config: MailConfig, logger: SafeLogger, codeTtlMinutes: number): Mailer {
  if (config.MAILER === 'console') {
    return new ConsoleMailer(logger, config.MAILER_LOG_CODES);
  }
  const transport = nodemailer.createTransport({
    host: config.SMTP_HOST,
    port: config.SMTP_PORT,
    secure: config.SMTP_SECURE,
    auth:
      config.SMTP_USER && config.SMTP_PASSWORD
        ? { user: config.SMTP_USER, pass: config.SMTP_PASSWORD }
        : undefined,
  });
  return new SmtpMailer(transport, config.MAIL_FROM, codeTtlMinutes);
}
