// Infrastructure: Mail dispatcher
// Out-of-band delivery of verification codes over SMTP (nodemailer)

import nodemailer, { type Transporter } from 'nodemailer';
import type { MailConfig } from '@/utils/config.js';
import { mailLogger } from '@/utils/logger.js';

export interface MailDispatcher {
  sendVerificationCode(recipient: string, code: string): Promise<void>;
}

export interface VerificationMessage {
  subject: string;
  text: string;
  html: string;
}

export function buildVerificationMessage(code: string, ttlHours: number): VerificationMessage {
  return {
    subject: 'Email Verification Code',
    text: [
      'Welcome!',
      '',
      `Your verification code is: ${code}`,
      '',
      `This code will expire in ${ttlHours} hours.`,
      '',
      'If you did not request this code, please ignore this email.',
    ].join('\n'),
    html: [
      '<html>',
      '  <body>',
      '    <h2>Welcome!</h2>',
      `    <p>Your verification code is: <strong>${code}</strong></p>`,
      `    <p>This code will expire in ${ttlHours} hours.</p>`,
      '    <p><em>If you did not request this code, please ignore this email.</em></p>',
      '  </body>',
      '</html>',
    ].join('\n'),
  };
}

export class SmtpMailDispatcher implements MailDispatcher {
  private readonly transporter: Transporter;

  constructor(
    private readonly from: string,
    private readonly ttlHours: number,
    transporter: Transporter
  ) {
    this.transporter = transporter;
  }

  async sendVerificationCode(recipient: string, code: string): Promise<void> {
    const message = buildVerificationMessage(code, this.ttlHours);

    await this.transporter.sendMail({
      from: this.from,
      to: recipient,
      subject: message.subject,
      text: message.text,
      html: message.html,
    });

    mailLogger.info('Verification email sent', { recipient });
  }
}

/**
 * Development fallback when SMTP credentials are missing: the code goes to the log
 */
export class ConsoleMailDispatcher implements MailDispatcher {
  async sendVerificationCode(recipient: string, code: string): Promise<void> {
    mailLogger.info('Verification email (development mode)', { recipient, code });
  }
}

export function createMailDispatcher(config: MailConfig, ttlHours: number): MailDispatcher {
  if (!config.smtpUsername || !config.smtpPassword) {
    mailLogger.warn('SMTP credentials not configured - verification codes will be logged');
    return new ConsoleMailDispatcher();
  }

  const transporter = nodemailer.createTransport({
    host: config.smtpServer,
    port: config.smtpPort,
    secure: config.smtpPort === 465,
    requireTLS: config.smtpPort !== 465,
    auth: {
      user: config.smtpUsername,
      pass: config.smtpPassword,
    },
  });

  return new SmtpMailDispatcher(config.fromEmail, ttlHours, transporter);
}
