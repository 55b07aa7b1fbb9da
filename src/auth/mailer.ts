/**
 * Verification mail delivery over SMTP (nodemailer).
 */

import nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';
import type { SmtpConfig } from '../config.js';
import { AuthError } from '../errors.js';
import { c, log } from '../utils.js';

export interface Mailer {
  /** Resolves once the relay accepted the message; throws `DeliveryError` otherwise. */
  sendVerificationEmail(toAddress: string, verificationLink: string): Promise<void>;
}

export function buildVerificationLink(appUrl: string, token: string): string {
  const url = new URL(`${appUrl.replace(/\/+$/, '')}/verify`);
  url.searchParams.set('token', token);
  return url.toString();
}

function escapeHtml(s: string): string {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export function verificationMessage(link: string): { subject: string; text: string; html: string } {
  return {
    subject: 'Confirm your trainlog account',
    text: [
      'Welcome to trainlog!',
      '',
      'Confirm your email address by opening this link:',
      link,
      '',
      "If you didn't create an account, you can ignore this email.",
    ].join('\n'),
    html: [
      '<p>Welcome to trainlog!</p>',
      `<p>Confirm your email address by opening <a href="${escapeHtml(link)}">this link</a>.</p>`,
      "<p>If you didn't create an account, you can ignore this email.</p>",
    ].join('\n'),
  };
}

export type SmtpMailerOptions =
  | { smtp: SmtpConfig }
  /** Any prebuilt nodemailer transport, e.g. `createTransport({ jsonTransport: true })` */
  | { transport: Transporter; from: string };

export class SmtpMailer implements Mailer {
  private readonly transporter: Transporter;
  private readonly from: string;

  constructor(options: SmtpMailerOptions) {
    if ('smtp' in options) {
      const { smtp } = options;
      this.transporter = nodemailer.createTransport({
        host: smtp.host,
        port: smtp.port,
        secure: smtp.secure,
        auth: smtp.user ? { user: smtp.user, pass: smtp.password ?? '' } : undefined,
      });
      this.from = smtp.from;
    } else {
      this.transporter = options.transport;
      this.from = options.from;
    }
  }

  async sendVerificationEmail(toAddress: string, verificationLink: string): Promise<void> {
    const message = verificationMessage(verificationLink);
    try {
      await this.transporter.sendMail({
        from: this.from,
        to: toAddress,
        subject: message.subject,
        text: message.text,
        html: message.html,
      });
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      log.warn('verification_email_failed', { reason });
      throw new AuthError('DeliveryError', `Verification email delivery failed: ${reason}`, { cause: err });
    }
    log.info('verification_email_sent');
  }
}

/**
 * Development fallback when no SMTP relay is configured: prints the link
 * instead of sending it.
 */
export class ConsoleMailer implements Mailer {
  async sendVerificationEmail(toAddress: string, verificationLink: string): Promise<void> {
    console.log(`${c.yellow}✉${c.reset}  verification email for ${c.bold}${toAddress}${c.reset}: ${verificationLink}`);
  }
}
