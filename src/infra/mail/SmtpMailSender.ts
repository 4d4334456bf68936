/**
 * SMTP Mail Sender (nodemailer)
 */
import nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';
import type { IMailSender, MailMessage } from '../../domain/ports/IMailSender.js';

export interface SmtpOptions {
  host: string;
  port: number;
  secure: boolean;
  user?: string;
  password?: string;
}

/**
 * Format "Name <address>" when a display name is given
 */
export function formatAddress(address: string, name?: string): string {
  return name ? `"${name.replace(/"/g, "'")}" <${address}>` : address;
}

export class SmtpMailSender implements IMailSender {
  private readonly transporter: Transporter;

  constructor(options: SmtpOptions) {
    this.transporter = nodemailer.createTransport({
      host: options.host,
      port: options.port,
      secure: options.secure,
      auth: options.user ? { user: options.user, pass: options.password } : undefined,
    });
  }

  async send(message: MailMessage): Promise<void> {
    await this.transporter.sendMail({
      to: formatAddress(message.to, message.toName),
      from: formatAddress(message.from, message.fromName),
      subject: message.subject,
      html: message.html,
    });
  }

  close(): void {
    this.transporter.close();
  }
}
