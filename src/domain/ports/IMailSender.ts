/**
 * Outbound mail message
 */
export interface MailMessage {
  to: string;
  toName?: string;
  from: string;
  fromName?: string;
  subject: string;
  html: string;
}

/**
 * Mail Sender Interface
 */
export interface IMailSender {
  send(message: MailMessage): Promise<void>;
  /** Release pooled connections */
  close?(): void;
}
