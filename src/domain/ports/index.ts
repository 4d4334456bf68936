export type { INotifier, RequestMetadata } from './INotifier.js';
export type { ITemplateRenderer } from './ITemplateRenderer.js';
export type { IMailSender, MailMessage } from './IMailSender.js';
