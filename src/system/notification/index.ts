/**
 * Notification Module
 *
 * Message templates and the email send capability used by the Send stage and by
 * subscriber administration.
 */

import nodemailer, { SendMailOptions } from 'nodemailer';
import type { MessageSender, OutgoingMessage, SendReceipt } from '../../delivery/types';
import { SendError, toErrorMessage } from '../error-handling';
import { Logger, createModuleLogger } from '../logging/logger';

/**
 * `{{variable}}` template
 */
export class NotificationTemplate {
  private template: string;
  private variables: Map<string, string> = new Map();

  constructor(template: string) {
    this.template = template;
  }

  setVariable(name: string, value: string): this {
    this.variables.set(name, value);
    return this;
  }

  setVariables(variables: Record<string, string>): this {
    for (const [name, value] of Object.entries(variables)) {
      this.variables.set(name, value);
    }
    return this;
  }

  /**
   * Replace every known variable; unknown placeholders are left in place.
   */
  render(): string {
    return this.template.replace(/\{\{(\w+)\}\}/g, (placeholder: string, name: string) => {
      return this.variables.get(name) ?? placeholder;
    });
  }

  static create(template: string): NotificationTemplate {
    return new NotificationTemplate(template);
  }
}

export const MAX_SUBJECT_LENGTH = 200;
export const MAX_BODY_LENGTH = 100_000;

/**
 * Shared validation and error mapping for senders.
 */
export abstract class BaseMessageSender implements MessageSender {
  abstract readonly name: string;

  async send(message: OutgoingMessage, signal?: AbortSignal): Promise<SendReceipt> {
    this.validateMessage(message);

    if (signal?.aborted) {
      throw new SendError(`Send to ${message.to} cancelled before dispatch`, undefined, { channel: this.name });
    }

    try {
      return await this.doSend(message);
    } catch (error) {
      if (error instanceof SendError) {
        throw error;
      }
      throw new SendError(`${this.name} delivery to ${message.to} failed: ${toErrorMessage(error)}`, error, {
        channel: this.name
      });
    }
  }

  abstract healthCheck(): Promise<boolean>;

  protected abstract doSend(message: OutgoingMessage): Promise<SendReceipt>;

  protected validateMessage(message: OutgoingMessage): void {
    if (!message.to.includes('@')) {
      throw new SendError(`Invalid recipient address: ${message.to}`);
    }
    if (!message.subject.trim() || !message.text.trim()) {
      throw new SendError('Message subject and body are required');
    }
    if (message.subject.length > MAX_SUBJECT_LENGTH) {
      throw new SendError(`Message subject too long (max ${MAX_SUBJECT_LENGTH} characters)`);
    }
    if (message.text.length > MAX_BODY_LENGTH) {
      throw new SendError(`Message body too long (max ${MAX_BODY_LENGTH} characters)`);
    }
  }
}

/**
 * The part of a nodemailer transporter the sender uses.
 */
export interface MailTransport {
  sendMail(mail: SendMailOptions): Promise<{ messageId: string }>;
  verify(): Promise<true>;
  close(): void;
}

export interface SmtpSettings {
  host: string;
  port: number;
  secure: boolean;
  user?: string;
  password?: string;
}

export interface EmailSenderOptions {
  from: string;
  smtp?: SmtpSettings;
  /** Ready-made transport; takes precedence over `smtp` */
  transport?: MailTransport;
  logger?: Logger;
}

export class EmailSender extends BaseMessageSender {
  readonly name = 'email';
  private transport: MailTransport;
  private from: string;
  private logger: Logger;

  constructor(options: EmailSenderOptions) {
    super();
    this.from = options.from;
    this.logger = options.logger ?? createModuleLogger('email');

    if (options.transport) {
      this.transport = options.transport;
    } else if (options.smtp) {
      this.transport = createSmtpTransport(options.smtp);
    } else {
      throw new SendError('Email sender needs SMTP settings or a transport');
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.transport.verify();
      return true;
    } catch (error) {
      this.logger.warn('SMTP verification failed', { error: toErrorMessage(error) }, 'healthCheck');
      return false;
    }
  }

  close(): void {
    this.transport.close();
  }

  protected async doSend(message: OutgoingMessage): Promise<SendReceipt> {
    const info = await this.transport.sendMail({
      from: this.from,
      to: message.to,
      subject: message.subject,
      text: message.text,
      html: message.html
    });

    this.logger.debug('Message accepted by transport', { to: message.to, messageId: info.messageId }, 'send');
    return { messageId: info.messageId };
  }
}

export function createSmtpTransport(smtp: SmtpSettings): MailTransport {
  return nodemailer.createTransport({
    host: smtp.host,
    port: smtp.port,
    secure: smtp.secure,
    auth: smtp.user ? { user: smtp.user, pass: smtp.password } : undefined
  });
}
