/**
 * Notification Module
 *
 * Outbound email behind an adapter interface; SMTP delivery uses nodemailer.
 */

import nodemailer, { SendMailOptions } from 'nodemailer';
import { MailConfig } from '../../config/config-types';

export interface NotificationMessage {
  recipient: string;
  title: string;
  content: string;
}

export interface NotificationResult {
  success: boolean;
  channel: string;
  messageId?: string;
  error?: string;
  timestamp: Date;
}

export interface NotificationAdapter {
  name: string;
  send(message: NotificationMessage): Promise<NotificationResult>;
  isAvailable(): Promise<boolean>;
}

/**
 * The part of a nodemailer transporter the email adapter uses
 */
export interface MailTransport {
  sendMail(options: SendMailOptions): Promise<{ messageId?: string }>;
}

/**
 * Base notification adapter; failures become unsuccessful results
 */
export abstract class BaseNotificationAdapter implements NotificationAdapter {
  abstract name: string;

  async send(message: NotificationMessage): Promise<NotificationResult> {
    try {
      this.validateMessage(message);

      const result = await this.doSend(message);

      return {
        success: true,
        channel: this.name,
        messageId: result.messageId,
        timestamp: new Date()
      };
    } catch (error) {
      return {
        success: false,
        channel: this.name,
        error: error instanceof Error ? error.message : 'Unknown error',
        timestamp: new Date()
      };
    }
  }

  abstract isAvailable(): Promise<boolean>;

  protected abstract doSend(message: NotificationMessage): Promise<{ messageId?: string }>;

  protected validateMessage(message: NotificationMessage): void {
    if (!message.recipient) {
      throw new Error('Notification recipient is required');
    }

    if (!message.title || !message.content) {
      throw new Error('Notification title and content are required');
    }

    if (message.title.length > 200) {
      throw new Error('Notification title too long (max 200 characters)');
    }

    if (message.content.length > 5000) {
      throw new Error('Notification content too long (max 5000 characters)');
    }
  }
}

/**
 * Email adapter over SMTP
 */
export class EmailNotificationAdapter extends BaseNotificationAdapter {
  name = 'email';
  private readonly transport: MailTransport | null;

  constructor(private readonly mailConfig: MailConfig, transport?: MailTransport) {
    super();
    this.transport = transport ?? EmailNotificationAdapter.createTransport(mailConfig);
  }

  /**
   * SMTP transport, or null when host or credentials are missing
   */
  static createTransport(config: MailConfig): MailTransport | null {
    if (!config.smtpHost || !config.smtpUser || !config.smtpPass) {
      return null;
    }

    return nodemailer.createTransport({
      host: config.smtpHost,
      port: config.smtpPort,
      secure: config.smtpPort === 465,
      auth: {
        user: config.smtpUser,
        pass: config.smtpPass
      }
    });
  }

  async isAvailable(): Promise<boolean> {
    return this.transport !== null;
  }

  protected async doSend(message: NotificationMessage): Promise<{ messageId?: string }> {
    if (!this.transport) {
      throw new Error('SMTP is not configured');
    }

    const info = await this.transport.sendMail({
      from: this.mailConfig.fromEmail || this.mailConfig.smtpUser,
      to: message.recipient,
      subject: message.title,
      text: message.content
    });

    return { messageId: info.messageId };
  }
}
