/**
 * Email collaborator
 * Sends the proposal to a lead that agreed to receive it
 */

import * as crypto from 'crypto';
import { SESv2Client, SendEmailCommand } from '@aws-sdk/client-sesv2';
import { EmailConfig } from '../config/types';
import { logger } from '../lib/logger';

export interface EmailMessage {
  to: string;
  subject: string;
  body: string;
}

export interface EmailReceipt {
  messageId: string;
}

export interface EmailSender {
  send(message: EmailMessage): Promise<EmailReceipt>;
}

// Records the message instead of delivering it
export class LogEmailSender implements EmailSender {
  readonly sent: EmailMessage[] = [];

  async send(message: EmailMessage): Promise<EmailReceipt> {
    this.sent.push(message);
    const messageId = `log_${crypto.randomBytes(6).toString('hex')}`;
    logger.info('Email recorded (log provider)', { to: message.to, subject: message.subject, messageId });
    return { messageId };
  }
}

export class SesEmailSender implements EmailSender {
  private readonly ses: SESv2Client;

  constructor(
    private readonly config: EmailConfig,
    ses?: SESv2Client
  ) {
    this.ses = ses ?? new SESv2Client({ region: config.region });
  }

  async send(message: EmailMessage): Promise<EmailReceipt> {
    if (!this.config.fromAddress) {
      throw new Error('email.fromAddress is not configured');
    }

    const result = await this.ses.send(
      new SendEmailCommand({
        FromEmailAddress: this.config.fromAddress,
        Destination: { ToAddresses: [message.to] },
        Content: {
          Simple: {
            Subject: { Data: message.subject, Charset: 'UTF-8' },
            Body: { Text: { Data: message.body, Charset: 'UTF-8' } },
          },
        },
      })
    );

    return { messageId: result.MessageId ?? '' };
  }
}

export function createEmailSender(config: EmailConfig): EmailSender {
  return config.provider === 'ses' ? new SesEmailSender(config) : new LogEmailSender();
}
