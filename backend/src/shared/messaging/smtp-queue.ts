/**
 * src/shared/messaging/smtp-queue.ts
 *
 * WHY:
 * - Production Queue transport: renders the message and hands it to an SMTP relay.
 * - Sending happens inline; callers already treat enqueue() as best-effort.
 *
 * HOW TO USE:
 * - const queue = SmtpQueue.fromUrl(config.mail.smtpUrl, { from, chapterName, siteUrl })
 */

import nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';

import type { Queue, QueueMessage } from './queue';
import { renderEmail } from './email-templates';
import type { EmailBranding } from './email-templates';
import { logger } from '../logger/logger';

export type SmtpQueueOptions = EmailBranding & {
  from: string;
};

export class SmtpQueue implements Queue {
  constructor(
    private readonly transporter: Transporter,
    private readonly opts: SmtpQueueOptions,
  ) {}

  static fromUrl(smtpUrl: string, opts: SmtpQueueOptions): SmtpQueue {
    return new SmtpQueue(nodemailer.createTransport(smtpUrl), opts);
  }

  async enqueue(message: QueueMessage): Promise<void> {
    const email = renderEmail(message, this.opts);

    await this.transporter.sendMail({
      from: this.opts.from,
      to: email.to,
      subject: email.subject,
      text: email.text,
    });

    logger.info('mail.sent', { flow: 'mail', type: message.type });
  }

  close(): void {
    this.transporter.close();
  }
}
