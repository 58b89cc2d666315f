/**
 * src/shared/messaging/inmem-queue.ts
 *
 * WHY:
 * - Tests inspect what the services enqueued without real email infrastructure.
 * - Local dev without SMTP_URL: messages are kept (and logged) instead of sent.
 *
 * RULES:
 * - drain() is the test contract; production code never calls it.
 */

import type { Queue, QueueMessage } from './queue';

export class InMemQueue implements Queue {
  private readonly messages: QueueMessage[] = [];

  enqueue(message: QueueMessage): Promise<void> {
    this.messages.push(message);
    return Promise.resolve();
  }

  /** Returns all enqueued messages and clears the queue. */
  drain(): QueueMessage[] {
    return this.messages.splice(0, this.messages.length);
  }
}
