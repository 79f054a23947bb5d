/**
 * Queue contract used by the poller and processor, and its SQS implementation.
 */

import {
  ChangeMessageVisibilityCommand,
  DeleteMessageCommand,
  ReceiveMessageCommand,
  SQSClient,
} from '@aws-sdk/client-sqs';

import { logger as rootLogger, type Log } from '../utils/logger';

// =============================================================================
// TYPES
// =============================================================================

export interface QueueMessage {
  messageId: string;
  /** Opaque handle needed to delete or extend this delivery */
  receiptHandle: string;
  body: string;
  /** How many times the queue has delivered this message */
  receiveCount: number;
}

export interface QueueAdapter {
  receive(maxMessages: number): Promise<QueueMessage[]>;
  delete(message: QueueMessage): Promise<void>;
  extendVisibility(message: QueueMessage, visibilityTimeoutSeconds: number): Promise<void>;
}

export interface SqsQueueConfig {
  queueUrl: string;
  region: string;
  endpoint?: string | null;
  waitTimeSeconds: number;
  visibilityTimeoutSeconds: number;
}

// =============================================================================
// SQS ADAPTER
// =============================================================================

export class SqsQueueAdapter implements QueueAdapter {
  private readonly client: SQSClient;
  private readonly log: Log;

  constructor(
    private readonly config: SqsQueueConfig,
    log: Log = rootLogger,
    client?: SQSClient
  ) {
    this.client =
      client ??
      new SQSClient({
        region: config.region,
        ...(config.endpoint ? { endpoint: config.endpoint } : {}),
      });
    this.log = log.child({ component: 'sqs' });
  }

  async receive(maxMessages: number): Promise<QueueMessage[]> {
    const response = await this.client.send(
      new ReceiveMessageCommand({
        QueueUrl: this.config.queueUrl,
        MaxNumberOfMessages: Math.min(Math.max(maxMessages, 1), 10),
        WaitTimeSeconds: this.config.waitTimeSeconds,
        VisibilityTimeout: this.config.visibilityTimeoutSeconds,
        MessageSystemAttributeNames: ['ApproximateReceiveCount'],
      })
    );

    const messages: QueueMessage[] = [];
    for (const message of response.Messages ?? []) {
      if (!message.MessageId || !message.ReceiptHandle) {
        this.log.warn('Dropping queue message without id or receipt handle');
        continue;
      }
      messages.push({
        messageId: message.MessageId,
        receiptHandle: message.ReceiptHandle,
        body: message.Body ?? '',
        receiveCount: Number(message.Attributes?.ApproximateReceiveCount ?? '1'),
      });
    }
    return messages;
  }

  async delete(message: QueueMessage): Promise<void> {
    await this.client.send(
      new DeleteMessageCommand({
        QueueUrl: this.config.queueUrl,
        ReceiptHandle: message.receiptHandle,
      })
    );
  }

  async extendVisibility(message: QueueMessage, visibilityTimeoutSeconds: number): Promise<void> {
    await this.client.send(
      new ChangeMessageVisibilityCommand({
        QueueUrl: this.config.queueUrl,
        ReceiptHandle: message.receiptHandle,
        VisibilityTimeout: visibilityTimeoutSeconds,
      })
    );
  }

  destroy(): void {
    this.client.destroy();
  }
}
