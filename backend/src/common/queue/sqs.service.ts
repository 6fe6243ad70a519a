import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  SQSClient,
  SQSClientConfig,
  SendMessageCommand,
  GetQueueAttributesCommand,
  MessageAttributeValue,
} from '@aws-sdk/client-sqs';

export interface QueueSettings {
  visibilityTimeoutSeconds?: number;
  /** maxReceiveCount from the redrive policy, when one is attached. */
  maxReceiveCount?: number;
  deadLetterTargetArn?: string;
}

@Injectable()
export class SqsService {
  private readonly client: SQSClient;
  private readonly requestQueueUrl: string | undefined;

  constructor(private readonly configService: ConfigService) {
    const endpoint = this.configService.get<string>('SQS_ENDPOINT');
    const clientConfig: SQSClientConfig = {
      region: this.configService.get<string>('AWS_REGION', 'us-east-1'),
      ...(endpoint ? { endpoint } : {}),
    };

    this.client = new SQSClient(clientConfig);
    this.requestQueueUrl = this.configService.get<string>('REQUEST_QUEUE_URL');
  }

  getRequestQueueUrl(): string {
    const url = this.requestQueueUrl?.trim();
    if (!url) {
      throw new Error('REQUEST_QUEUE_URL environment variable is required');
    }
    return url;
  }

  /** Sends one JSON message to the request queue and returns its message id. */
  async sendJson(body: unknown, attributes: Record<string, string> = {}): Promise<string | undefined> {
    const messageAttributes: Record<string, MessageAttributeValue> = {};
    for (const [name, value] of Object.entries(attributes)) {
      messageAttributes[name] = { DataType: 'String', StringValue: value };
    }

    const result = await this.client.send(
      new SendMessageCommand({
        QueueUrl: this.getRequestQueueUrl(),
        MessageBody: JSON.stringify(body),
        ...(Object.keys(messageAttributes).length > 0 && { MessageAttributes: messageAttributes }),
      }),
    );
    return result.MessageId;
  }

  /** Reads the request queue's delivery settings (visibility timeout, redrive policy). */
  async getQueueSettings(): Promise<QueueSettings> {
    const result = await this.client.send(
      new GetQueueAttributesCommand({
        QueueUrl: this.getRequestQueueUrl(),
        AttributeNames: ['VisibilityTimeout', 'RedrivePolicy'],
      }),
    );

    const attributes = result.Attributes ?? {};
    const settings: QueueSettings = {};

    if (attributes.VisibilityTimeout !== undefined) {
      settings.visibilityTimeoutSeconds = Number(attributes.VisibilityTimeout);
    }

    if (attributes.RedrivePolicy) {
      const policy: unknown = JSON.parse(attributes.RedrivePolicy);
      if (typeof policy === 'object' && policy !== null) {
        const maxReceiveCount: unknown = Reflect.get(policy, 'maxReceiveCount');
        const target: unknown = Reflect.get(policy, 'deadLetterTargetArn');
        if (maxReceiveCount !== undefined) settings.maxReceiveCount = Number(maxReceiveCount);
        if (typeof target === 'string') settings.deadLetterTargetArn = target;
      }
    }

    return settings;
  }
}
