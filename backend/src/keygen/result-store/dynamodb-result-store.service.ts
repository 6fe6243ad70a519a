import { Injectable, Logger } from '@nestjs/common';
import { DynamoDBService } from '../../common/dynamodb/dynamodb.service';
import { isConditionalCheckFailure } from '../../common/utils/errors';
import { JobStatus } from '../job-status';
import { ResultRecord, SubmittedRecord, isExpired, parseResultRecord } from './result-record';
import { ClaimOutcome, ClaimRequest, CompleteRequest, FailRequest, ResultStore } from './result-store';

/**
 * Result Store on a DynamoDB table keyed by `request_id` with TTL on
 * `expires_at`. Conditional writes carry the state machine; DynamoDB TTL
 * deletes lazily, so reads also hide records past `expires_at`.
 */
@Injectable()
export class DynamoDBResultStore extends ResultStore {
  private readonly logger = new Logger(DynamoDBResultStore.name);

  constructor(private readonly dynamoDb: DynamoDBService) {
    super();
  }

  async create(record: SubmittedRecord): Promise<boolean> {
    return this.conditional(() =>
      this.dynamoDb.put('results', {
        Item: { ...record },
        ConditionExpression: 'attribute_not_exists(request_id)',
      }),
    );
  }

  async get(requestId: string): Promise<ResultRecord | null> {
    const result = await this.dynamoDb.get('results', {
      Key: { request_id: requestId },
      ConsistentRead: true,
    });

    if (!result.Item) {
      return null;
    }

    const record = parseResultRecord(result.Item);
    return isExpired(record, Date.now()) ? null : record;
  }

  async claim({ requestId, claimToken, leaseSeconds }: ClaimRequest): Promise<ClaimOutcome> {
    const nowMs = Date.now();
    const nowSec = Math.floor(nowMs / 1000);

    try {
      const result = await this.dynamoDb.update('results', {
        Key: { request_id: requestId },
        UpdateExpression:
          'SET #status = :pending, claim_token = :token, lease_expires_at = :lease, updated_at = :now',
        ConditionExpression:
          'attribute_exists(request_id) AND expires_at > :nowSec AND ' +
          '(#status = :submitted OR (#status = :pending AND lease_expires_at <= :nowSec))',
        ExpressionAttributeNames: { '#status': 'status' },
        ExpressionAttributeValues: {
          ':pending': JobStatus.PENDING,
          ':submitted': JobStatus.SUBMITTED,
          ':token': claimToken,
          ':lease': nowSec + leaseSeconds,
          ':now': new Date(nowMs).toISOString(),
          ':nowSec': nowSec,
        },
        ReturnValues: 'ALL_NEW',
      });

      const record = parseResultRecord(result.Attributes ?? {});
      if (record.status !== JobStatus.PENDING) {
        throw new Error(`Claim of ${requestId} returned status ${record.status}`);
      }
      return { claimed: true, record };
    } catch (error: unknown) {
      if (!isConditionalCheckFailure(error)) {
        throw error;
      }
      this.logger.debug(`[${requestId}] Claim condition failed`);
      return { claimed: false, current: await this.get(requestId) };
    }
  }

  async complete({ requestId, claimToken, material }: CompleteRequest): Promise<boolean> {
    const now = new Date(Date.now()).toISOString();

    return this.conditional(() =>
      this.dynamoDb.update('results', {
        Key: { request_id: requestId },
        UpdateExpression:
          'SET #status = :complete, public_key = :publicKey, private_key = :privateKey, ' +
          'public_key_openssh = :openssh, completed_at = :now, updated_at = :now ' +
          'REMOVE claim_token, lease_expires_at, error_message',
        ConditionExpression: '#status = :pending AND claim_token = :token',
        ExpressionAttributeNames: { '#status': 'status' },
        ExpressionAttributeValues: {
          ':complete': JobStatus.COMPLETE,
          ':pending': JobStatus.PENDING,
          ':token': claimToken,
          ':publicKey': material.public_key,
          ':privateKey': material.private_key,
          ':openssh': material.public_key_openssh,
          ':now': now,
        },
      }),
    );
  }

  async fail({ requestId, errorMessage, claimToken }: FailRequest): Promise<boolean> {
    const now = new Date(Date.now()).toISOString();
    const guard =
      claimToken === null
        ? { condition: '#status = :from', values: { ':from': JobStatus.SUBMITTED } }
        : {
            condition: '#status = :from AND claim_token = :token',
            values: { ':from': JobStatus.PENDING, ':token': claimToken },
          };

    return this.conditional(() =>
      this.dynamoDb.update('results', {
        Key: { request_id: requestId },
        UpdateExpression:
          'SET #status = :error, error_message = :message, completed_at = :now, updated_at = :now ' +
          'REMOVE claim_token, lease_expires_at',
        ConditionExpression: guard.condition,
        ExpressionAttributeNames: { '#status': 'status' },
        ExpressionAttributeValues: {
          ':error': JobStatus.ERROR,
          ':message': errorMessage,
          ':now': now,
          ...guard.values,
        },
      }),
    );
  }

  async release(requestId: string, claimToken: string): Promise<boolean> {
    const nowMs = Date.now();

    return this.conditional(() =>
      this.dynamoDb.update('results', {
        Key: { request_id: requestId },
        UpdateExpression: 'SET lease_expires_at = :nowSec, updated_at = :now',
        ConditionExpression: '#status = :pending AND claim_token = :token',
        ExpressionAttributeNames: { '#status': 'status' },
        ExpressionAttributeValues: {
          ':pending': JobStatus.PENDING,
          ':token': claimToken,
          ':nowSec': Math.floor(nowMs / 1000),
          ':now': new Date(nowMs).toISOString(),
        },
      }),
    );
  }

  /** Runs a conditional write; false when its condition did not hold. */
  private async conditional(write: () => Promise<unknown>): Promise<boolean> {
    try {
      await write();
      return true;
    } catch (error: unknown) {
      if (isConditionalCheckFailure(error)) {
        return false;
      }
      throw error;
    }
  }
}
