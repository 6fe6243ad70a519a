import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DynamoDBClient, DynamoDBClientConfig } from '@aws-sdk/client-dynamodb';
import {
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  UpdateCommand,
  DeleteCommand,
  QueryCommand,
  GetCommandInput,
  PutCommandInput,
  UpdateCommandInput,
  DeleteCommandInput,
  QueryCommandInput,
} from '@aws-sdk/lib-dynamodb';

/** Logical tables this backend reads and writes. */
export type TableKey = 'results' | 'notes';

const TABLE_ENV_VARS: Record<TableKey, string> = {
  results: 'RESULTS_TABLE_NAME',
  notes: 'NOTES_TABLE_NAME',
};

@Injectable()
export class DynamoDBService {
  private readonly docClient: DynamoDBDocumentClient;
  private readonly tableNames: Record<TableKey, string | undefined>;

  constructor(private readonly configService: ConfigService) {
    const accessKeyId = this.configService.get<string>('AWS_ACCESS_KEY_ID');
    const secretAccessKey = this.configService.get<string>('AWS_SECRET_ACCESS_KEY');
    const endpoint = this.configService.get<string>('DYNAMODB_ENDPOINT');

    const credentials = accessKeyId && secretAccessKey ? { accessKeyId, secretAccessKey } : undefined;

    const clientConfig: DynamoDBClientConfig = {
      region: this.configService.get<string>('AWS_REGION', 'us-east-1'),
      ...(credentials && { credentials }),
      ...(endpoint ? { endpoint } : {}),
    };

    this.docClient = DynamoDBDocumentClient.from(new DynamoDBClient(clientConfig), {
      marshallOptions: {
        removeUndefinedValues: true,
      },
    });

    this.tableNames = {
      results: this.configService.get<string>(TABLE_ENV_VARS.results),
      notes: this.configService.get<string>(TABLE_ENV_VARS.notes),
    };
  }

  /** Resolves a logical table to its configured name; throws when it is not configured. */
  getTableName(table: TableKey): string {
    const name = this.tableNames[table]?.trim();
    if (!name) {
      throw new Error(`${TABLE_ENV_VARS[table]} environment variable is required`);
    }
    return name;
  }

  isConfigured(table: TableKey): boolean {
    return Boolean(this.tableNames[table]?.trim());
  }

  async get(table: TableKey, params: Omit<GetCommandInput, 'TableName'>) {
    const command = new GetCommand({
      TableName: this.getTableName(table),
      ...params,
    });
    return this.docClient.send(command);
  }

  async put(table: TableKey, params: Omit<PutCommandInput, 'TableName'>) {
    const command = new PutCommand({
      TableName: this.getTableName(table),
      ...params,
    });
    return this.docClient.send(command);
  }

  async update(table: TableKey, params: Omit<UpdateCommandInput, 'TableName'>) {
    const command = new UpdateCommand({
      TableName: this.getTableName(table),
      ...params,
    });
    return this.docClient.send(command);
  }

  async delete(table: TableKey, params: Omit<DeleteCommandInput, 'TableName'>) {
    const command = new DeleteCommand({
      TableName: this.getTableName(table),
      ...params,
    });
    return this.docClient.send(command);
  }

  async query(table: TableKey, params: Omit<QueryCommandInput, 'TableName'>) {
    const command = new QueryCommand({
      TableName: this.getTableName(table),
      ...params,
    });
    return this.docClient.send(command);
  }
}
