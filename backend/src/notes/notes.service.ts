import { Injectable, InternalServerErrorException, Logger, NotFoundException } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { DynamoDBService } from '../common/dynamodb/dynamodb.service';
import { errorMessage, isConditionalCheckFailure } from '../common/utils/errors';
import { CreateNoteDto } from './dto/create-note.dto';
import { UpdateNoteDto } from './dto/update-note.dto';

export interface Note {
  owner: string;
  id: string;
  title: string;
  note: string;
  created_at: string;
  updated_at: string;
}

export type CreatedNote = Pick<Note, 'id' | 'title' | 'note'>;

@Injectable()
export class NotesService {
  private readonly logger = new Logger(NotesService.name);

  constructor(private readonly dynamoDb: DynamoDBService) {}

  async create(owner: string, dto: CreateNoteDto): Promise<CreatedNote> {
    this.requireTable();

    const now = new Date(Date.now()).toISOString();
    const item: Note = {
      owner,
      id: uuidv4(),
      title: dto.title,
      note: dto.note,
      created_at: now,
      updated_at: now,
    };

    try {
      await this.dynamoDb.put('notes', {
        Item: item,
        ConditionExpression: 'attribute_not_exists(#id)',
        ExpressionAttributeNames: { '#id': 'id' },
      });
    } catch (error: unknown) {
      throw this.storageFailure('create note', error);
    }

    return { id: item.id, title: item.title, note: item.note };
  }

  async findAll(owner: string): Promise<{ items: Note[] }> {
    this.requireTable();

    const items: Note[] = [];
    let startKey: Record<string, unknown> | undefined;

    try {
      do {
        const result = await this.dynamoDb.query('notes', {
          KeyConditionExpression: '#owner = :owner',
          ExpressionAttributeNames: { '#owner': 'owner' },
          ExpressionAttributeValues: { ':owner': owner },
          ...(startKey && { ExclusiveStartKey: startKey }),
        });
        items.push(...(result.Items ?? []).map((item) => this.mapToNote(item)));
        startKey = result.LastEvaluatedKey;
      } while (startKey);
    } catch (error: unknown) {
      throw this.storageFailure('list notes', error);
    }

    return { items };
  }

  async findOne(owner: string, id: string): Promise<Note> {
    this.requireTable();

    let item: Record<string, unknown> | undefined;
    try {
      const result = await this.dynamoDb.get('notes', { Key: { owner, id } });
      item = result.Item;
    } catch (error: unknown) {
      throw this.storageFailure('get note', error);
    }

    if (!item) {
      throw new NotFoundException('Note not found');
    }
    return this.mapToNote(item);
  }

  async update(owner: string, id: string, dto: UpdateNoteDto): Promise<Note> {
    this.requireTable();

    try {
      const result = await this.dynamoDb.update('notes', {
        Key: { owner, id },
        UpdateExpression: 'SET #title = :title, #note = :note, #updated_at = :ts',
        ConditionExpression: 'attribute_exists(#id)',
        ExpressionAttributeNames: {
          '#id': 'id',
          '#title': 'title',
          '#note': 'note',
          '#updated_at': 'updated_at',
        },
        ExpressionAttributeValues: {
          ':title': dto.title,
          ':note': dto.note,
          ':ts': new Date(Date.now()).toISOString(),
        },
        ReturnValues: 'ALL_NEW',
      });
      return this.mapToNote(result.Attributes ?? {});
    } catch (error: unknown) {
      if (isConditionalCheckFailure(error)) {
        throw new NotFoundException('Note not found');
      }
      throw this.storageFailure('update note', error);
    }
  }

  async remove(owner: string, id: string): Promise<{ message: string }> {
    this.requireTable();

    try {
      await this.dynamoDb.delete('notes', {
        Key: { owner, id },
        ConditionExpression: 'attribute_exists(#id)',
        ExpressionAttributeNames: { '#id': 'id' },
      });
    } catch (error: unknown) {
      if (isConditionalCheckFailure(error)) {
        throw new NotFoundException('Note not found');
      }
      throw this.storageFailure('delete note', error);
    }

    return { message: 'Note deleted' };
  }

  private requireTable(): void {
    if (!this.dynamoDb.isConfigured('notes')) {
      throw new InternalServerErrorException({
        message: 'NOTES_TABLE_NAME environment variable is required',
        code: 'CONFIGURATION_ERROR',
      });
    }
  }

  private storageFailure(action: string, error: unknown): InternalServerErrorException {
    this.logger.error(`Failed to ${action}: ${errorMessage(error)}`);
    return new InternalServerErrorException(`Failed to ${action}`);
  }

  private mapToNote(item: Record<string, unknown>): Note {
    const text = (key: keyof Note): string => {
      const value = item[key];
      return typeof value === 'string' ? value : '';
    };
    return {
      owner: text('owner'),
      id: text('id'),
      title: text('title'),
      note: text('note'),
      created_at: text('created_at'),
      updated_at: text('updated_at'),
    };
  }
}
