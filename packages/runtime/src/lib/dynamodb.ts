import { ConditionalCheckFailedException, DynamoDBClient } from '@aws-sdk/client-dynamodb';
import {
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  QueryCommand,
  ScanCommand,
  UpdateCommand,
  type QueryCommandInput,
  type ScanCommandInput,
  type UpdateCommandInput,
} from '@aws-sdk/lib-dynamodb';
import { ulid } from 'ulid';
import { byUsageDesc, type DeskStore } from './store.js';
import {
  CallRecordSchema,
  HelpRequestSchema,
  KnowledgeEntrySchema,
  type CallRecord,
  type CallRecordDraft,
  type HelpRequest,
  type HelpRequestDraft,
  type KnowledgeEntry,
  type KnowledgeEntryDraft,
  type RuntimeConfig,
} from '../types/index.js';

type Item = Record<string, unknown>;

const HELP_REQUEST_PK = 'HELP_REQUEST';
const CALL_PK = 'CALL';
const STATUS_INDEX = 'StatusIndex';
const RECENT_INDEX = 'GSI1';

/**
 * DeskStore on three DynamoDB tables.
 *
 * - help requests: PK `id`; `StatusIndex` (status, createdAt) for pending
 *   lookups and `GSI1` (GSI1PK = HELP_REQUEST, GSI1SK = createdAt) for recency
 * - knowledge: PK `id`; lower-cased `questionLc` / `answerLc` copies for
 *   substring search
 * - call records: PK `id`; `GSI1` (GSI1PK = CALL, GSI1SK = startedAt)
 */
export class DynamoDBStore implements DeskStore {
  private client: DynamoDBDocumentClient;
  private config: RuntimeConfig;

  constructor(config: RuntimeConfig) {
    this.config = config;

    const dynamoClient = new DynamoDBClient({
      region: config.awsRegion,
      ...(config.dynamodbEndpoint ? { endpoint: config.dynamodbEndpoint } : {}),
    });

    this.client = DynamoDBDocumentClient.from(dynamoClient, {
      marshallOptions: {
        removeUndefinedValues: true,
      },
    });
  }

  /**
   * Generate a time-ordered record id
   */
  static generateId(): string {
    return ulid();
  }

  async createHelpRequest(request: HelpRequestDraft): Promise<string> {
    const id = DynamoDBStore.generateId();

    await this.client.send(new PutCommand({
      TableName: this.config.helpRequestsTable,
      Item: {
        ...request,
        id,
        GSI1PK: HELP_REQUEST_PK,
        GSI1SK: request.createdAt,
      },
      ConditionExpression: 'attribute_not_exists(id)',
    }));

    return id;
  }

  async getHelpRequest(id: string): Promise<HelpRequest | undefined> {
    const result = await this.client.send(new GetCommand({
      TableName: this.config.helpRequestsTable,
      Key: { id },
    }));

    return result.Item ? HelpRequestSchema.parse(result.Item) : undefined;
  }

  async listPending(): Promise<HelpRequest[]> {
    const items = await this.queryAll({
      TableName: this.config.helpRequestsTable,
      IndexName: STATUS_INDEX,
      KeyConditionExpression: '#status = :pending',
      ExpressionAttributeNames: { '#status': 'status' },
      ExpressionAttributeValues: { ':pending': 'pending' },
      ScanIndexForward: false, // Most recent first
    });

    return items.map(item => HelpRequestSchema.parse(item));
  }

  async listRecent(limit: number): Promise<HelpRequest[]> {
    const items = await this.queryAll({
      TableName: this.config.helpRequestsTable,
      IndexName: RECENT_INDEX,
      KeyConditionExpression: 'GSI1PK = :pk',
      ExpressionAttributeValues: { ':pk': HELP_REQUEST_PK },
      ScanIndexForward: false, // Most recent first
    }, limit);

    return items.map(item => HelpRequestSchema.parse(item));
  }

  async updateHelpRequestResolved(id: string, answer: string, resolver: string, resolvedAt: string): Promise<boolean> {
    return this.transitionFromPending({
      TableName: this.config.helpRequestsTable,
      Key: { id },
      UpdateExpression: 'SET #status = :resolved, supervisorAnswer = :answer, supervisorName = :resolver, resolvedAt = :resolvedAt',
      ConditionExpression: '#status = :pending',
      ExpressionAttributeNames: { '#status': 'status' },
      ExpressionAttributeValues: {
        ':resolved': 'resolved',
        ':pending': 'pending',
        ':answer': answer,
        ':resolver': resolver,
        ':resolvedAt': resolvedAt,
      },
    });
  }

  async updateHelpRequestTimeout(id: string, resolvedAt: string): Promise<boolean> {
    return this.transitionFromPending({
      TableName: this.config.helpRequestsTable,
      Key: { id },
      UpdateExpression: 'SET #status = :timeout, resolvedAt = :resolvedAt',
      ConditionExpression: '#status = :pending',
      ExpressionAttributeNames: { '#status': 'status' },
      ExpressionAttributeValues: {
        ':timeout': 'timeout',
        ':pending': 'pending',
        ':resolvedAt': resolvedAt,
      },
    });
  }

  async createKnowledgeEntry(entry: KnowledgeEntryDraft): Promise<string> {
    const id = DynamoDBStore.generateId();

    await this.client.send(new PutCommand({
      TableName: this.config.knowledgeTable,
      Item: {
        ...entry,
        id,
        questionLc: entry.question.toLowerCase(),
        answerLc: entry.answer.toLowerCase(),
      },
      ConditionExpression: 'attribute_not_exists(id)',
    }));

    return id;
  }

  async listAllKnowledge(): Promise<KnowledgeEntry[]> {
    const items = await this.scanAll({ TableName: this.config.knowledgeTable });

    // Scan order is arbitrary; ULID ids break createdAt ties in creation order
    return items
      .map(item => KnowledgeEntrySchema.parse(item))
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt) || a.id.localeCompare(b.id));
  }

  async incrementKnowledgeUsage(id: string): Promise<void> {
    await this.client.send(new UpdateCommand({
      TableName: this.config.knowledgeTable,
      Key: { id },
      UpdateExpression: 'ADD usageCount :one SET updatedAt = :now',
      ConditionExpression: 'attribute_exists(id)',
      ExpressionAttributeValues: {
        ':one': 1,
        ':now': new Date().toISOString(),
      },
    }));
  }

  async textSearchKnowledge(query: string): Promise<KnowledgeEntry[]> {
    const items = await this.scanAll({
      TableName: this.config.knowledgeTable,
      FilterExpression: 'contains(questionLc, :q) OR contains(answerLc, :q)',
      ExpressionAttributeValues: { ':q': query.toLowerCase() },
    });

    return items
      .map(item => KnowledgeEntrySchema.parse(item))
      .sort(byUsageDesc);
  }

  async createCallRecord(record: CallRecordDraft): Promise<string> {
    const id = DynamoDBStore.generateId();

    await this.client.send(new PutCommand({
      TableName: this.config.callRecordsTable,
      Item: {
        ...record,
        id,
        GSI1PK: CALL_PK,
        GSI1SK: record.startedAt,
      },
    }));

    return id;
  }

  async linkHelpRequestToCall(callId: string, requestId: string): Promise<void> {
    await this.client.send(new UpdateCommand({
      TableName: this.config.callRecordsTable,
      Key: { id: callId },
      UpdateExpression: 'SET helpRequestIds = list_append(if_not_exists(helpRequestIds, :empty), :ids), resolvedByAi = :false',
      ConditionExpression: 'attribute_exists(id)',
      ExpressionAttributeValues: {
        ':empty': [],
        ':ids': [requestId],
        ':false': false,
      },
    }));
  }

  async endCallRecord(callId: string, endedAt: string, transcript: string): Promise<void> {
    await this.client.send(new UpdateCommand({
      TableName: this.config.callRecordsTable,
      Key: { id: callId },
      UpdateExpression: 'SET endedAt = :endedAt, transcript = :transcript',
      ConditionExpression: 'attribute_exists(id)',
      ExpressionAttributeValues: {
        ':endedAt': endedAt,
        ':transcript': transcript,
      },
    }));
  }

  async listRecentCalls(limit: number): Promise<CallRecord[]> {
    const items = await this.queryAll({
      TableName: this.config.callRecordsTable,
      IndexName: RECENT_INDEX,
      KeyConditionExpression: 'GSI1PK = :pk',
      ExpressionAttributeValues: { ':pk': CALL_PK },
      ScanIndexForward: false,
    }, limit);

    return items.map(item => CallRecordSchema.parse(item));
  }

  /**
   * Conditional update out of `pending`; a failed condition means the
   * request is missing or already terminal.
   */
  private async transitionFromPending(input: UpdateCommandInput): Promise<boolean> {
    try {
      await this.client.send(new UpdateCommand(input));
      return true;
    } catch (error) {
      if (error instanceof ConditionalCheckFailedException) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Query following LastEvaluatedKey until exhausted or `limit` items are read
   */
  private async queryAll(input: QueryCommandInput, limit?: number): Promise<Item[]> {
    const items: Item[] = [];
    let exclusiveStartKey: Item | undefined;

    do {
      const remaining = limit === undefined ? undefined : limit - items.length;
      const result = await this.client.send(new QueryCommand({
        ...input,
        ...(remaining !== undefined ? { Limit: remaining } : {}),
        ExclusiveStartKey: exclusiveStartKey,
      }));

      items.push(...(result.Items || []));
      exclusiveStartKey = result.LastEvaluatedKey;
    } while (exclusiveStartKey && (limit === undefined || items.length < limit));

    return limit === undefined ? items : items.slice(0, limit);
  }

  private async scanAll(input: ScanCommandInput): Promise<Item[]> {
    const items: Item[] = [];
    let exclusiveStartKey: Item | undefined;

    do {
      const result = await this.client.send(new ScanCommand({
        ...input,
        ExclusiveStartKey: exclusiveStartKey,
      }));

      items.push(...(result.Items || []));
      exclusiveStartKey = result.LastEvaluatedKey;
    } while (exclusiveStartKey);

    return items;
  }
}
