import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import {
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  QueryCommand,
  ScanCommand,
  UpdateCommand,
  BatchWriteCommand,
} from '@aws-sdk/lib-dynamodb';
import {
  BoundingBox,
  DEFAULT_ENGINE_CONFIG,
  InsightGeneration,
  InsightRecord,
  ProximityGeneration,
  ProximityRecord,
  Store,
  StoreInput,
  TransactionPoint,
  WeatherGeneration,
  WeatherSnapshot,
  isDayPeriod,
} from '../types';
import { NotFoundError, ProviderUnavailableError, errorMessage } from '../errors';
import { StoreRepository, TransactionSource, validateStoreInput } from './store-repository';
import {
  GenerationStore,
  PublishedEntry,
  PublishedKind,
  PublishedPointer,
  PublishedProximity,
} from './generation-store';

type WriteRequest = { PutRequest: { Item: Record<string, unknown> } };

// Superseded generations expire through the table's TTL attribute
const GENERATION_TTL_DAYS = 7;

/**
 * DynamoDB Service - store registry, transaction series and published generations
 */
export class DynamoDBService implements StoreRepository, TransactionSource, GenerationStore {
  private docClient: DynamoDBDocumentClient;
  private storesTable: string;
  private transactionsTable: string;
  private generationsTable: string;
  private boundingBox: BoundingBox;

  constructor(config: {
    storesTable: string;
    transactionsTable: string;
    generationsTable: string;
    boundingBox?: BoundingBox;
    docClient?: DynamoDBDocumentClient;
  }) {
    this.docClient =
      config.docClient ??
      DynamoDBDocumentClient.from(new DynamoDBClient({}), {
        marshallOptions: { removeUndefinedValues: true },
      });

    this.storesTable = config.storesTable;
    this.transactionsTable = config.transactionsTable;
    this.generationsTable = config.generationsTable;
    this.boundingBox = config.boundingBox ?? DEFAULT_ENGINE_CONFIG.boundingBox;
  }

  // ============ Stores ============

  async getStore(storeId: string): Promise<Store | null> {
    const result = await this.docClient.send(
      new GetCommand({
        TableName: this.storesTable,
        Key: { storeId },
      })
    );
    return (result.Item as Store) || null;
  }

  async listStores(options: { includeInactive?: boolean } = {}): Promise<Store[]> {
    const stores: Store[] = [];
    let lastKey: Record<string, unknown> | undefined;
    let pageCount = 0;
    const startTime = Date.now();

    do {
      const result = await this.docClient.send(
        new ScanCommand({
          TableName: this.storesTable,
          ...(options.includeInactive
            ? {}
            : {
                FilterExpression: 'isActive = :active',
                ExpressionAttributeValues: { ':active': true },
              }),
          ExclusiveStartKey: lastKey,
        })
      );
      pageCount++;

      if (result.Items) {
        stores.push(...(result.Items as Store[]));
      }
      lastKey = result.LastEvaluatedKey;
    } while (lastKey);

    console.log(`[DynamoDB] listStores: ${stores.length} items, ${pageCount} pages, ${Date.now() - startTime}ms`);

    return stores;
  }

  async getStoresByCity(city: string): Promise<Store[]> {
    const stores: Store[] = [];
    let lastKey: Record<string, unknown> | undefined;

    do {
      const result = await this.docClient.send(
        new QueryCommand({
          TableName: this.storesTable,
          IndexName: 'by-city',
          KeyConditionExpression: 'city = :city',
          FilterExpression: 'isActive = :active',
          ExpressionAttributeValues: { ':city': city, ':active': true },
          ExclusiveStartKey: lastKey,
        })
      );

      if (result.Items) {
        stores.push(...(result.Items as Store[]));
      }
      lastKey = result.LastEvaluatedKey;
    } while (lastKey);

    return stores;
  }

  async putStore(input: StoreInput): Promise<Store> {
    validateStoreInput(input, this.boundingBox);

    const existing = await this.getStore(input.storeId);
    const now = new Date().toISOString();
    const store: Store = {
      ...input,
      isActive: input.isActive ?? existing?.isActive ?? true,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    };

    await this.docClient.send(
      new PutCommand({
        TableName: this.storesTable,
        Item: store,
      })
    );
    return store;
  }

  async deactivateStore(storeId: string): Promise<void> {
    const existing = await this.getStore(storeId);
    if (!existing) {
      throw new NotFoundError('Store', storeId);
    }

    await this.docClient.send(
      new UpdateCommand({
        TableName: this.storesTable,
        Key: { storeId },
        UpdateExpression: 'SET isActive = :inactive, updatedAt = :updatedAt',
        ExpressionAttributeValues: {
          ':inactive': false,
          ':updatedAt': new Date().toISOString(),
        },
      })
    );
  }

  // ============ Transactions ============

  /**
   * Sales/stock series for a store between two dates (inclusive).
   * Sort key is `date#period#category`, so a BETWEEN on the date prefix covers the range.
   */
  async getSeries(storeId: string, fromDate: string, toDate: string): Promise<TransactionPoint[]> {
    const points: TransactionPoint[] = [];
    let lastKey: Record<string, unknown> | undefined;

    try {
      do {
        const result = await this.docClient.send(
          new QueryCommand({
            TableName: this.transactionsTable,
            KeyConditionExpression: 'storeId = :storeId AND bucketKey BETWEEN :from AND :to',
            ExpressionAttributeValues: {
              ':storeId': storeId,
              ':from': `${fromDate}#`,
              ':to': `${toDate}#~`,
            },
            ProjectionExpression: '#date, #period, category, #value, stockLevel',
            ExpressionAttributeNames: { '#date': 'date', '#period': 'period', '#value': 'value' },
            ExclusiveStartKey: lastKey,
          })
        );

        for (const item of result.Items || []) {
          const point = toTransactionPoint(item);
          if (point) points.push(point);
        }
        lastKey = result.LastEvaluatedKey;
      } while (lastKey);
    } catch (error) {
      throw new ProviderUnavailableError('DynamoDB transactions', errorMessage(error), error);
    }

    return points;
  }

  async batchPutTransactions(storeId: string, points: TransactionPoint[]): Promise<void> {
    await this.batchPut(
      this.transactionsTable,
      points.map((point) => ({
        ...point,
        storeId,
        bucketKey: `${point.date}#${point.period}#${point.category}`,
      })),
      'transaction'
    );
  }

  // ============ Published generations ============

  async saveProximity(generation: ProximityGeneration): Promise<void> {
    await this.saveGeneration(
      {
        kind: 'proximity',
        generationId: generation.generationId,
        computedAt: generation.computedAt,
        radiusKm: generation.radiusKm,
      },
      [...generation.records].map(([storeId, records]) => ({ storeId, payload: { records } }))
    );
  }

  async saveWeather(generation: WeatherGeneration): Promise<void> {
    await this.saveGeneration(
      { kind: 'weather', generationId: generation.generationId, computedAt: generation.computedAt },
      [...generation.snapshots].map(([storeId, snapshot]) => ({ storeId, payload: { snapshot } }))
    );
  }

  async saveInsights(generation: InsightGeneration): Promise<void> {
    await this.saveGeneration(
      { kind: 'insights', generationId: generation.generationId, computedAt: generation.computedAt },
      [...generation.insights].map(([storeId, insights]) => ({ storeId, payload: { insights } }))
    );
  }

  async latestProximity(): Promise<PublishedProximity | null> {
    const pointer = await this.getPointer('proximity');
    if (!pointer) return null;

    const records = new Map<string, readonly ProximityRecord[]>();
    let lastKey: Record<string, unknown> | undefined;

    do {
      const result = await this.docClient.send(
        new QueryCommand({
          TableName: this.generationsTable,
          KeyConditionExpression: 'pk = :pk',
          ExpressionAttributeValues: { ':pk': `proximity#${pointer.generationId}` },
          ExclusiveStartKey: lastKey,
        })
      );

      for (const item of result.Items || []) {
        records.set(String(item.sk), (item.records as ProximityRecord[]) || []);
      }
      lastKey = result.LastEvaluatedKey;
    } while (lastKey);

    return {
      generationId: pointer.generationId,
      computedAt: pointer.computedAt,
      radiusKm: pointer.radiusKm ?? DEFAULT_ENGINE_CONFIG.proximityRadiusKm,
      records,
    };
  }

  async latestWeather(storeId: string): Promise<PublishedEntry<WeatherSnapshot> | null> {
    const entry = await this.getEntry('weather', storeId);
    return entry && entry.item.snapshot
      ? {
          generationId: entry.pointer.generationId,
          computedAt: entry.pointer.computedAt,
          value: entry.item.snapshot as WeatherSnapshot,
        }
      : null;
  }

  async latestInsights(storeId: string): Promise<PublishedEntry<readonly InsightRecord[]> | null> {
    const entry = await this.getEntry('insights', storeId);
    return entry
      ? {
          generationId: entry.pointer.generationId,
          computedAt: entry.pointer.computedAt,
          value: (entry.item.insights as InsightRecord[]) || [],
        }
      : null;
  }

  /**
   * Write every store entry of a generation, then move the `latest` pointer to it
   */
  private async saveGeneration(
    pointer: PublishedPointer,
    entries: Array<{ storeId: string; payload: Record<string, unknown> }>
  ): Promise<void> {
    const startTime = Date.now();
    const expiresAt = Math.floor(Date.now() / 1000) + GENERATION_TTL_DAYS * 24 * 60 * 60;

    const unwritten = await this.batchPut(
      this.generationsTable,
      entries.map(({ storeId, payload }) => ({
        pk: `${pointer.kind}#${pointer.generationId}`,
        sk: storeId,
        computedAt: pointer.computedAt,
        ...payload,
        expiresAt,
      })),
      pointer.kind
    );
    if (unwritten > 0) {
      throw new ProviderUnavailableError(
        'DynamoDB generations',
        `${unwritten} ${pointer.kind} entries of generation ${pointer.generationId} were not written`
      );
    }

    await this.docClient.send(
      new PutCommand({
        TableName: this.generationsTable,
        Item: { pk: 'latest', sk: pointer.kind, ...pointer },
      })
    );

    console.log(
      `[DynamoDB] Saved ${pointer.kind} generation ${pointer.generationId}: ${entries.length} stores, ${Date.now() - startTime}ms`
    );
  }

  private async getPointer(kind: PublishedKind): Promise<PublishedPointer | null> {
    const result = await this.docClient.send(
      new GetCommand({
        TableName: this.generationsTable,
        Key: { pk: 'latest', sk: kind },
      })
    );

    const item = result.Item;
    if (!item || typeof item.generationId !== 'string' || typeof item.computedAt !== 'string') {
      return null;
    }
    return {
      kind,
      generationId: item.generationId,
      computedAt: item.computedAt,
      radiusKm: typeof item.radiusKm === 'number' ? item.radiusKm : undefined,
    };
  }

  private async getEntry(
    kind: PublishedKind,
    storeId: string
  ): Promise<{ pointer: PublishedPointer; item: Record<string, unknown> } | null> {
    const pointer = await this.getPointer(kind);
    if (!pointer) return null;

    const result = await this.docClient.send(
      new GetCommand({
        TableName: this.generationsTable,
        Key: { pk: `${kind}#${pointer.generationId}`, sk: storeId },
      })
    );
    return result.Item ? { pointer, item: result.Item } : null;
  }

  /**
   * BatchWrite in chunks of 25, retrying unprocessed items with exponential backoff.
   * Returns the number of items still unwritten after the last retry.
   */
  private async batchPut(table: string, items: Record<string, unknown>[], label: string): Promise<number> {
    let unwritten = 0;

    for (const chunk of this.chunkArray(items, 25)) {
      let requestItems: Record<string, WriteRequest[]> = {
        [table]: chunk.map((item) => ({ PutRequest: { Item: item } })),
      };

      let retries = 0;
      const maxRetries = 5;

      while (Object.keys(requestItems).length > 0 && retries < maxRetries) {
        const result = await this.docClient.send(
          new BatchWriteCommand({ RequestItems: requestItems })
        );

        if (result.UnprocessedItems && Object.keys(result.UnprocessedItems).length > 0) {
          requestItems = result.UnprocessedItems as Record<string, WriteRequest[]>;
          retries++;
          // Exponential backoff: 100ms, 200ms, 400ms, 800ms, 1600ms
          await new Promise((resolve) => setTimeout(resolve, 50 * Math.pow(2, retries)));
        } else {
          requestItems = {};
        }
      }

      if (Object.keys(requestItems).length > 0) {
        const failed = Object.values(requestItems).flat().length;
        unwritten += failed;
        console.error(`[DynamoDB] Failed to write ${failed} ${label} items after ${maxRetries} retries`);
      }
    }

    return unwritten;
  }

  private chunkArray<T>(array: T[], size: number): T[][] {
    const chunks: T[][] = [];
    for (let i = 0; i < array.length; i += size) {
      chunks.push(array.slice(i, i + size));
    }
    return chunks;
  }
}

/**
 * Map a raw item to a transaction point, dropping malformed rows
 */
function toTransactionPoint(item: Record<string, unknown>): TransactionPoint | null {
  const { date, period, category, value, stockLevel } = item;
  if (
    typeof date !== 'string' ||
    typeof period !== 'string' ||
    !isDayPeriod(period) ||
    typeof category !== 'string' ||
    typeof value !== 'number' ||
    typeof stockLevel !== 'number'
  ) {
    return null;
  }
  return { date, period, category, value, stockLevel };
}

/**
 * Factory function to create the DynamoDB service from environment variables
 */
export function createDynamoDBService(boundingBox?: BoundingBox): DynamoDBService {
  return new DynamoDBService({
    storesTable: process.env.STORES_TABLE || 'store-insights-stores',
    transactionsTable: process.env.TRANSACTIONS_TABLE || 'store-insights-transactions',
    generationsTable: process.env.GENERATIONS_TABLE || 'store-insights-generations',
    boundingBox,
  });
}
