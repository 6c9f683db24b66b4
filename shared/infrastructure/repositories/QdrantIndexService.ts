import { QdrantClient } from '@qdrant/js-client-rest';
import { z } from 'zod';
import { IndexServiceError, toError } from '../../domain/errors.js';
import { BrowsedRecord, SearchRecord } from '../../domain/models/SearchRecord.js';
import {
  BrowsePage,
  BrowseRequest,
  FilterCondition,
  IndexCallOptions,
  IndexFilter,
  IndexService,
  describeFilter
} from '../../domain/repositories/IndexService.js';
import { Logger, getLogger } from '../logging.js';

/** Attributes with a keyword payload index; sweeps and deletions filter on them */
const INDEXED_ATTRIBUTES = ['rootUrl', 'indexEpoch'] as const;

const DEFAULT_PAGE_SIZE = 1000;

// Payloads come back untyped; only fields of the expected type are kept
const payloadSchema = z
  .object({
    rootUrl: z.string(),
    indexEpoch: z.string(),
    priority: z.number(),
    contentType: z.enum(['guide', 'tutorial']),
    url: z.string(),
    pageTitle: z.string(),
    siteTitle: z.string(),
    logoUrl: z.string(),
    description: z.string(),
    sourceRepository: z.string(),
    homepageUrl: z.string(),
    headingPath: z.array(z.string()),
    anchor: z.string(),
    content: z.string()
  })
  .partial();

function toQdrantCondition(condition: FilterCondition) {
  return { key: condition.attribute, match: { value: condition.equals } };
}

function toQdrantFilter(filter: IndexFilter) {
  return {
    must: filter.must.map(toQdrantCondition),
    must_not: (filter.mustNot ?? []).map(toQdrantCondition)
  };
}

function toPayload(record: SearchRecord): Record<string, unknown> {
  const payload: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    if (value !== undefined && key !== 'objectId') {
      payload[key] = value;
    }
  }
  return payload;
}

/**
 * Index service backed by a Qdrant collection.
 * Records are stored as payload-only points whose ids are the record ids.
 */
export class QdrantIndexService implements IndexService {
  private client: QdrantClient;
  private logger: Logger;
  private collectionName: string;
  private collectionReady: Promise<void> | null = null;

  constructor(qdrantUrl: string, collectionName = 'docs_librarian', loggerInstance?: Logger) {
    this.client = new QdrantClient({ url: qdrantUrl });
    this.collectionName = collectionName;
    this.logger = loggerInstance || getLogger();
    this.logger.info(`QdrantIndexService initialized. URL: ${qdrantUrl}, Collection: ${collectionName}`, 'QdrantIndexService');
  }

  /**
   * Create the collection and its payload indexes if they do not exist
   */
  async ensureCollection(): Promise<void> {
    try {
      this.logger.debug(`Checking if collection '${this.collectionName}' exists...`, 'QdrantIndexService.ensureCollection');
      const collections = await this.client.getCollections();
      const exists = collections.collections.some(c => c.name === this.collectionName);

      if (!exists) {
        this.logger.info(`Collection '${this.collectionName}' not found. Creating...`, 'QdrantIndexService.ensureCollection');
        await this.client.createCollection(this.collectionName, { vectors: {} });
        for (const field of INDEXED_ATTRIBUTES) {
          await this.client.createPayloadIndex(this.collectionName, {
            field_name: field,
            field_schema: 'keyword',
            wait: true
          });
        }
        this.logger.info(`Collection '${this.collectionName}' created successfully.`, 'QdrantIndexService.ensureCollection');
      }
    } catch (error: unknown) {
      const message = `Failed to ensure Qdrant collection '${this.collectionName}'`;
      this.logger.error(message, 'QdrantIndexService.ensureCollection', error);
      throw new IndexServiceError(message, toError(error));
    }
  }

  async save(records: SearchRecord[], options: IndexCallOptions = {}): Promise<string[]> {
    if (records.length === 0) {
      return [];
    }
    await this.ready(options.signal);
    try {
      this.logger.debug(`Upserting ${records.length} records`, 'QdrantIndexService.save');
      await this.client.upsert(this.collectionName, {
        wait: true,
        points: records.map(record => ({
          id: record.objectId,
          vector: {},
          payload: toPayload(record)
        }))
      });
    } catch (error: unknown) {
      const message = `Failed to upsert ${records.length} records`;
      this.logger.error(message, 'QdrantIndexService.save', error);
      throw new IndexServiceError(message, toError(error));
    }
    options.signal?.throwIfAborted();
    return records.map(record => record.objectId);
  }

  async browsePage(request: BrowseRequest, options: IndexCallOptions = {}): Promise<BrowsePage> {
    await this.ready(options.signal);
    let result;
    try {
      result = await this.client.scroll(this.collectionName, {
        filter: toQdrantFilter(request.filter),
        limit: request.limit ?? DEFAULT_PAGE_SIZE,
        offset: request.cursor,
        with_payload: request.attributes,
        with_vector: false
      });
    } catch (error: unknown) {
      const message = `Failed to browse records matching ${describeFilter(request.filter)}`;
      this.logger.error(message, 'QdrantIndexService.browsePage', error);
      throw new IndexServiceError(message, toError(error));
    }
    options.signal?.throwIfAborted();

    const records: BrowsedRecord[] = result.points.map(point => {
      const payload = payloadSchema.safeParse(point.payload ?? {});
      if (!payload.success) {
        this.logger.warn(`Unexpected payload for point ${String(point.id)}`, 'QdrantIndexService.browsePage', payload.error.issues);
      }
      return { ...(payload.success ? payload.data : {}), objectId: String(point.id) };
    });

    const next = result.next_page_offset;
    return {
      records,
      nextCursor: typeof next === 'string' || typeof next === 'number' ? next : null
    };
  }

  async delete(ids: string[], options: IndexCallOptions = {}): Promise<void> {
    if (ids.length === 0) {
      return;
    }
    await this.ready(options.signal);
    try {
      this.logger.debug(`Deleting ${ids.length} records`, 'QdrantIndexService.delete');
      await this.client.delete(this.collectionName, {
        wait: true,
        points: ids
      });
    } catch (error: unknown) {
      const message = `Failed to delete ${ids.length} records`;
      this.logger.error(message, 'QdrantIndexService.delete', error);
      throw new IndexServiceError(message, toError(error));
    }
    options.signal?.throwIfAborted();
  }

  private async ready(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    if (!this.collectionReady) {
      this.collectionReady = this.ensureCollection().catch((error: unknown) => {
        this.collectionReady = null;
        throw error;
      });
    }
    await this.collectionReady;
    signal?.throwIfAborted();
  }
}
