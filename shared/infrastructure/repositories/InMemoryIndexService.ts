import { BrowsedRecord, RecordAttribute, SearchRecord } from '../../domain/models/SearchRecord.js';
import {
  BrowsePage,
  BrowseRequest,
  IndexCallOptions,
  IndexService,
  matchesFilter
} from '../../domain/repositories/IndexService.js';

const DEFAULT_PAGE_SIZE = 1000;

function copyAttribute<K extends RecordAttribute>(target: Partial<SearchRecord>, source: SearchRecord, key: K): void {
  target[key] = source[key];
}

/**
 * The record's id and the requested attributes
 */
function project(record: SearchRecord, attributes: RecordAttribute[]): BrowsedRecord {
  const projected: Partial<SearchRecord> = {};
  for (const attribute of attributes) {
    copyAttribute(projected, record, attribute);
  }
  return { ...projected, objectId: record.objectId };
}

/**
 * Index service that keeps records in memory, in insertion order.
 * Used by the tests and for dry runs.
 */
export class InMemoryIndexService implements IndexService {
  private records: Map<string, SearchRecord> = new Map();

  /**
   * Store records without going through save
   */
  seed(records: Iterable<SearchRecord>): void {
    for (const record of records) {
      this.records.set(record.objectId, record);
    }
  }

  /** All stored records */
  all(): SearchRecord[] {
    return Array.from(this.records.values());
  }

  get size(): number {
    return this.records.size;
  }

  async save(records: SearchRecord[], options: IndexCallOptions = {}): Promise<string[]> {
    options.signal?.throwIfAborted();
    for (const record of records) {
      this.records.set(record.objectId, { ...record, headingPath: [...record.headingPath] });
    }
    return records.map(record => record.objectId);
  }

  async browsePage(request: BrowseRequest, options: IndexCallOptions = {}): Promise<BrowsePage> {
    options.signal?.throwIfAborted();

    const offset = typeof request.cursor === 'number' ? request.cursor : Number(request.cursor ?? 0);
    const limit = request.limit ?? DEFAULT_PAGE_SIZE;
    const matching = this.all().filter(record => matchesFilter(record, request.filter));
    const page = matching.slice(offset, offset + limit);

    const records = page.map(record => project(record, request.attributes));

    const next = offset + page.length;
    return { records, nextCursor: next < matching.length ? next : null };
  }

  async delete(ids: string[], options: IndexCallOptions = {}): Promise<void> {
    options.signal?.throwIfAborted();
    for (const id of ids) {
      this.records.delete(id);
    }
  }
}
