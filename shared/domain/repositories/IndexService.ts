import { BrowsedRecord, RecordAttribute, SearchRecord } from '../models/SearchRecord.js';

/**
 * Equality test on one indexed attribute
 */
export interface FilterCondition {
  attribute: RecordAttribute;
  equals: string;
}

/**
 * Conjunction of equality conditions, some of them negated:
 * `must[0] AND must[1] AND NOT mustNot[0] ...`
 */
export interface IndexFilter {
  must: FilterCondition[];
  mustNot?: FilterCondition[];
}

/** Continuation cursor handed back by a paginated browse */
export type ContinuationCursor = string | number;

export interface BrowseRequest {
  filter: IndexFilter;

  /** Attributes to return with each record, besides objectId */
  attributes: RecordAttribute[];

  /** Cursor of the page to fetch; omitted for the first page */
  cursor?: ContinuationCursor;

  /** Maximum number of records in the page */
  limit?: number;
}

export interface BrowsePage {
  records: BrowsedRecord[];

  /** Cursor of the next page, or null when this was the last one */
  nextCursor: ContinuationCursor | null;
}

export interface IndexCallOptions {
  /** Aborts the call; an aborted call rejects */
  signal?: AbortSignal;
}

/**
 * Remote search index, treated as a key-value service with filtered
 * browse and delete.
 */
export interface IndexService {
  /**
   * Upsert records by objectId.
   * A failure of the batch rejects the whole call.
   * @returns Ids of the persisted records
   */
  save(records: SearchRecord[], options?: IndexCallOptions): Promise<string[]>;

  /**
   * Fetch one page of records matching a filter
   */
  browsePage(request: BrowseRequest, options?: IndexCallOptions): Promise<BrowsePage>;

  /**
   * Delete records by objectId
   */
  delete(ids: string[], options?: IndexCallOptions): Promise<void>;
}

export function eq(attribute: RecordAttribute, equals: string): FilterCondition {
  return { attribute, equals };
}

/**
 * Quote a facet value for display, escaping embedded quotes
 */
export function escapeFacetValue(value: string): string {
  return `"${value.replace(/"/g, '\\"').replace(/'/g, "\\'")}"`;
}

/**
 * Render a filter as `rootUrl:"X" AND NOT indexEpoch:"E"`
 */
export function describeFilter(filter: IndexFilter): string {
  const parts = [
    ...filter.must.map(c => `${c.attribute}:${escapeFacetValue(c.equals)}`),
    ...(filter.mustNot ?? []).map(c => `NOT ${c.attribute}:${escapeFacetValue(c.equals)}`)
  ];
  return parts.join(' AND ');
}

/**
 * Evaluate a filter against a record
 */
export function matchesFilter(record: Partial<SearchRecord>, filter: IndexFilter): boolean {
  const holds = (condition: FilterCondition): boolean => {
    const value = record[condition.attribute];
    return typeof value === 'string' || typeof value === 'number' ? String(value) === condition.equals : false;
  };
  return filter.must.every(holds) && !(filter.mustNot ?? []).some(holds);
}
