import { BrowsedRecord } from '../../domain/models/SearchRecord.js';
import { BrowseRequest, ContinuationCursor, IndexService } from '../../domain/repositories/IndexService.js';
import { callWithTimeout } from '../abort.js';

export interface BrowseCursorOptions {
  /** Aborts the browse between or during page fetches */
  signal?: AbortSignal;

  /** Timeout of each page fetch in milliseconds */
  pageTimeoutMs?: number;
}

/**
 * Iterates over all records matching a browse request, fetching one page at
 * a time. The continuation cursor of the next page is exposed so that a
 * browse can be resumed.
 */
export class BrowseCursor implements AsyncIterable<BrowsedRecord> {
  private nextCursor: ContinuationCursor | undefined;
  private exhausted = false;

  constructor(
    private readonly index: IndexService,
    private readonly request: Omit<BrowseRequest, 'cursor'>,
    private readonly options: BrowseCursorOptions = {},
    startCursor?: ContinuationCursor
  ) {
    this.nextCursor = startCursor;
  }

  /** Cursor of the next page to fetch; undefined before the first page */
  get cursor(): ContinuationCursor | undefined {
    return this.nextCursor;
  }

  get done(): boolean {
    return this.exhausted;
  }

  /**
   * Fetch the next page. Returns an empty list once the browse is done.
   */
  async nextPage(): Promise<BrowsedRecord[]> {
    if (this.exhausted) {
      return [];
    }
    const page = await callWithTimeout(
      signal => this.index.browsePage({ ...this.request, cursor: this.nextCursor }, { signal }),
      this.options.signal,
      this.options.pageTimeoutMs
    );

    if (page.nextCursor === null) {
      this.exhausted = true;
    } else {
      this.nextCursor = page.nextCursor;
    }
    return page.records;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<BrowsedRecord> {
    while (!this.exhausted) {
      for (const record of await this.nextPage()) {
        yield record;
      }
    }
  }

  /**
   * Read the remaining records into a list
   */
  async collect(): Promise<BrowsedRecord[]> {
    const records: BrowsedRecord[] = [];
    for await (const record of this) {
      records.push(record);
    }
    return records;
  }
}
