/**
 * Index synchronizer
 *
 * Saves the records of one crawl run and then expires the records that
 * earlier runs saved under the same root URL. A run moves through the states
 * build, save, sweep and done; a failed save ends it in the failed state
 * without touching what is already in the index.
 */

import {
  IndexBrowseError,
  IndexDeleteError,
  IndexWriteError,
  LibrarianError,
  SyncInProgressError,
  toError
} from '../../../shared/domain/errors.js';
import { BrowsedRecord, IndexEpoch, SearchRecord } from '../../../shared/domain/models/SearchRecord.js';
import { IndexFilter, IndexService, describeFilter, eq } from '../../../shared/domain/repositories/IndexService.js';
import { IndexingObserver, SyncState, createLoggingObserver } from '../../../shared/infrastructure/IndexingObserver.js';
import { callWithTimeout } from '../../../shared/infrastructure/abort.js';
import { Logger, getLogger } from '../../../shared/infrastructure/logging.js';
import { BrowseCursor } from '../../../shared/infrastructure/repositories/BrowseCursor.js';

type BrowsedAttribute = 'rootUrl' | 'indexEpoch';

/**
 * Options for the index synchronizer
 */
export interface IndexSynchronizerOptions {
  /** Receives state transitions and sweep events; defaults to logging them */
  observer?: IndexingObserver;

  logger?: Logger;

  /** Timeout of each index call in milliseconds */
  callTimeoutMs?: number;

  /** Records fetched per browse page */
  browsePageSize?: number;
}

export interface SynchronizeRequest {
  rootUrl: string;

  /** Records built by this run; each must carry rootUrl and epoch */
  records: SearchRecord[];

  epoch: IndexEpoch;

  signal?: AbortSignal;
}

export type SynchronizeResult =
  | { state: 'done'; savedIds: string[]; expiredIds: string[] }
  | { state: 'failed'; savedIds: []; expiredIds: []; error: IndexWriteError };

export class IndexSynchronizer {
  private readonly observer: IndexingObserver;
  private readonly logger: Logger;
  private readonly inFlight = new Set<string>();

  constructor(
    private readonly index: IndexService,
    private readonly options: IndexSynchronizerOptions = {}
  ) {
    this.logger = options.logger ?? getLogger();
    this.observer = options.observer ?? createLoggingObserver(this.logger);
  }

  /**
   * Save a run's records, then expire the records of earlier runs of the
   * same root. Nothing is expired when the save fails or saves nothing.
   * @throws SyncInProgressError when a run for the root is already in progress
   * @throws IndexBrowseError or IndexDeleteError when expiring fails after the save
   */
  async synchronize(request: SynchronizeRequest): Promise<SynchronizeResult> {
    const { rootUrl, records, epoch, signal } = request;
    this.assertStamped(records, rootUrl, epoch);
    this.acquire(rootUrl);

    try {
      this.transition(rootUrl, 'build', 'save');

      let savedIds: string[];
      try {
        savedIds = await this.save(rootUrl, records, signal);
      } catch (error: unknown) {
        const writeError =
          error instanceof IndexWriteError ? error : new IndexWriteError(rootUrl, records.length, toError(error));
        this.transition(rootUrl, 'save', 'failed');
        return { state: 'failed', savedIds: [], expiredIds: [], error: writeError };
      }

      if (savedIds.length === 0) {
        this.observer.onEvent({ type: 'sweep-skipped', rootUrl });
        this.transition(rootUrl, 'save', 'done');
        return { state: 'done', savedIds, expiredIds: [] };
      }

      this.transition(rootUrl, 'save', 'sweep');
      const expiredIds = await this.expireOldRecords({ rootUrl, epoch, signal });
      this.transition(rootUrl, 'sweep', 'done');
      return { state: 'done', savedIds, expiredIds };
    } finally {
      this.inFlight.delete(rootUrl);
    }
  }

  /**
   * Upsert a batch of records. An empty batch makes no call.
   * @returns Ids of the saved records
   * @throws IndexWriteError when the index rejects the batch, or the call times out or is aborted
   */
  async save(rootUrl: string, records: SearchRecord[], signal?: AbortSignal): Promise<string[]> {
    if (records.length === 0) {
      this.logger.info(`No records to save for ${rootUrl}`, 'IndexSynchronizer');
      return [];
    }

    this.logger.info(`Indexing ${records.length} records for ${rootUrl}`, 'IndexSynchronizer');
    let savedIds: string[];
    try {
      savedIds = await this.call(callSignal => this.index.save(records, { signal: callSignal }), signal);
    } catch (error: unknown) {
      this.logger.error(`Error saving objects for ${rootUrl}`, 'IndexSynchronizer', error);
      throw new IndexWriteError(rootUrl, records.length, toError(error));
    }

    this.observer.onEvent({ type: 'records-saved', rootUrl, count: savedIds.length });
    return savedIds;
  }

  /**
   * Delete the records of a root that were not saved with the given epoch
   * @returns Ids of the deleted records
   */
  async expireOldRecords({
    rootUrl,
    epoch,
    signal
  }: {
    rootUrl: string;
    epoch: IndexEpoch;
    signal?: AbortSignal;
  }): Promise<string[]> {
    const filter: IndexFilter = { must: [eq('rootUrl', rootUrl)], mustNot: [eq('indexEpoch', epoch)] };
    const browsed = await this.browseAll(filter, ['rootUrl', 'indexEpoch'], signal);

    const ids = browsed
      .filter(record => this.confirm(record, 'rootUrl', rootUrl) && this.confirmStale(record, epoch))
      .map(record => record.objectId);
    this.observer.onEvent({ type: 'sweep-count', rootUrl, count: ids.length });

    await this.deleteIds(rootUrl, ids, signal);
    return ids;
  }

  /**
   * Delete every record of a root URL, whatever its epoch
   * @returns Ids of the deleted records
   * @throws SyncInProgressError when a run for the root is in progress
   */
  async deleteRootUrl({ rootUrl, signal }: { rootUrl: string; signal?: AbortSignal }): Promise<string[]> {
    this.acquire(rootUrl);
    try {
      const browsed = await this.browseAll({ must: [eq('rootUrl', rootUrl)] }, ['rootUrl'], signal);
      const ids = browsed
        .filter(record => this.confirm(record, 'rootUrl', rootUrl))
        .map(record => record.objectId);
      this.logger.info(`Found ${ids.length} records for ${rootUrl}`, 'IndexSynchronizer');

      await this.deleteIds(rootUrl, ids, signal);
      return ids;
    } finally {
      this.inFlight.delete(rootUrl);
    }
  }

  private async browseAll(
    filter: IndexFilter,
    attributes: BrowsedAttribute[],
    signal?: AbortSignal
  ): Promise<BrowsedRecord[]> {
    const cursor = new BrowseCursor(
      this.index,
      { filter, attributes, limit: this.options.browsePageSize },
      { signal, pageTimeoutMs: this.options.callTimeoutMs }
    );
    try {
      return await cursor.collect();
    } catch (error: unknown) {
      const description = describeFilter(filter);
      this.logger.error(`Error browsing records matching ${description}`, 'IndexSynchronizer', error);
      throw new IndexBrowseError(description, toError(error), { cursor: cursor.cursor });
    }
  }

  private async deleteIds(rootUrl: string, ids: string[], signal?: AbortSignal): Promise<void> {
    if (ids.length === 0) {
      return;
    }
    try {
      await this.call(callSignal => this.index.delete(ids, { signal: callSignal }), signal);
    } catch (error: unknown) {
      this.logger.error(`Error deleting records for ${rootUrl}`, 'IndexSynchronizer', error);
      throw new IndexDeleteError(rootUrl, ids.length, toError(error));
    }
    this.observer.onEvent({ type: 'records-deleted', rootUrl, count: ids.length });
  }

  // The index filtered the browse already; a record that does not match is reported and kept
  private confirm(record: BrowsedRecord, attribute: 'rootUrl', expected: string): boolean {
    const actual = record[attribute];
    if (actual === expected) {
      return true;
    }
    this.observer.onEvent({ type: 'consistency-mismatch', objectId: record.objectId, attribute, expected, actual });
    return false;
  }

  private confirmStale(record: BrowsedRecord, epoch: IndexEpoch): boolean {
    if (record.indexEpoch !== epoch) {
      return true;
    }
    this.observer.onEvent({
      type: 'consistency-mismatch',
      objectId: record.objectId,
      attribute: 'indexEpoch',
      expected: `not ${epoch}`,
      actual: record.indexEpoch
    });
    return false;
  }

  private call<T>(operation: (signal: AbortSignal | undefined) => Promise<T>, signal?: AbortSignal): Promise<T> {
    return callWithTimeout(operation, signal, this.options.callTimeoutMs);
  }

  private assertStamped(records: SearchRecord[], rootUrl: string, epoch: IndexEpoch): void {
    const stray = records.find(record => record.rootUrl !== rootUrl || record.indexEpoch !== epoch);
    if (stray) {
      throw new LibrarianError(
        `Record ${stray.objectId} does not belong to run ${epoch} of ${rootUrl}`,
        'RECORD_MISMATCH',
        { objectId: stray.objectId, rootUrl: stray.rootUrl, indexEpoch: stray.indexEpoch }
      );
    }
  }

  private acquire(rootUrl: string): void {
    if (this.inFlight.has(rootUrl)) {
      throw new SyncInProgressError(rootUrl);
    }
    this.inFlight.add(rootUrl);
  }

  private transition(rootUrl: string, from: SyncState, to: SyncState): void {
    this.observer.onEvent({ type: 'state-transition', rootUrl, from, to });
  }
}
