import { getEventListeners } from 'events';
import { describe, expect, it, vi } from 'vitest';
import { IndexBrowseError, IndexDeleteError, IndexWriteError, SyncInProgressError } from '../../../shared/domain/errors.js';
import { BrowsePage, BrowseRequest, IndexCallOptions } from '../../../shared/domain/repositories/IndexService.js';
import { InMemoryIndexService } from '../../../shared/infrastructure/repositories/InMemoryIndexService.js';
import { memoryLogger, recordingObserver } from '../../../shared/test/helpers.js';
import { IndexSynchronizer, IndexSynchronizerOptions } from '../domain/IndexSynchronizer.js';
import { makeRecords } from './helpers.js';

const R1 = 'https://r1.example.org/docs/';
const R2 = 'https://r2.example.org/docs/';

function setup(options: IndexSynchronizerOptions = {}, index = new InMemoryIndexService()) {
  const observer = recordingObserver();
  const { logger } = memoryLogger();
  const synchronizer = new IndexSynchronizer(index, { observer, logger, ...options });
  return { index, observer, synchronizer };
}

describe('IndexSynchronizer.synchronize', () => {
  it('expires the records of the previous run', async () => {
    const { index, synchronizer } = setup();

    const first = await synchronizer.synchronize({ rootUrl: R1, records: makeRecords(R1, 'e1', 10), epoch: 'e1' });
    expect(first).toEqual({ state: 'done', savedIds: expect.any(Array), expiredIds: [] });
    expect(index.size).toBe(10);

    const firstIds = makeRecords(R1, 'e1', 10).map(record => record.objectId);
    const second = await synchronizer.synchronize({ rootUrl: R1, records: makeRecords(R1, 'e2', 8), epoch: 'e2' });

    expect(second.state).toBe('done');
    expect(second.savedIds).toHaveLength(8);
    expect(second.expiredIds).toEqual(firstIds.slice(8));
    expect(index.size).toBe(8);
    expect(index.all().every(record => record.indexEpoch === 'e2')).toBe(true);
  });

  it('leaves other roots alone', async () => {
    const { index, synchronizer } = setup();
    index.seed(makeRecords(R2, 'old', 5));

    await synchronizer.synchronize({ rootUrl: R1, records: makeRecords(R1, 'e1', 3), epoch: 'e1' });

    expect(index.size).toBe(8);
    expect(index.all().filter(record => record.rootUrl === R2)).toHaveLength(5);
  });

  it('reports the run state transitions', async () => {
    const { observer, synchronizer } = setup();

    await synchronizer.synchronize({ rootUrl: R1, records: makeRecords(R1, 'e1', 2), epoch: 'e1' });

    expect(observer.events.filter(event => event.type === 'state-transition')).toEqual([
      { type: 'state-transition', rootUrl: R1, from: 'build', to: 'save' },
      { type: 'state-transition', rootUrl: R1, from: 'save', to: 'sweep' },
      { type: 'state-transition', rootUrl: R1, from: 'sweep', to: 'done' }
    ]);
    expect(observer.events).toContainEqual({ type: 'records-saved', rootUrl: R1, count: 2 });
    expect(observer.events).toContainEqual({ type: 'sweep-count', rootUrl: R1, count: 0 });
  });

  it('skips the sweep when nothing was saved', async () => {
    const { index, observer, synchronizer } = setup();
    index.seed(makeRecords(R1, 'e1', 4));
    const save = vi.spyOn(index, 'save');
    const browse = vi.spyOn(index, 'browsePage');
    const remove = vi.spyOn(index, 'delete');

    const result = await synchronizer.synchronize({ rootUrl: R1, records: [], epoch: 'e2' });

    expect(result).toEqual({ state: 'done', savedIds: [], expiredIds: [] });
    expect(save).not.toHaveBeenCalled();
    expect(browse).not.toHaveBeenCalled();
    expect(remove).not.toHaveBeenCalled();
    expect(observer.events).toContainEqual({ type: 'sweep-skipped', rootUrl: R1 });
    expect(index.size).toBe(4);
  });

  it('skips the sweep when the index saved no record', async () => {
    const { index, synchronizer } = setup();
    index.seed(makeRecords(R1, 'e1', 4));
    vi.spyOn(index, 'save').mockResolvedValue([]);
    const browse = vi.spyOn(index, 'browsePage');

    const result = await synchronizer.synchronize({ rootUrl: R1, records: makeRecords(R1, 'e2', 2), epoch: 'e2' });

    expect(result).toEqual({ state: 'done', savedIds: [], expiredIds: [] });
    expect(browse).not.toHaveBeenCalled();
    expect(index.size).toBe(4);
  });

  it('fails without touching the index when the save fails', async () => {
    const { index, observer, synchronizer } = setup();
    index.seed(makeRecords(R1, 'e1', 4));
    vi.spyOn(index, 'save').mockRejectedValue(new Error('service unavailable'));
    const browse = vi.spyOn(index, 'browsePage');
    const remove = vi.spyOn(index, 'delete');

    const result = await synchronizer.synchronize({ rootUrl: R1, records: makeRecords(R1, 'e2', 2), epoch: 'e2' });

    expect(result.state).toBe('failed');
    expect(result.savedIds).toEqual([]);
    expect(result.expiredIds).toEqual([]);
    if (result.state === 'failed') {
      expect(result.error).toBeInstanceOf(IndexWriteError);
      expect(result.error.errorCode).toBe('INDEX_WRITE_FAILED');
      expect(result.error.message).toBe(`Failed to save 2 records for ${R1}. service unavailable`);
    }
    expect(browse).not.toHaveBeenCalled();
    expect(remove).not.toHaveBeenCalled();
    expect(observer.events.filter(event => event.type === 'state-transition').map(event => event.to)).toEqual([
      'save',
      'failed'
    ]);
    expect(index.size).toBe(4);
  });

  it('treats a save timeout as a failed save', async () => {
    const { index, synchronizer } = setup({ callTimeoutMs: 20 });
    vi.spyOn(index, 'save').mockReturnValue(new Promise<string[]>(() => undefined));

    const result = await synchronizer.synchronize({ rootUrl: R1, records: makeRecords(R1, 'e1', 1), epoch: 'e1' });

    expect(result.state).toBe('failed');
  });

  it('fails when aborted before saving', async () => {
    const { index, synchronizer } = setup();
    const controller = new AbortController();
    controller.abort();

    const result = await synchronizer.synchronize({
      rootUrl: R1,
      records: makeRecords(R1, 'e1', 1),
      epoch: 'e1',
      signal: controller.signal
    });

    expect(result.state).toBe('failed');
    expect(index.size).toBe(0);
  });

  it('leaves no listener on the caller signal after a long sweep', async () => {
    const { index, synchronizer } = setup({ callTimeoutMs: 60_000, browsePageSize: 1 });
    index.seed(makeRecords(R1, 'old', 30, 'stale.html'));
    const controller = new AbortController();

    const result = await synchronizer.synchronize({
      rootUrl: R1,
      records: makeRecords(R1, 'e1', 2),
      epoch: 'e1',
      signal: controller.signal
    });

    expect(result.expiredIds).toHaveLength(30);
    expect(getEventListeners(controller.signal, 'abort')).toHaveLength(0);
  });

  it('rejects a second run for a root in flight', async () => {
    const { synchronizer } = setup();

    const first = synchronizer.synchronize({ rootUrl: R1, records: makeRecords(R1, 'e1', 1), epoch: 'e1' });
    await expect(
      synchronizer.synchronize({ rootUrl: R1, records: makeRecords(R1, 'e2', 1), epoch: 'e2' })
    ).rejects.toBeInstanceOf(SyncInProgressError);
    await expect(first).resolves.toMatchObject({ state: 'done' });

    await expect(
      synchronizer.synchronize({ rootUrl: R1, records: makeRecords(R1, 'e3', 1), epoch: 'e3' })
    ).resolves.toMatchObject({ state: 'done' });
  });

  it('rejects records of another run', async () => {
    const { synchronizer } = setup();

    await expect(
      synchronizer.synchronize({ rootUrl: R1, records: makeRecords(R1, 'other', 1), epoch: 'e1' })
    ).rejects.toMatchObject({ errorCode: 'RECORD_MISMATCH' });
  });

  it('escalates a failed sweep after the save', async () => {
    const { index, synchronizer } = setup();
    index.seed(makeRecords(R1, 'e1', 3));
    vi.spyOn(index, 'delete').mockRejectedValue(new Error('delete refused'));

    await expect(
      synchronizer.synchronize({ rootUrl: R1, records: makeRecords(R1, 'e2', 2), epoch: 'e2' })
    ).rejects.toBeInstanceOf(IndexDeleteError);
    expect(index.all().filter(record => record.indexEpoch === 'e2')).toHaveLength(2);
  });
});

describe('IndexSynchronizer.expireOldRecords', () => {
  it('pages through the stale records', async () => {
    const { index, synchronizer } = setup({ browsePageSize: 3 });
    index.seed(makeRecords(R1, 'e1', 10));
    const browse = vi.spyOn(index, 'browsePage');

    const expired = await synchronizer.expireOldRecords({ rootUrl: R1, epoch: 'e2' });

    expect(expired).toHaveLength(10);
    expect(browse).toHaveBeenCalledTimes(4);
    expect(index.size).toBe(0);
  });

  it('skips results the filter should have excluded', async () => {
    class LeakyIndex extends InMemoryIndexService {
      override async browsePage(request: BrowseRequest, options?: IndexCallOptions): Promise<BrowsePage> {
        const page = await super.browsePage(request, options);
        return {
          ...page,
          records: [
            ...page.records,
            { objectId: 'wrong-root', rootUrl: R2, indexEpoch: 'e1' },
            { objectId: 'current', rootUrl: R1, indexEpoch: 'e2' }
          ]
        };
      }
    }
    const { index, observer, synchronizer } = setup({}, new LeakyIndex());
    index.seed(makeRecords(R1, 'e1', 2));
    const remove = vi.spyOn(index, 'delete');

    const expired = await synchronizer.expireOldRecords({ rootUrl: R1, epoch: 'e2' });

    expect(expired).toEqual(makeRecords(R1, 'e1', 2).map(record => record.objectId));
    expect(remove).toHaveBeenCalledWith(expired, expect.anything());
    expect(observer.events).toContainEqual({
      type: 'consistency-mismatch',
      objectId: 'wrong-root',
      attribute: 'rootUrl',
      expected: R1,
      actual: R2
    });
    expect(observer.events).toContainEqual({
      type: 'consistency-mismatch',
      objectId: 'current',
      attribute: 'indexEpoch',
      expected: 'not e2',
      actual: 'e2'
    });
  });

  it('wraps browse failures', async () => {
    const { index, synchronizer } = setup();
    vi.spyOn(index, 'browsePage').mockRejectedValue(new Error('scroll failed'));

    await expect(synchronizer.expireOldRecords({ rootUrl: R1, epoch: 'e2' })).rejects.toBeInstanceOf(IndexBrowseError);
  });
});

describe('IndexSynchronizer.deleteRootUrl', () => {
  it('deletes every record of one root', async () => {
    const { index, observer, synchronizer } = setup();
    index.seed([...makeRecords(R1, 'e1', 5), ...makeRecords(R1, 'e2', 3, 'other.html'), ...makeRecords(R2, 'e1', 5)]);

    const deleted = await synchronizer.deleteRootUrl({ rootUrl: R1 });

    expect(deleted).toHaveLength(8);
    expect(index.size).toBe(5);
    expect(index.all().every(record => record.rootUrl === R2)).toBe(true);
    expect(observer.events).toContainEqual({ type: 'records-deleted', rootUrl: R1, count: 8 });
  });

  it('does not call delete for an unknown root', async () => {
    const { index, synchronizer } = setup();
    const remove = vi.spyOn(index, 'delete');

    await expect(synchronizer.deleteRootUrl({ rootUrl: R1 })).resolves.toEqual([]);
    expect(remove).not.toHaveBeenCalled();
  });
});
