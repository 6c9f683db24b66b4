/**
 * Structured events emitted by the reducers and the index synchronizer.
 * Each component takes an observer; the default one writes the events
 * to the logger.
 */

import { ContentNotFoundError } from '../domain/errors.js';
import { Logger, getLogger } from './logging.js';

export type SyncState = 'build' | 'save' | 'sweep' | 'done' | 'failed';

export type IndexingEvent =
  | { type: 'selector-match'; url: string; selector: string }
  | { type: 'selector-miss'; url: string; warning: ContentNotFoundError }
  | { type: 'state-transition'; rootUrl: string; from: SyncState; to: SyncState }
  | { type: 'records-saved'; rootUrl: string; count: number }
  | { type: 'sweep-skipped'; rootUrl: string }
  | { type: 'sweep-count'; rootUrl: string; count: number }
  | { type: 'records-deleted'; rootUrl: string; count: number }
  | {
      type: 'consistency-mismatch';
      objectId: string;
      attribute: 'rootUrl' | 'indexEpoch';
      expected: string;
      actual: string | undefined;
    };

export interface IndexingObserver {
  onEvent(event: IndexingEvent): void;
}

/**
 * Observer that writes every event to a logger
 */
export function createLoggingObserver(logger: Logger = getLogger()): IndexingObserver {
  return {
    onEvent(event: IndexingEvent): void {
      switch (event.type) {
        case 'selector-match':
          logger.debug(`Found content using selector '${event.selector}' for ${event.url}`, 'SectionReducer');
          break;
        case 'selector-miss':
          logger.warn(`${event.warning.message}. Skipping this page.`, 'SectionReducer', event.warning.details);
          break;
        case 'state-transition':
          logger.debug(`${event.rootUrl}: ${event.from} -> ${event.to}`, 'IndexSynchronizer');
          break;
        case 'records-saved':
          logger.info(`Finished saving ${event.count} records for ${event.rootUrl}`, 'IndexSynchronizer');
          break;
        case 'sweep-skipped':
          logger.warn(`No records saved for ${event.rootUrl}; keeping records from earlier runs`, 'IndexSynchronizer');
          break;
        case 'sweep-count':
          logger.info(`Collected ${event.count} old objectIds for deletion, for ${event.rootUrl}`, 'IndexSynchronizer');
          break;
        case 'records-deleted':
          logger.info(`Deleted ${event.count} objects for ${event.rootUrl}`, 'IndexSynchronizer');
          break;
        case 'consistency-mismatch':
          logger.warn(
            `Search failure: ${event.attribute} of ${event.objectId} is ${String(event.actual)}, expected ${event.expected}`,
            'IndexSynchronizer'
          );
          break;
      }
    }
  };
}
