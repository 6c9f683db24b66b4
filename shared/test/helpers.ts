import { SearchRecord } from '../domain/models/SearchRecord.js';
import { IndexingEvent, IndexingObserver } from '../infrastructure/IndexingObserver.js';
import { LogLevel, Logger } from '../infrastructure/logging.js';

/**
 * Logger that keeps its lines in memory
 */
export function memoryLogger(minLevel: LogLevel = LogLevel.DEBUG): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = new Logger(
    { minLevel, logFile: 'test.log', maxFileSize: 1024, maxFiles: 1 },
    line => {
      lines.push(line);
    }
  );
  return { logger, lines };
}

export function recordingObserver(): IndexingObserver & { events: IndexingEvent[] } {
  const events: IndexingEvent[] = [];
  return {
    events,
    onEvent(event: IndexingEvent): void {
      events.push(event);
    }
  };
}

/**
 * A minimal search record
 */
export function sampleRecord(objectId: string, rootUrl = 'https://example.org/', indexEpoch = 'e1'): SearchRecord {
  return {
    objectId,
    rootUrl,
    indexEpoch,
    priority: 0,
    contentType: 'guide',
    url: `${rootUrl}page.html#${objectId}`,
    pageTitle: 'Page',
    siteTitle: 'Site',
    homepageUrl: rootUrl,
    headingPath: ['Page'],
    anchor: `#${objectId}`,
    content: `Content of ${objectId}`
  };
}
