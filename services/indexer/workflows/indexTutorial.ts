/**
 * Indexing of single-page tutorials
 *
 * A tutorial is a site of its own: its root URL is the page URL, so
 * re-indexing a tutorial expires only the records of earlier runs of the
 * same page.
 */

import { HtmlPage } from '../../../shared/infrastructure/HtmlPage.js';
import { IHttpClient } from '../../../shared/infrastructure/HttpClient.js';
import { IndexingObserver } from '../../../shared/infrastructure/IndexingObserver.js';
import { LibrarianConfig, getConfig } from '../../../shared/infrastructure/config.js';
import { Logger, getLogger } from '../../../shared/infrastructure/logging.js';
import { IndexSynchronizer } from '../domain/IndexSynchronizer.js';
import { iterRecords, warnOnRepeatedIds } from '../domain/RecordBuilder.js';
import { newEpoch } from '../domain/epoch.js';
import { reducePage } from '../domain/reducers/ReducerFactory.js';
import { downloadHtml } from './download.js';

export interface IndexTutorialOptions {
  synchronizer: IndexSynchronizer;

  /** Elevates the tutorial in the default sorting; defaults to the configured defaultPriority */
  priority?: number;

  /** Configuration supplying the defaults; the process configuration when omitted */
  config?: LibrarianConfig;

  observer?: IndexingObserver;

  logger?: Logger;

  signal?: AbortSignal;
}

/**
 * Index a tutorial page
 * @returns Ids of the saved records; empty when the save failed
 * @throws MalformedMetadataError when the page has no title or no valid URL
 */
export async function indexTutorial(page: HtmlPage, options: IndexTutorialOptions): Promise<string[]> {
  const logger = options.logger ?? getLogger();
  const reducer = reducePage(page, { observer: options.observer });
  const site = reducer.tutorialSiteMetadata(options.priority ?? (options.config ?? getConfig()).defaultPriority);

  const epoch = newEpoch();
  const records = Array.from(
    iterRecords(reducer.iterSections(), {
      site,
      page: { url: page.url, title: site.title },
      epoch,
      contentType: 'tutorial'
    })
  );
  logger.info(`Indexing ${records.length} records for tutorial at ${page.url} (${reducer.name})`, 'indexTutorial');
  warnOnRepeatedIds(records, page.url, logger, 'indexTutorial');

  const result = await options.synchronizer.synchronize({
    rootUrl: site.rootUrl,
    records,
    epoch,
    signal: options.signal
  });
  if (result.state === 'failed') {
    logger.logError(result.error, 'indexTutorial', `Error saving objects for tutorial ${page.url}`);
  }
  return result.savedIds;
}

/**
 * Download and index a tutorial
 */
export async function indexTutorialFromUrl(
  url: string,
  httpClient: IHttpClient,
  options: IndexTutorialOptions
): Promise<string[]> {
  const page = await downloadHtml(url, httpClient, options.signal);
  return indexTutorial(page, options);
}

/**
 * Index a tutorial from a local HTML file
 * @param filePath Path of the HTML file
 * @param url URL where the tutorial is published
 */
export async function indexTutorialFromPath(
  filePath: string,
  url: string,
  options: IndexTutorialOptions
): Promise<string[]> {
  const page = await HtmlPage.fromPath(filePath, url);
  return indexTutorial(page, options);
}

