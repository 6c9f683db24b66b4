/**
 * Indexing of Jupyter Book guides
 *
 * The book's homepage lists every page in its navigation. All pages are
 * downloaded and reduced, and their records are saved under one epoch, so
 * that pages dropped from the book since the last run are expired.
 */

import { isLibrarianError } from '../../../shared/domain/errors.js';
import { SearchRecord } from '../../../shared/domain/models/SearchRecord.js';
import { SiteMetadata, allPageUrls, normalizeRootUrl } from '../../../shared/domain/models/SiteMetadata.js';
import { HtmlPage } from '../../../shared/infrastructure/HtmlPage.js';
import { IHttpClient } from '../../../shared/infrastructure/HttpClient.js';
import { IndexingObserver } from '../../../shared/infrastructure/IndexingObserver.js';
import { LibrarianConfig, getConfig } from '../../../shared/infrastructure/config.js';
import { Logger, getLogger } from '../../../shared/infrastructure/logging.js';
import { IndexSynchronizer } from '../domain/IndexSynchronizer.js';
import { iterRecords, warnOnRepeatedIds } from '../domain/RecordBuilder.js';
import { newEpoch } from '../domain/epoch.js';
import { JupyterBookReducer } from '../domain/reducers/JupyterBookReducer.js';
import { createReducer } from '../domain/reducers/ReducerFactory.js';
import { downloadHtml } from './download.js';

const REFRESH_URL = /url\s*=\s*['"]?([^'";]+)/i;

export interface IndexJupyterBookOptions {
  /** Root URL of the book; it may redirect to the homepage */
  url: string;

  httpClient: IHttpClient;

  synchronizer: IndexSynchronizer;

  /** Elevates the guide in the default sorting; defaults to the configured defaultPriority */
  priority?: number;

  /** Maximum number of pages downloaded at once; defaults to the configured maxConcurrentRequests */
  maxConcurrentRequests?: number;

  /** Configuration supplying the defaults; the process configuration when omitted */
  config?: LibrarianConfig;

  observer?: IndexingObserver;

  logger?: Logger;

  signal?: AbortSignal;
}

/**
 * Index every page of a Jupyter Book
 * @returns Ids of the saved records; empty when the save failed
 * @throws DownloadError when the root page or the homepage cannot be downloaded
 * @throws MalformedMetadataError when the homepage lacks the site metadata
 */
export async function indexJupyterBook(options: IndexJupyterBookOptions): Promise<string[]> {
  const logger = options.logger ?? getLogger();
  const { httpClient, signal } = options;
  const priority = options.priority ?? (options.config ?? getConfig()).defaultPriority;
  const maxConcurrentRequests = options.maxConcurrentRequests ?? (options.config ?? getConfig()).maxConcurrentRequests;

  const rootPage = await downloadHtml(options.url, httpClient, signal);
  const homepage = await followRefresh(rootPage, httpClient, signal);
  logger.debug(`Homepage of ${options.url} is ${homepage.url}`, 'indexJupyterBook');

  const homepageReducer = createReducer('jupyterbook', homepage, { observer: options.observer });
  const site = homepageReducer.siteMetadata({
    rootUrl: normalizeRootUrl(options.url),
    priority
  });

  const pageUrls = allPageUrls(site);
  logger.info(`Indexing ${pageUrls.length} pages of ${site.title} at ${site.rootUrl}`, 'indexJupyterBook');

  const pages = await mapWithConcurrency(pageUrls, maxConcurrentRequests, async pageUrl => {
    if (pageUrl === homepage.url) {
      return homepage;
    }
    try {
      return await downloadHtml(pageUrl, httpClient, signal);
    } catch (error: unknown) {
      signal?.throwIfAborted();
      logger.warn(`Skipping page ${pageUrl}: download failed`, 'indexJupyterBook', error);
      return null;
    }
  });

  const epoch = newEpoch();
  const records: SearchRecord[] = [];
  for (const page of pages) {
    if (page) {
      records.push(...reduceBookPage(page, site, epoch, options.observer, logger));
    }
  }

  warnOnRepeatedIds(records, site.rootUrl, logger, 'indexJupyterBook');

  const result = await options.synchronizer.synchronize({ rootUrl: site.rootUrl, records, epoch, signal });
  if (result.state === 'failed') {
    logger.logError(result.error, 'indexJupyterBook', `Error saving objects for guide ${site.rootUrl}`);
  }
  return result.savedIds;
}

function reduceBookPage(
  page: HtmlPage,
  site: SiteMetadata,
  epoch: string,
  observer: IndexingObserver | undefined,
  logger: Logger
): SearchRecord[] {
  const reducer: JupyterBookReducer = createReducer('jupyterbook', page, { observer });
  try {
    return Array.from(
      iterRecords(reducer.iterSections(), {
        site,
        page: { url: page.url, title: reducer.pageTitle ?? site.title },
        epoch,
        contentType: 'guide'
      })
    );
  } catch (error: unknown) {
    if (isLibrarianError(error) && error.errorCode === 'MALFORMED_METADATA') {
      logger.warn(`Skipping page ${page.url}: ${error.message}`, 'indexJupyterBook', error.details);
      return [];
    }
    throw error;
  }
}

/**
 * Follow a `<meta http-equiv="refresh">` redirect, as Jupyter Book emits on
 * its root index page
 */
async function followRefresh(page: HtmlPage, httpClient: IHttpClient, signal?: AbortSignal): Promise<HtmlPage> {
  const refresh = page
    .queryAll('meta[http-equiv]')
    .find(meta => meta.getAttribute('http-equiv')?.toLowerCase() === 'refresh');
  const match = REFRESH_URL.exec(refresh?.getAttribute('content') ?? '');
  if (!match) {
    return page;
  }
  const target = page.resolveUrl(match[1].trim());
  return target === page.url ? page : downloadHtml(target, httpClient, signal);
}

/**
 * Map items with at most `limit` calls in progress, keeping the input order
 */
async function mapWithConcurrency<T, R>(items: T[], limit: number, fn: (item: T) => Promise<R>): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index]);
    }
  };

  await Promise.all(Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, worker));
  return results;
}
