/**
 * IndexerServiceProvider
 *
 * Creates the index service, the synchronizer and the HTTP client the
 * indexing workflows need, configured from the librarian configuration.
 */

import { IndexService } from '../../../shared/domain/repositories/IndexService.js';
import { HttpClient, IHttpClient } from '../../../shared/infrastructure/HttpClient.js';
import { LibrarianConfig, getConfig } from '../../../shared/infrastructure/config.js';
import { Logger, getLogger } from '../../../shared/infrastructure/logging.js';
import { InMemoryIndexService } from '../../../shared/infrastructure/repositories/InMemoryIndexService.js';
import { QdrantIndexService } from '../../../shared/infrastructure/repositories/QdrantIndexService.js';
import { IndexSynchronizer } from '../domain/IndexSynchronizer.js';

export interface IndexerServices {
  index: IndexService;
  synchronizer: IndexSynchronizer;
  httpClient: IHttpClient;
  config: LibrarianConfig;
}

export interface CreateServicesOptions {
  config?: LibrarianConfig;

  /** Keep records in memory instead of writing to Qdrant */
  dryRun?: boolean;

  logger?: Logger;
}

export class IndexerServiceProvider {
  /**
   * Create the services of the indexer
   */
  public static createServices(options: CreateServicesOptions = {}): IndexerServices {
    const config = options.config ?? getConfig();
    const logger = options.logger ?? getLogger();

    logger.info(
      options.dryRun ? 'Creating indexer services with an in-memory index...' : 'Creating indexer services...',
      'IndexerServiceProvider'
    );

    const index: IndexService = options.dryRun
      ? new InMemoryIndexService()
      : new QdrantIndexService(config.index.qdrantUrl, config.index.collectionName, logger);

    const synchronizer = new IndexSynchronizer(index, {
      logger,
      callTimeoutMs: config.index.callTimeoutMs,
      browsePageSize: config.index.browsePageSize
    });

    const httpClient = new HttpClient({
      timeout: config.http.timeoutMs,
      retries: config.http.retries,
      retryDelay: config.http.retryDelayMs,
      userAgent: config.http.userAgent,
      rateLimit: config.http.rateLimit
    });

    return { index, synchronizer, httpClient, config };
  }
}
