/**
 * docs-librarian: reduces documentation sites into search records and keeps
 * a search index in sync with them.
 */

export * from './shared/domain/errors.js';
export * from './shared/domain/models/Section.js';
export * from './shared/domain/models/SearchRecord.js';
export * from './shared/domain/models/SiteMetadata.js';
export * from './shared/domain/repositories/IndexService.js';
export * from './shared/infrastructure/HtmlPage.js';
export * from './shared/infrastructure/HttpClient.js';
export * from './shared/infrastructure/IndexingObserver.js';
export * from './shared/infrastructure/abort.js';
export * from './shared/infrastructure/config.js';
export * from './shared/infrastructure/logging.js';
export * from './shared/infrastructure/repositories/BrowseCursor.js';
export * from './shared/infrastructure/repositories/InMemoryIndexService.js';
export * from './shared/infrastructure/repositories/QdrantIndexService.js';
export * from './services/indexer/domain/IndexSynchronizer.js';
export * from './services/indexer/domain/RecordBuilder.js';
export * from './services/indexer/domain/epoch.js';
export * from './services/indexer/domain/reducers/SectionReducer.js';
export * from './services/indexer/domain/reducers/PageReducer.js';
export * from './services/indexer/domain/reducers/ReducerFactory.js';
export * from './services/indexer/domain/reducers/JupyterBookReducer.js';
export * from './services/indexer/domain/reducers/SphinxTutorialReducer.js';
export * from './services/indexer/domain/reducers/NbCollectionTutorialReducer.js';
export * from './services/indexer/domain/reducers/GenericPageReducer.js';
export * from './services/indexer/workflows/download.js';
export * from './services/indexer/workflows/indexTutorial.js';
export * from './services/indexer/workflows/indexJupyterBook.js';
export * from './services/indexer/infrastructure/IndexerServiceProvider.js';
