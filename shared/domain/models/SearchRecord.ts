/**
 * Search record: the unit stored in the remote search index
 */

/** Opaque token minted once per crawl run */
export type IndexEpoch = string;

export type ContentType = 'guide' | 'tutorial';

export interface SearchRecord {
  /** Deterministic identifier derived from the section URL and anchor */
  objectId: string;

  /** Root URL of the site; partition key for sweeps and deletions */
  rootUrl: string;

  /** Epoch of the crawl run that produced this record */
  indexEpoch: IndexEpoch;

  /** Elevates the record in the default sorting */
  priority: number;

  contentType: ContentType;

  /** Fully-qualified URL of the section (page URL plus anchor) */
  url: string;

  pageTitle: string;

  siteTitle: string;

  logoUrl?: string;

  description?: string;

  sourceRepository?: string;

  homepageUrl: string;

  headingPath: string[];

  anchor?: string;

  content: string;
}

/** Attributes a browse or a filter can address */
export type RecordAttribute = keyof SearchRecord;

/**
 * A record as returned by a browse: the id plus whichever attributes
 * were requested
 */
export type BrowsedRecord = Pick<SearchRecord, 'objectId'> & Partial<Omit<SearchRecord, 'objectId'>>;
