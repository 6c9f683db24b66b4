/**
 * Record builder
 *
 * Turns reduced sections into search records, denormalizing the site and
 * page metadata into each record.
 */

import { v5 as uuidv5 } from 'uuid';
import { MalformedMetadataError } from '../../../shared/domain/errors.js';
import { ContentType, IndexEpoch, SearchRecord } from '../../../shared/domain/models/SearchRecord.js';
import { Section } from '../../../shared/domain/models/Section.js';
import { SiteMetadata } from '../../../shared/domain/models/SiteMetadata.js';
import { Logger } from '../../../shared/infrastructure/logging.js';

/** RFC 4122 namespace for URL names */
const URL_NAMESPACE = '6ba7b811-9dad-11d1-80b4-00c04fd430c8';

export interface PageInfo {
  url: string;
  title: string;
}

export interface BuildRecordInput {
  section: Section;
  site: SiteMetadata;
  page: PageInfo;
  epoch: IndexEpoch;
  contentType: ContentType;
}

/**
 * Compute the id of the record for a section. The same URL and anchor give
 * the same id in every process, and the id is a valid UUID.
 * @param resolvedUrl Section URL, anchor included
 * @param anchor Section anchor, if any
 */
export function computeObjectId(resolvedUrl: string, anchor?: string): string {
  return uuidv5(`${resolvedUrl}\u0000${anchor ?? ''}`, URL_NAMESPACE);
}

function requireAbsoluteUrl(field: string, value: string | undefined): string {
  if (!value) {
    throw new MalformedMetadataError(field, 'is missing');
  }
  if (!URL.canParse(value)) {
    throw new MalformedMetadataError(field, 'is not an absolute URL', { value });
  }
  return value;
}

/**
 * Build the search record of one section
 * @throws MalformedMetadataError when the root, homepage or page URL is missing or not absolute
 */
export function buildRecord({ section, site, page, epoch, contentType }: BuildRecordInput): SearchRecord {
  const rootUrl = requireAbsoluteUrl('rootUrl', site.rootUrl);
  const homepageUrl = requireAbsoluteUrl('homepageUrl', site.homepageUrl);
  const pageUrl = requireAbsoluteUrl('url', page.url);

  const url = new URL(section.anchor ?? '', pageUrl).toString();

  return {
    objectId: computeObjectId(url, section.anchor),
    rootUrl,
    indexEpoch: epoch,
    priority: site.priority,
    contentType,
    url,
    pageTitle: page.title,
    siteTitle: site.title,
    logoUrl: site.logoUrl,
    description: site.description || undefined,
    sourceRepository: site.sourceRepository,
    homepageUrl,
    headingPath: [...section.headingPath],
    anchor: section.anchor,
    content: section.content
  };
}

/**
 * Lazily build records for a sequence of sections
 */
export function* iterRecords(
  sections: Iterable<Section>,
  context: Omit<BuildRecordInput, 'section'>
): Generator<SearchRecord> {
  for (const section of sections) {
    yield buildRecord({ ...context, section });
  }
}

/**
 * Ids that more than one record of a batch carries, such as the shared id of
 * the anchorless sections of a page. Only the last of them survives an upsert.
 */
export function repeatedObjectIds(records: Iterable<SearchRecord>): string[] {
  const seen = new Set<string>();
  const repeated = new Set<string>();
  for (const record of records) {
    if (seen.has(record.objectId)) {
      repeated.add(record.objectId);
    }
    seen.add(record.objectId);
  }
  return Array.from(repeated);
}

/**
 * Warn about records of a batch that an upsert would overwrite with a later
 * record of the same batch
 */
export function warnOnRepeatedIds(records: SearchRecord[], url: string, logger: Logger, context: string): void {
  const repeated = repeatedObjectIds(records);
  if (repeated.length > 0) {
    logger.warn(
      `${repeated.length} objectIds of ${url} are shared by several sections; only the last of each is kept`,
      context,
      { objectIds: repeated }
    );
  }
}
