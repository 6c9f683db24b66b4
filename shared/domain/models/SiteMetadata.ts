/**
 * Metadata describing one crawled site (a guide or a tutorial) as a whole.
 * Every record built from a page of the site carries this metadata.
 */

import { z } from 'zod';
import { MalformedMetadataError } from '../errors.js';

const siteMetadataSchema = z.object({
  /** Canonical URL prefix shared by all pages of the site */
  rootUrl: z.string().url(),

  /** Site title as plain text */
  title: z.string().min(1, 'is missing'),

  logoUrl: z.string().url().optional(),

  /** Unformatted description, usually the first content paragraph */
  description: z.string().default(''),

  /** The landing page; may differ from rootUrl, which redirects to it */
  homepageUrl: z.string().url(),

  sourceRepository: z.string().url().optional(),

  pageUrls: z.array(z.string().url()).default([]),

  /** Elevates the site in the default sorting */
  priority: z.number().int().default(0)
});

export type SiteMetadataInput = z.input<typeof siteMetadataSchema>;

export type SiteMetadata = z.output<typeof siteMetadataSchema>;

/**
 * Normalize a root URL so that it points to a directory rather than a page:
 * query and fragment are dropped, `.html` path segments are removed and the
 * path always ends with a slash.
 * @param url Absolute URL
 */
export function normalizeRootUrl(url: string): string {
  const parsed = new URL(url);
  let path = parsed.pathname
    .split('/')
    .filter(segment => !segment.endsWith('.html'))
    .join('/');
  if (!path.endsWith('/')) {
    path = `${path}/`;
  }
  parsed.pathname = path;
  parsed.search = '';
  parsed.hash = '';
  return parsed.toString();
}

/**
 * Strip query and fragment from a page URL
 */
export function stripQueryAndFragment(url: string): string {
  const parsed = new URL(url);
  parsed.search = '';
  parsed.hash = '';
  return parsed.toString();
}

/**
 * Validate raw site metadata and normalize its root URL
 * @param input Raw metadata
 * @param options Set `normalizeRoot: false` for single-page sites whose root is the page itself
 * @throws MalformedMetadataError when a field is missing or invalid
 */
export function createSiteMetadata(
  input: SiteMetadataInput,
  options: { normalizeRoot?: boolean } = {}
): SiteMetadata {
  const result = siteMetadataSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue ? issue.path.join('.') : 'metadata';
    throw new MalformedMetadataError(field, issue ? issue.message : 'is invalid');
  }

  const metadata = result.data;
  return {
    ...metadata,
    rootUrl: options.normalizeRoot === false ? stripQueryAndFragment(metadata.rootUrl) : normalizeRootUrl(metadata.rootUrl),
    pageUrls: Array.from(new Set(metadata.pageUrls))
  };
}

/**
 * The site's page URLs together with its homepage URL, deduplicated
 */
export function allPageUrls(metadata: SiteMetadata): string[] {
  return Array.from(new Set([...metadata.pageUrls, metadata.homepageUrl]));
}
