import fs from 'fs';
import { fileURLToPath } from 'url';
import { SearchRecord } from '../../../shared/domain/models/SearchRecord.js';
import { createSiteMetadata } from '../../../shared/domain/models/SiteMetadata.js';
import { HttpResponse, IHttpClient } from '../../../shared/infrastructure/HttpClient.js';
import { buildRecord } from '../domain/RecordBuilder.js';

export function readFixture(name: string): string {
  return fs.readFileSync(fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url)), 'utf8');
}

/**
 * Records for `count` sections of one page of a site
 */
export function makeRecords(rootUrl: string, epoch: string, count: number, page = 'page.html'): SearchRecord[] {
  const site = createSiteMetadata({ rootUrl, title: 'Test Site', homepageUrl: rootUrl });
  const url = new URL(page, rootUrl).toString();
  return Array.from({ length: count }, (_, i) =>
    buildRecord({
      section: { headingPath: ['Page', `Section ${i}`], anchor: `#s${i}`, content: `Content ${i}` },
      site,
      page: { url, title: 'Page' },
      epoch,
      contentType: 'guide'
    })
  );
}

/**
 * HTTP client serving fixed pages; other URLs answer 404
 */
export class FakeHttpClient implements IHttpClient {
  readonly requested: string[] = [];

  constructor(private readonly pages: Record<string, string>) {}

  async get(url: string): Promise<HttpResponse> {
    this.requested.push(url);
    const body = this.pages[url];
    return {
      statusCode: body === undefined ? 404 : 200,
      headers: { 'content-type': 'text/html' },
      body: body ?? 'Not found',
      finalUrl: url,
      timeTaken: 1
    };
  }
}
