/**
 * Page reducer interface and base class
 *
 * A page reducer knows the markup of one kind of documentation page: where
 * its content lives, which parts to ignore and where to find page-level
 * metadata. Metadata lookups return null (or an empty list) when the page
 * lacks the element, they never throw.
 */

import { Section } from '../../../../shared/domain/models/Section.js';
import { SiteMetadata, createSiteMetadata } from '../../../../shared/domain/models/SiteMetadata.js';
import { HtmlPage } from '../../../../shared/infrastructure/HtmlPage.js';
import { IndexingObserver } from '../../../../shared/infrastructure/IndexingObserver.js';
import { SectionReducer, cleanContent, cleanHeading } from './SectionReducer.js';

/**
 * Options shared by all page reducers
 */
export interface PageReducerOptions {
  observer?: IndexingObserver;
}

/**
 * Page reducer interface
 */
export interface PageReducer {
  /** Reducer name, for logs */
  readonly name: string;

  readonly page: HtmlPage;

  /**
   * Sections of the page in document order
   */
  iterSections(): Generator<Section>;

  /** Title of the page, or null when it has none */
  readonly pageTitle: string | null;

  /** First content paragraph or the meta description */
  readonly description: string | null;

  /** Absolute URLs of the images in the content */
  readonly imageUrls: string[];

  /**
   * Metadata for a page that is a site of its own (a tutorial)
   * @throws MalformedMetadataError when the page has no title
   */
  tutorialSiteMetadata(priority: number): SiteMetadata;
}

/**
 * Base page reducer with the lookups common to all page kinds
 */
export abstract class BasePageReducer implements PageReducer {
  abstract readonly name: string;

  /** Content root selectors, most specific first */
  protected abstract readonly contentSelectors: readonly string[];

  protected readonly ignoreSelectors: readonly string[] = [];

  constructor(
    readonly page: HtmlPage,
    protected readonly options: PageReducerOptions = {}
  ) {}

  iterSections(): Generator<Section> {
    const reducer = new SectionReducer(this.page, {
      contentSelectors: this.contentSelectors,
      ignoreSelectors: this.ignoreSelectors,
      headingCleaner: cleanHeading,
      observer: this.options.observer
    });
    return reducer.iterSections();
  }

  get pageTitle(): string | null {
    const h1 = this.contentElement?.querySelector('h1') ?? this.page.query('h1');
    const title = h1 ? cleanHeading(h1.textContent ?? '') : '';
    if (title) {
      return title;
    }
    const fallback = cleanContent(this.page.document.title);
    return fallback || null;
  }

  get description(): string | null {
    const paragraph = this.contentElement?.querySelector('p');
    const text = paragraph ? cleanContent(paragraph.textContent ?? '') : '';
    if (text) {
      return text;
    }
    const meta = this.page.query('meta[name="description"]')?.getAttribute('content');
    return meta ? cleanContent(meta) : null;
  }

  get imageUrls(): string[] {
    const root = this.contentElement;
    if (!root) {
      return [];
    }
    const urls: string[] = [];
    for (const img of Array.from(root.querySelectorAll('img[src]'))) {
      const src = img.getAttribute('src');
      if (src) {
        urls.push(this.page.resolveUrl(src));
      }
    }
    return urls;
  }

  tutorialSiteMetadata(priority: number): SiteMetadata {
    return createSiteMetadata(
      {
        rootUrl: this.page.url,
        title: this.pageTitle ?? '',
        description: this.description ?? '',
        homepageUrl: this.page.url,
        logoUrl: this.imageUrls[0],
        priority
      },
      { normalizeRoot: false }
    );
  }

  /**
   * First element matching the content selectors, or null
   */
  protected get contentElement(): Element | null {
    for (const selector of this.contentSelectors) {
      const element = this.page.query(selector);
      if (element) {
        return element;
      }
    }
    return null;
  }

  protected text(selector: string): string | null {
    const element = this.page.query(selector);
    const text = element ? cleanContent(element.textContent ?? '') : '';
    return text || null;
  }
}
