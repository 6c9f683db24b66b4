/**
 * Reducer for pages of a Jupyter Book guide
 */

import { SiteMetadata, createSiteMetadata } from '../../../../shared/domain/models/SiteMetadata.js';
import { BasePageReducer } from './PageReducer.js';

export class JupyterBookReducer extends BasePageReducer {
  readonly name = 'JupyterBookReducer';

  // Older and newer Jupyter Book themes wrap the content differently
  protected readonly contentSelectors = [
    '#main-content .section',
    '#main-content',
    '.main-content .section',
    '.main-content',
    'main .section',
    'main',
    '.section',
    'article'
  ];

  /** The site's title (`#site-title`) */
  get siteTitle(): string | null {
    return this.text('#site-title');
  }

  /** The site's logo (`img.logo`), resolved against the page URL */
  get logoUrl(): string | null {
    const src = this.page.query('img.logo')?.getAttribute('src');
    return src ? this.page.resolveUrl(src) : null;
  }

  /** Cleaned text of the first paragraph of `#main-content` */
  get firstParagraph(): string | null {
    return this.text('#main-content p');
  }

  /** First GitHub link in the navigation */
  get githubRepository(): string | null {
    for (const link of this.page.queryAll('nav a.external')) {
      const href = link.getAttribute('href');
      if (href && href.startsWith('https://github.com')) {
        return href;
      }
    }
    return null;
  }

  /**
   * URLs of all pages of the book, from the docs navigation.
   * The `#` link to the current page is skipped.
   */
  get pageUrls(): string[] {
    const urls: string[] = [];
    for (const link of this.page.queryAll('nav#bd-docs-nav a.internal')) {
      const href = link.getAttribute('href');
      if (href && href !== '#') {
        urls.push(this.page.resolveUrl(href));
      }
    }
    return urls;
  }

  override get imageUrls(): string[] {
    const urls: string[] = [];
    for (const img of this.page.queryAll('#main-content img')) {
      const src = img.getAttribute('src');
      if (src) {
        urls.push(this.page.resolveUrl(src));
      }
    }
    return urls;
  }

  override get description(): string | null {
    return this.firstParagraph ?? super.description;
  }

  /**
   * Metadata of the whole book, read from its homepage
   * @param rootUrl URL the book was requested at, before any redirect
   * @throws MalformedMetadataError when the homepage has no site title
   */
  siteMetadata({ rootUrl, priority }: { rootUrl: string; priority: number }): SiteMetadata {
    return createSiteMetadata({
      rootUrl,
      title: this.siteTitle ?? '',
      logoUrl: this.logoUrl ?? undefined,
      description: this.description ?? '',
      homepageUrl: this.page.url,
      sourceRepository: this.githubRepository ?? undefined,
      pageUrls: this.pageUrls,
      priority
    });
  }
}
