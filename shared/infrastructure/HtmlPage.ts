/**
 * An HTML page together with the URL it was published at.
 * Parsing is done once, on first access to the document.
 */

import fs from 'fs/promises';
import { JSDOM } from 'jsdom';

export class HtmlPage {
  private dom: JSDOM | null = null;

  /**
   * @param html Page source
   * @param url URL the page is published at; relative links resolve against it
   */
  constructor(
    readonly html: string,
    readonly url: string
  ) {}

  /**
   * Load a page from a local file
   * @param filePath Path of the HTML file
   * @param url URL where the page is published
   */
  static async fromPath(filePath: string, url: string): Promise<HtmlPage> {
    const html = await fs.readFile(filePath, 'utf8');
    return new HtmlPage(html, url);
  }

  get document(): Document {
    if (!this.dom) {
      this.dom = new JSDOM(this.html, { url: this.url });
    }
    return this.dom.window.document;
  }

  /**
   * First element matching a selector, or null
   */
  query(selector: string): Element | null {
    return this.document.querySelector(selector);
  }

  queryAll(selector: string): Element[] {
    return Array.from(this.document.querySelectorAll(selector));
  }

  /**
   * Resolve a possibly relative URL against the page URL
   */
  resolveUrl(href: string): string {
    return new URL(href, this.url).toString();
  }
}
