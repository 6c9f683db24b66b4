/**
 * Section reducer
 *
 * Walks the content root of an HTML page and splits it into heading-scoped
 * sections. The content root is the first element matched by an ordered
 * list of selectors, so that one reducer copes with the markup of several
 * versions of a site generator.
 */

import { ContentNotFoundError } from '../../../../shared/domain/errors.js';
import { Section } from '../../../../shared/domain/models/Section.js';
import { HtmlPage } from '../../../../shared/infrastructure/HtmlPage.js';
import { IndexingObserver, createLoggingObserver } from '../../../../shared/infrastructure/IndexingObserver.js';

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;

const HEADING_TAG = /^H([1-6])$/;

const SKIPPED_TAGS = new Set(['SCRIPT', 'STYLE', 'NOSCRIPT', 'TEMPLATE']);

// Text of adjacent block elements is separated by a line break
const BLOCK_TAGS = new Set([
  'ADDRESS', 'ARTICLE', 'ASIDE', 'BLOCKQUOTE', 'DD', 'DIV', 'DL', 'DT', 'FIGCAPTION', 'FIGURE',
  'FOOTER', 'HEADER', 'HR', 'LI', 'MAIN', 'NAV', 'OL', 'P', 'PRE', 'SECTION', 'TABLE', 'TD',
  'TH', 'TR', 'UL'
]);

/**
 * Options for the section reducer
 */
export interface SectionReducerOptions {
  /** Selectors tried in order to find the content root; the first match wins */
  contentSelectors: readonly string[];

  /** Elements matching these selectors are skipped along with their subtree */
  ignoreSelectors?: readonly string[];

  /** Cleans a heading's text into its title */
  headingCleaner?: (text: string) => string;

  observer?: IndexingObserver;
}

/**
 * Clean extracted text: literal `\n` sequences, newlines and backslashes
 * become spaces, whitespace runs collapse and the ends are trimmed.
 */
export function cleanContent(text: string): string {
  return text
    .replace(/\\n/g, ' ')
    .replace(/\n/g, ' ')
    .replace(/\\/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Clean a heading, dropping the trailing pilcrow of permalink anchors
 */
export function cleanHeading(text: string): string {
  return cleanContent(text).replace(/\s*¶+$/, '');
}

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function headingLevel(element: Element): number | null {
  const match = HEADING_TAG.exec(element.tagName);
  return match ? Number(match[1]) : null;
}

interface OpenHeading {
  level: number;
  title: string;
}

/**
 * Mutable state of one traversal
 */
class TraversalState {
  private readonly stack: OpenHeading[] = [];
  private buffer: string[] = [];
  private anchor: string | undefined;
  private pendingAnchor: string | undefined;

  appendText(text: string): void {
    if (text.trim()) {
      this.pendingAnchor = undefined;
    }
    if (this.stack.length > 0) {
      this.buffer.push(text);
    }
  }

  appendBreak(): void {
    if (this.stack.length > 0) {
      this.buffer.push('\n');
    }
  }

  /**
   * An id-bearing element: anchors the open section unless one is already
   * set since its heading, and the next heading unless text comes first
   */
  noteAnchor(anchor: string): void {
    if (this.stack.length > 0 && !this.anchor) {
      this.anchor = anchor;
    }
    this.pendingAnchor = anchor;
  }

  openHeading(level: number, title: string, ownAnchor: string | undefined): void {
    while (this.stack.length > 0 && this.stack[this.stack.length - 1].level >= level) {
      this.stack.pop();
    }
    this.stack.push({ level, title });
    this.anchor = ownAnchor ?? this.pendingAnchor;
    this.pendingAnchor = undefined;
    this.buffer = [];
  }

  /**
   * Close the open section. Returns null when there is no heading open or
   * the section has no content.
   */
  flush(): Section | null {
    const content = cleanContent(this.buffer.join(''));
    this.buffer = [];
    if (this.stack.length === 0 || !content) {
      return null;
    }
    return {
      headingPath: this.stack.map(heading => heading.title),
      anchor: this.anchor,
      content
    };
  }
}

export class SectionReducer {
  private readonly observer: IndexingObserver;
  private readonly headingCleaner: (text: string) => string;

  constructor(
    private readonly page: HtmlPage,
    private readonly options: SectionReducerOptions
  ) {
    this.observer = options.observer ?? createLoggingObserver();
    this.headingCleaner = options.headingCleaner ?? cleanHeading;
  }

  /**
   * Find the content root: the first element of the first selector
   * that matches anything
   */
  findContentRoot(): { element: Element; selector: string } | null {
    for (const selector of this.options.contentSelectors) {
      const element = this.page.query(selector);
      if (element) {
        return { element, selector };
      }
    }
    return null;
  }

  /**
   * Iterate through the sections of the page in document order.
   * Yields nothing, and reports a selector miss, when no content root is found.
   */
  *iterSections(): Generator<Section> {
    const root = this.findContentRoot();
    if (!root) {
      this.observer.onEvent({
        type: 'selector-miss',
        url: this.page.url,
        warning: new ContentNotFoundError(this.page.url, this.options.contentSelectors)
      });
      return;
    }
    this.observer.onEvent({ type: 'selector-match', url: this.page.url, selector: root.selector });

    const state = new TraversalState();
    const rootId = root.element.getAttribute('id');
    if (rootId) {
      state.noteAnchor(`#${rootId}`);
    }

    yield* this.walk(root.element, state);

    const last = state.flush();
    if (last) {
      yield last;
    }
  }

  private *walk(node: Node, state: TraversalState): Generator<Section> {
    for (const child of Array.from(node.childNodes)) {
      if (child.nodeType === TEXT_NODE) {
        state.appendText(child.textContent ?? '');
        continue;
      }
      if (!isElement(child) || this.isSkipped(child)) {
        continue;
      }

      const level = headingLevel(child);
      if (level !== null) {
        const section = state.flush();
        if (section) {
          yield section;
        }
        state.openHeading(level, this.headingCleaner(child.textContent ?? ''), this.headingAnchor(child));
        continue;
      }

      if (child.tagName === 'BR') {
        state.appendBreak();
        continue;
      }

      const id = child.getAttribute('id');
      if (id) {
        state.noteAnchor(`#${id}`);
      }

      const isBlock = BLOCK_TAGS.has(child.tagName);
      if (isBlock) {
        state.appendBreak();
      }
      yield* this.walk(child, state);
      if (isBlock) {
        state.appendBreak();
      }
    }
  }

  private isSkipped(element: Element): boolean {
    if (SKIPPED_TAGS.has(element.tagName)) {
      return true;
    }
    return (this.options.ignoreSelectors ?? []).some(selector => element.matches(selector));
  }

  // The heading's own id, else a permalink inside it
  private headingAnchor(heading: Element): string | undefined {
    const id = heading.getAttribute('id');
    if (id) {
      return `#${id}`;
    }
    const permalink = heading.querySelector('a[href^="#"]')?.getAttribute('href');
    return permalink && permalink.length > 1 ? permalink : undefined;
  }
}
