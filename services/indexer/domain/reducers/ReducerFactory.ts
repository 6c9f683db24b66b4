/**
 * Page classification and reducer selection
 *
 * A page is classified once by structural inspection into a PageKind, and
 * each kind maps to exactly one reducer.
 */

import { HtmlPage } from '../../../../shared/infrastructure/HtmlPage.js';
import { GenericPageReducer } from './GenericPageReducer.js';
import { JupyterBookReducer } from './JupyterBookReducer.js';
import { NbCollectionTutorialReducer } from './NbCollectionTutorialReducer.js';
import { PageReducer, PageReducerOptions } from './PageReducer.js';
import { SphinxTutorialReducer } from './SphinxTutorialReducer.js';

export type PageKind = 'jupyterbook' | 'nbcollection-tutorial' | 'sphinx-tutorial' | 'generic';

/**
 * Classify a page by the markup its generator leaves behind
 */
export function classifyPage(page: HtmlPage): PageKind {
  const generator = page.query('meta[name="generator"]')?.getAttribute('content') ?? '';
  if (page.query('#site-title') || page.query('nav#bd-docs-nav') || /jupyter.?book/i.test(generator)) {
    return 'jupyterbook';
  }
  if (page.query('.jp-Notebook') || page.query('.jp-Cell')) {
    return 'nbcollection-tutorial';
  }
  if (page.query('.section a.headerlink') || page.query('section a.headerlink')) {
    return 'sphinx-tutorial';
  }
  return 'generic';
}

export function createReducer(kind: 'jupyterbook', page: HtmlPage, options?: PageReducerOptions): JupyterBookReducer;
export function createReducer(kind: PageKind, page: HtmlPage, options?: PageReducerOptions): PageReducer;
export function createReducer(kind: PageKind, page: HtmlPage, options: PageReducerOptions = {}): PageReducer {
  switch (kind) {
    case 'jupyterbook':
      return new JupyterBookReducer(page, options);
    case 'nbcollection-tutorial':
      return new NbCollectionTutorialReducer(page, options);
    case 'sphinx-tutorial':
      return new SphinxTutorialReducer(page, options);
    case 'generic':
      return new GenericPageReducer(page, options);
    default: {
      const unknownKind: never = kind;
      throw new Error(`Unknown page kind: ${String(unknownKind)}`);
    }
  }
}

/**
 * Classify a page and create its reducer
 */
export function reducePage(page: HtmlPage, options: PageReducerOptions = {}): PageReducer {
  return createReducer(classifyPage(page), page, options);
}
