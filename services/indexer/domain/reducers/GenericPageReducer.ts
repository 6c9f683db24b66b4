/**
 * Fallback reducer for pages of no recognized generator
 */

import { BasePageReducer } from './PageReducer.js';

export class GenericPageReducer extends BasePageReducer {
  readonly name = 'GenericPageReducer';

  protected readonly contentSelectors = ['main', 'article', '[role="main"]', 'body'];

  protected readonly ignoreSelectors = ['nav', 'header', 'footer', 'aside'];
}
