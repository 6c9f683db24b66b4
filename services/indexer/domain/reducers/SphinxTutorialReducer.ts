/**
 * Reducer for single-page tutorials built with Sphinx
 */

import { BasePageReducer } from './PageReducer.js';

export class SphinxTutorialReducer extends BasePageReducer {
  readonly name = 'SphinxTutorialReducer';

  protected readonly contentSelectors = [
    'div.body .section',
    'div.body section',
    '[role="main"] .section',
    '[role="main"] section',
    '.section',
    'section',
    'div.body'
  ];

  protected readonly ignoreSelectors = ['a.headerlink', 'div.sphinxsidebar', 'div.related'];
}
