/**
 * Reducer for single-page tutorials rendered from notebooks by nbcollection
 */

import { BasePageReducer } from './PageReducer.js';

export class NbCollectionTutorialReducer extends BasePageReducer {
  readonly name = 'NbCollectionTutorialReducer';

  protected readonly contentSelectors = ['.jp-Notebook', 'main', 'body'];

  // Cell prompts such as "In [3]:" are not content
  protected readonly ignoreSelectors = ['.jp-InputPrompt', '.jp-OutputPrompt', 'a.anchor-link'];
}
