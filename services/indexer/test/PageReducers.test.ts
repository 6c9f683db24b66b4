import { describe, expect, it } from 'vitest';
import { HtmlPage } from '../../../shared/infrastructure/HtmlPage.js';
import { recordingObserver } from '../../../shared/test/helpers.js';
import { GenericPageReducer } from '../domain/reducers/GenericPageReducer.js';
import { JupyterBookReducer } from '../domain/reducers/JupyterBookReducer.js';
import { NbCollectionTutorialReducer } from '../domain/reducers/NbCollectionTutorialReducer.js';
import { classifyPage, createReducer, reducePage } from '../domain/reducers/ReducerFactory.js';
import { SphinxTutorialReducer } from '../domain/reducers/SphinxTutorialReducer.js';
import { readFixture } from './helpers.js';

const TUTORIAL_URL = 'https://learn.example.org/tutorials/plotting.html';
const BOOK_URL = 'https://guides.example.org/demo/intro.html';

function page(html: string, url = 'https://example.org/page.html'): HtmlPage {
  return new HtmlPage(html, url);
}

describe('classifyPage', () => {
  it('recognizes Jupyter Book pages', () => {
    expect(classifyPage(page('<div id="site-title">Book</div>'))).toBe('jupyterbook');
    expect(classifyPage(page('<head><meta name="generator" content="Jupyter Book 0.12"></head>'))).toBe('jupyterbook');
    expect(classifyPage(page(readFixture('jupyterbook/intro.html')))).toBe('jupyterbook');
  });

  it('recognizes notebook tutorials', () => {
    expect(classifyPage(page(readFixture('nbcollection-tutorial.html')))).toBe('nbcollection-tutorial');
  });

  it('recognizes Sphinx tutorials', () => {
    expect(classifyPage(page(readFixture('sphinx-tutorial.html')))).toBe('sphinx-tutorial');
  });

  it('falls back to generic', () => {
    expect(classifyPage(page('<main><h1>Plain</h1><p>text</p></main>'))).toBe('generic');
  });
});

describe('createReducer', () => {
  it('maps every page kind to its reducer', () => {
    const html = page('<p>x</p>');
    expect(createReducer('jupyterbook', html)).toBeInstanceOf(JupyterBookReducer);
    expect(createReducer('nbcollection-tutorial', html)).toBeInstanceOf(NbCollectionTutorialReducer);
    expect(createReducer('sphinx-tutorial', html)).toBeInstanceOf(SphinxTutorialReducer);
    expect(createReducer('generic', html)).toBeInstanceOf(GenericPageReducer);
  });
});

describe('SphinxTutorialReducer', () => {
  const reducer = reducePage(page(readFixture('sphinx-tutorial.html'), TUTORIAL_URL), { observer: recordingObserver() });

  it('reduces the tutorial into sections', () => {
    expect(Array.from(reducer.iterSections())).toEqual([
      { headingPath: ['Plotting tutorial'], anchor: '#plotting-tutorial', content: 'Make a first plot.' },
      { headingPath: ['Plotting tutorial', 'Setup'], anchor: '#setup', content: 'Import the plotting module.' },
      { headingPath: ['Plotting tutorial', 'Styles'], anchor: '#styles', content: 'Pick a style.' }
    ]);
  });

  it('reads page metadata', () => {
    expect(reducer.name).toBe('SphinxTutorialReducer');
    expect(reducer.pageTitle).toBe('Plotting tutorial');
    expect(reducer.description).toBe('Make a first plot.');
    expect(reducer.imageUrls).toEqual(['https://learn.example.org/tutorials/_images/first-plot.png']);
  });

  it('describes the tutorial as a site rooted at the page', () => {
    expect(reducer.tutorialSiteMetadata(3)).toEqual({
      rootUrl: TUTORIAL_URL,
      title: 'Plotting tutorial',
      logoUrl: 'https://learn.example.org/tutorials/_images/first-plot.png',
      description: 'Make a first plot.',
      homepageUrl: TUTORIAL_URL,
      pageUrls: [],
      priority: 3
    });
  });
});

describe('NbCollectionTutorialReducer', () => {
  it('leaves cell prompts out of the content', () => {
    const reducer = reducePage(page(readFixture('nbcollection-tutorial.html'), TUTORIAL_URL), {
      observer: recordingObserver()
    });

    expect(reducer.name).toBe('NbCollectionTutorialReducer');
    expect(Array.from(reducer.iterSections())).toEqual([
      { headingPath: ['Fitting data'], anchor: '#Fitting-data', content: 'We fit a line. fit(x, y)' }
    ]);
  });
});

describe('GenericPageReducer', () => {
  it('ignores navigation and footers', () => {
    const reducer = reducePage(page('<body><nav>Menu</nav><h1>Title</h1><p>Body text.</p><footer>Footer</footer></body>'), {
      observer: recordingObserver()
    });

    expect(reducer.name).toBe('GenericPageReducer');
    expect(Array.from(reducer.iterSections())).toEqual([
      { headingPath: ['Title'], anchor: undefined, content: 'Body text.' }
    ]);
  });

  it('returns null for metadata the page lacks', () => {
    const reducer = new GenericPageReducer(page('<body><div>no headings</div></body>'));

    expect(reducer.pageTitle).toBeNull();
    expect(reducer.description).toBeNull();
    expect(reducer.imageUrls).toEqual([]);
  });
});

describe('JupyterBookReducer', () => {
  const reducer = createReducer('jupyterbook', page(readFixture('jupyterbook/intro.html'), BOOK_URL), {
    observer: recordingObserver()
  });

  it('reads the site metadata from the homepage', () => {
    expect(reducer.siteTitle).toBe('Demo Guide');
    expect(reducer.logoUrl).toBe('https://guides.example.org/demo/_static/logo.png');
    expect(reducer.firstParagraph).toBe('This guide shows the basics.');
    expect(reducer.githubRepository).toBe('https://github.com/example/demo-guide');
    expect(reducer.pageUrls).toEqual([
      'https://guides.example.org/demo/basics.html',
      'https://guides.example.org/demo/advanced.html'
    ]);
    expect(reducer.imageUrls).toEqual(['https://guides.example.org/demo/images/figure.png']);
  });

  it('builds the metadata of the book', () => {
    expect(reducer.siteMetadata({ rootUrl: 'https://guides.example.org/demo/', priority: 1 })).toEqual({
      rootUrl: 'https://guides.example.org/demo/',
      title: 'Demo Guide',
      logoUrl: 'https://guides.example.org/demo/_static/logo.png',
      description: 'This guide shows the basics.',
      homepageUrl: BOOK_URL,
      sourceRepository: 'https://github.com/example/demo-guide',
      pageUrls: ['https://guides.example.org/demo/basics.html', 'https://guides.example.org/demo/advanced.html'],
      priority: 1
    });
  });

  it('takes the page title from the content, not the site logo', () => {
    expect(reducer.pageTitle).toBe('Welcome');
  });

  it('reduces the page into sections', () => {
    expect(Array.from(reducer.iterSections())).toEqual([
      { headingPath: ['Welcome'], anchor: '#welcome', content: 'This guide shows the basics.' },
      { headingPath: ['Welcome', 'Audience'], anchor: '#audience', content: 'Anyone learning the tools.' }
    ]);
  });

  it('returns null lookups on a page without the book chrome', () => {
    const bare = createReducer('jupyterbook', page('<main><h1>Only</h1><p>text</p></main>'));

    expect(bare.siteTitle).toBeNull();
    expect(bare.logoUrl).toBeNull();
    expect(bare.githubRepository).toBeNull();
    expect(bare.pageUrls).toEqual([]);
  });

  it('rejects a homepage without a site title', () => {
    const bare = createReducer('jupyterbook', page('<main><h1>Only</h1><p>text</p></main>'));

    expect(() => bare.siteMetadata({ rootUrl: 'https://example.org/', priority: 0 })).toThrow(
      "Malformed metadata: 'title' is missing"
    );
  });
});
