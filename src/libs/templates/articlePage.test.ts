import { describe, it, expect } from 'vitest';
import { renderHtmlPage, type ArticlePageContext } from './articlePage';

const page = (overrides: Partial<ArticlePageContext> = {}) =>
  renderHtmlPage({
    topic: 'The Moon',
    category: 'history',
    categoryName: 'History',
    content: '<h1>The Moon</h1>\n<p>Old &amp; bright.</p>',
    metaDescription: 'A short history of the Moon.',
    ...overrides
  });

describe('renderHtmlPage', () => {
  it('renders a complete document', () => {
    const html = page();

    expect(html.startsWith('<!DOCTYPE html>\n<html lang="en">')).toBe(true);
    expect(html).toContain('<title>The Moon - History</title>');
    expect(html).toContain('<meta name="description" content="A short history of the Moon.">');
    expect(html).toContain('<meta property="og:title" content="The Moon - History">');
    expect(html).toContain('<span class="category category-history">History</span>');
    expect(html.trimEnd().endsWith('</html>')).toBe(true);
  });

  it('inserts the article content without escaping', () => {
    expect(page()).toContain('<article>\n<h1>The Moon</h1>\n<p>Old &amp; bright.</p>\n    </article>');
  });

  it('escapes the text fields', () => {
    const html = page({ topic: 'Tom & Jerry <3', metaDescription: 'Say "hi"' });

    expect(html).toContain('<title>Tom &amp; Jerry &lt;3 - History</title>');
    expect(html).toContain('<meta name="description" content="Say &quot;hi&quot;">');
  });
});
