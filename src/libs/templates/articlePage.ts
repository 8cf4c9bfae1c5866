import Handlebars from 'handlebars';

export interface ArticlePageContext {
  topic: string;
  category: string;
  categoryName: string;
  /** Already an HTML fragment; inserted without escaping. */
  content: string;
  metaDescription: string;
}

const ARTICLE_PAGE_TEMPLATE = `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>{{topic}} - {{categoryName}}</title>
  <meta name="description" content="{{metaDescription}}">
  <meta property="og:type" content="article">
  <meta property="og:title" content="{{topic}} - {{categoryName}}">
  <meta property="og:description" content="{{metaDescription}}">
  <style>
    body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; line-height: 1.7; color: #1f2933; margin: 0; background: #f9fafb; }
    main { max-width: 760px; margin: 0 auto; padding: 48px 24px; background: #fff; }
    .category { display: inline-block; font-size: 0.8rem; text-transform: uppercase; letter-spacing: 0.08em; color: #2563eb; margin-bottom: 16px; }
    h1 { font-size: 2.2rem; line-height: 1.2; }
    h2 { margin-top: 2rem; }
  </style>
</head>
<body>
  <main>
    <span class="category category-{{category}}">{{categoryName}}</span>
    <article>
{{{content}}}
    </article>
  </main>
</body>
</html>
`;

const compiledTemplate = Handlebars.compile<ArticlePageContext>(ARTICLE_PAGE_TEMPLATE);

export const renderHtmlPage = (context: ArticlePageContext): string => compiledTemplate(context);
