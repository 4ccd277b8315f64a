/**
 * Test Fixtures
 * Small hand-written listing pages
 */

export const BASE_URL = 'https://quotes.test';

interface QuoteFixture {
  text: string;
  author: string;
  slug: string;
  tags: string[];
}

export function quotesPage(quotes: QuoteFixture[], nextHref?: string): string {
  const items = quotes
    .map(
      (quote) => `
    <div class="quote" itemscope>
      <span class="text">“${quote.text}”</span>
      <span>by <small class="author">${quote.author}</small>
        <a href="/author/${quote.slug}">(about)</a>
      </span>
      <div class="tags">
        ${quote.tags.map((tag) => `<a class="tag" href="/tag/${tag}/">${tag}</a>`).join('\n        ')}
      </div>
    </div>`
    )
    .join('\n');

  const pager = nextHref ? `<ul class="pager"><li class="next"><a href="${nextHref}">Next →</a></li></ul>` : '';

  return `<!DOCTYPE html>
<html>
<head><title>Quotes</title></head>
<body>
  <div class="container">${items}
  ${pager}
  </div>
</body>
</html>`;
}

export const PAGE_ONE = quotesPage(
  [
    { text: 'Simplicity is prerequisite for reliability.', author: 'Ada Example', slug: 'Ada-Example', tags: ['design', 'simplicity'] },
    { text: 'Measure twice, cut once.', author: 'Carpenter Proverb', slug: 'Carpenter-Proverb', tags: [] },
  ],
  '/page/2/'
);

export const PAGE_TWO = quotesPage(
  [{ text: 'Small steps, every day.', author: 'Test Author', slug: 'Test-Author', tags: ['habits'] }],
  undefined
);

export const testHtml = `
<!DOCTYPE html>
<html>
<head>
  <title>Test Page</title>
  <meta name="description" content="Test description">
</head>
<body>
  <h1 id="heading" class="title main">Test Heading</h1>
  <p class="intro">Test paragraph content.</p>
  <div class="main-content">
    <p>Main content area.</p>
    <a href="/about">About</a>
    <a href="https://other.test/x#frag">Elsewhere</a>
    <a href="javascript:void(0)">Noop</a>
    <a href="/about">About again</a>
  </div>
  <table id="prices">
    <tr><th>Item</th><th>Price</th></tr>
    <tr data-sku="A1"><td>Widget</td><td>£1,299.50</td></tr>
    <tr data-sku="B2"><td>Gadget</td><td>£5</td></tr>
  </table>
  <script>console.log('test');</script>
</body>
</html>
`;
