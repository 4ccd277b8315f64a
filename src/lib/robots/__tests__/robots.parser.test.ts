/**
 * robots.txt Parser Tests
 */

import { isPathAllowed, parseRobotsTxt } from '../robots.parser';

const ROBOTS = `# sample
User-agent: *
Disallow: /private/
Allow: /private/public/
Crawl-delay: 2

User-agent: scrapekit
User-agent: otherbot
Disallow: /no-scrapekit   # trailing comment
Crawl-delay: 5

Sitemap: https://s.test/sitemap.xml
`;

describe('parseRobotsTxt', () => {
  it('should pick the group naming our agent', () => {
    expect(parseRobotsTxt(ROBOTS, 'scrapekit')).toEqual({
      rules: [{ allow: false, pattern: '/no-scrapekit' }],
      crawlDelay: 5,
      sitemaps: ['https://s.test/sitemap.xml'],
    });
  });

  it('should match the agent name case-insensitively inside a longer token', () => {
    expect(parseRobotsTxt(ROBOTS, 'ScrapeKit-Test').crawlDelay).toBe(5);
  });

  it('should fall back to the * group', () => {
    const rules = parseRobotsTxt(ROBOTS, 'somebot');
    expect(rules.crawlDelay).toBe(2);
    expect(rules.rules).toEqual([
      { allow: false, pattern: '/private/' },
      { allow: true, pattern: '/private/public/' },
    ]);
  });

  it('should start a new group after rules', () => {
    const text = 'User-agent: a\nDisallow: /x\nUser-agent: b\nDisallow: /y';
    expect(parseRobotsTxt(text, 'b').rules).toEqual([{ allow: false, pattern: '/y' }]);
    expect(parseRobotsTxt(text, 'a').rules).toEqual([{ allow: false, pattern: '/x' }]);
  });

  it('should merge groups with the same agent', () => {
    const text = 'User-agent: a\nDisallow: /x\n\nUser-agent: a\nDisallow: /y';
    expect(parseRobotsTxt(text, 'a').rules).toHaveLength(2);
  });

  it('should return no rules for an empty file', () => {
    expect(parseRobotsTxt('', 'scrapekit')).toEqual({ rules: [], crawlDelay: null, sitemaps: [] });
  });
});

describe('isPathAllowed', () => {
  const generic = parseRobotsTxt(ROBOTS, 'somebot');

  it('should apply the longest matching rule', () => {
    expect(isPathAllowed(generic, '/private/x')).toBe(false);
    expect(isPathAllowed(generic, '/private/public/x')).toBe(true);
    expect(isPathAllowed(generic, '/other')).toBe(true);
  });

  it('should let Allow win a tie', () => {
    const rules = parseRobotsTxt('User-agent: *\nDisallow: /page\nAllow: /page', 'x');
    expect(isPathAllowed(rules, '/page')).toBe(true);
  });

  it('should support * wildcards and $ anchors', () => {
    const rules = parseRobotsTxt('User-agent: *\nDisallow: /*.pdf$\nDisallow: /search?', 'x');
    expect(isPathAllowed(rules, '/docs/a.pdf')).toBe(false);
    expect(isPathAllowed(rules, '/docs/a.pdf?x=1')).toBe(true);
    expect(isPathAllowed(rules, '/search?q=1')).toBe(false);
    expect(isPathAllowed(rules, '/search')).toBe(true);
  });

  it('should treat an empty Disallow as allow all', () => {
    const rules = parseRobotsTxt('User-agent: *\nDisallow:', 'x');
    expect(isPathAllowed(rules, '/anything')).toBe(true);
  });

  it('should always allow /robots.txt', () => {
    const rules = parseRobotsTxt('User-agent: *\nDisallow: /', 'x');
    expect(isPathAllowed(rules, '/robots.txt')).toBe(true);
    expect(isPathAllowed(rules, '/')).toBe(false);
  });
});
