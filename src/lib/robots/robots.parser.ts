/**
 * robots.txt Parser
 *
 * Groups are runs of User-agent lines followed by rules. The group naming our
 * agent applies (longest matching name wins, same-name groups merge); otherwise
 * the `*` group. Within a group, the longest matching pattern decides and
 * Allow wins ties.
 */

export interface RobotsRule {
  allow: boolean;
  pattern: string;
}

export interface RobotsRules {
  rules: RobotsRule[];
  /** Crawl-delay in seconds (null if not specified) */
  crawlDelay: number | null;
  sitemaps: string[];
}

interface RobotsGroup {
  agents: string[];
  rules: RobotsRule[];
  crawlDelay: number | null;
}

export const ALLOW_ALL: RobotsRules = { rules: [], crawlDelay: null, sitemaps: [] };
export const DISALLOW_ALL: RobotsRules = {
  rules: [{ allow: false, pattern: '/' }],
  crawlDelay: null,
  sitemaps: [],
};

function parseGroups(text: string): { groups: RobotsGroup[]; sitemaps: string[] } {
  const groups: RobotsGroup[] = [];
  const sitemaps: string[] = [];
  let current: RobotsGroup | null = null;
  let collectingAgents = false;

  for (const rawLine of text.split(/\r\n|\r|\n/)) {
    const line = rawLine.replace(/#.*$/, '').trim();
    if (!line) continue;

    const colonIndex = line.indexOf(':');
    if (colonIndex === -1) continue;

    const directive = line.slice(0, colonIndex).trim().toLowerCase();
    const value = line.slice(colonIndex + 1).trim();

    switch (directive) {
      case 'user-agent': {
        if (!current || !collectingAgents) {
          current = { agents: [], rules: [], crawlDelay: null };
          groups.push(current);
        }
        current.agents.push(value.toLowerCase());
        collectingAgents = true;
        break;
      }
      case 'allow':
      case 'disallow': {
        collectingAgents = false;
        // Empty Disallow means allow everything; empty Allow means nothing
        if (!current || !value) break;
        current.rules.push({ allow: directive === 'allow', pattern: value });
        break;
      }
      case 'crawl-delay': {
        collectingAgents = false;
        if (!current) break;
        const delay = parseFloat(value);
        if (!isNaN(delay) && delay >= 0) {
          current.crawlDelay = delay;
        }
        break;
      }
      case 'sitemap': {
        if (value) sitemaps.push(value);
        break;
      }
      default:
        collectingAgents = false;
    }
  }

  return { groups, sitemaps };
}

/**
 * Parse robots.txt content into the rules that apply to `userAgentName`
 */
export function parseRobotsTxt(text: string, userAgentName: string): RobotsRules {
  const { groups, sitemaps } = parseGroups(text);
  const ourAgent = userAgentName.toLowerCase();

  let bestLength = 0;
  let selected: RobotsGroup[] = [];

  for (const group of groups) {
    for (const agent of group.agents) {
      if (agent === '*' || !ourAgent.includes(agent)) continue;
      if (agent.length > bestLength) {
        bestLength = agent.length;
        selected = [group];
      } else if (agent.length === bestLength && !selected.includes(group)) {
        selected.push(group);
      }
    }
  }

  if (selected.length === 0) {
    selected = groups.filter((group) => group.agents.includes('*'));
  }

  const delays = selected.map((group) => group.crawlDelay).filter((delay): delay is number => delay !== null);

  return {
    rules: selected.flatMap((group) => group.rules),
    crawlDelay: delays.length > 0 ? Math.max(...delays) : null,
    sitemaps,
  };
}

function patternToRegExp(pattern: string): RegExp {
  const anchored = pattern.endsWith('$');
  const body = anchored ? pattern.slice(0, -1) : pattern;
  const source = body
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  return new RegExp(`^${source}${anchored ? '$' : ''}`);
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * Decide whether a path (with query string) may be fetched
 */
export function isPathAllowed(rules: RobotsRules, path: string): boolean {
  if (path === '/robots.txt') return true;

  const decodedPath = safeDecode(path);
  let best: RobotsRule | null = null;

  for (const rule of rules.rules) {
    const regex = patternToRegExp(safeDecode(rule.pattern));
    if (!regex.test(decodedPath)) continue;

    if (
      best === null ||
      rule.pattern.length > best.pattern.length ||
      (rule.pattern.length === best.pattern.length && rule.allow)
    ) {
      best = rule;
    }
  }

  return best === null || best.allow;
}
