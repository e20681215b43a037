/**
 * Robots policy gate
 *
 * robots.txt is fetched once per run through the polite client and parsed
 * into the rule set that applies to our user agent.
 */

import type { PageFetcher } from './http-client.js';
import { logger } from '../utils/logger.js';

export interface RobotsRule {
  allow: boolean;
  pattern: string;
}

export interface RobotsGroup {
  agents: string[];
  rules: RobotsRule[];
}

/**
 * Parse robots.txt into user-agent groups. Consecutive User-agent lines
 * share one group; unknown fields are ignored.
 */
export function parseRobotsTxt(text: string): RobotsGroup[] {
  const groups: RobotsGroup[] = [];
  let current: RobotsGroup | null = null;
  let collectingAgents = false;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.replace(/#.*/, '').trim();
    const separator = line.indexOf(':');
    if (!line || separator === -1) {
      continue;
    }

    const field = line.slice(0, separator).trim().toLowerCase();
    const value = line.slice(separator + 1).trim();

    if (field === 'user-agent') {
      if (!current || !collectingAgents) {
        current = { agents: [], rules: [] };
        groups.push(current);
      }
      current.agents.push(value.toLowerCase());
      collectingAgents = true;
      continue;
    }

    collectingAgents = false;

    if ((field === 'allow' || field === 'disallow') && current) {
      // "Disallow:" with no path allows everything
      if (value === '') {
        continue;
      }
      current.rules.push({ allow: field === 'allow', pattern: value });
    }
  }

  return groups;
}

/**
 * Pick the rules for a user agent: the group whose token is the longest
 * substring of the agent's product name, else the "*" group.
 */
export function selectRules(groups: RobotsGroup[], userAgent: string): RobotsRule[] {
  const product = (userAgent.split('/')[0] ?? '').trim().toLowerCase();

  let best: { group: RobotsGroup; tokenLength: number } | null = null;
  let wildcard: RobotsGroup | null = null;

  for (const group of groups) {
    for (const agent of group.agents) {
      if (agent === '*') {
        wildcard ??= group;
      } else if (product.includes(agent) && (!best || agent.length > best.tokenLength)) {
        best = { group, tokenLength: agent.length };
      }
    }
  }

  return best?.group.rules ?? wildcard?.rules ?? [];
}

function patternToRegExp(pattern: string): RegExp {
  const anchored = pattern.endsWith('$');
  const body = (anchored ? pattern.slice(0, -1) : pattern)
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  return new RegExp(`^${body}${anchored ? '$' : ''}`);
}

/**
 * Longest matching pattern decides; Allow wins a tie; no match allows.
 */
export function isPathAllowed(path: string, rules: RobotsRule[]): boolean {
  let verdict: RobotsRule | null = null;

  for (const rule of rules) {
    if (!patternToRegExp(rule.pattern).test(path)) {
      continue;
    }
    if (
      !verdict ||
      rule.pattern.length > verdict.pattern.length ||
      (rule.pattern.length === verdict.pattern.length && rule.allow)
    ) {
      verdict = rule;
    }
  }

  return verdict?.allow ?? true;
}

export class RobotsGate {
  private readonly origin: string;
  private readonly rules: RobotsRule[];

  constructor(robotsUrl: string, rules: RobotsRule[]) {
    this.origin = new URL(robotsUrl).origin;
    this.rules = rules;
  }

  static fromText(robotsUrl: string, text: string, userAgent: string): RobotsGate {
    return new RobotsGate(robotsUrl, selectRules(parseRobotsTxt(text), userAgent));
  }

  /**
   * Whether the policy lets our user agent fetch `url`. URLs on other
   * hosts are outside this policy.
   */
  allows(url: string): boolean {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      return false;
    }

    if (parsed.origin !== this.origin) {
      return true;
    }

    return isPathAllowed(`${parsed.pathname}${parsed.search}`, this.rules);
  }
}

/**
 * Fetch and parse robots.txt
 * @throws FetchError when the policy cannot be retrieved
 */
export async function buildRobotsGate(
  fetcher: PageFetcher,
  options: { robotsUrl: string; userAgent: string }
): Promise<RobotsGate> {
  const text = await fetcher.fetch(options.robotsUrl);
  const gate = RobotsGate.fromText(options.robotsUrl, text, options.userAgent);

  logger.info({ robotsUrl: options.robotsUrl }, 'Robots policy loaded');
  return gate;
}
