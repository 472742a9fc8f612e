import { HttpClient } from "../core/http";
import { errorMessage, Logger } from "../observability";

export interface RobotsRule {
  allow: boolean;
  pattern: string;
}

export interface RobotsGroup {
  agents: string[];
  rules: RobotsRule[];
  crawlDelay?: number;
}

export interface ParsedRobots {
  groups: RobotsGroup[];
  sitemaps: string[];
}

export function parseRobots(text: string): ParsedRobots {
  const groups: RobotsGroup[] = [];
  const sitemaps: string[] = [];
  let current: RobotsGroup | undefined;
  let collectingAgents = false;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.replace(/#.*$/, "").trim();
    const separator = line.indexOf(":");
    if (separator <= 0) {
      continue;
    }
    const field = line.slice(0, separator).trim().toLowerCase();
    const value = line.slice(separator + 1).trim();

    switch (field) {
      case "user-agent":
        if (!current || !collectingAgents) {
          current = { agents: [], rules: [] };
          groups.push(current);
          collectingAgents = true;
        }
        current.agents.push(value.toLowerCase());
        break;
      case "allow":
      case "disallow":
        collectingAgents = false;
        if (current && value) {
          current.rules.push({ allow: field === "allow", pattern: value });
        }
        break;
      case "crawl-delay": {
        collectingAgents = false;
        const delay = Number.parseFloat(value);
        if (current && Number.isFinite(delay) && delay >= 0) {
          current.crawlDelay = delay;
        }
        break;
      }
      case "sitemap":
        if (value) {
          sitemaps.push(value);
        }
        break;
      default:
        break;
    }
  }

  return { groups, sitemaps };
}

/**
 * Groups that apply to `userAgent`: those whose most specific token is
 * contained in the agent string, else the `*` groups.
 */
export function selectGroups(groups: RobotsGroup[], userAgent: string): RobotsGroup[] {
  const agent = userAgent.toLowerCase();
  let bestToken = "";
  for (const group of groups) {
    for (const token of group.agents) {
      if (token !== "*" && agent.includes(token) && token.length > bestToken.length) {
        bestToken = token;
      }
    }
  }
  if (bestToken) {
    return groups.filter((group) => group.agents.includes(bestToken));
  }
  return groups.filter((group) => group.agents.includes("*"));
}

function patternToRegExp(pattern: string): RegExp {
  const anchored = pattern.endsWith("$");
  const body = anchored ? pattern.slice(0, -1) : pattern;
  const source = body
    .split("*")
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, "\\$&"))
    .join(".*");
  return new RegExp(`^${source}${anchored ? "$" : ""}`);
}

/** Longest matching pattern wins; `Allow` wins a tie. No match allows. */
export function isPathAllowed(rules: RobotsRule[], pathWithQuery: string): boolean {
  let best: RobotsRule | undefined;
  for (const rule of rules) {
    if (!patternToRegExp(rule.pattern).test(pathWithQuery)) {
      continue;
    }
    if (
      !best ||
      rule.pattern.length > best.pattern.length ||
      (rule.pattern.length === best.pattern.length && rule.allow && !best.allow)
    ) {
      best = rule;
    }
  }
  return best ? best.allow : true;
}

export interface RobotsLoadOptions {
  http: HttpClient;
  minDelaySeconds: number;
  timeoutMs: number;
  logger?: Logger;
}

export class RobotsPolicy {
  private constructor(
    private readonly origin: string | undefined,
    private readonly parsed: ParsedRobots | undefined,
    private readonly userAgent: string,
    private readonly minDelaySeconds: number,
  ) {}

  /** Fetches `{origin}/robots.txt` once. Any failure yields an allow-all policy. */
  static async load(baseUrl: string, options: RobotsLoadOptions): Promise<RobotsPolicy> {
    const origin = new URL(baseUrl).origin;
    const robotsUrl = `${origin}/robots.txt`;
    try {
      const text = await options.http.getText(robotsUrl, { timeoutMs: options.timeoutMs, accept: "text/plain,*/*" });
      const policy = RobotsPolicy.fromText(text, baseUrl, options.http.userAgent, options.minDelaySeconds);
      options.logger?.info("robots_loaded", {
        url: robotsUrl,
        sitemaps: policy.sitemapUrls().length,
        crawlDelaySeconds: policy.crawlDelay(),
      });
      return policy;
    } catch (error) {
      options.logger?.warn("robots_unavailable_allow_all", { url: robotsUrl, error: errorMessage(error) });
      return RobotsPolicy.unloaded(options.http.userAgent, options.minDelaySeconds);
    }
  }

  static fromText(text: string, baseUrl: string, userAgent: string, minDelaySeconds: number): RobotsPolicy {
    return new RobotsPolicy(new URL(baseUrl).origin, parseRobots(text), userAgent, minDelaySeconds);
  }

  static unloaded(userAgent: string, minDelaySeconds: number): RobotsPolicy {
    return new RobotsPolicy(undefined, undefined, userAgent, minDelaySeconds);
  }

  get loaded(): boolean {
    return this.parsed !== undefined;
  }

  canFetch(url: string): boolean {
    if (!this.parsed) {
      return true;
    }
    let target: URL;
    try {
      target = new URL(url);
    } catch {
      return false;
    }
    if (target.origin !== this.origin) {
      return true;
    }
    const rules = selectGroups(this.parsed.groups, this.userAgent).flatMap((group) => group.rules);
    return isPathAllowed(rules, `${target.pathname}${target.search}`);
  }

  /** Declared delay in seconds, never below the configured minimum. */
  crawlDelay(): number {
    if (!this.parsed) {
      return this.minDelaySeconds;
    }
    const matching = selectGroups(this.parsed.groups, this.userAgent).find((group) => group.crawlDelay !== undefined);
    const declared = matching?.crawlDelay ?? this.parsed.groups.find((group) => group.crawlDelay !== undefined)?.crawlDelay;
    return Math.max(this.minDelaySeconds, declared ?? this.minDelaySeconds);
  }

  sitemapUrls(): string[] {
    return this.parsed ? [...this.parsed.sitemaps] : [];
  }
}
