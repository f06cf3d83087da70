import robotsParser from "robots-parser";
import { errorMessage } from "@cadence/core";
import type { HttpClient } from "./http";

type HostRules = {
  isAllowed(url: string): boolean;
  sitemaps: string[];
};

const ALLOW_ALL: HostRules = {
  isAllowed: () => true,
  sitemaps: []
};

function robotsUrlFor(url: string) {
  try {
    const parsed = new URL(url);
    return `${parsed.protocol}//${parsed.host}/robots.txt`;
  } catch {
    return null;
  }
}

/**
 * Crawl-exclusion rules per host, fetched once per run. A robots file that
 * cannot be retrieved allows everything.
 */
export class RobotsPolicy {
  private readonly hosts = new Map<string, Promise<HostRules>>();

  constructor(
    private readonly http: HttpClient,
    private readonly userAgent: string
  ) {}

  async isAllowed(url: string) {
    const rules = await this.rulesFor(url);
    return rules.isAllowed(url);
  }

  async sitemapsFor(url: string) {
    const rules = await this.rulesFor(url);
    return rules.sitemaps;
  }

  private rulesFor(url: string) {
    const robotsUrl = robotsUrlFor(url);
    if (!robotsUrl) return Promise.resolve(ALLOW_ALL);

    let pending = this.hosts.get(robotsUrl);
    if (!pending) {
      pending = this.load(robotsUrl);
      this.hosts.set(robotsUrl, pending);
    }
    return pending;
  }

  private async load(robotsUrl: string): Promise<HostRules> {
    try {
      const response = await this.http.getAllowingErrors(robotsUrl, "text/plain, */*");
      if (response.status >= 400 && response.status < 500) {
        console.info(`[robots] ${robotsUrl} returned HTTP ${response.status}; no rules, allowing all`);
        return ALLOW_ALL;
      }
      if (response.status >= 500) {
        console.warn(`[robots] ${robotsUrl} returned HTTP ${response.status}; allowing all`);
        return ALLOW_ALL;
      }
      const robots = robotsParser(robotsUrl, response.body);
      return {
        isAllowed: (url) => robots.isAllowed(url, this.userAgent) ?? true,
        sitemaps: robots.getSitemaps()
      };
    } catch (error) {
      console.warn(`[robots] failed to fetch ${robotsUrl}: ${errorMessage(error)}; allowing all`);
      return ALLOW_ALL;
    }
  }
}
