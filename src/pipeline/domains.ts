// pattern: Functional Core
import type { Article } from "./types";

/**
 * Returns the URL's lowercased hostname without a leading `www.`, or null
 * when the URL cannot be parsed.
 */
export function hostnameOf(url: string): string | null {
  let hostname: string;
  try {
    hostname = new URL(url).hostname;
  } catch {
    return null;
  }
  return hostname.startsWith("www.") ? hostname.slice(4) : hostname;
}

/**
 * Keeps only articles whose hostname is in `trustedDomains`, compared
 * case-insensitively. An empty set keeps everything.
 */
export function filterByTrustedDomains(
  articles: ReadonlyArray<Article>,
  trustedDomains: ReadonlyArray<string>,
): Array<Article> {
  if (trustedDomains.length === 0) {
    return [...articles];
  }

  const trusted = new Set(trustedDomains.map((domain) => domain.toLowerCase()));
  return articles.filter((article) => {
    const hostname = hostnameOf(article.url);
    return hostname !== null && trusted.has(hostname);
  });
}
