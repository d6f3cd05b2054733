// pattern: Imperative Shell
import pLimit from "p-limit";
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import { deduplicateByUrl } from "./dedup";
import { filterByTrustedDomains } from "./domains";
import { searchTopic } from "./search";
import type { Article } from "./types";

export function buildQueries(topics: ReadonlyArray<string>): Array<string> {
  return topics
    .map((topic) => topic.trim())
    .filter((topic) => topic.length > 0)
    .map((topic) => `latest news on ${topic}`);
}

/**
 * Searches every configured topic concurrently, then merges the results in
 * query order, removes duplicate URLs and applies the trusted-domain filter.
 *
 * A failed topic contributes nothing; the others still count. An empty
 * return means there is nothing to process this run.
 */
export async function collectArticles(
  config: AppConfig,
  logger: Logger,
): Promise<Array<Article>> {
  const queries = buildQueries(config.newsletter.topics);
  const limit = pLimit(config.search.maxConcurrency);

  const results = await Promise.all(
    queries.map((query) => limit(() => searchTopic(query, config.search, logger))),
  );

  const merged: Array<Article> = [];
  let failedCount = 0;
  for (const result of results) {
    if (result.success) {
      merged.push(...result.articles);
    } else {
      failedCount++;
    }
  }

  const unique = deduplicateByUrl(merged);
  logger.info(
    { before: merged.length, after: unique.length },
    "deduplicated articles",
  );

  const { trustedDomains } = config.newsletter;
  const filtered = filterByTrustedDomains(unique, trustedDomains);
  if (trustedDomains.length === 0) {
    logger.debug("no trusted domains configured, skipping domain filter");
  } else {
    logger.info(
      { before: unique.length, after: filtered.length },
      "filtered articles by trusted domain",
    );
  }

  logger.info(
    { queries: queries.length, failedQueries: failedCount, articles: filtered.length },
    "collection complete",
  );
  return filtered;
}
