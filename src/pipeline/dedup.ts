// pattern: Functional Core
import type { Article } from "./types";

/**
 * Drops articles whose URL was already seen, keeping the first occurrence
 * and the original order. Articles with an empty URL are dropped.
 */
export function deduplicateByUrl(
  articles: ReadonlyArray<Article>,
): Array<Article> {
  const seen = new Set<string>();
  const unique: Array<Article> = [];

  for (const article of articles) {
    if (article.url.length === 0 || seen.has(article.url)) {
      continue;
    }
    seen.add(article.url);
    unique.push(article);
  }

  return unique;
}
