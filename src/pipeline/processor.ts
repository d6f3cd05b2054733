// pattern: Imperative Shell
import type { LanguageModel } from "ai";
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import { DEFAULTS } from "../config/schema";
import { generateNewsletter } from "./generator";
import { rankArticles, scoreArticles } from "./scorer";
import type { Article, NewsletterContent } from "./types";

/**
 * Scores the collected articles, keeps the best `limit` and writes the
 * newsletter copy for them.
 *
 * Returns null when there is nothing to include or generation failed.
 */
export async function processArticles(
  model: LanguageModel,
  articles: ReadonlyArray<Article>,
  config: AppConfig,
  logger: Logger,
  limit: number = DEFAULTS.topStories,
  now: Date = new Date(),
): Promise<NewsletterContent | null> {
  if (articles.length === 0) {
    logger.warn("no articles to process");
    return null;
  }

  const scored = await scoreArticles(model, articles, config, logger);
  const top = rankArticles(scored, limit);

  if (top.length === 0) {
    logger.warn({ limit }, "no articles selected for the newsletter");
    return null;
  }

  logger.info(
    { selected: top.length, scores: top.map((article) => article.score ?? 0) },
    "top articles selected",
  );

  return generateNewsletter(model, top, config, logger, now);
}
