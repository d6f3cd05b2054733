// pattern: Imperative Shell
import type { LanguageModel } from "ai";
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import { generateStructured } from "../llm/structured";
import { scoringOutputSchema } from "./scoring-schema";
import type { ArticleScore } from "./scoring-schema";
import type { Article } from "./types";

export function buildScoringPrompt(
  articles: ReadonlyArray<Article>,
  maxArticleLength: number,
): string {
  const listing = articles
    .map(
      (article, i) =>
        `ID: ${i}\nTitle: ${article.title || "N/A"}\nContent: ${article.rawContent.substring(0, maxArticleLength)}`,
    )
    .join("\n\n");

  return `Articles to score:\n\n${listing}`;
}

function buildScoringSystem(config: AppConfig): string {
  return [
    `You are a newsletter curator for an audience of ${config.newsletter.audience}.`,
    `Score each article for relevance to these interests: ${config.newsletter.topics.join(", ")}.`,
    "Consider newsworthiness (breakthroughs over routine updates), practical value and source credibility.",
    'Return a JSON object with a single key "scores": a list of objects with "id" (the article ID), "score" (0-10) and "reason" (one sentence).',
    "Be selective. Only truly noteworthy news should score above 7.",
  ].join("\n");
}

/**
 * Copies scores onto the articles by index. Ids outside the list are
 * ignored and articles without a score get 0.
 */
export function applyScores(
  articles: ReadonlyArray<Article>,
  scores: ReadonlyArray<ArticleScore>,
): Array<Article> {
  const scored = articles.map((article) => ({ ...article, score: 0, reason: "" }));

  for (const entry of scores) {
    const target = scored[entry.id];
    if (target === undefined) {
      continue;
    }
    target.score = entry.score;
    target.reason = entry.reason;
  }

  return scored;
}

/**
 * Orders articles by descending score, ties keeping their original order,
 * and keeps the first `limit`.
 */
export function rankArticles(
  articles: ReadonlyArray<Article>,
  limit: number,
): Array<Article> {
  // Array.prototype.sort is stable
  return [...articles]
    .sort((a, b) => (b.score ?? 0) - (a.score ?? 0))
    .slice(0, Math.max(limit, 0));
}

/**
 * Asks the model to score every article in one request. If the call fails or
 * the answer is malformed, the articles come back unscored in their original
 * order so the run can continue.
 */
export async function scoreArticles(
  model: LanguageModel,
  articles: ReadonlyArray<Article>,
  config: AppConfig,
  logger: Logger,
): Promise<Array<Article>> {
  try {
    const output = await generateStructured({
      model,
      schema: scoringOutputSchema,
      system: buildScoringSystem(config),
      prompt: buildScoringPrompt(articles, config.assessment.maxArticleLength),
    });

    logger.info(
      { articles: articles.length, scores: output.scores.length },
      "articles scored",
    );
    return rankArticles(applyScores(articles, output.scores), articles.length);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error(
      { error: message },
      "article scoring failed, keeping original order",
    );
    return [...articles];
  }
}
