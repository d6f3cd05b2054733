// pattern: Imperative Shell
import type { LanguageModel } from "ai";
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import { formatLongDate } from "../format";
import { generateStructured } from "../llm/structured";
import { newsletterOutputSchema } from "./newsletter-schema";
import type { Article, NewsletterContent } from "./types";

const DEFAULT_REASON = "Important AI news";

export function buildNewsletterPrompt(
  articles: ReadonlyArray<Article>,
  date: Date,
): string {
  const listing = articles
    .map(
      (article) =>
        `Title: ${article.title}\nURL: ${article.url}\nWhy selected: ${article.reason || DEFAULT_REASON}`,
    )
    .join("\n\n");

  return `Create the newsletter for ${formatLongDate(date)} using these top ${articles.length} articles:\n\n${listing}`;
}

function buildNewsletterSystem(config: AppConfig): string {
  return [
    `You are a newsletter editor writing "${config.newsletter.name}" for an audience of ${config.newsletter.audience}.`,
    'Return a JSON object with exactly these keys: "opening_hook", "top_stories", "tool_of_the_day", "closing_thought".',
    '- "opening_hook": a compelling 1-2 sentence intro about today\'s news.',
    '- "top_stories": one object per article with "headline" (rewritten, engaging), "summary" (2-3 sentences on what happened and why it matters) and "link" (the original URL).',
    '- "tool_of_the_day": one practical tool or resource to recommend, from the articles or general knowledge.',
    '- "closing_thought": a forward-looking insight or question to ponder.',
    "Keep the tone professional yet conversational and focus on practical implications.",
  ].join("\n");
}

/**
 * Turns the top articles into newsletter copy with a second model call.
 * Returns null when the call fails or the answer is malformed; there is no
 * partial newsletter.
 */
export async function generateNewsletter(
  model: LanguageModel,
  articles: ReadonlyArray<Article>,
  config: AppConfig,
  logger: Logger,
  now: Date = new Date(),
): Promise<NewsletterContent | null> {
  try {
    const output = await generateStructured({
      model,
      schema: newsletterOutputSchema,
      system: buildNewsletterSystem(config),
      prompt: buildNewsletterPrompt(articles, now),
    });

    logger.info(
      { stories: output.top_stories.length },
      "newsletter content generated",
    );
    return { ...output, original_articles: articles };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ error: message }, "newsletter generation failed");
    return null;
  }
}
