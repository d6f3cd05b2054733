// pattern: Functional Core
import { formatFullDate } from "../format";
import type { NewsletterContent } from "../pipeline/types";
import { FALLBACK_COPY, orFallback } from "./defaults";
import type { RenderOptions } from "./renderer";

/**
 * Plain-text alternative to the HTML body, for clients that do not render
 * HTML.
 */
export function renderNewsletterText(
  content: NewsletterContent,
  options: RenderOptions,
): string {
  const lines: Array<string> = [
    options.newsletterName,
    formatFullDate(options.now),
    "",
    orFallback(content.opening_hook, FALLBACK_COPY.openingHook),
    "",
    "--- TOP STORIES ---",
    "",
  ];

  for (const story of content.top_stories) {
    lines.push(
      `Headline: ${orFallback(story.headline, FALLBACK_COPY.headline)}`,
      `Summary: ${orFallback(story.summary, FALLBACK_COPY.missing)}`,
      `Link: ${orFallback(story.link, FALLBACK_COPY.link)}`,
      "",
    );
  }

  lines.push(
    "--- TOOL OF THE DAY ---",
    orFallback(content.tool_of_the_day, FALLBACK_COPY.missing),
    "",
    "--- CLOSING THOUGHT ---",
    orFallback(content.closing_thought, FALLBACK_COPY.missing),
  );

  return `${lines.join("\n")}\n`;
}
