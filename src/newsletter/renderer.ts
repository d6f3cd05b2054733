// pattern: Imperative Shell
import { readFileSync } from "node:fs";
import type { Logger } from "pino";
import { formatFullDate } from "../format";
import type { NewsletterContent, TopStory } from "../pipeline/types";
import { FALLBACK_COPY, orFallback } from "./defaults";

export const TEMPLATE_NOT_FOUND =
  "Template not found. Please check your installation.";
export const TEMPLATE_READ_ERROR = "Error rendering newsletter template.";

export type RenderOptions = {
  readonly newsletterName: string;
  readonly now: Date;
};

type TemplateValues = Readonly<Record<string, string>>;

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/** Only http(s) links make it into the email; anything else becomes "#". */
export function safeLink(link: string | undefined): string {
  const value = orFallback(link, FALLBACK_COPY.link).trim();
  return /^https?:\/\//i.test(value) ? value : FALLBACK_COPY.link;
}

export function renderStoryHtml(story: Partial<TopStory>): string {
  const headline = escapeHtml(orFallback(story.headline, FALLBACK_COPY.headline));
  const summary = escapeHtml(orFallback(story.summary, FALLBACK_COPY.summary));
  const link = escapeHtml(safeLink(story.link));

  return `
  <div style="margin-bottom: 24px; padding-bottom: 16px; border-bottom: 1px solid #e4e7eb;">
    <h3 style="margin: 0 0 8px; font-size: 18px;">${headline}</h3>
    <p style="margin: 0 0 8px; line-height: 1.5;">${summary}</p>
    <a href="${link}" style="color: #3b5bdb; text-decoration: none;">Read the full story &rarr;</a>
  </div>`;
}

/**
 * Replaces `{name}` placeholders with the given values. Unknown placeholders
 * and other braces in the template are left untouched.
 */
export function fillTemplate(template: string, values: TemplateValues): string {
  return template.replace(/\{([a-z_]+)\}/g, (match, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? (values[key] ?? match) : match,
  );
}

/**
 * Reads the HTML template. Returns the fallback body instead of throwing so
 * a missing template never blocks the send.
 */
export function loadTemplate(
  templatePath: string,
  logger: Logger,
): { readonly ok: true; readonly template: string } | { readonly ok: false; readonly body: string } {
  try {
    return { ok: true, template: readFileSync(templatePath, "utf-8") };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    const notFound =
      err instanceof Error && "code" in err && err.code === "ENOENT";
    logger.error({ templatePath, error: message }, "newsletter template unavailable");
    return { ok: false, body: notFound ? TEMPLATE_NOT_FOUND : TEMPLATE_READ_ERROR };
  }
}

export function renderNewsletterHtml(
  content: NewsletterContent,
  template: string,
  options: RenderOptions,
): string {
  const storiesHtml = content.top_stories.map(renderStoryHtml).join("\n");

  return fillTemplate(template, {
    newsletter_name: escapeHtml(options.newsletterName),
    current_date: escapeHtml(formatFullDate(options.now)),
    opening_hook: escapeHtml(
      orFallback(content.opening_hook, FALLBACK_COPY.openingHook),
    ),
    stories_html: storiesHtml,
    tool_of_the_day: escapeHtml(
      orFallback(content.tool_of_the_day, FALLBACK_COPY.toolOfTheDay),
    ),
    closing_thought: escapeHtml(
      orFallback(content.closing_thought, FALLBACK_COPY.closingThought),
    ),
  });
}
