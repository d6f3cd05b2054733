// pattern: Imperative Shell
import type { Logger } from "pino";
import { formatSubject } from "../format";
import type { AppConfig } from "../config";
import type { NewsletterContent } from "../pipeline/types";
import { loadTemplate, renderNewsletterHtml } from "./renderer";
import type { SendNewsletterFn } from "./sender";
import { renderNewsletterText } from "./text";

export type EmailSettings = {
  readonly newsletterName: string;
  readonly from: string;
  readonly recipients: ReadonlyArray<string>;
  readonly templatePath: string;
};

export function emailSettingsFrom(config: AppConfig): EmailSettings {
  return {
    newsletterName: config.newsletter.name,
    from: config.email.from,
    recipients: config.email.recipients,
    templatePath: config.email.templatePath,
  };
}

/**
 * Renders the newsletter as HTML and plain text and hands both to the mail
 * provider in a single call addressed to every recipient.
 *
 * Returns false without sending when the sender or recipients are missing or
 * there are no stories, and false when the provider rejects the message.
 */
export async function sendNewsletter(
  content: NewsletterContent,
  settings: EmailSettings,
  send: SendNewsletterFn,
  logger: Logger,
  now: Date = new Date(),
): Promise<boolean> {
  if (settings.from.trim().length === 0 || settings.recipients.length === 0) {
    logger.error("sender or recipient addresses not configured");
    return false;
  }
  if (content.top_stories.length === 0) {
    logger.warn("no newsletter stories to send");
    return false;
  }

  const renderOptions = { newsletterName: settings.newsletterName, now };
  const loaded = loadTemplate(settings.templatePath, logger);
  const html = loaded.ok
    ? renderNewsletterHtml(content, loaded.template, renderOptions)
    : loaded.body;
  const text = renderNewsletterText(content, renderOptions);

  const result = await send(
    {
      from: settings.from,
      to: settings.recipients,
      subject: formatSubject(settings.newsletterName, now),
      html,
      text,
    },
    logger,
  );

  if (!result.success) {
    logger.error({ error: result.error }, "newsletter not sent");
    return false;
  }

  logger.info({ messageId: result.messageId }, "newsletter sent");
  return true;
}
