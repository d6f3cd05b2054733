// pattern: Imperative Shell
import type { LanguageModel } from "ai";
import type { Logger } from "pino";
import type { AppConfig } from "./config";
import { collectArticles } from "./pipeline/collector";
import { processArticles } from "./pipeline/processor";
import type { Article, NewsletterContent } from "./pipeline/types";
import { emailSettingsFrom, sendNewsletter } from "./newsletter/emailer";
import { renderPreview } from "./newsletter/preview";
import type { SendNewsletterFn } from "./newsletter/sender";

/**
 * The three pipeline stages, injected so runs can be driven without network
 * access.
 */
export type PipelineStages = {
  readonly collect: () => Promise<ReadonlyArray<Article>>;
  readonly process: (
    articles: ReadonlyArray<Article>,
  ) => Promise<NewsletterContent | null>;
  readonly deliver: (content: NewsletterContent) => Promise<boolean>;
};

export type PreviewOptions = {
  readonly newsletterName: string;
  readonly write: (text: string) => void;
  readonly now?: () => Date;
};

export function createPipelineStages(
  config: AppConfig,
  model: LanguageModel,
  send: SendNewsletterFn,
  logger: Logger,
): PipelineStages {
  return {
    collect: () => collectArticles(config, logger),
    process: (articles) =>
      processArticles(model, articles, config, logger, config.newsletter.topStories),
    deliver: (content) =>
      sendNewsletter(content, emailSettingsFrom(config), send, logger),
  };
}

async function produceContent(
  stages: Pick<PipelineStages, "collect" | "process">,
  logger: Logger,
): Promise<NewsletterContent | null> {
  const articles = await stages.collect();
  if (articles.length === 0) {
    logger.warn("no articles found, stopping pipeline");
    return null;
  }

  const content = await stages.process(articles);
  if (content === null) {
    logger.warn("processing produced no newsletter content, stopping pipeline");
    return null;
  }
  return content;
}

function logUnexpected(err: unknown, logger: Logger): void {
  logger.fatal(
    {
      error: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
    },
    "unexpected error in newsletter pipeline",
  );
}

/**
 * Collects, processes and delivers one newsletter. Resolves to whether the
 * email went out; never rejects.
 */
export async function runNewsletter(
  stages: PipelineStages,
  logger: Logger,
): Promise<boolean> {
  logger.info("starting newsletter pipeline");
  try {
    const content = await produceContent(stages, logger);
    if (content === null) {
      return false;
    }

    const sent = await stages.deliver(content);
    if (sent) {
      logger.info("newsletter pipeline completed");
    } else {
      logger.error("newsletter pipeline failed during email sending");
    }
    return sent;
  } catch (err) {
    logUnexpected(err, logger);
    return false;
  }
}

/**
 * Runs collection and processing, then writes a readable preview instead of
 * sending. Resolves to whether any content was produced.
 */
export async function previewNewsletter(
  stages: Pick<PipelineStages, "collect" | "process">,
  options: PreviewOptions,
  logger: Logger,
): Promise<boolean> {
  logger.info("starting newsletter preview");
  try {
    const content = await produceContent(stages, logger);
    if (content === null) {
      options.write("No newsletter content was produced. Check the logs for details.\n");
      return false;
    }

    const now = options.now ? options.now() : new Date();
    options.write(renderPreview(content, options.newsletterName, now));
    return true;
  } catch (err) {
    logUnexpected(err, logger);
    return false;
  }
}
