// pattern: Imperative Shell
import Mailgun from "mailgun.js";
import FormData from "form-data";
import type { Logger } from "pino";

export type NewsletterMessage = {
  readonly from: string;
  readonly to: ReadonlyArray<string>;
  readonly subject: string;
  readonly html: string;
  readonly text: string;
};

/**
 * Discriminated union result type for newsletter send operations.
 */
export type SendResult =
  | { readonly success: true; readonly messageId: string }
  | { readonly success: false; readonly error: string };

/**
 * Delivers one message to every recipient. Never throws; errors, including
 * an unreachable provider, are returned in the result.
 */
export type SendNewsletterFn = (
  message: NewsletterMessage,
  logger: Logger,
) => Promise<SendResult>;

/**
 * Creates a Mailgun-backed sender bound to one sending domain.
 *
 * @param url - API base URL, e.g. `https://api.eu.mailgun.net` for EU domains
 */
export function createMailgunSender(
  apiKey: string,
  domain: string,
  url?: string,
): SendNewsletterFn {
  const mailgun = new Mailgun(FormData);
  const mg = mailgun.client(
    url ? { username: "api", key: apiKey, url } : { username: "api", key: apiKey },
  );

  return async function sendNewsletter(
    message: NewsletterMessage,
    logger: Logger,
  ): Promise<SendResult> {
    try {
      const result = await mg.messages.create(domain, {
        from: message.from,
        to: [...message.to],
        subject: message.subject,
        html: message.html,
        text: message.text,
      });

      logger.info(
        { messageId: result.id, recipients: message.to.length },
        "newsletter email sent",
      );
      return { success: true, messageId: result.id ?? "unknown" };
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      logger.error(
        { recipients: message.to.length, error },
        "newsletter email send failed",
      );
      return { success: false, error };
    }
  };
}
