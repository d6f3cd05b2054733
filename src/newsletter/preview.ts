// pattern: Functional Core
import { formatSubject } from "../format";
import type { NewsletterContent } from "../pipeline/types";

const RULE = "=".repeat(50);

export function renderPreview(
  content: NewsletterContent,
  newsletterName: string,
  now: Date,
): string {
  const lines: Array<string> = [
    "",
    RULE,
    "NEWSLETTER PREVIEW",
    RULE,
    "",
    `SUBJECT: ${formatSubject(newsletterName, now)}`,
    "",
    `OPENING: ${content.opening_hook}`,
    "",
  ];

  content.top_stories.forEach((story, i) => {
    lines.push(
      `--- STORY ${i + 1} ---`,
      `HEADLINE: ${story.headline}`,
      `SUMMARY: ${story.summary}`,
      `LINK: ${story.link}`,
      "",
    );
  });

  lines.push(
    "--- TOOL OF THE DAY ---",
    content.tool_of_the_day,
    "",
    "--- CLOSING THOUGHT ---",
    content.closing_thought,
    "",
    RULE,
    "Test run complete. No email was sent.",
    RULE,
    "",
  );

  return lines.join("\n");
}
