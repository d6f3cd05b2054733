import { z } from "zod";

export const topStorySchema = z.object({
  headline: z.string().describe("Rewritten, engaging headline"),
  summary: z
    .string()
    .describe("2-3 sentences on what happened and why it matters"),
  link: z.string().describe("The original article URL"),
});

export const newsletterOutputSchema = z.object({
  opening_hook: z
    .string()
    .describe("A compelling 1-2 sentence intro about today's landscape"),
  top_stories: z.array(topStorySchema).min(1),
  tool_of_the_day: z
    .string()
    .describe("One practical tool or resource worth trying"),
  closing_thought: z
    .string()
    .describe("A forward-looking insight or question to ponder"),
});

export type NewsletterOutput = z.infer<typeof newsletterOutputSchema>;
