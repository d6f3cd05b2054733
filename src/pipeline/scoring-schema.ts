import { z } from "zod";

export const articleScoreSchema = z.object({
  id: z.number().int().describe("Index of the article in the list"),
  score: z
    .number()
    .min(0)
    .max(10)
    .describe("Relevance and newsworthiness from 0 to 10"),
  reason: z.string().describe("One sentence explaining the score").default(""),
});

export const scoringOutputSchema = z.object({
  scores: z.array(articleScoreSchema),
});

export type ArticleScore = z.infer<typeof articleScoreSchema>;
export type ScoringOutput = z.infer<typeof scoringOutputSchema>;
