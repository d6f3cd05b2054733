import { describe, it, expect, vi, beforeEach } from "vitest";
import type { LanguageModel } from "ai";

const { generateText } = vi.hoisted(() => ({ generateText: vi.fn() }));

vi.mock("ai", () => ({
  generateText,
  Output: { object: vi.fn((options: unknown) => options) },
}));

// Import after mocking
import { processArticles } from "./processor";
import { buildNewsletterPrompt } from "./generator";
import { createMockLogger, createTestConfig, makeArticle } from "../test-utils/fixtures";

const model = { modelId: "mock-model" } as unknown as LanguageModel;
const now = new Date(2026, 9, 8);

function storiesFor(count: number) {
  return Array.from({ length: count }, (_, i) => ({
    headline: `Story ${i}`,
    summary: `Summary ${i}`,
    link: `https://example.com/articles/${i}`,
  }));
}

function newsletterOutput(count: number) {
  return {
    opening_hook: "Hello.",
    top_stories: storiesFor(count),
    tool_of_the_day: "A tool.",
    closing_thought: "A thought.",
  };
}

describe("processArticles", () => {
  beforeEach(() => {
    generateText.mockReset();
  });

  it("should return null without calling the model for empty input", async () => {
    const content = await processArticles(model, [], createTestConfig(), createMockLogger());

    expect(content).toBeNull();
    expect(generateText).not.toHaveBeenCalled();
  });

  it("should pass the top scored articles to generation", async () => {
    generateText
      .mockResolvedValueOnce({
        experimental_output: {
          scores: [
            { id: 0, score: 2, reason: "Weak." },
            { id: 1, score: 9, reason: "Strong." },
            { id: 2, score: 5, reason: "Okay." },
            { id: 3, score: 7, reason: "Good." },
            { id: 4, score: 1, reason: "Noise." },
          ],
        },
      })
      .mockResolvedValueOnce({ experimental_output: newsletterOutput(3) });

    const articles = [0, 1, 2, 3, 4].map((i) => makeArticle(i));
    const content = await processArticles(
      model,
      articles,
      createTestConfig(),
      createMockLogger(),
      3,
      now,
    );

    expect(generateText).toHaveBeenCalledTimes(2);
    expect(content?.top_stories).toHaveLength(3);
    expect(content?.original_articles.map((a) => a.title)).toEqual([
      "Article 1",
      "Article 3",
      "Article 2",
    ]);
  });

  it("should generate from the original order when scoring is malformed", async () => {
    generateText
      .mockResolvedValueOnce({ experimental_output: { scores: [{ id: "zero" }] } })
      .mockResolvedValueOnce({ experimental_output: newsletterOutput(2) });

    const articles = [makeArticle(0), makeArticle(1), makeArticle(2)];
    const content = await processArticles(
      model,
      articles,
      createTestConfig(),
      createMockLogger(),
      2,
      now,
    );

    const generationRequest = generateText.mock.calls[1]?.[0] as { prompt: string };
    expect(generationRequest.prompt).toBe(
      buildNewsletterPrompt([makeArticle(0), makeArticle(1)], now),
    );
    expect(content?.original_articles).toEqual([makeArticle(0), makeArticle(1)]);
  });

  it("should stop before generation when the limit leaves nothing", async () => {
    generateText.mockResolvedValueOnce({ experimental_output: { scores: [] } });
    const logger = createMockLogger();

    const content = await processArticles(
      model,
      [makeArticle(0)],
      createTestConfig(),
      logger,
      0,
    );

    expect(content).toBeNull();
    expect(generateText).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      { limit: 0 },
      "no articles selected for the newsletter",
    );
  });

  it("should return null when generation fails", async () => {
    generateText
      .mockResolvedValueOnce({ experimental_output: { scores: [] } })
      .mockRejectedValueOnce(new Error("boom"));

    const content = await processArticles(
      model,
      [makeArticle(0)],
      createTestConfig(),
      createMockLogger(),
    );

    expect(content).toBeNull();
  });
});
