import { vi } from "vitest";
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import type { Article, NewsletterContent } from "../pipeline/types";

/**
 * Creates a mock Logger instance for testing.
 */
export function createMockLogger(): Logger {
  return {
    info: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
    level: "info" as const,
    setLevel: vi.fn(),
    child: vi.fn(),
    isLevelEnabled: vi.fn(),
  } as unknown as Logger;
}

export function createTestConfig(): AppConfig {
  return {
    llm: {
      provider: "openai",
      model: "gpt-test",
    },
    search: {
      apiKey: "test-search-key",
      baseUrl: "https://search.test",
      maxResults: 20,
      timeoutMs: 30000,
      maxConcurrency: 2,
    },
    newsletter: {
      name: "Test Brief",
      audience: "test readers",
      topics: ["AI agents", "LLMs"],
      trustedDomains: [],
      topStories: 5,
    },
    assessment: {
      maxArticleLength: 4000,
    },
    email: {
      apiKey: "test-mail-key",
      domain: "mail.example.com",
      from: "brief@example.com",
      recipients: ["reader@example.com"],
      templatePath: "./templates/newsletter.html",
    },
  };
}

export function makeArticle(id: number | string, overrides: Partial<Article> = {}): Article {
  return {
    url: `https://example.com/articles/${id}`,
    title: `Article ${id}`,
    rawContent: `Body of article ${id}`,
    ...overrides,
  };
}

export function makeContent(
  overrides: Partial<NewsletterContent> = {},
): NewsletterContent {
  return {
    opening_hook: "Big day for agents.",
    top_stories: [
      {
        headline: "Agents ship",
        summary: "Agents shipped today.",
        link: "https://example.com/articles/1",
      },
    ],
    tool_of_the_day: "A handy CLI.",
    closing_thought: "What comes next?",
    original_articles: [makeArticle(1)],
    ...overrides,
  };
}
