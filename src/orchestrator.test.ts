import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { LanguageModel } from "ai";

const { generateText } = vi.hoisted(() => ({ generateText: vi.fn() }));

vi.mock("ai", () => ({
  generateText,
  Output: { object: vi.fn((options: unknown) => options) },
}));

// Import after mocking
import { createPipelineStages, previewNewsletter, runNewsletter } from "./orchestrator";
import type { PipelineStages } from "./orchestrator";
import type { SendNewsletterFn } from "./newsletter/sender";
import type { NewsletterContent } from "./pipeline/types";
import {
  createMockLogger,
  createTestConfig,
  makeArticle,
  makeContent,
} from "./test-utils/fixtures";

function createStages(overrides: Partial<PipelineStages> = {}) {
  return {
    collect: vi.fn<PipelineStages["collect"]>().mockResolvedValue([makeArticle(1)]),
    process: vi.fn<PipelineStages["process"]>().mockResolvedValue(makeContent()),
    deliver: vi.fn<PipelineStages["deliver"]>().mockResolvedValue(true),
    ...overrides,
  };
}

describe("runNewsletter", () => {
  it("should collect, process and deliver", async () => {
    const stages = createStages();

    const sent = await runNewsletter(stages, createMockLogger());

    expect(sent).toBe(true);
    expect(stages.process).toHaveBeenCalledWith([makeArticle(1)]);
    expect(stages.deliver).toHaveBeenCalledWith(makeContent());
  });

  it("should stop without processing when no articles are found", async () => {
    const stages = createStages({
      collect: vi.fn<PipelineStages["collect"]>().mockResolvedValue([]),
    });
    const logger = createMockLogger();

    const sent = await runNewsletter(stages, logger);

    expect(sent).toBe(false);
    expect(stages.process).not.toHaveBeenCalled();
    expect(stages.deliver).not.toHaveBeenCalled();
    expect(logger.warn).toHaveBeenCalledWith("no articles found, stopping pipeline");
  });

  it("should stop without delivering when no content is produced", async () => {
    const stages = createStages({
      process: vi.fn<PipelineStages["process"]>().mockResolvedValue(null),
    });

    const sent = await runNewsletter(stages, createMockLogger());

    expect(sent).toBe(false);
    expect(stages.deliver).not.toHaveBeenCalled();
  });

  it("should report a failed delivery", async () => {
    const stages = createStages({
      deliver: vi.fn<PipelineStages["deliver"]>().mockResolvedValue(false),
    });

    expect(await runNewsletter(stages, createMockLogger())).toBe(false);
  });

  it("should catch unexpected errors and log them as fatal", async () => {
    const stages = createStages({
      collect: vi.fn<PipelineStages["collect"]>().mockRejectedValue(new Error("kaboom")),
    });
    const logger = createMockLogger();

    const sent = await runNewsletter(stages, logger);

    expect(sent).toBe(false);
    expect(logger.fatal).toHaveBeenCalledWith(
      expect.objectContaining({ error: "kaboom", stack: expect.any(String) }),
      "unexpected error in newsletter pipeline",
    );
  });
});

describe("previewNewsletter", () => {
  it("should write the preview and never deliver", async () => {
    const stages = createStages();
    const write = vi.fn<(text: string) => void>();

    const produced = await previewNewsletter(
      stages,
      { newsletterName: "Test Brief", write, now: () => new Date(2026, 9, 8) },
      createMockLogger(),
    );

    expect(produced).toBe(true);
    expect(stages.deliver).not.toHaveBeenCalled();
    expect(write).toHaveBeenCalledTimes(1);
    expect(write.mock.calls[0]?.[0]).toContain("SUBJECT: Test Brief - October 08, 2026");
  });

  it("should write a notice when nothing was produced", async () => {
    const stages = createStages({
      collect: vi.fn<PipelineStages["collect"]>().mockResolvedValue([]),
    });
    const write = vi.fn<(text: string) => void>();

    const produced = await previewNewsletter(
      stages,
      { newsletterName: "Test Brief", write },
      createMockLogger(),
    );

    expect(produced).toBe(false);
    expect(write).toHaveBeenCalledWith(
      "No newsletter content was produced. Check the logs for details.\n",
    );
  });

  it("should catch unexpected errors", async () => {
    const stages = createStages({
      process: vi.fn<PipelineStages["process"]>().mockRejectedValue(new Error("boom")),
    });

    const produced = await previewNewsletter(
      stages,
      { newsletterName: "Test Brief", write: vi.fn() },
      createMockLogger(),
    );

    expect(produced).toBe(false);
  });
});

describe("newsletter pipeline end to end", () => {
  const model = { modelId: "mock-model" } as unknown as LanguageModel;

  function searchResults(prefix: string, shared: string) {
    return [
      { url: `https://example.com/${prefix}-1`, title: `${prefix} one`, raw_content: "text" },
      { url: `https://example.com/${prefix}-2`, title: `${prefix} two`, raw_content: "text" },
      { url: shared, title: "shared story", raw_content: "text" },
    ];
  }

  beforeEach(() => {
    generateText.mockReset();
    const shared = "https://example.com/shared";
    vi.stubGlobal(
      "fetch",
      vi.fn(async (_url: string, init: RequestInit) => {
        const { query } = JSON.parse(String(init.body)) as { query: string };
        const prefix = query === "latest news on AI agents" ? "agents" : "llms";
        return {
          ok: true,
          status: 200,
          statusText: "OK",
          json: async () => ({ results: searchResults(prefix, shared) }),
        };
      }),
    );
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should send one newsletter built from the three best unique articles", async () => {
    const base = createTestConfig();
    const config = {
      ...base,
      newsletter: { ...base.newsletter, topStories: 3 },
    };

    generateText.mockImplementation(async (request: { prompt: string }) => {
      if (request.prompt.startsWith("Articles to score:")) {
        const ids = request.prompt.match(/^ID: \d+$/gm) ?? [];
        return {
          experimental_output: {
            scores: ids.map((_, id) => ({ id, score: id, reason: `Reason ${id}` })),
          },
        };
      }
      return {
        experimental_output: {
          opening_hook: "Welcome.",
          top_stories: [1, 2, 3].map((n) => ({
            headline: `Story ${n}`,
            summary: `Summary ${n}`,
            link: `https://example.com/story-${n}`,
          })),
          tool_of_the_day: "A tool.",
          closing_thought: "A thought.",
        },
      };
    });

    const send = vi
      .fn<SendNewsletterFn>()
      .mockResolvedValue({ success: true, messageId: "msg-e2e" });
    const logger = createMockLogger();
    const stages = createPipelineStages(config, model, send, logger);

    const collect = vi.fn(stages.collect);
    const processStage = vi.fn(stages.process);
    const sent = await runNewsletter(
      { ...stages, collect, process: processStage },
      logger,
    );

    expect(sent).toBe(true);
    const collected = await collect.mock.results[0]?.value;
    expect(collected).toHaveLength(5);

    const content: NewsletterContent | null = await processStage.mock.results[0]?.value;
    expect(content?.top_stories).toHaveLength(3);
    expect(content?.original_articles.map((a) => a.title)).toEqual([
      "llms two",
      "llms one",
      "shared story",
    ]);

    expect(send).toHaveBeenCalledTimes(1);
    expect(send.mock.calls[0]?.[0].to).toEqual(["reader@example.com"]);
  });
});
