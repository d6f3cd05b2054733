// pattern: Imperative Shell
import { z } from "zod";
import type { Logger } from "pino";
import type { Article, SearchResult } from "./types";

export type SearchOptions = {
  readonly apiKey: string;
  readonly baseUrl: string;
  readonly maxResults: number;
  readonly timeoutMs: number;
};

const tavilyResultSchema = z.object({
  url: z.string().nullish(),
  title: z.string().nullish(),
  content: z.string().nullish(),
  raw_content: z.string().nullish(),
});

const tavilyResponseSchema = z.object({
  results: z.array(tavilyResultSchema).default([]),
});

type TavilyResult = z.infer<typeof tavilyResultSchema>;

function toArticle(url: string, result: TavilyResult): Article {
  return {
    url,
    title: result.title ?? "",
    rawContent: result.raw_content ?? result.content ?? "",
  };
}

/**
 * Runs one Tavily news search limited to the last day. Never throws: HTTP
 * errors, timeouts and unexpected payloads come back as a failed result.
 */
export async function searchTopic(
  query: string,
  options: SearchOptions,
  logger: Logger,
): Promise<SearchResult> {
  let body: unknown;
  try {
    const response = await fetch(`${options.baseUrl}/search`, {
      method: "POST",
      signal: AbortSignal.timeout(options.timeoutMs),
      headers: {
        Authorization: `Bearer ${options.apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        query,
        topic: "news",
        search_depth: "advanced",
        days: 1,
        max_results: options.maxResults,
        include_raw_content: true,
      }),
    });

    if (!response.ok) {
      const error = `HTTP ${response.status}: ${response.statusText}`;
      logger.error({ query, error }, "search request failed");
      return { success: false, query, error };
    }

    body = await response.json();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ query, error: message }, "search request failed");
    return { success: false, query, error: message };
  }

  const parsed = tavilyResponseSchema.safeParse(body);
  if (!parsed.success) {
    const error = `unexpected search response: ${parsed.error.issues[0]?.message ?? "invalid body"}`;
    logger.error({ query, error }, "search request failed");
    return { success: false, query, error };
  }

  const articles = parsed.data.results
    .flatMap((result) => (result.url ? [toArticle(result.url, result)] : []));

  logger.info({ query, count: articles.length }, "search complete");
  return { success: true, query, articles };
}
