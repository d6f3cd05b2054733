import { z } from "zod";

export const DEFAULT_INTERESTS = [
  "Large Language Models",
  "AI agents",
  "AI tools",
  "machine learning breakthroughs",
] as const;

export const DEFAULTS = {
  llmProvider: "azure",
  azureDeployment: "gpt-5-nano",
  azureApiVersion: "2024-12-01-preview",
  audience: "tech professionals and AI enthusiasts",
  newsletterName: "AI Daily Brief",
  topStories: 5,
  maxArticleLength: 4000,
  searchBaseUrl: "https://api.tavily.com",
  searchMaxResults: 20,
  searchTimeoutMs: 30_000,
  templatePath: "./templates/newsletter.html",
} as const;

export const llmProviderSchema = z.enum([
  "azure",
  "openai",
  "anthropic",
  "gemini",
  "ollama",
  "lmstudio",
]);

export type LlmProviderName = z.infer<typeof llmProviderSchema>;

const commaList = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0),
  );

const numeric = z.coerce.number().int();

/**
 * Shape of the optional YAML settings file. Holds only non-secret settings;
 * every field may be omitted.
 */
export const fileConfigSchema = z
  .object({
    newsletter: z
      .object({
        name: z.string().min(1).optional(),
        audience: z.string().min(1).optional(),
        topics: z.array(z.string()).optional(),
        trustedDomains: z.array(z.string()).optional(),
        topStories: z.number().int().nonnegative().optional(),
      })
      .strict()
      .optional(),
    search: z
      .object({
        maxResults: z.number().int().min(1).max(100).optional(),
        timeoutMs: z.number().int().positive().optional(),
        maxConcurrency: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
    llm: z
      .object({
        provider: llmProviderSchema.optional(),
        model: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    assessment: z
      .object({
        maxArticleLength: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
    email: z
      .object({
        templatePath: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

/**
 * Environment variables read at startup. Required settings are checked
 * separately so that every missing name lands in a single error.
 */
export const envSchema = z.object({
  TAVILY_API_KEY: z.string().optional(),
  TAVILY_BASE_URL: z.string().url().optional(),
  LLM_PROVIDER: llmProviderSchema.optional(),
  LLM_MODEL: z.string().min(1).optional(),
  AZURE_OPENAI_ENDPOINT: z.string().url().optional(),
  AZURE_OPENAI_API_KEY: z.string().optional(),
  AZURE_OPENAI_DEPLOYMENT_NAME: z.string().min(1).optional(),
  AZURE_OPENAI_API_VERSION: z.string().min(1).optional(),
  MAILGUN_API_KEY: z.string().optional(),
  MAILGUN_DOMAIN: z.string().optional(),
  MAILGUN_URL: z.string().url().optional(),
  FROM_EMAIL: z.string().optional(),
  RECIPIENT_EMAILS: commaList.optional(),
  AI_INTERESTS: commaList.optional(),
  TARGET_AUDIENCE: z.string().min(1).optional(),
  NEWSLETTER_NAME: z.string().min(1).optional(),
  TRUSTED_DOMAINS: commaList.optional(),
  TOP_STORIES: numeric.nonnegative().optional(),
  MAX_ARTICLE_LENGTH: numeric.positive().optional(),
  SEARCH_MAX_RESULTS: numeric.min(1).max(100).optional(),
  SEARCH_TIMEOUT_MS: numeric.positive().optional(),
  SEARCH_MAX_CONCURRENCY: numeric.positive().optional(),
  TEMPLATE_PATH: z.string().min(1).optional(),
});

export type EnvConfig = z.infer<typeof envSchema>;

const azureLlmSchema = z.object({
  provider: z.literal("azure"),
  model: z.string().min(1),
  endpoint: z.string().url(),
  apiKey: z.string().min(1),
  apiVersion: z.string().min(1),
});

const hostedLlmSchema = z.object({
  provider: llmProviderSchema.exclude(["azure"]),
  model: z.string().min(1),
});

export const appConfigSchema = z.object({
  llm: z.discriminatedUnion("provider", [azureLlmSchema, hostedLlmSchema]),
  search: z.object({
    apiKey: z.string().min(1),
    baseUrl: z.string().url(),
    maxResults: z.number().int().min(1).max(100),
    timeoutMs: z.number().int().positive(),
    maxConcurrency: z.number().int().positive(),
  }),
  newsletter: z.object({
    name: z.string().min(1),
    audience: z.string().min(1),
    topics: z.array(z.string().min(1)).min(1),
    trustedDomains: z.array(z.string().min(1)),
    topStories: z.number().int().nonnegative(),
  }),
  assessment: z.object({
    maxArticleLength: z.number().int().positive(),
  }),
  email: z.object({
    apiKey: z.string().min(1),
    domain: z.string().min(1),
    url: z.string().url().optional(),
    from: z.string().min(1),
    recipients: z.array(z.string().min(1)).min(1),
    templatePath: z.string().min(1),
  }),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type LlmConfig = AppConfig["llm"];
