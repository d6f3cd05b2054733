import { readFileSync } from "node:fs";
import { parse } from "yaml";
import type { ZodIssue } from "zod";
import {
  appConfigSchema,
  envSchema,
  fileConfigSchema,
  DEFAULTS,
  DEFAULT_INTERESTS,
} from "./schema";
import type { AppConfig, EnvConfig, FileConfig } from "./schema";

export type LoadConfigOptions = {
  readonly env: Readonly<Record<string, string | undefined>>;
  readonly configPath?: string;
};

const REQUIRED_ENV = [
  "TAVILY_API_KEY",
  "MAILGUN_API_KEY",
  "MAILGUN_DOMAIN",
  "FROM_EMAIL",
  "RECIPIENT_EMAILS",
] as const;

const REQUIRED_AZURE_ENV = [
  "AZURE_OPENAI_ENDPOINT",
  "AZURE_OPENAI_API_KEY",
] as const;

function formatIssues(issues: ReadonlyArray<ZodIssue>): string {
  return issues
    .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
    .join("\n");
}

function readConfigFile(configPath: string): FileConfig {
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to read config file at ${configPath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to parse YAML in ${configPath}: ${message}`);
  }

  // an empty file parses to null
  const result = fileConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new Error(
      `invalid configuration in ${configPath}:\n${formatIssues(result.error.issues)}`,
    );
  }
  return result.data;
}

function readEnv(env: LoadConfigOptions["env"]): EnvConfig {
  // blank variables count as unset
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      present[key] = value.trim();
    }
  }

  const result = envSchema.safeParse(present);
  if (!result.success) {
    throw new Error(
      `invalid environment configuration:\n${formatIssues(result.error.issues)}`,
    );
  }
  return result.data;
}

export function normalizeDomain(domain: string): string {
  const trimmed = domain.trim().toLowerCase();
  return trimmed.startsWith("www.") ? trimmed.slice(4) : trimmed;
}

/**
 * Builds the application configuration from the process environment and an
 * optional YAML settings file. Environment variables take precedence over the
 * file, and the file over the defaults in `./schema`.
 *
 * Every missing required setting is reported in one error so an operator can
 * fix them in a single pass.
 */
export function loadConfig(options: LoadConfigOptions): AppConfig {
  const file = options.configPath ? readConfigFile(options.configPath) : {};
  const env = readEnv(options.env);

  const provider = env.LLM_PROVIDER ?? file.llm?.provider ?? DEFAULTS.llmProvider;

  const missing: string[] = REQUIRED_ENV.filter((name) => {
    const value = env[name];
    return value === undefined || value.length === 0;
  });
  if (provider === "azure") {
    missing.push(...REQUIRED_AZURE_ENV.filter((name) => env[name] === undefined));
  }
  if (missing.length > 0) {
    throw new Error(
      `missing required environment variables: ${missing.join(", ")}`,
    );
  }

  const model =
    env.LLM_MODEL ??
    file.llm?.model ??
    env.AZURE_OPENAI_DEPLOYMENT_NAME ??
    DEFAULTS.azureDeployment;

  const llm =
    provider === "azure"
      ? {
          provider,
          model: env.AZURE_OPENAI_DEPLOYMENT_NAME ?? model,
          endpoint: env.AZURE_OPENAI_ENDPOINT,
          apiKey: env.AZURE_OPENAI_API_KEY,
          apiVersion: env.AZURE_OPENAI_API_VERSION ?? DEFAULTS.azureApiVersion,
        }
      : { provider, model };

  const topics = env.AI_INTERESTS ?? file.newsletter?.topics ?? [...DEFAULT_INTERESTS];

  const candidate = {
    llm,
    search: {
      apiKey: env.TAVILY_API_KEY,
      baseUrl: env.TAVILY_BASE_URL ?? DEFAULTS.searchBaseUrl,
      maxResults:
        env.SEARCH_MAX_RESULTS ??
        file.search?.maxResults ??
        DEFAULTS.searchMaxResults,
      timeoutMs:
        env.SEARCH_TIMEOUT_MS ?? file.search?.timeoutMs ?? DEFAULTS.searchTimeoutMs,
      maxConcurrency:
        env.SEARCH_MAX_CONCURRENCY ??
        file.search?.maxConcurrency ??
        Math.max(topics.length, 1),
    },
    newsletter: {
      name: env.NEWSLETTER_NAME ?? file.newsletter?.name ?? DEFAULTS.newsletterName,
      audience:
        env.TARGET_AUDIENCE ?? file.newsletter?.audience ?? DEFAULTS.audience,
      topics,
      trustedDomains: (env.TRUSTED_DOMAINS ?? file.newsletter?.trustedDomains ?? [])
        .map(normalizeDomain)
        .filter((domain) => domain.length > 0),
      topStories:
        env.TOP_STORIES ?? file.newsletter?.topStories ?? DEFAULTS.topStories,
    },
    assessment: {
      maxArticleLength:
        env.MAX_ARTICLE_LENGTH ??
        file.assessment?.maxArticleLength ??
        DEFAULTS.maxArticleLength,
    },
    email: {
      apiKey: env.MAILGUN_API_KEY,
      domain: env.MAILGUN_DOMAIN,
      url: env.MAILGUN_URL,
      from: env.FROM_EMAIL,
      recipients: env.RECIPIENT_EMAILS,
      templatePath:
        env.TEMPLATE_PATH ?? file.email?.templatePath ?? DEFAULTS.templatePath,
    },
  };

  const result = appConfigSchema.safeParse(candidate);
  if (!result.success) {
    throw new Error(`invalid configuration:\n${formatIssues(result.error.issues)}`);
  }

  return Object.freeze(result.data);
}

export type { AppConfig, LlmConfig, LlmProviderName } from "./schema";
