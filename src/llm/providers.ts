import { anthropic } from "@ai-sdk/anthropic";
import { createAzure } from "@ai-sdk/azure";
import { openai } from "@ai-sdk/openai";
import { google } from "@ai-sdk/google";
import { createOpenAICompatible } from "@ai-sdk/openai-compatible";
import { createOllama } from "ollama-ai-provider-v2";
import type { LanguageModel } from "ai";
import type { LlmConfig } from "../config";

const ollama = createOllama({
  baseURL: process.env["OLLAMA_BASE_URL"] ?? "http://localhost:11434/api",
});

const lmstudio = createOpenAICompatible({
  name: "lmstudio",
  baseURL: process.env["LMSTUDIO_BASE_URL"] ?? "http://localhost:1234/v1",
});

/**
 * Azure OpenAI addresses models by deployment name under
 * `{endpoint}/openai/deployments/{deployment}`.
 */
function azureModel(
  endpoint: string,
  apiKey: string,
  apiVersion: string,
  deployment: string,
): LanguageModel {
  const azure = createAzure({
    baseURL: `${endpoint.replace(/\/+$/, "")}/openai`,
    apiKey,
    apiVersion,
    useDeploymentBasedUrls: true,
  });
  return azure.chat(deployment);
}

export function getModel(llm: LlmConfig): LanguageModel {
  switch (llm.provider) {
    case "azure":
      return azureModel(llm.endpoint, llm.apiKey, llm.apiVersion, llm.model);
    case "anthropic":
      return anthropic(llm.model);
    case "openai":
      return openai(llm.model);
    case "gemini":
      return google(llm.model);
    case "ollama":
      return ollama(llm.model);
    case "lmstudio":
      return lmstudio(llm.model);
    default: {
      const _exhaustive: never = llm;
      throw new Error(`unknown provider: ${JSON.stringify(_exhaustive)}`);
    }
  }
}
