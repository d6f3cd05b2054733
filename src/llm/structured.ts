// pattern: Imperative Shell
import { generateText, Output } from "ai";
import type { LanguageModel } from "ai";
import type { z } from "zod";

export type StructuredRequest<T> = {
  readonly model: LanguageModel;
  readonly schema: z.ZodType<T, unknown>;
  readonly system: string;
  readonly prompt: string;
};

/**
 * Sends a single stateless prompt and returns the model's JSON answer
 * validated against `schema`. Throws when the call fails or the answer does
 * not match; callers decide the fallback.
 */
export async function generateStructured<T>(
  request: StructuredRequest<T>,
): Promise<T> {
  const response = await generateText({
    model: request.model,
    system: request.system,
    prompt: request.prompt,
    experimental_output: Output.object({ schema: request.schema }),
  });

  const result: unknown = response.experimental_output;
  if (!result || typeof result !== "object") {
    throw new Error("LLM returned invalid result");
  }

  return request.schema.parse(result);
}
