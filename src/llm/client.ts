import { createOpenRouter } from "@openrouter/ai-sdk-provider";
import type { LanguageModel } from "ai";

/**
 * Get a Vercel AI SDK compatible model instance from OpenRouter.
 * @param modelId - The OpenRouter model ID (e.g. 'anthropic/claude-3.5-sonnet')
 * @param apiKey - Falls back to OPENROUTER_API_KEY
 * @returns LanguageModel instance
 */
export function getModel(modelId: string, apiKey?: string): LanguageModel {
  const key = apiKey || process.env.OPENROUTER_API_KEY;
  if (!key) {
    throw new Error("OPENROUTER_API_KEY is not set in environment variables");
  }

  const openrouter = createOpenRouter({ apiKey: key });
  return openrouter(modelId);
}
