/**
 * OpenAI-compatible API client.
 *
 * All direct calls to the embeddings endpoint go through this client. SDK
 * retries are disabled: the pipeline owns retry and backoff so that it can
 * isolate bad inputs and apply queue backpressure.
 */
import type { AppConfig } from "@config/index";
import { logEvent } from "@infra/logging/Logger";
import OpenAI from "openai";

export function createOpenAIClient(config: AppConfig["openai"]): OpenAI {
  return new OpenAI({
    apiKey: config.key,
    baseURL: config.baseUrl,
    timeout: config.timeoutMs,
    maxRetries: 0,
  });
}

/**
 * Lightweight startup check against the embeddings endpoint. Never throws:
 * the service still starts and request paths report their own failures.
 */
export async function validateOpenAIKey(
  client: OpenAI,
  config: AppConfig["openai"]
): Promise<boolean> {
  const startedAt = Date.now();

  try {
    const response = await client.embeddings.create({
      model: config.embeddingModel,
      input: "connectivity-check",
    });

    const vectorLength = response.data[0]?.embedding.length ?? 0;

    logEvent("OPENAI_CONNECTIVITY", {
      ok: vectorLength > 0,
      model: config.embeddingModel,
      durationMs: Date.now() - startedAt,
      vectorLength,
    });

    return vectorLength > 0;
  } catch (error: unknown) {
    logEvent("OPENAI_CONNECTIVITY", {
      ok: false,
      model: config.embeddingModel,
      durationMs: Date.now() - startedAt,
      message: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}
