/**
 * Text generation through a Mastra agent backed by an OpenAI chat model.
 *
 * The agent is instructed to answer only from the supplied document context
 * and to say so when the context does not contain the answer. Earlier turns of
 * the conversation are passed to the agent as chat messages.
 */
import { createOpenAI } from "@ai-sdk/openai";
import type { AppConfig } from "@config/index";
import type { GenerationPort, GenerationRequest } from "@domain/llm/ports";
import { logEvent } from "@infra/logging/Logger";
import { Agent } from "@mastra/core/agent";

export const NO_ANSWER = "I don't know from the documents.";

const INSTRUCTIONS = `
You are a retrieval-augmented assistant answering questions about uploaded documents.

RULES:
1. Answer ONLY using DOCUMENT CONTEXT. Quote or paraphrase the relevant passages.
2. Passages are numbered like [1], [2]; cite the numbers you relied on.
3. If DOCUMENT CONTEXT is empty or does not contain the answer, respond EXACTLY:
   "${NO_ANSWER}"
4. Do NOT use outside knowledge and never invent facts.
5. Answer in the language of the question. Be concise.
`;

type AgentMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | { role: "assistant"; content: string };

/** Document context first, then the earlier turns, then the question. */
export function buildMessages(request: GenerationRequest): AgentMessage[] {
  return [
    { role: "system", content: `DOCUMENT CONTEXT:\n${request.context || "No documents."}` },
    ...request.history.map(
      (turn): AgentMessage =>
        turn.role === "user"
          ? { role: "user", content: turn.content }
          : { role: "assistant", content: turn.content }
    ),
    { role: "user", content: request.query },
  ];
}

export class MastraGenerationAdapter implements GenerationPort {
  readonly modelName: string;
  private readonly agent: Agent;

  constructor(config: AppConfig["openai"]) {
    const provider = createOpenAI({
      apiKey: config.key,
      baseURL: config.baseUrl,
    });

    this.modelName = config.model;
    this.agent = new Agent({
      name: "document-answerer",
      instructions: INSTRUCTIONS,
      model: provider(config.model),
    });
  }

  async generate(request: GenerationRequest): Promise<string> {
    const startedAt = Date.now();

    try {
      const result = await this.agent.generate(buildMessages(request));

      logEvent("LLM_SUCCESS", {
        model: this.modelName,
        durationMs: Date.now() - startedAt,
        questionLength: request.query.length,
        contextLength: request.context.length,
        historyCount: request.history.length,
      });

      return result.text;
    } catch (error: unknown) {
      logEvent("LLM_FAILURE", {
        model: this.modelName,
        durationMs: Date.now() - startedAt,
        message: error instanceof Error ? error.message : String(error),
        name: error instanceof Error ? error.name : undefined,
      });
      throw error;
    }
  }
}
