/**
 * In-process stand-ins for the embedding and generation services.
 */
import type { EmbeddingService, GenerationPort, GenerationRequest } from "@domain/llm/ports";

const KEYWORDS = ["alpha", "beta", "gamma"];

/** [alpha count, beta count, gamma count, 1] for the lower-cased text. */
export function keywordVector(text: string): number[] {
  const lower = text.toLowerCase();
  return [...KEYWORDS.map((word) => lower.split(word).length - 1), 1];
}

export function httpError(status: number, message: string): Error {
  return Object.assign(new Error(message), { status });
}

export class FakeEmbeddingService implements EmbeddingService {
  readonly modelName = "test-embedding";
  readonly dimension = 4;
  readonly calls: string[][] = [];

  /** Runs before each call; throw from it to simulate a provider failure. */
  beforeCall: ((texts: string[], call: number) => void) | undefined;

  async embedBatch(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    this.beforeCall?.(texts, this.calls.length);
    return texts.map(keywordVector);
  }
}

export class ScriptedGenerator implements GenerationPort {
  readonly modelName = "test-generation";
  readonly requests: GenerationRequest[] = [];

  /** Runs before each call, e.g. to advance a test clock. */
  beforeGenerate: (() => void) | undefined;

  /** Consumed in order; an Error is thrown, a string is returned. */
  constructor(private readonly script: Array<string | Error>) {}

  async generate(request: GenerationRequest): Promise<string> {
    this.requests.push(request);
    this.beforeGenerate?.();
    const next = this.script.shift();
    if (next === undefined) {
      throw new Error("generator script exhausted");
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}
