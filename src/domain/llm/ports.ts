/**
 * Domain ports for the two managed model APIs the pipeline depends on.
 *
 * Both are black-box request/response services with their own rate limits.
 * Implementations throw the provider's raw errors; classification into
 * transient and permanent failures happens in the app layer.
 */
export interface EmbeddingService {
  readonly modelName: string;
  readonly dimension: number;

  /** One vector per input, in input order. */
  embedBatch(texts: string[]): Promise<number[][]>;
}

/** A prior turn of the conversation the question belongs to. */
export interface ConversationTurn {
  role: "user" | "assistant";
  content: string;
}

export interface GenerationRequest {
  query: string;
  context: string;
  history: ConversationTurn[];
}

export interface GenerationPort {
  readonly modelName: string;

  generate(request: GenerationRequest): Promise<string>;
}
