/**
 * Centralized configuration for the ingestion and query pipelines.
 *
 * loadConfig() validates the environment once at startup and returns a deeply
 * frozen AppConfig. The composition root hands the relevant sections to each
 * component; nothing else reads process.env.
 */
import dotenv from "dotenv";
import { z } from "zod";

const intFrom = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const EnvSchema = z
  .object({
    NODE_ENV: z.string().default("development"),
    PORT: intFrom(3000),

    OPENAI_API_KEY: z
      .string({ required_error: "OPENAI_API_KEY is missing. Please set it in your .env file." })
      .min(1, "OPENAI_API_KEY is missing. Please set it in your .env file."),
    OPENAI_BASE_URL: optionalString,
    OPENAI_TIMEOUT_MS: intFrom(30000),
    OPENAI_MODEL: z.string().default("gpt-4o-mini"),
    OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
    OPENAI_EMBEDDING_DIMENSION: z.coerce.number().int().positive().default(1536),

    EMBEDDING_BATCH_SIZE: z.coerce.number().int().min(1).max(2048).default(100),
    EMBEDDING_CONCURRENCY: z.coerce.number().int().min(1).default(4),
    EMBEDDING_MAX_RETRIES: intFrom(3),
    EMBEDDING_BASE_DELAY_MS: intFrom(200),
    EMBEDDING_MAX_DELAY_MS: intFrom(5000),
    EMBEDDING_MAX_INPUT_CHARS: z.coerce.number().int().positive().default(24000),

    CHUNK_SIZE: z.coerce.number().int().positive().default(1000),
    CHUNK_OVERLAP: intFrom(200),
    CHUNK_LOCALE: z.string().default("en"),

    VECTOR_STORE: z.enum(["pinecone", "pgvector", "memory"]).default("pgvector"),
    PINECONE_API_KEY: optionalString,
    PINECONE_INDEX: z.string().default("rag-index"),
    PINECONE_NAMESPACE: z.string().default(""),
    PGVECTOR_TABLE: z
      .string()
      .regex(/^[a-z_][a-z0-9_]*$/, "PGVECTOR_TABLE must be a plain SQL identifier")
      .default("rag_vectors"),

    DB_HOST: z.string().default("localhost"),
    DB_PORT: intFrom(5432),
    DB_USER: optionalString,
    DB_PASSWORD: optionalString,
    DB_NAME: optionalString,
    DB_POOL_MAX: intFrom(10),
    DB_IDLE_TIMEOUT_MS: intFrom(30000),
    DB_CONN_TIMEOUT_MS: intFrom(10000),

    REDIS_URL: z.string().default("redis://localhost:6379"),

    CACHE_BACKEND: z.enum(["redis", "memory"]).default("redis"),
    CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(3600),
    CACHE_KEY_PREFIX: z.string().default("rag:cache:"),

    QUEUE_BACKEND: z.enum(["bullmq", "memory"]).default("bullmq"),
    QUEUE_NAME: z.string().default("chunk-embedding"),
    QUEUE_MAX_RECEIVE_COUNT: z.coerce.number().int().min(1).default(3),
    QUEUE_BATCH_SIZE: z.coerce.number().int().min(1).default(16),
    QUEUE_CONCURRENCY: z.coerce.number().int().min(1).default(1),
    QUEUE_RATE_LIMIT_COOLDOWN_MS: intFrom(5000),

    INGESTION_STATE_BACKEND: z.enum(["postgres", "memory"]).default("postgres"),
    OBJECT_STORE_ROOT: z.string().default("./data/objects"),
    DOCUMENTS_BUCKET: z.string().default("rag-documents"),
    UPLOAD_PREFIX: z.string().default("uploads/"),

    RAG_TOP_K: z.coerce.number().int().min(1).default(5),
    RAG_MAX_TOP_K: z.coerce.number().int().min(1).default(50),
    RAG_MIN_SCORE: z.coerce.number().min(-1).max(1).default(0),
    RAG_CONTEXT_BUDGET_CHARS: z.coerce.number().int().positive().default(6000),
    QUERY_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
    QUERY_MAX_CHARS: z.coerce.number().int().positive().default(1000),
    GENERATION_RETRIES: intFrom(1),

    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
    LOG_FILE: z.string().default("logs/app.log"),
  })
  .superRefine((env, ctx) => {
    if (env.CHUNK_OVERLAP >= env.CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["CHUNK_OVERLAP"],
        message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
      });
    }
    if (env.VECTOR_STORE === "pinecone" && !env.PINECONE_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["PINECONE_API_KEY"],
        message: "PINECONE_API_KEY is required when VECTOR_STORE=pinecone",
      });
    }
    if (env.RAG_TOP_K > env.RAG_MAX_TOP_K) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["RAG_TOP_K"],
        message: "RAG_TOP_K must not exceed RAG_MAX_TOP_K",
      });
    }
  });

function buildConfig(env: z.infer<typeof EnvSchema>) {
  return {
    env: env.NODE_ENV,
    port: env.PORT,

    openai: {
      key: env.OPENAI_API_KEY,
      baseUrl: env.OPENAI_BASE_URL,
      timeoutMs: env.OPENAI_TIMEOUT_MS,
      model: env.OPENAI_MODEL,
      embeddingModel: env.OPENAI_EMBEDDING_MODEL,
      embeddingDimension: env.OPENAI_EMBEDDING_DIMENSION,
    },

    embedding: {
      maxBatchSize: env.EMBEDDING_BATCH_SIZE,
      concurrency: env.EMBEDDING_CONCURRENCY,
      maxRetries: env.EMBEDDING_MAX_RETRIES,
      baseDelayMs: env.EMBEDDING_BASE_DELAY_MS,
      maxDelayMs: env.EMBEDDING_MAX_DELAY_MS,
      maxInputChars: env.EMBEDDING_MAX_INPUT_CHARS,
    },

    chunking: {
      maxChunkSize: env.CHUNK_SIZE,
      overlap: env.CHUNK_OVERLAP,
      locale: env.CHUNK_LOCALE,
    },

    vectorStore: {
      backend: env.VECTOR_STORE,
      pinecone: {
        apiKey: env.PINECONE_API_KEY,
        indexName: env.PINECONE_INDEX,
        namespace: env.PINECONE_NAMESPACE,
      },
      pgvector: {
        table: env.PGVECTOR_TABLE,
      },
    },

    db: {
      host: env.DB_HOST,
      port: env.DB_PORT,
      user: env.DB_USER,
      password: env.DB_PASSWORD,
      database: env.DB_NAME,
      max: env.DB_POOL_MAX,
      idleTimeoutMs: env.DB_IDLE_TIMEOUT_MS,
      connectionTimeoutMs: env.DB_CONN_TIMEOUT_MS,
    },

    redis: {
      url: env.REDIS_URL,
    },

    cache: {
      backend: env.CACHE_BACKEND,
      ttlMs: env.CACHE_TTL_SECONDS * 1000,
      keyPrefix: env.CACHE_KEY_PREFIX,
    },

    queue: {
      backend: env.QUEUE_BACKEND,
      name: env.QUEUE_NAME,
      maxReceiveCount: env.QUEUE_MAX_RECEIVE_COUNT,
      batchSize: env.QUEUE_BATCH_SIZE,
      concurrency: env.QUEUE_CONCURRENCY,
      rateLimitCooldownMs: env.QUEUE_RATE_LIMIT_COOLDOWN_MS,
    },

    ingestion: {
      stateBackend: env.INGESTION_STATE_BACKEND,
      objectStoreRoot: env.OBJECT_STORE_ROOT,
      bucket: env.DOCUMENTS_BUCKET,
      uploadPrefix: env.UPLOAD_PREFIX,
    },

    query: {
      topK: env.RAG_TOP_K,
      maxTopK: env.RAG_MAX_TOP_K,
      minScore: env.RAG_MIN_SCORE,
      contextBudgetChars: env.RAG_CONTEXT_BUDGET_CHARS,
      timeoutMs: env.QUERY_TIMEOUT_MS,
      maxQueryChars: env.QUERY_MAX_CHARS,
      generationRetries: env.GENERATION_RETRIES,
    },

    observability: {
      logLevel: env.LOG_LEVEL,
      logFile: env.LOG_FILE.trim() ? env.LOG_FILE.trim() : undefined,
    },
  };
}

type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type AppConfig = DeepReadonly<ReturnType<typeof buildConfig>>;

function deepFreeze(value: unknown): void {
  if (value && typeof value === "object") {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n- ${issues.join("\n- ")}`);
    this.name = "ConfigError";
  }
}

/**
 * Builds the immutable application config from an environment map.
 * Pass an explicit map in tests; the process entry points call it with no
 * argument after loading `.env`.
 */
export function loadConfig(
  env: Record<string, string | undefined> = loadDotenv()
): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "env"}: ${issue.message}`
      )
    );
  }

  const config = buildConfig(parsed.data);
  deepFreeze(config);
  return config;
}

function loadDotenv(): Record<string, string | undefined> {
  dotenv.config();
  return process.env;
}
