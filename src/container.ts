/**
 * Composition root.
 *
 * Builds every component once from the immutable AppConfig and picks the
 * backend for each port from configuration. Nothing below this file branches
 * on backend identity.
 */
import { EmbeddingBatcher } from "@app/embedding/EmbeddingBatcher";
import { IngestionCoordinator } from "@app/ingest/IngestionCoordinator";
import { QueryOrchestrator } from "@app/query/QueryOrchestrator";
import { ConfigError, type AppConfig } from "@config/index";
import type { CacheStore } from "@domain/cache/ports";
import { Chunker } from "@domain/ingestion/Chunker";
import type { IngestionStateRepository } from "@domain/ingestion/state";
import type { WorkQueue } from "@domain/queue/ports";
import type { VectorStore } from "@domain/rag/ports";
import type { ObjectStore } from "@domain/storage/ports";
import { InMemoryCacheStore } from "@infra/cache/InMemoryCacheStore";
import { RedisCacheStore } from "@infra/cache/RedisCacheStore";
import { createPool } from "@infra/database/db";
import { PgVectorStore } from "@infra/database/PgVectorStore";
import { InMemoryIngestionStateRepository } from "@infra/ingestion/InMemoryIngestionStateRepository";
import { PgIngestionStateRepository } from "@infra/ingestion/PgIngestionStateRepository";
import { OpenAIEmbeddingService } from "@infra/llm/EmbeddingProvider";
import { MastraGenerationAdapter } from "@infra/llm/MastraGenerationAdapter";
import { createOpenAIClient } from "@infra/llm/OpenAIAdapter";
import { configureLogger, logEvent } from "@infra/logging/Logger";
import { BullMQWorkQueue } from "@infra/queue/BullMQWorkQueue";
import { InMemoryWorkQueue } from "@infra/queue/InMemoryWorkQueue";
import { FileObjectStore } from "@infra/storage/FileObjectStore";
import { InMemoryVectorStore } from "@infra/vectorstore/InMemoryVectorStore";
import {
  PineconeVectorStore,
  createPineconeIndex,
} from "@infra/vectorstore/PineconeVectorStore";
import { Redis } from "ioredis";
import type OpenAI from "openai";
import type { Pool } from "pg";

export interface Container {
  config: AppConfig;
  openai: OpenAI;
  objectStore: ObjectStore;
  queue: WorkQueue;
  state: IngestionStateRepository;
  vectorStore: VectorStore;
  cache: CacheStore;
  batcher: EmbeddingBatcher;
  coordinator: IngestionCoordinator;
  orchestrator: QueryOrchestrator;
  close(): Promise<void>;
}

function createVectorStore(config: AppConfig, pool: () => Pool): VectorStore {
  const dimension = config.openai.embeddingDimension;

  switch (config.vectorStore.backend) {
    case "pinecone": {
      const { apiKey, indexName, namespace } = config.vectorStore.pinecone;
      if (!apiKey) {
        throw new ConfigError(["PINECONE_API_KEY: required when VECTOR_STORE=pinecone"]);
      }
      return new PineconeVectorStore(
        createPineconeIndex({ apiKey, indexName, namespace }),
        { dimension, namespace }
      );
    }
    case "pgvector":
      return new PgVectorStore(pool(), { table: config.vectorStore.pgvector.table, dimension });
    case "memory":
      return new InMemoryVectorStore(dimension);
  }
}

function createQueue(config: AppConfig): WorkQueue {
  const { queue } = config;

  if (queue.backend === "memory") {
    return new InMemoryWorkQueue({
      maxReceiveCount: queue.maxReceiveCount,
      rateLimitCooldownMs: queue.rateLimitCooldownMs,
    });
  }
  return new BullMQWorkQueue({
    name: queue.name,
    redisUrl: config.redis.url,
    maxReceiveCount: queue.maxReceiveCount,
    concurrency: queue.concurrency,
    rateLimitCooldownMs: queue.rateLimitCooldownMs,
    backoffDelayMs: config.embedding.baseDelayMs,
  });
}

/**
 * Wires the application. Postgres schemas are created on first use when a
 * Postgres-backed port is configured.
 */
export async function createContainer(config: AppConfig): Promise<Container> {
  configureLogger({
    level: config.observability.logLevel,
    filePath: config.observability.logFile,
    console: true,
  });

  let pool: Pool | undefined;
  const getPool = (): Pool => {
    pool ??= createPool(config.db);
    return pool;
  };

  const redis = config.cache.backend === "redis" ? new Redis(config.redis.url) : undefined;

  const openai = createOpenAIClient(config.openai);
  const batcher = new EmbeddingBatcher(
    new OpenAIEmbeddingService(openai, {
      model: config.openai.embeddingModel,
      dimension: config.openai.embeddingDimension,
    }),
    config.embedding
  );

  const vectorStore = createVectorStore(config, getPool);
  const state: IngestionStateRepository =
    config.ingestion.stateBackend === "postgres"
      ? new PgIngestionStateRepository(getPool())
      : new InMemoryIngestionStateRepository();
  const cache: CacheStore = redis
    ? new RedisCacheStore(redis, config.cache.keyPrefix)
    : new InMemoryCacheStore();
  const queue = createQueue(config);
  const objectStore = new FileObjectStore(config.ingestion.objectStoreRoot);

  if (vectorStore instanceof PgVectorStore) {
    await vectorStore.ensureSchema();
  }
  if (state instanceof PgIngestionStateRepository) {
    await state.ensureSchema();
  }

  const coordinator = new IngestionCoordinator({
    objectStore,
    queue,
    state,
    chunker: new Chunker(config.chunking),
    batcher,
    vectorStore,
    options: {
      bucket: config.ingestion.bucket,
      uploadPrefix: config.ingestion.uploadPrefix,
      queueBatchSize: config.queue.batchSize,
    },
  });

  const orchestrator = new QueryOrchestrator({
    batcher,
    vectorStore,
    cache,
    generator: new MastraGenerationAdapter(config.openai),
    options: { ...config.query, cacheTtlMs: config.cache.ttlMs },
  });

  logEvent("CONTAINER_READY", {
    vectorStore: config.vectorStore.backend,
    cache: config.cache.backend,
    queue: config.queue.backend,
    ingestionState: config.ingestion.stateBackend,
    embeddingModel: config.openai.embeddingModel,
    generationModel: config.openai.model,
  });

  return {
    config,
    openai,
    objectStore,
    queue,
    state,
    vectorStore,
    cache,
    batcher,
    coordinator,
    orchestrator,
    async close() {
      await queue.close();
      await cache.close();
      await vectorStore.close();
      await state.close();
      if (pool) {
        await pool.end();
      }
    },
  };
}
