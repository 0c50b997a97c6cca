/**
 * Redis-backed work queue on BullMQ.
 *
 * - jobId is the message id, so re-enqueueing an existing message is a no-op
 * - `attempts` is the max receive count; exhausted jobs stay in the failed set,
 *   which serves as the dead-letter queue
 * - non-retryable handler errors become UnrecoverableError (no further attempts)
 * - transient errors rate-limit the worker for `rateLimitCooldownMs`
 */
import {
  ChunkWorkMessageSchema,
  type ChunkWorkMessage,
  type OutgoingMessage,
  type WorkHandler,
  type WorkQueue,
} from "@domain/queue/ports";
import { logEvent } from "@infra/logging/Logger";
import { errorMessage, isAppError } from "@typesLocal/AppError";
import { isRetryableError } from "@utils/retry";
import { Queue, UnrecoverableError, Worker, type Job } from "bullmq";

const JOB_NAME = "embed-chunks";

export interface BullMQWorkQueueOptions {
  name: string;
  redisUrl: string;
  maxReceiveCount: number;
  concurrency: number;
  rateLimitCooldownMs: number;
  /** First retry delay; doubles per attempt. */
  backoffDelayMs?: number;
}

export interface RedisConnectionOptions {
  host: string;
  port: number;
  username?: string;
  password?: string;
  db?: number;
  maxRetriesPerRequest: null;
}

export function parseRedisUrl(url: string): RedisConnectionOptions {
  const parsed = new URL(url);
  const db = Number(parsed.pathname.replace(/^\//, ""));
  return {
    host: parsed.hostname,
    port: Number(parsed.port) || 6379,
    ...(parsed.username ? { username: decodeURIComponent(parsed.username) } : {}),
    ...(parsed.password ? { password: decodeURIComponent(parsed.password) } : {}),
    ...(Number.isInteger(db) && db > 0 ? { db } : {}),
    // BullMQ workers block on Redis and require this to be null.
    maxRetriesPerRequest: null,
  };
}

export class BullMQWorkQueue implements WorkQueue {
  private readonly queue: Queue<ChunkWorkMessage>;
  private worker: Worker<ChunkWorkMessage> | undefined;
  private readonly connection: RedisConnectionOptions;

  constructor(private readonly options: BullMQWorkQueueOptions) {
    this.connection = parseRedisUrl(options.redisUrl);
    this.queue = new Queue<ChunkWorkMessage>(options.name, {
      connection: this.connection,
    });
  }

  async enqueue(messages: OutgoingMessage[]): Promise<number> {
    if (messages.length === 0) {
      return 0;
    }

    await this.queue.addBulk(
      messages.map((message) => ({
        name: JOB_NAME,
        data: { items: message.items },
        opts: {
          jobId: message.messageId,
          attempts: this.options.maxReceiveCount,
          backoff: {
            type: "exponential",
            delay: this.options.backoffDelayMs ?? 1000,
          },
          removeOnComplete: true,
          removeOnFail: false,
        },
      }))
    );

    logEvent("QUEUE_ENQUEUE", { queue: this.options.name, messages: messages.length });
    return messages.length;
  }

  async consume(handler: WorkHandler): Promise<void> {
    if (this.worker) {
      return;
    }

    const worker = new Worker<ChunkWorkMessage>(
      this.options.name,
      (job) => this.process(job, handler),
      { connection: this.connection, concurrency: this.options.concurrency }
    );

    worker.on("failed", (job, error) => {
      const attempts = job?.opts.attempts ?? this.options.maxReceiveCount;
      const exhausted =
        error instanceof UnrecoverableError || (job?.attemptsMade ?? 0) >= attempts;
      logEvent(exhausted ? "QUEUE_DEAD_LETTER" : "QUEUE_RETRY", {
        queue: this.options.name,
        jobId: job?.id,
        attemptsMade: job?.attemptsMade,
        message: error.message,
      });
    });

    this.worker = worker;
  }

  async close(): Promise<void> {
    if (this.worker) {
      await this.worker.close();
    }
    await this.queue.close();
  }

  private async process(job: Job<ChunkWorkMessage>, handler: WorkHandler): Promise<void> {
    const parsed = ChunkWorkMessageSchema.safeParse(job.data);
    if (!parsed.success) {
      throw new UnrecoverableError(`Malformed work message: ${parsed.error.message}`);
    }

    try {
      await handler({
        messageId: job.id ?? "",
        items: parsed.data.items,
        attempt: job.attemptsMade + 1,
        maxAttempts: job.opts.attempts ?? this.options.maxReceiveCount,
      });
    } catch (error: unknown) {
      if (isAppError(error) && !error.retryable) {
        throw new UnrecoverableError(error.message);
      }
      if (isRetryableError(error) && this.worker) {
        await this.worker.rateLimit(this.options.rateLimitCooldownMs);
      }
      throw error instanceof Error ? error : new Error(errorMessage(error));
    }
  }
}
