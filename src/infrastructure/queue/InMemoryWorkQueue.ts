/**
 * Process-local work queue with at-least-once delivery, a max receive count
 * and a dead-letter list. Used for single-process runs and in tests.
 *
 * After a transient failure the queue waits `rateLimitCooldownMs` before it
 * pulls the next message, so a rate-limited embedding service is not fed new
 * work.
 *
 * Message ids are remembered for deduplication up to `dedupeWindow` entries;
 * past that the oldest ids are forgotten first.
 */
import type {
  ChunkWorkItem,
  OutgoingMessage,
  WorkHandler,
  WorkQueue,
} from "@domain/queue/ports";
import { logEvent, logger } from "@infra/logging/Logger";
import { errorMessage, isAppError } from "@typesLocal/AppError";
import { delay, isRetryableError } from "@utils/retry";

const DEFAULT_DEDUPE_WINDOW = 10_000;

interface PendingMessage {
  messageId: string;
  items: ChunkWorkItem[];
  receiveCount: number;
}

export interface DeadLetter {
  messageId: string;
  items: ChunkWorkItem[];
  receiveCount: number;
  error: string;
}

export interface InMemoryWorkQueueOptions {
  maxReceiveCount: number;
  rateLimitCooldownMs: number;
  /** Most recent message ids kept for deduplication. Defaults to 10 000. */
  dedupeWindow?: number;
  sleep?: (ms: number) => Promise<void>;
}

export class InMemoryWorkQueue implements WorkQueue {
  readonly deadLetters: DeadLetter[] = [];
  private readonly pending: PendingMessage[] = [];
  private readonly known = new Set<string>();
  private handler: WorkHandler | undefined;
  private draining: Promise<void> | undefined;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: InMemoryWorkQueueOptions) {
    this.sleep = options.sleep ?? delay;
  }

  private remember(messageId: string): void {
    this.known.add(messageId);
    const window = this.options.dedupeWindow ?? DEFAULT_DEDUPE_WINDOW;
    for (const oldest of this.known) {
      if (this.known.size <= window) break;
      this.known.delete(oldest);
    }
  }

  async enqueue(messages: OutgoingMessage[]): Promise<number> {
    let accepted = 0;
    for (const message of messages) {
      if (this.known.has(message.messageId)) {
        continue;
      }
      this.remember(message.messageId);
      this.pending.push({ ...message, receiveCount: 0 });
      accepted += 1;
    }
    this.kick();
    return accepted;
  }

  async consume(handler: WorkHandler): Promise<void> {
    this.handler = handler;
    this.kick();
  }

  /** Resolves once every pending message has been delivered or dead-lettered. */
  async idle(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  get depth(): number {
    return this.pending.length;
  }

  async close(): Promise<void> {
    this.handler = undefined;
    await this.idle();
  }

  private kick(): void {
    if (!this.handler || this.draining) {
      return;
    }

    this.draining = this.drain()
      .catch((error: unknown) => {
        logger.log("error", "In-memory queue drain failed", {
          message: errorMessage(error),
        });
      })
      .finally(() => {
        this.draining = undefined;
        if (this.pending.length > 0) {
          this.kick();
        }
      });
  }

  private async drain(): Promise<void> {
    let message = this.pending.shift();

    while (message && this.handler) {
      message.receiveCount += 1;

      try {
        await this.handler({
          messageId: message.messageId,
          items: message.items,
          attempt: message.receiveCount,
          maxAttempts: this.options.maxReceiveCount,
        });
      } catch (error: unknown) {
        const fatal = isAppError(error) && !error.retryable;

        if (fatal || message.receiveCount >= this.options.maxReceiveCount) {
          this.deadLetters.push({
            messageId: message.messageId,
            items: message.items,
            receiveCount: message.receiveCount,
            error: errorMessage(error),
          });
          logEvent("QUEUE_DEAD_LETTER", {
            messageId: message.messageId,
            receiveCount: message.receiveCount,
            message: errorMessage(error),
          });
        } else {
          this.pending.push(message);
          if (isRetryableError(error)) {
            await this.sleep(this.options.rateLimitCooldownMs);
          }
        }
      }

      message = this.pending.shift();
    }
  }
}
