/**
 * Work queue carrying chunk-embedding work between the chunking producer and
 * the embedding consumers. Delivery is at-least-once; after
 * `maxAttempts` failed deliveries a message is dead-lettered.
 */
import { z } from "zod";

export const ChunkWorkItemSchema = z.object({
  document_id: z.string().min(1),
  version: z.string().min(1),
  chunk_id: z.string().min(1),
  sequence_index: z.number().int().nonnegative(),
  text: z.string(),
  char_start: z.number().int().nonnegative(),
  char_end: z.number().int().nonnegative(),
});

export type ChunkWorkItem = z.infer<typeof ChunkWorkItemSchema>;

export const ChunkWorkMessageSchema = z.object({
  items: z.array(ChunkWorkItemSchema).min(1),
});

export type ChunkWorkMessage = z.infer<typeof ChunkWorkMessageSchema>;

export interface WorkDelivery {
  messageId: string;
  items: ChunkWorkItem[];
  /** 1-based delivery count for this message. */
  attempt: number;
  maxAttempts: number;
}

export type WorkHandler = (delivery: WorkDelivery) => Promise<void>;

export interface OutgoingMessage {
  /** Queues drop a message whose id they already hold. */
  messageId: string;
  items: ChunkWorkItem[];
}

export interface WorkQueue {
  /** Returns how many messages were accepted. */
  enqueue(messages: OutgoingMessage[]): Promise<number>;

  /** Starts delivering messages to the handler until close(). */
  consume(handler: WorkHandler): Promise<void>;

  close(): Promise<void>;
}
