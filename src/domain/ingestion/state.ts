/**
 * Per-document-version ingestion state machine.
 *
 *   RECEIVED → CHUNKED → QUEUED → EMBEDDING → INDEXED
 *                 ↘         ↘         ↘
 *                  FAILED ← ← ← ← ← ← ←
 *
 * FAILED → QUEUED is the retry pass: it re-enqueues only the chunks that were
 * never recorded as indexed.
 */
import { InvalidStateTransition } from "@typesLocal/AppError";

export const INGESTION_STATUSES = [
  "RECEIVED",
  "CHUNKED",
  "QUEUED",
  "EMBEDDING",
  "INDEXED",
  "FAILED",
] as const;

export type IngestionStatus = (typeof INGESTION_STATUSES)[number];

const TRANSITIONS: Record<IngestionStatus, readonly IngestionStatus[]> = {
  RECEIVED: ["CHUNKED"],
  CHUNKED: ["QUEUED", "FAILED"],
  QUEUED: ["EMBEDDING", "FAILED"],
  EMBEDDING: ["INDEXED", "FAILED"],
  INDEXED: [],
  FAILED: ["QUEUED"],
};

export function canTransition(from: IngestionStatus, to: IngestionStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: IngestionStatus, to: IngestionStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidStateTransition(from, to);
  }
}

export interface DocumentVersionRecord {
  documentId: string;
  version: string;
  sourceUri: string;
  contentType: string;
  status: IngestionStatus;
  chunkIds: string[];
  indexedChunkIds: string[];
  failedChunkIds: string[];
  lastError?: string | undefined;
  supersededBy?: string | undefined;
  /** Epoch milliseconds. */
  createdAt: number;
  /** Epoch milliseconds. */
  updatedAt: number;
}

export type DocumentVersionPatch = Partial<
  Pick<
    DocumentVersionRecord,
    "status" | "chunkIds" | "failedChunkIds" | "lastError" | "supersededBy"
  >
>;

export function missingChunkIds(record: DocumentVersionRecord): string[] {
  const indexed = new Set(record.indexedChunkIds);
  return record.chunkIds.filter((id) => !indexed.has(id));
}

export function isFullyIndexed(record: DocumentVersionRecord): boolean {
  return record.chunkIds.length > 0 && missingChunkIds(record).length === 0;
}

/**
 * Persistence for document-version records. Concurrent queue consumers
 * update the same record, so status changes are compare-and-set and chunk id
 * sets only grow.
 */
export interface IngestionStateRepository {
  /** Inserts the record unless one exists; returns the stored record. */
  create(record: DocumentVersionRecord): Promise<DocumentVersionRecord>;

  get(documentId: string, version: string): Promise<DocumentVersionRecord | undefined>;

  /** All versions of a document, oldest first. */
  list(documentId: string): Promise<DocumentVersionRecord[]>;

  /**
   * Applies the patch when the current status is one of `expected`.
   * Returns undefined when the record is missing or its status differs.
   */
  update(
    documentId: string,
    version: string,
    patch: DocumentVersionPatch,
    expected?: readonly IngestionStatus[]
  ): Promise<DocumentVersionRecord | undefined>;

  /** Adds chunk ids to the indexed set (and removes them from the failed set). */
  addIndexedChunks(
    documentId: string,
    version: string,
    chunkIds: string[]
  ): Promise<DocumentVersionRecord | undefined>;

  close(): Promise<void>;
}
