/**
 * Document ingestion pipeline.
 *
 * Drives each document version through
 * RECEIVED → CHUNKED → QUEUED → EMBEDDING → INDEXED:
 * - object-created events are decoded, chunked and enqueued as work messages
 * - queue consumers embed the chunks and upsert them keyed by chunk id
 * - indexed chunk ids are recorded as they land, so a failed version can be
 *   resumed with only its missing chunks
 * - once a version is fully indexed, older versions of the document are
 *   superseded and their vectors deleted
 * - re-uploading the content of a superseded version (a revert) creates a new
 *   revision of it, `<hash>.<n>`, which is indexed again
 *
 * Handlers are safe under at-least-once delivery: chunk ids are deterministic,
 * upserts overwrite, and status changes are compare-and-set.
 */
import type { EmbeddingBatcher } from "@app/embedding/EmbeddingBatcher";
import type { Chunker } from "@domain/ingestion/Chunker";
import {
  decodeDocument,
  inferContentType,
} from "@domain/ingestion/DocumentDecoder";
import {
  assertTransition,
  isFullyIndexed,
  missingChunkIds,
  type DocumentVersionPatch,
  type DocumentVersionRecord,
  type IngestionStateRepository,
  type IngestionStatus,
} from "@domain/ingestion/state";
import type { Chunk, Document } from "@domain/ingestion/types";
import type {
  ChunkWorkItem,
  OutgoingMessage,
  WorkDelivery,
  WorkQueue,
} from "@domain/queue/ports";
import type { VectorRecord, VectorStore } from "@domain/rag/ports";
import type { ObjectStore } from "@domain/storage/ports";
import { logEvent, logger } from "@infra/logging/Logger";
import {
  DomainError,
  InvalidStateTransition,
  NotFoundError,
  UnsupportedFormat,
  ValidationError,
  errorMessage,
  isAppError,
} from "@typesLocal/AppError";
import { sha256Hex } from "@utils/hash";

export interface ObjectCreatedEvent {
  bucket: string;
  key: string;
}

export interface UploadRequest {
  /** Path below the upload prefix, e.g. "handbook/leave-policy.md". */
  key: string;
  content: string;
  contentType?: string | undefined;
  /** How `content` is encoded; binary documents arrive as base64. */
  encoding?: "utf-8" | "base64" | undefined;
}

export interface IngestionResult {
  documentId: string;
  version: string;
  status: IngestionStatus;
  chunks: number;
  /** True when the event matched a version that was already being handled. */
  duplicate: boolean;
}

export interface IngestionCoordinatorOptions {
  bucket: string;
  uploadPrefix: string;
  /** Chunks per queue message. */
  queueBatchSize: number;
}

export interface IngestionCoordinatorDeps {
  objectStore: ObjectStore;
  queue: WorkQueue;
  state: IngestionStateRepository;
  chunker: Chunker;
  batcher: EmbeddingBatcher;
  vectorStore: VectorStore;
  options: IngestionCoordinatorOptions;
  now?: () => number;
}

function toWorkItem(chunk: Chunk): ChunkWorkItem {
  return {
    document_id: chunk.documentId,
    version: chunk.version,
    chunk_id: chunk.chunkId,
    sequence_index: chunk.sequenceIndex,
    text: chunk.text,
    char_start: chunk.charStart,
    char_end: chunk.charEnd,
  };
}

/** The content hash a version was derived from, without its revision suffix. */
export function contentHashOf(version: string): string {
  return version.split(".")[0] ?? version;
}

function splitSourceUri(sourceUri: string): ObjectCreatedEvent {
  const slash = sourceUri.indexOf("/");
  return { bucket: sourceUri.slice(0, slash), key: sourceUri.slice(slash + 1) };
}

export class IngestionCoordinator {
  private readonly now: () => number;

  constructor(private readonly deps: IngestionCoordinatorDeps) {
    this.now = deps.now ?? Date.now;
  }

  /**
   * Entry point for object-created events. Keys outside the upload prefix are
   * ignored and resolve to undefined.
   */
  async handleObjectCreated(
    event: ObjectCreatedEvent
  ): Promise<IngestionResult | undefined> {
    const { uploadPrefix } = this.deps.options;

    if (!event.key.startsWith(uploadPrefix)) {
      logEvent("INGEST_SKIPPED", { ...event, reason: "outside upload prefix" });
      return undefined;
    }

    const documentId = event.key.slice(uploadPrefix.length);
    if (!documentId || documentId.endsWith("/")) {
      throw new ValidationError("Object key does not name a document", { ...event });
    }

    const object = await this.deps.objectStore.getObject(event.bucket, event.key);
    const contentType = object.contentType ?? inferContentType(event.key);
    const { version, existing } = await this.resolveVersion(
      documentId,
      sha256Hex(object.body).slice(0, 16)
    );

    if (existing && existing.status !== "RECEIVED" && existing.status !== "CHUNKED") {
      logEvent("INGEST_DUPLICATE", { documentId, version, status: existing.status });
      return this.result(existing, true);
    }

    const timestamp = this.now();
    let record =
      existing ??
      (await this.deps.state.create({
        documentId,
        version,
        sourceUri: `${event.bucket}/${event.key}`,
        contentType,
        status: "RECEIVED",
        chunkIds: [],
        indexedChunkIds: [],
        failedChunkIds: [],
        createdAt: timestamp,
        updatedAt: timestamp,
      }));

    let chunks: Chunk[];
    try {
      chunks = this.chunkDocument({
        documentId,
        version,
        contentType,
        sourceUri: record.sourceUri,
        rawText: await decodeDocument(object.body, contentType),
      });
    } catch (error: unknown) {
      if (error instanceof UnsupportedFormat) {
        await this.deps.state.update(
          documentId,
          version,
          { lastError: error.message },
          ["RECEIVED"]
        );
        logEvent("INGEST_UNSUPPORTED", { documentId, version, contentType, message: error.message });
      }
      throw error;
    }

    if (record.status === "RECEIVED") {
      record = await this.transition(record, "CHUNKED", {
        chunkIds: chunks.map((chunk) => chunk.chunkId),
        lastError: undefined,
      });
    }

    record = await this.transition(record, "QUEUED");
    await this.enqueueChunks(record, chunks, "initial");

    logEvent("INGEST_ACCEPTED", {
      documentId,
      version,
      contentType,
      chunks: chunks.length,
    });

    return this.result(record, existing !== undefined);
  }

  /** Stores an uploaded document under the upload prefix and ingests it. */
  async putDocument(upload: UploadRequest): Promise<IngestionResult> {
    const { bucket, uploadPrefix } = this.deps.options;
    const key = upload.key.startsWith(uploadPrefix)
      ? upload.key
      : `${uploadPrefix}${upload.key.replace(/^\/+/, "")}`;

    await this.deps.objectStore.putObject(
      bucket,
      key,
      upload.encoding === "base64"
        ? new Uint8Array(Buffer.from(upload.content, "base64"))
        : new TextEncoder().encode(upload.content),
      upload.contentType ?? inferContentType(key)
    );

    const result = await this.handleObjectCreated({ bucket, key });
    if (!result) {
      throw new ValidationError("Upload key is outside the upload prefix", { key });
    }
    return result;
  }

  /**
   * Queue consumer. Embeds the delivered chunks, upserts their vectors and
   * records them as indexed. Transient failures propagate so the queue
   * redelivers; on the final delivery the version is marked FAILED first.
   */
  async processWorkItems(delivery: WorkDelivery): Promise<void> {
    const groups = new Map<string, ChunkWorkItem[]>();
    for (const item of delivery.items) {
      const key = `${item.document_id}\u0000${item.version}`;
      groups.set(key, [...(groups.get(key) ?? []), item]);
    }

    for (const items of groups.values()) {
      await this.processVersion(items, delivery);
    }
  }

  /**
   * Retry pass for a FAILED version: re-enqueues only the chunks that were
   * never recorded as indexed.
   */
  async resume(documentId: string, version: string): Promise<IngestionResult> {
    let record = await this.deps.state.get(documentId, version);
    if (!record) {
      throw new NotFoundError(`Unknown document version: ${documentId}@${version}`, {
        documentId,
        version,
      });
    }
    if (record.status !== "FAILED") {
      throw new InvalidStateTransition(record.status, "QUEUED", { documentId, version });
    }
    if (record.supersededBy) {
      throw new DomainError(
        `Version ${version} was superseded by ${record.supersededBy}`,
        409,
        { documentId, version },
        { stage: "ingestion" }
      );
    }

    const missing = new Set(missingChunkIds(record));
    const chunks = missing.size > 0 ? await this.reloadChunks(record) : [];
    const pending = chunks.filter((chunk) => missing.has(chunk.chunkId));

    record = await this.transition(record, "QUEUED", {
      failedChunkIds: [],
      lastError: undefined,
    });

    logEvent("INGEST_RESUME", { documentId, version, missing: pending.length });

    if (pending.length === 0) {
      record = await this.transition(record, "EMBEDDING");
      record = (await this.finalize(record)) ?? record;
      return this.result(record, false);
    }

    await this.enqueueChunks(record, pending, `resume-${this.now()}`);
    return { ...this.result(record, false), chunks: pending.length };
  }

  /** The record for a version, or for the most recent version when omitted. */
  async status(documentId: string, version?: string): Promise<DocumentVersionRecord> {
    const record = version
      ? await this.deps.state.get(documentId, version)
      : (await this.deps.state.list(documentId)).at(-1);

    if (!record) {
      throw new NotFoundError(`Unknown document: ${documentId}`, { documentId, version });
    }
    return record;
  }

  private async processVersion(
    items: ChunkWorkItem[],
    delivery: WorkDelivery
  ): Promise<void> {
    const first = items[0];
    if (!first) {
      return;
    }
    const { document_id: documentId, version } = first;

    let record = await this.deps.state.get(documentId, version);
    if (!record) {
      logger.log("warn", "Work for unknown document version dropped", {
        documentId,
        version,
        messageId: delivery.messageId,
      });
      return;
    }
    if (record.status === "INDEXED" || record.supersededBy) {
      return;
    }

    if (record.status === "QUEUED") {
      record =
        (await this.deps.state.update(documentId, version, { status: "EMBEDDING" }, ["QUEUED"])) ??
        (await this.deps.state.get(documentId, version)) ??
        record;
    }

    const indexed = new Set(record.indexedChunkIds);
    const pending = items.filter((item) => !indexed.has(item.chunk_id));
    if (pending.length === 0) {
      await this.finalize(record);
      return;
    }

    const ids = pending.map((item) => item.chunk_id);
    const { contentType, sourceUri } = record;
    let updated: DocumentVersionRecord | undefined;
    let upsertedIds: string[];
    let itemErrors: Array<{ id: string; reason: string }>;

    try {
      const result = await this.deps.batcher.embed(
        pending.map((item) => ({ id: item.chunk_id, text: item.text }))
      );

      const vectors: VectorRecord[] = [];
      result.vectors.forEach((vector, index) => {
        const item = pending[index];
        if (vector && item) {
          vectors.push({
            id: item.chunk_id,
            vector: vector.vector,
            metadata: {
              document_id: item.document_id,
              version: item.version,
              sequence_index: item.sequence_index,
              char_start: item.char_start,
              char_end: item.char_end,
              text: item.text,
              content_type: contentType,
              source_uri: sourceUri,
            },
          });
        }
      });

      upsertedIds = vectors.map((vector) => vector.id);
      await this.deps.vectorStore.upsert(vectors);
      updated = await this.deps.state.addIndexedChunks(documentId, version, upsertedIds);
      itemErrors = result.errors;
    } catch (error: unknown) {
      const fatal = isAppError(error) && !error.retryable;
      if (fatal || delivery.attempt >= delivery.maxAttempts) {
        await this.markFailed(documentId, version, ids, errorMessage(error));
      } else {
        logEvent("INGEST_RETRY", {
          documentId,
          version,
          attempt: delivery.attempt,
          message: errorMessage(error),
        });
      }
      throw error;
    }

    // A newer version may have been indexed while these chunks were embedding;
    // its supersede pass has already run, so the late vectors are removed here.
    if (updated?.supersededBy) {
      await this.deps.vectorStore.delete(upsertedIds);
      logEvent("INGEST_SUPERSEDED", {
        documentId,
        version,
        supersededBy: updated.supersededBy,
        deletedVectors: upsertedIds.length,
      });
      return;
    }

    logEvent("INGEST_CHUNKS_INDEXED", {
      documentId,
      version,
      indexed: ids.length - itemErrors.length,
      failed: itemErrors.length,
    });

    if (itemErrors.length > 0) {
      await this.markFailed(
        documentId,
        version,
        itemErrors.map((itemError) => itemError.id),
        itemErrors.map((itemError) => `${itemError.id}: ${itemError.reason}`).join("; ")
      );
      return;
    }

    if (updated) {
      await this.finalize(updated);
    }
  }

  /** Moves a fully indexed EMBEDDING version to INDEXED and supersedes older versions. */
  private async finalize(
    record: DocumentVersionRecord
  ): Promise<DocumentVersionRecord | undefined> {
    if (record.status !== "EMBEDDING" || !isFullyIndexed(record)) {
      return undefined;
    }

    const indexed = await this.deps.state.update(
      record.documentId,
      record.version,
      { status: "INDEXED", failedChunkIds: [], lastError: undefined },
      ["EMBEDDING"]
    );
    if (!indexed) {
      // Another consumer finished the version first.
      return undefined;
    }

    logEvent("INGEST_INDEXED", {
      documentId: indexed.documentId,
      version: indexed.version,
      chunks: indexed.chunkIds.length,
    });

    await this.supersedeOlderVersions(indexed);
    return indexed;
  }

  private async supersedeOlderVersions(current: DocumentVersionRecord): Promise<void> {
    const versions = await this.deps.state.list(current.documentId);

    for (const older of versions) {
      if (
        older.version === current.version ||
        older.supersededBy ||
        older.createdAt > current.createdAt
      ) {
        continue;
      }

      // Marked before the delete: a consumer that records chunks after this
      // update sees supersededBy and removes its own vectors.
      const marked = await this.deps.state.update(older.documentId, older.version, {
        supersededBy: current.version,
      });
      if (!marked) {
        continue;
      }
      await this.deps.vectorStore.delete(marked.indexedChunkIds);

      logEvent("INGEST_SUPERSEDED", {
        documentId: older.documentId,
        version: older.version,
        supersededBy: current.version,
        deletedVectors: marked.indexedChunkIds.length,
      });
    }
  }

  /**
   * Versions are content hashes. Content matching a superseded version gets the
   * next free revision so a revert is indexed again rather than treated as a
   * duplicate of vectors that were already deleted.
   */
  private async resolveVersion(
    documentId: string,
    contentHash: string
  ): Promise<{ version: string; existing: DocumentVersionRecord | undefined }> {
    for (let revision = 1; ; revision++) {
      const version = revision === 1 ? contentHash : `${contentHash}.${revision}`;
      const existing = await this.deps.state.get(documentId, version);
      if (!existing?.supersededBy) {
        return { version, existing };
      }
    }
  }

  private async markFailed(
    documentId: string,
    version: string,
    chunkIds: string[],
    reason: string
  ): Promise<void> {
    // Concurrent consumers may move the status between read and write.
    for (let tries = 0; tries < 3; tries++) {
      const current = await this.deps.state.get(documentId, version);
      if (!current || current.status === "INDEXED" || current.status === "RECEIVED") {
        return;
      }

      const failedChunkIds = [...new Set([...current.failedChunkIds, ...chunkIds])];
      const updated = await this.deps.state.update(
        documentId,
        version,
        { status: "FAILED", failedChunkIds, lastError: reason },
        [current.status]
      );

      if (updated) {
        logEvent("INGEST_FAILED", {
          documentId,
          version,
          from: current.status,
          failedChunkIds,
          message: reason,
        });
        return;
      }
    }

    logger.log("error", "Could not record failed chunks", { documentId, version, chunkIds });
  }

  private async transition(
    record: DocumentVersionRecord,
    to: IngestionStatus,
    patch: Omit<DocumentVersionPatch, "status"> = {}
  ): Promise<DocumentVersionRecord> {
    assertTransition(record.status, to);

    const updated = await this.deps.state.update(
      record.documentId,
      record.version,
      { ...patch, status: to },
      [record.status]
    );

    if (!updated) {
      const current = await this.deps.state.get(record.documentId, record.version);
      throw new InvalidStateTransition(current?.status ?? record.status, to, {
        documentId: record.documentId,
        version: record.version,
      });
    }

    logEvent("INGEST_TRANSITION", {
      documentId: record.documentId,
      version: record.version,
      from: record.status,
      to,
    });
    return updated;
  }

  private async enqueueChunks(
    record: DocumentVersionRecord,
    chunks: Chunk[],
    pass: string
  ): Promise<void> {
    const { queueBatchSize } = this.deps.options;
    const messages: OutgoingMessage[] = [];

    for (let i = 0; i < chunks.length; i += queueBatchSize) {
      const batch = chunks.slice(i, i + queueBatchSize);
      messages.push({
        messageId: sha256Hex(
          `${pass}:${record.documentId}:${record.version}:${batch.map((chunk) => chunk.chunkId).join(",")}`
        ).slice(0, 32),
        items: batch.map(toWorkItem),
      });
    }

    try {
      const accepted = await this.deps.queue.enqueue(messages);
      logEvent("INGEST_ENQUEUED", {
        documentId: record.documentId,
        version: record.version,
        messages: messages.length,
        accepted,
      });
    } catch (error: unknown) {
      await this.markFailed(
        record.documentId,
        record.version,
        [],
        `enqueue failed: ${errorMessage(error)}`
      );
      throw error;
    }
  }

  private chunkDocument(document: Document): Chunk[] {
    const chunks = this.deps.chunker.chunk(document);
    if (chunks.length === 0) {
      throw new UnsupportedFormat("No text content extracted", {
        documentId: document.documentId,
      });
    }
    return chunks;
  }

  /** Re-derives a version's chunks from its stored object. */
  private async reloadChunks(record: DocumentVersionRecord): Promise<Chunk[]> {
    const { bucket, key } = splitSourceUri(record.sourceUri);
    const object = await this.deps.objectStore.getObject(bucket, key);

    if (sha256Hex(object.body).slice(0, 16) !== contentHashOf(record.version)) {
      throw new DomainError(
        "Stored object no longer matches this version; upload it again",
        409,
        { documentId: record.documentId, version: record.version },
        { stage: "ingestion" }
      );
    }

    const chunks = this.chunkDocument({
      documentId: record.documentId,
      version: record.version,
      contentType: record.contentType,
      sourceUri: record.sourceUri,
      rawText: await decodeDocument(object.body, record.contentType),
    });

    const expected = new Set(record.chunkIds);
    if (!chunks.every((chunk) => expected.has(chunk.chunkId))) {
      throw new DomainError(
        "Chunking settings changed since this version was ingested",
        409,
        { documentId: record.documentId, version: record.version },
        { stage: "ingestion" }
      );
    }
    return chunks;
  }

  private result(record: DocumentVersionRecord, duplicate: boolean): IngestionResult {
    return {
      documentId: record.documentId,
      version: record.version,
      status: record.status,
      chunks: record.chunkIds.length,
      duplicate,
    };
  }
}
