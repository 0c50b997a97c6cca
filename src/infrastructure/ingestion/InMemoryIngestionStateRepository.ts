import type {
  DocumentVersionPatch,
  DocumentVersionRecord,
  IngestionStateRepository,
  IngestionStatus,
} from "@domain/ingestion/state";

const keyOf = (documentId: string, version: string) => `${documentId}\u0000${version}`;

export class InMemoryIngestionStateRepository implements IngestionStateRepository {
  private readonly records = new Map<string, DocumentVersionRecord>();

  constructor(private readonly now: () => number = Date.now) {}

  async create(record: DocumentVersionRecord): Promise<DocumentVersionRecord> {
    const key = keyOf(record.documentId, record.version);
    const existing = this.records.get(key);
    if (existing) {
      return structuredClone(existing);
    }
    this.records.set(key, structuredClone(record));
    return structuredClone(record);
  }

  async get(documentId: string, version: string): Promise<DocumentVersionRecord | undefined> {
    const record = this.records.get(keyOf(documentId, version));
    return record ? structuredClone(record) : undefined;
  }

  async list(documentId: string): Promise<DocumentVersionRecord[]> {
    return [...this.records.values()]
      .filter((record) => record.documentId === documentId)
      .sort((a, b) => a.createdAt - b.createdAt)
      .map((record) => structuredClone(record));
  }

  async update(
    documentId: string,
    version: string,
    patch: DocumentVersionPatch,
    expected?: readonly IngestionStatus[]
  ): Promise<DocumentVersionRecord | undefined> {
    const key = keyOf(documentId, version);
    const current = this.records.get(key);
    if (!current || (expected && !expected.includes(current.status))) {
      return undefined;
    }

    const next: DocumentVersionRecord = {
      ...current,
      ...patch,
      updatedAt: this.now(),
    };
    this.records.set(key, next);
    return structuredClone(next);
  }

  async addIndexedChunks(
    documentId: string,
    version: string,
    chunkIds: string[]
  ): Promise<DocumentVersionRecord | undefined> {
    const key = keyOf(documentId, version);
    const current = this.records.get(key);
    if (!current) {
      return undefined;
    }

    const added = new Set(chunkIds);
    const next: DocumentVersionRecord = {
      ...current,
      indexedChunkIds: [...new Set([...current.indexedChunkIds, ...chunkIds])],
      failedChunkIds: current.failedChunkIds.filter((id) => !added.has(id)),
      updatedAt: this.now(),
    };
    this.records.set(key, next);
    return structuredClone(next);
  }

  async close(): Promise<void> {}
}
