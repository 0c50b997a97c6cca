/**
 * Core ingestion entities.
 *
 * A Document is one immutable version of an uploaded object; re-uploading
 * different bytes under the same key produces a new version rather than
 * mutating the old one. Chunks are keyed by document version.
 */
export interface Document {
  documentId: string;
  sourceUri: string;
  contentType: string;
  rawText: string;
  version: string;
}

export interface Chunk {
  chunkId: string;
  documentId: string;
  version: string;
  sequenceIndex: number;
  text: string;
  charStart: number;
  charEnd: number;
  contentHash: string;
}
