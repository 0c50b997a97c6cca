/**
 * Ingestion HTTP controllers.
 *
 * - POST /ingest/events: object-created notification, 202 once enqueued
 * - POST /ingest/documents: manual upload (text, or base64 for PDF and DOCX) under the upload prefix
 * - GET  /ingest/documents/:documentId/status[?version=]
 * - POST /ingest/documents/:documentId/resume: retry pass for a FAILED version
 *
 * Document ids may contain slashes; clients URL-encode them in the path.
 */
import type {
  IngestionCoordinator,
  IngestionResult,
} from "@app/ingest/IngestionCoordinator";
import type { DocumentVersionRecord } from "@domain/ingestion/state";
import {
  DocumentParamsSchema,
  ObjectCreatedEventSchema,
  ResumeRequestSchema,
  UploadDocumentSchema,
  VersionSelectorSchema,
} from "@interfaces/http/ingest/schema";
import { parseInput } from "@interfaces/http/validation";
import type { NextFunction, Request, Response } from "express";

function toResultBody(result: IngestionResult) {
  return {
    document_id: result.documentId,
    version: result.version,
    status: result.status,
    chunks: result.chunks,
    duplicate: result.duplicate,
  };
}

function toRecordBody(record: DocumentVersionRecord) {
  return {
    document_id: record.documentId,
    version: record.version,
    source_uri: record.sourceUri,
    content_type: record.contentType,
    status: record.status,
    chunks: record.chunkIds.length,
    indexed_chunks: record.indexedChunkIds.length,
    failed_chunk_ids: record.failedChunkIds,
    last_error: record.lastError ?? null,
    superseded_by: record.supersededBy ?? null,
    created_at: new Date(record.createdAt).toISOString(),
    updated_at: new Date(record.updatedAt).toISOString(),
  };
}

export function createIngestController(coordinator: IngestionCoordinator) {
  return {
    async objectCreated(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const event = parseInput(ObjectCreatedEventSchema, req.body, "event");
        const result = await coordinator.handleObjectCreated(event);

        if (!result) {
          res.status(202).json({ ignored: true, reason: "key outside upload prefix" });
          return;
        }
        res.status(202).json(toResultBody(result));
      } catch (err: unknown) {
        next(err);
      }
    },

    async upload(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const body = parseInput(UploadDocumentSchema, req.body);
        const result = await coordinator.putDocument({
          key: body.key,
          content: body.content,
          contentType: body.content_type,
          encoding: body.encoding,
        });
        res.status(202).json(toResultBody(result));
      } catch (err: unknown) {
        next(err);
      }
    },

    async status(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const { documentId } = parseInput(DocumentParamsSchema, req.params, "path");
        const { version } = parseInput(VersionSelectorSchema, req.query, "query string");
        const record = await coordinator.status(documentId, version);
        res.json(toRecordBody(record));
      } catch (err: unknown) {
        next(err);
      }
    },

    async resume(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const { documentId } = parseInput(DocumentParamsSchema, req.params, "path");
        const { version } = parseInput(ResumeRequestSchema, req.body);
        const result = await coordinator.resume(documentId, version);
        res.status(202).json(toResultBody(result));
      } catch (err: unknown) {
        next(err);
      }
    },
  };
}
