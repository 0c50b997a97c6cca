import { z } from "zod";

/**
 * Zod schemas for the ingestion API:
 * - ObjectCreatedEventSchema: storage notification `{bucket, key}`
 * - UploadDocumentSchema: manual upload; binary formats (PDF, DOCX) are sent as base64
 * - VersionSelectorSchema: optional `version` for status lookups
 * - ResumeRequestSchema: version to run the retry pass for
 */
export const ObjectCreatedEventSchema = z.object({
  bucket: z.string().min(1),
  key: z.string().min(1),
});

export const UploadDocumentSchema = z.object({
  key: z.string().min(1),
  content: z.string().min(1),
  content_type: z.string().min(1).optional(),
  encoding: z.enum(["utf-8", "base64"]).default("utf-8"),
});

export const VersionSelectorSchema = z.object({
  version: z.string().min(1).optional(),
});

export const ResumeRequestSchema = z.object({
  version: z.string().min(1),
});

export const DocumentParamsSchema = z.object({
  documentId: z.string().min(1),
});
