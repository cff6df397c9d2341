// src/http/middleware/uploads.ts

/**
 * Multipart upload parsing (multer, in-memory storage).
 *
 * Text fields land on req.body, files on req.files. Non-multipart requests pass through.
 * The handles are owned by the request; validation only reads them.
 */

import type { Request, RequestHandler } from 'express';
import multer from 'multer';

export function createUploadMiddleware(maxFileBytes: number): RequestHandler {
  return multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxFileBytes },
  }).any();
}

/**
 * Files of the request keyed by field name; several files under one field become a list.
 */
export function groupUploadedFiles(req: Request): Record<string, unknown> {
  const files = req.files;
  if (files === undefined) return {};

  const byField: Record<string, Express.Multer.File[]> = Array.isArray(files) ? {} : files;
  if (Array.isArray(files)) {
    for (const upload of files) {
      const bucket = byField[upload.fieldname] ?? [];
      bucket.push(upload);
      byField[upload.fieldname] = bucket;
    }
  }

  const grouped: Record<string, unknown> = {};
  for (const [field, uploads] of Object.entries(byField)) {
    grouped[field] = uploads.length === 1 ? uploads[0] : uploads;
  }
  return grouped;
}

export function isMultipartError(err: unknown): err is multer.MulterError {
  return err instanceof multer.MulterError;
}
