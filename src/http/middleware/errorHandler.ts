// src/http/middleware/errorHandler.ts

/**
 * Global error handler
 *
 * - Parameter errors that reached here (no custom handler on the route):
 *   request errors -> 400, misconfigured declarations -> 500
 * - Upload limit violations and malformed bodies -> 400
 * - Unknown accounts -> 404
 * - Anything else -> 500
 * - Always returns the standard error envelope with the correlationId
 */

import type { NextFunction, Request, Response } from 'express';
import { buildErrorEnvelope, parameterErrorEnvelope } from '../errors/errorEnvelope';
import { isValidationSessionError } from '../../validation/errors/ParameterErrors';
import { AccountNotFoundError } from '../../accounts/domain/Account';
import { requestLogger } from '../../shared/logging/Logger';
import { isMultipartError } from './uploads';
import type {} from '../requestContext';

function isMalformedBodyError(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'type' in err &&
    err.type === 'entity.parse.failed'
  );
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction,
): Response {
  const log = requestLogger(req.correlationId);

  if (isValidationSessionError(err)) {
    if (!err.isClientError) {
      log.error({ err }, 'Misconfigured handler parameter');
    }
    return res
      .status(err.isClientError ? 400 : 500)
      .json(parameterErrorEnvelope(err, req.correlationId));
  }

  if (isMultipartError(err)) {
    log.debug({ code: err.code }, 'Upload rejected');

    return res.status(400).json(
      buildErrorEnvelope({
        code: 'UPLOAD_ERROR',
        message: err.message,
        correlationId: req.correlationId,
        details: { field: err.field },
      }),
    );
  }

  if (isMalformedBodyError(err)) {
    return res.status(400).json(
      buildErrorEnvelope({
        code: 'VALIDATION_ERROR',
        message: 'Request body is not valid JSON.',
        correlationId: req.correlationId,
      }),
    );
  }

  if (err instanceof AccountNotFoundError) {
    return res.status(404).json(
      buildErrorEnvelope({
        code: 'NOT_FOUND',
        message: err.message,
        correlationId: req.correlationId,
      }),
    );
  }

  // 500: unknown/unexpected failures
  log.error({ err }, 'Unhandled error in request pipeline');

  return res.status(500).json(
    buildErrorEnvelope({
      code: 'INTERNAL_SERVER_ERROR',
      message: 'An unexpected error occurred.',
      correlationId: req.correlationId,
    }),
  );
}
