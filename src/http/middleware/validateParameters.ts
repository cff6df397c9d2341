// src/http/middleware/validateParameters.ts

/**
 * Parameter validation stage of the Express pipeline.
 *
 * - buildInputBundle: snapshots route/body/query/form/file inputs of one request
 * - validateParameters: middleware; stores the validated record on req.validatedParameters
 * - withParameters: validation stage + handler receiving the typed record
 *
 * Failure responses:
 * - custom errorHandler configured: its { status, body } is sent as returned, for every kind
 * - otherwise: 400 { error: message } (plus `issues` for collect-all); a misconfigured
 *   parameter goes to the global error handler instead (500)
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { ParameterSpec, ValidatedParameters } from '../../validation/domain/ParameterSpec';
import type { RequestInputBundle } from '../../validation/domain/RequestInput';
import type { ValidationSessionOptions } from '../../validation/application/ValidationSession';
import type { ValidationSessionError } from '../../validation/errors/ParameterErrors';
import { ValidationSession } from '../../validation/application/ValidationSession';
import { isRecord } from '../../validation/domain/RuntimeType';
import {
  ParameterValidationFailure,
  isValidationSessionError,
} from '../../validation/errors/ParameterErrors';
import { requestLogger } from '../../shared/logging/Logger';
import { groupUploadedFiles } from './uploads';
import type {} from '../requestContext';

export type ErrorResponse = { status: number; body: unknown };

export type CustomErrorHandler = (err: ValidationSessionError, req: Request) => ErrorResponse;

export type ValidateParametersOptions = ValidationSessionOptions & {
  errorHandler?: CustomErrorHandler;
};

export type ParameterHandler<P extends readonly ParameterSpec[]> = (
  parameters: ValidatedParameters<P>,
  req: Request,
  res: Response,
) => Promise<unknown> | unknown;

const FORM_CONTENT_TYPES = ['application/x-www-form-urlencoded', 'multipart/form-data'];

export function buildInputBundle(req: Request): RequestInputBundle {
  const payload: Record<string, unknown> = isRecord(req.body) ? { ...req.body } : {};
  const isJson = Boolean(req.is('application/json'));
  const isForm = Boolean(req.is(FORM_CONTENT_TYPES));

  return {
    route: { ...req.params },
    body: isJson ? payload : {},
    query: { ...req.query },
    form: isForm ? payload : {},
    file: groupUploadedFiles(req),
  };
}

function defaultErrorBody(err: ValidationSessionError): Record<string, unknown> {
  return err instanceof ParameterValidationFailure
    ? { error: err.message, issues: err.issues }
    : { error: err.message };
}

/**
 * Runs the session; on failure responds (or forwards to next) and returns undefined.
 */
function runSession<P extends readonly ParameterSpec[]>(
  session: ValidationSession<P>,
  options: ValidateParametersOptions,
  req: Request,
  res: Response,
  next: NextFunction,
): ValidatedParameters<P> | undefined {
  try {
    return session.run(buildInputBundle(req)).parameters;
  } catch (err) {
    if (!isValidationSessionError(err)) {
      next(err);
      return undefined;
    }

    const log = requestLogger(req.correlationId);
    const context = {
      kind: err.kind,
      ...(err instanceof ParameterValidationFailure
        ? { issues: err.issues }
        : { parameter: err.parameter }),
    };
    if (err.isClientError) {
      log.debug(context, 'Request parameter validation failed');
    } else {
      log.error(context, 'Handler parameter is misconfigured');
    }

    if (options.errorHandler) {
      const response = options.errorHandler(err, req);
      res.status(response.status).json(response.body);
      return undefined;
    }

    if (!err.isClientError) {
      next(err);
      return undefined;
    }

    res.status(400).json(defaultErrorBody(err));
    return undefined;
  }
}

export function validateParameters<P extends readonly ParameterSpec[]>(
  params: P,
  options: ValidateParametersOptions = {},
): RequestHandler {
  const session = new ValidationSession(params, options);

  return (req: Request, res: Response, next: NextFunction) => {
    const parameters = runSession(session, options, req, res, next);
    if (parameters === undefined) return;

    req.validatedParameters = parameters;
    next();
  };
}

export function withParameters<P extends readonly ParameterSpec[]>(
  params: P,
  handler: ParameterHandler<P>,
  options: ValidateParametersOptions = {},
): RequestHandler {
  const session = new ValidationSession(params, options);

  return async (req: Request, res: Response, next: NextFunction) => {
    const parameters = runSession(session, options, req, res, next);
    if (parameters === undefined) return;

    try {
      await handler(parameters, req, res);
    } catch (err) {
      next(err);
    }
  };
}
