// src/http/errors/errorEnvelope.ts

/**
 * Standard error envelope
 *
 * Error responses of the service routes follow this structure so clients can parse them
 * reliably. Parameter validation failures carry the failing parameter(s) under `details`.
 */

import type { ValidationSessionError } from '../../validation/errors/ParameterErrors';
import { ParameterValidationFailure } from '../../validation/errors/ParameterErrors';

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'MISCONFIGURED_PARAMETER'
  | 'UPLOAD_ERROR'
  | 'NOT_FOUND'
  | 'INTERNAL_SERVER_ERROR';

export type ErrorEnvelope = {
  error: {
    code: ErrorCode;
    message: string;
    correlationId?: string;
    issues?: string[];
    details?: unknown;
  };
};

export function buildErrorEnvelope(params: {
  code: ErrorCode;
  message: string;
  correlationId?: string;
  issues?: string[];
  details?: unknown;
}): ErrorEnvelope {
  return {
    error: {
      code: params.code,
      message: params.message,
      ...(params.correlationId ? { correlationId: params.correlationId } : {}),
      ...(params.issues ? { issues: params.issues } : {}),
      ...(params.details !== undefined ? { details: params.details } : {}),
    },
  };
}

type ParameterErrorDetail = { parameter: string; kind: string };

export function parameterErrorEnvelope(
  err: ValidationSessionError,
  correlationId?: string,
): ErrorEnvelope {
  if (err instanceof ParameterValidationFailure) {
    const details: ParameterErrorDetail[] = err.errors.map((inner) => ({
      parameter: inner.parameter,
      kind: inner.kind,
    }));
    return buildErrorEnvelope({
      code: 'VALIDATION_ERROR',
      message: err.message,
      correlationId,
      issues: err.issues,
      details,
    });
  }

  const detail: ParameterErrorDetail = { parameter: err.parameter, kind: err.kind };
  return buildErrorEnvelope({
    code: err.isClientError ? 'VALIDATION_ERROR' : 'MISCONFIGURED_PARAMETER',
    message: err.message,
    correlationId,
    details: detail,
  });
}
