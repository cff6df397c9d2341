// src/validation/domain/RuntimeType.ts

/**
 * Runtime type membership for coerced values.
 *
 * JSON cannot tell `3` from `3.0`, so `float` accepts every finite number while
 * `int` only accepts integral ones. Candidate order decides which one a value resolves to.
 */

import type { ScalarType, UploadedFile } from './TypeDescriptor';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isUploadedFile(value: unknown): value is UploadedFile {
  if (!isRecord(value)) return false;
  return (
    typeof value.originalname === 'string' &&
    typeof value.mimetype === 'string' &&
    typeof value.size === 'number'
  );
}

export function matchesType(value: unknown, type: ScalarType): boolean {
  switch (type) {
    case 'str':
      return typeof value === 'string';
    case 'int':
      return typeof value === 'number' && Number.isInteger(value);
    case 'float':
      return typeof value === 'number' && Number.isFinite(value);
    case 'bool':
      return typeof value === 'boolean';
    case 'file':
      return isUploadedFile(value);
    case 'dict':
      return isRecord(value) && !isUploadedFile(value);
  }
}

/**
 * First candidate (in declaration order) the value belongs to, or undefined.
 */
export function resolveType(
  value: unknown,
  candidates: readonly ScalarType[],
): ScalarType | undefined {
  return candidates.find((candidate) => matchesType(value, candidate));
}

/**
 * Name of the value's runtime type, used in type-mismatch messages.
 */
export function runtimeTypeName(value: unknown): string {
  if (value === null || value === undefined) return 'None';
  if (Array.isArray(value)) return 'list';
  if (typeof value === 'string') return 'str';
  if (typeof value === 'boolean') return 'bool';
  if (typeof value === 'number') return Number.isInteger(value) ? 'int' : 'float';
  if (isUploadedFile(value)) return 'file';
  if (isRecord(value)) return 'dict';
  return typeof value;
}
