// src/validation/bindings/coercion.ts

/**
 * Scalar coercion for textual sources (route segments, query strings, form fields).
 */

import type { ScalarType } from '../domain/TypeDescriptor';

export type CoerceResult<T> = { ok: true; value: T } | { ok: false; reason: string };

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

const TRUE_LITERALS = ['true', '1'];
const FALSE_LITERALS = ['false', '0'];

export function coerceInteger(raw: string): CoerceResult<number> {
  const trimmed = raw.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return { ok: false, reason: 'invalid integer format' };
  }

  const value = Number(trimmed);
  if (!Number.isSafeInteger(value)) {
    return { ok: false, reason: 'integer out of range' };
  }

  return { ok: true, value };
}

export function coerceFloat(raw: string): CoerceResult<number> {
  const trimmed = raw.trim();
  if (!FLOAT_PATTERN.test(trimmed)) {
    return { ok: false, reason: 'invalid numeric format' };
  }

  const value = Number(trimmed);
  if (!Number.isFinite(value)) {
    return { ok: false, reason: 'non-finite number' };
  }

  return { ok: true, value };
}

export function coerceBoolean(raw: string): CoerceResult<boolean> {
  const normalized = raw.trim().toLowerCase();
  if (TRUE_LITERALS.includes(normalized)) return { ok: true, value: true };
  if (FALSE_LITERALS.includes(normalized)) return { ok: true, value: false };
  return { ok: false, reason: 'invalid boolean literal' };
}

export function coerceText(raw: string, type: ScalarType): CoerceResult<unknown> {
  switch (type) {
    case 'str':
      return { ok: true, value: raw };
    case 'int':
      return coerceInteger(raw);
    case 'float':
      return coerceFloat(raw);
    case 'bool':
      return coerceBoolean(raw);
    default:
      return { ok: false, reason: `text cannot become ${type}` };
  }
}
