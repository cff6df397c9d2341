// src/validation/bindings/Constraints.ts

/**
 * Semantic constraints attached to a source binding.
 *
 * Checks run after type conformance, so they only look at values of the kind they
 * concern (string checks skip numbers, numeric bounds skip strings, and so on).
 * The first violation throws a ConstraintViolationError.
 */

import { ConstraintViolationError } from '../errors/ParameterErrors';
import { isUploadedFile } from '../domain/RuntimeType';

export type CustomCheck = (value: unknown) => boolean | string;

export interface ParameterConstraints {
  minStrLength?: number;
  maxStrLength?: number;
  minListLength?: number;
  maxListLength?: number;
  /** Inclusive numeric bounds. */
  min?: number;
  max?: number;
  /** Every character of a string must appear here. */
  whitelist?: string;
  /** No character of a string may appear here. */
  blacklist?: string;
  pattern?: RegExp;
  /** Runs last on the whole value; `false` or a message rejects it. */
  func?: CustomCheck;
}

export interface FileConstraints extends ParameterConstraints {
  contentTypes?: readonly string[];
  /** Bytes. */
  minSize?: number;
  maxSize?: number;
}

export function checkConstraints(value: unknown, constraints: FileConstraints): void {
  if (Array.isArray(value)) {
    checkListLength(value, constraints);
    for (const element of value) {
      checkElement(element, constraints);
    }
  } else {
    checkElement(value, constraints);
  }

  if (constraints.func) {
    const outcome = constraints.func(value);
    if (outcome === false) {
      throw new ConstraintViolationError('failed custom validation');
    }
    if (typeof outcome === 'string') {
      throw new ConstraintViolationError(outcome);
    }
  }
}

function checkListLength(value: unknown[], constraints: ParameterConstraints): void {
  const { minListLength, maxListLength } = constraints;
  if (minListLength !== undefined && value.length < minListLength) {
    throw new ConstraintViolationError(`must have at least ${minListLength} items`);
  }
  if (maxListLength !== undefined && value.length > maxListLength) {
    throw new ConstraintViolationError(`must have at most ${maxListLength} items`);
  }
}

function checkElement(value: unknown, constraints: FileConstraints): void {
  if (typeof value === 'string') {
    checkString(value, constraints);
  } else if (typeof value === 'number') {
    checkNumber(value, constraints);
  } else if (isUploadedFile(value)) {
    checkFile(value.mimetype, value.size, constraints);
  }
}

function checkString(value: string, constraints: ParameterConstraints): void {
  const { minStrLength, maxStrLength, whitelist, blacklist, pattern } = constraints;
  // code points, not UTF-16 units
  const length = [...value].length;

  if (minStrLength !== undefined && length < minStrLength) {
    throw new ConstraintViolationError(`must be at least ${minStrLength} characters long`);
  }
  if (maxStrLength !== undefined && length > maxStrLength) {
    throw new ConstraintViolationError(`must be at most ${maxStrLength} characters long`);
  }

  if (whitelist !== undefined) {
    const outsider = [...value].find((char) => !whitelist.includes(char));
    if (outsider !== undefined) {
      throw new ConstraintViolationError(`must contain only characters from '${whitelist}'`);
    }
  }

  if (blacklist !== undefined) {
    const forbidden = [...value].find((char) => blacklist.includes(char));
    if (forbidden !== undefined) {
      throw new ConstraintViolationError(`must not contain '${forbidden}'`);
    }
  }

  if (pattern !== undefined && !matchesPattern(value, pattern)) {
    throw new ConstraintViolationError(`must match pattern '${pattern.source}'`);
  }
}

function matchesPattern(value: string, pattern: RegExp): boolean {
  // global/sticky patterns carry lastIndex between calls
  pattern.lastIndex = 0;
  return pattern.test(value);
}

function checkNumber(value: number, constraints: ParameterConstraints): void {
  const { min, max } = constraints;
  if (min !== undefined && value < min) {
    throw new ConstraintViolationError(`must be at least ${min}`);
  }
  if (max !== undefined && value > max) {
    throw new ConstraintViolationError(`must be at most ${max}`);
  }
}

function checkFile(mimetype: string, size: number, constraints: FileConstraints): void {
  const { contentTypes, minSize, maxSize } = constraints;

  if (contentTypes !== undefined && !contentTypes.includes(mimetype)) {
    throw new ConstraintViolationError(`must have content type ${contentTypes.join(' or ')}`);
  }
  if (minSize !== undefined && size < minSize) {
    throw new ConstraintViolationError(`must be at least ${minSize} bytes`);
  }
  if (maxSize !== undefined && size > maxSize) {
    throw new ConstraintViolationError(`must be at most ${maxSize} bytes`);
  }
}
