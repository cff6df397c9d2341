// src/validation/errors/ParameterErrors.ts

/**
 * Parameter validation errors
 *
 * Every failure raised while resolving a parameter is one of these kinds:
 * - MisconfiguredSourceError: the declaration names a source the engine cannot read (500-class)
 * - MissingInputError: required input absent, no default, not optional (400-class)
 * - TypeMismatchError: coerced value is not one of the candidate types (400-class)
 * - SemanticValidationError: a binding constraint rejected a well-typed value (400-class)
 *
 * Custom error handlers receive these objects as-is and can switch on `kind`.
 */

import type { SourceKind } from '../domain/RequestInput';
import type { TypeDescriptor } from '../domain/TypeDescriptor';
import { SOURCE_LABELS } from '../domain/RequestInput';
import { describeType } from '../domain/TypeDescriptor';
import { runtimeTypeName } from '../domain/RuntimeType';

export type ParameterErrorKind =
  | 'misconfigured_source'
  | 'missing_input'
  | 'type_mismatch'
  | 'semantic_validation';

export abstract class ParameterError extends Error {
  public abstract readonly kind: ParameterErrorKind;
  public readonly parameter: string;

  protected constructor(message: string, parameter: string) {
    super(message);
    this.parameter = parameter;
  }

  /**
   * True for errors caused by the request rather than by the handler's declaration.
   */
  public get isClientError(): boolean {
    return this.kind !== 'misconfigured_source';
  }
}

export class MisconfiguredSourceError extends ParameterError {
  public readonly kind = 'misconfigured_source';
  public readonly source: string;

  public constructor(parameter: string, source: string) {
    super(`Parameter '${parameter}' is bound to unrecognized source '${source}'`, parameter);
    this.name = 'MisconfiguredSourceError';
    this.source = source;
  }
}

export class MissingInputError extends ParameterError {
  public readonly kind = 'missing_input';
  public readonly source: SourceKind;

  public constructor(parameter: string, source: SourceKind) {
    super(`Required ${SOURCE_LABELS[source]} parameter '${parameter}' not given`, parameter);
    this.name = 'MissingInputError';
    this.source = source;
  }
}

export class TypeMismatchError extends ParameterError {
  public readonly kind = 'type_mismatch';
  public readonly declaredType: TypeDescriptor;
  public readonly receivedType: string;

  public constructor(parameter: string, declaredType: TypeDescriptor, received: unknown) {
    const expected = describeType(declaredType);
    const receivedType = runtimeTypeName(received);
    super(`Parameter '${parameter}' must be type '${expected}', got '${receivedType}'`, parameter);
    this.name = 'TypeMismatchError';
    this.declaredType = declaredType;
    this.receivedType = receivedType;
  }
}

export class SemanticValidationError extends ParameterError {
  public readonly kind = 'semantic_validation';
  public readonly declaredType: TypeDescriptor;
  public readonly reason: string;

  public constructor(parameter: string, declaredType: TypeDescriptor, reason: string) {
    super(`Parameter '${parameter}' ${reason}`, parameter);
    this.name = 'SemanticValidationError';
    this.declaredType = declaredType;
    this.reason = reason;
  }
}

/**
 * Raised by source bindings when a constraint rejects a value.
 * The engine turns it into a SemanticValidationError naming the parameter.
 */
export class ConstraintViolationError extends Error {
  public constructor(reason: string) {
    super(reason);
    this.name = 'ConstraintViolationError';
  }
}

/**
 * Aggregate raised by a collect-all session when one or more parameters failed.
 */
export class ParameterValidationFailure extends Error {
  public readonly kind = 'multiple';
  public readonly errors: ParameterError[];
  public readonly issues: string[];

  public constructor(errors: ParameterError[]) {
    super('Invalid request parameters');
    this.name = 'ParameterValidationFailure';
    this.errors = errors;
    this.issues = errors.map((error) => error.message);
  }

  public get isClientError(): boolean {
    return true;
  }
}

export type ValidationSessionError = ParameterError | ParameterValidationFailure;

export function isValidationSessionError(err: unknown): err is ValidationSessionError {
  return err instanceof ParameterError || err instanceof ParameterValidationFailure;
}
