// src/validation/application/ValidationSession.ts

/**
 * ValidationSession
 * -----------------
 * Runs the ValidationEngine over every declared parameter of one handler, in declaration
 * order, and produces the typed parameter record.
 *
 * Policies:
 * - fail-fast (default): the first failing parameter aborts the session.
 * - collect-all: request errors are gathered into one ParameterValidationFailure.
 *   A MisconfiguredSourceError still aborts immediately.
 */

import type { ParameterSpec, ValidatedParameters } from '../domain/ParameterSpec';
import type { RequestInputBundle } from '../domain/RequestInput';
import type { ResolvedType } from './ValidationEngine';
import {
  MisconfiguredSourceError,
  ParameterError,
  ParameterValidationFailure,
} from '../errors/ParameterErrors';
import { ValidationEngine } from './ValidationEngine';

export type ValidationPolicy = 'fail-fast' | 'collect-all';

export const VALIDATION_POLICIES: readonly ValidationPolicy[] = ['fail-fast', 'collect-all'];

export type ValidationSessionOptions = {
  policy?: ValidationPolicy;
  engine?: ValidationEngine;
};

export type SessionResult<P extends readonly ParameterSpec[]> = {
  parameters: ValidatedParameters<P>;
  /** Type each present parameter resolved to; absent optionals map to 'none'. */
  resolvedTypes: Record<string, ResolvedType | 'none'>;
};

export class ValidationSession<P extends readonly ParameterSpec[]> {
  private readonly policy: ValidationPolicy;
  private readonly engine: ValidationEngine;

  public constructor(
    private readonly params: P,
    options: ValidationSessionOptions = {},
  ) {
    this.policy = options.policy ?? 'fail-fast';
    this.engine = options.engine ?? new ValidationEngine();
  }

  public run(bundle: RequestInputBundle): SessionResult<P> {
    const values: Record<string, unknown> = {};
    const resolvedTypes: Record<string, ResolvedType | 'none'> = {};
    const errors: ParameterError[] = [];

    for (const spec of this.params) {
      try {
        const outcome = this.engine.resolve(spec, bundle);
        values[spec.name] = outcome.value;
        resolvedTypes[spec.name] = outcome.status === 'absent' ? 'none' : outcome.resolvedType;
      } catch (err) {
        if (
          this.policy === 'fail-fast' ||
          !(err instanceof ParameterError) ||
          err instanceof MisconfiguredSourceError
        ) {
          throw err;
        }
        errors.push(err);
      }
    }

    if (errors.length > 0) {
      throw new ParameterValidationFailure(errors);
    }

    // every value was checked against the descriptor its key is typed from
    return { parameters: values as ValidatedParameters<P>, resolvedTypes };
  }
}
