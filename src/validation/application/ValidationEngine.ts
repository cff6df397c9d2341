// src/validation/application/ValidationEngine.ts

/**
 * ValidationEngine
 * ----------------
 * Resolves ONE parameter against one request's inputs.
 *
 * Steps:
 * 1) resolve the binding's source inputs (unknown source -> MisconfiguredSourceError)
 * 2) fetch the raw value
 * 3) on absence: binding default, else null for optional types, else MissingInputError
 * 4) normalize the declared type against the raw value (union/list election);
 *    Any passes the raw value through
 * 5) convert through the binding
 * 6) conformance against the candidate types -> TypeMismatchError
 * 7) binding constraints -> SemanticValidationError
 *
 * Stateless and synchronous; safe to share between concurrent requests.
 */

import type { ParameterSpec } from '../domain/ParameterSpec';
import type { RequestInputBundle } from '../domain/RequestInput';
import type { ScalarType } from '../domain/TypeDescriptor';
import type { NormalizedType } from './TypeNormalizer';
import { isSourceKind } from '../domain/RequestInput';
import { isOptionalType } from '../domain/TypeDescriptor';
import { resolveType } from '../domain/RuntimeType';
import {
  ConstraintViolationError,
  MisconfiguredSourceError,
  MissingInputError,
  SemanticValidationError,
  TypeMismatchError,
} from '../errors/ParameterErrors';
import { normalizeType } from './TypeNormalizer';

export type ResolvedType = ScalarType | 'list' | 'any';

export type ParameterOutcome =
  | { status: 'coerced'; value: unknown; resolvedType: ResolvedType }
  | { status: 'absent'; value: null };

function isAbsent(value: unknown): value is undefined | null {
  return value === undefined || value === null;
}

export class ValidationEngine {
  public resolve(spec: ParameterSpec, bundle: RequestInputBundle): ParameterOutcome {
    const { name, type: declared, source: binding } = spec;

    const kind = binding.kind;
    if (!isSourceKind(kind)) {
      throw new MisconfiguredSourceError(name, kind);
    }
    const inputs = bundle[kind];
    if (inputs === undefined) {
      throw new MisconfiguredSourceError(name, kind);
    }

    let raw = binding.get(inputs, name);

    if (isAbsent(raw)) {
      if (!isAbsent(binding.default)) {
        raw = binding.default;
      } else if (isOptionalType(declared)) {
        return { status: 'absent', value: null };
      } else {
        throw new MissingInputError(name, kind);
      }
    }

    const normalized = normalizeType(declared, raw);
    if (normalized.skip) {
      return { status: 'coerced', value: raw, resolvedType: 'any' };
    }

    const converted = binding.convert(raw, normalized);

    const resolvedType = this.checkConformance(converted, normalized);
    if (resolvedType === undefined) {
      // messages name the declared type, not the elected union member
      throw new TypeMismatchError(name, declared, converted);
    }

    try {
      binding.validate(converted);
    } catch (err) {
      if (err instanceof ConstraintViolationError) {
        throw new SemanticValidationError(name, declared, err.message);
      }
      throw err;
    }

    return { status: 'coerced', value: converted, resolvedType };
  }

  private checkConformance(value: unknown, normalized: NormalizedType): ResolvedType | undefined {
    if (!normalized.isList) {
      return resolveType(value, normalized.candidates);
    }

    if (!Array.isArray(value)) return undefined;

    const conforms = value.every(
      (element) => resolveType(element, normalized.candidates) !== undefined,
    );
    return conforms ? 'list' : undefined;
  }
}
