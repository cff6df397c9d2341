// src/validation/domain/ParameterSpec.ts

/**
 * ParameterSpec
 * -------------
 * Declared contract for one handler parameter: name, declared type, source binding
 * (which carries the constraints and default). Immutable once declared.
 */

import type { SourceBinding } from '../bindings/SourceBinding';
import type { InferType, TypeDescriptor } from './TypeDescriptor';
import { ParameterDeclarationError } from './TypeDescriptor';

export type ParameterSpec<N extends string = string, D extends TypeDescriptor = TypeDescriptor> = {
  readonly name: N;
  readonly type: D;
  readonly source: SourceBinding;
};

/**
 * Typed record a handler receives once every parameter in P validated.
 */
export type ValidatedParameters<P extends readonly ParameterSpec[]> = {
  [S in P[number] as S['name']]: InferType<S['type']>;
};

export function param<N extends string, D extends TypeDescriptor>(
  name: N,
  type: D,
  source: SourceBinding,
): ParameterSpec<N, D> {
  if (name.trim().length === 0) {
    throw new ParameterDeclarationError('Parameter name must be a non-empty string.');
  }
  return Object.freeze({ name, type, source });
}

/**
 * Keeps declaration order (the order parameters are validated in) and rejects duplicate names.
 */
export function defineParameters<P extends ParameterSpec[]>(...params: P): P {
  const seen = new Set<string>();
  for (const { name } of params) {
    if (seen.has(name)) {
      throw new ParameterDeclarationError(`Parameter '${name}' is declared more than once.`);
    }
    seen.add(name);
  }
  return params;
}
