// src/validation/bindings/SourceBinding.ts

/**
 * SourceBinding
 * -------------
 * Capability contract for one input origin. The engine is written only against this class:
 *
 * - get(inputs, name): raw value for `name`, or undefined when absent
 * - default: substituted when the input is absent (undefined/null means "no default")
 * - convert(raw, target): best-effort coercion; never throws, returns the value unchanged
 *   when it cannot coerce so that conformance reports the mismatch
 * - validate(value): constraint checks on an already well-typed value
 *
 * `kind` is a plain string so that custom bindings can be declared; the engine rejects any
 * kind it has no inputs for.
 */

import type { InputMap } from '../domain/RequestInput';
import type { ScalarType } from '../domain/TypeDescriptor';
import { matchesType } from '../domain/RuntimeType';
import { coerceText } from './coercion';
import type { ParameterConstraints } from './Constraints';
import { checkConstraints } from './Constraints';

export type ConversionTarget = {
  candidates: readonly ScalarType[];
  isList: boolean;
};

export type BindingOptions<C extends ParameterConstraints = ParameterConstraints> = C & {
  default?: unknown;
};

export abstract class SourceBinding<C extends ParameterConstraints = ParameterConstraints> {
  public abstract readonly kind: string;
  public readonly default: unknown;
  public readonly constraints: C;

  /** Textual sources turn "42", "true" or a lone value for a list into typed values. */
  protected abstract readonly coercesText: boolean;

  protected constructor(options: BindingOptions<C>) {
    this.default = options.default;
    this.constraints = options;
  }

  public get(inputs: InputMap, name: string): unknown {
    return Object.prototype.hasOwnProperty.call(inputs, name) ? inputs[name] : undefined;
  }

  public convert(raw: unknown, target: ConversionTarget): unknown {
    if (!target.isList) {
      return this.convertScalar(raw, target.candidates);
    }

    if (Array.isArray(raw)) {
      return raw.map((item) => this.convertScalar(item, target.candidates));
    }

    // a repeated query key arrives as an array, a single occurrence as a string
    if (this.coercesText && typeof raw === 'string') {
      return [this.convertScalar(raw, target.candidates)];
    }

    return raw;
  }

  public validate(value: unknown): void {
    checkConstraints(value, this.constraints);
  }

  /** Candidates are tried in declaration order; the first that holds or coerces the value wins. */
  protected convertScalar(raw: unknown, candidates: readonly ScalarType[]): unknown {
    for (const candidate of candidates) {
      if (matchesType(raw, candidate)) return raw;
      if (this.coercesText && typeof raw === 'string') {
        const result = coerceText(raw, candidate);
        if (result.ok) return result.value;
      }
    }

    return raw;
  }
}
