/**
 * Domain tests for type descriptors and parameter declarations.
 */

import {
  ParameterDeclarationError,
  describeType,
  isOptionalType,
  t,
} from '../../src/validation/domain/TypeDescriptor';
import { defineParameters, param } from '../../src/validation/domain/ParameterSpec';
import { body, query } from '../../src/validation/bindings/sources';

describe('describeType', () => {
  it('renders plain, list, union and optional annotations', () => {
    expect(describeType(t.int())).toBe('int');
    expect(describeType(t.list(t.str()))).toBe('List[str]');
    expect(describeType(t.union(t.int(), t.float()))).toBe('Union[int, float]');
    expect(describeType(t.optional(t.str()))).toBe('Optional[str]');
    expect(describeType(t.union(t.list(t.str()), t.int(), t.none()))).toBe(
      'Union[List[str], int, None]',
    );
    expect(describeType(t.list(t.union(t.str(), t.int())))).toBe('List[Union[str, int]]');
    expect(describeType(t.any())).toBe('Any');
  });
});

describe('isOptionalType', () => {
  it('is true for Optional and for unions containing None', () => {
    expect(isOptionalType(t.optional(t.int()))).toBe(true);
    expect(isOptionalType(t.union(t.int(), t.none()))).toBe(true);
    expect(isOptionalType(t.union(t.str(), t.optional(t.int())))).toBe(true);
  });

  it('is false for plain, list and None-free unions', () => {
    expect(isOptionalType(t.int())).toBe(false);
    expect(isOptionalType(t.list(t.str()))).toBe(false);
    expect(isOptionalType(t.union(t.int(), t.float()))).toBe(false);
  });
});

describe('type builders', () => {
  it('rejects an empty union', () => {
    expect(() => t.union()).toThrow(ParameterDeclarationError);
  });

  it('rejects Any inside a union', () => {
    expect(() => t.union(t.int(), t.any())).toThrow('Union cannot contain Any.');
  });

  it('rejects Any inside an optional', () => {
    expect(() => t.optional(t.any())).toThrow('Optional cannot wrap Any.');
  });

  it('accepts optional lists and unions of lists', () => {
    expect(describeType(t.optional(t.list(t.int())))).toBe('Optional[List[int]]');
    expect(describeType(t.union(t.list(t.str()), t.none()))).toBe('Union[List[str], None]');
  });
});

describe('defineParameters', () => {
  it('keeps declaration order', () => {
    const params = defineParameters(
      param('b', t.int(), body()),
      param('a', t.str(), body()),
      param('c', t.bool(), query()),
    );

    expect(params.map((spec) => spec.name)).toEqual(['b', 'a', 'c']);
  });

  it('rejects duplicate parameter names', () => {
    expect(() =>
      defineParameters(param('age', t.int(), body()), param('age', t.int(), query())),
    ).toThrow("Parameter 'age' is declared more than once.");
  });

  it('rejects blank parameter names', () => {
    expect(() => param('  ', t.int(), body())).toThrow(ParameterDeclarationError);
  });
});
