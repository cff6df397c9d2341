// src/validation/application/TypeNormalizer.ts

/**
 * TypeNormalizer
 * --------------
 * Reduces a declared TypeDescriptor to the flat shape the engine checks against:
 *
 *   { candidates: ordered concrete types, isList, isOptional }
 *
 * The null marker never survives as a candidate; it only sets `isOptional`.
 *
 * Union election: when a union has a list member and the raw value is an array whose
 * every element already belongs to that member's element types, the union collapses to
 * that list member (first matching list member in declaration order). Otherwise the
 * union's plain members become the candidates and its list members are dropped.
 * This inspects the raw value before conversion, so it is data-dependent: a query value
 * `["1", "2"]` does not elect `List[int]` because its elements are still strings.
 * A union whose only non-null members are lists (`Optional[List[int]]`) is left with no
 * plain candidates in that case, so repeated textual query values for it always end in
 * a TypeMismatchError; only already-typed arrays (a JSON body) or absence pass.
 */

import type {
  ListElement,
  ListType,
  ScalarType,
  TypeDescriptor,
} from '../domain/TypeDescriptor';
import { resolveType } from '../domain/RuntimeType';

export type NormalizedType = {
  /** Concrete types a value (or each list element) may have, in declaration order. */
  candidates: readonly ScalarType[];
  isList: boolean;
  isOptional: boolean;
  /** True for Any: the engine passes the raw value through unchecked. */
  skip: boolean;
  /** The descriptor the candidates came from (the elected list member for unions). */
  effective: TypeDescriptor;
};

export function normalizeType(declared: TypeDescriptor, raw: unknown): NormalizedType {
  switch (declared.kind) {
    case 'any':
      return { candidates: [], isList: false, isOptional: true, skip: true, effective: declared };

    case 'none':
      return { candidates: [], isList: false, isOptional: true, skip: false, effective: declared };

    case 'plain':
      return {
        candidates: [declared.type],
        isList: false,
        isOptional: false,
        skip: false,
        effective: declared,
      };

    case 'list':
      return {
        candidates: elementCandidates(declared.element),
        isList: true,
        isOptional: false,
        skip: false,
        effective: declared,
      };

    case 'union':
    case 'optional':
      return normalizeUnion(declared, raw);
  }
}

function normalizeUnion(declared: TypeDescriptor, raw: unknown): NormalizedType {
  const members = flattenMembers(declared);
  const isOptional = members.some((member) => member.kind === 'none');

  const elected = Array.isArray(raw)
    ? members.find(
        (member): member is ListType =>
          member.kind === 'list' && isListOf(raw, elementCandidates(member.element)),
      )
    : undefined;

  if (elected) {
    return {
      candidates: elementCandidates(elected.element),
      isList: true,
      isOptional,
      skip: false,
      effective: elected,
    };
  }

  const candidates: ScalarType[] = [];
  for (const member of members) {
    if (member.kind === 'plain' && !candidates.includes(member.type)) {
      candidates.push(member.type);
    }
  }

  return { candidates, isList: false, isOptional, skip: false, effective: declared };
}

/**
 * Expands nested unions and optionals into one member list, keeping declaration order.
 */
function flattenMembers(descriptor: TypeDescriptor): TypeDescriptor[] {
  switch (descriptor.kind) {
    case 'union':
      return descriptor.members.flatMap(flattenMembers);
    case 'optional':
      return [...flattenMembers(descriptor.inner), { kind: 'none' }];
    default:
      return [descriptor];
  }
}

export function elementCandidates(element: ListElement): ScalarType[] {
  return element.kind === 'plain' ? [element.type] : element.members.map((member) => member.type);
}

function isListOf(values: unknown[], candidates: readonly ScalarType[]): boolean {
  return values.every((value) => resolveType(value, candidates) !== undefined);
}
