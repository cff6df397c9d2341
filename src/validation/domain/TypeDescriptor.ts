// src/validation/domain/TypeDescriptor.ts

/**
 * TypeDescriptor
 * --------------
 * Declared type of one handler parameter, built once when a route is registered.
 *
 * Shapes:
 * - plain: one concrete scalar type (str, int, float, bool, dict, file)
 * - list: homogeneous sequence whose element is a plain type or a union of plain types
 * - union: exactly one of n members; a member may itself be a list
 * - optional: sugar for union(inner, none)
 * - none: the null marker (only meaningful inside a union)
 * - any: skips validation entirely
 */

export type ScalarType = 'str' | 'int' | 'float' | 'bool' | 'dict' | 'file';

export interface PlainType<S extends ScalarType = ScalarType> {
  readonly kind: 'plain';
  readonly type: S;
}

export interface NoneType {
  readonly kind: 'none';
}

export interface AnyType {
  readonly kind: 'any';
}

export type ListElement = PlainType | UnionType<readonly PlainType[]>;

export interface ListType<E extends ListElement = ListElement> {
  readonly kind: 'list';
  readonly element: E;
}

// interfaces, so that the member defaults may refer back to TypeDescriptor
export interface UnionType<M extends readonly TypeDescriptor[] = readonly TypeDescriptor[]> {
  readonly kind: 'union';
  readonly members: M;
}

export interface OptionalType<I extends TypeDescriptor = TypeDescriptor> {
  readonly kind: 'optional';
  readonly inner: I;
}

export type TypeDescriptor = PlainType | NoneType | AnyType | ListType | UnionType | OptionalType;

/**
 * Thrown while declaring parameters. A programmer error, never a request error.
 */
export class ParameterDeclarationError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'ParameterDeclarationError';
  }
}

/* ------------------------------ value typing ------------------------------ */

/**
 * Uploaded file handle as produced by the multipart parser.
 * Only the fields the engine inspects are declared.
 */
export interface UploadedFile {
  fieldname?: string;
  originalname: string;
  mimetype: string;
  size: number;
  buffer?: Buffer;
}

type ScalarValue<S extends ScalarType> = S extends 'str'
  ? string
  : S extends 'int' | 'float'
    ? number
    : S extends 'bool'
      ? boolean
      : S extends 'dict'
        ? Record<string, unknown>
        : UploadedFile;

/**
 * TypeScript type of a value validated against descriptor D.
 */
export type InferType<D> = D extends PlainType<infer S>
  ? ScalarValue<S>
  : D extends ListType<infer E>
    ? InferType<E>[]
    : D extends UnionType<infer M>
      ? InferType<M[number]>
      : D extends OptionalType<infer I>
        ? InferType<I> | null
        : D extends NoneType
          ? null
          : unknown;

/* -------------------------------- builders -------------------------------- */

function plain<S extends ScalarType>(type: S): PlainType<S> {
  return { kind: 'plain', type };
}

function assertListElement(element: TypeDescriptor): ListElement {
  if (element.kind === 'plain') return element;

  if (element.kind === 'union') {
    const members: PlainType[] = [];
    for (const member of element.members) {
      if (member.kind !== 'plain') {
        throw new ParameterDeclarationError(
          `List element union may only contain plain types, got ${describeType(member)}.`,
        );
      }
      members.push(member);
    }
    return { kind: 'union', members };
  }

  throw new ParameterDeclarationError(
    `List element must be a plain type or a union of plain types, got ${describeType(element)}.`,
  );
}

export const t = {
  str: () => plain('str'),
  int: () => plain('int'),
  float: () => plain('float'),
  bool: () => plain('bool'),
  dict: () => plain('dict'),
  file: () => plain('file'),
  none: (): NoneType => ({ kind: 'none' }),
  any: (): AnyType => ({ kind: 'any' }),

  list<E extends ListElement>(element: E): ListType<E> {
    assertListElement(element);
    return { kind: 'list', element };
  },

  union<M extends TypeDescriptor[]>(...members: M): UnionType<M> {
    if (members.length === 0) {
      throw new ParameterDeclarationError('Union requires at least one member.');
    }
    if (members.some((member) => member.kind === 'any')) {
      throw new ParameterDeclarationError('Union cannot contain Any.');
    }
    return { kind: 'union', members };
  },

  optional<I extends TypeDescriptor>(inner: I): OptionalType<I> {
    if (inner.kind === 'any') {
      throw new ParameterDeclarationError('Optional cannot wrap Any.');
    }
    return { kind: 'optional', inner };
  },
};

/* ------------------------------- rendering -------------------------------- */

/**
 * Renders the declared annotation for error messages, e.g. `List[str]`.
 */
export function describeType(descriptor: TypeDescriptor): string {
  switch (descriptor.kind) {
    case 'plain':
      return descriptor.type;
    case 'none':
      return 'None';
    case 'any':
      return 'Any';
    case 'list':
      return `List[${describeType(descriptor.element)}]`;
    case 'union':
      return `Union[${descriptor.members.map(describeType).join(', ')}]`;
    case 'optional':
      return `Optional[${describeType(descriptor.inner)}]`;
  }
}

/**
 * True when the declared type accepts the null marker (Optional, or a union with None).
 * Determined from the declaration alone, before any value is seen.
 */
export function isOptionalType(descriptor: TypeDescriptor): boolean {
  switch (descriptor.kind) {
    case 'none':
    case 'optional':
      return true;
    case 'union':
      return descriptor.members.some(isOptionalType);
    default:
      return false;
  }
}
