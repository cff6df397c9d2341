// src/validation/index.ts

export { t, describeType, isOptionalType, ParameterDeclarationError } from './domain/TypeDescriptor';
export type {
  InferType,
  ScalarType,
  TypeDescriptor,
  UploadedFile,
} from './domain/TypeDescriptor';
export { SOURCE_KINDS, isSourceKind } from './domain/RequestInput';
export type { InputMap, RequestInputBundle, SourceKind } from './domain/RequestInput';
export { defineParameters, param } from './domain/ParameterSpec';
export type { ParameterSpec, ValidatedParameters } from './domain/ParameterSpec';

export { SourceBinding } from './bindings/SourceBinding';
export type { BindingOptions, ConversionTarget } from './bindings/SourceBinding';
export type { FileConstraints, ParameterConstraints } from './bindings/Constraints';
export {
  BodyParam,
  FileParam,
  FormParam,
  QueryParam,
  RouteParam,
  body,
  file,
  form,
  query,
  route,
} from './bindings/sources';

export { normalizeType } from './application/TypeNormalizer';
export type { NormalizedType } from './application/TypeNormalizer';
export { ValidationEngine } from './application/ValidationEngine';
export type { ParameterOutcome, ResolvedType } from './application/ValidationEngine';
export { VALIDATION_POLICIES, ValidationSession } from './application/ValidationSession';
export type { ValidationPolicy, SessionResult } from './application/ValidationSession';

export * from './errors/ParameterErrors';
