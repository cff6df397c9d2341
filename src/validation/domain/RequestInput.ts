// src/validation/domain/RequestInput.ts

export const SOURCE_KINDS = ['route', 'body', 'query', 'form', 'file'] as const;

export type SourceKind = (typeof SOURCE_KINDS)[number];

/**
 * Human-facing source names used in error messages.
 */
export const SOURCE_LABELS: Record<SourceKind, string> = {
  route: 'Route',
  body: 'Body',
  query: 'Query',
  form: 'Form',
  file: 'File',
};

export function isSourceKind(value: unknown): value is SourceKind {
  return typeof value === 'string' && (SOURCE_KINDS as readonly string[]).includes(value);
}

export type InputMap = Readonly<Record<string, unknown>>;

/**
 * Raw, untyped inputs of one request, grouped by source.
 * Rebuilt for every request and never mutated by validation.
 */
export type RequestInputBundle = { readonly [K in SourceKind]?: InputMap };
