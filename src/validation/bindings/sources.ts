// src/validation/bindings/sources.ts

/**
 * Concrete source bindings, one per request input origin.
 *
 * Route, Query and Form values reach the server as text and are coerced.
 * Body values are already decoded JSON and File values are upload handles;
 * both are checked as received.
 */

import type { SourceKind } from '../domain/RequestInput';
import type { FileConstraints, ParameterConstraints } from './Constraints';
import type { BindingOptions } from './SourceBinding';
import { SourceBinding } from './SourceBinding';

export class RouteParam extends SourceBinding {
  public readonly kind: SourceKind = 'route';
  protected readonly coercesText = true;

  public constructor(options: BindingOptions = {}) {
    super(options);
  }
}

export class BodyParam extends SourceBinding {
  public readonly kind: SourceKind = 'body';
  protected readonly coercesText = false;

  public constructor(options: BindingOptions = {}) {
    super(options);
  }
}

export class QueryParam extends SourceBinding {
  public readonly kind: SourceKind = 'query';
  protected readonly coercesText = true;

  public constructor(options: BindingOptions = {}) {
    super(options);
  }
}

export class FormParam extends SourceBinding {
  public readonly kind: SourceKind = 'form';
  protected readonly coercesText = true;

  public constructor(options: BindingOptions = {}) {
    super(options);
  }
}

/**
 * Upload handles pass through untouched; the engine neither keeps nor closes them.
 */
export class FileParam extends SourceBinding<FileConstraints> {
  public readonly kind: SourceKind = 'file';
  protected readonly coercesText = false;

  public constructor(options: BindingOptions<FileConstraints> = {}) {
    super(options);
  }
}

export const route = (options?: BindingOptions<ParameterConstraints>) => new RouteParam(options);
export const body = (options?: BindingOptions<ParameterConstraints>) => new BodyParam(options);
export const query = (options?: BindingOptions<ParameterConstraints>) => new QueryParam(options);
export const form = (options?: BindingOptions<ParameterConstraints>) => new FormParam(options);
export const file = (options?: BindingOptions<FileConstraints>) => new FileParam(options);
