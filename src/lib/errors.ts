/**
 * Typed error hierarchy for the query pipeline
 *
 * Every failure a query can hit is one of these classes, each with a `kind`
 * discriminator so the CLI can report and map it without string matching.
 *
 * Usage:
 * ```ts
 * import { FieldNotFoundError, isTypedError } from './lib/errors.js';
 *
 * throw new FieldNotFoundError('birth', 'Page infobox has no birth information');
 *
 * if (isTypedError(error) && error.kind === 'FIELD_NOT_FOUND') { ... }
 * ```
 */

import type { InfoboxField } from '../extract/fields.js';

/** Error kinds for type discrimination */
export type ErrorKind =
  | 'NOT_FOUND'
  | 'MISSING_INFOBOX'
  | 'FIELD_NOT_FOUND'
  | 'UPSTREAM'
  | 'VALIDATION';

/** Base interface for typed errors */
export interface TypedError extends Error {
  readonly kind: ErrorKind;
}

/**
 * Search returned no results, or the requested page does not exist
 */
export class NotFoundError extends Error implements TypedError {
  readonly kind = 'NOT_FOUND' as const;

  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/**
 * The fetched page has no element classed "infobox"
 */
export class MissingInfoboxError extends Error implements TypedError {
  readonly kind = 'MISSING_INFOBOX' as const;

  constructor(message = 'Page has no infobox') {
    super(message);
    this.name = 'MissingInfoboxError';
    Object.setPrototypeOf(this, MissingInfoboxError.prototype);
  }
}

/**
 * The infobox text did not match the field's extraction pattern
 */
export class FieldNotFoundError extends Error implements TypedError {
  readonly kind = 'FIELD_NOT_FOUND' as const;

  constructor(
    readonly field: InfoboxField,
    message: string
  ) {
    super(message);
    this.name = 'FieldNotFoundError';
    Object.setPrototypeOf(this, FieldNotFoundError.prototype);
  }
}

/**
 * Wikipedia answered with an HTTP error or an API error payload
 */
export class UpstreamError extends Error implements TypedError {
  readonly kind = 'UPSTREAM' as const;

  constructor(
    message: string,
    readonly status?: number
  ) {
    super(message);
    this.name = 'UpstreamError';
    Object.setPrototypeOf(this, UpstreamError.prototype);
  }
}

/**
 * Configuration or input failed validation
 */
export class ValidationError extends Error implements TypedError {
  readonly kind = 'VALIDATION' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Type guard to check if an error is one of the typed errors above
 */
export function isTypedError(error: unknown): error is TypedError {
  return error instanceof Error && 'kind' in error && typeof error.kind === 'string';
}

/**
 * Map error kind to process exit code for `infobot ask`
 */
export function getExitCodeForKind(kind: ErrorKind): number {
  switch (kind) {
    case 'NOT_FOUND':
    case 'MISSING_INFOBOX':
    case 'FIELD_NOT_FOUND':
      return 1;
    case 'UPSTREAM':
      return 3;
    case 'VALIDATION':
      return 2;
    default:
      return 1;
  }
}

/**
 * Human-readable message for any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
