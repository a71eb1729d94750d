/**
 * Error taxonomy shared by the catalog, ingestion and job services.
 *
 * Services throw these at validation boundaries; the HTTP layer maps `kind`
 * to a status code and CLI commands print `message`.
 */

export type CatalogErrorKind = 'validation' | 'not-found' | 'conflict' | 'authorization';

export abstract class CatalogError extends Error {
  abstract readonly kind: CatalogErrorKind;
}

export class ValidationError extends CatalogError {
  readonly kind = 'validation';

  constructor(message: string, public readonly field?: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends CatalogError {
  readonly kind = 'not-found';

  constructor(message: string, public readonly resource?: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends CatalogError {
  readonly kind = 'conflict';

  constructor(message: string, public readonly key?: string) {
    super(message);
    this.name = 'ConflictError';
  }
}

export class AuthorizationError extends CatalogError {
  readonly kind = 'authorization';

  constructor(message: string) {
    super(message);
    this.name = 'AuthorizationError';
  }
}

export function isCatalogError(error: unknown): error is CatalogError {
  return error instanceof CatalogError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Result shape returned by every mutating operation.
 */
export interface Failure {
  success: false;
  error: string;
  kind?: CatalogErrorKind;
}

export type OperationResult<T extends object = object> = ({ success: true; warnings?: string[] } & T) | Failure;

export function failure(error: unknown): Failure {
  if (isCatalogError(error)) {
    return { success: false, error: error.message, kind: error.kind };
  }
  return { success: false, error: errorMessage(error) };
}
