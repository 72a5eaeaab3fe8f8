import type { RecordId } from '../types';

/** Stable reason codes carried by every failed outcome. */
export type ErrorCode = 'validation_failed' | 'duplicate_key' | 'not_found';

export interface FieldIssue {
  path: string;
  message: string;
}

export interface ValidationError {
  code: 'validation_failed';
  message: string;
  issues: FieldIssue[];
}

export interface DuplicateKey {
  code: 'duplicate_key';
  message: string;
  field: string;
  value: string;
}

export interface NotFound {
  code: 'not_found';
  message: string;
  id: RecordId;
}

export type RecordError = ValidationError | DuplicateKey | NotFound;

export type Outcome<T, E extends RecordError = RecordError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E extends RecordError>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export function notFound(id: RecordId, message = 'Record not found'): NotFound {
  return { code: 'not_found', message, id };
}

export function duplicateKey(field: string, value: string, message = `${field} already registered`): DuplicateKey {
  return { code: 'duplicate_key', message, field, value };
}
