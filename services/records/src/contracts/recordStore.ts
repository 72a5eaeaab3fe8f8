import type { RecordId, StoredRecord } from '../types';
import type { DuplicateKey, NotFound, Outcome } from './outcome';

export type RecordPredicate<R> = (record: R) => boolean;

/**
 * Authoritative holder of the live records of one entity type.
 * Every read hands out a copy; the store keeps sole ownership of what it holds.
 */
export interface RecordStore<F, K extends RecordId> {
  readonly size: number;
  insert(candidate: F): Outcome<StoredRecord<F, K>, DuplicateKey>;
  get(id: K): Outcome<StoredRecord<F, K>, NotFound>;
  list(skip: number, limit: number): StoredRecord<F, K>[];
  update(id: K, candidate: F): Outcome<StoredRecord<F, K>, NotFound | DuplicateKey>;
  delete(id: K): Outcome<true, NotFound>;
  countBy(predicate: RecordPredicate<StoredRecord<F, K>>): number;
  find(predicate: RecordPredicate<StoredRecord<F, K>>): StoredRecord<F, K> | undefined;
  snapshot(): StoredRecord<F, K>[];
}
