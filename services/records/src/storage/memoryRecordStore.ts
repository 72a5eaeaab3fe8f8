import type { RecordPredicate, RecordStore } from '../contracts/recordStore';
import { duplicateKey, fail, notFound, ok } from '../contracts/outcome';
import type { DuplicateKey, NotFound, Outcome } from '../contracts/outcome';
import type { RecordId, StoredRecord } from '../types';
import type { IdAllocator } from './ids';

export interface MemoryRecordStoreOptions<F, K extends RecordId> {
  ids: IdAllocator<K>;
  /** Field whose value must be distinct across live records. */
  uniqueBy?: keyof F & string;
  clock?: () => Date;
}

/**
 * Implements `RecordStore` over a Map kept in insertion order.
 *
 * Every operation runs synchronously, so the uniqueness check and the write
 * that follows it are never interleaved with another mutation.
 * Uniqueness is backed by a secondary index (unique value -> id).
 */
export class MemoryRecordStore<F extends object, K extends RecordId> implements RecordStore<F, K> {
  private readonly records = new Map<K, StoredRecord<F, K>>();
  private readonly uniqueIndex = new Map<string, K>();
  private readonly ids: IdAllocator<K>;
  private readonly uniqueBy?: keyof F & string;
  private readonly clock: () => Date;

  constructor(options: MemoryRecordStoreOptions<F, K>) {
    this.ids = options.ids;
    this.uniqueBy = options.uniqueBy;
    this.clock = options.clock ?? (() => new Date());
  }

  get size() {
    return this.records.size;
  }

  insert(candidate: F): Outcome<StoredRecord<F, K>, DuplicateKey> {
    const key = this.uniqueValue(candidate);
    if (key !== undefined && this.uniqueIndex.has(key)) {
      return fail(this.duplicate(key));
    }

    const id = this.ids.next();
    const record: StoredRecord<F, K> = {
      ...structuredClone(candidate),
      id,
      created_at: this.clock().toISOString(),
    };
    this.records.set(id, record);
    if (key !== undefined) this.uniqueIndex.set(key, id);

    return ok(structuredClone(record));
  }

  get(id: K): Outcome<StoredRecord<F, K>, NotFound> {
    const record = this.records.get(id);
    if (!record) return fail(notFound(id));
    return ok(structuredClone(record));
  }

  list(skip: number, limit: number) {
    if (skip < 0 || limit < 0) throw new RangeError('skip and limit must be non-negative');
    return Array.from(this.records.values())
      .slice(skip, skip + limit)
      .map((record) => structuredClone(record));
  }

  update(id: K, candidate: F): Outcome<StoredRecord<F, K>, NotFound | DuplicateKey> {
    const existing = this.records.get(id);
    if (!existing) return fail(notFound(id));

    const previousKey = this.uniqueValue(existing);
    const nextKey = this.uniqueValue(candidate);
    if (nextKey !== undefined && nextKey !== previousKey) {
      const holder = this.uniqueIndex.get(nextKey);
      if (holder !== undefined && holder !== id) return fail(this.duplicate(nextKey));
    }

    const record: StoredRecord<F, K> = {
      ...structuredClone(candidate),
      id,
      created_at: existing.created_at,
    };
    this.records.set(id, record);
    if (previousKey !== undefined) this.uniqueIndex.delete(previousKey);
    if (nextKey !== undefined) this.uniqueIndex.set(nextKey, id);

    return ok(structuredClone(record));
  }

  delete(id: K): Outcome<true, NotFound> {
    const existing = this.records.get(id);
    if (!existing) return fail(notFound(id));

    this.records.delete(id);
    const key = this.uniqueValue(existing);
    if (key !== undefined) this.uniqueIndex.delete(key);
    return ok(true);
  }

  countBy(predicate: RecordPredicate<StoredRecord<F, K>>) {
    let count = 0;
    for (const record of this.records.values()) {
      if (predicate(record)) count += 1;
    }
    return count;
  }

  find(predicate: RecordPredicate<StoredRecord<F, K>>) {
    for (const record of this.records.values()) {
      if (predicate(record)) return structuredClone(record);
    }
    return undefined;
  }

  snapshot() {
    return Array.from(this.records.values(), (record) => structuredClone(record));
  }

  private uniqueValue(record: F): string | undefined {
    if (!this.uniqueBy) return undefined;
    const value: unknown = record[this.uniqueBy];
    return typeof value === 'string' ? value : undefined;
  }

  private duplicate(value: string): DuplicateKey {
    const field = this.uniqueBy ?? 'key';
    return duplicateKey(field, value);
  }
}
